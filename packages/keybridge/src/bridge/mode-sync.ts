/**
 * Keeps a group of axes in step with an external pulse/hold signal.
 *
 * @module bridge/mode-sync
 */

import type { PulseKeyEngine } from "../core/pulse-engine.js";
import type { AxisMode } from "../core/types.js";

/**
 * External signal selecting the group mode (e.g. a lock-key LED).
 * Returns null while the state is unknown; the current mode is kept.
 */
export interface ModeSource {
  isHoldMode(): boolean | null;
}

/**
 * Mode source with a fixed value, changeable by the host.
 */
export class StaticModeSource implements ModeSource {
  private hold: boolean;

  constructor(hold: boolean) {
    this.hold = hold;
  }

  set(hold: boolean): void {
    this.hold = hold;
  }

  isHoldMode(): boolean {
    return this.hold;
  }
}

/**
 * Mode source fed by a remote reporter (the injector client reads the lock key
 * on its own machine and reports it).
 */
export class RemoteModeSource implements ModeSource {
  private hold: boolean | null = null;

  report(hold: boolean): void {
    this.hold = hold;
  }

  isHoldMode(): boolean | null {
    return this.hold;
  }
}

/**
 * One axis of a synced group.
 */
export interface ModeGroupMember {
  engine: PulseKeyEngine;
  name: string;
}

/**
 * Human-readable name of a group mode.
 */
export function describeGroupMode(mode: AxisMode): string {
  return mode === "hold" ? "Character (hold)" : "Camera (pulse)";
}

/**
 * Polls a {@link ModeSource} and switches every member axis when it changes.
 *
 * A switch sets the new mode on every member first, then force-releases every
 * member, so no press made under the old mode outlives it.
 */
export class ModeSync {
  private members: ModeGroupMember[];
  private source: ModeSource | null;
  private current: AxisMode;

  /**
   * @param members - Axes switched together
   * @param source - External signal, or null for a fixed mode
   * @param fallbackMode - Mode used when the source is absent or unknown at startup
   */
  constructor(members: ModeGroupMember[], source: ModeSource | null, fallbackMode: AxisMode) {
    this.members = members;
    this.source = source;
    const initial = source?.isHoldMode() ?? null;
    this.current = initial === null ? fallbackMode : initial ? "hold" : "pulse";
  }

  /** The group's current mode */
  get mode(): AxisMode {
    return this.current;
  }

  /**
   * Read the source and switch the group if its mode changed.
   *
   * @returns true if the group switched
   */
  poll(): boolean {
    const hold = this.source?.isHoldMode() ?? null;
    if (hold === null) return false;
    const next: AxisMode = hold ? "hold" : "pulse";
    if (next === this.current) return false;
    this.apply(next);
    return true;
  }

  /**
   * Switch the group to a mode and release every member.
   */
  apply(mode: AxisMode): void {
    for (const { engine, name } of this.members) {
      engine.setMode(name, mode);
    }
    for (const { engine, name } of this.members) {
      engine.forceRelease(name);
    }
    this.current = mode;
    console.log(`[KeyBridge] Mode changed to: ${describeGroupMode(mode)}`);
  }
}
