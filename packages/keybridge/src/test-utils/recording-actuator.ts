import type { KeyActuator } from "../core/actuator.js";
import type { KeySymbol } from "../core/types.js";

/**
 * One recorded actuator call.
 */
export interface RecordedKeyEvent {
  action: "press" | "release";
  key: KeySymbol;
}

/**
 * Key actuator that records every call and tracks which keys are down.
 * Can be told to throw, to exercise the actuation boundary.
 */
export class RecordingActuator implements KeyActuator {
  readonly events: RecordedKeyEvent[] = [];
  private down: Set<KeySymbol> = new Set();
  private failing = false;

  /**
   * Make every following call throw (after recording it).
   */
  setFailing(failing: boolean): void {
    this.failing = failing;
  }

  press(key: KeySymbol): void {
    this.events.push({ action: "press", key });
    this.down.add(key);
    if (this.failing) throw new Error(`injection refused for ${key}`);
  }

  release(key: KeySymbol): void {
    this.events.push({ action: "release", key });
    this.down.delete(key);
    if (this.failing) throw new Error(`injection refused for ${key}`);
  }

  /** Recorded calls as "press:a" / "release:a" strings */
  log(): string[] {
    return this.events.map((e) => `${e.action}:${e.key}`);
  }

  /** Number of recorded presses, optionally for one key */
  pressCount(key?: KeySymbol): number {
    return this.events.filter((e) => e.action === "press" && (key === undefined || e.key === key)).length;
  }

  /** Number of recorded releases, optionally for one key */
  releaseCount(key?: KeySymbol): number {
    return this.events.filter((e) => e.action === "release" && (key === undefined || e.key === key)).length;
  }

  /** Whether the last recorded call for this key was a press */
  isDown(key: KeySymbol): boolean {
    return this.down.has(key);
  }

  clear(): void {
    this.events.length = 0;
  }
}
