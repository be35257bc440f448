/**
 * The polling host: device sample in, key events out.
 *
 * @module bridge/key-bridge
 */

import { DEFAULT_POLL_INTERVAL_MS } from "../constants.js";
import type { ActuatorErrorHandler, KeyActuator } from "../core/actuator.js";
import { ButtonEdgeDispatcher } from "../core/button-dispatcher.js";
import { PulseKeyEngine, type PulseEngineConfig } from "../core/pulse-engine.js";
import type { AxisMode, AxisStateSnapshot, ButtonBindings, DeviceSample, KeySymbol } from "../core/types.js";
import { orientSample, routeSample, type AxisRoute, type OrientationOptions } from "./axis-router.js";
import type { DeviceReader } from "./device-reader.js";
import {
  DEFAULT_AXIS_KEYS,
  DEFAULT_AXIS_LAYOUT,
  DEFAULT_AXIS_ROUTES,
  DEFAULT_BUTTON_BINDINGS,
  type AxisLayoutEntry,
  type EngineName,
} from "./layout.js";
import { ModeSync, type ModeGroupMember, type ModeSource } from "./mode-sync.js";

/**
 * Configuration for a {@link KeyBridge}.
 */
export interface KeyBridgeConfig {
  /** Source of device samples, read once per tick */
  reader: DeviceReader;
  /** Where key events go */
  actuator: KeyActuator;
  /** Tuning per engine (default: library defaults for both) */
  engines?: Partial<Record<EngineName, Partial<PulseEngineConfig>>>;
  /** Axis placement (default: DEFAULT_AXIS_LAYOUT) */
  layout?: readonly AxisLayoutEntry[];
  /** Key per axis name; axes without a key are not bound (default: DEFAULT_AXIS_KEYS) */
  axisKeys?: Readonly<Record<string, KeySymbol>>;
  /** Channel routing (default: DEFAULT_AXIS_ROUTES) */
  routes?: readonly AxisRoute[];
  /** Inversion and Y/Z swap (default: none) */
  orientation?: Partial<OrientationOptions>;
  /** Button bindings (default: DEFAULT_BUTTON_BINDINGS) */
  buttons?: ButtonBindings;
  /** Signal for the synced group's mode (default: none, fixed mode) */
  modeSource?: ModeSource | null;
  /** Synced group mode when the source is absent or unknown (default: pulse) */
  initialGroupMode?: AxisMode;
  /** Poll interval in milliseconds (default: DEFAULT_POLL_INTERVAL_MS) */
  pollIntervalMs?: number;
  /** Button tap settle delay in seconds (default: DEFAULT_SETTLE_DELAY_SECONDS) */
  settleDelaySeconds?: number;
  /** Monotonic clock in seconds (default: performance.now() / 1000) */
  clock?: () => number;
  /** Report for swallowed actuator failures (default: console warning) */
  onActuatorError?: ActuatorErrorHandler;
}

const defaultClock = () => performance.now() / 1000;

/**
 * Runs the read → mode sync → route → engines → buttons cycle on a fixed interval.
 *
 * Every engine, filter and dispatcher belongs to one bridge; two bridges share
 * nothing. Stopping the bridge always releases every key it may have down.
 *
 * @example
 * ```ts
 * const reader = new LatestSampleReader();
 * const bridge = new KeyBridge({
 *   reader,
 *   actuator: new LoggingKeyActuator(),
 *   engines: { zoom: { minHz: 8, maxHz: 18, holdThreshold: 0.5 } },
 *   orientation: { invertY: true, invertZ: true, invertYaw: true },
 * });
 *
 * bridge.start();
 * reader.push(sample); // from the device
 * // Later:
 * bridge.stop();
 * ```
 */
export class KeyBridge {
  private reader: DeviceReader;
  private engines: Map<EngineName, PulseKeyEngine> = new Map();
  private axisEngines: Map<string, PulseKeyEngine> = new Map();
  private dispatcher: ButtonEdgeDispatcher;
  private modeSync: ModeSync;
  private routes: readonly AxisRoute[];
  private orientation: Partial<OrientationOptions>;
  private clock: () => number;
  private pollIntervalMs: number;
  private intervalId: NodeJS.Timeout | null = null;
  private ticks = 0;
  private lastSample: DeviceSample | null = null;

  constructor(config: KeyBridgeConfig) {
    const pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
      throw new Error(`[KeyBridge] pollIntervalMs must be a positive finite number. Got: ${pollIntervalMs}`);
    }

    this.reader = config.reader;
    this.pollIntervalMs = pollIntervalMs;
    this.routes = config.routes ?? DEFAULT_AXIS_ROUTES;
    this.orientation = config.orientation ?? {};
    this.clock = config.clock ?? defaultClock;

    const engineNames: EngineName[] = ["move", "zoom"];
    for (const name of engineNames) {
      this.engines.set(
        name,
        new PulseKeyEngine(config.actuator, config.engines?.[name] ?? {}, config.onActuatorError),
      );
    }

    const layout = config.layout ?? DEFAULT_AXIS_LAYOUT;
    const axisKeys = config.axisKeys ?? DEFAULT_AXIS_KEYS;
    // Filled while binding below; ModeSync keeps the reference
    const synced: ModeGroupMember[] = [];
    this.modeSync = new ModeSync(synced, config.modeSource ?? null, config.initialGroupMode ?? "pulse");

    for (const entry of layout) {
      const key = axisKeys[entry.name];
      const engine = this.engines.get(entry.engine);
      if (key === undefined || !engine) continue;

      engine.bind(entry.name, key, entry.mode === "synced" ? this.modeSync.mode : entry.mode);
      this.axisEngines.set(entry.name, engine);
      if (entry.mode === "synced") {
        synced.push({ engine, name: entry.name });
      }
    }

    this.dispatcher = new ButtonEdgeDispatcher(config.actuator, config.buttons ?? DEFAULT_BUTTON_BINDINGS, {
      settleDelaySeconds: config.settleDelaySeconds,
      onActuatorError: config.onActuatorError,
    });
  }

  /**
   * Process one poll tick.
   *
   * A tick without new data keeps driving the engines with the last sample the
   * device reported, so smoothing decays and scheduled releases still happen.
   * Button edges only come from new samples; due taps are released either way.
   *
   * @param now - Current time in seconds (default: the configured clock)
   * @returns true if a new sample was read and processed
   */
  tick(now: number = this.clock()): boolean {
    const sample = this.reader.read();
    if (sample) {
      this.lastSample = sample;
    }

    if (this.lastSample) {
      this.modeSync.poll();
      this.updateAxes(this.lastSample, now);
    }

    if (!sample) {
      this.dispatcher.flush(now);
      return false;
    }

    this.dispatcher.dispatch(sample.buttons, now);
    this.ticks++;
    return true;
  }

  /**
   * Start polling.
   */
  start(): void {
    if (this.intervalId !== null) {
      return; // Already running
    }

    this.intervalId = setInterval(() => {
      this.tick();
    }, this.pollIntervalMs);
    console.log(`[KeyBridge] Started poll loop at ${Math.round(1000 / this.pollIntervalMs)} Hz`);
  }

  /**
   * Stop polling and release every key. Safe to call more than once.
   */
  stop(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      console.log("[KeyBridge] Stopped poll loop");
    }
    this.releaseAll();
  }

  /**
   * Check if the loop is running
   */
  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Force-release every bound axis and every pending button tap.
   */
  releaseAll(): void {
    for (const engine of this.engines.values()) {
      engine.forceReleaseAll();
    }
    this.dispatcher.releaseAll();
  }

  /**
   * Current mode of the synced axis group.
   */
  getGroupMode(): AxisMode {
    return this.modeSync.mode;
  }

  /**
   * Runtime state of a bound axis, or undefined if unbound.
   */
  getAxisState(name: string): AxisStateSnapshot | undefined {
    return this.axisEngines.get(name)?.getAxisState(name);
  }

  /**
   * Runtime state of every bound axis.
   */
  getAxisStates(): AxisStateSnapshot[] {
    const states: AxisStateSnapshot[] = [];
    for (const name of this.axisEngines.keys()) {
      const state = this.getAxisState(name);
      if (state) states.push(state);
    }
    return states;
  }

  /**
   * Number of ticks that processed a new sample.
   */
  getTickCount(): number {
    return this.ticks;
  }

  private updateAxes(sample: DeviceSample, now: number): void {
    for (const update of routeSample(orientSample(sample, this.orientation), this.routes)) {
      this.axisEngines.get(update.name)?.update(update.name, update.value, now);
    }
  }
}
