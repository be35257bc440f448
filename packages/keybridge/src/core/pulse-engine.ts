/**
 * Analog magnitude to key events.
 *
 * Games that only read the keyboard have no notion of "a little bit left".
 * PulseKeyEngine turns a smoothed axis magnitude into one of three outputs:
 *
 * 1. Below the deadzone: the key is released
 * 2. Between the deadzone and the hold threshold: short pulses whose rate grows
 *    linearly with the magnitude (duty-cycle keying)
 * 3. At or above the hold threshold: the key is held down continuously
 *
 * Axes bound in `hold` mode skip step 2 and hold whenever they leave the deadzone.
 *
 * @module core/pulse-engine
 */

import {
  DEFAULT_DEADZONE,
  DEFAULT_EMA_ALPHA,
  DEFAULT_HOLD_THRESHOLD,
  DEFAULT_MAX_HZ,
  DEFAULT_MIN_HZ,
  DEFAULT_PRESS_DURATION_SECONDS,
  PULSE_EPSILON,
} from "../constants.js";
import { createSafeActuator, type ActuatorErrorHandler, type KeyActuator } from "./actuator.js";
import { AxisSignalFilter } from "./signal-filter.js";
import { toAxisMode, type AxisMode, type AxisStateSnapshot, type KeySymbol } from "./types.js";
import { clamp, finiteOr } from "./utils.js";

/**
 * Tuning for one engine. All bound axes of an engine share it.
 */
export interface PulseEngineConfig {
  /**
   * On-time of each pulse in seconds.
   * @default 0.02
   */
  pressDurationSeconds: number;
  /**
   * Pulse rate at the deadzone edge, in Hz.
   * @default 15
   */
  minHz: number;
  /**
   * Pulse rate just below the hold threshold, in Hz.
   * @default 30
   */
  maxHz: number;
  /**
   * Filtered magnitudes at or below this are at rest.
   * @default 0.001
   */
  deadzone: number;
  /**
   * Filtered magnitudes at or above this hold the key (pulse mode only).
   * @default 0.4
   */
  holdThreshold: number;
  /**
   * EMA weight of the newest sample, in (0, 1].
   * @default 0.3
   */
  emaAlpha: number;
}

/**
 * Default pulse engine configuration.
 */
export const DEFAULT_PULSE_ENGINE_CONFIG: PulseEngineConfig = {
  pressDurationSeconds: DEFAULT_PRESS_DURATION_SECONDS,
  minHz: DEFAULT_MIN_HZ,
  maxHz: DEFAULT_MAX_HZ,
  deadzone: DEFAULT_DEADZONE,
  holdThreshold: DEFAULT_HOLD_THRESHOLD,
  emaAlpha: DEFAULT_EMA_ALPHA,
};

/**
 * Merge overrides onto the defaults. Values that are not finite or are out of
 * range fall back to their default instead of raising.
 */
export function resolvePulseEngineConfig(overrides: Partial<PulseEngineConfig> = {}): PulseEngineConfig {
  const d = DEFAULT_PULSE_ENGINE_CONFIG;
  const nonNegative = (value: unknown, fallback: number) => {
    const n = finiteOr(value, fallback);
    return n >= 0 ? n : fallback;
  };
  const positive = (value: unknown, fallback: number) => {
    const n = finiteOr(value, fallback);
    return n > 0 ? n : fallback;
  };
  const alpha = finiteOr(overrides.emaAlpha, d.emaAlpha);

  return {
    pressDurationSeconds: nonNegative(overrides.pressDurationSeconds, d.pressDurationSeconds),
    minHz: positive(overrides.minHz, d.minHz),
    maxHz: positive(overrides.maxHz, d.maxHz),
    deadzone: nonNegative(overrides.deadzone, d.deadzone),
    // holdThreshold <= deadzone is tolerated: the frequency mapping floors its span
    holdThreshold: finiteOr(overrides.holdThreshold, d.holdThreshold),
    emaAlpha: alpha > 0 && alpha <= 1 ? alpha : d.emaAlpha,
  };
}

/**
 * Runtime state of one bound logical direction.
 */
interface BoundAxis {
  readonly key: KeySymbol;
  mode: AxisMode;
  pressed: boolean;
  held: boolean;
  lastPulseStartTime: number;
  scheduledReleaseTime: number;
}

/**
 * Converts per-axis analog magnitudes into key presses and releases.
 *
 * Call {@link update} once per axis per poll tick. The engine's `pressed`/`held`
 * flags are the only record of which bound keys are down; nothing else may press
 * or release a bound key.
 *
 * @example
 * ```ts
 * const engine = new PulseKeyEngine(actuator, { minHz: 15, maxHz: 30 });
 * engine.bind("move_right", "d", "pulse");
 * engine.bind("move_left", "a", "pulse");
 *
 * // Each poll tick (now in seconds):
 * engine.update("move_right", Math.max(0, x), now);
 * engine.update("move_left", Math.max(0, -x), now);
 *
 * // On shutdown:
 * engine.forceReleaseAll();
 * ```
 */
export class PulseKeyEngine {
  private axes: Map<string, BoundAxis> = new Map();
  private filter: AxisSignalFilter;
  private actuator: KeyActuator;
  private config: PulseEngineConfig;

  /**
   * @param actuator - Where key events go. Wrapped so its failures never reach the engine.
   * @param config - Optional configuration overrides
   * @param onActuatorError - Report for swallowed actuator failures (default: console warning)
   */
  constructor(
    actuator: KeyActuator,
    config: Partial<PulseEngineConfig> = {},
    onActuatorError?: ActuatorErrorHandler,
  ) {
    this.actuator = createSafeActuator(actuator, onActuatorError);
    this.config = resolvePulseEngineConfig(config);
    this.filter = new AxisSignalFilter(this.config.emaAlpha);
  }

  /**
   * Register a logical direction. Invalid modes fall back to `pulse`.
   * Re-binding a name releases its old key (if down) and resets its state and filter.
   */
  bind(name: string, key: KeySymbol, mode: AxisMode | string = "pulse"): void {
    const existing = this.axes.get(name);
    if (existing) {
      this.ensureReleased(existing);
    }

    this.axes.set(name, {
      key,
      mode: toAxisMode(mode),
      pressed: false,
      held: false,
      lastPulseStartTime: 0,
      scheduledReleaseTime: 0,
    });
    this.filter.reset(name);
  }

  /**
   * Advance one axis by one poll tick.
   *
   * @param name - Bound axis name (unbound names are ignored)
   * @param rawValue - Raw magnitude for this direction, normally in [0, 1]
   * @param now - Current time in seconds
   */
  update(name: string, rawValue: number, now: number): void {
    const axis = this.axes.get(name);
    if (!axis) return;

    const mag = Math.abs(this.filter.filter(name, rawValue));
    const { deadzone, holdThreshold } = this.config;

    if (mag <= deadzone) {
      if (axis.held) {
        this.ensureReleased(axis);
      } else if (axis.pressed && now >= axis.scheduledReleaseTime) {
        this.release(axis);
      }
      return;
    }

    if (axis.mode === "hold") {
      if (!axis.held) {
        this.press(axis);
        axis.held = true;
      }
      return;
    }

    // Strong input holds the key so fast motion stays smooth instead of rapid-fire
    if (mag >= holdThreshold) {
      if (!axis.held) {
        this.press(axis);
        axis.held = true;
      }
      return;
    }

    // Dropped out of the hold band
    if (axis.held) {
      this.release(axis);
      axis.held = false;
    }

    const interval = this.pulseInterval(mag);

    if (now - axis.lastPulseStartTime >= interval) {
      this.press(axis);
      axis.scheduledReleaseTime = now + this.config.pressDurationSeconds;
      axis.lastPulseStartTime = now;
    }

    if (axis.pressed && now >= axis.scheduledReleaseTime) {
      this.release(axis);
    }
  }

  /**
   * Change an axis' mode at runtime. Invalid modes fall back to `pulse`.
   *
   * Does not release anything: the caller must {@link forceRelease} the axis
   * right after switching so no press from the old regime survives.
   */
  setMode(name: string, mode: AxisMode | string): void {
    const axis = this.axes.get(name);
    if (!axis) return;
    axis.mode = toAxisMode(mode);
  }

  /**
   * Release an axis' key if it is pressed or held, and clear its state.
   */
  forceRelease(name: string): void {
    const axis = this.axes.get(name);
    if (!axis) return;
    this.ensureReleased(axis);
  }

  /**
   * {@link forceRelease} every bound axis. Call on shutdown.
   */
  forceReleaseAll(): void {
    for (const axis of this.axes.values()) {
      this.ensureReleased(axis);
    }
  }

  /**
   * Get a snapshot of an axis' runtime state, or undefined if unbound.
   */
  getAxisState(name: string): AxisStateSnapshot | undefined {
    const axis = this.axes.get(name);
    if (!axis) return undefined;
    return {
      name,
      key: axis.key,
      mode: axis.mode,
      pressed: axis.pressed,
      held: axis.held,
      lastPulseStartTime: axis.lastPulseStartTime,
      scheduledReleaseTime: axis.scheduledReleaseTime,
      filteredValue: this.filter.get(name),
    };
  }

  /**
   * Names of all bound axes, in bind order.
   */
  getBoundNames(): string[] {
    return Array.from(this.axes.keys());
  }

  /**
   * Get the resolved configuration.
   */
  getConfig(): PulseEngineConfig {
    return { ...this.config };
  }

  /**
   * Seconds between pulse starts for a magnitude inside the pulsing band.
   * Maps [deadzone, holdThreshold] linearly onto [minHz, maxHz].
   */
  private pulseInterval(mag: number): number {
    const { deadzone, holdThreshold, minHz, maxHz } = this.config;
    const span = Math.max(PULSE_EPSILON, holdThreshold - deadzone);
    const unit = clamp((mag - deadzone) / span, 0, 1);
    const freq = minHz + unit * (maxHz - minHz);
    return 1 / Math.max(PULSE_EPSILON, freq);
  }

  private press(axis: BoundAxis): void {
    if (axis.pressed) return;
    this.actuator.press(axis.key);
    axis.pressed = true;
  }

  private release(axis: BoundAxis): void {
    if (!axis.pressed) return;
    this.actuator.release(axis.key);
    axis.pressed = false;
  }

  private ensureReleased(axis: BoundAxis): void {
    if (axis.pressed || axis.held) {
      this.actuator.release(axis.key);
    }
    axis.pressed = false;
    axis.held = false;
    axis.scheduledReleaseTime = 0;
  }
}
