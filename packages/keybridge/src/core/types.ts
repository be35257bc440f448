/**
 * Core types shared by the signal filter, the pulse engine and the button dispatcher.
 *
 * @module core/types
 */

/**
 * Abstract key symbol understood by the key actuator (e.g. "a", "page_up", "shift").
 */
export type KeySymbol = string;

/**
 * Output regime of a bound axis.
 * - `pulse`: short taps whose rate follows the magnitude, held above the hold threshold
 * - `hold`: key held for as long as the magnitude is outside the deadzone
 */
export type AxisMode = "pulse" | "hold";

/**
 * Binding for one device button: a single key, or an ordered modifier combo
 * (modifiers first, base key last).
 */
export type ButtonBinding = KeySymbol | readonly KeySymbol[];

/**
 * Button index to binding, as a Map or an index-keyed record.
 * Indices without an entry are ignored.
 */
export type ButtonBindings = ReadonlyMap<number, ButtonBinding> | Readonly<Record<number, ButtonBinding>>;

/**
 * One sample from the 6-DOF device, channels roughly in [-1, 1].
 */
export interface DeviceSample {
  x: number;
  y: number;
  z: number;
  roll: number;
  pitch: number;
  yaw: number;
  /** Button vector in device order */
  buttons: boolean[];
}

/**
 * Signed analog channel of a {@link DeviceSample}.
 */
export type AxisChannel = "x" | "y" | "z" | "roll" | "pitch" | "yaw";

/**
 * Read-only view of a bound axis' runtime state.
 */
export interface AxisStateSnapshot {
  name: string;
  key: KeySymbol;
  mode: AxisMode;
  /** Actuator press issued and not yet released */
  pressed: boolean;
  /** In the continuous-hold regime */
  held: boolean;
  /** Start time of the most recent pulse (seconds) */
  lastPulseStartTime: number;
  /** Time at which the in-flight pulse ends (seconds) */
  scheduledReleaseTime: number;
  /** Current smoothed value */
  filteredValue: number;
}

/**
 * Narrow an arbitrary value to an {@link AxisMode}, falling back to `pulse`.
 */
export function toAxisMode(mode: unknown): AxisMode {
  return mode === "hold" ? "hold" : "pulse";
}
