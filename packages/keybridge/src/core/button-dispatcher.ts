/**
 * Device buttons to key taps.
 *
 * @module core/button-dispatcher
 */

import { DEFAULT_SETTLE_DELAY_SECONDS } from "../constants.js";
import { createSafeActuator, type ActuatorErrorHandler, type KeyActuator } from "./actuator.js";
import type { ButtonBinding, ButtonBindings, KeySymbol } from "./types.js";
import { finiteOr } from "./utils.js";

/**
 * Options for {@link ButtonEdgeDispatcher}.
 */
export interface ButtonDispatcherOptions {
  /**
   * Time between a tap's press and its release, in seconds.
   * 0 releases in the same call.
   * @default 0.005
   */
  settleDelaySeconds?: number;
  /** Report for swallowed actuator failures (default: console warning) */
  onActuatorError?: ActuatorErrorHandler;
}

/**
 * A tap whose keys are down and whose release is due.
 */
interface PendingTap {
  index: number;
  keys: readonly KeySymbol[];
  releaseAt: number;
}

/**
 * Normalize a binding to its ordered key list.
 */
function toKeyList(binding: ButtonBinding): readonly KeySymbol[] {
  return typeof binding === "string" ? [binding] : binding;
}

function isBindingMap(bindings: ButtonBindings): bindings is ReadonlyMap<number, ButtonBinding> {
  return bindings instanceof Map;
}

function toBindingMap(bindings: ButtonBindings): Map<number, readonly KeySymbol[]> {
  const entries: Iterable<[number, ButtonBinding]> =
    isBindingMap(bindings)
      ? bindings.entries()
      : Object.entries(bindings).map(([index, binding]): [number, ButtonBinding] => [Number(index), binding]);

  const map = new Map<number, readonly KeySymbol[]>();
  for (const [index, binding] of entries) {
    const keys = toKeyList(binding);
    if (Number.isInteger(index) && index >= 0 && keys.length > 0) {
      map.set(index, [...keys]);
    }
  }
  return map;
}

/**
 * Fires key taps on the rising edges of a polled button vector.
 *
 * A single-key binding taps that key. A combo binding presses every key in order,
 * then releases them in reverse order, so modifiers are down before and after the
 * base key.
 *
 * The settle delay between press and release never blocks the poll loop: the
 * release is queued and issued by the first {@link dispatch} or {@link flush} call
 * whose `now` has reached it. A tap that needs a key still held by a pending tap
 * releases that tap first, so one key never carries two overlapping presses.
 *
 * @example
 * ```ts
 * const dispatcher = new ButtonEdgeDispatcher(actuator, {
 *   0: "esc",
 *   14: ["shift", "space"],
 * });
 *
 * // Each poll tick (now in seconds):
 * dispatcher.dispatch(sample.buttons, now);
 *
 * // On shutdown:
 * dispatcher.releaseAll();
 * ```
 */
export class ButtonEdgeDispatcher {
  private previous: boolean[] = [];
  private pending: PendingTap[] = [];
  private bindings: Map<number, readonly KeySymbol[]>;
  private actuator: KeyActuator;
  private settleDelaySeconds: number;

  constructor(actuator: KeyActuator, bindings: ButtonBindings, options: ButtonDispatcherOptions = {}) {
    this.actuator = createSafeActuator(actuator, options.onActuatorError);
    this.bindings = toBindingMap(bindings);
    const settle = finiteOr(options.settleDelaySeconds, DEFAULT_SETTLE_DELAY_SECONDS);
    this.settleDelaySeconds = settle >= 0 ? settle : DEFAULT_SETTLE_DELAY_SECONDS;
  }

  /**
   * Compare a new button vector against the previous one and tap every newly
   * pressed, bound button.
   *
   * An empty vector carries no button information and only flushes due releases.
   * A vector of a different length than the previous one resets the previous
   * state to all-released first.
   *
   * @param buttons - Button vector in device order
   * @param now - Current time in seconds
   * @returns Indices that fired a tap, in ascending order
   */
  dispatch(buttons: readonly boolean[], now: number): number[] {
    this.flush(now);

    if (buttons.length === 0) return [];

    if (buttons.length !== this.previous.length) {
      this.previous = new Array<boolean>(buttons.length).fill(false);
    }

    const fired: number[] = [];
    buttons.forEach((down, index) => {
      if (down && !this.previous[index]) {
        const keys = this.bindings.get(index);
        if (keys) {
          this.tap(index, keys, now);
          fired.push(index);
        }
      }
    });

    this.previous = buttons.map(Boolean);
    return fired;
  }

  /**
   * Release every pending tap whose settle delay has elapsed.
   */
  flush(now: number): void {
    const due = this.pending.filter((tap) => now >= tap.releaseAt);
    if (due.length === 0) return;
    this.pending = this.pending.filter((tap) => now < tap.releaseAt);
    for (const tap of due) {
      this.releaseKeys(tap.keys);
    }
  }

  /**
   * Release every pending tap immediately. Call on shutdown.
   */
  releaseAll(): void {
    const taps = this.pending;
    this.pending = [];
    for (const tap of taps) {
      this.releaseKeys(tap.keys);
    }
  }

  /**
   * Whether any tap is still waiting for its release.
   */
  hasPending(): boolean {
    return this.pending.length > 0;
  }

  /**
   * Replace the button bindings. Pending taps keep their original keys.
   */
  setBindings(bindings: ButtonBindings): void {
    this.bindings = toBindingMap(bindings);
  }

  private tap(index: number, keys: readonly KeySymbol[], now: number): void {
    // Pending taps of this button, or holding any of its keys, finish first
    const overlapping = this.pending.filter(
      (tap) => tap.index === index || tap.keys.some((key) => keys.includes(key)),
    );
    if (overlapping.length > 0) {
      this.pending = this.pending.filter((tap) => !overlapping.includes(tap));
      for (const tap of overlapping) {
        this.releaseKeys(tap.keys);
      }
    }

    for (const key of keys) {
      this.actuator.press(key);
    }

    if (this.settleDelaySeconds === 0) {
      this.releaseKeys(keys);
      return;
    }

    this.pending.push({ index, keys, releaseAt: now + this.settleDelaySeconds });
  }

  private releaseKeys(keys: readonly KeySymbol[]): void {
    for (let i = keys.length - 1; i >= 0; i--) {
      const key = keys[i];
      if (key !== undefined) {
        this.actuator.release(key);
      }
    }
  }
}
