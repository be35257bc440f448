/**
 * The key-actuation boundary.
 *
 * The engine and the dispatcher only ever talk to a {@link KeyActuator}. There is
 * no feedback channel: a press or release is assumed to have happened once it has
 * been issued, so failures are caught here and reported, never thrown back into
 * the state machines.
 *
 * @module core/actuator
 */

import type { KeySymbol } from "./types.js";

/**
 * Presses and releases abstract keys (OS injection, a socket relay, a test recorder).
 * Either call may throw; callers go through {@link createSafeActuator}.
 */
export interface KeyActuator {
  press(key: KeySymbol): void;
  release(key: KeySymbol): void;
}

/**
 * Which actuator call failed.
 */
export type ActuatorAction = "press" | "release";

/**
 * Called with every swallowed actuator failure.
 */
export type ActuatorErrorHandler = (action: ActuatorAction, key: KeySymbol, error: unknown) => void;

/**
 * Default failure report: one warning line per failed call.
 */
export const warnActuatorError: ActuatorErrorHandler = (action, key, error) => {
  const reason = error instanceof Error ? error.message : String(error);
  console.warn(`[KeyActuator] ${action} "${key}" failed: ${reason}`);
};

/**
 * Wrap an actuator so that its failures are reported instead of thrown.
 *
 * @param actuator - The actuator to protect
 * @param onError - Failure report (default: {@link warnActuatorError})
 */
export function createSafeActuator(
  actuator: KeyActuator,
  onError: ActuatorErrorHandler = warnActuatorError,
): KeyActuator {
  const attempt = (action: ActuatorAction, key: KeySymbol) => {
    try {
      actuator[action](key);
    } catch (error) {
      onError(action, key, error);
    }
  };

  return {
    press(key) {
      attempt("press", key);
    },
    release(key) {
      attempt("release", key);
    },
  };
}

/**
 * Dry-run actuator that logs every key event instead of injecting it.
 */
export class LoggingKeyActuator implements KeyActuator {
  private readonly tag: string;

  constructor(tag: string = "DryRun") {
    this.tag = tag;
  }

  press(key: KeySymbol): void {
    console.log(`[${this.tag}] press ${key}`);
  }

  release(key: KeySymbol): void {
    console.log(`[${this.tag}] release ${key}`);
  }
}
