/**
 * Client helper for processes that talk to a bridge server: a device reader
 * that pushes samples, and/or a key injector that performs relayed key events.
 *
 * @module create-client
 */

import type { Socket } from "socket.io-client";
import { createSafeActuator, type ActuatorErrorHandler, type KeyActuator } from "./core/actuator.js";
import type { DeviceSample, KeySymbol } from "./core/types.js";
import { BridgeEvent, keyEventSchema, type KeyEventMessage, type ModeReport } from "./protocol.js";

/**
 * Configuration for creating a bridge client.
 */
export interface BridgeClientConfig {
  /** Socket.IO client socket instance (created with bridgeParser) */
  socket: Socket;
  /** Performs relayed key events. Omit for a reader-only client. */
  actuator?: KeyActuator;
  /** Report for swallowed actuator failures (default: console warning) */
  onActuatorError?: ActuatorErrorHandler;
  /** Called for every valid key event received, after it was performed */
  onKeyEvent?: (event: KeyEventMessage) => void;
}

/**
 * Handle returned by {@link createBridgeClient}.
 */
export interface BridgeClientHandle {
  /** Send one device sample to the bridge */
  sendSample(sample: DeviceSample): void;
  /** Report the local lock-key state (true = character/hold mode) */
  reportMode(hold: boolean): void;
  /** Keys this client currently has down on behalf of the bridge */
  getHeldKeys(): Set<KeySymbol>;
  /** Release every held key and remove all socket listeners */
  destroy(): void;
}

/**
 * Create a bridge client.
 *
 * When the connection drops, every key the client pressed on the bridge's behalf
 * is released locally; the bridge can no longer send the matching releases.
 *
 * @example
 * ```ts
 * import { io } from "socket.io-client";
 * import { createBridgeClient, bridgeParser } from "@motionkeys/keybridge";
 *
 * const socket = io("http://localhost:3000", { parser: bridgeParser });
 * const client = createBridgeClient({ socket, actuator: osKeyboard });
 *
 * // Device reader side:
 * device.on("data", (sample) => client.sendSample(sample));
 *
 * // Injector side, when the lock key changes:
 * client.reportMode(capsLockOn);
 * ```
 */
export function createBridgeClient(config: BridgeClientConfig): BridgeClientHandle {
  const { socket } = config;
  const actuator = config.actuator ? createSafeActuator(config.actuator, config.onActuatorError) : null;
  const heldKeys = new Set<KeySymbol>();

  const releaseHeld = () => {
    if (!actuator) return;
    for (const key of heldKeys) {
      actuator.release(key);
    }
    heldKeys.clear();
  };

  const handleKey = (payload: unknown) => {
    if (!actuator) return;
    const parsed = keyEventSchema.safeParse(payload);
    if (!parsed.success) return;

    const event = parsed.data;
    if (event.action === "press") {
      actuator.press(event.key);
      heldKeys.add(event.key);
    } else {
      actuator.release(event.key);
      heldKeys.delete(event.key);
    }
    config.onKeyEvent?.(event);
  };

  const handleDisconnect = () => {
    if (heldKeys.size > 0) {
      console.log(`[BridgeClient] Disconnected, releasing ${heldKeys.size} held key(s)`);
    }
    releaseHeld();
  };

  socket.on(BridgeEvent.Key, handleKey);
  socket.on("disconnect", handleDisconnect);

  return {
    sendSample(sample: DeviceSample): void {
      socket.emit(BridgeEvent.Sample, sample);
    },

    reportMode(hold: boolean): void {
      const report: ModeReport = { hold };
      socket.emit(BridgeEvent.Mode, report);
    },

    getHeldKeys(): Set<KeySymbol> {
      return new Set(heldKeys);
    },

    destroy(): void {
      socket.off(BridgeEvent.Key, handleKey);
      socket.off("disconnect", handleDisconnect);
      releaseHeld();
    },
  };
}
