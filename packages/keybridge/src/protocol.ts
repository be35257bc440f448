/**
 * Socket.IO event names and payloads shared by the bridge server and its clients.
 *
 * @module protocol
 */

import { z } from "zod";
import type { KeySymbol } from "./core/types.js";

/**
 * Event names.
 * - `device:sample` client → server, a DeviceSample
 * - `bridge:mode` client → server, a {@link ModeReport}
 * - `bridge:key` server → clients, a {@link KeyEventMessage}
 */
export const BridgeEvent = {
  Sample: "device:sample",
  Mode: "bridge:mode",
  Key: "bridge:key",
} as const;

export type BridgeEventName = (typeof BridgeEvent)[keyof typeof BridgeEvent];

/**
 * A key press or release to perform on the injector's machine.
 */
export interface KeyEventMessage {
  key: KeySymbol;
  action: "press" | "release";
}

/**
 * Lock-key state reported by the injector (true = character/hold mode).
 */
export interface ModeReport {
  hold: boolean;
}

export const keyEventSchema = z.object({
  key: z.string().min(1),
  action: z.enum(["press", "release"]),
});

export const modeReportSchema = z.object({
  hold: z.boolean(),
});
