/**
 * Socket.IO relay between remote device readers / key injectors and a KeyBridge.
 *
 * @module create-server
 */

import type { Server, Socket } from "socket.io";
import type { KeyActuator } from "./core/actuator.js";
import type { KeySymbol } from "./core/types.js";
import { parseDeviceSample, type LatestSampleReader } from "./bridge/device-reader.js";
import type { RemoteModeSource } from "./bridge/mode-sync.js";
import { BridgeEvent, modeReportSchema, type KeyEventMessage } from "./protocol.js";

/**
 * Anything that can broadcast an event (a Socket.IO server or namespace).
 */
export interface KeyEventTarget {
  emit(event: string, payload: KeyEventMessage): unknown;
}

/**
 * Key actuator that broadcasts every press and release as a `bridge:key` event.
 * Injector clients perform them on their own machine.
 */
export class SocketKeyActuator implements KeyActuator {
  private target: KeyEventTarget;

  constructor(target: KeyEventTarget) {
    this.target = target;
  }

  press(key: KeySymbol): void {
    this.target.emit(BridgeEvent.Key, { key, action: "press" });
  }

  release(key: KeySymbol): void {
    this.target.emit(BridgeEvent.Key, { key, action: "release" });
  }
}

/**
 * Configuration for creating a bridge server.
 */
export interface CreateBridgeServerConfig {
  /** Socket.IO server instance */
  io: Server;
  /** Receives every valid `device:sample` */
  reader: LatestSampleReader;
  /** Receives every valid `bridge:mode` report (optional) */
  modeSource?: RemoteModeSource;
  /** Called when a client connects */
  onClientConnect?: (clientId: string) => void;
  /** Called when a client disconnects */
  onClientDisconnect?: (clientId: string) => void;
}

/**
 * Handle returned by {@link createBridgeServer}.
 */
export interface BridgeServerHandle {
  /** Actuator that relays key events to every connected injector */
  actuator: KeyActuator;
  /** Number of currently connected clients */
  getClientCount(): number;
  /** Number of payloads dropped because they failed validation */
  getRejectedCount(): number;
  /** Detach from the Socket.IO server */
  destroy(): void;
}

/**
 * Wire a Socket.IO server to a bridge's sample reader and mode source.
 *
 * Incoming payloads are untrusted: invalid samples and mode reports are dropped
 * without a reply.
 *
 * @example
 * ```ts
 * import { Server } from "socket.io";
 * import { createBridgeServer, bridgeParser, KeyBridge, LatestSampleReader } from "@motionkeys/keybridge";
 *
 * const io = new Server({ parser: bridgeParser });
 * const reader = new LatestSampleReader();
 * const relay = createBridgeServer({ io, reader });
 * const bridge = new KeyBridge({ reader, actuator: relay.actuator });
 *
 * bridge.start();
 * io.listen(3000);
 * ```
 */
export function createBridgeServer(config: CreateBridgeServerConfig): BridgeServerHandle {
  const clients = new Set<string>();
  let rejected = 0;

  const connectionHandler = (socket: Socket) => {
    const clientId = socket.id;
    clients.add(clientId);
    console.log(`[BridgeServer] Client connected: ${clientId}`);
    config.onClientConnect?.(clientId);

    socket.on(BridgeEvent.Sample, (payload: unknown) => {
      const sample = parseDeviceSample(payload);
      if (!sample) {
        rejected++;
        return;
      }
      config.reader.push(sample);
    });

    socket.on(BridgeEvent.Mode, (payload: unknown) => {
      const report = modeReportSchema.safeParse(payload);
      if (!report.success) {
        rejected++;
        return;
      }
      config.modeSource?.report(report.data.hold);
    });

    socket.on("disconnect", () => {
      clients.delete(clientId);
      console.log(`[BridgeServer] Client disconnected: ${clientId}`);
      config.onClientDisconnect?.(clientId);
    });
  };

  config.io.on("connection", connectionHandler);

  return {
    actuator: new SocketKeyActuator({
      emit: (event, payload) => config.io.emit(event, payload),
    }),

    getClientCount() {
      return clients.size;
    },

    getRejectedCount() {
      return rejected;
    },

    destroy() {
      config.io.off("connection", connectionHandler);
    },
  };
}
