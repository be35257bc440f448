/**
 * Builds a running bridge from a {@link HostConfig}: the Socket.IO relay, the
 * KeyBridge poll loop and a small HTTP status API on the same port.
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "node:http";
import { Server } from "socket.io";
import {
  KeyBridge,
  LatestSampleReader,
  LoggingKeyActuator,
  RemoteModeSource,
  createBridgeServer,
  describeGroupMode,
  bridgeParser,
  type BridgeServerHandle,
  type KeyActuator,
} from "@motionkeys/keybridge";
import { toEngineConfig, type HostConfig } from "./config.js";

export interface BridgeHost {
  io: Server;
  bridge: KeyBridge;
  relay: BridgeServerHandle;
  reader: LatestSampleReader;
  /** Present when the group mode follows the injector's lock key */
  modeSource: RemoteModeSource | null;
  config: HostConfig;
  startTime: number;
}

export interface HostOptions {
  /** Monotonic clock in seconds for the bridge (default: performance.now() / 1000) */
  clock?: () => number;
  /** Wall clock in milliseconds for uptime (default: Date.now) */
  now?: () => number;
}

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Wire a bridge host. Nothing listens and nothing polls until {@link listen}.
 */
export function createBridgeHost(config: HostConfig, options: HostOptions = {}): BridgeHost {
  if (!Number.isInteger(config.port) || config.port <= 0) {
    throw new Error(`[KeyBridge] port must be a positive integer. Got: ${config.port}`);
  }

  const io = new Server({
    parser: bridgeParser,
    cors: { origin: "*" },
  });
  const reader = new LatestSampleReader();
  const modeSource = config.mode.syncWithLockKey ? new RemoteModeSource() : null;
  const relay = createBridgeServer({ io, reader, modeSource: modeSource ?? undefined });

  const actuator: KeyActuator = config.dryRun ? new LoggingKeyActuator() : relay.actuator;

  const bridge = new KeyBridge({
    reader,
    actuator,
    engines: {
      move: toEngineConfig(config.move),
      zoom: toEngineConfig(config.zoom),
    },
    axisKeys: config.axes,
    buttons: config.buttons,
    orientation: {
      invertX: config.invertX,
      invertY: config.invertY,
      invertZ: config.invertZ,
      invertYaw: config.invertYaw,
      swapYZ: config.swapYZ,
    },
    modeSource,
    initialGroupMode: config.mode.startInCharacterMode ? "hold" : "pulse",
    pollIntervalMs: config.pollIntervalMs,
    clock: options.clock,
  });

  return {
    io,
    bridge,
    relay,
    reader,
    modeSource,
    config,
    startTime: (options.now ?? Date.now)(),
  };
}

/**
 * Answer a status API request.
 *
 * - `GET /api/health`: liveness and uptime
 * - `GET /api/status`: bridge and relay counters
 * - `POST /api/release`: force-release every key the bridge may have down
 */
export function handleApiRequest(
  host: BridgeHost,
  method: string,
  pathname: string,
  now: number = Date.now(),
): ApiResponse {
  if (pathname === "/api/health" && method === "GET") {
    return { status: 200, body: { status: "ok", uptime: now - host.startTime } };
  }

  if (pathname === "/api/status" && method === "GET") {
    const groupMode = host.bridge.getGroupMode();
    return {
      status: 200,
      body: {
        running: host.bridge.isRunning(),
        dryRun: host.config.dryRun,
        groupMode,
        groupModeLabel: describeGroupMode(groupMode),
        ticks: host.bridge.getTickCount(),
        samplesReceived: host.reader.getReceivedCount(),
        clients: host.relay.getClientCount(),
        rejected: host.relay.getRejectedCount(),
        pressed: host.bridge
          .getAxisStates()
          .filter((state) => state.pressed)
          .map((state) => state.name),
      },
    };
  }

  if (pathname === "/api/release" && method === "POST") {
    host.bridge.releaseAll();
    console.log("[KeyBridge] Released all keys on request");
    return { status: 200, body: { success: true } };
  }

  return { status: 404, body: { error: `Not Found: ${pathname}` } };
}

function respond(host: BridgeHost, req: IncomingMessage, res: ServerResponse): void {
  const url = new URL(req.url ?? "/", "http://localhost");
  const { status, body } = handleApiRequest(host, req.method ?? "GET", url.pathname);
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/**
 * Start the poll loop and serve Socket.IO and the status API on the configured port.
 *
 * @returns A function that stops the loop, releases every key and closes the server
 */
export function listen(host: BridgeHost): () => Promise<void> {
  const httpServer: HttpServer = createServer((req, res) => respond(host, req, res));
  host.io.attach(httpServer);

  host.bridge.start();
  httpServer.listen(host.config.port, () => {
    const mode = describeGroupMode(host.bridge.getGroupMode());
    console.log(`[KeyBridge] Listening on port ${host.config.port} (${host.config.dryRun ? "dry run" : "relay"}, ${mode})`);
  });

  return () =>
    new Promise<void>((resolve, reject) => {
      host.bridge.stop();
      host.relay.destroy();
      host.io.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
}
