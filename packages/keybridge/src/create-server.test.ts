import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import type { Server, Socket } from "socket.io";
import { createBridgeServer, SocketKeyActuator } from "./create-server.js";
import { LatestSampleReader } from "./bridge/device-reader.js";
import { RemoteModeSource } from "./bridge/mode-sync.js";
import { BridgeEvent, type KeyEventMessage } from "./protocol.js";

type Handler = (payload?: unknown) => void;

/** Minimal in-process stand-in for a connected Socket.IO socket */
class FakeSocket {
  readonly id: string;
  private handlers = new Map<string, Handler>();

  constructor(id: string) {
    this.id = id;
  }

  on(event: string, handler: Handler): this {
    this.handlers.set(event, handler);
    return this;
  }

  receive(event: string, payload?: unknown): void {
    this.handlers.get(event)?.(payload);
  }
}

/** Minimal in-process stand-in for a Socket.IO server */
class FakeServer {
  readonly emitted: Array<{ event: string; payload: unknown }> = [];
  private connectionHandler: ((socket: Socket) => void) | null = null;

  on(event: string, handler: (socket: Socket) => void): this {
    if (event === "connection") this.connectionHandler = handler;
    return this;
  }

  off(event: string, handler: (socket: Socket) => void): this {
    if (event === "connection" && this.connectionHandler === handler) this.connectionHandler = null;
    return this;
  }

  emit(event: string, payload: unknown): boolean {
    this.emitted.push({ event, payload });
    return true;
  }

  connect(id: string): FakeSocket {
    const socket = new FakeSocket(id);
    this.connectionHandler?.(socket as unknown as Socket);
    return socket;
  }

  hasConnectionHandler(): boolean {
    return this.connectionHandler !== null;
  }
}

const validSample = { x: 0.1, y: 0, z: 0, roll: 0, pitch: 0, yaw: 0, buttons: [false] };

describe("SocketKeyActuator", () => {
  test("should emit a key event for each press and release", () => {
    const sent: Array<[string, KeyEventMessage]> = [];
    const actuator = new SocketKeyActuator({
      emit: (event, payload) => sent.push([event, payload]),
    });

    actuator.press("page_up");
    actuator.release("page_up");

    expect(sent).toEqual([
      ["bridge:key", { key: "page_up", action: "press" }],
      ["bridge:key", { key: "page_up", action: "release" }],
    ]);
  });
});

describe("createBridgeServer", () => {
  let io: FakeServer;
  let reader: LatestSampleReader;
  let modeSource: RemoteModeSource;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    io = new FakeServer();
    reader = new LatestSampleReader();
    modeSource = new RemoteModeSource();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const create = (extra: { onClientConnect?: (id: string) => void; onClientDisconnect?: (id: string) => void } = {}) =>
    createBridgeServer({ io: io as unknown as Server, reader, modeSource, ...extra });

  test("should track connected clients", () => {
    const onClientConnect = vi.fn();
    const onClientDisconnect = vi.fn();
    const server = create({ onClientConnect, onClientDisconnect });

    const first = io.connect("client-1");
    io.connect("client-2");
    expect(server.getClientCount()).toBe(2);
    expect(onClientConnect).toHaveBeenCalledWith("client-1");
    expect(console.log).toHaveBeenCalledWith("[BridgeServer] Client connected: client-1");

    first.receive("disconnect");
    expect(server.getClientCount()).toBe(1);
    expect(onClientDisconnect).toHaveBeenCalledWith("client-1");
    expect(console.log).toHaveBeenCalledWith("[BridgeServer] Client disconnected: client-1");
  });

  test("should push valid samples to the reader", () => {
    create();
    const socket = io.connect("client-1");

    socket.receive(BridgeEvent.Sample, validSample);

    expect(reader.read()).toEqual(validSample);
  });

  test("should drop invalid samples and count them", () => {
    const server = create();
    const socket = io.connect("client-1");

    socket.receive(BridgeEvent.Sample, { x: "left" });
    socket.receive(BridgeEvent.Sample, null);

    expect(reader.read()).toBeNull();
    expect(server.getRejectedCount()).toBe(2);
  });

  test("should forward mode reports to the mode source", () => {
    const server = create();
    const socket = io.connect("client-1");

    socket.receive(BridgeEvent.Mode, { hold: true });
    expect(modeSource.isHoldMode()).toBe(true);

    socket.receive(BridgeEvent.Mode, { hold: "yes" });
    expect(modeSource.isHoldMode()).toBe(true);
    expect(server.getRejectedCount()).toBe(1);
  });

  test("should broadcast key events through its actuator", () => {
    const server = create();

    server.actuator.press("w");
    server.actuator.release("w");

    expect(io.emitted).toEqual([
      { event: "bridge:key", payload: { key: "w", action: "press" } },
      { event: "bridge:key", payload: { key: "w", action: "release" } },
    ]);
  });

  test("should stop accepting connections after destroy", () => {
    const server = create();
    server.destroy();

    expect(io.hasConnectionHandler()).toBe(false);
    io.connect("late");
    expect(server.getClientCount()).toBe(0);
  });
});
