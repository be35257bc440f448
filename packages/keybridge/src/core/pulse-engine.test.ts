import { describe, test, expect, beforeEach, vi } from "vitest";
import { PulseKeyEngine, resolvePulseEngineConfig, DEFAULT_PULSE_ENGINE_CONFIG } from "./pulse-engine.js";
import { RecordingActuator } from "../test-utils/index.js";

/**
 * Drive one axis at a constant magnitude with 1ms ticks and return the tick
 * indices at which presses and releases happened.
 */
function drive(
  engine: PulseKeyEngine,
  actuator: RecordingActuator,
  name: string,
  magnitude: number,
  ticks: number,
  start = 10,
): { pressTicks: number[]; releaseTicks: number[] } {
  const pressTicks: number[] = [];
  const releaseTicks: number[] = [];
  for (let i = 0; i < ticks; i++) {
    const before = actuator.events.length;
    engine.update(name, magnitude, start + i * 0.001);
    for (const event of actuator.events.slice(before)) {
      (event.action === "press" ? pressTicks : releaseTicks).push(i);
    }
  }
  return { pressTicks, releaseTicks };
}

describe("resolvePulseEngineConfig", () => {
  test("should return defaults when no overrides are given", () => {
    expect(resolvePulseEngineConfig()).toEqual(DEFAULT_PULSE_ENGINE_CONFIG);
  });

  test("should keep valid overrides", () => {
    const config = resolvePulseEngineConfig({ minHz: 8, maxHz: 18, holdThreshold: 0.5 });
    expect(config.minHz).toBe(8);
    expect(config.maxHz).toBe(18);
    expect(config.holdThreshold).toBe(0.5);
    expect(config.pressDurationSeconds).toBe(0.02);
  });

  test("should fall back for invalid values", () => {
    const config = resolvePulseEngineConfig({
      pressDurationSeconds: -1,
      minHz: 0,
      maxHz: Number.NaN,
      deadzone: -0.1,
      holdThreshold: Number.POSITIVE_INFINITY,
      emaAlpha: 2,
    });
    expect(config).toEqual(DEFAULT_PULSE_ENGINE_CONFIG);
  });

  test("should tolerate a hold threshold below the deadzone", () => {
    const config = resolvePulseEngineConfig({ deadzone: 0.1, holdThreshold: 0.05 });
    expect(config.holdThreshold).toBe(0.05);
  });
});

describe("PulseKeyEngine", () => {
  let actuator: RecordingActuator;
  let engine: PulseKeyEngine;

  beforeEach(() => {
    actuator = new RecordingActuator();
    // alpha 1: the filtered value equals the raw input
    engine = new PulseKeyEngine(actuator, {
      emaAlpha: 1,
      minHz: 10,
      maxHz: 20,
      deadzone: 0,
      holdThreshold: 1,
      pressDurationSeconds: 0.02,
    });
    engine.bind("move_right", "d", "pulse");
  });

  describe("bind", () => {
    test("should register the axis at rest", () => {
      expect(engine.getAxisState("move_right")).toEqual({
        name: "move_right",
        key: "d",
        mode: "pulse",
        pressed: false,
        held: false,
        lastPulseStartTime: 0,
        scheduledReleaseTime: 0,
        filteredValue: 0,
      });
    });

    test("should fall back to pulse for an unknown mode", () => {
      engine.bind("zoom_in", "page_up", "toggle");
      expect(engine.getAxisState("zoom_in")?.mode).toBe("pulse");
    });

    test("should list bound names in bind order", () => {
      engine.bind("move_left", "a", "hold");
      expect(engine.getBoundNames()).toEqual(["move_right", "move_left"]);
    });

    test("should release the old key when re-binding a held axis", () => {
      engine.update("move_right", 1, 10);
      expect(actuator.isDown("d")).toBe(true);

      engine.bind("move_right", "l", "pulse");

      expect(actuator.log()).toEqual(["press:d", "release:d"]);
      expect(engine.getAxisState("move_right")).toMatchObject({
        key: "l",
        pressed: false,
        held: false,
        filteredValue: 0,
      });
    });
  });

  describe("update", () => {
    test("should ignore unbound names", () => {
      engine.update("nothing", 1, 10);
      expect(actuator.events).toHaveLength(0);
      expect(engine.getAxisState("nothing")).toBeUndefined();
    });

    test("should stay silent inside the deadzone", () => {
      const quiet = new PulseKeyEngine(actuator, { emaAlpha: 1, deadzone: 0.05 });
      quiet.bind("move_right", "d");
      for (let i = 0; i < 100; i++) {
        quiet.update("move_right", i % 2 === 0 ? 0 : 0.04, 10 + i * 0.005);
      }
      expect(actuator.events).toHaveLength(0);
    });

    test("should hold above the hold threshold and release exactly once on return to rest", () => {
      const holding = new PulseKeyEngine(actuator, { emaAlpha: 1 });
      holding.bind("move_right", "d");

      for (let i = 0; i < 50; i++) {
        holding.update("move_right", 0.9, 10 + i * 0.005);
      }
      expect(actuator.log()).toEqual(["press:d"]);
      expect(holding.getAxisState("move_right")?.held).toBe(true);

      holding.update("move_right", 0, 11);
      holding.update("move_right", 0, 11.005);

      expect(actuator.log()).toEqual(["press:d", "release:d"]);
      expect(holding.getAxisState("move_right")).toMatchObject({ pressed: false, held: false });
    });

    test("should release then resume pulsing when dropping out of the hold band", () => {
      const holding = new PulseKeyEngine(actuator, { emaAlpha: 1 });
      holding.bind("move_right", "d");

      holding.update("move_right", 0.9, 10);
      holding.update("move_right", 0.2, 10.5);

      expect(actuator.log()).toEqual(["press:d", "release:d", "press:d"]);
      expect(holding.getAxisState("move_right")).toMatchObject({
        pressed: true,
        held: false,
        lastPulseStartTime: 10.5,
      });
      expect(holding.getAxisState("move_right")?.scheduledReleaseTime).toBeCloseTo(10.52, 10);
    });

    test("should pulse at the mid-range rate for a mid magnitude", () => {
      // magnitude 0.5 maps to 15 Hz: a press every 67 ticks of 1ms
      const { pressTicks } = drive(engine, actuator, "move_right", 0.5, 1000);
      expect(pressTicks).toHaveLength(15);
      expect(pressTicks.slice(0, 3)).toEqual([0, 67, 134]);
    });

    test("should pulse faster for a larger magnitude", () => {
      // magnitude 0.9 maps to 19 Hz: a press every 53 ticks of 1ms
      const { pressTicks } = drive(engine, actuator, "move_right", 0.9, 1000);
      expect(pressTicks).toHaveLength(19);
    });

    test("should release every pulse within the press duration plus one tick", () => {
      const { pressTicks, releaseTicks } = drive(engine, actuator, "move_right", 0.5, 1000);

      expect(releaseTicks).toHaveLength(pressTicks.length);
      pressTicks.forEach((pressTick, i) => {
        const releaseTick = releaseTicks[i] ?? Number.POSITIVE_INFINITY;
        expect(releaseTick).toBeGreaterThan(pressTick);
        expect(releaseTick - pressTick).toBeLessThanOrEqual(21);
      });
    });

    test("should alternate press and release so the key is never pressed twice", () => {
      drive(engine, actuator, "move_right", 0.3, 500);
      actuator.events.forEach((event, i) => {
        expect(event.action).toBe(i % 2 === 0 ? "press" : "release");
      });
    });

    test("should let an in-flight pulse finish after returning to rest", () => {
      engine.update("move_right", 0.5, 10);
      engine.update("move_right", 0, 10.005);
      expect(actuator.log()).toEqual(["press:d"]);

      engine.update("move_right", 0, 10.025);
      expect(actuator.log()).toEqual(["press:d", "release:d"]);
    });

    test("should hold in hold mode for any magnitude outside the deadzone", () => {
      engine.bind("rotate_left", "q", "hold");
      for (let i = 0; i < 20; i++) {
        engine.update("rotate_left", 0.05, 10 + i * 0.005);
      }
      expect(actuator.log()).toEqual(["press:q"]);

      engine.update("rotate_left", 0, 11);
      expect(actuator.log()).toEqual(["press:q", "release:q"]);
    });

    test("should hold when the hold threshold is below the deadzone", () => {
      const odd = new PulseKeyEngine(actuator, { emaAlpha: 1, deadzone: 0.1, holdThreshold: 0.05 });
      odd.bind("move_right", "d");

      expect(() => odd.update("move_right", 0.2, 10)).not.toThrow();
      expect(odd.getAxisState("move_right")?.held).toBe(true);
      expect(actuator.log()).toEqual(["press:d"]);
    });

    test("should hold when the hold threshold equals the deadzone", () => {
      const odd = new PulseKeyEngine(actuator, { emaAlpha: 1, deadzone: 0.1, holdThreshold: 0.1 });
      odd.bind("move_right", "d");

      odd.update("move_right", 0.3, 10);
      expect(odd.getAxisState("move_right")?.held).toBe(true);
    });

    test("should smooth input before thresholding", () => {
      const smooth = new PulseKeyEngine(actuator, { emaAlpha: 0.3 });
      smooth.bind("move_right", "d");

      // 0.3, 0.51: the first sample pulses, the second crosses the 0.4 hold threshold
      smooth.update("move_right", 1, 10);
      expect(smooth.getAxisState("move_right")).toMatchObject({ pressed: true, held: false });

      smooth.update("move_right", 1, 10.005);
      expect(smooth.getAxisState("move_right")).toMatchObject({ pressed: true, held: true });
      expect(smooth.getAxisState("move_right")?.filteredValue).toBeCloseTo(0.51, 10);
    });
  });

  describe("actuator failures", () => {
    test("should keep its state consistent and report the failure", () => {
      const onError = vi.fn();
      const failing = new PulseKeyEngine(actuator, { emaAlpha: 1 }, onError);
      failing.bind("move_right", "d");
      actuator.setFailing(true);

      expect(() => failing.update("move_right", 0.9, 10)).not.toThrow();
      expect(failing.getAxisState("move_right")).toMatchObject({ pressed: true, held: true });
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toBe("press");
      expect(onError.mock.calls[0]?.[1]).toBe("d");

      expect(() => failing.update("move_right", 0, 10.005)).not.toThrow();
      expect(failing.getAxisState("move_right")).toMatchObject({ pressed: false, held: false });
      expect(onError).toHaveBeenCalledTimes(2);
      expect(onError.mock.calls[1]?.[0]).toBe("release");
    });

    test("should warn on the console by default", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const failing = new PulseKeyEngine(actuator, { emaAlpha: 1 });
      failing.bind("move_right", "d");
      actuator.setFailing(true);

      failing.update("move_right", 0.9, 10);

      expect(warn).toHaveBeenCalledWith('[KeyActuator] press "d" failed: injection refused for d');
      warn.mockRestore();
    });
  });

  describe("setMode and forceRelease", () => {
    test("should change mode without releasing", () => {
      engine.update("move_right", 0.5, 10);
      engine.setMode("move_right", "hold");

      expect(engine.getAxisState("move_right")).toMatchObject({ mode: "hold", pressed: true });
      expect(actuator.log()).toEqual(["press:d"]);
    });

    test("should leave no key down after setMode followed by forceRelease", () => {
      engine.update("move_right", 0.5, 10);
      engine.setMode("move_right", "hold");
      engine.forceRelease("move_right");

      expect(actuator.isDown("d")).toBe(false);
      expect(engine.getAxisState("move_right")).toMatchObject({
        pressed: false,
        held: false,
        scheduledReleaseTime: 0,
      });

      engine.update("move_right", 0.5, 10.005);
      expect(actuator.log()).toEqual(["press:d", "release:d", "press:d"]);
      expect(engine.getAxisState("move_right")?.held).toBe(true);
    });

    test("should issue nothing when forcing release of an idle axis", () => {
      engine.forceRelease("move_right");
      engine.forceRelease("nothing");
      expect(actuator.events).toHaveLength(0);
    });

    test("should ignore setMode on unbound names", () => {
      expect(() => engine.setMode("nothing", "hold")).not.toThrow();
    });
  });

  describe("forceReleaseAll", () => {
    test("should release every key that is down, once", () => {
      engine.bind("move_left", "a", "hold");
      engine.bind("zoom_in", "page_up", "pulse");
      engine.update("move_right", 1, 10);
      engine.update("move_left", 0.5, 10);

      engine.forceReleaseAll();
      engine.forceReleaseAll();

      expect(actuator.releaseCount("d")).toBe(1);
      expect(actuator.releaseCount("a")).toBe(1);
      expect(actuator.releaseCount("page_up")).toBe(0);
      expect(actuator.isDown("d")).toBe(false);
      expect(actuator.isDown("a")).toBe(false);
    });
  });

  describe("getConfig", () => {
    test("should return a copy of the resolved configuration", () => {
      const config = engine.getConfig();
      config.minHz = 999;
      expect(engine.getConfig().minHz).toBe(10);
    });
  });
});
