/**
 * Host configuration: a JSON file whose every entry is optional.
 *
 * Missing or invalid entries fall back to their default one by one.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import {
  DEFAULT_AXIS_KEYS,
  DEFAULT_BUTTON_BINDINGS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT,
  type ButtonBinding,
  type KeySymbol,
  type OrientationOptions,
  type PulseEngineConfig,
} from "@motionkeys/keybridge";

export const DEFAULT_CONFIG_FILE = "motionkeys.config.json";
export const CONFIG_PATH_ENV = "MOTIONKEYS_CONFIG";

/**
 * Tuning of one engine group as written in the file.
 * `pressMs` is the pulse on-time in seconds.
 */
export interface TuningGroupConfig {
  pressMs: number;
  minHz: number;
  maxHz: number;
  deadzone: number;
  holdThreshold: number;
  emaAlpha: number;
}

export interface ModeConfig {
  /** Follow the lock-key state reported by the injector client */
  syncWithLockKey: boolean;
  /** Start the movement group in hold (character) mode */
  startInCharacterMode: boolean;
}

export interface HostConfig extends OrientationOptions {
  port: number;
  pollIntervalMs: number;
  /** Log key events instead of relaying them */
  dryRun: boolean;
  move: TuningGroupConfig;
  zoom: TuningGroupConfig;
  mode: ModeConfig;
  axes: Record<string, KeySymbol>;
  buttons: Record<number, ButtonBinding>;
}

const DEFAULT_MOVE_GROUP: TuningGroupConfig = {
  pressMs: 0.02,
  minHz: 15,
  maxHz: 30,
  deadzone: 0.001,
  holdThreshold: 0.4,
  emaAlpha: 0.3,
};

const DEFAULT_ZOOM_GROUP: TuningGroupConfig = {
  pressMs: 0.01,
  minHz: 8,
  maxHz: 18,
  deadzone: 0.001,
  holdThreshold: 0.5,
  emaAlpha: 0.3,
};

export const DEFAULT_HOST_CONFIG: HostConfig = {
  port: DEFAULT_PORT,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  dryRun: false,
  invertX: false,
  invertY: true,
  invertZ: true,
  invertYaw: true,
  swapYZ: false,
  move: DEFAULT_MOVE_GROUP,
  zoom: DEFAULT_ZOOM_GROUP,
  mode: { syncWithLockKey: true, startInCharacterMode: false },
  axes: { ...DEFAULT_AXIS_KEYS },
  buttons: { ...DEFAULT_BUTTON_BINDINGS },
};

const tuningGroupSchema = (defaults: TuningGroupConfig) =>
  z
    .object({
      pressMs: z.number().finite().nonnegative().catch(defaults.pressMs),
      minHz: z.number().finite().positive().catch(defaults.minHz),
      maxHz: z.number().finite().positive().catch(defaults.maxHz),
      deadzone: z.number().finite().nonnegative().catch(defaults.deadzone),
      holdThreshold: z.number().finite().catch(defaults.holdThreshold),
      emaAlpha: z.number().finite().positive().max(1).catch(defaults.emaAlpha),
    })
    .catch(defaults);

const keySchema = z.string().trim().min(1);
const bindingSchema = z.union([keySchema, z.array(keySchema).min(1)]);
const looseRecord = z.record(z.string(), z.unknown()).catch({});

const d = DEFAULT_HOST_CONFIG;

const hostConfigSchema = z.object({
  port: z.number().int().positive().max(65535).catch(d.port),
  pollIntervalMs: z.number().finite().positive().catch(d.pollIntervalMs),
  dryRun: z.boolean().catch(d.dryRun),
  invertX: z.boolean().catch(d.invertX),
  invertY: z.boolean().catch(d.invertY),
  invertZ: z.boolean().catch(d.invertZ),
  invertYaw: z.boolean().catch(d.invertYaw),
  swapYZ: z.boolean().catch(d.swapYZ),
  move: tuningGroupSchema(d.move),
  zoom: tuningGroupSchema(d.zoom),
  mode: z
    .object({
      syncWithLockKey: z.boolean().catch(d.mode.syncWithLockKey),
      startInCharacterMode: z.boolean().catch(d.mode.startInCharacterMode),
    })
    .catch(d.mode),
  axes: looseRecord.transform((raw) => {
    const axes: Record<string, KeySymbol> = { ...d.axes };
    for (const name of Object.keys(axes)) {
      const parsed = keySchema.safeParse(raw[name]);
      if (parsed.success) axes[name] = parsed.data;
    }
    return axes;
  }),
  buttons: looseRecord.transform((raw) => {
    const buttons: Record<number, ButtonBinding> = { ...d.buttons };
    for (const [index, value] of Object.entries(raw)) {
      const i = Number(index);
      const parsed = bindingSchema.safeParse(value);
      if (Number.isInteger(i) && i >= 0 && parsed.success) buttons[i] = parsed.data;
    }
    return buttons;
  }),
});

/**
 * Resolve an already-parsed JSON value into a full configuration.
 * Anything that is not an object yields the defaults.
 */
export function parseHostConfig(raw: unknown): HostConfig {
  const input = typeof raw === "object" && raw !== null && !Array.isArray(raw) ? raw : {};
  return hostConfigSchema.parse(input);
}

/**
 * Pick the configuration file: first CLI argument, then the environment, then
 * the default file in the working directory.
 */
export function resolveConfigPath(args: readonly string[], env: NodeJS.ProcessEnv, cwd: string): string {
  const candidate = args[0] ?? env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_FILE;
  return resolve(cwd, candidate);
}

/**
 * Load the configuration file. A missing or unreadable file yields the defaults.
 */
export function loadHostConfig(path: string): HostConfig {
  if (!existsSync(path)) {
    console.log(`[Config] No configuration at ${path}, using defaults`);
    return parseHostConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[Config] Could not read ${path} (${reason}), using defaults`);
    return parseHostConfig({});
  }

  console.log(`[Config] Loaded ${path}`);
  return parseHostConfig(raw);
}

/**
 * Engine tuning for a configuration group.
 */
export function toEngineConfig(group: TuningGroupConfig): PulseEngineConfig {
  return {
    pressDurationSeconds: group.pressMs,
    minHz: group.minHz,
    maxHz: group.maxHz,
    deadzone: group.deadzone,
    holdThreshold: group.holdThreshold,
    emaAlpha: group.emaAlpha,
  };
}
