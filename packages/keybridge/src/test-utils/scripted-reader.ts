import type { DeviceReader } from "../bridge/device-reader.js";
import type { DeviceSample } from "../core/types.js";

/**
 * Build a device sample; channels default to 0 and buttons to an empty vector.
 */
export function sampleOf(partial: Partial<DeviceSample> = {}): DeviceSample {
  return {
    x: 0,
    y: 0,
    z: 0,
    roll: 0,
    pitch: 0,
    yaw: 0,
    buttons: [],
    ...partial,
  };
}

/**
 * Device reader that replays a fixed script, one entry per read.
 * null entries are no-data ticks; past the end every read returns null.
 */
export class ScriptedReader implements DeviceReader {
  private script: Array<DeviceSample | null>;
  private cursor = 0;

  constructor(script: Array<DeviceSample | null> = []) {
    this.script = [...script];
  }

  enqueue(...entries: Array<DeviceSample | null>): void {
    this.script.push(...entries);
  }

  read(): DeviceSample | null {
    const entry = this.script[this.cursor];
    if (entry === undefined) return null;
    this.cursor++;
    return entry;
  }
}
