/**
 * Device sample sources for the bridge loop.
 *
 * @module bridge/device-reader
 */

import { z } from "zod";
import type { DeviceSample } from "../core/types.js";

/**
 * Produces at most one sample per poll. null means "no new data this tick".
 */
export interface DeviceReader {
  read(): DeviceSample | null;
}

/**
 * Schema for samples arriving from untrusted sources (the socket relay).
 * Missing buttons read as an empty vector.
 */
export const deviceSampleSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
  roll: z.number().finite(),
  pitch: z.number().finite(),
  yaw: z.number().finite(),
  buttons: z.array(z.boolean()).default([]),
});

/**
 * Validate an untrusted payload as a device sample.
 *
 * @returns The sample, or null if the payload does not describe one
 */
export function parseDeviceSample(payload: unknown): DeviceSample | null {
  const result = deviceSampleSchema.safeParse(payload);
  return result.success ? result.data : null;
}

/**
 * Holds the newest pushed sample and hands each one out once.
 *
 * Samples pushed between two polls collapse into the newest: the engine only
 * needs the current device position, not every intermediate report.
 */
export class LatestSampleReader implements DeviceReader {
  private latest: DeviceSample | null = null;
  private received = 0;

  push(sample: DeviceSample): void {
    this.latest = sample;
    this.received++;
  }

  read(): DeviceSample | null {
    const sample = this.latest;
    this.latest = null;
    return sample;
  }

  /** Total samples pushed since creation */
  getReceivedCount(): number {
    return this.received;
  }
}
