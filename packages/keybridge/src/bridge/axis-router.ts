/**
 * Splits signed device channels into pairs of logical directions.
 *
 * The pulse engine works on magnitudes: "move_right" and "move_left" are two
 * separate axes fed from the one signed X channel. For every routed channel, the
 * active direction gets the magnitude and the opposite direction gets 0 in the
 * same tick, so both are never driven at once.
 *
 * @module bridge/axis-router
 */

import type { AxisChannel, DeviceSample } from "../core/types.js";
import { finiteOr } from "../core/utils.js";

/**
 * One signed channel and the logical directions it drives.
 */
export interface AxisRoute {
  channel: AxisChannel;
  /** Axis name driven by positive values */
  positive: string;
  /** Axis name driven by negative values */
  negative: string;
}

/**
 * Per-channel sign flips and the Y/Z role swap.
 */
export interface OrientationOptions {
  invertX: boolean;
  invertY: boolean;
  invertZ: boolean;
  invertYaw: boolean;
  /** Swap the Y (move) and Z (zoom) channels after inversion */
  swapYZ: boolean;
}

/**
 * No inversion, no swap.
 */
export const NEUTRAL_ORIENTATION: OrientationOptions = {
  invertX: false,
  invertY: false,
  invertZ: false,
  invertYaw: false,
  swapYZ: false,
};

/**
 * One engine update produced by routing a sample.
 */
export interface AxisUpdate {
  name: string;
  value: number;
}

/**
 * Apply inversion and the optional Y/Z swap to a sample.
 * Non-finite channels read as 0.
 */
export function orientSample(
  sample: DeviceSample,
  options: Partial<OrientationOptions> = {},
): DeviceSample {
  const o = { ...NEUTRAL_ORIENTATION, ...options };
  const x = finiteOr(sample.x, 0) * (o.invertX ? -1 : 1);
  const y = finiteOr(sample.y, 0) * (o.invertY ? -1 : 1);
  const z = finiteOr(sample.z, 0) * (o.invertZ ? -1 : 1);
  const yaw = finiteOr(sample.yaw, 0) * (o.invertYaw ? -1 : 1);

  return {
    x,
    y: o.swapYZ ? z : y,
    z: o.swapYZ ? y : z,
    roll: finiteOr(sample.roll, 0),
    pitch: finiteOr(sample.pitch, 0),
    yaw,
    buttons: sample.buttons,
  };
}

/**
 * Turn an oriented sample into engine updates, two per route.
 *
 * @example
 * ```ts
 * routeSample({ ...sample, x: -0.5 }, [{ channel: "x", positive: "move_right", negative: "move_left" }]);
 * // [{ name: "move_left", value: 0.5 }, { name: "move_right", value: 0 }]
 * ```
 */
export function routeSample(sample: DeviceSample, routes: readonly AxisRoute[]): AxisUpdate[] {
  const updates: AxisUpdate[] = [];
  for (const route of routes) {
    const value = finiteOr(sample[route.channel], 0);
    if (value >= 0) {
      updates.push({ name: route.positive, value }, { name: route.negative, value: 0 });
    } else {
      updates.push({ name: route.negative, value: -value }, { name: route.positive, value: 0 });
    }
  }
  return updates;
}
