/**
 * Per-axis exponential smoothing of raw analog samples.
 *
 * Device readings jitter around their true value; feeding them straight into
 * the pulse engine makes keys flicker at the deadzone edge. Each axis name gets
 * its own exponential moving average:
 *
 *   filtered = alpha * raw + (1 - alpha) * previous
 *
 * Because the update is a convex combination, the filtered value never leaves
 * the range the raw input stays in.
 *
 * @module core/signal-filter
 */

import { DEFAULT_EMA_ALPHA } from "../constants.js";
import { finiteOr } from "./utils.js";

/**
 * Exponential moving average per axis name.
 *
 * @example
 * ```ts
 * const filter = new AxisSignalFilter(0.3);
 *
 * filter.filter("move_right", 1); // 0.3
 * filter.filter("move_right", 1); // 0.51
 * filter.filter("move_right", 1); // 0.657
 * ```
 */
export class AxisSignalFilter {
  private values: Map<string, number> = new Map();
  private readonly smoothing: number;

  /**
   * @param alpha - Weight of the newest sample, in (0, 1]. Anything else falls back to the default.
   */
  constructor(alpha: number = DEFAULT_EMA_ALPHA) {
    this.smoothing = alpha > 0 && alpha <= 1 ? alpha : DEFAULT_EMA_ALPHA;
  }

  /** The smoothing coefficient in use */
  get alpha(): number {
    return this.smoothing;
  }

  /**
   * Feed one raw sample for an axis and return the new filtered value.
   * Unknown axes start at 0. Non-finite samples are treated as 0.
   */
  filter(axisName: string, rawValue: number): number {
    const raw = finiteOr(rawValue, 0);
    const previous = this.values.get(axisName) ?? 0;
    const next = this.smoothing * raw + (1 - this.smoothing) * previous;
    this.values.set(axisName, next);
    return next;
  }

  /**
   * Current filtered value for an axis (0 if never fed).
   */
  get(axisName: string): number {
    return this.values.get(axisName) ?? 0;
  }

  /**
   * Forget an axis' history; its next sample starts from 0 again.
   */
  reset(axisName: string): void {
    this.values.set(axisName, 0);
  }
}
