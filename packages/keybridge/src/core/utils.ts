/**
 * Small numeric helpers used across the core.
 */

/**
 * Clamp a value into [lo, hi].
 */
export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Return the value if it is a finite number, otherwise the fallback.
 */
export function finiteOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}
