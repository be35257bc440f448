/**
 * Default configuration constants for the keybridge library
 */

/**
 * Default EMA smoothing coefficient.
 * Weight of the newest raw sample: 1 = no smoothing, lower = smoother but laggier.
 */
export const DEFAULT_EMA_ALPHA = 0.3;

/**
 * Default on-time of a single pulse in seconds (20ms).
 * Short enough that the game sees a tap, long enough that it registers at all.
 */
export const DEFAULT_PRESS_DURATION_SECONDS = 0.02;

/**
 * Default pulse rate at the deadzone edge (slowest motion), in Hz.
 */
export const DEFAULT_MIN_HZ = 15;

/**
 * Default pulse rate just below the hold threshold (fastest pulsing), in Hz.
 */
export const DEFAULT_MAX_HZ = 30;

/**
 * Default deadzone: filtered magnitudes at or below this are "at rest".
 */
export const DEFAULT_DEADZONE = 0.001;

/**
 * Default hold threshold: filtered magnitudes at or above this hold the key
 * down continuously instead of pulsing it.
 */
export const DEFAULT_HOLD_THRESHOLD = 0.4;

/**
 * Floor for the frequency-mapping denominator and the pulse frequency.
 * Keeps a misconfigured holdThreshold <= deadzone from dividing by zero.
 */
export const PULSE_EPSILON = 1e-6;

/**
 * Default settle delay between a button tap's press and its release (5ms).
 */
export const DEFAULT_SETTLE_DELAY_SECONDS = 0.005;

/**
 * Default poll interval of the bridge loop: 5ms (200 Hz).
 * Must stay at or below the pulse duration so pulse width is bounded by polling.
 */
export const DEFAULT_POLL_INTERVAL_MS = 5;

/**
 * Default port the bridge server listens on.
 */
export const DEFAULT_PORT = 3000;
