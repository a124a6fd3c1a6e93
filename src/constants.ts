/**
 * anchor-scroll - Constants
 * All default values and magic numbers in one place
 */

// =============================================================================
// Id Space
// =============================================================================

/** Smallest signed 64-bit id */
export const ID_MIN = -(2n ** 63n);

/**
 * Largest signed 64-bit id.
 * Ranges are half-open, so an item with this id can never be requested.
 */
export const ID_MAX = 2n ** 63n - 1n;

// =============================================================================
// Height Estimation
// =============================================================================

/** Assumed item height before anything has been measured (logical px) */
export const DEFAULT_ESTIMATED_ITEM_HEIGHT = 60;

/** Mean heights below this are treated as unreasonable */
export const MIN_MEAN_ITEM_HEIGHT = 0.01;

// =============================================================================
// Lookahead
// =============================================================================

/** Viewport heights kept loaded above the top of the viewport */
export const LOOKAHEAD_ABOVE = 1.5;

/**
 * Viewport heights kept loaded below the top of the viewport.
 * This includes the viewport itself; the anchor height is added on top.
 */
export const LOOKAHEAD_BELOW = 2.5;

// =============================================================================
// Handshake
// =============================================================================

/** Frames an action may stay unhandled before it is forcibly re-armed */
export const DEFAULT_MISSED_ACTION_LIMIT = 10;

// =============================================================================
// Input
// =============================================================================

/** Pixel height of one line for `WheelEvent.DOM_DELTA_LINE` deltas */
export const DEFAULT_WHEEL_LINE_HEIGHT = 16;

/** Default wheel sensitivity multiplier */
export const DEFAULT_WHEEL_SENSITIVITY = 1;

// =============================================================================
// Logging & DOM
// =============================================================================

/** Prefix for every log line */
export const LOG_PREFIX = "[anchor-scroll]";

/** Default CSS class prefix for the DOM host */
export const DEFAULT_CLASS_PREFIX = "anchor-scroll";
