/**
 * anchor-scroll - Input Conversion
 * Turning wheel deltas and reveal requests into scroll distances
 */

import {
  DEFAULT_WHEEL_LINE_HEIGHT,
  DEFAULT_WHEEL_SENSITIVITY,
} from "../constants";
import type { WheelDeltaMode } from "../types";

// =============================================================================
// Wheel
// =============================================================================

export interface WheelOptions {
  /** Pixel height of a line-mode delta */
  lineHeight?: number;
  /** Pixel size of a page-mode delta, normally the viewport height */
  pageSize?: number;
  /** Multiplier applied to the result */
  sensitivity?: number;
}

/**
 * Convert a `WheelEvent` delta into pixels (positive scrolls down).
 * Non-finite deltas produce 0.
 */
export const wheelDeltaToPixels = (
  delta: number,
  deltaMode: WheelDeltaMode,
  options: WheelOptions = {},
): number => {
  if (!Number.isFinite(delta)) return 0;

  const sensitivity = options.sensitivity ?? DEFAULT_WHEEL_SENSITIVITY;
  switch (deltaMode) {
    case 1:
      return delta * (options.lineHeight ?? DEFAULT_WHEEL_LINE_HEIGHT) * sensitivity;
    case 2:
      return delta * (options.pageSize ?? 0) * sensitivity;
    default:
      return delta * sensitivity;
  }
};

// =============================================================================
// Pan Range
// =============================================================================

export interface Span {
  start: number;
  end: number;
}

/**
 * Smallest move of `viewport` which reveals `target`.
 *
 * If either span contains the other the viewport stays where it is. A target
 * taller than the viewport is aligned by its edge nearest to the viewport.
 */
export const computePanRange = (viewport: Span, target: Span): Span => {
  if (target.start <= viewport.start && viewport.end <= target.end) {
    return { ...viewport };
  }
  if (viewport.start <= target.start && target.end <= viewport.end) {
    return { ...viewport };
  }

  const viewportSize = viewport.end - viewport.start;
  const fitted = Math.min(viewportSize, target.end - target.start);

  if (viewport.start >= target.start) {
    const start = target.end - fitted;
    return { start, end: start + viewportSize };
  }
  const end = target.start + fitted;
  return { start: end - viewportSize, end };
};
