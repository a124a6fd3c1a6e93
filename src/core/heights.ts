/**
 * anchor-scroll - Height Estimation
 * Sanitizing measured heights and maintaining the running mean
 */

import { MIN_MEAN_ITEM_HEIGHT } from "../constants";

// =============================================================================
// Item Heights
// =============================================================================

/**
 * Clamp a measured height to a usable value.
 * Negative and non-finite measurements count as zero height.
 */
export const sanitizeItemHeight = (height: number): number =>
  Number.isFinite(height) && height > 0 ? height : 0;

export const isUsableItemHeight = (height: number): boolean =>
  Number.isFinite(height) && height >= 0;

// =============================================================================
// Mean Height
// =============================================================================

export const isReasonableMeanHeight = (mean: number): boolean =>
  Number.isFinite(mean) && mean >= MIN_MEAN_ITEM_HEIGHT;

/**
 * Mean of the heights measured this pass, or `previous` if nothing was
 * measured. Callers must still pass the result through
 * `isReasonableMeanHeight`.
 */
export const computeMeanHeight = (
  totalHeight: number,
  count: number,
  previous: number,
): number => (count > 0 ? totalHeight / count : previous);

// =============================================================================
// Estimates
// =============================================================================

/**
 * Number of items of height `mean` needed to cover `distance`, rounded up.
 * Non-finite results (from a degenerate distance) count as zero items.
 */
export const itemsToCover = (distance: number, mean: number): bigint => {
  const count = Math.ceil(distance / mean);
  return Number.isFinite(count) ? BigInt(count) : 0n;
};
