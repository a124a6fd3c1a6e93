/**
 * anchor-scroll - Anchor Model
 * Boundary locks and the convergent anchor walk
 *
 * The scroll position is stored as an anchor id plus an offset from the top
 * of that item. Scroll input only moves the offset; the walk below moves the
 * anchor until `0 <= offset < anchorHeight` again.
 */

import type { IdRange, ItemId } from "../types";
import { isRangeEmpty, rangeContains } from "./range";
import { itemsToCover } from "./heights";

// =============================================================================
// Types
// =============================================================================

export interface AnchorPosition {
  index: ItemId;
  offset: number;
}

/**
 * Height of a materialized, active item as measured this pass;
 * `undefined` when the item is active but was never provided.
 */
export type HeightLookup = (id: ItemId) => number | undefined;

export interface AnchorWalkInput extends AnchorPosition {
  /** Height of the measured items above `index` */
  heightBeforeAnchor: number;
  validRange: IdRange;
  activeRange: IdRange;
  /** Sanitized mean height; must be finite and positive */
  meanHeight: number;
  measuredHeight: HeightLookup;
}

export interface AnchorWalkResult extends AnchorPosition {
  heightBeforeAnchor: number;
}

export interface SettledAnchor extends AnchorPosition {
  anchorHeight: number;
}

// =============================================================================
// Boundary Locks
// =============================================================================

/**
 * Largest offset allowed from the last valid item.
 * Keeps the bottom half of the last item reachable without ever letting it
 * scroll completely out of view.
 */
export const maxScrollFromAnchor = (
  anchorHeight: number,
  viewportHeight: number,
): number => Math.max(anchorHeight - viewportHeight / 2, 0);

export const capScrollDown = (
  offset: number,
  anchorHeight: number,
  viewportHeight: number,
): number => Math.min(offset, maxScrollFromAnchor(anchorHeight, viewportHeight));

export const capScrollUp = (offset: number): number => Math.max(offset, 0);

/**
 * Apply the locks after scroll input.
 *
 * Only an anchor exactly on a boundary is locked: if the valid range changed
 * while a scroll is in flight, that scroll may still bring the anchor back
 * inside it naturally.
 */
export const applyBoundaryLocks = (
  position: AnchorPosition,
  validRange: IdRange,
  anchorHeight: number,
  viewportHeight: number,
): number => {
  let offset = position.offset;
  if (position.index + 1n === validRange.end) {
    offset = capScrollDown(offset, anchorHeight, viewportHeight);
  }
  if (position.index === validRange.start) {
    offset = capScrollUp(offset);
  }
  return offset;
};

// =============================================================================
// Anchor Walk
// =============================================================================

/**
 * Move the anchor until its offset lies within the anchor item.
 *
 * Active items contribute their measured height; inactive ones the mean.
 * Runs of inactive ids are crossed in a single step. The walk stops early
 * at an active id which has no measured height, rather than advancing past
 * something it cannot measure. Only active items can have zero height, and
 * there are finitely many of them, so the walk always terminates.
 */
export const walkAnchor = (input: AnchorWalkInput): AnchorWalkResult => {
  const { validRange, activeRange, meanHeight, measuredHeight } = input;
  let { index, offset, heightBeforeAnchor } = input;
  const hasActive = !isRangeEmpty(activeRange);

  for (;;) {
    if (offset < 0) {
      if (index <= validRange.start) {
        offset = capScrollUp(offset);
        break;
      }

      const previous = index - 1n;
      if (rangeContains(activeRange, previous)) {
        index = previous;
        const height = measuredHeight(previous);
        if (height === undefined) break;
        offset += height;
        heightBeforeAnchor -= height;
        continue;
      }

      // Every id from `previous` down to the active range (or the start of
      // the valid range) is estimated at the mean
      let limit = index - validRange.start;
      if (hasActive && previous >= activeRange.end) {
        const untilActive = index - activeRange.end;
        if (untilActive < limit) limit = untilActive;
      }
      // A degenerate offset jumps straight to the limit
      let steps = Number.isFinite(-offset / meanHeight) ? itemsToCover(-offset, meanHeight) : limit;
      if (steps > limit) steps = limit;
      if (steps < 1n) steps = 1n;

      const distance = Number(steps) * meanHeight;
      index -= steps;
      offset += distance;
      heightBeforeAnchor -= distance;
      continue;
    }

    if (index + 1n >= validRange.end) break;

    if (rangeContains(activeRange, index)) {
      const height = measuredHeight(index);
      if (height === undefined || offset < height) break;
      index += 1n;
      offset -= height;
      heightBeforeAnchor += height;
      continue;
    }

    if (offset < meanHeight) break;

    let limit = validRange.end - 1n - index;
    if (hasActive && index < activeRange.start) {
      const untilActive = activeRange.start - index;
      if (untilActive < limit) limit = untilActive;
    }
    const covered = Math.floor(offset / meanHeight);
    let steps = Number.isFinite(covered) ? BigInt(covered) : limit;
    if (steps > limit) steps = limit;
    if (steps < 1n) steps = 1n;

    const distance = Number(steps) * meanHeight;
    index += steps;
    offset -= distance;
    heightBeforeAnchor += distance;
  }

  return { index, offset, heightBeforeAnchor };
};

// =============================================================================
// Settling
// =============================================================================

/**
 * Force a walked anchor inside the valid range and apply the final locks.
 *
 * Reaching the last valid id always scrolls to the downward cap; an anchor
 * before the first valid id snaps to its top.
 */
export const settleAnchor = (
  position: AnchorPosition,
  validRange: IdRange,
  anchorHeightOf: (id: ItemId) => number,
  viewportHeight: number,
): SettledAnchor => {
  let { index, offset } = position;

  const atValidEnd = index + 1n >= validRange.end;
  if (atValidEnd) {
    index = validRange.end - 1n;
  }
  if (index < validRange.start) {
    index = validRange.start;
    offset = 0;
  }

  const anchorHeight = anchorHeightOf(index);
  if (atValidEnd) {
    offset = maxScrollFromAnchor(anchorHeight, viewportHeight);
  }

  return { index, offset, anchorHeight };
};
