/**
 * anchor-scroll - Window Calculations
 * Lookahead cutoffs, placement scan and target range computation
 */

import { LOOKAHEAD_ABOVE, LOOKAHEAD_BELOW } from "../constants";
import type { IdRange, ItemId } from "../types";
import { itemsToCover } from "./heights";
import { rangeContains } from "./range";

// =============================================================================
// Types
// =============================================================================

export interface Cutoffs {
  /** Distance above the viewport top which stays loaded */
  up: number;
  /** Distance below the viewport top which stays loaded */
  down: number;
}

export interface ScanResult {
  /** Last id whose top is at or above `-cutoffs.up` */
  itemCrossingTop: ItemId | null;
  /** Last id whose top is at or above `cutoffs.down` */
  itemCrossingBottom: ItemId;
  /** Bottom edge of the last placed item */
  bottom: number;
  /** Top edge of each placed item, in id order */
  placements: Array<{ id: ItemId; y: number }>;
  /** First active id with no materialized item, if any */
  firstMissing: ItemId | null;
}

export interface TargetInput {
  activeRange: IdRange;
  anchorIndex: ItemId;
  heightBeforeAnchor: number;
  meanHeight: number;
  cutoffs: Cutoffs;
  scan: ScanResult;
  firstMeasured: ItemId | null;
  lastMeasured: ItemId | null;
}

// =============================================================================
// Cutoffs
// =============================================================================

/**
 * Load a page and a half above the viewport, and two and a half pages below
 * its top. The anchor height is added below so that scrolling the bottom of
 * the anchor to the top of the viewport still leaves the full margin.
 */
export const computeCutoffs = (
  viewportHeight: number,
  anchorHeight: number,
): Cutoffs => ({
  up: viewportHeight * LOOKAHEAD_ABOVE,
  down: viewportHeight * LOOKAHEAD_BELOW + anchorHeight,
});

// =============================================================================
// Placement Scan
// =============================================================================

/**
 * Walk the active range top to bottom, placing every materialized item.
 * `heightOf` returns `undefined` for ids which are missing.
 */
export const scanActiveRange = (
  activeRange: IdRange,
  heightBeforeAnchor: number,
  cutoffs: Cutoffs,
  heightOf: (id: ItemId) => number | undefined,
): ScanResult => {
  let itemCrossingTop: ItemId | null = null;
  let itemCrossingBottom = activeRange.start;
  let firstMissing: ItemId | null = null;
  let y = -heightBeforeAnchor;
  const placements: Array<{ id: ItemId; y: number }> = [];

  for (let id = activeRange.start; id < activeRange.end; id++) {
    if (y <= -cutoffs.up) itemCrossingTop = id;
    if (y <= cutoffs.down) itemCrossingBottom = id;

    const height = heightOf(id);
    if (height === undefined) {
      if (firstMissing === null) firstMissing = id;
      continue;
    }
    placements.push({ id, y });
    y += height;
  }

  return { itemCrossingTop, itemCrossingBottom, bottom: y, placements, firstMissing };
};

// =============================================================================
// Target Range
// =============================================================================

/**
 * The ids which should be active after this pass, before clamping.
 *
 * Where the loaded items do not reach a cutoff, the remaining distance is
 * converted into an id count with the mean height. An anchor outside the
 * active range (after a jump) re-seeds the whole window around it.
 */
export const computeTargetRange = (input: TargetInput): IdRange => {
  const { activeRange, anchorIndex, heightBeforeAnchor, meanHeight, cutoffs, scan } =
    input;

  if (!rangeContains(activeRange, anchorIndex)) {
    return {
      start: anchorIndex - itemsToCover(cutoffs.up, meanHeight),
      end: anchorIndex + itemsToCover(cutoffs.down, meanHeight),
    };
  }

  // Extrapolate from the loaded items, not the anchor
  const start =
    scan.itemCrossingTop ??
    (input.firstMeasured ?? anchorIndex) -
      itemsToCover(cutoffs.up - heightBeforeAnchor, meanHeight);

  const end =
    scan.bottom >= cutoffs.down
      ? scan.itemCrossingBottom + 1n
      : (input.lastMeasured ?? anchorIndex) +
        itemsToCover(cutoffs.down - scan.bottom, meanHeight) +
        1n;

  return { start, end };
};
