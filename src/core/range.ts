/**
 * anchor-scroll - Id Ranges
 * Pure helpers for half-open bigint ranges
 */

import type { IdRange, ItemId } from "../types";

// =============================================================================
// Construction
// =============================================================================

export const createRange = (start: ItemId, end: ItemId): IdRange => ({
  start,
  end,
});

/** Empty range positioned at `at` */
export const emptyRangeAt = (at: ItemId): IdRange => ({ start: at, end: at });

export const cloneRange = (range: IdRange): IdRange => ({
  start: range.start,
  end: range.end,
});

// =============================================================================
// Queries
// =============================================================================

/** Reversed ranges (`start > end`) count as empty */
export const isRangeEmpty = (range: IdRange): boolean =>
  range.start >= range.end;

export const rangeContains = (range: IdRange, id: ItemId): boolean =>
  id >= range.start && id < range.end;

export const rangesEqual = (a: IdRange, b: IdRange): boolean =>
  a.start === b.start && a.end === b.end;

export const getRangeCount = (range: IdRange): bigint =>
  range.end > range.start ? range.end - range.start : 0n;

export const formatRange = (range: IdRange): string =>
  `${range.start}..${range.end}`;

// =============================================================================
// Clamping
// =============================================================================

export const clampId = (id: ItemId, min: ItemId, max: ItemId): ItemId => {
  if (id < min) return min;
  if (id > max) return max;
  return id;
};

/**
 * Restrict `target` to ids inside `valid`.
 * An empty valid range collapses the target onto it.
 */
export const clampRangeTo = (target: IdRange, valid: IdRange): IdRange => {
  if (isRangeEmpty(valid)) return cloneRange(valid);
  return {
    // `start` is inclusive whereas `valid.end` is exclusive
    start: clampId(target.start, valid.start, valid.end - 1n),
    end: clampId(target.end, valid.start, valid.end),
  };
};

// =============================================================================
// Iteration
// =============================================================================

/** Iterate the ids of a range in ascending order */
export function* rangeIds(range: IdRange): Generator<ItemId> {
  for (let id = range.start; id < range.end; id++) {
    yield id;
  }
}

/**
 * Ids in `from` which are not in `exclude`, ascending.
 *
 * Walks only the two slices of `from` below and above `exclude` instead of
 * testing every id. Reversed ranges are empty on either side.
 */
export function* rangeDifference(
  from: IdRange,
  exclude: IdRange,
): Generator<ItemId> {
  const lowEnd = exclude.start < from.end ? exclude.start : from.end;
  for (let id = from.start; id < lowEnd; id++) {
    yield id;
  }
  const highStart = exclude.end > from.start ? exclude.end : from.start;
  const start = highStart > lowEnd ? highStart : lowEnd;
  for (let id = start; id < from.end; id++) {
    yield id;
  }
}

/**
 * Ids to remove and add when moving from `oldRange` to `newRange`
 */
export const diffRanges = (
  oldRange: IdRange,
  newRange: IdRange,
): { add: ItemId[]; remove: ItemId[] } => ({
  remove: [...rangeDifference(oldRange, newRange)],
  add: [...rangeDifference(newRange, oldRange)],
});
