/**
 * anchor-scroll - Driver Helper
 * Reconciles a controller's children against an action
 */

import type { VirtualScroll } from "./core/virtual";
import type { ItemId, VirtualScrollAction } from "./types";
import { rangeDifference, rangeIds } from "./core/range";

// =============================================================================
// Types
// =============================================================================

/** How a driver materializes and tears down the child for an id */
export interface ItemDriver<T> {
  /**
   * Build the child for `id`. Returning `undefined` leaves the id missing,
   * which the controller tolerates (with a density warning).
   */
  create: (id: ItemId) => T | undefined;

  /** Refresh a child which stays active */
  update?: (id: ItemId, child: T) => void;

  /** Release a child which left the active range */
  destroy?: (id: ItemId, child: T) => void;
}

export interface ApplyActionResult {
  added: number;
  removed: number;
}

// =============================================================================
// Apply
// =============================================================================

/**
 * Handle `action` on `scroll` in one go: acknowledge it, remove what left
 * the active range, update what stayed and create what entered it.
 */
export const applyAction = <T>(
  scroll: VirtualScroll<T>,
  action: VirtualScrollAction,
  driver: ItemDriver<T>,
): ApplyActionResult => {
  scroll.willHandleAction(action);

  let removed = 0;
  for (const id of rangeDifference(action.oldActive, action.target)) {
    if (!scroll.hasChild(id)) continue;
    const child = scroll.removeChild(id);
    if (child === undefined) continue;
    driver.destroy?.(id, child);
    removed++;
  }

  const { update } = driver;
  if (update) {
    const kept = {
      start: action.oldActive.start > action.target.start ? action.oldActive.start : action.target.start,
      end: action.oldActive.end < action.target.end ? action.oldActive.end : action.target.end,
    };
    for (const id of rangeIds(kept)) {
      if (scroll.hasChild(id)) update(id, scroll.getChild(id));
    }
  }

  let added = 0;
  for (const id of rangeDifference(action.target, action.oldActive)) {
    const child = driver.create(id);
    if (child === undefined) continue;
    scroll.addChild(id, child);
    added++;
  }

  return { added, removed };
};
