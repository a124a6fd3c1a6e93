/**
 * anchor-scroll - Virtual Scroll Controller
 * Decides which ids must be materialized and keeps the viewport anchored
 *
 * The controller never creates or destroys item content. It asks a driver
 * for ranges of ids through `VirtualScrollAction`s and integrates whatever
 * the driver provides. At most one action is outstanding at a time: a new
 * one is only emitted once the driver has called `willHandleAction` for the
 * previous one.
 *
 * Each frame, the host:
 * 1. forwards input (`scrollBy`, `handleWheel`, `handleKey`, ...)
 * 2. runs `layout()` while `needsLayout()`, letting the driver handle each
 *    emitted action in between
 * 3. positions children from `getPlacements()`
 * 4. calls `endFrame()`
 */

import {
  DEFAULT_ESTIMATED_ITEM_HEIGHT,
  DEFAULT_MISSED_ACTION_LIMIT,
  ID_MAX,
  ID_MIN,
} from "../constants";
import type {
  AccessibilityScrollAction,
  AccessibilityScrollUnit,
  AccessibilityState,
  IdRange,
  ItemId,
  LayoutResult,
  MeasureFn,
  Placement,
  VirtualScrollAction,
  VirtualScrollConfig,
  VirtualScrollEvents,
  VirtualScrollState,
  ViewportSize,
  WheelDeltaMode,
} from "../types";
import { createEmitter, type Emitter } from "../events";
import {
  applyBoundaryLocks,
  maxScrollFromAnchor,
  settleAnchor,
  walkAnchor,
} from "./anchor";
import { createDiagnostics, createLogger, VirtualScrollError } from "./diagnostics";
import {
  computeMeanHeight,
  isReasonableMeanHeight,
  isUsableItemHeight,
  sanitizeItemHeight,
} from "./heights";
import { computePanRange, wheelDeltaToPixels } from "./input";
import {
  clampRangeTo,
  cloneRange,
  createRange,
  emptyRangeAt,
  formatRange,
  rangeContains,
  rangesEqual,
} from "./range";
import { computeCutoffs, computeTargetRange, scanActiveRange } from "./window";

// =============================================================================
// Types
// =============================================================================

export interface VirtualScroll<T> {
  // Handshake
  /** Declare that `action` is about to be handled by the driver */
  willHandleAction(action: VirtualScrollAction): void;
  /** Hand ownership of `child` for `id` to the controller */
  addChild(id: ItemId, child: T): void;
  /** Take back the child for `id` so the driver can clean it up */
  removeChild(id: ItemId): T | undefined;
  /**
   * The live child for `id`, for the driver to update in place.
   * Throws `VirtualScrollError` if `id` is not materialized.
   */
  getChild(id: ItemId): T;
  hasChild(id: ItemId): boolean;
  /** Number of materialized children */
  len(): number;

  // Configuration
  withValidRange(range: IdRange): VirtualScroll<T>;
  setValidRange(range: IdRange): void;
  getValidRange(): IdRange;
  getActiveRange(): IdRange;

  // Position & input
  /** Align the top of `id` with the top of the viewport */
  overwriteAnchor(id: ItemId): void;
  /** Scroll by `delta` logical pixels (positive scrolls down) */
  scrollBy(delta: number): void;
  handleWheel(deltaY: number, deltaMode?: WheelDeltaMode): void;
  /** Handle PageUp/PageDown; returns whether the key was consumed */
  handleKey(key: string): boolean;
  handleAccessibilityAction(
    action: AccessibilityScrollAction,
    unit?: AccessibilityScrollUnit,
  ): void;
  /** Scroll the least distance which reveals the viewport-relative span */
  panToRect(top: number, bottom: number): void;
  /**
   * Reveal `id`. Placed items are panned into view; anything else becomes
   * the new anchor.
   */
  scrollIntoView(id: ItemId): void;

  // Passes
  layout(viewport: ViewportSize, measure: MeasureFn<T>): LayoutResult;
  needsLayout(): boolean;
  endFrame(): void;

  // Output
  getPlacements(): Placement<T>[];
  getScrollTranslation(): number;
  getAccessibilityState(): AccessibilityState;
  getState(): VirtualScrollState;

  // Events
  on: Emitter<VirtualScrollEvents>["on"];
  off: Emitter<VirtualScrollEvents>["off"];
  once: Emitter<VirtualScrollEvents>["once"];
}

// =============================================================================
// Helpers
// =============================================================================

/** Children are boxed so that `T` itself may include `undefined` */
interface Slot<T> {
  child: T;
}

const compareIds = (a: ItemId, b: ItemId): number => (a < b ? -1 : a > b ? 1 : 0);

const sanitizeViewport = (viewport: ViewportSize): ViewportSize => ({
  width: Number.isFinite(viewport.width) ? Math.max(viewport.width, 0) : 0,
  height: Number.isFinite(viewport.height) ? Math.max(viewport.height, 0) : 0,
});

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a virtual scroll controller.
 *
 * The item at `initialAnchor` starts with its top aligned with the top of
 * the viewport. Children cannot be added until the first action arrives.
 */
export const createVirtualScroll = <T>(
  initialAnchor: ItemId,
  config: VirtualScrollConfig = {},
): VirtualScroll<T> => {
  const logger = createLogger(config.debug ?? false, config.logger);
  const emitter = createEmitter<VirtualScrollEvents>(logger);
  const diagnostics = createDiagnostics({
    logger,
    strict: config.strict ?? false,
    onDiagnostic: (diagnostic) => emitter.emit("diagnostic", diagnostic),
  });

  const requestedEstimate = config.estimatedItemHeight ?? DEFAULT_ESTIMATED_ITEM_HEIGHT;
  let estimatedItemHeight = requestedEstimate;
  if (!isReasonableMeanHeight(requestedEstimate)) {
    diagnostics.warn(
      "unreasonable-mean-height",
      `Got an unreasonable estimated item height ${requestedEstimate}; using ${DEFAULT_ESTIMATED_ITEM_HEIGHT}`,
    );
    estimatedItemHeight = DEFAULT_ESTIMATED_ITEM_HEIGHT;
  }

  const requestedLimit = config.missedActionLimit ?? DEFAULT_MISSED_ACTION_LIMIT;
  let missedActionLimit = requestedLimit;
  if (!Number.isFinite(requestedLimit) || requestedLimit < 0) {
    diagnostics.warn(
      "invalid-missed-action-limit",
      `Got an invalid missed action limit ${requestedLimit}; using ${DEFAULT_MISSED_ACTION_LIMIT}`,
    );
    missedActionLimit = DEFAULT_MISSED_ACTION_LIMIT;
  }

  // State
  let validRange = createRange(ID_MIN, ID_MAX);
  // Nothing is loaded yet
  let activeRange = emptyRangeAt(initialAnchor);
  let actionHandled = true;
  let missedActionsCount = 0;
  const items = new Map<ItemId, Slot<T>>();

  let anchorIndex = initialAnchor;
  let scrollOffset = 0;
  let meanItemHeight = estimatedItemHeight;
  let anchorHeight = estimatedItemHeight;
  let warnedNotDense = false;

  let viewport: ViewportSize = { width: 0, height: 0 };
  let layoutRequested = true;
  let inLayout = false;

  // Results of the last layout pass
  const measuredHeights = new Map<ItemId, number>();
  const layoutOffsets = new Map<ItemId, number>();

  // ===========================================================================
  // Guards
  // ===========================================================================

  const rejectReentrant = (operation: string): boolean => {
    if (!inLayout) return false;
    diagnostics.violation(
      "reentrant-call",
      `${operation} was called during a layout pass; it is ignored. ` +
        "Handle actions after layout() returns.",
    );
    return true;
  };

  const applyValidRange = (range: IdRange): void => {
    if (range.end < range.start) {
      diagnostics.violation(
        "invalid-valid-range",
        `Expected the valid range not to end before its start, got ${formatRange(range)}`,
        () => {
          validRange = emptyRangeAt(range.start);
        },
      );
    } else {
      validRange = cloneRange(range);
    }
    layoutRequested = true;
  };

  if (config.validRange) applyValidRange(config.validRange);

  // ===========================================================================
  // Handshake
  // ===========================================================================

  const willHandleAction = (action: VirtualScrollAction): void => {
    if (rejectReentrant("willHandleAction")) return;
    if (!rangesEqual(activeRange, action.oldActive)) {
      diagnostics.violation(
        "action-mismatch",
        `Handling an action for the wrong range; got ${formatRange(action.oldActive)}, ` +
          `expected ${formatRange(activeRange)}. Was it routed to the wrong controller?`,
      );
    }
    actionHandled = true;
    // Keep the "delayed action" warning from repeating
    if (missedActionsCount > 0) missedActionsCount = 1;
    activeRange = cloneRange(action.target);
    layoutRequested = true;
    logger.debug("handling action", formatRange(action.oldActive), "->", formatRange(action.target));
  };

  const addChild = (id: ItemId, child: T): void => {
    if (rejectReentrant("addChild")) return;
    if (!actionHandled) {
      diagnostics.violation(
        "add-before-handled",
        `addChild(${id}) called before willHandleAction for the pending action`,
      );
    }
    if (!rangeContains(activeRange, id)) {
      diagnostics.violation(
        "add-outside-active",
        `addChild(${id}) is outside the active range ${formatRange(activeRange)}; the child is dropped`,
      );
      return;
    }
    if (items.has(id)) {
      diagnostics.warn("duplicate-child", `Tried to add child ${id} twice; the newer child replaces it`);
    }
    items.set(id, { child });
    layoutRequested = true;
  };

  const removeChild = (id: ItemId): T | undefined => {
    if (rejectReentrant("removeChild")) return undefined;
    if (!actionHandled) {
      diagnostics.violation(
        "remove-before-handled",
        `removeChild(${id}) called before willHandleAction for the pending action`,
      );
    }
    if (rangeContains(activeRange, id)) {
      diagnostics.violation(
        "remove-active-child",
        `removeChild(${id}) is inside the active range ${formatRange(activeRange)}; the child is kept`,
      );
      return undefined;
    }
    const slot = items.get(id);
    if (slot === undefined) {
      // A density warning already covers this
      if (!warnedNotDense) {
        diagnostics.error(
          "remove-missing-child",
          `Tried to remove child ${id} which has already been removed or was never added`,
        );
      }
      return undefined;
    }
    items.delete(id);
    layoutRequested = true;
    return slot.child;
  };

  const getChild = (id: ItemId): T => {
    const slot = items.get(id);
    if (slot === undefined) {
      throw new VirtualScrollError(
        "missing-child",
        `getChild called with non-present id ${id}. Active range is ${formatRange(activeRange)}.`,
      );
    }
    return slot.child;
  };

  // ===========================================================================
  // Position & Input
  // ===========================================================================

  const postScroll = (): void => {
    scrollOffset = applyBoundaryLocks(
      { index: anchorIndex, offset: scrollOffset },
      validRange,
      anchorHeight,
      viewport.height,
    );
    if (scrollOffset < 0 || scrollOffset >= anchorHeight) {
      layoutRequested = true;
    }
  };

  const scrollBy = (delta: number): void => {
    if (!Number.isFinite(delta)) {
      diagnostics.warn("invalid-scroll-delta", `Ignoring non-finite scroll delta ${delta}`);
      return;
    }
    if (delta === 0) return;
    const next = scrollOffset + delta;
    if (!Number.isFinite(next)) {
      diagnostics.warn(
        "invalid-scroll-delta",
        `Ignoring scroll delta ${delta}; the offset ${scrollOffset} would overflow`,
      );
      return;
    }
    scrollOffset = next;
    postScroll();
  };

  const overwriteAnchor = (id: ItemId): void => {
    anchorIndex = id;
    scrollOffset = 0;
    layoutRequested = true;
  };

  const handleWheel = (deltaY: number, deltaMode: WheelDeltaMode = 0): void => {
    scrollBy(
      wheelDeltaToPixels(deltaY, deltaMode, {
        lineHeight: config.wheel?.lineHeight,
        sensitivity: config.wheel?.sensitivity,
        pageSize: viewport.height,
      }),
    );
  };

  const handleKey = (key: string): boolean => {
    const distance = config.pageScrollDistance ?? viewport.height;
    if (key === "PageDown") {
      scrollBy(distance);
      return true;
    }
    if (key === "PageUp") {
      scrollBy(-distance);
      return true;
    }
    return false;
  };

  const handleAccessibilityAction = (
    action: AccessibilityScrollAction,
    unit: AccessibilityScrollUnit = "item",
  ): void => {
    const amount = unit === "item" ? anchorHeight : viewport.height;
    scrollBy(action === "scrollUp" ? -amount : amount);
  };

  const panToRect = (top: number, bottom: number): void => {
    const panned = computePanRange(
      { start: 0, end: viewport.height },
      { start: top, end: bottom },
    );
    scrollBy(panned.start);
  };

  const scrollIntoView = (id: ItemId): void => {
    const y = layoutOffsets.get(id);
    const height = measuredHeights.get(id);
    if (y === undefined || height === undefined || !rangeContains(activeRange, id)) {
      overwriteAnchor(id);
      return;
    }
    const top = y - scrollOffset;
    panToRect(top, top + height);
  };

  // ===========================================================================
  // Layout Pass
  // ===========================================================================

  const runLayout = (
    size: ViewportSize,
    measure: MeasureFn<T>,
  ): VirtualScrollAction | null => {
    layoutRequested = false;
    viewport = size;
    measuredHeights.clear();
    layoutOffsets.clear();

    // Measure
    let heightBeforeAnchor = 0;
    let totalHeight = 0;
    let count = 0;
    let invalidHeights = 0;
    let firstMeasured: ItemId | null = null;
    let lastMeasured: ItemId | null = null;

    for (const [id, slot] of items) {
      // Children outside the active range have been asked to be removed,
      // but the driver has not done so yet; they don't participate
      if (!rangeContains(activeRange, id)) continue;

      const raw = measure(slot.child, id, size.width);
      if (!isUsableItemHeight(raw)) invalidHeights++;
      const height = sanitizeItemHeight(raw);
      measuredHeights.set(id, height);

      if (firstMeasured === null || id < firstMeasured) firstMeasured = id;
      if (lastMeasured === null || id > lastMeasured) lastMeasured = id;
      if (id < anchorIndex) heightBeforeAnchor += height;
      totalHeight += height;
      count++;
    }

    if (invalidHeights > 0) {
      diagnostics.warn(
        "invalid-item-height",
        `${invalidHeights} item(s) reported a negative or non-finite height; using 0`,
      );
    }

    let mean = computeMeanHeight(totalHeight, count, meanItemHeight);
    if (!isReasonableMeanHeight(mean)) {
      diagnostics.warn(
        "unreasonable-mean-height",
        `Got an unreasonable mean item height ${mean}; using ${estimatedItemHeight}`,
      );
      mean = estimatedItemHeight;
    }
    meanItemHeight = mean;

    // Resolve the anchor
    const walked = walkAnchor({
      index: anchorIndex,
      offset: scrollOffset,
      heightBeforeAnchor,
      validRange,
      activeRange,
      meanHeight: mean,
      measuredHeight: (id) => measuredHeights.get(id),
    });
    heightBeforeAnchor = walked.heightBeforeAnchor;

    // Only active children are in `measuredHeights`
    const settled = settleAnchor(
      walked,
      validRange,
      (id) => measuredHeights.get(id) ?? mean,
      size.height,
    );
    anchorIndex = settled.index;
    scrollOffset = settled.offset;
    anchorHeight = settled.anchorHeight;

    // Place the active children
    const cutoffs = computeCutoffs(size.height, anchorHeight);
    const scan = scanActiveRange(activeRange, heightBeforeAnchor, cutoffs, (id) =>
      measuredHeights.get(id),
    );
    for (const placement of scan.placements) {
      layoutOffsets.set(placement.id, placement.y);
    }

    if (scan.firstMissing === null) {
      // Warn again on the next falling edge
      warnedNotDense = false;
    } else if (!warnedNotDense) {
      warnedNotDense = true;
      diagnostics.warn(
        "not-dense",
        `Items are not dense: expected every id in ${formatRange(activeRange)}, ` +
          `but ${scan.firstMissing} is missing`,
      );
    }

    // Only send a new request once the previous one was handled
    if (!actionHandled) return null;

    const target = clampRangeTo(
      computeTargetRange({
        activeRange,
        anchorIndex,
        heightBeforeAnchor,
        meanHeight: mean,
        cutoffs,
        scan,
        firstMeasured,
        lastMeasured,
      }),
      validRange,
    );
    if (rangesEqual(activeRange, target)) return null;

    actionHandled = false;
    return { oldActive: cloneRange(activeRange), target };
  };

  const layout = (size: ViewportSize, measure: MeasureFn<T>): LayoutResult => {
    if (rejectReentrant("layout")) return { action: null };

    let action: VirtualScrollAction | null = null;
    inLayout = true;
    try {
      action = runLayout(sanitizeViewport(size), measure);
    } finally {
      inLayout = false;
    }

    if (action) {
      logger.debug("requesting", formatRange(action.oldActive), "->", formatRange(action.target));
      emitter.emit("action", action);
    }
    return { action };
  };

  /**
   * Frame-end check, outside the layout fixed point: by now the driver must
   * have handled the last action.
   */
  const endFrame = (): void => {
    if (actionHandled) return;

    if (missedActionsCount === 0) {
      diagnostics.warn(
        "action-delayed",
        "Reached the end of a frame without the pending action being handled. " +
          "Maybe your driver only handles one action at a time?",
      );
    }
    if (missedActionsCount > missedActionLimit) {
      diagnostics.violation(
        "action-starved",
        "The pending action has repeatedly not been handled. " +
          "To handle an action, call willHandleAction with it.",
        () => {
          // Re-send the request, which will hopefully get things unstuck
          actionHandled = true;
          layoutRequested = true;
        },
      );
    }
    missedActionsCount++;
  };

  // ===========================================================================
  // Output
  // ===========================================================================

  const getPlacements = (): Placement<T>[] => {
    const placements: Placement<T>[] = [];
    for (const [id, y] of layoutOffsets) {
      const slot = items.get(id);
      if (slot === undefined || !rangeContains(activeRange, id)) continue;
      placements.push({ id, child: slot.child, y: y - scrollOffset });
    }
    return placements;
  };

  const getAccessibilityState = (): AccessibilityState => {
    const state: AccessibilityState = {
      orientation: "vertical",
      canScrollUp: anchorIndex !== validRange.start || scrollOffset > 0,
      canScrollDown: !(
        anchorIndex + 1n === validRange.end &&
        scrollOffset >= maxScrollFromAnchor(anchorHeight, viewport.height)
      ),
    };

    if (validRange.start === ID_MIN) {
      // Platforms need some scroll value to notice scrolling at all; assume
      // the anchor is in range for a double
      if (anchorIndex !== ID_MIN && anchorIndex !== ID_MAX) {
        state.scrollY = Number(anchorIndex) * meanItemHeight + scrollOffset;
      }
    } else {
      state.scrollYMin = 0;
      state.scrollY = Math.max(
        Number(anchorIndex - validRange.start) * meanItemHeight + scrollOffset,
        0,
      );
      if (validRange.end !== ID_MAX) {
        state.scrollYMax = Math.max(
          Number(validRange.end - validRange.start) * meanItemHeight,
          0,
        );
      }
    }
    return state;
  };

  const getState = (): VirtualScrollState => ({
    validRange: cloneRange(validRange),
    activeRange: cloneRange(activeRange),
    actionHandled,
    missedActionsCount,
    anchorIndex,
    scrollOffsetFromAnchor: scrollOffset,
    meanItemHeight,
    anchorHeight,
    warnedNotDense,
    childIds: [...items.keys()].sort(compareIds),
  });

  // ===========================================================================
  // Public API
  // ===========================================================================

  const scroll: VirtualScroll<T> = {
    willHandleAction,
    addChild,
    removeChild,
    getChild,
    hasChild: (id) => items.has(id),
    len: () => items.size,

    withValidRange: (range) => {
      applyValidRange(range);
      return scroll;
    },
    setValidRange: applyValidRange,
    getValidRange: () => cloneRange(validRange),
    getActiveRange: () => cloneRange(activeRange),

    overwriteAnchor,
    scrollBy,
    handleWheel,
    handleKey,
    handleAccessibilityAction,
    panToRect,
    scrollIntoView,

    layout,
    needsLayout: () => layoutRequested,
    endFrame,

    getPlacements,
    getScrollTranslation: () => -scrollOffset,
    getAccessibilityState,
    getState,

    on: emitter.on,
    off: emitter.off,
    once: emitter.once,
  };

  return scroll;
};
