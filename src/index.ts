/**
 * anchor-scroll - Headless Anchored Virtual Scrolling
 * Sparse, unbounded id spaces with a driver-owned item lifecycle
 *
 * @packageDocumentation
 */

// Controller
export { createVirtualScroll } from "./core/virtual";
export type { VirtualScroll } from "./core/virtual";

// Driver helper
export { applyAction } from "./driver";
export type { ItemDriver, ApplyActionResult } from "./driver";

// DOM host
export { mountVirtualScroll } from "./dom";
export type { MountConfig, MountedVirtualScroll } from "./dom";

// Errors & logging
export { VirtualScrollError, createLogger } from "./core/diagnostics";

// Range utilities
export {
  createRange,
  isRangeEmpty,
  rangeContains,
  rangesEqual,
  getRangeCount,
  rangeIds,
  rangeDifference,
  diffRanges,
} from "./core/range";

// Input conversion
export { wheelDeltaToPixels, computePanRange } from "./core/input";

// Constants
export {
  ID_MIN,
  ID_MAX,
  DEFAULT_ESTIMATED_ITEM_HEIGHT,
  DEFAULT_MISSED_ACTION_LIMIT,
} from "./constants";

// Types
export type {
  // Ids & ranges
  ItemId,
  IdRange,

  // Handshake
  VirtualScrollAction,

  // Layout
  ViewportSize,
  MeasureFn,
  LayoutResult,
  Placement,

  // Input
  WheelDeltaMode,
  AccessibilityScrollAction,
  AccessibilityScrollUnit,
  AccessibilityState,

  // Diagnostics
  Diagnostic,
  DiagnosticCode,
  DiagnosticLevel,
  Logger,

  // Config & state
  VirtualScrollConfig,
  VirtualScrollState,
  VirtualScrollEvents,

  // Events
  EventHandler,
  Unsubscribe,
} from "./types";
