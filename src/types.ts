/**
 * anchor-scroll - Core Types
 * Ids, ranges, actions and the configuration surface of the controller
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler function */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function returned by `on()` */
export type Unsubscribe = () => void;

// =============================================================================
// Ids & Ranges
// =============================================================================

/** Signed 64-bit item id; the total order of ids is the display order */
export type ItemId = bigint;

/** Half-open range of ids: `start` is included, `end` is not */
export interface IdRange {
  start: ItemId;
  end: ItemId;
}

// =============================================================================
// Handshake
// =============================================================================

/**
 * Request sent by the controller whenever the set of ids it wants
 * materialized changes.
 *
 * Before acting on it, the driver must pass it to `willHandleAction`. Then:
 * - ids in `oldActive` but not in `target` are removed with `removeChild`;
 * - ids in `target` but not in `oldActive` are added with `addChild`.
 */
export interface VirtualScrollAction {
  /** Ids which were active before this change */
  readonly oldActive: IdRange;
  /** Ids which are active once this change is handled */
  readonly target: IdRange;
}

// =============================================================================
// Layout
// =============================================================================

/** Viewport dimensions in logical pixels */
export interface ViewportSize {
  width: number;
  height: number;
}

/**
 * Lay out `child` with the given width and report its height.
 * This is the only way the controller learns item heights.
 */
export type MeasureFn<T> = (child: T, id: ItemId, width: number) => number;

/** Outcome of a layout pass */
export interface LayoutResult {
  /** The request emitted by this pass, if any */
  action: VirtualScrollAction | null;
}

/** Vertical placement of one materialized child, relative to the viewport top */
export interface Placement<T> {
  id: ItemId;
  child: T;
  y: number;
}

// =============================================================================
// Input
// =============================================================================

/** `WheelEvent.deltaMode` values */
export type WheelDeltaMode = 0 | 1 | 2;

/** Assistive-technology scroll actions */
export type AccessibilityScrollAction = "scrollUp" | "scrollDown";

/** Unit for an assistive-technology scroll */
export type AccessibilityScrollUnit = "item" | "page";

// =============================================================================
// Accessibility
// =============================================================================

/** Scroll values reported to the accessibility tree */
export interface AccessibilityState {
  orientation: "vertical";
  scrollY?: number;
  scrollYMin?: number;
  scrollYMax?: number;
  canScrollUp: boolean;
  canScrollDown: boolean;
}

// =============================================================================
// Diagnostics
// =============================================================================

/** Identifies each kind of contract problem the controller can report */
export type DiagnosticCode =
  | "invalid-valid-range"
  | "action-mismatch"
  | "add-before-handled"
  | "add-outside-active"
  | "duplicate-child"
  | "remove-before-handled"
  | "remove-active-child"
  | "remove-missing-child"
  | "missing-child"
  | "not-dense"
  | "action-delayed"
  | "action-starved"
  | "unreasonable-mean-height"
  | "invalid-item-height"
  | "invalid-scroll-delta"
  | "invalid-missed-action-limit"
  | "reentrant-call";

export type DiagnosticLevel = "warn" | "error";

export interface Diagnostic {
  code: DiagnosticCode;
  level: DiagnosticLevel;
  message: string;
}

/** Minimal logging surface; `console` satisfies it */
export interface Logger {
  debug(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

// =============================================================================
// Events
// =============================================================================

/** Events dispatched by the controller */
export interface VirtualScrollEvents extends EventMap {
  /** A new range request; the driver must handle it before the next frame */
  action: VirtualScrollAction;
  /** A warning or contract violation */
  diagnostic: Diagnostic;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VirtualScrollConfig {
  /** Ids which may ever be requested (default: `ID_MIN..ID_MAX`) */
  validRange?: IdRange;

  /** Height assumed before any item is measured (default: 60) */
  estimatedItemHeight?: number;

  /**
   * Throw a `VirtualScrollError` on contract violations instead of logging
   * and recovering (default: false). Meant for development and tests.
   */
  strict?: boolean;

  /** Emit debug logging (default: false) */
  debug?: boolean;

  /** Logger used for all output (default: console) */
  logger?: Logger;

  /** Frames an unhandled action is tolerated before recovery (default: 10) */
  missedActionLimit?: number;

  /** Wheel input conversion */
  wheel?: {
    /** Pixel height of a line-mode delta (default: 16) */
    lineHeight?: number;
    /** Multiplier applied to every wheel delta (default: 1) */
    sensitivity?: number;
  };

  /** Distance scrolled by PageUp/PageDown (default: viewport height) */
  pageScrollDistance?: number;
}

/** Read-only snapshot of the controller's internal state */
export interface VirtualScrollState {
  validRange: IdRange;
  activeRange: IdRange;
  actionHandled: boolean;
  missedActionsCount: number;
  anchorIndex: ItemId;
  scrollOffsetFromAnchor: number;
  meanItemHeight: number;
  anchorHeight: number;
  warnedNotDense: boolean;
  childIds: ItemId[];
}
