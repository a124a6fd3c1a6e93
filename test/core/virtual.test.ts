/**
 * anchor-scroll - Virtual Scroll Controller Tests
 * Convergence, boundary behaviour, the driver handshake and input handling
 */

import { describe, it, expect, vi } from "vitest";
import { createVirtualScroll, type VirtualScroll } from "../../src/core/virtual";
import { VirtualScrollError } from "../../src/core/diagnostics";
import { applyAction } from "../../src/driver";
import { createRange } from "../../src/core/range";
import { ID_MAX, ID_MIN } from "../../src/constants";
import type {
  DiagnosticCode,
  ItemId,
  Logger,
  VirtualScrollAction,
  VirtualScrollConfig,
} from "../../src/types";

// =============================================================================
// Test Utilities
// =============================================================================

interface TestItem {
  id: ItemId;
}

const VIEWPORT = { width: 100, height: 100 };
const ITEM_HEIGHT = 10;

const measureFixed = (): number => ITEM_HEIGHT;

const silentLogger = (): Logger => ({
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const create = (anchor: ItemId, config: VirtualScrollConfig = {}) => {
  const scroll = createVirtualScroll<TestItem>(anchor, { logger: silentLogger(), ...config });
  const codes: DiagnosticCode[] = [];
  scroll.on("diagnostic", (diagnostic) => codes.push(diagnostic.code));
  return { scroll, codes };
};

/** Every id which passes `exists` gets an item */
const createItems =
  (exists: (id: ItemId) => boolean = () => true) =>
  (id: ItemId): TestItem | undefined =>
    exists(id) ? { id } : undefined;

/**
 * Alternate layout and action handling until the controller stops asking
 * for changes, returning every action it emitted.
 */
const driveToFixpoint = (
  scroll: VirtualScroll<TestItem>,
  exists?: (id: ItemId) => boolean,
  maxIterations = 1000,
): VirtualScrollAction[] => {
  const actions: VirtualScrollAction[] = [];
  const driver = { create: createItems(exists) };

  for (let i = 0; i < maxIterations; i++) {
    const { action } = scroll.layout(VIEWPORT, measureFixed);
    if (!action) return actions;
    expect(action.target).not.toEqual(action.oldActive);
    actions.push(action);
    applyAction(scroll, action, driver);
  }
  throw new Error(`No fixpoint after ${maxIterations} layout passes`);
};

const expectChained = (actions: VirtualScrollAction[]): void => {
  for (let i = 1; i < actions.length; i++) {
    expect(actions[i]?.oldActive).toEqual(actions[i - 1]?.target);
  }
};

// =============================================================================
// Convergence
// =============================================================================

describe("convergence", () => {
  it("should load around the initial anchor", () => {
    const { scroll } = create(0n);
    const actions = driveToFixpoint(scroll);

    expect(actions).toEqual([
      { oldActive: { start: 0n, end: 0n }, target: { start: -3n, end: 6n } },
      { oldActive: { start: -3n, end: 6n }, target: { start: -15n, end: 26n } },
    ]);
    expect(scroll.getActiveRange()).toEqual({ start: -15n, end: 26n });
    expect(scroll.len()).toBe(41);
  });

  it("should stay put once converged", () => {
    const { scroll } = create(0n);
    driveToFixpoint(scroll);
    const before = scroll.getState();

    expect(scroll.needsLayout()).toBe(false);
    expect(scroll.layout(VIEWPORT, measureFixed).action).toBeNull();
    expect(scroll.getState()).toEqual(before);
  });

  it("should report the measured state", () => {
    const { scroll } = create(0n);
    driveToFixpoint(scroll);
    const state = scroll.getState();

    expect(state.anchorIndex).toBe(0n);
    expect(state.scrollOffsetFromAnchor).toBe(0);
    expect(state.meanItemHeight).toBe(10);
    expect(state.anchorHeight).toBe(10);
    expect(state.actionHandled).toBe(true);
    expect(state.childIds[0]).toBe(-15n);
    expect(state.childIds[state.childIds.length - 1]).toBe(25n);
  });

  it("should follow the anchor after scrolling", () => {
    const { scroll } = create(0n);
    driveToFixpoint(scroll);

    scroll.scrollBy(25);
    expect(scroll.needsLayout()).toBe(true);

    const actions = driveToFixpoint(scroll);
    expect(actions).toEqual([
      { oldActive: { start: -15n, end: 26n }, target: { start: -13n, end: 28n } },
    ]);
    expect(scroll.getState().anchorIndex).toBe(2n);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(5);
    expect(scroll.hasChild(-15n)).toBe(false);
    expect(scroll.hasChild(27n)).toBe(true);
  });

  it("should chain every action onto the previous target", () => {
    const { scroll } = create(0n);
    const actions = driveToFixpoint(scroll);
    scroll.scrollBy(-437);
    actions.push(...driveToFixpoint(scroll));
    scroll.overwriteAnchor(5000n);
    actions.push(...driveToFixpoint(scroll));

    expectChained(actions);
    expect(scroll.getState().anchorIndex).toBe(5000n);
  });

  it("should converge when every other id is missing", () => {
    const { scroll, codes } = create(0n);
    const actions = driveToFixpoint(scroll, (id) => id % 2n === 0n);

    expectChained(actions);
    expect(scroll.getActiveRange()).toEqual({ start: -29n, end: 50n });
    expect(codes).toContain("not-dense");
  });

  it("should converge when items are far apart", () => {
    const { scroll } = create(0n);
    const actions = driveToFixpoint(scroll, (id) => id % 100n === 1n);

    expectChained(actions);
    expect(scroll.getActiveRange()).toEqual({ start: -14n, end: 27n });
    expect(scroll.len()).toBe(1);
  });

  it("should converge when the driver only has a few items", () => {
    const { scroll } = create(0n);
    const actions = driveToFixpoint(scroll, (id) => id < 5n);

    expectChained(actions);
    expect(scroll.getActiveRange()).toEqual({ start: -15n, end: 26n });
    expect(scroll.len()).toBe(20);
  });

  it("should keep converging while scrolling past gaps", () => {
    const drivers: Array<(id: ItemId) => boolean> = [
      (id) => id % 2n === 0n,
      (id) => id % 100n === 1n,
      (id) => id < 5n,
    ];
    for (const exists of drivers) {
      const { scroll } = create(0n);
      const actions = driveToFixpoint(scroll, exists);
      for (const delta of [37, 37, -53, -53, 200, -400]) {
        scroll.scrollBy(delta);
        actions.push(...driveToFixpoint(scroll, exists));
      }
      expectChained(actions);
    }
  });

  it("should warn about gaps once per falling edge", () => {
    const { scroll, codes } = create(0n);
    driveToFixpoint(scroll, (id) => id % 2n === 0n);

    expect(codes.filter((code) => code === "not-dense")).toEqual(["not-dense"]);
    expect(scroll.getState().warnedNotDense).toBe(true);
  });
});

// =============================================================================
// Valid Range
// =============================================================================

describe("valid range", () => {
  it("should snap an anchor before the start to the first valid id", () => {
    const { scroll } = create(0n, { validRange: createRange(10n, ID_MAX) });
    const { action } = scroll.layout(VIEWPORT, measureFixed);

    expect(action).toEqual({
      oldActive: { start: 0n, end: 0n },
      target: { start: 10n, end: 16n },
    });
    expect(scroll.getState().anchorIndex).toBe(10n);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);
  });

  it("should not scroll above the first valid id", () => {
    const { scroll } = create(0n, { validRange: createRange(10n, ID_MAX) });
    driveToFixpoint(scroll);

    scroll.scrollBy(-100);

    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);
    expect(scroll.needsLayout()).toBe(false);
    expect(scroll.getActiveRange()).toEqual({ start: 10n, end: 36n });
  });

  it("should pull an anchor past the end back to the last valid id", () => {
    const { scroll } = create(100n, { validRange: createRange(ID_MIN, 10n) });
    const { action } = scroll.layout(VIEWPORT, measureFixed);

    expect(action).toEqual({
      oldActive: { start: 100n, end: 100n },
      target: { start: 6n, end: 10n },
    });
    expect(scroll.getState().anchorIndex).toBe(9n);
    // Half a viewport below a 60px estimate
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(10);
  });

  it("should cap scrolling down on the last valid id", () => {
    const { scroll } = create(100n, { validRange: createRange(ID_MIN, 10n) });
    driveToFixpoint(scroll);
    expect(scroll.getActiveRange()).toEqual({ start: -6n, end: 10n });
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);

    scroll.scrollBy(5);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);

    scroll.scrollBy(-5);
    driveToFixpoint(scroll);
    expect(scroll.getState().anchorIndex).toBe(8n);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(5);
  });

  it("should shrink the active range when the valid range shrinks", () => {
    const { scroll } = create(0n);
    driveToFixpoint(scroll);

    scroll.setValidRange(createRange(0n, 10n));
    const { action } = scroll.layout(VIEWPORT, measureFixed);

    expect(action).toEqual({
      oldActive: { start: -15n, end: 26n },
      target: { start: 0n, end: 10n },
    });
  });

  it("should request an empty range for an empty valid range", () => {
    const { scroll } = create(0n, { validRange: createRange(5n, 5n) });
    const actions = driveToFixpoint(scroll);

    expect(actions).toEqual([
      { oldActive: { start: 0n, end: 0n }, target: { start: 5n, end: 5n } },
    ]);
    expect(scroll.len()).toBe(0);
  });

  it("should treat a reversed valid range as empty", () => {
    const { scroll, codes } = create(0n);
    scroll.setValidRange(createRange(5n, 2n));

    expect(codes).toEqual(["invalid-valid-range"]);
    expect(scroll.getValidRange()).toEqual({ start: 5n, end: 5n });
  });

  it("should throw for a reversed valid range in strict mode", () => {
    expect(() =>
      createVirtualScroll(0n, {
        logger: silentLogger(),
        strict: true,
        validRange: createRange(5n, 2n),
      }),
    ).toThrow(VirtualScrollError);
  });

  it("should return the same controller from withValidRange", () => {
    const scroll = createVirtualScroll<TestItem>(0n, { logger: silentLogger() });
    expect(scroll.withValidRange(createRange(0n, 20n))).toBe(scroll);
    expect(scroll.getValidRange()).toEqual({ start: 0n, end: 20n });
  });
});

// =============================================================================
// Handshake
// =============================================================================

describe("handshake", () => {
  it("should not emit a new action until the pending one is handled", () => {
    const { scroll } = create(0n);
    const { action } = scroll.layout(VIEWPORT, measureFixed);
    expect(action).not.toBeNull();

    scroll.scrollBy(500);
    expect(scroll.layout(VIEWPORT, measureFixed).action).toBeNull();
  });

  it("should dispatch actions as events", () => {
    const { scroll } = create(0n);
    const handler = vi.fn();
    scroll.on("action", handler);

    const { action } = scroll.layout(VIEWPORT, measureFixed);

    expect(handler).toHaveBeenCalledWith(action);
  });

  it("should allow handling the action from its event", () => {
    const { scroll, codes } = create(0n);
    scroll.on("action", (action) => {
      applyAction(scroll, action, { create: createItems() });
    });

    scroll.layout(VIEWPORT, measureFixed);

    expect(codes).toEqual([]);
    expect(scroll.getActiveRange()).toEqual({ start: -3n, end: 6n });
    expect(scroll.len()).toBe(9);
  });

  it("should report an action for a different range", () => {
    const { scroll, codes } = create(0n);
    scroll.layout(VIEWPORT, measureFixed);

    scroll.willHandleAction({ oldActive: createRange(1n, 2n), target: createRange(0n, 4n) });

    expect(codes).toEqual(["action-mismatch"]);
    expect(scroll.getActiveRange()).toEqual({ start: 0n, end: 4n });
  });

  it("should throw for an action for a different range in strict mode", () => {
    const { scroll } = create(0n, { strict: true });
    scroll.layout(VIEWPORT, measureFixed);

    expect(() =>
      scroll.willHandleAction({ oldActive: createRange(1n, 2n), target: createRange(0n, 4n) }),
    ).toThrow(VirtualScrollError);
  });

  it("should drop children added before the action is handled", () => {
    const { scroll, codes } = create(0n);
    scroll.layout(VIEWPORT, measureFixed);

    scroll.addChild(0n, { id: 0n });

    expect(codes).toEqual(["add-before-handled", "add-outside-active"]);
    expect(scroll.hasChild(0n)).toBe(false);
  });

  it("should replace a child added twice", () => {
    const { scroll, codes } = create(0n);
    driveToFixpoint(scroll);
    const replacement = { id: 3n };

    scroll.addChild(3n, replacement);

    expect(codes).toEqual(["duplicate-child"]);
    expect(scroll.getChild(3n)).toBe(replacement);
  });

  it("should keep an active child which the driver tries to remove", () => {
    const { scroll, codes } = create(0n);
    driveToFixpoint(scroll);

    expect(scroll.removeChild(3n)).toBeUndefined();
    expect(codes).toEqual(["remove-active-child"]);
    expect(scroll.hasChild(3n)).toBe(true);
  });

  it("should report removing a child which is not there", () => {
    const { scroll, codes } = create(0n);
    driveToFixpoint(scroll);

    expect(scroll.removeChild(1000n)).toBeUndefined();
    expect(codes).toEqual(["remove-missing-child"]);
  });

  it("should throw when getting a child which is not there", () => {
    const { scroll } = create(0n);
    driveToFixpoint(scroll);

    expect(() => scroll.getChild(1000n)).toThrow(VirtualScrollError);
    try {
      scroll.getChild(1000n);
    } catch (error) {
      expect(error).toBeInstanceOf(VirtualScrollError);
      if (error instanceof VirtualScrollError) expect(error.code).toBe("missing-child");
    }
  });

  it("should ignore handshake calls made during layout", () => {
    const { scroll, codes } = create(0n);
    driveToFixpoint(scroll);

    scroll.scrollBy(25);
    scroll.layout(VIEWPORT, (item) => {
      scroll.removeChild(item.id);
      return ITEM_HEIGHT;
    });

    expect(codes[0]).toBe("reentrant-call");
    expect(codes.every((code) => code === "reentrant-call")).toBe(true);
    expect(scroll.len()).toBe(41);
  });
});

// =============================================================================
// Missed Actions
// =============================================================================

describe("missed actions", () => {
  it("should fall back to the default limit for an invalid one", () => {
    const logger = silentLogger();
    const scroll = createVirtualScroll<TestItem>(0n, { logger, missedActionLimit: Number.NaN });
    expect(logger.warn).toHaveBeenCalledTimes(1);

    const codes: DiagnosticCode[] = [];
    scroll.on("diagnostic", (diagnostic) => codes.push(diagnostic.code));
    scroll.layout(VIEWPORT, measureFixed);
    for (let i = 0; i < 12; i++) scroll.endFrame();

    expect(codes).toEqual(["action-delayed", "action-starved"]);
    expect(scroll.getState().actionHandled).toBe(true);
  });

  it("should warn on the first frame an action stays unhandled", () => {
    const { scroll, codes } = create(0n);
    scroll.layout(VIEWPORT, measureFixed);

    scroll.endFrame();
    scroll.endFrame();

    expect(codes).toEqual(["action-delayed"]);
    expect(scroll.getState().missedActionsCount).toBe(2);
  });

  it("should re-arm a starved action after the limit", () => {
    const { scroll, codes } = create(0n);
    scroll.layout(VIEWPORT, measureFixed);

    for (let i = 0; i < 11; i++) scroll.endFrame();
    expect(scroll.getState().actionHandled).toBe(false);

    scroll.endFrame();
    expect(codes).toEqual(["action-delayed", "action-starved"]);
    expect(scroll.getState().actionHandled).toBe(true);
    expect(scroll.needsLayout()).toBe(true);

    const { action } = scroll.layout(VIEWPORT, measureFixed);
    expect(action).toEqual({
      oldActive: { start: 0n, end: 0n },
      target: { start: -3n, end: 6n },
    });
  });

  it("should honour a custom limit", () => {
    const { scroll, codes } = create(0n, { missedActionLimit: 0 });
    scroll.layout(VIEWPORT, measureFixed);

    scroll.endFrame();
    scroll.endFrame();

    expect(codes).toEqual(["action-delayed", "action-starved"]);
  });

  it("should throw for a starved action in strict mode", () => {
    const { scroll } = create(0n, { strict: true, missedActionLimit: 0 });
    scroll.layout(VIEWPORT, measureFixed);
    scroll.endFrame();

    expect(() => scroll.endFrame()).toThrow(VirtualScrollError);
  });

  it("should reset the count to one once handled", () => {
    const { scroll } = create(0n);
    const { action } = scroll.layout(VIEWPORT, measureFixed);
    scroll.endFrame();
    scroll.endFrame();
    scroll.endFrame();
    if (!action) throw new Error("expected an action");

    applyAction(scroll, action, { create: createItems() });

    expect(scroll.getState().missedActionsCount).toBe(1);
  });
});

// =============================================================================
// Heights
// =============================================================================

describe("heights", () => {
  it("should fall back to the estimate for an unreasonable mean", () => {
    const { scroll, codes } = create(0n);
    const { action } = scroll.layout(VIEWPORT, measureFixed);
    if (!action) throw new Error("expected an action");
    applyAction(scroll, action, { create: createItems() });

    scroll.layout(VIEWPORT, () => 0);

    expect(codes).toEqual(["unreasonable-mean-height"]);
    expect(scroll.getState().meanItemHeight).toBe(60);
  });

  it("should count invalid heights as zero", () => {
    const { scroll, codes } = create(0n);
    const { action } = scroll.layout(VIEWPORT, measureFixed);
    if (!action) throw new Error("expected an action");
    applyAction(scroll, action, { create: createItems() });

    scroll.layout(VIEWPORT, (item) => (item.id === 2n ? Number.NaN : 9));

    expect(codes).toEqual(["invalid-item-height"]);
    expect(scroll.getState().meanItemHeight).toBe(8);
  });

  it("should replace an unreasonable estimate with the default and log it", () => {
    const logger = silentLogger();
    const scroll = createVirtualScroll<TestItem>(0n, { logger, estimatedItemHeight: Number.NaN });

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(scroll.getState().meanItemHeight).toBe(60);
  });

  it("should use the configured estimate before measuring", () => {
    const { scroll } = create(0n, { estimatedItemHeight: 20 });
    const { action } = scroll.layout(VIEWPORT, measureFixed);

    // 150 / 20 above, (250 + 20) / 20 below
    expect(action?.target).toEqual({ start: -8n, end: 14n });
  });
});

// =============================================================================
// Input
// =============================================================================

describe("input", () => {
  const converged = (config: VirtualScrollConfig = {}) => {
    const created = create(0n, config);
    driveToFixpoint(created.scroll);
    created.codes.length = 0;
    return created;
  };

  it("should scroll down for positive deltas", () => {
    const { scroll } = converged();
    scroll.scrollBy(7);

    expect(scroll.getState().scrollOffsetFromAnchor).toBe(7);
    expect(scroll.needsLayout()).toBe(false);
    expect(scroll.getScrollTranslation()).toBe(-7);
  });

  it("should ignore non-finite deltas", () => {
    const { scroll, codes } = converged();
    scroll.scrollBy(Number.NaN);

    expect(codes).toEqual(["invalid-scroll-delta"]);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);
  });

  it("should ignore a delta which would overflow the offset downward", () => {
    const { scroll, codes } = converged();
    scroll.scrollBy(1e308);
    scroll.scrollBy(1e308);

    expect(codes).toEqual(["invalid-scroll-delta"]);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(1e308);

    const { action } = scroll.layout(VIEWPORT, measureFixed);

    expect(action?.target).toEqual({ start: ID_MAX - 16n, end: ID_MAX });
    expect(scroll.getState().anchorIndex).toBe(ID_MAX - 1n);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);
  });

  it("should ignore a delta which would overflow the offset upward", () => {
    const { scroll, codes } = converged();
    scroll.scrollBy(-1e308);
    scroll.scrollBy(-1e308);

    expect(codes).toEqual(["invalid-scroll-delta"]);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(-1e308);

    const { action } = scroll.layout(VIEWPORT, measureFixed);

    expect(action?.target).toEqual({ start: ID_MIN, end: ID_MIN + 26n });
    expect(scroll.getState().anchorIndex).toBe(ID_MIN);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);
  });

  it("should settle at the boundary after a huge scroll", () => {
    const { scroll } = converged();
    scroll.scrollBy(1e308);
    driveToFixpoint(scroll);

    const state = scroll.getState();
    expect(state.anchorIndex).toBe(ID_MAX - 1n);
    expect(state.activeRange.end).toBe(ID_MAX);
    expect(state.childIds).toContain(ID_MAX - 1n);
  });

  it("should convert wheel deltas", () => {
    const { scroll } = converged({ wheel: { lineHeight: 20 } });

    scroll.handleWheel(2, 1);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(40);

    scroll.handleWheel(-1, 2);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(-60);
  });

  it("should page with PageDown and PageUp", () => {
    const { scroll } = converged();

    expect(scroll.handleKey("PageDown")).toBe(true);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(100);

    expect(scroll.handleKey("PageUp")).toBe(true);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);

    expect(scroll.handleKey("Enter")).toBe(false);
  });

  it("should use the configured page distance", () => {
    const { scroll } = converged({ pageScrollDistance: 40 });
    scroll.handleKey("PageDown");

    expect(scroll.getState().scrollOffsetFromAnchor).toBe(40);
  });

  it("should scroll by item or page for accessibility actions", () => {
    const { scroll } = converged();

    scroll.handleAccessibilityAction("scrollDown");
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(10);

    scroll.handleAccessibilityAction("scrollDown", "page");
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(110);

    scroll.handleAccessibilityAction("scrollUp", "page");
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(10);
  });

  it("should pan the least distance to reveal a span", () => {
    const { scroll } = converged();

    scroll.panToRect(120, 150);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(50);
  });

  it("should pan a placed item into view", () => {
    const { scroll } = converged();

    scroll.scrollIntoView(15n);

    expect(scroll.getState().anchorIndex).toBe(0n);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(60);
  });

  it("should jump to an item which is not placed", () => {
    const { scroll } = converged();

    scroll.scrollIntoView(1000n);

    expect(scroll.getState().anchorIndex).toBe(1000n);
    expect(scroll.getState().scrollOffsetFromAnchor).toBe(0);
    expect(scroll.needsLayout()).toBe(true);
  });
});

// =============================================================================
// Output
// =============================================================================

describe("output", () => {
  it("should place children relative to the viewport top", () => {
    const { scroll } = create(0n);
    driveToFixpoint(scroll);
    scroll.scrollBy(25);
    driveToFixpoint(scroll);

    const placements = scroll.getPlacements();
    expect(placements).toHaveLength(41);
    expect(placements[0]).toEqual({ id: -13n, child: { id: -13n }, y: -135 });
    expect(placements.find((p) => p.id === 2n)?.y).toBe(-5);
  });

  it("should report an unbounded start through the anchor position", () => {
    const { scroll } = create(0n);
    driveToFixpoint(scroll);
    scroll.scrollBy(4);

    expect(scroll.getAccessibilityState()).toEqual({
      orientation: "vertical",
      scrollY: 4,
      canScrollUp: true,
      canScrollDown: true,
    });
  });

  it("should report a bounded range with a minimum and maximum", () => {
    const { scroll } = create(0n, { validRange: createRange(0n, 20n) });
    driveToFixpoint(scroll);

    expect(scroll.getActiveRange()).toEqual({ start: 0n, end: 20n });
    expect(scroll.getAccessibilityState()).toEqual({
      orientation: "vertical",
      scrollY: 0,
      scrollYMin: 0,
      scrollYMax: 200,
      canScrollUp: false,
      canScrollDown: true,
    });
  });

  it("should not report scrolling down past the last item", () => {
    const { scroll } = create(100n, { validRange: createRange(ID_MIN, 10n) });
    driveToFixpoint(scroll);

    expect(scroll.getAccessibilityState().canScrollDown).toBe(false);
  });
});

// =============================================================================
// Logging
// =============================================================================

describe("logging", () => {
  it("should log requested ranges in debug mode", () => {
    const logger = silentLogger();
    const scroll = createVirtualScroll<TestItem>(0n, { logger, debug: true });

    scroll.layout(VIEWPORT, measureFixed);

    expect(logger.debug).toHaveBeenCalledWith("[anchor-scroll]", "requesting", "0..0", "->", "-3..6");
  });

  it("should stay quiet outside debug mode", () => {
    const logger = silentLogger();
    const scroll = createVirtualScroll<TestItem>(0n, { logger });

    scroll.layout(VIEWPORT, measureFixed);

    expect(logger.debug).not.toHaveBeenCalled();
  });
});
