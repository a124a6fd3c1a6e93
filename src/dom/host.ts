/**
 * anchor-scroll/dom - Host
 * Mounts a controller into the DOM and drives it once per animation frame
 *
 * Items are absolutely positioned inside the items layer and moved with
 * `translateY`; the viewport never scrolls natively. Wheel and PageUp/PageDown
 * input are forwarded to the controller.
 */

import { DEFAULT_CLASS_PREFIX } from "../constants";
import { createVirtualScroll, type VirtualScroll } from "../core/virtual";
import { applyAction, type ItemDriver } from "../driver";
import type {
  IdRange,
  ItemId,
  MeasureFn,
  VirtualScrollConfig,
  ViewportSize,
  WheelDeltaMode,
} from "../types";
import { createFrameScheduler } from "./frame";
import { createDOMStructure, resolveContainer } from "./structure";

// =============================================================================
// Types
// =============================================================================

export interface MountConfig extends VirtualScrollConfig {
  /** Container element or selector */
  container: HTMLElement | string;

  /** Id shown at the top of the viewport initially (default: 0) */
  initialAnchor?: ItemId;

  /** Create the element for `id`; `undefined` leaves the id empty */
  render: (id: ItemId) => HTMLElement | undefined;

  /** Called for elements which stay mounted when the active range moves */
  update?: (id: ItemId, element: HTMLElement) => void;

  /** Called after an element has been detached */
  release?: (id: ItemId, element: HTMLElement) => void;

  /** Item height (default: `offsetHeight`) */
  measure?: MeasureFn<HTMLElement>;

  /** Viewport dimensions (default: the viewport's client size) */
  viewportSize?: (viewport: HTMLElement) => ViewportSize;

  /** CSS class prefix (default: "anchor-scroll") */
  classPrefix?: string;

  ariaLabel?: string;

  /** Layout passes allowed per frame before deferring to the next (default: 16) */
  maxLayoutPasses?: number;
}

export interface MountedVirtualScroll {
  readonly scroll: VirtualScroll<HTMLElement>;
  /** Root element */
  readonly element: HTMLElement;
  /** Run a frame synchronously */
  refresh: () => void;
  /** Run a frame on the next animation frame */
  scheduleRefresh: () => void;
  scrollToId: (id: ItemId) => void;
  setValidRange: (range: IdRange) => void;
  destroy: () => void;
}

const DEFAULT_MAX_LAYOUT_PASSES = 16;

const toDeltaMode = (mode: number): WheelDeltaMode =>
  mode === 1 ? 1 : mode === 2 ? 2 : 0;

const defaultMeasure: MeasureFn<HTMLElement> = (element) => element.offsetHeight;

const defaultViewportSize = (viewport: HTMLElement): ViewportSize => ({
  width: viewport.clientWidth,
  height: viewport.clientHeight,
});

// =============================================================================
// Mount
// =============================================================================

export const mountVirtualScroll = (config: MountConfig): MountedVirtualScroll => {
  const {
    initialAnchor = 0n,
    render,
    update,
    release,
    measure = defaultMeasure,
    viewportSize = defaultViewportSize,
    classPrefix = DEFAULT_CLASS_PREFIX,
    ariaLabel,
    maxLayoutPasses = DEFAULT_MAX_LAYOUT_PASSES,
  } = config;

  const container = resolveContainer(config.container);
  const dom = createDOMStructure(container, classPrefix, ariaLabel);
  const scroll = createVirtualScroll<HTMLElement>(initialAnchor, config);

  const mounted = new Map<ItemId, HTMLElement>();
  let lastSize: ViewportSize | null = null;
  let isDestroyed = false;

  const detach = (id: ItemId, element: HTMLElement): void => {
    mounted.delete(id);
    element.remove();
    release?.(id, element);
  };

  const driver: ItemDriver<HTMLElement> = {
    create: (id) => {
      const element = render(id);
      if (!element) return undefined;
      element.classList.add(`${classPrefix}-item`);
      element.setAttribute("role", "listitem");
      element.dataset.id = String(id);
      element.style.position = "absolute";
      element.style.top = "0";
      element.style.left = "0";
      element.style.right = "0";
      // Attached before the next layout so it can be measured
      dom.items.appendChild(element);
      mounted.set(id, element);
      return element;
    },
    update,
    destroy: detach,
  };

  // ===========================================================================
  // Frame
  // ===========================================================================

  const place = (): void => {
    for (const { child, y } of scroll.getPlacements()) {
      child.style.transform = `translateY(${y}px)`;
    }
  };

  const runFrame = (): void => {
    if (isDestroyed) return;

    const size = viewportSize(dom.viewport);
    let resized =
      lastSize === null || lastSize.width !== size.width || lastSize.height !== size.height;
    lastSize = size;

    let passes = 0;
    while ((resized || scroll.needsLayout()) && passes < maxLayoutPasses) {
      resized = false;
      passes++;
      const { action } = scroll.layout(size, measure);
      if (action) applyAction(scroll, action, driver);
    }

    place();
    scroll.endFrame();

    // Not converged yet; continue next frame
    if (scroll.needsLayout()) frame.schedule();
  };

  const frame = createFrameScheduler(runFrame);

  const refresh = (): void => {
    frame.cancel();
    runFrame();
  };

  // ===========================================================================
  // Input
  // ===========================================================================

  const handleWheel = (event: WheelEvent): void => {
    event.preventDefault();
    scroll.handleWheel(event.deltaY, toDeltaMode(event.deltaMode));
    frame.schedule();
  };

  const handleKeydown = (event: KeyboardEvent): void => {
    if (!scroll.handleKey(event.key)) return;
    event.preventDefault();
    frame.schedule();
  };

  dom.viewport.addEventListener("wheel", handleWheel, { passive: false });
  dom.root.addEventListener("keydown", handleKeydown);

  const resizeObserver =
    typeof ResizeObserver === "undefined"
      ? null
      : new ResizeObserver(() => frame.schedule());
  resizeObserver?.observe(dom.viewport);

  // ===========================================================================
  // Public API
  // ===========================================================================

  const destroy = (): void => {
    if (isDestroyed) return;
    isDestroyed = true;
    frame.cancel();
    resizeObserver?.disconnect();
    dom.viewport.removeEventListener("wheel", handleWheel);
    dom.root.removeEventListener("keydown", handleKeydown);
    for (const [id, element] of [...mounted]) {
      detach(id, element);
    }
    dom.root.remove();
  };

  frame.schedule();

  return {
    scroll,
    element: dom.root,
    refresh,
    scheduleRefresh: frame.schedule,
    scrollToId: (id) => {
      scroll.scrollIntoView(id);
      frame.schedule();
    },
    setValidRange: (range) => {
      scroll.setValidRange(range);
      frame.schedule();
    },
    destroy,
  };
};
