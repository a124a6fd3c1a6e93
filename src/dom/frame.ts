/**
 * anchor-scroll/dom - Frame Scheduling
 */

// =============================================================================
// RAF Throttle
// =============================================================================

export interface FrameScheduler {
  /** Run the callback on the next animation frame, at most once per frame */
  schedule: () => void;
  /** Drop a pending frame */
  cancel: () => void;
}

/**
 * Create a RAF-throttled callback
 * However often `schedule` is called, `fn` runs once per animation frame
 */
export const createFrameScheduler = (fn: () => void): FrameScheduler => {
  let rafId: number | null = null;

  const schedule = (): void => {
    if (rafId !== null) return;
    rafId = requestAnimationFrame(() => {
      rafId = null;
      fn();
    });
  };

  const cancel = (): void => {
    if (rafId !== null) {
      cancelAnimationFrame(rafId);
      rafId = null;
    }
  };

  return { schedule, cancel };
};
