export {
  mountVirtualScroll,
  type MountConfig,
  type MountedVirtualScroll,
} from "./host";
export { createDOMStructure, resolveContainer, type DOMStructure } from "./structure";
export { createFrameScheduler, type FrameScheduler } from "./frame";
