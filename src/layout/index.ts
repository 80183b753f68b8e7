/**
 * rowscroll - Layout Domain
 * Geometry, cache and update tracking for row-scrolling grids
 */

export { createLayoutEngine, type LayoutEngine } from "./engine";
export { createLayoutCache, type LayoutCache } from "./cache";
export {
  createUpdateTracker,
  type UpdateTracker,
  type UpdateTrackerDeps,
  type TrackerState,
} from "./tracker";
