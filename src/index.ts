/**
 * rowscroll - Row-Scrolling Grid Layout
 * Item and scroll-region placement for grids whose rows scroll horizontally
 * on their own, kept consistent across inserts, deletes and resizes
 *
 * @packageDocumentation
 */

// Layout provider
export {
  createRowScrollLayout,
  type RowScrollLayout,
  type RowScrollLayoutConfig,
  type RowScrollEvents,
  type InvalidationReason,
  type InvalidateOptions,
  type SetOffsetOptions,
} from "./rowscroll";

// Layout domain
export {
  createLayoutEngine,
  createLayoutCache,
  createUpdateTracker,
  type LayoutEngine,
  type LayoutCache,
  type UpdateTracker,
  type UpdateTrackerDeps,
  type TrackerState,
} from "./layout";

// Configuration
export { resolveLayoutConfig } from "./config";
export {
  DEFAULT_ITEM_WIDTH,
  DEFAULT_ITEM_HEIGHT,
  DEFAULT_COLUMN_SPACING,
  DEFAULT_ROW_SPACING,
  DEFAULT_EDGE_INSET,
  SCROLL_REGION_KIND,
  Z_INDEX_ITEM,
  Z_INDEX_SCROLL_REGION,
} from "./constants";

// Errors & logging
export {
  PreconditionError,
  isPreconditionError,
  type PreconditionCode,
} from "./errors";
export { createLogger, type Logger, type LoggerOptions } from "./logger";

// Events
export { createEmitter, type Emitter } from "./events";

// Core Types
export type {
  Size,
  Rect,
  EdgeInsets,
  LayoutConfig,
  LayoutOptions,
  ScrollRegionKind,
  ItemFrame,
  ScrollRegion,
  LayoutSnapshot,
  RowCountProvider,
  LayoutHost,
  UpdateAction,
  UpdateItem,
  ItemPath,
  PendingUpdates,
  EventMap,
  EventHandler,
  Unsubscribe,
} from "./types";
