/**
 * rowscroll - Row Scroll Layout
 * Layout provider for a vertically scrolling grid whose rows scroll
 * horizontally on their own.
 *
 * Wires the pure engine, the row cache and the update tracker to a host
 * container. The host owns rendering and gestures; it asks this object
 * where things go and tells it when data, size or a row offset changes.
 *
 * ```ts
 * const layout = createRowScrollLayout({
 *   host: {
 *     getRowCounts: () => ({
 *       getRowCount: () => shelves.length,
 *       getItemCount: (row) => shelves[row].books.length,
 *     }),
 *     getContainerSize: () => ({ width: view.width, height: view.height }),
 *   },
 *   layout: { itemSize: { width: 160, height: 96 } },
 * })
 *
 * layout.prepare()
 * layout.on('invalidate', () => view.requestRedraw())
 * layout.setRowScrollOffset(2, 37)
 * ```
 */

import { resolveLayoutConfig } from "./config";
import { SCROLL_REGION_KIND } from "./constants";
import { createEmitter } from "./events";
import { createLogger, type Logger } from "./logger";
import {
  createLayoutCache,
  createLayoutEngine,
  createUpdateTracker,
  type TrackerState,
} from "./layout";
import type {
  EventHandler,
  EventMap,
  ItemFrame,
  LayoutConfig,
  LayoutHost,
  LayoutOptions,
  LayoutSnapshot,
  PendingUpdates,
  Rect,
  ScrollRegion,
  Size,
  Unsubscribe,
  UpdateItem,
} from "./types";

// =============================================================================
// Types
// =============================================================================

export interface RowScrollLayoutConfig {
  /** Container providing item counts and its current size */
  host: LayoutHost;

  /** Item size, spacing and insets; defaults apply per field */
  layout?: LayoutOptions;

  /** Log layout passes at debug level (default: false) */
  debug?: boolean;

  /** Replace the console logger */
  logger?: Logger;
}

/** Why the host should redraw */
export type InvalidationReason = "offset" | "data" | "layout";

export interface RowScrollEvents extends EventMap {
  /** The host should re-query the layout and redraw */
  invalidate: { reason: InvalidationReason };

  /** A row's horizontal offset changed */
  "offset:change": { row: number; offset: number };

  /** Container bounds changed size */
  resize: Size;

  /** An update batch was opened or extended */
  "update:begin": { count: number };

  /** An update batch was closed; carries what it collected */
  "update:end": { pending: PendingUpdates };
}

export interface SetOffsetOptions {
  /** Emit `invalidate` after moving the row (default: true) */
  invalidate?: boolean;
}

export interface InvalidateOptions {
  /** Item counts changed: rebuild every row (default: false) */
  dataSourceCounts?: boolean;
}

export interface RowScrollLayout {
  readonly config: LayoutConfig;

  /** Whether an update batch is open */
  readonly updateState: TrackerState;

  /** Full recompute from the host's counts, keeping row offsets */
  prepare(): void;

  itemFrame(row: number, column: number): ItemFrame | undefined;

  /** Every cached frame and scroll region */
  allVisibleFrames(region: Rect): LayoutSnapshot;

  /** Scroll region of a row; undefined for any other element kind */
  scrollRegionDescriptor(kind: string, row: number): ScrollRegion | undefined;

  beginUpdateBatch(updates: readonly UpdateItem[]): void;
  endUpdateBatch(): void;
  pendingUpdates(): PendingUpdates;

  /** Start frame of an item animating in */
  appearingItemFrame(row: number, column: number): ItemFrame | undefined;

  /** End frame of an item animating out; undefined when it is not leaving */
  disappearingItemFrame(row: number, column: number): ItemFrame | undefined;

  /** True iff the size differs from the last recorded one */
  notifyBoundsChanged(newSize: Size): boolean;

  invalidate(options?: InvalidateOptions): void;

  /** Stretch every row band to a new container width */
  onContainerResize(newWidth: number): void;

  /** Recompute everything, keeping offsets, then stretch bands */
  onFullInvalidation(newSize: Size): void;

  totalContentExtent(): Size;

  /** Move a row after a user pan; the host redraws on `invalidate` */
  setRowScrollOffset(
    row: number,
    offset: number,
    options?: SetOffsetOptions,
  ): void;

  on<K extends keyof RowScrollEvents>(
    event: K,
    handler: EventHandler<RowScrollEvents[K]>,
  ): Unsubscribe;

  off<K extends keyof RowScrollEvents>(
    event: K,
    handler: EventHandler<RowScrollEvents[K]>,
  ): void;

  once<K extends keyof RowScrollEvents>(
    event: K,
    handler: EventHandler<RowScrollEvents[K]>,
  ): Unsubscribe;

  /** Drop listeners, cache and any open batch */
  destroy(): void;
}

// =============================================================================
// Factory
// =============================================================================

export const createRowScrollLayout = (
  options: RowScrollLayoutConfig,
): RowScrollLayout => {
  const { host } = options;
  const config = resolveLayoutConfig(options.layout);
  const logger = options.logger ?? createLogger({ debug: options.debug });
  const emitter = createEmitter<RowScrollEvents>(logger);

  const engine = createLayoutEngine(
    config,
    () => host.getContainerSize().width,
  );
  const cache = createLayoutCache(engine);
  const tracker = createUpdateTracker({
    cache,
    getRowCounts: () => host.getRowCounts(),
    logger,
  });

  let recordedSize: Size = { ...host.getContainerSize() };

  /** Item count of every row, or null without a data source */
  const readRowCounts = (): number[] | null => {
    const counts = host.getRowCounts();
    if (!counts) return null;

    const rows = counts.getRowCount();
    const result: number[] = [];
    for (let row = 0; row < rows; row++) {
      result.push(counts.getItemCount(row));
    }
    return result;
  };

  const recompute = (): void => {
    const counts = readRowCounts();
    cache.recomputeAll(counts, true);
    logger.debug(
      counts === null
        ? "No data source attached, layout cleared"
        : `Laid out ${cache.size} of ${counts.length} row(s)`,
    );
  };

  // ===========================================================================
  // Queries
  // ===========================================================================

  const scrollRegionDescriptor = (
    kind: string,
    row: number,
  ): ScrollRegion | undefined =>
    kind === SCROLL_REGION_KIND ? cache.queryScrollRegion(row) : undefined;

  const transientFrame = (row: number, column: number): ItemFrame => ({
    ...engine.computeSingleItemFrame(row, column, cache.getRowOffset(row) ?? 0),
    alpha: 0,
  });

  const appearingItemFrame = (
    row: number,
    column: number,
  ): ItemFrame | undefined => {
    if (tracker.isInsertedRow(row) || tracker.isInsertedItem(row, column)) {
      return transientFrame(row, column);
    }
    return cache.queryItem(row, column);
  };

  const disappearingItemFrame = (
    row: number,
    column: number,
  ): ItemFrame | undefined => {
    if (tracker.isRemovedRow(row) || tracker.isRemovedItem(row, column)) {
      return transientFrame(row, column);
    }
    return undefined;
  };

  // ===========================================================================
  // Updates
  // ===========================================================================

  const beginUpdateBatch = (updates: readonly UpdateItem[]): void => {
    tracker.begin(updates);
    emitter.emit("update:begin", { count: updates.length });
  };

  const endUpdateBatch = (): void => {
    const pending = tracker.pending();
    tracker.end();
    emitter.emit("update:end", { pending });
  };

  const notifyBoundsChanged = (newSize: Size): boolean => {
    if (
      newSize.width === recordedSize.width &&
      newSize.height === recordedSize.height
    ) {
      return false;
    }
    recordedSize = { width: newSize.width, height: newSize.height };
    emitter.emit("resize", { ...recordedSize });
    return true;
  };

  const invalidate = (invalidateOptions: InvalidateOptions = {}): void => {
    if (invalidateOptions.dataSourceCounts) {
      recompute();
      emitter.emit("invalidate", { reason: "data" });
      return;
    }
    emitter.emit("invalidate", { reason: "layout" });
  };

  const onContainerResize = (newWidth: number): void => {
    cache.resizeBands(newWidth);
  };

  const onFullInvalidation = (newSize: Size): void => {
    recompute();
    onContainerResize(newSize.width);
  };

  const totalContentExtent = (): Size =>
    cache.getContentExtent(host.getContainerSize().width);

  const setRowScrollOffset = (
    row: number,
    offset: number,
    offsetOptions: SetOffsetOptions = {},
  ): void => {
    cache.setRowOffset(row, offset);
    emitter.emit("offset:change", { row, offset });
    if (offsetOptions.invalidate ?? true) {
      emitter.emit("invalidate", { reason: "offset" });
    }
  };

  const destroy = (): void => {
    tracker.end();
    cache.clear();
    emitter.clear();
  };

  return {
    config,

    get updateState() {
      return tracker.state;
    },

    prepare: recompute,
    itemFrame: cache.queryItem,
    allVisibleFrames: cache.queryRegion,
    scrollRegionDescriptor,
    beginUpdateBatch,
    endUpdateBatch,
    pendingUpdates: tracker.pending,
    appearingItemFrame,
    disappearingItemFrame,
    notifyBoundsChanged,
    invalidate,
    onContainerResize,
    onFullInvalidation,
    totalContentExtent,
    setRowScrollOffset,
    on: emitter.on,
    off: emitter.off,
    once: emitter.once,
    destroy,
  };
};
