/**
 * rowscroll - Layout Cache
 * Row index → item frames and scroll region, owned by one layout instance.
 *
 * Entries are created by a full recompute or by a row insert, replaced by
 * item inserts and offset updates, and dropped when a full recompute no
 * longer covers their row. Rows with zero items never get an entry.
 *
 * Stored attributes are frozen and handed out as-is: a host can read them
 * but cannot move a row without going through setRowOffset.
 */

import { PreconditionError } from "../errors";
import type {
  ItemFrame,
  LayoutSnapshot,
  Rect,
  ScrollRegion,
  Size,
} from "../types";
import type { LayoutEngine } from "./engine";

// =============================================================================
// Types
// =============================================================================

export interface LayoutCache {
  /** Number of rows holding an entry */
  readonly size: number;

  /**
   * Rebuild every row from its item count.
   * `null` means no data source is attached: the cache is emptied.
   */
  recomputeAll(
    rowCounts: readonly number[] | null,
    preserveOffsets: boolean,
  ): void;

  /** Create a row's entry from scratch, offset 0 */
  materializeRow(row: number, itemCount: number): void;

  /** Rebuild a row's frames and content size, keeping its offset */
  refreshRow(row: number, itemCount: number): void;

  /** Move a row's items and scroll region to a new horizontal offset */
  setRowOffset(row: number, offset: number): void;

  getRowOffset(row: number): number | undefined;

  queryItem(row: number, column: number): ItemFrame | undefined;

  /** Every cached frame and scroll region; no spatial culling */
  queryRegion(bounds: Rect): LayoutSnapshot;

  queryScrollRegion(row: number): ScrollRegion | undefined;

  /** Set every scroll region's band width */
  resizeBands(width: number): void;

  /** Extent of the vertical scroll content, zero when empty */
  getContentExtent(containerWidth: number): Size;

  /** Cached row indices, ascending */
  rowIndices(): number[];

  clear(): void;
}

// =============================================================================
// Factory
// =============================================================================

const ascending = (a: number, b: number): number => a - b;

const freezeItem = (item: ItemFrame): ItemFrame =>
  Object.freeze({ ...item, frame: Object.freeze({ ...item.frame }) });

const freezeRegion = (region: ScrollRegion): ScrollRegion =>
  Object.freeze({
    ...region,
    frame: Object.freeze({ ...region.frame }),
    contentSize: Object.freeze({ ...region.contentSize }),
  });

/**
 * Create a LayoutCache backed by the given engine.
 */
export const createLayoutCache = (engine: LayoutEngine): LayoutCache => {
  let itemFrames = new Map<number, ItemFrame[]>();
  let scrollRegions = new Map<number, ScrollRegion>();

  const removeRow = (row: number): void => {
    itemFrames.delete(row);
    scrollRegions.delete(row);
  };

  const buildRow = (
    row: number,
    itemCount: number,
    offset: number,
    frames: Map<number, ItemFrame[]>,
    regions: Map<number, ScrollRegion>,
  ): void => {
    const region = engine.computeRowScrollRegion(row, itemCount);
    regions.set(row, freezeRegion({ ...region, contentOffset: offset }));
    frames.set(
      row,
      engine.computeRowItemFrames(row, itemCount, offset).map(freezeItem),
    );
  };

  const recomputeAll = (
    rowCounts: readonly number[] | null,
    preserveOffsets: boolean,
  ): void => {
    if (rowCounts === null) {
      clear();
      return;
    }

    const nextFrames = new Map<number, ItemFrame[]>();
    const nextRegions = new Map<number, ScrollRegion>();

    rowCounts.forEach((itemCount, row) => {
      if (itemCount === 0) return;

      const offset = preserveOffsets
        ? (scrollRegions.get(row)?.contentOffset ?? 0)
        : 0;
      buildRow(row, itemCount, offset, nextFrames, nextRegions);
    });

    // Rows >= rowCounts.length are pruned by not carrying them over
    itemFrames = nextFrames;
    scrollRegions = nextRegions;
  };

  const materializeRow = (row: number, itemCount: number): void => {
    if (itemCount === 0) {
      removeRow(row);
      return;
    }
    buildRow(row, itemCount, 0, itemFrames, scrollRegions);
  };

  const refreshRow = (row: number, itemCount: number): void => {
    if (itemCount === 0) {
      removeRow(row);
      return;
    }
    const offset = scrollRegions.get(row)?.contentOffset ?? 0;
    buildRow(row, itemCount, offset, itemFrames, scrollRegions);
  };

  const setRowOffset = (row: number, offset: number): void => {
    const region = scrollRegions.get(row);
    const frames = itemFrames.get(row);
    if (!region || !frames) {
      throw new PreconditionError(
        "UNKNOWN_ROW",
        `cannot set the offset of row ${row}: it has no layout entry`,
      );
    }

    const translateX = engine.translationFor(offset);
    itemFrames.set(
      row,
      frames.map((frame) => freezeItem({ ...frame, translateX })),
    );
    scrollRegions.set(row, freezeRegion({ ...region, contentOffset: offset }));
  };

  const getRowOffset = (row: number): number | undefined =>
    scrollRegions.get(row)?.contentOffset;

  const queryItem = (row: number, column: number): ItemFrame | undefined =>
    itemFrames.get(row)?.[column];

  const rowIndices = (): number[] => [...scrollRegions.keys()].sort(ascending);

  // Bulk return: hosts get the whole cached set whatever the bounds
  const queryRegion = (_bounds: Rect): LayoutSnapshot => {
    const items: ItemFrame[] = [];
    const regions: ScrollRegion[] = [];

    for (const row of [...itemFrames.keys()].sort(ascending)) {
      items.push(...(itemFrames.get(row) ?? []));
    }
    for (const row of rowIndices()) {
      const region = scrollRegions.get(row);
      if (region) regions.push(region);
    }

    return { items, scrollRegions: regions };
  };

  const queryScrollRegion = (row: number): ScrollRegion | undefined =>
    scrollRegions.get(row);

  const resizeBands = (width: number): void => {
    for (const [row, region] of scrollRegions) {
      scrollRegions.set(
        row,
        freezeRegion({ ...region, frame: { ...region.frame, width } }),
      );
    }
  };

  const getContentExtent = (containerWidth: number): Size => {
    if (scrollRegions.size === 0) return { width: 0, height: 0 };

    let maxY = 0;
    for (const { frame } of scrollRegions.values()) {
      maxY = Math.max(maxY, frame.y + frame.height);
    }

    return {
      width: containerWidth,
      height: maxY + engine.config.insets.bottom,
    };
  };

  const clear = (): void => {
    itemFrames = new Map();
    scrollRegions = new Map();
  };

  return {
    get size() {
      return scrollRegions.size;
    },

    recomputeAll,
    materializeRow,
    refreshRow,
    setRowOffset,
    getRowOffset,
    queryItem,
    queryRegion,
    queryScrollRegion,
    resizeBands,
    getContentExtent,
    rowIndices,
    clear,
  };
};
