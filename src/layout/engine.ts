/**
 * rowscroll - Layout Engine
 * Pure geometry for rows of fixed-size items.
 *
 * Every row occupies a horizontal band; items run left to right inside it:
 *
 *   top inset
 *   ┌──────────────────────────────────────────────┐
 *   │ [0] [1] [2] [3] [4] ...   row 0 band         │ ← itemHeight
 *   │                           rowSpacing         │
 *   │ [0] [1] ...               row 1 band         │
 *   └──────────────────────────────────────────────┘
 *
 *   bandTop(row)   = insets.top + row * (itemHeight + rowSpacing)
 *   itemX(column)  = insets.left + column * (itemWidth + columnSpacing)
 *
 * The only state is the resolved config and a getter for the container
 * width, which the scroll region band follows.
 */

import { PreconditionError } from "../errors";
import {
  SCROLL_REGION_KIND,
  Z_INDEX_ITEM,
  Z_INDEX_SCROLL_REGION,
} from "../constants";
import type { ItemFrame, LayoutConfig, ScrollRegion } from "../types";

// =============================================================================
// Types
// =============================================================================

export interface LayoutEngine {
  readonly config: LayoutConfig;

  /** Item translation for a row offset */
  translationFor(offset: number): number;

  /** Y of a row's band — O(1) */
  getRowTop(row: number): number;

  /** Scrollable width of a row holding `itemCount` items (itemCount > 0) */
  getRowContentWidth(itemCount: number): number;

  /** Frames of every item in a row, left to right, translated by -offset */
  computeRowItemFrames(
    row: number,
    itemCount: number,
    offset?: number,
  ): ItemFrame[];

  /** Scroll region of a row; the row must hold at least one item */
  computeRowScrollRegion(row: number, itemCount: number): ScrollRegion;

  /** Closed-form frame of one item, no sibling count needed */
  computeSingleItemFrame(
    row: number,
    column: number,
    offset?: number,
  ): ItemFrame;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a LayoutEngine.
 *
 * @param config - Resolved layout config
 * @param getContainerWidth - Current width of the hosting container
 */
export const createLayoutEngine = (
  config: LayoutConfig,
  getContainerWidth: () => number,
): LayoutEngine => {
  const { itemSize, columnSpacing, rowSpacing, insets } = config;
  const rowStride = itemSize.height + rowSpacing;
  const columnStride = itemSize.width + columnSpacing;

  // Normalized so an unscrolled row carries +0, not -0
  const translationFor = (offset: number): number =>
    offset === 0 ? 0 : -offset;

  const assertItemCount = (row: number, itemCount: number): void => {
    if (!Number.isInteger(itemCount) || itemCount < 0) {
      throw new PreconditionError(
        "INVALID_ITEM_COUNT",
        `row ${row} reported an invalid item count (${itemCount})`,
      );
    }
  };

  const getRowTop = (row: number): number => insets.top + row * rowStride;

  const getColumnLeft = (column: number): number =>
    insets.left + column * columnStride;

  const getRowContentWidth = (itemCount: number): number =>
    insets.left +
    insets.right +
    itemCount * itemSize.width +
    (itemCount - 1) * columnSpacing;

  const makeItemFrame = (
    row: number,
    column: number,
    x: number,
    y: number,
    offset: number,
  ): ItemFrame => ({
    kind: "item",
    row,
    column,
    frame: { x, y, width: itemSize.width, height: itemSize.height },
    translateX: translationFor(offset),
    zIndex: Z_INDEX_ITEM,
    alpha: 1,
  });

  const computeRowItemFrames = (
    row: number,
    itemCount: number,
    offset = 0,
  ): ItemFrame[] => {
    assertItemCount(row, itemCount);

    const y = getRowTop(row);
    const frames: ItemFrame[] = [];

    for (let column = 0; column < itemCount; column++) {
      frames.push(
        makeItemFrame(row, column, getColumnLeft(column), y, offset),
      );
    }

    return frames;
  };

  const computeRowScrollRegion = (
    row: number,
    itemCount: number,
  ): ScrollRegion => {
    assertItemCount(row, itemCount);
    if (itemCount === 0) {
      throw new PreconditionError(
        "EMPTY_ROW_SCROLL_REGION",
        `row ${row} has no items; an empty row has no scroll region`,
      );
    }

    return {
      kind: SCROLL_REGION_KIND,
      row,
      frame: {
        x: 0,
        y: getRowTop(row),
        width: getContainerWidth(),
        height: itemSize.height,
      },
      contentSize: {
        width: getRowContentWidth(itemCount),
        height: itemSize.height,
      },
      contentOffset: 0,
      zIndex: Z_INDEX_SCROLL_REGION,
    };
  };

  const computeSingleItemFrame = (
    row: number,
    column: number,
    offset = 0,
  ): ItemFrame =>
    makeItemFrame(row, column, getColumnLeft(column), getRowTop(row), offset);

  return {
    config,
    translationFor,
    getRowTop,
    getRowContentWidth,
    computeRowItemFrames,
    computeRowScrollRegion,
    computeSingleItemFrame,
  };
};
