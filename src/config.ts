/**
 * rowscroll - Configuration
 * Merges layout options with defaults and validates the result
 */

import {
  DEFAULT_ITEM_WIDTH,
  DEFAULT_ITEM_HEIGHT,
  DEFAULT_COLUMN_SPACING,
  DEFAULT_ROW_SPACING,
  DEFAULT_EDGE_INSET,
} from "./constants";
import { PreconditionError } from "./errors";
import type { LayoutConfig, LayoutOptions } from "./types";

const requirePositive = (name: string, value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new PreconditionError(
      "INVALID_CONFIG",
      `${name} must be a positive number (got ${value})`,
    );
  }
  return value;
};

const requireNonNegative = (name: string, value: number): number => {
  if (!Number.isFinite(value) || value < 0) {
    throw new PreconditionError(
      "INVALID_CONFIG",
      `${name} must be a non-negative number (got ${value})`,
    );
  }
  return value;
};

/**
 * Resolve layout options into a frozen LayoutConfig.
 *
 * Item dimensions must be positive; spacings and insets may be zero.
 *
 * ```ts
 * const config = resolveLayoutConfig({ itemSize: { width: 160 }, rowSpacing: 8 })
 * config.itemSize // { width: 160, height: 120 }
 * ```
 */
export const resolveLayoutConfig = (
  options: LayoutOptions = {},
): LayoutConfig => {
  const itemSize = Object.freeze({
    width: requirePositive(
      "itemSize.width",
      options.itemSize?.width ?? DEFAULT_ITEM_WIDTH,
    ),
    height: requirePositive(
      "itemSize.height",
      options.itemSize?.height ?? DEFAULT_ITEM_HEIGHT,
    ),
  });

  const insets = Object.freeze({
    top: requireNonNegative(
      "insets.top",
      options.insets?.top ?? DEFAULT_EDGE_INSET,
    ),
    left: requireNonNegative(
      "insets.left",
      options.insets?.left ?? DEFAULT_EDGE_INSET,
    ),
    bottom: requireNonNegative(
      "insets.bottom",
      options.insets?.bottom ?? DEFAULT_EDGE_INSET,
    ),
    right: requireNonNegative(
      "insets.right",
      options.insets?.right ?? DEFAULT_EDGE_INSET,
    ),
  });

  return Object.freeze({
    itemSize,
    columnSpacing: requireNonNegative(
      "columnSpacing",
      options.columnSpacing ?? DEFAULT_COLUMN_SPACING,
    ),
    rowSpacing: requireNonNegative(
      "rowSpacing",
      options.rowSpacing ?? DEFAULT_ROW_SPACING,
    ),
    insets,
  });
};
