/**
 * rowscroll - Constants
 * All default values and magic numbers in one place
 */

import type { ScrollRegionKind } from "./types";

// =============================================================================
// Layout Defaults
// =============================================================================

/** Default item width in points */
export const DEFAULT_ITEM_WIDTH = 200;

/** Default item height in points */
export const DEFAULT_ITEM_HEIGHT = 120;

/** Default gap between two items of a row */
export const DEFAULT_COLUMN_SPACING = 7;

/** Default gap between two rows */
export const DEFAULT_ROW_SPACING = 15;

/** Default padding on every edge of the container */
export const DEFAULT_EDGE_INSET = 15;

// =============================================================================
// Stacking
// =============================================================================

/** Items sit below their row's scroll region */
export const Z_INDEX_ITEM = 0;

/** The scroll region sits above the items so it receives the pan */
export const Z_INDEX_SCROLL_REGION = 1;

// =============================================================================
// Element Kinds
// =============================================================================

/** Supplementary element kind of the per-row scroll region */
export const SCROLL_REGION_KIND: ScrollRegionKind = "rowscroll:scroll-region";

// =============================================================================
// Logging
// =============================================================================

/** Prefix for every log line and error message */
export const LOG_PREFIX = "[rowscroll]";
