/**
 * rowscroll - Core Types
 * Geometry primitives, layout attributes and the host contract
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler type */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Geometry
// =============================================================================

export interface Size {
  width: number;
  height: number;
}

/** Axis-aligned rectangle in points, origin at the top-left corner */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Padding applied on the outer edges of the grid */
export interface EdgeInsets {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Resolved layout configuration.
 * Frozen once resolved — every computation reads it, nothing writes it.
 */
export interface LayoutConfig {
  /** Size of every item */
  readonly itemSize: Readonly<Size>;

  /** Horizontal gap between two items of the same row */
  readonly columnSpacing: number;

  /** Vertical gap between two rows */
  readonly rowSpacing: number;

  /** Padding on the edges of the container */
  readonly insets: Readonly<EdgeInsets>;
}

/** User-facing layout options — every field falls back to a default */
export interface LayoutOptions {
  itemSize?: Partial<Size>;
  columnSpacing?: number;
  rowSpacing?: number;
  insets?: Partial<EdgeInsets>;
}

// =============================================================================
// Layout Attributes
// =============================================================================

/** Element kind tag used to look up the per-row scroll region */
export type ScrollRegionKind = "rowscroll:scroll-region";

/** Placement of a single item */
export interface ItemFrame {
  readonly kind: "item";

  /** Row (section) index */
  readonly row: number;

  /** Column (item) index within the row */
  readonly column: number;

  /** Untranslated rectangle */
  readonly frame: Readonly<Rect>;

  /** Horizontal translation, always the negated offset of the owning row */
  readonly translateX: number;

  /** Stacking order, below the row's scroll region */
  readonly zIndex: number;

  /** 1 for settled frames, 0 for the start/end of an insert/delete animation */
  readonly alpha: number;
}

/** Per-row supplementary element describing the virtual horizontal scroll */
export interface ScrollRegion {
  readonly kind: ScrollRegionKind;

  /** Row (section) index */
  readonly row: number;

  /** On-screen band of the row; width follows the container */
  readonly frame: Readonly<Rect>;

  /** Scrollable extent of the band */
  readonly contentSize: Readonly<Size>;

  /** Current horizontal scroll offset */
  readonly contentOffset: number;

  /** Stacking order, above the row's items */
  readonly zIndex: number;
}

/** Result of a bulk region query */
export interface LayoutSnapshot {
  readonly items: readonly ItemFrame[];
  readonly scrollRegions: readonly ScrollRegion[];
}

// =============================================================================
// Host Contract
// =============================================================================

/** Item counts supplied by the host's data source */
export interface RowCountProvider {
  /** Number of rows (sections) */
  getRowCount(): number;

  /** Number of items in a row */
  getItemCount(row: number): number;
}

/** What the layout needs from the container hosting it */
export interface LayoutHost {
  /** Current data source, or null when none is attached */
  getRowCounts(): RowCountProvider | null;

  /** Current container size */
  getContainerSize(): Size;
}

// =============================================================================
// Updates
// =============================================================================

export type UpdateAction = "insert" | "delete";

/**
 * A single mutation reported by the host.
 *
 * - `row` only — the whole row was inserted/deleted
 * - `row` and `column` — a single item was inserted/deleted
 * - neither — unresolvable, skipped
 */
export interface UpdateItem {
  action: UpdateAction;
  row?: number;
  column?: number;
}

/** Row/column address of an item */
export interface ItemPath {
  row: number;
  column: number;
}

/** Mutations collected during the open update batch */
export interface PendingUpdates {
  insertedItems: ItemPath[];
  removedItems: ItemPath[];
  insertedRows: number[];
  removedRows: number[];
}
