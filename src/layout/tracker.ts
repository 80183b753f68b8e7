/**
 * rowscroll - Update Tracker
 * Collects one batch of insert/delete notifications and applies inserts
 * to the layout cache as they arrive.
 *
 *   idle ──begin(updates)──▶ collecting ──end()──▶ idle
 *
 * Row inserts and item inserts rebuild the affected row immediately, since
 * the data source already reports the new counts when the batch opens.
 * Deletes are only recorded: the cache drops deleted rows on the next full
 * recompute, when the host invalidates its data source counts.
 */

import type { Logger } from "../logger";
import type {
  ItemPath,
  PendingUpdates,
  RowCountProvider,
  UpdateItem,
} from "../types";
import type { LayoutCache } from "./cache";

// =============================================================================
// Types
// =============================================================================

export type TrackerState = "idle" | "collecting";

export interface UpdateTrackerDeps {
  cache: LayoutCache;

  /** Current data source; null when none is attached */
  getRowCounts: () => RowCountProvider | null;

  logger: Logger;
}

export interface UpdateTracker {
  readonly state: TrackerState;

  /** Open (or extend) a batch and apply its updates */
  begin(updates: readonly UpdateItem[]): void;

  /** Close the batch and forget everything it collected */
  end(): void;

  /** Copy of the collected mutations */
  pending(): PendingUpdates;

  isInsertedRow(row: number): boolean;
  isRemovedRow(row: number): boolean;
  isInsertedItem(row: number, column: number): boolean;
  isRemovedItem(row: number, column: number): boolean;
}

// =============================================================================
// Factory
// =============================================================================

const hasPath = (paths: readonly ItemPath[], row: number, column: number) =>
  paths.some((path) => path.row === row && path.column === column);

/**
 * Create an UpdateTracker writing into the given cache.
 */
export const createUpdateTracker = (deps: UpdateTrackerDeps): UpdateTracker => {
  const { cache, getRowCounts, logger } = deps;

  let state: TrackerState = "idle";
  let insertedItems: ItemPath[] = [];
  let removedItems: ItemPath[] = [];
  let insertedRows: number[] = [];
  let removedRows: number[] = [];

  const itemCountOf = (row: number): number =>
    getRowCounts()?.getItemCount(row) ?? 0;

  const apply = (update: UpdateItem): void => {
    const { action, row, column } = update;

    if (row === undefined) {
      // A column alone cannot be placed either
      logger.warn(`Skipping unresolvable ${action} update`, update);
      return;
    }

    if (action === "insert") {
      if (column === undefined) {
        insertedRows.push(row);
        cache.materializeRow(row, itemCountOf(row));
      } else {
        insertedItems.push({ row, column });
        cache.refreshRow(row, itemCountOf(row));
      }
      return;
    }

    if (column === undefined) {
      removedRows.push(row);
    } else {
      removedItems.push({ row, column });
    }
  };

  const begin = (updates: readonly UpdateItem[]): void => {
    state = "collecting";
    for (const update of updates) {
      apply(update);
    }
    logger.debug(`Collected ${updates.length} update(s)`, pending());
  };

  const end = (): void => {
    insertedItems = [];
    removedItems = [];
    insertedRows = [];
    removedRows = [];
    state = "idle";
  };

  const pending = (): PendingUpdates => ({
    insertedItems: insertedItems.map((path) => ({ ...path })),
    removedItems: removedItems.map((path) => ({ ...path })),
    insertedRows: [...insertedRows],
    removedRows: [...removedRows],
  });

  return {
    get state() {
      return state;
    },

    begin,
    end,
    pending,
    isInsertedRow: (row) => insertedRows.includes(row),
    isRemovedRow: (row) => removedRows.includes(row),
    isInsertedItem: (row, column) => hasPath(insertedItems, row, column),
    isRemovedItem: (row, column) => hasPath(removedItems, row, column),
  };
};
