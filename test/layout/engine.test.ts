/**
 * rowscroll - Layout Engine Tests
 * Tests for item frames, scroll regions and closed-form placement
 */

import { describe, it, expect } from "vitest";
import { createLayoutEngine } from "../../src/layout/engine";
import { resolveLayoutConfig } from "../../src/config";
import { PreconditionError, isPreconditionError } from "../../src/errors";
import { SCROLL_REGION_KIND } from "../../src/constants";

// =============================================================================
// Helpers
// =============================================================================

// Defaults: item 200x120, column spacing 7, row spacing 15, insets 15
// Row stride = 135, column stride = 207
const makeEngine = (width = 800) => {
  let containerWidth = width;
  const engine = createLayoutEngine(
    resolveLayoutConfig(),
    () => containerWidth,
  );
  return {
    engine,
    setWidth: (next: number) => {
      containerWidth = next;
    },
  };
};

const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

// =============================================================================
// Row geometry
// =============================================================================

describe("getRowTop", () => {
  it("should start the first band at the top inset", () => {
    const { engine } = makeEngine();
    expect(engine.getRowTop(0)).toBe(15);
  });

  it("should advance by item height plus row spacing", () => {
    const { engine } = makeEngine();
    expect(engine.getRowTop(1)).toBe(150);
    expect(engine.getRowTop(4)).toBe(555);
  });

  it("should never overlap adjacent bands", () => {
    const { engine } = makeEngine();
    for (let row = 0; row < 10; row++) {
      expect(engine.getRowTop(row) + 120).toBeLessThanOrEqual(
        engine.getRowTop(row + 1),
      );
    }
  });
});

describe("getRowContentWidth", () => {
  it("should include both insets and the spacing between items", () => {
    const { engine } = makeEngine();
    // 15 + 15 + 4 * 200 + 3 * 7
    expect(engine.getRowContentWidth(4)).toBe(851);
  });

  it("should have no spacing for a single item", () => {
    const { engine } = makeEngine();
    expect(engine.getRowContentWidth(1)).toBe(230);
  });
});

// =============================================================================
// computeRowItemFrames
// =============================================================================

describe("computeRowItemFrames", () => {
  it("should lay out items left to right in the row band", () => {
    const { engine } = makeEngine();
    const frames = engine.computeRowItemFrames(1, 3);

    expect(frames.map((f) => f.frame)).toEqual([
      { x: 15, y: 150, width: 200, height: 120 },
      { x: 222, y: 150, width: 200, height: 120 },
      { x: 429, y: 150, width: 200, height: 120 },
    ]);
  });

  it("should tag frames with their row and column", () => {
    const { engine } = makeEngine();
    const frames = engine.computeRowItemFrames(2, 3);

    expect(frames.map((f) => [f.row, f.column])).toEqual([
      [2, 0],
      [2, 1],
      [2, 2],
    ]);
  });

  it("should separate neighbours by exactly the column spacing", () => {
    const { engine } = makeEngine();
    const frames = engine.computeRowItemFrames(0, 6);

    for (let i = 0; i < frames.length - 1; i++) {
      const current = frames[i]!.frame;
      const next = frames[i + 1]!.frame;
      expect(next.x - (current.x + current.width)).toBe(7);
    }
  });

  it("should translate every frame by the negated offset", () => {
    const { engine } = makeEngine();
    const frames = engine.computeRowItemFrames(0, 3, 37);
    expect(frames.map((f) => f.translateX)).toEqual([-37, -37, -37]);
  });

  it("should use a positive zero translation without offset", () => {
    const { engine } = makeEngine();
    const [first] = engine.computeRowItemFrames(0, 1);
    expect(first?.translateX).toBe(0);
  });

  it("should place items below the scroll region and fully opaque", () => {
    const { engine } = makeEngine();
    const [first] = engine.computeRowItemFrames(0, 1);
    expect(first?.zIndex).toBe(0);
    expect(first?.alpha).toBe(1);
    expect(first?.kind).toBe("item");
  });

  it("should return no frames for an empty row", () => {
    const { engine } = makeEngine();
    expect(engine.computeRowItemFrames(0, 0)).toEqual([]);
  });

  it("should reject a negative item count", () => {
    const { engine } = makeEngine();
    const error = catchError(() => engine.computeRowItemFrames(0, -1));

    expect(error).toBeInstanceOf(PreconditionError);
    expect(isPreconditionError(error, "INVALID_ITEM_COUNT")).toBe(true);
  });

  it("should reject a fractional item count", () => {
    const { engine } = makeEngine();

    expect(() => engine.computeRowItemFrames(2, 1.5)).toThrow(
      "[rowscroll] row 2 reported an invalid item count (1.5)",
    );
    const error = catchError(() => engine.computeRowItemFrames(2, 1.5));
    expect(isPreconditionError(error, "INVALID_ITEM_COUNT")).toBe(true);
  });
});

// =============================================================================
// computeRowScrollRegion
// =============================================================================

describe("computeRowScrollRegion", () => {
  it("should span the container width over the row band", () => {
    const { engine } = makeEngine();
    const region = engine.computeRowScrollRegion(2, 4);

    expect(region.frame).toEqual({ x: 0, y: 285, width: 800, height: 120 });
    expect(region.contentSize).toEqual({ width: 851, height: 120 });
  });

  it("should start unscrolled above the items", () => {
    const { engine } = makeEngine();
    const region = engine.computeRowScrollRegion(0, 1);

    expect(region.kind).toBe(SCROLL_REGION_KIND);
    expect(region.row).toBe(0);
    expect(region.contentOffset).toBe(0);
    expect(region.zIndex).toBe(1);
  });

  it("should follow the current container width", () => {
    const { engine, setWidth } = makeEngine(800);
    setWidth(1024);
    expect(engine.computeRowScrollRegion(0, 2).frame.width).toBe(1024);
  });

  it("should refuse a row without items", () => {
    const { engine } = makeEngine();
    const error = catchError(() => engine.computeRowScrollRegion(3, 0));

    expect(error).toBeInstanceOf(PreconditionError);
    expect(isPreconditionError(error, "EMPTY_ROW_SCROLL_REGION")).toBe(true);
    expect(() => engine.computeRowScrollRegion(3, 0)).toThrow(
      "[rowscroll] row 3 has no items; an empty row has no scroll region",
    );
  });
});

// =============================================================================
// computeSingleItemFrame
// =============================================================================

describe("computeSingleItemFrame", () => {
  it("should place an item without sibling counts", () => {
    const { engine } = makeEngine();
    const frame = engine.computeSingleItemFrame(3, 5, 10);

    expect(frame.frame).toEqual({ x: 1050, y: 420, width: 200, height: 120 });
    expect(frame.translateX).toBe(-10);
  });

  it("should agree with the full row computation", () => {
    const { engine } = makeEngine();
    const row = engine.computeRowItemFrames(3, 6, 10);
    expect(engine.computeSingleItemFrame(3, 5, 10)).toEqual(row[5]);
  });
});

// =============================================================================
// Custom configuration
// =============================================================================

describe("custom configuration", () => {
  it("should use the configured size, spacing and insets", () => {
    const engine = createLayoutEngine(
      resolveLayoutConfig({
        itemSize: { width: 50, height: 20 },
        columnSpacing: 0,
        rowSpacing: 0,
        insets: { top: 0, left: 0, bottom: 0, right: 0 },
      }),
      () => 320,
    );

    expect(engine.getRowTop(3)).toBe(60);
    expect(engine.computeSingleItemFrame(3, 2).frame).toEqual({
      x: 100,
      y: 60,
      width: 50,
      height: 20,
    });
    expect(engine.getRowContentWidth(4)).toBe(200);
  });
});
