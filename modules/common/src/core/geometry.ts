/**
 * modules/common/src/core/geometry.ts
 *
 * @file Pure rectangle and grid math: grid partitioning of a workarea, cell spans, edge/corner resizing, overlap
 * and the deterministic "most overlapping cell" choice. No I/O, no state.
 */
import type {Rectangle} from './window.js';
import {DegenerateGeometryError, InvalidGridError} from './errors.js';

/**
 * Partition of a workarea into `columns` x `rows` cells. `gaps` pixels are kept free between adjacent cells.
 */
export interface GridSpec {
  columns: number;
  rows: number;
  gaps?: number;
}

/**
 * Zero-based cell coordinate inside a grid.
 */
export interface GridCell {
  col: number;
  row: number;
}

/**
 * Rectangle of adjacent cells, anchored at its top-left cell.
 */
export interface GridSpan extends GridCell {
  colSpan: number;
  rowSpan: number;
}

export type Direction = 'left' | 'right' | 'up' | 'down';

export type ResizeEdge =
  | 'left'
  | 'right'
  | 'top'
  | 'bottom'
  | 'top-left'
  | 'top-right'
  | 'bottom-left'
  | 'bottom-right';

// ---- Rectangle helpers ----

/**
 * Compare two rectangles field by field.
 *
 * @param a - First rectangle.
 * @param b - Second rectangle.
 * @returns True if position and size are identical.
 */
export function rectEquals(a: Rectangle, b: Rectangle): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

/**
 * Shift a rectangle by the given offsets.
 *
 * @param rect - The rectangle to move.
 * @param dx - Horizontal offset in pixels.
 * @param dy - Vertical offset in pixels.
 * @returns A new, translated rectangle.
 */
export function translate(rect: Rectangle, dx: number, dy: number): Rectangle {
  return {x: rect.x + dx, y: rect.y + dy, width: rect.width, height: rect.height};
}

/**
 * Intersection of two rectangles.
 *
 * @param a - First rectangle.
 * @param b - Second rectangle.
 * @returns The shared area, or null if the rectangles do not overlap (touching edges do not count).
 */
export function intersect(a: Rectangle, b: Rectangle): Rectangle | null {
  const x1 = Math.max(a.x, b.x);
  const y1 = Math.max(a.y, b.y);
  const x2 = Math.min(a.x + a.width, b.x + b.width);
  const y2 = Math.min(a.y + a.height, b.y + b.height);
  if (x2 <= x1 || y2 <= y1) {
    return null;
  }
  return {x: x1, y: y1, width: x2 - x1, height: y2 - y1};
}

/**
 * Area shared by two rectangles in square pixels.
 *
 * @param a - First rectangle.
 * @param b - Second rectangle.
 * @returns The overlap area, 0 if the rectangles are disjoint.
 */
export function overlapArea(a: Rectangle, b: Rectangle): number {
  const shared = intersect(a, b);
  return shared ? shared.width * shared.height : 0;
}

/**
 * Point-in-rectangle test with inclusive top/left and exclusive bottom/right edges, so adjacent cells never both
 * contain the same point.
 *
 * @param rect - The rectangle to test against.
 * @param x - Point x coordinate.
 * @param y - Point y coordinate.
 * @returns True if the point lies inside the rectangle.
 */
export function containsPoint(rect: Rectangle, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}

/**
 * Reject rectangles with a non-positive or non-finite size.
 *
 * @param rect - The rectangle to validate.
 * @param what - Short description used in the error message.
 * @returns The same rectangle, for chaining.
 */
export function assertNonDegenerate(rect: Rectangle, what: string = 'rectangle'): Rectangle {
  if (!Number.isFinite(rect.width) || !Number.isFinite(rect.height) || rect.width <= 0 || rect.height <= 0) {
    throw new DegenerateGeometryError(`${what} would be ${rect.width}x${rect.height}`);
  }
  return rect;
}

// ---- Edge resizing ----

/**
 * Grow (positive delta) or shrink (negative delta) a rectangle by moving one edge, or both edges of a corner,
 * outward. The opposite edge stays where it is.
 *
 * @param rect - The rectangle to resize.
 * @param edge - The edge or corner to move.
 * @param delta - Outward growth in pixels.
 * @returns The resized rectangle.
 * @throws DegenerateGeometryError if the result would have a non-positive width or height.
 */
export function edgeResize(rect: Rectangle, edge: ResizeEdge, delta: number): Rectangle {
  if (!Number.isFinite(delta)) {
    throw new DegenerateGeometryError(`resize delta ${delta} is not a finite number`);
  }
  let {x, y, width, height} = rect;
  const left = edge === 'left' || edge === 'top-left' || edge === 'bottom-left';
  const right = edge === 'right' || edge === 'top-right' || edge === 'bottom-right';
  const top = edge === 'top' || edge === 'top-left' || edge === 'top-right';
  const bottom = edge === 'bottom' || edge === 'bottom-left' || edge === 'bottom-right';

  if (left) {
    x -= delta;
    width += delta;
  }
  if (right) {
    width += delta;
  }
  if (top) {
    y -= delta;
    height += delta;
  }
  if (bottom) {
    height += delta;
  }
  return assertNonDegenerate({x, y, width, height}, `resizing ${edge} edge by ${delta}`);
}

// ---- Grid model ----

/**
 * Validate a grid specification.
 *
 * @param grid - The grid to check.
 * @throws InvalidGridError if columns/rows are not positive integers or gaps are negative.
 */
export function validateGrid(grid: GridSpec): void {
  if (!Number.isInteger(grid.columns) || grid.columns <= 0) {
    throw new InvalidGridError(`grid columns must be a positive integer, got ${grid.columns}`);
  }
  if (!Number.isInteger(grid.rows) || grid.rows <= 0) {
    throw new InvalidGridError(`grid rows must be a positive integer, got ${grid.rows}`);
  }
  const gaps = grid.gaps ?? 0;
  if (!Number.isFinite(gaps) || gaps < 0) {
    throw new InvalidGridError(`grid gaps must be a non-negative number, got ${gaps}`);
  }
}

/**
 * Pixel boundary of the i-th column (or row) line. Boundaries are rounded once, so neighbouring cells share them.
 */
function boundary(origin: number, size: number, count: number, index: number): number {
  return origin + Math.round((index * size) / count);
}

/**
 * Rectangle covering a span of adjacent cells. Gaps are removed from the span's interior edges only; the outer
 * edges of the grid stay flush with the workarea.
 *
 * @param grid - The grid specification.
 * @param viewport - The workarea being partitioned.
 * @param span - The span to compute.
 * @returns The span rectangle.
 * @throws InvalidGridError for an invalid grid or a span outside it.
 * @throws DegenerateGeometryError if the gaps leave no room for the span.
 */
export function spanRect(grid: GridSpec, viewport: Rectangle, span: GridSpan): Rectangle {
  validateGrid(grid);
  const {col, row, colSpan, rowSpan} = span;
  const inside = Number.isInteger(col) && Number.isInteger(row)
    && Number.isInteger(colSpan) && Number.isInteger(rowSpan)
    && col >= 0 && row >= 0 && colSpan >= 1 && rowSpan >= 1
    && col + colSpan <= grid.columns && row + rowSpan <= grid.rows;
  if (!inside) {
    throw new InvalidGridError(
      `span (${col},${row}) ${colSpan}x${rowSpan} is outside the ${grid.columns}x${grid.rows} grid`,
    );
  }

  const gaps = grid.gaps ?? 0;
  const lastCol = col + colSpan - 1;
  const lastRow = row + rowSpan - 1;
  const leadX = col > 0 ? Math.floor(gaps / 2) : 0;
  const trailX = lastCol < grid.columns - 1 ? Math.ceil(gaps / 2) : 0;
  const leadY = row > 0 ? Math.floor(gaps / 2) : 0;
  const trailY = lastRow < grid.rows - 1 ? Math.ceil(gaps / 2) : 0;

  const left = boundary(viewport.x, viewport.width, grid.columns, col);
  const right = boundary(viewport.x, viewport.width, grid.columns, col + colSpan);
  const top = boundary(viewport.y, viewport.height, grid.rows, row);
  const bottom = boundary(viewport.y, viewport.height, grid.rows, row + rowSpan);

  return assertNonDegenerate({
    x: left + leadX,
    y: top + leadY,
    width: right - left - leadX - trailX,
    height: bottom - top - leadY - trailY,
  }, `grid cell (${col},${row})`);
}

/**
 * Rectangle of a single grid cell. Cells of a gap-less grid tile the workarea exactly.
 *
 * @param grid - The grid specification.
 * @param viewport - The workarea being partitioned.
 * @param col - Zero-based column.
 * @param row - Zero-based row.
 * @returns The cell rectangle.
 * @throws InvalidGridError for an invalid grid or a cell outside it.
 */
export function cellRect(grid: GridSpec, viewport: Rectangle, col: number, row: number): Rectangle {
  return spanRect(grid, viewport, {col, row, colSpan: 1, rowSpan: 1});
}

/**
 * Size of one grid step, used to express moves and resizes in grid units.
 *
 * @param grid - The grid specification.
 * @param viewport - The workarea being partitioned.
 * @returns Horizontal and vertical step in pixels.
 */
export function gridUnit(grid: GridSpec, viewport: Rectangle): {x: number; y: number} {
  validateGrid(grid);
  return {
    x: Math.round(viewport.width / grid.columns),
    y: Math.round(viewport.height / grid.rows),
  };
}

/**
 * The cell a rectangle overlaps most. Ties go to the lowest column, then the lowest row.
 *
 * @param grid - The grid specification.
 * @param viewport - The workarea being partitioned.
 * @param rect - The rectangle to place.
 * @returns The best matching cell; (0,0) when the rectangle overlaps no cell.
 */
export function bestCell(grid: GridSpec, viewport: Rectangle, rect: Rectangle): GridCell {
  validateGrid(grid);
  let best: GridCell = {col: 0, row: 0};
  let bestArea = -1;
  for (let col = 0; col < grid.columns; col++) {
    for (let row = 0; row < grid.rows; row++) {
      const area = overlapArea(cellRect(grid, viewport, col, row), rect);
      if (area > bestArea) {
        best = {col, row};
        bestArea = area;
      }
    }
  }
  return best;
}

/**
 * Find the span whose rectangle is exactly the given rectangle. Smaller spans are tried first.
 *
 * @param grid - The grid specification.
 * @param viewport - The workarea being partitioned.
 * @param rect - The rectangle to match.
 * @returns The matching span, or undefined if the rectangle is not aligned to the grid.
 */
export function findExactSpan(grid: GridSpec, viewport: Rectangle, rect: Rectangle): GridSpan | undefined {
  validateGrid(grid);
  for (let colSpan = 1; colSpan <= grid.columns; colSpan++) {
    for (let rowSpan = 1; rowSpan <= grid.rows; rowSpan++) {
      for (let col = 0; col + colSpan <= grid.columns; col++) {
        for (let row = 0; row + rowSpan <= grid.rows; row++) {
          const span = {col, row, colSpan, rowSpan};
          if (rectEquals(spanRect(grid, viewport, span), rect)) {
            return span;
          }
        }
      }
    }
  }
  return undefined;
}

/**
 * Step from a cell to its neighbour.
 *
 * @param grid - The grid specification.
 * @param cell - Starting cell.
 * @param direction - Direction to step in.
 * @returns The neighbouring cell, or undefined at the grid edge.
 */
export function neighbourCell(grid: GridSpec, cell: GridCell, direction: Direction): GridCell | undefined {
  const col = cell.col + (direction === 'right' ? 1 : direction === 'left' ? -1 : 0);
  const row = cell.row + (direction === 'down' ? 1 : direction === 'up' ? -1 : 0);
  if (col < 0 || row < 0 || col >= grid.columns || row >= grid.rows) {
    return undefined;
  }
  return {col, row};
}
