/**
 * modules/engine/src/resolver/gridPut.ts
 *
 * @file Placing a window onto grid cells, with optional span-grow: repeating the same placement widens the window
 * over the neighbouring cell, and repeating it again takes it back.
 */
import type {GridPutRequest} from '@common/actions/types.js';
import type {Direction, GridSpan, GridSpec} from '@common/core/geometry.js';
import type {Rectangle} from '@common/core/window.js';
import type {Resolution, ResolveContext} from './types.js';
import {bestCell, findExactSpan, rectEquals, spanRect, validateGrid} from '@common/core/geometry.js';
import {getLogger} from '../logging/index.js';
import {firstTarget, placeAt} from './shared.js';
import {EMPTY_RESOLUTION} from './types.js';

const log = getLogger('engine.resolver.grid');

function single(col: number, row: number): GridSpan {
  return {col, row, colSpan: 1, rowSpan: 1};
}

/**
 * Span for an absolute placement. With span-grow, a window already sitting exactly in the requested single cell is
 * widened by one column toward the horizontal centre of the grid.
 */
function absoluteSpan(
  grid: GridSpec,
  viewport: Rectangle,
  requested: GridSpan,
  current: Rectangle,
  spanGrow: boolean,
): GridSpan {
  const target = spanRect(grid, viewport, requested);
  const isSingle = requested.colSpan === 1 && requested.rowSpan === 1;
  if (!spanGrow || !isSingle || grid.columns < 2 || !rectEquals(current, target)) {
    return requested;
  }
  return requested.col < grid.columns / 2
    ? {...requested, colSpan: 2}
    : {...requested, col: requested.col - 1, colSpan: 2};
}

/**
 * Span-grow step along one axis: a single cell grows into its neighbour, an extended span shrinks back to its cell
 * at the direction's end.
 */
function growOrShrink(grid: GridSpec, span: GridSpan, direction: Direction): GridSpan | undefined {
  switch (direction) {
    case 'right':
      if (span.colSpan > 1) {
        return {...span, col: span.col + span.colSpan - 1, colSpan: 1};
      }
      return span.col + 1 < grid.columns ? {...span, colSpan: 2} : undefined;
    case 'left':
      if (span.colSpan > 1) {
        return {...span, colSpan: 1};
      }
      return span.col > 0 ? {...span, col: span.col - 1, colSpan: 2} : undefined;
    case 'down':
      if (span.rowSpan > 1) {
        return {...span, row: span.row + span.rowSpan - 1, rowSpan: 1};
      }
      return span.row + 1 < grid.rows ? {...span, rowSpan: 2} : undefined;
    case 'up':
      if (span.rowSpan > 1) {
        return {...span, rowSpan: 1};
      }
      return span.row > 0 ? {...span, row: span.row - 1, rowSpan: 2} : undefined;
  }
}

/**
 * Plain move to the cell next to the span's end cell in the given direction.
 */
function step(grid: GridSpec, span: GridSpan, direction: Direction): GridSpan | undefined {
  const lastCol = span.col + span.colSpan - 1;
  const lastRow = span.row + span.rowSpan - 1;
  switch (direction) {
    case 'right':
      return lastCol + 1 < grid.columns ? single(lastCol + 1, span.row) : undefined;
    case 'left':
      return span.col > 0 ? single(span.col - 1, span.row) : undefined;
    case 'down':
      return lastRow + 1 < grid.rows ? single(span.col, lastRow + 1) : undefined;
    case 'up':
      return span.row > 0 ? single(span.col, span.row - 1) : undefined;
  }
}

/**
 * Put the target window onto a grid cell or span.
 *
 * @param request - The grid-put request.
 * @param context - The resolve context.
 * @returns A geometry command, or none if the window is already there or at the grid edge.
 * @throws InvalidGridError for an invalid grid or an absolute cell outside it.
 * @throws DegenerateGeometryError if the gaps leave no room for the cell.
 */
export function resolveGridPut(request: GridPutRequest, context: ResolveContext): Resolution {
  const window = firstTarget(request, context);
  if (!window) {
    log.debug('grid-put: no window matches');
    return EMPTY_RESOLUTION;
  }
  const grid = request.grid ?? context.grid;
  validateGrid(grid);
  const spanGrow = request.spanGrow ?? context.spanGrow;
  const {viewport} = context.snapshots;
  const {cell} = request;

  let span: GridSpan | undefined;
  if (cell.mode === 'absolute') {
    const requested = {col: cell.col, row: cell.row, colSpan: cell.colSpan ?? 1, rowSpan: cell.rowSpan ?? 1};
    span = absoluteSpan(grid, viewport, requested, window.geometry, spanGrow);
  } else {
    const current = findExactSpan(grid, viewport, window.geometry);
    if (current === undefined) {
      const best = bestCell(grid, viewport, window.geometry);
      span = single(best.col, best.row);
    } else {
      span = spanGrow ? growOrShrink(grid, current, cell.direction) : step(grid, current, cell.direction);
    }
  }

  if (span === undefined) {
    log.debug(`grid-put: window ${window.id} is at the grid edge`);
    return EMPTY_RESOLUTION;
  }
  return placeAt(window, spanRect(grid, viewport, span), context);
}
