/**
 * modules/engine/src/resolver/moveResize.ts
 *
 * @file Relative moves and edge resizes, in pixels or grid steps.
 */
import type {Anchor, DistanceUnit, MoveRequest, ResizeRequest} from '@common/actions/types.js';
import type {ResizeEdge} from '@common/core/geometry.js';
import type {Rectangle} from '@common/core/window.js';
import type {Resolution, ResolveContext} from './types.js';
import {OutOfBoundsError} from '@common/core/errors.js';
import {edgeResize, gridUnit, overlapArea, translate} from '@common/core/geometry.js';
import {getLogger} from '../logging/index.js';
import {firstTarget, placeAt} from './shared.js';
import {EMPTY_RESOLUTION} from './types.js';

const log = getLogger('engine.resolver.move');

const HORIZONTAL_PART: Partial<Record<ResizeEdge, ResizeEdge>> = {
  'left': 'left',
  'right': 'right',
  'top-left': 'left',
  'top-right': 'right',
  'bottom-left': 'left',
  'bottom-right': 'right',
};

const VERTICAL_PART: Partial<Record<ResizeEdge, ResizeEdge>> = {
  'top': 'top',
  'bottom': 'bottom',
  'top-left': 'top',
  'top-right': 'top',
  'bottom-left': 'bottom',
  'bottom-right': 'bottom',
};

/**
 * The opposite side of the edge being dragged stays put.
 */
function resizeAnchor(horizontal: ResizeEdge | undefined, vertical: ResizeEdge | undefined): Anchor {
  return {x: horizontal === 'left' ? 1 : 0, y: vertical === 'top' ? 1 : 0};
}

function unitSize(unit: DistanceUnit, context: ResolveContext): {x: number; y: number} {
  return unit === 'grid' ? gridUnit(context.grid, context.snapshots.viewport) : {x: 1, y: 1};
}

function assertVisible(rect: Rectangle, viewport: Rectangle, what: string): Rectangle {
  if (overlapArea(rect, viewport) <= 0) {
    throw new OutOfBoundsError(`${what} would move the window off the workarea`);
  }
  return rect;
}

/**
 * Shift the target window.
 *
 * @param request - The move request.
 * @param context - The resolve context.
 * @returns A geometry command, or none for a zero move.
 * @throws OutOfBoundsError if the window would no longer overlap the workarea.
 */
export function resolveMove(request: MoveRequest, context: ResolveContext): Resolution {
  const window = firstTarget(request, context);
  if (!window) {
    log.debug('move: no window matches');
    return EMPTY_RESOLUTION;
  }
  const unit = unitSize(request.unit, context);
  const moved = translate(window.geometry, request.dx * unit.x, request.dy * unit.y);
  assertVisible(moved, context.snapshots.viewport, `moving by ${request.dx},${request.dy} ${request.unit}`);
  return placeAt(window, moved, context);
}

/**
 * Move one edge (or both edges of a corner) of the target window outward or inward. In grid units the horizontal
 * and vertical parts of a corner use their own step size.
 *
 * @param request - The resize request.
 * @param context - The resolve context.
 * @returns A geometry command, or none for a zero delta.
 * @throws DegenerateGeometryError if the window would lose its area.
 * @throws OutOfBoundsError if the window would no longer overlap the workarea.
 */
export function resolveResize(request: ResizeRequest, context: ResolveContext): Resolution {
  const window = firstTarget(request, context);
  if (!window) {
    log.debug('resize: no window matches');
    return EMPTY_RESOLUTION;
  }
  const unit = unitSize(request.unit, context);
  let rect: Rectangle = window.geometry;
  const horizontal = HORIZONTAL_PART[request.edge];
  const vertical = VERTICAL_PART[request.edge];
  if (horizontal) {
    rect = edgeResize(rect, horizontal, request.delta * unit.x);
  }
  if (vertical) {
    rect = edgeResize(rect, vertical, request.delta * unit.y);
  }
  assertVisible(rect, context.snapshots.viewport, `resizing ${request.edge} by ${request.delta} ${request.unit}`);
  return placeAt(window, rect, context, resizeAnchor(horizontal, vertical));
}
