/**
 * modules/common/src/core/placement.ts
 *
 * @file Declarative gravity placement of a window inside a workarea: optional size, then either edge offsets or an
 * alignment, clamped so the window stays inside the workarea.
 */
import type {Rectangle} from './window.js';
import {getLog} from '../logging.js';

const log = getLog('common.placement');

/**
 * Pixel or percentage value. Percentage values are interpreted relative to the workarea.
 */
export type PlacementOffset = number | `${number}%`;

/**
 * Preferred horizontal alignment for placement.
 */
export type PlacementHorizontal = 'left' | 'center' | 'right';

/**
 * Preferred vertical alignment for placement.
 */
export type PlacementVertical = 'top' | 'center' | 'bottom';

/**
 * Declarative placement options. Offsets win over alignments; `top` wins over `bottom` and `left` over `right`.
 */
export interface WindowPlacement {
  horizontal?: PlacementHorizontal;
  vertical?: PlacementVertical;
  top?: PlacementOffset;
  bottom?: PlacementOffset;
  left?: PlacementOffset;
  right?: PlacementOffset;
  /** New width; the current width is kept when omitted. */
  width?: PlacementOffset;
  /** New height; the current height is kept when omitted. */
  height?: PlacementOffset;
}

/**
 * Parse a placement value given as pixels (number) or percentage string (e.g. "25%").
 *
 * @param value - The value, either a number (px) or a percentage string.
 * @param axisSize - The full axis size in pixels used to resolve percentage values.
 * @param fieldName - The placement field name, used in warning messages for invalid values.
 * @returns The resolved value in pixels, or undefined if the value is undefined.
 */
export function parsePlacementOffset(
  value: PlacementOffset | undefined,
  axisSize: number,
  fieldName: keyof WindowPlacement,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  const match = /^(-?\d+(?:\.\d+)?)%$/.exec(value);
  if (!match) {
    log.warn(`invalid placement '${fieldName}' (${value}); using 0.`);
    return 0;
  }
  const percent = Number(match[1]);
  return Math.round(axisSize * (percent / 100));
}

/**
 * Compute the rectangle for a placement.
 *
 * @param placement - The declarative placement.
 * @param workArea - The workarea to place into.
 * @param current - The window's current geometry, used for the size when the placement gives none.
 * @returns The placed rectangle, clamped into the workarea.
 */
export function resolvePlacement(placement: WindowPlacement, workArea: Rectangle, current: Rectangle): Rectangle {
  if (placement.top !== undefined && placement.bottom !== undefined) {
    log.warn(`placement has both 'top' and 'bottom'; using 'top'.`);
  }
  if (placement.left !== undefined && placement.right !== undefined) {
    log.warn(`placement has both 'left' and 'right'; using 'left'.`);
  }

  const requestedWidth = parsePlacementOffset(placement.width, workArea.width, 'width') ?? current.width;
  const requestedHeight = parsePlacementOffset(placement.height, workArea.height, 'height') ?? current.height;
  const width = Math.min(requestedWidth, workArea.width);
  const height = Math.min(requestedHeight, workArea.height);

  const topPx = parsePlacementOffset(placement.top, workArea.height, 'top') ?? 0;
  const bottomPx = parsePlacementOffset(placement.bottom, workArea.height, 'bottom') ?? 0;
  const leftPx = parsePlacementOffset(placement.left, workArea.width, 'left') ?? 0;
  const rightPx = parsePlacementOffset(placement.right, workArea.width, 'right') ?? 0;

  let x: number;
  if (placement.left !== undefined) {
    x = workArea.x + leftPx;
  } else if (placement.right !== undefined) {
    x = workArea.x + workArea.width - width - rightPx;
  } else if (placement.horizontal === 'left') {
    x = workArea.x;
  } else if (placement.horizontal === 'right') {
    x = workArea.x + workArea.width - width;
  } else {
    x = workArea.x + Math.floor((workArea.width - width) / 2);
  }

  let y: number;
  if (placement.top !== undefined) {
    y = workArea.y + topPx;
  } else if (placement.bottom !== undefined) {
    y = workArea.y + workArea.height - height - bottomPx;
  } else if (placement.vertical === 'top') {
    y = workArea.y;
  } else if (placement.vertical === 'bottom') {
    y = workArea.y + workArea.height - height;
  } else {
    y = workArea.y + Math.floor((workArea.height - height) / 2);
  }

  const minX = workArea.x;
  const maxX = workArea.x + workArea.width - width;
  const minY = workArea.y;
  const maxY = workArea.y + workArea.height - height;

  return {
    x: Math.max(minX, Math.min(x, maxX)),
    y: Math.max(minY, Math.min(y, maxY)),
    width,
    height,
  };
}
