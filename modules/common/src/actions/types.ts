/**
 * modules/common/src/actions/types.ts
 *
 * @file Action requests, the commands they resolve to, and the invalidation events coming back from the window
 * system.
 */
import type {Direction, GridSpec, ResizeEdge} from '../core/geometry.js';
import type {WindowPlacement} from '../core/placement.js';
import type {Rectangle, WindowId, WindowStateFlag} from '../core/window.js';
import type {FilterExpression} from '../filter/expression.js';
import {canonicalJson} from '../core/canonical.js';

export type CycleDirection = 'next' | 'previous';

/**
 * `px` moves by pixels, `grid` by grid steps (workarea size divided by columns or rows).
 */
export type DistanceUnit = 'px' | 'grid';

export type GridTarget =
  | {mode: 'absolute'; col: number; row: number; colSpan?: number; rowSpan?: number}
  | {mode: 'relative'; direction: Direction};

/**
 * Flags a toggle-state action accepts. `maximized` toggles both axes together.
 */
export type ToggleFlag = 'maximized' | WindowStateFlag;

interface TargetedRequest {
  /** Which windows the action applies to. All kinds except `cycle` act on the topmost match. */
  target: FilterExpression;
}

export interface CycleRequest extends TargetedRequest {
  kind: 'cycle';
  direction: CycleDirection;
}

export interface GridPutRequest extends TargetedRequest {
  kind: 'grid-put';
  cell: GridTarget;
  grid?: GridSpec;
  spanGrow?: boolean;
}

export interface MoveRequest extends TargetedRequest {
  kind: 'move';
  dx: number;
  dy: number;
  unit: DistanceUnit;
}

export interface ResizeRequest extends TargetedRequest {
  kind: 'resize';
  edge: ResizeEdge;
  delta: number;
  unit: DistanceUnit;
}

export interface ToggleStateRequest extends TargetedRequest {
  kind: 'toggle-state';
  flag: ToggleFlag;
}

export interface PlaceRequest extends TargetedRequest {
  kind: 'place';
  placement: WindowPlacement;
}

export type ActionRequest =
  | CycleRequest
  | GridPutRequest
  | MoveRequest
  | ResizeRequest
  | ToggleStateRequest
  | PlaceRequest;

export type ActionKind = ActionRequest['kind'];

export const ACTION_KINDS: readonly ActionKind[] = ['cycle', 'grid-put', 'move', 'resize', 'toggle-state', 'place'];

export interface StateChange {
  set: readonly WindowStateFlag[];
  unset: readonly WindowStateFlag[];
}

/**
 * Point of a requested geometry that stays in place when the window system has to adjust the size, as fractions of
 * width and height: `{x: 0, y: 0}` keeps the top-left corner, `{x: 1, y: 1}` the bottom-right one.
 */
export interface Anchor {
  x: number;
  y: number;
}

/**
 * A command as produced by the resolver, before the pipeline stamps it.
 */
export interface PlannedCommand {
  windowId: WindowId;
  /** Outer geometry, window decorations included. */
  geometry?: Rectangle;
  /** Where a size adjustment is anchored. Top-left when absent. */
  anchor?: Anchor;
  state?: StateChange;
  activate?: boolean;
}

/**
 * A command on its way to the window system. `generation` grows per window id; only the newest generation of a
 * window counts.
 */
export interface Command extends PlannedCommand {
  commandId: string;
  generation: number;
}

export type InvalidationKind = 'created' | 'destroyed' | 'state-changed' | 'geometry-changed';

export interface InvalidationEvent {
  kind: InvalidationKind;
  windowId: WindowId;
}

/**
 * Canonical text of a request, used to recognise the same trigger delivered twice.
 *
 * @param request - The action request.
 * @returns A string equal for structurally equal requests.
 */
export function requestKey(request: ActionRequest): string {
  return canonicalJson(request);
}

/**
 * Short human-readable description for log lines.
 *
 * @param command - The command to describe.
 * @returns For example `0x3a00007#2 geometry=0,0,960,540 unset=fullscreen activate`.
 */
export function describeCommand(command: Command): string {
  const parts = [`${command.windowId}#${command.generation}`];
  if (command.geometry) {
    const {x, y, width, height} = command.geometry;
    parts.push(`geometry=${x},${y},${width},${height}`);
  }
  if (command.state && command.state.set.length > 0) {
    parts.push(`set=${command.state.set.join(',')}`);
  }
  if (command.state && command.state.unset.length > 0) {
    parts.push(`unset=${command.state.unset.join(',')}`);
  }
  if (command.activate) {
    parts.push('activate');
  }
  return parts.join(' ');
}
