/**
 * modules/engine/src/resolver/shared.ts
 *
 * @file Helpers used by several action kinds.
 */
import type {ActionRequest, Anchor, PlannedCommand} from '@common/actions/types.js';
import type {Rectangle, WindowSnapshot, WindowStateFlag} from '@common/core/window.js';
import type {Resolution, ResolveContext, StateChangeRecord} from './types.js';
import {rectEquals} from '@common/core/geometry.js';
import {select} from '@common/filter/evaluate.js';

/**
 * Flags the window manager would otherwise use to override an explicit geometry.
 */
const GEOMETRY_OVERRIDING_FLAGS: readonly WindowStateFlag[] = [
  'maximized-horizontal',
  'maximized-vertical',
  'fullscreen',
];

/**
 * Every window the request's filter selects, topmost first.
 */
export function selectTargets(request: ActionRequest, context: ResolveContext): readonly WindowSnapshot[] {
  const {windows, currentDesktop} = context.snapshots;
  return select(request.target, windows, {currentDesktop});
}

/**
 * The topmost window the request's filter selects.
 */
export function firstTarget(request: ActionRequest, context: ResolveContext): WindowSnapshot | undefined {
  return selectTargets(request, context).at(0);
}

/**
 * Resolution that puts a window at an explicit geometry: maximized and fullscreen flags are cleared so the window
 * manager honours the new geometry, and the window's restore entry is dropped.
 *
 * @param window - The window to place.
 * @param geometry - Its new geometry.
 * @param context - The resolve context.
 * @param anchor - Point kept in place if the window system adjusts the size.
 * @returns No command when nothing would change.
 */
export function placeAt(
  window: WindowSnapshot,
  geometry: Rectangle,
  context: ResolveContext,
  anchor?: Anchor,
): Resolution {
  const unset = GEOMETRY_OVERRIDING_FLAGS.filter(flag => window.state.has(flag));
  const changes: StateChangeRecord[] = context.restore.get(window.id) === undefined
    ? []
    : [{kind: 'restore-clear', windowId: window.id}];
  if (unset.length === 0 && rectEquals(window.geometry, geometry)) {
    return {commands: [], changes};
  }
  const command: PlannedCommand = {
    windowId: window.id,
    geometry: {x: geometry.x, y: geometry.y, width: geometry.width, height: geometry.height},
  };
  if (anchor) {
    command.anchor = anchor;
  }
  if (unset.length > 0) {
    command.state = {set: [], unset};
  }
  return {commands: [command], changes};
}
