/**
 * modules/engine/src/resolver/toggleState.ts
 *
 * @file State toggles. Maximize and fullscreen remember the geometry the window had before, and toggling them off
 * puts the window back exactly there.
 */
import type {PlannedCommand, ToggleStateRequest} from '@common/actions/types.js';
import type {Rectangle, WindowStateFlag} from '@common/core/window.js';
import type {Resolution, ResolveContext, StateChangeRecord} from './types.js';
import {GEOMETRY_FLAGS} from '@common/core/window.js';
import {getLogger} from '../logging/index.js';
import {firstTarget} from './shared.js';
import {EMPTY_RESOLUTION} from './types.js';

const log = getLogger('engine.resolver.toggle');

/**
 * Geometry a window takes with the given flags, starting from its unmaximized geometry.
 */
function geometryFor(flags: ReadonlySet<WindowStateFlag>, base: Rectangle, workarea: Rectangle): Rectangle {
  if (flags.has('fullscreen')) {
    return {x: workarea.x, y: workarea.y, width: workarea.width, height: workarea.height};
  }
  const horizontal = flags.has('maximized-horizontal');
  const vertical = flags.has('maximized-vertical');
  return {
    x: horizontal ? workarea.x : base.x,
    width: horizontal ? workarea.width : base.width,
    y: vertical ? workarea.y : base.y,
    height: vertical ? workarea.height : base.height,
  };
}

function hasGeometryFlag(flags: ReadonlySet<WindowStateFlag>): boolean {
  return [...flags].some(flag => GEOMETRY_FLAGS.has(flag));
}

/**
 * Flip a state flag on the target window. `maximized` is on only when both axis flags are set; turning it on sets
 * whichever is missing, turning it off clears both.
 *
 * @param request - The toggle request.
 * @param context - The resolve context.
 * @returns The state command, with geometry for maximize and fullscreen.
 */
export function resolveToggleState(request: ToggleStateRequest, context: ResolveContext): Resolution {
  const window = firstTarget(request, context);
  if (!window) {
    log.debug('toggle-state: no window matches');
    return EMPTY_RESOLUTION;
  }
  const flags: readonly WindowStateFlag[] = request.flag === 'maximized'
    ? ['maximized-horizontal', 'maximized-vertical']
    : [request.flag];
  const isOn = flags.every(flag => window.state.has(flag));

  if (!flags.some(flag => GEOMETRY_FLAGS.has(flag))) {
    const state = isOn ? {set: [], unset: flags} : {set: flags, unset: []};
    return {commands: [{windowId: window.id, state}], changes: []};
  }

  const workarea = context.snapshots.viewport;
  const saved = context.restore.get(window.id);
  const changes: StateChangeRecord[] = [];
  const command: PlannedCommand = {windowId: window.id};

  if (isOn) {
    const remaining = new Set(window.state);
    flags.forEach(flag => remaining.delete(flag));
    command.state = {set: [], unset: flags};
    if (hasGeometryFlag(remaining)) {
      command.geometry = geometryFor(remaining, saved ?? window.geometry, workarea);
    } else if (saved) {
      command.geometry = {x: saved.x, y: saved.y, width: saved.width, height: saved.height};
      changes.push({kind: 'restore-clear', windowId: window.id});
    } else {
      log.debug(`toggle-state: no saved geometry for ${window.id}; leaving it to the window manager`);
    }
  } else {
    const base = saved ?? window.geometry;
    if (!saved) {
      changes.push({kind: 'restore-save', windowId: window.id, geometry: window.geometry});
    }
    const next = new Set(window.state);
    flags.forEach(flag => next.add(flag));
    command.state = {set: flags.filter(flag => !window.state.has(flag)), unset: []};
    command.geometry = geometryFor(next, base, workarea);
  }
  return {commands: [command], changes};
}
