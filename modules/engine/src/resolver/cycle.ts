/**
 * modules/engine/src/resolver/cycle.ts
 *
 * @file Focus cycling through the windows a filter selects.
 */
import type {CycleRequest} from '@common/actions/types.js';
import type {WindowId} from '@common/core/window.js';
import type {Resolution, ResolveContext, StateChangeRecord} from './types.js';
import {filterKey} from '@common/filter/expression.js';
import {getLogger} from '../logging/index.js';
import {selectTargets} from './shared.js';
import {EMPTY_RESOLUTION} from './types.js';

const log = getLogger('engine.resolver.cycle');

function sameMembers(order: readonly WindowId[], ids: readonly WindowId[]): boolean {
  if (order.length !== ids.length) {
    return false;
  }
  const members = new Set(order);
  return ids.every(id => members.has(id));
}

function wrap(index: number, length: number): number {
  return ((index % length) + length) % length;
}

/**
 * Pick the next (or previous) window of the selection and activate it.
 *
 * While the set of matching windows is unchanged, the stored order is walked. When it changes, the cycle restarts
 * from the current selection: at the active window's position (then one step on), or at the first window if the
 * active window is not part of the selection.
 *
 * @param request - The cycle request.
 * @param context - The resolve context.
 * @returns An activate command for the chosen window, or none if it is active already.
 */
export function resolveCycle(request: CycleRequest, context: ResolveContext): Resolution {
  const selection = selectTargets(request, context);
  if (selection.length === 0) {
    log.debug('cycle: no window matches');
    return EMPTY_RESOLUTION;
  }
  const ids = selection.map(window => window.id);
  const key = filterKey(request.target);
  const step = request.direction === 'next' ? 1 : -1;
  const stored = context.cycles.get(key);

  let order: readonly WindowId[];
  let index: number;
  let change: StateChangeRecord;
  if (stored && sameMembers(stored.order, ids)) {
    order = stored.order;
    index = wrap(stored.index + step, order.length);
    change = {kind: 'cycle-advance', key, index};
  } else {
    order = ids;
    const activePosition = selection.findIndex(window => window.active);
    index = activePosition >= 0 ? wrap(activePosition + step, order.length) : 0;
    change = {kind: 'cycle-reset', key, order, index};
  }

  const targetId = order[index];
  const target = selection.find(window => window.id === targetId);
  if (!target || target.active) {
    return {commands: [], changes: [change]};
  }
  return {commands: [{windowId: target.id, activate: true}], changes: [change]};
}
