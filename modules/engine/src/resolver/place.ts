/**
 * modules/engine/src/resolver/place.ts
 *
 * @file Gravity placement of the target window inside the workarea.
 */
import type {PlaceRequest} from '@common/actions/types.js';
import type {Resolution, ResolveContext} from './types.js';
import {assertNonDegenerate} from '@common/core/geometry.js';
import {resolvePlacement} from '@common/core/placement.js';
import {getLogger} from '../logging/index.js';
import {firstTarget, placeAt} from './shared.js';
import {EMPTY_RESOLUTION} from './types.js';

const log = getLogger('engine.resolver.place');

export function resolvePlace(request: PlaceRequest, context: ResolveContext): Resolution {
  const window = firstTarget(request, context);
  if (!window) {
    log.debug('place: no window matches');
    return EMPTY_RESOLUTION;
  }
  const geometry = resolvePlacement(request.placement, context.snapshots.viewport, window.geometry);
  return placeAt(window, assertNonDegenerate(geometry, 'placement'), context);
}
