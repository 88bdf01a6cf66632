/**
 * modules/engine/src/resolver/ActionResolver.ts
 *
 * @file Single entry point of action resolution. Resolution is pure: it reads the snapshot set and the state tables
 * and returns commands plus the table updates to commit, or throws.
 */
import type {ActionRequest} from '@common/actions/types.js';
import type {Resolution, ResolveContext} from './types.js';
import {resolveCycle} from './cycle.js';
import {resolveGridPut} from './gridPut.js';
import {resolveMove, resolveResize} from './moveResize.js';
import {resolvePlace} from './place.js';
import {resolveToggleState} from './toggleState.js';

function assertNever(value: never): never {
  throw new Error(`unhandled action: ${JSON.stringify(value)}`);
}

/**
 * Resolve an action request against the captured windows.
 *
 * @param request - The request to resolve.
 * @param context - Snapshots, grid defaults and read access to the state tables.
 * @returns Commands to emit and state changes to commit.
 * @throws InvalidGridError, DegenerateGeometryError or OutOfBoundsError when the action cannot be carried out.
 */
export function resolveAction(request: ActionRequest, context: ResolveContext): Resolution {
  switch (request.kind) {
    case 'cycle':
      return resolveCycle(request, context);
    case 'grid-put':
      return resolveGridPut(request, context);
    case 'move':
      return resolveMove(request, context);
    case 'resize':
      return resolveResize(request, context);
    case 'toggle-state':
      return resolveToggleState(request, context);
    case 'place':
      return resolvePlace(request, context);
    default:
      return assertNever(request);
  }
}
