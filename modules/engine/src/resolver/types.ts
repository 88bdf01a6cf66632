/**
 * modules/engine/src/resolver/types.ts
 *
 * @file Inputs and outputs of action resolution.
 */
import type {PlannedCommand} from '@common/actions/types.js';
import type {GridSpec} from '@common/core/geometry.js';
import type {Rectangle, SnapshotSet, WindowId} from '@common/core/window.js';
import type {CycleStateReader} from './CycleStateStore.js';
import type {RestoreGeometryReader} from './RestoreGeometryTable.js';

export interface ResolveContext {
  snapshots: SnapshotSet;
  /** Grid used when a request names none. */
  grid: GridSpec;
  /** Span-grow default when a request does not set it. */
  spanGrow: boolean;
  cycles: CycleStateReader;
  restore: RestoreGeometryReader;
}

/**
 * A table update the resolver asks for. The pipeline applies these only after the whole resolution succeeded.
 */
export type StateChangeRecord =
  | {kind: 'cycle-reset'; key: string; order: readonly WindowId[]; index: number}
  | {kind: 'cycle-advance'; key: string; index: number}
  | {kind: 'restore-save'; windowId: WindowId; geometry: Rectangle}
  | {kind: 'restore-clear'; windowId: WindowId};

export interface Resolution {
  commands: readonly PlannedCommand[];
  changes: readonly StateChangeRecord[];
}

export const EMPTY_RESOLUTION: Resolution = Object.freeze({commands: [], changes: []});
