/**
 * modules/engine/src/__tests__/fixtures.ts
 *
 * @file Test data builders and an in-process window system for engine tests.
 */
import type {Command} from '@common/actions/types.js';
import type {Rectangle, SnapshotSet, WindowInfo, WindowSnapshot, WindowStateFlag} from '@common/core/window.js';
import type {ResolveContext} from '../resolver/types.js';
import type {CommandSink, WindowSource} from '../windowing/types.js';
import {StaleReferenceError} from '@common/core/errors.js';
import {CycleStateStore} from '../resolver/CycleStateStore.js';
import {RestoreGeometryTable} from '../resolver/RestoreGeometryTable.js';

export const SCREEN: Rectangle = {x: 0, y: 0, width: 1920, height: 1080};

export type WindowOverrides = Partial<Omit<WindowInfo, 'id' | 'state'>> & {state?: WindowStateFlag[]};

export function windowInfo(id: string, overrides: WindowOverrides = {}): WindowInfo {
  const {state, ...rest} = overrides;
  return {
    id,
    geometry: {x: 100, y: 100, width: 800, height: 600},
    desktop: 0,
    type: 'normal',
    active: false,
    ...rest,
    state: state ?? [],
  };
}

export function snapshot(id: string, overrides: WindowOverrides = {}): WindowSnapshot {
  const info = windowInfo(id, overrides);
  return {...info, state: new Set(info.state)};
}

export function snapshotSet(windows: WindowSnapshot[], viewport: Rectangle = SCREEN, currentDesktop = 0): SnapshotSet {
  return {windows, viewport, currentDesktop, capturedAt: 0};
}

export interface ContextOptions {
  viewport?: Rectangle;
  cycles?: CycleStateStore;
  restore?: RestoreGeometryTable;
  spanGrow?: boolean;
}

export function resolveContext(windows: WindowSnapshot[], options: ContextOptions = {}): ResolveContext {
  return {
    snapshots: snapshotSet(windows, options.viewport ?? SCREEN),
    grid: {columns: 2, rows: 2},
    spanGrow: options.spanGrow ?? true,
    cycles: options.cycles ?? new CycleStateStore(),
    restore: options.restore ?? new RestoreGeometryTable(),
  };
}

/**
 * Window system living in memory. Applied commands change the listed windows the way a window manager would, so
 * consecutive dispatches see each other's effects.
 */
export class FakeWindowSystem implements WindowSource, CommandSink {
  windows: WindowInfo[];
  viewport: Rectangle = SCREEN;
  currentDesktop: number | null = 0;
  readonly applied: Command[] = [];
  /** Set to make the next listings fail. */
  failure: Error | undefined;
  /** Set to make listings never answer. */
  hang = false;
  /** When set, confirmations wait until {@link confirmAll} is called. */
  holdConfirmations = false;
  listCalls = 0;

  private readonly held: Array<() => void> = [];

  constructor(windows: WindowInfo[] = []) {
    this.windows = windows;
  }

  async listWindows(): Promise<readonly WindowInfo[]> {
    this.listCalls++;
    if (this.hang) {
      return new Promise<readonly WindowInfo[]>(() => {});
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.windows.map(window => ({...window, geometry: {...window.geometry}, state: [...window.state]}));
  }

  async getViewport(): Promise<Rectangle> {
    return {...this.viewport};
  }

  async getCurrentDesktop(): Promise<number | null> {
    return this.currentDesktop;
  }

  async applyCommand(command: Command): Promise<void> {
    this.applied.push(command);
    if (this.holdConfirmations) {
      await new Promise<void>(resolve => this.held.push(resolve));
    }
    const index = this.windows.findIndex(window => window.id === command.windowId);
    if (index < 0) {
      throw new StaleReferenceError(`window ${command.windowId} no longer exists`);
    }
    const window = this.windows[index];
    const state = new Set(window.state);
    command.state?.unset.forEach(flag => state.delete(flag));
    command.state?.set.forEach(flag => state.add(flag));
    const updated: WindowInfo = {
      ...window,
      geometry: command.geometry ? {...command.geometry} : window.geometry,
      state: [...state],
    };
    if (command.activate) {
      this.windows = [
        {...updated, active: true},
        ...this.windows.filter(other => other.id !== window.id).map(other => ({...other, active: false})),
      ];
    } else {
      this.windows[index] = updated;
    }
  }

  confirmAll(): void {
    this.held.splice(0).forEach(resolve => resolve());
  }

  remove(id: string): void {
    this.windows = this.windows.filter(window => window.id !== id);
  }
}
