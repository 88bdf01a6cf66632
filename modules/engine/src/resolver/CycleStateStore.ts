/**
 * modules/engine/src/resolver/CycleStateStore.ts
 *
 * @file Per-filter cycle position. The order is captured when a cycle (re)starts and reused as long as the set of
 * matching windows stays the same, so a cycle does not jump around when the stacking order changes.
 */
import type {WindowId} from '@common/core/window.js';

export interface CycleState {
  readonly order: readonly WindowId[];
  readonly index: number;
}

/**
 * Read access handed to the resolver.
 */
export interface CycleStateReader {
  get(key: string): CycleState | undefined;
}

export class CycleStateStore implements CycleStateReader {
  private readonly states = new Map<string, CycleState>();

  get(key: string): CycleState | undefined {
    return this.states.get(key);
  }

  set(key: string, order: readonly WindowId[], index: number): void {
    this.states.set(key, Object.freeze({order: Object.freeze([...order]), index}));
  }

  /**
   * Move the index of an existing cycle. Unknown keys are ignored.
   */
  setIndex(key: string, index: number): void {
    const state = this.states.get(key);
    if (state) {
      this.states.set(key, Object.freeze({order: state.order, index}));
    }
  }

  /**
   * Forget every cycle the window takes part in.
   *
   * @param id - The vanished window.
   * @returns Number of cycles removed.
   */
  purgeWindow(id: WindowId): number {
    let removed = 0;
    for (const [key, state] of this.states) {
      if (state.order.includes(id)) {
        this.states.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Forget every cycle that refers to a window outside `present`.
   *
   * @returns Number of cycles removed.
   */
  retainOnly(present: ReadonlySet<WindowId>): number {
    let removed = 0;
    for (const [key, state] of this.states) {
      if (state.order.some(id => !present.has(id))) {
        this.states.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.states.size;
  }
}
