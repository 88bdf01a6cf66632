/**
 * modules/engine/src/dispatch/TriggerDeduplicator.ts
 *
 * @file Recognises a trigger delivered more than once (same timestamp, same request), e.g. by two key binders
 * watching the same chord.
 */
import type {ActionRequest} from '@common/actions/types.js';
import {requestKey} from '@common/actions/types.js';

export const DEFAULT_DEDUPE_HISTORY = 512;

function triggerKey(request: ActionRequest, timestamp: number): string {
  return `${timestamp}|${requestKey(request)}`;
}

export class TriggerDeduplicator {
  private readonly seen = new Set<string>();
  private readonly order: string[] = [];

  constructor(private readonly capacity: number = DEFAULT_DEDUPE_HISTORY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`dedupe history must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Record a trigger.
   *
   * @param request - The requested action.
   * @param timestamp - When the trigger fired.
   * @returns True if the same trigger was recorded before and is still in the history.
   */
  isDuplicate(request: ActionRequest, timestamp: number): boolean {
    const key = triggerKey(request, timestamp);
    if (this.seen.has(key)) {
      return true;
    }
    this.seen.add(key);
    this.order.push(key);
    while (this.order.length > this.capacity) {
      const oldest = this.order.shift();
      if (oldest !== undefined) {
        this.seen.delete(oldest);
      }
    }
    return false;
  }

  /**
   * Drop a recorded trigger, so that a redelivery of it is dispatched again.
   *
   * @returns True if the trigger was in the history.
   */
  forget(request: ActionRequest, timestamp: number): boolean {
    const key = triggerKey(request, timestamp);
    if (!this.seen.delete(key)) {
      return false;
    }
    this.order.splice(this.order.indexOf(key), 1);
    return true;
  }

  get size(): number {
    return this.order.length;
  }
}
