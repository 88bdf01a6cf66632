/**
 * modules/common/src/utils.ts
 *
 * @file Shared utility helpers.
 */

// ---- Types ----

/**
 * A debounced wrapper around a function. Calls are delayed until no further invocations occur within the configured
 * interval. Only the arguments from the most recent call are forwarded.
 */
export interface DebouncedFunction<A extends unknown[]> {
  (...args: A): void;

  /**
   * Cancel a pending invocation without executing the wrapped function.
   */
  cancel: () => void;

  /**
   * Execute the pending invocation immediately. No-op if nothing is pending.
   */
  flush: () => void;
}

// ---- Functions ----

/**
 * Delay repeated calls until a quiet period has elapsed.
 *
 * Every invocation resets the timer. The wrapped function is called once, after `ms` milliseconds of inactivity,
 * with the arguments from the most recent call. Used to coalesce bursts of geometry notifications while a window is
 * being dragged.
 *
 * @param fn - The function to debounce.
 * @param ms - Quiet period in milliseconds.
 * @returns A debounced wrapper with `.cancel()` and `.flush()` methods.
 */
export function debounce<A extends unknown[]>(fn: (...args: A) => void, ms: number): DebouncedFunction<A> {
  let timerId: ReturnType<typeof setTimeout> | undefined;
  let lastArgs: A | undefined;

  const fire = () => {
    const pending = lastArgs;
    timerId = undefined;
    lastArgs = undefined;
    if (pending !== undefined) {
      fn(...pending);
    }
  };

  const debounced = (...args: A) => {
    lastArgs = args;
    if (timerId !== undefined) {
      clearTimeout(timerId);
    }
    timerId = setTimeout(fire, ms);
  };

  const cancel = () => {
    if (timerId !== undefined) {
      clearTimeout(timerId);
      timerId = undefined;
    }
    lastArgs = undefined;
  };

  const flush = () => {
    if (timerId !== undefined) {
      clearTimeout(timerId);
      fire();
    }
  };

  return Object.assign(debounced, {cancel, flush});
}

/**
 * Race a promise against a timer. The timer is cleared as soon as the promise settles, so nothing keeps the event
 * loop alive afterwards.
 *
 * @param promise - The operation to wait for.
 * @param ms - Timeout in milliseconds.
 * @param onTimeout - Produces the rejection reason when the timer wins.
 * @returns The promise's value.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timerId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timerId = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timerId));
}
