/**
 * modules/engine/src/windowing/types.ts
 *
 * @file Contracts between the engine and a window system. The X11 adapter implements all three; tests use an
 * in-process fake.
 */
import type {ActionRequest, Command, InvalidationEvent} from '@common/actions/types.js';
import type {Rectangle, WindowInfo} from '@common/core/window.js';

/**
 * Read side of the window system.
 */
export interface WindowSource {
  /** Managed windows in stacking order, topmost first. */
  listWindows(): Promise<readonly WindowInfo[]>;

  /** Workarea of the current desktop, panels excluded. */
  getViewport(): Promise<Rectangle>;

  /** Index of the current desktop, or null if the window manager does not tell. */
  getCurrentDesktop(): Promise<number | null>;
}

/**
 * Write side of the window system. Rejects with StaleReferenceError when the window no longer exists.
 */
export interface CommandSink {
  /**
   * @param command - The command to apply.
   * @param signal - Aborted once a newer command for the same window exists; the remaining steps are skipped.
   */
  applyCommand(command: Command, signal?: AbortSignal): Promise<void>;
}

export type WindowEventListener = (event: InvalidationEvent) => void;

/**
 * Push notifications about window lifecycle and changes.
 */
export interface WindowEventSource {
  on(event: 'window-event', listener: WindowEventListener): this;
  off(event: 'window-event', listener: WindowEventListener): this;
}

export type TriggerListener = (request: ActionRequest, timestamp: number) => void;

/**
 * Anything that produces action requests, such as a key binder or a command stream.
 */
export interface TriggerSource {
  /**
   * @returns A function that removes the listener.
   */
  subscribe(listener: TriggerListener): () => void;
}
