/**
 * modules/engine/src/x11/X11EventWatcher.ts
 *
 * @file Polls a window source and turns the differences between two listings into invalidation events. Geometry
 * changes arrive in bursts while a window is dragged, so they are debounced per window.
 */
import type {InvalidationEvent, InvalidationKind} from '@common/actions/types.js';
import type {DebouncedFunction} from '@common/utils.js';
import type {Rectangle, WindowId, WindowInfo} from '@common/core/window.js';
import type {WindowEventListener, WindowEventSource, WindowSource} from '../windowing/types.js';
import {EventEmitter} from 'node:events';
import {describeError} from '@common/core/errors.js';
import {rectEquals} from '@common/core/geometry.js';
import {debounce} from '@common/utils.js';
import {getLogger} from '../logging/index.js';

const log = getLogger('engine.x11.watcher');

export interface X11EventWatcherOptions {
  /** Default 250 ms. */
  pollIntervalMs?: number;
  /** Quiet period before a geometry change is reported. Default 500 ms. */
  geometryDebounceMs?: number;
}

interface KnownWindow {
  geometry: Rectangle;
  state: string;
  desktop: number | null;
}

function stateKey(info: WindowInfo): string {
  return [...new Set(info.state)].sort().join(',');
}

export class X11EventWatcher extends EventEmitter implements WindowEventSource {
  private readonly pollIntervalMs: number;
  private readonly geometryDebounceMs: number;
  private readonly geometryNotifiers = new Map<WindowId, DebouncedFunction<[]>>();
  private known: Map<WindowId, KnownWindow> | undefined;
  private timer: ReturnType<typeof setInterval> | undefined;
  private polling = false;
  private failing = false;

  constructor(private readonly source: WindowSource, options: X11EventWatcherOptions = {}) {
    super();
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.geometryDebounceMs = options.geometryDebounceMs ?? 500;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    log.debug(`polling window list every ${this.pollIntervalMs} ms`);
    this.timer = setInterval(() => {
      this.poll().catch(reason => log.error('error during window poll', reason));
    }, this.pollIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    for (const notifier of this.geometryNotifiers.values()) {
      notifier.cancel();
    }
    this.geometryNotifiers.clear();
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Take one listing and emit events for what changed since the previous one. The first listing only sets the
   * baseline. Overlapping calls are skipped.
   */
  async poll(): Promise<void> {
    if (this.polling) {
      return;
    }
    this.polling = true;
    try {
      const windows = await this.source.listWindows();
      if (this.failing) {
        log.info('window source is back');
        this.failing = false;
      }
      this.diff(windows);
    } catch (e) {
      if (!this.failing) {
        log.warn(`window poll failed: ${describeError(e)}`);
        this.failing = true;
      }
    } finally {
      this.polling = false;
    }
  }

  public on(event: 'window-event', listener: WindowEventListener): this {
    return super.on(event, listener);
  }

  public off(event: 'window-event', listener: WindowEventListener): this {
    return super.off(event, listener);
  }

  private diff(windows: readonly WindowInfo[]): void {
    const previous = this.known;
    const next = new Map<WindowId, KnownWindow>();
    for (const info of windows) {
      next.set(info.id, {geometry: info.geometry, state: stateKey(info), desktop: info.desktop});
    }
    this.known = next;
    if (previous === undefined) {
      return;
    }

    for (const [id, current] of next) {
      const before = previous.get(id);
      if (before === undefined) {
        this.notify('created', id);
        continue;
      }
      if (before.state !== current.state || before.desktop !== current.desktop) {
        this.notify('state-changed', id);
      }
      if (!rectEquals(before.geometry, current.geometry)) {
        this.geometryNotifier(id)();
      }
    }
    for (const id of previous.keys()) {
      if (!next.has(id)) {
        this.geometryNotifiers.get(id)?.cancel();
        this.geometryNotifiers.delete(id);
        this.notify('destroyed', id);
      }
    }
  }

  private geometryNotifier(id: WindowId): DebouncedFunction<[]> {
    let notifier = this.geometryNotifiers.get(id);
    if (!notifier) {
      notifier = debounce(() => {
        this.geometryNotifiers.delete(id);
        this.notify('geometry-changed', id);
      }, this.geometryDebounceMs);
      this.geometryNotifiers.set(id, notifier);
    }
    return notifier;
  }

  private notify(kind: InvalidationKind, windowId: WindowId): void {
    const event: InvalidationEvent = {kind, windowId};
    log.debug(`window ${windowId} ${kind}`);
    this.emit('window-event', event);
  }
}
