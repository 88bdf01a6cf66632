/**
 * modules/engine/src/dispatch/DispatchPipeline.ts
 *
 * @file The event loop of the engine. Triggers and window-system invalidations go through one FIFO queue; each action
 * is deduplicated, resolved against a fresh capture and turned into commands that are sent to the window system
 * without waiting for them to land.
 *
 * All state that lives across dispatches (cycle positions, restore geometry, command generations) is owned here.
 */
import type {ActionRequest, Command, InvalidationEvent, PlannedCommand} from '@common/actions/types.js';
import type {GridSpec} from '@common/core/geometry.js';
import type {SnapshotSet, WindowId} from '@common/core/window.js';
import type {Resolution, StateChangeRecord} from '../resolver/types.js';
import type {CommandSink, WindowEventListener, WindowEventSource, WindowSource} from '../windowing/types.js';
import {describeCommand} from '@common/actions/types.js';
import {describeError, hasErrorCode} from '@common/core/errors.js';
import {v4 as uuidv4} from 'uuid';
import {getLogger} from '../logging/index.js';
import {resolveAction} from '../resolver/ActionResolver.js';
import {CycleStateStore} from '../resolver/CycleStateStore.js';
import {RestoreGeometryTable} from '../resolver/RestoreGeometryTable.js';
import {captureSnapshots, DEFAULT_CAPTURE_TIMEOUT_MS} from '../snapshot/capture.js';
import {DispatchQueue} from './DispatchQueue.js';
import {DEFAULT_DEDUPE_HISTORY, TriggerDeduplicator} from './TriggerDeduplicator.js';

const log = getLogger('engine.dispatch');

// ---- Types ----

export interface Trigger {
  request: ActionRequest;
  /** Milliseconds since the epoch at which the trigger fired. Part of the dedupe key. */
  timestamp: number;
}

export type ConfirmationStatus = 'confirmed' | 'superseded' | 'stale' | 'failed';

export interface Confirmation {
  command: Command;
  status: ConfirmationStatus;
}

export type DispatchOutcome =
  | {status: 'applied'; commands: readonly Command[]; confirmations?: readonly Confirmation[]}
  | {status: 'noop'}
  | {status: 'duplicate'}
  | {status: 'aborted'; error: Error}
  | {status: 'invalidated'; purged: boolean};

export interface DispatchPipelineOptions {
  source: WindowSource;
  sink: CommandSink;
  grid: GridSpec;
  spanGrow: boolean;
  /** Wait for the window system to confirm before the next item is dispatched. Default false. */
  awaitConfirmation?: boolean;
  captureTimeoutMs?: number;
  dedupeHistory?: number;
}

interface InFlight {
  command: Command;
  confirmation: Promise<Confirmation>;
  /** Aborted when a newer command for the window is sent or the window goes away. */
  controller: AbortController;
}

function asError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

// ---- Pipeline ----

export class DispatchPipeline {
  readonly cycles = new CycleStateStore();
  readonly restore = new RestoreGeometryTable();

  private readonly queue = new DispatchQueue();
  private readonly dedupe: TriggerDeduplicator;
  private readonly generations = new Map<WindowId, number>();
  private readonly inFlight = new Map<WindowId, InFlight>();
  /** Last command sent per window; the next one starts after it settles. */
  private readonly lanes = new Map<WindowId, Promise<Confirmation>>();
  private readonly unconfirmed = new Set<Promise<Confirmation>>();
  private knownIds = new Set<WindowId>();

  constructor(private readonly options: DispatchPipelineOptions) {
    this.dedupe = new TriggerDeduplicator(options.dedupeHistory ?? DEFAULT_DEDUPE_HISTORY);
  }

  /**
   * Queue an action trigger.
   *
   * @param trigger - The request and the time it fired.
   * @returns How the dispatch ended. Never rejects.
   */
  submit(trigger: Trigger): Promise<DispatchOutcome> {
    return this.enqueue(() => this.dispatch(trigger));
  }

  /**
   * Queue a window-system notification.
   *
   * @param event - What happened to which window.
   * @returns The invalidation outcome. Never rejects.
   */
  invalidate(event: InvalidationEvent): Promise<DispatchOutcome> {
    return this.enqueue(async () => this.applyInvalidation(event));
  }

  /**
   * Feed the notifications of an event source into the queue.
   *
   * @param events - The window event source.
   * @returns A function that detaches the source again.
   */
  attach(events: WindowEventSource): () => void {
    const listener: WindowEventListener = (event) => {
      this.invalidate(event).catch(reason => log.error('error during invalidation', reason));
    };
    events.on('window-event', listener);
    return () => {
      events.off('window-event', listener);
    };
  }

  /**
   * Stop accepting input, drain the queue and wait for outstanding confirmations.
   */
  async close(): Promise<void> {
    await this.queue.close();
    await this.settled();
  }

  /**
   * Wait until every command sent so far has been confirmed or has failed.
   */
  async settled(): Promise<readonly Confirmation[]> {
    return Promise.all([...this.unconfirmed]);
  }

  /** Windows seen in the latest capture, adjusted by later notifications. */
  get knownWindowIds(): ReadonlySet<WindowId> {
    return this.knownIds;
  }

  /** Commands sent and not yet confirmed, by window id. */
  get inFlightCommands(): ReadonlyMap<WindowId, Command> {
    return new Map([...this.inFlight].map(([id, entry]) => [id, entry.command]));
  }

  // ---- Queue items ----

  private async enqueue(task: () => Promise<DispatchOutcome>): Promise<DispatchOutcome> {
    if (this.queue.isClosed) {
      return {status: 'aborted', error: new Error('dispatch pipeline is closed')};
    }
    return this.queue.enqueue(task);
  }

  private async dispatch(trigger: Trigger): Promise<DispatchOutcome> {
    const {request, timestamp} = trigger;
    if (this.dedupe.isDuplicate(request, timestamp)) {
      log.debug(`dropping duplicate ${request.kind} trigger @${timestamp}`);
      return {status: 'duplicate'};
    }

    let snapshots: SnapshotSet;
    try {
      snapshots = await captureSnapshots(this.options.source, {
        timeoutMs: this.options.captureTimeoutMs ?? DEFAULT_CAPTURE_TIMEOUT_MS,
      });
    } catch (e) {
      log.error(`${request.kind} aborted, window state unavailable: ${describeError(e)}`);
      this.dedupe.forget(request, timestamp);
      return {status: 'aborted', error: asError(e)};
    }
    this.forgetMissing(snapshots);

    let resolution: Resolution;
    try {
      resolution = resolveAction(request, {
        snapshots,
        grid: this.options.grid,
        spanGrow: this.options.spanGrow,
        cycles: this.cycles,
        restore: this.restore,
      });
    } catch (e) {
      log.warn(`${request.kind} aborted: ${describeError(e)}`);
      return {status: 'aborted', error: asError(e)};
    }

    this.commit(resolution.changes);
    if (resolution.commands.length === 0) {
      log.debug(`${request.kind}: nothing to do`);
      return {status: 'noop'};
    }

    const commands = resolution.commands.map(planned => this.stamp(planned));
    const confirmations = commands.map(command => this.send(command));
    if (this.options.awaitConfirmation) {
      return {status: 'applied', commands, confirmations: await Promise.all(confirmations)};
    }
    return {status: 'applied', commands};
  }

  private applyInvalidation(event: InvalidationEvent): DispatchOutcome {
    const {kind, windowId} = event;
    if (kind === 'created') {
      this.knownIds.add(windowId);
      return {status: 'invalidated', purged: false};
    }
    if (kind !== 'destroyed') {
      return {status: 'invalidated', purged: false};
    }
    const restored = this.restore.clear(windowId);
    const cycles = this.cycles.purgeWindow(windowId);
    const inFlight = this.dropInFlight(windowId);
    this.generations.delete(windowId);
    this.knownIds.delete(windowId);
    const purged = restored || cycles > 0 || inFlight;
    if (purged) {
      log.debug(`window ${windowId} destroyed: purged restore=${restored} cycles=${cycles} inFlight=${inFlight}`);
    }
    return {status: 'invalidated', purged};
  }

  // ---- State ----

  private forgetMissing(snapshots: SnapshotSet): void {
    const present = new Set(snapshots.windows.map(window => window.id));
    const restores = this.restore.retainOnly(present);
    const cycles = this.cycles.retainOnly(present);
    for (const id of [...this.inFlight.keys()]) {
      if (!present.has(id)) {
        this.dropInFlight(id);
        this.generations.delete(id);
      }
    }
    if (restores > 0 || cycles > 0) {
      log.debug(`forgot state of vanished windows: restore=${restores} cycles=${cycles}`);
    }
    this.knownIds = present;
  }

  private commit(changes: readonly StateChangeRecord[]): void {
    for (const change of changes) {
      switch (change.kind) {
        case 'cycle-reset':
          this.cycles.set(change.key, change.order, change.index);
          break;
        case 'cycle-advance':
          this.cycles.setIndex(change.key, change.index);
          break;
        case 'restore-save':
          this.restore.save(change.windowId, change.geometry);
          break;
        case 'restore-clear':
          this.restore.clear(change.windowId);
          break;
      }
    }
  }

  // ---- Commands ----

  private stamp(planned: PlannedCommand): Command {
    const generation = (this.generations.get(planned.windowId) ?? 0) + 1;
    this.generations.set(planned.windowId, generation);
    return {...planned, commandId: uuidv4(), generation};
  }

  /**
   * Send a command once the previous command for the same window has settled, so that two commands for one window
   * never interleave. A command replaced before or while it runs is skipped or stopped.
   */
  private send(command: Command): Promise<Confirmation> {
    const id = command.windowId;
    this.inFlight.get(id)?.controller.abort();
    const controller = new AbortController();
    const previous = this.lanes.get(id);
    const run = () => this.apply(command, controller.signal);
    const confirmation = previous ? previous.then(run) : run();

    this.lanes.set(id, confirmation);
    this.inFlight.set(id, {command, confirmation, controller});
    this.unconfirmed.add(confirmation);
    confirmation.finally(() => {
      this.unconfirmed.delete(confirmation);
      if (this.lanes.get(id) === confirmation) {
        this.lanes.delete(id);
      }
    }).catch(reason => log.error('error during confirmation bookkeeping', reason));
    return confirmation;
  }

  private async apply(command: Command, signal: AbortSignal): Promise<Confirmation> {
    if (signal.aborted) {
      log.debug(`skipping superseded command ${describeCommand(command)}`);
      this.settle(command);
      return {command, status: 'superseded'};
    }
    log.debug(`sending ${describeCommand(command)}`);
    try {
      await this.options.sink.applyCommand(command, signal);
    } catch (reason) {
      return this.confirm(command, hasErrorCode(reason, 'StaleReference') ? 'stale' : 'failed', reason);
    }
    return this.confirm(command, 'confirmed');
  }

  private dropInFlight(id: WindowId): boolean {
    const entry = this.inFlight.get(id);
    if (!entry) {
      return false;
    }
    entry.controller.abort();
    return this.inFlight.delete(id);
  }

  private settle(command: Command): void {
    if (this.inFlight.get(command.windowId)?.command === command) {
      this.inFlight.delete(command.windowId);
    }
  }

  private confirm(command: Command, status: ConfirmationStatus, reason?: unknown): Confirmation {
    const latest = this.generations.get(command.windowId);
    this.settle(command);
    if (latest !== command.generation) {
      log.debug(`ignoring ${status} result of superseded command ${describeCommand(command)}`);
      return {command, status: 'superseded'};
    }
    switch (status) {
      case 'confirmed':
        log.debug(`confirmed ${describeCommand(command)}`);
        break;
      case 'stale':
        log.debug(`window of ${describeCommand(command)} is gone`);
        break;
      default:
        log.warn(`command ${describeCommand(command)} failed: ${describeError(reason)}`);
    }
    return {command, status};
  }
}
