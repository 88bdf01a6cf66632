/**
 * modules/engine/src/x11/X11WindowSystem.ts
 *
 * @file Window source and command sink for EWMH-compliant X11 window managers, driving `wmctrl`, `xprop` and
 * `xdotool` as child processes.
 */
import type {Command} from '@common/actions/types.js';
import type {Rectangle, WindowId, WindowInfo} from '@common/core/window.js';
import type {CommandSink, WindowSource} from '../windowing/types.js';
import type {RootProperties, WindowProperties} from './parsers.js';
import {execFile} from 'node:child_process';
import {promisify} from 'node:util';
import {describeCommand} from '@common/actions/types.js';
import {describeError, SourceUnavailableError, StaleReferenceError} from '@common/core/errors.js';
import {getLogger} from '../logging/index.js';
import {
  clientGeometry,
  frameGeometry,
  GEOMETRY_ATOMS,
  parseFrameExtents,
  parseRootProperties,
  parseSizeHints,
  parseWindowProperties,
  parseWmctrlList,
  ROOT_ATOMS,
  WINDOW_ATOMS,
  wmctrlStateArguments,
} from './parsers.js';

const log = getLogger('engine.x11');

const execFileAsync = promisify(execFile);

/**
 * Runs a program and resolves with its output; rejects if it cannot be started or exits non-zero.
 */
export type ExecFileFn = (file: string, args: readonly string[]) => Promise<{stdout: string; stderr: string}>;

export interface X11WindowSystemOptions {
  exec?: ExecFileFn;
  /** Kill a helper process after this many milliseconds. Default 1500. */
  commandTimeoutMs?: number;
}

const MISSING_WINDOW = /BadWindow|Cannot find|No such window|not found/i;

function errorText(error: unknown): string {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string' && error.stderr.trim()) {
    return `${error.stderr.trim()} (${error.message})`;
  }
  return describeError(error);
}

export class X11WindowSystem implements WindowSource, CommandSink {
  private readonly exec: ExecFileFn;
  private rootRead: Promise<RootProperties> | undefined;

  constructor(options: X11WindowSystemOptions = {}) {
    const timeout = options.commandTimeoutMs ?? 1500;
    this.exec = options.exec ?? (async (file, args) => execFileAsync(file, [...args], {encoding: 'utf8', timeout}));
  }

  // ---- WindowSource ----

  async listWindows(): Promise<readonly WindowInfo[]> {
    const [root, listing] = await Promise.all([this.readRoot(), this.run('wmctrl', ['-lGx'])]);
    const listed = parseWmctrlList(listing);

    const rank = new Map<WindowId, number>();
    [...root.stacking].reverse().forEach((id, index) => rank.set(id, index));
    const ordered = [...listed].sort((a, b) =>
      (rank.get(a.id) ?? Number.MAX_SAFE_INTEGER) - (rank.get(b.id) ?? Number.MAX_SAFE_INTEGER));

    const properties = await Promise.all(ordered.map(window => this.readWindowProperties(window.id)));
    const windows: WindowInfo[] = [];
    ordered.forEach((window, index) => {
      const props = properties[index];
      if (props === undefined) {
        return;
      }
      windows.push({
        id: window.id,
        geometry: frameGeometry(window.geometry, props.frame),
        state: props.state,
        desktop: window.desktop,
        type: props.type,
        active: window.id === root.active,
        title: window.title,
        wmClass: window.wmClass,
      });
    });
    return windows;
  }

  async getViewport(): Promise<Rectangle> {
    const root = await this.readRoot();
    const workarea = root.workareas[root.currentDesktop ?? 0] ?? root.workareas.at(0);
    if (workarea === undefined) {
      throw new SourceUnavailableError('window manager does not publish _NET_WORKAREA');
    }
    return workarea;
  }

  async getCurrentDesktop(): Promise<number | null> {
    return (await this.readRoot()).currentDesktop;
  }

  // ---- CommandSink ----

  /**
   * Apply a command in the order the window manager needs: clear states that pin the geometry, move/resize, set
   * states, then activate. The geometry is converted to client size with the window's current frame extents and
   * size hints, read right before the move.
   *
   * @param command - The command to apply.
   * @param signal - Stops the command between two steps once aborted.
   * @throws StaleReferenceError if the window no longer exists.
   */
  async applyCommand(command: Command, signal?: AbortSignal): Promise<void> {
    const id = command.windowId;
    const unset = command.state?.unset ?? [];
    const set = command.state?.set ?? [];

    const steps: Array<() => Promise<unknown>> = [];
    for (const argument of wmctrlStateArguments('remove', unset)) {
      steps.push(() => this.command('wmctrl', ['-i', '-r', id, '-b', argument], id));
    }
    const {geometry} = command;
    if (geometry) {
      steps.push(async () => {
        const output = await this.command('xprop', ['-id', id, ...GEOMETRY_ATOMS], id);
        if (signal?.aborted) {
          return;
        }
        const {x, y, width, height} = clientGeometry(
          geometry,
          parseFrameExtents(output),
          parseSizeHints(output),
          command.anchor,
        );
        await this.command('wmctrl', ['-i', '-r', id, '-e', `0,${x},${y},${width},${height}`], id);
      });
    }
    for (const argument of wmctrlStateArguments('add', set)) {
      steps.push(() => this.command('wmctrl', ['-i', '-r', id, '-b', argument], id));
    }
    if (set.includes('minimized')) {
      steps.push(() => this.command('xdotool', ['windowminimize', String(Number.parseInt(id, 16))], id));
    }
    if (command.activate || unset.includes('minimized')) {
      steps.push(() => this.command('wmctrl', ['-i', '-a', id], id));
    }

    for (const [index, step] of steps.entries()) {
      if (signal?.aborted) {
        log.debug(`stopping ${describeCommand(command)} after ${index} of ${steps.length} steps, it was replaced`);
        return;
      }
      await step();
    }
  }

  // ---- Helpers ----

  /**
   * Read the root properties once for all concurrent callers; a capture asks for windows, workarea and desktop in
   * parallel.
   */
  private readRoot(): Promise<RootProperties> {
    if (!this.rootRead) {
      this.rootRead = this.run('xprop', ['-root', ...ROOT_ATOMS])
        .then(parseRootProperties)
        .finally(() => {
          this.rootRead = undefined;
        });
    }
    return this.rootRead;
  }

  private async readWindowProperties(id: WindowId): Promise<WindowProperties | undefined> {
    try {
      return parseWindowProperties(await this.run('xprop', ['-id', id, ...WINDOW_ATOMS]));
    } catch (e) {
      log.debug(`skipping window ${id}, properties unreadable: ${errorText(e)}`);
      return undefined;
    }
  }

  private async run(file: string, args: readonly string[]): Promise<string> {
    try {
      const {stdout} = await this.exec(file, args);
      return stdout;
    } catch (e) {
      throw new SourceUnavailableError(`${file} ${args.join(' ')} failed: ${errorText(e)}`, {cause: e});
    }
  }

  /**
   * Run a helper on behalf of a command; missing-window errors become StaleReferenceError.
   */
  private async command(file: string, args: readonly string[], id: WindowId): Promise<string> {
    let result: {stdout: string; stderr: string};
    try {
      result = await this.exec(file, args);
    } catch (e) {
      const text = errorText(e);
      if (MISSING_WINDOW.test(text)) {
        throw new StaleReferenceError(`window ${id} no longer exists`, {cause: e});
      }
      throw new Error(`${file} ${args.join(' ')} failed: ${text}`, {cause: e});
    }
    if (MISSING_WINDOW.test(result.stderr)) {
      throw new StaleReferenceError(`window ${id} no longer exists`);
    }
    return result.stdout;
  }
}
