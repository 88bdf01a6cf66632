/**
 * modules/engine/src/snapshot/capture.ts
 *
 * @file Builds the frozen snapshot set a dispatch resolves against. Everything is read fresh from the window source
 * on every call; nothing is cached between dispatches.
 */
import type {Rectangle, SnapshotSet, WindowInfo, WindowSnapshot} from '@common/core/window.js';
import type {WindowSource} from '../windowing/types.js';
import {describeError, SourceUnavailableError} from '@common/core/errors.js';
import {withTimeout} from '@common/utils.js';
import {getLogger} from '../logging/index.js';

const log = getLogger('engine.snapshot');

export const DEFAULT_CAPTURE_TIMEOUT_MS = 2000;

export interface CaptureOptions {
  timeoutMs?: number;
  now?: () => number;
}

function freezeSnapshot(info: WindowInfo): WindowSnapshot {
  const {x, y, width, height} = info.geometry;
  const snapshot: WindowSnapshot = {
    id: info.id,
    geometry: Object.freeze({x, y, width, height}),
    state: new Set(info.state),
    desktop: info.desktop,
    type: info.type,
    active: info.active,
    ...(info.title === undefined ? {} : {title: info.title}),
    ...(info.wmClass === undefined ? {} : {wmClass: info.wmClass}),
  };
  return Object.freeze(snapshot);
}

function isUsable(rect: Rectangle): boolean {
  return Number.isFinite(rect.x) && Number.isFinite(rect.y) && rect.width > 0 && rect.height > 0;
}

/**
 * Read windows, workarea and current desktop from the source and freeze them. Window order is kept.
 *
 * @param source - The window system to read from.
 * @param options - Timeout and clock.
 * @returns The snapshot set.
 * @throws SourceUnavailableError if the source fails, answers too late or reports an unusable workarea.
 */
export async function captureSnapshots(source: WindowSource, options: CaptureOptions = {}): Promise<SnapshotSet> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CAPTURE_TIMEOUT_MS;
  const now = options.now ?? Date.now;

  let raw: [readonly WindowInfo[], Rectangle, number | null];
  try {
    raw = await withTimeout(
      Promise.all([source.listWindows(), source.getViewport(), source.getCurrentDesktop()]),
      timeoutMs,
      () => new SourceUnavailableError(`window source did not answer within ${timeoutMs} ms`),
    );
  } catch (e) {
    if (e instanceof SourceUnavailableError) {
      throw e;
    }
    throw new SourceUnavailableError(`window source failed: ${describeError(e)}`, {cause: e});
  }

  const [infos, viewport, currentDesktop] = raw;
  if (!isUsable(viewport)) {
    throw new SourceUnavailableError(
      `window source reported an unusable workarea ${viewport.width}x${viewport.height}`,
    );
  }

  const seen = new Set<string>();
  const windows: WindowSnapshot[] = [];
  for (const info of infos) {
    if (!isUsable(info.geometry)) {
      log.debug(`skipping window ${info.id} without area (${info.geometry.width}x${info.geometry.height})`);
      continue;
    }
    if (seen.has(info.id)) {
      log.warn(`window source listed ${info.id} twice; keeping the upper one`);
      continue;
    }
    seen.add(info.id);
    windows.push(freezeSnapshot(info));
  }

  return Object.freeze({
    windows: Object.freeze(windows),
    viewport: Object.freeze({x: viewport.x, y: viewport.y, width: viewport.width, height: viewport.height}),
    currentDesktop,
    capturedAt: now(),
  });
}
