/**
 * modules/engine/src/x11/__tests__/X11EventWatcher.spec.ts
 *
 * @file Tests for turning window listings into invalidation events.
 */
import type {InvalidationEvent} from '@common/actions/types.js';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {FakeWindowSystem, windowInfo} from '../../__tests__/fixtures.js';

const mocks = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
}));

vi.mock('../../logging/index.js', () => ({
  getLogger: () => ({debug: vi.fn(), info: mocks.info, warn: mocks.warn, error: vi.fn()}),
}));

const {X11EventWatcher} = await import('../X11EventWatcher.js');

function setup() {
  const fake = new FakeWindowSystem([windowInfo('a'), windowInfo('b')]);
  const watcher = new X11EventWatcher(fake, {pollIntervalMs: 100, geometryDebounceMs: 500});
  const events: InvalidationEvent[] = [];
  watcher.on('window-event', event => events.push(event));
  return {fake, watcher, events};
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('X11EventWatcher', () => {
  it('takes the first listing as baseline', async () => {
    const {watcher, events} = setup();

    await watcher.poll();

    expect(events).toEqual([]);
  });

  it('reports created and destroyed windows', async () => {
    const {fake, watcher, events} = setup();
    await watcher.poll();

    fake.remove('a');
    fake.windows.push(windowInfo('c'));
    await watcher.poll();

    expect(events).toEqual([
      {kind: 'created', windowId: 'c'},
      {kind: 'destroyed', windowId: 'a'},
    ]);
  });

  it('reports state and desktop changes right away', async () => {
    const {fake, watcher, events} = setup();
    await watcher.poll();

    fake.windows[0] = windowInfo('a', {state: ['above']});
    fake.windows[1] = windowInfo('b', {desktop: 3});
    await watcher.poll();

    expect(events).toEqual([
      {kind: 'state-changed', windowId: 'a'},
      {kind: 'state-changed', windowId: 'b'},
    ]);
  });

  it('reports a burst of geometry changes once after a quiet period', async () => {
    const {fake, watcher, events} = setup();
    await watcher.poll();

    fake.windows[0] = windowInfo('a', {geometry: {x: 110, y: 100, width: 800, height: 600}});
    await watcher.poll();
    await vi.advanceTimersByTimeAsync(300);
    fake.windows[0] = windowInfo('a', {geometry: {x: 120, y: 100, width: 800, height: 600}});
    await watcher.poll();
    await vi.advanceTimersByTimeAsync(499);
    expect(events).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    expect(events).toEqual([{kind: 'geometry-changed', windowId: 'a'}]);
  });

  it('drops a pending geometry change when the window goes away', async () => {
    const {fake, watcher, events} = setup();
    await watcher.poll();

    fake.windows[0] = windowInfo('a', {geometry: {x: 110, y: 100, width: 800, height: 600}});
    await watcher.poll();
    fake.remove('a');
    await watcher.poll();
    await vi.advanceTimersByTimeAsync(1000);

    expect(events).toEqual([{kind: 'destroyed', windowId: 'a'}]);
  });

  it('polls on an interval while running', async () => {
    const {fake, watcher} = setup();

    watcher.start();
    await vi.advanceTimersByTimeAsync(250);
    expect(watcher.isRunning).toBe(true);
    expect(fake.listCalls).toBe(2);

    watcher.stop();
    await vi.advanceTimersByTimeAsync(500);
    expect(watcher.isRunning).toBe(false);
    expect(fake.listCalls).toBe(2);
  });

  it('warns once while the source keeps failing', async () => {
    const {fake, watcher} = setup();
    fake.failure = new Error('display gone');

    await watcher.poll();
    await watcher.poll();
    fake.failure = undefined;
    await watcher.poll();

    expect(mocks.warn).toHaveBeenCalledTimes(1);
    expect(mocks.warn).toHaveBeenCalledWith('window poll failed: display gone');
    expect(mocks.info).toHaveBeenCalledWith('window source is back');
  });
});
