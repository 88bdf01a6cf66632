/**
 * modules/engine/src/snapshot/__tests__/capture.spec.ts
 *
 * @file Tests for snapshot capture.
 */
import {SourceUnavailableError} from '@common/core/errors.js';
import {beforeEach, describe, expect, it, vi} from 'vitest';
import {FakeWindowSystem, SCREEN, windowInfo} from '../../__tests__/fixtures.js';

const mocks = vi.hoisted(() => ({
  debug: vi.fn(),
  warn: vi.fn(),
}));

vi.mock('../../logging/index.js', () => ({
  getLogger: () => ({debug: mocks.debug, info: vi.fn(), warn: mocks.warn, error: vi.fn()}),
}));

const {captureSnapshots} = await import('../capture.js');

beforeEach(() => {
  vi.clearAllMocks();
});

describe('captureSnapshots', () => {
  it('freezes windows, workarea and desktop in stacking order', async () => {
    const fake = new FakeWindowSystem([
      windowInfo('top', {active: true, title: 'Editor', wmClass: 'editor.Editor', state: ['above']}),
      windowInfo('bottom', {desktop: null}),
    ]);
    fake.currentDesktop = 1;

    const snapshots = await captureSnapshots(fake, {now: () => 42});

    expect(snapshots.windows.map(window => window.id)).toEqual(['top', 'bottom']);
    expect(snapshots.windows[0]).toMatchObject({title: 'Editor', wmClass: 'editor.Editor', active: true});
    expect([...snapshots.windows[0].state]).toEqual(['above']);
    expect(snapshots.windows[1].desktop).toBeNull();
    expect(snapshots.windows[1]).not.toHaveProperty('title');
    expect(snapshots.viewport).toEqual(SCREEN);
    expect(snapshots.currentDesktop).toBe(1);
    expect(snapshots.capturedAt).toBe(42);
    expect(Object.isFrozen(snapshots)).toBe(true);
    expect(Object.isFrozen(snapshots.windows)).toBe(true);
    expect(Object.isFrozen(snapshots.windows[0].geometry)).toBe(true);
  });

  it('is not affected by later changes of the source', async () => {
    const fake = new FakeWindowSystem([windowInfo('w')]);

    const snapshots = await captureSnapshots(fake);
    fake.windows[0].geometry.x = 500;

    expect(snapshots.windows[0].geometry.x).toBe(100);
  });

  it('skips windows without area and keeps the first of duplicate ids', async () => {
    const fake = new FakeWindowSystem([
      windowInfo('flat', {geometry: {x: 0, y: 0, width: 300, height: 0}}),
      windowInfo('w', {title: 'upper'}),
      windowInfo('w', {title: 'lower'}),
    ]);

    const snapshots = await captureSnapshots(fake);

    expect(snapshots.windows.map(window => window.title)).toEqual(['upper']);
    expect(mocks.warn).toHaveBeenCalledWith('window source listed w twice; keeping the upper one');
  });

  it('wraps source failures', async () => {
    const fake = new FakeWindowSystem();
    const cause = new Error('connection refused');
    fake.failure = cause;

    const error = await captureSnapshots(fake).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({message: 'window source failed: connection refused', cause});
  });

  it('gives up after the timeout', async () => {
    vi.useFakeTimers();
    try {
      const fake = new FakeWindowSystem();
      fake.hang = true;
      const capture = captureSnapshots(fake, {timeoutMs: 100});
      const assertion = expect(capture).rejects.toThrow('window source did not answer within 100 ms');

      await vi.advanceTimersByTimeAsync(100);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('rejects a workarea without area', async () => {
    const fake = new FakeWindowSystem();
    fake.viewport = {x: 0, y: 0, width: 0, height: 1080};

    await expect(captureSnapshots(fake)).rejects.toThrow('window source reported an unusable workarea 0x1080');
  });
});
