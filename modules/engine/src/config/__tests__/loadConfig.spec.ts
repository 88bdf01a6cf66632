/**
 * modules/engine/src/config/__tests__/loadConfig.spec.ts
 *
 * @file Tests for configuration validation, preset resolution and file loading.
 */
import {ConfigError} from '@common/core/errors.js';
import {always, and, equals, hasState, isActive, onCurrentDesktop} from '@common/filter/expression.js';
import {mkdtemp, rm, writeFile} from 'node:fs/promises';
import {tmpdir} from 'node:os';
import path from 'node:path';
import {fileURLToPath} from 'node:url';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

vi.mock('../../logging/index.js', () => ({
  getLogger: () => ({debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn()}),
}));

const {configPath, loadConfig, parseConfig} = await import('../loadConfig.js');

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) {
      return e;
    }
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('parseConfig', () => {
  it('fills in defaults for an empty configuration', () => {
    const config = parseConfig({});

    expect(config.grid).toEqual({columns: 2, rows: 2, gaps: 0});
    expect(config.spanGrow).toBe(true);
    expect(config.dispatch).toEqual({awaitConfirmation: false, captureTimeoutMs: 2000});
    expect(config.x11).toEqual({pollIntervalMs: 250, geometryDebounceMs: 500, commandTimeoutMs: 1500});
    expect(config.logging).toEqual({level: 'INFO'});
    expect(config.filters.size).toBe(0);
    expect(config.bindings.size).toBe(0);
  });

  it('turns bindings into action requests', () => {
    const config = parseConfig({
      grid: {columns: 3, rows: 2, gaps: 8},
      filters: {
        terminals: {equals: {attribute: 'wmClass', value: 'term.Term'}},
        here: {and: [{preset: 'terminals'}, 'currentDesktop']},
      },
      bindings: {
        'Super-t': {kind: 'cycle', target: 'here'},
        'Super-Left': {kind: 'grid-put', cell: {direction: 'left'}},
        'Super-1': {kind: 'grid-put', cell: {col: 0, row: 0}, spanGrow: false, target: 'always'},
        'Super-m': {kind: 'move', dx: 1, unit: 'grid'},
        'Super-p': {kind: 'place', placement: {horizontal: 'center', width: '50%'}},
      },
    });

    const here = and(equals('wmClass', 'term.Term'), onCurrentDesktop());
    expect(config.grid).toEqual({columns: 3, rows: 2, gaps: 8});
    expect([...config.filters.keys()]).toEqual(['terminals', 'here']);
    expect(config.filters.get('here')).toEqual(here);
    expect(config.bindings.lookup('Super-t')).toEqual({kind: 'cycle', direction: 'next', target: here});
    expect(config.bindings.lookup('Super-Left')).toEqual({
      kind: 'grid-put',
      cell: {mode: 'relative', direction: 'left'},
      target: isActive(),
    });
    expect(config.bindings.lookup('Super-1')).toEqual({
      kind: 'grid-put',
      cell: {mode: 'absolute', col: 0, row: 0},
      target: always(),
      spanGrow: false,
    });
    expect(config.bindings.lookup('Super-m')).toEqual({kind: 'move', dx: 1, dy: 0, unit: 'grid', target: isActive()});
    expect(config.bindings.lookup('Super-p')).toEqual({
      kind: 'place',
      placement: {horizontal: 'center', width: '50%'},
      target: isActive(),
    });
  });

  it('lists every schema violation with its path', () => {
    const error = configError(() => parseConfig({grid: {columns: 0, rows: 2}, bindings: {a: {kind: 'jump'}}}));

    expect(error.issues.map(issue => issue.split(':')[0])).toEqual(['grid.columns', 'bindings.a.kind']);
    expect(error.message.startsWith('invalid configuration\n  - grid.columns: ')).toBe(true);
  });

  it('rejects a malformed placement offset', () => {
    const error = configError(() => parseConfig({
      bindings: {'Super-p': {kind: 'place', placement: {width: 'half'}}},
    }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith('bindings.Super-p.placement.width: ')).toBe(true);
  });

  it('names the binding that refers to an unknown preset', () => {
    const error = configError(() => parseConfig({bindings: {'Super-x': {kind: 'cycle', target: 'nope'}}}));

    expect(error.message).toBe('invalid binding \'Super-x\' in configuration: unknown filter preset \'nope\'');
  });

  it('rejects presets that refer to each other', () => {
    const error = configError(() => parseConfig({filters: {a: {preset: 'b'}, b: {not: {preset: 'a'}}}}));

    expect(error.issues).toEqual(['a -> b -> a']);
  });

  it('rejects two spellings of the same chord', () => {
    expect(() => parseConfig({
      bindings: {
        'Ctrl-Alt-a': {kind: 'toggle-state', flag: 'maximized'},
        'alt+ctrl+A': {kind: 'toggle-state', flag: 'fullscreen'},
      },
    })).toThrow(ConfigError);
  });

  it('reports an unparseable chord as a configuration problem', () => {
    const error = configError(() => parseConfig({bindings: {'Ctrl-': {kind: 'toggle-state', flag: 'above'}}}));

    expect(error.issues).toEqual(['KeyChordError: invalid key chord \'Ctrl-\'']);
  });
});

describe('configPath', () => {
  it('prefers an explicit path from the environment', () => {
    expect(configPath({TILEWRIGHT_CONFIG: '/etc/tilewright.json'})).toEqual({
      path: '/etc/tilewright.json',
      explicit: true,
    });
  });

  it('falls back to the XDG config directory', () => {
    expect(configPath({XDG_CONFIG_HOME: '/home/test/.cfg'})).toEqual({
      path: '/home/test/.cfg/tilewright/config.json',
      explicit: false,
    });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'tilewright-config-'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, {recursive: true, force: true});
  });

  it('reads and validates a file', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, JSON.stringify({
      spanGrow: false,
      bindings: {'Super-Up': {kind: 'toggle-state', flag: 'maximized'}},
    }));

    const config = await loadConfig(file);

    expect(config.spanGrow).toBe(false);
    expect(config.bindings.chords).toEqual(['Super+Up']);
  });

  it('uses the defaults when the default file does not exist', async () => {
    vi.stubEnv('TILEWRIGHT_CONFIG', '');
    vi.stubEnv('XDG_CONFIG_HOME', dir);

    const config = await loadConfig();

    expect(config.bindings.size).toBe(0);
    expect(config.grid).toEqual({columns: 2, rows: 2, gaps: 0});
  });

  it('accepts the shipped example configuration', async () => {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const example = path.resolve(here, '../../../../../config/tilewright.example.json');

    const config = await loadConfig(example);

    expect(config.grid).toEqual({columns: 2, rows: 2, gaps: 8});
    expect([...config.filters.keys()]).toEqual(['normalHere', 'terminals', 'minimizedHere']);
    expect(config.bindings.size).toBe(24);
    expect(config.bindings.lookup('super+shift+Left')).toEqual({
      kind: 'grid-put',
      cell: {mode: 'relative', direction: 'left'},
      target: isActive(),
      spanGrow: false,
    });
    expect(config.bindings.lookup('super+shift+Down')).toEqual({
      kind: 'toggle-state',
      flag: 'minimized',
      target: and(hasState('minimized'), onCurrentDesktop()),
    });
  });

  it('fails for a missing file that was named explicitly', async () => {
    const file = path.join(dir, 'missing.json');

    await expect(loadConfig(file)).rejects.toThrow(`configuration file ${file} does not exist`);
  });

  it('fails for a file that is not JSON', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, '{grid: 2}');

    const error = await loadConfig(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty('message', expect.stringMatching(/is not valid JSON/));
  });
});
