/**
 * modules/engine/src/config/loadConfig.ts
 *
 * @file Loads and validates the configuration file, resolves filter presets and builds the key binding table.
 * Every problem is reported before the engine starts; nothing is reloaded at run time.
 */
import type {ActionRequest, GridTarget} from '@common/actions/types.js';
import type {GridSpec} from '@common/core/geometry.js';
import type {LogLevelName} from '@common/logging.js';
import type {FilterExpression} from '@common/filter/expression.js';
import type {ActionJson, FilterJson} from './schema.js';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import {ConfigError, describeError} from '@common/core/errors.js';
import {
  always,
  and,
  containsPoint,
  equals,
  hasState,
  inSet,
  intersects,
  isActive,
  not,
  onCurrentDesktop,
  or,
} from '@common/filter/expression.js';
import {getLogger} from '../logging/index.js';
import {KeyBindingTable} from '../triggers/KeyBindingTable.js';
import {readTextFile} from '../utils/file-utils.js';
import {ConfigSchema} from './schema.js';

const log = getLogger('engine.config');

export interface EngineConfig {
  grid: GridSpec;
  spanGrow: boolean;
  dispatch: {awaitConfirmation: boolean; captureTimeoutMs: number};
  x11: {pollIntervalMs: number; geometryDebounceMs: number; commandTimeoutMs: number};
  logging: {level: LogLevelName; directory?: string};
  /** Resolved filter presets by name. */
  filters: ReadonlyMap<string, FilterExpression>;
  bindings: KeyBindingTable;
}

/**
 * Where the configuration file is looked up: `TILEWRIGHT_CONFIG`, else `$XDG_CONFIG_HOME/tilewright/config.json`,
 * else `~/.config/tilewright/config.json`.
 *
 * @param env - Environment to read.
 * @returns The path and whether it was set explicitly.
 */
export function configPath(env: NodeJS.ProcessEnv = process.env): {path: string; explicit: boolean} {
  if (env.TILEWRIGHT_CONFIG) {
    return {path: env.TILEWRIGHT_CONFIG, explicit: true};
  }
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return {path: path.join(base, 'tilewright', 'config.json'), explicit: false};
}

// ---- Filters ----

class PresetResolver {
  private readonly resolved = new Map<string, FilterExpression>();

  constructor(private readonly definitions: Readonly<Record<string, FilterJson>>) {}

  all(): Map<string, FilterExpression> {
    for (const name of Object.keys(this.definitions)) {
      this.preset(name, []);
    }
    return new Map(this.resolved);
  }

  filter(json: FilterJson, chain: readonly string[]): FilterExpression {
    if (json === 'active') {
      return isActive();
    }
    if (json === 'currentDesktop') {
      return onCurrentDesktop();
    }
    if (json === 'always') {
      return always();
    }
    if ('and' in json) {
      return and(...json.and.map(operand => this.filter(operand, chain)));
    }
    if ('or' in json) {
      return or(...json.or.map(operand => this.filter(operand, chain)));
    }
    if ('not' in json) {
      return not(this.filter(json.not, chain));
    }
    if ('equals' in json) {
      return equals(json.equals.attribute, json.equals.value);
    }
    if ('inSet' in json) {
      return inSet(json.inSet.attribute, json.inSet.values);
    }
    if ('hasState' in json) {
      return hasState(json.hasState);
    }
    if ('containsPoint' in json) {
      return containsPoint(json.containsPoint.x, json.containsPoint.y);
    }
    if ('intersects' in json) {
      return intersects(json.intersects);
    }
    return this.preset(json.preset, chain);
  }

  preset(name: string, chain: readonly string[]): FilterExpression {
    const done = this.resolved.get(name);
    if (done) {
      return done;
    }
    if (chain.includes(name)) {
      throw new ConfigError('filter presets refer to each other in a cycle', [[...chain, name].join(' -> ')]);
    }
    const definition = this.definitions[name];
    if (definition === undefined) {
      const from = chain.length > 0 ? ` (referenced by '${chain[chain.length - 1]}')` : '';
      throw new ConfigError(`unknown filter preset '${name}'${from}`);
    }
    const expr = this.filter(definition, [...chain, name]);
    this.resolved.set(name, expr);
    return expr;
  }
}

// ---- Actions ----

function toGridTarget(cell: Extract<ActionJson, {kind: 'grid-put'}>['cell']): GridTarget {
  if ('direction' in cell) {
    return {mode: 'relative', direction: cell.direction};
  }
  return {mode: 'absolute', ...cell};
}

/**
 * A target is a preset name or an inline filter. The bare leaf names win over presets of the same name; without a
 * target an action applies to the active window.
 */
function resolveTarget(target: string | FilterJson | undefined, presets: PresetResolver): FilterExpression {
  if (target === undefined) {
    return isActive();
  }
  if (target === 'active' || target === 'currentDesktop' || target === 'always') {
    return presets.filter(target, []);
  }
  if (typeof target === 'string') {
    return presets.preset(target, []);
  }
  return presets.filter(target, []);
}

function toActionRequest(json: ActionJson, presets: PresetResolver): ActionRequest {
  const target = resolveTarget(json.target, presets);

  switch (json.kind) {
    case 'cycle':
      return {kind: 'cycle', direction: json.direction, target};
    case 'grid-put':
      return {
        kind: 'grid-put',
        cell: toGridTarget(json.cell),
        target,
        ...(json.grid === undefined ? {} : {grid: json.grid}),
        ...(json.spanGrow === undefined ? {} : {spanGrow: json.spanGrow}),
      };
    case 'move':
      return {kind: 'move', dx: json.dx, dy: json.dy, unit: json.unit, target};
    case 'resize':
      return {kind: 'resize', edge: json.edge, delta: json.delta, unit: json.unit, target};
    case 'toggle-state':
      return {kind: 'toggle-state', flag: json.flag, target};
    case 'place':
      return {kind: 'place', placement: json.placement, target};
  }
}

// ---- Loading ----

/**
 * Validate parsed JSON and build the engine configuration.
 *
 * @param json - The parsed file content.
 * @param origin - File name used in error messages.
 * @returns The configuration.
 * @throws ConfigError listing every schema violation, or naming the broken preset or binding.
 */
export function parseConfig(json: unknown, origin: string = 'configuration'): EngineConfig {
  const result = ConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`invalid ${origin}`, issues);
  }
  const config = result.data;
  const presets = new PresetResolver(config.filters);
  const filters = presets.all();

  const entries: [string, ActionRequest][] = [];
  for (const [chord, action] of Object.entries(config.bindings)) {
    try {
      entries.push([chord, toActionRequest(action, presets)]);
    } catch (e) {
      if (e instanceof ConfigError) {
        throw new ConfigError(`invalid binding '${chord}' in ${origin}: ${e.message}`, e.issues, {cause: e});
      }
      throw e;
    }
  }

  let bindings: KeyBindingTable;
  try {
    bindings = new KeyBindingTable(entries);
  } catch (e) {
    if (e instanceof ConfigError) {
      throw e;
    }
    throw new ConfigError(`invalid key binding in ${origin}`, [describeError(e)], {cause: e});
  }

  return {
    grid: config.grid,
    spanGrow: config.spanGrow,
    dispatch: config.dispatch,
    x11: config.x11,
    logging: config.logging,
    filters,
    bindings,
  };
}

/**
 * Read the configuration file. A missing file at the default location yields the defaults without bindings; a
 * missing file named by `TILEWRIGHT_CONFIG` or the caller is an error.
 *
 * @param file - Explicit file path; defaults to {@link configPath}.
 * @returns The configuration.
 * @throws ConfigError if the file is unreadable, not JSON or invalid.
 */
export async function loadConfig(file?: string): Promise<EngineConfig> {
  const location = file === undefined ? configPath() : {path: file, explicit: true};
  let text: string | undefined;
  try {
    text = await readTextFile(location.path);
  } catch (e) {
    throw new ConfigError(`cannot read ${location.path}: ${describeError(e)}`, [], {cause: e});
  }
  if (text === undefined) {
    if (location.explicit) {
      throw new ConfigError(`configuration file ${location.path} does not exist`);
    }
    log.info(`no configuration at ${location.path}, using defaults`);
    return parseConfig({}, 'default configuration');
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`${location.path} is not valid JSON: ${describeError(e)}`, [], {cause: e});
  }
  const config = parseConfig(json, location.path);
  log.debug(`loaded ${location.path}: ${config.bindings.size} bindings, ${config.filters.size} filter presets`);
  return config;
}
