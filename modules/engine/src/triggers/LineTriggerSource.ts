/**
 * modules/engine/src/triggers/LineTriggerSource.ts
 *
 * @file Trigger source reading one chord per line from a stream, optionally prefixed with the millisecond timestamp
 * at which the key binder saw it: `1718000000123 Ctrl-Alt-KP_1`. This is how an external key binder (xbindkeys,
 * sxhkd) or a script talks to the engine.
 */
import type {ActionRequest} from '@common/actions/types.js';
import type {Readable} from 'node:stream';
import type {TriggerListener, TriggerSource} from '../windowing/types.js';
import type {KeyBindingTable} from './KeyBindingTable.js';
import {createInterface} from 'node:readline';
import {describeError} from '@common/core/errors.js';
import {getLogger} from '../logging/index.js';

const log = getLogger('engine.triggers');

export interface ParsedTriggerLine {
  timestamp: number | undefined;
  chord: string;
}

/**
 * Split a trigger line into timestamp and chord.
 *
 * @param line - One input line.
 * @returns The parts, or undefined for blank lines and `#` comments.
 */
export function parseTriggerLine(line: string): ParsedTriggerLine | undefined {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return undefined;
  }
  const m = /^(\d+)\s+(\S.*)$/.exec(trimmed);
  if (m) {
    return {timestamp: Number(m[1]), chord: m[2].trim()};
  }
  return {timestamp: undefined, chord: trimmed};
}

export class LineTriggerSource implements TriggerSource {
  private readonly listeners = new Set<TriggerListener>();
  private readonly finished: Promise<void>;

  constructor(input: Readable, private readonly table: KeyBindingTable, private readonly now: () => number = Date.now) {
    const lines = createInterface({input, crlfDelay: Infinity});
    lines.on('line', line => this.handleLine(line));
    this.finished = new Promise((resolve) => {
      lines.once('close', () => resolve());
    });
  }

  subscribe(listener: TriggerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves when the input stream has ended. */
  get closed(): Promise<void> {
    return this.finished;
  }

  private handleLine(line: string): void {
    const parsed = parseTriggerLine(line);
    if (!parsed) {
      return;
    }
    let request: ActionRequest | undefined;
    try {
      request = this.table.lookup(parsed.chord);
    } catch (e) {
      log.warn(`ignoring trigger line '${line.trim()}': ${describeError(e)}`);
      return;
    }
    if (!request) {
      log.warn(`no binding for '${parsed.chord}'`);
      return;
    }
    const timestamp = parsed.timestamp ?? this.now();
    for (const listener of this.listeners) {
      listener(request, timestamp);
    }
  }
}
