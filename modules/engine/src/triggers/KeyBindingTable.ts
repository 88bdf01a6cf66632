/**
 * modules/engine/src/triggers/KeyBindingTable.ts
 *
 * @file Maps key chords to the action requests they trigger.
 */
import type {ActionRequest} from '@common/actions/types.js';
import {ConfigError} from '@common/core/errors.js';
import {normalizeKeyChord} from './keys.js';

export class KeyBindingTable {
  private readonly bindings = new Map<string, ActionRequest>();

  /**
   * @param entries - Chord text and request pairs.
   * @throws KeyChordError for an unparseable chord.
   * @throws ConfigError if two chords are the same after normalization.
   */
  constructor(entries: Iterable<readonly [string, ActionRequest]> = []) {
    for (const [chord, request] of entries) {
      const canonical = normalizeKeyChord(chord);
      if (this.bindings.has(canonical)) {
        throw new ConfigError(`duplicate key binding '${chord}'`, [`'${chord}' is the same chord as ${canonical}`]);
      }
      this.bindings.set(canonical, request);
    }
  }

  /**
   * @param chord - Chord text in any accepted spelling.
   * @returns The bound request, or undefined for unbound chords.
   * @throws KeyChordError if the chord cannot be parsed.
   */
  lookup(chord: string): ActionRequest | undefined {
    return this.bindings.get(normalizeKeyChord(chord));
  }

  /** Canonical chords in binding order. */
  get chords(): readonly string[] {
    return [...this.bindings.keys()];
  }

  get size(): number {
    return this.bindings.size;
  }
}
