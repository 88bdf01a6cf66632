/**
 * modules/engine/src/triggers/keys.ts
 *
 * @file Key chord parsing. A chord is any number of modifiers and one key, separated by `-` or `+`, e.g.
 * `Ctrl-Alt-KP_1` or `super+Left`. Modifier names are case-insensitive; single-letter keys are lower-cased (use
 * Shift for upper case), longer key names keep their case.
 */
import {KeyChordError} from '@common/core/errors.js';

export const MODIFIERS = ['Ctrl', 'Alt', 'Shift', 'Super'] as const;

export type Modifier = typeof MODIFIERS[number];

const MODIFIER_ALIASES: Record<string, Modifier> = {
  alt: 'Alt',
  ctrl: 'Ctrl',
  control: 'Ctrl',
  shift: 'Shift',
  super: 'Super',
  win: 'Super',
};

export interface KeyChord {
  /** In canonical order: Ctrl, Alt, Shift, Super. */
  modifiers: readonly Modifier[];
  key: string;
  /** Canonical text, e.g. `Ctrl+Alt+KP_1`. Equal chords have equal canonical text. */
  canonical: string;
}

/**
 * Parse a key chord.
 *
 * @param text - Chord text such as `Ctrl-Alt-KP_1`.
 * @returns The parsed chord.
 * @throws KeyChordError for empty parts, unknown modifiers or a chord without a key.
 */
export function parseKeyChord(text: string): KeyChord {
  const trimmed = text.trim();
  const parts = trimmed.split(/[-+]/);
  if (trimmed === '' || parts.some(part => part.trim() === '')) {
    throw new KeyChordError(`invalid key chord '${text}'`);
  }
  const rawKey = parts[parts.length - 1].trim();
  if (MODIFIER_ALIASES[rawKey.toLowerCase()] !== undefined) {
    throw new KeyChordError(`key chord '${text}' has no key, only modifiers`);
  }

  const found = new Set<Modifier>();
  for (const part of parts.slice(0, -1)) {
    const modifier = MODIFIER_ALIASES[part.trim().toLowerCase()];
    if (modifier === undefined) {
      throw new KeyChordError(`unknown modifier '${part.trim()}' in key chord '${text}'`);
    }
    found.add(modifier);
  }

  const modifiers = MODIFIERS.filter(modifier => found.has(modifier));
  const key = rawKey.length === 1 ? rawKey.toLowerCase() : rawKey;
  return {modifiers, key, canonical: [...modifiers, key].join('+')};
}

/**
 * Canonical text of a chord.
 *
 * @param text - Chord text in any accepted spelling.
 * @returns The canonical text.
 * @throws KeyChordError if the chord cannot be parsed.
 */
export function normalizeKeyChord(text: string): string {
  return parseKeyChord(text).canonical;
}
