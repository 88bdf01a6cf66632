/**
 * modules/engine/src/triggers/__tests__/keys.spec.ts
 *
 * @file Tests for key chord parsing and normalization.
 */
import {KeyChordError} from '@common/core/errors.js';
import {describe, expect, it} from 'vitest';
import {normalizeKeyChord, parseKeyChord} from '../keys.js';

describe('parseKeyChord', () => {
  it('splits modifiers and key', () => {
    expect(parseKeyChord('Ctrl-Alt-KP_1')).toEqual({
      modifiers: ['Ctrl', 'Alt'],
      key: 'KP_1',
      canonical: 'Ctrl+Alt+KP_1',
    });
  });

  it('accepts aliases in any case and orders modifiers canonically', () => {
    expect(parseKeyChord('win+SHIFT+control+Left')).toEqual({
      modifiers: ['Ctrl', 'Shift', 'Super'],
      key: 'Left',
      canonical: 'Ctrl+Shift+Super+Left',
    });
  });

  it('lower-cases single-letter keys', () => {
    expect(normalizeKeyChord('Super-Alt-X')).toBe('Alt+Super+x');
    expect(normalizeKeyChord('Q')).toBe('q');
  });

  it('gives equal chords equal canonical text', () => {
    expect(normalizeKeyChord('alt-ctrl-a')).toBe(normalizeKeyChord('Ctrl+Alt+A'));
  });

  it.each([
    ['', 'invalid key chord \'\''],
    ['Ctrl--a', 'invalid key chord \'Ctrl--a\''],
    ['Ctrl-Alt', 'key chord \'Ctrl-Alt\' has no key, only modifiers'],
    ['Hyper-a', 'unknown modifier \'Hyper\' in key chord \'Hyper-a\''],
  ])('rejects %j', (text, message) => {
    expect(() => parseKeyChord(text)).toThrow(KeyChordError);
    expect(() => parseKeyChord(text)).toThrow(message);
  });
});
