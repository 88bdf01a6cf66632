/**
 * modules/common/src/__tests__/filter.spec.ts
 *
 * @file Tests for filter builders, evaluation, selection and the structural filter key.
 */
import type {FilterExpression} from '../filter/expression.js';
import type {WindowSnapshot, WindowStateFlag} from '../core/window.js';
import {describe, expect, it} from 'vitest';
import {canonicalJson} from '../core/canonical.js';
import {evaluate, select} from '../filter/evaluate.js';
import {
  always,
  and,
  containsPoint,
  equals,
  filterKey,
  hasState,
  inSet,
  intersects,
  isActive,
  not,
  onCurrentDesktop,
  or,
} from '../filter/expression.js';

function snapshot(
  id: string,
  overrides: Partial<Omit<WindowSnapshot, 'state'>> & {state?: WindowStateFlag[]} = {},
): WindowSnapshot {
  const {state, ...rest} = overrides;
  return {
    id,
    geometry: {x: 0, y: 0, width: 400, height: 300},
    desktop: 0,
    type: 'normal',
    active: false,
    ...rest,
    state: new Set(state ?? []),
  };
}

const WINDOWS = [
  snapshot('3', {desktop: 2}),
  snapshot('7', {desktop: 2, active: true, wmClass: 'term.Term'}),
  snapshot('9', {desktop: 1, state: ['sticky']}),
  snapshot('11', {desktop: null, type: 'dock'}),
  snapshot('12', {desktop: 2, geometry: {x: 500, y: 500, width: 100, height: 100}, title: 'Editor'}),
];

describe('evaluate', () => {
  it('selects the active window on desktop 2', () => {
    const expr = and(isActive(), equals('desktop', 2));
    expect(select(expr, WINDOWS).map(window => window.id)).toEqual(['7']);
  });

  it('treats an empty and as true and an empty or as false', () => {
    expect(evaluate(and(), WINDOWS[0])).toBe(true);
    expect(evaluate(or(), WINDOWS[0])).toBe(false);
  });

  it('negates with not', () => {
    expect(select(not(equals('desktop', 2)), WINDOWS).map(window => window.id)).toEqual(['9', '11']);
  });

  it('evaluates missing attributes to false', () => {
    expect(evaluate(equals('title', 'Editor'), WINDOWS[0])).toBe(false);
    expect(evaluate(not(equals('title', 'Editor')), WINDOWS[0])).toBe(true);
    expect(evaluate(equals('title', 'Editor'), WINDOWS[4])).toBe(true);
  });

  it('matches set membership, state flags and types', () => {
    expect(select(inSet('id', ['3', '9', '42']), WINDOWS).map(window => window.id)).toEqual(['3', '9']);
    expect(select(hasState('sticky'), WINDOWS).map(window => window.id)).toEqual(['9']);
    expect(select(equals('type', 'dock'), WINDOWS).map(window => window.id)).toEqual(['11']);
  });

  it('tests points and rectangles against the window geometry', () => {
    expect(select(containsPoint(550, 550), WINDOWS).map(window => window.id)).toEqual(['12']);
    expect(select(intersects({x: 390, y: 290, width: 120, height: 220}), WINDOWS).map(window => window.id))
      .toEqual(['3', '7', '9', '11', '12']);
    expect(select(intersects({x: 400, y: 0, width: 50, height: 50}), WINDOWS)).toEqual([]);
  });

  it('matches windows on the current desktop or on all desktops', () => {
    const context = {currentDesktop: 1};
    expect(select(onCurrentDesktop(), WINDOWS, context).map(window => window.id)).toEqual(['9', '11']);
  });

  it('matches no window on the current desktop without a context', () => {
    expect(select(onCurrentDesktop(), WINDOWS)).toEqual([]);
    expect(evaluate(onCurrentDesktop(), WINDOWS[3], {})).toBe(false);
    expect(select(onCurrentDesktop(), WINDOWS, {currentDesktop: null}).map(window => window.id)).toEqual(['11']);
  });

  it('returns false for unknown node kinds', () => {
    const unknown: FilterExpression = JSON.parse('{"kind":"regex","pattern":".*"}');
    expect(evaluate(unknown, WINDOWS[0])).toBe(false);
  });

  it('keeps the input order in select', () => {
    expect(select(always(), WINDOWS)).toEqual(WINDOWS);
  });
});

describe('builders', () => {
  it('return frozen trees', () => {
    const expr = and(isActive(), inSet('desktop', [1, 2]));
    expect(Object.isFrozen(expr)).toBe(true);
    if (expr.kind === 'and') {
      expect(Object.isFrozen(expr.operands)).toBe(true);
      expect(Object.isFrozen(expr.operands[1])).toBe(true);
    }
  });

  it('do not freeze or change operands they did not build', () => {
    const operand: FilterExpression = {kind: 'equals', attribute: 'desktop', value: 1};
    const expr = or(operand, isActive());
    expect(Object.isFrozen(operand)).toBe(false);
    expect(operand).toEqual({kind: 'equals', attribute: 'desktop', value: 1});
    expect(evaluate(expr, WINDOWS[2])).toBe(true);
  });
});

describe('filterKey', () => {
  it('is equal for structurally equal filters', () => {
    const a = and(isActive(), equals('desktop', 2));
    const b = and(isActive(), equals('desktop', 2));
    expect(a).not.toBe(b);
    expect(filterKey(a)).toBe(filterKey(b));
  });

  it('differs for different filters', () => {
    expect(filterKey(equals('desktop', 2))).not.toBe(filterKey(equals('desktop', 3)));
    expect(filterKey(and(isActive(), always()))).not.toBe(filterKey(and(always(), isActive())));
  });

  it('does not depend on key order', () => {
    expect(filterKey({kind: 'contains-point', y: 2, x: 1})).toBe(filterKey(containsPoint(1, 2)));
  });
});

describe('canonicalJson', () => {
  it('sorts keys and skips undefined members', () => {
    expect(canonicalJson({b: 1, a: [true, null, 'x'], c: undefined})).toBe('{"a":[true,null,"x"],"b":1}');
  });
});
