/**
 * modules/common/src/filter/expression.ts
 *
 * @file Filter expression tree and its builders. Expressions are immutable: every builder returns a deep-frozen
 * node and never touches its operands.
 */
import type {Rectangle, WindowStateFlag} from '../core/window.js';
import {canonicalJson} from '../core/canonical.js';

/**
 * Window attributes an `equals` or `in-set` leaf can compare.
 */
export const FILTER_ATTRIBUTES = ['id', 'desktop', 'type', 'wmClass', 'title', 'active'] as const;

export type FilterAttribute = typeof FILTER_ATTRIBUTES[number];

export type AttributeValue = string | number | boolean | null;

export type FilterExpression =
  | {readonly kind: 'and'; readonly operands: readonly FilterExpression[]}
  | {readonly kind: 'or'; readonly operands: readonly FilterExpression[]}
  | {readonly kind: 'not'; readonly operand: FilterExpression}
  | {readonly kind: 'equals'; readonly attribute: FilterAttribute; readonly value: AttributeValue}
  | {readonly kind: 'in-set'; readonly attribute: FilterAttribute; readonly values: readonly AttributeValue[]}
  | {readonly kind: 'has-state'; readonly flag: WindowStateFlag}
  | {readonly kind: 'contains-point'; readonly x: number; readonly y: number}
  | {readonly kind: 'intersects'; readonly rect: Readonly<Rectangle>}
  | {readonly kind: 'is-active'}
  | {readonly kind: 'on-current-desktop'}
  | {readonly kind: 'always'};

export type FilterKind = FilterExpression['kind'];

/**
 * Check whether a string names a filter attribute.
 *
 * @param value - Candidate attribute name.
 * @returns True if the value is a FilterAttribute.
 */
export function isFilterAttribute(value: string): value is FilterAttribute {
  return (FILTER_ATTRIBUTES as readonly string[]).includes(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
  }
  return value;
}

/**
 * Frozen operands are shared as they are; anything else is copied first, so the caller's object stays untouched.
 */
function own(expr: FilterExpression): FilterExpression {
  return Object.isFrozen(expr) ? expr : deepFreeze(structuredClone(expr));
}

// ---- Builders ----

export function and(...operands: FilterExpression[]): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'and', operands: operands.map(own)});
}

export function or(...operands: FilterExpression[]): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'or', operands: operands.map(own)});
}

export function not(operand: FilterExpression): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'not', operand: own(operand)});
}

export function equals(attribute: FilterAttribute, value: AttributeValue): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'equals', attribute, value});
}

export function inSet(attribute: FilterAttribute, values: readonly AttributeValue[]): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'in-set', attribute, values: [...values]});
}

export function hasState(flag: WindowStateFlag): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'has-state', flag});
}

export function containsPoint(x: number, y: number): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'contains-point', x, y});
}

export function intersects(rect: Rectangle): FilterExpression {
  const {x, y, width, height} = rect;
  return deepFreeze<FilterExpression>({kind: 'intersects', rect: {x, y, width, height}});
}

export function isActive(): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'is-active'});
}

export function onCurrentDesktop(): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'on-current-desktop'});
}

export function always(): FilterExpression {
  return deepFreeze<FilterExpression>({kind: 'always'});
}

// ---- Canonical key ----

const keyCache = new WeakMap<FilterExpression, string>();

/**
 * Structural identity of a filter. Two expressions built separately but with the same shape share a key, which is
 * what the cycle state is stored under.
 *
 * @param expr - The filter expression.
 * @returns The canonical key.
 */
export function filterKey(expr: FilterExpression): string {
  const cached = keyCache.get(expr);
  if (cached !== undefined) {
    return cached;
  }
  const key = canonicalJson(expr);
  keyCache.set(expr, key);
  return key;
}
