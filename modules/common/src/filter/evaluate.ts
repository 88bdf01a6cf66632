/**
 * modules/common/src/filter/evaluate.ts
 *
 * @file Evaluation of filter expressions against window snapshots. Evaluation is total: an unknown node or a
 * missing attribute yields false instead of throwing.
 */
import type {WindowSnapshot} from '../core/window.js';
import type {AttributeValue, FilterAttribute, FilterExpression} from './expression.js';
import {containsPoint, overlapArea} from '../core/geometry.js';

/**
 * Ambient values some leaves need.
 */
export interface FilterContext {
  currentDesktop?: number | null;
}

function readAttribute(window: WindowSnapshot, attribute: FilterAttribute): AttributeValue | undefined {
  switch (attribute) {
    case 'id':
      return window.id;
    case 'desktop':
      return window.desktop;
    case 'type':
      return window.type;
    case 'wmClass':
      return window.wmClass;
    case 'title':
      return window.title;
    case 'active':
      return window.active;
    default:
      return undefined;
  }
}

/**
 * Evaluate a filter against one window.
 *
 * @param expr - The filter expression.
 * @param window - The window snapshot.
 * @param context - Optional ambient values (current desktop).
 * @returns True if the window matches.
 */
export function evaluate(expr: FilterExpression, window: WindowSnapshot, context?: FilterContext): boolean {
  switch (expr.kind) {
    case 'and':
      return expr.operands.every(operand => evaluate(operand, window, context));
    case 'or':
      return expr.operands.some(operand => evaluate(operand, window, context));
    case 'not':
      return !evaluate(expr.operand, window, context);
    case 'equals': {
      const actual = readAttribute(window, expr.attribute);
      return actual !== undefined && actual === expr.value;
    }
    case 'in-set': {
      const actual = readAttribute(window, expr.attribute);
      return actual !== undefined && expr.values.includes(actual);
    }
    case 'has-state':
      return window.state.has(expr.flag);
    case 'contains-point':
      return containsPoint(window.geometry, expr.x, expr.y);
    case 'intersects':
      return overlapArea(window.geometry, expr.rect) > 0;
    case 'is-active':
      return window.active;
    case 'on-current-desktop':
      if (context?.currentDesktop === undefined) {
        return false;
      }
      return window.desktop === null || window.desktop === context.currentDesktop;
    case 'always':
      return true;
    default:
      return false;
  }
}

/**
 * All windows matching a filter, in input order.
 *
 * @param expr - The filter expression.
 * @param windows - Candidate windows.
 * @param context - Optional ambient values.
 * @returns The matching windows.
 */
export function select(
  expr: FilterExpression,
  windows: readonly WindowSnapshot[],
  context?: FilterContext,
): readonly WindowSnapshot[] {
  return windows.filter(window => evaluate(expr, window, context));
}
