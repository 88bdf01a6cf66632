/**
 * modules/engine/src/resolver/__tests__/stores.spec.ts
 *
 * @file Tests for the cycle state store and the restore-geometry table.
 */
import {describe, expect, it} from 'vitest';
import {CycleStateStore} from '../CycleStateStore.js';
import {RestoreGeometryTable} from '../RestoreGeometryTable.js';

describe('CycleStateStore', () => {
  it('stores a frozen copy of the order', () => {
    const store = new CycleStateStore();
    const order = ['a', 'b'];
    store.set('k', order, 1);
    order.push('c');
    expect(store.get('k')).toEqual({order: ['a', 'b'], index: 1});
    expect(Object.isFrozen(store.get('k')?.order)).toBe(true);
  });

  it('moves the index of known cycles only', () => {
    const store = new CycleStateStore();
    store.set('k', ['a', 'b'], 0);
    store.setIndex('k', 1);
    store.setIndex('unknown', 1);
    expect(store.get('k')?.index).toBe(1);
    expect(store.get('unknown')).toBeUndefined();
  });

  it('purges every cycle containing a window', () => {
    const store = new CycleStateStore();
    store.set('k1', ['a', 'b'], 0);
    store.set('k2', ['b', 'c'], 0);
    store.set('k3', ['c'], 0);
    expect(store.purgeWindow('b')).toBe(2);
    expect(store.get('k3')).toBeDefined();
    expect(store.size).toBe(1);
  });

  it('keeps only cycles whose windows are all present', () => {
    const store = new CycleStateStore();
    store.set('k1', ['a', 'b'], 0);
    store.set('k2', ['a'], 0);
    expect(store.retainOnly(new Set(['a']))).toBe(1);
    expect(store.get('k2')).toBeDefined();
  });
});

describe('RestoreGeometryTable', () => {
  it('saves a copy and clears it', () => {
    const table = new RestoreGeometryTable();
    const geometry = {x: 1, y: 2, width: 3, height: 4};
    table.save('w', geometry);
    geometry.x = 99;
    expect(table.get('w')).toEqual({x: 1, y: 2, width: 3, height: 4});
    expect(table.clear('w')).toBe(true);
    expect(table.clear('w')).toBe(false);
  });

  it('drops entries of windows that are gone', () => {
    const table = new RestoreGeometryTable();
    table.save('a', {x: 0, y: 0, width: 1, height: 1});
    table.save('b', {x: 0, y: 0, width: 1, height: 1});
    expect(table.retainOnly(new Set(['b']))).toBe(1);
    expect(table.size).toBe(1);
    expect(table.get('a')).toBeUndefined();
  });
});
