/**
 * modules/engine/src/resolver/RestoreGeometryTable.ts
 *
 * @file Geometry a window had before it was maximized or made fullscreen, keyed by window id.
 */
import type {Rectangle, WindowId} from '@common/core/window.js';

export interface RestoreGeometryReader {
  get(id: WindowId): Readonly<Rectangle> | undefined;
}

export class RestoreGeometryTable implements RestoreGeometryReader {
  private readonly entries = new Map<WindowId, Readonly<Rectangle>>();

  get(id: WindowId): Readonly<Rectangle> | undefined {
    return this.entries.get(id);
  }

  save(id: WindowId, geometry: Rectangle): void {
    this.entries.set(id, Object.freeze({x: geometry.x, y: geometry.y, width: geometry.width, height: geometry.height}));
  }

  /**
   * @returns True if an entry was removed.
   */
  clear(id: WindowId): boolean {
    return this.entries.delete(id);
  }

  retainOnly(present: ReadonlySet<WindowId>): number {
    let removed = 0;
    for (const id of [...this.entries.keys()]) {
      if (!present.has(id)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
