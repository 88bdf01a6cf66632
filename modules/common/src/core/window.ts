/**
 * modules/common/src/core/window.ts
 *
 * @file Shared window/workarea geometry and per-window state types.
 */

/**
 * Axis-aligned rectangle in desktop pixel coordinates describing a window, a grid cell or a workarea.
 */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Opaque window identifier, stable for the lifetime of the window (the X11 adapter uses the hex window id).
 */
export type WindowId = string;

/**
 * State flags a window can carry. `above` is the keep-above hint.
 */
export const WINDOW_STATE_FLAGS = [
  'maximized-horizontal',
  'maximized-vertical',
  'fullscreen',
  'sticky',
  'shaded',
  'minimized',
  'above',
] as const;

export type WindowStateFlag = typeof WINDOW_STATE_FLAGS[number];

/**
 * Flags that change window geometry when toggled.
 */
export const GEOMETRY_FLAGS: ReadonlySet<WindowStateFlag> = new Set<WindowStateFlag>([
  'maximized-horizontal',
  'maximized-vertical',
  'fullscreen',
]);

/**
 * Window type classes, following the EWMH `_NET_WM_WINDOW_TYPE` values the engine cares about.
 */
export const WINDOW_TYPES = ['normal', 'dialog', 'utility', 'toolbar', 'menu', 'splash', 'dock', 'desktop'] as const;

export type WindowType = typeof WINDOW_TYPES[number];

/**
 * Raw window description as delivered by a window source, before it is frozen into a snapshot.
 */
export interface WindowInfo {
  id: WindowId;
  geometry: Rectangle;
  state: Iterable<WindowStateFlag>;
  /** Desktop index, or null for windows shown on all desktops. */
  desktop: number | null;
  type: WindowType;
  active: boolean;
  title?: string;
  wmClass?: string;
}

/**
 * Read-only record of one window captured at dispatch time. Never mutated; a later capture replaces it.
 */
export interface WindowSnapshot {
  readonly id: WindowId;
  readonly geometry: Readonly<Rectangle>;
  readonly state: ReadonlySet<WindowStateFlag>;
  readonly desktop: number | null;
  readonly type: WindowType;
  readonly active: boolean;
  readonly title?: string;
  readonly wmClass?: string;
}

/**
 * Everything one dispatch resolves against: the windows in stacking order (topmost first), the workarea and the
 * current desktop.
 */
export interface SnapshotSet {
  readonly windows: readonly WindowSnapshot[];
  readonly viewport: Readonly<Rectangle>;
  readonly currentDesktop: number | null;
  readonly capturedAt: number;
}

/**
 * Check whether a string names a known window state flag.
 *
 * @param value - Candidate flag name.
 * @returns True if the value is a WindowStateFlag.
 */
export function isWindowStateFlag(value: string): value is WindowStateFlag {
  return (WINDOW_STATE_FLAGS as readonly string[]).includes(value);
}

/**
 * Check whether a string names a known window type.
 *
 * @param value - Candidate type name.
 * @returns True if the value is a WindowType.
 */
export function isWindowType(value: string): value is WindowType {
  return (WINDOW_TYPES as readonly string[]).includes(value);
}

/**
 * Look up a window in a snapshot set by id.
 *
 * @param snapshots - The captured snapshot set.
 * @param id - The window id to find.
 * @returns The snapshot, or undefined if the window is not present.
 */
export function findWindow(snapshots: SnapshotSet, id: WindowId): WindowSnapshot | undefined {
  return snapshots.windows.find(window => window.id === id);
}
