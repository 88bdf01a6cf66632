/**
 * modules/engine/src/x11/parsers.ts
 *
 * @file Parsers for the text output of `wmctrl -lGx` and `xprop`, the mapping between EWMH atoms and window
 * state flags, and the conversion between client and frame geometry.
 */
import type {Anchor} from '@common/actions/types.js';
import type {Rectangle, WindowId, WindowStateFlag, WindowType} from '@common/core/window.js';

/**
 * One line of `wmctrl -lGx`.
 */
export interface WmctrlWindow {
  id: WindowId;
  /** null for sticky windows (desktop -1). */
  desktop: number | null;
  geometry: Rectangle;
  wmClass: string;
  title: string;
}

/**
 * Root window properties read with `xprop -root`.
 */
export interface RootProperties {
  /** `_NET_CLIENT_LIST_STACKING`, bottom to top. */
  stacking: WindowId[];
  active: WindowId | null;
  currentDesktop: number | null;
  /** `_NET_WORKAREA`, one rectangle per desktop. */
  workareas: Rectangle[];
}

/**
 * `_NET_FRAME_EXTENTS`: width of the decorations the window manager draws around the client window.
 */
export interface FrameExtents {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export const NO_FRAME: FrameExtents = {left: 0, right: 0, top: 0, bottom: 0};

/**
 * The size constraints of `WM_NORMAL_HINTS`. Sizes are client sizes.
 */
export interface SizeHints {
  minWidth?: number;
  minHeight?: number;
  maxWidth?: number;
  maxHeight?: number;
  widthInc?: number;
  heightInc?: number;
  baseWidth?: number;
  baseHeight?: number;
  /** StaticGravity: the window manager places the client window, not its frame, at the requested position. */
  staticGravity: boolean;
}

export interface WindowProperties {
  state: WindowStateFlag[];
  type: WindowType;
  frame: FrameExtents;
}

export const ROOT_ATOMS = [
  '_NET_CLIENT_LIST_STACKING',
  '_NET_ACTIVE_WINDOW',
  '_NET_CURRENT_DESKTOP',
  '_NET_WORKAREA',
] as const;

export const WINDOW_ATOMS = ['_NET_WM_STATE', '_NET_WM_WINDOW_TYPE', '_NET_FRAME_EXTENTS'] as const;

/** Read before a geometry change. */
export const GEOMETRY_ATOMS = ['_NET_FRAME_EXTENTS', 'WM_NORMAL_HINTS'] as const;

const STATE_ATOMS: Record<string, WindowStateFlag> = {
  _NET_WM_STATE_MAXIMIZED_HORZ: 'maximized-horizontal',
  _NET_WM_STATE_MAXIMIZED_VERT: 'maximized-vertical',
  _NET_WM_STATE_FULLSCREEN: 'fullscreen',
  _NET_WM_STATE_STICKY: 'sticky',
  _NET_WM_STATE_SHADED: 'shaded',
  _NET_WM_STATE_HIDDEN: 'minimized',
  _NET_WM_STATE_ABOVE: 'above',
};

const TYPE_ATOMS: Record<string, WindowType> = {
  _NET_WM_WINDOW_TYPE_NORMAL: 'normal',
  _NET_WM_WINDOW_TYPE_DIALOG: 'dialog',
  _NET_WM_WINDOW_TYPE_UTILITY: 'utility',
  _NET_WM_WINDOW_TYPE_TOOLBAR: 'toolbar',
  _NET_WM_WINDOW_TYPE_MENU: 'menu',
  _NET_WM_WINDOW_TYPE_SPLASH: 'splash',
  _NET_WM_WINDOW_TYPE_DOCK: 'dock',
  _NET_WM_WINDOW_TYPE_DESKTOP: 'desktop',
};

/**
 * `wmctrl -b` property names. `minimized` has none; it is handled with xdotool.
 */
export const WMCTRL_PROPERTIES: Partial<Record<WindowStateFlag, string>> = {
  'maximized-horizontal': 'maximized_horz',
  'maximized-vertical': 'maximized_vert',
  'fullscreen': 'fullscreen',
  'sticky': 'sticky',
  'shaded': 'shaded',
  'above': 'above',
};

/** Desktop number X11 uses for windows shown on every desktop. */
const ALL_DESKTOPS = 0xFFFFFFFF;

/**
 * Bring a hex window id into the zero-padded form wmctrl prints (`0x04600007`), so ids from wmctrl and xprop match.
 *
 * @param raw - Hex id with `0x` prefix.
 * @returns The normalized id, or undefined if the input is not a hex id.
 */
export function normalizeWindowId(raw: string): WindowId | undefined {
  const match = /^0x([0-9a-f]+)$/i.exec(raw.trim());
  if (!match) {
    return undefined;
  }
  return `0x${Number.parseInt(match[1], 16).toString(16).padStart(8, '0')}`;
}

function parseDesktop(value: number): number | null {
  return value < 0 || value === ALL_DESKTOPS ? null : value;
}

const WMCTRL_LINE = /^(0x[0-9a-f]+)\s+(-?\d+)\s+(-?\d+)\s+(-?\d+)\s+(\d+)\s+(\d+)\s+(\S+)\s+\S+\s?(.*)$/i;

/**
 * Parse `wmctrl -lGx`: id, desktop, x, y, width, height, WM_CLASS, host, title. Lines that do not match are skipped.
 *
 * @param stdout - Command output.
 * @returns The listed windows in output order.
 */
export function parseWmctrlList(stdout: string): WmctrlWindow[] {
  const windows: WmctrlWindow[] = [];
  for (const line of stdout.split('\n')) {
    const m = WMCTRL_LINE.exec(line);
    if (!m) {
      continue;
    }
    const id = normalizeWindowId(m[1]);
    if (id === undefined) {
      continue;
    }
    windows.push({
      id,
      desktop: parseDesktop(Number.parseInt(m[2], 10)),
      geometry: {
        x: Number.parseInt(m[3], 10),
        y: Number.parseInt(m[4], 10),
        width: Number.parseInt(m[5], 10),
        height: Number.parseInt(m[6], 10),
      },
      wmClass: m[7],
      title: m[8].trim(),
    });
  }
  return windows;
}

/**
 * Split `xprop` output into property name and raw value. Properties reported as "not found" are left out.
 */
function xpropValues(stdout: string): Map<string, string> {
  const values = new Map<string, string>();
  for (const line of stdout.split('\n')) {
    const m = /^(\w+)\([^)]*\)\s*(?:=|:)\s*(.*)$/.exec(line.trim());
    if (m) {
      values.set(m[1], m[2].trim());
    }
  }
  return values;
}

function parseWindowList(value: string | undefined): WindowId[] {
  if (value === undefined) {
    return [];
  }
  const list = value.replace(/^window id #\s*/, '');
  return list.split(',')
    .map(item => normalizeWindowId(item))
    .filter((id): id is WindowId => id !== undefined && id !== '0x00000000');
}

function parseCardinals(value: string | undefined): number[] {
  if (value === undefined) {
    return [];
  }
  return value.split(',').map(item => Number.parseInt(item.trim(), 10)).filter(Number.isFinite);
}

/**
 * Parse `xprop -root` output for the atoms in {@link ROOT_ATOMS}.
 *
 * @param stdout - Command output.
 * @returns The root properties; missing properties come back empty or null.
 */
export function parseRootProperties(stdout: string): RootProperties {
  const values = xpropValues(stdout);
  const [active] = parseWindowList(values.get('_NET_ACTIVE_WINDOW'));
  const [desktop] = parseCardinals(values.get('_NET_CURRENT_DESKTOP'));
  const cardinals = parseCardinals(values.get('_NET_WORKAREA'));
  const workareas: Rectangle[] = [];
  for (let i = 0; i + 3 < cardinals.length; i += 4) {
    workareas.push({x: cardinals[i], y: cardinals[i + 1], width: cardinals[i + 2], height: cardinals[i + 3]});
  }
  return {
    stacking: parseWindowList(values.get('_NET_CLIENT_LIST_STACKING')),
    active: active ?? null,
    currentDesktop: desktop === undefined ? null : parseDesktop(desktop),
    workareas,
  };
}

/**
 * Parse the `_NET_FRAME_EXTENTS` line of `xprop -id` output (left, right, top, bottom).
 *
 * @param stdout - Command output.
 * @returns The extents, all zero for an undecorated window or a malformed value.
 */
export function parseFrameExtents(stdout: string): FrameExtents {
  const cardinals = parseCardinals(xpropValues(stdout).get('_NET_FRAME_EXTENTS'));
  if (cardinals.length !== 4 || cardinals.some(value => value < 0)) {
    return NO_FRAME;
  }
  const [left, right, top, bottom] = cardinals;
  return {left, right, top, bottom};
}

type SizeHintField = Exclude<keyof SizeHints, 'staticGravity'>;

const SIZE_HINT_LINES: ReadonlyArray<[RegExp, SizeHintField, SizeHintField]> = [
  [/minimum size: (\d+) by (\d+)/, 'minWidth', 'minHeight'],
  [/maximum size: (\d+) by (\d+)/, 'maxWidth', 'maxHeight'],
  [/resize increment: (\d+) by (\d+)/, 'widthInc', 'heightInc'],
  [/base size: (\d+) by (\d+)/, 'baseWidth', 'baseHeight'],
];

/**
 * Parse the indented `WM_NORMAL_HINTS` block of `xprop -id` output. Zero sizes count as unset.
 *
 * @param stdout - Command output.
 * @returns The size hints; no constraints when the block is missing.
 */
export function parseSizeHints(stdout: string): SizeHints {
  const hints: SizeHints = {staticGravity: false};
  let inBlock = false;
  for (const line of stdout.split('\n')) {
    if (/^WM_NORMAL_HINTS\(/.test(line)) {
      inBlock = true;
      continue;
    }
    if (!inBlock) {
      continue;
    }
    if (!/^\s/.test(line)) {
      break;
    }
    if (/window gravity:\s*Static\b/.test(line)) {
      hints.staticGravity = true;
    }
    for (const [pattern, widthKey, heightKey] of SIZE_HINT_LINES) {
      const m = pattern.exec(line);
      if (!m) {
        continue;
      }
      const width = Number.parseInt(m[1], 10);
      const height = Number.parseInt(m[2], 10);
      if (width > 0) {
        hints[widthKey] = width;
      }
      if (height > 0) {
        hints[heightKey] = height;
      }
    }
  }
  return hints;
}

/**
 * Parse `xprop -id <window>` output for the atoms in {@link WINDOW_ATOMS}. Unknown atoms are ignored; a window
 * without a type is `normal`.
 *
 * @param stdout - Command output.
 * @returns State flags, window type and frame extents.
 */
export function parseWindowProperties(stdout: string): WindowProperties {
  const values = xpropValues(stdout);
  const atoms = (name: string) => (values.get(name) ?? '').split(',').map(atom => atom.trim()).filter(Boolean);
  const state = atoms('_NET_WM_STATE')
    .map(atom => STATE_ATOMS[atom])
    .filter((flag): flag is WindowStateFlag => flag !== undefined);
  const type = atoms('_NET_WM_WINDOW_TYPE')
    .map(atom => TYPE_ATOMS[atom])
    .find(candidate => candidate !== undefined);
  return {state, type: type ?? 'normal', frame: parseFrameExtents(stdout)};
}

// ---- Frame geometry ----

/**
 * The outer geometry of a window, decorations included, from the client geometry wmctrl reports.
 *
 * @param client - Client window geometry.
 * @param frame - The window's frame extents.
 * @returns The frame-inclusive geometry.
 */
export function frameGeometry(client: Rectangle, frame: FrameExtents): Rectangle {
  return {
    x: client.x - frame.left,
    y: client.y - frame.top,
    width: client.width + frame.left + frame.right,
    height: client.height + frame.top + frame.bottom,
  };
}

function constrainSize(size: number, min?: number, max?: number, increment?: number, base?: number): number {
  let value = size;
  if (max !== undefined) {
    value = Math.min(value, max);
  }
  if (min !== undefined) {
    value = Math.max(value, min);
  }
  if (increment !== undefined && increment > 1) {
    const origin = base ?? min ?? 0;
    value = origin + Math.floor((value - origin) / increment) * increment;
    if (min !== undefined && value < min) {
      value += increment;
    }
  }
  return Math.max(1, value);
}

/**
 * The `wmctrl -e` geometry that gives a window the requested outer geometry: the frame is taken off the size, the
 * size is fitted to the window's size hints, and a size that had to change is placed around the anchor. Without a
 * base size the minimum size is the origin of the increments.
 *
 * @param outer - Requested geometry, decorations included.
 * @param frame - The window's frame extents.
 * @param hints - The window's size hints.
 * @param anchor - Point of the requested geometry that stays in place. Default top-left.
 * @returns Frame position with client size, or the client position under StaticGravity.
 */
export function clientGeometry(
  outer: Rectangle,
  frame: FrameExtents,
  hints: SizeHints,
  anchor: Anchor = {x: 0, y: 0},
): Rectangle {
  const requestedWidth = Math.max(1, outer.width - frame.left - frame.right);
  const requestedHeight = Math.max(1, outer.height - frame.top - frame.bottom);
  const width = constrainSize(requestedWidth, hints.minWidth, hints.maxWidth, hints.widthInc, hints.baseWidth);
  const height = constrainSize(requestedHeight, hints.minHeight, hints.maxHeight, hints.heightInc, hints.baseHeight);
  let x = outer.x + Math.round((requestedWidth - width) * anchor.x);
  let y = outer.y + Math.round((requestedHeight - height) * anchor.y);
  if (hints.staticGravity) {
    x += frame.left;
    y += frame.top;
  }
  return {x, y, width, height};
}

/**
 * Arguments for `wmctrl -b`, which changes at most two properties per call.
 *
 * @param action - `add` or `remove`.
 * @param flags - Flags to change; flags without a wmctrl property are skipped.
 * @returns One `-b` argument per call.
 */
export function wmctrlStateArguments(action: 'add' | 'remove', flags: readonly WindowStateFlag[]): string[] {
  const properties = flags
    .map(flag => WMCTRL_PROPERTIES[flag])
    .filter((property): property is string => property !== undefined);
  const calls: string[] = [];
  for (let i = 0; i < properties.length; i += 2) {
    calls.push([action, ...properties.slice(i, i + 2)].join(','));
  }
  return calls;
}
