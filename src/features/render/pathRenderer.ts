/**
 * Path rendering
 *
 * Draws a walk as a character grid, one character per cell. Row 0 is the
 * top line, so `y` grows downward as in the walk itself. Each visited cell
 * gets a box-drawing glyph joining it to the neighbours the path linked it
 * with; `S` marks the start and `E` the current end.
 *
 * Along an axis where the region is longer than the render limit, only a
 * window is drawn: the path's extent plus a one-cell margin, or, when even
 * that is too long, a limit-sized window around the end cell.
 */

import type { BoundedRegion } from '../../core/region/index.js';
import type { Coordinate, DirectionName, WalkStatistics } from '../../core/models/index.js';
import { directionBetween } from '../../core/models/index.js';
import { RenderError } from '../../shared/errors.js';
import { formatCoordinate } from '../../shared/utils/text.js';

export interface RenderOptions {
  /** Frame the grid with `+`, `-` and `|` (default: true) */
  border?: boolean;
  /** Prefix a title line (default: true) */
  title?: boolean;
  /** Character for unvisited cells (default: `·`) */
  emptyCell?: string;
  /** Widest region drawn in full; wider regions are cropped (default: 120) */
  maxColumns?: number;
  /** Tallest region drawn in full; taller regions are cropped (default: 60) */
  maxRows?: number;
}

const DEFAULT_MAX_COLUMNS = 120;
const DEFAULT_MAX_ROWS = 60;
const VIEW_MARGIN = 1;
const START_MARK = 'S';
const END_MARK = 'E';

const LINK_BITS: Record<DirectionName, number> = {
  up: 1,
  down: 2,
  left: 4,
  right: 8,
};

const OPPOSITE: Record<DirectionName, DirectionName> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left',
};

const { up: U, down: D, left: L, right: R } = LINK_BITS;

/** Glyph per link mask */
const GLYPHS: Record<number, string> = {
  0: '•',
  [U]: '│',
  [D]: '│',
  [U | D]: '│',
  [L]: '─',
  [R]: '─',
  [L | R]: '─',
  [D | R]: '┌',
  [D | L]: '┐',
  [U | R]: '└',
  [U | L]: '┘',
  [U | D | R]: '├',
  [U | D | L]: '┤',
  [D | L | R]: '┬',
  [U | L | R]: '┴',
  [U | D | L | R]: '┼',
};

/** Cells drawn along one axis: `[start, start + length)` */
interface AxisWindow {
  start: number;
  length: number;
}

interface Viewport {
  x: AxisWindow;
  y: AxisWindow;
  cropped: boolean;
}

function axisWindow(values: readonly number[], focus: number, size: number, limit: number): AxisWindow {
  if (size <= limit) {
    return { start: 0, length: size };
  }

  const low = values.reduce((min, v) => Math.min(min, v), focus);
  const high = values.reduce((max, v) => Math.max(max, v), focus);
  const start = Math.max(0, low - VIEW_MARGIN);
  const end = Math.min(size - 1, high + VIEW_MARGIN);
  if (end - start + 1 <= limit) {
    return { start, length: end - start + 1 };
  }

  const centred = Math.min(Math.max(0, focus - Math.floor(limit / 2)), size - limit);
  return { start: centred, length: limit };
}

function computeViewport(path: readonly Coordinate[], region: BoundedRegion, options: RenderOptions): Viewport {
  const maxColumns = options.maxColumns ?? DEFAULT_MAX_COLUMNS;
  const maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;
  const focus = path[path.length - 1] ?? region.start;

  const x = axisWindow(path.map((c) => c.x), focus.x, region.width, maxColumns);
  const y = axisWindow(path.map((c) => c.y), focus.y, region.height, maxRows);
  return { x, y, cropped: x.length < region.width || y.length < region.height };
}

function describeViewport(view: Viewport): string {
  const last = (axis: AxisWindow): number => axis.start + axis.length - 1;
  return `View: x ${view.x.start}-${last(view.x)}, y ${view.y.start}-${last(view.y)}`;
}

/**
 * Accumulate link masks for every visited cell, indexed `y * width + x`.
 */
function buildLinkMasks(path: readonly Coordinate[], region: BoundedRegion): Map<number, number> {
  const masks = new Map<number, number>();
  const index = (c: Coordinate): number => c.y * region.width + c.x;

  path.forEach((cell, i) => {
    if (!region.contains(cell)) {
      throw new RenderError(`Path cell ${formatCoordinate(cell)} lies outside the region`);
    }
    if (!masks.has(index(cell))) {
      masks.set(index(cell), 0);
    }
    if (i === 0) return;

    const previous = path[i - 1]!;
    const direction = directionBetween(previous, cell);
    if (!direction) {
      throw new RenderError(
        `Path jumps from ${formatCoordinate(previous)} to ${formatCoordinate(cell)}`,
      );
    }
    const from = index(previous);
    const to = index(cell);
    masks.set(from, (masks.get(from) ?? 0) | LINK_BITS[direction.name]);
    masks.set(to, (masks.get(to) ?? 0) | LINK_BITS[OPPOSITE[direction.name]]);
  });

  return masks;
}

interface Grid {
  lines: string[];
  view: Viewport;
}

function drawGrid(path: readonly Coordinate[], region: BoundedRegion, options: RenderOptions): Grid {
  const masks = buildLinkMasks(path, region);
  const view = computeViewport(path, region, options);
  const emptyCell = options.emptyCell ?? '·';
  const start = path[0];
  const end = path[path.length - 1];

  const rows: string[] = [];
  for (let y = view.y.start; y < view.y.start + view.y.length; y++) {
    let row = '';
    for (let x = view.x.start; x < view.x.start + view.x.length; x++) {
      if (start && start.x === x && start.y === y) {
        row += START_MARK;
      } else if (end && end.x === x && end.y === y) {
        row += END_MARK;
      } else {
        const mask = masks.get(y * region.width + x);
        row += mask === undefined ? emptyCell : GLYPHS[mask] ?? '?';
      }
    }
    rows.push(row);
  }

  if (options.border === false) {
    return { lines: rows, view };
  }
  const edge = `+${'-'.repeat(view.x.length)}+`;
  return { lines: [edge, ...rows.map((row) => `|${row}|`), edge], view };
}

function withTitle(grid: Grid, title: string, options: RenderOptions): string {
  if (options.title === false) {
    return grid.lines.join('\n');
  }
  const fullTitle = grid.view.cropped ? `${title} | ${describeViewport(grid.view)}` : title;
  return [fullTitle, ...grid.lines].join('\n');
}

/**
 * Render the whole recorded path with a statistics title.
 */
export function renderPath(stats: WalkStatistics, region: BoundedRegion, options: RenderOptions = {}): string {
  const title = `Steps: ${stats.stepsTaken} | Blocked: ${stats.blockedAttempts} | Distance: ${stats.euclideanDistance.toFixed(2)}`;
  return withTitle(drawGrid(stats.path, region, options), title, options);
}

/**
 * Render the path as it stood after `frame` steps (clamped to the path;
 * a non-finite frame counts as 0).
 */
export function renderFrame(
  stats: WalkStatistics,
  region: BoundedRegion,
  frame: number,
  options: RenderOptions = {},
): string {
  const lastFrame = stats.path.length - 1;
  const requested = Number.isFinite(frame) ? Math.floor(frame) : 0;
  const clamped = Math.min(Math.max(requested, 0), lastFrame);
  const partial = stats.path.slice(0, clamped + 1);
  const position = partial[partial.length - 1] ?? stats.start;
  const title = `Step ${clamped}/${lastFrame} | Position: ${formatCoordinate(position)}`;
  return withTitle(drawGrid(partial, region, options), title, options);
}

/**
 * Yield one rendered frame per path position, from the start to the end.
 */
export function* pathFrames(
  stats: WalkStatistics,
  region: BoundedRegion,
  options: RenderOptions = {},
): Generator<string, void, undefined> {
  for (let frame = 0; frame < stats.path.length; frame++) {
    yield renderFrame(stats, region, frame, options);
  }
}
