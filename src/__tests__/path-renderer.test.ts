/**
 * Path rendering and replay
 */

import { describe, it, expect, vi } from 'vitest';
import { BoundedRegion } from '../core/region/index.js';
import { WalkEngine, buildStatistics, createInitialState, createSeededRandom } from '../core/walk/index.js';
import type { Coordinate, WalkStatistics } from '../core/models/index.js';
import { pathFrames, playReplay, renderFrame, renderPath } from '../features/render/index.js';
import { runSimulation } from '../features/simulate/index.js';
import { getDefaultWalkConfig } from '../infra/config/index.js';
import { DRAW, createScriptedRandom } from './walk-test-helpers.js';

/** 3x3 loop around the centre: up, right, down, down, left, left, up */
function loopWalk(): { region: BoundedRegion; stats: WalkStatistics } {
  const region = new BoundedRegion({ width: 3, height: 3, start: { x: 1, y: 1 } });
  const engine = new WalkEngine(region, {
    random: createScriptedRandom([
      DRAW.up, DRAW.right, DRAW.down, DRAW.down, DRAW.left, DRAW.left, DRAW.up,
    ]),
  });
  return { region, stats: engine.simulate(7) };
}

function statsForPath(path: Coordinate[]): WalkStatistics {
  const state = createInitialState(path[0] ?? { x: 0, y: 0 });
  state.path = path;
  state.position = path[path.length - 1] ?? state.position;
  state.stepsTaken = path.length - 1;
  return buildStatistics(state.path[0] ?? state.position, state);
}

describe('renderPath', () => {
  it('should draw the path with joined glyphs inside a border', () => {
    const { region, stats } = loopWalk();

    expect(renderPath(stats, region).split('\n')).toEqual([
      'Steps: 7 | Blocked: 0 | Distance: 1.00',
      '+---+',
      '|·┌┐|',
      '|ES│|',
      '|└─┘|',
      '+---+',
    ]);
  });

  it('should honour border, title and empty-cell options', () => {
    const { region, stats } = loopWalk();

    expect(renderPath(stats, region, { border: false, title: false, emptyCell: ' ' })).toBe(
      ' ┌┐\nES│\n└─┘',
    );
  });

  it('should draw a walk that has not moved as its start mark', () => {
    const region = new BoundedRegion({ width: 1, height: 1 });

    expect(renderPath(statsForPath([{ x: 0, y: 0 }]), region, { title: false })).toBe('+-+\n|S|\n+-+');
  });

  it('should keep the start mark when the walk ends on it', () => {
    const region = new BoundedRegion({ width: 2, height: 1, start: { x: 0, y: 0 } });
    const stats = statsForPath([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 0 }]);

    expect(renderPath(stats, region, { title: false, border: false })).toBe('S─');
  });

  it('should crop an axis longer than the limit to the path plus a margin', () => {
    const region = new BoundedRegion({ width: 121, height: 1 });
    const stats = statsForPath([region.start]);

    expect(renderPath(stats, region, { border: false })).toBe(
      'Steps: 0 | Blocked: 0 | Distance: 0.00 | View: x 59-61, y 0-0\n·S·',
    );
    expect(renderPath(stats, region, { maxColumns: 200, title: false, border: false })).toHaveLength(121);
  });

  it('should centre a limit-sized window on the end cell when the path is too long', () => {
    const region = new BoundedRegion({ width: 10, height: 1, start: { x: 0, y: 0 } });
    const path = Array.from({ length: 8 }, (_, x) => ({ x, y: 0 }));

    expect(renderPath(statsForPath(path), region, { maxColumns: 4, title: false, border: false })).toBe('──E·');
  });

  it('should refuse a path with a jump', () => {
    const region = new BoundedRegion({ width: 3, height: 1, start: { x: 0, y: 0 } });
    const stats = statsForPath([{ x: 0, y: 0 }, { x: 2, y: 0 }]);

    expect(() => renderPath(stats, region)).toThrow('Path jumps from (0, 0) to (2, 0)');
  });

  it('should refuse a path that leaves the region', () => {
    const region = new BoundedRegion({ width: 3, height: 3 });
    const stats = statsForPath([{ x: 5, y: 5 }]);

    expect(() => renderPath(stats, region)).toThrow('Path cell (5, 5) lies outside the region');
  });
});

describe('rendering the default configuration', () => {
  const defaults = { ...getDefaultWalkConfig(), progress: 'silent' as const };

  it('should draw a loop on the 100x100 region within the row limit', () => {
    const draws = [
      ...Array<number>(25).fill(DRAW.right),
      ...Array<number>(25).fill(DRAW.down),
      ...Array<number>(25).fill(DRAW.left),
      ...Array<number>(25).fill(DRAW.up),
    ];
    const { region, statistics } = runSimulation(defaults, { random: createScriptedRandom(draws) });

    const lines = renderPath(statistics, region).split('\n');

    expect(lines).toHaveLength(31);
    expect(lines[0]).toBe('Steps: 100 | Blocked: 0 | Distance: 0.00 | View: x 0-99, y 49-76');
    expect(lines[1]).toBe(`+${'-'.repeat(100)}+`);
    expect(lines[2]).toBe(`|${'·'.repeat(100)}|`);
    expect(lines[3]).toBe(`|${'·'.repeat(50)}S${'─'.repeat(24)}┐${'·'.repeat(24)}|`);
    expect(lines[27]).toBe(`|${'·'.repeat(50)}└${'─'.repeat(24)}┘${'·'.repeat(24)}|`);
    expect(lines[30]).toBe(`+${'-'.repeat(100)}+`);
  });

  it('should draw a seeded default walk', () => {
    const { region, statistics } = runSimulation(defaults, { random: createSeededRandom(1) });

    const lines = renderPath(statistics, region).split('\n');

    expect(lines.length).toBeLessThanOrEqual(63);
    expect(lines[1]).toBe(`+${'-'.repeat(100)}+`);
  });
});

describe('renderFrame', () => {
  it('should draw the path as it stood after the given step', () => {
    const { region, stats } = loopWalk();

    expect(renderFrame(stats, region, 2, { border: false }).split('\n')).toEqual([
      'Step 2/7 | Position: (2, 0)',
      '·┌E',
      '·S·',
      '···',
    ]);
  });

  it('should treat a non-finite frame as the first frame', () => {
    const { region, stats } = loopWalk();

    expect(renderFrame(stats, region, Number.NaN, { border: false })).toBe(
      'Step 0/7 | Position: (1, 1)\n···\n·S·\n···',
    );
  });

  it('should clamp frames outside the path', () => {
    const { region, stats } = loopWalk();

    expect(renderFrame(stats, region, -3, { border: false, title: false })).toBe('···\n·S·\n···');
    expect(renderFrame(stats, region, 99, { border: false })).toBe(
      renderFrame(stats, region, 7, { border: false }),
    );
  });
});

describe('pathFrames', () => {
  it('should yield one frame per path position', () => {
    const { region, stats } = loopWalk();

    const frames = [...pathFrames(stats, region, { title: false, border: false })];

    expect(frames).toHaveLength(8);
    expect(frames[7]).toBe(renderPath(stats, region, { title: false, border: false }));
  });
});

describe('playReplay', () => {
  it('should write every frame and pause between them', async () => {
    const { region, stats } = loopWalk();
    const written: string[] = [];
    const sleepFn = vi.fn(async () => undefined);

    const shown = await playReplay(stats, region, {
      intervalMs: 5,
      writeFn: (text) => written.push(text),
      sleepFn,
    });

    expect(shown).toBe(8);
    expect(written).toHaveLength(8);
    expect(written[0]?.startsWith('\x1b[2J\x1b[H')).toBe(true);
    expect(sleepFn).toHaveBeenCalledTimes(7);
    expect(sleepFn).toHaveBeenCalledWith(5);
  });

  it('should skip the clear sequence when asked', async () => {
    const region = new BoundedRegion({ width: 1, height: 1 });
    const written: string[] = [];

    const shown = await playReplay(statsForPath([{ x: 0, y: 0 }]), region, {
      clearScreen: false,
      border: false,
      title: false,
      writeFn: (text) => written.push(text),
      sleepFn: async () => undefined,
    });

    expect(shown).toBe(1);
    expect(written).toEqual(['S\n']);
  });
});
