import { describe, it, expect } from 'vitest';
import {
  buildStatistics,
  createInitialState,
  efficiency,
  euclideanDistance,
  manhattanDistance,
} from '../core/walk/index.js';

describe('distance functions', () => {
  it('should be zero for the same cell', () => {
    expect(euclideanDistance({ x: 2, y: 3 }, { x: 2, y: 3 })).toBe(0);
    expect(manhattanDistance({ x: 2, y: 3 }, { x: 2, y: 3 })).toBe(0);
  });

  it('should measure a 3-4-5 displacement', () => {
    expect(euclideanDistance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    expect(manhattanDistance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(7);
  });

  it('should ignore the sign of the displacement', () => {
    expect(euclideanDistance({ x: 5, y: 5 }, { x: 2, y: 1 })).toBe(5);
    expect(manhattanDistance({ x: 5, y: 5 }, { x: 2, y: 1 })).toBe(7);
  });
});

describe('buildStatistics', () => {
  it('should describe a fresh state as zero displacement', () => {
    const start = { x: 1, y: 1 };

    expect(buildStatistics(start, createInitialState(start))).toEqual({
      stepsTaken: 0,
      blockedAttempts: 0,
      start: { x: 1, y: 1 },
      position: { x: 1, y: 1 },
      path: [{ x: 1, y: 1 }],
      euclideanDistance: 0,
      manhattanDistance: 0,
    });
  });

  it('should copy the path', () => {
    const state = createInitialState({ x: 0, y: 0 });
    const stats = buildStatistics({ x: 0, y: 0 }, state);

    state.path.push({ x: 1, y: 0 });

    expect(stats.path).toHaveLength(1);
  });
});

describe('efficiency', () => {
  it('should be undefined before any sample', () => {
    expect(efficiency({ stepsTaken: 0, blockedAttempts: 0 })).toBeUndefined();
  });

  it('should be 100 when nothing was blocked', () => {
    expect(efficiency({ stepsTaken: 12, blockedAttempts: 0 })).toBe(100);
  });

  it('should be 0 when every sample was blocked', () => {
    expect(efficiency({ stepsTaken: 0, blockedAttempts: 50 })).toBe(0);
  });

  it('should be the share of samples that moved', () => {
    expect(efficiency({ stepsTaken: 3, blockedAttempts: 1 })).toBe(75);
  });
});
