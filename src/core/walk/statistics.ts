/**
 * Walk statistics
 */

import type { Coordinate, WalkState, WalkStatistics } from '../models/types.js';

export function euclideanDistance(from: Coordinate, to: Coordinate): number {
  return Math.sqrt((to.x - from.x) ** 2 + (to.y - from.y) ** 2);
}

export function manhattanDistance(from: Coordinate, to: Coordinate): number {
  return Math.abs(to.x - from.x) + Math.abs(to.y - from.y);
}

/**
 * Build a statistics snapshot of `state`. The path is copied.
 */
export function buildStatistics(start: Coordinate, state: WalkState): WalkStatistics {
  return {
    stepsTaken: state.stepsTaken,
    blockedAttempts: state.blockedAttempts,
    start,
    position: state.position,
    path: [...state.path],
    euclideanDistance: euclideanDistance(start, state.position),
    manhattanDistance: manhattanDistance(start, state.position),
  };
}

/**
 * Share of samples that became moves, as a percentage.
 * Undefined before any sample has been drawn.
 */
export function efficiency(stats: Pick<WalkStatistics, 'stepsTaken' | 'blockedAttempts'>): number | undefined {
  const samples = stats.stepsTaken + stats.blockedAttempts;
  if (samples === 0) {
    return undefined;
  }
  return (stats.stepsTaken / samples) * 100;
}
