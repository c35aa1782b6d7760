/**
 * Walk state management
 *
 * Mutations of the engine-owned WalkState. Only the engine calls these.
 */

import type { Coordinate, WalkState } from '../models/types.js';

/**
 * Create the just-constructed state: at `start`, nothing counted.
 */
export function createInitialState(start: Coordinate): WalkState {
  return {
    position: start,
    path: [start],
    stepsTaken: 0,
    blockedAttempts: 0,
  };
}

/**
 * Move to `position` and record it in the path.
 */
export function commitMove(state: WalkState, position: Coordinate): void {
  state.position = position;
  state.path.push(position);
  state.stepsTaken += 1;
}

/**
 * Count one rejected direction sample.
 */
export function recordBlockedAttempt(state: WalkState): void {
  state.blockedAttempts += 1;
}

/**
 * Copy of the state that shares no mutable array with the original.
 */
export function snapshotState(state: WalkState): WalkState {
  return {
    position: state.position,
    path: [...state.path],
    stepsTaken: state.stepsTaken,
    blockedAttempts: state.blockedAttempts,
  };
}
