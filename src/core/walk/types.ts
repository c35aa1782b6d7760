/**
 * Walk engine type definitions
 *
 * Contains types for engine events, callbacks, and options.
 */

import type { Coordinate, StepResult, WalkState, WalkStatistics } from '../models/types.js';
import type { Direction } from '../models/direction.js';
import type { RandomSource } from './random-source.js';

/** Events emitted by the walk engine (all emitted synchronously) */
export interface WalkEvents {
  'step:start': (stepNumber: number, position: Coordinate) => void;
  'step:blocked': (direction: Direction, candidate: Coordinate) => void;
  'step:moved': (direction: Direction, position: Coordinate, stepsTaken: number) => void;
  'step:exhausted': (maxAttempts: number, position: Coordinate) => void;
  'walk:start': (numSteps: number, maxAttempts: number) => void;
  'walk:complete': (stats: WalkStatistics) => void;
  'walk:stopped': (stats: WalkStatistics, completedSteps: number) => void;
  'walk:reset': () => void;
}

/** Called after every `step` call, successful or not */
export type StepCallback = (result: StepResult, state: WalkState) => void;

/** Options for walk engine */
export interface WalkEngineOptions {
  /** Direction source. Defaults to an auto-seeded source owned by the engine. */
  random?: RandomSource;
  /** Per-step hook; receives a copy of the state */
  onStep?: StepCallback;
}
