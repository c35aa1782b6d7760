/**
 * Core type definitions
 */

import type { z } from 'zod/v4';
import type { Direction } from './direction.js';
import type { LogLevelSchema, ProgressModeSchema, RenderModeSchema } from './schemas.js';

/** Grid cell; `y` grows downward */
export interface Coordinate {
  readonly x: number;
  readonly y: number;
}

export interface Dimensions {
  width: number;
  height: number;
}

/** Region construction input. `start` defaults to the centre cell. */
export interface RegionConfig {
  width: number;
  height: number;
  start?: Coordinate;
}

/** Mutable walk state, owned by a single engine */
export interface WalkState {
  position: Coordinate;
  /** Every position occupied since the last reset, starting with the start cell */
  path: Coordinate[];
  stepsTaken: number;
  /** Rejected direction samples over the walk's lifetime */
  blockedAttempts: number;
}

/** Read-only snapshot returned by `statistics()` and `simulate()` */
export interface WalkStatistics {
  readonly stepsTaken: number;
  readonly blockedAttempts: number;
  readonly start: Coordinate;
  readonly position: Coordinate;
  readonly path: Coordinate[];
  readonly euclideanDistance: number;
  readonly manhattanDistance: number;
}

export interface StepSuccess {
  ok: true;
  direction: Direction;
  position: Coordinate;
  /** Samples drawn during this call, including the committed one */
  attempts: number;
  /** Samples rejected during this call */
  blocked: number;
}

export interface StepFailure {
  ok: false;
  reason: 'retry_exhausted';
  attempts: number;
  blocked: number;
  /** Unchanged position */
  position: Coordinate;
}

export type StepResult = StepSuccess | StepFailure;

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type ProgressMode = z.infer<typeof ProgressModeSchema>;
export type RenderMode = z.infer<typeof RenderModeSchema>;

/** Fully resolved run configuration (defaults, config file and CLI merged) */
export interface WalkRunConfig {
  width: number;
  height: number;
  start?: Coordinate;
  steps: number;
  maxAttempts: number;
  seed?: string | number;
  progress: ProgressMode;
  progressEvery: number;
  render: RenderMode;
  logLevel: LogLevel;
  debug?: {
    enabled: boolean;
    logFile?: string;
  };
}
