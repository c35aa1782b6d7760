/**
 * Walk module public API
 */

// Main engine
export { WalkEngine } from './WalkEngine.js';

// Constants
export { DEFAULT_MAX_ATTEMPTS, ERROR_MESSAGES } from './constants.js';

// Types
export type { WalkEvents, StepCallback, WalkEngineOptions } from './types.js';

// Random sources
export {
  createSeededRandom,
  createDefaultRandom,
  type RandomSource,
  type Seed,
} from './random-source.js';

// Statistics
export {
  euclideanDistance,
  manhattanDistance,
  buildStatistics,
  efficiency,
} from './statistics.js';

// State management
export { createInitialState, snapshotState } from './state-manager.js';
