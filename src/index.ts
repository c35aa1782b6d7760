/**
 * gridwalk - bounded 2-D random walk
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Region and engine
export { BoundedRegion, defaultStart } from './core/region/index.js';
export {
  WalkEngine,
  DEFAULT_MAX_ATTEMPTS,
  createSeededRandom,
  createDefaultRandom,
  euclideanDistance,
  manhattanDistance,
  efficiency,
  type WalkEvents,
  type StepCallback,
  type WalkEngineOptions,
  type RandomSource,
  type Seed,
} from './core/walk/index.js';

// Features
export {
  runSimulation,
  attachProgressReporter,
  ProgressReporter,
  type RunSimulationOptions,
  type SimulationResult,
  type ProgressReporterOptions,
} from './features/simulate/index.js';
export {
  renderPath,
  renderFrame,
  pathFrames,
  playReplay,
  formatStatisticsReport,
  toStatisticsJson,
  type RenderOptions,
  type ReplayOptions,
  type StatisticsJson,
} from './features/render/index.js';

// Configuration
export {
  loadWalkConfig,
  parseWalkConfig,
  mergeWalkConfig,
  getDefaultWalkConfig,
  type WalkConfigOverrides,
} from './infra/config/index.js';

// Errors
export {
  GridwalkError,
  InvalidConfigurationError,
  ConfigLoadError,
  RenderError,
  type GridwalkErrorCode,
} from './shared/errors.js';
