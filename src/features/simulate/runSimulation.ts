/**
 * Simulation use case
 *
 * Builds the region and engine from a resolved config, runs the walk with
 * progress reporting, and hands back everything the presentation layer needs.
 */

import { BoundedRegion } from '../../core/region/index.js';
import {
  WalkEngine,
  createDefaultRandom,
  createSeededRandom,
  type RandomSource,
  type StepCallback,
} from '../../core/walk/index.js';
import type { WalkRunConfig, WalkStatistics } from '../../core/models/index.js';
import { createLogger } from '../../shared/utils/debug.js';
import { attachProgressReporter } from './progressReporter.js';

const log = createLogger('simulate');

export interface RunSimulationOptions {
  /** Overrides the source derived from `config.seed` */
  random?: RandomSource;
  /** Per-step hook forwarded to the engine */
  onStep?: StepCallback;
  /** Override console output for testing */
  writeFn?: (line: string) => void;
}

export interface SimulationResult {
  region: BoundedRegion;
  engine: WalkEngine;
  statistics: WalkStatistics;
  requestedSteps: number;
  /** True when a step ran out of attempts before `requestedSteps` were taken */
  stoppedEarly: boolean;
}

function resolveRandom(config: WalkRunConfig, override?: RandomSource): RandomSource {
  if (override) return override;
  return config.seed !== undefined ? createSeededRandom(config.seed) : createDefaultRandom();
}

/**
 * Run one walk as described by `config`.
 * Throws InvalidConfigurationError before any step when the region is invalid.
 */
export function runSimulation(config: WalkRunConfig, options: RunSimulationOptions = {}): SimulationResult {
  const region = new BoundedRegion({
    width: config.width,
    height: config.height,
    start: config.start,
  });
  const engine = new WalkEngine(region, {
    random: resolveRandom(config, options.random),
    onStep: options.onStep,
  });

  log.info('Simulation starting', {
    width: region.width,
    height: region.height,
    start: region.start,
    steps: config.steps,
    maxAttempts: config.maxAttempts,
    seed: config.seed ?? null,
  });

  const reporter = attachProgressReporter(engine, {
    mode: config.progress,
    every: config.progressEvery,
    writeFn: options.writeFn,
  });

  try {
    const statistics = engine.simulate(config.steps, config.maxAttempts);
    const stoppedEarly = statistics.stepsTaken < config.steps;
    log.info('Simulation finished', {
      stepsTaken: statistics.stepsTaken,
      blockedAttempts: statistics.blockedAttempts,
      stoppedEarly,
    });
    return { region, engine, statistics, requestedSteps: config.steps, stoppedEarly };
  } finally {
    reporter.detach();
  }
}
