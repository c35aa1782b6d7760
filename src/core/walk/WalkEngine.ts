/**
 * Walk execution engine
 */

import { EventEmitter } from 'node:events';
import type { BoundedRegion } from '../region/BoundedRegion.js';
import type {
  StepFailure,
  StepResult,
  StepSuccess,
  WalkState,
  WalkStatistics,
} from '../models/types.js';
import { applyDirection, directionFromUnit } from '../models/direction.js';
import { InvalidConfigurationError } from '../../shared/errors.js';
import { createLogger } from '../../shared/utils/debug.js';
import { DEFAULT_MAX_ATTEMPTS, ERROR_MESSAGES } from './constants.js';
import { createDefaultRandom, type RandomSource } from './random-source.js';
import {
  createInitialState,
  commitMove,
  recordBlockedAttempt,
  snapshotState,
} from './state-manager.js';
import { buildStatistics } from './statistics.js';
import type { WalkEngineOptions } from './types.js';

const log = createLogger('engine');

export type { WalkEvents, StepCallback, WalkEngineOptions } from './types.js';

function assertMaxAttempts(maxAttempts: number): void {
  if (!Number.isInteger(maxAttempts) || maxAttempts <= 0) {
    throw new InvalidConfigurationError(ERROR_MESSAGES.INVALID_MAX_ATTEMPTS(maxAttempts));
  }
}

/**
 * Bounded random walk over a region.
 *
 * Each step samples directions until one stays inside the region or the
 * attempt budget runs out. Rejected samples are counted, never thrown.
 */
export class WalkEngine extends EventEmitter {
  private readonly region: BoundedRegion;
  private readonly random: RandomSource;
  private readonly options: WalkEngineOptions;
  private state: WalkState;

  constructor(region: BoundedRegion, options: WalkEngineOptions = {}) {
    super();
    this.region = region;
    this.options = options;
    this.random = options.random ?? createDefaultRandom();
    this.state = createInitialState(region.start);
    log.debug('WalkEngine initialized', {
      width: region.width,
      height: region.height,
      start: region.start,
    });
  }

  getRegion(): BoundedRegion {
    return this.region;
  }

  /** Copy of the current walk state */
  getState(): WalkState {
    return snapshotState(this.state);
  }

  /**
   * Attempt one move, drawing at most `maxAttempts` directions.
   * Blocked samples stay counted even when the step fails.
   */
  step(maxAttempts = DEFAULT_MAX_ATTEMPTS): StepResult {
    assertMaxAttempts(maxAttempts);
    this.emit('step:start', this.state.stepsTaken + 1, this.state.position);

    let blocked = 0;
    for (let attempts = 1; attempts <= maxAttempts; attempts++) {
      const direction = directionFromUnit(this.random.next());
      const candidate = applyDirection(this.state.position, direction);

      if (this.region.contains(candidate)) {
        commitMove(this.state, candidate);
        const result: StepSuccess = { ok: true, direction, position: candidate, attempts, blocked };
        this.emit('step:moved', direction, candidate, this.state.stepsTaken);
        this.notifyStep(result);
        return result;
      }

      recordBlockedAttempt(this.state);
      blocked++;
      this.emit('step:blocked', direction, candidate);
    }

    const failure: StepFailure = {
      ok: false,
      reason: 'retry_exhausted',
      attempts: maxAttempts,
      blocked,
      position: this.state.position,
    };
    log.debug('Step exhausted attempts', {
      maxAttempts,
      position: this.state.position,
      blockedAttempts: this.state.blockedAttempts,
    });
    this.emit('step:exhausted', maxAttempts, this.state.position);
    this.notifyStep(failure);
    return failure;
  }

  /**
   * Take up to `numSteps` steps, stopping at the first one that fails.
   */
  simulate(numSteps: number, maxAttempts = DEFAULT_MAX_ATTEMPTS): WalkStatistics {
    if (!Number.isInteger(numSteps) || numSteps < 0) {
      throw new InvalidConfigurationError(ERROR_MESSAGES.INVALID_STEP_COUNT(numSteps));
    }
    assertMaxAttempts(maxAttempts);

    this.emit('walk:start', numSteps, maxAttempts);
    for (let completed = 0; completed < numSteps; completed++) {
      const result = this.step(maxAttempts);
      if (!result.ok) {
        const stats = this.statistics();
        log.debug('Walk stopped early', { requested: numSteps, completed });
        this.emit('walk:stopped', stats, completed);
        return stats;
      }
    }

    const stats = this.statistics();
    log.debug('Walk complete', {
      stepsTaken: stats.stepsTaken,
      blockedAttempts: stats.blockedAttempts,
      position: stats.position,
    });
    this.emit('walk:complete', stats);
    return stats;
  }

  /** Snapshot computed from the current state */
  statistics(): WalkStatistics {
    return buildStatistics(this.region.start, this.state);
  }

  /** Return to the just-constructed state */
  reset(): void {
    this.state = createInitialState(this.region.start);
    this.emit('walk:reset');
  }

  private notifyStep(result: StepResult): void {
    this.options.onStep?.(result, snapshotState(this.state));
  }
}
