/**
 * Walk progress display
 *
 * Listens to engine events and prints progress lines. Nothing here changes
 * walk state.
 */

import chalk from 'chalk';
import type { WalkEngine, WalkEvents } from '../../core/walk/index.js';
import type { Coordinate, ProgressMode } from '../../core/models/index.js';
import { DEFAULT_PROGRESS_EVERY } from '../../shared/constants.js';
import { formatCoordinate } from '../../shared/utils/text.js';

export interface ProgressReporterOptions {
  mode: ProgressMode;
  /** Summary mode prints a line every `every` committed steps */
  every?: number;
  /** Override console output for testing */
  writeFn?: (line: string) => void;
}

type Listeners = { [K in keyof WalkEvents]?: WalkEvents[K] };

export class ProgressReporter {
  private readonly engine: WalkEngine;
  private readonly mode: ProgressMode;
  private readonly every: number;
  private readonly writeFn: (line: string) => void;
  private readonly listeners: Listeners;
  private totalSteps: number | undefined;
  private completedSteps = 0;

  constructor(engine: WalkEngine, options: ProgressReporterOptions) {
    this.engine = engine;
    this.mode = options.mode;
    this.every = options.every ?? DEFAULT_PROGRESS_EVERY;
    this.writeFn = options.writeFn ?? ((line: string) => console.log(line));
    this.listeners = this.buildListeners();
    this.attach();
  }

  /** Stop listening to the engine */
  detach(): void {
    for (const [event, listener] of Object.entries(this.listeners)) {
      if (listener) this.engine.off(event, listener);
    }
  }

  private attach(): void {
    for (const [event, listener] of Object.entries(this.listeners)) {
      if (listener) this.engine.on(event, listener);
    }
  }

  private buildListeners(): Listeners {
    if (this.mode === 'silent') {
      return {};
    }

    const listeners: Listeners = {
      'walk:start': (numSteps, maxAttempts) => this.onWalkStart(numSteps, maxAttempts),
      'step:moved': (_direction, position) => this.onSummaryMove(position),
      'step:exhausted': (maxAttempts, position) => {
        this.writeFn(chalk.yellow(`⚠ No valid move after ${maxAttempts} attempts at ${formatCoordinate(position)}`));
      },
      'walk:stopped': (_stats, completedSteps) => {
        this.writeFn(chalk.red(`⛔ Walk stopped at step ${completedSteps + 1}${this.ofTotal()}`));
      },
      'walk:complete': (stats) => {
        this.writeFn(chalk.green(`✓ Walk complete: ${stats.stepsTaken} steps taken, ${stats.blockedAttempts} blocked`));
      },
    };

    if (this.mode === 'detailed') {
      listeners['step:start'] = (stepNumber, position) => {
        this.writeFn(chalk.bold(`Step ${stepNumber}${this.ofTotal()} at ${formatCoordinate(position)}`));
      };
      listeners['step:blocked'] = (direction, candidate) => {
        this.writeFn(chalk.gray(`  ✗ ${direction.label} blocked at ${formatCoordinate(candidate)}`));
      };
      listeners['step:moved'] = (direction, position) => {
        this.completedSteps++;
        this.writeFn(chalk.green(`  ✓ ${direction.label} -> ${formatCoordinate(position)}`));
      };
    }

    return listeners;
  }

  private onWalkStart(numSteps: number, maxAttempts: number): void {
    this.totalSteps = numSteps;
    this.completedSteps = 0;

    const region = this.engine.getRegion();
    const position = this.engine.getState().position;
    this.writeFn('');
    this.writeFn(chalk.bold.cyan('=== Random walk ==='));
    this.writeFn(`${chalk.gray('Start position')}: ${formatCoordinate(position)}`);
    this.writeFn(`${chalk.gray('Region')}: ${region.width} x ${region.height}`);
    this.writeFn(`${chalk.gray('Steps to take')}: ${numSteps}`);
    this.writeFn(`${chalk.gray('Max attempts per step')}: ${maxAttempts}`);
    this.writeFn('');
  }

  private onSummaryMove(position: Coordinate): void {
    this.completedSteps++;
    if (this.completedSteps % this.every !== 0) {
      return;
    }

    const percent = this.totalSteps ? ((this.completedSteps / this.totalSteps) * 100).toFixed(1) : undefined;
    const progress = this.totalSteps
      ? `${this.completedSteps}/${this.totalSteps} steps (${percent}%)`
      : `${this.completedSteps} steps`;
    const { blockedAttempts } = this.engine.getState();
    this.writeFn(`⏳ Progress: ${progress} - position ${formatCoordinate(position)} - blocked ${blockedAttempts}`);
  }

  private ofTotal(): string {
    return this.totalSteps === undefined ? '' : `/${this.totalSteps}`;
  }
}

/**
 * Attach a reporter to `engine`. Call `detach()` on the result when done.
 */
export function attachProgressReporter(engine: WalkEngine, options: ProgressReporterOptions): ProgressReporter {
  return new ProgressReporter(engine, options);
}
