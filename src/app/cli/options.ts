/**
 * CLI option parsing
 *
 * Parsers throw commander's InvalidArgumentError so that commander reports
 * the bad flag and exits with code 1.
 */

import { InvalidArgumentError } from 'commander';
import {
  ProgressModeSchema,
  RenderModeSchema,
  type Coordinate,
  type ProgressMode,
  type RenderMode,
} from '../../core/models/index.js';
import type { WalkConfigOverrides } from '../../infra/config/index.js';

/** Raw option values as commander hands them to the action */
export type CliOptions = {
  width?: number;
  height?: number;
  steps?: number;
  seed?: string;
  start?: Coordinate;
  maxAttempts?: number;
  config?: string;
  progress?: ProgressMode;
  every?: number;
  render?: RenderMode;
  json?: boolean;
  strict?: boolean;
  quiet?: boolean;
  verbose?: boolean;
};

function parseInteger(value: string): number | undefined {
  if (!/^\s*-?\d+\s*$/.test(value)) return undefined;
  return Number.parseInt(value, 10);
}

export function parsePositiveInt(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === undefined || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === undefined || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** `x,y` with non-negative integers */
export function parseStart(value: string): Coordinate {
  const match = /^\s*(\d+)\s*,\s*(\d+)\s*$/.exec(value);
  if (!match) {
    throw new InvalidArgumentError('Expected "x,y" with non-negative integers.');
  }
  return { x: Number(match[1]), y: Number(match[2]) };
}

export function parseProgressMode(value: string): ProgressMode {
  const result = ProgressModeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${ProgressModeSchema.options.join(', ')}.`);
  }
  return result.data;
}

export function parseRenderMode(value: string): RenderMode {
  const result = RenderModeSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${RenderModeSchema.options.join(', ')}.`);
  }
  return result.data;
}

/**
 * Map CLI options to config overrides.
 * `--json` and `--quiet` silence progress; `--json` also hides info notices
 * unless `--verbose` lowers the log level to debug.
 */
export function toConfigOverrides(options: CliOptions): WalkConfigOverrides {
  const silenced = options.json === true || options.quiet === true;
  return {
    width: options.width,
    height: options.height,
    steps: options.steps,
    seed: options.seed,
    start: options.start,
    maxAttempts: options.maxAttempts,
    progress: silenced ? 'silent' : options.progress,
    progressEvery: options.every,
    render: options.json === true ? 'none' : options.render,
    logLevel: options.verbose === true ? 'debug' : options.json === true ? 'warn' : undefined,
  };
}
