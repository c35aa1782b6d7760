/**
 * Zod schemas for configuration validation
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';
import {
  DEFAULT_PROGRESS_EVERY,
  DEFAULT_REGION_HEIGHT,
  DEFAULT_REGION_WIDTH,
  DEFAULT_STEP_COUNT,
} from '../../shared/constants.js';
import { DEFAULT_MAX_ATTEMPTS } from '../walk/constants.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** How the progress reporter prints a running walk */
export const ProgressModeSchema = z.enum(['detailed', 'summary', 'silent']);

/** What the CLI draws after the walk */
export const RenderModeSchema = z.enum(['none', 'path', 'replay']);

export const CoordinateSchema = z.object({
  x: z.number().int().nonnegative(),
  y: z.number().int().nonnegative(),
});

export const DebugConfigSchema = z.object({
  enabled: z.boolean().optional().default(false),
  log_file: z.string().min(1).optional(),
});

/** Walk configuration schema - raw YAML format */
export const WalkConfigRawSchema = z.object({
  width: z.number().int().positive().optional().default(DEFAULT_REGION_WIDTH),
  height: z.number().int().positive().optional().default(DEFAULT_REGION_HEIGHT),
  /** Start cell; the centre of the region when omitted */
  start: CoordinateSchema.optional(),
  steps: z.number().int().nonnegative().optional().default(DEFAULT_STEP_COUNT),
  max_attempts: z.number().int().positive().optional().default(DEFAULT_MAX_ATTEMPTS),
  seed: z.union([z.string().min(1), z.number().int()]).optional(),
  progress: ProgressModeSchema.optional().default('summary'),
  progress_every: z.number().int().positive().optional().default(DEFAULT_PROGRESS_EVERY),
  render: RenderModeSchema.optional().default('path'),
  log_level: LogLevelSchema.optional().default('info'),
  debug: DebugConfigSchema.optional(),
});

export type WalkConfigRaw = z.infer<typeof WalkConfigRawSchema>;
