/**
 * Walk configuration management
 *
 * Reads gridwalk.yaml (or .gridwalk/config.yaml) from the working directory,
 * validates it, and merges CLI overrides on top.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse } from 'yaml';
import { WalkConfigRawSchema, type WalkConfigRaw } from '../../core/models/schemas.js';
import type { WalkRunConfig } from '../../core/models/types.js';
import { CONFIG_FILE_CANDIDATES } from '../../shared/constants.js';
import { ConfigLoadError } from '../../shared/errors.js';
import { getErrorMessage } from '../../shared/utils/error.js';

/** Values the CLI may set; undefined keeps the loaded value */
export type WalkConfigOverrides = Partial<Omit<WalkRunConfig, 'debug'>>;

/**
 * Convert the snake_case file format to a run config.
 */
function normalizeWalkConfig(raw: WalkConfigRaw): WalkRunConfig {
  return {
    width: raw.width,
    height: raw.height,
    ...(raw.start ? { start: raw.start } : {}),
    steps: raw.steps,
    maxAttempts: raw.max_attempts,
    ...(raw.seed !== undefined ? { seed: raw.seed } : {}),
    progress: raw.progress,
    progressEvery: raw.progress_every,
    render: raw.render,
    logLevel: raw.log_level,
    ...(raw.debug
      ? { debug: { enabled: raw.debug.enabled, ...(raw.debug.log_file ? { logFile: raw.debug.log_file } : {}) } }
      : {}),
  };
}

/** Built-in defaults (an empty config file) */
export function getDefaultWalkConfig(): WalkRunConfig {
  return normalizeWalkConfig(WalkConfigRawSchema.parse({}));
}

/**
 * Validate parsed YAML content. `source` names the file in error messages.
 */
export function parseWalkConfig(content: unknown, source: string): WalkRunConfig {
  const result = WalkConfigRawSchema.safeParse(content ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.map((segment) => String(segment)).join('.');
      return `${path || '(root)'}: ${issue.message}`;
    });
    throw new ConfigLoadError(source, issues);
  }
  return normalizeWalkConfig(result.data);
}

/**
 * Locate the config file: the explicit path when given (must exist),
 * otherwise the first existing candidate under `cwd`.
 */
export function resolveConfigPath(cwd: string, explicitPath?: string): string | undefined {
  if (explicitPath) {
    const fullPath = resolve(cwd, explicitPath);
    if (!existsSync(fullPath)) {
      throw new ConfigLoadError(fullPath, ['file not found']);
    }
    return fullPath;
  }

  return CONFIG_FILE_CANDIDATES
    .map((candidate) => join(resolve(cwd), candidate))
    .find((candidate) => existsSync(candidate));
}

/**
 * Load the walk configuration for `cwd`. A missing file yields the defaults.
 */
export function loadWalkConfig(cwd: string, explicitPath?: string): WalkRunConfig {
  const configPath = resolveConfigPath(cwd, explicitPath);
  if (!configPath) {
    return getDefaultWalkConfig();
  }

  let content: unknown;
  try {
    content = parse(readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ConfigLoadError(configPath, [getErrorMessage(e)]);
  }
  return parseWalkConfig(content, configPath);
}

/**
 * Apply overrides on top of `base`. Undefined override values are skipped.
 */
export function mergeWalkConfig(base: WalkRunConfig, overrides: WalkConfigOverrides): WalkRunConfig {
  return {
    ...base,
    width: overrides.width ?? base.width,
    height: overrides.height ?? base.height,
    start: overrides.start ?? base.start,
    steps: overrides.steps ?? base.steps,
    maxAttempts: overrides.maxAttempts ?? base.maxAttempts,
    seed: overrides.seed ?? base.seed,
    progress: overrides.progress ?? base.progress,
    progressEvery: overrides.progressEvery ?? base.progressEvery,
    render: overrides.render ?? base.render,
    logLevel: overrides.logLevel ?? base.logLevel,
  };
}
