/**
 * Debug logger
 *
 * Writes structured debug lines to a log file when enabled in config, and
 * echoes them to the console in verbose mode. Every call is a no-op when
 * neither sink is active.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, isAbsolute, join } from 'node:path';
import chalk from 'chalk';
import { DEFAULT_DEBUG_LOG_FILE } from '../constants.js';

export interface DebugConfig {
  enabled: boolean;
  /** Log file path; relative paths resolve against the working directory */
  logFile?: string;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

type DebugLevel = 'DEBUG' | 'INFO' | 'ERROR';

let logFilePath: string | null = null;
let verboseConsole = false;

/**
 * Configure the file sink. Passing an absent or disabled config turns it off.
 */
export function initDebugLogger(config: DebugConfig | undefined, cwd: string): void {
  if (!config?.enabled) {
    logFilePath = null;
    return;
  }

  const file = config.logFile ?? DEFAULT_DEBUG_LOG_FILE;
  logFilePath = isAbsolute(file) ? file : join(cwd, file);
  mkdirSync(dirname(logFilePath), { recursive: true });
}

/** Echo debug lines to the console (verbose mode) */
export function setVerboseConsole(enabled: boolean): void {
  verboseConsole = enabled;
}

/** Current log file, or null when file logging is off */
export function getDebugLogFile(): string | null {
  return logFilePath;
}

/** Reset to the disabled state (for tests) */
export function resetDebugLogger(): void {
  logFilePath = null;
  verboseConsole = false;
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  return ` ${JSON.stringify(data)}`;
}

function write(level: DebugLevel, name: string, message: string, data?: unknown): void {
  if (!logFilePath && !verboseConsole) return;

  const line = `[${level}] [${name}] ${message}${formatData(data)}`;
  if (logFilePath) {
    appendFileSync(logFilePath, `${new Date().toISOString()} ${line}\n`, 'utf-8');
  }
  if (verboseConsole) {
    console.log(chalk.gray(line));
  }
}

/**
 * Create a named logger. Name appears in every line as `[name]`.
 */
export function createLogger(name: string): Logger {
  return {
    debug: (message, data) => write('DEBUG', name, message, data),
    info: (message, data) => write('INFO', name, message, data),
    error: (message, data) => write('ERROR', name, message, data),
  };
}
