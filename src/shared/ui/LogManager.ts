/**
 * Console output for the CLI
 *
 * Level-filtered `[LEVEL] message` lines plus a few unfiltered helpers
 * (headers, success notices). Everything goes through one sink so tests
 * can capture it.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { LogLevel } from '../../core/models/types.js';

export type { LogLevel };

interface LevelStyle {
  priority: number;
  tag: string;
  color: ChalkInstance;
}

const LEVELS: Record<LogLevel, LevelStyle> = {
  debug: { priority: 0, tag: '[DEBUG]', color: chalk.gray },
  info: { priority: 1, tag: '[INFO]', color: chalk.blue },
  warn: { priority: 2, tag: '[WARN]', color: chalk.yellow },
  error: { priority: 3, tag: '[ERROR]', color: chalk.red },
};

export type LineWriter = (line: string) => void;

const consoleWriter: LineWriter = (line) => console.log(line);

/**
 * Level-filtered console logger. Singleton; use LogManager.getInstance().
 */
export class LogManager {
  private static instance: LogManager | null = null;
  private level: LogLevel = 'info';
  private writeFn: LineWriter = consoleWriter;

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    LogManager.instance = null;
  }

  setLogLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Redirect output; omit to restore the console */
  setWriter(writeFn?: LineWriter): void {
    this.writeFn = writeFn ?? consoleWriter;
  }

  shouldLog(level: LogLevel): boolean {
    return LEVELS[level].priority >= LEVELS[this.level].priority;
  }

  log(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;
    const style = LEVELS[level];
    this.writeFn(style.color(`${style.tag} ${message}`));
  }

  /** Unfiltered line */
  print(line = ''): void {
    this.writeFn(line);
  }
}

// ---- Module-level helpers ----

export function setLogLevel(level: LogLevel): void {
  LogManager.getInstance().setLogLevel(level);
}

export function debug(message: string): void {
  LogManager.getInstance().log('debug', message);
}

export function info(message: string): void {
  LogManager.getInstance().log('info', message);
}

export function warn(message: string): void {
  LogManager.getInstance().log('warn', message);
}

export function error(message: string): void {
  LogManager.getInstance().log('error', message);
}

/** Shown at every level */
export function success(message: string): void {
  LogManager.getInstance().print(chalk.green(message));
}

export function header(title: string): void {
  const manager = LogManager.getInstance();
  manager.print();
  manager.print(chalk.bold.cyan(`=== ${title} ===`));
  manager.print();
}
