/**
 * The gridwalk command: options, config resolution, walk and output.
 */

import { Command } from 'commander';
import { loadWalkConfig, mergeWalkConfig, resolveConfigPath } from '../../infra/config/index.js';
import { runSimulation } from '../../features/simulate/index.js';
import {
  playReplay,
  printStatisticsReport,
  renderPath,
  toStatisticsJson,
} from '../../features/render/index.js';
import type { BoundedRegion } from '../../core/region/index.js';
import type { RenderMode, WalkStatistics } from '../../core/models/index.js';
import { RenderError } from '../../shared/errors.js';
import { LogManager, debug, error, info, setLogLevel, success, warn } from '../../shared/ui/index.js';
import {
  createLogger,
  getErrorMessage,
  initDebugLogger,
  setVerboseConsole,
} from '../../shared/utils/index.js';
import {
  parseNonNegativeInt,
  parsePositiveInt,
  parseProgressMode,
  parseRenderMode,
  parseStart,
  toConfigOverrides,
  type CliOptions,
} from './options.js';

const log = createLogger('cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** --strict and the walk stopped before its step count */
export const EXIT_STOPPED_EARLY = 2;

function print(text: string): void {
  LogManager.getInstance().print(text);
}

async function renderResult(mode: RenderMode, statistics: WalkStatistics, region: BoundedRegion): Promise<void> {
  try {
    if (mode === 'path') {
      print(renderPath(statistics, region));
    } else if (mode === 'replay') {
      const frames = await playReplay(statistics, region);
      success(`Replayed ${frames} frames`);
    }
  } catch (e) {
    if (!(e instanceof RenderError)) throw e;
    warn(`${e.message}; skipping the drawing`);
  }
}

/**
 * Run one walk for the parsed options. Resolves with the process exit code;
 * failures are reported through the log manager, not thrown.
 */
export async function runWalkCommand(opts: CliOptions, cwd: string): Promise<number> {
  try {
    const configPath = resolveConfigPath(cwd, opts.config);
    const config = mergeWalkConfig(loadWalkConfig(cwd, opts.config), toConfigOverrides(opts));

    initDebugLogger(config.debug, cwd);
    setVerboseConsole(opts.verbose === true);
    setLogLevel(config.logLevel);
    log.info('gridwalk starting', { cwd, config });
    debug(configPath ? `Config file: ${configPath}` : 'No config file; using defaults');
    debug(`Region ${config.width}x${config.height}, ${config.steps} steps, seed ${config.seed ?? 'random'}`);

    const { region, statistics, requestedSteps, stoppedEarly } = runSimulation(config, { writeFn: print });
    if (stoppedEarly) {
      info(`Walk stopped after ${statistics.stepsTaken} of ${requestedSteps} steps`);
    }

    if (opts.json) {
      print(JSON.stringify(toStatisticsJson(statistics, region), null, 2));
    } else {
      printStatisticsReport(statistics);
      await renderResult(config.render, statistics, region);
    }

    return stoppedEarly && opts.strict ? EXIT_STOPPED_EARLY : EXIT_OK;
  } catch (e) {
    log.error('gridwalk failed', { message: getErrorMessage(e) });
    error(getErrorMessage(e));
    return EXIT_FAILURE;
  }
}

export function createProgram(version: string, cwd: string): Command {
  const program = new Command();

  program
    .name('gridwalk')
    .description('Bounded 2-D random walk simulator')
    .version(version);

  program
    .option('-W, --width <n>', 'Region width in cells', parsePositiveInt)
    .option('-H, --height <n>', 'Region height in cells', parsePositiveInt)
    .option('-s, --steps <n>', 'Number of steps to take', parseNonNegativeInt)
    .option('--seed <value>', 'Seed for a reproducible walk')
    .option('--start <x,y>', 'Start cell (defaults to the centre)', parseStart)
    .option('-m, --max-attempts <n>', 'Direction samples allowed per step', parsePositiveInt)
    .option('-c, --config <path>', 'Config file (defaults to gridwalk.yaml or .gridwalk/config.yaml)')
    .option('--progress <mode>', 'Progress output: detailed | summary | silent', parseProgressMode)
    .option('--every <n>', 'Summary progress line every N steps', parsePositiveInt)
    .option('--render <mode>', 'After the walk: none | path | replay', parseRenderMode)
    .option('--json', 'Print statistics as JSON (implies --progress silent)')
    .option('--strict', `Exit with code ${EXIT_STOPPED_EARLY} when the walk stops early`)
    .option('-q, --quiet', 'Suppress progress output')
    .option('-v, --verbose', 'Debug logging to the console');

  program.action(async () => {
    process.exitCode = await runWalkCommand(program.opts<CliOptions>(), cwd);
  });

  return program;
}
