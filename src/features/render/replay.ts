/**
 * Path replay
 *
 * Prints the path frame by frame with a pause between frames.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { BoundedRegion } from '../../core/region/index.js';
import type { WalkStatistics } from '../../core/models/index.js';
import { DEFAULT_REPLAY_INTERVAL_MS } from '../../shared/constants.js';
import { pathFrames, type RenderOptions } from './pathRenderer.js';

/** Clear screen and home the cursor */
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface ReplayOptions extends RenderOptions {
  /** Pause between frames in milliseconds */
  intervalMs?: number;
  /** Clear the terminal before each frame (default: true) */
  clearScreen?: boolean;
  /** Override process.stdout.write for testing */
  writeFn?: (text: string) => void;
  /** Override the pause for testing */
  sleepFn?: (ms: number) => Promise<unknown>;
}

/**
 * Play every frame of the path. Resolves with the number of frames shown.
 */
export async function playReplay(
  stats: WalkStatistics,
  region: BoundedRegion,
  options: ReplayOptions = {},
): Promise<number> {
  const intervalMs = options.intervalMs ?? DEFAULT_REPLAY_INTERVAL_MS;
  const writeFn = options.writeFn ?? ((text: string) => process.stdout.write(text));
  const sleepFn = options.sleepFn ?? sleep;
  const prefix = options.clearScreen === false ? '' : CLEAR_SCREEN;

  let shown = 0;
  for (const frame of pathFrames(stats, region, options)) {
    if (shown > 0) {
      await sleepFn(intervalMs);
    }
    writeFn(`${prefix}${frame}\n`);
    shown++;
  }
  return shown;
}
