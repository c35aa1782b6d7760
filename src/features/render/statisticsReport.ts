/**
 * Statistics report
 */

import chalk from 'chalk';
import type { BoundedRegion } from '../../core/region/index.js';
import type { Coordinate, WalkStatistics } from '../../core/models/index.js';
import { efficiency } from '../../core/walk/index.js';
import { LogManager, header } from '../../shared/ui/index.js';
import { formatCoordinate } from '../../shared/utils/text.js';

const LABEL_WIDTH = 20;

/** JSON form of a finished walk (`--json` output) */
export interface StatisticsJson {
  region: { width: number; height: number };
  start: Coordinate;
  position: Coordinate;
  stepsTaken: number;
  blockedAttempts: number;
  euclideanDistance: number;
  manhattanDistance: number;
  /** Percentage, or null before any sample */
  efficiency: number | null;
  path: Coordinate[];
}

function line(label: string, value: string): string {
  return `${label.padEnd(LABEL_WIDTH)}${value}`;
}

/**
 * Report lines, uncolored. Efficiency appears once at least one step was taken.
 */
export function formatStatisticsReport(stats: WalkStatistics): string[] {
  const lines = [
    line('Steps taken', String(stats.stepsTaken)),
    line('Blocked attempts', String(stats.blockedAttempts)),
    line('Start position', formatCoordinate(stats.start)),
    line('Final position', formatCoordinate(stats.position)),
    line('Euclidean distance', stats.euclideanDistance.toFixed(2)),
    line('Manhattan distance', String(stats.manhattanDistance)),
  ];

  const rate = efficiency(stats);
  if (stats.stepsTaken > 0 && rate !== undefined) {
    lines.push(line('Efficiency', `${rate.toFixed(2)}%`));
  }
  return lines;
}

export function printStatisticsReport(stats: WalkStatistics): void {
  const output = LogManager.getInstance();
  header('Simulation statistics');
  for (const reportLine of formatStatisticsReport(stats)) {
    output.print(chalk.white(reportLine));
  }
  output.print();
}

export function toStatisticsJson(stats: WalkStatistics, region: BoundedRegion): StatisticsJson {
  return {
    region: region.dimensions(),
    start: { x: stats.start.x, y: stats.start.y },
    position: { x: stats.position.x, y: stats.position.y },
    stepsTaken: stats.stepsTaken,
    blockedAttempts: stats.blockedAttempts,
    euclideanDistance: stats.euclideanDistance,
    manhattanDistance: stats.manhattanDistance,
    efficiency: efficiency(stats) ?? null,
    path: stats.path.map((cell) => ({ x: cell.x, y: cell.y })),
  };
}
