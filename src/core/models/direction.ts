/**
 * Step directions
 *
 * The four axis-aligned unit moves. `y` grows downward, so `up` is `-y`.
 */

import type { Coordinate } from './types.js';

export type DirectionName = 'up' | 'down' | 'left' | 'right';

export interface Direction {
  readonly name: DirectionName;
  /** Display label */
  readonly label: string;
  readonly dx: -1 | 0 | 1;
  readonly dy: -1 | 0 | 1;
}

export const DIRECTION = {
  up: { name: 'up', label: 'Up', dx: 0, dy: -1 },
  down: { name: 'down', label: 'Down', dx: 0, dy: 1 },
  left: { name: 'left', label: 'Left', dx: -1, dy: 0 },
  right: { name: 'right', label: 'Right', dx: 1, dy: 0 },
} as const satisfies Record<DirectionName, Direction>;

/** Sampling order: a uniform draw `r` selects `DIRECTIONS[floor(r * 4)]` */
export const DIRECTIONS: readonly Direction[] = Object.freeze([
  DIRECTION.up,
  DIRECTION.down,
  DIRECTION.left,
  DIRECTION.right,
]);

/**
 * Map a uniform draw in [0, 1) to a direction.
 */
export function directionFromUnit(value: number): Direction {
  if (!(value >= 0 && value < 1)) {
    throw new RangeError(`Random source returned ${value}; expected a value in [0, 1)`);
  }
  return DIRECTIONS[Math.floor(value * DIRECTIONS.length)]!;
}

/** Coordinate reached by moving one cell in `direction` */
export function applyDirection(from: Coordinate, direction: Direction): Coordinate {
  return Object.freeze({ x: from.x + direction.dx, y: from.y + direction.dy });
}

/**
 * Direction leading from `from` to the adjacent cell `to`,
 * or undefined when the two cells are not 4-neighbours.
 */
export function directionBetween(from: Coordinate, to: Coordinate): Direction | undefined {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  return DIRECTIONS.find((d) => d.dx === dx && d.dy === dy);
}
