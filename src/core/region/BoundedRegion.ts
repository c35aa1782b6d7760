/**
 * Bounded region
 *
 * The rectangle of cells a walk may occupy, plus its start cell.
 * Immutable once constructed.
 */

import type { Coordinate, Dimensions, RegionConfig } from '../models/types.js';
import { InvalidConfigurationError } from '../../shared/errors.js';
import { ERROR_MESSAGES } from '../walk/constants.js';

/** Centre cell of a `width` x `height` region (floor division) */
export function defaultStart(width: number, height: number): Coordinate {
  return { x: Math.floor(width / 2), y: Math.floor(height / 2) };
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigurationError(ERROR_MESSAGES.INVALID_DIMENSION(name, value));
  }
}

export class BoundedRegion {
  readonly width: number;
  readonly height: number;
  readonly start: Coordinate;

  constructor(config: RegionConfig) {
    assertDimension('width', config.width);
    assertDimension('height', config.height);
    this.width = config.width;
    this.height = config.height;

    const start = config.start ?? defaultStart(config.width, config.height);
    if (!Number.isInteger(start.x) || !Number.isInteger(start.y)) {
      throw new InvalidConfigurationError(ERROR_MESSAGES.START_NOT_INTEGER(start.x, start.y));
    }
    if (!this.isValid(start.x, start.y)) {
      throw new InvalidConfigurationError(
        ERROR_MESSAGES.START_OUT_OF_BOUNDS(start.x, start.y, this.width, this.height),
      );
    }
    this.start = Object.freeze({ x: start.x, y: start.y });
  }

  /** True iff `(x, y)` is a cell of this region */
  isValid(x: number, y: number): boolean {
    return Number.isInteger(x)
      && Number.isInteger(y)
      && x >= 0 && x < this.width
      && y >= 0 && y < this.height;
  }

  contains(coordinate: Coordinate): boolean {
    return this.isValid(coordinate.x, coordinate.y);
  }

  dimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }
}
