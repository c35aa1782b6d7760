/**
 * Walk engine constants
 */

/** Sample budget for a single step when the caller gives none */
export const DEFAULT_MAX_ATTEMPTS = 1000;

/** Error message templates */
export const ERROR_MESSAGES = {
  INVALID_DIMENSION: (name: string, value: number) =>
    `Region ${name} must be a positive integer (got ${value})`,
  START_NOT_INTEGER: (x: number, y: number) =>
    `Start position must have integer coordinates (got (${x}, ${y}))`,
  START_OUT_OF_BOUNDS: (x: number, y: number, width: number, height: number) =>
    `Start position (${x}, ${y}) lies outside the ${width}x${height} region`,
  INVALID_MAX_ATTEMPTS: (value: number) =>
    `maxAttempts must be a positive integer (got ${value})`,
  INVALID_STEP_COUNT: (value: number) =>
    `numSteps must be a non-negative integer (got ${value})`,
};
