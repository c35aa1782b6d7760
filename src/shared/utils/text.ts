/**
 * Text helpers for terminal output
 */

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/** Remove ANSI color/style sequences */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/** Format a coordinate as `(x, y)` */
export function formatCoordinate(coordinate: { x: number; y: number }): string {
  return `(${coordinate.x}, ${coordinate.y})`;
}
