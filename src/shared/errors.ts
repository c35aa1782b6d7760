/**
 * Error types surfaced by gridwalk.
 *
 * Boundary rejections and retry exhaustion are ordinary walk outcomes and
 * never appear here; these classes cover configuration and presentation
 * failures that stop a run before (or instead of) producing output.
 */

export type GridwalkErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'CONFIG_LOAD_FAILED'
  | 'RENDER_FAILED';

/** Base class for all gridwalk errors */
export class GridwalkError extends Error {
  readonly code: GridwalkErrorCode;

  constructor(message: string, code: GridwalkErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Non-positive dimensions, out-of-bounds start, or a bad engine argument */
export class InvalidConfigurationError extends GridwalkError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
  }
}

/** Config file could not be read, parsed, or validated */
export class ConfigLoadError extends GridwalkError {
  readonly filePath: string;
  readonly issues: string[];

  constructor(filePath: string, issues: string[]) {
    super(`Invalid config file ${filePath}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, 'CONFIG_LOAD_FAILED');
    this.filePath = filePath;
    this.issues = issues;
  }
}

/** Path could not be drawn (a cell outside the region, or a jump between cells) */
export class RenderError extends GridwalkError {
  constructor(message: string) {
    super(message, 'RENDER_FAILED');
  }
}
