export type {
  Coordinate,
  Dimensions,
  RegionConfig,
  WalkState,
  WalkStatistics,
  StepSuccess,
  StepFailure,
  StepResult,
  LogLevel,
  ProgressMode,
  RenderMode,
  WalkRunConfig,
} from './types.js';

export {
  DIRECTION,
  DIRECTIONS,
  directionFromUnit,
  applyDirection,
  directionBetween,
  type Direction,
  type DirectionName,
} from './direction.js';

export {
  LogLevelSchema,
  ProgressModeSchema,
  RenderModeSchema,
  CoordinateSchema,
  DebugConfigSchema,
  WalkConfigRawSchema,
  type WalkConfigRaw,
} from './schemas.js';
