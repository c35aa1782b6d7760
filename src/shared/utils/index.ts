export { getErrorMessage } from './error.js';
export { stripAnsi, formatCoordinate } from './text.js';
export {
  createLogger,
  initDebugLogger,
  setVerboseConsole,
  getDebugLogFile,
  resetDebugLogger,
  type DebugConfig,
  type Logger,
} from './debug.js';
