export {
  LogManager,
  setLogLevel,
  debug,
  info,
  warn,
  error,
  success,
  header,
  type LineWriter,
  type LogLevel,
} from './LogManager.js';
