/**
 * Structured logging with console and in-memory transports
 */

export { Logger, parseLogLevel } from './logger.js';
export { LoggerFactory } from './factory.js';
export { ConsoleTransport, formatJson, formatText } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
export {
  LOG_LEVELS,
  LOG_FORMATS,
  LogLevel,
  isLogLevel,
  isLogFormat,
  type LogLevelString,
  type LogFormat,
  type LogData,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
} from './types.js';
