import {
  type ConsoleTransportConfig,
  type LogEntry,
  type LogFormat,
  LogLevel,
  type LogTransport,
} from '../types.js';

const LEVEL_COLORS: Partial<Record<LogLevel, string>> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

/**
 * Render an entry as a single JSON line
 */
export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevel[entry.level],
    component: entry.component,
    message: entry.message,
    ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  });
}

/**
 * Render an entry as human-readable text
 */
export function formatText(entry: LogEntry, colors = false): string {
  const levelName = LogLevel[entry.level];
  const color = colors ? LEVEL_COLORS[entry.level] : undefined;
  const level = color ? `${color}${levelName}${RESET}` : levelName;

  let line = `${entry.timestamp.toISOString()} ${level} [${entry.component}] ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data)}`;
  }

  if (entry.error) {
    line += `\n${entry.error.stack ?? entry.error.message}`;
  }

  return line;
}

/**
 * Console transport for logging to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly format: LogFormat;
  private readonly colors: boolean;

  constructor(config: ConsoleTransportConfig = {}) {
    this.format = config.format ?? 'text';
    this.colors = config.colors ?? true;
  }

  async log(entry: LogEntry): Promise<void> {
    const output = this.format === 'json' ? formatJson(entry) : formatText(entry, this.colors);

    /* eslint-disable no-console */
    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      case LogLevel.INFO:
        console.info(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      default:
        console.error(output);
    }
    /* eslint-enable no-console */
  }
}
