import { ConsoleTransport } from './transports/console-transport.js';
import {
  type LogData,
  type LogEntry,
  LogLevel,
  type LogTransport,
  type LoggerConfig,
  isLogLevel,
} from './types.js';

/**
 * Parse a level name (case-insensitive, WARNING accepted) into a LogLevel
 */
export function parseLogLevel(level: LogLevel | string): LogLevel {
  if (typeof level !== 'string') {
    return level;
  }

  const normalized = level.trim().toUpperCase();
  const name = normalized === 'WARNING' ? 'WARN' : normalized;
  if (!isLogLevel(name)) {
    throw new Error(`Invalid log level: ${level}`);
  }
  return LogLevel[name];
}

/**
 * Structured logger with pluggable transports
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string;
  private readonly bindings: LogData;
  private transports: LogTransport[];

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = parseLogLevel(config.level);
    this.bindings = config.bindings ?? {};
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  /**
   * Create a child logger sharing this logger's transports
   */
  child(component: string, bindings: LogData = {}): Logger {
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: this.transports,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(message: string, data?: LogData): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write(LogLevel.WARN, message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    this.write(LogLevel.ERROR, message, data, error instanceof Error ? error : undefined);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  setLevel(level: LogLevel | string): void {
    this.level = parseLogLevel(level);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getComponent(): string {
    return this.component;
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  removeTransport(transportName: string): void {
    this.transports = this.transports.filter(t => t.name !== transportName);
  }

  async close(): Promise<void> {
    await Promise.all(this.transports.map(t => t.close?.()));
  }

  private write(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...data };
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(Object.keys(merged).length > 0 && { data: merged }),
      ...(error && { error }),
    };

    for (const transport of this.transports) {
      transport.log(entry).catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error(`Transport ${transport.name} failed:`, err);
      });
    }
  }
}
