import type { LogEntry, LogLevel, LogTransport } from '../types.js';

/**
 * Transport that keeps entries in memory, for inspection in tests and tooling
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly buffer: LogEntry[] = [];

  async log(entry: LogEntry): Promise<void> {
    this.buffer.push(entry);
  }

  get entries(): readonly LogEntry[] {
    return this.buffer;
  }

  messages(level?: LogLevel): string[] {
    return this.buffer
      .filter(entry => level === undefined || entry.level === level)
      .map(entry => entry.message);
  }

  clear(): void {
    this.buffer.length = 0;
  }
}
