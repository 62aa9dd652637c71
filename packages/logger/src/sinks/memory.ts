import type { LogEntry, Sink } from '../logger.js';

/**
 * Unbuffered sink keeping every entry in memory. Meant for tests that assert on
 * what an operation logged.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // entries are stored synchronously
  }

  messages(level?: LogEntry['level']): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.msg);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
