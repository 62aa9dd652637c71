import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  /** Wrap the level in ANSI colors */
  color?: boolean | undefined;
}

// ANSI foreground codes
const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '36',
  info: '32',
  warn: '33',
  error: '31',
};

function twoDigits(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `[HH:MM:SS] LEVEL [category] message {key=value, ...}` in local time
 */
export function formatLogLine(entry: LogEntry, color = false): string {
  const { timestamp } = entry;
  const time = [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()].map(twoDigits).join(':');
  const label = entry.level.toUpperCase().padEnd(5);
  const level = color ? `\x1b[${LEVEL_COLORS[entry.level]}m${label}\x1b[0m` : label;
  const fields = Object.entries(entry.context ?? {}).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  const context = fields.length > 0 ? ` {${fields.join(', ')}}` : '';

  return `[${time}] ${level} [${entry.category}] ${entry.msg}${context}`;
}

/**
 * Queues entries and prints them on the next turn of the event loop, or at flush()
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private queue: LogEntry[] = [];
  private drain: NodeJS.Immediate | undefined;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
  }

  write(entry: LogEntry): void {
    this.queue.push(entry);
    if (!this.drain) {
      this.drain = setImmediate(() => {
        this.flush();
      });
    }
  }

  flush(): void {
    if (this.drain) {
      clearImmediate(this.drain);
      this.drain = undefined;
    }

    const entries = this.queue;
    this.queue = [];
    for (const entry of entries) {
      this.print(entry);
    }
  }

  private print(entry: LogEntry): void {
    const line = formatLogLine(entry, this.color);
    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}
