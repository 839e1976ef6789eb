import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean;
  /** Lines held between drains before the oldest are discarded */
  maxPending?: number;
}

type ConsoleMethod = 'error' | 'warn' | 'log';

interface PendingLine {
  method: ConsoleMethod;
  line: string;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Format: 2024-01-01T12:00:00.000Z LEVEL [category] message {key=value, ...}
 */
export function formatEntry(entry: LogEntry, color = false): string {
  const padded = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${LEVEL_COLORS[entry.level]}${padded}\x1b[0m` : padded;
  const context = entry.context
    ? ` {${Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ')}}`
    : '';

  return `${entry.timestamp.toISOString()} ${level} [${entry.category}] ${entry.msg}${context}`;
}

function consoleMethodFor(level: LogLevel): ConsoleMethod {
  if (level === 'error') return 'error';
  if (level === 'warn') return 'warn';
  return 'log';
}

/**
 * Writes formatted lines to the console on the next macrotask, so decoding a
 * batch of operations does not wait on terminal output. Lines are formatted
 * when written; `flush()` prints whatever is pending immediately.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly maxPending: number;
  private pending: PendingLine[] = [];
  private discarded = 0;
  private scheduled = false;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.maxPending = options?.maxPending ?? 1000;
  }

  write(entry: LogEntry): void {
    if (this.pending.length >= this.maxPending) {
      this.pending.shift();
      this.discarded++;
    }
    this.pending.push({ method: consoleMethodFor(entry.level), line: formatEntry(entry, this.color) });

    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.flush());
    }
  }

  flush(): void {
    const lines = this.pending;
    const discarded = this.discarded;
    this.pending = [];
    this.discarded = 0;
    this.scheduled = false;

    if (discarded > 0) {
      const notice: LogEntry = {
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Discarded ${String(discarded)} console lines (sink overflow)`,
      };
      console.warn(formatEntry(notice, this.color));
    }

    for (const { method, line } of lines) {
      console[method](line);
    }
  }
}
