import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  /** Lines held between drains; the oldest are dropped past this */
  maxPending?: number | undefined;
  /** Defaults to stderr so log lines never mix with program output on stdout */
  stream?: Pick<NodeJS.WriteStream, 'write'> | undefined;
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export function formatConsoleLine(entry: LogEntry, color = false): string {
  const time = formatTime(entry.timestamp);
  const upper = entry.level.toUpperCase().padEnd(5);
  const level = color ? `${levelColors[entry.level]}${upper}\x1b[0m` : upper;
  const context = entry.context ? ` ${formatContext(entry.context)}` : '';

  return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
}

function formatTime(timestamp: Date): string {
  const hours = String(timestamp.getHours()).padStart(2, '0');
  const minutes = String(timestamp.getMinutes()).padStart(2, '0');
  const seconds = String(timestamp.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}

/**
 * Formats entries as they arrive and writes the pending lines in one chunk
 * on the next macrotask, so an exchange never waits on stderr.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly stream: Pick<NodeJS.WriteStream, 'write'>;
  private readonly maxPending: number;
  private pending: string[] = [];
  private dropped = 0;
  private scheduled = false;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
    this.maxPending = options?.maxPending ?? 1000;
  }

  write(entry: LogEntry): void {
    if (this.pending.length >= this.maxPending) {
      this.pending.shift();
      this.dropped++;
    }
    this.pending.push(formatConsoleLine(entry, this.color));
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.flush());
    }
  }

  /** Write pending lines now. Call before process exit. */
  flush(): void {
    const lines = this.pending;
    const dropped = this.dropped;
    this.pending = [];
    this.dropped = 0;
    this.scheduled = false;

    if (dropped > 0) {
      lines.unshift(
        formatConsoleLine(
          { level: 'warn', category: 'logger', timestamp: new Date(), msg: `Dropped ${String(dropped)} log lines` },
          this.color
        )
      );
    }
    if (lines.length > 0) {
      this.stream.write(`${lines.join('\n')}\n`);
    }
  }
}
