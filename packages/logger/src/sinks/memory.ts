import type { LogEntry, Sink } from '../logger.js';

/**
 * Keeps entries in an array. Intended for tests and for embedding
 * applications that forward logs somewhere else.
 */
export class MemorySink implements Sink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  flush(): void {
    // entries are stored synchronously
  }

  messages(category?: string): string[] {
    return this.entries.filter((entry) => category === undefined || entry.category === category).map((e) => e.msg);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
