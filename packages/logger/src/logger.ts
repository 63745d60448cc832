export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  category: string;
  timestamp: Date;
  msg: string;
  context?: Record<string, unknown>;
}

export interface Sink {
  write(entry: LogEntry): void;
  flush(): void;
}

export interface Logger {
  readonly category: string;
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Turns a context object into plain JSON data.
 * Errors keep name, message and stack; bigints become strings; repeated
 * references (circular or shared) become '[Circular]'.
 */
export function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (value instanceof Uint8Array) {
      return `<${value.byteLength} bytes>`;
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    return JSON.parse(JSON.stringify(obj, replacer)) as Record<string, unknown>;
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return globalConfig.sinks.length > 0 && levelOrder[level] >= levelOrder[globalConfig.level];
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry =
      typeof msgOrObj === 'string'
        ? { level, category: this.category, timestamp: new Date(), msg: msgOrObj }
        : {
            level,
            category: this.category,
            timestamp: new Date(),
            msg: maybeMsg ?? '',
            context: serializeContext(msgOrObj),
          };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

// Loggers read this at log time, so loggers created at module load follow later initLogger calls
let globalConfig: { level: LogLevel; sinks: Sink[] } = {
  level: 'info',
  sinks: [],
};

const loggerCache = new Map<string, Logger>();

export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    sinks: config.sinks ?? [],
  };
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
