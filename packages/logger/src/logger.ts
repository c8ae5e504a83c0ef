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
}

export interface LoggerConfig {
  level?: LogLevel | undefined;
  sinks?: Sink[] | undefined;
}

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Turn a context object into plain JSON data.
 * Errors become {name, message, stack}, bigints (amounts) become decimal strings,
 * repeated object references become '[Circular]'.
 */
function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
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

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    const serialized: Record<string, unknown> = JSON.parse(JSON.stringify(obj, replacer));
    return serialized;
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

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

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (levelOrder[level] < levelOrder[globalConfig.level]) return;
    if (globalConfig.sinks.length === 0) return;

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

// Silent until initLogger() installs sinks
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
  loggerCache.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

/** Drain every sink synchronously. Call before the process exits. */
export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
