import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
  /** Defaults to stderr: stdout carries the account report */
  stream?: Pick<NodeJS.WritableStream, 'write'> | undefined;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m', // gray
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
};

/**
 * Human-readable sink.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly stream: Pick<NodeJS.WritableStream, 'write'>;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.stream = options?.stream ?? process.stderr;
  }

  protected format(entry: LogEntry): string {
    const time = this.formatTime(entry.timestamp);
    const level = this.formatLevel(entry.level);
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';

    return `${time} ${level} [${entry.category}] ${entry.msg}${context}`;
  }

  protected writeChunk(chunk: string): void {
    this.stream.write(chunk);
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${LEVEL_COLORS[level]}${upper}\x1b[0m` : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}
