import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Pending lines that trigger a write before the end-of-run flush. Defaults to 256. */
  flushEvery?: number | undefined;
}

/**
 * Sink that renders each entry to one line and writes pending lines as a single chunk.
 *
 * Nothing is timer-driven: lines go out when `flushEvery` of them are pending, and the
 * CLI flushes the rest once, after the report (or the failure) is printed. A debug run over
 * a large file therefore costs one write per batch instead of one per record.
 */
export abstract class BufferedSink implements Sink {
  private pending: string[] = [];
  private readonly flushEvery: number;

  constructor(options?: BufferedSinkOptions) {
    this.flushEvery = Math.max(1, options?.flushEvery ?? 256);
  }

  /** One output line, without the trailing newline */
  protected abstract format(entry: LogEntry): string;

  protected abstract writeChunk(chunk: string): void;

  write(entry: LogEntry): void {
    this.pending.push(`${this.format(entry)}\n`);
    if (this.pending.length >= this.flushEvery) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pending.length === 0) return;
    const chunk = this.pending.join('');
    this.pending = [];
    this.writeChunk(chunk);
  }
}
