import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  path: string;
  /** Start the file empty instead of appending to an earlier run's log */
  truncate?: boolean | undefined;
}

/**
 * JSON-lines log file. Context fields (`recordNumber`, `transactionId`, `clientId`, ...)
 * sit at the top level next to `time`, `level`, `category` and `msg`, so a run's log can
 * be filtered by record without unwrapping.
 */
export class FileSink extends BufferedSink {
  private readonly path: string;

  constructor(options: FileSinkOptions) {
    super(options);
    mkdirSync(dirname(options.path), { recursive: true });
    if (options.truncate) {
      writeFileSync(options.path, '', 'utf8');
    }
    this.path = options.path;
  }

  protected format(entry: LogEntry): string {
    return JSON.stringify({
      ...entry.context,
      time: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
    });
  }

  protected writeChunk(chunk: string): void {
    appendFileSync(this.path, chunk, 'utf8');
  }
}
