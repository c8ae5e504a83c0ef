import { createReadStream } from 'node:fs';

import { RowValidationError } from '@ledgerflow/core';
import { CsvError, parse, type Options, type Parser } from 'csv-parse';
import { err } from 'neverthrow';

import { toMutation, type MutationRowResult } from './mutation-row.js';

const CSV_OPTIONS: Options = {
  bom: true,
  columns: (header: string[]) => header.map((column) => column.toLowerCase()),
  relax_column_count: true,
  skip_empty_lines: true,
  trim: true,
};

async function* fromParser(parser: Parser): AsyncGenerator<MutationRowResult> {
  let recordNumber = 0;
  try {
    for await (const record of parser) {
      recordNumber++;
      yield toMutation(record, recordNumber);
    }
  } catch (error) {
    if (!(error instanceof CsvError)) throw error;
    // The tokenizer cannot resynchronise after a structural error, so the stream ends here.
    yield err(new RowValidationError(`Malformed CSV at record ${recordNumber + 1}: ${error.message}`, recordNumber + 1));
  }
}

/**
 * Stream mutations from a CSV file, one record at a time, in file order.
 *
 * Malformed rows are yielded as errors so the caller's error policy decides what happens;
 * I/O failures (missing file, permissions) reject the iteration.
 */
export async function* readMutationsFromFile(filePath: string): AsyncGenerator<MutationRowResult> {
  const parser = parse(CSV_OPTIONS);
  const input = createReadStream(filePath);
  input.on('error', (error) => parser.destroy(error));
  input.pipe(parser);

  try {
    yield* fromParser(parser);
  } finally {
    input.destroy();
  }
}

/**
 * In-memory counterpart of readMutationsFromFile.
 */
export function parseMutationsFromString(text: string): AsyncGenerator<MutationRowResult> {
  return fromParser(parse(text, CSV_OPTIONS));
}
