import { EngineAbortError, InsufficientFundsError } from '@ledgerflow/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExitCodes } from '../exit-codes.js';
import { OutputManager, type OutputStreams } from '../output.js';

function captureStreams(): OutputStreams & { out: string[]; errOut: string[] } {
  const out: string[] = [];
  const errOut: string[] = [];
  return {
    out,
    errOut,
    stdout: { write: (chunk: string | Uint8Array) => out.push(String(chunk)) > 0 },
    stderr: { write: (chunk: string | Uint8Array) => errOut.push(String(chunk)) > 0 },
  };
}

function abortError(): EngineAbortError {
  const reason = new InsufficientFundsError("Error on trx 2: Can't withdraw 7.0000", {
    transactionId: 2,
    clientId: 1,
    amount: 70_000n,
  });
  return new EngineAbortError(2, reason);
}

describe('OutputManager', () => {
  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report the output mode', () => {
    expect(new OutputManager('json').isJsonMode()).toBe(true);
    expect(new OutputManager().isJsonMode()).toBe(false);
  });

  it('should write the report to stdout in text mode only', () => {
    const text = captureStreams();
    const json = captureStreams();

    new OutputManager('text', text).report('client,available,held,total,locked\n');
    new OutputManager('json', json).report('client,available,held,total,locked\n');

    expect(text.out).toEqual(['client,available,held,total,locked\n']);
    expect(json.out).toEqual([]);
  });

  it('should write a JSON envelope with the run duration', () => {
    const streams = captureStreams();

    new OutputManager('json', streams).json('ledgerflow', { accounts: [] });

    const parsed: unknown = JSON.parse(streams.out.join(''));
    expect(parsed).toMatchObject({ success: true, command: 'ledgerflow', data: { accounts: [] } });
    expect(parsed).toHaveProperty('durationMs');
  });

  it('should print the heading and reason to stderr and exit in text mode', () => {
    const streams = captureStreams();
    const output = new OutputManager('text', streams);

    expect(() =>
      output.error('ledgerflow', abortError(), ExitCodes.GENERAL_ERROR, 'The transaction engine failed with message:')
    ).toThrow('process.exit called');

    const written = streams.errOut.join('');
    expect(written).toContain('The transaction engine failed with message:');
    expect(written).toContain("\nRecord 2 (tx 2): Error on trx 2: Can't withdraw 7.0000\n");
    expect(streams.out).toEqual([]);
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should write domain error details to stdout in JSON mode', () => {
    const streams = captureStreams();
    const output = new OutputManager('json', streams);

    expect(() => output.error('ledgerflow', abortError(), ExitCodes.GENERAL_ERROR)).toThrow('process.exit called');

    expect(JSON.parse(streams.out.join(''))).toMatchObject({
      success: false,
      command: 'ledgerflow',
      error: {
        code: 'GENERAL_ERROR',
        message: "Record 2 (tx 2): Error on trx 2: Can't withdraw 7.0000",
        details: { code: 'ENGINE_ABORTED', transactionId: 2, clientId: 1, amount: '70000' },
      },
    });
    expect(streams.errOut).toEqual([]);
  });

  it('should add a usage tip for invalid arguments', () => {
    const streams = captureStreams();
    const output = new OutputManager('text', streams);

    expect(() => output.error('ledgerflow', new Error('bad flag'), ExitCodes.INVALID_ARGS)).toThrow(
      'process.exit called'
    );

    expect(streams.errOut.join('')).toContain('Run with --help for usage information.');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});
