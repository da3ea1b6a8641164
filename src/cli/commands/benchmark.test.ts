import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  benchmarkMessage,
  defaultBenchmarkMessage,
  estimateTokens,
  naturalLanguageRendering,
  runBenchmark,
} from './benchmark.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('benchmark', () => {
  it('estimates four characters per token, rounding up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });

  it('renders the message as natural language', () => {
    expect(naturalLanguageRendering(defaultBenchmarkMessage())).toBe(
      'Agent AGT1 to Agent AGT2: Please anly, xtrct with parameters firewall.log, denied_ips, out:json. ' +
        'Priority: HIGH. Context is stored under ref#1.'
    );
  });

  it('compares renderings against the compact form', () => {
    const rows = benchmarkMessage(defaultBenchmarkMessage());

    expect(rows.map((row) => row.format)).toEqual(['compact', 'JSON', 'natural language', 'structured']);
    expect(rows[0]).toEqual({ format: 'compact', chars: 94, tokens: 24, ratio: 1 });
    expect(rows[1]).toEqual({ format: 'JSON', chars: 179, tokens: 45, ratio: 1.875 });
    expect(rows[2]).toEqual({ format: 'natural language', chars: 143, tokens: 36, ratio: 1.5 });
    expect(rows[3]?.tokens).toBeGreaterThan(36);
  });

  it('prints a table and the savings against natural language', () => {
    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.join(' '));
    });

    runBenchmark(undefined);

    expect(logs[0]).toBe('Token usage comparison (estimated, ~4 chars/token)');
    expect(logs[4]).toBe(`${'compact'.padEnd(20)}${'24'.padStart(8)}${'1.00x'.padStart(12)}${'-'.padStart(10)}`);
    expect(logs[5]).toBe(`${'JSON'.padEnd(20)}${'45'.padStart(8)}${'1.88x'.padStart(12)}${'47%'.padStart(10)}`);
    expect(logs[logs.length - 1]).toBe('Compact form saves ~33% tokens vs natural language');
  });

  it('accepts a compact message argument', () => {
    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.join(' '));
    });

    runBenchmark('@to:A @fr:B @t:REQ\nSUMM');

    expect(logs[4]).toBe(`${'compact'.padEnd(20)}${'8'.padStart(8)}${'1.00x'.padStart(12)}${'-'.padStart(10)}`);
  });
});
