/**
 * Token usage comparison between the compact form and equivalent JSON,
 * natural-language and structured renderings of the same message.
 *
 * Counts are estimates at roughly four characters per token; no tokenizer
 * is loaded.
 */

import { decodeCompact, encodeCompact } from '../../protocol/compact.js';
import { encodeStructured } from '../../protocol/structured.js';
import { compactToStructured } from '../../protocol/converter.js';
import { createCompactMessage } from '../../protocol/types.js';
import type { CompactMessage } from '../../protocol/types.js';
import { IdGenerator } from '../../protocol/id-generator.js';

const CHARS_PER_TOKEN = 4;

export interface BenchmarkRow {
  format: string;
  chars: number;
  tokens: number;
  /** tokens / compact tokens */
  ratio: number;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function defaultBenchmarkMessage(): CompactMessage {
  return createCompactMessage({
    to: 'AGT2',
    from: 'AGT1',
    type: 'REQUEST',
    priority: 'HIGH',
    actions: ['ANLY', 'XTRCT'],
    params: ['firewall.log', 'denied_ips', 'out:json'],
    ctxRef: 'ref#1',
  });
}

export function naturalLanguageRendering(message: CompactMessage): string {
  const { to, from, priority } = message.envelope;
  const params = message.params.length > 0 ? ` with parameters ${message.params.join(', ')}` : '';
  const context = message.ctxRef !== undefined ? ` Context is stored under ${message.ctxRef}.` : '';
  return (
    `Agent ${from} to Agent ${to}: Please ${message.actions.join(', ').toLowerCase()}${params}. ` +
    `Priority: ${priority}.${context}`
  );
}

export function jsonRendering(message: CompactMessage): string {
  const { to, from, type, priority } = message.envelope;
  return JSON.stringify({
    to,
    from,
    message_type: type,
    priority,
    actions: message.actions,
    parameters: message.params,
    ...(message.ctxRef !== undefined ? { context_reference: message.ctxRef } : {}),
  });
}

export function benchmarkMessage(message: CompactMessage): BenchmarkRow[] {
  const natural = naturalLanguageRendering(message);
  const structured = compactToStructured(message, natural, {
    ids: new IdGenerator('BENCH', () => 0),
    now: () => new Date(0),
  });

  const renderings: Array<[string, string]> = [
    ['compact', encodeCompact(message)],
    ['JSON', jsonRendering(message)],
    ['natural language', natural],
    ['structured', encodeStructured(structured)],
  ];

  const baseline = estimateTokens(encodeCompact(message));
  return renderings.map(([format, text]) => {
    const tokens = estimateTokens(text);
    return { format, chars: text.length, tokens, ratio: tokens / baseline };
  });
}

export function runBenchmark(raw: string | undefined): void {
  const message = raw === undefined ? defaultBenchmarkMessage() : decodeCompact(raw, { strict: false }).message;
  const rows = benchmarkMessage(message);

  console.log('Token usage comparison (estimated, ~4 chars/token)');
  console.log('');
  console.log(`${'Format'.padEnd(20)}${'Tokens'.padStart(8)}${'vs compact'.padStart(12)}${'Savings'.padStart(10)}`);
  console.log('-'.repeat(50));
  for (const row of rows) {
    const savings = row.ratio > 1 ? `${Math.round((1 - 1 / row.ratio) * 100)}%` : '-';
    console.log(
      `${row.format.padEnd(20)}${String(row.tokens).padStart(8)}${`${row.ratio.toFixed(2)}x`.padStart(12)}${savings.padStart(10)}`
    );
  }

  const natural = rows.find((row) => row.format === 'natural language');
  const compact = rows[0];
  if (natural && compact && natural.tokens > compact.tokens) {
    console.log('');
    console.log(
      `Compact form saves ~${Math.round(((natural.tokens - compact.tokens) / natural.tokens) * 100)}% tokens vs natural language`
    );
  }
}
