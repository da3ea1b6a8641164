/**
 * Top-level entry points: sniff the format once, then hand off to exactly
 * one codec. A failing decode is surfaced as-is; input is never retried
 * against the other codec.
 */

import { decodeCompact, encodeCompact } from './compact.js';
import type { CompactDecodeOptions } from './compact.js';
import { decodeStructured, encodeStructured } from './structured.js';
import { detectFormat, firstSignificantChar } from './detect.js';
import { UnrecognizedFormatError } from './errors.js';
import type { Decoded } from './errors.js';
import type { ProtocolMessage } from './types.js';

export type ParseOptions = CompactDecodeOptions;

export function parseMessage(raw: string, options: ParseOptions = {}): Decoded<ProtocolMessage> {
  const format = detectFormat(raw);
  switch (format) {
    case 'compact':
      return decodeCompact(raw, options);
    case 'structured':
      return decodeStructured(raw);
    case 'unrecognized':
      throw new UnrecognizedFormatError(firstSignificantChar(raw));
  }
}

export function encodeMessage(message: ProtocolMessage): string {
  return message.format === 'compact' ? encodeCompact(message) : encodeStructured(message);
}
