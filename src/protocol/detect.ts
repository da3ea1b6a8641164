/**
 * Format sniffing: looks only at the first non-whitespace character.
 */

import type { WireFormat } from './types.js';

export type DetectedFormat = WireFormat | 'unrecognized';

export function firstSignificantChar(raw: string): string {
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (!/\s/.test(ch)) return ch;
  }
  return '';
}

/**
 * `<` means structured, `@` means compact, anything else (including empty
 * input) is unrecognized. Never parses or mutates the input.
 */
export function detectFormat(raw: string): DetectedFormat {
  switch (firstSignificantChar(raw)) {
    case '<':
      return 'structured';
    case '@':
      return 'compact';
    default:
      return 'unrecognized';
  }
}
