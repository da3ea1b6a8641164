/**
 * Verb Registry
 *
 * Maps short verb codes (ANLY, XTRCT, ...) to their meaning. Registries are
 * plain owned objects: create one per process, per agent or per test.
 * Codes are case-sensitive.
 */

import { createLogger } from '../utils/logger.js';
import { InvalidVerbCodeError } from './errors.js';

const log = createLogger('verbs');

export interface VerbEntry {
  code: string;
  meaning: string;
}

const VERB_CODE_PATTERN = /^[^\s[\]@]{2,6}$/;

export const STANDARD_VERBS: Readonly<Record<string, string>> = Object.freeze({
  ANLY: 'Analyze input data or content',
  XTRCT: 'Extract specific fields or values',
  SUMM: 'Summarize content into a shorter form',
  EXEC: 'Execute an action or command',
  VALD: 'Validate output against a schema or rule',
  ESCL: 'Escalate to human or manager agent',
  ROUT: 'Route message or payload to another agent',
  STOR: 'Save data to context store or memory',
  FETCH: 'Retrieve data from a URL or source',
  CMPX: 'Compare two values and return diff',
  FLTR: 'Filter a dataset by given criteria',
  TRNSF: 'Transform data format (e.g., JSON to CSV)',
  NTFY: 'Notify agent or system of an event',
  RETRY: 'Retry the previous failed task',
  HALT: 'Stop pipeline execution immediately',
});

export function isValidVerbCode(code: string): boolean {
  return VERB_CODE_PATTERN.test(code);
}

export class VerbRegistry {
  // Single-threaded event loop: each Map operation completes before the next
  // caller runs, so reads never observe a half-applied registration.
  private readonly verbs = new Map<string, string>();

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [code, meaning] of Object.entries(initial)) {
      this.register(code, meaning);
    }
  }

  lookup(code: string): string | undefined {
    return this.verbs.get(code);
  }

  has(code: string): boolean {
    return this.verbs.has(code);
  }

  /**
   * Add or overwrite a verb.
   */
  register(code: string, meaning: string): void {
    if (!isValidVerbCode(code)) {
      throw new InvalidVerbCodeError(code);
    }
    const previous = this.verbs.get(code);
    if (previous !== undefined && previous !== meaning) {
      log.debug('Overwriting verb', { code, previous });
    }
    this.verbs.set(code, meaning);
  }

  /**
   * Case-insensitive substring match over code and meaning, sorted by code.
   */
  search(term: string): VerbEntry[] {
    const needle = term.toLowerCase();
    return this.list().filter(
      (entry) => entry.code.toLowerCase().includes(needle) || entry.meaning.toLowerCase().includes(needle)
    );
  }

  list(): VerbEntry[] {
    return Array.from(this.verbs, ([code, meaning]) => ({ code, meaning })).sort((a, b) =>
      a.code < b.code ? -1 : a.code > b.code ? 1 : 0
    );
  }

  get size(): number {
    return this.verbs.size;
  }
}

export function createDefaultVerbRegistry(): VerbRegistry {
  return new VerbRegistry(STANDARD_VERBS);
}
