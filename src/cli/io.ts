import type { Readable } from 'node:stream';
import { errorKind } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('cli');

/**
 * Message text from an argument, or all of stdin when the argument is
 * omitted. A literal `\n` in an argument stands for a line break so a
 * two-line compact message fits in one shell argument.
 */
export async function readInput(argument: string | undefined, stdin: Readable = process.stdin): Promise<string> {
  if (argument !== undefined) {
    return argument.includes('\n') ? argument : argument.replace(/\\n/g, '\n');
  }
  const chunks: string[] = [];
  stdin.setEncoding('utf-8');
  for await (const chunk of stdin) {
    chunks.push(String(chunk));
  }
  return chunks.join('');
}

/** Comma-separated option value to trimmed, non-empty items. */
export function splitList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Print a failure as `Error [<kind>]: <message>` and mark the process failed.
 */
export function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error [${errorKind(err)}]: ${message}`);
  if (err instanceof Error && err.stack) {
    log.debug('Command failed', { stack: err.stack });
  }
  process.exitCode = 1;
}
