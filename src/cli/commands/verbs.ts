import { createDefaultVerbRegistry } from '../../protocol/verbs.js';

export interface VerbsCommandOptions {
  search?: string;
  json?: boolean;
}

export function runVerbs(options: VerbsCommandOptions): void {
  const registry = createDefaultVerbRegistry();
  const entries = options.search === undefined ? registry.list() : registry.search(options.search);

  if (options.json) {
    console.log(JSON.stringify(Object.fromEntries(entries.map((e) => [e.code, e.meaning])), null, 2));
    return;
  }

  if (options.search !== undefined && entries.length === 0) {
    console.log(`No verbs found matching '${options.search}'`);
    return;
  }

  console.log(
    options.search === undefined
      ? `Standard verbs (${entries.length} total):`
      : `Verbs matching '${options.search}':`
  );
  console.log('');
  for (const entry of entries) {
    console.log(`  ${entry.code.padEnd(8)}${entry.meaning}`);
  }
}
