/**
 * agentwire CLI
 * Build, parse, convert and benchmark inter-agent messages.
 */

import { Command } from 'commander';
import { loadWireConfig } from '../config/wire-config.js';
import type { ContextStoreConfig, WireConfig } from '../config/schemas.js';
import { configureLogging } from '../utils/logger.js';
import { createContextStore } from '../storage/adapter.js';
import type { ContextStore } from '../storage/adapter.js';
import { readInput, reportError } from './io.js';
import { runParse } from './commands/parse.js';
import type { ParseCommandOptions } from './commands/parse.js';
import { runBuild } from './commands/build.js';
import type { BuildCommandOptions } from './commands/build.js';
import { runConvert } from './commands/convert.js';
import type { ConvertCommandOptions } from './commands/convert.js';
import { runDetect } from './commands/detect.js';
import { runVerbs } from './commands/verbs.js';
import type { VerbsCommandOptions } from './commands/verbs.js';
import { runBenchmark } from './commands/benchmark.js';
import {
  runContextDelete,
  runContextGet,
  runContextHealth,
  runContextKeys,
  runContextSet,
} from './commands/context.js';
import type { ContextSetOptions } from './commands/context.js';

export const VERSION = '0.1.0';

/**
 * Load the wire config, apply its logging section, then run a command body.
 * Any failure, a bad AGENTWIRE_* value included, becomes
 * `Error [<kind>]: ...` and exit code 1.
 */
async function guarded(fn: (config: WireConfig) => Promise<void> | void): Promise<void> {
  try {
    const config = loadWireConfig();
    configureLogging(config.logging);
    await fn(config);
  } catch (err) {
    reportError(err);
  }
}

async function withStore(config: ContextStoreConfig, fn: (store: ContextStore) => Promise<void>): Promise<void> {
  const store = await createContextStore(config);
  try {
    await fn(store);
  } finally {
    await store.close();
  }
}

/**
 * @param setup - applied before any command is registered, so settings such
 *   as exitOverride() and configureOutput() reach every subcommand
 */
export function createProgram(setup?: (program: Command) => void): Command {
  const program = new Command();
  setup?.(program);

  program
    .name('agentwire')
    .description('Compact and structured inter-agent message protocol')
    .version(VERSION);

  program
    .command('parse')
    .description('Detect, decode and describe a message (reads stdin when omitted)')
    .argument('[message]', 'Message text; "\\n" separates the compact lines')
    .option('--lenient', 'Ignore unknown envelope keys instead of rejecting them')
    .option('--json', 'Output as JSON')
    .action((message: string | undefined, options: ParseCommandOptions) =>
      guarded(async (config) => {
        const raw = await readInput(message);
        runParse(raw, options, config.codec);
      })
    );

  program
    .command('build')
    .description('Build a compact message')
    .requiredOption('--to <agent>', 'Recipient agent id')
    .requiredOption('--from <agent>', 'Sender agent id')
    .requiredOption('--type <type>', 'REQ, RES, ERR or FIN')
    .option('--priority <priority>', 'HIGH, MED or LOW')
    .requiredOption('--actions <verbs>', 'Comma-separated verb codes')
    .option('--params <params>', 'Comma-separated params')
    .option('--ctx-ref <ref>', 'Context reference')
    .action((options: BuildCommandOptions) => guarded((config) => runBuild(options, config.codec)));

  program
    .command('convert')
    .description('Convert between the compact and structured forms (reads stdin when omitted)')
    .argument('[message]', 'Message text')
    .option('--intent <text>', 'Intent for the structured form (compact input)')
    .option('--thread-id <id>', 'Thread to attach the structured message to')
    .option('--reply-to <id>', 'Message id this one answers')
    .option('--status <status>', 'Initial status (default PENDING)')
    .option('--actions <verbs>', 'Comma-separated verbs for the compact form (structured input)')
    .option('--params <params>', 'Comma-separated params for the compact form')
    .option('--lenient', 'Ignore unknown envelope keys instead of rejecting them')
    .action((message: string | undefined, options: ConvertCommandOptions) =>
      guarded(async (config) => {
        const raw = await readInput(message);
        runConvert(raw, options, config.codec);
      })
    );

  program
    .command('detect')
    .description('Print the wire format of a message (reads stdin when omitted)')
    .argument('[message]', 'Message text')
    .action((message: string | undefined) =>
      guarded(async () => {
        runDetect(await readInput(message));
      })
    );

  program
    .command('verbs')
    .description('List the standard verbs')
    .option('--search <term>', 'Filter by code or meaning')
    .option('--json', 'Output as JSON')
    .action((options: VerbsCommandOptions) => guarded(() => runVerbs(options)));

  program
    .command('benchmark')
    .description('Compare estimated token usage across renderings')
    .argument('[message]', 'Compact message (a built-in example when omitted)')
    .action((message: string | undefined) =>
      guarded(() => runBenchmark(message === undefined ? undefined : message.replace(/\\n/g, '\n')))
    );

  const context = program
    .command('context')
    .description('Inspect the context store configured by AGENTWIRE_CONTEXT_* variables');

  context
    .command('set')
    .description('Store a context value')
    .argument('<key>', 'Reference id, e.g. ref#1')
    .argument('<value>', 'Value to store')
    .option('--ttl <ms>', 'Expire after this many milliseconds')
    .action((key: string, value: string, options: ContextSetOptions) =>
      guarded((config) => withStore(config.context, (store) => runContextSet(store, key, value, options)))
    );

  context
    .command('get')
    .description('Resolve a context reference')
    .argument('<key>', 'Reference id')
    .action((key: string) => guarded((config) => withStore(config.context, (store) => runContextGet(store, key))));

  context
    .command('delete')
    .description('Remove a context reference')
    .argument('<key>', 'Reference id')
    .action((key: string) => guarded((config) => withStore(config.context, (store) => runContextDelete(store, key))));

  context
    .command('keys')
    .description('List live context references')
    .action(() => guarded((config) => withStore(config.context, (store) => runContextKeys(store))));

  context
    .command('health')
    .description('Check the context store backend')
    .action(() => guarded((config) => withStore(config.context, (store) => runContextHealth(store))));

  return program;
}
