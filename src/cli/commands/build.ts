import { encodeCompact } from '../../protocol/compact.js';
import { createCompactMessage, parseCompactType, parsePriority } from '../../protocol/types.js';
import { createDefaultVerbRegistry } from '../../protocol/verbs.js';
import type { CodecConfig } from '../../config/schemas.js';
import { splitList } from '../io.js';

export interface BuildCommandOptions {
  to: string;
  from: string;
  type: string;
  priority?: string;
  actions: string;
  params?: string;
  ctxRef?: string;
}

/**
 * Assemble a compact message from options and print its wire form.
 */
export function runBuild(options: BuildCommandOptions, codec: CodecConfig): void {
  const actions = splitList(options.actions);
  const message = createCompactMessage({
    to: options.to,
    from: options.from,
    type: parseCompactType(options.type),
    priority: options.priority === undefined ? undefined : parsePriority(options.priority),
    actions,
    params: splitList(options.params),
    ctxRef: options.ctxRef,
  });

  if (codec.warnUnknownVerbs) {
    const registry = createDefaultVerbRegistry();
    for (const action of actions.filter((a) => !registry.has(a))) {
      console.error(`Warning: unknown verb ${action} (run "agentwire verbs" for the standard list)`);
    }
  }

  console.log(encodeCompact(message));
}
