import { parseMessage } from '../../protocol/codec.js';
import { encodeCompact } from '../../protocol/compact.js';
import { encodeStructured } from '../../protocol/structured.js';
import { compactToStructured, structuredToCompact } from '../../protocol/converter.js';
import { MissingConversionInputError } from '../../protocol/errors.js';
import type { CodecConfig } from '../../config/schemas.js';
import { splitList } from '../io.js';

export interface ConvertCommandOptions {
  intent?: string;
  threadId?: string;
  replyTo?: string;
  status?: string;
  actions?: string;
  params?: string;
  lenient?: boolean;
}

/**
 * Convert a message to the other wire form and print it.
 */
export function runConvert(raw: string, options: ConvertCommandOptions, codec: CodecConfig): void {
  const { message } = parseMessage(raw, { strict: options.lenient ? false : codec.strict });

  if (message.format === 'compact') {
    const structured = compactToStructured(message, options.intent ?? '', {
      threadId: options.threadId,
      replyTo: options.replyTo,
      status: options.status,
    });
    console.log(encodeStructured(structured));
    return;
  }

  if (options.actions === undefined) {
    throw new MissingConversionInputError('actions');
  }
  const compact = structuredToCompact(message, {
    actions: splitList(options.actions),
    params: splitList(options.params),
  });
  console.log(encodeCompact(compact));
}
