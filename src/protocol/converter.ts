/**
 * Converter between the compact and structured forms.
 *
 * compact → structured only adds information: the body line becomes the
 * content, ids and timestamp are generated.
 *
 * structured → compact cannot recover verbs and params from free text, so the
 * caller must hand them in. The context reference survives when the content
 * carries a `[ctx:REF]` marker.
 */

import { IdGenerator, idGen } from './id-generator.js';
import { createCompactMessage, createStructuredMessage } from './types.js';
import type {
  CompactMessage,
  CompactType,
  MessageStatus,
  StructuredMessage,
  StructuredType,
} from './types.js';
import { encodeCompactBody } from './compact.js';
import { MissingConversionInputError } from './errors.js';

export const COMPACT_TO_STRUCTURED_TYPE: Readonly<Record<CompactType, StructuredType>> = {
  REQUEST: 'REQUEST',
  RESPONSE: 'RESPONSE',
  ERROR: 'ESCALATE',
  FINALIZE: 'FINALIZE',
};

export const STRUCTURED_TO_COMPACT_TYPE: Readonly<Record<StructuredType, CompactType>> = {
  REQUEST: 'REQUEST',
  RESPONSE: 'RESPONSE',
  CRITIQUE: 'RESPONSE',
  DELEGATE: 'REQUEST',
  ACK: 'RESPONSE',
  ESCALATE: 'ERROR',
  FINALIZE: 'FINALIZE',
};

const CTX_MARKER = /\[ctx:([^\]\r\n]+)\]/g;

export interface CompactToStructuredOptions {
  /** Generated when omitted (conversation root). */
  threadId?: string;
  replyTo?: string;
  status?: MessageStatus;
  nextAction?: string;
  ids?: IdGenerator;
  now?: () => Date;
}

export function compactToStructured(
  message: CompactMessage,
  intent: string,
  options: CompactToStructuredOptions = {}
): StructuredMessage {
  if (intent.trim() === '') {
    throw new MissingConversionInputError('intent');
  }
  const ids = options.ids ?? idGen;
  const { to, from, type, priority } = message.envelope;

  return createStructuredMessage(
    {
      to,
      from,
      type: COMPACT_TO_STRUCTURED_TYPE[type],
      intent,
      content: encodeCompactBody(message),
      // Always fresh: a converted message is a new message
      msgId: ids.messageId(),
      threadId: options.threadId,
      replyTo: options.replyTo,
      priority,
      status: options.status,
      nextAction: options.nextAction,
    },
    { ids, now: options.now }
  );
}

/**
 * Verbs and params to rebuild a compact body from.
 */
export interface CompactHints {
  actions: readonly string[];
  params: readonly string[];
}

/**
 * Last `[ctx:REF]` marker in free text, if any.
 */
export function findContextMarker(text: string): string | undefined {
  let ref: string | undefined;
  for (const match of text.matchAll(CTX_MARKER)) {
    ref = match[1];
  }
  return ref;
}

export function structuredToCompact(message: StructuredMessage, hints: CompactHints): CompactMessage {
  if (hints.actions.length === 0) {
    throw new MissingConversionInputError('actions');
  }
  if (hints.params === undefined) {
    throw new MissingConversionInputError('params');
  }

  const { to, from, type } = message.envelope;
  return createCompactMessage({
    to,
    from,
    type: STRUCTURED_TO_COMPACT_TYPE[type],
    priority: message.priority,
    actions: hints.actions,
    params: hints.params,
    ctxRef: findContextMarker(message.content),
  });
}
