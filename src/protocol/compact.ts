/**
 * Compact Codec
 *
 * Two-line wire form, optimized for token count:
 *
 * ```
 * @to:AGT2 @fr:AGT1 @t:REQ @p:HIGH
 * ANLY XTRCT [firewall.log] [out:json] [ctx:ref#1]
 * ```
 *
 * Rules:
 * - Envelope keys may appear in any order; @p is optional (MED)
 * - Actions are bare tokens up to the first token starting with "["
 * - Params are taken verbatim; the first "]" always closes a param
 * - A trailing [ctx:REF] becomes the context reference
 */

import {
  COMPACT_TYPE_CODES,
  CTX_PARAM_PATTERN,
  DEFAULT_PRIORITY,
  assertAgentId,
  createCompactMessage,
  parseCompactType,
  parsePriority,
} from './types.js';
import type { AgentId, CompactMessage, Priority } from './types.js';
import {
  EmptyActionListError,
  MalformedBodyError,
  MalformedEnvelopeError,
  MissingFieldError,
  UnknownFieldError,
} from './errors.js';
import type { DecodeWarning, Decoded } from './errors.js';
import type { VerbRegistry } from './verbs.js';

export interface CompactDecodeOptions {
  /** Reject unknown envelope keys (default) instead of ignoring them. */
  strict?: boolean;
  /** When given, actions missing from the registry produce UnknownVerb warnings. */
  registry?: VerbRegistry;
}

const DEFAULT_DECODE_OPTIONS = {
  strict: true,
};

type EnvelopeKey = 'to' | 'fr' | 't' | 'p';

const ENVELOPE_KEYS: readonly EnvelopeKey[] = ['to', 'fr', 't', 'p'];
const ENVELOPE_TOKEN = /^@([A-Za-z_]+):(.*)$/;
const ENVELOPE_LINE = 1;
const BODY_LINE = 2;

function isEnvelopeKey(key: string): key is EnvelopeKey {
  return ENVELOPE_KEYS.some((k) => k === key);
}

function splitLines(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

function parseEnvelopeLine(
  line: string,
  strict: boolean,
  warnings: DecodeWarning[]
): { to: AgentId; from: AgentId; type: string; priority: Priority } {
  const fields = new Map<EnvelopeKey, string>();

  for (const token of line.split(/\s+/)) {
    const match = ENVELOPE_TOKEN.exec(token);
    if (!match) {
      throw new MalformedEnvelopeError(`"${token}" is not an @key:value token`);
    }
    const [, key = '', value = ''] = match;

    if (!isEnvelopeKey(key)) {
      if (strict) {
        throw new UnknownFieldError(key, ENVELOPE_LINE);
      }
      warnings.push({ kind: 'IgnoredField', field: key, message: `Ignored unknown envelope key @${key}` });
      continue;
    }
    if (fields.has(key)) {
      throw new MalformedEnvelopeError(`duplicate key @${key}`, { field: key });
    }
    fields.set(key, value);
  }

  const required = (key: EnvelopeKey): string => {
    const value = fields.get(key);
    if (value === undefined) {
      throw new MissingFieldError(key, ENVELOPE_LINE);
    }
    return value;
  };

  const pValue = fields.get('p');
  return {
    to: assertAgentId('to', required('to'), ENVELOPE_LINE),
    from: assertAgentId('fr', required('fr'), ENVELOPE_LINE),
    type: required('t'),
    priority: pValue === undefined ? DEFAULT_PRIORITY : parsePriority(pValue, ENVELOPE_LINE),
  };
}

function parseBodyLine(line: string): { actions: string[]; params: string[] } {
  const actions: string[] = [];
  const params: string[] = [];
  let i = 0;

  const skipWhitespace = () => {
    while (i < line.length && /\s/.test(line.charAt(i))) i++;
  };

  // Action run
  for (;;) {
    skipWhitespace();
    if (i >= line.length || line.charAt(i) === '[') break;
    const start = i;
    while (i < line.length && !/\s/.test(line.charAt(i))) i++;
    const token = line.slice(start, i);
    if (token.includes('[') || token.includes(']')) {
      throw new MalformedBodyError(`"${token}" is not a verb token`, BODY_LINE);
    }
    actions.push(token);
  }

  if (actions.length === 0) {
    throw new EmptyActionListError(BODY_LINE);
  }

  // Bracketed params
  for (;;) {
    skipWhitespace();
    if (i >= line.length) break;
    if (line.charAt(i) !== '[') {
      throw new MalformedBodyError(`unexpected text "${line.slice(i)}" after params`, BODY_LINE);
    }
    const close = line.indexOf(']', i + 1);
    if (close === -1) {
      throw new MalformedBodyError(`unterminated "[" at column ${i + 1}`, BODY_LINE);
    }
    params.push(line.slice(i + 1, close));
    i = close + 1;
  }

  return { actions, params };
}

/**
 * Decode the compact wire form.
 */
export function decodeCompact(raw: string, options: CompactDecodeOptions = {}): Decoded<CompactMessage> {
  const opts = { ...DEFAULT_DECODE_OPTIONS, ...options };
  const warnings: DecodeWarning[] = [];
  const lines = splitLines(raw);

  const [envelopeLine, bodyLine, ...extra] = lines;
  if (envelopeLine === undefined) {
    throw new MalformedEnvelopeError('input is empty');
  }
  if (!envelopeLine.startsWith('@')) {
    throw new MalformedEnvelopeError('first line must start with an @key:value token');
  }
  if (extra.length > 0) {
    throw new MalformedBodyError('compact messages have exactly two lines', BODY_LINE + 1);
  }

  const envelope = parseEnvelopeLine(envelopeLine, opts.strict, warnings);
  const type = parseCompactType(envelope.type, ENVELOPE_LINE);

  if (bodyLine === undefined) {
    throw new EmptyActionListError(BODY_LINE);
  }
  const { actions, params } = parseBodyLine(bodyLine);

  let ctxRef: string | undefined;
  const last = params[params.length - 1];
  const ctxMatch = last === undefined ? null : CTX_PARAM_PATTERN.exec(last);
  if (ctxMatch) {
    ctxRef = ctxMatch[1];
    params.pop();
  }

  if (opts.registry) {
    for (const action of actions) {
      if (!opts.registry.has(action)) {
        warnings.push({ kind: 'UnknownVerb', field: 'actions', message: `Unknown verb: ${action}` });
      }
    }
  }

  const message = createCompactMessage({
    to: envelope.to,
    from: envelope.from,
    type,
    priority: envelope.priority,
    actions,
    params,
    ctxRef,
  });

  return { message, warnings };
}

/**
 * Encode to the compact wire form. Field order is fixed: to, fr, t, p.
 */
export function encodeCompact(message: CompactMessage): string {
  const { to, from, type, priority } = message.envelope;
  const envelope = `@to:${to} @fr:${from} @t:${COMPACT_TYPE_CODES[type]} @p:${priority}`;
  return `${envelope}\n${encodeCompactBody(message)}`;
}

/**
 * The body line alone: actions, bracketed params, then the ctx reference.
 */
export function encodeCompactBody(message: Pick<CompactMessage, 'actions' | 'params' | 'ctxRef'>): string {
  const tokens = [...message.actions, ...message.params.map((param) => `[${param}]`)];
  if (message.ctxRef !== undefined) {
    tokens.push(`[ctx:${message.ctxRef}]`);
  }
  return tokens.join(' ');
}

// =============================================================================
// Helpers
// =============================================================================

export interface ReplyInit {
  actions: readonly string[];
  params?: readonly string[];
  /** Defaults to the original message's reference. */
  ctxRef?: string;
}

/**
 * Build a RESPONSE addressed back to the sender of `original`.
 */
export function replyTo(original: CompactMessage, reply: ReplyInit): CompactMessage {
  return createCompactMessage({
    to: original.envelope.from,
    from: original.envelope.to,
    type: 'RESPONSE',
    priority: original.envelope.priority,
    actions: reply.actions,
    params: reply.params ?? [],
    ctxRef: reply.ctxRef ?? original.ctxRef,
  });
}

export interface ErrorMessageInit {
  to: AgentId;
  from: AgentId;
  code: string;
  detail: string;
  priority?: Priority;
}

/**
 * Build an ERROR message that escalates `code`/`detail` to `to`.
 */
export function buildErrorMessage(init: ErrorMessageInit): CompactMessage {
  return createCompactMessage({
    to: init.to,
    from: init.from,
    type: 'ERROR',
    priority: init.priority ?? 'HIGH',
    actions: ['ESCL'],
    params: [`code:${init.code}`, `detail:${init.detail}`],
  });
}
