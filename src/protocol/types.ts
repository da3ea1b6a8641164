/**
 * Agentwire Canonical Message Model
 *
 * Both codecs decode into, and encode from, these values. Constructors
 * validate every invariant up front and return frozen values, so encoding a
 * constructed message cannot fail.
 */

import { IdGenerator, idGen } from './id-generator.js';
import {
  EmptyActionListError,
  InvalidAgentIdError,
  InvalidParamError,
  InvalidPriorityError,
  InvalidTypeError,
  MissingFieldError,
} from './errors.js';

export const PROTOCOL_VERSION = 1;

export type WireFormat = 'compact' | 'structured';

export type AgentId = string;

export const PRIORITIES = ['HIGH', 'MED', 'LOW'] as const;
export type Priority = (typeof PRIORITIES)[number];
export const DEFAULT_PRIORITY: Priority = 'MED';

/** Message types carried by the compact form. */
export const COMPACT_TYPES = ['REQUEST', 'RESPONSE', 'ERROR', 'FINALIZE'] as const;
export type CompactType = (typeof COMPACT_TYPES)[number];

/** Wire spelling of each compact type. */
export const COMPACT_TYPE_CODES = {
  REQUEST: 'REQ',
  RESPONSE: 'RES',
  ERROR: 'ERR',
  FINALIZE: 'FIN',
} as const satisfies Record<CompactType, string>;
export type CompactTypeCode = (typeof COMPACT_TYPE_CODES)[CompactType];

const COMPACT_TYPE_CODE_LIST = ['REQ', 'RES', 'ERR', 'FIN'] as const satisfies readonly CompactTypeCode[];

const COMPACT_TYPE_BY_CODE: Record<CompactTypeCode, CompactType> = {
  REQ: 'REQUEST',
  RES: 'RESPONSE',
  ERR: 'ERROR',
  FIN: 'FINALIZE',
};

/** Message types carried by the structured form. */
export const STRUCTURED_TYPES = [
  'REQUEST',
  'RESPONSE',
  'CRITIQUE',
  'DELEGATE',
  'ACK',
  'ESCALATE',
  'FINALIZE',
] as const;
export type StructuredType = (typeof STRUCTURED_TYPES)[number];

export const KNOWN_STATUSES = ['PENDING', 'IN_PROGRESS', 'DONE', 'FAILED', 'BLOCKED', 'ESCALATED'] as const;
export type KnownStatus = (typeof KNOWN_STATUSES)[number];
/** Open enum: known statuses plus any upper-case token. */
export type MessageStatus = KnownStatus | (string & {});
export const DEFAULT_STATUS: KnownStatus = 'PENDING';

export interface Envelope {
  readonly to: AgentId;
  readonly from: AgentId;
  readonly type: CompactType;
  readonly priority: Priority;
}

export interface CompactMessage {
  readonly format: 'compact';
  readonly envelope: Envelope;
  /** Verb codes in execution order; never empty. */
  readonly actions: readonly string[];
  readonly params: readonly string[];
  readonly ctxRef?: string;
}

export interface Artifact {
  readonly artifactId: string;
  /** e.g. "code", "test", "data" */
  readonly kind: string;
  readonly body: string;
}

export interface StructuredEnvelope {
  readonly to: AgentId;
  readonly from: AgentId;
  readonly type: StructuredType;
  readonly intent: string;
}

export interface StructuredMessage {
  readonly format: 'structured';
  readonly msgId: string;
  readonly threadId: string;
  readonly replyTo?: string;
  /** ISO-8601; null when absent or unreadable. */
  readonly timestamp: string | null;
  readonly priority: Priority;
  readonly envelope: StructuredEnvelope;
  readonly content: string;
  readonly artifacts: readonly Artifact[];
  readonly status: MessageStatus;
  readonly nextAction?: string;
}

export type ProtocolMessage = CompactMessage | StructuredMessage;

// =============================================================================
// Validation helpers
// =============================================================================

const AGENT_ID_PATTERN = /^[^\s@:[\]]+$/;
const TOKEN_PATTERN = /^\S+$/;
const ACTION_PATTERN = /^[^\s[\]]+$/;
const STATUS_PATTERN = /^[A-Z][A-Z0-9_]*$/;
const ISO_TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/** Matches a trailing `ctx:REF` param. */
export const CTX_PARAM_PATTERN = /^ctx:(.+)$/s;

export function isAgentId(value: string): boolean {
  return AGENT_ID_PATTERN.test(value);
}

export function assertAgentId(field: string, value: string, line?: number): AgentId {
  if (value === '') {
    throw new MissingFieldError(field, line);
  }
  if (!isAgentId(value)) {
    throw new InvalidAgentIdError(field, value, line);
  }
  return value;
}

export function isIsoTimestamp(value: string): boolean {
  return ISO_TIMESTAMP_PATTERN.test(value) && !Number.isNaN(Date.parse(value));
}

function isMember<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((item) => item === value);
}

export function parsePriority(value: string, line?: number): Priority {
  const upper = value.toUpperCase();
  if (isMember(PRIORITIES, upper)) {
    return upper;
  }
  throw new InvalidPriorityError(value, line);
}

/**
 * Accepts the wire code (REQ) or the full name (REQUEST).
 */
export function parseCompactType(value: string, line?: number): CompactType {
  const upper = value.toUpperCase();
  if (isMember(COMPACT_TYPE_CODE_LIST, upper)) {
    return COMPACT_TYPE_BY_CODE[upper];
  }
  if (isMember(COMPACT_TYPES, upper)) {
    return upper;
  }
  throw new InvalidTypeError(value, COMPACT_TYPE_CODE_LIST, line);
}

export function parseStructuredType(value: string): StructuredType {
  const upper = value.toUpperCase();
  if (isMember(STRUCTURED_TYPES, upper)) {
    return upper;
  }
  throw new InvalidTypeError(value, STRUCTURED_TYPES);
}

export function parseStatus(value: string): MessageStatus {
  const upper = value.trim().toUpperCase();
  if (!STATUS_PATTERN.test(upper)) {
    throw new InvalidParamError('status', `"${value}" is not a status token`);
  }
  return upper;
}

function assertToken(field: string, value: string): string {
  if (!TOKEN_PATTERN.test(value)) {
    throw new InvalidParamError(field, `"${value}" must be a non-empty token without whitespace`);
  }
  return value;
}

/** Blank or `NULL` optional leaves read as absent, on construction and on decode. */
export function isAbsentText(value: string | undefined): boolean {
  if (value === undefined) return true;
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toUpperCase() === 'NULL';
}

function assertBracketSafe(field: string, value: string): void {
  if (value.includes(']')) {
    throw new InvalidParamError(field, `"${value}" contains "]" which would close the bracket early`);
  }
  if (/[\r\n]/.test(value)) {
    throw new InvalidParamError(field, 'line breaks cannot be carried by the compact form');
  }
}

// =============================================================================
// Compact construction
// =============================================================================

export interface CompactMessageInit {
  to: AgentId;
  from: AgentId;
  type: CompactType | CompactTypeCode;
  priority?: Priority;
  actions: readonly string[];
  params?: readonly string[];
  ctxRef?: string;
}

export function createCompactMessage(init: CompactMessageInit): CompactMessage {
  const to = assertAgentId('to', init.to);
  const from = assertAgentId('from', init.from);
  const type = parseCompactType(init.type);
  const priority = parsePriority(init.priority ?? DEFAULT_PRIORITY);

  if (init.actions.length === 0) {
    throw new EmptyActionListError();
  }
  for (const action of init.actions) {
    if (!ACTION_PATTERN.test(action)) {
      throw new InvalidParamError('actions', `"${action}" is not a verb token`);
    }
  }

  const params = init.params ?? [];
  for (const param of params) {
    assertBracketSafe('params', param);
  }

  const ctxRef = init.ctxRef === '' ? undefined : init.ctxRef;
  if (ctxRef !== undefined) {
    assertBracketSafe('ctxRef', ctxRef);
  } else if (params.length > 0 && CTX_PARAM_PATTERN.test(params[params.length - 1] ?? '')) {
    throw new InvalidParamError('params', 'a trailing "ctx:" param is reserved for the context reference');
  }

  const message: CompactMessage = {
    format: 'compact',
    envelope: Object.freeze({ to, from, type, priority }),
    actions: Object.freeze([...init.actions]),
    params: Object.freeze([...params]),
    ...(ctxRef !== undefined ? { ctxRef } : {}),
  };
  return Object.freeze(message);
}

// =============================================================================
// Structured construction
// =============================================================================

export interface ArtifactInit {
  kind: string;
  body: string;
  artifactId?: string;
}

export interface StructuredMessageInit {
  to: AgentId;
  from: AgentId;
  type: StructuredType;
  intent?: string;
  content: string;
  msgId?: string;
  threadId?: string;
  replyTo?: string;
  /** Omitted: now. null: explicitly unknown. */
  timestamp?: string | null;
  priority?: Priority;
  status?: MessageStatus;
  nextAction?: string;
  artifacts?: readonly ArtifactInit[];
}

export interface ConstructionOptions {
  ids?: IdGenerator;
  now?: () => Date;
}

export function defaultArtifactId(position: number): string {
  return `ART-${String(position).padStart(3, '0')}`;
}

function buildArtifacts(inits: readonly ArtifactInit[]): readonly Artifact[] {
  const seen = new Set<string>();
  const artifacts = inits.map((init, index) => {
    const artifactId = assertToken('artifactId', init.artifactId ?? defaultArtifactId(index + 1));
    if (seen.has(artifactId)) {
      throw new InvalidParamError('artifactId', `duplicate artifact id "${artifactId}"`);
    }
    seen.add(artifactId);
    const kind = init.kind.trim();
    if (kind === '') {
      throw new InvalidParamError('artifact.kind', 'artifact kind cannot be empty');
    }
    return Object.freeze({ artifactId, kind, body: init.body });
  });
  return Object.freeze(artifacts);
}

export function createStructuredMessage(
  init: StructuredMessageInit,
  options: ConstructionOptions = {}
): StructuredMessage {
  const ids = options.ids ?? idGen;
  const now = options.now ?? (() => new Date());

  const to = assertAgentId('to', init.to);
  const from = assertAgentId('from', init.from);
  const type = parseStructuredType(init.type);
  const priority = parsePriority(init.priority ?? DEFAULT_PRIORITY);
  const status = parseStatus(init.status ?? DEFAULT_STATUS);

  const msgId = assertToken('msgId', init.msgId ?? ids.messageId());
  const threadId = assertToken('threadId', init.threadId ?? ids.threadId());
  if (threadId.toUpperCase() === 'NULL') {
    throw new InvalidParamError('threadId', '"NULL" is reserved for an absent thread');
  }
  const replyTo =
    init.replyTo === undefined || isAbsentText(init.replyTo) ? undefined : assertToken('replyTo', init.replyTo);

  let timestamp: string | null;
  if (init.timestamp === undefined) {
    timestamp = now().toISOString();
  } else if (init.timestamp === null) {
    timestamp = null;
  } else if (isIsoTimestamp(init.timestamp)) {
    timestamp = init.timestamp;
  } else {
    throw new InvalidParamError('timestamp', `"${init.timestamp}" is not an ISO-8601 timestamp`);
  }

  const nextAction = isAbsentText(init.nextAction) ? undefined : init.nextAction;

  const message: StructuredMessage = {
    format: 'structured',
    msgId,
    threadId,
    ...(replyTo !== undefined ? { replyTo } : {}),
    timestamp,
    priority,
    envelope: Object.freeze({ to, from, type, intent: init.intent ?? '' }),
    content: init.content,
    artifacts: buildArtifacts(init.artifacts ?? []),
    status,
    ...(nextAction !== undefined ? { nextAction } : {}),
  };
  return Object.freeze(message);
}

/**
 * Return a copy of `message` with one more artifact appended.
 */
export function withArtifact(message: StructuredMessage, artifact: ArtifactInit): StructuredMessage {
  const inits: ArtifactInit[] = message.artifacts.map((a) => ({
    artifactId: a.artifactId,
    kind: a.kind,
    body: a.body,
  }));
  inits.push({
    ...artifact,
    artifactId: artifact.artifactId ?? defaultArtifactId(inits.length + 1),
  });
  return Object.freeze({ ...message, artifacts: buildArtifacts(inits) });
}

export function isCompactMessage(message: ProtocolMessage): message is CompactMessage {
  return message.format === 'compact';
}

export function isStructuredMessage(message: ProtocolMessage): message is StructuredMessage {
  return message.format === 'structured';
}
