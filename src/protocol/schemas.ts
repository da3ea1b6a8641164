/**
 * Plain-object (JSON) forms of the canonical messages.
 *
 * Useful for logging, storage and handing messages across process
 * boundaries that already speak JSON.
 */

import { z } from 'zod';
import {
  PRIORITIES,
  STRUCTURED_TYPES,
  createCompactMessage,
  createStructuredMessage,
  parseCompactType,
} from './types.js';
import type { CompactMessage, StructuredMessage } from './types.js';

export const CompactMessageJsonSchema = z.object({
  to: z.string().min(1),
  from: z.string().min(1),
  /** Full name or wire code; checked by the model. */
  type: z.string().min(1),
  priority: z.enum(PRIORITIES).default('MED'),
  actions: z.array(z.string()).min(1),
  params: z.array(z.string()).default([]),
  ctxRef: z.string().optional(),
});

export type CompactMessageJson = z.infer<typeof CompactMessageJsonSchema>;

export const ArtifactJsonSchema = z.object({
  artifactId: z.string().min(1),
  kind: z.string().min(1),
  body: z.string(),
});

export const StructuredMessageJsonSchema = z.object({
  msgId: z.string().min(1),
  threadId: z.string().min(1),
  replyTo: z.string().optional(),
  timestamp: z.string().nullable(),
  priority: z.enum(PRIORITIES),
  to: z.string().min(1),
  from: z.string().min(1),
  type: z.enum(STRUCTURED_TYPES),
  intent: z.string().default(''),
  content: z.string(),
  artifacts: z.array(ArtifactJsonSchema).default([]),
  status: z.string().min(1),
  nextAction: z.string().optional(),
});

export type StructuredMessageJson = z.infer<typeof StructuredMessageJsonSchema>;

export function compactToJSON(message: CompactMessage): CompactMessageJson {
  const { to, from, type, priority } = message.envelope;
  return {
    to,
    from,
    type,
    priority,
    actions: [...message.actions],
    params: [...message.params],
    ...(message.ctxRef !== undefined ? { ctxRef: message.ctxRef } : {}),
  };
}

export function compactFromJSON(data: unknown): CompactMessage {
  const parsed = CompactMessageJsonSchema.parse(data);
  return createCompactMessage({ ...parsed, type: parseCompactType(parsed.type) });
}

export function structuredToJSON(message: StructuredMessage): StructuredMessageJson {
  return {
    msgId: message.msgId,
    threadId: message.threadId,
    ...(message.replyTo !== undefined ? { replyTo: message.replyTo } : {}),
    timestamp: message.timestamp,
    priority: message.priority,
    ...message.envelope,
    content: message.content,
    artifacts: message.artifacts.map((a) => ({ ...a })),
    status: message.status,
    ...(message.nextAction !== undefined ? { nextAction: message.nextAction } : {}),
  };
}

export function structuredFromJSON(data: unknown): StructuredMessage {
  const parsed = StructuredMessageJsonSchema.parse(data);
  return createStructuredMessage(parsed);
}
