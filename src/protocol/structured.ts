/**
 * Structured Codec
 *
 * Metadata-rich markup form used for traceability and debugging:
 *
 * ```xml
 * <message>
 *   <meta>
 *     <msg_id>MSG-001</msg_id>
 *     <thread_id>THREAD-001</thread_id>
 *     <timestamp>2025-01-01T00:00:00.000Z</timestamp>
 *     <priority>HIGH</priority>
 *   </meta>
 *   <envelope>
 *     <to>AGT2</to>
 *     <from>AGT1</from>
 *     <type>REQUEST</type>
 *     <intent>Review the parser</intent>
 *   </envelope>
 *   <content>Please review.</content>
 *   <artifacts>
 *     <artifact type="code" id="ART-001">...</artifact>
 *   </artifacts>
 *   <status>PENDING</status>
 * </message>
 * ```
 *
 * Sibling order is free on decode. Unknown elements are reported as
 * IgnoredField warnings and never re-emitted.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import {
  DEFAULT_PRIORITY,
  createStructuredMessage,
  defaultArtifactId,
  isAbsentText,
  isIsoTimestamp,
  parsePriority,
  parseStatus,
  parseStructuredType,
} from './types.js';
import type { ArtifactInit, Priority, StructuredMessage } from './types.js';
import { MalformedDocumentError, MissingFieldError } from './errors.js';
import type { DecodeWarning, Decoded } from './errors.js';

const MESSAGE_CHILDREN = new Set(['meta', 'envelope', 'content', 'artifacts', 'status', 'next_action']);
const META_CHILDREN = new Set(['msg_id', 'thread_id', 'reply_to', 'timestamp', 'priority']);
const ENVELOPE_CHILDREN = new Set(['to', 'from', 'type', 'intent']);

/** Priority spellings accepted from older structured producers. */
const PRIORITY_ALIASES: Record<string, Priority> = {
  NORMAL: 'MED',
  MEDIUM: 'MED',
  BLOCKING: 'HIGH',
};

const INDENT = '  ';

// =============================================================================
// Encode
// =============================================================================

function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function escapeAttr(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/"/g, '&quot;');
}

function leafLine(depth: number, name: string, value: string | null): string {
  const pad = INDENT.repeat(depth);
  return value === null || value === '' ? `${pad}<${name}/>` : `${pad}<${name}>${escapeText(value)}</${name}>`;
}

/**
 * Encode to the structured markup form. Emits only the fixed schema.
 */
export function encodeStructured(message: StructuredMessage): string {
  const lines: string[] = ['<message>'];

  lines.push(`${INDENT}<meta>`);
  lines.push(leafLine(2, 'msg_id', message.msgId));
  lines.push(leafLine(2, 'thread_id', message.threadId));
  if (message.replyTo !== undefined) {
    lines.push(leafLine(2, 'reply_to', message.replyTo));
  }
  lines.push(leafLine(2, 'timestamp', message.timestamp));
  lines.push(leafLine(2, 'priority', message.priority));
  lines.push(`${INDENT}</meta>`);

  const { to, from, type, intent } = message.envelope;
  lines.push(`${INDENT}<envelope>`);
  lines.push(leafLine(2, 'to', to));
  lines.push(leafLine(2, 'from', from));
  lines.push(leafLine(2, 'type', type));
  lines.push(leafLine(2, 'intent', intent));
  lines.push(`${INDENT}</envelope>`);

  lines.push(leafLine(1, 'content', message.content));

  if (message.artifacts.length === 0) {
    lines.push(`${INDENT}<artifacts/>`);
  } else {
    lines.push(`${INDENT}<artifacts>`);
    for (const artifact of message.artifacts) {
      lines.push(
        `${INDENT.repeat(2)}<artifact type="${escapeAttr(artifact.kind)}" id="${escapeAttr(artifact.artifactId)}">` +
          `${escapeText(artifact.body)}</artifact>`
      );
    }
    lines.push(`${INDENT}</artifacts>`);
  }

  lines.push(leafLine(1, 'status', message.status));
  if (message.nextAction !== undefined) {
    lines.push(leafLine(1, 'next_action', message.nextAction));
  }

  lines.push('</message>');
  return lines.join('\n');
}

// =============================================================================
// Decode
// =============================================================================

function child(parent: Cheerio<Element> | undefined, name: string): Cheerio<Element> | undefined {
  if (!parent) return undefined;
  const found = parent.children(name).first();
  return found.length > 0 ? found : undefined;
}

function leafText(parent: Cheerio<Element> | undefined, name: string): string | undefined {
  return child(parent, name)?.text();
}

function requiredLeaf(parent: Cheerio<Element> | undefined, name: string): string {
  const value = leafText(parent, name)?.trim();
  if (value === undefined || value === '') {
    throw new MissingFieldError(name);
  }
  return value;
}

function optionalLeaf(parent: Cheerio<Element> | undefined, name: string): string | undefined {
  const raw = leafText(parent, name);
  return isAbsentText(raw) ? undefined : raw;
}

function reportUnknownChildren(
  parent: Cheerio<Element> | undefined,
  known: ReadonlySet<string>,
  path: string,
  warnings: DecodeWarning[]
): void {
  if (!parent) return;
  for (const el of parent.children().toArray()) {
    if (!known.has(el.name)) {
      warnings.push({
        kind: 'IgnoredField',
        field: `${path}.${el.name}`,
        message: `Ignored unknown element <${el.name}> under <${path}>`,
      });
    }
  }
}

function readPriority(value: string | undefined): Priority {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_PRIORITY;
  }
  const upper = value.trim().toUpperCase();
  return PRIORITY_ALIASES[upper] ?? parsePriority(upper);
}

function readArtifacts($: CheerioAPI, container: Cheerio<Element> | undefined): ArtifactInit[] {
  if (!container) return [];
  return container
    .children('artifact')
    .toArray()
    .map((el, index) => {
      const node = $(el);
      const kind = node.attr('type')?.trim();
      const artifactId = node.attr('id')?.trim();
      return {
        kind: kind === undefined || kind === '' ? 'unknown' : kind,
        artifactId: artifactId === undefined || artifactId === '' ? defaultArtifactId(index + 1) : artifactId,
        body: node.text(),
      };
    });
}

/**
 * Decode the structured markup form.
 *
 * Missing required leaves (msg_id, to, from, type, content, status) are
 * errors; an unreadable timestamp is nulled and reported as a warning.
 */
export function decodeStructured(raw: string): Decoded<StructuredMessage> {
  const warnings: DecodeWarning[] = [];
  const $ = cheerio.load(raw, { xml: true });

  const roots = $.root().children();
  const root = roots.first();
  if (root.length === 0) {
    throw new MalformedDocumentError('no root element');
  }
  if (!root.is('message')) {
    throw new MalformedDocumentError(`root element must be <message>, got <${root.get(0)?.name ?? '?'}>`);
  }
  if (roots.length > 1) {
    throw new MalformedDocumentError('more than one root element');
  }

  const meta = child(root, 'meta');
  const envelope = child(root, 'envelope');
  reportUnknownChildren(root, MESSAGE_CHILDREN, 'message', warnings);
  reportUnknownChildren(meta, META_CHILDREN, 'meta', warnings);
  reportUnknownChildren(envelope, ENVELOPE_CHILDREN, 'envelope', warnings);

  const msgId = requiredLeaf(meta, 'msg_id');
  const to = requiredLeaf(envelope, 'to');
  const from = requiredLeaf(envelope, 'from');
  const type = parseStructuredType(requiredLeaf(envelope, 'type'));
  const content = leafText(root, 'content');
  if (content === undefined) {
    throw new MissingFieldError('content');
  }
  const status = parseStatus(requiredLeaf(root, 'status'));

  let timestamp: string | null = null;
  const rawTimestamp = leafText(meta, 'timestamp')?.trim();
  if (rawTimestamp !== undefined && rawTimestamp !== '') {
    if (isIsoTimestamp(rawTimestamp)) {
      timestamp = rawTimestamp;
    } else {
      warnings.push({
        kind: 'InvalidTimestamp',
        field: 'timestamp',
        message: `Unparsable timestamp "${rawTimestamp}" was dropped`,
      });
    }
  }

  const message = createStructuredMessage({
    to,
    from,
    type,
    intent: leafText(envelope, 'intent') ?? '',
    content,
    msgId,
    threadId: optionalLeaf(meta, 'thread_id')?.trim() ?? msgId,
    replyTo: optionalLeaf(meta, 'reply_to')?.trim(),
    timestamp,
    priority: readPriority(leafText(meta, 'priority')),
    status,
    nextAction: optionalLeaf(root, 'next_action'),
    artifacts: readArtifacts($, child(root, 'artifacts')),
  });

  return { message, warnings };
}
