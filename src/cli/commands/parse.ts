import { parseMessage } from '../../protocol/codec.js';
import { compactToJSON, structuredToJSON } from '../../protocol/schemas.js';
import { createDefaultVerbRegistry } from '../../protocol/verbs.js';
import type { VerbRegistry } from '../../protocol/verbs.js';
import type { CompactMessage, StructuredMessage } from '../../protocol/types.js';
import type { DecodeWarning } from '../../protocol/errors.js';
import type { CodecConfig } from '../../config/schemas.js';

export interface ParseCommandOptions {
  lenient?: boolean;
  json?: boolean;
}

function printCompact(message: CompactMessage, registry: VerbRegistry): void {
  const { to, from, type, priority } = message.envelope;
  console.log('Format: compact');
  console.log('');
  console.log('Envelope:');
  console.log(`  To:       ${to}`);
  console.log(`  From:     ${from}`);
  console.log(`  Type:     ${type}`);
  console.log(`  Priority: ${priority}`);
  console.log('');
  console.log('Actions:');
  for (const action of message.actions) {
    console.log(`  - ${action} (${registry.lookup(action) ?? 'unknown verb'})`);
  }
  if (message.params.length > 0) {
    console.log('');
    console.log('Parameters:');
    for (const param of message.params) {
      console.log(`  - ${param}`);
    }
  }
  if (message.ctxRef !== undefined) {
    console.log('');
    console.log(`Context: ${message.ctxRef}`);
  }
}

function printStructured(message: StructuredMessage): void {
  const { to, from, type, intent } = message.envelope;
  console.log('Format: structured');
  console.log('');
  console.log('Meta:');
  console.log(`  Message:   ${message.msgId}`);
  console.log(`  Thread:    ${message.threadId}`);
  if (message.replyTo !== undefined) {
    console.log(`  Reply to:  ${message.replyTo}`);
  }
  console.log(`  Timestamp: ${message.timestamp ?? '(none)'}`);
  console.log(`  Priority:  ${message.priority}`);
  console.log('');
  console.log('Envelope:');
  console.log(`  To:     ${to}`);
  console.log(`  From:   ${from}`);
  console.log(`  Type:   ${type}`);
  console.log(`  Intent: ${intent}`);
  console.log('');
  console.log('Content:');
  console.log(`  ${message.content}`);
  if (message.artifacts.length > 0) {
    console.log('');
    console.log('Artifacts:');
    for (const artifact of message.artifacts) {
      console.log(`  - ${artifact.artifactId} (${artifact.kind}, ${artifact.body.length} chars)`);
    }
  }
  console.log('');
  console.log(`Status: ${message.status}`);
  if (message.nextAction !== undefined) {
    console.log(`Next action: ${message.nextAction}`);
  }
}

function printWarnings(warnings: DecodeWarning[]): void {
  if (warnings.length === 0) return;
  console.log('');
  console.log('Warnings:');
  for (const warning of warnings) {
    console.log(`  - [${warning.kind}] ${warning.message}`);
  }
}

/**
 * Detect, decode and describe a message.
 */
export function runParse(raw: string, options: ParseCommandOptions, codec: CodecConfig): void {
  const registry = createDefaultVerbRegistry();
  const strict = options.lenient ? false : codec.strict;
  const { message, warnings } = parseMessage(raw, {
    strict,
    registry: codec.warnUnknownVerbs ? registry : undefined,
  });

  if (options.json) {
    const body = message.format === 'compact' ? compactToJSON(message) : structuredToJSON(message);
    console.log(JSON.stringify({ format: message.format, message: body, warnings }, null, 2));
    return;
  }

  if (message.format === 'compact') {
    printCompact(message, registry);
  } else {
    printStructured(message);
  }
  printWarnings(warnings);
}
