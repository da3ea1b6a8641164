import { describe, it, expect } from 'vitest';
import { decodeStructured, encodeStructured } from './structured.js';
import { createStructuredMessage, withArtifact } from './types.js';
import type { StructuredMessageInit } from './types.js';
import { IdGenerator } from './id-generator.js';
import { ProtocolError } from './errors.js';

const fixedIds = () => new IdGenerator('N1', () => 0);
const fixedNow = () => new Date('2025-01-01T00:00:00.000Z');

const makeMessage = () =>
  createStructuredMessage(
    {
      to: 'AGT2',
      from: 'AGT1',
      type: 'REQUEST',
      intent: 'Review the parser',
      content: 'Check a < b && c > d',
      priority: 'HIGH',
      artifacts: [{ kind: 'code', body: 'if (a < b) { run("x"); }' }],
      nextAction: 'Reply with findings',
    },
    { ids: fixedIds(), now: fixedNow }
  );

function wrap(meta: string, envelope: string, rest: string): string {
  return `<message><meta>${meta}</meta><envelope>${envelope}</envelope>${rest}</message>`;
}

const META = '<msg_id>M1</msg_id><thread_id>T1</thread_id><timestamp>2025-01-01T00:00:00Z</timestamp><priority>LOW</priority>';
const ENVELOPE = '<to>AGT2</to><from>AGT1</from><type>ACK</type><intent>ok</intent>';
const REST = '<content>done</content><artifacts/><status>DONE</status>';

const OPTIONAL_EDGES: Array<[string, Partial<StructuredMessageInit>]> = [
  ['a NULL next action', { nextAction: 'NULL' }],
  ['a blank next action', { nextAction: '  ' }],
  ['a lowercase null reply_to', { replyTo: 'null' }],
  ['a padded next action', { nextAction: '  call back later ' }],
  ['a padded artifact kind', { artifacts: [{ kind: ' code ', body: 'x = 1' }] }],
];

describe('encodeStructured', () => {
  it('emits the fixed schema with escaping', () => {
    expect(encodeStructured(makeMessage())).toBe(
      [
        '<message>',
        '  <meta>',
        '    <msg_id>MSG-0-0000-N1</msg_id>',
        '    <thread_id>THREAD-0-0001-N1</thread_id>',
        '    <timestamp>2025-01-01T00:00:00.000Z</timestamp>',
        '    <priority>HIGH</priority>',
        '  </meta>',
        '  <envelope>',
        '    <to>AGT2</to>',
        '    <from>AGT1</from>',
        '    <type>REQUEST</type>',
        '    <intent>Review the parser</intent>',
        '  </envelope>',
        '  <content>Check a &lt; b &amp;&amp; c &gt; d</content>',
        '  <artifacts>',
        '    <artifact type="code" id="ART-001">if (a &lt; b) { run("x"); }</artifact>',
        '  </artifacts>',
        '  <status>PENDING</status>',
        '  <next_action>Reply with findings</next_action>',
        '</message>',
      ].join('\n')
    );
  });

  it('writes empty artifacts and a null timestamp as empty elements', () => {
    const message = createStructuredMessage(
      { to: 'A', from: 'B', type: 'ACK', content: 'ok', timestamp: null, msgId: 'M1', threadId: 'T1' },
      { ids: fixedIds() }
    );
    const xml = encodeStructured(message);
    expect(xml).toContain('    <timestamp/>\n');
    expect(xml).toContain('  <artifacts/>\n');
    expect(xml).not.toContain('<reply_to');
    expect(xml).not.toContain('<next_action');
  });
});

describe('decodeStructured', () => {
  it('round-trips an encoded message', () => {
    const message = makeMessage();
    const { message: decoded, warnings } = decodeStructured(encodeStructured(message));
    expect(warnings).toEqual([]);
    expect(decoded).toEqual(message);
  });

  it('round-trips reply_to and several artifacts in order', () => {
    let message = createStructuredMessage(
      {
        to: 'AGT1',
        from: 'AGT2',
        type: 'RESPONSE',
        content: 'see attached',
        msgId: 'M2',
        threadId: 'T1',
        replyTo: 'M1',
        status: 'DONE',
      },
      { now: fixedNow }
    );
    message = withArtifact(message, { kind: 'test', body: 'expect(1).toBe(1)' });
    message = withArtifact(message, { kind: 'data', body: '{"a":1}', artifactId: 'ART-X' });

    const { message: decoded } = decodeStructured(encodeStructured(message));
    expect(decoded).toEqual(message);
    expect(decoded.artifacts.map((a) => a.artifactId)).toEqual(['ART-001', 'ART-X']);
  });

  it.each(OPTIONAL_EDGES)('round-trips %s', (_label, extra) => {
    const message = createStructuredMessage(
      { to: 'A', from: 'B', type: 'REQUEST', content: 'c', msgId: 'M1', threadId: 'T1', ...extra },
      { now: fixedNow }
    );
    const { message: decoded, warnings } = decodeStructured(encodeStructured(message));
    expect(warnings).toEqual([]);
    expect(decoded).toEqual(message);
  });

  it('accepts any sibling order', () => {
    const xml =
      '<message><status>DONE</status><content>done</content>' +
      '<envelope><type>ACK</type><intent>ok</intent><from>AGT1</from><to>AGT2</to></envelope>' +
      '<meta><priority>LOW</priority><timestamp>2025-01-01T00:00:00Z</timestamp><thread_id>T1</thread_id><msg_id>M1</msg_id></meta>' +
      '<artifacts/></message>';

    expect(decodeStructured(xml).message).toEqual(decodeStructured(wrap(META, ENVELOPE, REST)).message);
  });

  it('reads the fields of a hand-written document', () => {
    const { message } = decodeStructured(wrap(META, ENVELOPE, REST));
    expect(message).toMatchObject({
      format: 'structured',
      msgId: 'M1',
      threadId: 'T1',
      timestamp: '2025-01-01T00:00:00Z',
      priority: 'LOW',
      envelope: { to: 'AGT2', from: 'AGT1', type: 'ACK', intent: 'ok' },
      content: 'done',
      artifacts: [],
      status: 'DONE',
    });
    expect(message.replyTo).toBeUndefined();
    expect(message.nextAction).toBeUndefined();
  });

  it('nulls an unparsable timestamp and records a warning', () => {
    const meta = '<msg_id>M1</msg_id><thread_id>T1</thread_id><timestamp>yesterday</timestamp><priority>LOW</priority>';
    const { message, warnings } = decodeStructured(wrap(meta, ENVELOPE, REST));

    expect(message.timestamp).toBeNull();
    expect(message.content).toBe('done');
    expect(warnings).toEqual([
      { kind: 'InvalidTimestamp', field: 'timestamp', message: 'Unparsable timestamp "yesterday" was dropped' },
    ]);
  });

  it('ignores unknown elements with a warning', () => {
    const meta = `${META}<trace>abc</trace>`;
    const { message, warnings } = decodeStructured(wrap(meta, ENVELOPE, `${REST}<signature>x</signature>`));

    expect(warnings.map((w) => w.field)).toEqual(['message.signature', 'meta.trace']);
    expect(warnings[1]?.message).toBe('Ignored unknown element <trace> under <meta>');
    expect(encodeStructured(message)).not.toContain('trace');
  });

  it('falls back to msg_id when thread_id is missing', () => {
    const { message } = decodeStructured(wrap('<msg_id>M7</msg_id>', ENVELOPE, REST));
    expect(message.threadId).toBe('M7');
    expect(message.priority).toBe('MED');
    expect(message.timestamp).toBeNull();
  });

  it('maps legacy priority names', () => {
    const normal = decodeStructured(wrap('<msg_id>M1</msg_id><priority>NORMAL</priority>', ENVELOPE, REST));
    const blocking = decodeStructured(wrap('<msg_id>M1</msg_id><priority>blocking</priority>', ENVELOPE, REST));
    expect(normal.message.priority).toBe('MED');
    expect(blocking.message.priority).toBe('HIGH');
  });

  it('treats empty and NULL optional leaves as absent', () => {
    const meta = '<msg_id>M1</msg_id><reply_to>NULL</reply_to>';
    const { message } = decodeStructured(wrap(meta, ENVELOPE, `${REST}<next_action></next_action>`));
    expect(message.replyTo).toBeUndefined();
    expect(message.nextAction).toBeUndefined();
  });

  it('defaults artifact type and id', () => {
    const rest = '<content>c</content><artifacts><artifact>one</artifact><artifact type="log">two</artifact></artifacts><status>DONE</status>';
    const { message } = decodeStructured(wrap('<msg_id>M1</msg_id>', ENVELOPE, rest));
    expect(message.artifacts).toEqual([
      { artifactId: 'ART-001', kind: 'unknown', body: 'one' },
      { artifactId: 'ART-002', kind: 'log', body: 'two' },
    ]);
  });

  it.each([
    ['msg_id', wrap('<thread_id>T1</thread_id>', ENVELOPE, REST)],
    ['to', wrap(META, '<from>AGT1</from><type>ACK</type>', REST)],
    ['from', wrap(META, '<to>AGT2</to><type>ACK</type>', REST)],
    ['type', wrap(META, '<to>AGT2</to><from>AGT1</from>', REST)],
    ['content', wrap(META, ENVELOPE, '<status>DONE</status>')],
    ['status', wrap(META, ENVELOPE, '<content>done</content>')],
  ])('fails with MissingField when %s is absent', (field, xml) => {
    expect(() => decodeStructured(xml)).toThrow(ProtocolError);
    try {
      decodeStructured(xml);
    } catch (err) {
      expect(err).toMatchObject({ kind: 'MissingField', field });
    }
  });

  it('rejects a document whose root is not <message>', () => {
    expect(() => decodeStructured('<msg><content>x</content></msg>')).toThrow(
      'Malformed structured document: root element must be <message>, got <msg>'
    );
  });

  it('rejects an unknown message type', () => {
    const envelope = '<to>AGT2</to><from>AGT1</from><type>PING</type>';
    expect(() => decodeStructured(wrap(META, envelope, REST))).toThrow(/Invalid message type "PING"/);
  });
});
