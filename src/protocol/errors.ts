/**
 * Codec error taxonomy.
 *
 * Every decode/construct/convert failure is a ProtocolError with a `kind`
 * and, where one exists, the offending `field` and 1-based input `line`.
 */

import { AgentwireError } from '../utils/errors.js';

export type ProtocolErrorKind =
  | 'MalformedEnvelope'
  | 'MalformedBody'
  | 'MalformedDocument'
  | 'MissingField'
  | 'UnknownField'
  | 'InvalidType'
  | 'InvalidPriority'
  | 'InvalidAgentId'
  | 'InvalidParam'
  | 'EmptyActionList'
  | 'UnrecognizedFormat'
  | 'MissingConversionInput'
  | 'InvalidVerbCode';

export interface ProtocolErrorDetails {
  field?: string;
  line?: number;
}

export class ProtocolError extends AgentwireError {
  readonly kind: ProtocolErrorKind;
  readonly field?: string;
  readonly line?: number;

  constructor(kind: ProtocolErrorKind, message: string, details: ProtocolErrorDetails = {}) {
    super(message);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.field = details.field;
    this.line = details.line;
  }
}

export class MalformedEnvelopeError extends ProtocolError {
  constructor(reason: string, details: ProtocolErrorDetails = {}) {
    super('MalformedEnvelope', `Malformed envelope: ${reason}`, { line: 1, ...details });
    this.name = 'MalformedEnvelopeError';
  }
}

export class MalformedBodyError extends ProtocolError {
  constructor(reason: string, line = 2) {
    super('MalformedBody', `Malformed body: ${reason}`, { line });
    this.name = 'MalformedBodyError';
  }
}

export class MalformedDocumentError extends ProtocolError {
  constructor(reason: string) {
    super('MalformedDocument', `Malformed structured document: ${reason}`);
    this.name = 'MalformedDocumentError';
  }
}

export class MissingFieldError extends ProtocolError {
  constructor(field: string, line?: number) {
    super('MissingField', `Missing required field: ${field}`, { field, line });
    this.name = 'MissingFieldError';
  }
}

export class UnknownFieldError extends ProtocolError {
  constructor(field: string, line?: number) {
    super('UnknownField', `Unknown envelope key rejected in strict mode: ${field}`, { field, line });
    this.name = 'UnknownFieldError';
  }
}

export class InvalidTypeError extends ProtocolError {
  constructor(value: string, allowed: readonly string[], line?: number) {
    super('InvalidType', `Invalid message type "${value}" (expected one of ${allowed.join(', ')})`, {
      field: 'type',
      line,
    });
    this.name = 'InvalidTypeError';
  }
}

export class InvalidPriorityError extends ProtocolError {
  constructor(value: string, line?: number) {
    super('InvalidPriority', `Invalid priority "${value}" (expected HIGH, MED or LOW)`, {
      field: 'priority',
      line,
    });
    this.name = 'InvalidPriorityError';
  }
}

export class InvalidAgentIdError extends ProtocolError {
  constructor(field: string, value: string, line?: number) {
    super('InvalidAgentId', `Invalid agent id for ${field}: "${value}"`, { field, line });
    this.name = 'InvalidAgentIdError';
  }
}

export class InvalidParamError extends ProtocolError {
  constructor(field: string, reason: string) {
    super('InvalidParam', `Invalid ${field}: ${reason}`, { field });
    this.name = 'InvalidParamError';
  }
}

export class EmptyActionListError extends ProtocolError {
  constructor(line?: number) {
    super('EmptyActionList', 'Message has no actions', { field: 'actions', line });
    this.name = 'EmptyActionListError';
  }
}

export class UnrecognizedFormatError extends ProtocolError {
  constructor(found: string) {
    super(
      'UnrecognizedFormat',
      found === ''
        ? 'Unrecognized format: input is empty'
        : `Unrecognized format: expected "@" (compact) or "<" (structured), found "${found}"`
    );
    this.name = 'UnrecognizedFormatError';
  }
}

export class MissingConversionInputError extends ProtocolError {
  constructor(input: string) {
    super('MissingConversionInput', `Conversion requires ${input}`, { field: input });
    this.name = 'MissingConversionInputError';
  }
}

export class InvalidVerbCodeError extends ProtocolError {
  constructor(code: string) {
    super('InvalidVerbCode', `Invalid verb code "${code}" (2-6 characters, no whitespace or brackets)`, {
      field: 'code',
    });
    this.name = 'InvalidVerbCodeError';
  }
}

/**
 * Non-fatal findings attached to a decode result.
 */
export type DecodeWarningKind = 'InvalidTimestamp' | 'UnknownVerb' | 'IgnoredField';

export interface DecodeWarning {
  kind: DecodeWarningKind;
  field: string;
  message: string;
}

export interface Decoded<T> {
  message: T;
  warnings: DecodeWarning[];
}
