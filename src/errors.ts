/**
 * Error types raised across the protocol model.
 *
 * Field- and block-level problems are absorbed and logged; only the structural
 * failures below reach the caller.
 */

export type ProtocolErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'PARSE_ERROR'
  | 'UNNAMED_SEQUENCE'
  | 'UNSUPPORTED_MODALITY'
  | 'BAD_RECORD'
  | 'UNKNOWN_PARSER'
  | 'UNKNOWN_PARAMETER';

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = 'ProtocolError';
    this.code = code;
  }
}

/**
 * Sequence name not present in a protocol.
 */
export class SequenceNotFoundError extends ProtocolError {
  constructor(
    public readonly sequenceName: string,
    public readonly protocolName: string
  ) {
    super('NOT_FOUND', `Sequence '${sequenceName}' not found in protocol '${protocolName}'`);
    this.name = 'SequenceNotFoundError';
  }
}

/**
 * Sequence name already taken in a protocol.
 */
export class SequenceConflictError extends ProtocolError {
  constructor(
    public readonly sequenceName: string,
    public readonly protocolName: string
  ) {
    super('CONFLICT', `Sequence '${sequenceName}' already exists in protocol '${protocolName}'`);
    this.name = 'SequenceConflictError';
  }
}

/**
 * Document could not be parsed into any protocol structure.
 */
export class ProtocolParseError extends ProtocolError {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super('PARSE_ERROR', line !== undefined ? `${message} (line ${line})` : message);
    this.name = 'ProtocolParseError';
  }
}

export function isProtocolError(err: unknown, code?: ProtocolErrorCode): err is ProtocolError {
  if (!(err instanceof ProtocolError)) return false;
  return code === undefined || err.code === code;
}
