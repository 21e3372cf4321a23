/**
 * Message kinds named in version diagnostics
 */
export type MessageKind =
  | 'PairwiseMessage'
  | 'PreKeyMessage'
  | 'SenderKeyMessage'
  | 'SenderKeyDistributionMessage';

/**
 * Key type names used in key decoding errors
 */
export type KeyTypeName = 'Djb';

/**
 * Every failure this library reports, keyed by `kind`
 */
export type ProtocolErrorDetail =
  | { kind: 'InvalidArgument'; reason: string }
  | { kind: 'ProtobufDecodingError'; reason: string }
  | { kind: 'ProtobufEncodingError'; reason: string }
  | { kind: 'InvalidProtobufEncoding' }
  | { kind: 'CiphertextMessageTooShort'; length: number }
  | { kind: 'LegacyCiphertextVersion'; version: number; messageKind: MessageKind }
  | { kind: 'UnrecognizedCiphertextVersion'; version: number; messageKind: MessageKind }
  | { kind: 'UnrecognizedMessageVersion'; version: number; messageKind: MessageKind }
  | { kind: 'NoKeyTypeIdentifier' }
  | { kind: 'BadKeyType'; keyType: number }
  | { kind: 'BadKeyLength'; keyType: KeyTypeName; length: number }
  | { kind: 'SignatureValidationFailed' }
  | { kind: 'InvalidMacKeyLength'; length: number }
  | { kind: 'ApplicationCallbackError'; method: string };

export type ProtocolErrorKind = ProtocolErrorDetail['kind'];

function describe(detail: ProtocolErrorDetail): string {
  switch (detail.kind) {
    case 'InvalidArgument':
      return `invalid argument: ${detail.reason}`;
    case 'ProtobufDecodingError':
      return `failed to decode protobuf: ${detail.reason}`;
    case 'ProtobufEncodingError':
      return `failed to encode protobuf: ${detail.reason}`;
    case 'InvalidProtobufEncoding':
      return 'protobuf encoding was invalid';
    case 'CiphertextMessageTooShort':
      return `ciphertext serialized bytes were too short <${detail.length}>`;
    case 'LegacyCiphertextVersion':
      return `${detail.messageKind} ciphertext version was too old <${detail.version}>`;
    case 'UnrecognizedCiphertextVersion':
      return `${detail.messageKind} ciphertext version was unrecognized <${detail.version}>`;
    case 'UnrecognizedMessageVersion':
      return `unrecognized ${detail.messageKind} message version <${detail.version}>`;
    case 'NoKeyTypeIdentifier':
      return 'no key type identifier';
    case 'BadKeyType':
      return `bad key type <0x${detail.keyType.toString(16).padStart(2, '0')}>`;
    case 'BadKeyLength':
      return `bad key length <${detail.length}> for key with type <${detail.keyType}>`;
    case 'SignatureValidationFailed':
      return 'invalid signature detected';
    case 'InvalidMacKeyLength':
      return `invalid MAC key length <${detail.length}>`;
    case 'ApplicationCallbackError':
      return `error in method call '${detail.method}'`;
  }
}

function reasonOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Error thrown by every fallible operation in this library.
 *
 * Switch on `detail.kind` to handle a specific failure; the remaining
 * fields of `detail` depend on the kind.
 */
export class ProtocolError extends Error {
  readonly detail: ProtocolErrorDetail;

  constructor(detail: ProtocolErrorDetail, options?: { cause?: unknown }) {
    super(describe(detail), options);
    this.name = 'ProtocolError';
    this.detail = detail;
  }

  get kind(): ProtocolErrorKind {
    return this.detail.kind;
  }

  static invalidArgument(reason: string): ProtocolError {
    return new ProtocolError({ kind: 'InvalidArgument', reason });
  }

  static protobufDecoding(cause: unknown): ProtocolError {
    return new ProtocolError({ kind: 'ProtobufDecodingError', reason: reasonOf(cause) }, { cause });
  }

  static protobufEncoding(cause: unknown): ProtocolError {
    return new ProtocolError({ kind: 'ProtobufEncodingError', reason: reasonOf(cause) }, { cause });
  }

  static invalidProtobufEncoding(cause?: unknown): ProtocolError {
    return new ProtocolError(
      { kind: 'InvalidProtobufEncoding' },
      cause === undefined ? undefined : { cause }
    );
  }

  static messageTooShort(length: number): ProtocolError {
    return new ProtocolError({ kind: 'CiphertextMessageTooShort', length });
  }

  static legacyVersion(version: number, messageKind: MessageKind): ProtocolError {
    return new ProtocolError({ kind: 'LegacyCiphertextVersion', version, messageKind });
  }

  static unrecognizedVersion(version: number, messageKind: MessageKind): ProtocolError {
    return new ProtocolError({ kind: 'UnrecognizedCiphertextVersion', version, messageKind });
  }

  static unrecognizedMessageVersion(version: number, messageKind: MessageKind): ProtocolError {
    return new ProtocolError({ kind: 'UnrecognizedMessageVersion', version, messageKind });
  }

  static noKeyTypeIdentifier(): ProtocolError {
    return new ProtocolError({ kind: 'NoKeyTypeIdentifier' });
  }

  static badKeyType(keyType: number): ProtocolError {
    return new ProtocolError({ kind: 'BadKeyType', keyType });
  }

  static badKeyLength(keyType: KeyTypeName, length: number): ProtocolError {
    return new ProtocolError({ kind: 'BadKeyLength', keyType, length });
  }

  static signatureValidationFailed(): ProtocolError {
    return new ProtocolError({ kind: 'SignatureValidationFailed' });
  }

  static invalidMacKeyLength(length: number): ProtocolError {
    return new ProtocolError({ kind: 'InvalidMacKeyLength', length });
  }

  /**
   * Wrap a failure raised by application code the library called into.
   * The cause is kept as-is for diagnostics.
   */
  static applicationCallback(method: string, cause: unknown): ProtocolError {
    return new ProtocolError({ kind: 'ApplicationCallbackError', method }, { cause });
  }
}

/**
 * Check whether a value is a ProtocolError, optionally of a given kind
 */
export function isProtocolError(value: unknown, kind?: ProtocolErrorKind): value is ProtocolError {
  return value instanceof ProtocolError && (kind === undefined || value.kind === kind);
}
