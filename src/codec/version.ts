import { ProtocolError, type MessageKind } from '../errors.js';
import { CIPHERTEXT_MESSAGE_CURRENT_VERSION, MessageVersion } from './types.js';

/**
 * Pack a version into the first wire byte.
 * The high nibble holds `version`; the low nibble is always the current version.
 */
export function packVersionByte(version: MessageVersion): number {
  return ((version & 0xf) << 4) | CIPHERTEXT_MESSAGE_CURRENT_VERSION;
}

/**
 * Map a numeric version field to a known version
 * @throws ProtocolError UnrecognizedMessageVersion
 */
export function messageVersionFromNumber(value: number, kind: MessageKind): MessageVersion {
  switch (value) {
    case MessageVersion.Version2:
      return MessageVersion.Version2;
    case MessageVersion.Version3:
      return MessageVersion.Version3;
    default:
      throw ProtocolError.unrecognizedMessageVersion(value, kind);
  }
}

/**
 * Classify the high nibble of a message's first byte.
 * Only the current version passes; older and newer versions are rejected.
 * @throws ProtocolError LegacyCiphertextVersion or UnrecognizedCiphertextVersion
 */
export function checkVersionByte(byte: number, kind: MessageKind): MessageVersion {
  const version = byte >> 4;
  if (version < CIPHERTEXT_MESSAGE_CURRENT_VERSION) {
    throw ProtocolError.legacyVersion(version, kind);
  }
  if (version > CIPHERTEXT_MESSAGE_CURRENT_VERSION) {
    throw ProtocolError.unrecognizedVersion(version, kind);
  }
  return messageVersionFromNumber(version, kind);
}
