import { ProtocolError } from '../errors.js';
import { PairwiseMessage } from './pairwise.js';
import { PreKeyMessage } from './prekey.js';
import { SenderKeyMessage } from './sender-key.js';
import { CiphertextMessageType } from './types.js';

/**
 * A message that travels as opaque ciphertext, tagged with its wire type
 */
export type CiphertextMessage =
  | { readonly type: CiphertextMessageType.Pairwise; readonly message: PairwiseMessage }
  | { readonly type: CiphertextMessageType.PreKey; readonly message: PreKeyMessage }
  | { readonly type: CiphertextMessageType.SenderKey; readonly message: SenderKeyMessage };

/**
 * Tag a concrete message with its wire type
 */
export function toCiphertextMessage(
  message: PairwiseMessage | PreKeyMessage | SenderKeyMessage
): CiphertextMessage {
  if (message instanceof PairwiseMessage) {
    return { type: CiphertextMessageType.Pairwise, message };
  }
  if (message instanceof PreKeyMessage) {
    return { type: CiphertextMessageType.PreKey, message };
  }
  return { type: CiphertextMessageType.SenderKey, message };
}

export function ciphertextMessageType(ciphertext: CiphertextMessage): CiphertextMessageType {
  return ciphertext.type;
}

/**
 * Wire bytes of whichever message is held
 */
export function serializeCiphertextMessage(ciphertext: CiphertextMessage): Uint8Array {
  switch (ciphertext.type) {
    case CiphertextMessageType.Pairwise:
      return ciphertext.message.serialized;
    case CiphertextMessageType.PreKey:
      return ciphertext.message.serialized;
    case CiphertextMessageType.SenderKey:
      return ciphertext.message.serialized;
    default: {
      const unreachable: never = ciphertext;
      return unreachable;
    }
  }
}

/**
 * Parse bytes received with an envelope type code
 * @throws ProtocolError InvalidArgument for codes that are not ciphertext messages
 */
export function parseCiphertextMessage(type: number, bytes: Uint8Array): CiphertextMessage {
  switch (type) {
    case CiphertextMessageType.Pairwise:
      return { type: CiphertextMessageType.Pairwise, message: PairwiseMessage.deserialize(bytes) };
    case CiphertextMessageType.PreKey:
      return { type: CiphertextMessageType.PreKey, message: PreKeyMessage.deserialize(bytes) };
    case CiphertextMessageType.SenderKey:
      return { type: CiphertextMessageType.SenderKey, message: SenderKeyMessage.deserialize(bytes) };
    default:
      throw ProtocolError.invalidArgument(`unknown ciphertext message type ${type}`);
  }
}
