import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { ProtocolError } from '../errors.js';
import { MAC_KEY_LENGTH, MAC_LENGTH } from '../codec/types.js';
import type { IdentityKey } from './identity.js';

/**
 * Compute the pairwise message MAC:
 * HMAC-SHA256(macKey, sender || receiver || message), truncated to 8 bytes.
 *
 * @param sender - Sender's identity key
 * @param receiver - Receiver's identity key
 * @param macKey - 32-byte message MAC key
 * @param message - Exact bytes being authenticated (version byte + body)
 * @throws ProtocolError InvalidMacKeyLength unless the key is 32 bytes
 */
export function computeMac(
  sender: IdentityKey,
  receiver: IdentityKey,
  macKey: Uint8Array,
  message: Uint8Array
): Uint8Array {
  if (macKey.length !== MAC_KEY_LENGTH) {
    throw ProtocolError.invalidMacKeyLength(macKey.length);
  }
  const mac = hmac
    .create(sha256, macKey)
    .update(sender.serialize())
    .update(receiver.serialize())
    .update(message)
    .digest();
  return mac.slice(0, MAC_LENGTH);
}
