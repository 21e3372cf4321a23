import { ed25519 } from '@noble/curves/ed25519';
import { invert, mod } from '@noble/curves/abstract/modular';
import { bytesToNumberLE, numberToBytesLE } from '@noble/curves/abstract/utils';
import { sha512 } from '@noble/hashes/sha512';
import { concatBytes } from './utils.js';

/**
 * XEdDSA: EdDSA signatures from X25519 keys.
 *
 * Signatures are plain Ed25519 signatures (R || s) made with the Edwards
 * form of the Montgomery private scalar, so any Ed25519 verifier accepts
 * them against the converted public key.
 */

export const SIGNATURE_LENGTH = 64;

const { ExtendedPoint, CURVE } = ed25519;
const ORDER = CURVE.n;
const FIELD = CURVE.Fp.ORDER;

// hash1 prefix: 0xFE followed by 31 bytes of 0xFF
const HASH1_PREFIX = new Uint8Array(32).fill(0xff);
HASH1_PREFIX[0] = 0xfe;

export function clampScalar(bytes: Uint8Array): Uint8Array {
  const k = Uint8Array.from(bytes);
  k[0] &= 248;
  k[31] &= 127;
  k[31] |= 64;
  return k;
}

function hashToScalar(...parts: Uint8Array[]): bigint {
  return mod(bytesToNumberLE(sha512(concatBytes(...parts))), ORDER);
}

/**
 * Sign `message` with a 32-byte X25519 private key.
 * `nonce` must be 64 fresh random bytes.
 */
export function xeddsaSign(
  privateKey: Uint8Array,
  message: Uint8Array,
  nonce: Uint8Array
): Uint8Array {
  const k = mod(bytesToNumberLE(clampScalar(privateKey)), ORDER);
  let point = ExtendedPoint.BASE.multiply(k);
  let a = k;
  // The public Edwards point always has a zero sign bit.
  if (point.toRawBytes()[31] & 0x80) {
    point = point.negate();
    a = mod(-k, ORDER);
  }
  const publicPoint = point.toRawBytes();

  const r = hashToScalar(HASH1_PREFIX, numberToBytesLE(a, 32), message, nonce);
  const R = ExtendedPoint.BASE.multiply(r).toRawBytes();
  const h = hashToScalar(R, publicPoint, message);
  const s = mod(r + h * a, ORDER);

  return concatBytes(R, numberToBytesLE(s, 32));
}

/**
 * Map an X25519 u-coordinate to the Edwards public key with sign bit 0.
 * Returns null for u = -1, which has no Edwards image.
 */
function montgomeryToEdwards(u: Uint8Array): Uint8Array | null {
  const uMasked = Uint8Array.from(u);
  uMasked[31] &= 0x7f;
  const uValue = mod(bytesToNumberLE(uMasked), FIELD);
  const denominator = mod(uValue + 1n, FIELD);
  if (denominator === 0n) {
    return null;
  }
  const y = mod((uValue - 1n) * invert(denominator, FIELD), FIELD);
  return numberToBytesLE(y, 32);
}

/**
 * Verify an XEdDSA signature against a 32-byte X25519 public key
 */
export function xeddsaVerify(
  publicKey: Uint8Array,
  message: Uint8Array,
  signature: Uint8Array
): boolean {
  if (signature.length !== SIGNATURE_LENGTH || publicKey.length !== 32) {
    return false;
  }
  const edwardsKey = montgomeryToEdwards(publicKey);
  if (edwardsKey === null) {
    return false;
  }
  try {
    return ed25519.verify(signature, message, edwardsKey);
  } catch {
    return false;
  }
}
