import { randomBytes } from '@noble/ciphers/webcrypto';
import { equalBytes } from '@noble/curves/abstract/utils';
import { ProtocolError } from '../errors.js';

/**
 * Source of cryptographically secure random bytes.
 * Returns exactly `length` fresh bytes per call.
 */
export type RandomSource = (length: number) => Uint8Array;

/**
 * Generate cryptographically secure random bytes
 */
export function secureRandomBytes(length: number): Uint8Array {
  return randomBytes(length);
}

/**
 * Draw bytes from a caller-supplied random source.
 * A throwing source surfaces as ApplicationCallbackError.
 */
export function drawRandom(random: RandomSource, length: number): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = random(length);
  } catch (error) {
    throw ProtocolError.applicationCallback('RandomSource', error);
  }
  if (bytes.length !== length) {
    throw ProtocolError.invalidArgument(
      `random source returned ${bytes.length} bytes, expected ${length}`
    );
  }
  return bytes;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((acc, arr) => acc + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Compare two byte arrays without early exit on the first difference
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  return equalBytes(a, b);
}

/**
 * Convert hex string to Uint8Array
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string length');
  }
  if (!/^[0-9a-fA-F]*$/.test(cleanHex)) {
    throw new Error('Invalid hex string');
  }
  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(cleanHex.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert Uint8Array to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}
