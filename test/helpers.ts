import { ProtocolError } from '../src/errors.js';
import { IdentityKeyPair, KeyPair, secureRandomBytes, type RandomSource } from '../src/crypto/index.js';
import { PairwiseMessage, type PairwiseMessageParams } from '../src/codec/index.js';

/**
 * Run `fn` and return the ProtocolError it throws
 */
export function captureError(fn: () => unknown): ProtocolError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ProtocolError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ProtocolError');
}

/**
 * Random source that returns `fill` repeated
 */
export function fixedRandom(fill: number): RandomSource {
  return (length) => new Uint8Array(length).fill(fill);
}

/**
 * Copy of `bytes` with one bit flipped
 */
export function flipBit(bytes: Uint8Array, index: number, bit: number): Uint8Array {
  const copy = Uint8Array.from(bytes);
  copy[index] ^= 1 << bit;
  return copy;
}

export interface PairwiseFixture {
  message: PairwiseMessage;
  params: PairwiseMessageParams;
}

export function createPairwiseMessage(
  overrides: Partial<PairwiseMessageParams> = {}
): PairwiseFixture {
  const params: PairwiseMessageParams = {
    macKey: secureRandomBytes(32),
    senderRatchetKey: KeyPair.generate().publicKey,
    counter: 42,
    previousCounter: 41,
    ciphertext: secureRandomBytes(20),
    senderIdentityKey: IdentityKeyPair.generate().identityKey(),
    receiverIdentityKey: IdentityKeyPair.generate().identityKey(),
    ...overrides,
  };
  return { message: PairwiseMessage.create(params), params };
}
