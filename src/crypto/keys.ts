import { x25519 } from '@noble/curves/ed25519';
import { ProtocolError } from '../errors.js';
import { concatBytes, constantTimeEqual, drawRandom, secureRandomBytes, type RandomSource } from './utils.js';
import { clampScalar, xeddsaSign, xeddsaVerify } from './xeddsa.js';

/**
 * Type byte prefixed to serialized Curve25519 public keys
 */
export const DJB_TYPE = 0x05;

/**
 * Raw Curve25519 key length in bytes
 */
export const DJB_KEY_LENGTH = 32;

/**
 * Serialized public key length: type byte + 32-byte u-coordinate
 */
export const PUBLIC_KEY_LENGTH = 1 + DJB_KEY_LENGTH;

/**
 * Curve25519 public key.
 * Serialized form is `0x05 || u[32]`.
 */
export class PublicKey {
  private readonly key: Uint8Array;

  private constructor(key: Uint8Array) {
    this.key = key;
  }

  static fromPublicKeyBytes(key: Uint8Array): PublicKey {
    if (key.length !== DJB_KEY_LENGTH) {
      throw ProtocolError.badKeyLength('Djb', key.length);
    }
    return new PublicKey(Uint8Array.from(key));
  }

  /**
   * Decode a serialized public key
   * @throws ProtocolError NoKeyTypeIdentifier, BadKeyType or BadKeyLength
   */
  static deserialize(value: Uint8Array): PublicKey {
    if (value.length === 0) {
      throw ProtocolError.noKeyTypeIdentifier();
    }
    if (value[0] !== DJB_TYPE) {
      throw ProtocolError.badKeyType(value[0]);
    }
    if (value.length !== PUBLIC_KEY_LENGTH) {
      throw ProtocolError.badKeyLength('Djb', value.length);
    }
    return new PublicKey(value.slice(1));
  }

  serialize(): Uint8Array {
    return concatBytes(Uint8Array.of(DJB_TYPE), this.key);
  }

  /**
   * Raw 32-byte key without the type byte
   */
  publicKeyBytes(): Uint8Array {
    return Uint8Array.from(this.key);
  }

  verifySignature(message: Uint8Array, signature: Uint8Array): boolean {
    return xeddsaVerify(this.key, message, signature);
  }

  equals(other: PublicKey): boolean {
    return constantTimeEqual(this.key, other.key);
  }
}

/**
 * Curve25519 private key, stored clamped
 */
export class PrivateKey {
  private readonly key: Uint8Array;

  private constructor(key: Uint8Array) {
    this.key = key;
  }

  static generate(random: RandomSource = secureRandomBytes): PrivateKey {
    return new PrivateKey(clampScalar(drawRandom(random, DJB_KEY_LENGTH)));
  }

  /**
   * @throws ProtocolError BadKeyLength unless exactly 32 bytes
   */
  static deserialize(value: Uint8Array): PrivateKey {
    if (value.length !== DJB_KEY_LENGTH) {
      throw ProtocolError.badKeyLength('Djb', value.length);
    }
    return new PrivateKey(clampScalar(value));
  }

  serialize(): Uint8Array {
    return Uint8Array.from(this.key);
  }

  publicKey(): PublicKey {
    return PublicKey.fromPublicKeyBytes(x25519.getPublicKey(this.key));
  }

  /**
   * Produce a 64-byte XEdDSA signature over `message`.
   * Draws a 64-byte nonce from `random`.
   */
  calculateSignature(message: Uint8Array, random: RandomSource = secureRandomBytes): Uint8Array {
    return xeddsaSign(this.key, message, drawRandom(random, 64));
  }
}

/**
 * Matching public/private Curve25519 keys
 */
export class KeyPair {
  constructor(
    readonly publicKey: PublicKey,
    readonly privateKey: PrivateKey
  ) {}

  static generate(random: RandomSource = secureRandomBytes): KeyPair {
    const privateKey = PrivateKey.generate(random);
    return new KeyPair(privateKey.publicKey(), privateKey);
  }
}
