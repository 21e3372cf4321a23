import { decodeBody, encodeBody, requiredBytes, schemas } from '../codec/proto.js';
import { KeyPair, PrivateKey, PublicKey } from './keys.js';
import { secureRandomBytes, type RandomSource } from './utils.js';

/**
 * The public identity of a user. Wraps a {@link PublicKey}.
 */
export class IdentityKey {
  constructor(private readonly key: PublicKey) {}

  /**
   * Decode a public identity from its serialized public key
   */
  static decode(value: Uint8Array): IdentityKey {
    return new IdentityKey(PublicKey.deserialize(value));
  }

  publicKey(): PublicKey {
    return this.key;
  }

  /**
   * Serialized public key; the inverse of {@link IdentityKey.decode}
   */
  serialize(): Uint8Array {
    return this.key.serialize();
  }

  equals(other: IdentityKey): boolean {
    return this.key.equals(other.key);
  }
}

/**
 * The private identity of a user
 */
export class IdentityKeyPair {
  constructor(
    private readonly identity: IdentityKey,
    private readonly secret: PrivateKey
  ) {}

  static generate(random: RandomSource = secureRandomBytes): IdentityKeyPair {
    return IdentityKeyPair.fromKeyPair(KeyPair.generate(random));
  }

  static fromKeyPair(keyPair: KeyPair): IdentityKeyPair {
    return new IdentityKeyPair(new IdentityKey(keyPair.publicKey), keyPair.privateKey);
  }

  static fromPrivateKey(privateKey: PrivateKey): IdentityKeyPair {
    return new IdentityKeyPair(new IdentityKey(privateKey.publicKey()), privateKey);
  }

  /**
   * Decode a key pair written by {@link IdentityKeyPair.serialize}
   */
  static deserialize(value: Uint8Array): IdentityKeyPair {
    const body = decodeBody(schemas.IdentityKeyPairStructure, value);
    return new IdentityKeyPair(
      IdentityKey.decode(requiredBytes(body, 'publicKey')),
      PrivateKey.deserialize(requiredBytes(body, 'privateKey'))
    );
  }

  identityKey(): IdentityKey {
    return this.identity;
  }

  publicKey(): PublicKey {
    return this.identity.publicKey();
  }

  privateKey(): PrivateKey {
    return this.secret;
  }

  serialize(): Uint8Array {
    return encodeBody(schemas.IdentityKeyPairStructure, {
      publicKey: this.identity.serialize(),
      privateKey: this.secret.serialize(),
    });
  }
}
