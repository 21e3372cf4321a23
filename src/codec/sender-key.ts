import { ProtocolError } from '../errors.js';
import type { PrivateKey, PublicKey } from '../crypto/keys.js';
import { secureRandomBytes, type RandomSource } from '../crypto/utils.js';
import { SIGNATURE_LENGTH } from '../crypto/xeddsa.js';
import { distributionIdFromBytes, distributionIdToBytes } from './distribution-id.js';
import {
  assertUint32,
  decodeBody,
  encodeBody,
  requiredBytes,
  requiredUint32,
  schemas,
} from './proto.js';
import { MessageVersion, type Counter, type DistributionId } from './types.js';
import { checkVersionByte, packVersionByte } from './version.js';

/**
 * Fields of a new sender-key message
 */
export interface SenderKeyMessageParams {
  distributionId: DistributionId;
  chainId: number;
  iteration: Counter;
  ciphertext: Uint8Array;
  /** Private half of the sender's per-distribution signing key */
  signatureKey: PrivateKey;
  /** Nonce source for the signature; defaults to the platform CSPRNG */
  random?: RandomSource;
}

/**
 * Group message encrypted under a sender key.
 *
 * Wire layout:
 * [0]         version byte
 * [1..n-64]   protobuf body (distribution_uuid, chain_id, iteration, ciphertext)
 * [n-64..n]   XEdDSA signature over bytes [0..n-64]
 */
export class SenderKeyMessage {
  private constructor(
    readonly messageVersion: MessageVersion,
    readonly distributionId: DistributionId,
    readonly chainId: number,
    readonly iteration: Counter,
    private readonly body: Uint8Array,
    private readonly bytes: Uint8Array
  ) {}

  /**
   * Build and sign a new message. Always uses the current version.
   */
  static create(params: SenderKeyMessageParams): SenderKeyMessage {
    const messageVersion = MessageVersion.Version3;
    const ciphertext = Uint8Array.from(params.ciphertext);
    const body = encodeBody(schemas.SenderKeyMessage, {
      distributionUuid: distributionIdToBytes(params.distributionId),
      chainId: assertUint32('chainId', params.chainId),
      iteration: assertUint32('iteration', params.iteration),
      ciphertext,
    });

    const signedLength = 1 + body.length;
    const serialized = new Uint8Array(signedLength + SIGNATURE_LENGTH);
    serialized[0] = packVersionByte(messageVersion);
    serialized.set(body, 1);
    const signature = params.signatureKey.calculateSignature(
      serialized.subarray(0, signedLength),
      params.random ?? secureRandomBytes
    );
    serialized.set(signature, signedLength);

    return new SenderKeyMessage(
      messageVersion,
      params.distributionId.toLowerCase(),
      params.chainId,
      params.iteration,
      ciphertext,
      serialized
    );
  }

  /**
   * Parse a message received off the wire. Does not check the signature.
   */
  static deserialize(value: Uint8Array): SenderKeyMessage {
    if (value.length < 1 + SIGNATURE_LENGTH) {
      throw ProtocolError.messageTooShort(value.length);
    }
    const messageVersion = checkVersionByte(value[0], 'SenderKeyMessage');
    const body = decodeBody(
      schemas.SenderKeyMessage,
      value.subarray(1, value.length - SIGNATURE_LENGTH)
    );

    const distributionId = distributionIdFromBytes(requiredBytes(body, 'distributionUuid'));
    const chainId = requiredUint32(body, 'chainId');
    const iteration = requiredUint32(body, 'iteration');
    const ciphertext = requiredBytes(body, 'ciphertext');

    return new SenderKeyMessage(
      messageVersion,
      distributionId,
      chainId,
      iteration,
      ciphertext,
      Uint8Array.from(value)
    );
  }

  get ciphertext(): Uint8Array {
    return Uint8Array.from(this.body);
  }

  get serialized(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /**
   * Check the trailing signature against the distribution's signing key
   * @throws ProtocolError SignatureValidationFailed
   */
  verifySignature(signingKey: PublicKey): void {
    const signedLength = this.bytes.length - SIGNATURE_LENGTH;
    const valid = signingKey.verifySignature(
      this.bytes.subarray(0, signedLength),
      this.bytes.subarray(signedLength)
    );
    if (!valid) {
      throw ProtocolError.signatureValidationFailed();
    }
  }
}
