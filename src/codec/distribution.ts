import { ProtocolError } from '../errors.js';
import { PUBLIC_KEY_LENGTH, PublicKey } from '../crypto/keys.js';
import { distributionIdFromBytes, distributionIdToBytes } from './distribution-id.js';
import {
  assertUint32,
  decodeBody,
  encodeBody,
  requiredBytes,
  requiredUint32,
  schemas,
} from './proto.js';
import { CHAIN_KEY_LENGTH, MessageVersion, type Counter, type DistributionId } from './types.js';
import { checkVersionByte, packVersionByte } from './version.js';

// A distribution message holds at least a chain key and a public key
const MIN_DISTRIBUTION_MESSAGE_LENGTH = 1 + 32 + 32;

/**
 * Fields of a new distribution message
 */
export interface SenderKeyDistributionMessageParams {
  distributionId: DistributionId;
  chainId: number;
  iteration: Counter;
  /** 32-byte sender chain key */
  chainKey: Uint8Array;
  signingKey: PublicKey;
}

/**
 * Hands a group member a sender's chain key and signature verification key.
 * Not a ciphertext message and not authenticated by itself: it is trusted
 * because of the channel that delivers it.
 */
export class SenderKeyDistributionMessage {
  private constructor(
    readonly messageVersion: MessageVersion,
    readonly distributionId: DistributionId,
    readonly chainId: number,
    readonly iteration: Counter,
    private readonly key: Uint8Array,
    readonly signingKey: PublicKey,
    private readonly bytes: Uint8Array
  ) {}

  static create(params: SenderKeyDistributionMessageParams): SenderKeyDistributionMessage {
    if (params.chainKey.length !== CHAIN_KEY_LENGTH) {
      throw ProtocolError.invalidArgument(
        `chain key must be ${CHAIN_KEY_LENGTH} bytes, got ${params.chainKey.length}`
      );
    }
    const messageVersion = MessageVersion.Version3;
    const chainKey = Uint8Array.from(params.chainKey);
    const body = encodeBody(schemas.SenderKeyDistributionMessage, {
      distributionUuid: distributionIdToBytes(params.distributionId),
      chainId: assertUint32('chainId', params.chainId),
      iteration: assertUint32('iteration', params.iteration),
      chainKey,
      signingKey: params.signingKey.serialize(),
    });

    const serialized = new Uint8Array(1 + body.length);
    serialized[0] = packVersionByte(messageVersion);
    serialized.set(body, 1);

    return new SenderKeyDistributionMessage(
      messageVersion,
      params.distributionId.toLowerCase(),
      params.chainId,
      params.iteration,
      chainKey,
      params.signingKey,
      serialized
    );
  }

  static deserialize(value: Uint8Array): SenderKeyDistributionMessage {
    if (value.length < MIN_DISTRIBUTION_MESSAGE_LENGTH) {
      throw ProtocolError.messageTooShort(value.length);
    }
    const messageVersion = checkVersionByte(value[0], 'SenderKeyDistributionMessage');
    const body = decodeBody(schemas.SenderKeyDistributionMessage, value.subarray(1));

    const distributionId = distributionIdFromBytes(requiredBytes(body, 'distributionUuid'));
    const chainId = requiredUint32(body, 'chainId');
    const iteration = requiredUint32(body, 'iteration');
    const chainKey = requiredBytes(body, 'chainKey');
    const signingKey = requiredBytes(body, 'signingKey');

    if (chainKey.length !== CHAIN_KEY_LENGTH || signingKey.length !== PUBLIC_KEY_LENGTH) {
      throw ProtocolError.invalidProtobufEncoding();
    }

    return new SenderKeyDistributionMessage(
      messageVersion,
      distributionId,
      chainId,
      iteration,
      chainKey,
      PublicKey.deserialize(signingKey),
      Uint8Array.from(value)
    );
  }

  /**
   * 32-byte sender chain key (a copy)
   */
  get chainKey(): Uint8Array {
    return Uint8Array.from(this.key);
  }

  get serialized(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}
