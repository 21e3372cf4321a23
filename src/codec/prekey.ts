import { ProtocolError } from '../errors.js';
import { IdentityKey } from '../crypto/identity.js';
import { PublicKey } from '../crypto/keys.js';
import { PairwiseMessage } from './pairwise.js';
import {
  assertUint32,
  decodeBody,
  encodeBody,
  optionalUint32,
  requiredBytes,
  requiredUint32,
  schemas,
} from './proto.js';
import { MessageVersion } from './types.js';
import { checkVersionByte, packVersionByte } from './version.js';

/**
 * Fields of a new pre-key message
 */
export interface PreKeyMessageParams {
  registrationId: number;
  /** One-time pre-key used, if any */
  preKeyId?: number;
  signedPreKeyId: number;
  baseKey: PublicKey;
  identityKey: IdentityKey;
  message: PairwiseMessage;
}

/**
 * First message of a session: a pairwise message plus the keys the
 * receiver needs to set the session up.
 *
 * Carries no tag of its own; the inner pairwise message's MAC covers it.
 */
export class PreKeyMessage {
  private constructor(
    readonly messageVersion: MessageVersion,
    readonly registrationId: number,
    readonly preKeyId: number | undefined,
    readonly signedPreKeyId: number,
    readonly baseKey: PublicKey,
    readonly identityKey: IdentityKey,
    readonly message: PairwiseMessage,
    private readonly bytes: Uint8Array
  ) {}

  static create(params: PreKeyMessageParams): PreKeyMessage {
    const messageVersion = MessageVersion.Version3;
    const body = encodeBody(schemas.PreKeyMessage, {
      registrationId: assertUint32('registrationId', params.registrationId),
      preKeyId: params.preKeyId === undefined ? undefined : assertUint32('preKeyId', params.preKeyId),
      signedPreKeyId: assertUint32('signedPreKeyId', params.signedPreKeyId),
      baseKey: params.baseKey.serialize(),
      identityKey: params.identityKey.serialize(),
      message: params.message.serialized,
    });

    const serialized = new Uint8Array(1 + body.length);
    serialized[0] = packVersionByte(messageVersion);
    serialized.set(body, 1);

    return new PreKeyMessage(
      messageVersion,
      params.registrationId,
      params.preKeyId,
      params.signedPreKeyId,
      params.baseKey,
      params.identityKey,
      params.message,
      serialized
    );
  }

  /**
   * Parse a pre-key message and its inner pairwise message
   */
  static deserialize(value: Uint8Array): PreKeyMessage {
    if (value.length === 0) {
      throw ProtocolError.messageTooShort(value.length);
    }
    const messageVersion = checkVersionByte(value[0], 'PreKeyMessage');
    const body = decodeBody(schemas.PreKeyMessage, value.subarray(1));

    const baseKey = requiredBytes(body, 'baseKey');
    const identityKey = requiredBytes(body, 'identityKey');
    const message = requiredBytes(body, 'message');
    const signedPreKeyId = requiredUint32(body, 'signedPreKeyId');

    return new PreKeyMessage(
      messageVersion,
      optionalUint32(body, 'registrationId') ?? 0,
      optionalUint32(body, 'preKeyId'),
      signedPreKeyId,
      PublicKey.deserialize(baseKey),
      IdentityKey.decode(identityKey),
      PairwiseMessage.deserialize(message),
      Uint8Array.from(value)
    );
  }

  get serialized(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}
