import { ProtocolError } from '../errors.js';
import { logger } from '../logger.js';
import type { IdentityKey } from '../crypto/identity.js';
import { PublicKey } from '../crypto/keys.js';
import { computeMac } from '../crypto/mac.js';
import { bytesToHex, constantTimeEqual } from '../crypto/utils.js';
import {
  assertUint32,
  decodeBody,
  encodeBody,
  optionalUint32,
  requiredBytes,
  requiredUint32,
  schemas,
} from './proto.js';
import { MAC_LENGTH, MessageVersion, type Counter } from './types.js';
import { checkVersionByte, packVersionByte } from './version.js';

const log = logger.child({ component: 'pairwise' });

/**
 * Fields of a new pairwise message
 */
export interface PairwiseMessageParams {
  /** 32-byte message MAC key */
  macKey: Uint8Array;
  senderRatchetKey: PublicKey;
  counter: Counter;
  previousCounter: Counter;
  ciphertext: Uint8Array;
  senderIdentityKey: IdentityKey;
  receiverIdentityKey: IdentityKey;
}

/**
 * Double Ratchet message between two sessions.
 *
 * Wire layout:
 * [0]        version byte
 * [1..n-8]   protobuf body (ratchet_key, counter, previous_counter, ciphertext)
 * [n-8..n]   truncated HMAC-SHA256 over bytes [0..n-8]
 */
export class PairwiseMessage {
  private constructor(
    readonly messageVersion: MessageVersion,
    readonly senderRatchetKey: PublicKey,
    readonly counter: Counter,
    readonly previousCounter: Counter,
    private readonly ciphertext: Uint8Array,
    private readonly bytes: Uint8Array
  ) {}

  /**
   * Build and MAC a new message. Always uses the current version.
   * @throws ProtocolError InvalidMacKeyLength, InvalidArgument or ProtobufEncodingError
   */
  static create(params: PairwiseMessageParams): PairwiseMessage {
    const messageVersion = MessageVersion.Version3;
    const ciphertext = Uint8Array.from(params.ciphertext);
    const body = encodeBody(schemas.PairwiseMessage, {
      ratchetKey: params.senderRatchetKey.serialize(),
      counter: assertUint32('counter', params.counter),
      previousCounter: assertUint32('previousCounter', params.previousCounter),
      ciphertext,
    });

    const serialized = new Uint8Array(1 + body.length + MAC_LENGTH);
    serialized[0] = packVersionByte(messageVersion);
    serialized.set(body, 1);
    const macOffset = serialized.length - MAC_LENGTH;
    const mac = computeMac(
      params.senderIdentityKey,
      params.receiverIdentityKey,
      params.macKey,
      serialized.subarray(0, macOffset)
    );
    serialized.set(mac, macOffset);

    return new PairwiseMessage(
      messageVersion,
      params.senderRatchetKey,
      params.counter,
      params.previousCounter,
      ciphertext,
      serialized
    );
  }

  /**
   * Parse a message received off the wire. Does not check the MAC.
   * @throws ProtocolError on short input, bad version, or malformed body
   */
  static deserialize(value: Uint8Array): PairwiseMessage {
    if (value.length < MAC_LENGTH + 1) {
      throw ProtocolError.messageTooShort(value.length);
    }
    const messageVersion = checkVersionByte(value[0], 'PairwiseMessage');
    const body = decodeBody(schemas.PairwiseMessage, value.subarray(1, value.length - MAC_LENGTH));

    const senderRatchetKey = PublicKey.deserialize(requiredBytes(body, 'ratchetKey'));
    const counter = requiredUint32(body, 'counter');
    const previousCounter = optionalUint32(body, 'previousCounter') ?? 0;
    const ciphertext = requiredBytes(body, 'ciphertext');

    return new PairwiseMessage(
      messageVersion,
      senderRatchetKey,
      counter,
      previousCounter,
      ciphertext,
      Uint8Array.from(value)
    );
  }

  /**
   * Encrypted payload (a copy)
   */
  get body(): Uint8Array {
    return Uint8Array.from(this.ciphertext);
  }

  /**
   * Exact wire bytes, MAC included (a copy)
   */
  get serialized(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /**
   * Recompute the MAC over the stored bytes and compare it with the stored tag.
   *
   * @returns false when the tags differ
   * @throws ProtocolError InvalidMacKeyLength when the MAC cannot be computed
   */
  verifyMac(sender: IdentityKey, receiver: IdentityKey, macKey: Uint8Array): boolean {
    const macOffset = this.bytes.length - MAC_LENGTH;
    const ourMac = computeMac(sender, receiver, macKey, this.bytes.subarray(0, macOffset));
    const theirMac = this.bytes.subarray(macOffset);
    const result = constantTimeEqual(ourMac, theirMac);
    if (!result) {
      log.error({ theirMac: bytesToHex(theirMac), ourMac: bytesToHex(ourMac) }, 'Bad Mac!');
    }
    return result;
  }
}
