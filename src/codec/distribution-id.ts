import { parse, stringify, v4 as uuidv4, validate } from 'uuid';
import { ProtocolError } from '../errors.js';
import { DISTRIBUTION_ID_LENGTH, type DistributionId } from './types.js';

/**
 * Generate a fresh random distribution id
 */
export function generateDistributionId(): DistributionId {
  return uuidv4();
}

/**
 * Encode a distribution id as its 16 wire bytes. Case is ignored.
 * @throws ProtocolError InvalidArgument for anything but an RFC 4122 UUID
 */
export function distributionIdToBytes(id: DistributionId): Uint8Array {
  if (!validate(id)) {
    throw ProtocolError.invalidArgument(`invalid distribution id: ${id}`);
  }
  return Uint8Array.from(parse(id));
}

/**
 * Decode 16 wire bytes into a lowercase distribution id
 * @throws ProtocolError InvalidProtobufEncoding unless the bytes form a UUID
 */
export function distributionIdFromBytes(bytes: Uint8Array): DistributionId {
  if (bytes.length !== DISTRIBUTION_ID_LENGTH) {
    throw ProtocolError.invalidProtobufEncoding();
  }
  try {
    return stringify(bytes);
  } catch (error) {
    throw ProtocolError.invalidProtobufEncoding(error);
  }
}
