import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import type { Type } from 'protobufjs';
import { ProtocolError } from '../errors.js';

// src/codec when run from sources, dist/src/codec once built
const protoDir = ['../../proto/', '../../../proto/']
  .map((relative) => fileURLToPath(new URL(relative, import.meta.url)))
  .find((dir) => existsSync(`${dir}wire.proto`));
if (protoDir === undefined) {
  throw new Error('wire.proto not found');
}

const root = protobuf.loadSync([`${protoDir}wire.proto`, `${protoDir}storage.proto`]);

/**
 * Message schemas, keyed by the name used in this library
 */
export const schemas = {
  PairwiseMessage: root.lookupType('ratchetwire.wire.PairwiseMessage'),
  PreKeyMessage: root.lookupType('ratchetwire.wire.PreKeyMessage'),
  SenderKeyMessage: root.lookupType('ratchetwire.wire.SenderKeyMessage'),
  SenderKeyDistributionMessage: root.lookupType('ratchetwire.wire.SenderKeyDistributionMessage'),
  IdentityKeyPairStructure: root.lookupType('ratchetwire.storage.IdentityKeyPairStructure'),
} as const;

/**
 * Field values of a body. Absent fields are `undefined` and are not written.
 */
export type BodyFields = Record<string, number | Uint8Array | undefined>;

/**
 * Decoded body: only the fields present on the wire
 */
export type DecodedBody = Record<string, unknown>;

export function encodeBody(type: Type, fields: BodyFields): Uint8Array {
  const present: Record<string, number | Uint8Array> = {};
  for (const [name, value] of Object.entries(fields)) {
    if (value !== undefined) {
      present[name] = value;
    }
  }
  const problem = type.verify(present);
  if (problem) {
    throw ProtocolError.protobufEncoding(new Error(problem));
  }
  try {
    return Uint8Array.from(type.encode(type.create(present)).finish());
  } catch (error) {
    throw ProtocolError.protobufEncoding(error);
  }
}

/**
 * Decode a body, keeping field presence: a field missing on the wire is
 * missing from the result rather than set to its default.
 */
export function decodeBody(type: Type, bytes: Uint8Array): DecodedBody {
  try {
    return type.toObject(type.decode(bytes));
  } catch (error) {
    throw ProtocolError.protobufDecoding(error);
  }
}

export function optionalBytes(body: DecodedBody, field: string): Uint8Array | undefined {
  const value = body[field];
  return value instanceof Uint8Array ? Uint8Array.from(value) : undefined;
}

export function optionalUint32(body: DecodedBody, field: string): number | undefined {
  const value = body[field];
  return typeof value === 'number' ? value : undefined;
}

/**
 * @throws ProtocolError InvalidProtobufEncoding when the field is absent
 */
export function requiredBytes(body: DecodedBody, field: string): Uint8Array {
  const value = optionalBytes(body, field);
  if (value === undefined) {
    throw ProtocolError.invalidProtobufEncoding();
  }
  return value;
}

/**
 * @throws ProtocolError InvalidProtobufEncoding when the field is absent
 */
export function requiredUint32(body: DecodedBody, field: string): number {
  const value = optionalUint32(body, field);
  if (value === undefined) {
    throw ProtocolError.invalidProtobufEncoding();
  }
  return value;
}

const UINT32_MAX = 0xffffffff;

/**
 * @throws ProtocolError InvalidArgument unless `value` is an integer in uint32 range
 */
export function assertUint32(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw ProtocolError.invalidArgument(`${name} must be a uint32, got ${value}`);
  }
  return value;
}
