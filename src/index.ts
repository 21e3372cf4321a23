// Errors
export {
  ProtocolError,
  isProtocolError,
  type ProtocolErrorDetail,
  type ProtocolErrorKind,
  type MessageKind,
  type KeyTypeName,
} from './errors.js';

// Logging
export { logger } from './logger.js';

// Keys, identities and authentication helpers
export {
  type RandomSource,
  secureRandomBytes,
  bytesToHex,
  hexToBytes,
  DJB_TYPE,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH,
  PublicKey,
  PrivateKey,
  KeyPair,
  IdentityKey,
  IdentityKeyPair,
  computeMac,
} from './crypto/index.js';

// Wire messages
export {
  CIPHERTEXT_MESSAGE_CURRENT_VERSION,
  MessageVersion,
  CiphertextMessageType,
  MAC_LENGTH,
  type Counter,
  type DistributionId,
  packVersionByte,
  checkVersionByte,
  messageVersionFromNumber,
  generateDistributionId,
  PairwiseMessage,
  PreKeyMessage,
  SenderKeyMessage,
  SenderKeyDistributionMessage,
  type PairwiseMessageParams,
  type PreKeyMessageParams,
  type SenderKeyMessageParams,
  type SenderKeyDistributionMessageParams,
  type CiphertextMessage,
  toCiphertextMessage,
  ciphertextMessageType,
  serializeCiphertextMessage,
  parseCiphertextMessage,
} from './codec/index.js';
