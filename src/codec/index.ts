export {
  CIPHERTEXT_MESSAGE_CURRENT_VERSION,
  MessageVersion,
  CiphertextMessageType,
  MAC_LENGTH,
  MAC_KEY_LENGTH,
  CHAIN_KEY_LENGTH,
  DISTRIBUTION_ID_LENGTH,
  type Counter,
  type DistributionId,
} from './types.js';

export { packVersionByte, checkVersionByte, messageVersionFromNumber } from './version.js';

export {
  generateDistributionId,
  distributionIdToBytes,
  distributionIdFromBytes,
} from './distribution-id.js';

export { PairwiseMessage, type PairwiseMessageParams } from './pairwise.js';
export { PreKeyMessage, type PreKeyMessageParams } from './prekey.js';
export { SenderKeyMessage, type SenderKeyMessageParams } from './sender-key.js';
export {
  SenderKeyDistributionMessage,
  type SenderKeyDistributionMessageParams,
} from './distribution.js';

export {
  type CiphertextMessage,
  toCiphertextMessage,
  ciphertextMessageType,
  serializeCiphertextMessage,
  parseCiphertextMessage,
} from './ciphertext.js';
