export {
  type RandomSource,
  secureRandomBytes,
  drawRandom,
  concatBytes,
  constantTimeEqual,
  hexToBytes,
  bytesToHex,
} from './utils.js';

export {
  DJB_TYPE,
  DJB_KEY_LENGTH,
  PUBLIC_KEY_LENGTH,
  PublicKey,
  PrivateKey,
  KeyPair,
} from './keys.js';

export { SIGNATURE_LENGTH } from './xeddsa.js';

export { IdentityKey, IdentityKeyPair } from './identity.js';

export { computeMac } from './mac.js';
