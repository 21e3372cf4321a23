/**
 * Current ciphertext message version. The only version produced or accepted.
 */
export const CIPHERTEXT_MESSAGE_CURRENT_VERSION = 3;

/**
 * Message chain format versions
 */
export enum MessageVersion {
  /** Legacy; kept so diagnostics can name it. Never produced. */
  Version2 = 2,
  /** Current */
  Version3 = 3,
}

/**
 * Wire type codes of the ciphertext message kinds.
 * Aligned with the outer envelope type space; do not renumber.
 */
export enum CiphertextMessageType {
  Pairwise = 2,
  PreKey = 3,
  SenderKey = 7,
}

/**
 * Truncated HMAC-SHA256 length appended to pairwise messages
 */
export const MAC_LENGTH = 8;

/**
 * MAC key length in bytes
 */
export const MAC_KEY_LENGTH = 32;

/**
 * Sender chain key length in distribution messages
 */
export const CHAIN_KEY_LENGTH = 32;

/**
 * Distribution id length on the wire (a UUID)
 */
export const DISTRIBUTION_ID_LENGTH = 16;

/**
 * Ratchet counters, chain ids and iterations (uint32)
 */
export type Counter = number;

/**
 * Group distribution id, as a UUID string
 */
export type DistributionId = string;
