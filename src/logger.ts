import { pino } from 'pino';

/**
 * Library logger.
 *
 * Metadata only: never log plaintext, key material or whole ciphertexts.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: {
    module: 'ratchet-wire',
  },
});
