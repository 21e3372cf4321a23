#!/usr/bin/env npx tsx
/**
 * Wire format demo
 *
 * Builds one message of each kind, parses it back the way a receiver
 * would, and checks its MAC or signature.
 *
 * Run with: npm run demo
 */

import {
  CiphertextMessageType,
  IdentityKeyPair,
  KeyPair,
  PairwiseMessage,
  PreKeyMessage,
  ProtocolError,
  SenderKeyDistributionMessage,
  SenderKeyMessage,
  bytesToHex,
  generateDistributionId,
  logger,
  parseCiphertextMessage,
  secureRandomBytes,
  serializeCiphertextMessage,
  toCiphertextMessage,
} from '../src/index.js';

const log = logger.child({ component: 'demo' });

function pairwiseDemo(): void {
  console.log('\n-- Pairwise and pre-key messages --\n');

  const alice = IdentityKeyPair.generate();
  const bob = IdentityKeyPair.generate();
  const macKey = secureRandomBytes(32);

  const message = PairwiseMessage.create({
    macKey,
    senderRatchetKey: KeyPair.generate().publicKey,
    counter: 42,
    previousCounter: 41,
    ciphertext: new TextEncoder().encode('not really encrypted'),
    senderIdentityKey: alice.identityKey(),
    receiverIdentityKey: bob.identityKey(),
  });
  console.log(`   Pairwise bytes (${message.serialized.length}): ${bytesToHex(message.serialized)}`);

  const preKey = PreKeyMessage.create({
    registrationId: 365,
    signedPreKeyId: 97,
    baseKey: KeyPair.generate().publicKey,
    identityKey: alice.identityKey(),
    message,
  });

  // The receiver only sees a type code and bytes
  const wire = serializeCiphertextMessage(toCiphertextMessage(preKey));
  const received = parseCiphertextMessage(CiphertextMessageType.PreKey, wire);
  if (received.type !== CiphertextMessageType.PreKey) {
    throw new Error(`unexpected message type ${received.type}`);
  }

  const inner = received.message.message;
  const valid = inner.verifyMac(alice.identityKey(), bob.identityKey(), macKey);
  console.log(`   Pre-key message from registration ${received.message.registrationId}`);
  console.log(`   Inner counter ${inner.counter}, MAC valid: ${valid}`);

  // Swapping the identities is what a reflected message looks like
  const reflected = inner.verifyMac(bob.identityKey(), alice.identityKey(), macKey);
  console.log(`   Reflected MAC valid: ${reflected}`);
}

function groupDemo(): void {
  console.log('\n-- Sender-key messages --\n');

  const distributionId = generateDistributionId();
  const signing = KeyPair.generate();

  const distribution = SenderKeyDistributionMessage.create({
    distributionId,
    chainId: 1,
    iteration: 0,
    chainKey: secureRandomBytes(32),
    signingKey: signing.publicKey,
  });
  const member = SenderKeyDistributionMessage.deserialize(distribution.serialized);
  console.log(`   Distribution ${member.distributionId}, chain ${member.chainId}`);

  const message = SenderKeyMessage.create({
    distributionId,
    chainId: 1,
    iteration: 0,
    ciphertext: new TextEncoder().encode('hello group'),
    signatureKey: signing.privateKey,
  });
  const received = SenderKeyMessage.deserialize(message.serialized);
  received.verifySignature(member.signingKey);
  console.log(`   Group message at iteration ${received.iteration} verified`);

  const tampered = Uint8Array.from(message.serialized);
  tampered[tampered.length - 1] ^= 0x01;
  try {
    SenderKeyMessage.deserialize(tampered).verifySignature(member.signingKey);
  } catch (error) {
    if (!(error instanceof ProtocolError)) {
      throw error;
    }
    console.log(`   Tampered message rejected: ${error.message}`);
  }
}

function main(): void {
  console.log('\n=== Ratchet wire format demo ===');
  pairwiseDemo();
  groupDemo();
  console.log('\nDone.\n');
}

try {
  main();
} catch (error) {
  log.error({ err: error }, 'Demo failed');
  process.exit(1);
}
