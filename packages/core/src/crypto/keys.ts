/**
 * meshid: Ed25519 key generation.
 */

import { ed25519 } from "@noble/curves/ed25519";

/** A raw cryptographic key pair. */
export interface KeyPair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/** Ed25519 private keys (seeds) and public keys are both 32 bytes. */
export const ED25519_KEY_LENGTH = 32;

/** Generate an Ed25519 signing key pair from the platform CSPRNG. */
export function generateSigningKeyPair(): KeyPair {
  const privateKey = ed25519.utils.randomPrivateKey();
  const publicKey = ed25519.getPublicKey(privateKey);
  return { publicKey, privateKey };
}

/**
 * Rebuild a key pair from a stored private key.
 * @throws {RangeError} If the key is not 32 bytes.
 */
export function keyPairFromPrivateKey(privateKey: Uint8Array): KeyPair {
  if (privateKey.length !== ED25519_KEY_LENGTH) {
    throw new RangeError(
      `Invalid Ed25519 private key length: expected ${ED25519_KEY_LENGTH}, got ${privateKey.length}`,
    );
  }
  return { publicKey: ed25519.getPublicKey(privateKey), privateKey };
}
