/**
 * meshid: DID derivation from Ed25519 public keys.
 *
 * DIDs take the form `did:<method>:z<base58btc(0xed01 ‖ publicKey)>`; with the
 * default method this is a standard `did:key` identifier.
 */

import { generateSigningKeyPair, type KeyPair } from "../crypto/keys.js";
import { InvalidDIDFormatError } from "../types/errors.js";
import { decodePublicKeyMultibase, encodePublicKeyMultibase } from "./document.js";

export const DEFAULT_DID_METHOD = "key";

/** DID method names: lowercase letters and digits. */
const METHOD_PATTERN = /^[a-z0-9]+$/;

/** Result of generating a new DID. */
export interface GeneratedDID {
  did: string;
  keyPair: KeyPair;
}

/**
 * Derive the canonical DID for a public key. Pure: the same key and method
 * always give the same DID.
 * @throws {InvalidDIDFormatError} If the method name is not valid DID syntax.
 */
export function deriveDID(publicKey: Uint8Array, method: string = DEFAULT_DID_METHOD): string {
  if (!METHOD_PATTERN.test(method)) {
    throw new InvalidDIDFormatError(`Invalid DID method name: "${method}"`, `did:${method}:`);
  }
  return `did:${method}:${encodePublicKeyMultibase(publicKey)}`;
}

/**
 * Split a DID into its method and embedded public key.
 * @throws {InvalidDIDFormatError} If the DID is not `did:<method>:<multibase key>`.
 */
export function parseDID(did: string): { method: string; publicKey: Uint8Array } {
  const parts = did.split(":");
  if (parts.length !== 3 || parts[0] !== "did" || !METHOD_PATTERN.test(parts[1])) {
    throw new InvalidDIDFormatError(
      `Invalid DID format: expected "did:<method>:<key>", got "${did}"`,
      did,
    );
  }
  try {
    return { method: parts[1], publicKey: decodePublicKeyMultibase(parts[2]) };
  } catch (err) {
    throw new InvalidDIDFormatError(
      `Invalid DID key encoding: ${err instanceof Error ? err.message : String(err)}`,
      did,
    );
  }
}

/** Generate a fresh key pair and its DID. */
export function generateDID(
  method: string = DEFAULT_DID_METHOD,
  generateKeyPair: () => KeyPair = generateSigningKeyPair,
): GeneratedDID {
  const keyPair = generateKeyPair();
  return { did: deriveDID(keyPair.publicKey, method), keyPair };
}
