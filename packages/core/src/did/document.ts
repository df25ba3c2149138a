/**
 * meshid: Multibase key encoding and DID Document construction.
 */

import { base58btc } from "multiformats/bases/base58";
import { bytesToHex, concatBytes } from "@noble/hashes/utils";
import type { DIDDocument, DIDNode, IdentityCluster } from "../types/did.js";
import { ED25519_KEY_LENGTH } from "../crypto/keys.js";

/** Ed25519 multicodec prefix: 0xed 0x01 */
const ED25519_MULTICODEC_PREFIX = new Uint8Array([0xed, 0x01]);

/** Multibase encode: z prefix + base58btc(multicodec_prefix + raw_key) */
export function encodePublicKeyMultibase(publicKey: Uint8Array): string {
  return base58btc.encode(concatBytes(ED25519_MULTICODEC_PREFIX, publicKey));
}

/**
 * Decode a multibase Ed25519 public key, stripping the multicodec prefix.
 * @throws If the encoding, prefix or key length is wrong.
 */
export function decodePublicKeyMultibase(multibase: string): Uint8Array {
  const decoded = base58btc.decode(multibase);
  for (let i = 0; i < ED25519_MULTICODEC_PREFIX.length; i++) {
    if (decoded[i] !== ED25519_MULTICODEC_PREFIX[i]) {
      throw new Error(
        `Invalid multicodec prefix: expected ${bytesToHex(ED25519_MULTICODEC_PREFIX)}, ` +
        `got ${bytesToHex(decoded.slice(0, ED25519_MULTICODEC_PREFIX.length))}`,
      );
    }
  }
  const key = decoded.slice(ED25519_MULTICODEC_PREFIX.length);
  if (key.length !== ED25519_KEY_LENGTH) {
    throw new Error(`Invalid Ed25519 public key length: ${key.length}`);
  }
  return key;
}

/**
 * Build a W3C DID Document for a node.
 * `alsoKnownAs` lists the other active members of the node's cluster.
 */
export function buildDIDDocument(
  node: DIDNode,
  cluster: IdentityCluster | null,
  isActive: (did: string) => boolean,
): DIDDocument {
  const verificationMethodId = `${node.did}#key-1`;
  const alsoKnownAs = (cluster?.memberDids ?? []).filter(
    (did) => did !== node.did && isActive(did),
  );

  return {
    "@context": [
      "https://www.w3.org/ns/did/v1",
      "https://w3id.org/security/suites/ed25519-2020/v1",
    ],
    id: node.did,
    verificationMethod: [
      {
        id: verificationMethodId,
        type: "Ed25519VerificationKey2020",
        controller: node.did,
        publicKeyMultibase: encodePublicKeyMultibase(node.publicKey),
      },
    ],
    authentication: [verificationMethodId],
    assertionMethod: [verificationMethodId],
    alsoKnownAs,
  };
}
