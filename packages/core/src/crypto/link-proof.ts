/**
 * meshid: Link-proof payload construction and signature checks.
 *
 * Both nodes sign the same canonical payload:
 *
 *   { created_at, did_a, did_b, domain: "meshid/link-proof/v1" }
 *
 * with `did_a < did_b`. The domain tag keeps these signatures from being
 * replayed as request or envelope signatures and vice versa.
 */

import type { LinkProof } from "../types/did.js";
import { canonicalBytes, sign, toBase64Url, verifyBase64Url } from "./signing.js";

export const LINK_PROOF_DOMAIN = "meshid/link-proof/v1";

/** Order two DIDs the way link proofs store them. */
export function canonicalPair(first: string, second: string): [string, string] {
  return first < second ? [first, second] : [second, first];
}

/** Canonical payload bytes for a link between two DIDs, in either order. */
export function buildLinkPayload(
  first: string,
  second: string,
  createdAt: string,
): Uint8Array {
  const [didA, didB] = canonicalPair(first, second);
  return canonicalBytes({
    created_at: createdAt,
    did_a: didA,
    did_b: didB,
    domain: LINK_PROOF_DOMAIN,
  });
}

/**
 * Produce one node's half of a link proof.
 * @returns Base64url-encoded signature.
 */
export function signLinkPayload(
  privateKey: Uint8Array,
  did: string,
  counterpartDid: string,
  createdAt: string,
): string {
  const payload = buildLinkPayload(did, counterpartDid, createdAt);
  return toBase64Url(sign(privateKey, payload));
}

/**
 * Check both signatures of a proof against the given public keys.
 * @returns The DIDs whose signature failed; empty when the proof is valid.
 */
export function findInvalidSignatures(
  proof: Pick<LinkProof, "didA" | "didB" | "signatureA" | "signatureB" | "createdAt">,
  publicKeyA: Uint8Array,
  publicKeyB: Uint8Array,
): string[] {
  const payload = buildLinkPayload(proof.didA, proof.didB, proof.createdAt);
  const failed: string[] = [];
  if (!verifyBase64Url(publicKeyA, payload, proof.signatureA)) failed.push(proof.didA);
  if (!verifyBase64Url(publicKeyB, payload, proof.signatureB)) failed.push(proof.didB);
  return failed;
}
