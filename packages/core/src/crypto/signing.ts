/**
 * meshid: Ed25519 signing, verification, and canonical serialization.
 */

import { ed25519 } from "@noble/curves/ed25519";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";

/**
 * Deep-sort all object keys recursively to produce a canonical form.
 * Arrays preserve element order but objects within arrays are also sorted.
 */
export function canonicalize(obj: unknown): string {
  return JSON.stringify(deepSortKeys(obj));
}

function deepSortKeys(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(deepSortKeys);
  }
  if (typeof value === "object") {
    const record = value as Record<string, unknown>;
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(record).sort()) {
      sorted[key] = deepSortKeys(record[key]);
    }
    return sorted;
  }
  return value;
}

/** Base64url encode a Uint8Array (no padding). */
export function toBase64Url(bytes: Uint8Array): string {
  const binString = Array.from(bytes, (b) => String.fromCharCode(b)).join("");
  return btoa(binString).replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

/** Decode a base64url string to Uint8Array. */
export function fromBase64Url(str: string): Uint8Array {
  const padded = str.replace(/-/g, "+").replace(/_/g, "/");
  const binString = atob(padded);
  return Uint8Array.from(binString, (c) => c.charCodeAt(0));
}

/** UTF-8 bytes of the canonical JSON form of `data`. */
export function canonicalBytes(data: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalize(data));
}

/** Sign a payload. Ed25519 signing is deterministic for a given key and message. */
export function sign(privateKey: Uint8Array, payload: Uint8Array): Uint8Array {
  return ed25519.sign(payload, privateKey);
}

/**
 * Verify an Ed25519 signature.
 * @returns true if the signature is valid; false for any malformed input.
 */
export function verify(
  publicKey: Uint8Array,
  payload: Uint8Array,
  signature: Uint8Array,
): boolean {
  try {
    return ed25519.verify(signature, payload, publicKey);
  } catch {
    return false;
  }
}

/** Verify a base64url-encoded signature; false when it does not decode. */
export function verifyBase64Url(
  publicKey: Uint8Array,
  payload: Uint8Array,
  signature: string,
): boolean {
  let sigBytes: Uint8Array;
  try {
    sigBytes = fromBase64Url(signature);
  } catch {
    return false;
  }
  return verify(publicKey, payload, sigBytes);
}

/**
 * Compute the SHA-256 hex digest of canonicalized data.
 */
export function hashPayload(data: unknown): string {
  return bytesToHex(sha256(canonicalBytes(data)));
}
