/**
 * meshid: Signed HTTP request headers.
 *
 * A request is signed over the canonical JSON of
 * `{ body_hash, did, method, nonce, timestamp, url }`.
 */

import { randomUUID } from "node:crypto";
import { canonicalBytes, hashPayload, sign, toBase64Url } from "./signing.js";

/** Header names carrying request authentication. */
export const AUTH_HEADERS = {
  did: "x-meshid-did",
  timestamp: "x-meshid-timestamp",
  nonce: "x-meshid-nonce",
  signature: "x-meshid-signature",
} as const;

export interface RequestSigningInput {
  method: string;
  url: string;
  /** Parsed JSON body; absent for GET/DELETE. */
  body?: unknown;
  did: string;
  timestamp: string;
  nonce: string;
}

/** The bytes a request signature covers. */
export function requestSigningPayload(input: RequestSigningInput): Uint8Array {
  return canonicalBytes({
    body_hash: hashPayload(input.body ?? null),
    did: input.did,
    method: input.method.toUpperCase(),
    nonce: input.nonce,
    timestamp: input.timestamp,
    url: input.url,
  });
}

/**
 * Build authentication headers for a request made on behalf of `did`.
 * Timestamp and nonce default to now and a random UUID.
 */
export function signRequest(
  request: Omit<RequestSigningInput, "timestamp" | "nonce"> &
    Partial<Pick<RequestSigningInput, "timestamp" | "nonce">>,
  privateKey: Uint8Array,
): Record<string, string> {
  const input: RequestSigningInput = {
    ...request,
    timestamp: request.timestamp ?? new Date().toISOString(),
    nonce: request.nonce ?? randomUUID(),
  };
  const signature = toBase64Url(sign(privateKey, requestSigningPayload(input)));
  return {
    [AUTH_HEADERS.did]: input.did,
    [AUTH_HEADERS.timestamp]: input.timestamp,
    [AUTH_HEADERS.nonce]: input.nonce,
    [AUTH_HEADERS.signature]: signature,
  };
}
