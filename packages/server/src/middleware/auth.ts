/**
 * meshid: Authentication middleware.
 *
 * Provides a Fastify preHandler for routes that act on behalf of a DID.
 *
 * Authentication steps:
 * 1. Read the x-meshid-* headers
 * 2. Check timestamp within the configured skew
 * 3. Check nonce not reused (stored with 24h TTL)
 * 4. Resolve signer DID → public key, and require it to be active
 * 5. Verify the Ed25519 signature over the canonical request
 */

import type { FastifyRequest } from "fastify";
import {
  AUTH_HEADERS,
  DIDRevokedError,
  IdentityError,
  IdentityErrorCode,
  requestSigningPayload,
  verifyBase64Url,
  type DIDNode,
} from "@meshid/core";

/** Nonce TTL in hours. */
const NONCE_TTL_HOURS = 24;

export interface RequestAuth {
  did: string;
  node: DIDNode;
}

declare module "fastify" {
  interface FastifyRequest {
    meshidAuth?: RequestAuth;
  }
}

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Fastify preHandler that verifies a signed request and attaches the
 * signer to `request.meshidAuth`.
 */
export async function verifyRequestAuth(request: FastifyRequest): Promise<void> {
  const did = headerValue(request, AUTH_HEADERS.did);
  const timestamp = headerValue(request, AUTH_HEADERS.timestamp);
  const nonce = headerValue(request, AUTH_HEADERS.nonce);
  const signature = headerValue(request, AUTH_HEADERS.signature);

  if (!did || !timestamp || !nonce || !signature) {
    throw new IdentityError(
      IdentityErrorCode.UNAUTHORIZED,
      "Missing authentication headers",
      { required: Object.values(AUTH_HEADERS) },
    );
  }

  const created = Date.parse(timestamp);
  if (Number.isNaN(created)) {
    throw new IdentityError(IdentityErrorCode.TIMESTAMP_EXPIRED, "Invalid timestamp format", {
      timestamp,
    });
  }

  const now = Date.now();
  const skew = Math.abs(now - created);
  if (skew > request.server.clockSkewMs) {
    throw new IdentityError(
      IdentityErrorCode.TIMESTAMP_EXPIRED,
      "Timestamp outside acceptable range",
      { server_time: new Date(now).toISOString(), request_time: timestamp, skew_ms: skew },
    );
  }

  const { db } = request.server;
  if (db.nonceExists(nonce)) {
    throw new IdentityError(IdentityErrorCode.NONCE_REUSED, "Nonce has already been used", {
      nonce,
    });
  }

  if (!db.hasNode(did)) {
    throw new IdentityError(IdentityErrorCode.UNAUTHORIZED, "Unknown signer", { did });
  }
  const node = db.getNode(did);
  if (node.status !== "active") {
    throw new DIDRevokedError(did);
  }

  const payload = requestSigningPayload({
    method: request.method,
    url: request.url,
    body: request.body,
    did,
    timestamp,
    nonce,
  });
  if (!verifyBase64Url(node.publicKey, payload, signature)) {
    throw new IdentityError(IdentityErrorCode.UNAUTHORIZED, "Invalid request signature", {
      did,
    });
  }

  db.insertNonce(nonce, did, NONCE_TTL_HOURS);
  request.meshidAuth = { did, node };
}

function requireAuth(request: FastifyRequest): RequestAuth {
  if (!request.meshidAuth) {
    throw new IdentityError(IdentityErrorCode.UNAUTHORIZED, "Request is not authenticated");
  }
  return request.meshidAuth;
}

/** The signer must be `did` itself. */
export function requireSelf(request: FastifyRequest, did: string): RequestAuth {
  const auth = requireAuth(request);
  if (auth.did !== did) {
    throw new IdentityError(IdentityErrorCode.FORBIDDEN, "Signer may only act on itself", {
      signer: auth.did,
      target: did,
    });
  }
  return auth;
}

/**
 * The signer must be `target` or an active member of the same cluster,
 * so a surviving device can revoke a lost one.
 */
export function requireSelfOrClusterPeer(
  request: FastifyRequest,
  target: DIDNode,
): RequestAuth {
  const auth = requireAuth(request);
  if (auth.did === target.did) {
    return auth;
  }
  if (target.clusterId !== null && auth.node.clusterId === target.clusterId) {
    return auth;
  }
  throw new IdentityError(
    IdentityErrorCode.FORBIDDEN,
    "Signer is not a member of the target's identity cluster",
    { signer: auth.did, target: target.did },
  );
}
