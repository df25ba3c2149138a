/**
 * meshid: DID status validation and transition rules.
 */

import type { DIDNode, DIDStatus } from "../types/did.js";
import { DIDRevokedError } from "../types/errors.js";

/**
 * Valid DID status transitions.
 * - active -> revoked (permanent)
 */
const VALID_TRANSITIONS: ReadonlyMap<DIDStatus, ReadonlySet<DIDStatus>> = new Map([
  ["active", new Set<DIDStatus>(["revoked"])],
  ["revoked", new Set<DIDStatus>()], // terminal
]);

/**
 * Check whether a DID status transition is valid.
 */
export function isValidTransition(from: DIDStatus, to: DIDStatus): boolean {
  const allowed = VALID_TRANSITIONS.get(from);
  return allowed !== undefined && allowed.has(to);
}

/**
 * Ensure a node may take part in a link.
 * @throws {DIDRevokedError} If the node is revoked.
 */
export function assertActive(node: DIDNode): void {
  if (node.status === "revoked") {
    throw new DIDRevokedError(node.did);
  }
}
