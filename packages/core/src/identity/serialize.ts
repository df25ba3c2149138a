/**
 * meshid: Lossless JSON records for nodes, clusters and proofs.
 *
 * Records use snake_case keys and multibase public keys. Node records are
 * strict so a stray private key can never be loaded back into a store.
 */

import { z } from "zod";
import type { DIDNode, IdentityCluster, LinkProof } from "../types/did.js";
import { SnapshotInvalidError } from "../types/errors.js";
import { bytesToHex } from "@noble/hashes/utils";
import { decodePublicKeyMultibase, encodePublicKeyMultibase } from "../did/document.js";
import { parseDID } from "../did/generate.js";

export const SNAPSHOT_VERSION = 1;

export const nodeRecordSchema = z
  .object({
    did: z.string().min(1),
    public_key: z.string().min(1),
    label: z.string(),
    status: z.enum(["active", "revoked"]),
    cluster_id: z.string().nullable(),
    created_at: z.string(),
    revoked_at: z.string().nullable(),
    revocation_reason: z.string().nullable(),
  })
  .strict();

export const clusterRecordSchema = z.object({
  cluster_id: z.string().min(1),
  label: z.string().nullable(),
  member_dids: z.array(z.string()).min(1),
  created_at: z.string(),
});

export const proofRecordSchema = z.object({
  did_a: z.string(),
  did_b: z.string(),
  signature_a: z.string(),
  signature_b: z.string(),
  cluster_id: z.string(),
  created_at: z.string(),
});

export const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  nodes: z.array(nodeRecordSchema),
  clusters: z.array(clusterRecordSchema),
  proofs: z.array(proofRecordSchema),
});

export type NodeRecord = z.infer<typeof nodeRecordSchema>;
export type ClusterRecord = z.infer<typeof clusterRecordSchema>;
export type ProofRecord = z.infer<typeof proofRecordSchema>;
export type StoreSnapshot = z.infer<typeof snapshotSchema>;

export function nodeToRecord(node: DIDNode): NodeRecord {
  return {
    did: node.did,
    public_key: encodePublicKeyMultibase(node.publicKey),
    label: node.label,
    status: node.status,
    cluster_id: node.clusterId,
    created_at: node.createdAt,
    revoked_at: node.revokedAt,
    revocation_reason: node.revocationReason,
  };
}

/** Hex of the key a DID encodes, or null when the DID does not parse. */
function didKeyOf(did: string): string | null {
  try {
    return bytesToHex(parseDID(did).publicKey);
  } catch {
    return null;
  }
}

/**
 * @throws {SnapshotInvalidError} If the public key is malformed or is not
 *   the key encoded in the DID.
 */
export function nodeFromRecord(record: NodeRecord): DIDNode {
  let publicKey: Uint8Array;
  try {
    publicKey = decodePublicKeyMultibase(record.public_key);
  } catch (err) {
    throw new SnapshotInvalidError(
      `Invalid public key for ${record.did}: ${err instanceof Error ? err.message : String(err)}`,
      { did: record.did },
    );
  }
  if (didKeyOf(record.did) !== bytesToHex(publicKey)) {
    throw new SnapshotInvalidError(`Public key does not match ${record.did}`, {
      did: record.did,
    });
  }
  return {
    did: record.did,
    publicKey,
    label: record.label,
    status: record.status,
    clusterId: record.cluster_id,
    createdAt: record.created_at,
    revokedAt: record.revoked_at,
    revocationReason: record.revocation_reason,
  };
}

export function clusterToRecord(cluster: IdentityCluster): ClusterRecord {
  return {
    cluster_id: cluster.clusterId,
    label: cluster.label,
    member_dids: [...cluster.memberDids],
    created_at: cluster.createdAt,
  };
}

export function clusterFromRecord(record: ClusterRecord): IdentityCluster {
  return {
    clusterId: record.cluster_id,
    label: record.label,
    memberDids: [...record.member_dids],
    createdAt: record.created_at,
  };
}

export function proofToRecord(proof: LinkProof): ProofRecord {
  return {
    did_a: proof.didA,
    did_b: proof.didB,
    signature_a: proof.signatureA,
    signature_b: proof.signatureB,
    cluster_id: proof.clusterId,
    created_at: proof.createdAt,
  };
}

export function proofFromRecord(record: ProofRecord): LinkProof {
  return {
    didA: record.did_a,
    didB: record.did_b,
    signatureA: record.signature_a,
    signatureB: record.signature_b,
    clusterId: record.cluster_id,
    createdAt: record.created_at,
  };
}

/**
 * Validate untrusted snapshot data.
 * @throws {SnapshotInvalidError} Listing the first offending paths.
 */
export function parseSnapshot(data: unknown): StoreSnapshot {
  const result = snapshotSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5).map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    throw new SnapshotInvalidError("Identity store snapshot is invalid", { issues });
  }
  return result.data;
}
