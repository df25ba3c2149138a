/**
 * meshid: Identity model: DID nodes, identity clusters and link proofs.
 */

/** Lifecycle status of a DID node. Revocation is terminal. */
export type DIDStatus = "active" | "revoked";

/**
 * One node's identity. The private key is never part of a stored node;
 * `clusterId` is a cached pointer, the cluster's member list is authoritative.
 */
export interface DIDNode {
  did: string;
  /** Raw Ed25519 public key (32 bytes). */
  publicKey: Uint8Array;
  label: string;
  status: DIDStatus;
  clusterId: string | null;
  /** ISO 8601 timestamps. */
  createdAt: string;
  revokedAt: string | null;
  revocationReason: string | null;
}

/** A freshly created node. The only value that ever carries the private key. */
export type CreatedDIDNode = DIDNode & { privateKey: Uint8Array };

/** The set of DIDs known to represent one real-world identity. */
export interface IdentityCluster {
  /** UUIDv7, so lexicographic order follows creation order. */
  clusterId: string;
  label: string | null;
  /** Insertion-ordered, never empty, no duplicates. */
  memberDids: string[];
  createdAt: string;
}

/**
 * Bidirectional proof that two nodes agreed to share a cluster.
 * `didA` sorts before `didB`; both signatures cover the same payload.
 */
export interface LinkProof {
  didA: string;
  didB: string;
  /** Base64url-encoded Ed25519 signatures. */
  signatureA: string;
  signatureB: string;
  clusterId: string;
  createdAt: string;
}

/** A link proof whose signatures were produced outside the manager. */
export interface LinkProofSubmission {
  didA: string;
  didB: string;
  createdAt: string;
  signatureA: string;
  signatureB: string;
  label?: string;
}

/** Ed25519 verification method as per W3C DID spec. */
export interface Ed25519VerificationKey2020 {
  id: string;
  type: "Ed25519VerificationKey2020";
  controller: string;
  publicKeyMultibase: string;
}

/** W3C-compliant DID Document for a meshid node. */
export interface DIDDocument {
  "@context": [
    "https://www.w3.org/ns/did/v1",
    "https://w3id.org/security/suites/ed25519-2020/v1",
  ];
  id: string;
  verificationMethod: [Ed25519VerificationKey2020];
  authentication: [string];
  assertionMethod: [string];
  /** Other active DIDs of the same identity cluster. */
  alsoKnownAs: string[];
}

/** DID resolution metadata accompanying a document. */
export interface DIDDocumentMetadata {
  created: string;
  deactivated: boolean;
  updated?: string;
}

export interface DIDResolution {
  didDocument: DIDDocument;
  didDocumentMetadata: DIDDocumentMetadata;
}
