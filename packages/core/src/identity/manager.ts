/**
 * meshid: DIDManager.
 *
 * Orchestrates node creation, the link protocol, revocation and identity
 * resolution over an injected DIDStore. This is the only place the
 * cross-entity invariants are enforced:
 *
 * - a stored node never carries private key material
 * - revocation is terminal and touches exactly one node
 * - revoked nodes never join or merge clusters
 * - a link writes nothing unless both signatures verify
 * - every member of a cluster points at that cluster
 *
 * Every operation is synchronous and mutating ones run inside a single
 * store transaction, so within a process the event loop serializes writers
 * and a failed operation leaves the store untouched.
 */

import { pino, type BaseLogger } from "pino";
import { v7 as uuidv7 } from "uuid";
import type {
  CreatedDIDNode,
  DIDNode,
  DIDResolution,
  IdentityCluster,
  LinkProof,
  LinkProofSubmission,
} from "../types/did.js";
import {
  DIDAlreadyExistsError,
  LinkProofInvalidError,
} from "../types/errors.js";
import type { DIDStore } from "../store/types.js";
import { generateSigningKeyPair, type KeyPair } from "../crypto/keys.js";
import {
  canonicalPair,
  findInvalidSignatures,
  signLinkPayload,
} from "../crypto/link-proof.js";
import { DEFAULT_DID_METHOD, generateDID } from "../did/generate.js";
import { buildDIDDocument } from "../did/document.js";
import { assertActive, isValidTransition } from "../did/status.js";
import { planLink, type LinkOutcome } from "./cluster.js";

/** Maximum accepted age (or lead) of a submitted link proof's timestamp. */
export const DEFAULT_MAX_CLOCK_SKEW_MS = 5 * 60 * 1000;

/** The pino methods the manager calls; Fastify's `app.log` satisfies it. */
export type IdentityLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export interface DIDManagerOptions {
  /** DID method segment; defaults to "key". */
  method?: string;
  logger?: IdentityLogger;
  clock?: () => Date;
  generateKeyPair?: () => KeyPair;
  generateClusterId?: () => string;
  maxClockSkewMs?: number;
}

export interface LinkOptions {
  /** Label for the resulting cluster. */
  label?: string;
}

export class DIDManager {
  private readonly method: string;
  private readonly logger: IdentityLogger;
  private readonly clock: () => Date;
  private readonly generateKeyPair: () => KeyPair;
  private readonly generateClusterId: () => string;
  private readonly maxClockSkewMs: number;

  constructor(
    private readonly store: DIDStore,
    options: DIDManagerOptions = {},
  ) {
    this.method = options.method ?? DEFAULT_DID_METHOD;
    this.logger = options.logger ?? pino({ level: "silent" });
    this.clock = options.clock ?? (() => new Date());
    this.generateKeyPair = options.generateKeyPair ?? generateSigningKeyPair;
    this.generateClusterId = options.generateClusterId ?? (() => uuidv7());
    this.maxClockSkewMs = options.maxClockSkewMs ?? DEFAULT_MAX_CLOCK_SKEW_MS;
  }

  // -----------------------------------------------------------------------
  // Nodes
  // -----------------------------------------------------------------------

  /**
   * Create a node with a fresh keypair.
   *
   * The returned value is the only place the private key ever appears; the
   * stored node has none.
   * @throws {DIDAlreadyExistsError} If the derived DID is already stored.
   */
  createDid(label: string): CreatedDIDNode {
    const { did, keyPair } = generateDID(this.method, this.generateKeyPair);

    const node = this.store.transaction(() => {
      if (this.store.hasNode(did)) {
        throw new DIDAlreadyExistsError(did);
      }
      const created: DIDNode = {
        did,
        publicKey: keyPair.publicKey,
        label,
        status: "active",
        clusterId: null,
        createdAt: this.now(),
        revokedAt: null,
        revocationReason: null,
      };
      this.store.saveNode(created);
      return created;
    });

    this.logger.info({ did, label }, "DID created");
    return { ...node, privateKey: keyPair.privateKey };
  }

  /** @throws {DIDNotFoundError} */
  getNode(did: string): DIDNode {
    return this.store.getNode(did);
  }

  /**
   * Change a node's label. Labels carry no security meaning, so revoked
   * nodes may be relabelled.
   * @throws {DIDNotFoundError}
   */
  renameDid(did: string, label: string): DIDNode {
    return this.store.transaction(() => {
      const node = this.store.getNode(did);
      const renamed: DIDNode = { ...node, label };
      this.store.saveNode(renamed);
      this.logger.debug({ did, label }, "DID relabelled");
      return renamed;
    });
  }

  /**
   * Revoke a single node. Idempotent: a revoked node is returned unchanged.
   * Never alters cluster membership or any other node.
   * @throws {DIDNotFoundError}
   */
  revokeDid(did: string, reason: string): DIDNode {
    return this.store.transaction(() => {
      const node = this.store.getNode(did);
      if (!isValidTransition(node.status, "revoked")) {
        this.logger.debug({ did }, "DID already revoked");
        return node;
      }
      const revoked: DIDNode = {
        ...node,
        status: "revoked",
        revokedAt: this.now(),
        revocationReason: reason,
      };
      this.store.saveNode(revoked);
      this.logger.info({ did, reason, cluster_id: node.clusterId }, "DID revoked");
      return revoked;
    });
  }

  listNodes(): DIDNode[] {
    return this.store.listNodes();
  }

  // -----------------------------------------------------------------------
  // Linking
  // -----------------------------------------------------------------------

  /**
   * Link two nodes the caller controls into one identity cluster.
   *
   * Both private keys sign the canonical payload and the signatures are
   * checked against the stored public keys before anything is written.
   * @throws {DIDNotFoundError} If either DID is unknown.
   * @throws {DIDRevokedError} If either node is revoked.
   * @throws {LinkProofInvalidError} If a key does not match its DID.
   */
  linkDids(
    didA: string,
    privateKeyA: Uint8Array,
    didB: string,
    privateKeyB: Uint8Array,
    options: LinkOptions = {},
  ): LinkProof {
    return this.store.transaction(() => {
      const [nodeA, nodeB] = this.requireLinkable(didA, didB);
      const createdAt = this.now();
      const signatureA = this.signHalf(privateKeyA, didA, didB, createdAt);
      const signatureB = this.signHalf(privateKeyB, didB, didA, createdAt);
      return this.applyLink(
        nodeA,
        signatureA,
        nodeB,
        signatureB,
        createdAt,
        options.label,
      );
    });
  }

  /**
   * Record a link whose signatures were produced by the nodes themselves,
   * e.g. on two devices via `signLinkPayload`.
   *
   * `signatureA` belongs to `didA` regardless of DID order. The timestamp
   * must be within the clock skew window and the proof must not have been
   * recorded before. `label` applies only when the link creates a cluster.
   * @throws {DIDNotFoundError}
   * @throws {DIDRevokedError}
   * @throws {LinkProofInvalidError}
   */
  submitLinkProof(submission: LinkProofSubmission): LinkProof {
    return this.store.transaction(() => {
      const [nodeA, nodeB] = this.requireLinkable(submission.didA, submission.didB);

      const created = Date.parse(submission.createdAt);
      if (Number.isNaN(created)) {
        throw new LinkProofInvalidError("Link proof timestamp is not a valid date", {
          created_at: submission.createdAt,
        });
      }
      const skew = Math.abs(this.clock().getTime() - created);
      if (skew > this.maxClockSkewMs) {
        throw new LinkProofInvalidError("Link proof timestamp outside acceptable range", {
          created_at: submission.createdAt,
          skew_ms: skew,
        });
      }

      const [first, second] = canonicalPair(submission.didA, submission.didB);
      const replayed = this.store
        .listProofs()
        .some((p) => p.didA === first && p.didB === second && p.createdAt === submission.createdAt);
      if (replayed) {
        throw new LinkProofInvalidError("Link proof has already been recorded", {
          did_a: first,
          did_b: second,
          created_at: submission.createdAt,
        });
      }

      // unsigned: may name a new cluster only
      const label =
        nodeA.clusterId === null && nodeB.clusterId === null ? submission.label : undefined;
      return this.applyLink(
        nodeA,
        submission.signatureA,
        nodeB,
        submission.signatureB,
        submission.createdAt,
        label,
      );
    });
  }

  /**
   * Re-verify a proof against the stored public keys.
   * @returns false if either DID is unknown or either signature fails.
   */
  verifyProof(proof: LinkProof): boolean {
    if (!this.store.hasNode(proof.didA) || !this.store.hasNode(proof.didB)) {
      return false;
    }
    const nodeA = this.store.getNode(proof.didA);
    const nodeB = this.store.getNode(proof.didB);
    return findInvalidSignatures(proof, nodeA.publicKey, nodeB.publicKey).length === 0;
  }

  /** Proofs in append order; only those naming `did` when given. */
  listProofs(did?: string): LinkProof[] {
    const proofs = this.store.listProofs();
    return did === undefined
      ? proofs
      : proofs.filter((p) => p.didA === did || p.didB === did);
  }

  // -----------------------------------------------------------------------
  // Resolution
  // -----------------------------------------------------------------------

  /**
   * The cluster a node belongs to, or null if it was never linked.
   * @throws {DIDNotFoundError}
   * @throws {ClusterNotFoundError} If the node's cluster pointer dangles.
   */
  resolveIdentity(did: string): IdentityCluster | null {
    const node = this.store.getNode(did);
    if (node.clusterId === null) {
      return null;
    }
    return this.store.getCluster(node.clusterId);
  }

  /**
   * W3C DID document for a node, listing the other active members of its
   * cluster under `alsoKnownAs`.
   * @throws {DIDNotFoundError}
   */
  resolveDocument(did: string): DIDResolution {
    const node = this.store.getNode(did);
    const cluster = this.resolveIdentity(did);
    const isActive = (member: string): boolean =>
      this.store.hasNode(member) && this.store.getNode(member).status === "active";

    return {
      didDocument: buildDIDDocument(node, cluster, isActive),
      didDocumentMetadata: {
        created: node.createdAt,
        deactivated: node.status === "revoked",
        ...(node.revokedAt ? { updated: node.revokedAt } : {}),
      },
    };
  }

  /** @throws {ClusterNotFoundError} */
  getCluster(clusterId: string): IdentityCluster {
    return this.store.getCluster(clusterId);
  }

  listClusters(): IdentityCluster[] {
    return this.store.listClusters();
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private now(): string {
    return this.clock().toISOString();
  }

  /** Existence, then status, then distinctness. */
  private requireLinkable(didA: string, didB: string): [DIDNode, DIDNode] {
    const nodeA = this.store.getNode(didA);
    const nodeB = this.store.getNode(didB);
    assertActive(nodeA);
    assertActive(nodeB);
    if (didA === didB) {
      throw new LinkProofInvalidError("A DID cannot be linked to itself", { did: didA });
    }
    return [nodeA, nodeB];
  }

  private signHalf(
    privateKey: Uint8Array,
    did: string,
    counterpartDid: string,
    createdAt: string,
  ): string {
    try {
      return signLinkPayload(privateKey, did, counterpartDid, createdAt);
    } catch (err) {
      throw new LinkProofInvalidError(`Private key for ${did} is malformed`, {
        did,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /**
   * Verify both halves, then update membership and append the proof.
   * Must run inside a store transaction.
   */
  private applyLink(
    nodeA: DIDNode,
    signatureA: string,
    nodeB: DIDNode,
    signatureB: string,
    createdAt: string,
    label: string | undefined,
  ): LinkProof {
    const [first, second] =
      nodeA.did < nodeB.did
        ? [{ node: nodeA, signature: signatureA }, { node: nodeB, signature: signatureB }]
        : [{ node: nodeB, signature: signatureB }, { node: nodeA, signature: signatureA }];

    const unsigned = {
      didA: first.node.did,
      didB: second.node.did,
      signatureA: first.signature,
      signatureB: second.signature,
      createdAt,
    };
    const failed = findInvalidSignatures(unsigned, first.node.publicKey, second.node.publicKey);
    if (failed.length > 0) {
      throw new LinkProofInvalidError("Link proof signature verification failed", {
        failed_dids: failed,
      });
    }

    const outcome = planLink(
      { node: nodeA, cluster: this.clusterOf(nodeA) },
      { node: nodeB, cluster: this.clusterOf(nodeB) },
      { newClusterId: this.generateClusterId, createdAt, label },
    );
    this.applyOutcome(outcome);

    const proof: LinkProof = { ...unsigned, clusterId: outcome.cluster.clusterId };
    this.store.saveProof(proof);

    this.logger.info(
      {
        did_a: proof.didA,
        did_b: proof.didB,
        cluster_id: proof.clusterId,
        outcome: outcome.kind,
        ...(outcome.absorbedClusterId ? { absorbed_cluster_id: outcome.absorbedClusterId } : {}),
      },
      "DIDs linked",
    );
    return proof;
  }

  private clusterOf(node: DIDNode): IdentityCluster | null {
    return node.clusterId === null ? null : this.store.getCluster(node.clusterId);
  }

  private applyOutcome(outcome: LinkOutcome): void {
    const { cluster } = outcome;
    this.store.saveCluster(cluster);
    for (const did of outcome.repointed) {
      const member = this.store.getNode(did);
      this.store.saveNode({ ...member, clusterId: cluster.clusterId });
    }
    if (outcome.absorbedClusterId !== null) {
      this.store.deleteCluster(outcome.absorbedClusterId);
    }
  }
}

