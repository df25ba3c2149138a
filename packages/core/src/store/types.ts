/**
 * meshid: Persistence boundary for the identity graph.
 *
 * Stores hold nodes, clusters and an append-only list of link proofs. They
 * enforce no cross-entity invariants; DIDManager does. Enumerations return
 * insertion order, and every returned entity is a copy the caller may mutate.
 */

import type { DIDNode, IdentityCluster, LinkProof } from "../types/did.js";

export interface DIDStore {
  /** Insert or replace a node. Replacing keeps its original position. */
  saveNode(node: DIDNode): void;
  /** @throws {DIDNotFoundError} */
  getNode(did: string): DIDNode;
  hasNode(did: string): boolean;
  listNodes(): DIDNode[];

  /** Insert or replace a cluster. Replacing keeps its original position. */
  saveCluster(cluster: IdentityCluster): void;
  /** @throws {ClusterNotFoundError} */
  getCluster(clusterId: string): IdentityCluster;
  listClusters(): IdentityCluster[];
  /** @throws {ClusterNotFoundError} */
  deleteCluster(clusterId: string): void;

  /** Append a proof. Proofs are never updated or removed. */
  saveProof(proof: LinkProof): void;
  listProofs(): LinkProof[];

  /**
   * Run `fn` atomically. If it throws, every write made inside it is undone
   * and the error is rethrown. Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T;
}
