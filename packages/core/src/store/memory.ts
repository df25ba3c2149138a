/**
 * meshid: In-memory DIDStore.
 *
 * Backed by insertion-ordered Maps. Transactions snapshot the three
 * collections and restore them when the callback throws.
 */

import type { DIDNode, IdentityCluster, LinkProof } from "../types/did.js";
import { ClusterNotFoundError, DIDNotFoundError } from "../types/errors.js";
import {
  SNAPSHOT_VERSION,
  clusterFromRecord,
  clusterToRecord,
  nodeFromRecord,
  nodeToRecord,
  parseSnapshot,
  proofFromRecord,
  proofToRecord,
  type StoreSnapshot,
} from "../identity/serialize.js";
import type { DIDStore } from "./types.js";

interface StoreState {
  nodes: Map<string, DIDNode>;
  clusters: Map<string, IdentityCluster>;
  proofs: LinkProof[];
}

export class InMemoryDIDStore implements DIDStore {
  private state: StoreState = {
    nodes: new Map(),
    clusters: new Map(),
    proofs: [],
  };
  private transactionDepth = 0;

  /**
   * Build a store from snapshot data (validated).
   * @throws {SnapshotInvalidError}
   */
  static fromSnapshot(data: unknown): InMemoryDIDStore {
    const store = new InMemoryDIDStore();
    store.loadSnapshot(data);
    return store;
  }

  // -----------------------------------------------------------------------
  // Nodes
  // -----------------------------------------------------------------------

  saveNode(node: DIDNode): void {
    this.state.nodes.set(node.did, structuredClone(node));
  }

  getNode(did: string): DIDNode {
    const node = this.state.nodes.get(did);
    if (!node) {
      throw new DIDNotFoundError(did);
    }
    return structuredClone(node);
  }

  hasNode(did: string): boolean {
    return this.state.nodes.has(did);
  }

  listNodes(): DIDNode[] {
    return Array.from(this.state.nodes.values(), (node) => structuredClone(node));
  }

  // -----------------------------------------------------------------------
  // Clusters
  // -----------------------------------------------------------------------

  saveCluster(cluster: IdentityCluster): void {
    this.state.clusters.set(cluster.clusterId, structuredClone(cluster));
  }

  getCluster(clusterId: string): IdentityCluster {
    const cluster = this.state.clusters.get(clusterId);
    if (!cluster) {
      throw new ClusterNotFoundError(clusterId);
    }
    return structuredClone(cluster);
  }

  listClusters(): IdentityCluster[] {
    return Array.from(this.state.clusters.values(), (cluster) => structuredClone(cluster));
  }

  deleteCluster(clusterId: string): void {
    if (!this.state.clusters.delete(clusterId)) {
      throw new ClusterNotFoundError(clusterId);
    }
  }

  // -----------------------------------------------------------------------
  // Proofs
  // -----------------------------------------------------------------------

  saveProof(proof: LinkProof): void {
    this.state.proofs.push({ ...proof });
  }

  listProofs(): LinkProof[] {
    return this.state.proofs.map((proof) => ({ ...proof }));
  }

  // -----------------------------------------------------------------------
  // Transactions
  // -----------------------------------------------------------------------

  transaction<T>(fn: () => T): T {
    if (this.transactionDepth > 0) {
      return fn();
    }
    const saved: StoreState = {
      nodes: new Map(this.state.nodes),
      clusters: new Map(this.state.clusters),
      proofs: [...this.state.proofs],
    };
    this.transactionDepth++;
    try {
      return fn();
    } catch (err) {
      this.state = saved;
      throw err;
    } finally {
      this.transactionDepth--;
    }
  }

  // -----------------------------------------------------------------------
  // Snapshots
  // -----------------------------------------------------------------------

  /** Serializable copy of the whole store. Contains no private keys. */
  exportSnapshot(): StoreSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      nodes: Array.from(this.state.nodes.values(), nodeToRecord),
      clusters: Array.from(this.state.clusters.values(), clusterToRecord),
      proofs: this.state.proofs.map(proofToRecord),
    };
  }

  /**
   * Replace the store contents with validated snapshot data.
   * @throws {SnapshotInvalidError}
   */
  protected loadSnapshot(data: unknown): void {
    const snapshot = parseSnapshot(data);
    const state: StoreState = { nodes: new Map(), clusters: new Map(), proofs: [] };
    for (const record of snapshot.nodes) {
      const node = nodeFromRecord(record);
      state.nodes.set(node.did, node);
    }
    for (const record of snapshot.clusters) {
      const cluster = clusterFromRecord(record);
      state.clusters.set(cluster.clusterId, cluster);
    }
    state.proofs = snapshot.proofs.map(proofFromRecord);
    this.state = state;
  }
}
