/**
 * meshid: Database schema and SQLite-backed DIDStore.
 *
 * Uses better-sqlite3 (synchronous) with WAL mode. Rows use the same
 * snake_case records as store snapshots, so conversion goes through the
 * core record helpers.
 */

import BetterSqlite3 from "better-sqlite3";
import {
  ClusterNotFoundError,
  DIDNotFoundError,
  clusterFromRecord,
  clusterToRecord,
  nodeFromRecord,
  nodeToRecord,
  proofFromRecord,
  proofToRecord,
  type ClusterRecord,
  type DIDNode,
  type DIDStore,
  type IdentityCluster,
  type LinkProof,
  type NodeRecord,
  type ProofRecord,
} from "@meshid/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface NonceRow {
  nonce: string;
  did: string;
  created_at: string;
  expires_at: string;
}

type ClusterRow = Omit<ClusterRecord, "member_dids">;

const NODE_COLUMNS =
  "did, public_key, label, status, cluster_id, created_at, revoked_at, revocation_reason";
const PROOF_COLUMNS = "did_a, did_b, signature_a, signature_b, cluster_id, created_at";

// ---------------------------------------------------------------------------
// Schema initialization
// ---------------------------------------------------------------------------

export function initializeDatabase(dbPath: string): BetterSqlite3.Database {
  const db = new BetterSqlite3(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  // seq columns preserve insertion order across upserts
  db.exec(`
    CREATE TABLE IF NOT EXISTS did_nodes (
      seq               INTEGER PRIMARY KEY AUTOINCREMENT,
      did               TEXT UNIQUE NOT NULL,
      public_key        TEXT NOT NULL,
      label             TEXT NOT NULL,
      status            TEXT NOT NULL CHECK (status IN ('active', 'revoked')),
      cluster_id        TEXT,
      created_at        TEXT NOT NULL,
      revoked_at        TEXT,
      revocation_reason TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_did_nodes_cluster ON did_nodes(cluster_id);

    CREATE TABLE IF NOT EXISTS identity_clusters (
      seq         INTEGER PRIMARY KEY AUTOINCREMENT,
      cluster_id  TEXT UNIQUE NOT NULL,
      label       TEXT,
      created_at  TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS cluster_members (
      cluster_id  TEXT NOT NULL REFERENCES identity_clusters(cluster_id) ON DELETE CASCADE,
      did         TEXT NOT NULL,
      position    INTEGER NOT NULL,
      PRIMARY KEY (cluster_id, did)
    );

    CREATE TABLE IF NOT EXISTS link_proofs (
      seq          INTEGER PRIMARY KEY AUTOINCREMENT,
      did_a        TEXT NOT NULL,
      did_b        TEXT NOT NULL,
      signature_a  TEXT NOT NULL,
      signature_b  TEXT NOT NULL,
      cluster_id   TEXT NOT NULL,
      created_at   TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_link_proofs_did_a ON link_proofs(did_a);
    CREATE INDEX IF NOT EXISTS idx_link_proofs_did_b ON link_proofs(did_b);

    CREATE TABLE IF NOT EXISTS nonces (
      nonce       TEXT PRIMARY KEY,
      did         TEXT NOT NULL,
      created_at  TEXT NOT NULL,
      expires_at  TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_nonces_expires ON nonces(expires_at);
  `);

  return db;
}

// ---------------------------------------------------------------------------
// Database wrapper class
// ---------------------------------------------------------------------------

export class Database implements DIDStore {
  private db: BetterSqlite3.Database;

  constructor(dbPath: string) {
    this.db = initializeDatabase(dbPath);
  }

  /** Expose raw db for advanced usage. */
  get raw(): BetterSqlite3.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    // better-sqlite3 turns nested transactions into savepoints
    return this.db.transaction(fn)();
  }

  // -----------------------------------------------------------------------
  // Nodes
  // -----------------------------------------------------------------------

  saveNode(node: DIDNode): void {
    const stmt = this.db.prepare(`
      INSERT INTO did_nodes (${NODE_COLUMNS})
      VALUES (@did, @public_key, @label, @status, @cluster_id, @created_at, @revoked_at, @revocation_reason)
      ON CONFLICT(did) DO UPDATE SET
        public_key = excluded.public_key,
        label = excluded.label,
        status = excluded.status,
        cluster_id = excluded.cluster_id,
        created_at = excluded.created_at,
        revoked_at = excluded.revoked_at,
        revocation_reason = excluded.revocation_reason
    `);
    stmt.run(nodeToRecord(node));
  }

  getNode(did: string): DIDNode {
    const stmt = this.db.prepare(`SELECT ${NODE_COLUMNS} FROM did_nodes WHERE did = ?`);
    const row = stmt.get(did) as NodeRecord | undefined;
    if (!row) {
      throw new DIDNotFoundError(did);
    }
    return nodeFromRecord(row);
  }

  hasNode(did: string): boolean {
    const stmt = this.db.prepare("SELECT 1 FROM did_nodes WHERE did = ?");
    return stmt.get(did) !== undefined;
  }

  listNodes(): DIDNode[] {
    const stmt = this.db.prepare(`SELECT ${NODE_COLUMNS} FROM did_nodes ORDER BY seq`);
    return (stmt.all() as NodeRecord[]).map(nodeFromRecord);
  }

  // -----------------------------------------------------------------------
  // Clusters
  // -----------------------------------------------------------------------

  saveCluster(cluster: IdentityCluster): void {
    const record = clusterToRecord(cluster);
    this.transaction(() => {
      this.db
        .prepare(`
          INSERT INTO identity_clusters (cluster_id, label, created_at)
          VALUES (@cluster_id, @label, @created_at)
          ON CONFLICT(cluster_id) DO UPDATE SET
            label = excluded.label,
            created_at = excluded.created_at
        `)
        .run({ cluster_id: record.cluster_id, label: record.label, created_at: record.created_at });

      this.db.prepare("DELETE FROM cluster_members WHERE cluster_id = ?").run(record.cluster_id);
      const insertMember = this.db.prepare(
        "INSERT INTO cluster_members (cluster_id, did, position) VALUES (?, ?, ?)",
      );
      record.member_dids.forEach((did, position) => {
        insertMember.run(record.cluster_id, did, position);
      });
    });
  }

  getCluster(clusterId: string): IdentityCluster {
    const stmt = this.db.prepare(
      "SELECT cluster_id, label, created_at FROM identity_clusters WHERE cluster_id = ?",
    );
    const row = stmt.get(clusterId) as ClusterRow | undefined;
    if (!row) {
      throw new ClusterNotFoundError(clusterId);
    }
    return this.hydrateCluster(row);
  }

  listClusters(): IdentityCluster[] {
    const stmt = this.db.prepare(
      "SELECT cluster_id, label, created_at FROM identity_clusters ORDER BY seq",
    );
    return (stmt.all() as ClusterRow[]).map((row) => this.hydrateCluster(row));
  }

  deleteCluster(clusterId: string): void {
    const stmt = this.db.prepare("DELETE FROM identity_clusters WHERE cluster_id = ?");
    if (stmt.run(clusterId).changes === 0) {
      throw new ClusterNotFoundError(clusterId);
    }
  }

  getClusterCount(): number {
    const stmt = this.db.prepare("SELECT COUNT(*) as total FROM identity_clusters");
    return (stmt.get() as { total: number }).total;
  }

  private hydrateCluster(row: ClusterRow): IdentityCluster {
    const stmt = this.db.prepare(
      "SELECT did FROM cluster_members WHERE cluster_id = ? ORDER BY position",
    );
    const members = (stmt.all(row.cluster_id) as Array<{ did: string }>).map((m) => m.did);
    return clusterFromRecord({ ...row, member_dids: members });
  }

  // -----------------------------------------------------------------------
  // Proofs
  // -----------------------------------------------------------------------

  saveProof(proof: LinkProof): void {
    const stmt = this.db.prepare(`
      INSERT INTO link_proofs (${PROOF_COLUMNS})
      VALUES (@did_a, @did_b, @signature_a, @signature_b, @cluster_id, @created_at)
    `);
    stmt.run(proofToRecord(proof));
  }

  listProofs(): LinkProof[] {
    const stmt = this.db.prepare(`SELECT ${PROOF_COLUMNS} FROM link_proofs ORDER BY seq`);
    return (stmt.all() as ProofRecord[]).map(proofFromRecord);
  }

  // -----------------------------------------------------------------------
  // Stats
  // -----------------------------------------------------------------------

  getNodeCount(): number {
    const stmt = this.db.prepare("SELECT COUNT(*) as total FROM did_nodes");
    return (stmt.get() as { total: number }).total;
  }

  getProofCount(): number {
    const stmt = this.db.prepare("SELECT COUNT(*) as total FROM link_proofs");
    return (stmt.get() as { total: number }).total;
  }

  // -----------------------------------------------------------------------
  // Nonce
  // -----------------------------------------------------------------------

  insertNonce(nonce: string, did: string, ttlHours: number = 24): void {
    const now = new Date();
    const expiresAt = new Date(now.getTime() + ttlHours * 60 * 60 * 1000);
    const stmt = this.db.prepare(
      "INSERT INTO nonces (nonce, did, created_at, expires_at) VALUES (?, ?, ?, ?)",
    );
    stmt.run(nonce, did, now.toISOString(), expiresAt.toISOString());
  }

  nonceExists(nonce: string): boolean {
    const stmt = this.db.prepare("SELECT 1 FROM nonces WHERE nonce = ?");
    return stmt.get(nonce) !== undefined;
  }

  getNonce(nonce: string): NonceRow | undefined {
    const stmt = this.db.prepare("SELECT * FROM nonces WHERE nonce = ?");
    return stmt.get(nonce) as NonceRow | undefined;
  }

  deleteExpiredNonces(): number {
    const now = new Date().toISOString();
    const stmt = this.db.prepare("DELETE FROM nonces WHERE expires_at < ?");
    return stmt.run(now).changes;
  }
}
