/**
 * meshid: Database tests.
 *
 * Tests the SQLite-backed DIDStore: CRUD, ordering, transactions, nonce
 * management, and running DIDManager on top of it.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { randomUUID } from "node:crypto";
import { mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  ClusterNotFoundError,
  DIDManager,
  DIDNotFoundError,
  deriveDID,
  generateSigningKeyPair,
  type DIDNode,
  type IdentityCluster,
} from "@meshid/core";
import { Database } from "../db/schema.js";

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

let db: Database;
let testDir: string;

beforeEach(() => {
  testDir = join(tmpdir(), `meshid-test-${randomUUID()}`);
  mkdirSync(testDir, { recursive: true });
  db = new Database(join(testDir, "test.db"));
});

afterEach(() => {
  db.close();
  rmSync(testDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeNode(label: string, overrides: Partial<DIDNode> = {}): DIDNode {
  const kp = generateSigningKeyPair();
  return {
    did: deriveDID(kp.publicKey),
    publicKey: kp.publicKey,
    label,
    status: "active",
    clusterId: null,
    createdAt: "2026-01-01T00:00:00.000Z",
    revokedAt: null,
    revocationReason: null,
    ...overrides,
  };
}

function makeCluster(clusterId: string, memberDids: string[]): IdentityCluster {
  return { clusterId, label: null, memberDids, createdAt: "2026-01-01T00:00:00.000Z" };
}

// ---------------------------------------------------------------------------
// Nodes
// ---------------------------------------------------------------------------

describe("Nodes", () => {
  it("should save and retrieve a node losslessly", () => {
    const node = makeNode("laptop", {
      status: "revoked",
      clusterId: "c1",
      revokedAt: "2026-02-01T00:00:00.000Z",
      revocationReason: "lost device",
    });
    db.saveNode(node);
    expect(db.getNode(node.did)).toEqual(node);
  });

  it("should throw DIDNotFoundError for an unknown DID", () => {
    expect(() => db.getNode("did:key:zMissing")).toThrow(DIDNotFoundError);
    expect(db.hasNode("did:key:zMissing")).toBe(false);
  });

  it("should update in place and keep insertion order", () => {
    const a = makeNode("a");
    const b = makeNode("b");
    db.saveNode(a);
    db.saveNode(b);
    db.saveNode({ ...a, label: "a2" });

    expect(db.listNodes().map((n) => n.label)).toEqual(["a2", "b"]);
    expect(db.getNodeCount()).toBe(2);
  });
});

// ---------------------------------------------------------------------------
// Clusters
// ---------------------------------------------------------------------------

describe("Clusters", () => {
  it("should keep member order", () => {
    db.saveCluster(makeCluster("c1", ["did:key:zB", "did:key:zA", "did:key:zC"]));
    expect(db.getCluster("c1").memberDids).toEqual(["did:key:zB", "did:key:zA", "did:key:zC"]);
  });

  it("should replace members on save", () => {
    db.saveCluster(makeCluster("c1", ["did:key:zA", "did:key:zB"]));
    db.saveCluster({ ...makeCluster("c1", ["did:key:zA", "did:key:zB", "did:key:zC"]), label: "alice" });

    const cluster = db.getCluster("c1");
    expect(cluster.memberDids).toEqual(["did:key:zA", "did:key:zB", "did:key:zC"]);
    expect(cluster.label).toBe("alice");
    expect(db.getClusterCount()).toBe(1);
  });

  it("should delete a cluster and its members", () => {
    db.saveCluster(makeCluster("c1", ["did:key:zA"]));
    db.saveCluster(makeCluster("c2", ["did:key:zB"]));
    db.deleteCluster("c1");

    expect(db.listClusters().map((c) => c.clusterId)).toEqual(["c2"]);
    expect(() => db.getCluster("c1")).toThrow(ClusterNotFoundError);
    const orphans = db.raw
      .prepare("SELECT COUNT(*) as total FROM cluster_members WHERE cluster_id = ?")
      .get("c1") as { total: number };
    expect(orphans.total).toBe(0);
  });

  it("should throw ClusterNotFoundError when deleting an unknown cluster", () => {
    expect(() => db.deleteCluster("missing")).toThrow(ClusterNotFoundError);
  });
});

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

describe("Transactions", () => {
  it("should roll back every write when the callback throws", () => {
    const kept = makeNode("kept");
    db.saveNode(kept);

    expect(() =>
      db.transaction(() => {
        db.saveNode({ ...kept, label: "changed" });
        db.saveCluster(makeCluster("c1", [kept.did]));
        db.saveProof({
          didA: kept.did,
          didB: "did:key:zOther",
          signatureA: "a",
          signatureB: "b",
          clusterId: "c1",
          createdAt: "2026-01-01T00:00:00.000Z",
        });
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(db.getNode(kept.did).label).toBe("kept");
    expect(db.listClusters()).toEqual([]);
    expect(db.listProofs()).toEqual([]);
  });

  it("should return the callback's value", () => {
    expect(db.transaction(() => "done")).toBe("done");
  });
});

// ---------------------------------------------------------------------------
// Nonces
// ---------------------------------------------------------------------------

describe("Nonces", () => {
  it("should record and detect nonces", () => {
    expect(db.nonceExists("n-1")).toBe(false);
    db.insertNonce("n-1", "did:key:zA");
    expect(db.nonceExists("n-1")).toBe(true);
    expect(db.getNonce("n-1")?.did).toBe("did:key:zA");
  });

  it("should delete only expired nonces", () => {
    db.insertNonce("expired", "did:key:zA", -1);
    db.insertNonce("fresh", "did:key:zA", 24);

    expect(db.deleteExpiredNonces()).toBe(1);
    expect(db.nonceExists("expired")).toBe(false);
    expect(db.nonceExists("fresh")).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// DIDManager on SQLite
// ---------------------------------------------------------------------------

describe("DIDManager with SQLite", () => {
  it("should merge clusters and persist across reopen", () => {
    const manager = new DIDManager(db);
    const a = manager.createDid("a");
    const b = manager.createDid("b");
    const c = manager.createDid("c");
    const d = manager.createDid("d");
    const first = manager.linkDids(a.did, a.privateKey, b.did, b.privateKey);
    const second = manager.linkDids(c.did, c.privateKey, d.did, d.privateKey);
    const merged = manager.linkDids(b.did, b.privateKey, c.did, c.privateKey);

    const survivor = [first.clusterId, second.clusterId].sort()[0];
    expect(merged.clusterId).toBe(survivor);

    db.close();
    db = new Database(join(testDir, "test.db"));
    const reopened = new DIDManager(db);

    expect(reopened.listClusters()).toHaveLength(1);
    expect(new Set(reopened.resolveIdentity(a.did)?.memberDids)).toEqual(
      new Set([a.did, b.did, c.did, d.did]),
    );
    for (const did of [a.did, b.did, c.did, d.did]) {
      expect(reopened.getNode(did).clusterId).toBe(survivor);
    }
    expect(reopened.listProofs()).toHaveLength(3);
    expect(reopened.listProofs().every((p) => reopened.verifyProof(p))).toBe(true);
  });

  it("should leave no trace of a rejected link", () => {
    const manager = new DIDManager(db);
    const a = manager.createDid("a");
    const b = manager.createDid("b");
    const wrong = generateSigningKeyPair();

    expect(() => manager.linkDids(a.did, a.privateKey, b.did, wrong.privateKey)).toThrow();
    expect(db.getClusterCount()).toBe(0);
    expect(db.getProofCount()).toBe(0);
    expect(db.getNode(a.did).clusterId).toBeNull();
  });
});
