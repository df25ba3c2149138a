import { describe, it, expect } from "vitest";
import { chooseSurvivor, planLink, unionMembers, type LinkSide } from "../identity/cluster.js";
import type { DIDNode, IdentityCluster } from "../types/did.js";

const CREATED_AT = "2026-03-01T00:00:00.000Z";

function node(did: string, label = did, clusterId: string | null = null): DIDNode {
  return {
    did,
    publicKey: new Uint8Array(32),
    label,
    status: "active",
    clusterId,
    createdAt: CREATED_AT,
    revokedAt: null,
    revocationReason: null,
  };
}

function cluster(clusterId: string, memberDids: string[], label: string | null = null): IdentityCluster {
  return { clusterId, label, memberDids, createdAt: CREATED_AT };
}

function side(n: DIDNode, c: IdentityCluster | null): LinkSide {
  return { node: n, cluster: c };
}

const ctx = { newClusterId: () => "new-cluster", createdAt: CREATED_AT };

describe("unionMembers", () => {
  it("keeps base order and appends unseen members", () => {
    expect(unionMembers(["a", "b"], ["c", "b", "d"])).toEqual(["a", "b", "c", "d"]);
  });
});

describe("chooseSurvivor", () => {
  it("keeps the cluster with the smaller id regardless of argument order", () => {
    const older = cluster("0190a000-0000-7000-8000-000000000001", ["a"]);
    const newer = cluster("0190b000-0000-7000-8000-000000000001", ["b"]);
    expect(chooseSurvivor(older, newer).survivor).toBe(older);
    expect(chooseSurvivor(newer, older).survivor).toBe(older);
    expect(chooseSurvivor(newer, older).absorbed).toBe(newer);
  });
});

describe("planLink", () => {
  it("creates a cluster when neither node is linked", () => {
    const outcome = planLink(side(node("x", "laptop"), null), side(node("y", "phone"), null), ctx);
    expect(outcome).toEqual({
      kind: "created",
      cluster: cluster("new-cluster", ["x", "y"], "laptop"),
      repointed: ["x", "y"],
      absorbedClusterId: null,
    });
  });

  it("uses an explicit label for a new cluster", () => {
    const outcome = planLink(side(node("x"), null), side(node("y"), null), { ...ctx, label: "alice" });
    expect(outcome.cluster.label).toBe("alice");
  });

  it("joins the unlinked node to the existing cluster", () => {
    const existing = cluster("c1", ["a", "b"], "alice");
    const outcome = planLink(side(node("c"), null), side(node("b", "b", "c1"), existing), ctx);
    expect(outcome).toEqual({
      kind: "joined",
      cluster: cluster("c1", ["a", "b", "c"], "alice"),
      repointed: ["c"],
      absorbedClusterId: null,
    });
  });

  it("leaves membership unchanged for two nodes of the same cluster", () => {
    const existing = cluster("c1", ["a", "b"], "alice");
    const outcome = planLink(side(node("a", "a", "c1"), existing), side(node("b", "b", "c1"), existing), ctx);
    expect(outcome.kind).toBe("unchanged");
    expect(outcome.cluster).toEqual(existing);
    expect(outcome.repointed).toEqual([]);
  });

  it("merges two clusters into the one with the smaller id", () => {
    const ab = cluster("c2", ["a", "b"]);
    const cd = cluster("c1", ["c", "d"], "work");
    const outcome = planLink(side(node("b", "b", "c2"), ab), side(node("c", "c", "c1"), cd), ctx);
    expect(outcome).toEqual({
      kind: "merged",
      cluster: cluster("c1", ["c", "d", "a", "b"], "work"),
      repointed: ["a", "b"],
      absorbedClusterId: "c2",
    });
  });

  it("inherits the absorbed label when the survivor has none", () => {
    const ab = cluster("c1", ["a", "b"]);
    const cd = cluster("c2", ["c", "d"], "home");
    expect(planLink(side(node("b"), ab), side(node("c"), cd), ctx).cluster.label).toBe("home");
  });

  it("does not call the id generator unless a cluster is created", () => {
    let calls = 0;
    const counting = { ...ctx, newClusterId: () => `gen-${++calls}` };
    planLink(side(node("a"), cluster("c1", ["a"])), side(node("b"), null), counting);
    expect(calls).toBe(0);
  });
});
