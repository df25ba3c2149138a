/**
 * meshid: Cluster join and merge planning.
 *
 * Linking two nodes is a union over their clusters. `planLink` decides the
 * outcome without touching a store; DIDManager applies it.
 *
 *   neither linked   -> created   (new cluster with both)
 *   one linked       -> joined    (the other node is appended)
 *   same cluster     -> unchanged (no membership change)
 *   two clusters     -> merged    (survivor absorbs the other)
 */

import type { DIDNode, IdentityCluster } from "../types/did.js";

export type LinkOutcomeKind = "created" | "joined" | "unchanged" | "merged";

export interface LinkOutcome {
  kind: LinkOutcomeKind;
  /** The cluster as it must be saved. */
  cluster: IdentityCluster;
  /** DIDs whose `clusterId` must be repointed to `cluster.clusterId`. */
  repointed: string[];
  /** Cluster to delete after a merge. */
  absorbedClusterId: string | null;
}

/** A node together with the cluster it currently points at, if any. */
export interface LinkSide {
  node: DIDNode;
  cluster: IdentityCluster | null;
}

export interface LinkPlanContext {
  /** Id for a cluster created by this link. */
  newClusterId: () => string;
  createdAt: string;
  /** Explicit label for the resulting cluster. */
  label?: string;
}

/**
 * Deterministic merge tie-break: the cluster whose id sorts first survives.
 * Cluster ids are UUIDv7, so this is also the older cluster.
 */
export function chooseSurvivor(
  x: IdentityCluster,
  y: IdentityCluster,
): { survivor: IdentityCluster; absorbed: IdentityCluster } {
  return x.clusterId <= y.clusterId
    ? { survivor: x, absorbed: y }
    : { survivor: y, absorbed: x };
}

/** Union of member lists: `base` order first, then unseen `extra` members. */
export function unionMembers(base: readonly string[], extra: readonly string[]): string[] {
  const seen = new Set(base);
  const merged = [...base];
  for (const did of extra) {
    if (!seen.has(did)) {
      seen.add(did);
      merged.push(did);
    }
  }
  return merged;
}

/** Decide how linking `a` and `b` changes cluster membership. */
export function planLink(a: LinkSide, b: LinkSide, ctx: LinkPlanContext): LinkOutcome {
  if (a.cluster && b.cluster) {
    return planClusterPair(a.cluster, b.cluster, ctx.label);
  }

  const existing = a.cluster ?? b.cluster;
  if (existing) {
    const newcomer = a.cluster ? b.node : a.node;
    return {
      kind: "joined",
      cluster: {
        ...existing,
        label: ctx.label ?? existing.label,
        memberDids: unionMembers(existing.memberDids, [newcomer.did]),
      },
      repointed: [newcomer.did],
      absorbedClusterId: null,
    };
  }

  return {
    kind: "created",
    cluster: {
      clusterId: ctx.newClusterId(),
      label: ctx.label ?? a.node.label,
      memberDids: [a.node.did, b.node.did],
      createdAt: ctx.createdAt,
    },
    repointed: [a.node.did, b.node.did],
    absorbedClusterId: null,
  };
}

function planClusterPair(
  x: IdentityCluster,
  y: IdentityCluster,
  label: string | undefined,
): LinkOutcome {
  if (x.clusterId === y.clusterId) {
    return {
      kind: "unchanged",
      cluster: { ...x, label: label ?? x.label },
      repointed: [],
      absorbedClusterId: null,
    };
  }

  const { survivor, absorbed } = chooseSurvivor(x, y);
  return {
    kind: "merged",
    cluster: {
      ...survivor,
      label: label ?? survivor.label ?? absorbed.label,
      memberDids: unionMembers(survivor.memberDids, absorbed.memberDids),
    },
    repointed: [...absorbed.memberDids],
    absorbedClusterId: absorbed.clusterId,
  };
}
