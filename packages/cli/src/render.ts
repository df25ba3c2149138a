/**
 * meshid: Plain-text rendering for CLI output.
 */

import type { DIDNode, IdentityCluster, LinkProof } from "@meshid/core";

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + " ".repeat(width - value.length);
}

function clusterName(cluster: IdentityCluster): string {
  return cluster.label ?? cluster.clusterId;
}

export function renderNodeTable(nodes: DIDNode[], clusters: IdentityCluster[]): string[] {
  if (nodes.length === 0) {
    return ["No DIDs registered."];
  }

  const byId = new Map(clusters.map((c) => [c.clusterId, c]));
  const didWidth = Math.max(3, ...nodes.map((n) => n.did.length));
  const labelWidth = Math.max(5, ...nodes.map((n) => n.label.length));

  const lines = [
    `${pad("DID", didWidth)}  ${pad("LABEL", labelWidth)}  ${pad("STATUS", 7)}  CLUSTER`,
  ];
  for (const node of nodes) {
    const cluster = node.clusterId === null ? undefined : byId.get(node.clusterId);
    lines.push(
      `${pad(node.did, didWidth)}  ${pad(node.label, labelWidth)}  ${pad(node.status, 7)}  ${
        cluster ? clusterName(cluster) : "-"
      }`,
    );
  }
  lines.push("");
  lines.push(`${nodes.length} DID(s), ${clusters.length} cluster(s)`);
  return lines;
}

export function renderNode(node: DIDNode): string[] {
  const lines = [
    `DID:      ${node.did}`,
    `Label:    ${node.label}`,
    `Status:   ${node.status}`,
    `Cluster:  ${node.clusterId ?? "-"}`,
    `Created:  ${node.createdAt}`,
  ];
  if (node.status === "revoked") {
    lines.push(`Revoked:  ${node.revokedAt ?? "-"}`);
    lines.push(`Reason:   ${node.revocationReason || "-"}`);
  }
  return lines;
}

export function renderCluster(
  cluster: IdentityCluster,
  statusOf: (did: string) => string,
): string[] {
  return [
    `Cluster:  ${cluster.clusterId}`,
    `Label:    ${cluster.label ?? "-"}`,
    `Created:  ${cluster.createdAt}`,
    `Members:  ${cluster.memberDids.length}`,
    ...cluster.memberDids.map((did) => `  ${did} (${statusOf(did)})`),
  ];
}

export function renderProof(proof: LinkProof, valid: boolean): string {
  return `${proof.createdAt}  ${proof.didA} <-> ${proof.didB}  ${proof.clusterId}  ${
    valid ? "valid" : "INVALID"
  }`;
}
