/**
 * meshid: identity graph security properties.
 *
 * Scenario-level checks that cut across operations: the lost-device flow,
 * store isolation, and the guarantees a rejected link must keep.
 */

import { describe, it, expect } from "vitest";
import { DIDManager } from "../identity/manager.js";
import { InMemoryDIDStore } from "../store/memory.js";
import { generateSigningKeyPair } from "../crypto/keys.js";
import { signLinkPayload } from "../crypto/link-proof.js";
import { deriveDID } from "../did/generate.js";
import {
  DIDNotFoundError,
  DIDRevokedError,
  LinkProofInvalidError,
} from "../types/errors.js";

describe("lost device", () => {
  it("keeps the identity resolvable from the surviving device", () => {
    const manager = new DIDManager(new InMemoryDIDStore());
    const x = manager.createDid("laptop");
    const y = manager.createDid("phone");

    const proof = manager.linkDids(x.did, x.privateKey, y.did, y.privateKey);
    const cluster = manager.resolveIdentity(y.did);
    expect(cluster?.clusterId).toBe(proof.clusterId);
    expect(new Set(cluster?.memberDids)).toEqual(new Set([x.did, y.did]));

    const revoked = manager.revokeDid(x.did, "lost device");
    expect(revoked.status).toBe("revoked");
    expect(revoked.revocationReason).toBe("lost device");

    expect(manager.resolveIdentity(y.did)).toEqual(cluster);
    expect(manager.getNode(y.did).status).toBe("active");
    expect(manager.resolveDocument(y.did).didDocument.alsoKnownAs).toEqual([]);
  });

  it("lets the surviving device link a replacement", () => {
    const manager = new DIDManager(new InMemoryDIDStore());
    const x = manager.createDid("laptop");
    const y = manager.createDid("phone");
    const { clusterId } = manager.linkDids(x.did, x.privateKey, y.did, y.privateKey);
    manager.revokeDid(x.did, "lost device");

    const z = manager.createDid("new laptop");
    expect(manager.linkDids(z.did, z.privateKey, y.did, y.privateKey).clusterId).toBe(clusterId);
    expect(manager.resolveIdentity(z.did)?.memberDids).toHaveLength(3);
  });

  it("refuses a thief holding the lost key", () => {
    const manager = new DIDManager(new InMemoryDIDStore());
    const x = manager.createDid("laptop");
    const y = manager.createDid("phone");
    manager.linkDids(x.did, x.privateKey, y.did, y.privateKey);
    manager.revokeDid(x.did, "lost device");

    const rogue = manager.createDid("rogue");
    expect(() => manager.linkDids(x.did, x.privateKey, rogue.did, rogue.privateKey)).toThrow(
      DIDRevokedError,
    );
    expect(manager.resolveIdentity(rogue.did)).toBeNull();
  });
});

describe("link forgery", () => {
  it("cannot pull a victim into an attacker's cluster with a self-made key", () => {
    const manager = new DIDManager(new InMemoryDIDStore());
    const victim = manager.createDid("victim");
    const attacker = manager.createDid("attacker");
    const forged = generateSigningKeyPair();

    expect(() =>
      manager.linkDids(attacker.did, attacker.privateKey, victim.did, forged.privateKey),
    ).toThrow(LinkProofInvalidError);
    expect(manager.getNode(victim.did).clusterId).toBeNull();
    expect(manager.getNode(attacker.did).clusterId).toBeNull();
    expect(manager.listProofs()).toEqual([]);
  });

  it("cannot replay one signature as both halves", () => {
    const manager = new DIDManager(new InMemoryDIDStore());
    const a = manager.createDid("a");
    const b = manager.createDid("b");
    const createdAt = new Date().toISOString();
    const signature = signLinkPayload(a.privateKey, a.did, b.did, createdAt);

    expect(() =>
      manager.submitLinkProof({ didA: a.did, didB: b.did, createdAt, signatureA: signature, signatureB: signature }),
    ).toThrow(LinkProofInvalidError);
  });

  it("cannot link a DID that was never registered", () => {
    const manager = new DIDManager(new InMemoryDIDStore());
    const a = manager.createDid("a");
    const outsider = generateSigningKeyPair();
    expect(() =>
      manager.linkDids(a.did, a.privateKey, deriveDID(outsider.publicKey), outsider.privateKey),
    ).toThrow(DIDNotFoundError);
  });
});

describe("store isolation", () => {
  it("keeps independent stores in one process separate", () => {
    const first = new DIDManager(new InMemoryDIDStore());
    const second = new DIDManager(new InMemoryDIDStore());

    const node = first.createDid("laptop");

    expect(first.listNodes()).toHaveLength(1);
    expect(second.listNodes()).toEqual([]);
    expect(() => second.getNode(node.did)).toThrow(DIDNotFoundError);
  });
});
