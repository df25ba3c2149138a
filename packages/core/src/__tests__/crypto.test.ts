import { describe, it, expect } from "vitest";
import {
  generateSigningKeyPair,
  keyPairFromPrivateKey,
} from "../crypto/keys.js";
import {
  canonicalize,
  fromBase64Url,
  hashPayload,
  sign,
  toBase64Url,
  verify,
  verifyBase64Url,
} from "../crypto/signing.js";
import {
  LINK_PROOF_DOMAIN,
  buildLinkPayload,
  canonicalPair,
  findInvalidSignatures,
  signLinkPayload,
} from "../crypto/link-proof.js";
import { AUTH_HEADERS, requestSigningPayload, signRequest } from "../crypto/request.js";

const encoder = new TextEncoder();

// ---------------------------------------------------------------------------
// Key generation
// ---------------------------------------------------------------------------
describe("generateSigningKeyPair", () => {
  it("returns 32-byte public and private keys", () => {
    const kp = generateSigningKeyPair();
    expect(kp.publicKey).toBeInstanceOf(Uint8Array);
    expect(kp.publicKey.length).toBe(32);
    expect(kp.privateKey.length).toBe(32);
  });

  it("generates different keys on each call", () => {
    const a = generateSigningKeyPair();
    const b = generateSigningKeyPair();
    expect(a.privateKey).not.toEqual(b.privateKey);
    expect(a.publicKey).not.toEqual(b.publicKey);
  });
});

describe("keyPairFromPrivateKey", () => {
  it("recovers the public key of a generated pair", () => {
    const kp = generateSigningKeyPair();
    expect(keyPairFromPrivateKey(kp.privateKey).publicKey).toEqual(kp.publicKey);
  });

  it("rejects keys that are not 32 bytes", () => {
    expect(() => keyPairFromPrivateKey(new Uint8Array(31))).toThrow(RangeError);
  });
});

// ---------------------------------------------------------------------------
// canonicalize
// ---------------------------------------------------------------------------
describe("canonicalize", () => {
  it("sorts top-level keys alphabetically", () => {
    expect(canonicalize({ z: 1, a: 2, m: 3 })).toBe('{"a":2,"m":3,"z":1}');
  });

  it("sorts nested keys and keeps array order", () => {
    const result = canonicalize({ b: [{ y: 1, x: 2 }, 3], a: { d: 4, c: 5 } });
    expect(result).toBe('{"a":{"c":5,"d":4},"b":[{"x":2,"y":1},3]}');
  });

  it("produces identical output regardless of insertion order", () => {
    expect(canonicalize({ first: 1, second: 2 })).toBe(canonicalize({ second: 2, first: 1 }));
  });
});

// ---------------------------------------------------------------------------
// base64url
// ---------------------------------------------------------------------------
describe("base64url encoding", () => {
  it("uses the URL-safe alphabet without padding", () => {
    expect(toBase64Url(new Uint8Array([0xfb, 0xff]))).toBe("-_8");
  });

  it("decodes what it encodes", () => {
    const bytes = new Uint8Array([0, 1, 2, 250, 251, 252, 253, 254, 255]);
    expect(fromBase64Url(toBase64Url(bytes))).toEqual(bytes);
  });
});

// ---------------------------------------------------------------------------
// sign / verify
// ---------------------------------------------------------------------------
describe("sign and verify", () => {
  it("verifies a signature made with the matching key", () => {
    const kp = generateSigningKeyPair();
    const payload = encoder.encode("hello");
    const sig = sign(kp.privateKey, payload);
    expect(sig.length).toBe(64);
    expect(verify(kp.publicKey, payload, sig)).toBe(true);
  });

  it("is deterministic for the same key and message", () => {
    const kp = generateSigningKeyPair();
    const payload = encoder.encode("same message");
    expect(sign(kp.privateKey, payload)).toEqual(sign(kp.privateKey, payload));
  });

  it("rejects a signature from another key", () => {
    const kp1 = generateSigningKeyPair();
    const kp2 = generateSigningKeyPair();
    const payload = encoder.encode("hello");
    expect(verify(kp2.publicKey, payload, sign(kp1.privateKey, payload))).toBe(false);
  });

  it("rejects a modified payload", () => {
    const kp = generateSigningKeyPair();
    const sig = sign(kp.privateKey, encoder.encode("hello"));
    expect(verify(kp.publicKey, encoder.encode("hellO"), sig)).toBe(false);
  });

  it("returns false instead of throwing on malformed input", () => {
    const kp = generateSigningKeyPair();
    const payload = encoder.encode("hello");
    expect(verify(kp.publicKey, payload, new Uint8Array(10))).toBe(false);
    expect(verify(new Uint8Array(5), payload, new Uint8Array(64))).toBe(false);
  });

  it("verifyBase64Url returns false for undecodable signatures", () => {
    const kp = generateSigningKeyPair();
    expect(verifyBase64Url(kp.publicKey, encoder.encode("x"), "not base64 !!")).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// hashPayload
// ---------------------------------------------------------------------------
describe("hashPayload", () => {
  it("returns a 64-character hex string (SHA-256)", () => {
    expect(hashPayload({ foo: "bar" })).toMatch(/^[0-9a-f]{64}$/);
  });

  it("hashes equivalent objects identically", () => {
    expect(hashPayload({ x: 1, y: 2 })).toBe(hashPayload({ y: 2, x: 1 }));
  });

  it("hashes different data differently", () => {
    expect(hashPayload({ value: "alpha" })).not.toBe(hashPayload({ value: "beta" }));
  });
});

// ---------------------------------------------------------------------------
// Link-proof payloads
// ---------------------------------------------------------------------------
describe("link-proof payload", () => {
  const createdAt = "2026-01-01T00:00:00.000Z";

  it("orders DIDs lexicographically", () => {
    expect(canonicalPair("did:key:zB", "did:key:zA")).toEqual(["did:key:zA", "did:key:zB"]);
    expect(canonicalPair("did:key:zA", "did:key:zB")).toEqual(["did:key:zA", "did:key:zB"]);
  });

  it("binds both DIDs, the timestamp and the domain tag", () => {
    const payload = new TextDecoder().decode(
      buildLinkPayload("did:key:zB", "did:key:zA", createdAt),
    );
    expect(payload).toBe(
      `{"created_at":"${createdAt}","did_a":"did:key:zA","did_b":"did:key:zB","domain":"${LINK_PROOF_DOMAIN}"}`,
    );
  });

  it("is independent of argument order", () => {
    expect(buildLinkPayload("did:key:zA", "did:key:zB", createdAt)).toEqual(
      buildLinkPayload("did:key:zB", "did:key:zA", createdAt),
    );
  });

  it("accepts a proof signed by both keys", () => {
    const a = generateSigningKeyPair();
    const b = generateSigningKeyPair();
    const proof = {
      didA: "did:key:zA",
      didB: "did:key:zB",
      signatureA: signLinkPayload(a.privateKey, "did:key:zA", "did:key:zB", createdAt),
      signatureB: signLinkPayload(b.privateKey, "did:key:zB", "did:key:zA", createdAt),
      createdAt,
    };
    expect(findInvalidSignatures(proof, a.publicKey, b.publicKey)).toEqual([]);
  });

  it("names the side whose signature fails", () => {
    const a = generateSigningKeyPair();
    const b = generateSigningKeyPair();
    const intruder = generateSigningKeyPair();
    const proof = {
      didA: "did:key:zA",
      didB: "did:key:zB",
      signatureA: signLinkPayload(a.privateKey, "did:key:zA", "did:key:zB", createdAt),
      signatureB: signLinkPayload(intruder.privateKey, "did:key:zB", "did:key:zA", createdAt),
      createdAt,
    };
    expect(findInvalidSignatures(proof, a.publicKey, b.publicKey)).toEqual(["did:key:zB"]);
  });

  it("rejects signatures over a different timestamp", () => {
    const a = generateSigningKeyPair();
    const b = generateSigningKeyPair();
    const proof = {
      didA: "did:key:zA",
      didB: "did:key:zB",
      signatureA: signLinkPayload(a.privateKey, "did:key:zA", "did:key:zB", createdAt),
      signatureB: signLinkPayload(b.privateKey, "did:key:zB", "did:key:zA", createdAt),
      createdAt: "2026-01-01T00:00:01.000Z",
    };
    expect(findInvalidSignatures(proof, a.publicKey, b.publicKey)).toEqual([
      "did:key:zA",
      "did:key:zB",
    ]);
  });
});

// ---------------------------------------------------------------------------
// Request signing
// ---------------------------------------------------------------------------
describe("signRequest", () => {
  it("produces headers whose signature covers the request", () => {
    const kp = generateSigningKeyPair();
    const request = {
      method: "post",
      url: "/api/v1/dids/did:key:zA/revoke",
      body: { reason: "lost device" },
      did: "did:key:zA",
      timestamp: "2026-01-01T00:00:00.000Z",
      nonce: "nonce-1",
    };
    const headers = signRequest(request, kp.privateKey);

    expect(headers[AUTH_HEADERS.did]).toBe("did:key:zA");
    expect(headers[AUTH_HEADERS.timestamp]).toBe(request.timestamp);
    expect(headers[AUTH_HEADERS.nonce]).toBe("nonce-1");

    const payload = requestSigningPayload({ ...request, method: "POST" });
    expect(verifyBase64Url(kp.publicKey, payload, headers[AUTH_HEADERS.signature])).toBe(true);

    const tampered = requestSigningPayload({ ...request, body: { reason: "other" } });
    expect(verifyBase64Url(kp.publicKey, tampered, headers[AUTH_HEADERS.signature])).toBe(false);
  });

  it("fills in timestamp and nonce when omitted", () => {
    const kp = generateSigningKeyPair();
    const headers = signRequest(
      { method: "GET", url: "/health", did: "did:key:zA" },
      kp.privateKey,
    );
    expect(Number.isNaN(Date.parse(headers[AUTH_HEADERS.timestamp]))).toBe(false);
    expect(headers[AUTH_HEADERS.nonce]).toMatch(/^[0-9a-f-]{36}$/);
  });
});
