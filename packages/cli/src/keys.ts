/**
 * meshid: Local private key files.
 *
 * One hex-encoded Ed25519 private key per DID, readable by the owner only.
 * Keys live apart from the identity store, which never holds key material.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { ED25519_KEY_LENGTH, PrivateKeyNotFoundError } from "@meshid/core";

const KEY_PATTERN = new RegExp(`^[0-9a-f]{${ED25519_KEY_LENGTH * 2}}$`);

export class KeyDirectory {
  constructor(readonly dir: string) {}

  /** File holding the key for `did`; DID colons become underscores. */
  pathFor(did: string): string {
    return join(this.dir, `${did.replace(/[^A-Za-z0-9]/g, "_")}.key`);
  }

  save(did: string, privateKey: Uint8Array): string {
    mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    const path = this.pathFor(did);
    writeFileSync(path, bytesToHex(privateKey) + "\n", { mode: 0o600, flag: "wx" });
    return path;
  }

  /** @throws {PrivateKeyNotFoundError} If the file is missing or malformed. */
  load(did: string): Uint8Array {
    const path = this.pathFor(did);
    if (!existsSync(path)) {
      throw new PrivateKeyNotFoundError(did, { path });
    }
    const hex = readFileSync(path, "utf8").trim().toLowerCase();
    if (!KEY_PATTERN.test(hex)) {
      throw new PrivateKeyNotFoundError(did, { path, reason: "malformed key file" });
    }
    return hexToBytes(hex);
  }
}
