/**
 * meshid: CLI configuration.
 *
 * Environment variables with defaults under ~/.meshid; flags override them.
 */

import { homedir } from "node:os";
import { join } from "node:path";

export interface CliConfig {
  /** Identity store JSON file */
  storePath: string;
  /** Directory holding one private key file per DID */
  keysDir: string;
  /** Method segment of newly created DIDs */
  didMethod: string;
  /** Pino log level (logs go to stderr) */
  logLevel: string;
}

function envStr(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const raw = env[key];
  return raw !== undefined && raw !== "" ? raw : fallback;
}

/** Expand a leading "~" to the user's home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    storePath: expandHome(envStr(env, "MESHID_STORE", "~/.meshid/store.json")),
    keysDir: expandHome(envStr(env, "MESHID_KEYS_DIR", "~/.meshid/keys")),
    didMethod: envStr(env, "MESHID_DID_METHOD", "key"),
    logLevel: envStr(env, "LOG_LEVEL", "warn"),
  };
}
