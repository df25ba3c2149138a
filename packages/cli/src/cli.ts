/**
 * meshid: Command-line interface.
 *
 * `runCli` parses arguments, runs one command against a JSON file store
 * and a key directory, and returns the process exit code. The store is
 * written back only after a mutating command succeeds.
 */

import { parseArgs } from "node:util";
import { pino } from "pino";
import {
  DIDManager,
  IdentityError,
  type IdentityLogger,
  assertActive,
  clusterToRecord,
  nodeToRecord,
  proofToRecord,
} from "@meshid/core";
import { loadConfig, expandHome, type CliConfig } from "./config.js";
import { JsonFileDIDStore } from "./file-store.js";
import { KeyDirectory } from "./keys.js";
import {
  renderCluster,
  renderNode,
  renderNodeTable,
  renderProof,
} from "./render.js";

export const USAGE = [
  "Usage: meshid <command> [options]",
  "",
  "Commands:",
  "  create <label>              Create a DID and store its private key",
  "  list [--json]               List DIDs and their clusters",
  "  show <did> [--json]         Show one DID",
  "  link <didA> <didB>          Link two local DIDs [--label <name>]",
  "  revoke <did>                Revoke a DID [--reason <text>]",
  "  resolve <did> [--json]      Show the identity cluster of a DID",
  "  proofs [did] [--json]       List link proofs",
  "  verify                      Re-verify every link proof",
  "",
  "Options:",
  "  --store <path>              Identity store file (MESHID_STORE)",
  "  --keys <dir>                Private key directory (MESHID_KEYS_DIR)",
];

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  io?: CliIO;
  logger?: IdentityLogger;
  clock?: () => Date;
}

const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

interface ParsedFlags {
  store?: string;
  keys?: string;
  json?: boolean;
  label?: string;
  reason?: string;
  help?: boolean;
}

interface CommandContext {
  args: string[];
  flags: ParsedFlags;
  config: CliConfig;
  io: CliIO;
  store: JsonFileDIDStore;
  keys: KeyDirectory;
  manager: DIDManager;
}

/** Raised for bad usage; exits with status 2. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function requireArgs(ctx: CommandContext, count: number, names: string): string[] {
  if (ctx.args.length < count) {
    throw new UsageError(`Missing argument: ${names}`);
  }
  return ctx.args.slice(0, count);
}

function printJson(io: CliIO, value: unknown): void {
  io.stdout(JSON.stringify(value, null, 2));
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function cmdCreate(ctx: CommandContext): number {
  const label = ctx.args.join(" ").trim();
  if (label === "") {
    throw new UsageError("Missing argument: <label>");
  }

  const created = ctx.manager.createDid(label);
  const keyPath = ctx.keys.save(created.did, created.privateKey);
  ctx.store.save();

  ctx.io.stdout(`Created ${created.did} (${label})`);
  ctx.io.stdout(`Private key saved to ${keyPath}`);
  return 0;
}

function cmdList(ctx: CommandContext): number {
  const nodes = ctx.manager.listNodes();
  const clusters = ctx.manager.listClusters();
  if (ctx.flags.json) {
    printJson(ctx.io, {
      nodes: nodes.map(nodeToRecord),
      clusters: clusters.map(clusterToRecord),
    });
    return 0;
  }
  for (const line of renderNodeTable(nodes, clusters)) {
    ctx.io.stdout(line);
  }
  return 0;
}

function cmdShow(ctx: CommandContext): number {
  const [did] = requireArgs(ctx, 1, "<did>");
  const node = ctx.manager.getNode(did);
  if (ctx.flags.json) {
    printJson(ctx.io, nodeToRecord(node));
    return 0;
  }
  for (const line of renderNode(node)) {
    ctx.io.stdout(line);
  }
  return 0;
}

function cmdLink(ctx: CommandContext): number {
  const [didA, didB] = requireArgs(ctx, 2, "<didA> <didB>");
  // unknown and revoked DIDs fail before key files are read
  assertActive(ctx.manager.getNode(didA));
  assertActive(ctx.manager.getNode(didB));
  const keyA = ctx.keys.load(didA);
  const keyB = ctx.keys.load(didB);

  const proof = ctx.manager.linkDids(didA, keyA, didB, keyB, { label: ctx.flags.label });
  ctx.store.save();

  const cluster = ctx.manager.getCluster(proof.clusterId);
  ctx.io.stdout(`Linked ${didA} and ${didB}`);
  ctx.io.stdout(`Cluster ${cluster.clusterId} now has ${cluster.memberDids.length} member(s)`);
  return 0;
}

function cmdRevoke(ctx: CommandContext): number {
  const [did] = requireArgs(ctx, 1, "<did>");
  const reason = ctx.flags.reason ?? "";
  const node = ctx.manager.revokeDid(did, reason);
  ctx.store.save();

  ctx.io.stdout(`Revoked ${node.did} (${node.label})`);
  if (node.revocationReason) {
    ctx.io.stdout(`Reason: ${node.revocationReason}`);
  }
  return 0;
}

function cmdResolve(ctx: CommandContext): number {
  const [did] = requireArgs(ctx, 1, "<did>");
  const cluster = ctx.manager.resolveIdentity(did);
  if (ctx.flags.json) {
    printJson(ctx.io, { did, cluster: cluster ? clusterToRecord(cluster) : null });
    return 0;
  }
  if (!cluster) {
    ctx.io.stdout(`${did} is not linked to any identity cluster`);
    return 0;
  }
  const statusOf = (member: string): string =>
    ctx.store.hasNode(member) ? ctx.store.getNode(member).status : "unknown";
  for (const line of renderCluster(cluster, statusOf)) {
    ctx.io.stdout(line);
  }
  return 0;
}

function cmdProofs(ctx: CommandContext): number {
  const did = ctx.args[0];
  if (did !== undefined) {
    ctx.manager.getNode(did);
  }
  const proofs = ctx.manager.listProofs(did);
  if (ctx.flags.json) {
    printJson(ctx.io, proofs.map(proofToRecord));
    return 0;
  }
  if (proofs.length === 0) {
    ctx.io.stdout("No link proofs recorded.");
    return 0;
  }
  for (const proof of proofs) {
    ctx.io.stdout(renderProof(proof, ctx.manager.verifyProof(proof)));
  }
  return 0;
}

function cmdVerify(ctx: CommandContext): number {
  const proofs = ctx.manager.listProofs();
  const invalid = proofs.filter((proof) => !ctx.manager.verifyProof(proof));
  for (const proof of invalid) {
    ctx.io.stderr(`invalid: ${renderProof(proof, false)}`);
  }
  ctx.io.stdout(`${proofs.length - invalid.length}/${proofs.length} proof(s) verified`);
  return invalid.length === 0 ? 0 : 1;
}

const COMMANDS = new Map<string, (ctx: CommandContext) => number>([
  ["create", cmdCreate],
  ["list", cmdList],
  ["show", cmdShow],
  ["link", cmdLink],
  ["revoke", cmdRevoke],
  ["resolve", cmdResolve],
  ["proofs", cmdProofs],
  ["verify", cmdVerify],
]);

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

export function runCli(argv: string[], options: CliOptions = {}): number {
  const io = options.io ?? consoleIO;
  const logger = options.logger ?? pino({ level: "silent" });

  let positionals: string[];
  let flags: ParsedFlags;
  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        store: { type: "string" },
        keys: { type: "string" },
        json: { type: "boolean", short: "j" },
        label: { type: "string" },
        reason: { type: "string", short: "r" },
        help: { type: "boolean", short: "h" },
      },
    });
    positionals = parsed.positionals;
    flags = parsed.values;
  } catch (err) {
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}`);
    io.stderr(USAGE.join("\n"));
    return 2;
  }

  const [command, ...args] = positionals;
  if (flags.help || command === "help") {
    io.stdout(USAGE.join("\n"));
    return 0;
  }
  if (command === undefined) {
    io.stderr(USAGE.join("\n"));
    return 2;
  }
  const handler = COMMANDS.get(command);
  if (!handler) {
    io.stderr(`error: unknown command "${command}"`);
    io.stderr(USAGE.join("\n"));
    return 2;
  }

  const config = loadConfig(options.env);
  const storePath = flags.store ? expandHome(flags.store) : config.storePath;
  const keysDir = flags.keys ? expandHome(flags.keys) : config.keysDir;

  try {
    const store = JsonFileDIDStore.open(storePath);
    const manager = new DIDManager(store, {
      method: config.didMethod,
      logger,
      clock: options.clock,
    });
    logger.debug({ command, store: storePath }, "Running command");
    return handler({
      args,
      flags,
      config,
      io,
      store,
      keys: new KeyDirectory(keysDir),
      manager,
    });
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`error: ${err.message}`);
      return 2;
    }
    if (err instanceof IdentityError) {
      io.stderr(`error [${err.code}]: ${err.message}`);
      return 1;
    }
    logger.error({ err }, "Command failed");
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
