/**
 * meshid: Fastify application setup.
 *
 * Exports `buildApp()` for testing and `start()` for production.
 */

import "dotenv/config";

import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { DIDManager, IdentityError, IdentityErrorCode } from "@meshid/core";

import { config } from "./config.js";
import { Database } from "./db/schema.js";

import didRoutes from "./routes/dids.js";
import linkRoutes from "./routes/links.js";
import clusterRoutes from "./routes/clusters.js";
import healthRoutes from "./routes/health.js";

// ---------------------------------------------------------------------------
// Fastify type augmentation
// ---------------------------------------------------------------------------

declare module "fastify" {
  interface FastifyInstance {
    db: Database;
    identity: DIDManager;
    clockSkewMs: number;
    startedAt: number;
  }
}

// ---------------------------------------------------------------------------
// Error envelope
// ---------------------------------------------------------------------------

interface ErrorBody {
  error: { code: string; message: string; details: Record<string, unknown> };
}

function envelope(code: string, message: string, details: Record<string, unknown> = {}): ErrorBody {
  return { error: { code, message, details } };
}

/** Maps every thrown error onto `{ error: { code, message, details } }`. */
function handleError(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  if (error instanceof IdentityError) {
    if (error.httpStatus >= 500) {
      request.log.error({ err: error }, "Identity operation failed");
    }
    return reply
      .status(error.httpStatus)
      .send(envelope(error.code, error.message, error.details));
  }

  const statusCode = "statusCode" in error && typeof error.statusCode === "number"
    ? error.statusCode
    : 500;

  if (statusCode === 429) {
    return reply.status(429).send(
      envelope(IdentityErrorCode.RATE_LIMIT_EXCEEDED, "Rate limit exceeded", {
        retryAfter: error.message,
      }),
    );
  }
  // malformed JSON, unsupported content type and the like
  if (statusCode >= 400 && statusCode < 500) {
    return reply
      .status(statusCode)
      .send(envelope(IdentityErrorCode.VALIDATION_FAILED, error.message));
  }

  request.log.error({ err: error }, "Unhandled error");
  const exposeDetail = config.nodeEnv !== "production";
  return reply.status(500).send(
    envelope(
      IdentityErrorCode.INTERNAL_ERROR,
      exposeDetail ? error.message : "Internal server error",
      exposeDetail ? { stack: error.stack } : {},
    ),
  );
}

// ---------------------------------------------------------------------------
// Build application
// ---------------------------------------------------------------------------

export async function buildApp(
  overrides?: Partial<{
    databaseUrl: string;
    skipRateLimit: boolean;
    maxClockSkewMs: number;
    logLevel: string;
  }>,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: overrides?.logLevel ?? config.logLevel,
      ...(config.nodeEnv === "development"
        ? { transport: { target: "pino-pretty" } }
        : {}),
    },
  });

  // Route plugins take the handler in force when they are registered.
  app.setErrorHandler(handleError);

  // -----------------------------------------------------------------------
  // Plugins
  // -----------------------------------------------------------------------

  await app.register(cors, {
    origin: true,
    methods: ["GET", "POST", "PUT", "OPTIONS"],
  });

  if (!overrides?.skipRateLimit) {
    await app.register(rateLimit, {
      global: true,
      max: config.rateLimitRead,
      timeWindow: "1 minute",
    });
  }

  // -----------------------------------------------------------------------
  // Database and identity graph
  // -----------------------------------------------------------------------

  const dbPath = overrides?.databaseUrl ?? config.databaseUrl;
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);
  const clockSkewMs = overrides?.maxClockSkewMs ?? config.maxClockSkewMs;
  const identity = new DIDManager(db, {
    method: config.didMethod,
    logger: app.log.child({ module: "identity" }),
    maxClockSkewMs: clockSkewMs,
  });

  app.decorate("db", db);
  app.decorate("identity", identity);
  app.decorate("clockSkewMs", clockSkewMs);
  app.decorate("startedAt", Date.now());

  // -----------------------------------------------------------------------
  // Routes
  // -----------------------------------------------------------------------

  await app.register(didRoutes);
  await app.register(linkRoutes);
  await app.register(clusterRoutes);
  await app.register(healthRoutes);

  // -----------------------------------------------------------------------
  // Shutdown
  // -----------------------------------------------------------------------

  app.addHook("onClose", async () => {
    db.close();
  });

  return app;
}

// ---------------------------------------------------------------------------
// Production start
// ---------------------------------------------------------------------------

const NONCE_SWEEP_INTERVAL_MS = 60 * 60 * 1000;

export async function start(): Promise<void> {
  const app = await buildApp();

  const sweep = setInterval(() => {
    try {
      const removed = app.db.deleteExpiredNonces();
      app.log.debug({ removed }, "Expired nonces removed");
    } catch (err) {
      app.log.error({ err }, "Nonce sweep failed");
    }
  }, NONCE_SWEEP_INTERVAL_MS);
  sweep.unref();
  app.addHook("onClose", async () => {
    clearInterval(sweep);
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: config.port, host: "0.0.0.0" });
    app.log.info({ port: config.port, env: config.nodeEnv }, "meshid server listening");
  } catch (err) {
    app.log.fatal({ err }, "Server failed to start");
    process.exit(1);
  }
}

if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  void start();
}
