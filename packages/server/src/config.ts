/**
 * meshid: Server configuration.
 *
 * Loads environment variables with defaults for local development.
 */

export interface ServerConfig {
  /** HTTP port (default 3900) */
  port: number;
  /** "development" | "production" | "test" */
  nodeEnv: string;
  /** Pino log level */
  logLevel: string;

  /** SQLite database file path */
  databaseUrl: string;
  /** Method segment of newly created DIDs */
  didMethod: string;

  /** Read endpoints: max requests per minute per IP */
  rateLimitRead: number;
  /** Write endpoints: max requests per minute per IP */
  rateLimitWrite: number;

  /** Accepted clock skew for signed requests and link proofs */
  maxClockSkewMs: number;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envStr(key: string, fallback: string): string {
  const raw = process.env[key];
  return raw !== undefined && raw !== "" ? raw : fallback;
}

export const config: ServerConfig = {
  port: envInt("PORT", 3900),
  nodeEnv: envStr("NODE_ENV", "development"),
  logLevel: envStr("LOG_LEVEL", "info"),

  databaseUrl: envStr("DATABASE_URL", "./data/meshid.db"),
  didMethod: envStr("DID_METHOD", "key"),

  rateLimitRead: envInt("RATE_LIMIT_READ", 100),
  rateLimitWrite: envInt("RATE_LIMIT_WRITE", 20),

  maxClockSkewMs: envInt("MAX_CLOCK_SKEW_MS", 300_000),
};
