/**
 * meshid: Rate limiting configuration.
 *
 * Read routes: RATE_LIMIT_READ req/min per IP (set globally in app.ts)
 * Write routes: RATE_LIMIT_WRITE req/min per IP
 */

import type { FastifyRequest, RouteOptions } from "fastify";
import { config } from "../config.js";

/**
 * Rate limit configuration for write routes.
 * The limiter runs before any signature check, so it keys on the client
 * address only; `x-meshid-*` headers are still unauthenticated here.
 */
export const writeLimitConfig: RouteOptions["config"] = {
  rateLimit: {
    max: config.rateLimitWrite,
    timeWindow: "1 minute",
    keyGenerator: (request: FastifyRequest) => request.ip,
  },
};
