/**
 * meshid: Health route.
 *
 * GET /health  Health check
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

export const SERVER_VERSION = "0.1.0";

export default async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    "/health",
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const uptimeSeconds = Math.floor((Date.now() - fastify.startedAt) / 1000);

      return reply.send({
        status: "ok",
        version: SERVER_VERSION,
        dids_count: fastify.db.getNodeCount(),
        clusters_count: fastify.db.getClusterCount(),
        proofs_count: fastify.db.getProofCount(),
        uptime_seconds: uptimeSeconds,
      });
    },
  );
}
