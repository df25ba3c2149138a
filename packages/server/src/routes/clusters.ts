/**
 * meshid: Cluster routes.
 *
 * GET /api/v1/clusters              All identity clusters
 * GET /api/v1/clusters/:clusterId   One cluster
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { clusterToRecord } from "@meshid/core";

export default async function clusterRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    "/api/v1/clusters",
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const clusters = fastify.identity.listClusters();
      return reply.send({
        clusters: clusters.map(clusterToRecord),
        total: clusters.length,
      });
    },
  );

  fastify.get<{ Params: { clusterId: string } }>(
    "/api/v1/clusters/:clusterId",
    async (request, reply) => {
      return reply.send(clusterToRecord(fastify.identity.getCluster(request.params.clusterId)));
    },
  );
}
