/**
 * meshid: Link routes.
 *
 * POST /api/v1/links  Record a link proof signed by both DIDs
 *
 * The proof authenticates itself: each DID signs the canonical link
 * payload with its own key, so private keys never reach the server.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { clusterToRecord, proofToRecord } from "@meshid/core";
import { writeLimitConfig } from "../middleware/rateLimit.js";
import { parseBody } from "../middleware/validate.js";

const linkBodySchema = z.object({
  did_a: z.string().min(1),
  did_b: z.string().min(1),
  created_at: z.string().min(1),
  signature_a: z.string().min(1),
  signature_b: z.string().min(1),
  label: z.string().trim().min(1).max(200).optional(),
});

export default async function linkRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post(
    "/api/v1/links",
    { config: writeLimitConfig },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const body = parseBody(linkBodySchema, request.body);

      const proof = fastify.identity.submitLinkProof({
        didA: body.did_a,
        didB: body.did_b,
        createdAt: body.created_at,
        signatureA: body.signature_a,
        signatureB: body.signature_b,
        label: body.label,
      });

      return reply.status(201).send({
        proof: proofToRecord(proof),
        cluster: clusterToRecord(fastify.identity.getCluster(proof.clusterId)),
      });
    },
  );
}
