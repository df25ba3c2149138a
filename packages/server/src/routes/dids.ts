/**
 * meshid: DID routes.
 *
 * POST   /api/v1/dids                   Create a DID (returns its private key once)
 * GET    /api/v1/dids                   List DIDs, optionally by status
 * GET    /api/v1/dids/:did              Node details
 * PUT    /api/v1/dids/:did              Relabel (signed by the DID)
 * POST   /api/v1/dids/:did/revoke       Revoke (signed by the DID or a cluster peer)
 * GET    /api/v1/dids/:did/identity     The cluster the DID belongs to
 * GET    /api/v1/dids/:did/document     W3C DID document
 * GET    /api/v1/dids/:did/proofs       Link proofs naming the DID
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { z } from "zod";
import { bytesToHex } from "@noble/hashes/utils";
import { clusterToRecord, nodeToRecord, proofToRecord } from "@meshid/core";
import {
  requireSelf,
  requireSelfOrClusterPeer,
  verifyRequestAuth,
} from "../middleware/auth.js";
import { writeLimitConfig } from "../middleware/rateLimit.js";
import { parseBody } from "../middleware/validate.js";

const labelSchema = z.string().trim().min(1).max(200);

const createBodySchema = z.object({ label: labelSchema });
const updateBodySchema = z.object({ label: labelSchema });
const revokeBodySchema = z.object({ reason: z.string().trim().min(1).max(500) });

type DidParams = { Params: { did: string } };

export default async function didRoutes(fastify: FastifyInstance): Promise<void> {
  // ---------- POST /api/v1/dids: Create ----------

  fastify.post(
    "/api/v1/dids",
    { config: writeLimitConfig },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { label } = parseBody(createBodySchema, request.body);
      const created = fastify.identity.createDid(label);
      const { privateKey, ...node } = created;

      return reply.status(201).send({
        ...nodeToRecord(node),
        private_key: bytesToHex(privateKey),
      });
    },
  );

  // ---------- GET /api/v1/dids: List ----------

  fastify.get<{ Querystring: { status?: string } }>(
    "/api/v1/dids",
    async (request, reply) => {
      const { status } = request.query;
      const nodes = fastify.identity
        .listNodes()
        .filter((node) => status === undefined || node.status === status);

      return reply.send({
        dids: nodes.map(nodeToRecord),
        total: nodes.length,
      });
    },
  );

  // ---------- GET /api/v1/dids/:did: Details ----------

  fastify.get<DidParams>(
    "/api/v1/dids/:did",
    async (request, reply) => {
      return reply.send(nodeToRecord(fastify.identity.getNode(request.params.did)));
    },
  );

  // ---------- PUT /api/v1/dids/:did: Relabel ----------

  fastify.put<DidParams>(
    "/api/v1/dids/:did",
    { preHandler: [verifyRequestAuth], config: writeLimitConfig },
    async (request, reply) => {
      const { did } = request.params;
      requireSelf(request, did);
      const { label } = parseBody(updateBodySchema, request.body);

      return reply.send(nodeToRecord(fastify.identity.renameDid(did, label)));
    },
  );

  // ---------- POST /api/v1/dids/:did/revoke: Revoke ----------

  fastify.post<DidParams>(
    "/api/v1/dids/:did/revoke",
    { preHandler: [verifyRequestAuth], config: writeLimitConfig },
    async (request, reply) => {
      const target = fastify.identity.getNode(request.params.did);
      const auth = requireSelfOrClusterPeer(request, target);
      const { reason } = parseBody(revokeBodySchema, request.body);

      const revoked = fastify.identity.revokeDid(target.did, reason);
      request.log.info({ did: target.did, revoked_by: auth.did }, "Revocation requested");
      return reply.send(nodeToRecord(revoked));
    },
  );

  // ---------- GET /api/v1/dids/:did/identity: Cluster ----------

  fastify.get<DidParams>(
    "/api/v1/dids/:did/identity",
    async (request, reply) => {
      const { did } = request.params;
      const cluster = fastify.identity.resolveIdentity(did);
      return reply.send({
        did,
        cluster: cluster ? clusterToRecord(cluster) : null,
      });
    },
  );

  // ---------- GET /api/v1/dids/:did/document: DID document ----------

  fastify.get<DidParams>(
    "/api/v1/dids/:did/document",
    async (request, reply) => {
      const resolution = fastify.identity.resolveDocument(request.params.did);
      return reply
        .header("content-type", "application/did+json")
        .send(resolution);
    },
  );

  // ---------- GET /api/v1/dids/:did/proofs: Proofs ----------

  fastify.get<DidParams>(
    "/api/v1/dids/:did/proofs",
    async (request, reply) => {
      const { did } = request.params;
      fastify.identity.getNode(did);
      return reply.send({
        did,
        proofs: fastify.identity.listProofs(did).map(proofToRecord),
      });
    },
  );
}
