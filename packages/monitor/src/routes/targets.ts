import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { MonitorEngine } from "../services/engine.js";
import { parseLimit } from "./query.js";

// ---------------------------------------------------------------------------
// Route parameter / query types
// ---------------------------------------------------------------------------

interface TargetParams {
  id: string;
}

interface HistoryQuery {
  limit?: string;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

/**
 * Register target management routes. Errors thrown by the engine
 * (ValidationError, NotFoundError) reach the shared error handler.
 */
export function registerTargetRoutes(fastify: FastifyInstance, engine: MonitorEngine): void {
  // -------------------------------------------------------------------------
  // GET /targets - Every target with its health state
  // -------------------------------------------------------------------------
  fastify.get("/targets", async (_request: FastifyRequest, reply: FastifyReply) => {
    const targets = engine.list().map((target) => ({
      target,
      status: engine.status(target.id),
    }));
    return reply.code(200).send({ count: targets.length, targets });
  });

  // -------------------------------------------------------------------------
  // POST /targets - Register a target
  // -------------------------------------------------------------------------
  fastify.post("/targets", async (request: FastifyRequest, reply: FastifyReply) => {
    const target = engine.add(request.body);
    return reply.code(201).send({ target });
  });

  // -------------------------------------------------------------------------
  // GET /targets/:id
  // -------------------------------------------------------------------------
  fastify.get<{ Params: TargetParams }>(
    "/targets/:id",
    async (request: FastifyRequest<{ Params: TargetParams }>, reply: FastifyReply) => {
      const { id } = request.params;
      return reply.code(200).send({ target: engine.get(id), status: engine.status(id) });
    },
  );

  // -------------------------------------------------------------------------
  // PATCH /targets/:id - Change name, schedule or thresholds
  // -------------------------------------------------------------------------
  fastify.patch<{ Params: TargetParams }>(
    "/targets/:id",
    async (request: FastifyRequest<{ Params: TargetParams }>, reply: FastifyReply) => {
      const target = engine.update(request.params.id, request.body);
      return reply.code(200).send({ target });
    },
  );

  // -------------------------------------------------------------------------
  // DELETE /targets/:id
  // -------------------------------------------------------------------------
  fastify.delete<{ Params: TargetParams }>(
    "/targets/:id",
    async (request: FastifyRequest<{ Params: TargetParams }>, reply: FastifyReply) => {
      engine.remove(request.params.id);
      return reply.code(204).send();
    },
  );

  // -------------------------------------------------------------------------
  // GET /targets/:id/status
  // -------------------------------------------------------------------------
  fastify.get<{ Params: TargetParams }>(
    "/targets/:id/status",
    async (request: FastifyRequest<{ Params: TargetParams }>, reply: FastifyReply) => {
      return reply.code(200).send({ status: engine.status(request.params.id) });
    },
  );

  // -------------------------------------------------------------------------
  // GET /targets/:id/history?limit=N - Most recent results first
  // -------------------------------------------------------------------------
  fastify.get<{ Params: TargetParams; Querystring: HistoryQuery }>(
    "/targets/:id/history",
    async (
      request: FastifyRequest<{ Params: TargetParams; Querystring: HistoryQuery }>,
      reply: FastifyReply,
    ) => {
      const limit = parseLimit(request.query.limit);
      const results = engine.history(request.params.id, limit);
      return reply.code(200).send({ count: results.length, results });
    },
  );

  // -------------------------------------------------------------------------
  // GET /targets/:id/metrics - Uptime and latency percentiles over the window
  // -------------------------------------------------------------------------
  fastify.get<{ Params: TargetParams }>(
    "/targets/:id/metrics",
    async (request: FastifyRequest<{ Params: TargetParams }>, reply: FastifyReply) => {
      return reply.code(200).send({ metrics: engine.metrics(request.params.id) });
    },
  );

  // -------------------------------------------------------------------------
  // POST /targets/:id/probe - Probe now and return the applied result
  // -------------------------------------------------------------------------
  fastify.post<{ Params: TargetParams }>(
    "/targets/:id/probe",
    async (request: FastifyRequest<{ Params: TargetParams }>, reply: FastifyReply) => {
      const result = await engine.probeNow(request.params.id);
      return reply.code(200).send({ result });
    },
  );
}
