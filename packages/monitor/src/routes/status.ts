import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { MonitorEngine } from "../services/engine.js";
import { parseLimit } from "./query.js";

interface TransitionsQuery {
  limit?: string;
}

/**
 * Register aggregate status routes.
 */
export function registerStatusRoutes(fastify: FastifyInstance, engine: MonitorEngine): void {
  // -------------------------------------------------------------------------
  // GET /status/summary - Counts per status
  // -------------------------------------------------------------------------
  fastify.get("/status/summary", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      timestamp: new Date().toISOString(),
      summary: engine.summary(),
    });
  });

  // -------------------------------------------------------------------------
  // GET /transitions?limit=N - Recent status changes, newest first
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: TransitionsQuery }>(
    "/transitions",
    async (request: FastifyRequest<{ Querystring: TransitionsQuery }>, reply: FastifyReply) => {
      const transitions = engine.transitions(parseLimit(request.query.limit));
      return reply.code(200).send({ count: transitions.length, transitions });
    },
  );
}
