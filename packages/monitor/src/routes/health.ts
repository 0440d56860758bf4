import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { MonitorEngine } from "../services/engine.js";

export const SERVICE_NAME = "netpulse";
export const SERVICE_VERSION = "1.0.0";

const ENDPOINTS = [
  "GET /health",
  "GET /targets",
  "POST /targets",
  "GET /targets/:id",
  "PATCH /targets/:id",
  "DELETE /targets/:id",
  "GET /targets/:id/status",
  "GET /targets/:id/history",
  "GET /targets/:id/metrics",
  "POST /targets/:id/probe",
  "GET /status/summary",
  "GET /transitions",
  "GET /ws",
];

/**
 * Register the service descriptor (GET /) and the liveness route of netpulse
 * itself (GET /health).
 */
export function registerHealthRoutes(fastify: FastifyInstance, engine: MonitorEngine): void {
  fastify.get("/", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      description: "Network probing and status aggregation",
      endpoints: ENDPOINTS,
    });
  });

  fastify.get("/health", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      status: "ok",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: SERVICE_VERSION,
      targets: engine.list().length,
      probes: engine.load,
    });
  });
}
