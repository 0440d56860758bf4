import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import { apiErrorHandler, createInternalAuthHook } from "@netpulse/shared/middleware";

import type { MonitorEngine } from "./services/engine.js";
import { WsHub } from "./services/ws-hub.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerTargetRoutes } from "./routes/targets.js";
import { registerStatusRoutes } from "./routes/status.js";

export interface AppOptions {
  /** Enables x-internal-api-key auth on every route but / and /health. */
  apiKey?: string;
  /** Fastify request log level; false disables request logging. */
  logLevel?: string | false;
}

/**
 * Build the HTTP surface around an engine. The caller owns the engine's
 * lifecycle; closing the app only detaches it.
 */
export async function buildApp(
  engine: MonitorEngine,
  options: AppOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger:
      options.logLevel === false
        ? false
        : { level: options.logLevel ?? process.env["LOG_LEVEL"] ?? "info", timestamp: true },
  });

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
  });
  await fastify.register(websocket);

  fastify.addHook("onRequest", createInternalAuthHook({ apiKey: options.apiKey }));
  fastify.setErrorHandler(apiErrorHandler);

  // -------------------------------------------------------------------------
  // Live transition stream
  // -------------------------------------------------------------------------
  const wsHub = new WsHub();
  wsHub.register(fastify);
  const unsubscribe = engine.onTransition((transition) => {
    wsHub.broadcast("transition", transition);
  });
  fastify.addHook("onClose", async () => {
    unsubscribe();
  });

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------
  registerHealthRoutes(fastify, engine);
  registerTargetRoutes(fastify, engine);
  registerStatusRoutes(fastify, engine);

  return fastify;
}
