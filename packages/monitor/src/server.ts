import "dotenv/config";
import { Redis } from "ioredis";
import type pg from "pg";
import { createLogger } from "@netpulse/shared/utils";
import { createDb } from "@netpulse/shared/db";

import { buildApp } from "./app.js";
import { loadConfig, loadTargetsFile, seedTargets } from "./config.js";
import { MonitorEngine } from "./services/engine.js";
import { DrizzleResultRecorder } from "./services/recorder.js";
import { RedisTransitionPublisher } from "./services/publisher.js";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

const logger = createLogger("netpulse");

// ---------------------------------------------------------------------------
// Main startup
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadConfig();

  // -------------------------------------------------------------------------
  // Optional PostgreSQL recorder
  // -------------------------------------------------------------------------
  let pool: pg.Pool | null = null;
  let recorder: DrizzleResultRecorder | undefined;
  if (config.databaseUrl) {
    logger.info("Connecting to PostgreSQL...");
    const created = createDb(config.databaseUrl);
    pool = created.pool;
    recorder = new DrizzleResultRecorder(created.db);
    await recorder.ensureSchema();
    logger.info("PostgreSQL connected, result recorder enabled");
  }

  // -------------------------------------------------------------------------
  // Optional Redis publisher
  // -------------------------------------------------------------------------
  let redis: Redis | null = null;
  let publisher: RedisTransitionPublisher | undefined;
  if (config.redisUrl) {
    logger.info("Connecting to Redis...");
    redis = new Redis(config.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        return Math.min(times * 200, 5000);
      },
      lazyConnect: true,
    });
    await redis.connect();
    publisher = new RedisTransitionPublisher(redis);
    logger.info("Redis connected, transition publisher enabled");
  }

  // -------------------------------------------------------------------------
  // Engine and seed targets
  // -------------------------------------------------------------------------
  const engine = new MonitorEngine({ config: config.monitor, recorder, publisher });

  if (config.targetsFile) {
    const specs = await loadTargetsFile(config.targetsFile);
    const report = seedTargets(engine, specs);
    for (const rejected of report.rejected) {
      logger.warn({ file: config.targetsFile, ...rejected }, "Skipping invalid target spec");
    }
    logger.info({ file: config.targetsFile, added: report.added.length }, "Targets loaded");
  }

  // -------------------------------------------------------------------------
  // HTTP server
  // -------------------------------------------------------------------------
  const fastify = await buildApp(engine, {
    apiKey: config.apiKey,
    logLevel: config.logLevel,
  });

  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, "netpulse server started");

  engine.start();

  // -------------------------------------------------------------------------
  // Graceful shutdown
  // -------------------------------------------------------------------------
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down netpulse...");

    try {
      await engine.shutdown();
    } catch (err) {
      logger.error({ err }, "Error stopping monitor engine");
    }

    try {
      await fastify.close();
      logger.info("Fastify server closed");
    } catch (err) {
      logger.error({ err }, "Error closing Fastify");
    }

    if (redis) {
      try {
        await redis.quit();
        logger.info("Redis disconnected");
      } catch (err) {
        logger.error({ err }, "Error disconnecting Redis");
      }
    }

    if (pool) {
      try {
        await pool.end();
        logger.info("PostgreSQL pool closed");
      } catch (err) {
        logger.error({ err }, "Error closing PostgreSQL pool");
      }
    }

    logger.info("netpulse shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "netpulse failed to start");
  process.exit(1);
});
