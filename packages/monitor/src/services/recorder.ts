import { fileURLToPath } from "node:url";
import { applySchemaFile, type Database } from "@netpulse/shared/db";
import { probeResults, statusTransitions } from "../schema.js";
import type { ProbeResult, StatusTransition } from "../types.js";

/** Durable sink for probe results and status transitions. */
export interface ResultRecorder {
  recordResult(result: ProbeResult): Promise<void>;
  recordTransition(transition: StatusTransition): Promise<void>;
}

const SCHEMA_FILE = fileURLToPath(new URL("../../sql/schema.sql", import.meta.url));

/**
 * PostgreSQL recorder. Errors propagate to the caller; the engine logs them
 * without interrupting probing.
 */
export class DrizzleResultRecorder implements ResultRecorder {
  constructor(private readonly db: Database) {}

  /** Create the tables and enums when they do not exist yet. */
  async ensureSchema(): Promise<void> {
    await applySchemaFile(this.db, SCHEMA_FILE);
  }

  async recordResult(result: ProbeResult): Promise<void> {
    await this.db.insert(probeResults).values({
      target_id: result.targetId,
      outcome: result.outcome,
      latency_ms: result.latencyMs,
      status_code: result.statusCode ?? null,
      message: result.message ?? null,
      probed_at: new Date(result.timestamp),
    });
  }

  async recordTransition(transition: StatusTransition): Promise<void> {
    await this.db.insert(statusTransitions).values({
      id: transition.id,
      target_id: transition.targetId,
      target_name: transition.targetName,
      from_status: transition.from,
      to_status: transition.to,
      reason: transition.reason,
      severity: transition.severity,
      transitioned_at: new Date(transition.at),
    });
  }
}
