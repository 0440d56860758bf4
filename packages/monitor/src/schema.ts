import {
  pgTable,
  pgEnum,
  uuid,
  text,
  integer,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const targetStatusEnum = pgEnum("target_status", [
  "UP",
  "DOWN",
  "DEGRADED",
  "UNKNOWN",
]);

export const probeOutcomeEnum = pgEnum("probe_outcome", [
  "success",
  "failure",
  "timeout",
  "error",
]);

export const transitionSeverityEnum = pgEnum("transition_severity", [
  "critical",
  "warning",
  "info",
]);

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export const probeResults = pgTable(
  "probe_results",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    target_id: uuid("target_id").notNull(),
    outcome: probeOutcomeEnum("outcome").notNull(),
    latency_ms: integer("latency_ms"),
    status_code: integer("status_code"),
    message: text("message"),
    probed_at: timestamp("probed_at", { withTimezone: true }).notNull(),
  },
  (table) => [
    index("idx_probe_results_target").on(table.target_id),
    index("idx_probe_results_target_probed_at").on(table.target_id, table.probed_at),
  ],
);

export const statusTransitions = pgTable(
  "status_transitions",
  {
    id: uuid("id").primaryKey(),
    target_id: uuid("target_id").notNull(),
    target_name: text("target_name").notNull(),
    from_status: targetStatusEnum("from_status").notNull(),
    to_status: targetStatusEnum("to_status").notNull(),
    reason: text("reason").notNull(),
    severity: transitionSeverityEnum("severity").notNull(),
    transitioned_at: timestamp("transitioned_at", { withTimezone: true }).notNull(),
  },
  (table) => [
    index("idx_status_transitions_target").on(table.target_id),
    index("idx_status_transitions_at").on(table.transitioned_at),
  ],
);
