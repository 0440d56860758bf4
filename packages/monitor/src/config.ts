import { readFile } from "node:fs/promises";
import { isAppError, ValidationError } from "@netpulse/shared/errors";
import { MONITOR_ENV_REQUIREMENTS, validateEnvironment } from "@netpulse/shared/utils";
import type { MonitorEngine } from "./services/engine.js";
import { MAX_HISTORY_CAPACITY } from "./services/history.js";
import { MAX_TIMER_DELAY_MS } from "./services/validation.js";
import type { MonitorConfig } from "./types.js";

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: string;
  apiKey: string | undefined;
  databaseUrl: string | undefined;
  redisUrl: string | undefined;
  targetsFile: string | undefined;
  monitor: MonitorConfig;
}

/** Startup configuration was rejected. `problems` lists every one found. */
export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

function int(values: Record<string, string>, name: string): number {
  return Number.parseInt(values[name] ?? "", 10);
}

/**
 * Read and check the environment. Values that fail their pattern are all
 * reported together in one ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const result = validateEnvironment(MONITOR_ENV_REQUIREMENTS, { exitOnError: false, env });
  if (!result.valid) throw new ConfigError(result.errors);

  const { values } = result;
  const port = int(values, "NETPULSE_PORT");
  const historyCapacity = int(values, "HISTORY_CAPACITY");
  const timeoutMs = int(values, "DEFAULT_TIMEOUT_MS");

  const problems: string[] = [];
  if (port > 65535) problems.push(`NETPULSE_PORT out of range: ${port}`);
  if (historyCapacity > MAX_HISTORY_CAPACITY) {
    problems.push(`HISTORY_CAPACITY must be at most ${MAX_HISTORY_CAPACITY}: ${historyCapacity}`);
  }
  if (timeoutMs > MAX_TIMER_DELAY_MS) {
    problems.push(`DEFAULT_TIMEOUT_MS must be at most ${MAX_TIMER_DELAY_MS}: ${timeoutMs}`);
  }
  if (problems.length > 0) throw new ConfigError(problems);

  return {
    port,
    host: values["NETPULSE_HOST"] ?? "0.0.0.0",
    logLevel: env["LOG_LEVEL"] || "info",
    apiKey: values["INTERNAL_API_KEY"],
    databaseUrl: values["DATABASE_URL"],
    redisUrl: values["REDIS_URL"],
    targetsFile: values["TARGETS_FILE"],
    monitor: {
      maxConcurrentProbes: int(values, "MAX_CONCURRENT_PROBES"),
      historyCapacity,
      jitterRatio: Number.parseFloat(values["JITTER_RATIO"] ?? "0.2"),
      defaults: {
        timeoutMs,
        successThreshold: int(values, "DEFAULT_SUCCESS_THRESHOLD"),
        failureThreshold: int(values, "DEFAULT_FAILURE_THRESHOLD"),
      },
      transitionLogSize: 100,
    },
  };
}

// ---------------------------------------------------------------------------
// Targets file
// ---------------------------------------------------------------------------

/** Parse a JSON array of target specs. Entries are validated when added. */
export function parseTargetsJson(text: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError([`Targets file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  if (!Array.isArray(data)) {
    throw new ConfigError(["Targets file must contain a JSON array of target specs"]);
  }
  return data;
}

export async function loadTargetsFile(path: string): Promise<unknown[]> {
  return parseTargetsJson(await readFile(path, "utf8"));
}

export interface SeedReport {
  added: string[];
  rejected: { index: number; errors: string[] }[];
}

/**
 * Register each spec with the engine. A rejected entry does not stop the
 * others.
 */
export function seedTargets(engine: MonitorEngine, specs: unknown[]): SeedReport {
  const report: SeedReport = { added: [], rejected: [] };
  specs.forEach((spec, index) => {
    try {
      report.added.push(engine.add(spec).id);
    } catch (err) {
      if (!isAppError(err)) throw err;
      report.rejected.push({
        index,
        errors: err instanceof ValidationError ? err.details : [err.message],
      });
    }
  });
  return report;
}
