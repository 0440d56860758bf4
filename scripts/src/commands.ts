import { request as httpRequest } from "undici";
import {
  ProbeExecutor,
  validateTargetSpec,
  DEFAULT_MONITOR_CONFIG,
  type ProbeResult,
  type StatusSummary,
  type Target,
} from "@netpulse/monitor";

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

function pad(str: string, len: number): string {
  return str.padEnd(len);
}

// ---------------------------------------------------------------------------
// probe
// ---------------------------------------------------------------------------

export interface ProbeCommandOptions {
  timeout: string;
  path?: string;
  tls?: boolean;
}

export type RunProbe = (target: Target) => Promise<ProbeResult>;

export function formatResult(target: Target, result: ProbeResult): string {
  const { host, port, protocol } = target.address;
  const where = protocol === "ICMP" ? host : `${host}:${port}`;
  const latency = result.latencyMs === null ? "-" : `${result.latencyMs}ms`;
  const parts = [`${protocol} ${where}`, result.outcome.toUpperCase(), latency];
  if (result.statusCode !== undefined) parts.push(`HTTP ${result.statusCode}`);
  if (result.message && result.message !== `HTTP ${result.statusCode}`) parts.push(result.message);
  return parts.join("  ");
}

/**
 * Run one probe against an address and print the outcome.
 * Returns the exit code: 0 on success, 1 otherwise.
 */
export async function probeCommand(
  protocol: string,
  host: string,
  port: string | undefined,
  opts: ProbeCommandOptions,
  out: Output = consoleOutput,
  runProbe: RunProbe = (target) => new ProbeExecutor().probe(target),
): Promise<number> {
  const spec: Record<string, unknown> = {
    protocol,
    host,
    intervalMs: 1000,
    timeoutMs: Number(opts.timeout),
  };
  if (port !== undefined) spec["port"] = Number(port);
  if (opts.path !== undefined) spec["path"] = opts.path;
  if (opts.tls) spec["tls"] = true;

  const validation = validateTargetSpec(spec, DEFAULT_MONITOR_CONFIG.defaults);
  if (!validation.valid) {
    for (const error of validation.errors) out.error(`Invalid target: ${error}`);
    return 1;
  }

  const { host: h, port: p, protocol: proto, ...rest } = validation.value;
  const now = new Date().toISOString();
  const target: Target = {
    id: "cli",
    ...rest,
    address: { host: h, port: p, protocol: proto },
    createdAt: now,
    updatedAt: now,
  };

  const result = await runProbe(target);
  out.log(formatResult(target, result));
  return result.outcome === "success" ? 0 : 1;
}

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

export interface StatusCommandOptions {
  url: string;
  apiKey?: string;
}

export interface StatusRow {
  name: string;
  address: string;
  status: string;
  latencyMs: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function parseSummary(body: unknown): StatusSummary {
  const summary = isRecord(body) ? body["summary"] : undefined;
  if (!isRecord(summary)) throw new Error("Unexpected /status/summary response");

  const count = (key: keyof StatusSummary): number => {
    const value = summary[key];
    if (typeof value !== "number") throw new Error(`Unexpected /status/summary response: ${key} missing`);
    return value;
  };
  return {
    up: count("up"),
    down: count("down"),
    degraded: count("degraded"),
    unknown: count("unknown"),
    total: count("total"),
  };
}

export function parseTargetRows(body: unknown): StatusRow[] {
  const targets = isRecord(body) ? body["targets"] : undefined;
  if (!Array.isArray(targets)) throw new Error("Unexpected /targets response");

  return targets.map((entry: unknown): StatusRow => {
    const target = isRecord(entry) ? entry["target"] : undefined;
    const state = isRecord(entry) ? entry["status"] : undefined;
    const address = isRecord(target) ? target["address"] : undefined;
    if (!isRecord(target) || !isRecord(state) || !isRecord(address)) {
      throw new Error("Unexpected /targets response");
    }
    const latency = state["lastLatencyMs"];
    return {
      name: String(target["name"]),
      address:
        address["protocol"] === "ICMP"
          ? `ICMP ${String(address["host"])}`
          : `${String(address["protocol"])} ${String(address["host"])}:${String(address["port"])}`,
      status: String(state["status"]),
      latencyMs: typeof latency === "number" ? latency : null,
    };
  });
}

export function formatStatusTable(summary: StatusSummary, rows: StatusRow[]): string[] {
  const lines = [
    `Targets: ${summary.total}  UP: ${summary.up}  DEGRADED: ${summary.degraded}  DOWN: ${summary.down}  UNKNOWN: ${summary.unknown}`,
    "=".repeat(70),
    `${pad("Name", 24)} ${pad("Address", 28)} ${pad("Status", 10)} Latency`,
    "-".repeat(70),
  ];
  for (const row of rows) {
    const latency = row.latencyMs === null ? "-" : `${row.latencyMs}ms`;
    lines.push(`${pad(row.name, 24)} ${pad(row.address, 28)} ${pad(row.status, 10)} ${latency}`);
  }
  return lines;
}

async function getJson(base: string, path: string, apiKey: string | undefined): Promise<unknown> {
  const headers: Record<string, string> = { accept: "application/json" };
  if (apiKey) headers["x-internal-api-key"] = apiKey;

  const { statusCode, body } = await httpRequest(new URL(path, base), { method: "GET", headers });
  if (statusCode >= 400) {
    const text = await body.text();
    throw new Error(`GET ${path} failed with HTTP ${statusCode}: ${text}`);
  }
  return body.json();
}

/** Print the summary and per-target table of a running server. */
export async function statusCommand(opts: StatusCommandOptions, out: Output = consoleOutput): Promise<number> {
  try {
    const [summaryBody, targetsBody] = await Promise.all([
      getJson(opts.url, "/status/summary", opts.apiKey),
      getJson(opts.url, "/targets", opts.apiKey),
    ]);
    for (const line of formatStatusTable(parseSummary(summaryBody), parseTargetRows(targetsBody))) {
      out.log(line);
    }
    return 0;
  } catch (err) {
    out.error(`Status request failed: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
