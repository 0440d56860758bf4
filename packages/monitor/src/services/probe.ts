import { execFile } from "node:child_process";
import { Socket, isIP, type LookupFunction } from "node:net";
import { Agent, request, type Dispatcher } from "undici";
import type { ProbeOutcome, ProbeResult, Target } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface CheckOutcome {
  outcome: ProbeOutcome;
  /** Overrides the measured wall time, e.g. the RTT reported by ping. */
  latencyMs?: number;
  message?: string;
  statusCode?: number;
}

export interface ProbeExecutorOptions {
  /** Monotonic clock in milliseconds. */
  clock?: () => number;
  platform?: NodeJS.Platform;
  /** Resolver for TCP and HTTP hosts. Defaults to the system resolver. */
  lookup?: LookupFunction;
}

const TIMEOUT_CODES = new Set([
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function errorCode(err: unknown): string | undefined {
  if (err !== null && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Round-trip time from ping output ("time=12.3 ms" or "time<1ms"). */
export function parsePingLatency(output: string): number | undefined {
  const match = /time[=<]\s*([\d.]+)\s*ms/i.exec(output);
  if (!match?.[1]) return undefined;
  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? Math.round(value) : undefined;
}

export function targetUrl(target: Target): string {
  const { host, port } = target.address;
  const hostPart = isIP(host) === 6 ? `[${host}]` : host;
  return `${target.tls ? "https" : "http"}://${hostPart}:${port}${target.path}`;
}

// ---------------------------------------------------------------------------
// ProbeExecutor
// ---------------------------------------------------------------------------

/**
 * Runs one health check against one target. `probe()` never rejects: every
 * failure mode is reported through the result's outcome.
 */
export class ProbeExecutor {
  private readonly clock: () => number;
  private readonly platform: NodeJS.Platform;
  private readonly lookup: LookupFunction | undefined;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: ProbeExecutorOptions = {}) {
    this.clock = options.clock ?? (() => performance.now());
    this.platform = options.platform ?? process.platform;
    this.lookup = options.lookup;
    this.dispatcher = options.lookup ? new Agent({ connect: { lookup: options.lookup } }) : undefined;
  }

  async probe(target: Target): Promise<ProbeResult> {
    const timestamp = new Date().toISOString();
    const start = this.clock();
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<CheckOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ outcome: "timeout", message: `No response within ${target.timeoutMs}ms` });
      }, target.timeoutMs);
    });

    let checked: CheckOutcome;
    try {
      checked = await Promise.race([this.check(target, controller.signal), deadline]);
    } catch (err) {
      checked = { outcome: "error", message: errorMessage(err) };
    } finally {
      clearTimeout(timer);
    }

    const measured = checked.latencyMs ?? Math.max(0, Math.round(this.clock() - start));
    const result: ProbeResult = {
      targetId: target.id,
      timestamp,
      outcome: checked.outcome,
      latencyMs: checked.outcome === "timeout" || checked.outcome === "error" ? null : measured,
    };
    if (checked.message !== undefined) result.message = checked.message;
    if (checked.statusCode !== undefined) result.statusCode = checked.statusCode;
    return Object.freeze(result);
  }

  private check(target: Target, signal: AbortSignal): Promise<CheckOutcome> {
    switch (target.address.protocol) {
      case "TCP":
        return this.checkTcp(target.address.host, target.address.port, signal);
      case "HTTP":
        return this.checkHttp(target, signal);
      case "ICMP":
        return this.checkIcmp(target.address.host, target.timeoutMs, signal);
    }
  }

  // -----------------------------------------------------------------------
  // Checkers
  // -----------------------------------------------------------------------

  private checkTcp(host: string, port: number, signal: AbortSignal): Promise<CheckOutcome> {
    return new Promise((resolve) => {
      const socket = new Socket();
      const onAbort = (): void => {
        socket.destroy();
      };
      signal.addEventListener("abort", onAbort, { once: true });

      socket.once("connect", () => {
        signal.removeEventListener("abort", onAbort);
        socket.destroy();
        resolve({ outcome: "success" });
      });

      socket.once("error", (err) => {
        signal.removeEventListener("abort", onAbort);
        socket.destroy();
        resolve({ outcome: "error", message: err.message });
      });

      socket.connect(this.lookup ? { port, host, lookup: this.lookup } : { port, host });
    });
  }

  private async checkHttp(target: Target, signal: AbortSignal): Promise<CheckOutcome> {
    const start = this.clock();
    try {
      const response = await request(targetUrl(target), {
        method: "GET",
        signal,
        dispatcher: this.dispatcher,
        headersTimeout: target.timeoutMs,
        bodyTimeout: target.timeoutMs,
      });
      // Latency is time to headers; the body is discarded
      const latencyMs = Math.max(0, Math.round(this.clock() - start));
      await response.body.dump();

      if (response.statusCode >= 400) {
        return {
          outcome: "failure",
          latencyMs,
          statusCode: response.statusCode,
          message: `HTTP ${response.statusCode}`,
        };
      }
      return { outcome: "success", latencyMs, statusCode: response.statusCode };
    } catch (err) {
      const code = errorCode(err);
      if (code !== undefined && TIMEOUT_CODES.has(code)) {
        return { outcome: "timeout", message: errorMessage(err) };
      }
      return { outcome: "error", message: errorMessage(err) };
    }
  }

  private checkIcmp(host: string, timeoutMs: number, signal: AbortSignal): Promise<CheckOutcome> {
    const args =
      this.platform === "win32"
        ? ["-n", "1", "-w", String(timeoutMs), host]
        : ["-c", "1", "-W", String(Math.max(1, Math.ceil(timeoutMs / 1000))), host];

    return new Promise((resolve) => {
      execFile("ping", args, { signal }, (error, stdout) => {
        if (!error) {
          const latencyMs = parsePingLatency(String(stdout));
          resolve(latencyMs === undefined ? { outcome: "success" } : { outcome: "success", latencyMs });
          return;
        }
        // ping exits 1 when the host did not answer
        if (error.code === 1) {
          resolve({ outcome: "failure", message: `No echo reply from ${host}` });
          return;
        }
        resolve({ outcome: "error", message: error.message });
      });
    });
  }
}
