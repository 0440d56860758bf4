import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createServer as createHttpServer, Server as HttpServer } from "node:http";
import { createServer as createTcpServer, type LookupFunction, type Server as TcpServer } from "node:net";
import type { ExecFileException } from "node:child_process";
import type { Target } from "../types.js";
import { ProbeExecutor, parsePingLatency, targetUrl } from "./probe.js";
import { WorkerPool } from "./worker-pool.js";

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

type ExecCallback = (error: ExecFileException | null, stdout: string, stderr: string) => void;

const execFileMock = vi.hoisted(() => vi.fn());

vi.mock("node:child_process", () => ({
  execFile: execFileMock,
}));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeTarget(overrides: Partial<Target> & { address: Target["address"] }): Target {
  return {
    id: "t1",
    name: "probe-test",
    path: "/",
    tls: false,
    intervalMs: 1000,
    timeoutMs: 2000,
    successThreshold: 2,
    failureThreshold: 3,
    degradedLatencyMs: null,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function portOf(server: TcpServer): number {
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on TCP");
  return address.port;
}

async function listen<S extends TcpServer>(server: S): Promise<S> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  return server;
}

async function close(server: TcpServer): Promise<void> {
  if (server instanceof HttpServer) server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/** Resolver that answers NXDOMAIN for every name. */
const unknownHostLookup: LookupFunction = (hostname, _options, callback) => {
  const err: NodeJS.ErrnoException = new Error(`getaddrinfo ENOTFOUND ${hostname}`);
  err.code = "ENOTFOUND";
  process.nextTick(() => callback(err, "", 0));
};

/** Resolver that never answers. */
const hangingLookup: LookupFunction = () => undefined;

/** A port with nothing listening on it. */
async function closedPort(): Promise<number> {
  const server = await listen(createTcpServer());
  const port = portOf(server);
  await close(server);
  return port;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ProbeExecutor", () => {
  const executor = new ProbeExecutor();

  beforeEach(() => {
    execFileMock.mockReset();
  });

  describe("TCP", () => {
    let server: TcpServer;

    beforeEach(async () => {
      server = await listen(createTcpServer((socket) => socket.end()));
    });

    afterEach(async () => {
      await close(server);
    });

    it("succeeds when the port accepts a connection", async () => {
      const target = makeTarget({ address: { host: "127.0.0.1", port: portOf(server), protocol: "TCP" } });
      const result = await executor.probe(target);

      expect(result.outcome).toBe("success");
      expect(result.targetId).toBe("t1");
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
      expect(Object.isFrozen(result)).toBe(true);
    });

    it("reports a refused connection as error", async () => {
      const port = await closedPort();
      const target = makeTarget({ address: { host: "127.0.0.1", port, protocol: "TCP" } });
      const result = await executor.probe(target);

      expect(result.outcome).toBe("error");
      expect(result.latencyMs).toBeNull();
      expect(result.message).toBe(`connect ECONNREFUSED 127.0.0.1:${port}`);
    });

    it("reports an unresolvable host as error", async () => {
      const resolver = new ProbeExecutor({ lookup: unknownHostLookup });
      const target = makeTarget({ address: { host: "db.example.invalid", port: 5432, protocol: "TCP" } });
      const result = await resolver.probe(target);

      expect(result.outcome).toBe("error");
      expect(result.latencyMs).toBeNull();
      expect(result.message).toBe("getaddrinfo ENOTFOUND db.example.invalid");
    });

    it("times out a connection that never completes", async () => {
      const resolver = new ProbeExecutor({ lookup: hangingLookup });
      const target = makeTarget({
        address: { host: "db.example.invalid", port: 5432, protocol: "TCP" },
        timeoutMs: 300,
      });

      const started = Date.now();
      const result = await resolver.probe(target);

      expect(result.outcome).toBe("timeout");
      expect(result.latencyMs).toBeNull();
      expect(result.message).toBe("No response within 300ms");
      expect(Date.now() - started).toBeLessThan(1000);
    });

    it("stamps the result with the probe start time", async () => {
      const before = Date.now();
      const target = makeTarget({ address: { host: "127.0.0.1", port: portOf(server), protocol: "TCP" } });
      const result = await executor.probe(target);
      const stamped = Date.parse(result.timestamp);

      expect(stamped).toBeGreaterThanOrEqual(before);
      expect(stamped).toBeLessThanOrEqual(Date.now());
    });
  });

  describe("HTTP", () => {
    let server: HttpServer;
    let requestedPaths: string[];

    beforeEach(async () => {
      requestedPaths = [];
      server = await listen(
        createHttpServer((req, res) => {
          requestedPaths.push(req.url ?? "");
          // /hang never answers
          if (req.url === "/hang") return;
          res.statusCode = req.url === "/down" ? 503 : 200;
          res.end("ok");
        }),
      );
    });

    afterEach(async () => {
      await close(server);
    });

    function httpTarget(path: string, timeoutMs = 2000): Target {
      return makeTarget({
        address: { host: "127.0.0.1", port: portOf(server), protocol: "HTTP" },
        path,
        timeoutMs,
      });
    }

    it("succeeds below 400 and requests the configured path", async () => {
      const result = await executor.probe(httpTarget("/healthz"));

      expect(result.outcome).toBe("success");
      expect(result.statusCode).toBe(200);
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
      expect(requestedPaths).toEqual(["/healthz"]);
    });

    it("reports 4xx/5xx as failure with the status code", async () => {
      const result = await executor.probe(httpTarget("/down"));

      expect(result.outcome).toBe("failure");
      expect(result.statusCode).toBe(503);
      expect(result.message).toBe("HTTP 503");
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it("records a 500 ms timeout as timeout", async () => {
      const started = Date.now();
      const result = await executor.probe(httpTarget("/hang", 500));

      expect(result.outcome).toBe("timeout");
      expect(result.latencyMs).toBeNull();
      expect(Date.now() - started).toBeLessThan(1500);
    });

    it("does not hold a worker past the timeout", async () => {
      const pool = new WorkerPool(1);
      const tcp = await listen(createTcpServer((socket) => socket.end()));
      const fast = makeTarget({ address: { host: "127.0.0.1", port: portOf(tcp), protocol: "TCP" } });

      const started = Date.now();
      const [slowResult, fastResult] = await Promise.all([
        pool.run(() => executor.probe(httpTarget("/hang", 500))),
        pool.run(() => executor.probe(fast)),
      ]);
      const elapsed = Date.now() - started;
      await close(tcp);

      expect(slowResult.outcome).toBe("timeout");
      expect(fastResult.outcome).toBe("success");
      expect(elapsed).toBeLessThan(1500);
      expect(pool.active).toBe(0);
    });

    it("reports an unresolvable host as error", async () => {
      const resolver = new ProbeExecutor({ lookup: unknownHostLookup });
      const target = makeTarget({ address: { host: "status.example.invalid", port: 80, protocol: "HTTP" } });
      const result = await resolver.probe(target);

      expect(result.outcome).toBe("error");
      expect(result.latencyMs).toBeNull();
      expect(result.message).toContain("ENOTFOUND status.example.invalid");
    });

    it("reports a refused connection as error", async () => {
      const port = await closedPort();
      const target = makeTarget({ address: { host: "127.0.0.1", port, protocol: "HTTP" } });
      const result = await executor.probe(target);

      expect(result.outcome).toBe("error");
      expect(result.latencyMs).toBeNull();
      expect(result.message).toContain("ECONNREFUSED");
    });
  });

  describe("ICMP", () => {
    const icmpTarget = makeTarget({
      address: { host: "10.0.0.1", port: 0, protocol: "ICMP" },
      timeoutMs: 500,
    });

    it("runs one echo request and parses the round-trip time", async () => {
      execFileMock.mockImplementation((_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
        cb(null, "64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=12.4 ms\n", "");
      });

      const result = await new ProbeExecutor({ platform: "linux" }).probe(icmpTarget);

      expect(result.outcome).toBe("success");
      expect(result.latencyMs).toBe(12);
      expect(execFileMock).toHaveBeenCalledWith(
        "ping",
        ["-c", "1", "-W", "1", "10.0.0.1"],
        expect.objectContaining({ signal: expect.any(AbortSignal) }),
        expect.any(Function),
      );
    });

    it("uses Windows flags on win32", async () => {
      execFileMock.mockImplementation((_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
        cb(null, "Reply from 10.0.0.1: bytes=32 time=3ms TTL=128\r\n", "");
      });

      const result = await new ProbeExecutor({ platform: "win32" }).probe(icmpTarget);

      expect(result.latencyMs).toBe(3);
      expect(execFileMock.mock.calls[0]?.[1]).toEqual(["-n", "1", "-w", "500", "10.0.0.1"]);
    });

    it("reports exit code 1 as failure", async () => {
      execFileMock.mockImplementation((_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
        cb(Object.assign(new Error("Command failed: ping"), { code: 1 }), "", "");
      });

      const result = await executor.probe(icmpTarget);

      expect(result.outcome).toBe("failure");
      expect(result.message).toBe("No echo reply from 10.0.0.1");
      expect(typeof result.latencyMs).toBe("number");
    });

    it("reports other exit codes as error", async () => {
      execFileMock.mockImplementation((_file: string, _args: string[], _opts: unknown, cb: ExecCallback) => {
        cb(Object.assign(new Error("ping: unknown host"), { code: 2 }), "", "");
      });

      const result = await executor.probe(icmpTarget);

      expect(result.outcome).toBe("error");
      expect(result.message).toBe("ping: unknown host");
      expect(result.latencyMs).toBeNull();
    });

    it("aborts the child when the deadline passes", async () => {
      let signal: AbortSignal | undefined;
      execFileMock.mockImplementation((_file: string, _args: string[], opts: { signal: AbortSignal }) => {
        signal = opts.signal;
      });

      const result = await executor.probe({ ...icmpTarget, timeoutMs: 50 });

      expect(result.outcome).toBe("timeout");
      expect(result.message).toBe("No response within 50ms");
      expect(signal?.aborted).toBe(true);
    });
  });
});

describe("parsePingLatency", () => {
  it.each([
    ["time=12.4 ms", 12],
    ["time=0.045 ms", 0],
    ["time<1ms", 1],
    ["time=3ms", 3],
    ["Request timed out.", undefined],
  ])("%s -> %s", (output, expected) => {
    expect(parsePingLatency(output)).toBe(expected);
  });
});

describe("targetUrl", () => {
  it("brackets IPv6 hosts and uses https for tls", () => {
    const base = makeTarget({ address: { host: "::1", port: 8443, protocol: "HTTP" }, path: "/health" });
    expect(targetUrl(base)).toBe("http://[::1]:8443/health");
    expect(targetUrl({ ...base, tls: true, address: { host: "example.com", port: 443, protocol: "HTTP" } })).toBe(
      "https://example.com:443/health",
    );
  });
});
