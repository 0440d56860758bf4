/**
 * Shared fixtures for the netpulse integration suites.
 */

import { createServer, type Server } from "node:net";

export const API_KEY = "test-secret";
export const AUTH_HEADERS = { "x-internal-api-key": API_KEY };

// ---------------------------------------------------------------------------
// TCP endpoint
// ---------------------------------------------------------------------------

export interface TcpEndpoint {
  server: Server;
  port: number;
  close(): Promise<void>;
}

/** A local TCP server that accepts and immediately ends every connection. */
export async function startTcpEndpoint(): Promise<TcpEndpoint> {
  const server = createServer((socket) => socket.end());
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("TCP endpoint did not bind a port");
  }

  return {
    server,
    port: address.port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

// ---------------------------------------------------------------------------
// Target specs
// ---------------------------------------------------------------------------

export function createTcpSpec(port: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: "local tcp",
    host: "127.0.0.1",
    port,
    protocol: "tcp",
    intervalMs: 100,
    timeoutMs: 500,
    successThreshold: 2,
    failureThreshold: 2,
    ...overrides,
  };
}
