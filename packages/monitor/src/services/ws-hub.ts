import type { FastifyInstance } from "fastify";
import type { WebSocket } from "@fastify/websocket";
import { createLogger } from "@netpulse/shared/utils";

const logger = createLogger("monitor:ws-hub");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type WsEventType = "connected" | "transition" | "pong";

export interface WsEvent {
  type: WsEventType;
  timestamp: string;
  data: unknown;
}

interface TrackedClient {
  socket: WebSocket;
  id: string;
  connectedAt: number;
  lastPong: number;
}

function isPingMessage(message: unknown): boolean {
  return (
    message !== null &&
    typeof message === "object" &&
    "type" in message &&
    message.type === "ping"
  );
}

// ---------------------------------------------------------------------------
// WebSocket Hub
// ---------------------------------------------------------------------------

const HEARTBEAT_INTERVAL_MS = 15_000;
const STALE_TIMEOUT_MS = 60_000;
const WS_OPEN = 1;

export class WsHub {
  private clients: Map<string, TrackedClient> = new Map();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private clientCounter = 0;

  /**
   * Register the /ws route. Must be called after @fastify/websocket is
   * registered. The hub closes with the Fastify instance.
   */
  register(fastify: FastifyInstance): void {
    fastify.get("/ws", { websocket: true }, (socket, _request) => {
      const clientId = `ws-${++this.clientCounter}-${Date.now()}`;
      const now = Date.now();

      const tracked: TrackedClient = {
        socket,
        id: clientId,
        connectedAt: now,
        lastPong: now,
      };

      this.clients.set(clientId, tracked);
      logger.info({ clientId, totalClients: this.clients.size }, "WebSocket client connected");

      this.sendToClient(tracked, {
        type: "connected",
        timestamp: new Date().toISOString(),
        data: { clientId },
      });

      socket.on("pong", () => {
        const client = this.clients.get(clientId);
        if (client) {
          client.lastPong = Date.now();
        }
      });

      socket.on("message", (raw: Buffer | ArrayBuffer | Buffer[]) => {
        let message: unknown;
        try {
          message = JSON.parse(raw.toString());
        } catch {
          logger.debug({ clientId }, "Ignoring non-JSON WebSocket message");
          return;
        }

        if (isPingMessage(message)) {
          tracked.lastPong = Date.now();
          this.sendToClient(tracked, {
            type: "pong",
            timestamp: new Date().toISOString(),
            data: null,
          });
        }
      });

      socket.on("close", () => {
        this.clients.delete(clientId);
        logger.info(
          { clientId, totalClients: this.clients.size },
          "WebSocket client disconnected",
        );
      });

      socket.on("error", (err: Error) => {
        logger.error({ err, clientId }, "WebSocket client error");
        this.clients.delete(clientId);
      });
    });

    fastify.addHook("onClose", async () => {
      await this.close();
    });

    this.startHeartbeat();
  }

  /**
   * Broadcast an event to all connected clients.
   */
  broadcast(type: WsEventType, data: unknown): void {
    const event: WsEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };

    const payload = JSON.stringify(event);
    let sent = 0;

    for (const client of this.clients.values()) {
      try {
        if (client.socket.readyState === WS_OPEN) {
          client.socket.send(payload);
          sent++;
        }
      } catch (err) {
        logger.debug({ err, clientId: client.id }, "Failed to send to client");
      }
    }

    logger.debug({ type, clients: sent }, "Broadcast event");
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /**
   * Close all connections and stop the heartbeat.
   */
  async close(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }

    for (const [id, client] of this.clients) {
      try {
        client.socket.close(1001, "Server shutting down");
      } catch (err) {
        logger.debug({ err, clientId: id }, "Error closing WebSocket client");
      }
      this.clients.delete(id);
    }
  }

  private sendToClient(client: TrackedClient, event: WsEvent): void {
    try {
      if (client.socket.readyState === WS_OPEN) {
        client.socket.send(JSON.stringify(event));
      }
    } catch (err) {
      logger.debug({ err, clientId: client.id }, "Failed to send to client");
    }
  }

  /** Ping every client and drop the ones that stopped answering. */
  private startHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
    }

    this.heartbeatTimer = setInterval(() => {
      const now = Date.now();

      for (const [id, client] of this.clients) {
        if (now - client.lastPong > STALE_TIMEOUT_MS) {
          logger.info({ clientId: id }, "Disconnecting stale WebSocket client");
          client.socket.terminate();
          this.clients.delete(id);
          continue;
        }

        try {
          if (client.socket.readyState === WS_OPEN) {
            client.socket.ping();
          }
        } catch (err) {
          logger.debug({ err, clientId: id }, "Ping failed, dropping client");
          this.clients.delete(id);
        }
      }
    }, HEARTBEAT_INTERVAL_MS);
    this.heartbeatTimer.unref();
  }
}
