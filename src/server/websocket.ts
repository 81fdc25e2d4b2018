import { WebSocketServer, WebSocket, RawData } from "ws";
import { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { ulid } from "ulid";
import { ProtocolError } from "../core/errors";
import { EventBus, EventEnvelope } from "../core/eventBus";
import type { Logger } from "../core/logger";
import type { ExecutionEngine } from "../core/tool-engine";
import { RateLimiter } from "./middleware/rateLimit";
import { RpcResponse, UNKNOWN_RPC_ID, dispatchRpc, errorResponse, parseRpcRequest } from "./protocol";

export const WS_PATH = "/ws";

export interface WsServerDeps {
  engine: ExecutionEngine;
  eventBus: EventBus;
  logger: Logger;
  /** Applied to handshakes. */
  rateLimiter?: RateLimiter;
}

export interface WsServerHandle {
  wss: WebSocketServer;
  activeConnections: () => number;
  close: () => Promise<void>;
}

interface Connection {
  id: string;
  socket: WebSocket;
  /** Aborted on close; cancels this connection's in-flight invocations. */
  controller: AbortController;
  subscription?: (evt: EventEnvelope) => void;
}

type OutboundMessage =
  | RpcResponse
  | { type: "connected"; connectionId: string; ts: number }
  | { type: "event"; event: EventEnvelope };

export function createWsServer(server: Server, deps: WsServerDeps): WsServerHandle {
  const { engine, eventBus, logger, rateLimiter } = deps;
  const wss = new WebSocketServer({ noServer: true });
  const connections = new Map<string, Connection>();

  const reject = (socket: Duplex, status: string) => {
    socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
    socket.destroy();
  };

  server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(request.url ?? "/", "http://localhost").pathname;
    if (pathname !== WS_PATH) {
      reject(socket, "404 Not Found");
      return;
    }

    if (rateLimiter) {
      const clientIp = request.socket.remoteAddress || "unknown";
      if (!rateLimiter.check(clientIp).allowed) {
        logger.warn("WebSocket handshake rate limited", { ip: clientIp });
        reject(socket, "429 Too Many Requests");
        return;
      }
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  const send = (conn: Connection, message: OutboundMessage) => {
    if (conn.socket.readyState !== WebSocket.OPEN) return;
    conn.socket.send(JSON.stringify(message), (err) => {
      if (err) logger.warn("WebSocket send failed", { connectionId: conn.id, error: err.message });
    });
  };

  const unsubscribe = (conn: Connection) => {
    if (conn.subscription) {
      eventBus.offAny(conn.subscription);
      conn.subscription = undefined;
    }
  };

  const handleMessage = async (conn: Connection, data: RawData): Promise<RpcResponse> => {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch {
      return errorResponse(UNKNOWN_RPC_ID, new ProtocolError("Invalid JSON", "INVALID_REQUEST"));
    }

    const parsed = parseRpcRequest(raw);
    if (!parsed.ok) return parsed.response;
    const { request } = parsed;

    switch (request.method) {
      case "events/subscribe": {
        if (!conn.subscription) {
          const listener = (event: EventEnvelope) => send(conn, { type: "event", event });
          conn.subscription = listener;
          eventBus.onAny(listener);
        }
        return { id: request.id, result: { subscribed: true } };
      }
      case "events/unsubscribe":
        unsubscribe(conn);
        return { id: request.id, result: { subscribed: false } };
      default:
        return dispatchRpc(engine, request, conn.controller.signal);
    }
  };

  wss.on("connection", (ws: WebSocket) => {
    const conn: Connection = { id: ulid(), socket: ws, controller: new AbortController() };
    connections.set(conn.id, conn);
    eventBus.emit("ConnectionEvent", { type: "open", connectionId: conn.id, activeConnections: connections.size });

    send(conn, { type: "connected", connectionId: conn.id, ts: Date.now() });

    // Messages are dispatched concurrently; responses carry the request id.
    ws.on("message", (data) => {
      handleMessage(conn, data)
        .then(response => send(conn, response))
        .catch((error: unknown) => {
          logger.error(error instanceof Error ? error : new Error(String(error)), { connectionId: conn.id });
          send(conn, errorResponse(UNKNOWN_RPC_ID, error));
        });
    });

    ws.on("close", () => {
      conn.controller.abort();
      unsubscribe(conn);
      connections.delete(conn.id);
      eventBus.emit("ConnectionEvent", { type: "close", connectionId: conn.id, activeConnections: connections.size });
    });

    ws.on("error", (error) => {
      logger.warn("WebSocket error", { connectionId: conn.id, error: error.message });
    });
  });

  return {
    wss,
    activeConnections: () => connections.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const conn of connections.values()) {
          conn.socket.terminate();
        }
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
