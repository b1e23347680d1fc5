import type { IncomingMessage } from "node:http";
import { WebSocketServer, type WebSocket } from "ws";

import type { AccessTokenService } from "../services/accessTokenService";
import type { Logger } from "../services/actionLog";

export type ErrorCode = "UNAUTHORIZED" | "INVALID_INPUT" | "SESSION_EXPIRED";

export type ServiceError = {
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
};

export type MessageEnvelope = Readonly<{
  type: string;
  payload?: unknown;
}>;

export type AuthHandshakePayload = Readonly<{
  token: string;
}>;

export type WebsocketGatewayDeps = Readonly<{
  wss: WebSocketServer;
  accessTokens: Pick<AccessTokenService, "verify">;
  maxIncomingPayloadBytes?: number;
  maxOutgoingPayloadBytes?: number;
  heartbeatTimeoutMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type WebsocketGateway = Readonly<{
  close(): Promise<void>;
  /** Sends to every authenticated socket of one chat; resolves to the number of sockets reached. */
  deliver(chatId: string, type: string, payload: unknown): number;
  connectedChats(): ReadonlyArray<string>;
}>;

const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 2 * 1024;
const DEFAULT_MAX_OUTGOING_PAYLOAD_BYTES = 8 * 1024;
const DEFAULT_HEARTBEAT_TIMEOUT_MS = 45_000;

function makeError(code: ErrorCode, message: string, context?: Record<string, unknown>): ServiceError {
  return context ? { code, message, context } : { code, message };
}

function safeJsonParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isEnvelope(value: unknown): value is MessageEnvelope {
  return isRecord(value) && typeof value.type === "string";
}

function isAuthPayload(value: unknown): value is AuthHandshakePayload {
  return isRecord(value) && typeof value.token === "string";
}

function send(ws: WebSocket, type: string, payload: unknown): void {
  const message = JSON.stringify({ type, payload });
  ws.send(message);
}

function sendError(ws: WebSocket, error: ServiceError): void {
  send(ws, "error", error);
}

function closePolicy(ws: WebSocket): void {
  try {
    ws.close(1008, "Policy violation");
  } catch {
    // Ignore; ws may already be closed.
  }
}

export function createWebsocketGateway(deps: WebsocketGatewayDeps): WebsocketGateway {
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const maxOutgoingPayloadBytes = deps.maxOutgoingPayloadBytes ?? DEFAULT_MAX_OUTGOING_PAYLOAD_BYTES;
  const heartbeatTimeoutMs = deps.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? console;

  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(maxOutgoingPayloadBytes) || maxOutgoingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxOutgoingPayloadBytes.");
  }
  if (!Number.isFinite(heartbeatTimeoutMs) || heartbeatTimeoutMs <= 0) {
    throw new Error("websocketGateway requires a positive heartbeatTimeoutMs.");
  }

  const connections = new Set<WebSocket>();
  const chatBySocket = new Map<WebSocket, string>();
  const lastHeartbeatBySocket = new Map<WebSocket, number>();

  function cleanup(ws: WebSocket): void {
    connections.delete(ws);
    chatBySocket.delete(ws);
    lastHeartbeatBySocket.delete(ws);
  }

  function handleAuth(ws: WebSocket, payload: unknown): void {
    if (!isAuthPayload(payload)) {
      sendError(ws, makeError("INVALID_INPUT", "Invalid auth payload."));
      closePolicy(ws);
      return;
    }

    const claims = deps.accessTokens.verify(payload.token);
    if (!claims.ok) {
      sendError(ws, makeError("UNAUTHORIZED", claims.error.message));
      closePolicy(ws);
      return;
    }
    // Only chat tokens subscribe to broadcasts; the subject is the chat identity.
    if (claims.value.role !== "chat") {
      sendError(ws, makeError("UNAUTHORIZED", "A chat token is required."));
      closePolicy(ws);
      return;
    }

    chatBySocket.set(ws, claims.value.subject);
    lastHeartbeatBySocket.set(ws, nowMs());
    send(ws, "auth_ok", { chatId: claims.value.subject });
  }

  function handleEnvelope(ws: WebSocket, envelope: MessageEnvelope): void {
    if (envelope.type === "auth") {
      if (chatBySocket.has(ws)) {
        sendError(ws, makeError("INVALID_INPUT", "Already authenticated."));
        closePolicy(ws);
        return;
      }
      handleAuth(ws, envelope.payload);
      return;
    }

    if (!chatBySocket.has(ws)) {
      sendError(ws, makeError("UNAUTHORIZED", "Authentication required."));
      closePolicy(ws);
      return;
    }

    if (envelope.type === "heartbeat") {
      lastHeartbeatBySocket.set(ws, nowMs());
      send(ws, "heartbeat_ok", { nowMs: nowMs() });
      return;
    }

    sendError(ws, makeError("INVALID_INPUT", "Unknown message type.", { type: envelope.type }));
    closePolicy(ws);
  }

  deps.wss.on("connection", (ws: WebSocket, _req: IncomingMessage) => {
    connections.add(ws);

    ws.on("close", () => cleanup(ws));
    ws.on("error", (e: Error) => {
      logger.warn(`[RegistrantDesk] WebSocket error: ${e.message}`);
      cleanup(ws);
    });

    ws.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
      const buffer = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
      if (buffer.byteLength > maxIncomingPayloadBytes) {
        sendError(ws, makeError("INVALID_INPUT", "Payload too large.", { maxBytes: maxIncomingPayloadBytes }));
        closePolicy(ws);
        return;
      }

      const text = buffer.toString("utf8");
      const parsed = safeJsonParse(text);
      if (!parsed.ok || !isEnvelope(parsed.value)) {
        sendError(ws, makeError("INVALID_INPUT", "Invalid message envelope."));
        closePolicy(ws);
        return;
      }

      handleEnvelope(ws, parsed.value);
    });
  });

  const heartbeatTimer = setInterval(() => {
    const now = nowMs();
    for (const ws of connections) {
      if (!chatBySocket.has(ws)) continue;
      const last = lastHeartbeatBySocket.get(ws);
      if (typeof last !== "number") continue;
      if (now - last > heartbeatTimeoutMs) {
        sendError(ws, makeError("SESSION_EXPIRED", "Heartbeat timeout."));
        closePolicy(ws);
      }
    }
  }, Math.min(heartbeatTimeoutMs, 5_000));

  return {
    async close(): Promise<void> {
      clearInterval(heartbeatTimer);
      for (const ws of connections) {
        ws.terminate();
      }
      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
    },

    deliver(chatId: string, type: string, payload: unknown): number {
      const message = JSON.stringify({ type, payload });
      const bytes = Buffer.byteLength(message, "utf8");
      if (bytes > maxOutgoingPayloadBytes) {
        throw new Error(`websocketGateway message exceeds ${maxOutgoingPayloadBytes} bytes.`);
      }

      let reached = 0;
      for (const [ws, boundChat] of chatBySocket) {
        if (boundChat !== chatId) continue;
        if (ws.readyState !== ws.OPEN) continue;
        ws.send(message);
        reached += 1;
      }
      return reached;
    },

    connectedChats(): ReadonlyArray<string> {
      return Array.from(new Set(chatBySocket.values()));
    }
  };
}
