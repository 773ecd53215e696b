import type { IncomingMessage } from "node:http";
import { WebSocketServer, type WebSocket } from "ws";

import type { IdentityVerifier } from "../auth/identityToken";
import type { AccessGuard } from "../services/accessGuard";
import { isNonEmptyString, type Caller, type ErrorCode, type ServiceError } from "../services/chatTypes";
import { renderForViewer } from "../services/messageStore";
import type { ChangeFeed, FeedEvent, FeedSubscription, OverflowPolicy } from "./changeFeed";

export type MessageEnvelope = Readonly<{
  type: string;
  payload?: unknown;
}>;

export type WebsocketGatewayDeps = Readonly<{
  wss: WebSocketServer;
  identity: IdentityVerifier;
  guard: AccessGuard;
  feed: ChangeFeed;

  maxIncomingPayloadBytes?: number;
  heartbeatTimeoutMs?: number;
  maxSubscriptionsPerSocket?: number;
  feedBufferSize?: number;
  feedOverflowPolicy?: OverflowPolicy;
  nowMs?: () => number;
  logger?: Pick<Console, "error">;
}>;

export type WebsocketGateway = Readonly<{
  close(): Promise<void>;
  connectionCount(): number;
}>;

type SocketState = {
  caller: Caller | null;
  lastHeartbeatMs: number;
  subscriptions: Map<string, FeedSubscription>;
};

const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 2 * 1024;
const DEFAULT_HEARTBEAT_TIMEOUT_MS = 45_000;
const DEFAULT_MAX_SUBSCRIPTIONS = 50;

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

function isEnvelope(value: unknown): value is MessageEnvelope {
  if (typeof value !== "object" || value === null) return false;
  return "type" in value && typeof value.type === "string";
}

function stringField(payload: unknown, key: string): string | null {
  if (typeof payload !== "object" || payload === null || !(key in payload)) return null;
  const value: unknown = Reflect.get(payload, key);
  return isNonEmptyString(value) ? value.trim() : null;
}

function send(ws: WebSocket, type: string, payload: unknown): void {
  if (ws.readyState !== ws.OPEN) return;
  ws.send(JSON.stringify({ type, payload }));
}

function sendError(ws: WebSocket, error: ServiceError): void {
  send(ws, "error", error);
}

function closePolicy(ws: WebSocket, reason = "Policy violation"): void {
  if (ws.readyState === ws.CLOSED || ws.readyState === ws.CLOSING) return;
  ws.close(1008, reason);
}

/**
 * Relays the change feed to authenticated members. Clients authenticate with the
 * identity service's JWT, then subscribe per group; membership is checked at
 * subscribe time and again before each event is relayed.
 */
export function createWebsocketGateway(deps: WebsocketGatewayDeps): WebsocketGateway {
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const heartbeatTimeoutMs = deps.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const maxSubscriptions = deps.maxSubscriptionsPerSocket ?? DEFAULT_MAX_SUBSCRIPTIONS;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? console;

  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(heartbeatTimeoutMs) || heartbeatTimeoutMs <= 0) {
    throw new Error("websocketGateway requires a positive heartbeatTimeoutMs.");
  }
  if (!Number.isInteger(maxSubscriptions) || maxSubscriptions <= 0) {
    throw new Error("websocketGateway requires a positive maxSubscriptionsPerSocket.");
  }

  const sockets = new Map<WebSocket, SocketState>();

  function cleanup(ws: WebSocket): void {
    const state = sockets.get(ws);
    if (!state) return;
    for (const sub of state.subscriptions.values()) sub.unsubscribe();
    state.subscriptions.clear();
    sockets.delete(ws);
  }

  function violation(ws: WebSocket, error: ServiceError): void {
    sendError(ws, error);
    closePolicy(ws);
  }

  function handleAuth(ws: WebSocket, state: SocketState, payload: unknown): void {
    const token = stringField(payload, "jwt");
    if (!token) {
      violation(ws, makeError("INVALID_SESSION", "Missing credentials."));
      return;
    }
    const verified = deps.identity.verify(token);
    if (!verified.ok) {
      violation(ws, makeError("INVALID_SESSION", "Invalid credentials."));
      return;
    }
    state.caller = verified.value;
    state.lastHeartbeatMs = nowMs();
    send(ws, "auth_ok", { userId: verified.value.userId, username: verified.value.username });
  }

  async function handleSubscribe(ws: WebSocket, state: SocketState, caller: Caller, payload: unknown): Promise<void> {
    const groupId = stringField(payload, "groupId");
    if (!groupId) {
      violation(ws, makeError("INVALID_INPUT", "groupId is required."));
      return;
    }
    if (state.subscriptions.has(groupId)) {
      send(ws, "subscribed", { groupId });
      return;
    }
    if (state.subscriptions.size >= maxSubscriptions) {
      sendError(ws, makeError("INVALID_INPUT", "Too many subscriptions.", { maxSubscriptions }));
      return;
    }

    const access = await deps.guard.authorize(caller, groupId, "member");
    if (!access.ok) {
      sendError(ws, access.error);
      return;
    }
    // The socket may have gone away while the membership check ran.
    if (!sockets.has(ws) || state.subscriptions.has(groupId)) return;

    // Membership and role are re-read per event: a member who leaves or is removed stops receiving.
    const subscription = deps.feed.subscribe(
      groupId,
      async (event: FeedEvent) => {
        const current = await deps.guard.authorize(caller, event.groupId, "member");
        if (!current.ok) {
          subscription.unsubscribe();
          if (state.subscriptions.get(groupId) === subscription) state.subscriptions.delete(groupId);
          sendError(ws, current.error);
          return;
        }
        send(ws, "message_created", {
          groupId: event.groupId,
          message: renderForViewer(event.message, current.value.isAdmin)
        });
      },
      {
        bufferSize: deps.feedBufferSize,
        overflowPolicy: deps.feedOverflowPolicy,
        onDisconnect: () => {
          state.subscriptions.delete(groupId);
          sendError(ws, makeError("CONSTRAINT_VIOLATION", "Subscriber fell too far behind.", { groupId }));
          closePolicy(ws, "Subscriber overflow");
        }
      }
    );
    state.subscriptions.set(groupId, subscription);
    send(ws, "subscribed", { groupId });
  }

  function handleUnsubscribe(ws: WebSocket, state: SocketState, payload: unknown): void {
    const groupId = stringField(payload, "groupId");
    if (!groupId) {
      violation(ws, makeError("INVALID_INPUT", "groupId is required."));
      return;
    }
    state.subscriptions.get(groupId)?.unsubscribe();
    state.subscriptions.delete(groupId);
    send(ws, "unsubscribed", { groupId });
  }

  async function handleEnvelope(ws: WebSocket, state: SocketState, envelope: MessageEnvelope): Promise<void> {
    if (envelope.type === "auth") {
      if (state.caller) {
        violation(ws, makeError("INVALID_INPUT", "Already authenticated."));
        return;
      }
      handleAuth(ws, state, envelope.payload);
      return;
    }

    const caller = state.caller;
    if (!caller) {
      violation(ws, makeError("INVALID_SESSION", "Authentication required."));
      return;
    }

    if (envelope.type === "heartbeat") {
      state.lastHeartbeatMs = nowMs();
      send(ws, "heartbeat_ok", { nowMs: nowMs() });
      return;
    }
    if (envelope.type === "subscribe") {
      await handleSubscribe(ws, state, caller, envelope.payload);
      return;
    }
    if (envelope.type === "unsubscribe") {
      handleUnsubscribe(ws, state, envelope.payload);
      return;
    }

    violation(ws, makeError("INVALID_INPUT", "Unknown message type.", { type: envelope.type }));
  }

  deps.wss.on("connection", (ws: WebSocket, _req: IncomingMessage) => {
    const state: SocketState = { caller: null, lastHeartbeatMs: nowMs(), subscriptions: new Map() };
    sockets.set(ws, state);

    ws.on("close", () => cleanup(ws));
    ws.on("error", () => cleanup(ws));

    ws.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
      const buffer = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
      if (buffer.byteLength > maxIncomingPayloadBytes) {
        violation(ws, makeError("INVALID_INPUT", "Payload too large.", { maxBytes: maxIncomingPayloadBytes }));
        return;
      }

      const parsed = safeJsonParse(buffer.toString("utf8"));
      if (!parsed.ok || !isEnvelope(parsed.value)) {
        violation(ws, makeError("INVALID_INPUT", "Invalid message envelope."));
        return;
      }

      const envelope = parsed.value;
      handleEnvelope(ws, state, envelope).catch((e: unknown) => {
        const message = e instanceof Error ? e.message : String(e);
        logger.error(`[GroupChat] WebSocket "${envelope.type}" handling failed: ${message}`);
        sendError(ws, makeError("CONSTRAINT_VIOLATION", "Request failed."));
      });
    });
  });

  const heartbeatTimer = setInterval(() => {
    const now = nowMs();
    for (const [ws, state] of sockets) {
      if (!state.caller) continue;
      if (now - state.lastHeartbeatMs > heartbeatTimeoutMs) {
        violation(ws, makeError("INVALID_SESSION", "Heartbeat timeout."));
      }
    }
  }, Math.min(heartbeatTimeoutMs, 5_000));

  return {
    async close(): Promise<void> {
      clearInterval(heartbeatTimer);
      for (const ws of Array.from(sockets.keys())) {
        cleanup(ws);
        ws.terminate();
      }
      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
    },

    connectionCount(): number {
      return sockets.size;
    }
  };
}
