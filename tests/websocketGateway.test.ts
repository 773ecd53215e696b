import http from "node:http";
import { WebSocket, WebSocketServer, type RawData } from "ws";

import { createIdentityVerifier, signIdentityToken } from "../backend/src/auth/identityToken";
import { createWebsocketGateway, type WebsocketGatewayDeps } from "../backend/src/realtime/websocketGateway";
import { T0, alice, bob, createChatFixture } from "./helpers/chatFixture";

type Frame = Readonly<{ type: string; payload: unknown }>;

type Client = Readonly<{
  ws: WebSocket;
  closed: Promise<number>;
  next(): Promise<Frame>;
  send(type: string, payload?: unknown): void;
}>;

function toFrame(data: RawData): Frame {
  const buffer = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
  const parsed: unknown = JSON.parse(buffer.toString("utf8"));
  if (typeof parsed !== "object" || parsed === null || !("type" in parsed) || typeof parsed.type !== "string") {
    throw new Error("unexpected frame");
  }
  return { type: parsed.type, payload: "payload" in parsed ? parsed.payload : undefined };
}

async function connect(url: string): Promise<Client> {
  const ws = new WebSocket(url);
  const frames: Frame[] = [];
  const waiters: Array<(frame: Frame) => void> = [];
  ws.on("message", (data: RawData) => {
    const frame = toFrame(data);
    const waiter = waiters.shift();
    if (waiter) waiter(frame);
    else frames.push(frame);
  });
  const closed = new Promise<number>((resolve) => {
    ws.once("close", (code: number) => resolve(code));
  });
  await new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", (e) => reject(e));
  });
  return {
    ws,
    closed,
    next() {
      const frame = frames.shift();
      if (frame) return Promise.resolve(frame);
      return new Promise<Frame>((resolve) => waiters.push(resolve));
    },
    send(type, payload) {
      ws.send(JSON.stringify({ type, payload }));
    }
  };
}

async function createServer(): Promise<{
  url: string;
  wss: WebSocketServer;
  closeHttp(): Promise<void>;
}> {
  const server = http.createServer((_req, res) => {
    res.writeHead(200);
    res.end("ok");
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("unexpected address");
  const wss = new WebSocketServer({ server });
  return {
    url: `ws://127.0.0.1:${address.port}`,
    wss,
    async closeHttp() {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  };
}

async function waitUntil(check: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

type Harness = Awaited<ReturnType<typeof startHarness>>;

// alice creates a public room and bob joins; the gateway authenticates with "test-secret".
async function startHarness(overrides: Partial<Omit<WebsocketGatewayDeps, "wss" | "identity" | "guard" | "feed">> = {}) {
  const fx = createChatFixture();
  const created = await fx.groups.createGroup(alice, { name: "Room" });
  if (!created.ok) throw new Error("unreachable");
  await fx.memberships.join(bob, created.value.id);

  const server = await createServer();
  const gateway = createWebsocketGateway({
    wss: server.wss,
    identity: createIdentityVerifier({ jwtSecret: "test-secret" }),
    guard: fx.guard,
    feed: fx.feed,
    heartbeatTimeoutMs: 5_000,
    logger: fx.logger,
    ...overrides
  });
  const clients: Client[] = [];

  return {
    fx,
    gateway,
    groupId: created.value.id,
    async client(): Promise<Client> {
      const c = await connect(server.url);
      clients.push(c);
      return c;
    },
    async stop(): Promise<void> {
      for (const c of clients) c.ws.terminate();
      await gateway.close();
      await server.closeHttp();
    }
  };
}

async function authed(harness: Harness, user: Readonly<{ userId: string; username: string }>): Promise<Client> {
  const c = await harness.client();
  c.send("auth", { jwt: signIdentityToken("test-secret", user) });
  const frame = await c.next();
  if (frame.type !== "auth_ok") throw new Error(`unexpected ${frame.type}`);
  return c;
}

describe("websocketGateway", () => {
  it("Given invalid gateway dependencies When createWebsocketGateway is called Then it throws deterministically", async () => {
    const fx = createChatFixture();
    const server = await createServer();
    const base = {
      wss: server.wss,
      identity: createIdentityVerifier({ jwtSecret: "test-secret" }),
      guard: fx.guard,
      feed: fx.feed
    };

    try {
      expect(() => createWebsocketGateway({ ...base, maxIncomingPayloadBytes: 0 })).toThrow(
        "websocketGateway requires a positive maxIncomingPayloadBytes."
      );
      expect(() => createWebsocketGateway({ ...base, heartbeatTimeoutMs: 0 })).toThrow(
        "websocketGateway requires a positive heartbeatTimeoutMs."
      );
      expect(() => createWebsocketGateway({ ...base, maxSubscriptionsPerSocket: 0 })).toThrow(
        "websocketGateway requires a positive maxSubscriptionsPerSocket."
      );
    } finally {
      server.wss.close();
      await server.closeHttp();
    }
  });

  it("Given a JWT from the identity service When a client authenticates Then the gateway responds with auth_ok", async () => {
    const harness = await startHarness();
    try {
      const c = await harness.client();
      c.send("auth", { jwt: signIdentityToken("test-secret", { userId: "u-alice", username: "alice" }) });

      expect(await c.next()).toEqual({ type: "auth_ok", payload: { userId: "u-alice", username: "alice" } });
    } finally {
      await harness.stop();
    }
  });

  it("Given a subscribed member When another member sends a message Then it arrives as message_created", async () => {
    const harness = await startHarness();
    try {
      const c = await authed(harness, { userId: "u-alice", username: "alice" });
      c.send("subscribe", { groupId: harness.groupId });
      expect(await c.next()).toEqual({ type: "subscribed", payload: { groupId: harness.groupId } });

      const sent = await harness.fx.messages.send(bob, { groupId: harness.groupId, content: "hi all" });
      if (!sent.ok) throw new Error("unreachable");

      const frame = await c.next();
      expect(frame.type).toBe("message_created");
      expect(frame.payload).toEqual({ groupId: harness.groupId, message: sent.value });
    } finally {
      await harness.stop();
    }
  });

  it("Given a non-member When it subscribes Then it gets NOT_AUTHORIZED and the socket stays open", async () => {
    const harness = await startHarness({ nowMs: () => T0 });
    try {
      const c = await authed(harness, { userId: "u-carol", username: "carol" });
      c.send("subscribe", { groupId: harness.groupId });

      expect(await c.next()).toEqual({
        type: "error",
        payload: {
          code: "NOT_AUTHORIZED",
          message: "You are not allowed to access this group.",
          context: { groupId: harness.groupId }
        }
      });

      c.send("heartbeat");
      expect(await c.next()).toEqual({ type: "heartbeat_ok", payload: { nowMs: T0 } });
      expect(harness.fx.feed.subscriberCount(harness.groupId)).toBe(0);
    } finally {
      await harness.stop();
    }
  });

  it("Given a subscribed member When an admin removes them Then later messages are withheld and the subscription is dropped", async () => {
    const harness = await startHarness({ nowMs: () => T0 });
    try {
      const c = await authed(harness, { userId: "u-bob", username: "bob" });
      c.send("subscribe", { groupId: harness.groupId });
      await c.next();

      const removed = await harness.fx.memberships.removeMember(alice, harness.groupId, "u-bob");
      if (!removed.ok) throw new Error("unreachable");

      // The removal notice is the first event after the kick; it is refused rather than relayed.
      expect(await c.next()).toEqual({
        type: "error",
        payload: {
          code: "NOT_AUTHORIZED",
          message: "You are not allowed to access this group.",
          context: { groupId: harness.groupId }
        }
      });
      expect(harness.fx.feed.subscriberCount(harness.groupId)).toBe(0);

      const sent = await harness.fx.messages.send(alice, { groupId: harness.groupId, content: "secret after kick" });
      if (!sent.ok) throw new Error("unreachable");
      await harness.fx.feed.drain();

      c.send("heartbeat");
      expect(await c.next()).toEqual({ type: "heartbeat_ok", payload: { nowMs: T0 } });
    } finally {
      await harness.stop();
    }
  });

  it("Given connected clients When one closes Then connectionCount tracks the open sockets", async () => {
    const harness = await startHarness();
    try {
      const first = await authed(harness, { userId: "u-alice", username: "alice" });
      await harness.client();
      expect(harness.gateway.connectionCount()).toBe(2);

      first.ws.close();
      await first.closed;
      await waitUntil(() => harness.gateway.connectionCount() === 1);
      expect(harness.gateway.connectionCount()).toBe(1);
    } finally {
      await harness.stop();
    }
  });

  it("Given a subscription When the client unsubscribes Then the feed subscription is released", async () => {
    const harness = await startHarness();
    try {
      const c = await authed(harness, { userId: "u-bob", username: "bob" });
      c.send("subscribe", { groupId: harness.groupId });
      await c.next();
      expect(harness.fx.feed.subscriberCount(harness.groupId)).toBe(1);

      c.send("unsubscribe", { groupId: harness.groupId });
      expect(await c.next()).toEqual({ type: "unsubscribed", payload: { groupId: harness.groupId } });
      expect(harness.fx.feed.subscriberCount(harness.groupId)).toBe(0);
    } finally {
      await harness.stop();
    }
  });

  it("Given auth handshakes without valid credentials When received Then the gateway rejects with INVALID_SESSION and closes 1008", async () => {
    const harness = await startHarness();
    try {
      const missing = await harness.client();
      missing.send("auth", {});
      expect(await missing.next()).toEqual({
        type: "error",
        payload: { code: "INVALID_SESSION", message: "Missing credentials." }
      });
      expect(await missing.closed).toBe(1008);

      const forged = await harness.client();
      forged.send("auth", { jwt: signIdentityToken("other-secret", { userId: "u-alice", username: "alice" }) });
      expect(await forged.next()).toEqual({
        type: "error",
        payload: { code: "INVALID_SESSION", message: "Invalid credentials." }
      });
      expect(await forged.closed).toBe(1008);
    } finally {
      await harness.stop();
    }
  });

  it("Given an unauthenticated client When it sends a non-auth message Then the gateway rejects with Authentication required", async () => {
    const harness = await startHarness();
    try {
      const c = await harness.client();
      c.send("subscribe", { groupId: harness.groupId });

      expect(await c.next()).toEqual({
        type: "error",
        payload: { code: "INVALID_SESSION", message: "Authentication required." }
      });
      expect(await c.closed).toBe(1008);
    } finally {
      await harness.stop();
    }
  });

  it("Given an authenticated client When it sends an unknown message type Then the gateway rejects and closes", async () => {
    const harness = await startHarness();
    try {
      const c = await authed(harness, { userId: "u-alice", username: "alice" });
      c.send("nope", {});

      expect(await c.next()).toEqual({
        type: "error",
        payload: { code: "INVALID_INPUT", message: "Unknown message type.", context: { type: "nope" } }
      });
      expect(await c.closed).toBe(1008);
    } finally {
      await harness.stop();
    }
  });

  it("Given malformed frames When received Then the gateway rejects them and closes", async () => {
    const harness = await startHarness();
    try {
      const notJson = await harness.client();
      notJson.ws.send("not json");
      expect(await notJson.next()).toEqual({
        type: "error",
        payload: { code: "INVALID_INPUT", message: "Invalid message envelope." }
      });
      expect(await notJson.closed).toBe(1008);

      const oversized = await harness.client();
      oversized.ws.send("x".repeat(2 * 1024 + 10));
      expect(await oversized.next()).toEqual({
        type: "error",
        payload: { code: "INVALID_INPUT", message: "Payload too large.", context: { maxBytes: 2048 } }
      });
      expect(await oversized.closed).toBe(1008);
    } finally {
      await harness.stop();
    }
  });

  it("Given an authenticated client When it fails to send heartbeats within the timeout Then the gateway closes the connection", async () => {
    let now = T0;
    const harness = await startHarness({ nowMs: () => now, heartbeatTimeoutMs: 25 });
    try {
      const c = await authed(harness, { userId: "u-alice", username: "alice" });

      now += 100;

      expect(await c.next()).toEqual({
        type: "error",
        payload: { code: "INVALID_SESSION", message: "Heartbeat timeout." }
      });
      expect(await c.closed).toBe(1008);
    } finally {
      await harness.stop();
    }
  });
});
