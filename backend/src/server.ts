import http from "node:http";
import path from "node:path";

import { WebSocketServer } from "ws";

import { createIdentityVerifier } from "./auth/identityToken";
import { resolveChatConfigFromEnv } from "./config";
import { createChatApp } from "./http/app";
import { createChangeFeed } from "./realtime/changeFeed";
import { createWebsocketGateway } from "./realtime/websocketGateway";
import type { ChatRepository } from "./repositories/chatRepository";
import { createInMemoryChatRepository } from "./repositories/inMemoryChatRepository";
import { createPostgresChatRepository } from "./repositories/postgresChatRepository";
import { createPostgresPool, ensurePostgresSchema } from "./repositories/postgresCore";
import { createAccessGuard } from "./services/accessGuard";
import { createGroupRegistry } from "./services/groupRegistry";
import { createMembershipManager } from "./services/membershipManager";
import { createMessageStore } from "./services/messageStore";
import { createReadReceiptTracker } from "./services/readReceiptTracker";

async function main(): Promise<void> {
  const config = resolveChatConfigFromEnv();
  if (!config.jwtSecret) {
    throw new Error("Missing JWT_SECRET environment variable.");
  }
  if (config.requireDatabase && !config.postgres) {
    throw new Error("REQUIRE_DATABASE=true but no PostgreSQL URL was found. Set DATABASE_URL.");
  }

  let repo: ChatRepository;
  if (config.postgres) {
    const pool = createPostgresPool(config.postgres);
    await ensurePostgresSchema(pool);
    repo = createPostgresChatRepository(pool);
    console.log("[GroupChat] Persistence mode: PostgreSQL (DATABASE_URL)");
  } else {
    const dataFilePath = config.dataFilePath ?? path.resolve(process.cwd(), "backend/.data/chat.json");
    repo = createInMemoryChatRepository({ persistenceFilePath: dataFilePath });
    console.log(`[GroupChat] Persistence mode: local file storage (${dataFilePath})`);
  }

  const identity = createIdentityVerifier({ jwtSecret: config.jwtSecret });
  const guard = createAccessGuard({ store: repo });
  const feed = createChangeFeed({
    bufferSize: config.feedBufferSize,
    overflowPolicy: config.feedOverflowPolicy
  });
  const messages = createMessageStore({ repo, guard, feed, maxContentLength: config.maxMessageLength });
  const groups = createGroupRegistry({
    repo,
    guard,
    defaultGroup: config.defaultGroup,
    systemMessages: messages
  });
  const memberships = createMembershipManager({ repo, guard, systemMessages: messages });
  const receipts = createReadReceiptTracker({ repo, guard });

  const defaultGroup = await groups.ensureDefaultGroup();
  if (!defaultGroup.ok) {
    throw new Error(`Could not ensure the default group: ${defaultGroup.error.message}`);
  }
  console.log(`[GroupChat] Default group: ${defaultGroup.value.id} (${defaultGroup.value.name})`);

  const app = createChatApp({
    identity,
    groups,
    memberships,
    messages,
    receipts,
    corsAllowedOrigins: config.corsAllowedOrigins
  });

  const server = http.createServer(app);
  const wss = new WebSocketServer({ server, path: "/ws" });
  const gateway = createWebsocketGateway({
    wss,
    identity,
    guard,
    feed,
    feedBufferSize: config.feedBufferSize,
    feedOverflowPolicy: config.feedOverflowPolicy
  });

  server.listen(config.port, () => {
    console.log(`[GroupChat] Listening on http://localhost:${config.port}`);
  });

  const shutdown = async (): Promise<void> => {
    await gateway.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await feed.drain();
    feed.close();
    await repo.close();
  };

  const onSignal = (): void => {
    shutdown()
      .catch((e: unknown) => {
        const message = e instanceof Error ? e.message : String(e);
        console.error(`[GroupChat] Shutdown failed: ${message}`);
      })
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((e: unknown) => {
  const message = e instanceof Error ? e.message : String(e);
  console.error(`[GroupChat] Startup failed: ${message}`);
  process.exit(1);
});
