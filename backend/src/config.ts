import type { OverflowPolicy } from "./realtime/changeFeed";
import { resolvePostgresSettingsFromEnv, type PostgresSettings } from "./repositories/postgresCore";

export type ChatConfig = Readonly<{
  port: number;
  jwtSecret: string | null;
  postgres: PostgresSettings | null;
  requireDatabase: boolean;
  dataFilePath: string | null;
  defaultGroup: Readonly<{
    name: string;
    description: string;
    adminUserId?: string;
    adminUsername?: string;
  }>;
  maxMessageLength: number;
  feedBufferSize: number;
  feedOverflowPolicy: OverflowPolicy;
  corsAllowedOrigins: string;
}>;

const DEFAULT_CORS_ORIGINS = "http://localhost,http://127.0.0.1";

function trimmed(value: string | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const t = value.trim();
  return t === "" ? undefined : t;
}

function positiveInt(raw: string | undefined, fallback: number, key: string): number {
  const value = trimmed(raw);
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${key} must be a positive integer.`);
  }
  return n;
}

/** Reads every setting the service needs from the environment; throws on malformed values. */
export function resolveChatConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ChatConfig {
  const overflowRaw = trimmed(env.FEED_OVERFLOW_POLICY) ?? "drop_oldest";
  if (overflowRaw !== "drop_oldest" && overflowRaw !== "disconnect") {
    throw new Error("FEED_OVERFLOW_POLICY must be drop_oldest or disconnect.");
  }

  const adminUserId = trimmed(env.ADMIN_USER_ID);
  const adminUsername = trimmed(env.ADMIN_USERNAME);

  return {
    port: positiveInt(env.PORT, 3000, "PORT"),
    jwtSecret: trimmed(env.JWT_SECRET) ?? null,
    postgres: resolvePostgresSettingsFromEnv(env),
    requireDatabase: env.REQUIRE_DATABASE === "true",
    dataFilePath: trimmed(env.CHAT_DATA_FILE) ?? null,
    defaultGroup: {
      name: trimmed(env.DEFAULT_GROUP_NAME) ?? "General",
      description: trimmed(env.DEFAULT_GROUP_DESCRIPTION) ?? "Everyone is a member of this group.",
      ...(adminUserId ? { adminUserId } : {}),
      ...(adminUsername ? { adminUsername } : {})
    },
    maxMessageLength: positiveInt(env.MAX_MESSAGE_LENGTH, 4000, "MAX_MESSAGE_LENGTH"),
    feedBufferSize: positiveInt(env.FEED_BUFFER_SIZE, 256, "FEED_BUFFER_SIZE"),
    feedOverflowPolicy: overflowRaw,
    corsAllowedOrigins: trimmed(env.CORS_ALLOWED_ORIGINS) ?? DEFAULT_CORS_ORIGINS
  };
}
