import { Pool } from "pg";

export type PostgresSettings = Readonly<{
  connectionString: string;
  ssl?: boolean;
}>;

function asBoolean(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === "true";
}

export function resolvePostgresSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): PostgresSettings | null {
  const dbUrl = env.DATABASE_URL;
  if (typeof dbUrl !== "string" || dbUrl.trim() === "") {
    return null;
  }
  return {
    connectionString: dbUrl.trim(),
    ssl: asBoolean(env.DATABASE_SSL)
  };
}

export function createPostgresPool(settings: PostgresSettings): Pool {
  return new Pool({
    connectionString: settings.connectionString,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    ssl: settings.ssl === true ? { rejectUnauthorized: false } : undefined
  });
}

// Concurrent first boots may race on CREATE ... IF NOT EXISTS; the advisory lock serializes them.
const SCHEMA_LOCK_KEY = 7_340_221;

export async function ensurePostgresSchema(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("SELECT pg_advisory_lock($1)", [SCHEMA_LOCK_KEY]);

    await client.query(`
      CREATE TABLE IF NOT EXISTS chat_groups (
        id UUID PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        is_default BOOLEAN NOT NULL DEFAULT false,
        is_public BOOLEAN NOT NULL DEFAULT false,
        invite_code VARCHAR(64),
        created_by TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        archived_at TIMESTAMPTZ,
        CONSTRAINT chat_groups_invite_code_key UNIQUE (invite_code),
        CONSTRAINT ck_chat_groups_default_public CHECK (NOT is_default OR is_public),
        CONSTRAINT ck_chat_groups_default_no_invite CHECK (NOT is_default OR invite_code IS NULL)
      )
    `);
    await client.query(
      "CREATE UNIQUE INDEX IF NOT EXISTS uq_chat_groups_single_default ON chat_groups(is_default) WHERE is_default"
    );

    await client.query(`
      CREATE TABLE IF NOT EXISTS group_members (
        id UUID PRIMARY KEY,
        group_id UUID NOT NULL,
        user_id TEXT NOT NULL,
        username VARCHAR(255) NOT NULL DEFAULT '',
        role VARCHAR(20) NOT NULL DEFAULT 'member',
        joined_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT group_members_group_id_fkey FOREIGN KEY (group_id) REFERENCES chat_groups(id),
        CONSTRAINT group_members_group_id_user_id_key UNIQUE (group_id, user_id),
        CONSTRAINT ck_group_members_role CHECK (role IN ('admin', 'member'))
      )
    `);
    await client.query("CREATE INDEX IF NOT EXISTS idx_group_members_group_user ON group_members(group_id, user_id)");
    await client.query("CREATE INDEX IF NOT EXISTS idx_group_members_user ON group_members(user_id)");

    await client.query(`
      CREATE TABLE IF NOT EXISTS messages (
        id UUID PRIMARY KEY,
        group_id UUID NOT NULL,
        sender_id TEXT,
        sender_username VARCHAR(255),
        content TEXT NOT NULL,
        message_type VARCHAR(30) NOT NULL DEFAULT 'text',
        reply_to_id UUID,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        is_edited BOOLEAN NOT NULL DEFAULT false,
        edited_at TIMESTAMPTZ,
        is_deleted BOOLEAN NOT NULL DEFAULT false,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT messages_group_id_fkey FOREIGN KEY (group_id) REFERENCES chat_groups(id),
        CONSTRAINT messages_reply_to_id_fkey FOREIGN KEY (reply_to_id) REFERENCES messages(id) ON DELETE SET NULL,
        CONSTRAINT ck_messages_type CHECK (message_type IN ('text', 'system', 'admin_announcement')),
        CONSTRAINT ck_messages_system_sender CHECK ((sender_id IS NULL) = (sender_username IS NULL))
      )
    `);
    await client.query("CREATE INDEX IF NOT EXISTS idx_messages_group_created ON messages(group_id, created_at DESC)");
    await client.query("CREATE INDEX IF NOT EXISTS idx_messages_sender ON messages(sender_id)");
    await client.query(
      "CREATE INDEX IF NOT EXISTS idx_messages_reply_to ON messages(reply_to_id) WHERE reply_to_id IS NOT NULL"
    );

    await client.query(`
      CREATE TABLE IF NOT EXISTS message_read_status (
        id UUID PRIMARY KEY,
        message_id UUID NOT NULL,
        user_id TEXT NOT NULL,
        read_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT message_read_status_message_id_fkey FOREIGN KEY (message_id) REFERENCES messages(id) ON DELETE CASCADE,
        CONSTRAINT message_read_status_message_id_user_id_key UNIQUE (message_id, user_id)
      )
    `);
  } finally {
    try {
      await client.query("SELECT pg_advisory_unlock($1)", [SCHEMA_LOCK_KEY]);
    } finally {
      client.release();
    }
  }
}
