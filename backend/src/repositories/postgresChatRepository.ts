import type { Pool } from "pg";

import type { ChatGroup, ChatMessage, Membership, ReadReceipt } from "../services/chatTypes";
import {
  StorageError,
  type ChatRepository,
  type ChatStore,
  type GroupWithMemberCount,
  type MessagePatch
} from "./chatRepository";

type Row = Record<string, unknown>;
type Run = (text: string, values?: ReadonlyArray<unknown>) => Promise<ReadonlyArray<Row>>;

// Ids are UUID columns; anything else cannot match a row and would fail the cast with 22P02.
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function asNullableString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function asMs(value: unknown): number {
  if (value instanceof Date) return value.getTime();
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return new Date(value).getTime();
  return Number.NaN;
}

function asNullableMs(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const ms = asMs(value);
  return Number.isFinite(ms) ? ms : null;
}

function toGroup(row: Row): ChatGroup {
  return {
    id: asString(row.id),
    name: asString(row.name),
    description: asString(row.description),
    isDefault: row.is_default === true,
    isPublic: row.is_public === true,
    inviteCode: asNullableString(row.invite_code),
    createdBy: asString(row.created_by),
    createdAtMs: asMs(row.created_at),
    updatedAtMs: asMs(row.updated_at),
    archivedAtMs: asNullableMs(row.archived_at)
  };
}

function toMembership(row: Row): Membership {
  return {
    id: asString(row.id),
    groupId: asString(row.group_id),
    userId: asString(row.user_id),
    username: asString(row.username),
    role: row.role === "admin" ? "admin" : "member",
    joinedAtMs: asMs(row.joined_at)
  };
}

function toMessage(row: Row): ChatMessage {
  const type = row.message_type;
  const metadata = row.metadata;
  return {
    id: asString(row.id),
    groupId: asString(row.group_id),
    senderId: asNullableString(row.sender_id),
    senderUsername: asNullableString(row.sender_username),
    content: asString(row.content),
    messageType: type === "system" || type === "admin_announcement" ? type : "text",
    replyToId: asNullableString(row.reply_to_id),
    metadata: typeof metadata === "object" && metadata !== null && !Array.isArray(metadata) ? { ...metadata } : {},
    isEdited: row.is_edited === true,
    editedAtMs: asNullableMs(row.edited_at),
    isDeleted: row.is_deleted === true,
    createdAtMs: asMs(row.created_at),
    updatedAtMs: asMs(row.updated_at)
  };
}

function toReceipt(row: Row): ReadReceipt {
  return {
    id: asString(row.id),
    messageId: asString(row.message_id),
    userId: asString(row.user_id),
    readAtMs: asMs(row.read_at)
  };
}

function first<T>(rows: ReadonlyArray<Row>, map: (row: Row) => T): T | null {
  const row = rows[0];
  return row ? map(row) : null;
}

/** Maps a node-postgres error onto StorageError by SQLSTATE; anything else is returned unchanged. */
export function translatePostgresError(e: unknown): unknown {
  if (typeof e !== "object" || e === null) return e;
  const rawMessage: unknown = Reflect.get(e, "message");
  const rawConstraint: unknown = Reflect.get(e, "constraint");
  const message = typeof rawMessage === "string" ? rawMessage : "Storage constraint failed.";
  const constraint = typeof rawConstraint === "string" ? rawConstraint : undefined;
  switch (Reflect.get(e, "code")) {
    case "23505":
      return new StorageError("unique_violation", message, constraint);
    case "23503":
      return new StorageError("foreign_key_violation", message, constraint);
    case "23514":
      return new StorageError("check_violation", message, constraint);
    case "40001":
    case "40P01":
      return new StorageError("serialization_failure", message, constraint);
    default:
      return e;
  }
}

function createStore(run: Run): ChatStore {
  async function getGroup(groupId: string, forUpdate = false): Promise<ChatGroup | null> {
    if (!isUuid(groupId)) return null;
    const rows = await run(`SELECT * FROM chat_groups WHERE id = $1${forUpdate ? " FOR UPDATE" : ""}`, [groupId]);
    return first(rows, toGroup);
  }

  async function getDefaultGroup(): Promise<ChatGroup | null> {
    return first(await run("SELECT * FROM chat_groups WHERE is_default LIMIT 1"), toGroup);
  }

  async function getMembership(groupId: string, userId: string): Promise<Membership | null> {
    if (!isUuid(groupId)) return null;
    const rows = await run("SELECT * FROM group_members WHERE group_id = $1 AND user_id = $2", [groupId, userId]);
    return first(rows, toMembership);
  }

  async function insertGroupRow(group: ChatGroup, onConflictDefault: boolean): Promise<ReadonlyArray<Row>> {
    return run(
      `INSERT INTO chat_groups (
        id, name, description, is_default, is_public, invite_code, created_by, created_at, updated_at, archived_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      ${onConflictDefault ? "ON CONFLICT (is_default) WHERE is_default DO NOTHING" : ""}
      RETURNING *`,
      [
        group.id,
        group.name,
        group.description,
        group.isDefault,
        group.isPublic,
        group.inviteCode,
        group.createdBy,
        new Date(group.createdAtMs),
        new Date(group.updatedAtMs),
        group.archivedAtMs === null ? null : new Date(group.archivedAtMs)
      ]
    );
  }

  async function insertMemberRow(member: Membership, ignoreConflict: boolean): Promise<ReadonlyArray<Row>> {
    return run(
      `INSERT INTO group_members (id, group_id, user_id, username, role, joined_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       ${ignoreConflict ? "ON CONFLICT (group_id, user_id) DO NOTHING" : ""}
       RETURNING *`,
      [member.id, member.groupId, member.userId, member.username, member.role, new Date(member.joinedAtMs)]
    );
  }

  return {
    async insertGroup(group) {
      await insertGroupRow(group, false);
    },

    async insertDefaultGroupIfAbsent(group) {
      const inserted = first(await insertGroupRow(group, true), toGroup);
      if (inserted) return { group: inserted, created: true };
      const existing = await getDefaultGroup();
      if (!existing) {
        throw new StorageError("serialization_failure", "Default group vanished during insert.");
      }
      return { group: existing, created: false };
    },

    getGroup: (groupId, options) => getGroup(groupId, options?.forUpdate === true),
    getDefaultGroup,

    async findGroupByInviteCode(inviteCode) {
      return first(await run("SELECT * FROM chat_groups WHERE invite_code = $1", [inviteCode]), toGroup);
    },

    async updateGroup(groupId, patch) {
      if (!isUuid(groupId)) return null;
      const sets: string[] = [];
      const values: unknown[] = [groupId];
      const set = (column: string, value: unknown): void => {
        values.push(value);
        sets.push(`${column} = $${values.length}`);
      };
      if (patch.name !== undefined) set("name", patch.name);
      if (patch.description !== undefined) set("description", patch.description);
      if (patch.inviteCode !== undefined) set("invite_code", patch.inviteCode);
      if (patch.archivedAtMs !== undefined) {
        set("archived_at", patch.archivedAtMs === null ? null : new Date(patch.archivedAtMs));
      }
      set("updated_at", new Date(patch.updatedAtMs));
      const rows = await run(`UPDATE chat_groups SET ${sets.join(", ")} WHERE id = $1 RETURNING *`, values);
      return first(rows, toGroup);
    },

    async listGroupsForUser(userId) {
      const rows = await run(
        `SELECT g.*,
                (SELECT COUNT(*) FROM group_members c WHERE c.group_id = g.id) AS member_count,
                (SELECT v.role FROM group_members v WHERE v.group_id = g.id AND v.user_id = $1) AS viewer_role
         FROM chat_groups g
         WHERE g.is_default
            OR EXISTS (SELECT 1 FROM group_members m WHERE m.group_id = g.id AND m.user_id = $1)
         ORDER BY g.created_at ASC, g.id ASC`,
        [userId]
      );
      return rows.map(
        (row): GroupWithMemberCount => ({
          group: toGroup(row),
          memberCount: Number(row.member_count),
          viewerRole: row.viewer_role === "admin" || row.viewer_role === "member" ? row.viewer_role : null
        })
      );
    },

    async countDefaultGroups() {
      const rows = await run("SELECT COUNT(*) AS total FROM chat_groups WHERE is_default");
      return Number(rows[0]?.total ?? 0);
    },

    async insertMember(member) {
      await insertMemberRow(member, false);
    },

    async insertMemberIfAbsent(member) {
      const inserted = first(await insertMemberRow(member, true), toMembership);
      if (inserted) return { member: inserted, created: true };
      const existing = await getMembership(member.groupId, member.userId);
      if (!existing) {
        throw new StorageError("serialization_failure", "Membership vanished during insert.");
      }
      return { member: existing, created: false };
    },

    getMembership,

    async deleteMembership(groupId, userId) {
      if (!isUuid(groupId)) return null;
      const rows = await run("DELETE FROM group_members WHERE group_id = $1 AND user_id = $2 RETURNING *", [
        groupId,
        userId
      ]);
      return first(rows, toMembership);
    },

    async updateMemberRole(groupId, userId, role) {
      if (!isUuid(groupId)) return null;
      const rows = await run("UPDATE group_members SET role = $3 WHERE group_id = $1 AND user_id = $2 RETURNING *", [
        groupId,
        userId,
        role
      ]);
      return first(rows, toMembership);
    },

    async updateMemberUsername(groupId, userId, username) {
      if (!isUuid(groupId)) return null;
      const rows = await run(
        "UPDATE group_members SET username = $3 WHERE group_id = $1 AND user_id = $2 RETURNING *",
        [groupId, userId, username]
      );
      return first(rows, toMembership);
    },

    async listMembers(groupId) {
      if (!isUuid(groupId)) return [];
      const rows = await run("SELECT * FROM group_members WHERE group_id = $1 ORDER BY joined_at ASC, id ASC", [groupId]);
      return rows.map(toMembership);
    },

    async insertMessage(message) {
      await run(
        `INSERT INTO messages (
          id, group_id, sender_id, sender_username, content, message_type, reply_to_id, metadata,
          is_edited, edited_at, is_deleted, created_at, updated_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10, $11, $12, $13)`,
        [
          message.id,
          message.groupId,
          message.senderId,
          message.senderUsername,
          message.content,
          message.messageType,
          message.replyToId,
          JSON.stringify(message.metadata),
          message.isEdited,
          message.editedAtMs === null ? null : new Date(message.editedAtMs),
          message.isDeleted,
          new Date(message.createdAtMs),
          new Date(message.updatedAtMs)
        ]
      );
    },

    async getMessage(messageId, options) {
      if (!isUuid(messageId)) return null;
      const lock = options?.forUpdate === true ? " FOR UPDATE" : "";
      return first(await run(`SELECT * FROM messages WHERE id = $1${lock}`, [messageId]), toMessage);
    },

    async latestMessageCreatedAtMs(groupId) {
      if (!isUuid(groupId)) return null;
      const rows = await run("SELECT MAX(created_at) AS latest FROM messages WHERE group_id = $1", [groupId]);
      return asNullableMs(rows[0]?.latest);
    },

    async updateMessage(messageId, patch: MessagePatch) {
      if (!isUuid(messageId)) return null;
      const sets: string[] = [];
      const values: unknown[] = [messageId];
      const set = (column: string, value: unknown): void => {
        values.push(value);
        sets.push(`${column} = $${values.length}`);
      };
      if (patch.content !== undefined) set("content", patch.content);
      if (patch.isEdited !== undefined) set("is_edited", patch.isEdited);
      if (patch.editedAtMs !== undefined) set("edited_at", patch.editedAtMs === null ? null : new Date(patch.editedAtMs));
      if (patch.isDeleted !== undefined) set("is_deleted", patch.isDeleted);
      set("updated_at", new Date(patch.updatedAtMs));
      const rows = await run(`UPDATE messages SET ${sets.join(", ")} WHERE id = $1 RETURNING *`, values);
      return first(rows, toMessage);
    },

    async listMessagesPage(query) {
      if (!isUuid(query.groupId)) return [];
      const values: unknown[] = [query.groupId];
      let cursorClause = "";
      if (query.before) {
        values.push(new Date(query.before.createdAtMs));
        if (typeof query.before.id === "string") {
          values.push(query.before.id);
          // uuid and its text form sort alike, so a cursor id that is not a uuid still pages.
          cursorClause = "AND (created_at, id::text) < ($2, $3)";
        } else {
          cursorClause = "AND created_at < $2";
        }
      }
      values.push(query.limit);
      const rows = await run(
        `SELECT * FROM messages
         WHERE group_id = $1 ${cursorClause}
         ORDER BY created_at DESC, id DESC
         LIMIT $${values.length}`,
        values
      );
      return rows.map(toMessage);
    },

    async listReplies(messageId) {
      if (!isUuid(messageId)) return [];
      const rows = await run("SELECT * FROM messages WHERE reply_to_id = $1 ORDER BY created_at ASC, id ASC", [messageId]);
      return rows.map(toMessage);
    },

    async insertReceiptIfAbsent(receipt) {
      const inserted = first(
        await run(
          `INSERT INTO message_read_status (id, message_id, user_id, read_at)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (message_id, user_id) DO NOTHING
           RETURNING *`,
          [receipt.id, receipt.messageId, receipt.userId, new Date(receipt.readAtMs)]
        ),
        toReceipt
      );
      if (inserted) return { receipt: inserted, created: true };
      const existing = first(
        await run("SELECT * FROM message_read_status WHERE message_id = $1 AND user_id = $2", [
          receipt.messageId,
          receipt.userId
        ]),
        toReceipt
      );
      if (!existing) {
        throw new StorageError("serialization_failure", "Read receipt vanished during insert.");
      }
      return { receipt: existing, created: false };
    },

    async countUnread(groupId, userId, sinceMs) {
      if (!isUuid(groupId)) return 0;
      const rows = await run(
        `SELECT COUNT(*) AS unread
         FROM messages m
         WHERE m.group_id = $1
           AND m.created_at >= $3
           AND NOT EXISTS (
             SELECT 1 FROM message_read_status r WHERE r.message_id = m.id AND r.user_id = $2
           )`,
        [groupId, userId, new Date(sinceMs)]
      );
      return Number(rows[0]?.unread ?? 0);
    }
  };
}

type QueryFn = (text: string, values: unknown[]) => Promise<{ rows: Row[] }>;

/** The slice of a `pg` pool the repository needs; tests hand in a stand-in. */
export type PostgresConnection = Readonly<{
  query: QueryFn;
  connect(): Promise<Readonly<{ query: QueryFn; release(): void }>>;
  end(): Promise<void>;
}>;

function runnerFor(query: QueryFn): Run {
  return async (text, values) => {
    try {
      const result = await query(text, values ? [...values] : []);
      return result.rows;
    } catch (e) {
      throw translatePostgresError(e);
    }
  };
}

export function createPostgresChatRepository(pool: Pool): ChatRepository {
  return createPostgresChatRepositoryOn({
    query: (text, values) => pool.query(text, values),
    async connect() {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release()
      };
    },
    end: () => pool.end()
  });
}

export function createPostgresChatRepositoryOn(connection: PostgresConnection): ChatRepository {
  const store = createStore(runnerFor(connection.query));

  return {
    ...store,

    async transaction<T>(work: (tx: ChatStore) => Promise<T>): Promise<T> {
      const client = await connection.connect();
      try {
        await client.query("BEGIN", []);
        const result = await work(createStore(runnerFor(client.query)));
        await client.query("COMMIT", []);
        return result;
      } catch (e) {
        await client.query("ROLLBACK", []);
        throw translatePostgresError(e);
      } finally {
        client.release();
      }
    },

    async close(): Promise<void> {
      await connection.end();
    }
  };
}
