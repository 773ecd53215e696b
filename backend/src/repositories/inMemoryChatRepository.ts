import fs from "node:fs";
import path from "node:path";

import {
  compareNewestFirst,
  compareOldestFirst,
  type ChatGroup,
  type ChatMessage,
  type Membership,
  type ReadReceipt
} from "../services/chatTypes";
import {
  CONSTRAINTS,
  StorageError,
  type ChatRepository,
  type ChatStore,
  type GroupWithMemberCount
} from "./chatRepository";

type InMemoryChatRepoOptions = Readonly<{
  // When set, committed state is written to this JSON file and reloaded on start.
  persistenceFilePath?: string;
}>;

type State = {
  groups: Map<string, ChatGroup>;
  members: Map<string, Membership>;
  messages: Map<string, ChatMessage>;
  receipts: Map<string, ReadReceipt>;
};

function pairKey(a: string, b: string): string {
  return `${a}::${b}`;
}

function isNullableNumber(value: unknown): boolean {
  return value === null || typeof value === "number";
}

function isGroupLike(value: unknown): value is ChatGroup {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.name === "string" &&
    typeof v.description === "string" &&
    typeof v.isDefault === "boolean" &&
    typeof v.isPublic === "boolean" &&
    (v.inviteCode === null || typeof v.inviteCode === "string") &&
    typeof v.createdBy === "string" &&
    typeof v.createdAtMs === "number" &&
    typeof v.updatedAtMs === "number" &&
    isNullableNumber(v.archivedAtMs)
  );
}

function isMembershipLike(value: unknown): value is Membership {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.groupId === "string" &&
    typeof v.userId === "string" &&
    typeof v.username === "string" &&
    (v.role === "admin" || v.role === "member") &&
    typeof v.joinedAtMs === "number"
  );
}

function isMessageLike(value: unknown): value is ChatMessage {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.groupId === "string" &&
    (v.senderId === null || typeof v.senderId === "string") &&
    (v.senderUsername === null || typeof v.senderUsername === "string") &&
    typeof v.content === "string" &&
    (v.messageType === "text" || v.messageType === "system" || v.messageType === "admin_announcement") &&
    (v.replyToId === null || typeof v.replyToId === "string") &&
    typeof v.metadata === "object" &&
    v.metadata !== null &&
    typeof v.isEdited === "boolean" &&
    isNullableNumber(v.editedAtMs) &&
    typeof v.isDeleted === "boolean" &&
    typeof v.createdAtMs === "number" &&
    typeof v.updatedAtMs === "number"
  );
}

function isReceiptLike(value: unknown): value is ReadReceipt {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.messageId === "string" &&
    typeof v.userId === "string" &&
    typeof v.readAtMs === "number"
  );
}

/**
 * In-process repository. Transactions run one at a time through a queue and roll
 * back to a snapshot on failure, which gives the same guarantees the unique and
 * foreign-key constraints give in PostgreSQL.
 */
export function createInMemoryChatRepository(options: InMemoryChatRepoOptions = {}): ChatRepository {
  const persistenceFilePath = options.persistenceFilePath;
  let state: State = {
    groups: new Map(),
    members: new Map(),
    messages: new Map(),
    receipts: new Map()
  };
  let dirty = false;
  let tail: Promise<void> = Promise.resolve();

  function snapshot(): State {
    return {
      groups: new Map(state.groups),
      members: new Map(state.members),
      messages: new Map(state.messages),
      receipts: new Map(state.receipts)
    };
  }

  function load(): void {
    if (!persistenceFilePath) return;
    if (!fs.existsSync(persistenceFilePath)) return;
    const raw = fs.readFileSync(persistenceFilePath, "utf8");
    if (!raw.trim()) return;
    const parsed = JSON.parse(raw) as {
      version?: unknown;
      groups?: unknown;
      members?: unknown;
      messages?: unknown;
      receipts?: unknown;
    };
    if (parsed.version !== 1) {
      throw new Error("Invalid chat store format.");
    }
    for (const row of Array.isArray(parsed.groups) ? parsed.groups : []) {
      if (isGroupLike(row)) state.groups.set(row.id, row);
    }
    for (const row of Array.isArray(parsed.members) ? parsed.members : []) {
      if (isMembershipLike(row)) state.members.set(pairKey(row.groupId, row.userId), row);
    }
    for (const row of Array.isArray(parsed.messages) ? parsed.messages : []) {
      if (isMessageLike(row)) state.messages.set(row.id, row);
    }
    for (const row of Array.isArray(parsed.receipts) ? parsed.receipts : []) {
      if (isReceiptLike(row)) state.receipts.set(pairKey(row.messageId, row.userId), row);
    }
  }

  function persist(): void {
    if (!persistenceFilePath) return;
    fs.mkdirSync(path.dirname(persistenceFilePath), { recursive: true });
    const payload = {
      version: 1,
      groups: Array.from(state.groups.values()),
      members: Array.from(state.members.values()),
      messages: Array.from(state.messages.values()),
      receipts: Array.from(state.receipts.values())
    };
    fs.writeFileSync(persistenceFilePath, JSON.stringify(payload), "utf8");
  }

  function requireGroup(groupId: string, constraint: string): void {
    if (!state.groups.has(groupId)) {
      throw new StorageError("foreign_key_violation", `Group ${groupId} does not exist.`, constraint);
    }
  }

  function putGroup(group: ChatGroup): void {
    if (state.groups.has(group.id)) {
      throw new StorageError("unique_violation", "Duplicate group id.", "chat_groups_pkey");
    }
    if (group.isDefault && !group.isPublic) {
      throw new StorageError("check_violation", "The default group must be public.", CONSTRAINTS.defaultIsPublic);
    }
    for (const existing of state.groups.values()) {
      if (group.isDefault && existing.isDefault) {
        throw new StorageError("unique_violation", "A default group already exists.", CONSTRAINTS.singleDefaultGroup);
      }
      if (group.inviteCode !== null && existing.inviteCode === group.inviteCode) {
        throw new StorageError("unique_violation", "Duplicate invite code.", CONSTRAINTS.inviteCode);
      }
    }
    state.groups.set(group.id, group);
    dirty = true;
  }

  function putMember(member: Membership): void {
    requireGroup(member.groupId, CONSTRAINTS.memberGroup);
    const key = pairKey(member.groupId, member.userId);
    if (state.members.has(key)) {
      throw new StorageError("unique_violation", "Membership already exists.", CONSTRAINTS.membershipPair);
    }
    state.members.set(key, member);
    dirty = true;
  }

  function findDefault(): ChatGroup | null {
    for (const group of state.groups.values()) {
      if (group.isDefault) return group;
    }
    return null;
  }

  function memberCount(groupId: string): number {
    let count = 0;
    for (const member of state.members.values()) {
      if (member.groupId === groupId) count += 1;
    }
    return count;
  }

  const store: ChatStore = {
    async insertGroup(group) {
      putGroup(group);
    },

    async insertDefaultGroupIfAbsent(group) {
      const existing = findDefault();
      if (existing) return { group: existing, created: false };
      putGroup(group);
      return { group, created: true };
    },

    async getGroup(groupId) {
      return state.groups.get(groupId) ?? null;
    },

    async getDefaultGroup() {
      return findDefault();
    },

    async findGroupByInviteCode(inviteCode) {
      for (const group of state.groups.values()) {
        if (group.inviteCode === inviteCode) return group;
      }
      return null;
    },

    async updateGroup(groupId, patch) {
      const existing = state.groups.get(groupId);
      if (!existing) return null;
      if (patch.inviteCode !== undefined && patch.inviteCode !== null) {
        for (const other of state.groups.values()) {
          if (other.id !== groupId && other.inviteCode === patch.inviteCode) {
            throw new StorageError("unique_violation", "Duplicate invite code.", CONSTRAINTS.inviteCode);
          }
        }
      }
      const next: ChatGroup = {
        ...existing,
        name: patch.name ?? existing.name,
        description: patch.description ?? existing.description,
        inviteCode: patch.inviteCode !== undefined ? patch.inviteCode : existing.inviteCode,
        archivedAtMs: patch.archivedAtMs !== undefined ? patch.archivedAtMs : existing.archivedAtMs,
        updatedAtMs: patch.updatedAtMs
      };
      state.groups.set(groupId, next);
      dirty = true;
      return next;
    },

    async listGroupsForUser(userId) {
      const rows: GroupWithMemberCount[] = [];
      for (const group of state.groups.values()) {
        const membership = state.members.get(pairKey(group.id, userId));
        if (!group.isDefault && !membership) continue;
        rows.push({ group, memberCount: memberCount(group.id), viewerRole: membership?.role ?? null });
      }
      return rows.sort((a, b) => compareOldestFirst(a.group, b.group));
    },

    async countDefaultGroups() {
      let count = 0;
      for (const group of state.groups.values()) {
        if (group.isDefault) count += 1;
      }
      return count;
    },

    async insertMember(member) {
      putMember(member);
    },

    async insertMemberIfAbsent(member) {
      const existing = state.members.get(pairKey(member.groupId, member.userId));
      if (existing) return { member: existing, created: false };
      putMember(member);
      return { member, created: true };
    },

    async getMembership(groupId, userId) {
      return state.members.get(pairKey(groupId, userId)) ?? null;
    },

    async deleteMembership(groupId, userId) {
      const key = pairKey(groupId, userId);
      const existing = state.members.get(key);
      if (!existing) return null;
      state.members.delete(key);
      dirty = true;
      return existing;
    },

    async updateMemberRole(groupId, userId, role) {
      const key = pairKey(groupId, userId);
      const existing = state.members.get(key);
      if (!existing) return null;
      const next: Membership = { ...existing, role };
      state.members.set(key, next);
      dirty = true;
      return next;
    },

    async updateMemberUsername(groupId, userId, username) {
      const key = pairKey(groupId, userId);
      const existing = state.members.get(key);
      if (!existing) return null;
      const next: Membership = { ...existing, username };
      state.members.set(key, next);
      dirty = true;
      return next;
    },

    async listMembers(groupId) {
      return Array.from(state.members.values())
        .filter((m) => m.groupId === groupId)
        .sort((a, b) => (a.joinedAtMs !== b.joinedAtMs ? a.joinedAtMs - b.joinedAtMs : a.id < b.id ? -1 : 1));
    },

    async insertMessage(message) {
      if (state.messages.has(message.id)) {
        throw new StorageError("unique_violation", "Duplicate message id.", "messages_pkey");
      }
      requireGroup(message.groupId, CONSTRAINTS.messageGroup);
      if (message.replyToId !== null && !state.messages.has(message.replyToId)) {
        throw new StorageError("foreign_key_violation", "Reply target does not exist.", CONSTRAINTS.messageReplyTo);
      }
      state.messages.set(message.id, message);
      dirty = true;
    },

    async getMessage(messageId) {
      return state.messages.get(messageId) ?? null;
    },

    async latestMessageCreatedAtMs(groupId) {
      let latest: number | null = null;
      for (const message of state.messages.values()) {
        if (message.groupId !== groupId) continue;
        if (latest === null || message.createdAtMs > latest) latest = message.createdAtMs;
      }
      return latest;
    },

    async updateMessage(messageId, patch) {
      const existing = state.messages.get(messageId);
      if (!existing) return null;
      const next: ChatMessage = {
        ...existing,
        content: patch.content ?? existing.content,
        isEdited: patch.isEdited ?? existing.isEdited,
        editedAtMs: patch.editedAtMs !== undefined ? patch.editedAtMs : existing.editedAtMs,
        isDeleted: patch.isDeleted ?? existing.isDeleted,
        updatedAtMs: patch.updatedAtMs
      };
      state.messages.set(messageId, next);
      dirty = true;
      return next;
    },

    async listMessagesPage(query) {
      const before = query.before;
      return Array.from(state.messages.values())
        .filter((m) => {
          if (m.groupId !== query.groupId) return false;
          if (!before) return true;
          if (m.createdAtMs !== before.createdAtMs) return m.createdAtMs < before.createdAtMs;
          return typeof before.id === "string" && m.id < before.id;
        })
        .sort(compareNewestFirst)
        .slice(0, query.limit);
    },

    async listReplies(messageId) {
      return Array.from(state.messages.values())
        .filter((m) => m.replyToId === messageId)
        .sort(compareOldestFirst);
    },

    async insertReceiptIfAbsent(receipt) {
      if (!state.messages.has(receipt.messageId)) {
        throw new StorageError("foreign_key_violation", "Message does not exist.", CONSTRAINTS.receiptMessage);
      }
      const key = pairKey(receipt.messageId, receipt.userId);
      const existing = state.receipts.get(key);
      if (existing) return { receipt: existing, created: false };
      state.receipts.set(key, receipt);
      dirty = true;
      return { receipt, created: true };
    },

    async countUnread(groupId, userId, sinceMs) {
      let count = 0;
      for (const message of state.messages.values()) {
        if (message.groupId !== groupId || message.createdAtMs < sinceMs) continue;
        if (!state.receipts.has(pairKey(message.id, userId))) count += 1;
      }
      return count;
    }
  };

  function transaction<T>(work: (tx: ChatStore) => Promise<T>): Promise<T> {
    const run = tail.then(async () => {
      const before = snapshot();
      dirty = false;
      try {
        const result = await work(store);
        if (dirty) persist();
        return result;
      } catch (e) {
        state = before;
        throw e;
      }
    });
    tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  load();

  return {
    insertGroup: (group) => transaction((tx) => tx.insertGroup(group)),
    insertDefaultGroupIfAbsent: (group) => transaction((tx) => tx.insertDefaultGroupIfAbsent(group)),
    getGroup: (groupId) => transaction((tx) => tx.getGroup(groupId)),
    getDefaultGroup: () => transaction((tx) => tx.getDefaultGroup()),
    findGroupByInviteCode: (code) => transaction((tx) => tx.findGroupByInviteCode(code)),
    updateGroup: (groupId, patch) => transaction((tx) => tx.updateGroup(groupId, patch)),
    listGroupsForUser: (userId) => transaction((tx) => tx.listGroupsForUser(userId)),
    countDefaultGroups: () => transaction((tx) => tx.countDefaultGroups()),
    insertMember: (member) => transaction((tx) => tx.insertMember(member)),
    insertMemberIfAbsent: (member) => transaction((tx) => tx.insertMemberIfAbsent(member)),
    getMembership: (groupId, userId) => transaction((tx) => tx.getMembership(groupId, userId)),
    deleteMembership: (groupId, userId) => transaction((tx) => tx.deleteMembership(groupId, userId)),
    updateMemberRole: (groupId, userId, role) => transaction((tx) => tx.updateMemberRole(groupId, userId, role)),
    updateMemberUsername: (groupId, userId, username) =>
      transaction((tx) => tx.updateMemberUsername(groupId, userId, username)),
    listMembers: (groupId) => transaction((tx) => tx.listMembers(groupId)),
    insertMessage: (message) => transaction((tx) => tx.insertMessage(message)),
    getMessage: (messageId) => transaction((tx) => tx.getMessage(messageId)),
    latestMessageCreatedAtMs: (groupId) => transaction((tx) => tx.latestMessageCreatedAtMs(groupId)),
    updateMessage: (messageId, patch) => transaction((tx) => tx.updateMessage(messageId, patch)),
    listMessagesPage: (query) => transaction((tx) => tx.listMessagesPage(query)),
    listReplies: (messageId) => transaction((tx) => tx.listReplies(messageId)),
    insertReceiptIfAbsent: (receipt) => transaction((tx) => tx.insertReceiptIfAbsent(receipt)),
    countUnread: (groupId, userId, sinceMs) => transaction((tx) => tx.countUnread(groupId, userId, sinceMs)),
    transaction,
    async close(): Promise<void> {
      await tail;
    }
  };
}
