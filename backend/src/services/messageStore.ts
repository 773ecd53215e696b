import { randomUUID } from "node:crypto";

import type { ChangeFeed } from "../realtime/changeFeed";
import type { ChatRepository } from "../repositories/chatRepository";
import type { AccessGuard } from "./accessGuard";
import {
  SERVICE_CALLER,
  displayName,
  err,
  isMessageType,
  isNonEmptyString,
  ok,
  requireActingUser,
  type Caller,
  type ChatMessage,
  type MessageMetadata,
  type MessageType,
  type PageCursor,
  type Result,
  type SystemMessagePoster
} from "./chatTypes";
import { withStorageBoundary, type RetryPolicy } from "./storageBoundary";

export type SendMessageInput = Readonly<{
  groupId: string;
  content: unknown;
  type?: unknown;
  replyToId?: unknown;
  metadata?: unknown;
}>;

export type ListPageOptions = Readonly<{
  before?: PageCursor;
  limit?: number;
}>;

/** A page row with a preview of the message it replies to, when that is still in the group. */
export type ListedMessage = ChatMessage &
  Readonly<{
    replyToContent: string | null;
    replyToUsername: string | null;
  }>;

export type MessagePage = Readonly<{
  messages: ReadonlyArray<ListedMessage>;
  nextCursor: PageCursor | null;
  hasMore: boolean;
}>;

export type MessageStoreDeps = Readonly<{
  repo: ChatRepository;
  guard: AccessGuard;
  feed?: ChangeFeed;
  nowMs?: () => number;
  newId?: () => string;
  maxContentLength?: number;
  retry?: RetryPolicy;
  logger?: Pick<Console, "warn" | "error">;
}>;

export type MessageStore = SystemMessagePoster &
  Readonly<{
    send(caller: Caller, input: SendMessageInput): Promise<Result<ChatMessage>>;
    edit(caller: Caller, messageId: string, newContent: unknown): Promise<Result<ChatMessage>>;
    softDelete(caller: Caller, messageId: string): Promise<Result<ChatMessage>>;
    getMessage(caller: Caller, messageId: string): Promise<Result<ChatMessage>>;
    listPage(caller: Caller, groupId: string, options?: ListPageOptions): Promise<Result<MessagePage>>;
    getThread(caller: Caller, messageId: string): Promise<Result<ReadonlyArray<ChatMessage>>>;
  }>;

const DEFAULT_MAX_CONTENT_LENGTH = 4000;
const DEFAULT_PAGE_LIMIT = 50;
const MAX_PAGE_LIMIT = 200;
const DELETED_REPLY_PREVIEW = "[Message deleted]";

/**
 * Tombstone rendering. Deleted messages keep their row (and position) but their
 * content and metadata are withheld from viewers who are not group admins.
 */
export function renderForViewer(message: ChatMessage, privileged: boolean): ChatMessage {
  if (!message.isDeleted || privileged) return message;
  return { ...message, content: "", metadata: {} };
}

function withReplyPreview(message: ChatMessage, parent: ChatMessage | null, privileged: boolean): ListedMessage {
  if (!parent) return { ...message, replyToContent: null, replyToUsername: null };
  const shown = renderForViewer(parent, privileged);
  return {
    ...message,
    replyToContent: shown.isDeleted && !privileged ? DELETED_REPLY_PREVIEW : shown.content,
    replyToUsername: shown.senderUsername
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createMessageStore(deps: MessageStoreDeps): MessageStore {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const newId = deps.newId ?? (() => randomUUID());
  const maxContentLength = deps.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
  const logger = deps.logger ?? console;
  const { repo, guard } = deps;

  if (!Number.isInteger(maxContentLength) || maxContentLength <= 0) {
    throw new Error("messageStore requires a positive maxContentLength.");
  }

  // Commit-then-publish runs one at a time per group so the feed sees commit order.
  const groupQueues = new Map<string, Promise<void>>();

  function serializeForGroup<T>(groupId: string, work: () => Promise<T>): Promise<T> {
    const previous = groupQueues.get(groupId) ?? Promise.resolve();
    const run = previous.then(work);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    groupQueues.set(groupId, settled);
    void settled.then(() => {
      if (groupQueues.get(groupId) === settled) groupQueues.delete(groupId);
    });
    return run;
  }

  function validateContent(value: unknown): Result<string> {
    if (typeof value !== "string") return err("INVALID_INPUT", "Message content is required.");
    const trimmed = value.trim();
    if (trimmed === "") return err("INVALID_INPUT", "Message content is required.");
    if (trimmed.length > maxContentLength) {
      return err("INVALID_INPUT", "Message content is too long.", { maxLength: maxContentLength });
    }
    return ok(trimmed);
  }

  async function send(caller: Caller, input: SendMessageInput): Promise<Result<ChatMessage>> {
    if (typeof caller !== "object" || caller === null) return err("INVALID_SESSION", "Invalid caller.");
    if (typeof input !== "object" || input === null || !isNonEmptyString(input.groupId)) {
      return err("INVALID_INPUT", "A target group is required.");
    }
    const groupId = input.groupId.trim();

    let type: MessageType = "text";
    if (input.type !== undefined) {
      if (!isMessageType(input.type)) return err("INVALID_INPUT", "Invalid message type.");
      type = input.type;
    }
    const content = validateContent(input.content);
    if (!content.ok) return content;

    if (input.metadata !== undefined && input.metadata !== null && !isPlainObject(input.metadata)) {
      return err("INVALID_INPUT", "Message metadata must be an object.");
    }
    const metadata: MessageMetadata = isPlainObject(input.metadata) ? { ...input.metadata } : {};

    if (input.replyToId !== undefined && input.replyToId !== null && !isNonEmptyString(input.replyToId)) {
      return err("INVALID_INPUT", "Invalid reply target.");
    }
    const replyToId = isNonEmptyString(input.replyToId) ? input.replyToId.trim() : null;

    let sender: { userId: string; username: string } | null = null;
    if (caller.trust === "user") {
      const acting = requireActingUser(caller);
      if (!acting.ok) return err("INVALID_SESSION", "Invalid caller.");
      sender = acting.value;
    } else if (isNonEmptyString(caller.userId)) {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;
      sender = acting.value;
    }

    if (type === "system" && sender !== null) {
      if (caller.trust === "user") return err("NOT_AUTHORIZED", "System messages are authored by the service.");
      return err("INVALID_INPUT", "System messages have no sender.");
    }
    if (type === "text" && sender === null) {
      return err("INVALID_INPUT", "Text messages require a sender.");
    }

    return serializeForGroup(groupId, async () => {
      const result = await withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<ChatMessage>> => {
            const access = await guard.authorize(caller, groupId, "member", tx);
            if (!access.ok) return access;

            const group = await tx.getGroup(groupId, { forUpdate: true });
            if (!group) return err("NOT_FOUND", "Group not found.", { groupId });
            if (group.archivedAtMs !== null) return err("GROUP_ARCHIVED", "This group is archived.", { groupId });

            if (sender !== null && access.value.membership === null) {
              return err("NOT_A_MEMBER", "The sender is not a member of this group.", { groupId });
            }
            if (type === "admin_announcement" && sender !== null && access.value.membership?.role !== "admin") {
              return err("NOT_AUTHORIZED", "Only group admins can post announcements.", { groupId });
            }

            if (replyToId !== null) {
              const target = await tx.getMessage(replyToId);
              if (!target || target.groupId !== groupId || target.isDeleted) {
                return err("INVALID_REPLY_TARGET", "The reply target is not a message in this group.", { replyToId });
              }
            }

            const latest = await tx.latestMessageCreatedAtMs(groupId);
            const now = nowMs();
            const createdAtMs = latest !== null && latest >= now ? latest + 1 : now;
            const message: ChatMessage = {
              id: newId(),
              groupId,
              senderId: sender?.userId ?? null,
              senderUsername: sender?.username ?? null,
              content: content.value,
              messageType: type,
              replyToId,
              metadata,
              isEdited: false,
              editedAtMs: null,
              isDeleted: false,
              createdAtMs,
              updatedAtMs: createdAtMs
            };
            await tx.insertMessage(message);
            return ok(message);
          }),
        deps.retry
      );
      if (result.ok) deps.feed?.publish(result.value);
      return result;
    });
  }

  return {
    send,

    postSystemMessage(groupId: string, content: string, metadata?: MessageMetadata): Promise<Result<ChatMessage>> {
      return send(SERVICE_CALLER, { groupId, content, type: "system", metadata });
    },

    async edit(caller: Caller, messageId: string, newContent: unknown): Promise<Result<ChatMessage>> {
      if (!isNonEmptyString(messageId)) return err("MESSAGE_NOT_FOUND", "Message not found.");
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;
      const content = validateContent(newContent);
      if (!content.ok) return content;

      return withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<ChatMessage>> => {
            const message = await tx.getMessage(messageId, { forUpdate: true });
            if (!message) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
            const access = await guard.authorize(caller, message.groupId, "member", tx);
            if (!access.ok) return access;
            if (message.isDeleted) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
            if (message.senderId !== acting.value.userId) {
              return err("NOT_AUTHORIZED", "Only the sender can edit this message.", { messageId });
            }
            if (message.messageType !== "text") {
              return err("NOT_AUTHORIZED", "Only text messages can be edited.", { messageId });
            }
            const now = nowMs();
            const updated = await tx.updateMessage(messageId, {
              content: content.value,
              isEdited: true,
              editedAtMs: now,
              updatedAtMs: now
            });
            if (!updated) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
            return ok(updated);
          }),
        deps.retry
      );
    },

    async softDelete(caller: Caller, messageId: string): Promise<Result<ChatMessage>> {
      if (!isNonEmptyString(messageId)) return err("MESSAGE_NOT_FOUND", "Message not found.");
      if (typeof caller !== "object" || caller === null) return err("INVALID_SESSION", "Invalid caller.");

      const result = await withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<{ message: ChatMessage; privileged: boolean }>> => {
            const message = await tx.getMessage(messageId, { forUpdate: true });
            if (!message) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
            const access = await guard.authorize(caller, message.groupId, "member", tx);
            if (!access.ok) return access;
            if (message.isDeleted) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });

            const isSender = isNonEmptyString(caller.userId) && message.senderId === caller.userId;
            if (!isSender && !access.value.isAdmin) {
              return err("NOT_AUTHORIZED", "Only the sender or a group admin can delete this message.", { messageId });
            }
            const updated = await tx.updateMessage(messageId, { isDeleted: true, updatedAtMs: nowMs() });
            if (!updated) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
            return ok({ message: updated, privileged: access.value.isAdmin });
          }),
        deps.retry
      );
      if (!result.ok) return result;

      const { message, privileged } = result.value;
      const removedByAdmin =
        caller.trust === "user" && message.senderId !== null && message.senderId !== caller.userId;
      if (removedByAdmin) {
        const posted = await send(SERVICE_CALLER, {
          groupId: message.groupId,
          content: `A message was removed by ${displayName(caller)}`,
          type: "system"
        });
        if (!posted.ok) {
          logger.warn(`[GroupChat] Removal notice for group ${message.groupId} was not posted: ${posted.error.code}`);
        }
      }
      return ok(renderForViewer(message, privileged));
    },

    async getMessage(caller: Caller, messageId: string): Promise<Result<ChatMessage>> {
      if (!isNonEmptyString(messageId)) return err("MESSAGE_NOT_FOUND", "Message not found.");
      const message = await repo.getMessage(messageId);
      if (!message) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
      const access = await guard.authorize(caller, message.groupId, "member");
      if (!access.ok) return access;
      return ok(renderForViewer(message, access.value.isAdmin));
    },

    async listPage(caller: Caller, groupId: string, options: ListPageOptions = {}): Promise<Result<MessagePage>> {
      const requested = options.limit ?? DEFAULT_PAGE_LIMIT;
      if (!Number.isInteger(requested) || requested < 1) {
        return err("INVALID_INPUT", "Page limit must be a positive integer.");
      }
      const limit = Math.min(requested, MAX_PAGE_LIMIT);
      const before = options.before;
      if (before !== undefined) {
        if (!Number.isFinite(before.createdAtMs)) return err("INVALID_INPUT", "Invalid page cursor.");
        if (before.id !== undefined && !isNonEmptyString(before.id)) return err("INVALID_INPUT", "Invalid page cursor.");
      }

      const access = await guard.authorize(caller, groupId, "member");
      if (!access.ok) return access;

      const rows = await repo.listMessagesPage({ groupId, before, limit: limit + 1 });
      const hasMore = rows.length > limit;
      const page = rows.slice(0, limit);
      const last = page[page.length - 1];

      // Parents on the page are reused; older ones are fetched, and only kept if they share the group.
      const parents = new Map<string, ChatMessage>(rows.map((m): [string, ChatMessage] => [m.id, m]));
      for (const m of page) {
        if (m.replyToId === null || parents.has(m.replyToId)) continue;
        const parent = await repo.getMessage(m.replyToId);
        if (parent && parent.groupId === groupId) parents.set(parent.id, parent);
      }
      const privileged = access.value.isAdmin;
      return ok({
        messages: page.map((m) =>
          withReplyPreview(
            renderForViewer(m, privileged),
            m.replyToId === null ? null : parents.get(m.replyToId) ?? null,
            privileged
          )
        ),
        nextCursor: hasMore && last ? { createdAtMs: last.createdAtMs, id: last.id } : null,
        hasMore
      });
    },

    async getThread(caller: Caller, messageId: string): Promise<Result<ReadonlyArray<ChatMessage>>> {
      if (!isNonEmptyString(messageId)) return err("MESSAGE_NOT_FOUND", "Message not found.");
      const parent = await repo.getMessage(messageId);
      if (!parent) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
      const access = await guard.authorize(caller, parent.groupId, "member");
      if (!access.ok) return access;

      const replies = await repo.listReplies(messageId);
      const sameGroup = replies.filter((reply) => {
        if (reply.groupId === parent.groupId) return true;
        logger.error(`[GroupChat] Reply ${reply.id} crosses from group ${reply.groupId} to ${parent.groupId}; skipped.`);
        return false;
      });
      return ok(sameGroup.map((m) => renderForViewer(m, access.value.isAdmin)));
    }
  };
}
