import { randomUUID } from "node:crypto";

import type { ChatRepository } from "../repositories/chatRepository";
import type { AccessGuard } from "./accessGuard";
import {
  err,
  isNonEmptyString,
  ok,
  requireActingUser,
  type Caller,
  type ReadReceipt,
  type Result
} from "./chatTypes";
import { withStorageBoundary, type RetryPolicy } from "./storageBoundary";

export type MarkReadOutcome = Readonly<{ receipt: ReadReceipt; created: boolean }>;

export type MarkManyOutcome = Readonly<{
  receipts: ReadonlyArray<ReadReceipt>;
  createdCount: number;
}>;

export type ReadReceiptTrackerDeps = Readonly<{
  repo: ChatRepository;
  guard: AccessGuard;
  nowMs?: () => number;
  newId?: () => string;
  maxBatchSize?: number;
  retry?: RetryPolicy;
}>;

export type ReadReceiptTracker = Readonly<{
  markRead(caller: Caller, messageId: string): Promise<Result<MarkReadOutcome>>;
  markManyRead(caller: Caller, groupId: string, messageIds: unknown): Promise<Result<MarkManyOutcome>>;
  unreadCount(caller: Caller, groupId: string, sinceJoinMs?: number): Promise<Result<number>>;
}>;

function isIdList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isNonEmptyString);
}

export function createReadReceiptTracker(deps: ReadReceiptTrackerDeps): ReadReceiptTracker {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const newId = deps.newId ?? (() => randomUUID());
  const maxBatchSize = deps.maxBatchSize ?? 500;
  const { repo, guard } = deps;

  return {
    async markRead(caller: Caller, messageId: string): Promise<Result<MarkReadOutcome>> {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;
      if (!isNonEmptyString(messageId)) return err("MESSAGE_NOT_FOUND", "Message not found.");

      return withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<MarkReadOutcome>> => {
            const message = await tx.getMessage(messageId);
            if (!message) return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId });
            const access = await guard.authorize(caller, message.groupId, "member", tx);
            if (!access.ok) return access;
            // A repeat keeps the first readAtMs.
            return ok(
              await tx.insertReceiptIfAbsent({
                id: newId(),
                messageId,
                userId: acting.value.userId,
                readAtMs: nowMs()
              })
            );
          }),
        deps.retry
      );
    },

    async markManyRead(caller: Caller, groupId: string, messageIds: unknown): Promise<Result<MarkManyOutcome>> {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;
      if (!isIdList(messageIds) || messageIds.length === 0) {
        return err("INVALID_INPUT", "messageIds must be a non-empty list of ids.");
      }
      const ids = Array.from(new Set(messageIds.map((id) => id.trim())));
      if (ids.length > maxBatchSize) {
        return err("INVALID_INPUT", "Too many messages in one request.", { maxBatchSize });
      }

      return withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<MarkManyOutcome>> => {
            const access = await guard.authorize(caller, groupId, "member", tx);
            if (!access.ok) return access;
            for (const id of ids) {
              const message = await tx.getMessage(id);
              if (!message || message.groupId !== groupId) {
                return err("MESSAGE_NOT_FOUND", "Message not found.", { messageId: id });
              }
            }

            const readAtMs = nowMs();
            const receipts: ReadReceipt[] = [];
            let createdCount = 0;
            for (const id of ids) {
              const outcome = await tx.insertReceiptIfAbsent({
                id: newId(),
                messageId: id,
                userId: acting.value.userId,
                readAtMs
              });
              receipts.push(outcome.receipt);
              if (outcome.created) createdCount += 1;
            }
            return ok({ receipts, createdCount });
          }),
        deps.retry
      );
    },

    async unreadCount(caller: Caller, groupId: string, sinceJoinMs?: number): Promise<Result<number>> {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;
      if (sinceJoinMs !== undefined && !Number.isFinite(sinceJoinMs)) {
        return err("INVALID_INPUT", "sinceJoinMs must be a timestamp.");
      }
      const access = await guard.authorize(caller, groupId, "member");
      if (!access.ok) return access;

      const sinceMs = sinceJoinMs ?? access.value.membership?.joinedAtMs ?? 0;
      return ok(await repo.countUnread(groupId, acting.value.userId, sinceMs));
    }
  };
}
