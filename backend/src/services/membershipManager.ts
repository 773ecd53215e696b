import { randomUUID } from "node:crypto";

import { CONSTRAINTS, type ChatRepository, type ChatStore, type StorageError } from "../repositories/chatRepository";
import type { AccessGuard } from "./accessGuard";
import {
  err,
  isMemberRole,
  isNonEmptyString,
  ok,
  requireActingUser,
  type Caller,
  type MemberRole,
  type Membership,
  type Result,
  type SystemMessagePoster
} from "./chatTypes";
import { withStorageBoundary, type RetryPolicy } from "./storageBoundary";

export type RemovalOutcome = Readonly<{
  removed: Membership;
  // Set when the removed member was the last admin and someone else inherited the role.
  promoted: Membership | null;
}>;

export type MembershipManagerDeps = Readonly<{
  repo: ChatRepository;
  guard: AccessGuard;
  systemMessages?: SystemMessagePoster;
  nowMs?: () => number;
  newId?: () => string;
  retry?: RetryPolicy;
  logger?: Pick<Console, "warn">;
}>;

export type MembershipManager = Readonly<{
  join(caller: Caller, groupId: string, inviteCode?: string): Promise<Result<Membership>>;
  joinByInviteCode(caller: Caller, inviteCode: string): Promise<Result<Membership>>;
  leave(caller: Caller, groupId: string): Promise<Result<RemovalOutcome>>;
  setRole(caller: Caller, groupId: string, targetUserId: string, role: unknown): Promise<Result<Membership>>;
  listMembers(caller: Caller, groupId: string): Promise<Result<ReadonlyArray<Membership>>>;
  addMember(caller: Caller, groupId: string, userId: string, username: string): Promise<Result<Membership>>;
  removeMember(caller: Caller, groupId: string, userId: string): Promise<Result<RemovalOutcome>>;
  ensureInDefaultGroup(caller: Caller): Promise<Result<{ membership: Membership; created: boolean }>>;
}>;

function alreadyMember(e: StorageError): Result<never> | null {
  if (e.kind === "unique_violation" && e.constraint === CONSTRAINTS.membershipPair) {
    return err("ALREADY_MEMBER", "Already a member of this group.");
  }
  return null;
}

/**
 * Deletes a membership and, when that leaves the group without an admin, promotes the
 * earliest-joined remaining member. Must run inside a transaction holding the group row.
 */
async function removeWithSuccession(tx: ChatStore, target: Membership): Promise<RemovalOutcome> {
  await tx.deleteMembership(target.groupId, target.userId);
  if (target.role !== "admin") return { removed: target, promoted: null };

  const remaining = await tx.listMembers(target.groupId);
  if (remaining.length === 0 || remaining.some((m) => m.role === "admin")) {
    return { removed: target, promoted: null };
  }
  const heir = remaining[0];
  const promoted = heir ? await tx.updateMemberRole(heir.groupId, heir.userId, "admin") : null;
  return { removed: target, promoted };
}

export function createMembershipManager(deps: MembershipManagerDeps): MembershipManager {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const newId = deps.newId ?? (() => randomUUID());
  const logger = deps.logger ?? console;
  const { repo, guard } = deps;

  async function announce(groupId: string, content: string): Promise<void> {
    if (!deps.systemMessages) return;
    const posted = await deps.systemMessages.postSystemMessage(groupId, content);
    if (!posted.ok) {
      logger.warn(`[GroupChat] System message for group ${groupId} was not posted: ${posted.error.code}`);
    }
  }

  async function announceRemoval(outcome: RemovalOutcome, content: string): Promise<void> {
    await announce(outcome.removed.groupId, content);
    if (outcome.promoted) {
      await announce(outcome.promoted.groupId, `${outcome.promoted.username} is now an admin`);
    }
  }

  async function join(caller: Caller, groupId: string, inviteCode?: string): Promise<Result<Membership>> {
    const acting = requireActingUser(caller);
    if (!acting.ok) return acting;
    if (!isNonEmptyString(groupId)) return err("INVALID_INVITE_CODE", "Invalid invite code.");

    const result = await withStorageBoundary(
      () =>
        repo.transaction(async (tx): Promise<Result<Membership>> => {
          const group = await tx.getGroup(groupId);
          // Absent and private-without-code look the same to the caller.
          if (!group) return err("INVALID_INVITE_CODE", "Invalid invite code.");
          if (!group.isPublic && (group.inviteCode === null || inviteCode?.trim() !== group.inviteCode)) {
            return err("INVALID_INVITE_CODE", "Invalid invite code.");
          }
          if (group.archivedAtMs !== null) return err("GROUP_ARCHIVED", "This group is archived.", { groupId });

          const membership: Membership = {
            id: newId(),
            groupId,
            userId: acting.value.userId,
            username: acting.value.username,
            role: "member",
            joinedAtMs: nowMs()
          };
          await tx.insertMember(membership);
          return ok(membership);
        }),
      deps.retry,
      alreadyMember
    );
    if (!result.ok) return result;

    await announce(groupId, `${result.value.username} joined the group`);
    return result;
  }

  return {
    join,

    async joinByInviteCode(caller: Caller, inviteCode: string): Promise<Result<Membership>> {
      if (!isNonEmptyString(inviteCode)) return err("INVALID_INVITE_CODE", "Invalid invite code.");
      // An archived group's code is dead, the same answer resolveInviteCode gives.
      const group = await repo.findGroupByInviteCode(inviteCode.trim());
      if (!group || group.archivedAtMs !== null) return err("INVALID_INVITE_CODE", "Invalid invite code.");
      const joined = await join(caller, group.id, inviteCode);
      if (!joined.ok && joined.error.code === "GROUP_ARCHIVED") return err("INVALID_INVITE_CODE", "Invalid invite code.");
      return joined;
    },

    async leave(caller: Caller, groupId: string): Promise<Result<RemovalOutcome>> {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;

      const result = await withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<RemovalOutcome>> => {
            const group = await tx.getGroup(groupId, { forUpdate: true });
            const membership = group ? await tx.getMembership(groupId, acting.value.userId) : null;
            if (!group || !membership) return err("NOT_A_MEMBER", "Not a member of this group.", { groupId });
            if (group.isDefault) return err("DEFAULT_GROUP_LOCKED", "The default group cannot be left.");
            return ok(await removeWithSuccession(tx, membership));
          }),
        deps.retry
      );
      if (!result.ok) return result;

      await announceRemoval(result.value, `${result.value.removed.username} left the group`);
      return result;
    },

    async setRole(caller: Caller, groupId: string, targetUserId: string, role: unknown): Promise<Result<Membership>> {
      if (!isMemberRole(role)) return err("INVALID_INPUT", "Role must be admin or member.");
      if (!isNonEmptyString(targetUserId)) return err("INVALID_INPUT", "A target user is required.");
      const nextRole: MemberRole = role;

      return withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<Membership>> => {
            const access = await guard.authorize(caller, groupId, "admin", tx);
            if (!access.ok) return access;
            const group = await tx.getGroup(groupId, { forUpdate: true });
            if (!group) return err("NOT_FOUND", "Group not found.", { groupId });

            const target = await tx.getMembership(groupId, targetUserId.trim());
            if (!target) return err("NOT_A_MEMBER", "The target user is not a member of this group.", { groupId });
            if (target.role === nextRole) return ok(target);

            if (target.role === "admin") {
              const admins = (await tx.listMembers(groupId)).filter((m) => m.role === "admin");
              if (admins.length <= 1) {
                return err("LAST_ADMIN", "The group's only admin cannot be demoted.", { groupId });
              }
            }
            const updated = await tx.updateMemberRole(groupId, target.userId, nextRole);
            if (!updated) return err("NOT_A_MEMBER", "The target user is not a member of this group.", { groupId });
            return ok(updated);
          }),
        deps.retry
      );
    },

    async listMembers(caller: Caller, groupId: string): Promise<Result<ReadonlyArray<Membership>>> {
      const access = await guard.authorize(caller, groupId, "member");
      if (!access.ok) return access;
      return ok(await repo.listMembers(groupId));
    },

    async addMember(caller: Caller, groupId: string, userId: string, username: string): Promise<Result<Membership>> {
      if (!isNonEmptyString(userId)) return err("INVALID_INPUT", "A user id is required.");
      const cachedName = isNonEmptyString(username) ? username.trim() : userId.trim();

      const result = await withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<Membership>> => {
            const access = await guard.authorize(caller, groupId, "admin", tx);
            if (!access.ok) return access;
            const group = await tx.getGroup(groupId);
            if (!group) return err("NOT_FOUND", "Group not found.", { groupId });
            if (group.archivedAtMs !== null) return err("GROUP_ARCHIVED", "This group is archived.", { groupId });

            const membership: Membership = {
              id: newId(),
              groupId,
              userId: userId.trim(),
              username: cachedName,
              role: "member",
              joinedAtMs: nowMs()
            };
            await tx.insertMember(membership);
            return ok(membership);
          }),
        deps.retry,
        alreadyMember
      );
      if (!result.ok) return result;

      await announce(groupId, `${result.value.username} was added to the group`);
      return result;
    },

    async removeMember(caller: Caller, groupId: string, userId: string): Promise<Result<RemovalOutcome>> {
      if (!isNonEmptyString(userId)) return err("INVALID_INPUT", "A user id is required.");

      const result = await withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<RemovalOutcome>> => {
            const access = await guard.authorize(caller, groupId, "admin", tx);
            if (!access.ok) return access;
            const group = await tx.getGroup(groupId, { forUpdate: true });
            if (!group) return err("NOT_FOUND", "Group not found.", { groupId });
            if (group.isDefault) return err("DEFAULT_GROUP_LOCKED", "Members cannot be removed from the default group.");

            const target = await tx.getMembership(groupId, userId.trim());
            if (!target) return err("NOT_A_MEMBER", "The target user is not a member of this group.", { groupId });
            return ok(await removeWithSuccession(tx, target));
          }),
        deps.retry
      );
      if (!result.ok) return result;

      await announceRemoval(result.value, `${result.value.removed.username} was removed from the group`);
      return result;
    },

    async ensureInDefaultGroup(caller: Caller): Promise<Result<{ membership: Membership; created: boolean }>> {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;

      return withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<{ membership: Membership; created: boolean }>> => {
            const group = await tx.getDefaultGroup();
            if (!group) return err("NOT_FOUND", "The default group does not exist yet.");

            const ensured = await tx.insertMemberIfAbsent({
              id: newId(),
              groupId: group.id,
              userId: acting.value.userId,
              username: acting.value.username,
              role: "member",
              joinedAtMs: nowMs()
            });
            if (ensured.created || ensured.member.username === acting.value.username) {
              return ok({ membership: ensured.member, created: ensured.created });
            }
            const refreshed = await tx.updateMemberUsername(group.id, acting.value.userId, acting.value.username);
            return ok({ membership: refreshed ?? ensured.member, created: false });
          }),
        deps.retry
      );
    }
  };
}
