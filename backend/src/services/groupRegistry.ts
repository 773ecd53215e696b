import { randomBytes, randomUUID } from "node:crypto";

import { CONSTRAINTS, type ChatRepository } from "../repositories/chatRepository";
import type { AccessGuard } from "./accessGuard";
import {
  displayName,
  err,
  isNonEmptyString,
  ok,
  requireActingUser,
  type Caller,
  type ChatGroup,
  type MemberRole,
  type Membership,
  type MessageMetadata,
  type Result,
  type SystemMessagePoster
} from "./chatTypes";
import { withStorageBoundary, type RetryPolicy } from "./storageBoundary";

export type DefaultGroupSettings = Readonly<{
  name: string;
  description: string;
  adminUserId?: string;
  adminUsername?: string;
}>;

export type CreateGroupInput = Readonly<{
  name: unknown;
  description?: unknown;
  isPublic?: unknown;
  // Private groups only: these users become members at creation.
  invitedUserIds?: unknown;
}>;

export type UpdateGroupInput = Readonly<{
  name?: unknown;
  description?: unknown;
}>;

export type GroupSummary = Readonly<{
  group: ChatGroup;
  memberCount: number;
  role: MemberRole | null;
}>;

export type GroupRegistryDeps = Readonly<{
  repo: ChatRepository;
  guard: AccessGuard;
  defaultGroup: DefaultGroupSettings;
  systemMessages?: SystemMessagePoster;
  nowMs?: () => number;
  newId?: () => string;
  generateInviteCode?: () => string;
  maxInviteCodeAttempts?: number;
  retry?: RetryPolicy;
  logger?: Pick<Console, "info" | "warn">;
}>;

export type GroupRegistry = Readonly<{
  ensureDefaultGroup(): Promise<Result<ChatGroup>>;
  createGroup(caller: Caller, input: CreateGroupInput): Promise<Result<ChatGroup>>;
  rotateInviteCode(caller: Caller, groupId: string): Promise<Result<ChatGroup>>;
  resolveInviteCode(inviteCode: string): Promise<Result<ChatGroup>>;
  getGroup(caller: Caller, groupId: string): Promise<Result<ChatGroup>>;
  listGroupsForUser(caller: Caller): Promise<Result<ReadonlyArray<GroupSummary>>>;
  updateGroup(caller: Caller, groupId: string, input: UpdateGroupInput): Promise<Result<ChatGroup>>;
  archiveGroup(caller: Caller, groupId: string): Promise<Result<ChatGroup>>;
}>;

const MAX_NAME_LENGTH = 100;
const MAX_DESCRIPTION_LENGTH = 1000;
const MAX_INVITED_USERS = 100;

function defaultInviteCode(): string {
  return randomBytes(32).toString("base64url");
}

/** Hides the invite code from anyone who is not an admin of the group. */
export function redactInviteCode(group: ChatGroup, isAdmin: boolean): ChatGroup {
  if (isAdmin || group.inviteCode === null) return group;
  return { ...group, inviteCode: null };
}

export function createGroupRegistry(deps: GroupRegistryDeps): GroupRegistry {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const newId = deps.newId ?? (() => randomUUID());
  const generateInviteCode = deps.generateInviteCode ?? defaultInviteCode;
  const maxInviteCodeAttempts = deps.maxInviteCodeAttempts ?? 5;
  const logger = deps.logger ?? console;
  const { repo, guard } = deps;

  if (!Number.isInteger(maxInviteCodeAttempts) || maxInviteCodeAttempts <= 0) {
    throw new Error("groupRegistry requires a positive maxInviteCodeAttempts.");
  }
  if (!isNonEmptyString(deps.defaultGroup.name)) {
    throw new Error("groupRegistry requires a default group name.");
  }

  async function announce(groupId: string, content: string, metadata?: MessageMetadata): Promise<void> {
    if (!deps.systemMessages) return;
    const posted = await deps.systemMessages.postSystemMessage(groupId, content, metadata);
    if (!posted.ok) {
      logger.warn(`[GroupChat] System message for group ${groupId} was not posted: ${posted.error.code}`);
    }
  }

  function normalizeName(value: unknown): Result<string> {
    if (!isNonEmptyString(value)) return err("INVALID_INPUT", "Group name is required.");
    const name = value.trim();
    if (name.length > MAX_NAME_LENGTH) {
      return err("INVALID_INPUT", "Group name is too long.", { maxLength: MAX_NAME_LENGTH });
    }
    return ok(name);
  }

  function normalizeDescription(value: unknown): Result<string> {
    if (value === undefined || value === null) return ok("");
    if (typeof value !== "string") return err("INVALID_INPUT", "Group description must be a string.");
    const description = value.trim();
    if (description.length > MAX_DESCRIPTION_LENGTH) {
      return err("INVALID_INPUT", "Group description is too long.", { maxLength: MAX_DESCRIPTION_LENGTH });
    }
    return ok(description);
  }

  function normalizeInvitedUserIds(value: unknown, creatorId: string): Result<ReadonlyArray<string>> {
    if (value === undefined || value === null) return ok([]);
    if (!Array.isArray(value)) return err("INVALID_INPUT", "invitedUserIds must be a list of user ids.");
    const entries: ReadonlyArray<unknown> = value;
    if (entries.length > MAX_INVITED_USERS) {
      return err("INVALID_INPUT", "Too many invited users.", { maxInvited: MAX_INVITED_USERS });
    }
    const ids: string[] = [];
    for (const entry of entries) {
      if (!isNonEmptyString(entry)) return err("INVALID_INPUT", "invitedUserIds must be a list of user ids.");
      const id = entry.trim();
      if (id !== creatorId && !ids.includes(id)) ids.push(id);
    }
    return ok(ids);
  }

  // Posted into the default group so everyone hears about the new group.
  async function announceNewGroup(
    group: ChatGroup,
    creator: string,
    invited: ReadonlyArray<Membership>
  ): Promise<void> {
    const defaultGroup = await repo.getDefaultGroup();
    if (!defaultGroup) return;
    const kind = group.isPublic ? "public" : "private";
    await announce(defaultGroup.id, `New ${kind} group "${group.name}" created by ${creator}`, {
      group_invite: true,
      target_group_id: group.id,
      target_group_name: group.name,
      target_group_description: group.description,
      is_public: group.isPublic,
      invited_user_ids: invited.map((m) => m.userId)
    });
  }

  // Each attempt gets a fresh code; a collision on the unique column means "try again".
  async function withFreshInviteCode<T>(work: (inviteCode: string) => Promise<Result<T>>): Promise<Result<T>> {
    for (let attempt = 1; attempt <= maxInviteCodeAttempts; attempt += 1) {
      const inviteCode = generateInviteCode();
      const result = await withStorageBoundary(() => work(inviteCode), deps.retry, (e) =>
        e.kind === "unique_violation" && e.constraint === CONSTRAINTS.inviteCode
          ? err("DUPLICATE_INVITE_CODE", "Invite code collision.")
          : null
      );
      if (result.ok || result.error.code !== "DUPLICATE_INVITE_CODE") return result;
    }
    return err("DUPLICATE_INVITE_CODE", "Could not allocate a unique invite code.", {
      attempts: maxInviteCodeAttempts
    });
  }

  return {
    async ensureDefaultGroup(): Promise<Result<ChatGroup>> {
      const settings = deps.defaultGroup;
      const result = await withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<{ group: ChatGroup; created: boolean }>> => {
            const now = nowMs();
            const ensured = await tx.insertDefaultGroupIfAbsent({
              id: newId(),
              name: settings.name.trim(),
              description: settings.description.trim(),
              isDefault: true,
              isPublic: true,
              inviteCode: null,
              createdBy: settings.adminUserId ?? "system",
              createdAtMs: now,
              updatedAtMs: now,
              archivedAtMs: null
            });
            if (ensured.created && isNonEmptyString(settings.adminUserId)) {
              await tx.insertMemberIfAbsent({
                id: newId(),
                groupId: ensured.group.id,
                userId: settings.adminUserId.trim(),
                username: isNonEmptyString(settings.adminUsername)
                  ? settings.adminUsername.trim()
                  : settings.adminUserId.trim(),
                role: "admin",
                joinedAtMs: now
              });
            }
            return ok(ensured);
          }),
        deps.retry
      );
      if (!result.ok) return result;
      if (result.value.created) {
        logger.info(`[GroupChat] Created default group ${result.value.group.id}.`);
      }
      return ok(result.value.group);
    },

    async createGroup(caller: Caller, input: CreateGroupInput): Promise<Result<ChatGroup>> {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;
      if (typeof input !== "object" || input === null) return err("INVALID_INPUT", "Group details are required.");
      const name = normalizeName(input.name);
      if (!name.ok) return name;
      const description = normalizeDescription(input.description);
      if (!description.ok) return description;
      if (input.isPublic !== undefined && typeof input.isPublic !== "boolean") {
        return err("INVALID_INPUT", "isPublic must be a boolean.");
      }
      const isPublic = typeof input.isPublic === "boolean" ? input.isPublic : true;
      const invitedUserIds = normalizeInvitedUserIds(input.invitedUserIds, acting.value.userId);
      if (!invitedUserIds.ok) return invitedUserIds;
      const invitees = isPublic ? [] : invitedUserIds.value;

      const insert = (inviteCode: string | null) =>
        repo.transaction(async (tx): Promise<Result<{ group: ChatGroup; invited: ReadonlyArray<Membership> }>> => {
          const now = nowMs();
          const group: ChatGroup = {
            id: newId(),
            name: name.value,
            description: description.value,
            isDefault: false,
            isPublic,
            inviteCode,
            createdBy: acting.value.userId,
            createdAtMs: now,
            updatedAtMs: now,
            archivedAtMs: null
          };
          await tx.insertGroup(group);
          await tx.insertMember({
            id: newId(),
            groupId: group.id,
            userId: acting.value.userId,
            username: acting.value.username,
            role: "admin",
            joinedAtMs: now
          });

          // Invitees keep the name they carry in the default group; unknown users go by their id.
          const defaultGroup = invitees.length > 0 ? await tx.getDefaultGroup() : null;
          const invited: Membership[] = [];
          for (const userId of invitees) {
            const known = defaultGroup ? await tx.getMembership(defaultGroup.id, userId) : null;
            const member: Membership = {
              id: newId(),
              groupId: group.id,
              userId,
              username: known?.username ?? userId,
              role: "member",
              joinedAtMs: now
            };
            await tx.insertMember(member);
            invited.push(member);
          }
          return ok({ group, invited });
        });

      const created = isPublic
        ? await withStorageBoundary(() => insert(null), deps.retry)
        : await withFreshInviteCode((code) => insert(code));
      if (!created.ok) return created;
      const { group, invited } = created.value;

      await announce(group.id, `Group "${group.name}" created by ${acting.value.username}`);
      await announceNewGroup(group, acting.value.username, invited);
      return ok(group);
    },

    async rotateInviteCode(caller: Caller, groupId: string): Promise<Result<ChatGroup>> {
      return withFreshInviteCode((inviteCode) =>
        repo.transaction(async (tx): Promise<Result<ChatGroup>> => {
          const access = await guard.authorize(caller, groupId, "admin", tx);
          if (!access.ok) return access;
          const group = await tx.getGroup(groupId, { forUpdate: true });
          if (!group) return err("NOT_FOUND", "Group not found.", { groupId });
          if (group.isDefault) return err("DEFAULT_GROUP_LOCKED", "The default group has no invite code.");
          if (group.isPublic) return err("INVALID_INPUT", "Public groups have no invite code.");
          const updated = await tx.updateGroup(groupId, { inviteCode, updatedAtMs: nowMs() });
          if (!updated) return err("NOT_FOUND", "Group not found.", { groupId });
          return ok(updated);
        })
      );
    },

    async resolveInviteCode(inviteCode: string): Promise<Result<ChatGroup>> {
      if (!isNonEmptyString(inviteCode)) return err("INVALID_INVITE_CODE", "Invalid invite code.");
      const group = await repo.findGroupByInviteCode(inviteCode.trim());
      if (!group || group.archivedAtMs !== null) return err("INVALID_INVITE_CODE", "Invalid invite code.");
      return ok(redactInviteCode(group, false));
    },

    async getGroup(caller: Caller, groupId: string): Promise<Result<ChatGroup>> {
      const access = await guard.authorize(caller, groupId, "member");
      if (!access.ok) return access;
      const group = await repo.getGroup(groupId);
      if (!group) return err("NOT_FOUND", "Group not found.", { groupId });
      return ok(redactInviteCode(group, access.value.isAdmin));
    },

    async listGroupsForUser(caller: Caller): Promise<Result<ReadonlyArray<GroupSummary>>> {
      const acting = requireActingUser(caller);
      if (!acting.ok) return acting;
      const rows = await repo.listGroupsForUser(acting.value.userId);
      return ok(
        rows.map((row) => ({
          group: redactInviteCode(row.group, caller.trust === "service" || row.viewerRole === "admin"),
          memberCount: row.memberCount,
          role: row.viewerRole
        }))
      );
    },

    async updateGroup(caller: Caller, groupId: string, input: UpdateGroupInput): Promise<Result<ChatGroup>> {
      if (typeof input !== "object" || input === null) return err("INVALID_INPUT", "Group details are required.");
      let nextName: string | undefined;
      if (input.name !== undefined) {
        const name = normalizeName(input.name);
        if (!name.ok) return name;
        nextName = name.value;
      }
      let nextDescription: string | undefined;
      if (input.description !== undefined) {
        const description = normalizeDescription(input.description);
        if (!description.ok) return description;
        nextDescription = description.value;
      }

      const result = await withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<{ group: ChatGroup; changes: string[] }>> => {
            const access = await guard.authorize(caller, groupId, "admin", tx);
            if (!access.ok) return access;
            const group = await tx.getGroup(groupId, { forUpdate: true });
            if (!group) return err("NOT_FOUND", "Group not found.", { groupId });
            if (group.archivedAtMs !== null) return err("GROUP_ARCHIVED", "This group is archived.", { groupId });

            const changes: string[] = [];
            if (nextName !== undefined && nextName !== group.name) changes.push(`renamed the group to "${nextName}"`);
            if (nextDescription !== undefined && nextDescription !== group.description) {
              changes.push("updated the description");
            }
            if (changes.length === 0) return ok({ group, changes });

            const updated = await tx.updateGroup(groupId, {
              name: nextName,
              description: nextDescription,
              updatedAtMs: nowMs()
            });
            if (!updated) return err("NOT_FOUND", "Group not found.", { groupId });
            return ok({ group: updated, changes });
          }),
        deps.retry
      );
      if (!result.ok) return result;

      if (result.value.changes.length > 0) {
        await announce(groupId, `${displayName(caller)} ${result.value.changes.join(" and ")}`);
      }
      return ok(result.value.group);
    },

    async archiveGroup(caller: Caller, groupId: string): Promise<Result<ChatGroup>> {
      return withStorageBoundary(
        () =>
          repo.transaction(async (tx): Promise<Result<ChatGroup>> => {
            const access = await guard.authorize(caller, groupId, "admin", tx);
            if (!access.ok) return access;
            const group = await tx.getGroup(groupId, { forUpdate: true });
            if (!group) return err("NOT_FOUND", "Group not found.", { groupId });
            if (group.isDefault) return err("DEFAULT_GROUP_LOCKED", "The default group cannot be archived.");
            if (group.archivedAtMs !== null) return ok(group);
            const now = nowMs();
            const updated = await tx.updateGroup(groupId, { archivedAtMs: now, updatedAtMs: now });
            if (!updated) return err("NOT_FOUND", "Group not found.", { groupId });
            return ok(updated);
          }),
        deps.retry
      );
    }
  };
}
