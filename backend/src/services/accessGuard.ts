import type { ChatStore } from "../repositories/chatRepository";
import { err, isNonEmptyString, ok, type Caller, type Membership, type Result, type TrustLevel } from "./chatTypes";

export type AccessRequirement = "member" | "admin";

export type Access = Readonly<{
  trust: TrustLevel;
  // The caller's membership row; null for a service caller acting without a user id.
  membership: Membership | null;
  isAdmin: boolean;
}>;

export type AccessGuard = Readonly<{
  authorize(caller: Caller, groupId: string, requirement: AccessRequirement, store?: ChatStore): Promise<Result<Access>>;
}>;

export type AccessGuardDeps = Readonly<{
  store: ChatStore;
}>;

const NOT_AUTHORIZED_MESSAGE = "You are not allowed to access this group.";

/**
 * Application-level replacement for row-level security. Missing groups and missing
 * memberships both yield NOT_AUTHORIZED so callers cannot probe for group existence.
 */
export function createAccessGuard(deps: AccessGuardDeps): AccessGuard {
  return {
    async authorize(caller, groupId, requirement, store = deps.store): Promise<Result<Access>> {
      if (typeof caller !== "object" || caller === null) {
        return err("INVALID_SESSION", "Invalid caller.");
      }
      if (!isNonEmptyString(groupId)) {
        return err("NOT_AUTHORIZED", NOT_AUTHORIZED_MESSAGE);
      }

      const userId = isNonEmptyString(caller.userId) ? caller.userId.trim() : null;

      if (caller.trust === "service") {
        const membership = userId === null ? null : await store.getMembership(groupId, userId);
        return ok({ trust: "service", membership, isAdmin: true });
      }

      if (caller.trust !== "user" || userId === null) {
        return err("INVALID_SESSION", "Invalid caller.");
      }

      const membership = await store.getMembership(groupId, userId);
      if (!membership) {
        return err("NOT_AUTHORIZED", NOT_AUTHORIZED_MESSAGE, { groupId });
      }
      if (requirement === "admin" && membership.role !== "admin") {
        return err("NOT_AUTHORIZED", "Only group admins can do this.", { groupId });
      }
      return ok({ trust: "user", membership, isAdmin: membership.role === "admin" });
    }
  };
}
