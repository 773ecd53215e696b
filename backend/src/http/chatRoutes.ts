import express, { type NextFunction, type Request, type Response, type Router } from "express";

import type { IdentityVerifier } from "../auth/identityToken";
import type { Caller, ErrorCode, ServiceError } from "../services/chatTypes";
import type { GroupRegistry } from "../services/groupRegistry";
import type { MembershipManager } from "../services/membershipManager";
import type { MessageStore } from "../services/messageStore";
import type { ReadReceiptTracker } from "../services/readReceiptTracker";

export type ChatRouterDeps = Readonly<{
  identity: IdentityVerifier;
  groups: GroupRegistry;
  memberships: MembershipManager;
  messages: MessageStore;
  receipts: ReadReceiptTracker;
}>;

const STATUS_BY_CODE = {
  NOT_AUTHORIZED: 403,
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  ALREADY_MEMBER: 409,
  NOT_A_MEMBER: 404,
  MESSAGE_NOT_FOUND: 404,
  INVALID_REPLY_TARGET: 400,
  INVALID_INVITE_CODE: 400,
  DUPLICATE_INVITE_CODE: 409,
  CONSTRAINT_VIOLATION: 409,
  INVALID_INPUT: 400,
  INVALID_SESSION: 401,
  DEFAULT_GROUP_LOCKED: 400,
  GROUP_ARCHIVED: 410,
  LAST_ADMIN: 409
} satisfies Record<ErrorCode, number>;

export function statusForError(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function sendError(res: Response, error: ServiceError): void {
  res.status(statusForError(error.code)).json(error);
}

function bearerToken(req: Request): string | null {
  const header = req.header("authorization");
  if (typeof header !== "string") return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match?.[1]?.trim() || null;
}

function bodyField(req: Request, key: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return undefined;
  return Reflect.get(body, key);
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

type AuthedHandler = (req: Request, res: Response, caller: Caller) => Promise<unknown>;

/** Express JSON adapter over the core modules; every rule lives in the services. */
export function createChatRouter(deps: ChatRouterDeps): Router {
  const router = express.Router();
  const { groups, memberships, messages, receipts } = deps;

  // Express 4 does not await handlers; rejected promises are handed to the error boundary.
  const authed =
    (handler: AuthedHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      const verified = deps.identity.verify(bearerToken(req) ?? "");
      if (!verified.ok) {
        sendError(res, verified.error);
        return;
      }
      handler(req, res, verified.value).catch(next);
    };

  router.get("/health", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  // Groups
  router.get(
    "/groups",
    authed(async (_req, res, caller) => {
      const ensured = await memberships.ensureInDefaultGroup(caller);
      if (!ensured.ok && ensured.error.code !== "NOT_FOUND") return sendError(res, ensured.error);
      const result = await groups.listGroupsForUser(caller);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ groups: result.value });
    })
  );

  router.post(
    "/groups",
    authed(async (req, res, caller) => {
      const result = await groups.createGroup(caller, {
        name: bodyField(req, "name"),
        description: bodyField(req, "description"),
        isPublic: bodyField(req, "isPublic"),
        invitedUserIds: bodyField(req, "invitedUserIds")
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json({ group: result.value });
    })
  );

  router.get(
    "/groups/:groupId",
    authed(async (req, res, caller) => {
      const result = await groups.getGroup(caller, req.params.groupId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ group: result.value });
    })
  );

  router.patch(
    "/groups/:groupId",
    authed(async (req, res, caller) => {
      const result = await groups.updateGroup(caller, req.params.groupId, {
        name: bodyField(req, "name"),
        description: bodyField(req, "description")
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ group: result.value });
    })
  );

  router.post(
    "/groups/:groupId/archive",
    authed(async (req, res, caller) => {
      const result = await groups.archiveGroup(caller, req.params.groupId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ group: result.value });
    })
  );

  router.post(
    "/groups/:groupId/invite-code",
    authed(async (req, res, caller) => {
      const result = await groups.rotateInviteCode(caller, req.params.groupId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ group: result.value });
    })
  );

  // Invites
  router.get(
    "/invites/:code",
    authed(async (req, res) => {
      const result = await groups.resolveInviteCode(req.params.code);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ group: result.value });
    })
  );

  router.post(
    "/invites/:code/join",
    authed(async (req, res, caller) => {
      const result = await memberships.joinByInviteCode(caller, req.params.code);
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json({ membership: result.value });
    })
  );

  // Membership
  router.post(
    "/groups/:groupId/join",
    authed(async (req, res, caller) => {
      const result = await memberships.join(caller, req.params.groupId, optionalString(bodyField(req, "inviteCode")));
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json({ membership: result.value });
    })
  );

  router.post(
    "/groups/:groupId/leave",
    authed(async (req, res, caller) => {
      const result = await memberships.leave(caller, req.params.groupId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  router.get(
    "/groups/:groupId/members",
    authed(async (req, res, caller) => {
      const result = await memberships.listMembers(caller, req.params.groupId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ members: result.value });
    })
  );

  router.post(
    "/groups/:groupId/members",
    authed(async (req, res, caller) => {
      const result = await memberships.addMember(
        caller,
        req.params.groupId,
        optionalString(bodyField(req, "userId")) ?? "",
        optionalString(bodyField(req, "username")) ?? ""
      );
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json({ membership: result.value });
    })
  );

  router.put(
    "/groups/:groupId/members/:userId/role",
    authed(async (req, res, caller) => {
      const result = await memberships.setRole(caller, req.params.groupId, req.params.userId, bodyField(req, "role"));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ membership: result.value });
    })
  );

  router.delete(
    "/groups/:groupId/members/:userId",
    authed(async (req, res, caller) => {
      const result = await memberships.removeMember(caller, req.params.groupId, req.params.userId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  // Messages
  router.get(
    "/groups/:groupId/messages",
    authed(async (req, res, caller) => {
      const limitRaw = queryString(req, "limit");
      const beforeRaw = queryString(req, "before");
      const beforeId = queryString(req, "beforeId");
      const result = await messages.listPage(caller, req.params.groupId, {
        limit: limitRaw === undefined ? undefined : Number(limitRaw),
        before: beforeRaw === undefined ? undefined : { createdAtMs: Number(beforeRaw), id: beforeId }
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  router.post(
    "/groups/:groupId/messages",
    authed(async (req, res, caller) => {
      const result = await messages.send(caller, {
        groupId: req.params.groupId,
        content: bodyField(req, "content"),
        type: bodyField(req, "type"),
        replyToId: bodyField(req, "replyToId"),
        metadata: bodyField(req, "metadata")
      });
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json({ message: result.value });
    })
  );

  router.get(
    "/groups/:groupId/unread",
    authed(async (req, res, caller) => {
      const sinceRaw = queryString(req, "since");
      const result = await receipts.unreadCount(
        caller,
        req.params.groupId,
        sinceRaw === undefined ? undefined : Number(sinceRaw)
      );
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ unreadCount: result.value });
    })
  );

  router.post(
    "/groups/:groupId/read",
    authed(async (req, res, caller) => {
      const result = await receipts.markManyRead(caller, req.params.groupId, bodyField(req, "messageIds"));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  router.get(
    "/messages/:messageId",
    authed(async (req, res, caller) => {
      const result = await messages.getMessage(caller, req.params.messageId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ message: result.value });
    })
  );

  router.patch(
    "/messages/:messageId",
    authed(async (req, res, caller) => {
      const result = await messages.edit(caller, req.params.messageId, bodyField(req, "content"));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ message: result.value });
    })
  );

  router.delete(
    "/messages/:messageId",
    authed(async (req, res, caller) => {
      const result = await messages.softDelete(caller, req.params.messageId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ message: result.value });
    })
  );

  router.get(
    "/messages/:messageId/thread",
    authed(async (req, res, caller) => {
      const result = await messages.getThread(caller, req.params.messageId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ messages: result.value });
    })
  );

  router.post(
    "/messages/:messageId/read",
    authed(async (req, res, caller) => {
      const result = await receipts.markRead(caller, req.params.messageId);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  return router;
}
