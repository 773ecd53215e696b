export type TrustLevel = "user" | "service";
export type MemberRole = "admin" | "member";
export type MessageType = "text" | "system" | "admin_announcement";

export type ErrorCode =
  | "NOT_AUTHORIZED"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "ALREADY_MEMBER"
  | "NOT_A_MEMBER"
  | "MESSAGE_NOT_FOUND"
  | "INVALID_REPLY_TARGET"
  | "INVALID_INVITE_CODE"
  | "DUPLICATE_INVITE_CODE"
  | "CONSTRAINT_VIOLATION"
  | "INVALID_INPUT"
  | "INVALID_SESSION"
  | "DEFAULT_GROUP_LOCKED"
  | "GROUP_ARCHIVED"
  | "LAST_ADMIN";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

/**
 * Identity a request runs under. `service` is the backend's own principal and is
 * never minted from an external credential; `user` callers always carry the
 * identity service's `userId`/`username`.
 */
export type Caller = Readonly<{
  trust: TrustLevel;
  userId?: string;
  username?: string;
}>;

export type ChatGroup = Readonly<{
  id: string;
  name: string;
  description: string;
  isDefault: boolean;
  isPublic: boolean;
  inviteCode: string | null;
  createdBy: string;
  createdAtMs: number;
  updatedAtMs: number;
  archivedAtMs: number | null;
}>;

export type Membership = Readonly<{
  id: string;
  groupId: string;
  userId: string;
  username: string;
  role: MemberRole;
  joinedAtMs: number;
}>;

export type MessageMetadata = Readonly<Record<string, unknown>>;

export type ChatMessage = Readonly<{
  id: string;
  groupId: string;
  senderId: string | null;
  senderUsername: string | null;
  content: string;
  messageType: MessageType;
  replyToId: string | null;
  metadata: MessageMetadata;
  isEdited: boolean;
  editedAtMs: number | null;
  isDeleted: boolean;
  createdAtMs: number;
  updatedAtMs: number;
}>;

export type ReadReceipt = Readonly<{
  id: string;
  messageId: string;
  userId: string;
  readAtMs: number;
}>;

export type PageCursor = Readonly<{
  createdAtMs: number;
  id?: string;
}>;

export const SERVICE_CALLER: Caller = { trust: "service" };

export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

export function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

export function isMemberRole(value: unknown): value is MemberRole {
  return value === "admin" || value === "member";
}

export function isMessageType(value: unknown): value is MessageType {
  return value === "text" || value === "system" || value === "admin_announcement";
}

export function userCaller(userId: string, username: string): Caller {
  return { trust: "user", userId, username };
}

/** Resolves the acting user of a caller, or an INVALID_INPUT error when there is none. */
export function requireActingUser(caller: Caller): Result<{ userId: string; username: string }> {
  if (typeof caller !== "object" || caller === null) {
    return err("INVALID_SESSION", "Invalid caller.");
  }
  if (!isNonEmptyString(caller.userId)) {
    return err("INVALID_INPUT", "An acting user is required.");
  }
  const username = isNonEmptyString(caller.username) ? caller.username.trim() : caller.userId.trim();
  return ok({ userId: caller.userId.trim(), username });
}

/** Total order used by pagination and the change feed: newest first. */
export function compareNewestFirst(
  a: Readonly<{ createdAtMs: number; id: string }>,
  b: Readonly<{ createdAtMs: number; id: string }>
): number {
  if (a.createdAtMs !== b.createdAtMs) return b.createdAtMs - a.createdAtMs;
  if (a.id === b.id) return 0;
  return a.id < b.id ? 1 : -1;
}

export function compareOldestFirst(
  a: Readonly<{ createdAtMs: number; id: string }>,
  b: Readonly<{ createdAtMs: number; id: string }>
): number {
  return compareNewestFirst(b, a);
}

/** Posts service-authored messages; implemented by the message store. */
export type SystemMessagePoster = Readonly<{
  postSystemMessage(groupId: string, content: string, metadata?: MessageMetadata): Promise<Result<ChatMessage>>;
}>;

export function displayName(caller: Caller): string {
  if (isNonEmptyString(caller.username)) return caller.username.trim();
  if (isNonEmptyString(caller.userId)) return caller.userId.trim();
  return "system";
}
