import type {
  ChatGroup,
  ChatMessage,
  MemberRole,
  Membership,
  PageCursor,
  ReadReceipt
} from "../services/chatTypes";

export type StorageErrorKind =
  | "unique_violation"
  | "foreign_key_violation"
  | "check_violation"
  | "serialization_failure";

/** Integrity failure raised by a repository; services translate it into a ServiceError. */
export class StorageError extends Error {
  readonly kind: StorageErrorKind;
  readonly constraint: string | undefined;

  constructor(kind: StorageErrorKind, message: string, constraint?: string) {
    super(message);
    this.name = "StorageError";
    this.kind = kind;
    this.constraint = constraint;
  }
}

export function isStorageError(value: unknown): value is StorageError {
  return value instanceof StorageError;
}

// Constraint names shared by both repositories so services can tell conflicts apart.
export const CONSTRAINTS = {
  singleDefaultGroup: "uq_chat_groups_single_default",
  inviteCode: "chat_groups_invite_code_key",
  defaultIsPublic: "ck_chat_groups_default_public",
  membershipPair: "group_members_group_id_user_id_key",
  receiptPair: "message_read_status_message_id_user_id_key",
  memberGroup: "group_members_group_id_fkey",
  messageGroup: "messages_group_id_fkey",
  messageReplyTo: "messages_reply_to_id_fkey",
  receiptMessage: "message_read_status_message_id_fkey"
} as const;

export type GroupPatch = Readonly<{
  name?: string;
  description?: string;
  inviteCode?: string | null;
  archivedAtMs?: number | null;
  updatedAtMs: number;
}>;

export type MessagePatch = Readonly<{
  content?: string;
  isEdited?: boolean;
  editedAtMs?: number | null;
  isDeleted?: boolean;
  updatedAtMs: number;
}>;

export type MessagePageQuery = Readonly<{
  groupId: string;
  before?: PageCursor;
  limit: number;
}>;

export type GroupWithMemberCount = Readonly<{
  group: ChatGroup;
  memberCount: number;
  // Role of the user the listing was made for; null for the default group when not joined.
  viewerRole: MemberRole | null;
}>;

/**
 * Operations available inside one transaction. Writers that must not race use the
 * `...IfAbsent` primitives or rely on the thrown unique_violation, never a pre-check.
 */
export type ChatStore = Readonly<{
  insertGroup(group: ChatGroup): Promise<void>;
  insertDefaultGroupIfAbsent(group: ChatGroup): Promise<{ group: ChatGroup; created: boolean }>;
  getGroup(groupId: string, options?: Readonly<{ forUpdate?: boolean }>): Promise<ChatGroup | null>;
  getDefaultGroup(): Promise<ChatGroup | null>;
  findGroupByInviteCode(inviteCode: string): Promise<ChatGroup | null>;
  updateGroup(groupId: string, patch: GroupPatch): Promise<ChatGroup | null>;
  listGroupsForUser(userId: string): Promise<ReadonlyArray<GroupWithMemberCount>>;
  countDefaultGroups(): Promise<number>;

  insertMember(member: Membership): Promise<void>;
  insertMemberIfAbsent(member: Membership): Promise<{ member: Membership; created: boolean }>;
  getMembership(groupId: string, userId: string): Promise<Membership | null>;
  deleteMembership(groupId: string, userId: string): Promise<Membership | null>;
  updateMemberRole(groupId: string, userId: string, role: MemberRole): Promise<Membership | null>;
  updateMemberUsername(groupId: string, userId: string, username: string): Promise<Membership | null>;
  listMembers(groupId: string): Promise<ReadonlyArray<Membership>>;

  insertMessage(message: ChatMessage): Promise<void>;
  getMessage(messageId: string, options?: Readonly<{ forUpdate?: boolean }>): Promise<ChatMessage | null>;
  latestMessageCreatedAtMs(groupId: string): Promise<number | null>;
  updateMessage(messageId: string, patch: MessagePatch): Promise<ChatMessage | null>;
  listMessagesPage(query: MessagePageQuery): Promise<ReadonlyArray<ChatMessage>>;
  listReplies(messageId: string): Promise<ReadonlyArray<ChatMessage>>;

  insertReceiptIfAbsent(receipt: ReadReceipt): Promise<{ receipt: ReadReceipt; created: boolean }>;
  countUnread(groupId: string, userId: string, sinceMs: number): Promise<number>;
}>;

export type ChatRepository = ChatStore &
  Readonly<{
    /** Runs `work` atomically: everything it wrote is committed together or not at all. */
    transaction<T>(work: (store: ChatStore) => Promise<T>): Promise<T>;
    close(): Promise<void>;
  }>;
