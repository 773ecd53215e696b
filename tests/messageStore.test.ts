import type { FeedEvent } from "../backend/src/realtime/changeFeed";
import { SERVICE_CALLER, type ChatMessage } from "../backend/src/services/chatTypes";
import { renderForViewer } from "../backend/src/services/messageStore";
import { T0, alice, bob, carol, createChatFixture } from "./helpers/chatFixture";

type Fixture = ReturnType<typeof createChatFixture>;

function makeMessage(overrides: Partial<ChatMessage> & Pick<ChatMessage, "id" | "groupId">): ChatMessage {
  return {
    senderId: "u-alice",
    senderUsername: "alice",
    content: overrides.id,
    messageType: "text",
    replyToId: null,
    metadata: {},
    isEdited: false,
    editedAtMs: null,
    isDeleted: false,
    createdAtMs: T0,
    updatedAtMs: T0,
    ...overrides
  };
}

// alice (admin) creates a public room; bob and carol join. Clock ends at T0 + 1000.
async function room(fx: Fixture): Promise<string> {
  const created = await fx.groups.createGroup(alice, { name: "Room" });
  if (!created.ok) throw new Error("unreachable");
  await fx.memberships.join(bob, created.value.id);
  await fx.memberships.join(carol, created.value.id);
  fx.advance(1_000);
  return created.value.id;
}

async function sendText(fx: Fixture, caller: typeof alice, groupId: string, content: string, replyToId?: string) {
  const sent = await fx.messages.send(caller, { groupId, content, replyToId });
  if (!sent.ok) throw new Error(`unexpected ${sent.error.code}`);
  return sent.value;
}

describe("messageStore", () => {
  it("Given invalid dependencies When createMessageStore is called Then it throws deterministically", () => {
    expect(() => createChatFixture({ maxContentLength: 0 })).toThrow("messageStore requires a positive maxContentLength.");
  });

  it("Given a member's message When another member replies Then getThread returns the reply", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);

    const m1 = await sendText(fx, alice, groupId, "  hello  ");
    expect(m1).toMatchObject({
      groupId,
      senderId: "u-alice",
      senderUsername: "alice",
      content: "hello",
      messageType: "text",
      replyToId: null,
      metadata: {},
      isEdited: false,
      isDeleted: false,
      createdAtMs: T0 + 1_000
    });
    const m2 = await sendText(fx, bob, groupId, "hi back", m1.id);
    expect(m2.replyToId).toBe(m1.id);
    expect(m2.createdAtMs).toBe(T0 + 1_001);

    const thread = await fx.messages.getThread(carol, m1.id);
    if (!thread.ok) throw new Error("unreachable");
    expect(thread.value.map((m) => m.id)).toEqual([m2.id]);
  });

  it("Given a soft-deleted message When pages are listed Then it keeps its position as a tombstone for non-admins", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);
    const sent = await fx.messages.send(bob, { groupId, content: "first", metadata: { mood: "happy" } });
    if (!sent.ok) throw new Error("unreachable");
    const m1 = sent.value;
    const m2 = await sendText(fx, carol, groupId, "reply", m1.id);

    const deleted = await fx.messages.softDelete(bob, m1.id);
    if (!deleted.ok) throw new Error("unreachable");
    expect(deleted.value).toMatchObject({ id: m1.id, isDeleted: true, content: "", metadata: {} });

    const forCarol = await fx.messages.listPage(carol, groupId, { limit: 2 });
    if (!forCarol.ok) throw new Error("unreachable");
    expect(forCarol.value.messages.map((m) => [m.id, m.content, m.isDeleted])).toEqual([
      [m2.id, "reply", false],
      [m1.id, "", true]
    ]);
    expect(forCarol.value.messages[1]?.metadata).toEqual({});

    const forAdmin = await fx.messages.listPage(alice, groupId, { limit: 2 });
    if (!forAdmin.ok) throw new Error("unreachable");
    expect(forAdmin.value.messages[1]).toMatchObject({ id: m1.id, content: "first", metadata: { mood: "happy" } });

    const thread = await fx.messages.getThread(carol, m1.id);
    if (!thread.ok) throw new Error("unreachable");
    expect(thread.value.map((m) => m.id)).toEqual([m2.id]);

    const again = await fx.messages.softDelete(bob, m1.id);
    expect(again).toEqual({ ok: false, error: { code: "MESSAGE_NOT_FOUND", message: "Message not found.", context: { messageId: m1.id } } });
  });

  it("Given replies When pages are listed Then each carries a preview of its parent, with tombstone text once the parent is deleted", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);
    const parent = await sendText(fx, bob, groupId, "lunch?");
    const reply = await sendText(fx, carol, groupId, "yes", parent.id);
    const plain = await sendText(fx, alice, groupId, "ok");

    const before = await fx.messages.listPage(carol, groupId, { limit: 2 });
    if (!before.ok) throw new Error("unreachable");
    expect(before.value.messages.map((m) => [m.id, m.replyToContent, m.replyToUsername])).toEqual([
      [plain.id, null, null],
      [reply.id, "lunch?", "bob"]
    ]);

    const deleted = await fx.messages.softDelete(bob, parent.id);
    if (!deleted.ok) throw new Error("unreachable");

    const forCarol = await fx.messages.listPage(carol, groupId, { limit: 2 });
    if (!forCarol.ok) throw new Error("unreachable");
    expect(forCarol.value.messages[1]).toMatchObject({
      id: reply.id,
      replyToContent: "[Message deleted]",
      replyToUsername: "bob"
    });

    const forAdmin = await fx.messages.listPage(alice, groupId, { limit: 3 });
    if (!forAdmin.ok) throw new Error("unreachable");
    expect(forAdmin.value.messages.map((m) => [m.id, m.replyToContent])).toEqual([
      [plain.id, null],
      [reply.id, "lunch?"],
      [parent.id, null]
    ]);
  });

  it("Given an admin When they delete another member's message Then a removal notice is posted", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);
    const m1 = await sendText(fx, carol, groupId, "oops");

    const byOther = await fx.messages.softDelete(bob, m1.id);
    if (byOther.ok) throw new Error("unreachable");
    expect(byOther.error.code).toBe("NOT_AUTHORIZED");

    const byAdmin = await fx.messages.softDelete(alice, m1.id);
    if (!byAdmin.ok) throw new Error("unreachable");
    expect(byAdmin.value).toMatchObject({ isDeleted: true, content: "oops" });

    const page = await fx.messages.listPage(bob, groupId, { limit: 1 });
    if (!page.ok) throw new Error("unreachable");
    expect(page.value.messages[0]).toMatchObject({
      content: "A message was removed by alice",
      messageType: "system",
      createdAtMs: T0 + 1_001
    });
  });

  it("Given a sent message When it is edited Then only the sender may edit and createdAtMs never changes", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);
    const m1 = await sendText(fx, bob, groupId, "typo");
    fx.advance(500);

    const byOther = await fx.messages.edit(alice, m1.id, "hijack");
    expect(byOther).toEqual({
      ok: false,
      error: { code: "NOT_AUTHORIZED", message: "Only the sender can edit this message.", context: { messageId: m1.id } }
    });

    const empty = await fx.messages.edit(bob, m1.id, "   ");
    expect(empty).toEqual({ ok: false, error: { code: "INVALID_INPUT", message: "Message content is required." } });

    const edited = await fx.messages.edit(bob, m1.id, "fixed");
    if (!edited.ok) throw new Error("unreachable");
    expect(edited.value).toMatchObject({
      content: "fixed",
      isEdited: true,
      editedAtMs: T0 + 1_500,
      updatedAtMs: T0 + 1_500,
      createdAtMs: T0 + 1_000
    });

    const page = await fx.messages.listPage(alice, groupId, { limit: 1 });
    if (!page.ok) throw new Error("unreachable");
    expect(page.value.messages[0]?.content).toBe("fixed");
  });

  it("Given a system message When its author or an admin tries to edit it Then the edit is refused", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);
    const notice = await fx.messages.postSystemMessage(groupId, "Maintenance tonight");
    if (!notice.ok) throw new Error("unreachable");
    expect(notice.value).toMatchObject({ senderId: null, senderUsername: null, messageType: "system" });

    const byAdmin = await fx.messages.edit(alice, notice.value.id, "changed");
    if (byAdmin.ok) throw new Error("unreachable");
    expect(byAdmin.error.code).toBe("NOT_AUTHORIZED");

    const byService = await fx.messages.edit(SERVICE_CALLER, notice.value.id, "changed");
    if (byService.ok) throw new Error("unreachable");
    expect(byService.error.code).toBe("INVALID_INPUT");
  });

  it("Given malformed sends When send is called Then input and authorship rules are enforced", async () => {
    const fx = createChatFixture({ maxContentLength: 10 });
    const groupId = await room(fx);

    expect(await fx.messages.send(alice, { groupId, content: "   " })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Message content is required." }
    });
    expect(await fx.messages.send(alice, { groupId, content: "01234567890" })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Message content is too long.", context: { maxLength: 10 } }
    });
    expect(await fx.messages.send(alice, { groupId, content: "x", type: "shout" })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Invalid message type." }
    });
    expect(await fx.messages.send(alice, { groupId, content: "x", metadata: ["a"] })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Message metadata must be an object." }
    });
    expect(await fx.messages.send(alice, { groupId, content: "x", type: "system" })).toEqual({
      ok: false,
      error: { code: "NOT_AUTHORIZED", message: "System messages are authored by the service." }
    });
    expect(await fx.messages.send(SERVICE_CALLER, { groupId, content: "x" })).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Text messages require a sender." }
    });

    const memberAnnouncement = await fx.messages.send(bob, { groupId, content: "hear ye", type: "admin_announcement" });
    expect(memberAnnouncement).toEqual({
      ok: false,
      error: { code: "NOT_AUTHORIZED", message: "Only group admins can post announcements.", context: { groupId } }
    });
    const adminAnnouncement = await fx.messages.send(alice, { groupId, content: "hear ye", type: "admin_announcement" });
    if (!adminAnnouncement.ok) throw new Error("unreachable");
    expect(adminAnnouncement.value.messageType).toBe("admin_announcement");
  });

  it("Given the service acting for a user who is not a member When it sends Then NOT_A_MEMBER is returned", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);

    const sent = await fx.messages.send({ trust: "service", userId: "u-dave", username: "dave" }, { groupId, content: "hi" });
    expect(sent).toEqual({
      ok: false,
      error: { code: "NOT_A_MEMBER", message: "The sender is not a member of this group.", context: { groupId } }
    });
  });

  it("Given reply targets When they are missing, deleted or in another group Then INVALID_REPLY_TARGET is returned", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);
    const other = await fx.groups.createGroup(alice, { name: "Elsewhere" });
    if (!other.ok) throw new Error("unreachable");
    const foreign = await sendText(fx, alice, other.value.id, "over here");
    const doomed = await sendText(fx, alice, groupId, "soon gone");
    await fx.messages.softDelete(alice, doomed.id);

    for (const replyToId of ["no-such-message", foreign.id, doomed.id]) {
      const sent = await fx.messages.send(alice, { groupId, content: "re", replyToId });
      expect(sent).toEqual({
        ok: false,
        error: {
          code: "INVALID_REPLY_TARGET",
          message: "The reply target is not a message in this group.",
          context: { replyToId }
        }
      });
    }
  });

  it("Given a non-member When any group-scoped operation is called Then NOT_AUTHORIZED is returned, never a not-found", async () => {
    const fx = createChatFixture();
    const created = await fx.groups.createGroup(alice, { name: "Closed", isPublic: false });
    if (!created.ok) throw new Error("unreachable");
    const groupId = created.value.id;
    const m1 = await sendText(fx, alice, groupId, "members only");

    const results = [
      await fx.groups.getGroup(bob, groupId),
      await fx.groups.getGroup(bob, "no-such-group"),
      await fx.groups.updateGroup(bob, groupId, { name: "Mine" }),
      await fx.groups.archiveGroup(bob, groupId),
      await fx.memberships.listMembers(bob, groupId),
      await fx.memberships.setRole(bob, groupId, "u-bob", "admin"),
      await fx.messages.send(bob, { groupId, content: "let me in" }),
      await fx.messages.listPage(bob, groupId),
      await fx.messages.listPage(bob, "no-such-group"),
      await fx.messages.getMessage(bob, m1.id),
      await fx.messages.getThread(bob, m1.id),
      await fx.messages.edit(bob, m1.id, "mine now"),
      await fx.messages.softDelete(bob, m1.id),
      await fx.receipts.markRead(bob, m1.id),
      await fx.receipts.unreadCount(bob, groupId)
    ];

    expect(results.map((r) => (r.ok ? "ok" : r.error.code))).toEqual(Array(results.length).fill("NOT_AUTHORIZED"));
  });

  it("Given equal timestamps When paging with cursors Then every message is returned once in (createdAtMs, id) order", async () => {
    const fx = createChatFixture();
    const created = await fx.groups.createGroup(alice, { name: "Busy" });
    if (!created.ok) throw new Error("unreachable");
    const groupId = created.value.id;
    for (const id of ["msg-1", "msg-2", "msg-3", "msg-4", "msg-5"]) {
      await fx.repo.insertMessage(makeMessage({ id, groupId, createdAtMs: T0 + 100, updatedAtMs: T0 + 100 }));
    }

    const seen: string[] = [];
    const first = await fx.messages.listPage(alice, groupId, { limit: 2 });
    if (!first.ok) throw new Error("unreachable");
    expect(first.value.messages.map((m) => m.id)).toEqual(["msg-5", "msg-4"]);
    expect(first.value.nextCursor).toEqual({ createdAtMs: T0 + 100, id: "msg-4" });
    expect(first.value.hasMore).toBe(true);
    seen.push(...first.value.messages.map((m) => m.id));

    let cursor = first.value.nextCursor;
    while (cursor) {
      const page = await fx.messages.listPage(alice, groupId, { limit: 2, before: cursor });
      if (!page.ok) throw new Error("unreachable");
      seen.push(...page.value.messages.map((m) => m.id));
      cursor = page.value.nextCursor;
    }

    expect(seen).toHaveLength(6);
    expect(new Set(seen).size).toBe(6);
    expect(seen.slice(0, 5)).toEqual(["msg-5", "msg-4", "msg-3", "msg-2", "msg-1"]);

    const olderOnly = await fx.messages.listPage(alice, groupId, { before: { createdAtMs: T0 + 100 } });
    if (!olderOnly.ok) throw new Error("unreachable");
    expect(olderOnly.value.messages.map((m) => m.content)).toEqual(['Group "Busy" created by alice']);
    expect(olderOnly.value).toMatchObject({ hasMore: false, nextCursor: null });

    const zero = await fx.messages.listPage(alice, groupId, { limit: 0 });
    expect(zero).toEqual({ ok: false, error: { code: "INVALID_INPUT", message: "Page limit must be a positive integer." } });
  });

  it("Given concurrent sends When the feed delivers them Then feed order equals listPage order reversed", async () => {
    const fx = createChatFixture();
    const groupId = await room(fx);
    const received: FeedEvent[] = [];
    fx.feed.subscribe(groupId, (event) => {
      received.push(event);
    });

    const sends = await Promise.all([
      fx.messages.send(alice, { groupId, content: "a1" }),
      fx.messages.send(bob, { groupId, content: "b1" }),
      fx.messages.send(carol, { groupId, content: "c1" }),
      fx.messages.send(alice, { groupId, content: "a2" }),
      fx.messages.send(bob, { groupId, content: "   " })
    ]);
    await fx.feed.drain();

    expect(sends.filter((r) => r.ok)).toHaveLength(4);
    const page = await fx.messages.listPage(alice, groupId, { limit: 4 });
    if (!page.ok) throw new Error("unreachable");
    expect(received.map((e) => e.message.id)).toEqual(page.value.messages.map((m) => m.id).reverse());
    expect(received.map((e) => e.message.content)).toEqual(["a1", "b1", "c1", "a2"]);
    expect(received.every((e) => e.type === "message_created" && e.groupId === groupId)).toBe(true);
  });

  it("Given a deleted message When renderForViewer is called Then only privileged viewers see its content", () => {
    const message = makeMessage({ id: "m", groupId: "g", content: "secret", metadata: { k: 1 }, isDeleted: true });

    expect(renderForViewer(message, true)).toBe(message);
    expect(renderForViewer(message, false)).toEqual({ ...message, content: "", metadata: {} });
    expect(renderForViewer({ ...message, isDeleted: false }, false).content).toBe("secret");
  });
});
