import { createInMemoryChatRepository } from "../backend/src/repositories/inMemoryChatRepository";
import { createAccessGuard } from "../backend/src/services/accessGuard";
import { SERVICE_CALLER } from "../backend/src/services/chatTypes";
import { alice, bob, carol, makeGroup, makeMember } from "./helpers/chatFixture";

async function seeded() {
  const repo = createInMemoryChatRepository();
  await repo.insertGroup(makeGroup({ id: "g1" }));
  const admin = makeMember({ groupId: "g1", userId: "u-alice", role: "admin" });
  const member = makeMember({ groupId: "g1", userId: "u-bob" });
  await repo.insertMember(admin);
  await repo.insertMember(member);
  return { repo, guard: createAccessGuard({ store: repo }), admin, member };
}

describe("accessGuard", () => {
  it("Given members of a group When they are authorized Then the access carries their membership and admin flag", async () => {
    const { guard, admin, member } = await seeded();

    expect(await guard.authorize(alice, "g1", "admin")).toEqual({
      ok: true,
      value: { trust: "user", membership: admin, isAdmin: true }
    });
    expect(await guard.authorize(bob, "g1", "member")).toEqual({
      ok: true,
      value: { trust: "user", membership: member, isAdmin: false }
    });
  });

  it("Given a plain member When admin access is required Then NOT_AUTHORIZED is returned", async () => {
    const { guard } = await seeded();

    expect(await guard.authorize(bob, "g1", "admin")).toEqual({
      ok: false,
      error: { code: "NOT_AUTHORIZED", message: "Only group admins can do this.", context: { groupId: "g1" } }
    });
  });

  it("Given a missing group or a non-member When authorized Then both answers are identical", async () => {
    const { guard } = await seeded();

    const nonMember = await guard.authorize(carol, "g1", "member");
    const missing = await guard.authorize(carol, "g-missing", "member");
    expect(nonMember).toEqual({
      ok: false,
      error: { code: "NOT_AUTHORIZED", message: "You are not allowed to access this group.", context: { groupId: "g1" } }
    });
    expect(missing).toEqual({
      ok: false,
      error: {
        code: "NOT_AUTHORIZED",
        message: "You are not allowed to access this group.",
        context: { groupId: "g-missing" }
      }
    });
    expect(await guard.authorize(carol, "  ", "member")).toEqual({
      ok: false,
      error: { code: "NOT_AUTHORIZED", message: "You are not allowed to access this group." }
    });
  });

  it("Given the service principal When authorized Then it passes and resolves the acting user's membership", async () => {
    const { guard, member } = await seeded();

    expect(await guard.authorize(SERVICE_CALLER, "g-missing", "admin")).toEqual({
      ok: true,
      value: { trust: "service", membership: null, isAdmin: true }
    });
    expect(await guard.authorize({ trust: "service", userId: "u-bob" }, "g1", "admin")).toEqual({
      ok: true,
      value: { trust: "service", membership: member, isAdmin: true }
    });
  });

  it("Given caller ids padded with whitespace When authorized Then the trimmed id resolves the membership", async () => {
    const { guard, admin, member } = await seeded();

    expect(await guard.authorize({ trust: "service", userId: " u-bob " }, "g1", "member")).toEqual({
      ok: true,
      value: { trust: "service", membership: member, isAdmin: true }
    });
    expect(await guard.authorize({ trust: "user", userId: "u-alice\t", username: "alice" }, "g1", "admin")).toEqual({
      ok: true,
      value: { trust: "user", membership: admin, isAdmin: true }
    });
  });

  it("Given a user caller without a user id When authorized Then INVALID_SESSION is returned", async () => {
    const { guard } = await seeded();

    expect(await guard.authorize({ trust: "user" }, "g1", "member")).toEqual({
      ok: false,
      error: { code: "INVALID_SESSION", message: "Invalid caller." }
    });
  });

  it("Given a transaction When a store is passed Then membership is read through it", async () => {
    const { repo, guard } = await seeded();

    const access = await repo.transaction(async (tx) => {
      await tx.insertMember(makeMember({ groupId: "g1", userId: "u-carol" }));
      return guard.authorize(carol, "g1", "member", tx);
    });

    if (!access.ok) throw new Error("unreachable");
    expect(access.value.membership?.userId).toBe("u-carol");
  });
});
