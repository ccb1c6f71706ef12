import { describe, expect, it } from "vitest";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import { userId } from "../../src/core/types/brand.js";
import { STORAGE_DRIVERS } from "../helpers/storage.js";

describe.each(STORAGE_DRIVERS)("UserRepository (%s)", (_driver, open) => {
  it("creates a user with defaults and finds it by id, username and email", async () => {
    const { userRepo } = await open();
    const created = await userRepo.create({
      username: "voter1",
      email: "voter1@example.com",
      passwordHash: "hash-1",
    });
    if (!created.ok) throw new Error(created.error.message);

    expect(created.value).toMatchObject({
      username: "voter1",
      email: "voter1@example.com",
      passwordHash: "hash-1",
      isSuperuser: false,
      isBlocked: false,
      totpSecret: null,
      totpConfirmed: false,
    });

    for (const found of [
      await userRepo.findById(created.value.id),
      await userRepo.findByUsername("voter1"),
      await userRepo.findByEmail("voter1@example.com"),
    ]) {
      expect(found).toEqual({ ok: true, value: created.value });
    }
  });

  it("returns NOT_FOUND for misses", async () => {
    const { userRepo } = await open();
    const byId = await userRepo.findById(userId("missing"));
    const byName = await userRepo.findByUsername("missing");
    const byEmail = await userRepo.findByEmail("missing@example.com");

    for (const result of [byId, byName, byEmail]) {
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(ErrorCode.NOT_FOUND);
    }
  });

  it("rejects a duplicate username with CONFLICT and leaves the original intact", async () => {
    const { userRepo } = await open();
    const first = await userRepo.create({ username: "user1", passwordHash: "hash-1" });
    const second = await userRepo.create({ username: "user1", passwordHash: "hash-2" });

    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error.code).toBe(ErrorCode.CONFLICT);
      expect(second.error.message).toBe("Username already exists");
    }

    const found = await userRepo.findByUsername("user1");
    expect(found.ok && first.ok && found.value.passwordHash === "hash-1").toBe(true);
  });

  it("rejects a duplicate email with CONFLICT", async () => {
    const { userRepo } = await open();
    await userRepo.create({ username: "a", email: "same@example.com", passwordHash: "h" });
    const second = await userRepo.create({
      username: "b",
      email: "same@example.com",
      passwordHash: "h",
    });

    expect(second.ok).toBe(false);
    if (!second.ok) expect(second.error.message).toBe("Email already exists");
  });

  it("allows many users without an email", async () => {
    const { userRepo } = await open();
    const a = await userRepo.create({ username: "a", passwordHash: "h" });
    const b = await userRepo.create({ username: "b", email: null, passwordHash: "h" });
    expect(a.ok && b.ok).toBe(true);
  });

  it("updates only the given fields", async () => {
    const { userRepo } = await open();
    const created = await userRepo.create({ username: "voter1", passwordHash: "hash-1" });
    if (!created.ok) throw new Error(created.error.message);

    const updated = await userRepo.update(created.value.id, {
      isBlocked: true,
      totpSecret: "JBSWY3DPEHPK3PXP",
    });
    if (!updated.ok) throw new Error(updated.error.message);

    expect(updated.value).toMatchObject({
      username: "voter1",
      passwordHash: "hash-1",
      isBlocked: true,
      totpSecret: "JBSWY3DPEHPK3PXP",
      totpConfirmed: false,
    });

    const cleared = await userRepo.update(created.value.id, { totpSecret: null });
    expect(cleared.ok && cleared.value.totpSecret).toBe(null);
  });

  it("returns NOT_FOUND when updating a missing user", async () => {
    const { userRepo } = await open();
    const result = await userRepo.update(userId("missing"), { isBlocked: true });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(ErrorCode.NOT_FOUND);
  });
});
