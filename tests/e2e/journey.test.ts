/**
 * End-to-end account journeys against a migrated SQLite store, wired
 * through the same composition root the CLI uses.
 */

import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { AuthModule } from "../../src/bootstrap.js";
import {
  type OutboxNotifier,
  createOutboxNotifier,
} from "../../src/infrastructure/notifications/log-notifier.js";
import { createTestModule, currentCode, seedUser } from "../helpers/fixtures.js";

const SITE = { protocol: "https", domain: "votaciones.example.org" } as const;

describe("Account journeys (sqlite)", () => {
  let module: AuthModule;
  let outbox: OutboxNotifier;
  let adminToken: string;

  beforeAll(async () => {
    outbox = createOutboxNotifier();
    module = await createTestModule(
      {
        DATABASE_DRIVER: "sqlite",
        DATABASE_PATH: ":memory:",
        AUTH_MAX_FAILED_LOGIN_ATTEMPTS: "3",
      },
      { notifier: outbox },
    );

    await seedUser(module, { username: "admin", password: "admin-pass", isSuperuser: true });
    const login = await module.auth.login({ username: "admin", password: "admin-pass" });
    if (!login.ok || login.value.step !== "authenticated") throw new Error("admin login failed");
    adminToken = login.value.token;
  });

  afterAll(() => {
    module.close();
  });

  it("stores data in SQLite", () => {
    expect(module.storage.db).not.toBe(null);
  });

  it("superuser registers a voter who logs in and out", async () => {
    const registered = await module.registration.registerPrivileged({
      token: adminToken,
      username: "user1",
      password: "pwd1",
    });
    if (!registered.ok) throw new Error(registered.error.message);

    const login = await module.auth.login({ username: "user1", password: "pwd1" });
    if (!login.ok || login.value.step !== "authenticated") throw new Error("login failed");
    expect(login.value.user.id).toBe(registered.value.userPk);

    expect(await module.auth.logout(login.value.token)).toEqual({ ok: true, value: undefined });
    expect(await module.auth.getUser(login.value.token)).toEqual({
      ok: false,
      error: { code: "NOT_FOUND", message: "Token not found" },
    });
    expect((await module.auth.getUser(registered.value.token)).ok).toBe(true);
  });

  it("voter locks the account, an operator unblocks it", async () => {
    await module.registration.registerPrivileged({ token: adminToken, username: "user2", password: "pwd2" });

    const codes: string[] = [];
    for (let i = 0; i < 3; i++) {
      const attempt = await module.auth.login({ username: "user2", password: "wrong" });
      codes.push(attempt.ok ? "ok" : attempt.error.code);
    }
    expect(codes).toEqual(["INVALID_CREDENTIALS", "INVALID_CREDENTIALS", "ACCOUNT_LOCKED"]);

    const locked = await module.auth.login({ username: "user2", password: "pwd2" });
    expect(locked.ok || locked.error.code).toBe("ACCOUNT_LOCKED");

    const user = await module.storage.userRepo.findByUsername("user2");
    if (!user.ok) throw new Error("user2 missing");
    await module.storage.userRepo.update(user.value.id, { isBlocked: false });

    const unlocked = await module.auth.login({ username: "user2", password: "pwd2" });
    expect(unlocked.ok && unlocked.value.step).toBe("authenticated");
  });

  it("self-service voter enrolls in two-factor and logs in with a code", async () => {
    const signup = await module.registration.registerSelfService({
      email: "usuariodeprueba@gmail.com",
      password1: "pruebapass123",
      password2: "pruebapass123",
    });
    if (!signup.ok) throw new Error(signup.error.message);
    const id = signup.value.user.id;

    const enrollment = await module.twoFactor.beginEnrollment(id);
    if (!enrollment.ok) throw new Error(enrollment.error.message);
    const { secret } = enrollment.value;
    expect(await module.twoFactor.confirmEnrollment(id, currentCode(module, secret))).toEqual({
      ok: true,
      value: undefined,
    });

    const step = await module.auth.login({
      username: "usuariodeprueba@gmail.com",
      password: "pruebapass123",
    });
    if (!step.ok || step.value.step !== "awaiting_code") throw new Error("expected a challenge");

    const verified = await module.auth.verifyTwoFactor({
      userId: step.value.userId,
      code: currentCode(module, secret),
    });
    expect(verified.ok && verified.value.step).toBe("authenticated");
  });

  it("voter resets a forgotten password by email", async () => {
    await module.registration.registerSelfService({
      email: "olvidadizo@example.com",
      password1: "primera-clave-larga",
      password2: "primera-clave-larga",
    });

    await module.passwordReset.requestPasswordReset({ email: "olvidadizo@example.com" }, SITE);
    const mail = outbox.sent.find((m) => m.to === "olvidadizo@example.com");
    const [, uidb64 = "", token = ""] =
      /\/authentication\/reset\/([^/]+)\/([^/]+)\//.exec(mail?.text ?? "") ?? [];

    const confirmed = await module.passwordReset.confirmPasswordReset({
      uidb64,
      token,
      password1: "segunda-clave-larga",
      password2: "segunda-clave-larga",
    });
    expect(confirmed).toEqual({ ok: true, value: undefined });

    const login = await module.auth.login({
      username: "olvidadizo@example.com",
      password: "segunda-clave-larga",
    });
    expect(login.ok && login.value.step).toBe("authenticated");
  });
});
