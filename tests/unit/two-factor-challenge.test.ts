import { describe, expect, it } from "vitest";
import { userId } from "../../src/core/types/brand.js";
import { createInMemoryTwoFactorChallengeStore } from "../../src/infrastructure/database/in-memory-two-factor-challenge.store.js";

const VOTER = userId("voter-1");

const withClock = (start: number) => {
  let now = start;
  const store = createInMemoryTwoFactorChallengeStore(() => now);
  return {
    store,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

describe("InMemory TwoFactorChallengeStore", () => {
  it("opens a challenge that expires after the TTL", async () => {
    const { store, advance } = withClock(1_000);

    expect(await store.open(VOTER, 500)).toEqual({
      ok: true,
      value: { userId: VOTER, expiresAt: 1_500, failedCodes: 0 },
    });

    advance(499);
    expect(await store.find(VOTER)).toEqual({
      ok: true,
      value: { userId: VOTER, expiresAt: 1_500, failedCodes: 0 },
    });

    advance(1);
    expect(await store.find(VOTER)).toEqual({ ok: true, value: null });
  });

  it("counts wrong codes per challenge", async () => {
    const { store } = withClock(0);
    await store.open(VOTER, 1_000);

    expect(await store.recordFailure(VOTER, 5)).toEqual({ ok: true, value: 1 });
    expect(await store.recordFailure(VOTER, 5)).toEqual({ ok: true, value: 2 });
  });

  it("starts a replaced challenge from zero failures", async () => {
    const { store } = withClock(0);
    await store.open(VOTER, 1_000);
    await store.recordFailure(VOTER, 5);
    await store.open(VOTER, 1_000);

    expect(await store.recordFailure(VOTER, 5)).toEqual({ ok: true, value: 1 });
  });

  it("closes the challenge on the failure that reaches the limit", async () => {
    const { store } = withClock(0);
    await store.open(VOTER, 1_000);

    expect(await store.recordFailure(VOTER, 2)).toEqual({ ok: true, value: 1 });
    expect(await store.recordFailure(VOTER, 2)).toEqual({ ok: true, value: 2 });

    expect(await store.find(VOTER)).toEqual({ ok: true, value: null });
    expect(await store.consume(VOTER)).toEqual({ ok: true, value: false });
    expect(await store.recordFailure(VOTER, 2)).toEqual({ ok: true, value: 0 });
  });

  it("records nothing without a challenge", async () => {
    const { store } = withClock(0);
    expect(await store.recordFailure(VOTER, 5)).toEqual({ ok: true, value: 0 });
  });

  it("lets exactly one concurrent caller consume a challenge", async () => {
    const { store } = withClock(0);
    await store.open(VOTER, 1_000);

    const results = await Promise.all([store.consume(VOTER), store.consume(VOTER)]);
    expect(results).toEqual([
      { ok: true, value: true },
      { ok: true, value: false },
    ]);
    expect(await store.find(VOTER)).toEqual({ ok: true, value: null });
  });

  it("does not consume an expired challenge", async () => {
    const { store, advance } = withClock(0);
    await store.open(VOTER, 100);
    advance(100);
    expect(await store.consume(VOTER)).toEqual({ ok: true, value: false });
  });

  it("discard drops the challenge", async () => {
    const { store } = withClock(0);
    await store.open(VOTER, 1_000);
    await store.discard(VOTER);
    expect(await store.find(VOTER)).toEqual({ ok: true, value: null });
  });
});
