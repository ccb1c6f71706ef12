import { describe, expect, it } from "vitest";
import {
  ErrorCode,
  accountLocked,
  appError,
  badRequest,
  conflict,
  httpStatus,
  internal,
  invalidCode,
  invalidCredentials,
  notFound,
  storageUnavailable,
  unauthorized,
  validation,
} from "../../src/core/errors/app-error.js";

describe("AppError", () => {
  it("invalidCredentials → 400 with a fixed message", () => {
    const e = invalidCredentials();
    expect(e.code).toBe(ErrorCode.INVALID_CREDENTIALS);
    expect(e.message).toBe("Unable to log in with provided credentials");
    expect(httpStatus(e.code)).toBe(400);
  });

  it("accountLocked → 423", () => {
    expect(httpStatus(accountLocked().code)).toBe(423);
  });

  it("invalidCode → 401", () => {
    expect(httpStatus(invalidCode().code)).toBe(401);
  });

  it("badRequest → 400 and keeps details", () => {
    const e = badRequest("oops", { field: "username" });
    expect(httpStatus(e.code)).toBe(400);
    expect(e.message).toBe("oops");
    expect(e.details).toEqual({ field: "username" });
  });

  it("unauthorized → 401", () => {
    expect(httpStatus(unauthorized().code)).toBe(401);
  });

  it("notFound → 404", () => {
    const e = notFound("User");
    expect(e.message).toBe("User not found");
    expect(httpStatus(e.code)).toBe(404);
  });

  it("conflict → 409", () => {
    expect(httpStatus(conflict("dup").code)).toBe(409);
  });

  it("validation → 422 with itemized fields", () => {
    const e = validation({ email: ["Enter a valid email address."] });
    expect(httpStatus(e.code)).toBe(422);
    expect(e.details).toEqual({ fields: { email: ["Enter a valid email address."] } });
  });

  it("internal → 500 and keeps the cause", () => {
    const cause = new Error("hash failure");
    const e = internal("Failed to hash password", cause);
    expect(httpStatus(e.code)).toBe(500);
    expect(e.cause).toBe(cause);
    expect(e.details).toBeUndefined();
  });

  it("storageUnavailable → 503", () => {
    expect(httpStatus(storageUnavailable().code)).toBe(503);
  });

  it("appError omits absent optional fields", () => {
    expect(appError(ErrorCode.CONFLICT, "dup")).toEqual({ code: "CONFLICT", message: "dup" });
  });
});
