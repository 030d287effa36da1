import { describe, expect, it } from "vitest";
import {
  ErrorCode,
  badRequest,
  cancelled,
  duplicateTarget,
  httpStatus,
  internal,
  isServerFault,
  notFound,
  protocolViolation,
  renderFailed,
  validation,
} from "../../src/core/errors/app-error.js";

describe("AppError", () => {
  it("badRequest → 400", () => {
    const e = badRequest("oops");
    expect(e.code).toBe(ErrorCode.BAD_REQUEST);
    expect(httpStatus(e.code)).toBe(400);
    expect(e.message).toBe("oops");
  });

  it("notFound → 404", () => {
    const e = notFound("Team");
    expect(e.message).toBe("Team not found");
    expect(httpStatus(e.code)).toBe(404);
  });

  it("validation → 422 with details", () => {
    const e = validation({ name: "required" });
    expect(httpStatus(e.code)).toBe(422);
    expect(e.details).toEqual({ name: "required" });
  });

  it("cancelled is a client condition", () => {
    const e = cancelled();
    expect(httpStatus(e.code)).toBe(499);
    expect(isServerFault(e)).toBe(false);
  });

  it("internal → 500", () => {
    expect(httpStatus(internal().code)).toBe(500);
    expect(internal().cause).toBeUndefined();
  });

  describe("composition faults", () => {
    it("protocolViolation names the path", () => {
      const e = protocolViolation("/teams/t1/switch");
      expect(e.code).toBe(ErrorCode.PROTOCOL_VIOLATION);
      expect(e.message).toBe("/teams/t1/switch is only reachable through fragment requests");
      expect(e.details).toEqual({ path: "/teams/t1/switch" });
      expect(isServerFault(e)).toBe(true);
    });

    it("renderFailed keeps the cause", () => {
      const cause = new Error("bad value");
      const e = renderFailed("pages/home", cause);
      expect(e.message).toBe('Failed to render template "pages/home"');
      expect(e.cause).toBe(cause);
      expect(httpStatus(e.code)).toBe(500);
    });

    it("duplicateTarget names the target", () => {
      const e = duplicateTarget("toast-container");
      expect(e.details).toEqual({ targetId: "toast-container" });
      expect(isServerFault(e)).toBe(true);
    });
  });
});
