import jwt from "jsonwebtoken";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ForbiddenRoleError, generateAdminToken, verifyToken } from "./auth";

describe("admin tokens", () => {
  beforeEach(() => {
    vi.stubEnv("JWT_SECRET", "test-secret");
  });

  it("round-trips the subject and role", () => {
    const payload = verifyToken(generateAdminToken(" content-ops "));
    expect(payload.subject).toBe("content-ops");
    expect(payload.role).toBe("banner-admin");
  });

  it("rejects tokens signed with another secret", () => {
    const foreign = jwt.sign({ subject: "ops", role: "banner-admin" }, "other-secret");
    expect(() => verifyToken(foreign)).toThrow(jwt.JsonWebTokenError);
  });

  it("rejects tokens for other roles", () => {
    const viewer = jwt.sign({ subject: "ops", role: "viewer" }, "test-secret");
    expect(() => verifyToken(viewer)).toThrow(ForbiddenRoleError);
  });

  it("rejects tokens without a subject", () => {
    const anonymous = jwt.sign({ role: "banner-admin" }, "test-secret");
    expect(() => verifyToken(anonymous)).toThrow("Token payload is malformed.");
  });

  it("rejects expired tokens", () => {
    expect(() => verifyToken(generateAdminToken("ops", -10))).toThrow(jwt.TokenExpiredError);
  });

  it("requires a subject to issue a token", () => {
    expect(() => generateAdminToken("   ")).toThrow("Token subject must be a non-empty string.");
  });
});
