import { describe, it, expect } from "vitest";
import { SecurityService, TOKEN_LENGTH } from "./security.js";
import {
  STRONG_PASSWORD,
  TEST_SECURITY_CONFIG,
  TestClock,
  WEAK_PASSWORD,
} from "../test/helpers.js";

describe("SecurityService", () => {
  const clock = new TestClock("2026-03-01T12:00:00.000Z");
  const security = new SecurityService(TEST_SECURITY_CONFIG, clock.now);

  it("hashes a password so that only the same password verifies", async () => {
    const hash = await security.hashPassword(STRONG_PASSWORD);
    expect(hash.startsWith("$argon2id$")).toBe(true);
    expect(hash).not.toContain(STRONG_PASSWORD);
    expect(await security.verifyPassword(STRONG_PASSWORD, hash)).toBe(true);
    expect(await security.verifyPassword(`${STRONG_PASSWORD}x`, hash)).toBe(false);
  });

  it("salts each hash", async () => {
    const a = await security.hashPassword(STRONG_PASSWORD);
    const b = await security.hashPassword(STRONG_PASSWORD);
    expect(a).not.toBe(b);
  });

  it("treats a malformed stored hash as a mismatch", async () => {
    expect(await security.verifyPassword(STRONG_PASSWORD, "not-a-hash")).toBe(false);
  });

  it("salts with the configured number of bytes", async () => {
    const wide = new SecurityService({ ...TEST_SECURITY_CONFIG, passwordSaltLength: 32 });
    const hash = await wide.hashPassword(STRONG_PASSWORD);
    const salt = hash.split("$")[4];
    expect(Buffer.from(salt, "base64")).toHaveLength(32);
    expect(await wide.verifyPassword(STRONG_PASSWORD, hash)).toBe(true);

    const narrow = await security.hashPassword(STRONG_PASSWORD);
    expect(Buffer.from(narrow.split("$")[4], "base64")).toHaveLength(16);
  });

  it("propagates argon2 failures on a corrupt argon2 hash", async () => {
    await expect(
      security.verifyPassword(STRONG_PASSWORD, "$argon2id$v=19$m=4096,t=2,p=1$!!!!$!!!!"),
    ).rejects.toThrow();
  });

  it("scores password strength", () => {
    expect(security.passwordStrength(WEAK_PASSWORD)).toBe(0);
    expect(security.isPasswordAcceptable(WEAK_PASSWORD)).toBe(false);
    expect(security.passwordStrength(STRONG_PASSWORD)).toBeGreaterThanOrEqual(3);
    expect(security.isPasswordAcceptable(STRONG_PASSWORD)).toBe(true);
  });

  it("generates alphanumeric token strings of fixed length", () => {
    const seen = new Set<string>();
    for (let i = 0; i < 50; i++) {
      const token = security.generateTokenString();
      expect(token).toMatch(/^[A-Za-z0-9]+$/);
      expect(token).toHaveLength(TOKEN_LENGTH);
      seen.add(token);
    }
    expect(seen.size).toBe(50);
  });

  it("hashes token strings deterministically with SHA-256", () => {
    expect(security.hashTokenString("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
    const token = security.generateTokenString();
    expect(security.hashTokenString(token)).toBe(security.hashTokenString(token));
    expect(security.hashTokenString(token)).not.toBe(
      security.hashTokenString(security.generateTokenString()),
    );
  });

  it("stamps tokens with the clock and the configured lifetime", () => {
    const { tokenString, token } = security.makeRegistrationToken("user-1");
    expect(token).toEqual({
      token_hash: security.hashTokenString(tokenString),
      created_at: "2026-03-01T12:00:00.000Z",
      expired_at: "2026-03-08T12:00:00.000Z",
      user_id: "user-1",
    });

    const access = security.makeAccessToken("session-1").token;
    expect(access.session_id).toBe("session-1");
    expect(access.expired_at).toBe("2026-03-01T12:10:00.000Z");

    const refresh = security.makeRefreshToken("session-1").token;
    expect(refresh.expired_at).toBe("2026-03-02T12:00:00.000Z");

    const change = security.makeChangeEmailToken("user-1", "new@example.com").token;
    expect(change.email).toBe("new@example.com");
    expect(change.expired_at).toBe("2026-03-02T12:00:00.000Z");

    const reset = security.makePasswordToken("user-1").token;
    expect(reset.user_id).toBe("user-1");
    expect(reset.expired_at).toBe("2026-03-02T12:00:00.000Z");
  });
});
