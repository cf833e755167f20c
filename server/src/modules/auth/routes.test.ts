import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createTestApp,
  OTHER_STRONG_PASSWORD,
  STRONG_PASSWORD,
  WEAK_PASSWORD,
  type TestApp,
} from "../../test/helpers.js";

describe("auth routes", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  const register = (email: string, password = STRONG_PASSWORD) =>
    t.app.inject({
      method: "POST",
      url: "/auth/register",
      payload: { name: "Ada", email, password },
    });

  const verify = (token: string) =>
    t.app.inject({ method: "POST", url: "/auth/register/verify", payload: { token } });

  const login = (email: string, password = STRONG_PASSWORD) =>
    t.app.inject({ method: "POST", url: "/auth/login", payload: { email, password } });

  it("registers a newcomer and mails a confirmation link", async () => {
    const res = await register(" ADA@Example.com ");
    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({
      user_id: expect.any(String),
      name: "Ada",
      email: "ada@example.com",
      created_at: "2026-03-01T12:00:00.000Z",
      marketing_agree: false,
    });

    const token = await t.lastToken("ada@example.com");
    expect(token).toMatch(/^[A-Za-z0-9]{64}$/);
    expect(t.sent[0].subject).toBe("Confirm your Gatehouse registration");
  });

  it("rejects a weak password", async () => {
    const res = await register("ada@example.com", WEAK_PASSWORD);
    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      error: "Password is too weak",
      key: "password.improper",
      loc: ["body", "password"],
    });
  });

  it("rejects an invalid body", async () => {
    const res = await register("not-an-email");
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ error: "Valid email is required", key: "validation" });
  });

  it("answers 409 for a taken email and for too many pending registrations", async () => {
    await register("ada@example.com");
    await register("ada@example.com");
    await register("ada@example.com");
    const tooMany = await register("ada@example.com");
    expect(tooMany.statusCode).toBe(409);
    expect(tooMany.json()).toMatchObject({ key: "conflict" });

    const token = await t.lastToken("ada@example.com");
    expect((await verify(token)).statusCode).toBe(200);
    const taken = await register("ada@example.com");
    expect(taken.statusCode).toBe(409);
    expect(taken.json()).toMatchObject({ key: "email.already_exists" });
  });

  it("verifies a registration once", async () => {
    await register("ada@example.com");
    const token = await t.lastToken("ada@example.com");

    const res = await verify(token);
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      email: "ada@example.com",
      role: "user",
      verified_at: "2026-03-01T12:00:00.000Z",
    });

    const again = await verify(token);
    expect(again.statusCode).toBe(403);
    expect(again.json()).toEqual({ error: "Token not found", key: "forbidden" });
  });

  it("answers email.already_verified for a second pending registration", async () => {
    await register("ada@example.com");
    const first = await t.lastToken("ada@example.com");
    await register("ada@example.com");
    const second = await t.lastToken("ada@example.com");
    expect((await verify(first)).statusCode).toBe(200);

    const res = await verify(second);
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: "Email already verified", key: "email.already_verified" });
  });

  it("logs in, refreshes and logs out", async () => {
    await register("ada@example.com");
    await verify(await t.lastToken("ada@example.com"));

    const res = await login("ada@example.com");
    expect(res.statusCode).toBe(200);
    const pair = res.json<{ access_token: string; refresh_token: string }>();

    const refreshed = await t.app.inject({
      method: "POST",
      url: "/auth/refresh_token",
      payload: { token: pair.refresh_token },
    });
    expect(refreshed.statusCode).toBe(200);
    const next = refreshed.json<{ access_token: string; refresh_token: string }>();

    const reused = await t.app.inject({
      method: "POST",
      url: "/auth/refresh_token",
      payload: { token: pair.refresh_token },
    });
    expect(reused.statusCode).toBe(403);
    expect(reused.json()).toMatchObject({ key: "forbidden" });

    const out = await t.app.inject({
      method: "POST",
      url: "/auth/logout",
      headers: { authorization: `Bearer ${next.access_token}` },
    });
    expect(out.statusCode).toBe(200);
    expect(out.json()).toEqual({});

    const me = await t.app.inject({
      method: "GET",
      url: "/users/me",
      headers: { authorization: `Bearer ${pair.access_token}` },
    });
    expect(me.statusCode).toBe(403);
  });

  it("keeps login failures indistinguishable", async () => {
    await register("ada@example.com");
    await verify(await t.lastToken("ada@example.com"));

    const wrong = await login("ada@example.com", OTHER_STRONG_PASSWORD);
    const unknown = await login("bob@example.com");
    expect(wrong.statusCode).toBe(403);
    expect(unknown.statusCode).toBe(403);
    expect(wrong.json()).toEqual({ error: "Invalid email or password", key: "credentials.invalid" });
    expect(unknown.json()).toEqual(wrong.json());
  });

  it("tells a pending registration to confirm its email", async () => {
    await register("ada@example.com");
    const res = await login("ada@example.com");
    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({ error: "Email is not confirmed", key: "email.not_confirmed" });
  });

  it("checks the authorization header", async () => {
    const cases: Array<[Record<string, string>, string]> = [
      [{}, "authorization.not_set"],
      [{ authorization: "Bearer" }, "authorization.scheme_unrecognised"],
      [{ authorization: "Basic abc" }, "authorization.scheme_invalid"],
      [{ authorization: "Bearer unknown" }, "forbidden"],
    ];
    for (const [headers, key] of cases) {
      const res = await t.app.inject({ method: "POST", url: "/auth/logout", headers });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toMatchObject({ key });
    }
  });
});
