import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestApp, type TestApp } from "../../test/helpers.js";
import { getRootVersion } from "./routes.js";

describe("health routes", () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.close();
  });

  it("answers ping", async () => {
    const res = await t.app.inject({ method: "GET", url: "/ping" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ message: "pong" });
  });

  it("reports a healthy database", async () => {
    const res = await t.app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, timestamp: expect.any(String) });
  });

  it("reports 503 when the database is gone", async () => {
    t.ctx.pool.close();
    const res = await t.app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ ok: false });
  });

  it("returns the root package version", async () => {
    const res = await t.app.inject({ method: "GET", url: "/version" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ version: getRootVersion() });
    expect(getRootVersion()).toBe("0.1.0");
  });

  it("answers unknown routes with not_found", async () => {
    const res = await t.app.inject({ method: "GET", url: "/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "Route GET /nope not found", key: "not_found" });
  });
});
