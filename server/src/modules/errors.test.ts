import Fastify from "fastify";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  IdentityError,
  PoolTimeoutError,
  TransactionError,
} from "../services/errors.js";
import { AppError, IDENTITY_ERRORS, registerErrorHandler, toAppError } from "./errors.js";

describe("toAppError", () => {
  it("maps identity kinds through the table", () => {
    expect(toAppError(new IdentityError("user_already_exists"))).toMatchObject({
      statusCode: 409,
      key: "email.already_exists",
    });
    expect(toAppError(new IdentityError("token_not_found"))).toMatchObject({
      statusCode: 403,
      key: "forbidden",
      message: IDENTITY_ERRORS.token_not_found.message,
    });
    expect(toAppError(new IdentityError("email_not_confirmed"))).toMatchObject({
      statusCode: 403,
      key: "email.not_confirmed",
    });
  });
});

describe("registerErrorHandler", () => {
  const app = Fastify({ logger: false, requestIdHeader: "x-request-id" });

  beforeAll(async () => {
    registerErrorHandler(app);
    app.get("/app-error", async () => {
      throw new AppError(418, "teapot", "Short and stout", ["query", "cup"]);
    });
    app.get("/identity", async () => {
      throw new IdentityError("too_many_password_tokens");
    });
    app.get("/transaction", async () => {
      throw new TransactionError(5);
    });
    app.get("/pool", async () => {
      throw new PoolTimeoutError(100);
    });
    app.get("/boom", async () => {
      throw new Error("boom");
    });
    app.post("/json", async () => ({}));
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("sends AppError status, key and loc", async () => {
    const res = await app.inject({ method: "GET", url: "/app-error" });
    expect(res.statusCode).toBe(418);
    expect(res.json()).toEqual({ error: "Short and stout", key: "teapot", loc: ["query", "cup"] });
  });

  it("translates identity errors", async () => {
    const res = await app.inject({ method: "GET", url: "/identity" });
    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({ error: "Too many password reset requests", key: "conflict" });
  });

  it("hides unexpected failures behind server_error", async () => {
    for (const url of ["/transaction", "/pool", "/boom"]) {
      const res = await app.inject({
        method: "GET",
        url,
        headers: { "x-request-id": "req-1" },
      });
      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        error: "Internal server error while processing request req-1",
        key: "server_error",
      });
    }
  });

  it("passes framework client errors through as http_exception", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/json",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ key: "http_exception" });
  });
});
