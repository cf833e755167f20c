import type { FastifyInstance } from "fastify";
import {
  loginBodySchema,
  registerBodySchema,
  tokenBodySchema,
} from "@gatehouse/shared";
import { requireAuth } from "../../plugins/auth.js";
import { redactEmail } from "../../logger.js";
import { isIdentityError } from "../../services/errors.js";
import { AppError, sendValidationError } from "../errors.js";

/** 422 password.improper, shared by every route that sets a password. */
export function improperPasswordError(field: string): AppError {
  return new AppError(422, "password.improper", "Password is too weak", [
    "body",
    field,
  ]);
}

export async function authRoutes(app: FastifyInstance) {
  app.post(
    "/auth/register",
    async (request, reply) => {
      const parsed = registerBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const { name, email, password, marketing_agree } = parsed.data;
      if (!app.security.isPasswordAcceptable(password)) {
        throw improperPasswordError("password");
      }

      const { newcomer, tokenString } = await app.identity.registerNewcomer({
        name,
        email,
        password,
        marketingAgree: marketing_agree,
      });
      app.mail.enqueue({ to: newcomer.email, tokenString, kind: "registration" });
      request.log.info(
        { emailRedacted: redactEmail(newcomer.email) },
        "Newcomer registered",
      );
      return reply.status(201).send(newcomer);
    },
  );

  app.post(
    "/auth/register/verify",
    async (request, reply) => {
      const parsed = tokenBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      try {
        const user = await app.identity.verifyNewcomer(parsed.data.token);
        return reply.send(user);
      } catch (err) {
        if (isIdentityError(err, "user_already_exists")) {
          throw new AppError(409, "email.already_verified", "Email already verified");
        }
        throw err;
      }
    },
  );

  app.post(
    "/auth/login",
    async (request, reply) => {
      const parsed = loginBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const { email, password } = parsed.data;
      try {
        const pair = await app.identity.login(email, password);
        return reply.send(pair);
      } catch (err) {
        if (isIdentityError(err)) {
          request.log.warn(
            { emailRedacted: redactEmail(email), reason: err.kind },
            "Login failed",
          );
        }
        throw err;
      }
    },
  );

  app.post(
    "/auth/refresh_token",
    async (request, reply) => {
      const parsed = tokenBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const pair = await app.identity.refreshTokens(parsed.data.token);
      return reply.send(pair);
    },
  );

  app.post(
    "/auth/logout",
    {
      preHandler: [requireAuth],
    },
    async (request, reply) => {
      await app.identity.logout(request.accessToken);
      return reply.send({});
    },
  );
}
