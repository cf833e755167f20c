import type { FastifyInstance } from "fastify";
import {
  emailChangeBodySchema,
  forgotPasswordBodySchema,
  passwordChangeBodySchema,
  resetPasswordBodySchema,
  tokenBodySchema,
  userInfoBodySchema,
} from "@gatehouse/shared";
import { requireAuth } from "../../plugins/auth.js";
import { redactEmail } from "../../logger.js";
import { sendValidationError } from "../errors.js";
import { improperPasswordError } from "../auth/routes.js";

export async function usersRoutes(app: FastifyInstance) {
  app.get(
    "/users/me",
    {
      preHandler: [requireAuth],
    },
    async (request, reply) => {
      return reply.send(request.authUser);
    },
  );

  app.patch(
    "/users/me",
    {
      preHandler: [requireAuth],
    },
    async (request, reply) => {
      const parsed = userInfoBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const user = await app.identity.updateUserInfo(request.authUser.user_id, {
        name: parsed.data.name,
        marketingAgree:
          parsed.data.marketing_agree ?? request.authUser.marketing_agree,
      });
      return reply.send(user);
    },
  );

  app.patch(
    "/users/me/password",
    {
      preHandler: [requireAuth],
    },
    async (request, reply) => {
      const parsed = passwordChangeBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const { password, new_password } = parsed.data;
      if (!app.security.isPasswordAcceptable(new_password)) {
        throw improperPasswordError("new_password");
      }
      await app.identity.changePassword(
        request.authUser.user_id,
        password,
        new_password,
      );
      return reply.send({});
    },
  );

  app.patch(
    "/users/me/email",
    {
      preHandler: [requireAuth],
    },
    async (request, reply) => {
      const parsed = emailChangeBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const { email, tokenString } = await app.identity.requestEmailChange(
        request.authUser.user_id,
        parsed.data.new_email,
        parsed.data.password,
      );
      app.mail.enqueue({ to: email, tokenString, kind: "change_email" });
      return reply.send({});
    },
  );

  app.post(
    "/users/me/email/verify",
    async (request, reply) => {
      const parsed = tokenBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const user = await app.identity.verifyEmailChange(parsed.data.token);
      return reply.send(user);
    },
  );

  app.post(
    "/users/me/password/forgot",
    async (request, reply) => {
      const parsed = forgotPasswordBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      const issued = await app.identity.requestPasswordReset(parsed.data.email);
      if (issued) {
        app.mail.enqueue({
          to: issued.user.email,
          tokenString: issued.tokenString,
          kind: "reset_password",
        });
      } else {
        request.log.info(
          { emailRedacted: redactEmail(parsed.data.email) },
          "Password reset not issued",
        );
      }
      return reply.status(202).send({});
    },
  );

  app.post(
    "/users/me/password/reset",
    async (request, reply) => {
      const parsed = resetPasswordBodySchema.safeParse(request.body);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      if (!app.security.isPasswordAcceptable(parsed.data.password)) {
        throw improperPasswordError("password");
      }
      await app.identity.resetPassword(parsed.data.token, parsed.data.password);
      return reply.send({});
    },
  );
}
