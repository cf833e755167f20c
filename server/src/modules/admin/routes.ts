import type { FastifyInstance } from "fastify";
import { userIdParamSchema } from "@gatehouse/shared";
import { requireAdmin } from "../../plugins/auth.js";
import { isIdentityError } from "../../services/errors.js";
import { NotFoundError, sendValidationError } from "../errors.js";

export async function adminRoutes(app: FastifyInstance) {
  app.get(
    "/users/:user_id",
    {
      preHandler: [requireAdmin],
    },
    async (request, reply) => {
      const parsed = userIdParamSchema.safeParse(request.params);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }
      try {
        const user = await app.identity.getUserById(parsed.data.user_id);
        return reply.send(user);
      } catch (err) {
        if (isIdentityError(err, "user_not_exists")) throw new NotFoundError();
        throw err;
      }
    },
  );
}
