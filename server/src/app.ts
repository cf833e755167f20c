import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { CORS_ORIGIN, REQUEST_ID_HEADER, TRUST_PROXY } from "./config.js";
import { registerErrorHandler } from "./modules/errors.js";
import { healthRoutes } from "./modules/health/routes.js";
import { authRoutes } from "./modules/auth/routes.js";
import { usersRoutes } from "./modules/users/routes.js";
import { adminRoutes } from "./modules/admin/routes.js";
import type { IdentityService } from "./services/identity.js";
import type { MailQueue } from "./services/mailQueue.js";
import type { SecurityService } from "./services/security.js";

declare module "fastify" {
  interface FastifyInstance {
    identity: IdentityService;
    security: SecurityService;
    mail: MailQueue;
  }
}

export interface AppDeps {
  identity: IdentityService;
  security: SecurityService;
  mail: MailQueue;
  logger: FastifyBaseLogger;
  /** Global rate limit; false turns it off (tests). */
  rateLimit?: { max: number; timeWindow: string } | false;
}

/** Build the HTTP app around already constructed services. Does not listen. */
export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({
    loggerInstance: deps.logger,
    trustProxy: TRUST_PROXY,
    requestIdHeader: REQUEST_ID_HEADER,
  });

  app.decorate("identity", deps.identity);
  app.decorate("security", deps.security);
  app.decorate("mail", deps.mail);

  await app.register(cors, {
    origin: CORS_ORIGIN,
  });

  if (deps.rateLimit) {
    await app.register(rateLimit, {
      max: deps.rateLimit.max,
      timeWindow: deps.rateLimit.timeWindow,
    });
  }

  registerErrorHandler(app);

  await app.register(healthRoutes);
  await app.register(authRoutes);
  await app.register(usersRoutes);
  await app.register(adminRoutes);

  app.addHook("onClose", async () => {
    await deps.mail.drain();
  });

  return app;
}
