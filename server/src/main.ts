import * as config from "./config.js";
import { buildApp } from "./app.js";
import { createServices } from "./context.js";
import { logger } from "./logger.js";

async function main() {
  const { pool, security, identity, mail } = await createServices();

  const app = await buildApp({
    identity,
    security,
    mail,
    logger,
    rateLimit: {
      max: config.RATE_LIMIT_MAX,
      timeWindow: config.RATE_LIMIT_TIME_WINDOW,
    },
  });
  app.addHook("onClose", async () => {
    pool.close();
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "Shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "Shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: config.PORT, host: config.HOST });
}

main().catch((err: unknown) => {
  logger.error({ err }, "Startup failed");
  process.exit(1);
});
