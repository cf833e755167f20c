import type { FastifyInstance } from "fastify";
import { readFileSync, existsSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Root package.json (workspace root): from server/src/modules/health -> root. */
export function getRootVersion(): string | null {
  const rootPkg = join(__dirname, "..", "..", "..", "..", "package.json");
  if (!existsSync(rootPkg)) return null;
  try {
    const pkg: unknown = JSON.parse(readFileSync(rootPkg, "utf-8"));
    if (typeof pkg !== "object" || pkg === null || !("version" in pkg)) {
      return null;
    }
    return typeof pkg.version === "string" ? pkg.version : null;
  } catch {
    return null;
  }
}

export async function healthRoutes(app: FastifyInstance) {
  app.get(
    "/ping",
    {
      schema: {
        response: {
          200: {
            type: "object",
            properties: { message: { type: "string" } },
            required: ["message"],
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ message: "pong" });
    },
  );

  app.get(
    "/health",
    async (request, reply) => {
      const timestamp = new Date().toISOString();
      let ok = false;
      try {
        ok = await app.identity.ping();
      } catch (err) {
        request.log.error({ err }, "Database ping failed");
      }
      return reply.status(ok ? 200 : 503).send({ ok, timestamp });
    },
  );

  app.get(
    "/version",
    {
      schema: {
        response: {
          200: {
            type: "object",
            properties: { version: { type: "string" } },
            required: ["version"],
          },
        },
      },
    },
    async (_request, reply) => {
      return reply.send({ version: getRootVersion() ?? "unknown" });
    },
  );
}
