import type { FastifyRequest, FastifyReply } from "fastify";
import type { User } from "../db/types.js";
import { isIdentityError } from "../services/errors.js";
import { ForbiddenError, NotFoundError } from "../modules/errors.js";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by requireAuth. */
    authUser: User;
    /** Access token string the request was authenticated with. */
    accessToken: string;
  }
}

const BEARER_SCHEME = "Bearer";

function getHeaderValue(h: unknown): string | undefined {
  if (typeof h === "string") return h;
  if (Array.isArray(h)) return typeof h[0] === "string" ? h[0] : undefined;
  return undefined;
}

/** Token from "Authorization: Bearer <token>", or a ForbiddenError naming what is wrong with the header. */
export function extractBearerToken(header: string | undefined): string {
  if (!header) {
    throw new ForbiddenError(
      "authorization.not_set",
      "Authorization header not recognized",
    );
  }
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2) {
    throw new ForbiddenError(
      "authorization.scheme_unrecognised",
      "Authorization scheme not recognised",
    );
  }
  const [scheme, token] = parts;
  if (scheme !== BEARER_SCHEME) {
    throw new ForbiddenError(
      "authorization.scheme_invalid",
      "Expected Bearer authorization scheme",
    );
  }
  return token;
}

/** preHandler: resolve the bearer token to its user or answer 403. */
export async function requireAuth(
  request: FastifyRequest,
  _reply: FastifyReply,
): Promise<void> {
  const token = extractBearerToken(
    getHeaderValue(request.headers["authorization"]),
  );
  try {
    request.authUser = await request.server.identity.getUserByAccessToken(token);
    request.accessToken = token;
  } catch (err) {
    if (isIdentityError(err, "user_not_exists")) throw new ForbiddenError();
    throw err;
  }
}

/** Require admin role. Non-admins get the same 404 as a missing user. */
export async function requireAdmin(
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<void> {
  await requireAuth(request, reply);
  if (request.authUser.role !== "admin") {
    throw new NotFoundError();
  }
}
