import type { FastifyError, FastifyInstance, FastifyReply } from "fastify";
import type { ZodError } from "zod";
import {
  IdentityError,
  PoolTimeoutError,
  TransactionError,
  type IdentityErrorKind,
} from "../services/errors.js";

export interface ErrorBody {
  error: string;
  key: string;
  loc?: string[];
}

/** An error with a fixed HTTP status and client-facing key. */
export class AppError extends Error {
  readonly statusCode: number;
  readonly key: string;
  readonly loc?: string[];

  constructor(statusCode: number, key: string, message: string, loc?: string[]) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.key = key;
    this.loc = loc;
  }
}

export class ForbiddenError extends AppError {
  constructor(key = "forbidden", message = "Forbidden") {
    super(403, key, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(404, "not_found", message);
  }
}

/** How each identity outcome reaches the client. Routes may override a key for their context. */
export const IDENTITY_ERRORS: Record<
  IdentityErrorKind,
  { status: number; key: string; message: string }
> = {
  user_already_exists: {
    status: 409,
    key: "email.already_exists",
    message: "User with this email already exists",
  },
  too_many_newcomers_with_same_email: {
    status: 409,
    key: "conflict",
    message: "Too many newcomers with this email",
  },
  too_many_change_same_email_requests: {
    status: 409,
    key: "conflict",
    message: "Too many requests to change to this email",
  },
  too_many_password_tokens: {
    status: 409,
    key: "conflict",
    message: "Too many password reset requests",
  },
  token_not_found: { status: 403, key: "forbidden", message: "Token not found" },
  password_invalid: {
    status: 403,
    key: "password.invalid",
    message: "Password is invalid",
  },
  user_not_exists: { status: 403, key: "forbidden", message: "Forbidden" },
  not_exists: { status: 403, key: "forbidden", message: "Forbidden" },
  invalid_credentials: {
    status: 403,
    key: "credentials.invalid",
    message: "Invalid email or password",
  },
  email_not_confirmed: {
    status: 403,
    key: "email.not_confirmed",
    message: "Email is not confirmed",
  },
};

export function toAppError(err: IdentityError): AppError {
  const entry = IDENTITY_ERRORS[err.kind];
  return new AppError(entry.status, entry.key, entry.message);
}

export function validationBody(error: ZodError): ErrorBody & { details: unknown } {
  return {
    error: error.issues[0]?.message ?? "Validation failed",
    key: "validation",
    details: error.flatten(),
  };
}

export function sendValidationError(reply: FastifyReply, error: ZodError) {
  return reply.status(422).send(validationBody(error));
}

function errorBody(err: AppError): ErrorBody {
  return err.loc
    ? { error: err.message, key: err.key, loc: err.loc }
    : { error: err.message, key: err.key };
}

function isFastifyClientError(err: unknown): err is FastifyError {
  return (
    err instanceof Error &&
    "statusCode" in err &&
    typeof err.statusCode === "number" &&
    err.statusCode >= 400 &&
    err.statusCode < 500
  );
}

/**
 * One translation point for thrown errors. Expected outcomes are logged at
 * info; anything unexpected becomes 500 server_error and is logged at error.
 */
export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler<Error>((err, request, reply) => {
    const known =
      err instanceof AppError
        ? err
        : err instanceof IdentityError
          ? toAppError(err)
          : undefined;
    if (known) {
      request.log.info({ key: known.key, status: known.statusCode }, known.message);
      return reply.status(known.statusCode).send(errorBody(known));
    }

    if (isFastifyClientError(err)) {
      request.log.info({ err }, "Request rejected");
      return reply
        .status(err.statusCode ?? 400)
        .send({ error: err.message, key: "http_exception" });
    }

    if (err instanceof TransactionError) {
      request.log.error({ err, attempts: err.attempts }, "Transaction retries exhausted");
    } else if (err instanceof PoolTimeoutError) {
      request.log.error({ err }, "Database connection unavailable");
    } else {
      request.log.error({ err }, "Unhandled error");
    }
    return reply.status(500).send({
      error: `Internal server error while processing request ${request.id}`,
      key: "server_error",
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply
      .status(404)
      .send({ error: `Route ${request.method} ${request.url} not found`, key: "not_found" });
  });
}
