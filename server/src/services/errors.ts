/**
 * Business outcomes of the identity service. The HTTP boundary maps each kind
 * to a status and error key through a single lookup table (modules/errors.ts).
 */
export type IdentityErrorKind =
  | "user_already_exists"
  | "too_many_newcomers_with_same_email"
  | "too_many_change_same_email_requests"
  | "too_many_password_tokens"
  | "token_not_found"
  | "password_invalid"
  | "user_not_exists"
  | "not_exists"
  | "invalid_credentials"
  | "email_not_confirmed";

const DEFAULT_MESSAGES: Record<IdentityErrorKind, string> = {
  user_already_exists: "User with this email already exists",
  too_many_newcomers_with_same_email:
    "Too many pending registrations for this email",
  too_many_change_same_email_requests:
    "Too many pending email change requests for this email",
  too_many_password_tokens: "Too many pending password reset requests",
  token_not_found: "Token not found or expired",
  password_invalid: "Password is invalid",
  user_not_exists: "User does not exist",
  not_exists: "Not found",
  invalid_credentials: "Invalid email or password",
  email_not_confirmed: "Email is not confirmed",
};

export class IdentityError extends Error {
  readonly kind: IdentityErrorKind;

  constructor(kind: IdentityErrorKind, message?: string) {
    super(message ?? DEFAULT_MESSAGES[kind]);
    this.name = "IdentityError";
    this.kind = kind;
  }
}

export function isIdentityError(
  err: unknown,
  kind?: IdentityErrorKind,
): err is IdentityError {
  return err instanceof IdentityError && (kind === undefined || err.kind === kind);
}

/** Serializable transaction kept conflicting after every retry. Safe to retry the whole request later. */
export class TransactionError extends Error {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super(`Transaction failed after ${attempts} attempts`, options);
    this.name = "TransactionError";
    this.attempts = attempts;
  }
}

/** No pooled connection became free within the acquire timeout. Never retried. */
export class PoolTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for a database connection`);
    this.name = "PoolTimeoutError";
  }
}
