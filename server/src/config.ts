import { join } from "path";

/**
 * Central app config. All values can be overridden via environment variables.
 * Use .env or set in the shell when running the server.
 */

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/** Application display name (emails, logs). Env: APP_NAME */
export const APP_NAME = process.env.APP_NAME?.trim() || "Gatehouse";

/** Slug form of APP_NAME (lowercase, spaces to hyphens) for filenames. */
export const APP_NAME_SLUG = APP_NAME.toLowerCase().replace(/\s+/g, "-");

/** Server port. Env: PORT. Default 3001. */
export const PORT = envNumber("PORT", 3001);

/** Server listen host. Env: HOST. Default "0.0.0.0". */
export const HOST = process.env.HOST?.trim() || "0.0.0.0";

/** Enable the logger. Env: LOGGER. Set to "false" or "0" to disable. Default true. */
export const LOGGER =
  process.env.LOGGER !== "false" && process.env.LOGGER !== "0";

/** Log level for the pino logger. Env: LOG_LEVEL. Default "info". */
export const LOG_LEVEL = process.env.LOG_LEVEL?.trim() || "info";

/** Header carrying the request id, echoed into request logs. Env: REQUEST_ID_HEADER. Default "x-request-id". */
export const REQUEST_ID_HEADER =
  process.env.REQUEST_ID_HEADER?.trim().toLowerCase() || "x-request-id";

/** Trust X-Forwarded-* headers (set true when behind a reverse proxy). Env: TRUST_PROXY. Default true. */
export const TRUST_PROXY =
  process.env.TRUST_PROXY === "false" || process.env.TRUST_PROXY === "0"
    ? false
    : true;

/** CORS origin: true = allow request origin (e.g. dev), false = no CORS. Env: CORS_ORIGIN. Default: false in production, true otherwise. */
export const CORS_ORIGIN =
  process.env.CORS_ORIGIN !== undefined
    ? process.env.CORS_ORIGIN === "true" || process.env.CORS_ORIGIN === "1"
    : process.env.NODE_ENV !== "production";

/** Global rate limit: max requests per time window. Env: RATE_LIMIT_MAX. Default 100. */
export const RATE_LIMIT_MAX = envNumber("RATE_LIMIT_MAX", 100);

/** Global rate limit: time window (e.g. "1 minute"). Env: RATE_LIMIT_TIME_WINDOW. Default "1 minute". */
export const RATE_LIMIT_TIME_WINDOW =
  process.env.RATE_LIMIT_TIME_WINDOW?.trim() || "1 minute";

/** Directory holding the SQLite database. Env: DATA_DIR. Default "data" under the working directory. */
export const DATA_DIR = process.env.DATA_DIR ?? join(process.cwd(), "data");

/** SQLite database filename (under DATA_DIR). Env: DB_FILENAME. Default derived from APP_NAME (e.g. gatehouse.db). */
export const DB_FILENAME =
  process.env.DB_FILENAME?.trim() || `${APP_NAME_SLUG}.db`;

/** Number of pooled database connections. Env: DB_POOL_SIZE. Default 4. */
export const DB_POOL_SIZE = envNumber("DB_POOL_SIZE", 4);

/** How long an operation may wait for a free connection (ms). Env: DB_ACQUIRE_TIMEOUT_MS. Default 10000. */
export const DB_ACQUIRE_TIMEOUT_MS = envNumber("DB_ACQUIRE_TIMEOUT_MS", 10_000);

/** SQLite busy handler timeout per statement (ms). Env: DB_BUSY_TIMEOUT_MS. Default 100. */
export const DB_BUSY_TIMEOUT_MS = envNumber("DB_BUSY_TIMEOUT_MS", 100);

/** Minimum zxcvbn score (0-4) for new passwords. Env: MIN_PASSWORD_STRENGTH. Default 3. */
export const MIN_PASSWORD_STRENGTH = envNumber("MIN_PASSWORD_STRENGTH", 3);

/** argon2 iterations. Env: PASSWORD_HASH_TIME_COST. Default 3. */
export const PASSWORD_HASH_TIME_COST = envNumber("PASSWORD_HASH_TIME_COST", 3);

/** argon2 memory in KiB. Env: PASSWORD_HASH_MEMORY_COST. Default 19456 (19 MiB). */
export const PASSWORD_HASH_MEMORY_COST = envNumber(
  "PASSWORD_HASH_MEMORY_COST",
  19_456,
);

/** argon2 salt size in bytes. Env: PASSWORD_SALT_LENGTH. Default 32. */
export const PASSWORD_SALT_LENGTH = envNumber("PASSWORD_SALT_LENGTH", 32);

/** Registration link validity (seconds). Env: REGISTRATION_TOKEN_LIFETIME_SECONDS. Default 7 days. */
export const REGISTRATION_TOKEN_LIFETIME_SECONDS = envNumber(
  "REGISTRATION_TOKEN_LIFETIME_SECONDS",
  60 * 60 * 24 * 7,
);

/** Change-email link validity (seconds). Env: CHANGE_EMAIL_TOKEN_LIFETIME_SECONDS. Default 1 day. */
export const CHANGE_EMAIL_TOKEN_LIFETIME_SECONDS = envNumber(
  "CHANGE_EMAIL_TOKEN_LIFETIME_SECONDS",
  60 * 60 * 24,
);

/** Password reset link validity (seconds). Env: PASSWORD_TOKEN_LIFETIME_SECONDS. Default 1 day. */
export const PASSWORD_TOKEN_LIFETIME_SECONDS = envNumber(
  "PASSWORD_TOKEN_LIFETIME_SECONDS",
  60 * 60 * 24,
);

/** Access token validity (seconds). Env: ACCESS_TOKEN_LIFETIME_SECONDS. Default 10 minutes. */
export const ACCESS_TOKEN_LIFETIME_SECONDS = envNumber(
  "ACCESS_TOKEN_LIFETIME_SECONDS",
  60 * 10,
);

/** Refresh token validity (seconds). Env: REFRESH_TOKEN_LIFETIME_SECONDS. Default 1 day. */
export const REFRESH_TOKEN_LIFETIME_SECONDS = envNumber(
  "REFRESH_TOKEN_LIFETIME_SECONDS",
  60 * 60 * 24,
);

/** Pending registrations allowed per email. Env: MAX_ACTIVE_NEWCOMERS_WITH_SAME_EMAIL. Default 3. */
export const MAX_ACTIVE_NEWCOMERS_WITH_SAME_EMAIL = envNumber(
  "MAX_ACTIVE_NEWCOMERS_WITH_SAME_EMAIL",
  3,
);

/** Pending email changes allowed per target email. Env: MAX_ACTIVE_REQUESTS_CHANGE_SAME_EMAIL. Default 2. */
export const MAX_ACTIVE_REQUESTS_CHANGE_SAME_EMAIL = envNumber(
  "MAX_ACTIVE_REQUESTS_CHANGE_SAME_EMAIL",
  2,
);

/** Pending password reset tokens allowed per user. Env: MAX_ACTIVE_USER_PASSWORD_TOKENS. Default 2. */
export const MAX_ACTIVE_USER_PASSWORD_TOKENS = envNumber(
  "MAX_ACTIVE_USER_PASSWORD_TOKENS",
  2,
);

/** Serializable transaction attempts before giving up. Env: N_TRANSACTION_RETRIES. Default 10. */
export const N_TRANSACTION_RETRIES = envNumber("N_TRANSACTION_RETRIES", 10);

/** First backoff interval between transaction attempts (ms). Env: TRANSACTION_RETRY_INTERVAL_FIRST_MS. Default 10. */
export const TRANSACTION_RETRY_INTERVAL_FIRST_MS = envNumber(
  "TRANSACTION_RETRY_INTERVAL_FIRST_MS",
  10,
);

/** Backoff multiplier. Env: TRANSACTION_RETRY_INTERVAL_FACTOR. Default 2. */
export const TRANSACTION_RETRY_INTERVAL_FACTOR = envNumber(
  "TRANSACTION_RETRY_INTERVAL_FACTOR",
  2,
);

/** Mail transport: "smtp", "sendgrid", "log" or "none". Env: MAIL_PROVIDER. Default "log". */
export const MAIL_PROVIDER = process.env.MAIL_PROVIDER?.trim() || "log";

/** Domain used for the sender address (noreply@MAIL_DOMAIN). Env: MAIL_DOMAIN. Default "localhost". */
export const MAIL_DOMAIN = process.env.MAIL_DOMAIN?.trim() || "localhost";

/** SMTP host. Env: SMTP_HOST. Default "localhost". */
export const SMTP_HOST = process.env.SMTP_HOST?.trim() || "localhost";

/** SMTP port. Env: SMTP_PORT. Default 587. */
export const SMTP_PORT = envNumber("SMTP_PORT", 587);

/** Use TLS from the start (port 465). Env: SMTP_SECURE. Default false. */
export const SMTP_SECURE =
  process.env.SMTP_SECURE === "true" || process.env.SMTP_SECURE === "1";

/** SMTP username. Env: SMTP_USER. */
export const SMTP_USER = process.env.SMTP_USER?.trim() ?? "";

/** SMTP password. Env: SMTP_PASSWORD. */
export const SMTP_PASSWORD = process.env.SMTP_PASSWORD ?? "";

/** SendGrid API key. Env: SENDGRID_API_KEY. */
export const SENDGRID_API_KEY = process.env.SENDGRID_API_KEY?.trim() ?? "";

/** SendGrid mail send API URL. Env: SENDGRID_MAIL_SEND_URL. Default "https://api.sendgrid.com/v3/mail/send". */
export const SENDGRID_MAIL_SEND_URL =
  process.env.SENDGRID_MAIL_SEND_URL?.trim() ||
  "https://api.sendgrid.com/v3/mail/send";

/** Link in the registration letter; {token} is replaced. Env: REGISTER_VERIFY_LINK_TEMPLATE. */
export const REGISTER_VERIFY_LINK_TEMPLATE =
  process.env.REGISTER_VERIFY_LINK_TEMPLATE?.trim() ||
  "http://localhost:3000/registration/verify?token={token}";

/** Link in the change-email letter; {token} is replaced. Env: CHANGE_EMAIL_LINK_TEMPLATE. */
export const CHANGE_EMAIL_LINK_TEMPLATE =
  process.env.CHANGE_EMAIL_LINK_TEMPLATE?.trim() ||
  "http://localhost:3000/email/verify?token={token}";

/** Link in the reset-password letter; {token} is replaced. Env: RESET_PASSWORD_LINK_TEMPLATE. */
export const RESET_PASSWORD_LINK_TEMPLATE =
  process.env.RESET_PASSWORD_LINK_TEMPLATE?.trim() ||
  "http://localhost:3000/password/reset?token={token}";
