import { join } from "path";
import * as config from "./config.js";
import { ConnectionPool } from "./db/index.js";
import { migrate } from "./db/migrate.js";
import { logger } from "./logger.js";
import { isMailProvider, type MailConfig } from "./services/email.js";
import { IdentityService } from "./services/identity.js";
import { MailQueue } from "./services/mailQueue.js";
import { SecurityService } from "./services/security.js";

export interface Services {
  pool: ConnectionPool;
  security: SecurityService;
  identity: IdentityService;
  mail: MailQueue;
}

export function mailConfigFromEnv(): MailConfig {
  if (!isMailProvider(config.MAIL_PROVIDER)) {
    throw new Error(
      `MAIL_PROVIDER must be one of smtp, sendgrid, log, none (got "${config.MAIL_PROVIDER}")`,
    );
  }
  return {
    appName: config.APP_NAME,
    provider: config.MAIL_PROVIDER,
    domain: config.MAIL_DOMAIN,
    smtp: {
      host: config.SMTP_HOST,
      port: config.SMTP_PORT,
      secure: config.SMTP_SECURE,
      user: config.SMTP_USER,
      password: config.SMTP_PASSWORD,
    },
    sendgrid: {
      apiKey: config.SENDGRID_API_KEY,
      url: config.SENDGRID_MAIL_SEND_URL,
    },
    linkTemplates: {
      registration: config.REGISTER_VERIFY_LINK_TEMPLATE,
      change_email: config.CHANGE_EMAIL_LINK_TEMPLATE,
      reset_password: config.RESET_PASSWORD_LINK_TEMPLATE,
    },
    linkLifetimesSeconds: {
      registration: config.REGISTRATION_TOKEN_LIFETIME_SECONDS,
      change_email: config.CHANGE_EMAIL_TOKEN_LIFETIME_SECONDS,
      reset_password: config.PASSWORD_TOKEN_LIFETIME_SECONDS,
    },
  };
}

/**
 * Open the database (applying migrations) and construct the services from
 * environment configuration. The caller owns the pool and closes it.
 */
export async function createServices(): Promise<Services> {
  const pool = new ConnectionPool({
    path: join(config.DATA_DIR, config.DB_FILENAME),
    size: config.DB_POOL_SIZE,
    acquireTimeoutMs: config.DB_ACQUIRE_TIMEOUT_MS,
    busyTimeoutMs: config.DB_BUSY_TIMEOUT_MS,
  });
  try {
    await pool.use((db) => migrate(db, (msg) => logger.info(msg)));
  } catch (err) {
    pool.close();
    throw err;
  }

  const security = new SecurityService({
    minPasswordStrength: config.MIN_PASSWORD_STRENGTH,
    passwordHashTimeCost: config.PASSWORD_HASH_TIME_COST,
    passwordHashMemoryCost: config.PASSWORD_HASH_MEMORY_COST,
    passwordSaltLength: config.PASSWORD_SALT_LENGTH,
    registrationTokenLifetimeSeconds: config.REGISTRATION_TOKEN_LIFETIME_SECONDS,
    changeEmailTokenLifetimeSeconds: config.CHANGE_EMAIL_TOKEN_LIFETIME_SECONDS,
    passwordTokenLifetimeSeconds: config.PASSWORD_TOKEN_LIFETIME_SECONDS,
    accessTokenLifetimeSeconds: config.ACCESS_TOKEN_LIFETIME_SECONDS,
    refreshTokenLifetimeSeconds: config.REFRESH_TOKEN_LIFETIME_SECONDS,
  });

  const identity = new IdentityService({
    pool,
    security,
    limits: {
      maxActiveNewcomersWithSameEmail: config.MAX_ACTIVE_NEWCOMERS_WITH_SAME_EMAIL,
      maxActiveRequestsChangeSameEmail: config.MAX_ACTIVE_REQUESTS_CHANGE_SAME_EMAIL,
      maxActiveUserPasswordTokens: config.MAX_ACTIVE_USER_PASSWORD_TOKENS,
    },
    retry: {
      attempts: config.N_TRANSACTION_RETRIES,
      intervalFirstMs: config.TRANSACTION_RETRY_INTERVAL_FIRST_MS,
      intervalFactor: config.TRANSACTION_RETRY_INTERVAL_FACTOR,
    },
    log: logger.child({ component: "identity" }),
  });

  const mail = new MailQueue(
    mailConfigFromEnv(),
    logger.child({ component: "mail" }),
  );

  return { pool, security, identity, mail };
}
