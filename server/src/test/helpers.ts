import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { pino } from "pino";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../app.js";
import { ConnectionPool } from "../db/index.js";
import { migrate } from "../db/migrate.js";
import type { RetryPolicy } from "../db/transaction.js";
import type { MailConfig, SendMailOptions } from "../services/email.js";
import {
  DEFAULT_STORE_LIMITS,
  IdentityService,
  type StoreLimits,
} from "../services/identity.js";
import { MailQueue } from "../services/mailQueue.js";
import { SecurityService, type SecurityConfig } from "../services/security.js";

export const silentLogger = pino({ level: "silent" });

export const STRONG_PASSWORD = "Mx7#qLp2!vTz9wRb";
export const OTHER_STRONG_PASSWORD = "Qe4$Hn8&wKc1^Ydu";
export const WEAK_PASSWORD = "password";

/** Cheap argon2 parameters so tests stay fast. */
export const TEST_SECURITY_CONFIG: SecurityConfig = {
  minPasswordStrength: 3,
  passwordHashTimeCost: 2,
  passwordHashMemoryCost: 4096,
  passwordSaltLength: 16,
  registrationTokenLifetimeSeconds: 7 * 24 * 3600,
  changeEmailTokenLifetimeSeconds: 24 * 3600,
  passwordTokenLifetimeSeconds: 24 * 3600,
  accessTokenLifetimeSeconds: 600,
  refreshTokenLifetimeSeconds: 24 * 3600,
};

export const FAST_RETRY: RetryPolicy = {
  attempts: 10,
  intervalFirstMs: 1,
  intervalFactor: 2,
};

export const TEST_MAIL_CONFIG: MailConfig = {
  appName: "Gatehouse",
  provider: "none",
  domain: "example.com",
  smtp: { host: "localhost", port: 587, secure: false, user: "", password: "" },
  sendgrid: { apiKey: "test-secret", url: "http://localhost/v3/mail/send" },
  linkTemplates: {
    registration: "http://app.test/registration/verify?token={token}",
    change_email: "http://app.test/email/verify?token={token}",
    reset_password: "http://app.test/password/reset?token={token}",
  },
  linkLifetimesSeconds: {
    registration: 7 * 24 * 3600,
    change_email: 24 * 3600,
    reset_password: 24 * 3600,
  },
};

/** Settable clock shared by the security and identity services. */
export class TestClock {
  current: Date;

  constructor(start = "2026-03-01T12:00:00.000Z") {
    this.current = new Date(start);
  }

  now = (): Date => this.current;

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

export interface TestContext {
  dir: string;
  pool: ConnectionPool;
  clock: TestClock;
  security: SecurityService;
  identity: IdentityService;
  close(): void;
}

export interface TestContextOptions {
  limits?: Partial<StoreLimits>;
  retry?: RetryPolicy;
  poolSize?: number;
  wait?: (ms: number) => Promise<void>;
}

/** Fresh migrated database in a temp directory plus services wired to it. */
export async function createTestContext(
  options: TestContextOptions = {},
): Promise<TestContext> {
  const dir = mkdtempSync(join(tmpdir(), "gatehouse-test-"));
  const pool = new ConnectionPool({
    path: join(dir, "test.db"),
    size: options.poolSize ?? 4,
    acquireTimeoutMs: 5_000,
    busyTimeoutMs: 20,
  });
  await pool.use((db) => migrate(db, () => undefined));
  const clock = new TestClock();
  const security = new SecurityService(TEST_SECURITY_CONFIG, clock.now);
  const identity = new IdentityService({
    pool,
    security,
    limits: { ...DEFAULT_STORE_LIMITS, ...options.limits },
    retry: options.retry ?? FAST_RETRY,
    log: silentLogger,
    wait: options.wait,
  });
  return {
    dir,
    pool,
    clock,
    security,
    identity,
    close() {
      pool.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Register and verify in one go; returns the new user. */
export async function createUser(
  ctx: TestContext,
  email: string,
  password = STRONG_PASSWORD,
  name = "Test User",
) {
  const { tokenString } = await ctx.identity.registerNewcomer({
    name,
    email,
    password,
    marketingAgree: false,
  });
  return ctx.identity.verifyNewcomer(tokenString);
}

export interface TestApp {
  ctx: TestContext;
  app: FastifyInstance;
  sent: SendMailOptions[];
  mail: MailQueue;
  /** Token carried by the last letter sent to this address. */
  lastToken(to: string): Promise<string>;
  close(): Promise<void>;
}

export async function createTestApp(
  options: TestContextOptions = {},
): Promise<TestApp> {
  const ctx = await createTestContext(options);
  const sent: SendMailOptions[] = [];
  const mail = new MailQueue(TEST_MAIL_CONFIG, silentLogger, async (letter) => {
    sent.push(letter);
    return { sent: true };
  });
  const app = await buildApp({
    identity: ctx.identity,
    security: ctx.security,
    mail,
    logger: silentLogger,
    rateLimit: false,
  });
  await app.ready();
  return {
    ctx,
    app,
    sent,
    mail,
    async lastToken(to: string) {
      await mail.drain();
      const letter = [...sent].reverse().find((l) => l.to === to);
      const match = letter?.text.match(/token=([A-Za-z0-9]+)/);
      if (!match) throw new Error(`No token mailed to ${to}`);
      return match[1];
    },
    async close() {
      await app.close();
      ctx.close();
    },
  };
}
