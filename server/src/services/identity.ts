import { v4 as uuidv4 } from "uuid";
import type { Logger } from "pino";
import type { ConnectionPool, Db } from "../db/index.js";
import { runSerializable, type RetryPolicy } from "../db/transaction.js";
import * as newcomersQ from "../db/queries/newcomers.js";
import * as sessionsQ from "../db/queries/sessions.js";
import * as tokensQ from "../db/queries/tokens.js";
import * as usersQ from "../db/queries/users.js";
import type {
  Newcomer,
  NewcomerFull,
  TokenPair,
  User,
  UserRole,
} from "../db/types.js";
import { redactEmail } from "../logger.js";
import { IdentityError, isIdentityError } from "./errors.js";
import type { SecurityService } from "./security.js";

export interface StoreLimits {
  maxActiveNewcomersWithSameEmail: number;
  maxActiveRequestsChangeSameEmail: number;
  maxActiveUserPasswordTokens: number;
}

export const DEFAULT_STORE_LIMITS: StoreLimits = {
  maxActiveNewcomersWithSameEmail: 3,
  maxActiveRequestsChangeSameEmail: 2,
  maxActiveUserPasswordTokens: 2,
};

export interface IdentityServiceOptions {
  pool: ConnectionPool;
  security: SecurityService;
  limits: StoreLimits;
  retry: RetryPolicy;
  log: Logger;
  /** Backoff sleep between transaction attempts; tests pass a recorder. */
  wait?: (ms: number) => Promise<void>;
}

export interface RegisterInput {
  name: string;
  email: string;
  password: string;
  marketingAgree: boolean;
}

export interface UserInfoInput {
  name: string;
  marketingAgree: boolean;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function publicNewcomer(newcomer: NewcomerFull): Newcomer {
  return {
    user_id: newcomer.user_id,
    name: newcomer.name,
    email: newcomer.email,
    created_at: newcomer.created_at,
    marketing_agree: newcomer.marketing_agree,
  };
}

/**
 * Registration, sessions, and account changes. Every multi-step change runs
 * as one serializable transaction; the bounds on pending records hold under
 * concurrent requests because a conflicting transaction is retried from the start.
 */
export class IdentityService {
  private readonly pool: ConnectionPool;
  private readonly security: SecurityService;
  private readonly limits: StoreLimits;
  private readonly retry: RetryPolicy;
  private readonly log: Logger;
  private readonly wait?: (ms: number) => Promise<void>;

  constructor(options: IdentityServiceOptions) {
    this.pool = options.pool;
    this.security = options.security;
    this.limits = options.limits;
    this.retry = options.retry;
    this.log = options.log;
    this.wait = options.wait;
  }

  private now(): string {
    return this.security.now().toISOString();
  }

  private transaction<T>(work: (db: Db) => Promise<T> | T): Promise<T> {
    return runSerializable(
      { pool: this.pool, retry: this.retry, log: this.log, wait: this.wait },
      work,
    );
  }

  /** Pending newcomers and email change requests both reserve an address. */
  private checkEmailAvailable(db: Db, email: string, now: string): void {
    if (usersQ.existsWithEmail(db, email)) {
      throw new IdentityError("user_already_exists");
    }
    if (
      newcomersQ.countActiveByEmail(db, email, now) >=
      this.limits.maxActiveNewcomersWithSameEmail
    ) {
      throw new IdentityError("too_many_newcomers_with_same_email");
    }
    if (
      tokensQ.countActiveChangeEmailTokens(db, email, now) >=
      this.limits.maxActiveRequestsChangeSameEmail
    ) {
      throw new IdentityError("too_many_change_same_email_requests");
    }
  }

  private issueTokenPair(db: Db, sessionId: string): TokenPair {
    const access = this.security.makeAccessToken(sessionId);
    const refresh = this.security.makeRefreshToken(sessionId);
    sessionsQ.insertAccessToken(db, access.token);
    sessionsQ.insertRefreshToken(db, refresh.token);
    return {
      access_token: access.tokenString,
      refresh_token: refresh.tokenString,
    };
  }

  async ping(): Promise<boolean> {
    return this.pool.use((db) => {
      const row = db.prepare("SELECT 1 AS ok").get() as { ok: number } | undefined;
      return row?.ok === 1;
    });
  }

  async registerNewcomer(
    input: RegisterInput,
  ): Promise<{ newcomer: Newcomer; tokenString: string }> {
    const email = normalizeEmail(input.email);
    const name = input.name.trim();
    const passwordHash = await this.security.hashPassword(input.password);

    return this.transaction((db) => {
      const now = this.now();
      this.checkEmailAvailable(db, email, now);

      const newcomer: NewcomerFull = {
        user_id: uuidv4(),
        name,
        email,
        password_hash: passwordHash,
        created_at: now,
        marketing_agree: input.marketingAgree,
      };
      newcomersQ.insert(db, newcomer);
      const { tokenString, token } = this.security.makeRegistrationToken(
        newcomer.user_id,
      );
      newcomersQ.insertRegistrationToken(db, token);
      return { newcomer: publicNewcomer(newcomer), tokenString };
    });
  }

  /** Promote a pending registration to a user. The newcomer row stays; only its token is consumed. */
  async verifyNewcomer(tokenString: string): Promise<User> {
    const tokenHash = this.security.hashTokenString(tokenString);
    return this.transaction((db) => {
      const now = this.now();
      const newcomer = newcomersQ.getByRegistrationTokenHash(db, tokenHash, now);
      if (!newcomer) throw new IdentityError("token_not_found");
      if (usersQ.existsWithEmail(db, newcomer.email)) {
        throw new IdentityError("user_already_exists");
      }
      newcomersQ.deleteRegistrationToken(db, tokenHash);

      const user: User = {
        ...publicNewcomer(newcomer),
        verified_at: now,
        role: "user",
      };
      usersQ.insert(db, { ...user, password_hash: newcomer.password_hash });
      return user;
    });
  }

  /**
   * Open a session. A wrong password and an unknown email fail the same way;
   * only when no user holds the email is a password matching a still-pending
   * registration told apart.
   */
  async login(email: string, password: string): Promise<TokenPair> {
    const normalized = normalizeEmail(email);
    const found = await this.pool.use((db) =>
      usersQ.getWithPasswordHashByEmail(db, normalized),
    );
    if (found) {
      if (!(await this.security.verifyPassword(password, found.passwordHash))) {
        throw new IdentityError("invalid_credentials");
      }
      const userId = found.user.user_id;
      return this.transaction((db) => {
        const now = this.now();
        const sessionId = uuidv4();
        sessionsQ.insertSession(db, {
          session_id: sessionId,
          user_id: userId,
          started_at: now,
          finished_at: null,
        });
        return this.issueTokenPair(db, sessionId);
      });
    }

    const pending = await this.pool.use((db) =>
      newcomersQ.listActiveByEmail(db, normalized, this.now()),
    );
    for (const newcomer of pending) {
      if (await this.security.verifyPassword(password, newcomer.password_hash)) {
        throw new IdentityError("email_not_confirmed");
      }
    }
    throw new IdentityError("invalid_credentials");
  }

  async logout(accessTokenString: string): Promise<void> {
    const tokenHash = this.security.hashTokenString(accessTokenString);
    await this.transaction((db) => {
      const now = this.now();
      const sessionId = sessionsQ.getSessionIdByAccessTokenHash(db, tokenHash, now);
      if (!sessionId) throw new IdentityError("not_exists");
      sessionsQ.deleteSessionTokens(db, sessionId);
      sessionsQ.finishSession(db, sessionId, now);
    });
  }

  /**
   * Trade a refresh token for a new pair. Access tokens issued earlier in the
   * session are left to expire on their own.
   */
  async refreshTokens(refreshTokenString: string): Promise<TokenPair> {
    const tokenHash = this.security.hashTokenString(refreshTokenString);
    return this.transaction((db) => {
      const sessionId = sessionsQ.takeRefreshToken(db, tokenHash, this.now());
      if (!sessionId) throw new IdentityError("not_exists");
      return this.issueTokenPair(db, sessionId);
    });
  }

  async getUserByAccessToken(accessTokenString: string): Promise<User> {
    const tokenHash = this.security.hashTokenString(accessTokenString);
    const user = await this.pool.use((db) =>
      usersQ.getByAccessTokenHash(db, tokenHash, this.now()),
    );
    if (!user) throw new IdentityError("user_not_exists");
    return user;
  }

  async getUserById(userId: string): Promise<User> {
    const user = await this.pool.use((db) => usersQ.getById(db, userId));
    if (!user) throw new IdentityError("user_not_exists");
    return user;
  }

  async updateUserInfo(userId: string, info: UserInfoInput): Promise<User> {
    const name = info.name.trim();
    return this.transaction((db) => {
      if (!usersQ.updateInfo(db, userId, { name, marketingAgree: info.marketingAgree })) {
        throw new IdentityError("user_not_exists");
      }
      const user = usersQ.getById(db, userId);
      if (!user) throw new IdentityError("user_not_exists");
      return user;
    });
  }

  /**
   * Replace the password hash when check accepts the current one. The read,
   * the check and the write form one transaction, so a concurrent change
   * between them forces a retry rather than a lost update.
   */
  async changePasswordIfOldValid(
    userId: string,
    newPasswordHash: string,
    check: (currentHash: string) => Promise<boolean> | boolean,
  ): Promise<void> {
    await this.transaction(async (db) => {
      const currentHash = usersQ.getPasswordHash(db, userId);
      if (currentHash === undefined) throw new IdentityError("user_not_exists");
      if (!(await check(currentHash))) throw new IdentityError("password_invalid");
      usersQ.updatePasswordHash(db, userId, newPasswordHash);
    });
  }

  async changePassword(
    userId: string,
    oldPassword: string,
    newPassword: string,
  ): Promise<void> {
    const newHash = await this.security.hashPassword(newPassword);
    await this.changePasswordIfOldValid(userId, newHash, (currentHash) =>
      this.security.verifyPassword(oldPassword, currentHash),
    );
  }

  async requestEmailChange(
    userId: string,
    newEmail: string,
    password: string,
  ): Promise<{ user: User; email: string; tokenString: string }> {
    const email = normalizeEmail(newEmail);
    const current = await this.pool.use((db) => ({
      user: usersQ.getById(db, userId),
      passwordHash: usersQ.getPasswordHash(db, userId),
    }));
    if (!current.user || current.passwordHash === undefined) {
      throw new IdentityError("user_not_exists");
    }
    if (!(await this.security.verifyPassword(password, current.passwordHash))) {
      throw new IdentityError("password_invalid");
    }
    const user = current.user;

    return this.transaction((db) => {
      this.checkEmailAvailable(db, email, this.now());
      const { tokenString, token } = this.security.makeChangeEmailToken(
        user.user_id,
        email,
      );
      tokensQ.insertChangeEmailToken(db, token);
      return { user, email, tokenString };
    });
  }

  async verifyEmailChange(tokenString: string): Promise<User> {
    const tokenHash = this.security.hashTokenString(tokenString);
    return this.transaction((db) => {
      const token = tokensQ.getActiveChangeEmailToken(db, tokenHash, this.now());
      if (!token) throw new IdentityError("token_not_found");
      if (usersQ.existsWithEmail(db, token.email)) {
        throw new IdentityError("user_already_exists");
      }
      tokensQ.deleteChangeEmailToken(db, tokenHash);
      if (!usersQ.updateEmail(db, token.user_id, token.email)) {
        throw new IdentityError("user_not_exists");
      }
      const user = usersQ.getById(db, token.user_id);
      if (!user) throw new IdentityError("user_not_exists");
      return user;
    });
  }

  /**
   * Issue a reset token, or null when the email is unknown or the user already
   * holds the maximum of live tokens. Callers answer the same way in every case.
   */
  async requestPasswordReset(
    email: string,
  ): Promise<{ user: User; tokenString: string } | null> {
    const normalized = normalizeEmail(email);
    const user = await this.pool.use((db) => usersQ.getByEmail(db, normalized));
    if (!user) return null;

    try {
      return await this.transaction((db) => {
        const count = tokensQ.countActivePasswordTokens(db, user.user_id, this.now());
        if (count >= this.limits.maxActiveUserPasswordTokens) {
          throw new IdentityError("too_many_password_tokens");
        }
        const { tokenString, token } = this.security.makePasswordToken(user.user_id);
        tokensQ.insertPasswordToken(db, token);
        return { user, tokenString };
      });
    } catch (err) {
      if (!isIdentityError(err, "too_many_password_tokens")) throw err;
      this.log.info(
        { emailRedacted: redactEmail(normalized) },
        "Password reset skipped: too many active tokens",
      );
      return null;
    }
  }

  async resetPassword(tokenString: string, newPassword: string): Promise<void> {
    const tokenHash = this.security.hashTokenString(tokenString);
    const newHash = await this.security.hashPassword(newPassword);
    await this.transaction((db) => {
      const userId = tokensQ.takePasswordToken(db, tokenHash, this.now());
      if (!userId) throw new IdentityError("token_not_found");
      usersQ.updatePasswordHash(db, userId, newHash);
    });
  }

  /** Set a user's role by email (operator command). */
  async setRole(email: string, role: UserRole): Promise<User> {
    const normalized = normalizeEmail(email);
    return this.transaction((db) => {
      const user = usersQ.getByEmail(db, normalized);
      if (!user) throw new IdentityError("user_not_exists");
      usersQ.setRole(db, user.user_id, role);
      return { ...user, role };
    });
  }
}
