import { randomBytes } from "crypto";
import argon2 from "argon2";
import { customAlphabet } from "nanoid";
import zxcvbn from "zxcvbn";
import { sha256Hex } from "../utils/hash.js";
import type {
  AccessToken,
  ChangeEmailToken,
  IssuedToken,
  PasswordToken,
  RefreshToken,
  RegistrationToken,
  TokenRecord,
} from "../db/types.js";

const ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
export const TOKEN_LENGTH = 64;

const generateToken = customAlphabet(ALPHABET, TOKEN_LENGTH);

export interface SecurityConfig {
  /** zxcvbn score (0-4) a new password must reach. */
  minPasswordStrength: number;
  /** argon2 iterations. */
  passwordHashTimeCost: number;
  /** argon2 memory in KiB. */
  passwordHashMemoryCost: number;
  /** Salt size in bytes. */
  passwordSaltLength: number;
  registrationTokenLifetimeSeconds: number;
  changeEmailTokenLifetimeSeconds: number;
  passwordTokenLifetimeSeconds: number;
  accessTokenLifetimeSeconds: number;
  refreshTokenLifetimeSeconds: number;
}

export type Clock = () => Date;

/**
 * Password hashing and strength checks, and minting of the opaque tokens the
 * service hands out. Only token hashes are ever stored.
 */
export class SecurityService {
  private readonly config: SecurityConfig;
  private readonly clock: Clock;

  constructor(config: SecurityConfig, clock: Clock = () => new Date()) {
    this.config = config;
    this.clock = clock;
  }

  /** Current time; token lifetimes and expiry checks both read it. */
  now(): Date {
    return this.clock();
  }

  passwordStrength(password: string): number {
    return zxcvbn(password).score;
  }

  isPasswordAcceptable(password: string): boolean {
    return this.passwordStrength(password) >= this.config.minPasswordStrength;
  }

  hashPassword(password: string): Promise<string> {
    return argon2.hash(password, {
      type: argon2.argon2id,
      timeCost: this.config.passwordHashTimeCost,
      memoryCost: this.config.passwordHashMemoryCost,
      salt: randomBytes(this.config.passwordSaltLength),
    });
  }

  /** False for a mismatch and for a stored value that is not an argon2 hash. */
  async verifyPassword(password: string, passwordHash: string): Promise<boolean> {
    if (!passwordHash.startsWith("$argon2")) return false;
    return argon2.verify(passwordHash, password);
  }

  generateTokenString(): string {
    return generateToken();
  }

  hashTokenString(tokenString: string): string {
    return sha256Hex(tokenString);
  }

  makeRegistrationToken(userId: string): IssuedToken<RegistrationToken> {
    return this.makeToken(this.config.registrationTokenLifetimeSeconds, (t) => ({
      ...t,
      user_id: userId,
    }));
  }

  makeChangeEmailToken(
    userId: string,
    email: string,
  ): IssuedToken<ChangeEmailToken> {
    return this.makeToken(this.config.changeEmailTokenLifetimeSeconds, (t) => ({
      ...t,
      user_id: userId,
      email,
    }));
  }

  makePasswordToken(userId: string): IssuedToken<PasswordToken> {
    return this.makeToken(this.config.passwordTokenLifetimeSeconds, (t) => ({
      ...t,
      user_id: userId,
    }));
  }

  makeAccessToken(sessionId: string): IssuedToken<AccessToken> {
    return this.makeToken(this.config.accessTokenLifetimeSeconds, (t) => ({
      ...t,
      session_id: sessionId,
    }));
  }

  makeRefreshToken(sessionId: string): IssuedToken<RefreshToken> {
    return this.makeToken(this.config.refreshTokenLifetimeSeconds, (t) => ({
      ...t,
      session_id: sessionId,
    }));
  }

  private makeToken<T extends TokenRecord>(
    lifetimeSeconds: number,
    withOwner: (token: TokenRecord) => T,
  ): IssuedToken<T> {
    const createdAt = this.now();
    const expiredAt = new Date(createdAt.getTime() + lifetimeSeconds * 1000);
    const tokenString = this.generateTokenString();
    return {
      tokenString,
      token: withOwner({
        token_hash: this.hashTokenString(tokenString),
        created_at: createdAt.toISOString(),
        expired_at: expiredAt.toISOString(),
      }),
    };
  }
}
