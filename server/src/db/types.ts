import type { UserRole } from "@gatehouse/shared";

export type { UserRole };

export interface Newcomer {
  user_id: string;
  name: string;
  email: string;
  created_at: string;
  marketing_agree: boolean;
}

/** Newcomer as stored, including the password hash. Never leaves the service. */
export interface NewcomerFull extends Newcomer {
  password_hash: string;
}

export interface User extends Newcomer {
  verified_at: string;
  role: UserRole;
}

export interface TokenRecord {
  /** SHA-256 hex of the token string handed to the client. */
  token_hash: string;
  created_at: string;
  expired_at: string;
}

export interface RegistrationToken extends TokenRecord {
  user_id: string;
}

export interface ChangeEmailToken extends TokenRecord {
  user_id: string;
  /** Proposed new address, not yet checked against users until verification. */
  email: string;
}

export interface PasswordToken extends TokenRecord {
  user_id: string;
}

export interface AccessToken extends TokenRecord {
  session_id: string;
}

export interface RefreshToken extends TokenRecord {
  session_id: string;
}

export interface Session {
  session_id: string;
  user_id: string;
  started_at: string;
  finished_at: string | null;
}

/** A freshly minted token: the plaintext for the client and the record to store. */
export interface IssuedToken<T extends TokenRecord> {
  tokenString: string;
  token: T;
}

export interface TokenPair {
  access_token: string;
  refresh_token: string;
}
