import type { Db } from "../index.js";
import type { User, UserRole } from "../types.js";

interface UserRow {
  user_id: string;
  name: string;
  email: string;
  created_at: string;
  verified_at: string;
  role: UserRole;
  marketing_agree: number;
}

export const USER_COLUMNS =
  "users.user_id, users.name, users.email, users.created_at, users.verified_at, users.role, users.marketing_agree";

export function toUser(row: UserRow): User {
  return {
    user_id: row.user_id,
    name: row.name,
    email: row.email,
    created_at: row.created_at,
    verified_at: row.verified_at,
    role: row.role,
    marketing_agree: row.marketing_agree === 1,
  };
}

export function getById(db: Db, userId: string): User | undefined {
  const row = db
    .prepare(`SELECT ${USER_COLUMNS} FROM users WHERE user_id = ?`)
    .get(userId) as UserRow | undefined;
  return row ? toUser(row) : undefined;
}

export function getByEmail(db: Db, email: string): User | undefined {
  const row = db
    .prepare(`SELECT ${USER_COLUMNS} FROM users WHERE email = ?`)
    .get(email) as UserRow | undefined;
  return row ? toUser(row) : undefined;
}

export function existsWithEmail(db: Db, email: string): boolean {
  return (
    db.prepare("SELECT 1 FROM users WHERE email = ?").get(email) !== undefined
  );
}

export function getPasswordHash(db: Db, userId: string): string | undefined {
  const row = db
    .prepare("SELECT password_hash FROM users WHERE user_id = ?")
    .get(userId) as { password_hash: string } | undefined;
  return row?.password_hash;
}

export function getWithPasswordHashByEmail(
  db: Db,
  email: string,
): { user: User; passwordHash: string } | undefined {
  const row = db
    .prepare(`SELECT ${USER_COLUMNS}, users.password_hash FROM users WHERE email = ?`)
    .get(email) as (UserRow & { password_hash: string }) | undefined;
  return row ? { user: toUser(row), passwordHash: row.password_hash } : undefined;
}

/** User owning a live access token; one read, no transaction. */
export function getByAccessTokenHash(
  db: Db,
  tokenHash: string,
  now: string,
): User | undefined {
  const row = db
    .prepare(
      `SELECT ${USER_COLUMNS} FROM access_tokens
         JOIN sessions ON sessions.session_id = access_tokens.session_id
         JOIN users ON users.user_id = sessions.user_id
         WHERE access_tokens.token_hash = ? AND access_tokens.expired_at > ?`,
    )
    .get(tokenHash, now) as UserRow | undefined;
  return row ? toUser(row) : undefined;
}

export function insert(db: Db, user: User & { password_hash: string }): void {
  db.prepare(
    `INSERT INTO users (user_id, name, email, password_hash, created_at, verified_at, role, marketing_agree)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    user.user_id,
    user.name,
    user.email,
    user.password_hash,
    user.created_at,
    user.verified_at,
    user.role,
    user.marketing_agree ? 1 : 0,
  );
}

/** Returns false when no such user. */
export function updateInfo(
  db: Db,
  userId: string,
  info: { name: string; marketingAgree: boolean },
): boolean {
  const res = db
    .prepare("UPDATE users SET name = ?, marketing_agree = ? WHERE user_id = ?")
    .run(info.name, info.marketingAgree ? 1 : 0, userId);
  return res.changes > 0;
}

export function updatePasswordHash(
  db: Db,
  userId: string,
  passwordHash: string,
): boolean {
  const res = db
    .prepare("UPDATE users SET password_hash = ? WHERE user_id = ?")
    .run(passwordHash, userId);
  return res.changes > 0;
}

export function updateEmail(db: Db, userId: string, email: string): boolean {
  const res = db
    .prepare("UPDATE users SET email = ? WHERE user_id = ?")
    .run(email, userId);
  return res.changes > 0;
}

export function setRole(db: Db, userId: string, role: UserRole): boolean {
  const res = db
    .prepare("UPDATE users SET role = ? WHERE user_id = ?")
    .run(role, userId);
  return res.changes > 0;
}
