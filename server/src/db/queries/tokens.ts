import type { Db } from "../index.js";
import type { ChangeEmailToken, PasswordToken } from "../types.js";

export function countActiveChangeEmailTokens(
  db: Db,
  email: string,
  now: string,
): number {
  const row = db
    .prepare(
      "SELECT COUNT(*) AS count FROM change_email_tokens WHERE email = ? AND expired_at > ?",
    )
    .get(email, now) as { count: number };
  return row.count;
}

export function insertChangeEmailToken(db: Db, token: ChangeEmailToken): void {
  db.prepare(
    `INSERT INTO change_email_tokens (token_hash, user_id, email, created_at, expired_at)
     VALUES (?, ?, ?, ?, ?)`,
  ).run(
    token.token_hash,
    token.user_id,
    token.email,
    token.created_at,
    token.expired_at,
  );
}

export function getActiveChangeEmailToken(
  db: Db,
  tokenHash: string,
  now: string,
): ChangeEmailToken | undefined {
  return db
    .prepare(
      `SELECT token_hash, user_id, email, created_at, expired_at FROM change_email_tokens
         WHERE token_hash = ? AND expired_at > ?`,
    )
    .get(tokenHash, now) as ChangeEmailToken | undefined;
}

export function deleteChangeEmailToken(db: Db, tokenHash: string): boolean {
  const res = db
    .prepare("DELETE FROM change_email_tokens WHERE token_hash = ?")
    .run(tokenHash);
  return res.changes > 0;
}

export function countActivePasswordTokens(
  db: Db,
  userId: string,
  now: string,
): number {
  const row = db
    .prepare(
      "SELECT COUNT(*) AS count FROM password_tokens WHERE user_id = ? AND expired_at > ?",
    )
    .get(userId, now) as { count: number };
  return row.count;
}

export function insertPasswordToken(db: Db, token: PasswordToken): void {
  db.prepare(
    `INSERT INTO password_tokens (token_hash, user_id, created_at, expired_at)
     VALUES (?, ?, ?, ?)`,
  ).run(token.token_hash, token.user_id, token.created_at, token.expired_at);
}

/** Consume a live password token; the owner's id, or undefined when none matched. */
export function takePasswordToken(
  db: Db,
  tokenHash: string,
  now: string,
): string | undefined {
  const row = db
    .prepare(
      "DELETE FROM password_tokens WHERE token_hash = ? AND expired_at > ? RETURNING user_id",
    )
    .get(tokenHash, now) as { user_id: string } | undefined;
  return row?.user_id;
}
