import type { Db } from "../index.js";
import type { NewcomerFull, RegistrationToken } from "../types.js";

interface NewcomerRow {
  user_id: string;
  name: string;
  email: string;
  password_hash: string;
  created_at: string;
  marketing_agree: number;
}

function toNewcomer(row: NewcomerRow): NewcomerFull {
  return {
    user_id: row.user_id,
    name: row.name,
    email: row.email,
    password_hash: row.password_hash,
    created_at: row.created_at,
    marketing_agree: row.marketing_agree === 1,
  };
}

const NEWCOMER_COLUMNS =
  "newcomers.user_id, newcomers.name, newcomers.email, newcomers.password_hash, newcomers.created_at, newcomers.marketing_agree";

/** Newcomers with this email that still hold an unexpired registration token. */
export function countActiveByEmail(db: Db, email: string, now: string): number {
  const row = db
    .prepare(
      `SELECT COUNT(*) AS count FROM newcomers
         JOIN registration_tokens ON registration_tokens.user_id = newcomers.user_id
         WHERE newcomers.email = ? AND registration_tokens.expired_at > ?`,
    )
    .get(email, now) as { count: number };
  return row.count;
}

export function listActiveByEmail(
  db: Db,
  email: string,
  now: string,
): NewcomerFull[] {
  const rows = db
    .prepare(
      `SELECT ${NEWCOMER_COLUMNS} FROM newcomers
         JOIN registration_tokens ON registration_tokens.user_id = newcomers.user_id
         WHERE newcomers.email = ? AND registration_tokens.expired_at > ?`,
    )
    .all(email, now) as NewcomerRow[];
  return rows.map(toNewcomer);
}

export function getByRegistrationTokenHash(
  db: Db,
  tokenHash: string,
  now: string,
): NewcomerFull | undefined {
  const row = db
    .prepare(
      `SELECT ${NEWCOMER_COLUMNS} FROM registration_tokens
         JOIN newcomers ON newcomers.user_id = registration_tokens.user_id
         WHERE registration_tokens.token_hash = ? AND registration_tokens.expired_at > ?`,
    )
    .get(tokenHash, now) as NewcomerRow | undefined;
  return row ? toNewcomer(row) : undefined;
}

export function getById(db: Db, userId: string): NewcomerFull | undefined {
  const row = db
    .prepare(`SELECT ${NEWCOMER_COLUMNS} FROM newcomers WHERE user_id = ?`)
    .get(userId) as NewcomerRow | undefined;
  return row ? toNewcomer(row) : undefined;
}

export function insert(db: Db, newcomer: NewcomerFull): void {
  db.prepare(
    `INSERT INTO newcomers (user_id, name, email, password_hash, created_at, marketing_agree)
     VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    newcomer.user_id,
    newcomer.name,
    newcomer.email,
    newcomer.password_hash,
    newcomer.created_at,
    newcomer.marketing_agree ? 1 : 0,
  );
}

export function insertRegistrationToken(db: Db, token: RegistrationToken): void {
  db.prepare(
    `INSERT INTO registration_tokens (token_hash, user_id, created_at, expired_at)
     VALUES (?, ?, ?, ?)`,
  ).run(token.token_hash, token.user_id, token.created_at, token.expired_at);
}

export function deleteRegistrationToken(db: Db, tokenHash: string): boolean {
  const res = db
    .prepare("DELETE FROM registration_tokens WHERE token_hash = ?")
    .run(tokenHash);
  return res.changes > 0;
}
