import type { Db } from "../index.js";
import type { AccessToken, RefreshToken, Session } from "../types.js";

export function insertSession(db: Db, session: Session): void {
  db.prepare(
    "INSERT INTO sessions (session_id, user_id, started_at, finished_at) VALUES (?, ?, ?, ?)",
  ).run(session.session_id, session.user_id, session.started_at, session.finished_at);
}

export function getSession(db: Db, sessionId: string): Session | undefined {
  return db
    .prepare(
      "SELECT session_id, user_id, started_at, finished_at FROM sessions WHERE session_id = ?",
    )
    .get(sessionId) as Session | undefined;
}

export function finishSession(db: Db, sessionId: string, now: string): void {
  db.prepare("UPDATE sessions SET finished_at = ? WHERE session_id = ?").run(
    now,
    sessionId,
  );
}

export function insertAccessToken(db: Db, token: AccessToken): void {
  db.prepare(
    "INSERT INTO access_tokens (token_hash, session_id, created_at, expired_at) VALUES (?, ?, ?, ?)",
  ).run(token.token_hash, token.session_id, token.created_at, token.expired_at);
}

export function insertRefreshToken(db: Db, token: RefreshToken): void {
  db.prepare(
    "INSERT INTO refresh_tokens (token_hash, session_id, created_at, expired_at) VALUES (?, ?, ?, ?)",
  ).run(token.token_hash, token.session_id, token.created_at, token.expired_at);
}

export function getSessionIdByAccessTokenHash(
  db: Db,
  tokenHash: string,
  now: string,
): string | undefined {
  const row = db
    .prepare(
      "SELECT session_id FROM access_tokens WHERE token_hash = ? AND expired_at > ?",
    )
    .get(tokenHash, now) as { session_id: string } | undefined;
  return row?.session_id;
}

/** Consume a live refresh token; its session id, or undefined when none matched. */
export function takeRefreshToken(
  db: Db,
  tokenHash: string,
  now: string,
): string | undefined {
  const row = db
    .prepare(
      "DELETE FROM refresh_tokens WHERE token_hash = ? AND expired_at > ? RETURNING session_id",
    )
    .get(tokenHash, now) as { session_id: string } | undefined;
  return row?.session_id;
}

export function deleteSessionTokens(db: Db, sessionId: string): void {
  db.prepare("DELETE FROM access_tokens WHERE session_id = ?").run(sessionId);
  db.prepare("DELETE FROM refresh_tokens WHERE session_id = ?").run(sessionId);
}

export function countAccessTokens(db: Db, sessionId: string): number {
  const row = db
    .prepare("SELECT COUNT(*) AS count FROM access_tokens WHERE session_id = ?")
    .get(sessionId) as { count: number };
  return row.count;
}
