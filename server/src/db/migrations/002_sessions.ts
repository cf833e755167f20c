/**
 * Login sessions with their access tokens and the single refresh token per session.
 */
export const up = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      session_id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
      started_at TEXT NOT NULL,
      finished_at TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_user_id ON sessions(user_id);

    CREATE TABLE IF NOT EXISTS access_tokens (
      token_hash TEXT PRIMARY KEY,
      session_id TEXT NOT NULL REFERENCES sessions(session_id) ON DELETE CASCADE,
      created_at TEXT NOT NULL,
      expired_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_access_tokens_session_id ON access_tokens(session_id);

    CREATE TABLE IF NOT EXISTS refresh_tokens (
      token_hash TEXT PRIMARY KEY,
      session_id TEXT NOT NULL UNIQUE REFERENCES sessions(session_id) ON DELETE CASCADE,
      created_at TEXT NOT NULL,
      expired_at TEXT NOT NULL
    );
  `);
};

export const down = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    DROP TABLE IF EXISTS refresh_tokens;
    DROP TABLE IF EXISTS access_tokens;
    DROP TABLE IF EXISTS sessions;
  `);
};
