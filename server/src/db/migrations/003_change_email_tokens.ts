/**
 * Email change: pending requests keyed by token, indexed by the proposed address.
 */
export const up = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS change_email_tokens (
      token_hash TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
      email TEXT NOT NULL,
      created_at TEXT NOT NULL,
      expired_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_change_email_tokens_email ON change_email_tokens(email);
  `);
};

export const down = (db: { exec: (sql: string) => void }) => {
  db.exec(`DROP TABLE IF EXISTS change_email_tokens;`);
};
