/**
 * Initial schema: verified users, pending registrations and their tokens.
 */
export const up = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      user_id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      email TEXT UNIQUE NOT NULL,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL,
      verified_at TEXT NOT NULL,
      role TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('user', 'admin'))
    );

    CREATE TABLE IF NOT EXISTS newcomers (
      user_id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      email TEXT NOT NULL,
      password_hash TEXT NOT NULL,
      created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_newcomers_email ON newcomers(email);

    CREATE TABLE IF NOT EXISTS registration_tokens (
      token_hash TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES newcomers(user_id) ON DELETE CASCADE,
      created_at TEXT NOT NULL,
      expired_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_registration_tokens_user_id ON registration_tokens(user_id);
  `);
};

export const down = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    DROP TABLE IF EXISTS registration_tokens;
    DROP TABLE IF EXISTS newcomers;
    DROP TABLE IF EXISTS users;
  `);
};
