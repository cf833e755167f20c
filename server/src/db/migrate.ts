import type { Db } from "./index.js";
import * as m001 from "./migrations/001_initial.js";
import * as m002 from "./migrations/002_sessions.js";
import * as m003 from "./migrations/003_change_email_tokens.js";
import * as m004 from "./migrations/004_password_tokens.js";
import * as m005 from "./migrations/005_marketing_agree.js";

interface Migration {
  name: string;
  up: (db: { exec: (sql: string) => void }) => void;
}

export const migrations: Migration[] = [
  { name: "001_initial", ...m001 },
  { name: "002_sessions", ...m002 },
  { name: "003_change_email_tokens", ...m003 },
  { name: "004_password_tokens", ...m004 },
  { name: "005_marketing_agree", ...m005 },
];

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    name TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  );
`;

function getApplied(db: Db): Set<string> {
  db.exec(MIGRATIONS_TABLE);
  const rows = db.prepare("SELECT name FROM _migrations").all() as {
    name: string;
  }[];
  return new Set(rows.map((r) => r.name));
}

/** Apply pending migrations in order. Returns the names applied by this call. */
export function migrate(
  db: Db,
  log: (msg: string) => void = console.log,
): string[] {
  const applied = getApplied(db);
  const done: string[] = [];
  for (const m of migrations) {
    if (applied.has(m.name)) continue;
    log(`Applying migration: ${m.name}`);
    db.transaction(() => {
      m.up(db);
      db.prepare("INSERT INTO _migrations (name) VALUES (?)").run(m.name);
    })();
    done.push(m.name);
  }
  log("Migrations complete.");
  return done;
}
