export const up = (db: { exec: (sql: string) => void }) => {
  db.exec(`
    ALTER TABLE newcomers ADD COLUMN marketing_agree INTEGER NOT NULL DEFAULT 0;
    ALTER TABLE users ADD COLUMN marketing_agree INTEGER NOT NULL DEFAULT 0;
  `);
};

export const down = (_db: { exec: (sql: string) => void }) => {
  // SQLite before 3.35 cannot drop columns; left in place
};
