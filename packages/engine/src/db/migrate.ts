import type { DB } from './index.js';

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS loans (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    principal_cents INTEGER NOT NULL CHECK(principal_cents > 0),
    annual_rate_percent TEXT NOT NULL,
    term_months INTEGER NOT NULL CHECK(term_months > 0),
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_loans_user ON loans(user_id);

  CREATE TABLE IF NOT EXISTS loan_shares (
    loan_id TEXT NOT NULL REFERENCES loans(id) ON DELETE CASCADE,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    created_at TEXT NOT NULL,
    PRIMARY KEY (loan_id, user_id)
  );

  CREATE INDEX IF NOT EXISTS idx_loan_shares_user ON loan_shares(user_id);
`;

export function migrate(db: DB): void {
  db.$client.exec(SCHEMA_SQL);
}
