import { createDb, createSqliteStore, migrate, type LoanStore } from '@loan-amort/engine';

export function openStore(dbPath: string): LoanStore {
  const db = createDb(dbPath);
  migrate(db);
  return createSqliteStore(db);
}
