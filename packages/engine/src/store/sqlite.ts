import { eq, or, inArray, sql } from 'drizzle-orm';
import type { DB } from '../db/index.js';
import { users, loans, loanShares } from '../db/schema.js';
import type { Loan, LoanStore, NewLoan, NewUser, User } from './types.js';

type UserRow = typeof users.$inferSelect;
type LoanRow = typeof loans.$inferSelect;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    createdAt: row.createdAt,
  };
}

function toLoan(row: LoanRow, sharedUserIds: string[]): Loan {
  return {
    id: row.id,
    userId: row.userId,
    principalCents: row.principalCents,
    annualRatePercent: row.annualRatePercent,
    termMonths: row.termMonths,
    sharedUserIds,
    createdAt: row.createdAt,
  };
}

export function createSqliteStore(db: DB): LoanStore {
  function sharesByLoan(loanIds: string[]): Map<string, string[]> {
    const result = new Map<string, string[]>();
    if (loanIds.length === 0) return result;

    const rows = db
      .select()
      .from(loanShares)
      .where(inArray(loanShares.loanId, loanIds))
      // Insertion order; created_at collides within a millisecond.
      .orderBy(sql`rowid`)
      .all();

    for (const row of rows) {
      const ids = result.get(row.loanId) ?? [];
      ids.push(row.userId);
      result.set(row.loanId, ids);
    }
    return result;
  }

  function withShares(rows: LoanRow[]): Loan[] {
    const shares = sharesByLoan(rows.map((r) => r.id));
    return rows.map((row) => toLoan(row, shares.get(row.id) ?? []));
  }

  function getLoan(id: string): Loan | null {
    const row = db.select().from(loans).where(eq(loans.id, id)).get();
    if (!row) return null;
    return withShares([row])[0];
  }

  return {
    createUser(input: NewUser): User {
      const created = db
        .insert(users)
        .values({ username: input.username, email: input.email })
        .returning()
        .get();
      return toUser(created);
    },

    listUsers(): User[] {
      return db.select().from(users).all().map(toUser);
    },

    getUser(id: string): User | null {
      const row = db.select().from(users).where(eq(users.id, id)).get();
      return row ? toUser(row) : null;
    },

    findUserByUsernameOrEmail(username: string, email: string): User | null {
      const row = db
        .select()
        .from(users)
        .where(or(eq(users.username, username), eq(users.email, email)))
        .get();
      return row ? toUser(row) : null;
    },

    createLoan(input: NewLoan): Loan {
      const created = db
        .insert(loans)
        .values({
          userId: input.userId,
          principalCents: input.principalCents,
          annualRatePercent: input.annualRatePercent,
          termMonths: input.termMonths,
        })
        .returning()
        .get();
      return toLoan(created, []);
    },

    listLoans(): Loan[] {
      return withShares(db.select().from(loans).all());
    },

    listLoansForUser(userId: string): Loan[] {
      return withShares(db.select().from(loans).where(eq(loans.userId, userId)).all());
    },

    getLoan,

    shareLoan(loanId: string, userId: string): Loan | null {
      db.insert(loanShares).values({ loanId, userId }).run();
      return getLoan(loanId);
    },
  };
}
