import { sqliteTable, text, integer, index, primaryKey } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';

export const users = sqliteTable('users', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  username: text('username').notNull().unique(),
  email: text('email').notNull().unique(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
});

export const loans = sqliteTable('loans', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  userId: text('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  principalCents: integer('principal_cents').notNull(),
  // Kept as text so the rate round-trips as an exact decimal.
  annualRatePercent: text('annual_rate_percent').notNull(),
  termMonths: integer('term_months').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_loans_user').on(table.userId),
]);

export const loanShares = sqliteTable('loan_shares', {
  loanId: text('loan_id').notNull().references(() => loans.id, { onDelete: 'cascade' }),
  userId: text('user_id').notNull().references(() => users.id, { onDelete: 'cascade' }),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  primaryKey({ columns: [table.loanId, table.userId] }),
  index('idx_loan_shares_user').on(table.userId),
]);
