import { describe, it, expect, beforeEach } from 'vitest';
import { createDb, type DB } from '../src/db/index.js';
import { migrate } from '../src/db/migrate.js';
import { createSqliteStore } from '../src/store/sqlite.js';
import type { LoanStore, User } from '../src/store/types.js';

describe('SQLite loan store', () => {
  let db: DB;
  let store: LoanStore;
  let alice: User;
  let bob: User;

  beforeEach(() => {
    db = createDb(':memory:');
    migrate(db);
    store = createSqliteStore(db);
    alice = store.createUser({ username: 'alice', email: 'alice@example.com' });
    bob = store.createUser({ username: 'bob', email: 'bob@example.com' });
  });

  describe('users', () => {
    it('creates users with generated ids', () => {
      expect(alice.id).toEqual(expect.any(String));
      expect(alice.id).not.toBe(bob.id);
      expect(alice.username).toBe('alice');
      expect(alice.email).toBe('alice@example.com');
      expect(alice.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('lists users in insertion order', () => {
      expect(store.listUsers().map((u) => u.username)).toEqual(['alice', 'bob']);
    });

    it('gets a user by id', () => {
      expect(store.getUser(bob.id)).toEqual(bob);
    });

    it('returns null for unknown user', () => {
      expect(store.getUser('nonexistent')).toBeNull();
    });

    it('finds a user by username or email', () => {
      expect(store.findUserByUsernameOrEmail('alice', 'other@example.com')?.id).toBe(alice.id);
      expect(store.findUserByUsernameOrEmail('someone', 'bob@example.com')?.id).toBe(bob.id);
      expect(store.findUserByUsernameOrEmail('carol', 'carol@example.com')).toBeNull();
    });

    it('rejects a duplicate username at the database level', () => {
      expect(() => store.createUser({ username: 'alice', email: 'alice2@example.com' })).toThrow();
    });
  });

  describe('loans', () => {
    it('creates a loan with no shares', () => {
      const loan = store.createLoan({
        userId: alice.id,
        principalCents: 1000000,
        annualRatePercent: '5.5',
        termMonths: 36,
      });

      expect(loan.userId).toBe(alice.id);
      expect(loan.principalCents).toBe(1000000);
      expect(loan.annualRatePercent).toBe('5.5');
      expect(loan.termMonths).toBe(36);
      expect(loan.sharedUserIds).toEqual([]);
      expect(store.getLoan(loan.id)).toEqual(loan);
    });

    it('keeps the rate text exactly as given', () => {
      const loan = store.createLoan({
        userId: alice.id,
        principalCents: 500000,
        annualRatePercent: '3.125',
        termMonths: 12,
      });
      expect(store.getLoan(loan.id)?.annualRatePercent).toBe('3.125');
    });

    it('lists all loans and loans per owner', () => {
      const first = store.createLoan({ userId: alice.id, principalCents: 100000, annualRatePercent: '6', termMonths: 12 });
      const second = store.createLoan({ userId: bob.id, principalCents: 200000, annualRatePercent: '0', termMonths: 24 });

      expect(store.listLoans().map((l) => l.id)).toEqual([first.id, second.id]);
      expect(store.listLoansForUser(alice.id).map((l) => l.id)).toEqual([first.id]);
      expect(store.listLoansForUser(bob.id).map((l) => l.id)).toEqual([second.id]);
    });

    it('returns an empty list for a user without loans', () => {
      expect(store.listLoansForUser(bob.id)).toEqual([]);
    });

    it('returns null for unknown loan', () => {
      expect(store.getLoan('nonexistent')).toBeNull();
    });

    it('refuses a loan for an unknown owner', () => {
      expect(() =>
        store.createLoan({ userId: 'nonexistent', principalCents: 100000, annualRatePercent: '6', termMonths: 12 }),
      ).toThrow();
    });

    it('refuses a non-positive term', () => {
      expect(() =>
        store.createLoan({ userId: alice.id, principalCents: 100000, annualRatePercent: '6', termMonths: 0 }),
      ).toThrow();
    });
  });

  describe('sharing', () => {
    it('records shared users on the loan', () => {
      const loan = store.createLoan({ userId: alice.id, principalCents: 100000, annualRatePercent: '6', termMonths: 12 });
      const carol = store.createUser({ username: 'carol', email: 'carol@example.com' });

      expect(store.shareLoan(loan.id, bob.id)?.sharedUserIds).toEqual([bob.id]);
      const shared = store.shareLoan(loan.id, carol.id);

      expect(shared?.sharedUserIds).toEqual([bob.id, carol.id]);
      expect(store.listLoans()[0].sharedUserIds).toHaveLength(2);
      expect(store.listLoansForUser(alice.id)[0].sharedUserIds).toHaveLength(2);
    });

    it('does not show a share on other loans', () => {
      const first = store.createLoan({ userId: alice.id, principalCents: 100000, annualRatePercent: '6', termMonths: 12 });
      const second = store.createLoan({ userId: alice.id, principalCents: 100000, annualRatePercent: '6', termMonths: 12 });
      store.shareLoan(first.id, bob.id);

      expect(store.getLoan(second.id)?.sharedUserIds).toEqual([]);
    });

    it('rejects sharing twice with the same user', () => {
      const loan = store.createLoan({ userId: alice.id, principalCents: 100000, annualRatePercent: '6', termMonths: 12 });
      store.shareLoan(loan.id, bob.id);

      expect(() => store.shareLoan(loan.id, bob.id)).toThrow();
    });
  });

  it('lists shared users in the order they were added', () => {
    const loan = store.createLoan({ userId: alice.id, principalCents: 100000, annualRatePercent: '6', termMonths: 12 });
    const others = ['carol', 'dave', 'erin', 'frank'].map((name) =>
      store.createUser({ username: name, email: `${name}@example.com` }),
    );
    for (const user of [...others].reverse()) store.shareLoan(loan.id, user.id);
    store.shareLoan(loan.id, bob.id);

    expect(store.getLoan(loan.id)?.sharedUserIds).toEqual([...[...others].reverse().map((u) => u.id), bob.id]);
  });

  it('creates only the columns the store reads', () => {
    const columns = (table: string) =>
      db.$client.prepare('SELECT name FROM pragma_table_info(?)').pluck().all(table);

    expect(columns('users')).toEqual(['id', 'username', 'email', 'created_at']);
    expect(columns('loans')).toEqual([
      'id',
      'user_id',
      'principal_cents',
      'annual_rate_percent',
      'term_months',
      'created_at',
    ]);
  });

  it('migrate is idempotent', () => {
    expect(() => migrate(db)).not.toThrow();
    expect(store.listUsers()).toHaveLength(2);
  });
});
