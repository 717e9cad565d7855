import { Hono } from 'hono';
import { z } from 'zod';
import {
  type Loan,
  type LoanParameters,
  type LoanStore,
  type ScheduleEntry,
  buildSchedule,
  summarize,
  centsToDecimal,
  formatMoney,
} from '@loan-amort/engine';
import { AppError, fromEngineError, notFound } from '../errors.js';
import { parseJson, parseQuery } from '../validation.js';

const RATE_PATTERN = /^\d+(\.\d+)?$/;

const createLoanSchema = z.object({
  userId: z.string().min(1),
  principalCents: z.number().int().positive().safe(),
  annualRatePercent: z
    .union([
      z.string().regex(RATE_PATTERN, 'annualRatePercent must be a non-negative decimal'),
      z.number().nonnegative().finite(),
    ])
    .transform((rate) => String(rate)),
  termMonths: z.number().int().positive(),
});

const shareLoanSchema = z.object({
  userId: z.string().min(1),
});

const summaryQuerySchema = z.object({
  month: z
    .string({ required_error: 'month is required' })
    .regex(/^-?\d+$/, 'month must be an integer')
    .transform(Number),
});

export function formatLoan(loan: Loan, currency: string) {
  return {
    id: loan.id,
    userId: loan.userId,
    principalCents: loan.principalCents,
    principal: centsToDecimal(loan.principalCents),
    principalFormatted: formatMoney(loan.principalCents, currency),
    annualRatePercent: loan.annualRatePercent,
    termMonths: loan.termMonths,
    sharedUserIds: loan.sharedUserIds,
    createdAt: loan.createdAt,
  };
}

function formatEntry(entry: ScheduleEntry, currency: string) {
  return {
    month: entry.month,
    remainingBalanceCents: entry.remainingBalanceCents,
    remainingBalance: centsToDecimal(entry.remainingBalanceCents),
    remainingBalanceFormatted: formatMoney(entry.remainingBalanceCents, currency),
    monthlyPaymentCents: entry.paymentCents,
    monthlyPayment: centsToDecimal(entry.paymentCents),
    monthlyPaymentFormatted: formatMoney(entry.paymentCents, currency),
    principalCents: entry.principalCents,
    interestCents: entry.interestCents,
  };
}

function loanParameters(loan: Loan): LoanParameters {
  return {
    principalCents: loan.principalCents,
    annualRatePercent: loan.annualRatePercent,
    termMonths: loan.termMonths,
  };
}

export function loanRoutes(store: LoanStore, currency: string) {
  const router = new Hono();

  function requireLoan(id: string): Loan {
    const loan = store.getLoan(id);
    if (!loan) throw notFound('Loan', id);
    return loan;
  }

  // GET / — list all loans
  router.get('/', (c) => {
    return c.json(store.listLoans().map((loan) => formatLoan(loan, currency)));
  });

  // POST / — create loan for an existing owner
  router.post('/', async (c) => {
    const data = await parseJson(c, createLoanSchema);
    if (!store.getUser(data.userId)) throw notFound('User', data.userId);

    const schedule = buildSchedule(data);
    if (!schedule.ok) throw fromEngineError(schedule.error);

    const created = store.createLoan(data);
    return c.json(formatLoan(created, currency), 201);
  });

  // GET /:id — single loan with shared user ids
  router.get('/:id', (c) => {
    const loan = requireLoan(c.req.param('id'));
    return c.json(formatLoan(loan, currency));
  });

  // POST /:id/share — grant another user read access
  router.post('/:id/share', async (c) => {
    const { userId } = await parseJson(c, shareLoanSchema);
    // No await between the read below and the insert.
    const loan = requireLoan(c.req.param('id'));

    if (!store.getUser(userId)) throw notFound('User', userId);

    if (userId === loan.userId) {
      throw new AppError(
        'OWNER_ACCESS',
        'Owner already has access to this loan',
        400,
        'Share with a user other than the owner',
      );
    }

    if (loan.sharedUserIds.includes(userId)) {
      throw new AppError(
        'ALREADY_SHARED',
        'Loan already shared with this user',
        400,
        `Use GET /api/v1/loans/${loan.id} to see who has access`,
      );
    }

    const shared = store.shareLoan(loan.id, userId);
    if (!shared) throw notFound('Loan', loan.id);
    return c.json(formatLoan(shared, currency));
  });

  // GET /:id/schedule — amortization schedule
  router.get('/:id/schedule', (c) => {
    const loan = requireLoan(c.req.param('id'));

    const result = buildSchedule(loanParameters(loan));
    if (!result.ok) throw fromEngineError(result.error);
    const schedule = result.value;

    return c.json({
      loanId: loan.id,
      principalCents: schedule.principalCents,
      annualRatePercent: schedule.annualRatePercent,
      termMonths: schedule.termMonths,
      monthlyPaymentCents: schedule.monthlyPaymentCents,
      monthlyPayment: centsToDecimal(schedule.monthlyPaymentCents),
      totalInterestCents: schedule.totalInterestCents,
      totalPaidCents: schedule.totalPaidCents,
      schedule: schedule.entries.map((entry) => formatEntry(entry, currency)),
    });
  });

  // GET /:id/summary?month=N — balances after N payments
  router.get('/:id/summary', (c) => {
    const loan = requireLoan(c.req.param('id'));
    const { month } = parseQuery(c, summaryQuerySchema);

    const schedule = buildSchedule(loanParameters(loan));
    if (!schedule.ok) throw fromEngineError(schedule.error);

    const result = summarize(schedule.value, month);
    if (!result.ok) throw fromEngineError(result.error);
    const summary = result.value;

    return c.json({
      loanId: loan.id,
      month: summary.month,
      currentPrincipalBalanceCents: summary.currentPrincipalBalanceCents,
      currentPrincipalBalance: centsToDecimal(summary.currentPrincipalBalanceCents),
      currentPrincipalBalanceFormatted: formatMoney(summary.currentPrincipalBalanceCents, currency),
      totalPrincipalPaidCents: summary.totalPrincipalPaidCents,
      totalPrincipalPaid: centsToDecimal(summary.totalPrincipalPaidCents),
      totalPrincipalPaidFormatted: formatMoney(summary.totalPrincipalPaidCents, currency),
      totalInterestPaidCents: summary.totalInterestPaidCents,
      totalInterestPaid: centsToDecimal(summary.totalInterestPaidCents),
      totalInterestPaidFormatted: formatMoney(summary.totalInterestPaidCents, currency),
    });
  });

  return router;
}
