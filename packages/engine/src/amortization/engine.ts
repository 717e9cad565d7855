import Decimal from 'decimal.js';
import { Dec, multiplyCents, roundCents, subtractCents, sumCents } from '../math/money.js';
import type {
  EngineError,
  EngineErrorKind,
  EngineResult,
  LoanParameters,
  Schedule,
  ScheduleEntry,
  Summary,
} from './types.js';

const UNSAFE_TOTALS = 'loan totals exceed the range of exact whole cents';

function fail(kind: EngineErrorKind, message: string): { ok: false; error: EngineError } {
  return { ok: false, error: { kind, message } };
}

function parseRate(value: Decimal.Value): Decimal | null {
  try {
    const rate = new Dec(value);
    return rate.isFinite() ? rate : null;
  } catch (err) {
    if (err instanceof Error && err.message.startsWith('[DecimalError]')) return null;
    throw err;
  }
}

export function validateLoanParameters(params: LoanParameters): EngineResult<LoanParameters> {
  if (!Number.isSafeInteger(params.principalCents) || params.principalCents <= 0) {
    return fail('InvalidLoanParameters', 'principalCents must be a positive whole number of cents');
  }
  if (!Number.isSafeInteger(params.termMonths) || params.termMonths < 1) {
    return fail('InvalidLoanParameters', 'termMonths must be a positive integer');
  }
  const rate = parseRate(params.annualRatePercent);
  if (rate === null) {
    return fail('InvalidLoanParameters', 'annualRatePercent must be a decimal number');
  }
  if (rate.isNegative() && !rate.isZero()) {
    return fail('InvalidLoanParameters', 'annualRatePercent must not be negative');
  }
  return { ok: true, value: params };
}

/** Annual percentage rate to an unrounded per-month fraction. */
export function monthlyRate(annualRatePercent: Decimal.Value): Decimal {
  return new Dec(annualRatePercent).dividedBy(1200);
}

/**
 * Fixed payment for a fully amortizing loan, rounded half-up to cents.
 * Every month but the last charges exactly this amount.
 */
export function computeMonthlyPayment(principalCents: number, rate: Decimal, termMonths: number): number {
  const growth = new Dec(rate).plus(1).pow(termMonths);
  // A rate below the working precision compounds to exactly 1: no interest accrues.
  if (rate.isZero() || growth.minus(1).isZero()) {
    return roundCents(new Dec(principalCents).dividedBy(termMonths));
  }
  const payment = new Dec(principalCents).times(rate).times(growth).dividedBy(growth.minus(1));
  return roundCents(payment);
}

/**
 * Builds the month-by-month schedule. Interest is rounded to cents each month
 * before the principal component is derived from it, and the last month takes
 * whatever principal is left so the final balance is exactly zero.
 */
export function buildSchedule(params: LoanParameters): EngineResult<Schedule> {
  const checked = validateLoanParameters(params);
  if (!checked.ok) return checked;

  const { principalCents, termMonths } = params;
  const rate = monthlyRate(params.annualRatePercent);
  const monthlyPaymentCents = computeMonthlyPayment(principalCents, rate, termMonths);
  if (!Number.isSafeInteger(monthlyPaymentCents)) {
    return fail('InvalidLoanParameters', UNSAFE_TOTALS);
  }

  const entries: ScheduleEntry[] = [];
  let remaining = principalCents;

  for (let month = 1; month <= termMonths; month++) {
    const interestCents = multiplyCents(remaining, rate);

    let principalPaid = subtractCents(monthlyPaymentCents, interestCents);
    if (month === termMonths || principalPaid > remaining) {
      principalPaid = remaining;
    }

    remaining = subtractCents(remaining, principalPaid);

    entries.push({
      month,
      principalCents: principalPaid,
      interestCents,
      paymentCents: principalPaid + interestCents,
      remainingBalanceCents: remaining,
    });
  }

  const totalInterestCents = sumCents(entries.map((e) => e.interestCents));
  if (!Number.isSafeInteger(principalCents + totalInterestCents)) {
    return fail('InvalidLoanParameters', UNSAFE_TOTALS);
  }

  return {
    ok: true,
    value: {
      principalCents,
      annualRatePercent: new Dec(params.annualRatePercent).toString(),
      termMonths,
      monthlyPaymentCents,
      totalInterestCents,
      totalPaidCents: principalCents + totalInterestCents,
      entries,
    },
  };
}

export function summarize(schedule: Schedule, month: number): EngineResult<Summary> {
  if (!Number.isInteger(month) || month < 0 || month > schedule.termMonths) {
    return fail('InvalidMonth', `month must be between 0 and ${schedule.termMonths}`);
  }

  const paid = schedule.entries.slice(0, month);
  const currentPrincipalBalanceCents = paid.at(-1)?.remainingBalanceCents ?? schedule.principalCents;

  return {
    ok: true,
    value: {
      month,
      currentPrincipalBalanceCents,
      totalPrincipalPaidCents: subtractCents(schedule.principalCents, currentPrincipalBalanceCents),
      totalInterestPaidCents: sumCents(paid.map((e) => e.interestCents)),
    },
  };
}

export function getSchedule(params: LoanParameters): EngineResult<Schedule> {
  return buildSchedule(params);
}

export function getSummary(params: LoanParameters, month: number): EngineResult<Summary> {
  const schedule = buildSchedule(params);
  if (!schedule.ok) return schedule;
  return summarize(schedule.value, month);
}
