import type Decimal from 'decimal.js';

export interface LoanParameters {
  principalCents: number;
  /** Nominal annual rate in percent, e.g. "5.5" for 5.5%. */
  annualRatePercent: Decimal.Value;
  termMonths: number;
}

export interface ScheduleEntry {
  month: number;
  principalCents: number;
  interestCents: number;
  paymentCents: number;
  remainingBalanceCents: number;
}

export interface Schedule {
  principalCents: number;
  annualRatePercent: string;
  termMonths: number;
  /** Nominal payment charged every month but the last. */
  monthlyPaymentCents: number;
  totalInterestCents: number;
  totalPaidCents: number;
  entries: ScheduleEntry[];
}

export interface Summary {
  month: number;
  currentPrincipalBalanceCents: number;
  totalPrincipalPaidCents: number;
  totalInterestPaidCents: number;
}

export type EngineErrorKind = 'InvalidMonth' | 'InvalidLoanParameters';

export interface EngineError {
  kind: EngineErrorKind;
  message: string;
}

export type EngineResult<T> = { ok: true; value: T } | { ok: false; error: EngineError };
