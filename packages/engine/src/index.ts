export { createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { users, loans, loanShares } from './db/schema.js';
export { migrate, SCHEMA_SQL } from './db/migrate.js';

export {
  Dec,
  formatMoney,
  roundCents,
  toCents,
  centsToDecimal,
  addCents,
  subtractCents,
  multiplyCents,
  sumCents,
} from './math/money.js';

export type {
  LoanParameters,
  ScheduleEntry,
  Schedule,
  Summary,
  EngineErrorKind,
  EngineError,
  EngineResult,
} from './amortization/types.js';
export {
  validateLoanParameters,
  monthlyRate,
  computeMonthlyPayment,
  buildSchedule,
  summarize,
  getSchedule,
  getSummary,
} from './amortization/engine.js';

export type { User, Loan, NewUser, NewLoan, LoanStore } from './store/types.js';
export { createSqliteStore } from './store/sqlite.js';
