export interface User {
  id: string;
  username: string;
  email: string;
  createdAt: string;
}

export interface Loan {
  id: string;
  userId: string;
  principalCents: number;
  annualRatePercent: string;
  termMonths: number;
  sharedUserIds: string[];
  createdAt: string;
}

export interface NewUser {
  username: string;
  email: string;
}

export interface NewLoan {
  userId: string;
  principalCents: number;
  annualRatePercent: string;
  termMonths: number;
}

/** Data access for users, loans and loan shares. Lookups of missing rows return null. */
export interface LoanStore {
  createUser(input: NewUser): User;
  listUsers(): User[];
  getUser(id: string): User | null;
  findUserByUsernameOrEmail(username: string, email: string): User | null;
  createLoan(input: NewLoan): Loan;
  listLoans(): Loan[];
  listLoansForUser(userId: string): Loan[];
  getLoan(id: string): Loan | null;
  /** Grants `userId` read access; returns the updated loan. */
  shareLoan(loanId: string, userId: string): Loan | null;
}
