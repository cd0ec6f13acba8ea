/**
 * Payoff lifecycle transitions for loans, credit purchases and savings goals.
 * Pure: each function takes a row and returns the next row.
 *
 * `status` separates "finished" (paid off / target reached) from "removed"
 * (soft-deleted by the user); the legacy booleans follow it.
 */
import { monthsToPayoff, remainingBalance } from './amortization';
import type {
  CreditPurchase,
  CreditView,
  LifecycleStatus,
  Loan,
  LoanView,
  SavingsGoal,
  SavingsGoalView,
} from './types';

export type PayoffFailure = 'not_found' | 'not_active' | 'store_error';

export type PayoffOutcome<T> =
  | { ok: true; row: T; transitioned: boolean }
  | { ok: false; reason: PayoffFailure };

export function withLoanStatus(loan: Loan, status: LifecycleStatus): Loan {
  return { ...loan, status, active: status === 'active' };
}

export function withCreditStatus(credit: CreditPurchase, status: LifecycleStatus): CreditPurchase {
  return { ...credit, status, paid: status !== 'active' };
}

export function withGoalStatus(goal: SavingsGoal, status: LifecycleStatus): SavingsGoal {
  return { ...goal, status, completed: status !== 'active' };
}

// --- Payoff rule ---
// Progress never exceeds the threshold, and an active row that reaches it
// finishes. Applied after every payment and every edit.

export function settleLoan(loan: Loan): Loan {
  const row = { ...loan, amountPaid: Math.min(loan.amountPaid, loan.principal) };
  return row.status === 'active' && row.amountPaid >= row.principal ? withLoanStatus(row, 'finished') : row;
}

export function settleCredit(credit: CreditPurchase): CreditPurchase {
  const row = { ...credit, monthsPaid: Math.min(credit.monthsPaid, credit.termMonths) };
  return row.status === 'active' && row.monthsPaid >= row.termMonths ? withCreditStatus(row, 'finished') : row;
}

export function settleGoal(goal: SavingsGoal): SavingsGoal {
  const row = { ...goal, currentAmount: Math.min(goal.currentAmount, goal.targetAmount) };
  return row.status === 'active' && row.currentAmount >= row.targetAmount ? withGoalStatus(row, 'finished') : row;
}

/** Adds a payment; reaching the principal clamps and finishes the loan */
export function applyLoanPayment(loan: Loan, amount: number): PayoffOutcome<Loan> {
  if (loan.status !== 'active') return { ok: false, reason: 'not_active' };

  const row = settleLoan({ ...loan, amountPaid: loan.amountPaid + amount });
  return { ok: true, row, transitioned: row.status === 'finished' };
}

/** Advances one month at the stored installment */
export function applyCreditPayment(credit: CreditPurchase): PayoffOutcome<CreditPurchase> {
  if (credit.status !== 'active') return { ok: false, reason: 'not_active' };

  const row = settleCredit({ ...credit, monthsPaid: credit.monthsPaid + 1 });
  return { ok: true, row, transitioned: row.status === 'finished' };
}

/**
 * A finished goal still takes deposits up to its target, so it can be topped
 * up again after a withdrawal. Only a removed goal refuses them.
 */
export function applyDeposit(goal: SavingsGoal, amount: number): PayoffOutcome<SavingsGoal> {
  if (goal.status === 'removed') return { ok: false, reason: 'not_active' };

  const row = settleGoal({ ...goal, currentAmount: goal.currentAmount + amount });
  return { ok: true, row, transitioned: goal.status === 'active' && row.status === 'finished' };
}

/**
 * Floors at zero. Allowed in every state and never reopens a finished goal,
 * so a finished goal can hold less than its target afterwards.
 */
export function applyWithdrawal(goal: SavingsGoal, amount: number): PayoffOutcome<SavingsGoal> {
  return { ok: true, row: { ...goal, currentAmount: Math.max(0, goal.currentAmount - amount) }, transitioned: false };
}

function ratio(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return Math.min(1, Math.max(0, part / whole));
}

export function loanProgress(loan: Loan): number {
  return ratio(loan.amountPaid, loan.principal);
}

export function creditProgress(credit: CreditPurchase): number {
  return ratio(credit.monthsPaid, credit.termMonths);
}

export function savingsProgress(goal: SavingsGoal): number {
  return ratio(goal.currentAmount, goal.targetAmount);
}

// --- List views ---

export function loanView(loan: Loan): LoanView {
  const outstanding = Math.max(0, loan.principal - loan.amountPaid);
  return {
    ...loan,
    progress: loanProgress(loan),
    outstanding,
    monthsLeft: monthsToPayoff(outstanding, loan.monthlyInstallment),
  };
}

export function creditView(credit: CreditPurchase): CreditView {
  return {
    ...credit,
    progress: creditProgress(credit),
    ...remainingBalance(credit.termMonths, credit.monthsPaid, credit.monthlyInstallment),
  };
}

export function savingsGoalView(goal: SavingsGoal): SavingsGoalView {
  return {
    ...goal,
    progress: savingsProgress(goal),
    missing: Math.max(0, goal.targetAmount - goal.currentAmount),
  };
}
