/**
 * Payoff operations: load the row, apply the pure transition, save it back.
 */
import {
  applyCreditPayment,
  applyDeposit,
  applyLoanPayment,
  applyWithdrawal,
  type PayoffOutcome,
} from '../domain/payoff';
import type { CreditPurchase, Loan, SavingsGoal } from '../domain/types';
import { logger } from '../lib/logger';
import type { LedgerRepo } from './repo';

const log = logger.child({ module: 'payoff' });

function persist<T extends { id: number }>(
  outcome: PayoffOutcome<T>,
  save: (row: T) => boolean,
  kind: string,
): PayoffOutcome<T> {
  if (!outcome.ok) return outcome;
  if (!save(outcome.row)) return { ok: false, reason: 'store_error' };
  if (outcome.transitioned) {
    log.info({ kind, id: outcome.row.id }, 'finished');
  }
  return outcome;
}

export function registerLoanPayment(repo: LedgerRepo, id: number, amount: number): PayoffOutcome<Loan> {
  const loan = repo.getLoan(id);
  if (!loan) return { ok: false, reason: 'not_found' };
  return persist(applyLoanPayment(loan, amount), (row) => repo.saveLoanProgress(row), 'loan');
}

export function registerCreditPayment(repo: LedgerRepo, id: number): PayoffOutcome<CreditPurchase> {
  const credit = repo.getCredit(id);
  if (!credit) return { ok: false, reason: 'not_found' };
  return persist(applyCreditPayment(credit), (row) => repo.saveCreditProgress(row), 'credit');
}

export function depositToGoal(repo: LedgerRepo, id: number, amount: number): PayoffOutcome<SavingsGoal> {
  const goal = repo.getSavingsGoal(id);
  if (!goal) return { ok: false, reason: 'not_found' };
  return persist(applyDeposit(goal, amount), (row) => repo.saveGoalProgress(row), 'savings');
}

export function withdrawFromGoal(repo: LedgerRepo, id: number, amount: number): PayoffOutcome<SavingsGoal> {
  const goal = repo.getSavingsGoal(id);
  if (!goal) return { ok: false, reason: 'not_found' };
  return persist(applyWithdrawal(goal, amount), (row) => repo.saveGoalProgress(row), 'savings');
}

export function removeLoan(repo: LedgerRepo, id: number): boolean {
  return repo.softDelete('loans', id);
}

export function removeCredit(repo: LedgerRepo, id: number): boolean {
  return repo.softDelete('credit_purchases', id);
}

export function removeSavingsGoal(repo: LedgerRepo, id: number): boolean {
  return repo.softDelete('savings_goals', id);
}
