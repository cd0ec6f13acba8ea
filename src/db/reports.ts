/**
 * Aggregation over the current store contents.
 * Every call reloads the rows it needs; nothing is cached.
 */
import {
  availableFunds,
  bankBalanceTotal,
  categorySpend,
  creditDebtTotal,
  loanDebtTotal,
  monthlyBalance,
  monthOf,
  obligations,
  overallBalance,
  savingsTotal,
  spendByCategory,
  trailingMonths,
} from '../domain/computations';
import { monthName } from '../domain/categories';
import type {
  Balance,
  CategoryTotal,
  Dashboard,
  MonthBalance,
  MonthlyReport,
  Obligations,
  TrendPoint,
} from '../domain/types';
import type { LedgerRepo } from './repo';

export function getOverallBalance(repo: LedgerRepo): Balance {
  return overallBalance(repo.listTransactions());
}

export function getMonthlyBalance(repo: LedgerRepo, month: number, year: number): MonthBalance {
  return monthlyBalance(repo.transactionsForMonth(month, year), month, year);
}

export function getSpendByCategory(repo: LedgerRepo, month: number, year: number): CategoryTotal[] {
  return spendByCategory(repo.transactionsForMonth(month, year), month, year);
}

export function getCategorySpend(repo: LedgerRepo, category: string, month: number, year: number): number {
  return categorySpend(repo.transactionsForMonth(month, year), category, month, year);
}

/** Spend in one category for the month containing `now` */
export function getCategorySpendThisMonth(repo: LedgerRepo, category: string, now: Date = new Date()): number {
  const { month, year } = monthOf(now);
  return getCategorySpend(repo, category, month, year);
}

export function getTrailingMonths(repo: LedgerRepo, count = 6, now: Date = new Date()): TrendPoint[] {
  return trailingMonths(repo.listTransactions(), count, now);
}

export function getObligations(repo: LedgerRepo): Obligations {
  return obligations(repo.listSubscriptions(), repo.listLoans(), repo.listCredits());
}

export function getAvailableFunds(repo: LedgerRepo): number {
  return availableFunds(getOverallBalance(repo).net, getObligations(repo));
}

export function getDashboard(repo: LedgerRepo, now: Date = new Date()): Dashboard {
  const overall = getOverallBalance(repo);
  const owed = getObligations(repo);
  const { month, year } = monthOf(now);

  return {
    overall,
    thisMonth: getMonthlyBalance(repo, month, year),
    obligations: owed,
    availableFunds: availableFunds(overall.net, owed),
    loanDebt: loanDebtTotal(repo.listLoans()),
    creditDebt: creditDebtTotal(repo.listCredits()),
    savings: savingsTotal(repo.listSavingsGoals()),
    bankBalance: bankBalanceTotal(repo.listBankAccounts()),
  };
}

/** Everything a month's spreadsheet export needs */
export function getMonthlyReport(repo: LedgerRepo, month: number, year: number): MonthlyReport {
  const transactions = repo.transactionsForMonth(month, year);
  const { income, expense } = monthlyBalance(transactions, month, year);
  const owed = getObligations(repo);

  return {
    month,
    year,
    monthName: monthName(month),
    income,
    expense,
    subscriptions: owed.subscriptions,
    loanInstallments: owed.loanInstallments,
    creditInstallments: owed.creditInstallments,
    balance: income - expense,
    transactions,
  };
}
