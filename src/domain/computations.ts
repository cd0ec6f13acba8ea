/**
 * Pure aggregation computations.
 * No DB, no IO. Rows in, totals out.
 */
import { format, subDays } from 'date-fns';
import type {
  Balance,
  BankAccount,
  CategoryTotal,
  CreditPurchase,
  Loan,
  MonthBalance,
  Obligations,
  SavingsGoal,
  Subscription,
  Transaction,
  TrendPoint,
} from './types';

/** Fixed stride of the trailing-window walk, in days */
export const TRAILING_STEP_DAYS = 30;

/** YYYY-MM key for a calendar month; month is 1-based and zero-padded here */
export function monthKey(month: number, year: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** Month and year of a date, month 1-based */
export function monthOf(now: Date = new Date()): { month: number; year: number } {
  return { month: now.getMonth() + 1, year: now.getFullYear() };
}

/** Filter transactions to a single calendar month */
export function forMonth(txns: Transaction[], month: number, year: number): Transaction[] {
  const key = monthKey(month, year);
  return txns.filter((t) => t.timestamp.startsWith(key));
}

function sumKind(txns: Transaction[], kind: Transaction['kind']): number {
  return txns.filter((t) => t.kind === kind).reduce((sum, t) => sum + t.amount, 0);
}

export function overallBalance(txns: Transaction[]): Balance {
  const income = sumKind(txns, 'income');
  const expense = sumKind(txns, 'expense');
  return { income, expense, net: income - expense };
}

export function monthlyBalance(txns: Transaction[], month: number, year: number): MonthBalance {
  const monthTxns = forMonth(txns, month, year);
  return { income: sumKind(monthTxns, 'income'), expense: sumKind(monthTxns, 'expense') };
}

/**
 * Expense totals per category for a month, largest first.
 * Equal totals keep the order in which their categories were first seen.
 */
export function spendByCategory(txns: Transaction[], month: number, year: number): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const t of forMonth(txns, month, year)) {
    if (t.kind !== 'expense') continue;
    map.set(t.category, (map.get(t.category) ?? 0) + t.amount);
  }
  return Array.from(map.entries())
    .map(([category, total]) => ({ category, total }))
    .sort((a, b) => b.total - a.total);
}

export function categorySpend(
  txns: Transaction[],
  category: string,
  month: number,
  year: number,
): number {
  return spendByCategory(txns, month, year).find((c) => c.category === category)?.total ?? 0;
}

/**
 * Income/expense for the last `count` periods, oldest first.
 *
 * Each step goes back a fixed 30 days from `now` rather than one calendar
 * month, so after several steps a label can repeat or skip a month.
 */
export function trailingMonths(txns: Transaction[], count: number, now: Date = new Date()): TrendPoint[] {
  if (count <= 0) return [];

  return Array.from({ length: count }, (_, index) => {
    const d = subDays(now, (count - 1 - index) * TRAILING_STEP_DAYS);
    const { month, year } = monthOf(d);
    const { income, expense } = monthlyBalance(txns, month, year);
    return { monthLabel: format(d, 'MMM'), year, income, expense };
  });
}

export function subscriptionsTotal(subs: Subscription[]): number {
  return subs.filter((s) => s.active).reduce((sum, s) => sum + s.monthlyAmount, 0);
}

export function loanInstallmentsTotal(loans: Loan[]): number {
  return loans.filter((l) => l.active).reduce((sum, l) => sum + l.monthlyInstallment, 0);
}

export function creditInstallmentsTotal(credits: CreditPurchase[]): number {
  return credits.filter((c) => !c.paid).reduce((sum, c) => sum + c.monthlyInstallment, 0);
}

export function obligations(
  subs: Subscription[],
  loans: Loan[],
  credits: CreditPurchase[],
): Obligations {
  return {
    subscriptions: subscriptionsTotal(subs),
    loanInstallments: loanInstallmentsTotal(loans),
    creditInstallments: creditInstallmentsTotal(credits),
  };
}

/**
 * Net balance minus every recurring monthly obligation.
 * Bank balances are stored value, not outflow, and are left out.
 */
export function availableFunds(net: number, o: Obligations): number {
  return net - o.subscriptions - o.loanInstallments - o.creditInstallments;
}

/** Outstanding principal over active loans */
export function loanDebtTotal(loans: Loan[]): number {
  return loans.filter((l) => l.active).reduce((sum, l) => sum + (l.principal - l.amountPaid), 0);
}

/** Installments still owed over unpaid credit purchases */
export function creditDebtTotal(credits: CreditPurchase[]): number {
  return credits
    .filter((c) => !c.paid)
    .reduce((sum, c) => sum + (c.termMonths - c.monthsPaid) * c.monthlyInstallment, 0);
}

/** Money set aside in goals that are still in progress */
export function savingsTotal(goals: SavingsGoal[]): number {
  return goals.filter((g) => !g.completed).reduce((sum, g) => sum + g.currentAmount, 0);
}

export function bankBalanceTotal(accounts: BankAccount[]): number {
  return accounts.filter((a) => a.active).reduce((sum, a) => sum + a.balance, 0);
}
