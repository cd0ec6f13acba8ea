import { evaluateBudget } from '../domain/budget';
import { monthOf } from '../domain/computations';
import type { BudgetStatus } from '../domain/types';
import { getCategorySpend } from './reports';
import type { LedgerRepo } from './repo';

/** Spend against the category's limit for a month (the current one by default) */
export function evaluateCategory(
  repo: LedgerRepo,
  category: string,
  month?: number,
  year?: number,
  now: Date = new Date(),
): BudgetStatus {
  const current = monthOf(now);
  const m = month ?? current.month;
  const y = year ?? current.year;
  const budget = repo.getBudget(category);
  return evaluateBudget(category, budget ? budget.limit : null, getCategorySpend(repo, category, m, y));
}

/** Status of every stored budget, by category */
export function budgetOverview(repo: LedgerRepo, month: number, year: number): BudgetStatus[] {
  return repo.listBudgets().map((b) =>
    evaluateBudget(b.category, b.limit, getCategorySpend(repo, b.category, month, year)),
  );
}
