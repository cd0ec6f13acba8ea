import type { BudgetStatus } from './types';

export const NEAR_LIMIT_RATIO = 0.8;

/** Classifies spend against a limit; a null limit means no budget row exists */
export function evaluateBudget(category: string, limit: number | null, spent: number): BudgetStatus {
  if (limit === null) {
    return { category, limit: null, spent, ratio: null, status: 'no_limit' };
  }

  const ratio = spent / limit;
  const status = ratio >= 1 ? 'over' : ratio >= NEAR_LIMIT_RATIO ? 'near' : 'under';
  return { category, limit, spent, ratio, status };
}
