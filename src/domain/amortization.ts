/**
 * Fixed-installment amortization.
 * Callers validate inputs first: term > 0 and rate >= 0.
 */

/**
 * Monthly installment for a principal spread over `termMonths`.
 *
 * `monthlyRate` is a percentage (1 = 1% per month). With a positive rate the
 * annuity formula applies; with a zero rate the principal is split evenly.
 * A zero-rate call with `termMonths <= 0` falls back to the whole principal.
 */
export function computeInstallment(principal: number, termMonths: number, monthlyRate: number): number {
  if (monthlyRate > 0) {
    const r = monthlyRate / 100;
    const growth = Math.pow(1 + r, termMonths);
    return (principal * (r * growth)) / (growth - 1);
  }
  return termMonths > 0 ? principal / termMonths : principal;
}

export function remainingBalance(
  termMonths: number,
  monthsPaid: number,
  installment: number,
): { monthsRemaining: number; balanceRemaining: number } {
  const monthsRemaining = termMonths - monthsPaid;
  return { monthsRemaining, balanceRemaining: monthsRemaining * installment };
}

/** Whole installments needed to clear `outstanding`; 0 when nothing is owed */
export function monthsToPayoff(outstanding: number, installment: number): number {
  if (outstanding <= 0) return 0;
  return Math.ceil(outstanding / installment);
}
