import { computeInstallment, monthsToPayoff, remainingBalance } from '../../../src/domain/amortization';

describe('computeInstallment', () => {
  it('splits the principal evenly when interest-free', () => {
    expect(computeInstallment(1200, 12, 0)).toBe(100);
  });

  it('applies the annuity formula for a positive monthly rate', () => {
    const r = 0.01;
    const growth = Math.pow(1 + r, 12);
    const expected = (1200 * (r * growth)) / (growth - 1);

    const installment = computeInstallment(1200, 12, 1);

    expect(installment).toBeCloseTo(expected, 10);
    expect(installment).toBeCloseTo(106.62, 2);
  });

  it('charges more in total than the principal when interest applies', () => {
    expect(computeInstallment(5000, 24, 2) * 24).toBeGreaterThan(5000);
  });

  it('falls back to the whole principal for a zero-month interest-free plan', () => {
    expect(computeInstallment(900, 0, 0)).toBe(900);
  });
});

describe('remainingBalance', () => {
  it('multiplies the months left by the installment', () => {
    expect(remainingBalance(12, 4, 100)).toEqual({ monthsRemaining: 8, balanceRemaining: 800 });
  });

  it('is zero once every month is paid', () => {
    expect(remainingBalance(6, 6, 250)).toEqual({ monthsRemaining: 0, balanceRemaining: 0 });
  });
});

describe('monthsToPayoff', () => {
  it('rounds partial installments up', () => {
    expect(monthsToPayoff(250, 100)).toBe(3);
  });

  it('is zero when nothing is owed', () => {
    expect(monthsToPayoff(0, 100)).toBe(0);
  });
});
