import {
  applyCreditPayment,
  applyDeposit,
  applyLoanPayment,
  applyWithdrawal,
  creditProgress,
  creditView,
  loanProgress,
  loanView,
  savingsGoalView,
  savingsProgress,
  settleCredit,
  settleGoal,
  settleLoan,
} from '../../../src/domain/payoff';
import { makeCredit, makeGoal, makeLoan } from '../../helpers/factories';

describe('applyLoanPayment', () => {
  it('accumulates partial payments while staying active', () => {
    const outcome = applyLoanPayment(makeLoan({ principal: 1000, amountPaid: 200 }), 300);
    expect(outcome).toEqual({
      ok: true,
      transitioned: false,
      row: expect.objectContaining({ amountPaid: 500, status: 'active', active: true }),
    });
  });

  it('finishes exactly at the principal', () => {
    const outcome = applyLoanPayment(makeLoan({ principal: 1000, amountPaid: 600 }), 400);
    expect(outcome.ok && outcome.row).toEqual(expect.objectContaining({ amountPaid: 1000, status: 'finished', active: false }));
    expect(outcome.ok && outcome.transitioned).toBe(true);
  });

  it('clamps an overshooting final payment to the principal', () => {
    const outcome = applyLoanPayment(makeLoan({ principal: 1000, amountPaid: 900 }), 250);
    expect(outcome.ok && outcome.row.amountPaid).toBe(1000);
  });

  it('rejects payments once the loan left the active state', () => {
    expect(applyLoanPayment(makeLoan({ status: 'finished', active: false }), 10)).toEqual({ ok: false, reason: 'not_active' });
    expect(applyLoanPayment(makeLoan({ status: 'removed', active: false }), 10)).toEqual({ ok: false, reason: 'not_active' });
  });
});

describe('applyCreditPayment', () => {
  it('advances one month at a time', () => {
    const outcome = applyCreditPayment(makeCredit({ termMonths: 3, monthsPaid: 1 }));
    expect(outcome.ok && outcome.row).toEqual(expect.objectContaining({ monthsPaid: 2, status: 'active', paid: false }));
  });

  it('is paid after the last month', () => {
    const outcome = applyCreditPayment(makeCredit({ termMonths: 3, monthsPaid: 2 }));
    expect(outcome.ok && outcome.row).toEqual(expect.objectContaining({ monthsPaid: 3, status: 'finished', paid: true }));
  });

  it('reports not_active for a paid credit', () => {
    expect(applyCreditPayment(makeCredit({ monthsPaid: 12, status: 'finished', paid: true }))).toEqual({
      ok: false,
      reason: 'not_active',
    });
  });
});

describe('savings transitions', () => {
  it('completes and clamps on reaching the target', () => {
    const outcome = applyDeposit(makeGoal({ targetAmount: 100, currentAmount: 70 }), 50);
    expect(outcome.ok && outcome.row).toEqual(expect.objectContaining({ currentAmount: 100, status: 'finished', completed: true }));
  });

  it('floors withdrawals at zero', () => {
    const outcome = applyWithdrawal(makeGoal({ currentAmount: 30 }), 80);
    expect(outcome.ok && outcome.row.currentAmount).toBe(0);
  });

  it('leaves a completed goal completed after a withdrawal', () => {
    const goal = makeGoal({ targetAmount: 100, currentAmount: 100, status: 'finished', completed: true });
    const outcome = applyWithdrawal(goal, 30);
    expect(outcome.ok && outcome.row).toEqual(expect.objectContaining({ currentAmount: 70, completed: true }));
  });

  it('tops a finished goal back up to its target without a new transition', () => {
    const goal = makeGoal({ targetAmount: 100, currentAmount: 70, status: 'finished', completed: true });
    expect(applyDeposit(goal, 50)).toEqual({
      ok: true,
      transitioned: false,
      row: expect.objectContaining({ currentAmount: 100, status: 'finished', completed: true }),
    });
  });

  it('rejects deposits into a removed goal', () => {
    expect(applyDeposit(makeGoal({ status: 'removed', completed: true }), 10)).toEqual({ ok: false, reason: 'not_active' });
  });
});

describe('progress ratios', () => {
  it('stays within [0, 1]', () => {
    expect(loanProgress(makeLoan({ principal: 1000, amountPaid: 250 }))).toBe(0.25);
    expect(creditProgress(makeCredit({ termMonths: 4, monthsPaid: 1 }))).toBe(0.25);
    expect(savingsProgress(makeGoal({ targetAmount: 100, currentAmount: 100 }))).toBe(1);
    expect(savingsProgress(makeGoal({ targetAmount: 0, currentAmount: 10 }))).toBe(0);
  });
});

describe('settling after an edit', () => {
  it('finishes a credit whose new term is already covered', () => {
    expect(settleCredit(makeCredit({ termMonths: 4, monthsPaid: 6 }))).toEqual(
      expect.objectContaining({ monthsPaid: 4, status: 'finished', paid: true }),
    );
  });

  it('finishes a loan whose new principal is already paid', () => {
    expect(settleLoan(makeLoan({ principal: 500, amountPaid: 800 }))).toEqual(
      expect.objectContaining({ amountPaid: 500, status: 'finished', active: false }),
    );
  });

  it('completes a goal whose new target is already saved', () => {
    expect(settleGoal(makeGoal({ targetAmount: 50, currentAmount: 80 }))).toEqual(
      expect.objectContaining({ currentAmount: 50, status: 'finished', completed: true }),
    );
  });

  it('leaves a row short of its threshold active', () => {
    const loan = makeLoan({ principal: 1000, amountPaid: 300 });
    expect(settleLoan(loan)).toEqual(loan);
  });

  it('clamps a removed row without reviving it', () => {
    expect(settleCredit(makeCredit({ termMonths: 4, monthsPaid: 6, status: 'removed', paid: true }))).toEqual(
      expect.objectContaining({ monthsPaid: 4, status: 'removed' }),
    );
  });
});

describe('list views', () => {
  it('adds outstanding principal and installments left to a loan', () => {
    expect(loanView(makeLoan({ principal: 1000, amountPaid: 250, monthlyInstallment: 100 }))).toEqual(
      expect.objectContaining({ progress: 0.25, outstanding: 750, monthsLeft: 8 }),
    );
  });

  it('adds months and balance remaining to a credit purchase', () => {
    expect(creditView(makeCredit({ termMonths: 12, monthsPaid: 3, monthlyInstallment: 100 }))).toEqual(
      expect.objectContaining({ progress: 0.25, monthsRemaining: 9, balanceRemaining: 900 }),
    );
  });

  it('adds the amount still missing to a goal', () => {
    expect(savingsGoalView(makeGoal({ targetAmount: 200, currentAmount: 150 }))).toEqual(
      expect.objectContaining({ progress: 0.75, missing: 50 }),
    );
  });
});
