import request from 'supertest';
import { createApp } from '../../server/src/app';
import { loadConfig } from '../../server/src/config';
import type { LedgerRepo } from '../../src/db/repo';
import { makeRepo } from '../helpers/factories';

const fixedNow = new Date(2025, 8, 15, 10, 30);

describe('ledger API', () => {
  let repo: LedgerRepo;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    repo = makeRepo();
    app = createApp(repo, () => fixedNow);
  });

  afterEach(() => {
    repo.db.close();
  });

  it('answers the health check', async () => {
    await request(app).get('/health').expect(200, { ok: true });
  });

  it('lists the default categories', async () => {
    const res = await request(app).get('/categories').expect(200);
    expect(res.body).toHaveLength(9);
    expect(res.body[0]).toBe('Food');
  });

  describe('transactions', () => {
    it('creates a transaction stamped by the clock', async () => {
      const res = await request(app)
        .post('/transactions')
        .send({ kind: 'expense', category: 'Food', amount: 18.25, description: 'lunch' })
        .expect(201);

      expect(res.body).toEqual({
        id: 1,
        kind: 'expense',
        category: 'Food',
        amount: 18.25,
        description: 'lunch',
        timestamp: '2025-09-15 10:30',
      });
    });

    it('rejects invalid input with field messages', async () => {
      const res = await request(app)
        .post('/transactions')
        .send({ kind: 'expense', category: 'Food', amount: -3 })
        .expect(400);

      expect(res.body).toEqual({
        error: 'Validation failed',
        fields: [{ field: 'amount', message: 'Amount must be greater than zero' }],
      });
      expect(repo.listTransactions()).toEqual([]);
    });

    it('reports malformed JSON as a bad request', async () => {
      await request(app)
        .post('/transactions')
        .set('Content-Type', 'application/json')
        .send('{"kind":')
        .expect(400, { error: 'Malformed JSON body', fields: [] });
    });

    it('returns 404 when editing a missing transaction', async () => {
      await request(app)
        .put('/transactions/5')
        .send({ kind: 'income', category: 'Salary', amount: 1 })
        .expect(404, { error: 'Transaction not found', fields: [] });
    });

    it('posts a new transaction to the chosen account', async () => {
      repo.addBankAccount({ bankName: 'North', accountType: 'debit', initialBalance: 100, creditLimit: 0 }, fixedNow);

      await request(app)
        .post('/transactions')
        .send({ kind: 'expense', category: 'Food', amount: 30, accountId: 1 })
        .expect(201);
      expect(repo.getBankAccount(1)?.balance).toBe(70);
    });

    it('answers 404 for an unknown posting account and stores nothing', async () => {
      await request(app)
        .post('/transactions')
        .send({ kind: 'income', category: 'Salary', amount: 30, accountId: 8 })
        .expect(404, { error: 'Account not found', fields: [] });
      expect(repo.listTransactions()).toEqual([]);
    });

    it('filters by month when asked', async () => {
      repo.addTransaction({ kind: 'expense', category: 'Food', amount: 1, description: 'aug' }, new Date(2025, 7, 31, 20, 0));
      repo.addTransaction({ kind: 'expense', category: 'Food', amount: 2, description: 'sep' }, fixedNow);

      const res = await request(app).get('/transactions').query({ month: 8, year: 2025 }).expect(200);
      expect(res.body.map((t: { description: string }) => t.description)).toEqual(['aug']);
    });
  });

  describe('payoff flows', () => {
    it('finishes a loan and answers 409 to a further payment', async () => {
      await request(app)
        .post('/loans')
        .send({ lender: 'Bank', principal: 500, monthlyInstallment: 250, dueDay: 1 })
        .expect(201);

      await request(app).post('/loans/1/payments').send({ amount: 250 }).expect(200);
      const res = await request(app).post('/loans/1/payments').send({ amount: 250 }).expect(200);
      expect(res.body).toEqual(expect.objectContaining({ amountPaid: 500, status: 'finished', active: false }));

      await request(app)
        .post('/loans/1/payments')
        .send({ amount: 1 })
        .expect(409, { error: 'Loan is already finished or removed', fields: [] });
      await request(app).get('/loans').expect(200, []);
    });

    it('lists loans with their progress', async () => {
      await request(app)
        .post('/loans')
        .send({ lender: 'Bank', principal: 1000, monthlyInstallment: 100, dueDay: 3 })
        .expect(201);
      await request(app).post('/loans/1/payments').send({ amount: 250 }).expect(200);

      const res = await request(app).get('/loans').expect(200);
      expect(res.body).toEqual([
        expect.objectContaining({ id: 1, amountPaid: 250, progress: 0.25, outstanding: 750, monthsLeft: 8 }),
      ]);
    });

    it('lists credits and goals with what is left', async () => {
      await request(app)
        .post('/credits')
        .send({ description: 'Desk', lender: 'Card', principal: 400, termMonths: 4 })
        .expect(201);
      await request(app).post('/credits/1/payments').expect(200);
      await request(app).post('/savings').send({ name: 'Trip', targetAmount: 500 }).expect(201);
      await request(app).post('/savings/1/deposits').send({ amount: 125 }).expect(200);

      const credits = await request(app).get('/credits').expect(200);
      expect(credits.body).toEqual([
        expect.objectContaining({ monthsPaid: 1, progress: 0.25, monthsRemaining: 3, balanceRemaining: 300 }),
      ]);
      const goals = await request(app).get('/savings').expect(200);
      expect(goals.body).toEqual([expect.objectContaining({ currentAmount: 125, progress: 0.25, missing: 375 })]);
    });

    it('finishes a credit whose edited term is already paid', async () => {
      await request(app)
        .post('/credits')
        .send({ description: 'Desk', lender: 'Card', principal: 400, termMonths: 4 })
        .expect(201);
      await request(app).post('/credits/1/payments').expect(200);
      await request(app).post('/credits/1/payments').expect(200);

      const res = await request(app)
        .put('/credits/1')
        .send({ description: 'Desk', lender: 'Card', principal: 400, termMonths: 2 })
        .expect(200);
      expect(res.body).toEqual(expect.objectContaining({ monthsPaid: 2, status: 'finished', paid: true }));
      await request(app).get('/credits').expect(200, []);
    });

    it('rejects a credit term beyond fifty years', async () => {
      const res = await request(app)
        .post('/credits')
        .send({ description: 'House', lender: 'Bank', principal: 100000, termMonths: 1000, monthlyInterestRate: 1 })
        .expect(400);
      expect(res.body.fields).toEqual([{ field: 'termMonths', message: 'Months must be at most 600' }]);
    });

    it('answers 404 for a payment on an unknown credit purchase', async () => {
      await request(app).post('/credits/3/payments').expect(404, { error: 'Credit purchase not found', fields: [] });
    });
  });

  describe('transfers', () => {
    beforeEach(() => {
      repo.addBankAccount({ bankName: 'North', accountType: 'debit', initialBalance: 300, creditLimit: 0 }, fixedNow);
      repo.addBankAccount({ bankName: 'South', accountType: 'savings', initialBalance: 0, creditLimit: 0 }, fixedNow);
    });

    it('moves money and returns the transfer id', async () => {
      await request(app)
        .post('/transfers')
        .send({ sourceAccountId: 1, destinationAccountId: 2, amount: 100 })
        .expect(201, { id: 1 });

      const accounts = await request(app).get('/accounts').expect(200);
      expect(accounts.body.map((a: { bankName: string; balance: number }) => [a.bankName, a.balance])).toEqual([
        ['North', 200],
        ['South', 100],
      ]);
    });

    it('deposits into and withdraws from one account', async () => {
      const deposit = await request(app).post('/accounts/2/deposits').send({ amount: 50 }).expect(200);
      expect(deposit.body).toEqual(expect.objectContaining({ id: 2, balance: 50 }));

      const withdrawal = await request(app).post('/accounts/1/withdrawals').send({ amount: 320 }).expect(200);
      expect(withdrawal.body).toEqual(expect.objectContaining({ id: 1, balance: -20 }));

      await request(app)
        .post('/accounts/7/deposits')
        .send({ amount: 5 })
        .expect(404, { error: 'Account not found', fields: [] });
      await request(app).post('/accounts/1/withdrawals').send({ amount: 0 }).expect(400);
    });

    it('refuses a transfer to the same account', async () => {
      const res = await request(app)
        .post('/transfers')
        .send({ sourceAccountId: 1, destinationAccountId: 1, amount: 10 })
        .expect(400);
      expect(res.body.fields).toEqual([
        { field: 'destinationAccountId', message: 'Source and destination accounts must differ' },
      ]);
    });

    it('answers 404 for an unknown destination', async () => {
      await request(app)
        .post('/transfers')
        .send({ sourceAccountId: 1, destinationAccountId: 9, amount: 10 })
        .expect(404, { error: 'Destination account not found', fields: [] });
      expect(repo.getBankAccount(1)?.balance).toBe(300);
    });
  });

  describe('budgets and summary', () => {
    it('evaluates a category for the current month', async () => {
      await request(app).put('/budgets').send({ category: 'Food', limit: 100 }).expect(200);
      repo.addTransaction({ kind: 'expense', category: 'Food', amount: 120, description: '' }, fixedNow);

      await request(app).get('/budgets/Food/status').expect(200, {
        category: 'Food',
        limit: 100,
        spent: 120,
        ratio: 1.2,
        status: 'over',
      });
    });

    it('returns the dashboard totals', async () => {
      repo.addTransaction({ kind: 'income', category: 'Salary', amount: 1000, description: '' }, fixedNow);
      repo.addSubscription({ name: 'Music', monthlyAmount: 10, billingDay: 1 });

      const res = await request(app).get('/summary').expect(200);
      expect(res.body.availableFunds).toBe(990);
      expect(res.body.thisMonth).toEqual({ income: 1000, expense: 0 });
    });

    it('caps the trend window', async () => {
      await request(app).get('/summary/trend').query({ months: 40 }).expect(400);
      const res = await request(app).get('/summary/trend').expect(200);
      expect(res.body).toHaveLength(6);
    });
  });

  describe('settings and backup', () => {
    it('locks with a PIN and reports it in settings', async () => {
      await request(app).post('/settings/pin').send({ pin: '2468' }).expect(200);
      await request(app).post('/settings/pin/verify').send({ pin: '2468' }).expect(200, { valid: true });
      await request(app).post('/settings/pin/verify').send({ pin: '1357' }).expect(200, { valid: false });
      await request(app).get('/settings').expect(200, { theme: 'light', hasPin: true, firstRun: true });
    });

    it('round-trips a backup through the API', async () => {
      repo.addTransaction({ kind: 'expense', category: 'Food', amount: 7, description: 'tea' }, fixedNow);
      const exported = await request(app).get('/backup').expect(200);

      const target = makeRepo();
      const res = await request(createApp(target, () => fixedNow)).post('/backup').send(exported.body).expect(200);

      expect(res.body).toEqual({ imported: 1, skipped: 0 });
      expect(target.listTransactions()).toEqual(repo.listTransactions());
      target.db.close();
    });
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ NODE_ENV: 'test', LEDGER_DB_PATH: ':memory:' });
    expect(config).toEqual({
      NODE_ENV: 'test',
      HOST: '127.0.0.1',
      PORT: 8787,
      LEDGER_DB_PATH: ':memory:',
      LOG_LEVEL: 'info',
    });
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow('Invalid configuration: PORT:');
  });
});
