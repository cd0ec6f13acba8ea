/**
 * Loopback JSON API driven by the presentation shell.
 * Thin adapter: validate, call into src/, map the result to a status code.
 */
import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import { exportBackup, importBackup } from '../../src/db/backup';
import { budgetOverview, evaluateCategory } from '../../src/db/budgets';
import {
  depositToGoal,
  registerCreditPayment,
  registerLoanPayment,
  removeCredit,
  removeLoan,
  removeSavingsGoal,
  withdrawFromGoal,
} from '../../src/db/payoff';
import {
  getDashboard,
  getMonthlyBalance,
  getMonthlyReport,
  getSpendByCategory,
  getTrailingMonths,
} from '../../src/db/reports';
import type { LedgerRepo } from '../../src/db/repo';
import {
  completeOnboarding,
  getTheme,
  hasPin,
  isFirstRun,
  savePin,
  saveTheme,
  verifyPin,
} from '../../src/db/settings';
import { transfer } from '../../src/db/transfers';
import { CATEGORIES } from '../../src/domain/categories';
import { monthOf } from '../../src/domain/computations';
import { creditView, loanView, savingsGoalView, type PayoffOutcome } from '../../src/domain/payoff';
import {
  amountSchema,
  balanceSchema,
  bankAccountEditSchema,
  bankAccountSchema,
  budgetSchema,
  creditSchema,
  loanSchema,
  newTransactionSchema,
  pinSchema,
  savingsGoalSchema,
  subscriptionSchema,
  themeSchema,
  transactionSchema,
  transferSchema,
  validate,
  type FieldError,
} from '../../src/domain/validation';
import { logger } from '../../src/lib/logger';

const log = logger.child({ module: 'api' });

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly fields: FieldError[] = [],
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = validate(schema, input);
  if (!result.ok) {
    throw new HttpError(400, 'Validation failed', result.errors);
  }
  return result.value;
}

function idParam(req: Request): number {
  const id = Number(req.params.id);
  if (!Number.isInteger(id) || id <= 0) {
    throw new HttpError(400, 'Invalid id');
  }
  return id;
}

function found<T>(value: T | null, what: string): T {
  if (value === null) throw new HttpError(404, `${what} not found`);
  return value;
}

function stored<T>(value: T | null): T {
  if (value === null) throw new HttpError(500, 'Operation did not take effect');
  return value;
}

function done(ok: boolean): void {
  if (!ok) throw new HttpError(500, 'Operation did not take effect');
}

function settle<T>(outcome: PayoffOutcome<T>, what: string): T {
  if (outcome.ok) return outcome.row;
  switch (outcome.reason) {
    case 'not_found':
      throw new HttpError(404, `${what} not found`);
    case 'not_active':
      throw new HttpError(409, `${what} is already finished or removed`);
    default:
      throw new HttpError(500, 'Operation did not take effect');
  }
}

const periodQuery = z.object({
  month: z.coerce.number().int().min(1).max(12).optional(),
  year: z.coerce.number().int().min(1970).max(9999).optional(),
});

const trendQuery = z.object({
  months: z.coerce.number().int().min(1).max(36).default(6),
});

const searchQuery = z.object({
  text: z.string().optional(),
  category: z.string().optional(),
  kind: z.enum(['income', 'expense']).optional(),
  from: z.string().optional(),
  to: z.string().optional(),
});

export function createApp(repo: LedgerRepo, clock: () => Date = () => new Date()): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  const period = (req: Request): { month: number; year: number } => {
    const q = parse(periodQuery, req.query);
    const current = monthOf(clock());
    return { month: q.month ?? current.month, year: q.year ?? current.year };
  };

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/categories', (_req, res) => {
    res.json(CATEGORIES);
  });

  // --- Transactions ---

  app.get('/transactions', (req, res) => {
    if (req.query.month || req.query.year) {
      const { month, year } = period(req);
      res.json(repo.transactionsForMonth(month, year));
      return;
    }
    res.json(repo.listTransactions());
  });

  app.get('/transactions/search', (req, res) => {
    res.json(repo.searchTransactions(parse(searchQuery, req.query)));
  });

  app.post('/transactions', (req, res) => {
    const input = parse(newTransactionSchema, req.body);
    if (input.accountId !== undefined) {
      found(repo.getBankAccount(input.accountId), 'Account');
    }
    res.status(201).json(stored(repo.addTransaction(input, clock())));
  });

  app.put('/transactions/:id', (req, res) => {
    const id = idParam(req);
    const input = parse(transactionSchema, req.body);
    found(repo.getTransaction(id), 'Transaction');
    done(repo.updateTransaction(id, input));
    res.json(repo.getTransaction(id));
  });

  app.delete('/transactions/:id', (req, res) => {
    const id = idParam(req);
    found(repo.getTransaction(id), 'Transaction');
    done(repo.deleteTransaction(id));
    res.json({ ok: true });
  });

  // --- Subscriptions ---

  app.get('/subscriptions', (_req, res) => {
    res.json(repo.listSubscriptions());
  });

  app.post('/subscriptions', (req, res) => {
    res.status(201).json(stored(repo.addSubscription(parse(subscriptionSchema, req.body))));
  });

  app.put('/subscriptions/:id', (req, res) => {
    const id = idParam(req);
    const input = parse(subscriptionSchema, req.body);
    found(repo.getSubscription(id), 'Subscription');
    done(repo.updateSubscription(id, input));
    res.json(repo.getSubscription(id));
  });

  app.delete('/subscriptions/:id', (req, res) => {
    const id = idParam(req);
    found(repo.getSubscription(id), 'Subscription');
    done(repo.removeSubscription(id));
    res.json({ ok: true });
  });

  // --- Loans ---

  app.get('/loans', (_req, res) => {
    res.json(repo.listLoans().map(loanView));
  });

  app.post('/loans', (req, res) => {
    res.status(201).json(stored(repo.addLoan(parse(loanSchema, req.body), clock())));
  });

  app.put('/loans/:id', (req, res) => {
    const id = idParam(req);
    const input = parse(loanSchema, req.body);
    found(repo.getLoan(id), 'Loan');
    done(repo.updateLoan(id, input));
    res.json(repo.getLoan(id));
  });

  app.delete('/loans/:id', (req, res) => {
    const id = idParam(req);
    found(repo.getLoan(id), 'Loan');
    done(removeLoan(repo, id));
    res.json({ ok: true });
  });

  app.post('/loans/:id/payments', (req, res) => {
    const id = idParam(req);
    const { amount } = parse(amountSchema, req.body);
    res.json(settle(registerLoanPayment(repo, id, amount), 'Loan'));
  });

  // --- Credit purchases ---

  app.get('/credits', (_req, res) => {
    res.json(repo.listCredits().map(creditView));
  });

  app.post('/credits', (req, res) => {
    res.status(201).json(stored(repo.addCredit(parse(creditSchema, req.body), clock())));
  });

  app.put('/credits/:id', (req, res) => {
    const id = idParam(req);
    const input = parse(creditSchema, req.body);
    found(repo.getCredit(id), 'Credit purchase');
    done(repo.updateCredit(id, input));
    res.json(repo.getCredit(id));
  });

  app.delete('/credits/:id', (req, res) => {
    const id = idParam(req);
    found(repo.getCredit(id), 'Credit purchase');
    done(removeCredit(repo, id));
    res.json({ ok: true });
  });

  app.post('/credits/:id/payments', (req, res) => {
    res.json(settle(registerCreditPayment(repo, idParam(req)), 'Credit purchase'));
  });

  // --- Savings goals ---

  app.get('/savings', (_req, res) => {
    res.json(repo.listSavingsGoals().map(savingsGoalView));
  });

  app.post('/savings', (req, res) => {
    res.status(201).json(stored(repo.addSavingsGoal(parse(savingsGoalSchema, req.body), clock())));
  });

  app.put('/savings/:id', (req, res) => {
    const id = idParam(req);
    const input = parse(savingsGoalSchema, req.body);
    found(repo.getSavingsGoal(id), 'Savings goal');
    done(repo.updateSavingsGoal(id, input));
    res.json(repo.getSavingsGoal(id));
  });

  app.delete('/savings/:id', (req, res) => {
    const id = idParam(req);
    found(repo.getSavingsGoal(id), 'Savings goal');
    done(removeSavingsGoal(repo, id));
    res.json({ ok: true });
  });

  app.post('/savings/:id/deposits', (req, res) => {
    const id = idParam(req);
    const { amount } = parse(amountSchema, req.body);
    res.json(settle(depositToGoal(repo, id, amount), 'Savings goal'));
  });

  app.post('/savings/:id/withdrawals', (req, res) => {
    const id = idParam(req);
    const { amount } = parse(amountSchema, req.body);
    res.json(settle(withdrawFromGoal(repo, id, amount), 'Savings goal'));
  });

  // --- Bank accounts and transfers ---

  app.get('/accounts', (_req, res) => {
    res.json(repo.listBankAccounts());
  });

  app.post('/accounts', (req, res) => {
    res.status(201).json(stored(repo.addBankAccount(parse(bankAccountSchema, req.body), clock())));
  });

  app.put('/accounts/:id', (req, res) => {
    const id = idParam(req);
    const input = parse(bankAccountEditSchema, req.body);
    found(repo.getBankAccount(id), 'Account');
    done(repo.updateBankAccount(id, input));
    res.json(repo.getBankAccount(id));
  });

  app.put('/accounts/:id/balance', (req, res) => {
    const id = idParam(req);
    const { balance } = parse(balanceSchema, req.body);
    found(repo.getBankAccount(id), 'Account');
    done(repo.setBalance(id, balance));
    res.json(repo.getBankAccount(id));
  });

  app.post('/accounts/:id/deposits', (req, res) => {
    const id = idParam(req);
    const { amount } = parse(amountSchema, req.body);
    found(repo.getBankAccount(id), 'Account');
    done(repo.depositToAccount(id, amount));
    res.json(repo.getBankAccount(id));
  });

  app.post('/accounts/:id/withdrawals', (req, res) => {
    const id = idParam(req);
    const { amount } = parse(amountSchema, req.body);
    found(repo.getBankAccount(id), 'Account');
    done(repo.withdrawFromAccount(id, amount));
    res.json(repo.getBankAccount(id));
  });

  app.delete('/accounts/:id', (req, res) => {
    const id = idParam(req);
    found(repo.getBankAccount(id), 'Account');
    done(repo.removeBankAccount(id));
    res.json({ ok: true });
  });

  app.get('/transfers', (_req, res) => {
    res.json(repo.listTransfers());
  });

  app.post('/transfers', (req, res) => {
    const input = parse(transferSchema, req.body);
    found(repo.getBankAccount(input.sourceAccountId), 'Source account');
    found(repo.getBankAccount(input.destinationAccountId), 'Destination account');
    const id = stored(transfer(repo, input, clock()));
    res.status(201).json({ id });
  });

  // --- Budgets ---

  app.get('/budgets', (req, res) => {
    const { month, year } = period(req);
    res.json(budgetOverview(repo, month, year));
  });

  app.put('/budgets', (req, res) => {
    res.json(stored(repo.saveBudget(parse(budgetSchema, req.body), clock())));
  });

  app.delete('/budgets/:id', (req, res) => {
    const id = idParam(req);
    if (!repo.deleteBudget(id)) throw new HttpError(404, 'Budget not found');
    res.json({ ok: true });
  });

  app.get('/budgets/:category/status', (req, res) => {
    const { month, year } = period(req);
    res.json(evaluateCategory(repo, req.params.category, month, year));
  });

  // --- Summary ---

  app.get('/summary', (_req, res) => {
    res.json(getDashboard(repo, clock()));
  });

  app.get('/summary/monthly', (req, res) => {
    const { month, year } = period(req);
    res.json({ month, year, ...getMonthlyBalance(repo, month, year) });
  });

  app.get('/summary/categories', (req, res) => {
    const { month, year } = period(req);
    res.json(getSpendByCategory(repo, month, year));
  });

  app.get('/summary/trend', (req, res) => {
    const { months } = parse(trendQuery, req.query);
    res.json(getTrailingMonths(repo, months, clock()));
  });

  app.get('/summary/report', (req, res) => {
    const { month, year } = period(req);
    res.json(getMonthlyReport(repo, month, year));
  });

  // --- Settings ---

  app.get('/settings', (_req, res) => {
    res.json({ theme: getTheme(repo), hasPin: hasPin(repo), firstRun: isFirstRun(repo) });
  });

  app.put('/settings/theme', (req, res) => {
    const { theme } = parse(themeSchema, req.body);
    done(saveTheme(repo, theme));
    res.json({ theme });
  });

  app.post('/settings/pin', (req, res) => {
    const { pin } = parse(pinSchema, req.body);
    done(savePin(repo, pin));
    res.json({ ok: true });
  });

  app.post('/settings/pin/verify', (req, res) => {
    const { pin } = parse(pinSchema, req.body);
    res.json({ valid: verifyPin(repo, pin) });
  });

  app.post('/settings/onboarding', (_req, res) => {
    done(completeOnboarding(repo));
    res.json({ ok: true });
  });

  // --- Backup ---

  app.get('/backup', (_req, res) => {
    res.type('application/json').send(stored(exportBackup(repo)));
  });

  app.post('/backup', (req, res) => {
    const result = importBackup(repo, JSON.stringify(req.body));
    if (result === null) throw new HttpError(400, 'Backup must be a JSON object of table rows');
    res.json(result);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).json({ error: err.message, fields: err.fields });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', fields: [] });
      return;
    }
    log.error({ err }, 'unhandled request error');
    res.status(500).json({ error: 'Internal error', fields: [] });
  });

  return app;
}
