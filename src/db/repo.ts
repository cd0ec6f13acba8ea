/**
 * Repository layer: the Ledger Store.
 *
 * Every operation catches driver errors, logs them and reports a neutral
 * result (false / null / []) so callers never see an exception.
 */
import { format } from 'date-fns';
import { computeInstallment } from '../domain/amortization';
import { monthKey } from '../domain/computations';
import { settleCredit, settleGoal, settleLoan } from '../domain/payoff';
import type {
  AccountType,
  BankAccount,
  Budget,
  CreditPurchase,
  LifecycleStatus,
  Loan,
  SavingsGoal,
  Subscription,
  Transaction,
  TransactionKind,
  Transfer,
  TransferView,
} from '../domain/types';
import type {
  BankAccountEdit,
  BankAccountInput,
  BudgetInput,
  CreditInput,
  LoanInput,
  NewTransactionInput,
  SavingsGoalInput,
  SubscriptionInput,
  TransactionInput,
} from '../domain/validation';
import { logger } from '../lib/logger';
import type {
  Db,
  DbBankAccount,
  DbBudget,
  DbCreditPurchase,
  DbLoan,
  DbSavingsGoal,
  DbSubscription,
  DbTransaction,
  DbTransfer,
} from './database';

const log = logger.child({ module: 'repo' });

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm';
export const DATE_FORMAT = 'yyyy-MM-dd';

export interface TransactionFilter {
  text?: string;
  category?: string;
  kind?: TransactionKind;
  from?: string;               // inclusive lower bound on timestamp
  to?: string;                 // inclusive upper bound on timestamp
}

/** Entity kinds reachable through filterRows */
export interface EntityMap {
  transactions: Transaction;
  subscriptions: Subscription;
  loans: Loan;
  credit_purchases: CreditPurchase;
  savings_goals: SavingsGoal;
  bank_accounts: BankAccount;
  budgets: Budget;
  transfers: Transfer;
}

// --- Row mapping ---

function parseKind(value: string): TransactionKind {
  return value === 'income' ? 'income' : 'expense';
}

function parseStatus(value: string): LifecycleStatus {
  if (value === 'finished' || value === 'removed') return value;
  return 'active';
}

function parseAccountType(value: string): AccountType {
  switch (value) {
    case 'credit':
    case 'savings':
    case 'investment':
      return value;
    default:
      return 'debit';
  }
}

function toTransaction(r: DbTransaction): Transaction {
  return {
    id: r.id,
    kind: parseKind(r.kind),
    category: r.category,
    amount: r.amount,
    description: r.description,
    timestamp: r.timestamp,
  };
}

function toSubscription(r: DbSubscription): Subscription {
  return {
    id: r.id,
    name: r.name,
    monthlyAmount: r.monthly_amount,
    billingDay: r.billing_day,
    active: r.active === 1,
  };
}

function toLoan(r: DbLoan): Loan {
  const status = parseStatus(r.status);
  return {
    id: r.id,
    lender: r.lender,
    principal: r.principal,
    amountPaid: r.amount_paid,
    monthlyInstallment: r.monthly_installment,
    dueDay: r.due_day,
    startDate: r.start_date,
    status,
    active: status === 'active',
  };
}

function toCredit(r: DbCreditPurchase): CreditPurchase {
  const status = parseStatus(r.status);
  return {
    id: r.id,
    description: r.description,
    lender: r.lender,
    principal: r.principal,
    termMonths: r.term_months,
    monthlyInstallment: r.monthly_installment,
    monthsPaid: r.months_paid,
    purchaseDate: r.purchase_date,
    monthlyInterestRate: r.monthly_interest_rate,
    status,
    paid: status !== 'active',
  };
}

function toGoal(r: DbSavingsGoal): SavingsGoal {
  const status = parseStatus(r.status);
  return {
    id: r.id,
    name: r.name,
    targetAmount: r.target_amount,
    currentAmount: r.current_amount,
    startDate: r.start_date,
    status,
    completed: status !== 'active',
  };
}

function toAccount(r: DbBankAccount): BankAccount {
  return {
    id: r.id,
    bankName: r.bank_name,
    accountType: parseAccountType(r.account_type),
    balance: r.balance,
    creditLimit: r.credit_limit,
    createdDate: r.created_date,
    active: r.active === 1,
  };
}

function toTransfer(r: DbTransfer): Transfer {
  return {
    id: r.id,
    sourceAccountId: r.source_account_id,
    destinationAccountId: r.destination_account_id,
    amount: r.amount,
    timestamp: r.timestamp,
    description: r.description,
  };
}

function toBudget(r: DbBudget): Budget {
  return { id: r.id, category: r.category, limit: r.limit_amount, month: r.month, year: r.year };
}

interface DbTransferView extends DbTransfer {
  source_bank_name: string | null;
  destination_bank_name: string | null;
}

export class LedgerRepo {
  constructor(readonly db: Db) {}

  /** Runs `fn`, converting a thrown driver error into `fallback` */
  private attempt<T>(operation: string, fallback: T, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      log.error({ err: error, operation }, 'store operation failed');
      return fallback;
    }
  }

  /** Runs `fn` inside one SQLite transaction; a throw rolls everything back */
  runInTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // --- Transactions ---

  /**
   * With `accountId` the amount is also posted to that account (income adds,
   * expense subtracts); a missing account leaves nothing behind.
   */
  addTransaction(input: NewTransactionInput, now: Date = new Date()): Transaction | null {
    return this.attempt('addTransaction', null, () => {
      const id = this.runInTransaction(() => {
        const result = this.db.prepare(`
          INSERT INTO transactions (kind, category, amount, description, timestamp)
          VALUES (?, ?, ?, ?, ?)
        `).run(input.kind, input.category, input.amount, input.description, format(now, TIMESTAMP_FORMAT));
        if (input.accountId !== undefined) {
          this.adjustBalanceOrThrow(input.accountId, input.kind === 'income' ? input.amount : -input.amount);
        }
        return Number(result.lastInsertRowid);
      });
      return this.getTransaction(id);
    });
  }

  getTransaction(id: number): Transaction | null {
    return this.attempt('getTransaction', null, () => {
      const row = this.db.prepare<[number], DbTransaction>('SELECT * FROM transactions WHERE id = ?').get(id);
      return row ? toTransaction(row) : null;
    });
  }

  listTransactions(): Transaction[] {
    return this.attempt('listTransactions', [], () =>
      this.db.prepare<[], DbTransaction>('SELECT * FROM transactions ORDER BY id DESC').all().map(toTransaction),
    );
  }

  transactionsForMonth(month: number, year: number): Transaction[] {
    const key = monthKey(month, year);
    return this.attempt('transactionsForMonth', [], () =>
      this.db.prepare<[string], DbTransaction>(`
        SELECT * FROM transactions
        WHERE substr(timestamp, 1, 7) = ?
        ORDER BY timestamp DESC, id DESC
      `).all(key).map(toTransaction),
    );
  }

  searchTransactions(filter: TransactionFilter): Transaction[] {
    let query = 'SELECT * FROM transactions WHERE 1=1';
    const params: (string | number)[] = [];

    if (filter.text) {
      query += ' AND (description LIKE ? OR category LIKE ?)';
      params.push(`%${filter.text}%`, `%${filter.text}%`);
    }
    if (filter.category) {
      query += ' AND category = ?';
      params.push(filter.category);
    }
    if (filter.kind) {
      query += ' AND kind = ?';
      params.push(filter.kind);
    }
    if (filter.from) {
      query += ' AND timestamp >= ?';
      params.push(filter.from);
    }
    if (filter.to) {
      query += ' AND timestamp <= ?';
      params.push(filter.to);
    }
    query += ' ORDER BY id DESC';

    return this.attempt('searchTransactions', [], () =>
      this.db.prepare<(string | number)[], DbTransaction>(query).all(...params).map(toTransaction),
    );
  }

  updateTransaction(id: number, input: TransactionInput): boolean {
    return this.attempt('updateTransaction', false, () => {
      const result = this.db.prepare(`
        UPDATE transactions SET kind = ?, category = ?, amount = ?, description = ?
        WHERE id = ?
      `).run(input.kind, input.category, input.amount, input.description, id);
      return result.changes > 0;
    });
  }

  deleteTransaction(id: number): boolean {
    return this.attempt('deleteTransaction', false, () =>
      this.db.prepare('DELETE FROM transactions WHERE id = ?').run(id).changes > 0,
    );
  }

  // --- Subscriptions ---

  addSubscription(input: SubscriptionInput): Subscription | null {
    return this.attempt('addSubscription', null, () => {
      const result = this.db.prepare(`
        INSERT INTO subscriptions (name, monthly_amount, billing_day) VALUES (?, ?, ?)
      `).run(input.name, input.monthlyAmount, input.billingDay);
      return this.getSubscription(Number(result.lastInsertRowid));
    });
  }

  getSubscription(id: number): Subscription | null {
    return this.attempt('getSubscription', null, () => {
      const row = this.db.prepare<[number], DbSubscription>('SELECT * FROM subscriptions WHERE id = ?').get(id);
      return row ? toSubscription(row) : null;
    });
  }

  /** Active subscriptions by billing day */
  listSubscriptions(): Subscription[] {
    return this.attempt('listSubscriptions', [], () =>
      this.db.prepare<[], DbSubscription>('SELECT * FROM subscriptions WHERE active = 1 ORDER BY billing_day, id')
        .all().map(toSubscription),
    );
  }

  listAllSubscriptions(): Subscription[] {
    return this.attempt('listAllSubscriptions', [], () =>
      this.db.prepare<[], DbSubscription>('SELECT * FROM subscriptions ORDER BY id').all().map(toSubscription),
    );
  }

  updateSubscription(id: number, input: SubscriptionInput): boolean {
    return this.attempt('updateSubscription', false, () =>
      this.db.prepare(`
        UPDATE subscriptions SET name = ?, monthly_amount = ?, billing_day = ? WHERE id = ?
      `).run(input.name, input.monthlyAmount, input.billingDay, id).changes > 0,
    );
  }

  removeSubscription(id: number): boolean {
    return this.attempt('removeSubscription', false, () =>
      this.db.prepare('UPDATE subscriptions SET active = 0 WHERE id = ?').run(id).changes > 0,
    );
  }

  // --- Loans ---

  addLoan(input: LoanInput, now: Date = new Date()): Loan | null {
    return this.attempt('addLoan', null, () => {
      const result = this.db.prepare(`
        INSERT INTO loans (lender, principal, monthly_installment, due_day, start_date)
        VALUES (?, ?, ?, ?, ?)
      `).run(input.lender, input.principal, input.monthlyInstallment, input.dueDay, format(now, DATE_FORMAT));
      return this.getLoan(Number(result.lastInsertRowid));
    });
  }

  getLoan(id: number): Loan | null {
    return this.attempt('getLoan', null, () => {
      const row = this.db.prepare<[number], DbLoan>('SELECT * FROM loans WHERE id = ?').get(id);
      return row ? toLoan(row) : null;
    });
  }

  /** Active loans by due day */
  listLoans(): Loan[] {
    return this.attempt('listLoans', [], () =>
      this.db.prepare<[], DbLoan>(`SELECT * FROM loans WHERE status = 'active' ORDER BY due_day, id`)
        .all().map(toLoan),
    );
  }

  listAllLoans(): Loan[] {
    return this.attempt('listAllLoans', [], () =>
      this.db.prepare<[], DbLoan>('SELECT * FROM loans ORDER BY id').all().map(toLoan),
    );
  }

  /** A principal at or below what was already paid finishes the loan */
  updateLoan(id: number, input: LoanInput): boolean {
    return this.attempt('updateLoan', false, () =>
      this.runInTransaction(() => {
        const row = this.db.prepare<[number], DbLoan>('SELECT * FROM loans WHERE id = ?').get(id);
        if (!row) return false;
        const loan = settleLoan({
          ...toLoan(row),
          lender: input.lender,
          principal: input.principal,
          monthlyInstallment: input.monthlyInstallment,
          dueDay: input.dueDay,
        });
        return this.db.prepare(`
          UPDATE loans SET lender = ?, principal = ?, monthly_installment = ?, due_day = ?,
            amount_paid = ?, status = ?, active = ?
          WHERE id = ?
        `).run(
          loan.lender, loan.principal, loan.monthlyInstallment, loan.dueDay,
          loan.amountPaid, loan.status, loan.active ? 1 : 0, id,
        ).changes > 0;
      }),
    );
  }

  /** Persists payoff progress and lifecycle together */
  saveLoanProgress(loan: Loan): boolean {
    return this.attempt('saveLoanProgress', false, () =>
      this.db.prepare('UPDATE loans SET amount_paid = ?, status = ?, active = ? WHERE id = ?')
        .run(loan.amountPaid, loan.status, loan.active ? 1 : 0, loan.id).changes > 0,
    );
  }

  // --- Credit purchases ---

  addCredit(input: CreditInput, now: Date = new Date()): CreditPurchase | null {
    const installment = computeInstallment(input.principal, input.termMonths, input.monthlyInterestRate);
    return this.attempt('addCredit', null, () => {
      const result = this.db.prepare(`
        INSERT INTO credit_purchases
          (description, lender, principal, term_months, monthly_installment, purchase_date, monthly_interest_rate)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        input.description, input.lender, input.principal, input.termMonths,
        installment, format(now, DATE_FORMAT), input.monthlyInterestRate,
      );
      return this.getCredit(Number(result.lastInsertRowid));
    });
  }

  getCredit(id: number): CreditPurchase | null {
    return this.attempt('getCredit', null, () => {
      const row = this.db.prepare<[number], DbCreditPurchase>('SELECT * FROM credit_purchases WHERE id = ?').get(id);
      return row ? toCredit(row) : null;
    });
  }

  /** Unpaid credit purchases, newest first */
  listCredits(): CreditPurchase[] {
    return this.attempt('listCredits', [], () =>
      this.db.prepare<[], DbCreditPurchase>(`
        SELECT * FROM credit_purchases WHERE status = 'active' ORDER BY purchase_date DESC, id DESC
      `).all().map(toCredit),
    );
  }

  listAllCredits(): CreditPurchase[] {
    return this.attempt('listAllCredits', [], () =>
      this.db.prepare<[], DbCreditPurchase>('SELECT * FROM credit_purchases ORDER BY id').all().map(toCredit),
    );
  }

  /** Edits recompute the stored installment; a term already covered finishes the purchase */
  updateCredit(id: number, input: CreditInput): boolean {
    return this.attempt('updateCredit', false, () =>
      this.runInTransaction(() => {
        const row = this.db.prepare<[number], DbCreditPurchase>('SELECT * FROM credit_purchases WHERE id = ?').get(id);
        if (!row) return false;
        const credit = settleCredit({
          ...toCredit(row),
          description: input.description,
          lender: input.lender,
          principal: input.principal,
          termMonths: input.termMonths,
          monthlyInstallment: computeInstallment(input.principal, input.termMonths, input.monthlyInterestRate),
          monthlyInterestRate: input.monthlyInterestRate,
        });
        return this.db.prepare(`
          UPDATE credit_purchases SET description = ?, lender = ?, principal = ?, term_months = ?,
            monthly_installment = ?, monthly_interest_rate = ?, months_paid = ?, status = ?, paid = ?
          WHERE id = ?
        `).run(
          credit.description, credit.lender, credit.principal, credit.termMonths,
          credit.monthlyInstallment, credit.monthlyInterestRate,
          credit.monthsPaid, credit.status, credit.paid ? 1 : 0, id,
        ).changes > 0;
      }),
    );
  }

  saveCreditProgress(credit: CreditPurchase): boolean {
    return this.attempt('saveCreditProgress', false, () =>
      this.db.prepare('UPDATE credit_purchases SET months_paid = ?, status = ?, paid = ? WHERE id = ?')
        .run(credit.monthsPaid, credit.status, credit.paid ? 1 : 0, credit.id).changes > 0,
    );
  }

  // --- Savings goals ---

  addSavingsGoal(input: SavingsGoalInput, now: Date = new Date()): SavingsGoal | null {
    return this.attempt('addSavingsGoal', null, () => {
      const result = this.db.prepare(`
        INSERT INTO savings_goals (name, target_amount, start_date) VALUES (?, ?, ?)
      `).run(input.name, input.targetAmount, format(now, DATE_FORMAT));
      return this.getSavingsGoal(Number(result.lastInsertRowid));
    });
  }

  getSavingsGoal(id: number): SavingsGoal | null {
    return this.attempt('getSavingsGoal', null, () => {
      const row = this.db.prepare<[number], DbSavingsGoal>('SELECT * FROM savings_goals WHERE id = ?').get(id);
      return row ? toGoal(row) : null;
    });
  }

  /** Goals still in progress, newest first */
  listSavingsGoals(): SavingsGoal[] {
    return this.attempt('listSavingsGoals', [], () =>
      this.db.prepare<[], DbSavingsGoal>(`
        SELECT * FROM savings_goals WHERE status = 'active' ORDER BY start_date DESC, id DESC
      `).all().map(toGoal),
    );
  }

  listAllSavingsGoals(): SavingsGoal[] {
    return this.attempt('listAllSavingsGoals', [], () =>
      this.db.prepare<[], DbSavingsGoal>('SELECT * FROM savings_goals ORDER BY id').all().map(toGoal),
    );
  }

  /** Lowering the target to the saved amount or below completes the goal */
  updateSavingsGoal(id: number, input: SavingsGoalInput): boolean {
    return this.attempt('updateSavingsGoal', false, () =>
      this.runInTransaction(() => {
        const row = this.db.prepare<[number], DbSavingsGoal>('SELECT * FROM savings_goals WHERE id = ?').get(id);
        if (!row) return false;
        const goal = settleGoal({ ...toGoal(row), name: input.name, targetAmount: input.targetAmount });
        return this.db.prepare(`
          UPDATE savings_goals SET name = ?, target_amount = ?, current_amount = ?, status = ?, completed = ?
          WHERE id = ?
        `).run(goal.name, goal.targetAmount, goal.currentAmount, goal.status, goal.completed ? 1 : 0, id).changes > 0;
      }),
    );
  }

  saveGoalProgress(goal: SavingsGoal): boolean {
    return this.attempt('saveGoalProgress', false, () =>
      this.db.prepare('UPDATE savings_goals SET current_amount = ?, status = ?, completed = ? WHERE id = ?')
        .run(goal.currentAmount, goal.status, goal.completed ? 1 : 0, goal.id).changes > 0,
    );
  }

  // --- Bank accounts ---

  addBankAccount(input: BankAccountInput, now: Date = new Date()): BankAccount | null {
    return this.attempt('addBankAccount', null, () => {
      const result = this.db.prepare(`
        INSERT INTO bank_accounts (bank_name, account_type, balance, credit_limit, created_date)
        VALUES (?, ?, ?, ?, ?)
      `).run(input.bankName, input.accountType, input.initialBalance, input.creditLimit, format(now, DATE_FORMAT));
      return this.getBankAccount(Number(result.lastInsertRowid));
    });
  }

  getBankAccount(id: number): BankAccount | null {
    return this.attempt('getBankAccount', null, () => {
      const row = this.db.prepare<[number], DbBankAccount>('SELECT * FROM bank_accounts WHERE id = ?').get(id);
      return row ? toAccount(row) : null;
    });
  }

  /** Active accounts by bank name */
  listBankAccounts(): BankAccount[] {
    return this.attempt('listBankAccounts', [], () =>
      this.db.prepare<[], DbBankAccount>('SELECT * FROM bank_accounts WHERE active = 1 ORDER BY bank_name, id')
        .all().map(toAccount),
    );
  }

  listAllBankAccounts(): BankAccount[] {
    return this.attempt('listAllBankAccounts', [], () =>
      this.db.prepare<[], DbBankAccount>('SELECT * FROM bank_accounts ORDER BY id').all().map(toAccount),
    );
  }

  updateBankAccount(id: number, input: BankAccountEdit): boolean {
    return this.attempt('updateBankAccount', false, () =>
      this.db.prepare('UPDATE bank_accounts SET bank_name = ?, account_type = ?, credit_limit = ? WHERE id = ?')
        .run(input.bankName, input.accountType, input.creditLimit, id).changes > 0,
    );
  }

  setBalance(id: number, balance: number): boolean {
    return this.attempt('setBalance', false, () =>
      this.db.prepare('UPDATE bank_accounts SET balance = ? WHERE id = ?').run(balance, id).changes > 0,
    );
  }

  depositToAccount(id: number, amount: number): boolean {
    return this.attempt('depositToAccount', false, () =>
      this.db.prepare('UPDATE bank_accounts SET balance = balance + ? WHERE id = ?').run(amount, id).changes > 0,
    );
  }

  /** May take the balance below zero */
  withdrawFromAccount(id: number, amount: number): boolean {
    return this.attempt('withdrawFromAccount', false, () =>
      this.db.prepare('UPDATE bank_accounts SET balance = balance - ? WHERE id = ?').run(amount, id).changes > 0,
    );
  }

  /**
   * Adds `delta` to an account balance. Unlike the other writes this one
   * throws, so a transfer or a posted transaction can roll back a half-done move.
   */
  adjustBalanceOrThrow(id: number, delta: number): void {
    const result = this.db.prepare('UPDATE bank_accounts SET balance = balance + ? WHERE id = ?').run(delta, id);
    if (result.changes === 0) {
      throw new Error(`bank account ${id} not found`);
    }
  }

  removeBankAccount(id: number): boolean {
    return this.attempt('removeBankAccount', false, () =>
      this.db.prepare('UPDATE bank_accounts SET active = 0 WHERE id = ?').run(id).changes > 0,
    );
  }

  // --- Soft delete for payoff rows ---

  /**
   * Marks a loan, credit purchase or goal as removed. A row that already
   * finished keeps its finished status; the legacy flag is set either way.
   */
  softDelete(table: 'loans' | 'credit_purchases' | 'savings_goals', id: number): boolean {
    const flag = table === 'loans' ? 'active = 0' : table === 'credit_purchases' ? 'paid = 1' : 'completed = 1';
    return this.attempt(`softDelete:${table}`, false, () =>
      this.db.prepare(`
        UPDATE ${table}
        SET status = CASE WHEN status = 'active' THEN 'removed' ELSE status END, ${flag}
        WHERE id = ?
      `).run(id).changes > 0,
    );
  }

  // --- Transfers ---

  /** Appends a transfer record; throws so it can join the transfer transaction */
  insertTransferOrThrow(transfer: Omit<Transfer, 'id'>): number {
    const result = this.db.prepare(`
      INSERT INTO transfers (source_account_id, destination_account_id, amount, timestamp, description)
      VALUES (?, ?, ?, ?, ?)
    `).run(
      transfer.sourceAccountId, transfer.destinationAccountId,
      transfer.amount, transfer.timestamp, transfer.description,
    );
    return Number(result.lastInsertRowid);
  }

  /** Newest first, with bank names; a missing account resolves to null */
  listTransfers(): TransferView[] {
    return this.attempt('listTransfers', [], () =>
      this.db.prepare<[], DbTransferView>(`
        SELECT t.*, s.bank_name AS source_bank_name, d.bank_name AS destination_bank_name
        FROM transfers t
        LEFT JOIN bank_accounts s ON t.source_account_id = s.id
        LEFT JOIN bank_accounts d ON t.destination_account_id = d.id
        ORDER BY t.timestamp DESC, t.id DESC
      `).all().map((r) => ({
        ...toTransfer(r),
        sourceBankName: r.source_bank_name,
        destinationBankName: r.destination_bank_name,
      })),
    );
  }

  listAllTransfers(): Transfer[] {
    return this.attempt('listAllTransfers', [], () =>
      this.db.prepare<[], DbTransfer>('SELECT * FROM transfers ORDER BY id').all().map(toTransfer),
    );
  }

  // --- Budgets ---

  /** Upsert keyed by category; month/year are stamped from `now` */
  saveBudget(input: BudgetInput, now: Date = new Date()): Budget | null {
    return this.attempt('saveBudget', null, () => {
      this.db.prepare(`
        INSERT INTO budgets (category, limit_amount, month, year) VALUES (?, ?, ?, ?)
        ON CONFLICT(category) DO UPDATE SET
          limit_amount = excluded.limit_amount, month = excluded.month, year = excluded.year
      `).run(input.category, input.limit, now.getMonth() + 1, now.getFullYear());
      return this.getBudget(input.category);
    });
  }

  getBudget(category: string): Budget | null {
    return this.attempt('getBudget', null, () => {
      const row = this.db.prepare<[string], DbBudget>('SELECT * FROM budgets WHERE category = ?').get(category);
      return row ? toBudget(row) : null;
    });
  }

  listBudgets(): Budget[] {
    return this.attempt('listBudgets', [], () =>
      this.db.prepare<[], DbBudget>('SELECT * FROM budgets ORDER BY category').all().map(toBudget),
    );
  }

  deleteBudget(id: number): boolean {
    return this.attempt('deleteBudget', false, () =>
      this.db.prepare('DELETE FROM budgets WHERE id = ?').run(id).changes > 0,
    );
  }

  // --- Config ---

  getConfig(key: string): string | null {
    return this.attempt('getConfig', null, () => {
      const row = this.db.prepare<[string], { value: string | null }>('SELECT value FROM config WHERE key = ?').get(key);
      return row?.value ?? null;
    });
  }

  setConfig(key: string, value: string): boolean {
    return this.attempt('setConfig', false, () => {
      this.db.prepare(`
        INSERT INTO config (key, value) VALUES (?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value
      `).run(key, value);
      return true;
    });
  }

  deleteConfig(key: string): boolean {
    return this.attempt('deleteConfig', false, () => {
      this.db.prepare('DELETE FROM config WHERE key = ?').run(key);
      return true;
    });
  }

  // --- Generic filtering ---

  /** Every row of a kind, regardless of active/paid flags, that passes `predicate` */
  filterRows<K extends keyof EntityMap>(kind: K, predicate: (row: EntityMap[K]) => boolean): EntityMap[K][] {
    const rows: { [P in keyof EntityMap]: () => EntityMap[P][] } = {
      transactions: () => this.listTransactions(),
      subscriptions: () => this.listAllSubscriptions(),
      loans: () => this.listAllLoans(),
      credit_purchases: () => this.listAllCredits(),
      savings_goals: () => this.listAllSavingsGoals(),
      bank_accounts: () => this.listAllBankAccounts(),
      budgets: () => this.listBudgets(),
      transfers: () => this.listAllTransfers(),
    };
    return rows[kind]().filter(predicate);
  }
}
