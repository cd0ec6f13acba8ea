/**
 * SQLite schema for the ledger (better-sqlite3).
 * One file per user; `:memory:` is used by tests.
 */
import Database from 'better-sqlite3';
import { logger } from '../lib/logger';

export type Db = Database.Database;

const log = logger.child({ module: 'database' });

// --- Row shapes as stored (snake_case, 0/1 booleans) ---

export interface DbTransaction {
  id: number;
  kind: string;
  category: string;
  amount: number;
  description: string;
  timestamp: string;
}

export interface DbSubscription {
  id: number;
  name: string;
  monthly_amount: number;
  billing_day: number;
  active: number;
}

export interface DbLoan {
  id: number;
  lender: string;
  principal: number;
  amount_paid: number;
  monthly_installment: number;
  due_day: number;
  start_date: string;
  status: string;
  active: number;
}

export interface DbCreditPurchase {
  id: number;
  description: string;
  lender: string;
  principal: number;
  term_months: number;
  monthly_installment: number;
  months_paid: number;
  purchase_date: string;
  monthly_interest_rate: number;
  status: string;
  paid: number;
}

export interface DbSavingsGoal {
  id: number;
  name: string;
  target_amount: number;
  current_amount: number;
  start_date: string;
  status: string;
  completed: number;
}

export interface DbBankAccount {
  id: number;
  bank_name: string;
  account_type: string;
  balance: number;
  credit_limit: number;
  created_date: string;
  active: number;
}

export interface DbTransfer {
  id: number;
  source_account_id: number;
  destination_account_id: number;
  amount: number;
  timestamp: string;
  description: string;
}

export interface DbBudget {
  id: number;
  category: string;
  limit_amount: number;
  month: number;
  year: number;
}

/** Tables carried by backups, in restore order */
export const BACKUP_TABLES = [
  'transactions',
  'subscriptions',
  'loans',
  'credit_purchases',
  'savings_goals',
  'bank_accounts',
  'budgets',
  'transfers',
] as const;

export type BackupTable = (typeof BACKUP_TABLES)[number];

function createTables(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS config (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      key TEXT UNIQUE NOT NULL,
      value TEXT
    )
  `);

  // Budgets are keyed by category alone; month/year only record the last save
  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      category TEXT UNIQUE NOT NULL,
      limit_amount REAL NOT NULL,
      month INTEGER,
      year INTEGER
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      category TEXT NOT NULL,
      amount REAL NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      timestamp TEXT NOT NULL
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_transactions_timestamp ON transactions(timestamp)`);

  db.exec(`
    CREATE TABLE IF NOT EXISTS subscriptions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      monthly_amount REAL NOT NULL,
      billing_day INTEGER,
      active INTEGER NOT NULL DEFAULT 1
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS loans (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      lender TEXT NOT NULL,
      principal REAL NOT NULL,
      amount_paid REAL NOT NULL DEFAULT 0,
      monthly_installment REAL NOT NULL,
      due_day INTEGER,
      start_date TEXT,
      active INTEGER NOT NULL DEFAULT 1
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS credit_purchases (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      description TEXT NOT NULL,
      lender TEXT NOT NULL,
      principal REAL NOT NULL,
      term_months INTEGER NOT NULL,
      monthly_installment REAL NOT NULL,
      months_paid INTEGER NOT NULL DEFAULT 0,
      purchase_date TEXT,
      monthly_interest_rate REAL NOT NULL DEFAULT 0,
      paid INTEGER NOT NULL DEFAULT 0
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS savings_goals (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      target_amount REAL NOT NULL,
      current_amount REAL NOT NULL DEFAULT 0,
      start_date TEXT,
      completed INTEGER NOT NULL DEFAULT 0
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS bank_accounts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      bank_name TEXT NOT NULL,
      account_type TEXT NOT NULL,
      balance REAL NOT NULL DEFAULT 0,
      credit_limit REAL NOT NULL DEFAULT 0,
      created_date TEXT,
      active INTEGER NOT NULL DEFAULT 1
    )
  `);

  // No FOREIGN KEY enforcement: a transfer outlives its accounts
  db.exec(`
    CREATE TABLE IF NOT EXISTS transfers (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_account_id INTEGER NOT NULL,
      destination_account_id INTEGER NOT NULL,
      amount REAL NOT NULL,
      timestamp TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT ''
    )
  `);
}

// --- Migrations: add new columns safely ---

/**
 * Adds the `status` lifecycle column and backfills it from the legacy flag.
 * Rows that were inactive before the column existed cannot be told apart,
 * so a paid-off amount marks them finished and anything else removed.
 */
function addLifecycleStatus(db: Db, table: string, backfill: string): void {
  const columns = db.pragma(`table_info(${table})`) as { name: string }[];
  if (columns.some((c) => c.name === 'status')) return;

  db.exec(`ALTER TABLE ${table} ADD COLUMN status TEXT NOT NULL DEFAULT 'active'`);
  db.exec(backfill);
  log.info({ table }, 'added lifecycle status column');
}

function migrate(db: Db): void {
  addLifecycleStatus(db, 'loans', `
    UPDATE loans SET status = CASE WHEN amount_paid >= principal THEN 'finished' ELSE 'removed' END
    WHERE active = 0
  `);
  addLifecycleStatus(db, 'credit_purchases', `
    UPDATE credit_purchases SET status = CASE WHEN months_paid >= term_months THEN 'finished' ELSE 'removed' END
    WHERE paid = 1
  `);
  addLifecycleStatus(db, 'savings_goals', `
    UPDATE savings_goals SET status = CASE WHEN current_amount >= target_amount THEN 'finished' ELSE 'removed' END
    WHERE completed = 1
  `);
}

export function openDatabase(path = ':memory:'): Db {
  const db = new Database(path);

  // One writer, occasional reader from the same process
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  createTables(db);
  migrate(db);
  log.debug({ path }, 'database ready');
  return db;
}
