/**
 * Whole-store backup as JSON: `{ [table]: row[] }`, rows keyed by column name.
 * Import inserts-or-replaces row by row and skips what it cannot store.
 */
import { z } from 'zod';
import { logger } from '../lib/logger';
import { BACKUP_TABLES, type BackupTable } from './database';
import type { LedgerRepo } from './repo';

const log = logger.child({ module: 'backup' });

type SqlValue = string | number | null;

export type BackupData = Record<BackupTable, Record<string, unknown>[]>;

export interface ImportResult {
  imported: number;
  skipped: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBackupTable(name: string): name is BackupTable {
  return BACKUP_TABLES.some((t) => t === name);
}

// --- Row schemas ---
// Every column is optional so older backups still load (missing NOT NULL
// columns are left to the driver); a present value must have the column's
// type, and an unknown column rejects the row.

const id = z.number().int().positive();
const amount = z.number().finite();
const positive = amount.positive();
const count = z.number().int().min(0);
const day = z.number().int().min(1).max(31).nullable();
const date = z.string().nullable();
const flag = z.union([z.literal(0), z.literal(1), z.boolean()]).transform((v) => (v === true || v === 1 ? 1 : 0));
const status = z.enum(['active', 'finished', 'removed']);

type RowSchema = z.ZodType<Partial<Record<string, SqlValue>>, z.ZodTypeDef, unknown>;

const ROW_SCHEMAS: Record<BackupTable, RowSchema> = {
  transactions: z.object({
    id,
    kind: z.enum(['income', 'expense']),
    category: z.string().min(1),
    amount: positive,
    description: z.string(),
    timestamp: z.string().min(1),
  }).partial().strict(),
  subscriptions: z.object({
    id,
    name: z.string(),
    monthly_amount: positive,
    billing_day: day,
    active: flag,
  }).partial().strict(),
  loans: z.object({
    id,
    lender: z.string(),
    principal: positive,
    amount_paid: amount.min(0),
    monthly_installment: positive,
    due_day: day,
    start_date: date,
    status,
    active: flag,
  }).partial().strict(),
  credit_purchases: z.object({
    id,
    description: z.string(),
    lender: z.string(),
    principal: positive,
    term_months: count.positive(),
    monthly_installment: positive,
    months_paid: count,
    purchase_date: date,
    monthly_interest_rate: amount.min(0),
    status,
    paid: flag,
  }).partial().strict(),
  savings_goals: z.object({
    id,
    name: z.string(),
    target_amount: positive,
    current_amount: amount.min(0),
    start_date: date,
    status,
    completed: flag,
  }).partial().strict(),
  bank_accounts: z.object({
    id,
    bank_name: z.string(),
    account_type: z.enum(['debit', 'credit', 'savings', 'investment']),
    balance: amount,
    credit_limit: amount.min(0),
    created_date: date,
    active: flag,
  }).partial().strict(),
  budgets: z.object({
    id,
    category: z.string().min(1),
    limit_amount: positive,
    month: z.number().int().min(1).max(12).nullable(),
    year: z.number().int().nullable(),
  }).partial().strict(),
  transfers: z.object({
    id,
    source_account_id: id,
    destination_account_id: id,
    amount: positive,
    timestamp: z.string().min(1),
    description: z.string(),
  }).partial().strict(),
};

export function collectBackup(repo: LedgerRepo): BackupData | null {
  try {
    const data: Partial<BackupData> = {};
    for (const table of BACKUP_TABLES) {
      data[table] = repo.db.prepare<[], Record<string, unknown>>(`SELECT * FROM ${table} ORDER BY id`).all();
    }
    return {
      transactions: data.transactions ?? [],
      subscriptions: data.subscriptions ?? [],
      loans: data.loans ?? [],
      credit_purchases: data.credit_purchases ?? [],
      savings_goals: data.savings_goals ?? [],
      bank_accounts: data.bank_accounts ?? [],
      budgets: data.budgets ?? [],
      transfers: data.transfers ?? [],
    };
  } catch (error) {
    log.error({ err: error }, 'export failed');
    return null;
  }
}

export function exportBackup(repo: LedgerRepo): string | null {
  const data = collectBackup(repo);
  return data ? JSON.stringify(data, null, 2) : null;
}

function insertRow(repo: LedgerRepo, table: BackupTable, row: unknown): boolean {
  const parsed = ROW_SCHEMAS[table].safeParse(row);
  if (!parsed.success) {
    log.warn({ table, issues: parsed.error.issues.length }, 'skipped invalid backup row');
    return false;
  }

  const names: string[] = [];
  const values: SqlValue[] = [];
  for (const [name, value] of Object.entries(parsed.data)) {
    if (value === undefined) continue;
    names.push(name);
    values.push(value);
  }
  if (names.length === 0) return false;

  try {
    repo.db.prepare(`
      INSERT OR REPLACE INTO ${table} (${names.join(', ')})
      VALUES (${names.map(() => '?').join(', ')})
    `).run(...values);
    return true;
  } catch (error) {
    log.warn({ err: error, table }, 'skipped backup row');
    return false;
  }
}

/** Rows restored from backups that predate the lifecycle column */
function reconcileLifecycle(repo: LedgerRepo): void {
  repo.db.exec(`
    UPDATE loans SET status = CASE WHEN amount_paid >= principal THEN 'finished' ELSE 'removed' END
    WHERE active = 0 AND status = 'active'
  `);
  repo.db.exec(`
    UPDATE credit_purchases SET status = CASE WHEN months_paid >= term_months THEN 'finished' ELSE 'removed' END
    WHERE paid = 1 AND status = 'active'
  `);
  repo.db.exec(`
    UPDATE savings_goals SET status = CASE WHEN current_amount >= target_amount THEN 'finished' ELSE 'removed' END
    WHERE completed = 1 AND status = 'active'
  `);
}

export function importBackup(repo: LedgerRepo, json: string): ImportResult | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    log.error({ err: error }, 'backup is not valid JSON');
    return null;
  }
  if (!isRecord(parsed)) return null;
  const data = parsed;

  const result: ImportResult = { imported: 0, skipped: 0 };

  try {
    repo.runInTransaction(() => {
      for (const [table, rows] of Object.entries(data)) {
        if (!Array.isArray(rows)) continue;
        if (!isBackupTable(table)) {
          result.skipped += rows.length;
          continue;
        }
        for (const row of rows) {
          if (insertRow(repo, table, row)) {
            result.imported++;
          } else {
            result.skipped++;
          }
        }
      }
      reconcileLifecycle(repo);
    });
  } catch (error) {
    log.error({ err: error }, 'import failed');
    return null;
  }

  log.info(result, 'backup imported');
  return result;
}

/** Empties every table a backup carries; config is left alone */
export function clearAll(repo: LedgerRepo): boolean {
  try {
    repo.runInTransaction(() => {
      for (const table of BACKUP_TABLES) {
        repo.db.exec(`DELETE FROM ${table}`);
      }
    });
    return true;
  } catch (error) {
    log.error({ err: error }, 'clear failed');
    return false;
  }
}
