import fs from 'fs';
import path from 'path';
import { openDatabase } from '../../src/db/database';
import { LedgerRepo } from '../../src/db/repo';

/** Opens the ledger file, creating its directory on first run */
export function openLedger(dbPath: string): LedgerRepo {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  return new LedgerRepo(openDatabase(dbPath));
}
