/**
 * Moves money between two bank accounts.
 *
 * Debit, credit and the transfer record run in one SQLite transaction, so a
 * failure in any step leaves both balances and the transfer log untouched.
 */
import { format } from 'date-fns';
import type { TransferInput } from '../domain/validation';
import { logger } from '../lib/logger';
import { TIMESTAMP_FORMAT, type LedgerRepo } from './repo';

const log = logger.child({ module: 'transfers' });

export function transfer(repo: LedgerRepo, input: TransferInput, now: Date = new Date()): number | null {
  const { sourceAccountId, destinationAccountId, amount, description } = input;
  try {
    return repo.runInTransaction(() => {
      repo.adjustBalanceOrThrow(sourceAccountId, -amount);
      repo.adjustBalanceOrThrow(destinationAccountId, amount);
      return repo.insertTransferOrThrow({
        sourceAccountId,
        destinationAccountId,
        amount,
        timestamp: format(now, TIMESTAMP_FORMAT),
        description,
      });
    });
  } catch (error) {
    log.error({ err: error, sourceAccountId, destinationAccountId }, 'transfer failed');
    return null;
  }
}
