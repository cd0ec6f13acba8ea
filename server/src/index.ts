import { logger } from '../../src/lib/logger';
import { createApp } from './app';
import { loadConfig } from './config';
import { openLedger } from './db';

const config = loadConfig();

const repo = openLedger(config.LEDGER_DB_PATH);
const app = createApp(repo);

const server = app.listen(config.PORT, config.HOST, () => {
  logger.info({ host: config.HOST, port: config.PORT, db: config.LEDGER_DB_PATH }, 'ledger API listening');
});

function shutdown(): void {
  server.close(() => {
    repo.db.close();
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
