import path from 'path';
import { PATHS } from '@fitledger/shared';

function getBasePath(): string {
  return process.env.APP_DIR || '.';
}

/**
 * Location of the local database file. `FITLEDGER_DB_PATH` wins over APP_DIR;
 * `:memory:` opens a throwaway in-memory database.
 */
export function getDatabasePath(): string {
  if (process.env.FITLEDGER_DB_PATH) {
    return process.env.FITLEDGER_DB_PATH;
  }
  return path.join(getBasePath(), PATHS.STATE_DIR, PATHS.DB_FILE);
}

export function getLogLevel(): string {
  return process.env.LOG_LEVEL || 'info';
}
