import Database from 'better-sqlite3';
import { StoreUnavailableError } from '../core/errors.js';
import { err, ok, type Result } from '../core/types.js';
import { logger } from '../utils/logger.js';

export type SqliteDatabase = Database.Database;

/**
 * Open an existing catalogue file read-only. A missing or unreadable file is
 * reported as StoreUnavailableError instead of thrown.
 */
export function openReadOnly(path: string): Result<SqliteDatabase, StoreUnavailableError> {
  try {
    const db = new Database(path, { readonly: true, fileMustExist: true });
    logger.debug('DB', `Opened ${path} (read-only)`);
    return ok(db);
  } catch (error) {
    logger.warn('DB', `Cannot open ${path}`, error);
    return err(new StoreUnavailableError(path, error));
  }
}

/**
 * Open (or create) a catalogue file for writing. Used by the seeding path only.
 */
export function openWritable(path: string): SqliteDatabase {
  logger.info('DB', `Opening ${path} for writing...`);
  return new Database(path);
}
