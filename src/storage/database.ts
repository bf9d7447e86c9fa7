import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { StorageError } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';

/**
 * Open (creating if needed) the service database. ':memory:' gives a
 * private in-process database.
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
    }
    db.pragma('busy_timeout = 5000');
    return db;
  } catch (error) {
    throw new StorageError('open', false, `${dbPath}: ${getErrorMessage(error)}`, toError(error));
  }
}
