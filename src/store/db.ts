import Database from 'better-sqlite3';
import { applySchema } from './schema.js';

let _db: Database.Database | null = null;

function configure(db: Database.Database): Database.Database {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  applySchema(db);
  return db;
}

export function openDb(dbPath: string): Database.Database {
  if (_db) return _db;
  _db = configure(new Database(dbPath));
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

