import Database from 'better-sqlite3';
import { drizzle, BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import fs from 'fs';
import path from 'path';
import { createChildLogger } from '../utils/logger';
import * as schema from './schema';

const log = createChildLogger('database');

export type LicenseDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: LicenseDb;
  sqlite: Database.Database;
  close(): void;
}

const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the local license database and run migrations.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filePath: string): DatabaseHandle {
  const inMemory = filePath === IN_MEMORY;

  if (!inMemory) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    log.info(`Initializing SQLite database at ${filePath}`);
  }

  const sqlite = new Database(filePath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  const db = drizzle(sqlite, { schema });

  runMigrations(sqlite);

  if (!inMemory) {
    restrictPermissions(filePath);
  }

  return {
    db,
    sqlite,
    close() {
      if (sqlite.open) {
        sqlite.close();
        log.info('Database connection closed');
      }
    },
  };
}

function restrictPermissions(filePath: string): void {
  // Owner-only on Unix; Windows keeps the data dir inside the user profile
  try {
    fs.chmodSync(filePath, 0o600);
    for (const suffix of ['-wal', '-shm']) {
      if (fs.existsSync(filePath + suffix)) fs.chmodSync(filePath + suffix, 0o600);
    }
  } catch (err) {
    log.debug({ err }, 'Could not restrict database file permissions');
  }
}

function runMigrations(sqlite: Database.Database): void {
  log.debug('Running database migrations...');

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS license_info (
      id TEXT PRIMARY KEY,
      license_key TEXT NOT NULL UNIQUE,
      status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'active', 'revoked', 'expired')),
      tier TEXT NOT NULL DEFAULT 'standard' CHECK(tier IN ('trial', 'standard', 'premium')),
      hw_network TEXT NOT NULL DEFAULT '',
      hw_cpu TEXT NOT NULL DEFAULT '',
      hw_board TEXT NOT NULL DEFAULT '',
      licensee_name TEXT NOT NULL DEFAULT '',
      licensee_email TEXT NOT NULL DEFAULT '',
      expiry_date TEXT,
      transfer_count INTEGER NOT NULL DEFAULT 0,
      last_verified_at INTEGER,
      offline_grace_until INTEGER,
      activated_at INTEGER NOT NULL,
      last_transfer_at INTEGER,
      manual_verification_count INTEGER NOT NULL DEFAULT 0,
      manual_verification_reset_at INTEGER,
      is_current INTEGER NOT NULL DEFAULT 0,
      integrity_signature TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_license_info_current ON license_info(is_current);

    CREATE TABLE IF NOT EXISTS license_audit_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_type TEXT NOT NULL,
      license_key TEXT,
      source_ip TEXT,
      details TEXT NOT NULL DEFAULT '{}',
      timestamp INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_license_audit_timestamp ON license_audit_log(timestamp);

    CREATE TRIGGER IF NOT EXISTS license_audit_log_no_update
    BEFORE UPDATE ON license_audit_log
    BEGIN
      SELECT RAISE(ABORT, 'license_audit_log is append-only');
    END;

    CREATE TRIGGER IF NOT EXISTS license_audit_log_no_delete
    BEFORE DELETE ON license_audit_log
    BEGIN
      SELECT RAISE(ABORT, 'license_audit_log is append-only');
    END;
  `);

  log.debug('Migrations completed');
}
