import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { logger } from '../logger/logger.js';
import { migrations } from './migrations.js';

export type Db = Database.Database;

function migrate(db: Db) {
  const current = Number(db.pragma('user_version', { simple: true }));
  if (current >= migrations.length) return;

  const apply = db.transaction(() => {
    for (let version = current; version < migrations.length; version += 1) {
      db.exec(migrations[version]);
    }
    db.pragma(`user_version = ${migrations.length}`);
  });
  apply();
  logger.info('Database migrated', { from: current, to: migrations.length });
}

export function openDatabase(databasePath: string): Db {
  const inMemory = databasePath === ':memory:';
  if (!inMemory) {
    mkdirSync(path.dirname(databasePath), { recursive: true });
  }

  const db = new Database(databasePath);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');
  migrate(db);
  return db;
}

export function pingDatabase(db: Db): boolean {
  const row = db.prepare<[], { result: number }>('SELECT 1 AS result').get();
  return row?.result === 1;
}
