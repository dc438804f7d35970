import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { logger } from './logger.js';
import { ConfigError, errorMessage } from './errors.js';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS posts (
    id TEXT PRIMARY KEY,
    account TEXT NOT NULL,
    text TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    like_count INTEGER NOT NULL DEFAULT 0,
    repost_count INTEGER NOT NULL DEFAULT 0,
    reply_count INTEGER NOT NULL DEFAULT 0,
    fetched_at INTEGER NOT NULL,
    category TEXT,
    sentiment_score REAL,
    signals TEXT NOT NULL DEFAULT '[]',
    cache_version TEXT
  );
  CREATE TABLE IF NOT EXISTS account_fetches (
    account TEXT PRIMARY KEY,
    fetched_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_posts_account ON posts(account);
  CREATE INDEX IF NOT EXISTS idx_posts_created_at ON posts(created_at);
  CREATE INDEX IF NOT EXISTS idx_posts_category ON posts(category);
`;

/**
 * Opens (or creates) the cache database. `:memory:` gives a throwaway store.
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const db = new Database(dbPath);
    // WAL keeps readers on the last committed post while a collector writes.
    db.pragma('journal_mode = WAL');
    db.exec(SCHEMA);
    logger.debug(`Cache database ready at ${dbPath}`);
    return db;
  } catch (error) {
    throw new ConfigError(`Cannot open cache database at ${dbPath}: ${errorMessage(error)}`, {
      cause: error
    });
  }
}
