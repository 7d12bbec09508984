/**
 * SQLite Database Connection
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { SCHEMA } from './schema.js';

export type SqliteDatabase = Database.Database;

let db: SqliteDatabase | null = null;

/**
 * Get the open database
 */
export function getDatabase(): SqliteDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Open the database file and apply the schema. ':memory:' opens a private in-memory database.
 */
export function initDatabase(path: string): SqliteDatabase {
  if (db) {
    logger.debug('Database already initialized');
    return db;
  }

  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const connection = new Database(path);
  try {
    connection.pragma('journal_mode = WAL');
    connection.pragma('synchronous = FULL');
    connection.pragma('foreign_keys = ON');
    connection.exec(SCHEMA);
  } catch (error) {
    connection.close();
    logger.fatal({ error, path }, 'Failed to initialize database schema');
    throw error;
  }

  db = connection;
  logger.info({ path }, 'Database initialized');
  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.debug('Database connection closed');
  }
}

/**
 * Check if database is initialized
 */
export function isDatabaseInitialized(): boolean {
  return db !== null;
}
