import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import fs from 'fs';
import path from 'path';

let db: Database | null = null;

/**
 * Open a SQLite connection with foreign keys enabled.
 * ':memory:' skips directory creation.
 */
export async function openDatabase(filename: string): Promise<Database> {
  if (filename !== ':memory:') {
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const database = await open({
    filename,
    driver: sqlite3.Database
  });

  // Enable foreign keys so classification records cascade with their message/category
  await database.exec('PRAGMA foreign_keys = ON');

  return database;
}

/**
 * Get or create the shared database connection
 */
export async function getDatabase(databasePath: string): Promise<Database> {
  if (db) {
    return db;
  }

  db = await openDatabase(databasePath);
  return db;
}

/**
 * Close the shared database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.close();
    db = null;
  }
}

const writeQueues = new WeakMap<Database, Promise<unknown>>();

/**
 * Run `work` after every earlier write on this connection has settled.
 *
 * All statements share one connection, so a write issued while another
 * caller's transaction is open would join that transaction. Every write
 * goes through this queue.
 */
export function runExclusive<T>(database: Database, work: (db: Database) => Promise<T>): Promise<T> {
  const previous = writeQueues.get(database) ?? Promise.resolve();
  const run = (): Promise<T> => work(database);

  const next = previous.then(run, run);
  // Keep the queue alive after a failed write
  writeQueues.set(database, next.catch(() => undefined));
  return next;
}

/**
 * Run `work` inside BEGIN/COMMIT on the write queue, rolling back on failure.
 * `work` must write through the connection it is given, not through a repository.
 */
export function withTransaction<T>(database: Database, work: (db: Database) => Promise<T>): Promise<T> {
  return runExclusive(database, async (db) => {
    await db.exec('BEGIN IMMEDIATE TRANSACTION');
    try {
      const result = await work(db);
      await db.exec('COMMIT');
      return result;
    } catch (error) {
      await db.exec('ROLLBACK');
      throw error;
    }
  });
}
