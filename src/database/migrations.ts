import { Database } from 'sqlite';
import { withTransaction } from '../config/database';

/**
 * Database migration scripts for SQLite schema creation
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
  down: (db: Database) => Promise<void>;
}

const MIGRATION_HISTORY_VERSION = 1;

export const migrations: Migration[] = [
  {
    version: MIGRATION_HISTORY_VERSION,
    name: 'create_migration_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS migration_history (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL
        );
      `);
    },
    down: async () => {
      // Needed for tracking; never rolled back
    }
  },
  {
    version: 2,
    name: 'create_messages_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS messages (
          id TEXT PRIMARY KEY,
          subject TEXT NOT NULL,
          sender TEXT NOT NULL,
          recipients TEXT NOT NULL DEFAULT '[]', -- JSON array
          snippet TEXT,
          body TEXT,
          date TEXT,
          embedding TEXT -- JSON number array
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_messages_date ON messages(date);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS messages;');
    }
  },
  {
    version: 3,
    name: 'create_categories_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS categories (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT UNIQUE NOT NULL,
          description TEXT NOT NULL,
          embedding TEXT -- JSON number array
        );
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS categories;');
    }
  },
  {
    version: 4,
    name: 'create_message_categories_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS message_categories (
          message_id TEXT NOT NULL,
          category_id INTEGER NOT NULL,
          score REAL NOT NULL CHECK (score >= 0 AND score <= 1),
          explanation TEXT NOT NULL,
          classified_at TEXT NOT NULL,
          PRIMARY KEY (message_id, category_id),
          FOREIGN KEY (message_id) REFERENCES messages(id) ON DELETE CASCADE,
          FOREIGN KEY (category_id) REFERENCES categories(id) ON DELETE CASCADE
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_message_categories_category_id ON message_categories(category_id);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS message_categories;');
    }
  }
];

export async function runMigrations(db: Database): Promise<void> {
  console.log('🔄 Running database migrations...');

  // Ensure migration history table exists first
  const migrationHistoryMigration = migrations.find(m => m.version === MIGRATION_HISTORY_VERSION);
  if (migrationHistoryMigration) {
    await migrationHistoryMigration.up(db);
  }

  const currentVersion = await getCurrentVersion(db);

  const pending = migrations
    .filter(m => m.version > currentVersion)
    .sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    console.log(`🔄 Running migration ${migration.version}: ${migration.name}`);

    try {
      await db.exec('BEGIN TRANSACTION;');
      await migration.up(db);

      // Record migration in history
      await db.run(
        'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
        [migration.version, migration.name, new Date().toISOString()]
      );

      await db.exec('COMMIT;');
      console.log(`✅ Migration ${migration.version} completed successfully`);
    } catch (error) {
      await db.exec('ROLLBACK;');
      console.error(`❌ Migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  console.log('✅ All migrations completed successfully');
}

export async function rollbackMigration(db: Database, targetVersion: number): Promise<void> {
  console.log(`🔄 Rolling back to migration version ${targetVersion}...`);

  const currentVersion = await getCurrentVersion(db);

  if (targetVersion >= currentVersion) {
    console.log('No rollback needed - target version is current or higher');
    return;
  }

  const migrationsToRollback = migrations
    .filter(m => m.version > targetVersion && m.version <= currentVersion && m.version !== MIGRATION_HISTORY_VERSION)
    .sort((a, b) => b.version - a.version);

  for (const migration of migrationsToRollback) {
    console.log(`🔄 Rolling back migration ${migration.version}: ${migration.name}`);

    try {
      await db.exec('BEGIN TRANSACTION;');
      await migration.down(db);

      await db.run(
        'DELETE FROM migration_history WHERE version = ?',
        [migration.version]
      );

      await db.exec('COMMIT;');
      console.log(`✅ Migration ${migration.version} rolled back successfully`);
    } catch (error) {
      await db.exec('ROLLBACK;');
      console.error(`❌ Rollback of migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  console.log(`✅ Rollback to version ${targetVersion} completed successfully`);
}

/**
 * Remove all messages, categories and classification records, keeping the schema
 */
export async function clearData(db: Database): Promise<void> {
  try {
    await withTransaction(db, async (tx) => {
      await tx.exec('DELETE FROM message_categories;');
      await tx.exec('DELETE FROM messages;');
      await tx.exec('DELETE FROM categories;');
      await tx.exec("DELETE FROM sqlite_sequence WHERE name = 'categories';");
    });
  } catch (error) {
    console.error('❌ Failed to clear data:', error);
    throw error;
  }
}

async function getCurrentVersion(db: Database): Promise<number> {
  const row = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  return row?.version || 0;
}
