/**
 * SQLite Database Infrastructure
 * Manages the database connection, schema migrations and lifecycle for the document store
 */

import Database, { type Database as DatabaseType, type Statement } from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';

// ============================================
// Types
// ============================================

export interface DatabaseConfig {
  /** Path to SQLite database file, or ':memory:' */
  path: string;
  /** Enable WAL mode for better concurrent access */
  walMode: boolean;
  /** Busy timeout in milliseconds */
  busyTimeout: number;
  /** Print applied migrations */
  verbose: boolean;
}

export interface MigrationInfo {
  version: number;
  appliedAt: number;
  description: string;
}

// ============================================
// Schema Migrations
// ============================================

interface Migration {
  version: number;
  description: string;
  up: string;
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Create documents table',
    up: `
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        collection TEXT NOT NULL,
        data TEXT NOT NULL CHECK(json_valid(data)),
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_documents_collection
        ON documents(collection);
    `,
  },
  {
    version: 2,
    description: 'Index user documents by email',
    up: `
      CREATE INDEX IF NOT EXISTS idx_documents_user_email
        ON documents(json_extract(data, '$.email'))
        WHERE collection = 'user';
    `,
  },
  {
    version: 3,
    description: 'Replace partial email index with a collection/email index',
    up: `
      DROP INDEX IF EXISTS idx_documents_user_email;

      CREATE INDEX IF NOT EXISTS idx_documents_collection_email
        ON documents(collection, json_extract(data, '$.email'));
    `,
  },
];

const IN_MEMORY = ':memory:';

// ============================================
// Database Manager
// ============================================

export class DatabaseManager {
  private db: DatabaseType | null = null;
  private config: DatabaseConfig;
  private preparedStatements = new Map<string, Statement>();

  constructor(config: Partial<DatabaseConfig> = {}) {
    this.config = {
      path: 'data/app.db',
      walMode: true,
      busyTimeout: 5000,
      verbose: true,
      ...config,
    };
  }

  /**
   * Initialize the database connection and run migrations
   */
  initialize(): void {
    if (this.db) {
      return; // Already initialized
    }

    if (this.config.path !== IN_MEMORY) {
      const dbDir = dirname(this.config.path);
      if (dbDir && !existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(this.config.path);

    if (this.config.walMode && this.config.path !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    if (this.config.busyTimeout) {
      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    }
    this.db.pragma('synchronous = NORMAL');

    this.runMigrations();
  }

  /**
   * Get the database connection
   */
  getDb(): DatabaseType {
    if (!this.db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Get or create a prepared statement
   */
  prepare(sql: string): Statement {
    let stmt = this.preparedStatements.get(sql);
    if (!stmt) {
      stmt = this.getDb().prepare(sql);
      this.preparedStatements.set(sql, stmt);
    }
    return stmt;
  }

  private runMigrations(): void {
    const db = this.getDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        applied_at INTEGER NOT NULL,
        description TEXT NOT NULL
      );
    `);

    const currentVersion = db.prepare(
      'SELECT COALESCE(MAX(version), 0) as version FROM schema_migrations'
    ).get() as { version: number };

    for (const migration of MIGRATIONS) {
      if (migration.version <= currentVersion.version) {
        continue;
      }

      db.transaction(() => {
        db.exec(migration.up);
        db.prepare(
          'INSERT INTO schema_migrations (version, applied_at, description) VALUES (?, ?, ?)'
        ).run(migration.version, Date.now(), migration.description);
      })();

      if (this.config.verbose) {
        console.log(`Migration ${migration.version}: ${migration.description}`);
      }
    }
  }

  /**
   * Get applied migrations
   */
  getMigrations(): MigrationInfo[] {
    const db = this.getDb();
    return db.prepare(
      'SELECT version, applied_at as appliedAt, description FROM schema_migrations ORDER BY version'
    ).all() as MigrationInfo[];
  }

  /**
   * Names of every collection holding at least one document, sorted
   */
  listCollectionNames(): string[] {
    const rows = this.prepare(
      'SELECT DISTINCT collection FROM documents ORDER BY collection'
    ).all() as Array<{ collection: string }>;
    return rows.map(r => r.collection);
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.preparedStatements.clear();

      if (this.config.walMode && this.config.path !== IN_MEMORY) {
        try {
          this.db.pragma('wal_checkpoint(TRUNCATE)');
        } catch (error) {
          console.warn('WAL checkpoint failed on close:', error);
        }
      }

      this.db.close();
      this.db = null;
    }
  }

  isInitialized(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.config.path;
  }
}

// ============================================
// Process Instance
// ============================================

let defaultInstance: DatabaseManager | null = null;

/**
 * Open the process-wide database. Returns the existing one if already open.
 */
export function initDatabase(config: Partial<DatabaseConfig> = {}): DatabaseManager {
  if (defaultInstance?.isInitialized()) {
    return defaultInstance;
  }

  defaultInstance = new DatabaseManager(config);
  defaultInstance.initialize();
  return defaultInstance;
}

/**
 * Close the process-wide database
 */
export function closeDatabase(): void {
  if (defaultInstance) {
    defaultInstance.close();
    defaultInstance = null;
  }
}
