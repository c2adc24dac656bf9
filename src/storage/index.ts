/**
 * Storage Module Exports
 */

export {
  DatabaseManager,
  initDatabase,
  closeDatabase,
  type DatabaseConfig,
  type MigrationInfo,
} from './sqlite.js';

export {
  SqliteDocumentStore,
  buildDocumentQuery,
  type DocumentStore,
  type DocumentQuery,
} from './document-store.js';
