/**
 * Document Store
 * Schemaless JSON documents grouped into named collections, persisted in SQLite
 */

import { v4 as uuidv4 } from 'uuid';
import type { DatabaseManager } from './sqlite.js';
import type { DocumentFilter, FilterValue, StoredDocument } from '../types/index.js';

// ============================================
// Interface
// ============================================

/**
 * Handle to the persistence layer, shared by every request
 */
export interface DocumentStore {
  /**
   * Insert a record and return its generated id.
   * `created_at` and `updated_at` are added to the stored document.
   */
  createDocument(collection: string, record: Record<string, unknown>): string;

  /**
   * Documents in insertion order whose top-level fields equal every filter value.
   * A missing or non-positive limit returns all matches.
   */
  getDocuments(collection: string, filter?: DocumentFilter, limit?: number): StoredDocument[];

  listCollectionNames(): string[];
}

// ============================================
// SQLite Implementation
// ============================================

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface DocumentRow {
  id: string;
  data: string;
}

export interface DocumentQuery {
  sql: string;
  params: Array<string | number>;
}

/**
 * SELECT for getDocuments. JSON paths are inlined so SQLite can match them against
 * expression indexes; field names are restricted to plain identifiers for that reason.
 */
export function buildDocumentQuery(collection: string, filter: DocumentFilter = {}, limit?: number): DocumentQuery {
  const clauses = ['collection = ?'];
  const params: Array<string | number> = [collection];

  for (const [field, value] of Object.entries(filter)) {
    if (!FIELD_NAME.test(field)) {
      throw new Error(`Invalid filter field: ${field}`);
    }
    const path = `json_extract(data, '$.${field}')`;
    if (value === null) {
      clauses.push(`${path} IS NULL`);
    } else {
      clauses.push(`${path} = ?`);
      params.push(toSqlValue(value));
    }
  }

  params.push(limit !== undefined && limit > 0 ? limit : -1);

  return {
    sql: `SELECT id, data FROM documents WHERE ${clauses.join(' AND ')} ORDER BY rowid LIMIT ?`,
    params,
  };
}

export class SqliteDocumentStore implements DocumentStore {
  constructor(private readonly db: DatabaseManager) {}

  createDocument(collection: string, record: Record<string, unknown>): string {
    const id = uuidv4();
    const now = new Date().toISOString();
    const data = { ...record, created_at: now, updated_at: now };

    this.db.prepare(`
      INSERT INTO documents (id, collection, data, created_at)
      VALUES (?, ?, ?, ?)
    `).run(id, collection, JSON.stringify(data), now);

    return id;
  }

  getDocuments(collection: string, filter: DocumentFilter = {}, limit?: number): StoredDocument[] {
    const { sql, params } = buildDocumentQuery(collection, filter, limit);
    const rows = this.db.prepare(sql).all(...params) as DocumentRow[];

    return rows.map(toStoredDocument);
  }

  listCollectionNames(): string[] {
    return this.db.listCollectionNames();
  }
}

// ============================================
// Helpers
// ============================================

/** json_extract yields 1/0 for JSON booleans, and SQLite cannot bind booleans */
function toSqlValue(value: Exclude<FilterValue, null>): string | number {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

function toStoredDocument(row: DocumentRow): StoredDocument {
  const data: unknown = JSON.parse(row.data);
  const fields: Record<string, unknown> = typeof data === 'object' && data !== null && !Array.isArray(data)
    ? Object.fromEntries(Object.entries(data))
    : {};
  return { ...fields, _id: row.id };
}
