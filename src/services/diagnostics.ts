/**
 * Diagnostics
 * Read-only report of backend and database status, used for smoke-testing a deployment
 */

import type { DocumentStore } from '../storage/document-store.js';
import type { DiagnosticReport } from '../types/index.js';

export const MAX_REPORTED_COLLECTIONS = 10;

const ERROR_EXCERPT_LENGTH = 50;

export interface DiagnosticSettings {
  /** Raw DATABASE_URL, only checked for presence */
  databaseUrl?: string;
  /** Raw DATABASE_NAME, only checked for presence */
  databaseName?: string;
}

export function runDiagnostics(store: DocumentStore | null, settings: DiagnosticSettings): DiagnosticReport {
  const report: DiagnosticReport = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: null,
    database_name: null,
    connection_status: 'Not Connected',
    collections: [],
  };

  if (store) {
    report.database = '✅ Available';
    report.connection_status = 'Connected';
    try {
      report.collections = store.listCollectionNames().slice(0, MAX_REPORTED_COLLECTIONS);
      report.database = '✅ Connected & Working';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      report.database = `⚠️  Connected but Error: ${message.slice(0, ERROR_EXCERPT_LENGTH)}`;
    }
  } else {
    report.database = '⚠️  Available but not initialized';
  }

  report.database_url = settings.databaseUrl ? '✅ Set' : '❌ Not Set';
  report.database_name = settings.databaseName ? '✅ Set' : '❌ Not Set';

  return report;
}
