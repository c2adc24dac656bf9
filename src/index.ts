#!/usr/bin/env node
/**
 * SaaS API - Main Entry Point
 * Provides CLI for starting the HTTP server
 */

import { parseArgs, printHelp } from './cli.js';
import { loadConfig, type AppConfig } from './config.js';
import { ApiServer } from './server/index.js';
import { initDatabase, closeDatabase, SqliteDocumentStore, type DocumentStore } from './storage/index.js';

// ============================================
// Commands
// ============================================

/**
 * A database that fails to open leaves the server running without one
 */
function openStore(config: AppConfig): DocumentStore | null {
  if (!config.databasePath) {
    console.log('DATABASE_URL not set, running without a database');
    return null;
  }

  try {
    console.log(`Opening database ${config.databasePath}...`);
    const db = initDatabase({ path: config.databasePath });
    return new SqliteDocumentStore(db);
  } catch (error) {
    console.error('Database unavailable:', error instanceof Error ? error.message : error);
    return null;
  }
}

async function runServe(config: AppConfig): Promise<void> {
  console.log('Starting SaaS API...');

  const store = openStore(config);
  const server = new ApiServer({ store }, {
    port: config.port,
    host: config.host,
    databaseUrl: config.databaseUrl,
    databaseName: config.databaseName,
  });

  const shutdown = (signal: string): void => {
    console.log(`Received ${signal}, shutting down...`);
    server.stop()
      .then(() => {
        closeDatabase();
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'help':
      printHelp();
      break;

    case 'serve': {
      const config = loadConfig();
      await runServe(args.port !== undefined ? { ...config, port: args.port } : config);
      break;
    }
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  closeDatabase();
  process.exit(1);
});
