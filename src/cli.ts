/**
 * Command-line parsing
 */

import { PortSchema } from './config.js';

export interface CliArgs {
  command: 'serve' | 'help';
  port?: number;
}

function parsePort(value: string | undefined): number {
  const parsed = PortSchema.safeParse(value);
  if (value === undefined || value.trim() === '' || !parsed.success) {
    throw new Error(`Invalid port: ${value ?? '(missing)'}`);
  }
  return parsed.data;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { command: 'serve' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === 'serve' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      result.port = parsePort(argv[++i]);
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

export function printHelp(): void {
  console.log(`
SaaS API - auth, blog, contact and pricing endpoints

Usage: saas-api [command] [options]

Commands:
  serve     Start the HTTP server (default)
  help      Show this help message

Options:
  -p, --port <port>   Server port, 1-65535 (default: $PORT or 8000)
  -h, --help          Show help

Environment:
  PORT            Listen port (default: 8000)
  HOST            Listen address (default: 0.0.0.0)
  DATABASE_URL    SQLite database file; no database when unset
  DATABASE_NAME   Reported as set or unset by GET /test
`);
}
