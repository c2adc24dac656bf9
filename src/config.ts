/**
 * Environment configuration
 */

import { z } from 'zod';

/** Unset and empty variables are treated the same */
const optionalString = z.preprocess(
  value => (value === '' ? undefined : value),
  z.string().optional()
);

/** TCP port, from the environment or the command line */
export const PortSchema = z.coerce.number().int().min(1).max(65535);

const EnvSchema = z.object({
  PORT: z.preprocess(
    value => (value === '' ? undefined : value),
    PortSchema.default(8000)
  ),
  HOST: optionalString.transform(value => value ?? '0.0.0.0'),
  DATABASE_URL: optionalString,
  DATABASE_NAME: optionalString,
});

export interface AppConfig {
  port: number;
  host: string;
  /** Raw DATABASE_URL; no database is opened when unset */
  databaseUrl?: string;
  /** Raw DATABASE_NAME; only its presence is reported */
  databaseName?: string;
  /** SQLite file resolved from DATABASE_URL */
  databasePath?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Strip a `file:` or `sqlite:` scheme (with or without `//`) from a database URL
 */
export function resolveDatabasePath(url: string): string {
  return url.replace(/^(?:file|sqlite):(?:\/\/)?/, '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { PORT, HOST, DATABASE_URL, DATABASE_NAME } = parsed.data;
  return {
    port: PORT,
    host: HOST,
    databaseUrl: DATABASE_URL,
    databaseName: DATABASE_NAME,
    databasePath: DATABASE_URL ? resolveDatabasePath(DATABASE_URL) : undefined,
  };
}
