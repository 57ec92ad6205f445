import { existsSync, readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ACCESS_TOKEN_ENV } from '../constants.js';
import { ConfigError, errorMessage } from '../errors.js';

const envSchema = z.object({
  [ACCESS_TOKEN_ENV]: z.string().trim().min(1),
});

export interface SyncConfig {
  accessToken: string;
}

/**
 * Read runtime configuration from the environment. A missing token is
 * fatal and must be reported before any row is processed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`${ACCESS_TOKEN_ENV} environment variable not set.`);
  }
  return { accessToken: parsed.data[ACCESS_TOKEN_ENV] };
}

/**
 * Copy variables from a dotenv file into `env`. Variables already set win.
 * Returns false when the file does not exist.
 */
export function loadEnvFile(path: string, env: NodeJS.ProcessEnv = process.env): boolean {
  if (!existsSync(path)) {
    return false;
  }
  let parsed: Record<string, string>;
  try {
    parsed = dotenv.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read ${path}: ${errorMessage(err)}`, err instanceof Error ? err : undefined);
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return true;
}
