import { isAbsolute, join } from 'node:path';
import { DEFAULT_CSV_FILE, ENV_FILE, LOG_FILE } from '../constants.js';

export function resolveFromCwd(filePath: string): string {
  return isAbsolute(filePath) ? filePath : join(process.cwd(), filePath);
}

export function getDefaultCsvPath(): string {
  return resolveFromCwd(DEFAULT_CSV_FILE);
}

export function getLogFilePath(override?: string): string {
  return resolveFromCwd(override ?? LOG_FILE);
}

export function getEnvFilePath(): string {
  return resolveFromCwd(ENV_FILE);
}
