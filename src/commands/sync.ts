import { reconcile } from '../core/reconciler.js';
import { readPropertyRequests } from '../core/csv-reader.js';
import { createRunContext } from '../core/run-context.js';
import { errorMessage } from '../errors.js';
import type { HttpTransport } from '../types/crm.js';
import type { RunSummary } from '../types/sync.js';
import { loadConfig, loadEnvFile } from '../utils/config.js';
import { createFetchTransport } from '../utils/http.js';
import { createLogSink } from '../utils/log-sink.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { getDefaultCsvPath, getEnvFilePath, getLogFilePath, resolveFromCwd } from '../utils/paths.js';
import type { RetryOptions } from '../utils/retry.js';

export interface SyncCommandOptions {
  csv?: string;
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  logFile?: string;
}

export interface PropertySyncOptions {
  csvPath: string;
  transport: HttpTransport;
  logger: Logger;
  dryRun?: boolean;
  retry?: RetryOptions;
}

/**
 * Read the CSV and reconcile it against the CRM in one pass.
 * Throws only for unreadable or malformed input.
 */
export async function runPropertySync(options: PropertySyncOptions): Promise<RunSummary> {
  const requests = await readPropertyRequests(options.csvPath);
  const ctx = createRunContext({
    transport: options.transport,
    emit: createLogSink(options.logger),
    dryRun: options.dryRun,
    retry: { onRetry: options.logger.warn, ...options.retry },
  });
  return reconcile(ctx, requests, options.csvPath);
}

/**
 * Build the logger and HTTP transport for a CLI run. Exits when the
 * access token is missing.
 */
export function prepareRun(options: SyncCommandOptions): { logger: Logger; transport: HttpTransport; csvPath: string } {
  const logger = createLogger({
    file: getLogFilePath(options.logFile),
    quiet: options.quiet,
    verbose: options.verbose,
  });

  let accessToken: string;
  try {
    loadEnvFile(getEnvFilePath());
    accessToken = loadConfig().accessToken;
  } catch (err) {
    logger.error(`${errorMessage(err)} Exiting.`);
    process.exit(1);
  }

  const csvPath = options.csv ? resolveFromCwd(options.csv) : getDefaultCsvPath();
  return { logger, transport: createFetchTransport({ accessToken }), csvPath };
}

export async function syncCommand(options: SyncCommandOptions): Promise<void> {
  const { logger, transport, csvPath } = prepareRun(options);
  if (options.dryRun) {
    logger.info('Dry run mode - no changes will be made.');
  }

  try {
    const summary = await runPropertySync({ csvPath, transport, logger, dryRun: options.dryRun });
    if (summary.errors.length > 0) {
      process.exitCode = 1;
    }
  } catch (err) {
    logger.error(`Sync failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
