import chokidar from 'chokidar';
import { DEFAULT_DEBOUNCE_MS } from '../constants.js';
import { errorMessage } from '../errors.js';
import { prepareRun, runPropertySync, type SyncCommandOptions } from './sync.js';

export async function watchCommand(options: SyncCommandOptions & { debounce?: number }): Promise<void> {
  const { logger, transport, csvPath } = prepareRun(options);
  const debounceMs = options.debounce ?? DEFAULT_DEBOUNCE_MS;

  logger.info(`Watching for changes: ${csvPath}`);
  logger.info(`Debounce: ${debounceMs}ms`);
  logger.dim('Press Ctrl+C to stop.');

  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let isSyncing = false;

  // Each run builds a fresh context, so group checks are never reused.
  const runSync = async () => {
    if (isSyncing) return;
    isSyncing = true;
    try {
      const summary = await runPropertySync({ csvPath, transport, logger, dryRun: options.dryRun });
      logger.info(
        `Sync complete: ${summary.created.length} created, ${summary.skipped.length} skipped, ${summary.errors.length} error(s)`,
      );
    } catch (err) {
      logger.error(`Sync failed: ${errorMessage(err)}`);
    } finally {
      isSyncing = false;
    }
  };

  const debouncedSync = () => {
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    debounceTimer = setTimeout(() => {
      void runSync();
    }, debounceMs);
  };

  const watcher = chokidar.watch(csvPath, {
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: { stabilityThreshold: 200 },
  });

  watcher.on('add', debouncedSync);
  watcher.on('change', debouncedSync);

  const shutdown = async () => {
    logger.info('Shutting down watcher...');
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    await watcher.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  await runSync();
}
