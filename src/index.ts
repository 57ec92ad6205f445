import { Command } from 'commander';
import { syncCommand } from './commands/sync.js';
import { watchCommand } from './commands/watch.js';
import { typesCommand } from './commands/types.js';

export { normalize, normalizeOptionValue } from './core/name-normalizer.js';
export {
  buildOptions,
  createObjectTypeTable,
  createTypeMapper,
  createTypeTable,
  resolveObjectType,
} from './core/type-mapper.js';
export type { TypeMapper, TypeTable, ObjectTypeTable } from './core/type-mapper.js';
export { SchemaClient } from './core/schema-client.js';
export { buildPayload, reconcile, reconcileRow } from './core/reconciler.js';
export { Reporter } from './core/reporter.js';
export { createRunContext } from './core/run-context.js';
export type { RunContext, RunContextOptions } from './core/run-context.js';
export { parseCsvRows, parsePropertyCsv, readPropertyRequests } from './core/csv-reader.js';
export { createFetchTransport } from './utils/http.js';
export { createLogSink, formatSummary } from './utils/log-sink.js';
export { runPropertySync } from './commands/sync.js';
export * from './errors.js';
export type * from './types/property.js';
export type * from './types/crm.js';
export type * from './types/sync.js';

interface CliOptions {
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  logFile?: string;
}

const program = new Command();

program
  .name('propsync')
  .description('Create CRM custom properties from a CSV definition file')
  .version('0.1.0');

program
  .command('sync', { isDefault: true })
  .description('Create every property in the CSV that does not exist yet')
  .argument('[csv]', 'CSV file with Property Name, Property Type, Property Options, Object Type columns')
  .option('--dry-run', 'Check existence only; create nothing')
  .option('--quiet', 'Only print warnings and errors')
  .option('--verbose', 'Print debug output')
  .option('--log-file <path>', 'Log file (default: property_import.log)')
  .action(async (csv: string | undefined, opts: CliOptions) => {
    await syncCommand({ csv, ...opts });
  });

program
  .command('watch')
  .description('Re-run the sync whenever the CSV changes')
  .argument('[csv]', 'CSV file to watch')
  .option('--dry-run', 'Check existence only; create nothing')
  .option('--verbose', 'Print debug output')
  .option('--log-file <path>', 'Log file (default: property_import.log)')
  .option('--debounce <ms>', 'Debounce interval in ms (default: 1000)', (value: string) => parseInt(value, 10))
  .action(async (csv: string | undefined, opts: CliOptions & { debounce?: number }) => {
    await watchCommand({ csv, ...opts });
  });

program
  .command('types')
  .description('List the supported property and object types')
  .action(() => {
    typesCommand();
  });

export function main(): void {
  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
