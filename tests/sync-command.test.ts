import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runPropertySync } from '../src/commands/sync.js';
import { CsvFormatError } from '../src/errors.js';
import { createLogger } from '../src/utils/logger.js';
import { FakeCrm } from './fake-crm.js';

const HEADER = 'Property Name,Property Type,Property Options,Object Type';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'propsync-sync-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

async function writeCsv(lines: string[]): Promise<string> {
  const file = join(tempDir, 'properties.csv');
  await writeFile(file, [HEADER, ...lines].join('\n') + '\n', 'utf-8');
  return file;
}

describe('runPropertySync', () => {
  it('should create a property from a one-row CSV', async () => {
    const csvPath = await writeCsv(['VIP Status,Single Checkbox,,Contact']);
    const crm = new FakeCrm({ groups: { contacts: ['api_imported_properties'] } });
    const logger = createLogger({ file: join(tempDir, 'import.log'), quiet: true });

    const summary = await runPropertySync({ csvPath, transport: crm.transport, logger });

    expect(summary).toEqual({ created: ['VIP Status'], skipped: [], errors: [], dryRun: false });
    expect(crm.posts('/contacts')).toEqual([
      {
        name: 'vip_status',
        label: 'VIP Status',
        groupName: 'api_imported_properties',
        type: 'bool',
        fieldType: 'booleancheckbox',
      },
    ]);
  });

  it('should write decisions and the summary to the log file', async () => {
    const csvPath = await writeCsv(['VIP Status,Single Checkbox,,Contact', 'Mystery,Hologram,,Contact']);
    const logFile = join(tempDir, 'import.log');
    const crm = new FakeCrm({ groups: { contacts: ['api_imported_properties'] } });

    await runPropertySync({ csvPath, transport: crm.transport, logger: createLogger({ file: logFile, quiet: true }) });

    const lines = (await readFile(logFile, 'utf-8')).trimEnd().split('\n');
    expect(lines.some(l => l.endsWith(" - ERROR - Unknown property type 'Hologram' for property 'Mystery'. Skipping."))).toBe(true);
    expect(lines.at(-3)).toMatch(/ - INFO - Properties Created: \['VIP Status'\]$/);
    expect(lines.at(-1)).toMatch(/ - INFO - Properties with Errors: \['Mystery'\]$/);
  });

  it('should reject a CSV with missing columns before calling the API', async () => {
    const csvPath = join(tempDir, 'bad.csv');
    await writeFile(csvPath, 'Property Name,Property Type\nVIP Status,Single Checkbox\n', 'utf-8');
    const crm = new FakeCrm();

    await expect(
      runPropertySync({ csvPath, transport: crm.transport, logger: createLogger({ quiet: true }) }),
    ).rejects.toBeInstanceOf(CsvFormatError);
    expect(crm.requests).toHaveLength(0);
  });
});
