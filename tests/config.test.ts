import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, loadEnvFile } from '../src/utils/config.js';
import { ConfigError } from '../src/errors.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'propsync-env-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('should read the access token from the environment', () => {
    expect(loadConfig({ HUBSPOT_ACCESS_TOKEN: 'test-token' })).toEqual({ accessToken: 'test-token' });
  });

  it('should trim the token', () => {
    expect(loadConfig({ HUBSPOT_ACCESS_TOKEN: '  test-token\n' }).accessToken).toBe('test-token');
  });

  it('should fail when the token is missing', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('HUBSPOT_ACCESS_TOKEN environment variable not set.');
  });

  it('should fail when the token is blank', () => {
    expect(() => loadConfig({ HUBSPOT_ACCESS_TOKEN: '   ' })).toThrow(ConfigError);
  });
});

describe('loadEnvFile', () => {
  it('should load variables from a dotenv file', async () => {
    const file = join(tempDir, '.env');
    await writeFile(file, '# token for local runs\nHUBSPOT_ACCESS_TOKEN=test-token\nOTHER="quoted value"\n', 'utf-8');
    const env: NodeJS.ProcessEnv = {};

    expect(loadEnvFile(file, env)).toBe(true);
    expect(env).toEqual({ HUBSPOT_ACCESS_TOKEN: 'test-token', OTHER: 'quoted value' });
    expect(loadConfig(env).accessToken).toBe('test-token');
  });

  it('should not override variables that are already set', async () => {
    const file = join(tempDir, '.env');
    await writeFile(file, 'HUBSPOT_ACCESS_TOKEN=from-file\n', 'utf-8');
    const env: NodeJS.ProcessEnv = { HUBSPOT_ACCESS_TOKEN: 'from-shell' };

    loadEnvFile(file, env);
    expect(env.HUBSPOT_ACCESS_TOKEN).toBe('from-shell');
  });

  it('should return false when the file does not exist', () => {
    const env: NodeJS.ProcessEnv = {};
    expect(loadEnvFile(join(tempDir, '.env'), env)).toBe(false);
    expect(env).toEqual({});
  });
});
