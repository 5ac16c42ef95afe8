import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';

describe('logger', () => {
  const savedLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    vi.unstubAllEnvs();
    if (savedLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLevel;
    }
  });

  it('takes its level from the .env file loaded by the entry point', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'dotenv-'));
    const envFile = join(dir, '.env');
    writeFileSync(envFile, 'LOG_LEVEL=error\n');
    vi.stubEnv('DOTENV_CONFIG_PATH', envFile);
    delete process.env.LOG_LEVEL;

    await import('../src/index.js');
    const { logger } = await import('../src/utils/logger.js');

    expect(logger.level).toBe('error');
  });
});
