import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

describe('.env loading', () => {
  let dir: string;
  const savedLogLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'notion-env-'));
    writeFileSync(join(dir, '.env'), 'LOG_LEVEL=error\n');
    process.env.DOTENV_CONFIG_PATH = join(dir, '.env');
    delete process.env.LOG_LEVEL;
    vi.resetModules();
  });

  afterEach(() => {
    delete process.env.DOTENV_CONFIG_PATH;
    if (savedLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLogLevel;
    }
    rmSync(dir, { recursive: true, force: true });
    vi.resetModules();
  });

  it('applies LOG_LEVEL from .env before the logger is created', async () => {
    const { logger } = await import('../../utils/logger.js');
    expect(logger.level).toBe('error');
  });

  it('applies .env when env.ts is the first module loaded', async () => {
    const { validateEnv, resetEnv } = await import('../env.js');
    const { logger } = await import('../../utils/logger.js');
    resetEnv();
    expect(validateEnv().LOG_LEVEL).toBe('error');
    expect(logger.level).toBe('error');
  });
});
