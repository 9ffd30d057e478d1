/**
 * Tests for shared CLI setup.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { applyLogLevel, exitWithError, loadCliConfig, resolveEntityFiles } from '../../../src/cli/project.js';
import { getDefaultConfig } from '../../../src/core/config/loader.js';
import { logger } from '../../../src/utils/logger.js';
import { CompileError } from '../../../src/utils/errors.js';

vi.mock('../../../src/utils/logger.js', async () => {
  const { createMockLogger } = await import('./commands/mock-logger.js');
  return { logger: createMockLogger() };
});

const mockLogger = vi.mocked(logger);
const configFile = fileURLToPath(new URL('../../fixtures/config/config.yaml', import.meta.url));

describe('applyLogLevel', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should let --quiet win over --verbose', () => {
    applyLogLevel(getDefaultConfig(), { quiet: true, verbose: true });

    expect(mockLogger.setLevel).toHaveBeenCalledWith('error');
  });

  it('should use --verbose over the config', () => {
    applyLogLevel(getDefaultConfig(), { verbose: true });

    expect(mockLogger.setLevel).toHaveBeenCalledWith('debug');
  });

  it('should fall back to the configured level', async () => {
    const config = await loadCliConfig({ config: configFile }, tmpdir());

    expect(config.schemas.app).toBe('core');
    expect(mockLogger.setLevel).toHaveBeenCalledWith('warn');
  });
});

describe('resolveEntityFiles', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'pgmutate-project-'));
    mkdirSync(join(root, 'entities'));
    writeFileSync(join(root, 'entities', 'post.yaml'), '');
    writeFileSync(join(root, 'entities', 'user.yml'), '');
    writeFileSync(join(root, 'entities', 'notes.txt'), '');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should expand globs to YAML files only', async () => {
    const files = await resolveEntityFiles(['entities/*'], root);

    expect(files).toEqual([join(root, 'entities', 'post.yaml'), join(root, 'entities', 'user.yml')]);
  });

  it('should resolve plain paths and drop duplicates', async () => {
    const files = await resolveEntityFiles(['entities/post.yaml', 'entities/*.yaml'], root);

    expect(files).toEqual([join(root, 'entities', 'post.yaml')]);
  });
});

describe('exitWithError', () => {
  it('should log the code and exit 1', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });

    expect(() => exitWithError(new CompileError('C005', 'Action has no steps'))).toThrow('process.exit(1)');
    expect(mockLogger.error).toHaveBeenCalledWith('C005: Action has no steps');
    exit.mockRestore();
  });
});
