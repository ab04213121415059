import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';

// Mock fs module
vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return {
    ...actual,
    existsSync: vi.fn(),
    readFileSync: vi.fn()
  };
});

import * as fs from 'fs';
import { ConfigLoader } from './loader';
import { ConfigError } from '@core/errors';

describe('ConfigLoader', () => {
  const testProjectPath = '/test/project';
  const globalConfigPath = '/home/tester/.config/recscope.json';
  const projectConfigPath = path.join(testProjectPath, 'recscope.config.json');

  let mockFiles: Record<string, string> = {};

  const createLoader = (environment: Record<string, string | undefined> = {}) =>
    new ConfigLoader(testProjectPath, { globalConfigPath, environment });

  beforeEach(() => {
    mockFiles = {};
    vi.clearAllMocks();

    vi.mocked(fs.existsSync).mockImplementation((filePath: fs.PathLike) => String(filePath) in mockFiles);
    vi.mocked(fs.readFileSync).mockImplementation(((filePath: fs.PathOrFileDescriptor) => {
      const key = String(filePath);
      if (key in mockFiles) {
        return mockFiles[key];
      }
      throw new Error(`File not found: ${key}`);
    }) as typeof fs.readFileSync);
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should load empty config when no files exist', () => {
    expect(createLoader().load()).toEqual({});
  });

  it('should resolve defaults for an empty config', () => {
    const resolved = createLoader().resolve();

    expect(resolved.macros.strict).toBe(false);
    expect(resolved.macros.bareNames).toBe(true);
    expect(resolved.macros.environmentSkipPatterns).toEqual(['*TOKEN*', '*SECRET*', '*PASSWORD*']);
    expect(resolved.loader.concurrency).toBe(4);
    expect(resolved.loader.requireDefinitions).toBe(false);
    expect(resolved.shell.standinDirectories).toEqual({});
  });

  it('should merge global and project configs', () => {
    mockFiles[globalConfigPath] = JSON.stringify({
      macros: { strict: true, environmentSkipPatterns: ['HOME'] },
      shell: { standinDirectories: { '/cds/group/': '/mnt/group/', '/reg/': '/mnt/reg/' } },
      links: { extraLinkFields: ['MYLNK'] }
    });
    mockFiles[projectConfigPath] = JSON.stringify({
      macros: { strict: false, environmentSkipPatterns: ['PATH'] },
      shell: { standinDirectories: { '/reg/': '/data/reg/' } },
      loader: { concurrency: 2, requireDefinitions: true },
      links: { extraLinkFields: ['OTHERLNK'] }
    });

    const config = createLoader().load();

    // Project overrides scalars
    expect(config.macros?.strict).toBe(false);
    // Arrays are merged
    expect(config.macros?.environmentSkipPatterns).toEqual(['HOME', 'PATH']);
    expect(config.links?.extraLinkFields).toEqual(['MYLNK', 'OTHERLNK']);
    // Maps are merged key by key
    expect(config.shell?.standinDirectories).toEqual({
      '/cds/group/': '/mnt/group/',
      '/reg/': '/data/reg/'
    });
    expect(config.loader?.concurrency).toBe(2);
    expect(createLoader().resolve().loader.requireDefinitions).toBe(true);
  });

  it('should prefer RECSCOPE_PARALLEL_LIMIT over configured concurrency', () => {
    mockFiles[projectConfigPath] = JSON.stringify({ loader: { concurrency: 2 } });

    expect(createLoader({ RECSCOPE_PARALLEL_LIMIT: '8' }).resolve().loader.concurrency).toBe(8);
    expect(createLoader({ RECSCOPE_PARALLEL_LIMIT: 'zero' }).resolve().loader.concurrency).toBe(2);
  });

  it('should reject configs that do not match the schema', () => {
    mockFiles[projectConfigPath] = JSON.stringify({ loader: { concurrency: 0 } });

    expect(() => createLoader().load()).toThrow(ConfigError);
  });

  it('should reject malformed JSON', () => {
    mockFiles[projectConfigPath] = '{ "macros": ';

    expect(() => createLoader().load()).toThrow(/Failed to read config/);
  });

  it('should cache the loaded config', () => {
    mockFiles[projectConfigPath] = JSON.stringify({ loader: { concurrency: 3 } });
    const loader = createLoader();

    expect(loader.load()).toBe(loader.load());
    expect(fs.readFileSync).toHaveBeenCalledTimes(1);
  });
});
