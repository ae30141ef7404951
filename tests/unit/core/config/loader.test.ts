/**
 * Tests for loading .testsmith/config.yaml.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  getDefaultConfig,
  getConfigPath,
  DEFAULT_CONFIG_PATH,
} from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `testsmith-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, '.testsmith'), { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('should return every section with defaults', () => {
      const config = getDefaultConfig();

      expect(config.validation.test_prefix).toBe('test_');
      expect(config.validation.naming.include_methods).toBe(false);
      expect(config.dependencies.resolver).toBe('static');
      expect(config.dependencies.modules).toEqual(['pytest']);
      expect(config.logging.level).toBe('info');
    });
  });

  describe('getConfigPath', () => {
    it('should resolve the default path under the project root', () => {
      expect(getConfigPath('/project')).toBe(join('/project', DEFAULT_CONFIG_PATH));
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no config file exists', async () => {
      const config = await loadConfig(testDir);

      expect(config).toEqual(getDefaultConfig());
    });

    it('should return defaults for an empty file', async () => {
      await writeFile(join(testDir, DEFAULT_CONFIG_PATH), '');

      const config = await loadConfig(testDir);

      expect(config).toEqual(getDefaultConfig());
    });

    it('should merge file values over defaults', async () => {
      await writeFile(
        join(testDir, DEFAULT_CONFIG_PATH),
        [
          'validation:',
          '  test_prefix: check_',
          '  naming:',
          '    include_methods: true',
          'dependencies:',
          '  modules: [pytest, requests]',
          'logging:',
          '  level: debug',
          '',
        ].join('\n')
      );

      const config = await loadConfig(testDir);

      expect(config.validation.test_prefix).toBe('check_');
      expect(config.validation.naming.include_methods).toBe(true);
      expect(config.validation.frameworks).toEqual(['pytest', 'unittest.mock', 'mock']);
      expect(config.dependencies.modules).toEqual(['pytest', 'requests']);
      expect(config.dependencies.stdlib).toBe(true);
      expect(config.logging.level).toBe('debug');
    });

    it('should load from a custom path', async () => {
      await writeFile(join(testDir, 'custom.yaml'), 'validation:\n  test_prefix: it_\n');

      const config = await loadConfig(testDir, 'custom.yaml');

      expect(config.validation.test_prefix).toBe('it_');
    });

    it('should throw ConfigError for invalid values', async () => {
      const file = join(testDir, DEFAULT_CONFIG_PATH);
      await writeFile(file, 'dependencies:\n  resolver: network\n');

      const load = loadConfig(testDir);

      await expect(load).rejects.toBeInstanceOf(ConfigError);
      await expect(loadConfig(testDir)).rejects.toMatchObject({
        code: ErrorCodes.CONFIG_LOAD_ERROR,
      });
      await expect(loadConfig(testDir)).rejects.toThrow(`Failed to load config from ${file}`);
    });

    it('should throw ConfigError for malformed YAML', async () => {
      const file = join(testDir, DEFAULT_CONFIG_PATH);
      await writeFile(file, 'validation: [unclosed\n');

      await expect(loadConfig(testDir)).rejects.toBeInstanceOf(ConfigError);
      await expect(loadConfig(testDir)).rejects.toThrow(
        `Failed to load config from ${file}: Malformed YAML in ${file}: `
      );
    });
  });
});
