import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/custom-errors.js';
import { loadConfig, readConfigFile } from './config-loader.js';
import { validateConfigSafe } from './config-schema.js';

describe('Config', () => {
  let dir: string;
  let configFile: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hh-config-'));
    configFile = join(dir, 'hh-downloader.yaml');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('Validation', () => {
    it('should report the failing path and code', () => {
      const result = validateConfigSafe({
        site: {},
        download: { outputDir: 'x', maxConcurrent: 0, fallbackPrefix: '', extension: '.mp3' },
        notifications: { consoleMinLevel: 'info' },
        logLevel: 'INFO',
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toContain('"download.maxConcurrent"');
        expect(result.error).toContain('[TOO_SMALL]');
      }
    });
  });

  describe('Loader', () => {
    it('should fall back to defaults when the default file is absent', async () => {
      const cwd = process.cwd();
      process.chdir(dir);
      try {
        const config = await loadConfig({ env: {} });
        expect(config.download.outputDir).toBe('dan_carlin_episodes');
        expect(config.download.maxConcurrent).toBe(3);
        expect(config.site.baseUrl).toBe('https://www.dancarlin.com');
        expect(config.credentials).toBeUndefined();
      } finally {
        process.chdir(cwd);
      }
    });

    it('should throw if an explicit file is not found', async () => {
      await expect(loadConfig({ configPath: join(dir, 'missing.yaml') })).rejects.toThrow(
        'Configuration file not found',
      );
    });

    it('should merge the file over the defaults', async () => {
      await writeFile(
        configFile,
        `
site:
  baseUrl: https://shop.example.com
  selectors:
    downloadsTable: table.downloads
download:
  outputDir: ./episodes
  maxConcurrent: 2
`,
      );

      const config = await loadConfig({ configPath: configFile, env: {} });
      expect(config.site.baseUrl).toBe('https://shop.example.com');
      expect(config.site.loginPath).toBe('/wp-login.php');
      expect(config.site.selectors.downloadsTable).toBe('table.downloads');
      expect(config.site.selectors.titleCell).toBe('td.download-product');
      expect(config.download.outputDir).toBe('./episodes');
      expect(config.download.maxConcurrent).toBe(2);
      expect(config.download.extension).toBe('.mp3');
    });

    it('should let CLI overrides win over the file', async () => {
      await writeFile(configFile, 'download:\n  maxConcurrent: 2\n  outputDir: ./from-file\n');

      const config = await loadConfig({
        configPath: configFile,
        overrides: { maxConcurrent: 6, outputDir: undefined },
        env: {},
      });
      expect(config.download.maxConcurrent).toBe(6);
      expect(config.download.outputDir).toBe('./from-file');
    });

    it('should resolve environment variables in credentials', async () => {
      await writeFile(configFile, 'credentials:\n  username: "${HH_USERNAME}"\n  password: "${HH_PASSWORD}"\n');

      const config = await loadConfig({
        configPath: configFile,
        env: { HH_USERNAME: 'listener', HH_PASSWORD: 'test-secret' },
      });
      expect(config.credentials).toEqual({ username: 'listener', password: 'test-secret' });
    });

    it('should treat an empty file as no overrides', async () => {
      await writeFile(configFile, '');
      await expect(readConfigFile(configFile, {})).resolves.toEqual({});
    });

    it('should reject unknown top-level keys', async () => {
      await writeFile(configFile, 'downloads:\n  outputDir: x\n');
      await expect(readConfigFile(configFile, {})).rejects.toThrow(ConfigError);
    });

    it('should reject malformed YAML', async () => {
      await writeFile(configFile, 'download: [unclosed\n');
      await expect(readConfigFile(configFile, {})).rejects.toThrow('Failed to parse YAML');
    });

    it('should reject a non-mapping root', async () => {
      await writeFile(configFile, '- one\n- two\n');
      await expect(readConfigFile(configFile, {})).rejects.toThrow('Configuration root must be a mapping');
    });
  });
});
