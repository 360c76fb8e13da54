import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigError } from '@cross-poster/shared';
import {
  CONFIG_TEMPLATE,
  credentialsFor,
  describeConfig,
  getConfigPath,
  initConfig,
  loadConfig,
  type AppConfig,
} from '../src/config.js';

describe('getConfigPath', () => {
  it('should prefer CROSS_POSTER_CONFIG', () => {
    expect(getConfigPath({ CROSS_POSTER_CONFIG: '/etc/crosspost.json', XDG_CONFIG_HOME: '/xdg' })).toBe(
      '/etc/crosspost.json'
    );
  });

  it('should use XDG_CONFIG_HOME when set', () => {
    expect(getConfigPath({ XDG_CONFIG_HOME: '/xdg' })).toBe('/xdg/cross-poster/config.json');
  });

  it('should default to ~/.config', () => {
    expect(getConfigPath({})).toBe(path.join(os.homedir(), '.config', 'cross-poster', 'config.json'));
  });
});

describe('config file', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cross-poster-config-'));
    configPath = path.join(tempDir, 'nested', 'config.json');
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('initConfig', () => {
    it('should write the template readable by the owner only', async () => {
      const result = await initConfig(configPath);

      expect(result).toEqual({ success: true, data: { path: configPath, created: true } });
      expect(await fs.readJson(configPath)).toEqual(CONFIG_TEMPLATE);
      const { mode } = await fs.stat(configPath);
      expect(mode & 0o777).toBe(0o600);
    });

    it('should never overwrite an existing file', async () => {
      await fs.outputJson(configPath, { devto: { api_key: 'test-secret' } });

      const result = await initConfig(configPath);

      expect(result).toEqual({ success: true, data: { path: configPath, created: false } });
      expect(await fs.readJson(configPath)).toEqual({ devto: { api_key: 'test-secret' } });
    });
  });

  describe('loadConfig', () => {
    it('should work without a config file', async () => {
      const result = await loadConfig({ CROSS_POSTER_CONFIG: configPath });

      expect(result).toEqual({
        success: true,
        data: { path: configPath, exists: false, devto: { source: 'none' }, medium: { source: 'none' } },
      });
    });

    it('should let environment variables override file values', async () => {
      await fs.outputJson(configPath, {
        devto: { api_key: 'file-secret' },
        medium: { access_token: 'file-token' },
      });

      const result = await loadConfig({ CROSS_POSTER_CONFIG: configPath, DEVTO_API_KEY: 'env-secret' });

      expect(result).toEqual({
        success: true,
        data: {
          path: configPath,
          exists: true,
          devto: { value: 'env-secret', source: 'env' },
          medium: { value: 'file-token', source: 'file' },
        },
      });
    });

    it('should ignore empty environment variables', async () => {
      const result = await loadConfig({ CROSS_POSTER_CONFIG: configPath, MEDIUM_ACCESS_TOKEN: '  ' });

      expect(result.success && result.data.medium).toEqual({ source: 'none' });
    });

    it('should reject invalid JSON', async () => {
      await fs.outputFile(configPath, '{ not json');

      const result = await loadConfig({ CROSS_POSTER_CONFIG: configPath });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message.startsWith(`Cannot read config file "${configPath}": `)).toBe(true);
    });

    it('should reject a file with the wrong shape', async () => {
      await fs.outputJson(configPath, { devto: { api_key: 5 } });

      const result = await loadConfig({ CROSS_POSTER_CONFIG: configPath });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toBe(
        `Invalid config file "${configPath}": devto.api_key: Expected string, received number`
      );
    });
  });
});

describe('credentialsFor', () => {
  const config: AppConfig = {
    path: '/home/user/.config/cross-poster/config.json',
    exists: true,
    devto: { value: 'test-secret', source: 'file' },
    medium: { source: 'none' },
  };

  it('should build credentials for a configured platform', () => {
    expect(credentialsFor(config, 'devto')).toEqual({
      success: true,
      data: { platform: 'devto', apiKey: 'test-secret' },
    });
  });

  it('should explain how to configure a missing platform', () => {
    const result = credentialsFor(config, 'medium');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      'No Medium access_token configured. Set MEDIUM_ACCESS_TOKEN or add medium.access_token to ' +
        '/home/user/.config/cross-poster/config.json'
    );
  });
});

describe('describeConfig', () => {
  it('should mask secrets and flag placeholders', () => {
    const entries = describeConfig({
      path: '/tmp/config.json',
      exists: true,
      devto: { value: 'test-secret-abcd', source: 'env' },
      medium: { value: 'your_medium_access_token_here', source: 'file' },
    });

    expect(entries).toEqual([
      { platform: 'devto', field: 'api_key', source: 'env', value: '********abcd', placeholder: false },
      { platform: 'medium', field: 'access_token', source: 'file', value: '********here', placeholder: true },
    ]);
  });

  it('should fully mask short values', () => {
    const [devto, medium] = describeConfig({
      path: '/tmp/config.json',
      exists: true,
      devto: { value: 'short', source: 'file' },
      medium: { source: 'none' },
    });

    expect(devto.value).toBe('********');
    expect(medium.value).toBe('(not set)');
  });
});
