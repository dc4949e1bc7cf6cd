/**
 * Tests for CLI configuration management
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile, writeFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  resolveSettings,
  saveConfig,
  setConfigValue,
  validateConfig,
} from '../config.js';

describe('config', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `cloud-agents-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getConfigPath', () => {
    it('should use HOME env var for config path', () => {
      const originalHome = process.env.HOME;
      try {
        process.env.HOME = '/home/test-user';
        expect(getConfigPath()).toBe('/home/test-user/.cloud-agents/config.json');
      } finally {
        process.env.HOME = originalHome;
      }
    });
  });

  describe('getDefaultConfig', () => {
    it('should point at the public service with the standard timeout', () => {
      expect(getDefaultConfig()).toEqual({ baseUrl: 'https://agent.timeweb.cloud', timeoutMs: 120_000 });
    });
  });

  describe('validateConfig', () => {
    it('should accept a complete config', () => {
      expect(validateConfig({ baseUrl: 'http://localhost:9000', token: 't', agentId: 'a', timeoutMs: 1000 })).toBe(true);
    });

    it('should reject bad field types', () => {
      expect(validateConfig(null)).toBe(false);
      expect(validateConfig({ baseUrl: '', timeoutMs: 1000 })).toBe(false);
      expect(validateConfig({ baseUrl: 'http://x', timeoutMs: 0 })).toBe(false);
      expect(validateConfig({ baseUrl: 'http://x', timeoutMs: 1000, token: 42 })).toBe(false);
      expect(validateConfig({ baseUrl: 'http://x', timeoutMs: 1000, agentId: ['a'] })).toBe(false);
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when the file does not exist', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      expect(await loadConfig(join(testDir, 'missing.json'))).toEqual(getDefaultConfig());
      expect(warn).not.toHaveBeenCalled();
    });

    it('should merge the file over defaults', async () => {
      const path = join(testDir, 'config.json');
      await writeFile(path, JSON.stringify({ token: 'test-token', agentId: 'agent-1' }));

      expect(await loadConfig(path)).toEqual({
        baseUrl: 'https://agent.timeweb.cloud',
        timeoutMs: 120_000,
        token: 'test-token',
        agentId: 'agent-1',
      });
    });

    it('should warn and fall back on an invalid shape', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const path = join(testDir, 'config.json');
      await writeFile(path, JSON.stringify({ timeoutMs: 'soon' }));

      expect(await loadConfig(path)).toEqual(getDefaultConfig());
      expect(warn).toHaveBeenCalledWith('Invalid configuration, using defaults');
    });

    it('should warn and fall back on malformed JSON', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const path = join(testDir, 'config.json');
      await writeFile(path, '{ not json');

      expect(await loadConfig(path)).toEqual(getDefaultConfig());
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe('Error loading configuration:');
    });
  });

  describe('saveConfig', () => {
    it('should write the file with owner-only permissions', async () => {
      const path = join(testDir, 'nested', 'config.json');
      await saveConfig({ baseUrl: 'http://localhost:9000', timeoutMs: 5000, token: 'test-token' }, path);

      expect(JSON.parse(await readFile(path, 'utf-8'))).toEqual({
        baseUrl: 'http://localhost:9000',
        timeoutMs: 5000,
        token: 'test-token',
      });
      expect((await stat(path)).mode & 0o777).toBe(0o600);
    });

    it('should round-trip through loadConfig', async () => {
      const path = join(testDir, 'config.json');
      const config = { baseUrl: 'http://localhost:9000', timeoutMs: 5000, agentId: 'agent-7' };
      await saveConfig(config, path);
      expect(await loadConfig(path)).toEqual(config);
    });
  });

  describe('resolveSettings', () => {
    const fileConfig = { baseUrl: 'http://file.test', timeoutMs: 1000, token: 'file-token', agentId: 'file-agent' };

    it('should let environment variables override the file', () => {
      expect(resolveSettings(fileConfig, {
        CLOUD_AI_BASE_URL: 'http://env.test',
        CLOUD_AI_API_TOKEN: 'env-token',
        CLOUD_AI_AGENT_ID: 'env-agent',
        CLOUD_AI_TIMEOUT_MS: '2500',
      })).toEqual({ baseUrl: 'http://env.test', timeoutMs: 2500, token: 'env-token', agentId: 'env-agent' });
    });

    it('should let flags override the environment', () => {
      const resolved = resolveSettings(
        fileConfig,
        { CLOUD_AI_API_TOKEN: 'env-token', CLOUD_AI_AGENT_ID: 'env-agent' },
        { token: 'flag-token', agentId: 'flag-agent' },
      );
      expect(resolved.token).toBe('flag-token');
      expect(resolved.agentId).toBe('flag-agent');
      expect(resolved.baseUrl).toBe('http://file.test');
    });

    it('should ignore a bad timeout variable with a warning', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      expect(resolveSettings(fileConfig, { CLOUD_AI_TIMEOUT_MS: '-5' }).timeoutMs).toBe(1000);
      expect(warn).toHaveBeenCalledWith("Ignoring CLOUD_AI_TIMEOUT_MS='-5': not a positive number");
    });

    it('should not modify its input', () => {
      resolveSettings(fileConfig, { CLOUD_AI_API_TOKEN: 'env-token' });
      expect(fileConfig.token).toBe('file-token');
    });
  });

  describe('setConfigValue', () => {
    it('should set string keys and parse the timeout', () => {
      const base = getDefaultConfig();
      expect(setConfigValue(base, 'agentId', 'agent-1').agentId).toBe('agent-1');
      expect(setConfigValue(base, 'timeoutMs', '3000').timeoutMs).toBe(3000);
    });

    it('should reject an invalid timeout or empty base URL', () => {
      expect(() => setConfigValue(getDefaultConfig(), 'timeoutMs', 'abc')).toThrow("timeoutMs must be a positive number, got 'abc'");
      expect(() => setConfigValue(getDefaultConfig(), 'baseUrl', '')).toThrow('baseUrl cannot be empty');
    });
  });
});
