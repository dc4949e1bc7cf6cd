/**
 * CLI configuration management
 *
 * Settings live in ~/.cloud-agents/config.json. Environment variables override
 * the file and command-line flags override both.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, dirname } from 'node:path';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '@cloud-agents/core';

export interface CliConfig {
  baseUrl: string;
  token?: string;
  /** Agent access ID used when --agent is not given */
  agentId?: string;
  timeoutMs: number;
}

/** Config keys settable through `config set` */
export const CONFIG_KEYS = ['baseUrl', 'token', 'agentId', 'timeoutMs'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

export interface SettingOverrides {
  baseUrl?: string;
  token?: string;
  agentId?: string;
}

export function getConfigPath(): string {
  return join(homedir(), '.cloud-agents', 'config.json');
}

export function getDefaultConfig(): CliConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): config is CliConfig {
  if (!isRecord(config)) {
    return false;
  }
  if (typeof config.baseUrl !== 'string' || config.baseUrl.length === 0) {
    return false;
  }
  if (typeof config.timeoutMs !== 'number' || !Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    return false;
  }
  if (config.token !== undefined && typeof config.token !== 'string') {
    return false;
  }
  if (config.agentId !== undefined && typeof config.agentId !== 'string') {
    return false;
  }
  return true;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Load configuration from file, falling back to defaults
 */
export async function loadConfig(configPath?: string): Promise<CliConfig> {
  const path = configPath ?? getConfigPath();
  const defaults = getDefaultConfig();

  try {
    const content = await readFile(path, 'utf-8');
    const loaded: unknown = JSON.parse(content);
    if (!isRecord(loaded)) {
      console.warn('Invalid configuration, using defaults');
      return defaults;
    }

    const merged: unknown = { ...defaults, ...loaded };
    if (!validateConfig(merged)) {
      console.warn('Invalid configuration, using defaults');
      return defaults;
    }
    return merged;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return defaults;
    }
    console.warn('Error loading configuration:', error);
    return defaults;
  }
}

export async function saveConfig(config: CliConfig, configPath?: string): Promise<void> {
  const path = configPath ?? getConfigPath();
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
}

/**
 * Apply CLOUD_AI_* environment variables, then explicit overrides.
 */
export function resolveSettings(
  config: CliConfig,
  env: NodeJS.ProcessEnv,
  overrides: SettingOverrides = {},
): CliConfig {
  const resolved: CliConfig = { ...config };

  if (env.CLOUD_AI_BASE_URL) resolved.baseUrl = env.CLOUD_AI_BASE_URL;
  if (env.CLOUD_AI_API_TOKEN) resolved.token = env.CLOUD_AI_API_TOKEN;
  if (env.CLOUD_AI_AGENT_ID) resolved.agentId = env.CLOUD_AI_AGENT_ID;
  if (env.CLOUD_AI_TIMEOUT_MS) {
    const timeoutMs = Number(env.CLOUD_AI_TIMEOUT_MS);
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      resolved.timeoutMs = timeoutMs;
    } else {
      console.warn(`Ignoring CLOUD_AI_TIMEOUT_MS='${env.CLOUD_AI_TIMEOUT_MS}': not a positive number`);
    }
  }

  if (overrides.baseUrl !== undefined) resolved.baseUrl = overrides.baseUrl;
  if (overrides.token !== undefined) resolved.token = overrides.token;
  if (overrides.agentId !== undefined) resolved.agentId = overrides.agentId;

  return resolved;
}

export function isConfigKey(value: string): value is ConfigKey {
  return CONFIG_KEYS.some((key) => key === value);
}

/**
 * Return a copy of `config` with one key changed. Throws on a value the key
 * cannot hold.
 */
export function setConfigValue(config: CliConfig, key: ConfigKey, value: string): CliConfig {
  switch (key) {
    case 'timeoutMs': {
      const timeoutMs = Number(value);
      if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        throw new Error(`timeoutMs must be a positive number, got '${value}'`);
      }
      return { ...config, timeoutMs };
    }
    case 'baseUrl':
      if (value.length === 0) {
        throw new Error('baseUrl cannot be empty');
      }
      return { ...config, baseUrl: value };
    case 'token':
      return { ...config, token: value };
    case 'agentId':
      return { ...config, agentId: value };
  }
}
