/**
 * Config command - show and edit ~/.cloud-agents/config.json
 */

import { CliUsageError, positionals } from '../args.js';
import { CONFIG_KEYS, isConfigKey, loadConfig, saveConfig, setConfigValue, type CliConfig } from '../config.js';
import { output, success } from '../output.js';

export interface ConfigCommandOptions {
  configPath: string;
  /** Settings after env and flag overrides */
  effective: CliConfig;
  json: boolean;
}

function maskToken(token: string | undefined): string | null {
  if (!token) return null;
  return token.length <= 8 ? '****' : `${token.slice(0, 4)}…${token.slice(-4)}`;
}

export async function configCommand(options: ConfigCommandOptions, args: string[]): Promise<void> {
  const subcommand = args[0] || 'show';
  const [key, value] = positionals(args.slice(1));

  switch (subcommand) {
    case 'show': {
      const shown = { ...options.effective, token: maskToken(options.effective.token) };
      output(shown, null, { json: options.json });
      break;
    }

    case 'path':
      console.log(options.configPath);
      break;

    case 'set': {
      if (key === undefined || value === undefined) {
        throw new CliUsageError(`Usage: cloud-agents config set <${CONFIG_KEYS.join('|')}> <value>`);
      }
      if (!isConfigKey(key)) {
        throw new CliUsageError(`Unknown config key '${key}', expected one of ${CONFIG_KEYS.join(', ')}`);
      }
      const current = await loadConfig(options.configPath);
      await saveConfig(setConfigValue(current, key, value), options.configPath);
      success(`Set ${key} in ${options.configPath}`);
      break;
    }

    default:
      throw new CliUsageError('Usage: cloud-agents config <show|path|set> ...');
  }
}
