export { run, parseGlobalOptions, helpText, type GlobalOptions, type RunOptions } from './cli.js';
export {
  getConfigPath,
  getDefaultConfig,
  validateConfig,
  loadConfig,
  saveConfig,
  resolveSettings,
  type CliConfig,
} from './config.js';
