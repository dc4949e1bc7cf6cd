/**
 * cloud-agents CLI
 *
 * Command-line interface for cloud AI agents: chat, conversations and
 * responses against one agent access ID.
 */

import { CloudAIClient, isCloudAIError, type Transport } from '@cloud-agents/core';
import { CliUsageError } from './args.js';
import { getConfigPath, loadConfig, resolveSettings } from './config.js';
import type { CommandContext } from './context.js';
import { callCommand, chatCommand, completeCommand, embedCommand, modelsCommand } from './commands/agents.js';
import { configCommand } from './commands/config.js';
import { conversationsCommand } from './commands/conversations.js';
import { responsesCommand } from './commands/responses.js';
import { error, info } from './output.js';

export interface GlobalOptions {
  baseUrl?: string;
  token?: string;
  agentId?: string;
  json: boolean;
  debug: boolean;
}

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  /** Replaces the fetch transport */
  transport?: Transport;
}

const GLOBAL_VALUE_OPTIONS: Record<string, 'baseUrl' | 'token' | 'agentId'> = {
  '--base-url': 'baseUrl',
  '--token': 'token',
  '-t': 'token',
  '--agent': 'agentId',
  '-a': 'agentId',
};

/**
 * Pull global options out of argv; everything else is passed to the command.
 */
export function parseGlobalOptions(args: string[]): { options: GlobalOptions; args: string[] } {
  const options: GlobalOptions = { json: false, debug: false };
  const remaining: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const key = Object.hasOwn(GLOBAL_VALUE_OPTIONS, arg) ? GLOBAL_VALUE_OPTIONS[arg] : undefined;

    if (key !== undefined) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new CliUsageError(`${arg} requires a value`);
      }
      options[key] = value;
      i++;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--debug') {
      options.debug = true;
    } else {
      remaining.push(arg);
    }
  }

  return { options, args: remaining };
}

export function helpText(): string {
  return `
cloud-agents - Cloud AI agent client

Usage:
  cloud-agents [global options] <command> [subcommand] [options]

Global Options:
  --base-url <url>      Service base URL (default https://agent.timeweb.cloud)
  --token, -t <token>   API bearer token
  --agent, -a <id>      Agent access ID
  --json                Output in JSON format
  --debug               Log each HTTP request

  Defaults are read from ~/.cloud-agents/config.json

Commands:
  chat <message>        Chat completion
    [--system <text>]   System prompt
    [--image <url>]     Attach an image (repeatable)
    [--model <id>] [--max-tokens <n>]
  call <message>        Simple agent call
    [--parent <id>]     Continue from a previous message
  complete <prompt>     Legacy text completion
  models                List models available to the agent
  embed                 Print the widget embed script
    --referer <url> [--origin <origin>] [--collapsed]

  conversations         Manage conversations
    create [--message <text>] [--meta key=value]...
    get <id>
    update <id> --meta key=value...
    delete <id>
    items <id> [--limit <n>] [--order asc|desc] [--after <item-id>] [--all]
    add-item <id> <text> [--role user|assistant|system|developer]
    get-item <id> <item-id>
    delete-item <id> <item-id>

  responses             Manage responses
    create <input> [--instructions <text>] [--model <id>] [--background]
    get <id>
    cancel <id>
    delete <id>

  config                Configuration management
    show                Show effective settings
    path                Print the config file path
    set <key> <value>   Set baseUrl, token, agentId or timeoutMs

Environment:
  CLOUD_AI_API_TOKEN    API bearer token
  CLOUD_AI_BASE_URL     Service base URL
  CLOUD_AI_AGENT_ID     Agent access ID
  CLOUD_AI_TIMEOUT_MS   Request timeout in milliseconds

Examples:
  cloud-agents -a agent-123 chat "Hello"
  cloud-agents -a agent-123 conversations items conv_1 --all --json
  cloud-agents -a agent-123 responses create "Summarise this" --background
`;
}

function reportError(err: unknown): void {
  if (isCloudAIError(err)) {
    error(`${err.kind}: ${err.message}`);
    if (err.kind === 'configuration_error') {
      info('Set CLOUD_AI_API_TOKEN, pass --token, or run "cloud-agents config set token <token>"');
    }
    return;
  }
  error(err instanceof Error ? err.message : String(err));
}

/**
 * Run one CLI invocation and return the process exit code.
 */
export async function run(argv: string[], runOptions: RunOptions = {}): Promise<number> {
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === 'help') {
    console.log(helpText());
    return 0;
  }

  try {
    const { options, args } = parseGlobalOptions(argv);
    if (args.length === 0) {
      console.log(helpText());
      return 0;
    }

    const configPath = runOptions.configPath ?? getConfigPath();
    const settings = resolveSettings(await loadConfig(configPath), runOptions.env ?? process.env, options);
    const command = args[0];
    const subArgs = args.slice(1);

    if (command === 'help') {
      console.log(helpText());
      return 0;
    }
    if (command === 'config') {
      await configCommand({ configPath, effective: settings, json: options.json }, subArgs);
      return 0;
    }

    const client = CloudAIClient.create({
      token: settings.token,
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs,
      debug: options.debug,
      transport: runOptions.transport,
    });
    const ctx: CommandContext = { client, agentId: settings.agentId, json: options.json };

    switch (command) {
      case 'chat':
        await chatCommand(ctx, subArgs);
        break;
      case 'call':
        await callCommand(ctx, subArgs);
        break;
      case 'complete':
        await completeCommand(ctx, subArgs);
        break;
      case 'models':
        await modelsCommand(ctx);
        break;
      case 'embed':
        await embedCommand(ctx, subArgs);
        break;
      case 'conversations':
        await conversationsCommand(ctx, subArgs);
        break;
      case 'responses':
        await responsesCommand(ctx, subArgs);
        break;
      default:
        error(`Unknown command: ${command}`);
        console.log('Run "cloud-agents --help" for usage information.');
        return 1;
    }
    return 0;
  } catch (err) {
    reportError(err);
    return 1;
  }
}
