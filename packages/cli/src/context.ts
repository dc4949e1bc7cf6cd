import type { CloudAIClient } from '@cloud-agents/core';
import { CliUsageError } from './args.js';

export interface CommandContext {
  client: CloudAIClient;
  agentId?: string;
  json: boolean;
}

export function requireAgent(ctx: CommandContext): string {
  if (!ctx.agentId) {
    throw new CliUsageError('No agent selected: pass --agent <id> or set CLOUD_AI_AGENT_ID');
  }
  return ctx.agentId;
}
