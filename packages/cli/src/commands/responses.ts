/**
 * Responses command - create, inspect, cancel and delete responses
 */

import type { CreateResponseRequest, Response } from '@cloud-agents/core';
import { CliUsageError, getOption, getOptions, hasFlag, positionals, requireArg } from '../args.js';
import { requireAgent, type CommandContext } from '../context.js';
import { formatTimestamp, info, output, success, type Row } from '../output.js';
import { formatUsage } from './agents.js';

const VALUE_OPTIONS = ['--instructions', '--model', '--previous', '--conversation', '--include'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Concatenate the `output_text` parts of a response's output items.
 */
export function outputText(response: Response): string {
  const items = response.extra.output;
  if (!Array.isArray(items)) {
    return '';
  }
  const parts: string[] = [];
  for (const item of items) {
    if (!isRecord(item) || !Array.isArray(item.content)) continue;
    for (const part of item.content) {
      if (isRecord(part) && part.type === 'output_text' && typeof part.text === 'string') {
        parts.push(part.text);
      }
    }
  }
  return parts.join('');
}

function responseRow(response: Response): Row {
  return {
    id: response.id,
    status: response.status,
    model: response.model,
    created: formatTimestamp(response.created_at),
    usage: response.usage ? formatUsage(response.usage) : null,
  };
}

function printResponse(response: Response, json: boolean): void {
  if (json) {
    output(response, null, { json: true });
    return;
  }
  output(responseRow(response), null, {});
  const text = outputText(response);
  if (text) {
    console.log('');
    console.log(text);
  }
}

export async function responsesCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const agentId = requireAgent(ctx);
  const subcommand = args[0] || 'help';
  const rest = args.slice(1);
  const [first] = positionals(rest, VALUE_OPTIONS);
  const { client } = ctx;

  switch (subcommand) {
    case 'create': {
      const input = requireArg(
        positionals(rest, VALUE_OPTIONS).join(' '),
        'responses create <input> [--instructions <text>] [--model <id>] [--previous <response-id>] [--conversation <id>] [--background]',
      );
      const request: CreateResponseRequest = { input };
      const instructions = getOption(rest, '--instructions');
      if (instructions !== undefined) request.instructions = instructions;
      const model = getOption(rest, '--model');
      if (model !== undefined) request.model = model;
      const previous = getOption(rest, '--previous');
      if (previous !== undefined) request.previous_response_id = previous;
      const conversation = getOption(rest, '--conversation');
      if (conversation !== undefined) request.conversation = conversation;
      if (hasFlag(rest, '--background')) request.background = true;

      const response = await client.createResponse(agentId, request);
      printResponse(response, ctx.json);
      break;
    }

    case 'get': {
      const id = requireArg(first, 'responses get <response-id> [--include <field>]...');
      const include = getOptions(rest, '--include');
      const response = await client.getResponse(agentId, id, include.length > 0 ? { include } : undefined);
      printResponse(response, ctx.json);
      break;
    }

    case 'cancel': {
      const id = requireArg(first, 'responses cancel <response-id>');
      const response = await client.cancelResponse(agentId, id);
      if (ctx.json) {
        output(response, null, { json: true });
      } else if (response.status === 'cancelled') {
        success(`Cancelled response ${response.id}`);
      } else {
        info(`Response ${response.id} is ${response.status}`);
      }
      break;
    }

    case 'delete': {
      const id = requireArg(first, 'responses delete <response-id>');
      await client.deleteResponse(agentId, id);
      if (ctx.json) {
        output({ id, deleted: true }, null, { json: true });
      } else {
        success(`Deleted response ${id}`);
      }
      break;
    }

    default:
      throw new CliUsageError('Usage: cloud-agents responses <create|get|cancel|delete> ...');
  }
}
