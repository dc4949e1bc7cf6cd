/**
 * Agent commands: chat, call, complete, models, embed
 */

import {
  ChatMessage,
  imageUrlContent,
  textContent,
  type ChatCompletionRequest,
  type ChatContent,
  type Usage,
} from '@cloud-agents/core';
import { getNumberOption, getOption, getOptions, hasFlag, positionals, requireArg, CliUsageError } from '../args.js';
import { requireAgent, type CommandContext } from '../context.js';
import { formatTable, formatTimestamp, info, output } from '../output.js';

const modelColumns = [
  { header: 'ID', key: 'id' },
  { header: 'Owner', key: 'owned_by' },
  { header: 'Created', key: 'created' },
];

export function formatUsage(usage: Usage): string {
  return `${usage.prompt_tokens} prompt + ${usage.completion_tokens} completion = ${usage.total_tokens} tokens`;
}

/**
 * Printable text of an assistant reply; array content joins its text items.
 */
export function replyText(content: ChatContent | null): string | null {
  if (content === null || typeof content === 'string') {
    return content;
  }
  return content.map((item) => (item.type === 'text' ? item.text : '')).join('');
}

export async function chatCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const agentId = requireAgent(ctx);
  const message = requireArg(
    positionals(args, ['--system', '--image', '--model', '--max-tokens']).join(' '),
    'chat <message> [--system <text>] [--image <url>]... [--model <id>] [--max-tokens <n>]',
  );

  const messages: ChatMessage[] = [];
  const system = getOption(args, '--system');
  if (system !== undefined) {
    messages.push(ChatMessage.system(system));
  }
  const images = getOptions(args, '--image');
  messages.push(images.length > 0
    ? ChatMessage.userMultimodal([textContent(message), ...images.map((url) => imageUrlContent(url))])
    : ChatMessage.user(message));

  const request: ChatCompletionRequest = { messages };
  const model = getOption(args, '--model');
  if (model !== undefined) request.model = model;
  const maxTokens = getNumberOption(args, '--max-tokens');
  if (maxTokens !== undefined) request.max_completion_tokens = maxTokens;

  const completion = await ctx.client.chatCompletions(agentId, request);
  if (ctx.json) {
    output(completion, null, { json: true });
    return;
  }

  const choice = completion.choices[0];
  const text = choice ? replyText(choice.message.content) : null;
  console.log(text ?? choice?.message.refusal ?? '(no content)');
  if (completion.usage) {
    info(formatUsage(completion.usage));
  }
}

export async function callCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const agentId = requireAgent(ctx);
  const message = requireArg(positionals(args, ['--parent']).join(' '), 'call <message> [--parent <message-id>]');
  const parent = getOption(args, '--parent');

  const reply = await ctx.client.callAgent(agentId, parent === undefined ? { message } : { message, parent_message_id: parent });
  if (ctx.json) {
    output(reply, null, { json: true });
    return;
  }
  console.log(reply.message);
  if (reply.response_id) {
    info(`message ${reply.id}, response ${reply.response_id}`);
  }
}

/**
 * Legacy text completion. Kept for agents that only expose /v1/completions.
 */
export async function completeCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const agentId = requireAgent(ctx);
  const prompt = requireArg(positionals(args, ['--max-tokens']).join(' '), 'complete <prompt> [--max-tokens <n>]');
  const maxTokens = getNumberOption(args, '--max-tokens');

  const completion = await ctx.client.textCompletions(agentId, maxTokens === undefined ? { prompt } : { prompt, max_tokens: maxTokens });
  if (ctx.json) {
    output(completion, null, { json: true });
    return;
  }
  console.log(completion.choices[0]?.text ?? '');
  info(formatUsage(completion.usage));
}

export async function modelsCommand(ctx: CommandContext): Promise<void> {
  const agentId = requireAgent(ctx);
  const models = await ctx.client.listModels(agentId);
  if (ctx.json) {
    output(models.data, null, { json: true });
  } else if (models.data.length === 0) {
    console.log('No models found');
  } else {
    console.log(formatTable(modelColumns, models.data.map((m) => ({
      id: m.id,
      owned_by: m.owned_by,
      created: formatTimestamp(m.created),
    }))));
  }
}

export async function embedCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const agentId = requireAgent(ctx);
  const referer = requireArg(getOption(args, '--referer'), 'embed --referer <url> [--origin <origin>] [--collapsed]');

  let origin = getOption(args, '--origin');
  if (origin === undefined) {
    try {
      origin = new URL(referer).origin;
    } catch (err) {
      throw new CliUsageError(`--referer is not a valid URL: ${referer}`, { cause: err });
    }
  }

  const code = await ctx.client.getEmbedCode(agentId, {
    referer,
    origin,
    collapsed: hasFlag(args, '--collapsed') ? true : undefined,
  });
  if (ctx.json) {
    output({ code }, null, { json: true });
    return;
  }
  console.log(code);
}
