/**
 * Conversations command - manage conversations and their items
 */

import {
  conversationMessage,
  nextItemsPage,
  type Conversation,
  type ConversationItem,
  type ConversationItemRole,
  type ListItemsQuery,
  type SortOrder,
} from '@cloud-agents/core';
import {
  CliUsageError,
  getNumberOption,
  getOption,
  getOptions,
  hasFlag,
  parseMetadata,
  positionals,
  requireArg,
} from '../args.js';
import { requireAgent, type CommandContext } from '../context.js';
import { formatTable, formatTimestamp, output, success, truncate, type Row } from '../output.js';

const ITEM_ROLES: readonly ConversationItemRole[] = ['user', 'assistant', 'system', 'developer'];

const itemColumns = [
  { header: 'ID', key: 'id', width: 24 },
  { header: 'Role', key: 'role', width: 10 },
  { header: 'Status', key: 'status', width: 12 },
  { header: 'Text', key: 'text' },
];

const VALUE_OPTIONS = ['--meta', '--message', '--limit', '--order', '--after', '--role', '--include'];

function conversationRow(conv: Conversation): Row {
  return {
    id: conv.id,
    created: formatTimestamp(conv.created_at),
    metadata: conv.metadata ?? null,
  };
}

function itemText(item: ConversationItem): string {
  return item.content.map((c) => c.text).join(' ');
}

function itemRow(item: ConversationItem): Row {
  return { id: item.id, role: item.role, status: item.status, text: truncate(itemText(item), 60) };
}

function parseRole(value: string | undefined): ConversationItemRole {
  if (value === undefined) {
    return 'user';
  }
  const role = ITEM_ROLES.find((r) => r === value);
  if (!role) {
    throw new CliUsageError(`--role must be one of ${ITEM_ROLES.join(', ')}, got '${value}'`);
  }
  return role;
}

function parseOrder(value: string | undefined): SortOrder | undefined {
  if (value === undefined) return undefined;
  if (value !== 'asc' && value !== 'desc') {
    throw new CliUsageError(`--order must be asc or desc, got '${value}'`);
  }
  return value;
}

function listQuery(args: string[]): ListItemsQuery {
  const query: ListItemsQuery = {};
  const limit = getNumberOption(args, '--limit');
  if (limit !== undefined) query.limit = limit;
  const order = parseOrder(getOption(args, '--order'));
  if (order !== undefined) query.order = order;
  const after = getOption(args, '--after');
  if (after !== undefined) query.after = after;
  const include = getOptions(args, '--include');
  if (include.length > 0) query.include = include;
  return query;
}

export async function conversationsCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const agentId = requireAgent(ctx);
  const subcommand = args[0] || 'help';
  const rest = args.slice(1);
  const [first, second] = positionals(rest, VALUE_OPTIONS);
  const { client } = ctx;

  switch (subcommand) {
    case 'create': {
      const message = getOption(rest, '--message');
      const metadata = parseMetadata(getOptions(rest, '--meta'));
      const conv = await client.createConversation(agentId, {
        ...(message !== undefined ? { items: [conversationMessage('user', message)] } : {}),
        ...(metadata !== undefined ? { metadata } : {}),
      });
      if (ctx.json) {
        output(conv, null, { json: true });
      } else {
        success(`Created conversation ${conv.id}`);
      }
      break;
    }

    case 'get': {
      const id = requireArg(first, 'conversations get <conversation-id>');
      const conv = await client.getConversation(agentId, id);
      output(ctx.json ? conv : conversationRow(conv), null, { json: ctx.json });
      break;
    }

    case 'update': {
      const id = requireArg(first, 'conversations update <conversation-id> --meta key=value...');
      const metadata = parseMetadata(getOptions(rest, '--meta'));
      if (metadata === undefined) {
        throw new CliUsageError('Usage: cloud-agents conversations update <conversation-id> --meta key=value...');
      }
      const conv = await client.updateConversation(agentId, id, { metadata });
      if (ctx.json) {
        output(conv, null, { json: true });
      } else {
        success(`Updated conversation ${conv.id}`);
      }
      break;
    }

    case 'delete': {
      const id = requireArg(first, 'conversations delete <conversation-id>');
      const result = await client.deleteConversation(agentId, id);
      if (ctx.json) {
        output(result, null, { json: true });
      } else if (result.deleted) {
        success(`Deleted conversation ${result.id}`);
      } else {
        throw new Error(`Conversation ${result.id} was not deleted`);
      }
      break;
    }

    case 'items': {
      const id = requireArg(first, 'conversations items <conversation-id> [--limit <n>] [--order asc|desc] [--after <item-id>] [--all]');
      const base = listQuery(rest);
      const items: ConversationItem[] = [];
      let query: ListItemsQuery | null = base;
      while (query) {
        const page = await client.listConversationItems(agentId, id, query);
        items.push(...page.data);
        query = hasFlag(rest, '--all') ? nextItemsPage(page, base) : null;
      }
      if (ctx.json) {
        output(items, null, { json: true });
      } else if (items.length === 0) {
        console.log('No items found');
      } else {
        console.log(formatTable(itemColumns, items.map(itemRow)));
      }
      break;
    }

    case 'add-item': {
      const id = requireArg(first, 'conversations add-item <conversation-id> <text> [--role <role>]');
      const text = requireArg(positionals(rest, VALUE_OPTIONS).slice(1).join(' '), 'conversations add-item <conversation-id> <text> [--role <role>]');
      const role = parseRole(getOption(rest, '--role'));
      const contentType = role === 'assistant' ? 'output_text' : 'input_text';
      const include = getOptions(rest, '--include');
      const list = await client.createConversationItems(
        agentId,
        id,
        { items: [conversationMessage(role, text, contentType)] },
        include.length > 0 ? { include } : undefined,
      );
      if (ctx.json) {
        output(list, null, { json: true });
      } else {
        success(`Added ${list.data.map((i) => i.id).join(', ')} to ${id}`);
      }
      break;
    }

    case 'get-item': {
      const usage = 'conversations get-item <conversation-id> <item-id>';
      const id = requireArg(first, usage);
      const itemId = requireArg(second, usage);
      const include = getOptions(rest, '--include');
      const item = await client.getConversationItem(agentId, id, itemId, include.length > 0 ? { include } : undefined);
      if (ctx.json) {
        output(item, null, { json: true });
      } else {
        output({ id: item.id, type: item.type, role: item.role, status: item.status, text: itemText(item) }, null, {});
      }
      break;
    }

    case 'delete-item': {
      const usage = 'conversations delete-item <conversation-id> <item-id>';
      const id = requireArg(first, usage);
      const itemId = requireArg(second, usage);
      const conv = await client.deleteConversationItem(agentId, id, itemId);
      if (ctx.json) {
        output(conv, null, { json: true });
      } else {
        success(`Deleted item ${itemId} from ${conv.id}`);
      }
      break;
    }

    default:
      throw new CliUsageError(
        'Usage: cloud-agents conversations <create|get|update|delete|items|add-item|get-item|delete-item> ...',
      );
  }
}
