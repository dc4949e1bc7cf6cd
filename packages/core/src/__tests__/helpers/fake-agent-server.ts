import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';

interface StoredItem {
  type: string;
  id: string;
  status: string;
  role: string;
  content: Array<{ type: string; text: string }>;
}

interface StoredConversation {
  id: string;
  created_at: number;
  metadata: Record<string, string>;
  items: StoredItem[];
}

interface StoredResponse {
  id: string;
  status: string;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingMessage['headers'];
  body: string;
}

export interface FakeAgentServer {
  baseUrl: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

const ROOT = '/api/v1/cloud-ai/agents/';
const MAX_ITEMS_PER_CALL = 20;

function send(res: ServerResponse, status: number, body?: unknown): void {
  if (body === undefined) {
    res.writeHead(status);
    res.end();
    return;
  }
  if (typeof body === 'string') {
    res.writeHead(status, { 'Content-Type': 'text/plain' });
    res.end(body);
    return;
  }
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toItems(value: unknown, nextId: () => string): StoredItem[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isObject).map((raw) => ({
    type: 'message',
    id: nextId(),
    status: 'completed',
    role: typeof raw.role === 'string' ? raw.role : 'user',
    content: Array.isArray(raw.content)
      ? raw.content.filter(isObject).map((c) => ({ type: String(c.type), text: String(c.text) }))
      : [],
  }));
}

/**
 * In-process stand-in for the agent service: conversations, items and
 * responses kept in memory, bearer auth checked on every route except
 * embed.js. Listens on an ephemeral port.
 */
export async function startFakeAgentServer(token = 'test-token'): Promise<FakeAgentServer> {
  const conversations = new Map<string, StoredConversation>();
  const responses = new Map<string, StoredResponse>();
  const requests: RecordedRequest[] = [];
  let counter = 0;
  const nextId = (prefix: string) => `${prefix}_${++counter}`;

  function conversationJson(conv: StoredConversation) {
    return { id: conv.id, object: 'conversation', created_at: conv.created_at, metadata: conv.metadata };
  }

  function itemListJson(items: StoredItem[], hasMore: boolean) {
    return {
      object: 'list',
      data: items,
      first_id: items.length > 0 ? items[0].id : null,
      last_id: items.length > 0 ? items[items.length - 1].id : null,
      has_more: hasMore,
    };
  }

  function responseJson(stored: StoredResponse) {
    return {
      id: stored.id,
      object: 'response',
      created_at: 1700000000,
      model: 'agent-model',
      status: stored.status,
      usage: stored.status === 'completed' ? { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 } : null,
      output: [],
    };
  }

  function route(req: IncomingMessage, res: ServerResponse, body: string): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (!url.pathname.startsWith(ROOT)) {
      send(res, 404);
      return;
    }
    const [agent, ...rest] = url.pathname.slice(ROOT.length).split('/').map(decodeURIComponent);
    const path = rest.join('/');
    const method = req.method ?? 'GET';

    if (path === 'embed.js' && method === 'GET') {
      if (req.headers.origin !== 'https://allowed.test') {
        send(res, 403, 'Origin not allowed');
        return;
      }
      const collapsed = url.searchParams.get('collapsed') === 'true';
      send(res, 200, `/* widget ${agent} collapsed=${collapsed} */`);
      return;
    }

    if (req.headers.authorization !== `Bearer ${token}`) {
      send(res, 401);
      return;
    }
    if (agent === 'suspended-agent') {
      send(res, 403);
      return;
    }

    const payload: unknown = body ? JSON.parse(body) : {};
    const input = isObject(payload) ? payload : {};

    if (path === 'call' && method === 'POST') {
      send(res, 200, { id: nextId('msg'), message: `Echo: ${String(input.message ?? '')}` });
      return;
    }

    if (path === 'v1/models' && method === 'GET') {
      send(res, 200, { object: 'list', data: [{ id: 'agent-model', object: 'model', created: 1700000000, owned_by: 'cloud' }] });
      return;
    }

    if (path === 'v1/chat/completions' && method === 'POST') {
      const messages = Array.isArray(input.messages) ? input.messages : [];
      send(res, 200, {
        id: nextId('chatcmpl'),
        object: 'chat.completion',
        created: 1700000000,
        model: 'agent-model',
        choices: [{ index: 0, message: { role: 'assistant', content: `Seen ${messages.length} messages` }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 8, completion_tokens: 3, total_tokens: 11 },
      });
      return;
    }

    if (path === 'v1/conversations' && method === 'POST') {
      const conv: StoredConversation = {
        id: nextId('conv'),
        created_at: 1700000000,
        metadata: isObject(input.metadata) ? Object.fromEntries(Object.entries(input.metadata).map(([k, v]) => [k, String(v)])) : {},
        items: toItems(input.items, () => nextId('item')),
      };
      conversations.set(conv.id, conv);
      send(res, 200, conversationJson(conv));
      return;
    }

    const convMatch = /^v1\/conversations\/([^/]+)(?:\/items(?:\/([^/]+))?)?$/.exec(path);
    if (convMatch) {
      const conv = conversations.get(convMatch[1]);
      if (!conv) {
        send(res, 404, 'Conversation not found');
        return;
      }
      const isItems = path.includes('/items');
      const itemId = convMatch[2];

      if (!isItems) {
        if (method === 'GET') {
          send(res, 200, conversationJson(conv));
        } else if (method === 'POST') {
          conv.metadata = isObject(input.metadata) ? Object.fromEntries(Object.entries(input.metadata).map(([k, v]) => [k, String(v)])) : {};
          send(res, 200, conversationJson(conv));
        } else {
          conversations.delete(conv.id);
          send(res, 200, { id: conv.id, object: 'conversation.deleted', deleted: true });
        }
        return;
      }

      if (itemId === undefined) {
        if (method === 'POST') {
          const added = toItems(input.items, () => nextId('item'));
          if (added.length > MAX_ITEMS_PER_CALL) {
            send(res, 400, `At most ${MAX_ITEMS_PER_CALL} items per request`);
            return;
          }
          conv.items.push(...added);
          send(res, 200, itemListJson(added, false));
          return;
        }
        const ordered = url.searchParams.get('order') === 'desc' ? [...conv.items].reverse() : conv.items;
        const after = url.searchParams.get('after');
        const start = after ? ordered.findIndex((i) => i.id === after) + 1 : 0;
        const limit = Number(url.searchParams.get('limit') ?? '20');
        const page = ordered.slice(start, start + limit);
        send(res, 200, itemListJson(page, start + limit < ordered.length));
        return;
      }

      const index = conv.items.findIndex((i) => i.id === itemId);
      if (index < 0) {
        send(res, 404, 'Item not found');
        return;
      }
      if (method === 'GET') {
        send(res, 200, conv.items[index]);
      } else {
        conv.items.splice(index, 1);
        send(res, 200, conversationJson(conv));
      }
      return;
    }

    if (path === 'v1/responses' && method === 'POST') {
      const stored: StoredResponse = { id: nextId('resp'), status: input.background === true ? 'queued' : 'completed' };
      responses.set(stored.id, stored);
      send(res, 200, responseJson(stored));
      return;
    }

    const respMatch = /^v1\/responses\/([^/]+)(\/cancel)?$/.exec(path);
    if (respMatch) {
      const stored = responses.get(respMatch[1]);
      if (!stored) {
        send(res, 404);
        return;
      }
      if (respMatch[2]) {
        if (stored.status !== 'queued' && stored.status !== 'in_progress') {
          send(res, 400, `Cannot cancel a ${stored.status} response`);
          return;
        }
        stored.status = 'cancelled';
        send(res, 200, responseJson(stored));
      } else if (method === 'DELETE') {
        responses.delete(stored.id);
        send(res, 204);
      } else {
        send(res, 200, responseJson(stored));
      }
      return;
    }

    send(res, 404);
  }

  const server: Server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (c: Buffer) => chunks.push(c));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString();
      requests.push({ method: req.method ?? '', url: req.url ?? '', headers: req.headers, body });
      try {
        route(req, res, body);
      } catch (err) {
        send(res, 500, err instanceof Error ? err.message : String(err));
      }
    });
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    }),
  };
}
