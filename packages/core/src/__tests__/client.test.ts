import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { CloudAIClient } from '../client/cloud-ai-client.js';
import { nextItemsPage } from '../api/conversations.js';
import { throwIfCancelled } from '../api/responses.js';
import { ChatMessage } from '../types/messages.js';
import { conversationMessage, type ListItemsQuery } from '../types/conversation.js';
import { isCloudAIError } from '../errors.js';
import { startFakeAgentServer, type FakeAgentServer } from './helpers/fake-agent-server.js';

describe('CloudAIClient against an in-process agent service', () => {
  let server: FakeAgentServer;
  let client: CloudAIClient;

  beforeAll(async () => {
    server = await startFakeAgentServer('test-token');
    client = CloudAIClient.create({ token: 'test-token', baseUrl: server.baseUrl, timeoutMs: 5000 });
  });

  afterAll(async () => {
    await server.close();
  });

  it('runs a conversation through create, page, delete and lookup', async () => {
    const conv = await client.createConversation('agent-1', {
      items: [conversationMessage('user', 'Hello')],
      metadata: { topic: 'demo' },
    });
    expect(conv.id).toMatch(/^conv_\d+$/);
    expect(conv.metadata).toEqual({ topic: 'demo' });

    const added = await client.createConversationItems('agent-1', conv.id, {
      items: [conversationMessage('assistant', 'Hi there', 'output_text'), conversationMessage('user', 'Bye')],
    });
    expect(added.data).toHaveLength(2);

    const seen: string[] = [];
    let query: ListItemsQuery | null = { limit: 2 };
    let pages = 0;
    while (query) {
      const page = await client.listConversationItems('agent-1', conv.id, query);
      seen.push(...page.data.map((item) => item.content[0].text));
      query = nextItemsPage(page, { limit: 2 });
      pages++;
    }
    expect(pages).toBe(2);
    expect(seen).toEqual(['Hello', 'Hi there', 'Bye']);

    const first = await client.listConversationItems('agent-1', conv.id, { limit: 1 });
    const firstId = first.first_id ?? '';
    const item = await client.getConversationItem('agent-1', conv.id, firstId);
    expect(item.content).toEqual([{ type: 'input_text', text: 'Hello' }]);

    const parent = await client.deleteConversationItem('agent-1', conv.id, firstId);
    expect(parent.id).toBe(conv.id);
    expect((await client.listConversationItems('agent-1', conv.id)).data).toHaveLength(2);

    const updated = await client.updateConversation('agent-1', conv.id, { metadata: { topic: 'renamed' } });
    expect(updated.metadata).toEqual({ topic: 'renamed' });

    const deleted = await client.deleteConversation('agent-1', conv.id);
    expect(deleted).toEqual({ id: conv.id, object: 'conversation.deleted', deleted: true });

    await expect(client.getConversation('agent-1', conv.id)).rejects.toMatchObject({
      kind: 'not_found',
      status: 404,
      message: 'Conversation not found',
    });
  });

  it('lets the server reject more than twenty items', async () => {
    const conv = await client.createConversation('agent-1');
    const items = Array.from({ length: 21 }, (_, i) => conversationMessage('user', `m${i}`));

    await expect(client.createConversationItems('agent-1', conv.id, { items })).rejects.toMatchObject({
      kind: 'invalid_request',
      message: 'At most 20 items per request',
    });
  });

  it('calls the agent and chat completions', async () => {
    const reply = await client.callAgent('agent-1', { message: 'ping' });
    expect(reply.message).toBe('Echo: ping');

    const completion = await client.chatCompletions('agent-1', {
      messages: [ChatMessage.system('Be brief'), ChatMessage.user('Hello')],
    });
    expect(completion.choices[0].message.content).toBe('Seen 2 messages');
    expect(completion.usage).toEqual({ prompt_tokens: 8, completion_tokens: 3, total_tokens: 11 });

    const models = await client.listModels('agent-1');
    expect(models.data[0].id).toBe('agent-model');
  });

  it('drives a background response through cancel and delete', async () => {
    const created = await client.createResponse('agent-1', { input: 'Write a haiku', background: true });
    expect(created.status).toBe('queued');
    expect(created.usage).toBeNull();
    expect(created.extra).toEqual({ output: [] });

    const cancelled = await client.cancelResponse('agent-1', created.id);
    expect(cancelled.status).toBe('cancelled');
    expect(() => throwIfCancelled(cancelled)).toThrow(`Response ${created.id} was cancelled`);

    await expect(client.cancelResponse('agent-1', created.id)).rejects.toMatchObject({
      kind: 'invalid_request',
      message: 'Cannot cancel a cancelled response',
    });

    await expect(client.deleteResponse('agent-1', created.id)).resolves.toBeUndefined();
    await expect(client.getResponse('agent-1', created.id)).rejects.toMatchObject({ kind: 'not_found' });
  });

  it('returns embed code for an allowed origin without a token', async () => {
    const before = server.requests.length;
    const code = await client.getEmbedCode('agent-1', {
      collapsed: true,
      referer: 'https://allowed.test/page',
      origin: 'https://allowed.test',
    });

    expect(code).toBe('/* widget agent-1 collapsed=true */');
    const received = server.requests[before];
    expect(received.headers.authorization).toBeUndefined();
    expect(received.headers.referer).toBe('https://allowed.test/page');
  });

  it('reports a disallowed origin as forbidden', async () => {
    await expect(client.getEmbedCode('agent-1', {
      referer: 'https://other.test/',
      origin: 'https://other.test',
    })).rejects.toMatchObject({ kind: 'forbidden', message: 'Origin not allowed' });
  });

  it('identifies the client on every request', async () => {
    const before = server.requests.length;
    await client.listModels('agent-1');

    expect(server.requests[before].headers['x-proxy-source']).toBe('cloud-agents-ts');
    expect(server.requests[before].headers['x-request-id']).toMatch(/^req-/);
  });

  it('maps a bad token to unauthorized', async () => {
    const other = CloudAIClient.create({ token: 'wrong-token', baseUrl: server.baseUrl });

    await expect(other.callAgent('agent-1', { message: 'x' })).rejects.toMatchObject({
      kind: 'unauthorized',
      message: 'Authentication failed - invalid or expired token',
    });
  });

  it('maps a suspended agent to forbidden', async () => {
    await expect(client.callAgent('suspended-agent', { message: 'x' })).rejects.toMatchObject({ kind: 'forbidden' });
  });

  it('reports a refused connection as a transport failure', async () => {
    const closed = await startFakeAgentServer();
    const baseUrl = closed.baseUrl;
    await closed.close();
    const offline = CloudAIClient.create({ token: 'test-token', baseUrl, timeoutMs: 5000 });

    try {
      await offline.listModels('agent-1');
      expect.unreachable('request should fail');
    } catch (err) {
      expect(isCloudAIError(err, 'transport_failure')).toBe(true);
      if (isCloudAIError(err)) {
        expect(err.message.startsWith('HTTP request failed: ')).toBe(true);
      }
    }
  });
});
