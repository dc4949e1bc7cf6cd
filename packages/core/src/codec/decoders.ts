/**
 * Decoders for response payloads.
 *
 * Each decoder takes a parsed JSON value and returns the typed DTO, throwing a
 * `decode_failure` CloudAIError naming the offending field when the payload
 * does not match. Unknown fields are ignored, except on Response, where they
 * are kept in the `extra` bag.
 */

import type { AgentCallResponse, ChatCompletionChoice, ChatCompletionMessage, ChatCompletionResponse, TextCompletionChoice, TextCompletionLogprobs, TextCompletionResponse } from '../types/chat.js';
import type { FinishReason, Metadata, Model, ModelsResponse, Usage } from '../types/common.js';
import type { Conversation, ConversationDeleted, ConversationItem, ConversationItemContent, ConversationItemList } from '../types/conversation.js';
import type { ChatMessage, Role, ToolCall } from '../types/messages.js';
import type { Response } from '../types/response.js';
import { decodeChatContent, encodeChatContent } from './content-codec.js';
import {
  decodeFailure,
  isNullableString,
  isRecord,
  requireArray,
  requireBoolean,
  requireNumber,
  requireRecord,
  requireString,
  type JsonObject,
} from './json-guards.js';

export type Decoder<T> = (value: unknown) => T;

const ROLES: readonly Role[] = ['system', 'user', 'assistant', 'tool', 'developer'];
const FINISH_REASONS: readonly FinishReason[] = ['stop', 'length', 'content_filter', 'tool_calls'];

function isRole(value: unknown): value is Role {
  return ROLES.some((r) => r === value);
}

function isFinishReason(value: unknown): value is FinishReason {
  return FINISH_REASONS.some((r) => r === value);
}

export function decodeUsage(value: unknown): Usage {
  const obj = requireRecord(value, 'usage');
  return {
    prompt_tokens: requireNumber(obj, 'prompt_tokens', 'usage'),
    completion_tokens: requireNumber(obj, 'completion_tokens', 'usage'),
    total_tokens: requireNumber(obj, 'total_tokens', 'usage'),
  };
}

function decodeMetadata(value: unknown, what: string): Metadata | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  if (!isRecord(value)) {
    throw decodeFailure(what, "'metadata' must be an object");
  }
  return Object.fromEntries(Object.entries(value));
}

function decodeToolCall(value: unknown): ToolCall {
  const obj = requireRecord(value, 'tool call');
  if (obj.type !== 'function') {
    throw decodeFailure('tool call', `unsupported type '${String(obj.type)}'`);
  }
  const fn = requireRecord(obj.function, 'tool call function');
  return {
    id: requireString(obj, 'id', 'tool call'),
    type: 'function',
    function: {
      name: requireString(fn, 'name', 'tool call function'),
      arguments: requireString(fn, 'arguments', 'tool call function'),
    },
  };
}

export function encodeChatMessage(message: ChatMessage): JsonObject {
  const wire: JsonObject = {
    role: message.role,
    content: encodeChatContent(message.content),
  };
  if (message.name !== undefined) wire.name = message.name;
  if (message.tool_call_id !== undefined) wire.tool_call_id = message.tool_call_id;
  if (message.tool_calls !== undefined) wire.tool_calls = message.tool_calls;
  return wire;
}

export function decodeChatMessage(value: unknown): ChatMessage {
  const obj = requireRecord(value, 'chat message');
  if (!isRole(obj.role)) {
    throw decodeFailure('chat message', `unknown role '${String(obj.role)}'`);
  }
  const message: ChatMessage = { role: obj.role, content: decodeChatContent(obj.content) };
  if (obj.name !== undefined) message.name = requireString(obj, 'name', 'chat message');
  if (obj.tool_call_id !== undefined) message.tool_call_id = requireString(obj, 'tool_call_id', 'chat message');
  if (obj.tool_calls !== undefined) message.tool_calls = requireArray(obj, 'tool_calls', 'chat message').map(decodeToolCall);
  return message;
}

export function decodeAgentCallResponse(value: unknown): AgentCallResponse {
  const obj = requireRecord(value, 'agent call response');
  const result: AgentCallResponse = {
    id: requireString(obj, 'id', 'agent call response'),
    message: requireString(obj, 'message', 'agent call response'),
  };
  if (typeof obj.finish_reason === 'string') result.finish_reason = obj.finish_reason;
  if (typeof obj.response_id === 'string') result.response_id = obj.response_id;
  return result;
}

function decodeCompletionMessage(value: unknown): ChatCompletionMessage {
  const obj = requireRecord(value, 'completion message');
  if (obj.role !== 'assistant') {
    throw decodeFailure('completion message', `unexpected role '${String(obj.role)}'`);
  }
  if (obj.content === undefined) {
    throw decodeFailure('completion message', "'content' must be present");
  }
  const message: ChatCompletionMessage = {
    role: 'assistant',
    content: obj.content === null ? null : decodeChatContent(obj.content),
  };
  if (obj.refusal !== undefined) {
    if (!isNullableString(obj.refusal)) {
      throw decodeFailure('completion message', "'refusal' must be a string or null");
    }
    message.refusal = obj.refusal;
  }
  if (obj.tool_calls !== undefined && obj.tool_calls !== null) {
    message.tool_calls = requireArray(obj, 'tool_calls', 'completion message').map(decodeToolCall);
  }
  return message;
}

function decodeChatChoice(value: unknown): ChatCompletionChoice {
  const obj = requireRecord(value, 'completion choice');
  const reason = obj.finish_reason;
  if (reason !== null && !isFinishReason(reason)) {
    throw decodeFailure('completion choice', `unknown finish_reason '${String(reason)}'`);
  }
  const choice: ChatCompletionChoice = {
    index: requireNumber(obj, 'index', 'completion choice'),
    message: decodeCompletionMessage(obj.message),
    finish_reason: reason,
  };
  if (obj.logprobs !== undefined) choice.logprobs = obj.logprobs;
  return choice;
}

export function decodeChatCompletionResponse(value: unknown): ChatCompletionResponse {
  const obj = requireRecord(value, 'chat completion');
  const response: ChatCompletionResponse = {
    id: requireString(obj, 'id', 'chat completion'),
    object: requireString(obj, 'object', 'chat completion'),
    created: requireNumber(obj, 'created', 'chat completion'),
    model: requireString(obj, 'model', 'chat completion'),
    choices: requireArray(obj, 'choices', 'chat completion').map(decodeChatChoice),
  };
  if (obj.usage !== undefined && obj.usage !== null) response.usage = decodeUsage(obj.usage);
  if (obj.system_fingerprint !== undefined) {
    if (!isNullableString(obj.system_fingerprint)) {
      throw decodeFailure('chat completion', "'system_fingerprint' must be a string or null");
    }
    response.system_fingerprint = obj.system_fingerprint;
  }
  return response;
}

function decodeNumberArray(obj: JsonObject, key: string, what: string): number[] {
  return requireArray(obj, key, what).map((v) => {
    if (typeof v !== 'number') {
      throw decodeFailure(what, `'${key}' must contain only numbers`);
    }
    return v;
  });
}

function decodeTextLogprobs(value: unknown): TextCompletionLogprobs {
  const obj = requireRecord(value, 'logprobs');
  const tokens = requireArray(obj, 'tokens', 'logprobs').map((t) => {
    if (typeof t !== 'string') {
      throw decodeFailure('logprobs', "'tokens' must contain only strings");
    }
    return t;
  });
  return {
    tokens,
    token_logprobs: decodeNumberArray(obj, 'token_logprobs', 'logprobs'),
    top_logprobs: obj.top_logprobs,
    text_offset: decodeNumberArray(obj, 'text_offset', 'logprobs'),
  };
}

function decodeTextChoice(value: unknown): TextCompletionChoice {
  const obj = requireRecord(value, 'text completion choice');
  const choice: TextCompletionChoice = {
    text: requireString(obj, 'text', 'text completion choice'),
    index: requireNumber(obj, 'index', 'text completion choice'),
    finish_reason: requireString(obj, 'finish_reason', 'text completion choice'),
  };
  if (obj.logprobs === null) {
    choice.logprobs = null;
  } else if (obj.logprobs !== undefined) {
    choice.logprobs = decodeTextLogprobs(obj.logprobs);
  }
  return choice;
}

export function decodeTextCompletionResponse(value: unknown): TextCompletionResponse {
  const obj = requireRecord(value, 'text completion');
  return {
    id: requireString(obj, 'id', 'text completion'),
    object: requireString(obj, 'object', 'text completion'),
    created: requireNumber(obj, 'created', 'text completion'),
    model: requireString(obj, 'model', 'text completion'),
    choices: requireArray(obj, 'choices', 'text completion').map(decodeTextChoice),
    usage: decodeUsage(obj.usage),
  };
}

function decodeModel(value: unknown): Model {
  const obj = requireRecord(value, 'model');
  return {
    id: requireString(obj, 'id', 'model'),
    object: requireString(obj, 'object', 'model'),
    created: requireNumber(obj, 'created', 'model'),
    owned_by: requireString(obj, 'owned_by', 'model'),
  };
}

export function decodeModelsResponse(value: unknown): ModelsResponse {
  const obj = requireRecord(value, 'model list');
  return {
    object: requireString(obj, 'object', 'model list'),
    data: requireArray(obj, 'data', 'model list').map(decodeModel),
  };
}

export function decodeConversation(value: unknown): Conversation {
  const obj = requireRecord(value, 'conversation');
  const conversation: Conversation = {
    id: requireString(obj, 'id', 'conversation'),
    object: requireString(obj, 'object', 'conversation'),
    created_at: requireNumber(obj, 'created_at', 'conversation'),
  };
  const metadata = decodeMetadata(obj.metadata, 'conversation');
  if (metadata !== undefined) conversation.metadata = metadata;
  return conversation;
}

export function decodeConversationDeleted(value: unknown): ConversationDeleted {
  const obj = requireRecord(value, 'conversation deletion');
  return {
    id: requireString(obj, 'id', 'conversation deletion'),
    object: requireString(obj, 'object', 'conversation deletion'),
    deleted: requireBoolean(obj, 'deleted', 'conversation deletion'),
  };
}

function decodeItemContent(value: unknown): ConversationItemContent {
  const obj = requireRecord(value, 'item content');
  return {
    type: requireString(obj, 'type', 'item content'),
    text: requireString(obj, 'text', 'item content'),
  };
}

export function decodeConversationItem(value: unknown): ConversationItem {
  const obj = requireRecord(value, 'conversation item');
  return {
    type: requireString(obj, 'type', 'conversation item'),
    id: requireString(obj, 'id', 'conversation item'),
    status: requireString(obj, 'status', 'conversation item'),
    role: requireString(obj, 'role', 'conversation item'),
    content: requireArray(obj, 'content', 'conversation item').map(decodeItemContent),
  };
}

export function decodeConversationItemList(value: unknown): ConversationItemList {
  const obj = requireRecord(value, 'item list');
  const firstId = obj.first_id ?? null;
  const lastId = obj.last_id ?? null;
  if ((typeof firstId !== 'string' && firstId !== null) || (typeof lastId !== 'string' && lastId !== null)) {
    throw decodeFailure('item list', "'first_id' and 'last_id' must be strings or null");
  }
  return {
    object: requireString(obj, 'object', 'item list'),
    data: requireArray(obj, 'data', 'item list').map(decodeConversationItem),
    first_id: firstId,
    last_id: lastId,
    has_more: requireBoolean(obj, 'has_more', 'item list'),
  };
}

const RESPONSE_FIELDS = new Set(['id', 'object', 'created_at', 'model', 'status', 'usage']);

export function decodeResponse(value: unknown): Response {
  const obj = requireRecord(value, 'response');
  const extra: Record<string, unknown> = Object.fromEntries(
    Object.entries(obj).filter(([key]) => !RESPONSE_FIELDS.has(key)),
  );
  return {
    id: requireString(obj, 'id', 'response'),
    object: requireString(obj, 'object', 'response'),
    created_at: requireNumber(obj, 'created_at', 'response'),
    model: requireString(obj, 'model', 'response'),
    status: requireString(obj, 'status', 'response'),
    usage: obj.usage === undefined || obj.usage === null ? null : decodeUsage(obj.usage),
    extra,
  };
}
