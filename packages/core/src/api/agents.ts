/**
 * Agent endpoints: simple call, chat completions, legacy text completions,
 * model listing and widget embed code.
 */

import type { ClientConfig } from '../client/config.js';
import { dispatch, dispatchText } from '../client/dispatcher.js';
import {
  decodeAgentCallResponse,
  decodeChatCompletionResponse,
  decodeModelsResponse,
  decodeTextCompletionResponse,
  encodeChatMessage,
} from '../codec/decoders.js';
import type {
  AgentCallRequest,
  AgentCallResponse,
  ChatCompletionRequest,
  ChatCompletionResponse,
  TextCompletionRequest,
  TextCompletionResponse,
} from '../types/chat.js';
import type { ModelsResponse } from '../types/common.js';
import { agentPath } from './paths.js';

export interface EmbedCodeOptions {
  collapsed?: boolean;
  /** Page embedding the widget; must be on the agent's allowed domains */
  referer: string;
  origin: string;
}

/**
 * POST /api/v1/cloud-ai/agents/{id}/call
 */
export function callAgent(config: ClientConfig, agentAccessId: string, request: AgentCallRequest): Promise<AgentCallResponse> {
  return dispatch(config, {
    method: 'POST',
    path: agentPath(agentAccessId, 'call'),
    auth: true,
    body: request,
  }, decodeAgentCallResponse);
}

/**
 * POST /api/v1/cloud-ai/agents/{id}/v1/chat/completions
 */
export function chatCompletions(config: ClientConfig, agentAccessId: string, request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
  return dispatch(config, {
    method: 'POST',
    path: agentPath(agentAccessId, 'v1', 'chat', 'completions'),
    auth: true,
    body: { ...request, messages: request.messages.map(encodeChatMessage) },
  }, decodeChatCompletionResponse);
}

/**
 * POST /api/v1/cloud-ai/agents/{id}/v1/completions
 *
 * @deprecated Use chatCompletions. Still fully functional.
 */
export function textCompletions(config: ClientConfig, agentAccessId: string, request: TextCompletionRequest): Promise<TextCompletionResponse> {
  return dispatch(config, {
    method: 'POST',
    path: agentPath(agentAccessId, 'v1', 'completions'),
    auth: true,
    body: request,
  }, decodeTextCompletionResponse);
}

/**
 * GET /api/v1/cloud-ai/agents/{id}/v1/models
 */
export function listModels(config: ClientConfig, agentAccessId: string): Promise<ModelsResponse> {
  return dispatch(config, {
    method: 'GET',
    path: agentPath(agentAccessId, 'v1', 'models'),
    auth: true,
  }, decodeModelsResponse);
}

/**
 * GET /api/v1/cloud-ai/agents/{id}/embed.js
 *
 * Unauthenticated: the service checks referer and origin instead of a token.
 * Returns the script source as plain text.
 */
export function getEmbedCode(config: ClientConfig, agentAccessId: string, options: EmbedCodeOptions): Promise<string> {
  return dispatchText(config, {
    method: 'GET',
    path: agentPath(agentAccessId, 'embed.js'),
    auth: false,
    query: { collapsed: options.collapsed },
    headers: { referer: options.referer, origin: options.origin },
  });
}
