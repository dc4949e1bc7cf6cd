/**
 * CloudAIClient binds one ClientConfig to the endpoint functions.
 *
 * The endpoint functions take the config explicitly and can be used on their
 * own; the class only saves passing it around. Instances are immutable and
 * safe to share between concurrent calls.
 */

import * as agents from '../api/agents.js';
import * as conversations from '../api/conversations.js';
import * as responses from '../api/responses.js';
import type {
  AgentCallRequest,
  AgentCallResponse,
  ChatCompletionRequest,
  ChatCompletionResponse,
  TextCompletionRequest,
  TextCompletionResponse,
} from '../types/chat.js';
import type { ModelsResponse } from '../types/common.js';
import type {
  Conversation,
  ConversationDeleted,
  ConversationItem,
  ConversationItemList,
  CreateConversationRequest,
  CreateItemsQuery,
  CreateItemsRequest,
  GetItemQuery,
  ListItemsQuery,
  UpdateConversationRequest,
} from '../types/conversation.js';
import type { CreateResponseRequest, GetResponseQuery, Response } from '../types/response.js';
import { clientOptionsFromEnv, createClientConfig, type ClientConfig, type ClientOptions } from './config.js';

export class CloudAIClient {
  constructor(readonly config: ClientConfig) {}

  /**
   * Validate options and build a client. Throws `configuration_error`.
   */
  static create(options: ClientOptions): CloudAIClient {
    return new CloudAIClient(createClientConfig(options));
  }

  /**
   * Build a client from CLOUD_AI_API_TOKEN, CLOUD_AI_BASE_URL and
   * CLOUD_AI_TIMEOUT_MS.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, overrides: ClientOptions = {}): CloudAIClient {
    return CloudAIClient.create({ ...clientOptionsFromEnv(env), ...overrides });
  }

  callAgent(agentAccessId: string, request: AgentCallRequest): Promise<AgentCallResponse> {
    return agents.callAgent(this.config, agentAccessId, request);
  }

  chatCompletions(agentAccessId: string, request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    return agents.chatCompletions(this.config, agentAccessId, request);
  }

  /**
   * @deprecated Use chatCompletions. Still fully functional.
   */
  textCompletions(agentAccessId: string, request: TextCompletionRequest): Promise<TextCompletionResponse> {
    return agents.textCompletions(this.config, agentAccessId, request);
  }

  listModels(agentAccessId: string): Promise<ModelsResponse> {
    return agents.listModels(this.config, agentAccessId);
  }

  getEmbedCode(agentAccessId: string, options: agents.EmbedCodeOptions): Promise<string> {
    return agents.getEmbedCode(this.config, agentAccessId, options);
  }

  createConversation(agentAccessId: string, request?: CreateConversationRequest): Promise<Conversation> {
    return conversations.createConversation(this.config, agentAccessId, request);
  }

  getConversation(agentAccessId: string, conversationId: string): Promise<Conversation> {
    return conversations.getConversation(this.config, agentAccessId, conversationId);
  }

  updateConversation(agentAccessId: string, conversationId: string, request: UpdateConversationRequest): Promise<Conversation> {
    return conversations.updateConversation(this.config, agentAccessId, conversationId, request);
  }

  deleteConversation(agentAccessId: string, conversationId: string): Promise<ConversationDeleted> {
    return conversations.deleteConversation(this.config, agentAccessId, conversationId);
  }

  listConversationItems(agentAccessId: string, conversationId: string, query?: ListItemsQuery): Promise<ConversationItemList> {
    return conversations.listConversationItems(this.config, agentAccessId, conversationId, query);
  }

  createConversationItems(
    agentAccessId: string,
    conversationId: string,
    request: CreateItemsRequest,
    query?: CreateItemsQuery,
  ): Promise<ConversationItemList> {
    return conversations.createConversationItems(this.config, agentAccessId, conversationId, request, query);
  }

  getConversationItem(agentAccessId: string, conversationId: string, itemId: string, query?: GetItemQuery): Promise<ConversationItem> {
    return conversations.getConversationItem(this.config, agentAccessId, conversationId, itemId, query);
  }

  deleteConversationItem(agentAccessId: string, conversationId: string, itemId: string): Promise<Conversation> {
    return conversations.deleteConversationItem(this.config, agentAccessId, conversationId, itemId);
  }

  createResponse(agentAccessId: string, request: CreateResponseRequest): Promise<Response> {
    return responses.createResponse(this.config, agentAccessId, request);
  }

  getResponse(agentAccessId: string, responseId: string, query?: GetResponseQuery): Promise<Response> {
    return responses.getResponse(this.config, agentAccessId, responseId, query);
  }

  deleteResponse(agentAccessId: string, responseId: string): Promise<void> {
    return responses.deleteResponse(this.config, agentAccessId, responseId);
  }

  cancelResponse(agentAccessId: string, responseId: string): Promise<Response> {
    return responses.cancelResponse(this.config, agentAccessId, responseId);
  }
}
