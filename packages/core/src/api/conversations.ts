/**
 * Conversation and conversation-item endpoints.
 *
 * List calls return one page; callers paginate by passing `after = last_id`
 * while `has_more` is true (see nextItemsPage).
 */

import type { ClientConfig } from '../client/config.js';
import { dispatch } from '../client/dispatcher.js';
import {
  decodeConversation,
  decodeConversationDeleted,
  decodeConversationItem,
  decodeConversationItemList,
} from '../codec/decoders.js';
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
import { agentPath, idSegment } from './paths.js';

function conversationPath(agentAccessId: string, conversationId?: string): string {
  return conversationId === undefined
    ? agentPath(agentAccessId, 'v1', 'conversations')
    : agentPath(agentAccessId, 'v1', 'conversations', idSegment(conversationId));
}

function itemsPath(agentAccessId: string, conversationId: string, itemId?: string): string {
  const base = `${conversationPath(agentAccessId, conversationId)}/items`;
  return itemId === undefined ? base : `${base}/${idSegment(itemId)}`;
}

export function createConversation(config: ClientConfig, agentAccessId: string, request: CreateConversationRequest = {}): Promise<Conversation> {
  return dispatch(config, {
    method: 'POST',
    path: conversationPath(agentAccessId),
    auth: true,
    body: request,
  }, decodeConversation);
}

export function getConversation(config: ClientConfig, agentAccessId: string, conversationId: string): Promise<Conversation> {
  return dispatch(config, {
    method: 'GET',
    path: conversationPath(agentAccessId, conversationId),
    auth: true,
  }, decodeConversation);
}

/**
 * Replace the conversation's metadata.
 */
export function updateConversation(
  config: ClientConfig,
  agentAccessId: string,
  conversationId: string,
  request: UpdateConversationRequest,
): Promise<Conversation> {
  return dispatch(config, {
    method: 'POST',
    path: conversationPath(agentAccessId, conversationId),
    auth: true,
    body: request,
  }, decodeConversation);
}

export function deleteConversation(config: ClientConfig, agentAccessId: string, conversationId: string): Promise<ConversationDeleted> {
  return dispatch(config, {
    method: 'DELETE',
    path: conversationPath(agentAccessId, conversationId),
    auth: true,
  }, decodeConversationDeleted);
}

export function listConversationItems(
  config: ClientConfig,
  agentAccessId: string,
  conversationId: string,
  query?: ListItemsQuery,
): Promise<ConversationItemList> {
  return dispatch(config, {
    method: 'GET',
    path: itemsPath(agentAccessId, conversationId),
    auth: true,
    query,
  }, decodeConversationItemList);
}

export function createConversationItems(
  config: ClientConfig,
  agentAccessId: string,
  conversationId: string,
  request: CreateItemsRequest,
  query?: CreateItemsQuery,
): Promise<ConversationItemList> {
  return dispatch(config, {
    method: 'POST',
    path: itemsPath(agentAccessId, conversationId),
    auth: true,
    body: request,
    query,
  }, decodeConversationItemList);
}

export function getConversationItem(
  config: ClientConfig,
  agentAccessId: string,
  conversationId: string,
  itemId: string,
  query?: GetItemQuery,
): Promise<ConversationItem> {
  return dispatch(config, {
    method: 'GET',
    path: itemsPath(agentAccessId, conversationId, itemId),
    auth: true,
    query,
  }, decodeConversationItem);
}

/**
 * Delete one item. The service answers with the parent conversation.
 */
export function deleteConversationItem(
  config: ClientConfig,
  agentAccessId: string,
  conversationId: string,
  itemId: string,
): Promise<Conversation> {
  return dispatch(config, {
    method: 'DELETE',
    path: itemsPath(agentAccessId, conversationId, itemId),
    auth: true,
  }, decodeConversation);
}

/**
 * Query for the page after `list`, or null when there is none.
 * Performs no request.
 */
export function nextItemsPage(list: ConversationItemList, query: ListItemsQuery = {}): ListItemsQuery | null {
  if (!list.has_more || list.last_id === null) {
    return null;
  }
  return { ...query, after: list.last_id };
}
