import type { Metadata } from './common.js';

/**
 * Conversation item content uses the plain `{type, text}` shape
 * (`input_text`, `output_text`, ...), not the multimodal chat content model.
 */
export interface ConversationItemContent {
  type: string;
  text: string;
}

export interface ConversationItem {
  type: string;
  id: string;
  status: string;
  role: string;
  content: ConversationItemContent[];
}

export type ConversationItemRole = 'user' | 'assistant' | 'system' | 'developer';

export interface ConversationItemInput {
  type: 'message';
  role: ConversationItemRole;
  content: ConversationItemContent[];
}

export interface Conversation {
  id: string;
  object: string;
  /** Unix timestamp, seconds */
  created_at: number;
  metadata?: Metadata | null;
}

export interface ConversationDeleted {
  id: string;
  object: string;
  deleted: boolean;
}

export interface ConversationItemList {
  object: string;
  data: ConversationItem[];
  first_id: string | null;
  last_id: string | null;
  has_more: boolean;
}

export interface CreateConversationRequest {
  /** Initial items; the server accepts up to 20 */
  items?: ConversationItemInput[];
  metadata?: Metadata;
}

export interface UpdateConversationRequest {
  metadata: Metadata;
}

export interface CreateItemsRequest {
  /** The server accepts up to 20 items per call */
  items: ConversationItemInput[];
}

export type SortOrder = 'asc' | 'desc';

export interface ListItemsQuery {
  after?: string;
  include?: string[];
  /** 1-100, server default 20 */
  limit?: number;
  order?: SortOrder;
}

export interface CreateItemsQuery {
  include?: string[];
}

export interface GetItemQuery {
  include?: string[];
}

export function conversationMessage(
  role: ConversationItemRole,
  text: string,
  contentType = 'input_text',
): ConversationItemInput {
  return { type: 'message', role, content: [{ type: contentType, text }] };
}
