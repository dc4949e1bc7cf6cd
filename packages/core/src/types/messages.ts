import type { ChatContent, ContentItem } from './content.js';

export type Role = 'system' | 'user' | 'assistant' | 'tool' | 'developer';

export interface ToolCallFunction {
  name: string;
  /** JSON-encoded arguments, as produced by the model */
  arguments: string;
}

export interface ToolCall {
  id: string;
  type: 'function';
  function: ToolCallFunction;
}

export interface ChatMessage {
  role: Role;
  content: ChatContent;
  name?: string;
  /** Set on `tool` messages: the call this message answers */
  tool_call_id?: string;
  tool_calls?: ToolCall[];
}

/**
 * Convenience constructors. Item count and ordering are not checked here;
 * limits are enforced by the server.
 */
export const ChatMessage = {
  system(text: string): ChatMessage {
    return { role: 'system', content: text };
  },

  developer(text: string): ChatMessage {
    return { role: 'developer', content: text };
  },

  user(text: string): ChatMessage {
    return { role: 'user', content: text };
  },

  assistant(text: string): ChatMessage {
    return { role: 'assistant', content: text };
  },

  tool(text: string, toolCallId: string): ChatMessage {
    return { role: 'tool', content: text, tool_call_id: toolCallId };
  },

  userMultimodal(items: ContentItem[]): ChatMessage {
    return { role: 'user', content: [...items] };
  },
};
