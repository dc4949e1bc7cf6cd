import type { ChatContent } from './content.js';
import type { ChatMessage, ToolCall } from './messages.js';
import type {
  ChatTool,
  FinishReason,
  ResponseFormat,
  StreamOptions,
  ToolChoice,
  Usage,
} from './common.js';

export interface AgentCallRequest {
  message?: string;
  /** Continue a thread from a previous agent reply */
  parent_message_id?: string;
  file_ids?: string[];
}

export interface AgentCallResponse {
  id: string;
  message: string;
  finish_reason?: string;
  response_id?: string;
}

export interface ChatCompletionRequest {
  model?: string;
  messages: ChatMessage[];
  temperature?: number;
  top_p?: number;
  n?: number;
  /** Forwarded as-is; incremental event decoding is not supported */
  stream?: boolean;
  stream_options?: StreamOptions;
  stop?: string | string[];
  max_tokens?: number;
  max_completion_tokens?: number;
  presence_penalty?: number;
  frequency_penalty?: number;
  logit_bias?: Record<string, number>;
  logprobs?: boolean;
  top_logprobs?: number;
  user?: string;
  seed?: number;
  response_format?: ResponseFormat;
  tools?: ChatTool[];
  tool_choice?: ToolChoice;
  parallel_tool_calls?: boolean;
  reasoning_effort?: 'low' | 'medium' | 'high';
  metadata?: Record<string, string>;
  store?: boolean;
}

export interface ChatCompletionMessage {
  role: 'assistant';
  content: ChatContent | null;
  refusal?: string | null;
  tool_calls?: ToolCall[];
}

export interface ChatCompletionChoice {
  index: number;
  message: ChatCompletionMessage;
  finish_reason: FinishReason | null;
  logprobs?: unknown;
}

export interface ChatCompletionResponse {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage?: Usage;
  system_fingerprint?: string | null;
}

/**
 * Legacy text completion request.
 */
export interface TextCompletionRequest {
  prompt: string;
  model?: string;
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  n?: number;
  stream?: boolean;
  logprobs?: number;
  echo?: boolean;
  stop?: string[];
  presence_penalty?: number;
  frequency_penalty?: number;
  best_of?: number;
  user?: string;
}

export interface TextCompletionLogprobs {
  tokens: string[];
  token_logprobs: number[];
  top_logprobs: unknown;
  text_offset: number[];
}

export interface TextCompletionChoice {
  text: string;
  index: number;
  logprobs?: TextCompletionLogprobs | null;
  finish_reason: string;
}

export interface TextCompletionResponse {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: TextCompletionChoice[];
  usage: Usage;
}
