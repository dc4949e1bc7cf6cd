export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  /** Equals prompt_tokens + completion_tokens by protocol convention */
  total_tokens: number;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls';

export interface ResponseFormatText {
  type: 'text';
}

export interface ResponseFormatJsonObject {
  type: 'json_object';
}

export interface ResponseFormatJsonSchema {
  type: 'json_schema';
  json_schema: Record<string, unknown>;
}

export type ResponseFormat = ResponseFormatText | ResponseFormatJsonObject | ResponseFormatJsonSchema;

export interface FunctionTool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: Record<string, unknown>;
    strict?: boolean;
  };
}

export interface CustomTool {
  type: 'custom';
  custom: Record<string, unknown>;
}

export type ChatTool = FunctionTool | CustomTool;

export type ToolChoice =
  | 'none'
  | 'auto'
  | 'required'
  | { type: 'function'; function: { name: string } };

export interface StreamOptions {
  include_usage?: boolean;
}

/**
 * Opaque key-value map attached to conversations and responses.
 * The protocol allows up to 16 entries; this client does not enforce it.
 */
export type Metadata = Record<string, unknown>;

export interface Model {
  id: string;
  object: string;
  created: number;
  owned_by: string;
}

export interface ModelsResponse {
  object: string;
  data: Model[];
}
