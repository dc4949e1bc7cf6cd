import type { Metadata, Usage } from './common.js';

/**
 * Response input: a bare prompt string, or a list of input items passed
 * through unmodified.
 */
export type ResponseInput = string | Record<string, unknown>[];

export interface CreateResponseRequest {
  model?: string;
  instructions?: string;
  input?: ResponseInput;
  max_output_tokens?: number;
  temperature?: number;
  metadata?: Metadata;
  tools?: Record<string, unknown>[];
  /** Forwarded as-is; incremental event decoding is not supported */
  stream?: boolean;
  stream_options?: Record<string, unknown>;
  background?: boolean;
  text?: Record<string, unknown>;
  tool_choice?: string | Record<string, unknown>;
  parallel_tool_calls?: boolean;
  max_tool_calls?: number;
  previous_response_id?: string;
  conversation?: string | { id: string };
  include?: string[];
  store?: boolean;
  top_p?: number;
  top_logprobs?: number;
  truncation?: 'auto' | 'disabled';
  service_tier?: string;
  safety_identifier?: string;
  prompt_cache_key?: string;
  prompt?: Record<string, unknown>;
  reasoning?: Record<string, unknown>;
  user?: string;
}

export type ResponseStatus =
  | 'queued'
  | 'in_progress'
  | 'completed'
  | 'failed'
  | 'incomplete'
  | 'cancelled';

export interface Response {
  id: string;
  object: string;
  created_at: number;
  model: string;
  /** Server-defined; the known values are listed in ResponseStatus */
  status: string;
  /** Absent while a response is still queued or running */
  usage: Usage | null;
  /** Every field not modelled above, preserved verbatim */
  extra: Record<string, unknown>;
}

export interface GetResponseQuery {
  include?: string[];
  include_obfuscation?: boolean;
  starting_after?: number;
  stream?: boolean;
}
