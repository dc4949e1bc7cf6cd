import type { Usage } from '../types/common.js';

/**
 * Add a call's usage to a running total.
 */
export function accumulateUsage(current: Usage, delta: Usage): Usage {
  return {
    prompt_tokens: current.prompt_tokens + delta.prompt_tokens,
    completion_tokens: current.completion_tokens + delta.completion_tokens,
    total_tokens: current.total_tokens + delta.total_tokens,
  };
}

export function emptyUsage(): Usage {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };
}

/**
 * Whether total_tokens equals prompt_tokens + completion_tokens. The client
 * trusts the server's total and never recomputes it; this is for checks.
 */
export function isUsageConsistent(usage: Usage): boolean {
  return usage.total_tokens === usage.prompt_tokens + usage.completion_tokens;
}
