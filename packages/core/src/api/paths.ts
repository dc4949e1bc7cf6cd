const AGENTS_ROOT = '/api/v1/cloud-ai/agents';

/**
 * Path under an agent, with each ID segment percent-encoded.
 * `agentPath('a1', 'v1', 'conversations', 'c1')` → `/api/v1/cloud-ai/agents/a1/v1/conversations/c1`
 */
export function agentPath(agentAccessId: string, ...segments: string[]): string {
  const parts = [AGENTS_ROOT, encodeURIComponent(agentAccessId), ...segments];
  return parts.join('/');
}

export function idSegment(id: string): string {
  return encodeURIComponent(id);
}
