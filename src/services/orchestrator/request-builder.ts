// Request Builder
// Derives each round's model request from the per-call config and the transcript so far

import type { Message, ModelRequest, ToolSpec } from '../../providers/types.js';

export interface RequestConfig {
  readonly system: string;
  readonly tools: readonly ToolSpec[];
}

export function buildSystemContext(preamble: string, history?: string): string {
  return history ? `${preamble}\n\nPrevious conversation:\n${history}` : preamble;
}

export function createRequestConfig(
  preamble: string,
  history: string | undefined,
  tools: readonly ToolSpec[] = [],
): RequestConfig {
  return Object.freeze({
    system: buildSystemContext(preamble, history),
    tools: Object.freeze([...tools]),
  });
}

export function buildModelRequest(
  config: RequestConfig,
  transcript: readonly Message[],
  { withTools }: { withTools: boolean },
): ModelRequest {
  const request: ModelRequest = {
    system: config.system,
    messages: [...transcript],
  };

  if (withTools && config.tools.length > 0) {
    return { ...request, tools: config.tools, toolChoice: { type: 'auto' } };
  }

  return request;
}
