// Orchestrator Types

import type { Message, ToolSpec } from '../../providers/types.js';

/**
 * Runs a tool requested by the model. Rejections are turned into error text
 * for the model; they never fail the orchestration.
 */
export interface ToolExecutor {
  execute(name: string, input: Record<string, unknown>): Promise<string>;
}

export interface OrchestratorOptions {
  systemPrompt?: string;
  maxRounds?: number;
}

export interface AnswerOptions {
  /** Summary of earlier turns, appended to the system prompt. */
  history?: string;
  /** Tools offered to the model; none means tools are disabled for the call. */
  tools?: readonly ToolSpec[];
  executor?: ToolExecutor;
  maxRounds?: number;
}

export interface ToolInvocation {
  round: number;
  toolUseId: string;
  name: string;
  input: Record<string, unknown>;
  content: string;
  isError: boolean;
}

export interface OrchestrationResult {
  answer: string;
  transcript: Message[];
  /** Negotiation rounds entered; 0 on the direct-answer path. */
  rounds: number;
  modelCalls: number;
  toolInvocations: ToolInvocation[];
}
