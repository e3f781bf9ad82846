// Orchestrator Module - Main exports

export { ToolCallingOrchestrator, createOrchestrator, extractText, DEFAULT_MAX_ROUNDS } from './orchestrator.js';
export { buildModelRequest, buildSystemContext, createRequestConfig } from './request-builder.js';
export { SYSTEM_PROMPT, ROUNDS_EXHAUSTED_MESSAGE } from './prompts.js';
export type { RequestConfig } from './request-builder.js';
export type {
  AnswerOptions,
  OrchestrationResult,
  OrchestratorOptions,
  ToolExecutor,
  ToolInvocation,
} from './types.js';
