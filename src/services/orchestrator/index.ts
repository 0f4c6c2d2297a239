// Orchestrator Module - Main exports

export { ConversationOrchestrator, validateToolArguments } from './orchestrator.js';
export type { RunOptions } from './orchestrator.js';
export { extractJson } from './extractor.js';
export type { ExtractMode } from './extractor.js';
export { RetryController } from './retry.js';
export type { RetryOptions } from './retry.js';
export {
  PlannerError,
  RateLimitedError,
  MalformedCallError,
  MalformedOutputError,
  DeadlineExceededError,
} from './errors.js';
