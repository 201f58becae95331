/**
 * @critique/review: context building, AI review and result merging.
 *
 * Used by the CLI (`critique review`) to turn a pre-analysis and an LLM
 * answer into one scored report.
 */

// ─── Pipeline ───────────────────────────────────────────────────────────────

export {
  ReviewOrchestrator,
  type OrchestratorOptions,
  type ReviewOptions,
} from './orchestrator.js';
export { ReviewRun, ReviewFailedError } from './review-run.js';
export { ContextBuilder, MAX_LISTED_NAMES, MAX_CONTEXT_MESSAGE_LENGTH, type ContextMeta } from './context-builder.js';
export {
  ResultMerger,
  mergeKey,
  resolveReference,
  countSeverities,
  computeScore,
} from './merger.js';
export { compareIssues, SEVERITY_RANK } from './severity.js';

// ─── AI review ──────────────────────────────────────────────────────────────

export {
  validateAIReview,
  emptyAIReview,
  normalizeSeverity,
  normalizeCategory,
  normalizeMessagePrefix,
  issueIdentity,
  MESSAGE_PREFIX_LENGTH,
} from './ai-review.js';
export { LLMCodeReviewer, type LLMCodeReviewerOptions } from './llm-reviewer.js';
export { OpenRouterLLMClient, OPENROUTER_API_URL, type OpenRouterLLMClientOptions } from './llm-client.js';
export { buildReviewPrompt, SYSTEM_PROMPT } from './prompt.js';
export {
  extractJSONFromCodeBlock,
  repairTruncatedJSON,
  recoverJSONObject,
  tryParseJSON,
} from './json-utils.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type {
  LLMClient,
  LLMOptions,
  LLMResponse,
  TokenUsage,
  CodeReviewer,
  ReviewCallOptions,
  IssueReference,
  AIReview,
  AIValidationResult,
  ReviewMode,
  ReviewState,
  SeverityCounts,
  MergeStatistics,
  MergeResult,
  FinalReview,
} from './types.js';

// ─── Config, output, logging ────────────────────────────────────────────────

export {
  loadConfig,
  resolveConfigPath,
  resolveLLMApiKey,
  interpolateEnvVars,
  DEFAULT_MODEL,
  type ReviewYamlConfig,
  type LLMSettings,
} from './config.js';
export { formatReview, type FormatOptions } from './adapters/terminal.js';
export { type Logger, consoleLogger, stderrLogger } from './logger.js';

// Test harness
export {
  silentLogger,
  createTestIssue,
  createTestPreAnalysis,
  createMockLLMClient,
  createMockReviewer,
  type MockReviewerCall,
} from './test-helpers.js';
