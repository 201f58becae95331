/**
 * Shared types for the review package
 */

import type {
  Degradation,
  Issue,
  IssueCategory,
  Language,
  PreAnalysis,
} from '@critique/core';

// ---------------------------------------------------------------------------
// LLM Client
// ---------------------------------------------------------------------------

/**
 * Options for a single LLM completion call.
 */
export interface LLMOptions {
  /** Max tokens for the response */
  maxTokens?: number;
  /** Sampling temperature (0-1) */
  temperature?: number;
  /** Abort signal for per-call timeout */
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  cost: number;
}

/**
 * Response from an LLM completion call.
 */
export interface LLMResponse {
  /** The completion text */
  content: string;
  /** Token usage and cost information */
  usage?: TokenUsage;
}

/**
 * Abstraction over LLM providers. Instance-based, no global mutable state.
 */
export interface LLMClient {
  complete(prompt: string, opts?: LLMOptions): Promise<LLMResponse>;
  /** Accumulated usage across all calls on this instance */
  getUsage(): TokenUsage;
}

// ---------------------------------------------------------------------------
// Reviewer
// ---------------------------------------------------------------------------

export interface ReviewCallOptions {
  /** Aborted when the orchestrator's timeout fires */
  signal?: AbortSignal;
}

/**
 * The AI collaborator. Returns the parsed JSON payload, unvalidated.
 *
 * Throws AIResponseMalformedError when the answer holds no recoverable JSON,
 * and any other error for transport, auth or timeout failures.
 */
export interface CodeReviewer {
  reviewWithContext(
    contextText: string,
    sourceText: string,
    language: Language,
    opts?: ReviewCallOptions,
  ): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// AI Review
// ---------------------------------------------------------------------------

/**
 * Points at a pre-analysis issue the AI confirmed or rejected.
 * `category` is absent when the AI named no known category.
 */
export interface IssueReference {
  readonly category?: IssueCategory;
  readonly line?: number;
  readonly message?: string;
  readonly reason?: string;
  readonly recommendation?: string;
}

export interface AIReview {
  readonly validatedIssues: readonly IssueReference[];
  readonly falsePositives: readonly IssueReference[];
  /** Issues the AI found on its own; `source` is always 'AI' */
  readonly newFindings: readonly Issue[];
  readonly summary: string;
  readonly recommendations: readonly string[];
  readonly strengths: readonly string[];
  /** The AI's own score, informational only */
  readonly score?: number;
}

export type AIValidationResult =
  | { status: 'success'; review: AIReview }
  | { status: 'partial'; review: AIReview; problems: string[] }
  | { status: 'failure'; problems: string[] };

// ---------------------------------------------------------------------------
// Final review
// ---------------------------------------------------------------------------

export type ReviewMode = 'quick' | 'full';

export type ReviewState =
  | 'RECEIVED'
  | 'PRE_ANALYZED'
  | 'SCORED'
  | 'CONTEXT_BUILT'
  | 'AI_REVIEWED'
  | 'MERGED'
  | 'DONE'
  | 'FAILED';

export interface SeverityCounts {
  readonly critical: number;
  readonly medium: number;
  readonly low: number;
  readonly total: number;
}

export interface MergeStatistics {
  readonly preAnalysisFound: number;
  readonly aiFound: number;
  readonly falsePositivesRemoved: number;
  /** AI references that matched no pre-analysis issue */
  readonly unresolvedReferences: number;
  /** AI findings dropped because they collided with another issue */
  readonly duplicatesDropped: number;
  readonly validatedByAI: number;
}

export interface MergeResult {
  readonly issues: readonly Issue[];
  readonly score: number;
  readonly counts: SeverityCounts;
  readonly statistics: MergeStatistics;
}

export interface FinalReview extends MergeResult {
  readonly source: { readonly filename?: string; readonly language: Language; readonly size: number };
  readonly mode: ReviewMode;
  readonly preAnalysis: PreAnalysis;
  readonly aiReview: AIReview | null;
  /** True when the full path fell back to quick scoring */
  readonly aiSkipped: boolean;
  readonly degradations: readonly Degradation[];
  /** States visited, in order */
  readonly stages: readonly ReviewState[];
  readonly processingTimeMs: number;
}
