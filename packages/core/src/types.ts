/**
 * Domain types shared by the pre-analysis engine and the review pipeline.
 */

import type { Language } from './languages.js';

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

/**
 * One file submitted for review. Created once per request, never mutated.
 */
export interface SourceUnit {
  readonly text: string;
  readonly language: Language;
  /** Byte size: the declared size when the caller supplied one, else the UTF-8 length of `text` */
  readonly size: number;
  readonly filename?: string;
}

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

/**
 * A function (or method) and the lines it covers. 1-based, inclusive.
 */
export interface FunctionSpan {
  readonly name: string;
  readonly startLine: number;
  readonly endLine: number;
}

export interface ClassEntry {
  readonly name: string;
  readonly line: number;
}

export type Confidence = 'high' | 'low';

export interface StructureInfo {
  readonly totalLines: number;
  readonly codeLines: number;
  readonly commentLines: number;
  readonly blankLines: number;
  readonly functionCount: number;
  readonly classCount: number;
  readonly importCount: number;
  readonly functions: readonly FunctionSpan[];
  readonly classes: readonly ClassEntry[];
  readonly usesAsync: boolean;
  readonly usesDecorators: boolean;
  /** 'low' when the text could not be scanned cleanly (unbalanced blocks, extractor failure) */
  readonly confidence: Confidence;
}

// ---------------------------------------------------------------------------
// Complexity
// ---------------------------------------------------------------------------

export interface FunctionComplexity {
  readonly name: string;
  readonly line: number;
  readonly score: number;
}

export interface ComplexityInfo {
  readonly functions: readonly FunctionComplexity[];
  readonly average: number;
  readonly max: number;
  /** Entries with score >= threshold, in source order */
  readonly high: readonly FunctionComplexity[];
  readonly threshold: number;
}

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

export const PATTERN_CATEGORIES = [
  'API_ENDPOINT',
  'DB_QUERY',
  'FILE_IO',
  'NETWORK_CALL',
  'AUTH',
] as const;

export type PatternCategory = (typeof PATTERN_CATEGORIES)[number];

export interface PatternMatch {
  readonly count: number;
  /** First few matching line numbers */
  readonly lines: readonly number[];
}

export type PatternInfo = Readonly<Record<PatternCategory, PatternMatch>>;

// ---------------------------------------------------------------------------
// Issues
// ---------------------------------------------------------------------------

export const ISSUE_CATEGORIES = [
  'SECRET',
  'SQL_INJECTION',
  'MISSING_ERROR_HANDLING',
  'BARE_EXCEPT',
  'LONG_FUNCTION',
  'LONG_LINE',
  'DEBUG_OUTPUT',
  'TODO_COMMENT',
  'LLM_FINDING',
] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export const SEVERITIES = ['CRITICAL', 'MEDIUM', 'LOW'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type IssueSource = 'PRE_ANALYSIS' | 'AI';

export interface Issue {
  readonly category: IssueCategory;
  readonly severity: Severity;
  readonly line?: number;
  readonly message: string;
  readonly source: IssueSource;
  /** Trimmed source line the issue points at */
  readonly snippet?: string;
  readonly recommendation?: string;
  /** Set by the merger when the AI confirmed a pre-analysis issue */
  readonly aiValidated?: boolean;
}

// ---------------------------------------------------------------------------
// Degradation
// ---------------------------------------------------------------------------

export type PipelineStage =
  | 'structure'
  | 'complexity'
  | 'patterns'
  | 'issues'
  | 'ai-review'
  | 'merge';

/**
 * A stage that completed with partial data instead of failing the review.
 */
export interface Degradation {
  readonly stage: PipelineStage;
  readonly code: 'ANALYSIS_DEGRADED' | 'AI_RESPONSE_MALFORMED';
  readonly detail: string;
}

// ---------------------------------------------------------------------------
// Pre-analysis aggregate
// ---------------------------------------------------------------------------

export interface PreAnalysis {
  readonly structure: StructureInfo;
  readonly complexity: ComplexityInfo;
  readonly patterns: PatternInfo;
  readonly issues: readonly Issue[];
  readonly degradations: readonly Degradation[];
}
