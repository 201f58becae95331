/**
 * @critique/core - heuristic pre-analysis engine
 *
 * Public API for:
 * - @critique/review (context building, merge, orchestration)
 * - @critique/cli (command-line front end)
 *
 * @example
 * ```typescript
 * import { createSourceUnit, runPreAnalysis } from '@critique/core';
 *
 * const unit = createSourceUnit({ text: source, language: 'python' });
 * const analysis = await runPreAnalysis(unit);
 * console.log(analysis.issues.length);
 * ```
 */

// =============================================================================
// SOURCE
// =============================================================================

export { createSourceUnit } from './source-unit.js';
export type { SourceUnitInput } from './source-unit.js';
export {
  SUPPORTED_LANGUAGES,
  CONTROL_KEYWORDS,
  isSupportedLanguage,
  getLanguageDefinition,
  detectLanguage,
} from './languages.js';
export type { Language, LanguageDefinition, BlockStyle } from './languages.js';

// =============================================================================
// PRE-ANALYSIS
// =============================================================================

export { StructureExtractor, findFunctionSpans, emptyStructure } from './analysis/structure.js';
export type { FunctionSpanScan } from './analysis/structure.js';
export { ComplexityScorer, countDecisionPoints } from './analysis/complexity.js';
export {
  PatternDetector,
  BUILTIN_PATTERN_RULES,
  NETWORK_CALL_PATTERNS,
  MAX_PATTERN_EXAMPLES,
} from './analysis/patterns.js';
export type { PatternRule } from './analysis/patterns.js';
export { IssueDetector, MAX_SNIPPET_LENGTH } from './analysis/issues.js';
export type { IssueDetection, RuleFailure } from './analysis/issues.js';
export {
  BUILTIN_ISSUE_RULES,
  hardcodedSecretRule,
  sqlInjectionRule,
  missingErrorHandlingRule,
  broadExceptionRule,
  longFunctionRule,
  longLineRule,
  debugOutputRule,
  todoCommentRule,
  isInsideTry,
} from './analysis/issue-rules.js';
export type {
  IssueRule,
  LineIssueRule,
  SourceIssueRule,
  SourceIssueCandidate,
  LineView,
  RuleContext,
  RuleMatch,
} from './analysis/issue-rules.js';
export {
  PreAnalyzer,
  runPreAnalysis,
  emptyComplexity,
  emptyPatterns,
  activePatternCategories,
} from './analysis/pre-analyzer.js';
export { splitLines, maskSource, renderTemplate } from './analysis/text.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export {
  resolvePipelineConfig,
  pipelineConfigSchema,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_COMPLEXITY_THRESHOLD,
  DEFAULT_LONG_LINE_THRESHOLD,
  DEFAULT_LONG_FUNCTION_THRESHOLD,
  DEFAULT_ISSUE_DISPLAY_CAP,
  DEFAULT_AI_TIMEOUT_SECONDS,
  MAX_AI_TIMEOUT_SECONDS,
  DEFAULT_MAX_FILE_SIZE_BYTES,
} from './config.js';
export type { PipelineConfig, ScoreWeights } from './config.js';

// =============================================================================
// ERRORS
// =============================================================================

export {
  CritiqueError,
  CritiqueErrorCode,
  InputInvalidError,
  AIUnavailableError,
  AIResponseMalformedError,
  ConfigError,
  isCritiqueError,
  getErrorMessage,
} from './errors/index.js';

// =============================================================================
// TYPES
// =============================================================================

export type {
  // Source
  SourceUnit,

  // Structure
  FunctionSpan,
  ClassEntry,
  Confidence,
  StructureInfo,

  // Complexity
  FunctionComplexity,
  ComplexityInfo,

  // Patterns
  PatternCategory,
  PatternMatch,
  PatternInfo,

  // Issues
  IssueCategory,
  Severity,
  IssueSource,
  Issue,

  // Pipeline
  PipelineStage,
  Degradation,
  PreAnalysis,
} from './types.js';

export { PATTERN_CATEGORIES, ISSUE_CATEGORIES, SEVERITIES } from './types.js';
