/**
 * Error codes for all Critique-specific errors.
 * Used to classify failures programmatically.
 */
export enum CritiqueErrorCode {
  // Input
  INPUT_INVALID = 'INPUT_INVALID',

  // Analysis
  ANALYSIS_DEGRADED = 'ANALYSIS_DEGRADED',

  // AI review
  AI_UNAVAILABLE = 'AI_UNAVAILABLE',
  AI_RESPONSE_MALFORMED = 'AI_RESPONSE_MALFORMED',

  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
