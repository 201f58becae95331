/**
 * Pipeline configuration: thresholds, caps and score weights.
 *
 * Resolved once and frozen; every component receives the snapshot at
 * construction instead of reading process-wide state.
 */

import { z } from 'zod';
import { ConfigError } from './errors/index.js';

export const DEFAULT_COMPLEXITY_THRESHOLD = 10;
export const DEFAULT_LONG_LINE_THRESHOLD = 120;
export const DEFAULT_LONG_FUNCTION_THRESHOLD = 50;
export const DEFAULT_ISSUE_DISPLAY_CAP = 20;
export const DEFAULT_AI_TIMEOUT_SECONDS = 60;
/** Largest delay a Node timer holds (2^31 - 1 ms), in whole seconds */
export const MAX_AI_TIMEOUT_SECONDS = 2_147_483;
/** 5 MB */
export const DEFAULT_MAX_FILE_SIZE_BYTES = 5 * 1024 * 1024;

const positiveInt = z.number().int().positive();

const scoreWeightsSchema = z
  .object({
    critical: z.number().int().nonnegative().default(15),
    medium: z.number().int().nonnegative().default(5),
    low: z.number().int().nonnegative().default(1),
  })
  .default({});

/**
 * Recognized options. Unknown keys are dropped by zod's default object parsing.
 */
export const pipelineConfigSchema = z.object({
  complexityThreshold: positiveInt.default(DEFAULT_COMPLEXITY_THRESHOLD),
  longLineThreshold: positiveInt.default(DEFAULT_LONG_LINE_THRESHOLD),
  longFunctionThreshold: positiveInt.default(DEFAULT_LONG_FUNCTION_THRESHOLD),
  issueDisplayCap: positiveInt.default(DEFAULT_ISSUE_DISPLAY_CAP),
  aiTimeoutSeconds: z.number().positive().max(MAX_AI_TIMEOUT_SECONDS).default(DEFAULT_AI_TIMEOUT_SECONDS),
  scoreWeights: scoreWeightsSchema,
  maxFileSizeBytes: positiveInt.default(DEFAULT_MAX_FILE_SIZE_BYTES),
});

export interface ScoreWeights {
  readonly critical: number;
  readonly medium: number;
  readonly low: number;
}

export interface PipelineConfig {
  readonly complexityThreshold: number;
  readonly longLineThreshold: number;
  readonly longFunctionThreshold: number;
  readonly issueDisplayCap: number;
  readonly aiTimeoutSeconds: number;
  readonly scoreWeights: ScoreWeights;
  readonly maxFileSizeBytes: number;
}

/**
 * Validate raw options and fill defaults. The result is frozen.
 *
 * @throws ConfigError when a recognized option has an invalid value
 */
export function resolvePipelineConfig(raw: unknown = {}): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid pipeline config:\n${issues}`);
  }

  const { scoreWeights, ...rest } = result.data;
  return Object.freeze({ ...rest, scoreWeights: Object.freeze({ ...scoreWeights }) });
}

/** Defaults, resolved once. */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = resolvePipelineConfig({});
