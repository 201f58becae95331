/**
 * ReviewOrchestrator — drives one source unit through the pipeline.
 *
 *   RECEIVED → PRE_ANALYZED → quick: SCORED
 *                           → full:  CONTEXT_BUILT → AI_REVIEWED
 *            → MERGED → DONE
 *
 * Any stage may end in FAILED. An AI answer that cannot be used drops the
 * full path back to quick scoring instead of failing.
 */

import {
  AIResponseMalformedError,
  AIUnavailableError,
  DEFAULT_PIPELINE_CONFIG,
  InputInvalidError,
  PreAnalyzer,
  getErrorMessage,
  isSupportedLanguage,
  type Degradation,
  type PipelineConfig,
  type PreAnalysis,
  type SourceUnit,
} from '@critique/core';
import { validateAIReview } from './ai-review.js';
import { ContextBuilder } from './context-builder.js';
import type { Logger } from './logger.js';
import { ResultMerger } from './merger.js';
import { ReviewRun } from './review-run.js';
import type { AIReview, CodeReviewer, FinalReview, ReviewMode } from './types.js';

export interface OrchestratorOptions {
  config?: PipelineConfig;
  /** Required for full reviews */
  reviewer?: CodeReviewer;
  logger?: Logger;
  /** Clock, injected for tests */
  now?: () => number;
}

export interface ReviewOptions {
  mode?: ReviewMode;
}

type AIOutcome =
  | { kind: 'reviewed'; review: AIReview; degradations: Degradation[] }
  | { kind: 'skipped'; degradations: Degradation[] };

export class ReviewOrchestrator {
  private readonly config: PipelineConfig;
  private readonly reviewer?: CodeReviewer;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly preAnalyzer: PreAnalyzer;
  private readonly contextBuilder: ContextBuilder;
  private readonly merger: ResultMerger;

  constructor(opts: OrchestratorOptions = {}) {
    this.config = opts.config ?? DEFAULT_PIPELINE_CONFIG;
    this.reviewer = opts.reviewer;
    this.logger = opts.logger;
    this.now = opts.now ?? Date.now;
    this.preAnalyzer = new PreAnalyzer(this.config);
    this.contextBuilder = new ContextBuilder(this.config);
    this.merger = new ResultMerger(this.config);
  }

  /**
   * Review one source unit.
   *
   * @throws ReviewFailedError with the code and state of the failure
   */
  async review(unit: SourceUnit, opts: ReviewOptions = {}): Promise<FinalReview> {
    const mode = opts.mode ?? 'full';
    const run = new ReviewRun(this.now);

    try {
      this.validateInput(unit, mode);

      const preAnalysis = await this.preAnalyzer.analyze(unit);
      run.transition('PRE_ANALYZED');
      this.logger?.info(
        `Pre-analysis: ${preAnalysis.issues.length} issue(s), ` +
          `${preAnalysis.structure.functionCount} function(s) (${run.elapsedMs()}ms)`,
      );
      for (const note of preAnalysis.degradations) {
        this.logger?.warning(`Pre-analysis degraded at ${note.stage}: ${note.detail}`);
      }

      let aiReview: AIReview | null = null;
      let aiSkipped = false;
      const degradations: Degradation[] = [...preAnalysis.degradations];

      if (mode === 'quick') {
        run.transition('SCORED');
      } else {
        const outcome = await this.runAIReview(run, unit, preAnalysis);
        degradations.push(...outcome.degradations);
        if (outcome.kind === 'reviewed') {
          aiReview = outcome.review;
        } else {
          aiSkipped = true;
        }
      }

      const merged = this.merger.merge(preAnalysis, aiReview);
      run.transition('MERGED');
      run.transition('DONE');

      const processingTimeMs = run.elapsedMs();
      this.logger?.info(`Review complete: score ${merged.score}, ${merged.counts.total} issue(s) (${processingTimeMs}ms)`);

      return Object.freeze({
        source: Object.freeze({
          ...(unit.filename !== undefined ? { filename: unit.filename } : {}),
          language: unit.language,
          size: unit.size,
        }),
        mode,
        preAnalysis,
        aiReview,
        ...merged,
        aiSkipped,
        degradations: Object.freeze(degradations),
        stages: run.stages,
        processingTimeMs,
      });
    } catch (error) {
      const failure = run.fail(error);
      this.logger?.error(`Review failed at ${failure.failedAt}: ${failure.message}`);
      throw failure;
    }
  }

  private validateInput(unit: SourceUnit, mode: ReviewMode): void {
    if (!isSupportedLanguage(unit.language)) {
      throw new InputInvalidError(`Unsupported language '${unit.language}'`, { language: unit.language });
    }
    // Units built by hand may carry any size; the text decides the floor
    const size = Math.max(unit.size, Buffer.byteLength(unit.text, 'utf8'));
    if (size > this.config.maxFileSizeBytes) {
      throw new InputInvalidError(
        `File too large: ${size} bytes (limit ${this.config.maxFileSizeBytes})`,
        { size, limit: this.config.maxFileSizeBytes },
      );
    }
    if (mode === 'full' && !this.reviewer) {
      throw new AIUnavailableError('Full review requested but no AI reviewer is configured');
    }
  }

  private async runAIReview(run: ReviewRun, unit: SourceUnit, preAnalysis: PreAnalysis): Promise<AIOutcome> {
    const context = this.contextBuilder.build(preAnalysis, {
      filename: unit.filename,
      language: unit.language,
      size: unit.size,
    });
    run.transition('CONTEXT_BUILT');
    this.logger?.debug(`Context: ${context.length} chars`);

    let raw: unknown;
    try {
      raw = await this.callReviewer(unit, context);
    } catch (error) {
      if (error instanceof AIResponseMalformedError) {
        return this.skipAI(run, error.message);
      }
      throw error;
    }

    const validation = validateAIReview(raw);
    if (validation.status === 'failure') {
      return this.skipAI(run, validation.problems.join('; '));
    }

    run.transition('AI_REVIEWED');
    const degradations: Degradation[] = [];
    if (validation.status === 'partial') {
      this.logger?.warning(`AI response partially valid: ${validation.problems.length} problem(s)`);
      degradations.push({
        stage: 'ai-review',
        code: 'AI_RESPONSE_MALFORMED',
        detail: validation.problems.join('; '),
      });
    }
    return { kind: 'reviewed', review: validation.review, degradations };
  }

  private skipAI(run: ReviewRun, detail: string): AIOutcome {
    this.logger?.warning(`AI response unusable, falling back to pre-analysis scoring: ${detail}`);
    run.transition('SCORED');
    return {
      kind: 'skipped',
      degradations: [{ stage: 'ai-review', code: 'AI_RESPONSE_MALFORMED', detail }],
    };
  }

  /**
   * Call the reviewer, aborting it when `aiTimeoutSeconds` elapses.
   * Transport failures surface as AIUnavailableError; malformed answers pass through.
   */
  private callReviewer(unit: SourceUnit, context: string): Promise<unknown> {
    const reviewer = this.reviewer;
    if (!reviewer) {
      return Promise.reject(new AIUnavailableError('No AI reviewer is configured'));
    }

    const timeoutSeconds = this.config.aiTimeoutSeconds;
    const controller = new AbortController();

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new AIUnavailableError(`AI review timed out after ${timeoutSeconds}s`, { timeoutSeconds }));
      }, timeoutSeconds * 1000);

      void Promise.resolve()
        .then(() => reviewer.reviewWithContext(context, unit.text, unit.language, { signal: controller.signal }))
        .then(
          value => {
            clearTimeout(timer);
            resolve(value);
          },
          (error: unknown) => {
            clearTimeout(timer);
            if (error instanceof AIResponseMalformedError || error instanceof AIUnavailableError) {
              reject(error);
            } else {
              reject(new AIUnavailableError(`AI reviewer failed: ${getErrorMessage(error)}`));
            }
          },
        );
    });
  }
}
