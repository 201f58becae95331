import { describe, it, expect } from 'vitest';
import {
  AIResponseMalformedError,
  createSourceUnit,
  resolvePipelineConfig,
  type SourceUnit,
} from '@critique/core';
import { ReviewOrchestrator } from '../src/orchestrator.js';
import { ReviewFailedError } from '../src/review-run.js';
import { createMockReviewer, silentLogger } from '../src/test-helpers.js';
import type { Logger } from '../src/logger.js';

const unit = createSourceUnit({ text: 'print("hi")\n', language: 'python', filename: 'hello.py' });

function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: message => lines.push(`info: ${message}`),
    warning: message => lines.push(`warning: ${message}`),
    error: message => lines.push(`error: ${message}`),
    debug: () => {},
  };
}

async function reviewFailure(promise: Promise<unknown>): Promise<ReviewFailedError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ReviewFailedError) return error;
    throw error;
  }
  throw new Error('expected the review to fail');
}

describe('ReviewOrchestrator', () => {
  describe('quick mode', () => {
    it('should score pre-analysis issues without calling the reviewer', async () => {
      const reviewer = createMockReviewer(() => ({ summary: 'unused' }));
      const orchestrator = new ReviewOrchestrator({ reviewer, logger: silentLogger });

      const review = await orchestrator.review(unit, { mode: 'quick' });

      expect(reviewer.calls).toHaveLength(0);
      expect(review.mode).toBe('quick');
      expect(review.stages).toEqual(['RECEIVED', 'PRE_ANALYZED', 'SCORED', 'MERGED', 'DONE']);
      expect(review.issues.map(i => [i.category, i.line])).toEqual([['DEBUG_OUTPUT', 1]]);
      expect(review.score).toBe(99);
      expect(review.aiReview).toBeNull();
      expect(review.aiSkipped).toBe(false);
      expect(review.source).toEqual({ filename: 'hello.py', language: 'python', size: 12 });
      expect(Object.isFrozen(review)).toBe(true);
    });

    it('should not need a reviewer', async () => {
      const review = await new ReviewOrchestrator().review(unit, { mode: 'quick' });
      expect(review.score).toBe(99);
    });
  });

  describe('full mode', () => {
    it('should merge the AI review into the result', async () => {
      const reviewer = createMockReviewer(() => ({
        validated_issues: [{ line: 1, type: 'DEBUG_OUTPUT', recommendation: 'Use logging' }],
        new_findings: [{ line: 1, severity: 'low', type: 'style', message: 'Greeting is hard-coded' }],
        summary: 'Small script',
      }));
      const orchestrator = new ReviewOrchestrator({ reviewer, logger: silentLogger });

      const review = await orchestrator.review(unit);

      expect(review.stages).toEqual([
        'RECEIVED',
        'PRE_ANALYZED',
        'CONTEXT_BUILT',
        'AI_REVIEWED',
        'MERGED',
        'DONE',
      ]);
      expect(review.issues.map(i => [i.category, i.source, i.aiValidated])).toEqual([
        ['DEBUG_OUTPUT', 'PRE_ANALYSIS', true],
        ['LLM_FINDING', 'AI', undefined],
      ]);
      expect(review.issues[0]?.recommendation).toBe('Use logging');
      expect(review.score).toBe(98);
      expect(review.aiReview?.summary).toBe('Small script');
      expect(review.degradations).toEqual([]);
    });

    it('should hand the reviewer the context, the source and an abort signal', async () => {
      const reviewer = createMockReviewer(() => ({ summary: 'ok' }));

      await new ReviewOrchestrator({ reviewer }).review(unit);

      const call = reviewer.calls[0];
      expect(call?.contextText.startsWith('# Pre-analysis context\n\n## File\n- Filename: hello.py')).toBe(true);
      expect(call?.sourceText).toBe('print("hi")\n');
      expect(call?.language).toBe('python');
      expect(call?.signal).toBeInstanceOf(AbortSignal);
    });

    it('should fall back to pre-analysis scoring when the answer is malformed', async () => {
      const reviewer = createMockReviewer(() => {
        throw new AIResponseMalformedError('AI response contained no recoverable JSON object');
      });

      const review = await new ReviewOrchestrator({ reviewer }).review(unit);

      expect(review.aiSkipped).toBe(true);
      expect(review.aiReview).toBeNull();
      expect(review.stages).toEqual(['RECEIVED', 'PRE_ANALYZED', 'CONTEXT_BUILT', 'SCORED', 'MERGED', 'DONE']);
      expect(review.score).toBe(99);
      expect(review.degradations).toEqual([
        {
          stage: 'ai-review',
          code: 'AI_RESPONSE_MALFORMED',
          detail: 'AI response contained no recoverable JSON object',
        },
      ]);
    });

    it('should fall back when the payload fails validation', async () => {
      const reviewer = createMockReviewer(() => 'just text');

      const review = await new ReviewOrchestrator({ reviewer }).review(unit);

      expect(review.aiSkipped).toBe(true);
      expect(review.degradations).toEqual([
        { stage: 'ai-review', code: 'AI_RESPONSE_MALFORMED', detail: 'AI response is not a JSON object' },
      ]);
    });

    it('should merge a partially valid payload and record what was dropped', async () => {
      const reviewer = createMockReviewer(() => ({ summary: 'Mostly fine', new_findings: [{ line: 2 }] }));

      const review = await new ReviewOrchestrator({ reviewer }).review(unit);

      expect(review.aiSkipped).toBe(false);
      expect(review.stages).toContain('AI_REVIEWED');
      expect(review.aiReview?.summary).toBe('Mostly fine');
      expect(review.degradations).toEqual([
        { stage: 'ai-review', code: 'AI_RESPONSE_MALFORMED', detail: 'new_findings[0]: missing message' },
      ]);
    });

    it('should fail with AI_UNAVAILABLE when the reviewer times out', async () => {
      const reviewer = createMockReviewer(() => new Promise(() => {}));
      const config = resolvePipelineConfig({ aiTimeoutSeconds: 0.01 });

      const failure = await reviewFailure(new ReviewOrchestrator({ config, reviewer }).review(unit));

      expect(failure.code).toBe('AI_UNAVAILABLE');
      expect(failure.failedAt).toBe('CONTEXT_BUILT');
      expect(failure.message).toBe('AI review timed out after 0.01s');
      expect(reviewer.calls[0]?.signal?.aborted).toBe(true);
    });

    it('should fail with AI_UNAVAILABLE when the reviewer call fails', async () => {
      const reviewer = createMockReviewer(() => {
        throw new Error('connection reset');
      });
      const logger = recordingLogger();

      const failure = await reviewFailure(new ReviewOrchestrator({ reviewer, logger }).review(unit));

      expect(failure.code).toBe('AI_UNAVAILABLE');
      expect(failure.message).toBe('AI reviewer failed: connection reset');
      expect(logger.lines.at(-1)).toBe('error: Review failed at CONTEXT_BUILT: AI reviewer failed: connection reset');
    });

    it('should fail when no reviewer is configured', async () => {
      const failure = await reviewFailure(new ReviewOrchestrator().review(unit));

      expect(failure.code).toBe('AI_UNAVAILABLE');
      expect(failure.failedAt).toBe('RECEIVED');
    });
  });

  describe('input validation', () => {
    it('should reject oversized input before pre-analysis', async () => {
      const config = resolvePipelineConfig({ maxFileSizeBytes: 10 });
      const big = createSourceUnit({ text: 'x = 1', language: 'python', size: 20 });

      const failure = await reviewFailure(new ReviewOrchestrator({ config }).review(big, { mode: 'quick' }));

      expect(failure.code).toBe('INPUT_INVALID');
      expect(failure.failedAt).toBe('RECEIVED');
      expect(failure.message).toBe('File too large: 20 bytes (limit 10)');
    });

    it('should measure the text when the declared size understates it', async () => {
      const config = resolvePipelineConfig({ maxFileSizeBytes: 100 });
      const understated: SourceUnit = { text: 'x = 1\n'.repeat(1000), language: 'python', size: 10 };

      const failure = await reviewFailure(new ReviewOrchestrator({ config }).review(understated, { mode: 'quick' }));

      expect(failure.code).toBe('INPUT_INVALID');
      expect(failure.failedAt).toBe('RECEIVED');
      expect(failure.message).toBe('File too large: 6000 bytes (limit 100)');
    });
  });

  it('should log stage timings from the injected clock', async () => {
    const logger = recordingLogger();
    let tick = 0;
    const orchestrator = new ReviewOrchestrator({ logger, now: () => (tick += 5) });

    const review = await orchestrator.review(unit, { mode: 'quick' });

    expect(review.processingTimeMs).toBe(10);
    expect(logger.lines).toEqual([
      'info: Pre-analysis: 1 issue(s), 0 function(s) (5ms)',
      'info: Review complete: score 99, 1 issue(s) (10ms)',
    ]);
  });
});
