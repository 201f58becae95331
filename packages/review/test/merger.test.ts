import { describe, it, expect } from 'vitest';
import { resolvePipelineConfig, type Issue } from '@critique/core';
import { emptyAIReview } from '../src/ai-review.js';
import { ResultMerger, computeScore, mergeKey, resolveReference } from '../src/merger.js';
import { createTestIssue } from '../src/test-helpers.js';
import type { AIReview } from '../src/types.js';

function aiReview(overrides: Partial<AIReview>): AIReview {
  return { ...emptyAIReview(), ...overrides };
}

function aiFinding(overrides: Partial<Issue>): Issue {
  return createTestIssue({ category: 'LLM_FINDING', severity: 'MEDIUM', source: 'AI', ...overrides });
}

const secret = createTestIssue({
  category: 'SECRET',
  severity: 'CRITICAL',
  line: 2,
  message: 'Possible hardcoded credential in API_KEY',
});
const debug = createTestIssue({ category: 'DEBUG_OUTPUT', severity: 'LOW', line: 5 });

describe('computeScore', () => {
  it('should subtract weighted severity counts from 100', () => {
    const weights = { critical: 15, medium: 5, low: 1 };
    expect(computeScore({ critical: 2, medium: 1, low: 0, total: 3 }, weights)).toBe(65);
  });

  it('should clamp at 0', () => {
    const weights = { critical: 15, medium: 5, low: 1 };
    expect(computeScore({ critical: 7, medium: 0, low: 0, total: 7 }, weights)).toBe(0);
  });
});

describe('mergeKey', () => {
  it('should include the message prefix only for issues without a line', () => {
    expect(mergeKey(debug)).toBe('DEBUG_OUTPUT|5|PRE_ANALYSIS');
    expect(mergeKey(aiFinding({ line: undefined, message: 'No tests' }))).toBe('LLM_FINDING|-|no tests|AI');
  });
});

describe('resolveReference', () => {
  it('should match on category and line', () => {
    expect(resolveReference({ category: 'SECRET', line: 2 }, [secret, debug])).toEqual([secret]);
    expect(resolveReference({ category: 'SECRET', line: 3 }, [secret, debug])).toEqual([]);
  });

  it('should need the message prefix for issues without a line', () => {
    const lineless = createTestIssue({ category: 'LONG_FUNCTION', line: undefined, message: 'Too long' });
    expect(resolveReference({ category: 'LONG_FUNCTION', message: 'too long!' }, [lineless])).toEqual([lineless]);
    expect(resolveReference({ category: 'LONG_FUNCTION', message: 'other' }, [lineless])).toEqual([]);
  });

  it('should resolve a reference without category when its line holds one issue', () => {
    expect(resolveReference({ line: 5 }, [secret, debug])).toEqual([debug]);
  });

  it('should use the message prefix when several issues share the line', () => {
    const todo = createTestIssue({ category: 'TODO_COMMENT', line: 5, message: 'Unfinished work marker (TODO)' });
    expect(resolveReference({ line: 5 }, [debug, todo])).toEqual([]);
    expect(resolveReference({ line: 5, message: 'Unfinished work marker (TODO)' }, [debug, todo])).toEqual([todo]);
  });
});

describe('ResultMerger', () => {
  const merger = new ResultMerger();

  it('should score 2 CRITICAL and 1 MEDIUM issues at 65', () => {
    const issues = [
      secret,
      createTestIssue({ category: 'SQL_INJECTION', severity: 'CRITICAL', line: 9 }),
      createTestIssue({ category: 'BARE_EXCEPT', severity: 'MEDIUM', line: 12 }),
    ];

    const result = merger.merge({ issues }, null);

    expect(result.score).toBe(65);
    expect(result.counts).toEqual({ critical: 2, medium: 1, low: 0, total: 3 });
  });

  it('should honor configured score weights', () => {
    const weighted = new ResultMerger(resolvePipelineConfig({ scoreWeights: { critical: 50 } }));
    expect(weighted.merge({ issues: [secret] }, null).score).toBe(50);
  });

  it('should drop duplicate pre-analysis issues', () => {
    const result = merger.merge({ issues: [debug, { ...debug }] }, null);
    expect(result.issues).toHaveLength(1);
    expect(result.statistics.preAnalysisFound).toBe(1);
  });

  it('should remove false positives from issues and counts', () => {
    const result = merger.merge(
      { issues: [secret, debug] },
      aiReview({ falsePositives: [{ category: 'DEBUG_OUTPUT', line: 5, reason: 'CLI tool' }] }),
    );

    expect(result.issues).toEqual([secret]);
    expect(result.counts).toEqual({ critical: 1, medium: 0, low: 0, total: 1 });
    expect(result.score).toBe(85);
    expect(result.statistics.falsePositivesRemoved).toBe(1);
  });

  it('should mark validated issues without mutating the input', () => {
    const input = [secret];
    const result = merger.merge(
      { issues: input },
      aiReview({ validatedIssues: [{ category: 'SECRET', line: 2, recommendation: 'Load it from the environment' }] }),
    );

    expect(result.issues).toEqual([
      { ...secret, aiValidated: true, recommendation: 'Load it from the environment' },
    ]);
    expect(input[0]).toBe(secret);
    expect(secret.aiValidated).toBeUndefined();
    expect(result.statistics.validatedByAI).toBe(1);
  });

  it('should count references that match nothing', () => {
    const result = merger.merge(
      { issues: [secret] },
      aiReview({
        validatedIssues: [{ category: 'SQL_INJECTION', line: 40 }],
        falsePositives: [{ line: 99 }],
      }),
    );

    expect(result.issues).toEqual([secret]);
    expect(result.statistics.unresolvedReferences).toBe(2);
  });

  it('should keep the pre-analysis issue when an AI finding duplicates it', () => {
    const result = merger.merge(
      { issues: [secret] },
      aiReview({
        newFindings: [aiFinding({ category: 'SECRET', line: 2, severity: 'LOW', message: 'Key in source' })],
      }),
    );

    expect(result.issues).toEqual([secret]);
    expect(result.statistics.duplicatesDropped).toBe(1);
    expect(result.statistics.aiFound).toBe(0);
  });

  it('should keep the first of repeated AI findings on the same line', () => {
    const result = merger.merge(
      { issues: [] },
      aiReview({
        newFindings: [aiFinding({ line: 3, message: 'First' }), aiFinding({ line: 3, message: 'Second' })],
      }),
    );

    expect(result.issues.map(i => i.message)).toEqual(['First']);
  });

  it('should keep distinct AI findings without a line', () => {
    const result = merger.merge(
      { issues: [] },
      aiReview({
        newFindings: [
          aiFinding({ line: undefined, message: 'No tests for the parser' }),
          aiFinding({ line: undefined, message: 'Module does too much' }),
        ],
      }),
    );

    expect(result.issues).toHaveLength(2);
    expect(result.statistics.aiFound).toBe(2);
  });

  it('should order by severity then line with missing lines last', () => {
    const result = merger.merge(
      { issues: [debug] },
      aiReview({
        newFindings: [
          aiFinding({ line: undefined, severity: 'MEDIUM', message: 'No input validation' }),
          aiFinding({ line: 10, severity: 'CRITICAL', message: 'Command injection' }),
          aiFinding({ line: 1, severity: 'MEDIUM', message: 'Unbounded loop' }),
        ],
      }),
    );

    expect(result.issues.map(i => [i.severity, i.line])).toEqual([
      ['CRITICAL', 10],
      ['MEDIUM', 1],
      ['MEDIUM', undefined],
      ['LOW', 5],
    ]);
  });

  it('should leave a merged result unchanged when merged again with an empty review', () => {
    const first = merger.merge(
      { issues: [secret, debug] },
      aiReview({
        validatedIssues: [{ category: 'SECRET', line: 2 }],
        newFindings: [aiFinding({ line: 7, message: 'Shared state' })],
      }),
    );

    const second = merger.merge(first, emptyAIReview());

    expect(second.issues).toEqual(first.issues);
    expect(second.score).toBe(first.score);
    expect(second.counts).toEqual(first.counts);
  });

  it('should return a frozen result', () => {
    const result = merger.merge({ issues: [debug] }, null);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.issues)).toBe(true);
  });
});
