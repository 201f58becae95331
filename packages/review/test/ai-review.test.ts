import { describe, it, expect } from 'vitest';
import {
  emptyAIReview,
  issueIdentity,
  normalizeCategory,
  normalizeMessagePrefix,
  normalizeSeverity,
  validateAIReview,
} from '../src/ai-review.js';

describe('normalizeSeverity', () => {
  it('should map severity words onto the three levels', () => {
    expect(normalizeSeverity('High')).toBe('CRITICAL');
    expect(normalizeSeverity(' moderate ')).toBe('MEDIUM');
    expect(normalizeSeverity('info')).toBe('LOW');
    expect(normalizeSeverity('minor')).toBe('LOW');
  });

  it('should return null for unknown words', () => {
    expect(normalizeSeverity('urgent')).toBeNull();
  });
});

describe('normalizeCategory', () => {
  it('should accept category names in any case and spacing', () => {
    expect(normalizeCategory('SQL Injection')).toBe('SQL_INJECTION');
    expect(normalizeCategory('long-function')).toBe('LONG_FUNCTION');
  });

  it('should map known aliases', () => {
    expect(normalizeCategory('hardcoded_secret')).toBe('SECRET');
    expect(normalizeCategory('print statement')).toBe('DEBUG_OUTPUT');
  });

  it('should return null for labels that name no category', () => {
    expect(normalizeCategory('race condition')).toBeNull();
    expect(normalizeCategory('LLM_FINDING')).toBeNull();
  });
});

describe('normalizeMessagePrefix', () => {
  it('should lower-case, collapse punctuation and cut to 40 characters', () => {
    expect(normalizeMessagePrefix('Possible hardcoded credential in API_KEY!')).toBe(
      'possible hardcoded credential in api key',
    );
    expect(normalizeMessagePrefix('x'.repeat(50))).toHaveLength(40);
  });

  it('should key identities on the line, or on the prefix when there is none', () => {
    expect(issueIdentity({ category: 'TODO_COMMENT', line: 3, message: 'TODO: fix' })).toBe('TODO_COMMENT|3');
    expect(issueIdentity({ category: 'LLM_FINDING', message: 'No tests' })).toBe('LLM_FINDING|-|no tests');
  });
});

describe('validateAIReview', () => {
  it('should fail on a non-object payload', () => {
    expect(validateAIReview('text')).toEqual({
      status: 'failure',
      problems: ['AI response is not a JSON object'],
    });
    expect(validateAIReview([1])).toEqual({
      status: 'failure',
      problems: ['AI response is not a JSON object'],
    });
  });

  it('should fail when none of the review fields are present', () => {
    expect(validateAIReview({ foo: 1 })).toEqual({
      status: 'failure',
      problems: ['AI response has none of the expected fields'],
    });
  });

  it('should validate a complete payload', () => {
    const result = validateAIReview({
      validated_issues: [{ line: 2, type: 'SECRET', message: 'Real key', recommendation: 'Use env' }],
      false_positives: [{ line: 5, type: 'debug_output', reason: 'CLI tool' }],
      new_findings: [{ line: 9, severity: 'high', type: 'race condition', message: 'Shared counter' }],
      summary: ' Decent ',
      score: 72,
      strengths: ['Clear names'],
      key_improvements: ['Move secrets'],
    });

    expect(result).toEqual({
      status: 'success',
      review: {
        validatedIssues: [{ category: 'SECRET', line: 2, message: 'Real key', recommendation: 'Use env' }],
        falsePositives: [{ category: 'DEBUG_OUTPUT', line: 5, reason: 'CLI tool' }],
        newFindings: [
          { category: 'LLM_FINDING', severity: 'CRITICAL', line: 9, message: 'Shared counter', source: 'AI' },
        ],
        summary: 'Decent',
        score: 72,
        recommendations: ['Move secrets'],
        strengths: ['Clear names'],
      },
    });
  });

  it('should keep valid entries and report the rest as partial', () => {
    const result = validateAIReview({
      new_findings: [
        { line: 3, severity: 'urgent', message: 'Unbounded retry' },
        { line: 4 },
      ],
      false_positives: [{ type: 'SECRET' }],
      validated_issues: 'oops',
    });

    expect(result.status).toBe('partial');
    if (result.status !== 'partial') return;
    expect(result.review.newFindings).toEqual([
      { category: 'LLM_FINDING', severity: 'MEDIUM', line: 3, message: 'Unbounded retry', source: 'AI' },
    ]);
    expect(result.review.falsePositives).toEqual([]);
    expect(result.review.validatedIssues).toEqual([]);
    expect(result.problems).toEqual([
      'validated_issues: expected an array',
      'false_positives[0]: needs a line or a message',
      "new_findings[0]: unknown severity 'urgent', using MEDIUM",
      'new_findings[1]: missing message',
    ]);
  });

  it('should coerce numeric strings and drop non-positive lines', () => {
    const result = validateAIReview({
      new_findings: [
        { line: '12', severity: 'low', message: 'Magic number' },
        { line: 0, severity: 'low', message: 'Module docstring missing' },
      ],
      score: '85',
    });

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.review.newFindings.map(f => f.line)).toEqual([12, undefined]);
    expect(result.review.score).toBe(85);
  });

  it('should report an out-of-range score without failing', () => {
    const result = validateAIReview({ summary: 'ok', score: 150 });

    expect(result).toEqual({
      status: 'partial',
      review: { ...emptyAIReview(), summary: 'ok' },
      problems: ['score: expected a number between 0 and 100'],
    });
  });

  it('should report entries whose fields have the wrong type', () => {
    const result = validateAIReview({ new_findings: [{ line: 1, message: 123 }] });

    expect(result.status).toBe('partial');
    if (result.status !== 'partial') return;
    expect(result.review.newFindings).toEqual([]);
    expect(result.problems).toHaveLength(1);
    expect(result.problems[0]).toMatch(/^new_findings\[0\]: message: /);
  });
});
