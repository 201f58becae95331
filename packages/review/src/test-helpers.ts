/**
 * Test harness for the review pipeline.
 *
 * Provides factory functions for pre-analysis fixtures and mock LLM
 * collaborators without network calls.
 */

import {
  emptyComplexity,
  emptyPatterns,
  emptyStructure,
  type Issue,
  type Language,
  type PreAnalysis,
} from '@critique/core';
import type { Logger } from './logger.js';
import type {
  CodeReviewer,
  LLMClient,
  LLMOptions,
  LLMResponse,
  ReviewCallOptions,
} from './types.js';

/**
 * A no-op logger for tests. Swallows all output.
 */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Create a pre-analysis issue with sensible defaults.
 */
export function createTestIssue(overrides?: Partial<Issue>): Issue {
  return {
    category: 'DEBUG_OUTPUT',
    severity: 'LOW',
    line: 1,
    message: 'Debug output statement; prefer a logger',
    source: 'PRE_ANALYSIS',
    ...overrides,
  };
}

/**
 * Create a valid PreAnalysis with empty results.
 * Override any field via the overrides parameter.
 */
export function createTestPreAnalysis(overrides?: Partial<PreAnalysis>): PreAnalysis {
  return {
    structure: { ...emptyStructure(), confidence: 'high' },
    complexity: emptyComplexity(10),
    patterns: emptyPatterns(),
    issues: [],
    degradations: [],
    ...overrides,
  };
}

/**
 * Create a mock LLM client that returns predefined responses.
 *
 * @param responses - Queue of responses to return. If exhausted, returns a default response.
 */
export function createMockLLMClient(
  responses: (string | LLMResponse)[] = [],
): LLMClient & { calls: Array<{ prompt: string; opts?: LLMOptions }> } {
  const queue = [...responses];
  const calls: Array<{ prompt: string; opts?: LLMOptions }> = [];

  const usage = {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    cost: 0,
  };

  return {
    calls,
    async complete(prompt: string, opts?: LLMOptions): Promise<LLMResponse> {
      calls.push({ prompt, opts });

      const next = queue.shift();
      if (next === undefined) {
        return { content: '{}' };
      }

      const response: LLMResponse = typeof next === 'string' ? { content: next } : next;
      if (response.usage) {
        usage.promptTokens += response.usage.promptTokens;
        usage.completionTokens += response.usage.completionTokens;
        usage.totalTokens += response.usage.totalTokens;
        usage.cost += response.usage.cost;
      }
      return response;
    },
    getUsage() {
      return { ...usage };
    },
  };
}

export interface MockReviewerCall {
  contextText: string;
  sourceText: string;
  language: Language;
  signal?: AbortSignal;
}

/**
 * Create a mock CodeReviewer.
 *
 * @param respond - Produces the payload for each call (may throw or never settle)
 */
export function createMockReviewer(
  respond: (call: MockReviewerCall) => unknown,
): CodeReviewer & { calls: MockReviewerCall[] } {
  const calls: MockReviewerCall[] = [];
  return {
    calls,
    async reviewWithContext(
      contextText: string,
      sourceText: string,
      language: Language,
      opts?: ReviewCallOptions,
    ): Promise<unknown> {
      const call: MockReviewerCall = { contextText, sourceText, language, signal: opts?.signal };
      calls.push(call);
      return respond(call);
    },
  };
}
