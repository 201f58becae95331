import { AIResponseMalformedError, type Language } from '@critique/core';
import { recoverJSONObject } from './json-utils.js';
import type { Logger } from './logger.js';
import { buildReviewPrompt } from './prompt.js';
import type { CodeReviewer, LLMClient, ReviewCallOptions } from './types.js';

/** Characters of the raw answer kept in a malformed-response error */
const RAW_EXCERPT_LENGTH = 500;

export interface LLMCodeReviewerOptions {
  llm: LLMClient;
  logger?: Logger;
  maxTokens?: number;
  temperature?: number;
}

/**
 * CodeReviewer backed by an LLMClient: builds the prompt, sends it and
 * recovers the JSON object from the answer.
 */
export class LLMCodeReviewer implements CodeReviewer {
  constructor(private readonly opts: LLMCodeReviewerOptions) {}

  async reviewWithContext(
    contextText: string,
    sourceText: string,
    language: Language,
    callOpts?: ReviewCallOptions,
  ): Promise<unknown> {
    const prompt = buildReviewPrompt(contextText, sourceText, language);
    this.opts.logger?.debug(`Review prompt: ${prompt.length} chars`);

    const response = await this.opts.llm.complete(prompt, {
      maxTokens: this.opts.maxTokens,
      temperature: this.opts.temperature,
      signal: callOpts?.signal,
    });

    const payload = recoverJSONObject(response.content);
    if (!payload) {
      this.opts.logger?.warning(`Could not parse review response (${response.content.length} chars)`);
      throw new AIResponseMalformedError('AI response contained no recoverable JSON object', {
        excerpt: response.content.slice(0, RAW_EXCERPT_LENGTH),
      });
    }
    return payload;
  }
}
