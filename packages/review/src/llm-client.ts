/**
 * Instance-based LLM client wrapping OpenRouter.
 *
 * Features:
 * - Per-instance token usage tracking (no global state)
 * - Per-call timeout via AbortSignal
 * - Per-instance token budget enforcement
 */

import { z } from 'zod';
import { AIUnavailableError, getErrorMessage } from '@critique/core';
import type { LLMClient, LLMOptions, LLMResponse, TokenUsage } from './types.js';
import type { Logger } from './logger.js';

export const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';

/** Models known to support OpenRouter's extended reasoning parameter */
const REASONING_MODELS = /deepseek|minimax|o1|o3|qwq/i;

/** Default timeout per LLM call (reasoning models need more time) */
const DEFAULT_TIMEOUT_MS = 120_000;

const DEFAULT_MAX_TOKENS = 8192;

/**
 * OpenRouter API response structure.
 * Cost is returned in usage.cost when usage accounting is enabled.
 */
const openRouterResponseSchema = z.object({
  id: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string().nullable().optional(),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
      cost: z.number().optional(),
    })
    .optional(),
});

export interface OpenRouterLLMClientOptions {
  apiKey: string;
  model: string;
  /** Maximum total tokens across all calls (budget enforcement) */
  maxTotalTokens?: number;
  /** Default timeout per call in ms */
  timeoutMs?: number;
  /** System message sent before every prompt */
  systemPrompt?: string;
  logger?: Logger;
  /** Injected for tests */
  fetch?: typeof fetch;
}

/**
 * Instance-based LLM client backed by OpenRouter.
 */
export class OpenRouterLLMClient implements LLMClient {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTotalTokens: number;
  private readonly timeoutMs: number;
  private readonly systemPrompt?: string;
  private readonly logger?: Logger;
  private readonly fetchImpl: typeof fetch;

  private usage: TokenUsage = {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    cost: 0,
  };

  constructor(opts: OpenRouterLLMClientOptions) {
    this.apiKey = opts.apiKey;
    this.model = opts.model;
    this.maxTotalTokens = opts.maxTotalTokens ?? Infinity;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.systemPrompt = opts.systemPrompt;
    this.logger = opts.logger;
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async complete(prompt: string, opts?: LLMOptions): Promise<LLMResponse> {
    if (this.usage.totalTokens >= this.maxTotalTokens) {
      throw new AIUnavailableError(
        `Token budget exceeded: ${this.usage.totalTokens} >= ${this.maxTotalTokens}`,
      );
    }

    const supportsReasoning = REASONING_MODELS.test(this.model);

    // Build AbortSignal: caller-provided or timeout-based
    const signal = opts?.signal ?? AbortSignal.timeout(this.timeoutMs);

    const messages = [
      ...(this.systemPrompt ? [{ role: 'system', content: this.systemPrompt }] : []),
      { role: 'user', content: prompt },
    ];

    let response: Response;
    try {
      response = await this.fetchImpl(OPENROUTER_API_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'X-Title': 'Critique',
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: opts?.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: opts?.temperature ?? 0.3,
          ...(supportsReasoning ? { reasoning: { effort: 'high' } } : {}),
          usage: { include: true },
        }),
        signal,
      });
    } catch (error) {
      const aborted = signal.aborted;
      throw new AIUnavailableError(
        aborted ? 'OpenRouter request timed out or was aborted' : `OpenRouter request failed: ${getErrorMessage(error)}`,
        { model: this.model, aborted },
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new AIUnavailableError(`OpenRouter API error (${response.status}): ${errorText}`, {
        status: response.status,
        model: this.model,
      });
    }

    const parsed = openRouterResponseSchema.safeParse(await response.json());
    if (!parsed.success || parsed.data.choices.length === 0) {
      throw new AIUnavailableError('No response from OpenRouter', { model: this.model });
    }
    const data = parsed.data;

    let usage: TokenUsage | undefined;
    if (data.usage) {
      usage = {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
        totalTokens: data.usage.total_tokens,
        cost: data.usage.cost ?? 0,
      };
      this.usage.promptTokens += usage.promptTokens;
      this.usage.completionTokens += usage.completionTokens;
      this.usage.totalTokens += usage.totalTokens;
      this.usage.cost += usage.cost;

      const costStr = data.usage.cost ? ` ($${data.usage.cost.toFixed(6)})` : '';
      this.logger?.info(
        `LLM tokens: ${usage.promptTokens} in, ${usage.completionTokens} out${costStr}`,
      );
    }

    return {
      content: data.choices[0].message.content ?? '',
      ...(usage ? { usage } : {}),
    };
  }

  getUsage(): TokenUsage {
    return { ...this.usage };
  }
}
