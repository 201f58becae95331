/**
 * Config module for .critique/review.yml parsing.
 *
 * Owns the file format, validation, and loading.
 * Sensible defaults when no config file exists.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { ConfigError, getErrorMessage, resolvePipelineConfig, type PipelineConfig } from '@critique/core';

// ---------------------------------------------------------------------------
// Config Schema
// ---------------------------------------------------------------------------

export const DEFAULT_MODEL = 'minimax/minimax-m2.5';

const llmConfigSchema = z
  .object({
    provider: z.literal('openrouter').default('openrouter'),
    model: z.string().min(1).default(DEFAULT_MODEL),
    apiKey: z.string().optional(),
  })
  .default({});

const reviewConfigSchema = z.object({
  llm: llmConfigSchema,
  // Validated by resolvePipelineConfig
  pipeline: z.record(z.string(), z.unknown()).default({}),
});

export interface LLMSettings {
  provider: 'openrouter';
  model: string;
  apiKey?: string;
}

export interface ReviewYamlConfig {
  llm: LLMSettings;
  pipeline: PipelineConfig;
}

// ---------------------------------------------------------------------------
// Config Loading
// ---------------------------------------------------------------------------

const CONFIG_FILENAME = 'review.yml';
const CONFIG_DIR = '.critique';

/**
 * Resolve the config file path from a root directory.
 */
export function resolveConfigPath(rootDir: string): string {
  return path.join(rootDir, CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Interpolate environment variables in strings.
 * Supports ${VAR_NAME} syntax; unset variables become empty strings.
 */
export function interpolateEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(/\$\{(\w+)\}/g, (_, varName: string) => env[varName] ?? '');
}

/**
 * Deep-interpolate environment variables in an object.
 */
function interpolateConfig(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map(item => interpolateConfig(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateConfig(value, env);
    }
    return result;
  }
  return obj;
}

function toConfig(raw: unknown, source: string): ReviewYamlConfig {
  const result = reviewConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config in ${source}:\n${issues}`, { path: source });
  }

  let pipeline: PipelineConfig;
  try {
    pipeline = resolvePipelineConfig(result.data.pipeline);
  } catch (error) {
    throw new ConfigError(`Invalid config in ${source}: ${getErrorMessage(error)}`, { path: source });
  }

  const { apiKey, ...llm } = result.data.llm;
  return { llm: apiKey ? { ...llm, apiKey } : llm, pipeline };
}

/**
 * Load and parse .critique/review.yml.
 * Returns defaults when no config file exists or the file is empty.
 *
 * @throws ConfigError when the file cannot be parsed or holds invalid values
 */
export function loadConfig(rootDir: string, env: NodeJS.ProcessEnv = process.env): ReviewYamlConfig {
  const configPath = resolveConfigPath(rootDir);

  if (!fs.existsSync(configPath)) {
    return toConfig({}, configPath);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${getErrorMessage(error)}`, {
      path: configPath,
    });
  }

  if (!parsed || typeof parsed !== 'object') {
    return toConfig({}, configPath);
  }

  // Interpolate env vars (e.g., ${OPENROUTER_API_KEY})
  return toConfig(interpolateConfig(parsed, env), configPath);
}

/**
 * Resolve the LLM API key from config or environment.
 */
export function resolveLLMApiKey(
  config: ReviewYamlConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  // Config value (may have been interpolated from env var)
  if (config.llm.apiKey) return config.llm.apiKey;

  // Fall back to env var
  return env.OPENROUTER_API_KEY || undefined;
}
