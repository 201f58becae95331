import { describe, it, expect } from 'vitest';
import { DEFAULT_PIPELINE_CONFIG, resolvePipelineConfig } from './config.js';
import { ConfigError } from './errors/index.js';

describe('resolvePipelineConfig', () => {
  it('should fill defaults', () => {
    expect(resolvePipelineConfig()).toEqual({
      complexityThreshold: 10,
      longLineThreshold: 120,
      longFunctionThreshold: 50,
      issueDisplayCap: 20,
      aiTimeoutSeconds: 60,
      scoreWeights: { critical: 15, medium: 5, low: 1 },
      maxFileSizeBytes: 5 * 1024 * 1024,
    });
  });

  it('should merge partial score weights with defaults', () => {
    const config = resolvePipelineConfig({ scoreWeights: { critical: 20 } });

    expect(config.scoreWeights).toEqual({ critical: 20, medium: 5, low: 1 });
  });

  it('should drop unknown keys', () => {
    const config = resolvePipelineConfig({ complexityThreshold: 8, colour: 'blue' });

    expect(config.complexityThreshold).toBe(8);
    expect('colour' in config).toBe(false);
  });

  it('should throw ConfigError naming the invalid field', () => {
    expect(() => resolvePipelineConfig({ complexityThreshold: -1 })).toThrow(ConfigError);
    expect(() => resolvePipelineConfig({ complexityThreshold: -1 })).toThrow(/complexityThreshold/);
  });

  it('should cap the AI timeout at what a timer can hold', () => {
    expect(resolvePipelineConfig({ aiTimeoutSeconds: 2_147_483 }).aiTimeoutSeconds).toBe(2_147_483);
    expect(() => resolvePipelineConfig({ aiTimeoutSeconds: 3_000_000 })).toThrow(/aiTimeoutSeconds/);
  });

  it('should freeze the snapshot', () => {
    expect(Object.isFrozen(DEFAULT_PIPELINE_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_PIPELINE_CONFIG.scoreWeights)).toBe(true);
  });
});
