import type { PipelineConfig } from '../config.js';
import { DEFAULT_PIPELINE_CONFIG } from '../config.js';
import { getErrorMessage } from '../errors/index.js';
import {
  PATTERN_CATEGORIES,
  type ComplexityInfo,
  type Degradation,
  type PatternCategory,
  type PatternInfo,
  type PipelineStage,
  type PreAnalysis,
  type SourceUnit,
  type StructureInfo,
} from '../types.js';
import { ComplexityScorer } from './complexity.js';
import { IssueDetector, type IssueDetection } from './issues.js';
import { PatternDetector } from './patterns.js';
import { StructureExtractor, emptyStructure } from './structure.js';
import { splitLines } from './text.js';

export function emptyComplexity(threshold: number): ComplexityInfo {
  return { functions: [], average: 0, max: 0, high: [], threshold };
}

export function emptyPatterns(): PatternInfo {
  const none = { count: 0, lines: [] };
  return {
    API_ENDPOINT: none,
    DB_QUERY: none,
    FILE_IO: none,
    NETWORK_CALL: none,
    AUTH: none,
  };
}

/**
 * PreAnalyzer — runs the four heuristic components over one source unit.
 *
 * Structure, patterns and issues start together; complexity waits for
 * structure. A component that fails contributes an empty result and an
 * ANALYSIS_DEGRADED note instead of failing the whole analysis.
 */
export class PreAnalyzer {
  private readonly structure = new StructureExtractor();
  private readonly complexity: ComplexityScorer;
  private readonly patterns: PatternDetector;
  private readonly issues: IssueDetector;

  constructor(
    private readonly config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
    components: { patterns?: PatternDetector; issues?: IssueDetector } = {},
  ) {
    this.complexity = new ComplexityScorer(config);
    this.patterns = components.patterns ?? new PatternDetector();
    this.issues = components.issues ?? new IssueDetector(config);
  }

  async analyze(unit: SourceUnit): Promise<PreAnalysis> {
    const degradations: Degradation[] = [];
    const degrade = (stage: PipelineStage, detail: string) => {
      degradations.push({ stage, code: 'ANALYSIS_DEGRADED', detail });
    };

    const [structureResult, patternResult, issueResult] = await Promise.allSettled([
      Promise.resolve().then(() => this.structure.extract(unit)),
      Promise.resolve().then(() => this.patterns.detect(unit)),
      Promise.resolve().then(() => this.issues.detect(unit)),
    ]);

    let structure: StructureInfo;
    if (structureResult.status === 'fulfilled') {
      structure = structureResult.value;
      if (structure.confidence === 'low') {
        degrade('structure', 'Unbalanced or unterminated blocks; function spans are approximate');
      }
    } else {
      structure = emptyStructure(splitLines(unit.text));
      degrade('structure', getErrorMessage(structureResult.reason));
    }

    let complexity: ComplexityInfo;
    try {
      complexity = this.complexity.score(unit, structure);
    } catch (error) {
      complexity = emptyComplexity(this.config.complexityThreshold);
      degrade('complexity', getErrorMessage(error));
    }

    let patterns: PatternInfo;
    if (patternResult.status === 'fulfilled') {
      patterns = patternResult.value;
    } else {
      patterns = emptyPatterns();
      degrade('patterns', getErrorMessage(patternResult.reason));
    }

    let detection: IssueDetection;
    if (issueResult.status === 'fulfilled') {
      detection = issueResult.value;
      for (const failure of detection.ruleFailures) {
        const where = failure.line === undefined ? '' : ` at line ${failure.line}`;
        degrade('issues', `Rule '${failure.ruleId}' failed${where}: ${failure.error}`);
      }
    } else {
      detection = { issues: [], ruleFailures: [] };
      degrade('issues', getErrorMessage(issueResult.reason));
    }

    return Object.freeze({
      structure,
      complexity,
      patterns,
      issues: Object.freeze([...detection.issues]),
      degradations: Object.freeze(degradations),
    });
  }
}

/**
 * One-shot pre-analysis with the given (or default) configuration.
 */
export function runPreAnalysis(
  unit: SourceUnit,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
): Promise<PreAnalysis> {
  return new PreAnalyzer(config).analyze(unit);
}

/** Categories with at least one match, in declaration order */
export function activePatternCategories(patterns: PatternInfo): PatternCategory[] {
  return PATTERN_CATEGORIES.filter(c => patterns[c].count > 0);
}
