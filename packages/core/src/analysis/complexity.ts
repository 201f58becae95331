import type { PipelineConfig } from '../config.js';
import type { ComplexityInfo, FunctionComplexity, SourceUnit, StructureInfo } from '../types.js';
import { getLanguageDefinition, type Language } from '../languages.js';
import { countMatches, maskSource, splitLines } from './text.js';

/**
 * Decision points counted in every language:
 * if, elif/elsif, for/foreach, while, case, guard, catch/except/rescue, &&, ||, ?:
 */
const DECISION_POINTS: RegExp[] = [
  /\bif\b/g,
  /\belif\b/g,
  /\belsif\b/g,
  /\bfor\b/g,
  /\bforeach\b/g,
  /\bwhile\b/g,
  /\bcase\b/g,
  /\bguard\b/g,
  /\bcatch\b/g,
  /\bexcept\b/g,
  /\brescue\b/g,
  /&&/g,
  /\|\|/g,
  // Ternary written `a ? b : c`; skips `?.`, `??` and `x?: T`
  /\s\?\s/g,
];

const WORD_BOOLEAN_OPERATORS: RegExp[] = [/\band\b/g, /\bor\b/g];

/**
 * Count decision points on one masked line.
 */
export function countDecisionPoints(maskedLine: string, language: Language): number {
  let count = 0;
  for (const pattern of DECISION_POINTS) {
    count += countMatches(maskedLine, pattern);
  }
  if (getLanguageDefinition(language).wordBooleanOperators) {
    for (const pattern of WORD_BOOLEAN_OPERATORS) {
      count += countMatches(maskedLine, pattern);
    }
  }
  return count;
}

/**
 * ComplexityScorer — cyclomatic-style score per function span.
 *
 * Complexity = 1 (base) + decision points inside the span. String literals
 * and comments are masked first so keywords inside them do not count.
 * Spans are line ranges, so a nested function's branches also count toward
 * every function enclosing it.
 */
export class ComplexityScorer {
  constructor(private readonly config: Pick<PipelineConfig, 'complexityThreshold'>) {}

  score(unit: SourceUnit, structure: StructureInfo): ComplexityInfo {
    const threshold = this.config.complexityThreshold;
    const masked = maskSource(splitLines(unit.text), unit.language);

    const functions: FunctionComplexity[] = structure.functions.map(span => {
      let decisions = 0;
      const last = Math.min(span.endLine, masked.length);
      for (let line = span.startLine; line <= last; line++) {
        decisions += countDecisionPoints(masked[line - 1], unit.language);
      }
      return { name: span.name, line: span.startLine, score: decisions + 1 };
    });

    if (functions.length === 0) {
      return { functions: [], average: 0, max: 0, high: [], threshold };
    }

    const total = functions.reduce((sum, f) => sum + f.score, 0);
    return {
      functions,
      average: Math.round((total / functions.length) * 100) / 100,
      max: Math.max(...functions.map(f => f.score)),
      high: functions.filter(f => f.score >= threshold),
      threshold,
    };
  }
}
