/**
 * StructureExtractor — counts and locates top-level constructs with
 * language-aware regular expressions. Never throws: text it cannot scan
 * cleanly yields a low-confidence result.
 */

import type { ClassEntry, FunctionSpan, SourceUnit, StructureInfo } from '../types.js';
import {
  CONTROL_KEYWORDS,
  getLanguageDefinition,
  type Language,
  type LanguageDefinition,
} from '../languages.js';
import { indentOf, isBlank, maskSource, splitLines } from './text.js';

/** Lines to look ahead for an opening brace after a declaration (Allman style, wrapped signatures) */
const BRACE_LOOKAHEAD = 3;

const RUBY_BLOCK_OPENER = /^\s*(?:def|class|module|if|unless|while|until|case|begin|for)\b/;
const RUBY_DO_BLOCK = /\bdo\s*(?:\|[^|]*\|)?\s*$/;
const RUBY_END = /^\s*end\b/;

export interface FunctionSpanScan {
  spans: FunctionSpan[];
  /** True when some block never closed or braces are unbalanced */
  unbalanced: boolean;
}

export class StructureExtractor {
  extract(unit: SourceUnit): StructureInfo {
    const lines = splitLines(unit.text);
    try {
      return extractStructure(lines, unit.language);
    } catch {
      return emptyStructure(lines);
    }
  }
}

/**
 * Zero counts with low confidence, used when the scan itself fails.
 */
export function emptyStructure(lines: readonly string[] = []): StructureInfo {
  const blankLines = lines.filter(isBlank).length;
  return {
    totalLines: lines.length,
    codeLines: 0,
    commentLines: 0,
    blankLines,
    functionCount: 0,
    classCount: 0,
    importCount: 0,
    functions: [],
    classes: [],
    usesAsync: false,
    usesDecorators: false,
    confidence: 'low',
  };
}

function extractStructure(lines: readonly string[], language: Language): StructureInfo {
  const def = getLanguageDefinition(language);
  const masked = maskSource(lines, language);

  let blankLines = 0;
  let commentLines = 0;
  let codeLines = 0;
  for (let i = 0; i < lines.length; i++) {
    if (isBlank(lines[i])) blankLines++;
    else if (isBlank(masked[i])) commentLines++;
    else codeLines++;
  }

  const { spans, unbalanced } = scanFunctionSpans(lines, masked, def);
  const classes = findClasses(masked, def);

  return {
    totalLines: lines.length,
    codeLines,
    commentLines,
    blankLines,
    functionCount: spans.length,
    classCount: classes.length,
    importCount: countImports(lines, masked, def),
    functions: spans,
    classes,
    usesAsync: def.asyncPattern !== null && masked.some(l => def.asyncPattern?.test(l) ?? false),
    usesDecorators:
      def.decoratorPattern !== null && masked.some(l => def.decoratorPattern?.test(l) ?? false),
    confidence: unbalanced ? 'low' : 'high',
  };
}

/**
 * Locate function declarations and the lines their bodies cover.
 */
export function findFunctionSpans(lines: readonly string[], language: Language): FunctionSpanScan {
  return scanFunctionSpans(lines, maskSource(lines, language), getLanguageDefinition(language));
}

function scanFunctionSpans(
  lines: readonly string[],
  masked: readonly string[],
  def: LanguageDefinition,
): FunctionSpanScan {
  const spans: FunctionSpan[] = [];
  let unbalanced = def.blockStyle === 'braces' && !bracesBalanced(masked);

  for (let i = 0; i < masked.length; i++) {
    const name = matchFunctionName(masked[i], def);
    if (!name) continue;

    const end = findSpanEnd(masked, i, def);
    if (end === null) {
      unbalanced = true;
      spans.push({ name, startLine: i + 1, endLine: lines.length });
    } else {
      spans.push({ name, startLine: i + 1, endLine: end + 1 });
    }
  }

  return { spans, unbalanced };
}

function matchFunctionName(maskedLine: string, def: LanguageDefinition): string | null {
  for (const pattern of def.functionPatterns) {
    const match = maskedLine.match(pattern);
    if (match?.[1] && !CONTROL_KEYWORDS.has(match[1])) {
      return match[1];
    }
  }
  return null;
}

/**
 * Index of the last line of the function starting at `start`, or null
 * when the body never closes.
 */
function findSpanEnd(masked: readonly string[], start: number, def: LanguageDefinition): number | null {
  switch (def.blockStyle) {
    case 'braces':
      return findBraceEnd(masked, start);
    case 'indent':
      return findIndentEnd(masked, start);
    case 'end':
      return findRubyEnd(masked, start);
  }
}

function findBraceEnd(masked: readonly string[], start: number): number | null {
  let depth = 0;
  let opened = false;

  for (let i = start; i < masked.length; i++) {
    const line = masked[i];
    for (const ch of line) {
      if (ch === '{') {
        depth++;
        opened = true;
      } else if (ch === '}') {
        depth--;
        if (opened && depth <= 0) return i;
      } else if (ch === ';' && !opened) {
        // Prototype, abstract method or expression-bodied arrow
        return i;
      }
    }
    if (!opened && i - start >= BRACE_LOOKAHEAD) return start;
  }

  return opened ? null : start;
}

function findIndentEnd(masked: readonly string[], start: number): number | null {
  const baseIndent = indentOf(masked[start]);

  // Skip a wrapped signature up to the line ending with ':'
  let bodyStart = start;
  if (hasOpenParen(masked[start])) {
    while (bodyStart < masked.length && !/:\s*$/.test(masked[bodyStart])) {
      bodyStart++;
    }
    if (bodyStart >= masked.length) return null;
  } else if (!/:\s*$/.test(masked[start])) {
    // `def f(x): return x`
    return start;
  }

  let last = bodyStart;
  for (let i = bodyStart + 1; i < masked.length; i++) {
    if (isBlank(masked[i])) continue;
    if (indentOf(masked[i]) <= baseIndent) break;
    last = i;
  }
  return last;
}

function hasOpenParen(line: string): boolean {
  let depth = 0;
  for (const ch of line) {
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
  }
  return depth > 0;
}

function findRubyEnd(masked: readonly string[], start: number): number | null {
  const header = masked[start];
  // One-liners: `def x; end` and endless `def x = value`
  if (/\bend\s*$/.test(header) && /;/.test(header)) return start;
  if (/^\s*def\s+[\w.?!]+(?:\([^)]*\))?\s*=[^=]/.test(header)) return start;

  let depth = 1;
  for (let i = start + 1; i < masked.length; i++) {
    const line = masked[i];
    if (RUBY_END.test(line)) {
      depth--;
      if (depth === 0) return i;
    } else if (RUBY_BLOCK_OPENER.test(line) || RUBY_DO_BLOCK.test(line)) {
      depth++;
    }
  }
  return null;
}

function bracesBalanced(masked: readonly string[]): boolean {
  let depth = 0;
  for (const line of masked) {
    for (const ch of line) {
      if (ch === '{') depth++;
      else if (ch === '}') depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

function findClasses(masked: readonly string[], def: LanguageDefinition): ClassEntry[] {
  const classes: ClassEntry[] = [];
  masked.forEach((line, i) => {
    const match = line.match(def.classPattern);
    if (match?.[1]) classes.push({ name: match[1], line: i + 1 });
  });
  return classes;
}

function countImports(
  lines: readonly string[],
  masked: readonly string[],
  def: LanguageDefinition,
): number {
  let count = 0;
  let inBlock = false;

  for (let i = 0; i < lines.length; i++) {
    if (isBlank(masked[i])) continue;

    if (inBlock) {
      if (def.importBlock?.end.test(masked[i])) inBlock = false;
      else count++;
      continue;
    }

    if (def.importBlock?.start.test(masked[i])) {
      inBlock = true;
    } else if (def.importPattern.test(lines[i])) {
      count++;
    }
  }
  return count;
}
