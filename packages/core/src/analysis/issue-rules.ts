/**
 * Built-in issue rules.
 *
 * Each rule is a declarative object: a trigger, a severity and a message
 * template. Rules are independent; the detector runs every rule and orders
 * output by `priority` (lower first).
 */

import type { PipelineConfig } from '../config.js';
import type { FunctionSpan, IssueCategory, Severity } from '../types.js';
import type { Language } from '../languages.js';
import { NETWORK_CALL_PATTERNS } from './patterns.js';
import { indentOf, isBlank } from './text.js';

/**
 * One line as the rules see it.
 */
export interface LineView {
  /** 1-based line number */
  number: number;
  text: string;
  /** Same line with string and comment contents blanked */
  masked: string;
}

/**
 * Shared read-only view of the file under analysis.
 */
export interface RuleContext {
  language: Language;
  lines: readonly string[];
  masked: readonly string[];
  functions: readonly FunctionSpan[];
  config: Pick<PipelineConfig, 'longLineThreshold' | 'longFunctionThreshold'>;
}

/** Placeholder values for the message template */
export type RuleMatch = Readonly<Record<string, string | number>>;

interface IssueRuleBase {
  id: string;
  category: IssueCategory;
  severity: Severity;
  priority: number;
  /** `{name}` placeholders are filled from the match */
  message: string;
}

export interface LineIssueRule extends IssueRuleBase {
  kind: 'line';
  trigger(line: LineView, ctx: RuleContext): RuleMatch | null;
}

export interface SourceIssueCandidate {
  line: number;
  match: RuleMatch;
}

export interface SourceIssueRule extends IssueRuleBase {
  kind: 'source';
  scan(ctx: RuleContext): SourceIssueCandidate[];
}

export type IssueRule = LineIssueRule | SourceIssueRule;

// ---------------------------------------------------------------------------
// Triggers
// ---------------------------------------------------------------------------

const CREDENTIAL_ASSIGNMENT =
  /\b(\w*(?:api[_-]?key|secret|password|passwd|pwd|token|access[_-]?key|private[_-]?key)\w*)["']?\s*[:=]\s*[rbuf]?["'`]([^"'`\s]{8,})["'`]/i;

const KNOWN_KEY_PREFIX =
  /["'`](?:sk-[A-Za-z0-9_-]{16,}|AKIA[0-9A-Z]{16}|ghp_[A-Za-z0-9]{30,}|xox[baprs]-[A-Za-z0-9-]{10,})["'`]/;

const SQL_IN_STRING =
  /["'`][^"'`]*\b(?:SELECT\s+[\w*]|INSERT\s+INTO|UPDATE\s+\w+\s+SET|DELETE\s+FROM)/i;

const STRING_BUILDING: RegExp[] = [
  /["'`]\s*\+\s*[\w(]/, // "..." + value
  /[\w)\]]\s*\+\s*["'`]/, // value + "..."
  /\$\{[^}]+\}/, // template literal
  /\bf["']/, // python f-string
  /["']\s*%\s*[\w(]/, // "..." % value
  /\.format\s*\(/,
  /#\{[^}]+\}/, // ruby interpolation
  /"[^"]*\$\w+/, // php interpolation
  /\bString\.format\s*\(|\bsprintf\s*\(|\bfmt\.Sprintf\s*\(/,
];

const TRY_LINE = /^\s*(?:\}\s*)?try\b/;

const BROAD_HANDLERS: Array<{ pattern: RegExp; form: string }> = [
  { pattern: /^\s*except\s*:/, form: 'bare except' },
  { pattern: /^\s*except\s+(?:Base)?Exception\s*:\s*(?:pass)?\s*$/, form: 'catches every Exception' },
  { pattern: /\bcatch\s*(?:\([^)]*\))?\s*\{\s*\}/, form: 'empty catch block' },
  { pattern: /\bcatch\s*\(\s*(?:Exception|Throwable)\s+\w+\s*\)/, form: 'catches every Exception' },
  { pattern: /\brescue\s+Exception\b/, form: 'rescues every Exception' },
];

const DEBUG_OUTPUT =
  /\bprint\s*\(|\bconsole\.(?:log|debug)\s*\(|\bSystem\.out\.print(?:ln)?\s*\(|\bfmt\.Print(?:ln|f)?\s*\(|\bvar_dump\s*\(|\bprint_r\s*\(/;

const WORK_MARKER = /(?:\/\/|#|\/\*|\*|--)\s*(TODO|FIXME|XXX|HACK)\b/;

const tryScopes = new WeakMap<readonly string[], boolean[]>();

/**
 * For every line, whether an enclosing line (by indentation) opens a `try`.
 * One pass over the file with a stack of open indentation levels.
 */
function enclosedByTry(masked: readonly string[]): boolean[] {
  const cached = tryScopes.get(masked);
  if (cached) return cached;

  const enclosed: boolean[] = [];
  const open: Array<{ indent: number; inTry: boolean }> = [];
  for (const line of masked) {
    if (isBlank(line)) {
      enclosed.push(false);
      continue;
    }
    const indent = indentOf(line);
    while (open.length > 0 && open[open.length - 1].indent >= indent) open.pop();
    const parentInTry = open.length > 0 && open[open.length - 1].inTry;
    enclosed.push(parentInTry);
    open.push({ indent, inTry: parentInTry || TRY_LINE.test(line) });
  }

  tryScopes.set(masked, enclosed);
  return enclosed;
}

/**
 * Whether the line sits inside a `try` block, judged by indentation.
 */
export function isInsideTry(lineIndex: number, ctx: RuleContext): boolean {
  if (/\btry\b/.test(ctx.masked[lineIndex])) return true;
  return enclosedByTry(ctx.masked)[lineIndex] ?? false;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const hardcodedSecretRule: LineIssueRule = {
  id: 'hardcoded-secret',
  kind: 'line',
  category: 'SECRET',
  severity: 'CRITICAL',
  priority: 1,
  message: 'Possible hardcoded credential in {name}',
  trigger(line) {
    const assignment = line.text.match(CREDENTIAL_ASSIGNMENT);
    if (assignment) return { name: assignment[1] };
    if (KNOWN_KEY_PREFIX.test(line.text)) return { name: 'string literal' };
    return null;
  },
};

export const sqlInjectionRule: LineIssueRule = {
  id: 'sql-injection',
  kind: 'line',
  category: 'SQL_INJECTION',
  severity: 'CRITICAL',
  priority: 2,
  message: 'SQL built by string concatenation or interpolation; use a parameterized query',
  trigger(line) {
    if (!SQL_IN_STRING.test(line.text)) return null;
    return STRING_BUILDING.some(p => p.test(line.text)) ? {} : null;
  },
};

export const missingErrorHandlingRule: LineIssueRule = {
  id: 'missing-error-handling',
  kind: 'line',
  category: 'MISSING_ERROR_HANDLING',
  severity: 'MEDIUM',
  priority: 3,
  message: 'Network call without error handling',
  trigger(line, ctx) {
    if (!NETWORK_CALL_PATTERNS.some(p => p.test(line.masked))) return null;
    if (/\.catch\s*\(/.test(line.masked)) return null;
    const next = ctx.masked[line.number];
    if (next !== undefined && /^\s*\.catch\s*\(/.test(next)) return null;
    return isInsideTry(line.number - 1, ctx) ? null : {};
  },
};

export const broadExceptionRule: LineIssueRule = {
  id: 'bare-except',
  kind: 'line',
  category: 'BARE_EXCEPT',
  severity: 'MEDIUM',
  priority: 4,
  message: 'Overly broad exception handler ({form})',
  trigger(line) {
    const hit = BROAD_HANDLERS.find(h => h.pattern.test(line.masked));
    return hit ? { form: hit.form } : null;
  },
};

export const longFunctionRule: SourceIssueRule = {
  id: 'long-function',
  kind: 'source',
  category: 'LONG_FUNCTION',
  severity: 'MEDIUM',
  priority: 5,
  message: "Function '{name}' is {length} lines long (limit {limit})",
  scan(ctx) {
    const limit = ctx.config.longFunctionThreshold;
    return ctx.functions
      .map(span => ({ span, length: span.endLine - span.startLine + 1 }))
      .filter(({ length }) => length > limit)
      .map(({ span, length }) => ({
        line: span.startLine,
        match: { name: span.name, length, limit },
      }));
  },
};

export const longLineRule: LineIssueRule = {
  id: 'long-line',
  kind: 'line',
  category: 'LONG_LINE',
  severity: 'LOW',
  priority: 6,
  message: 'Line is {length} characters long (limit {limit})',
  trigger(line, ctx) {
    const limit = ctx.config.longLineThreshold;
    return line.text.length > limit ? { length: line.text.length, limit } : null;
  },
};

export const debugOutputRule: LineIssueRule = {
  id: 'debug-output',
  kind: 'line',
  category: 'DEBUG_OUTPUT',
  severity: 'LOW',
  priority: 7,
  message: 'Debug output statement; prefer a logger',
  trigger(line) {
    return DEBUG_OUTPUT.test(line.masked) ? {} : null;
  },
};

export const todoCommentRule: LineIssueRule = {
  id: 'todo-comment',
  kind: 'line',
  category: 'TODO_COMMENT',
  severity: 'LOW',
  priority: 8,
  message: 'Unfinished work marker ({marker})',
  trigger(line) {
    const match = line.text.match(WORK_MARKER);
    return match ? { marker: match[1] } : null;
  },
};

export const BUILTIN_ISSUE_RULES: readonly IssueRule[] = [
  hardcodedSecretRule,
  sqlInjectionRule,
  missingErrorHandlingRule,
  broadExceptionRule,
  longFunctionRule,
  longLineRule,
  debugOutputRule,
  todoCommentRule,
];
