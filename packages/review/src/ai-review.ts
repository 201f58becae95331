/**
 * Validation of the AI reviewer's JSON payload.
 *
 * The payload is untrusted: entries are checked one by one with zod, bad
 * entries are dropped and reported, and the result is tagged
 * success / partial / failure. Nothing here throws.
 */

import { z } from 'zod';
import { ISSUE_CATEGORIES, type Issue, type IssueCategory, type Severity } from '@critique/core';
import { isPlainObject } from './json-utils.js';
import type { AIReview, AIValidationResult, IssueReference } from './types.js';

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

const SEVERITY_ALIASES: Record<string, Severity> = {
  critical: 'CRITICAL',
  high: 'CRITICAL',
  severe: 'CRITICAL',
  blocker: 'CRITICAL',
  error: 'CRITICAL',
  medium: 'MEDIUM',
  moderate: 'MEDIUM',
  major: 'MEDIUM',
  warning: 'MEDIUM',
  low: 'LOW',
  minor: 'LOW',
  info: 'LOW',
  informational: 'LOW',
  note: 'LOW',
  style: 'LOW',
};

const CATEGORY_ALIASES: Record<string, IssueCategory> = {
  hardcoded_secret: 'SECRET',
  hardcoded_credential: 'SECRET',
  credential: 'SECRET',
  sql_string: 'SQL_INJECTION',
  sql: 'SQL_INJECTION',
  error_handling: 'MISSING_ERROR_HANDLING',
  broad_except: 'BARE_EXCEPT',
  broad_exception: 'BARE_EXCEPT',
  empty_catch: 'BARE_EXCEPT',
  print_statement: 'DEBUG_OUTPUT',
  console_log: 'DEBUG_OUTPUT',
  todo: 'TODO_COMMENT',
};

/**
 * Map a severity word to a Severity, or null when it is not recognized.
 */
export function normalizeSeverity(value: string): Severity | null {
  return SEVERITY_ALIASES[value.trim().toLowerCase()] ?? null;
}

/**
 * Map an issue type such as "SQL Injection" or "hardcoded_secret" to a
 * known category, or null when it names none.
 */
export function normalizeCategory(value: string): IssueCategory | null {
  const key = value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_|_$/g, '');
  const upper = key.toUpperCase();
  const exact = ISSUE_CATEGORIES.find(c => c === upper);
  if (exact && exact !== 'LLM_FINDING') return exact;
  return CATEGORY_ALIASES[key] ?? null;
}

/** Length of the message prefix used in issue identity */
export const MESSAGE_PREFIX_LENGTH = 40;

/**
 * Lower-case, collapse non-alphanumeric runs to one space, trim, first 40 characters.
 */
export function normalizeMessagePrefix(message: string): string {
  return message
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .slice(0, MESSAGE_PREFIX_LENGTH);
}

/**
 * Dedup identity. A line pins the issue down on its own; line-less issues
 * are told apart by their normalized message prefix.
 */
export function issueIdentity(issue: Pick<Issue, 'category' | 'line' | 'message'>): string {
  return issue.line === undefined
    ? `${issue.category}|-|${normalizeMessagePrefix(issue.message)}`
    : `${issue.category}|${issue.line}`;
}

// ---------------------------------------------------------------------------
// Payload schemas
// ---------------------------------------------------------------------------

/** Line numbers arrive as numbers, numeric strings or null */
const lineSchema = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform(value => {
    const line = typeof value === 'string' ? Number.parseInt(value, 10) : value;
    return typeof line === 'number' && Number.isInteger(line) && line > 0 ? line : undefined;
  });

const optionalText = z
  .union([z.string(), z.null()])
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const referenceSchema = z.object({
  line: lineSchema,
  type: optionalText,
  category: optionalText,
  message: optionalText,
  description: optionalText,
  reason: optionalText,
  recommendation: optionalText,
});

const findingSchema = referenceSchema.extend({
  severity: optionalText,
  code_snippet: optionalText,
  snippet: optionalText,
});

const scoreSchema = z
  .union([z.number(), z.string().regex(/^\s*\d+(?:\.\d+)?\s*$/).transform(Number)])
  .pipe(z.number().min(0).max(100));

const REVIEW_KEYS = [
  'validated_issues',
  'false_positives',
  'new_findings',
  'summary',
  'score',
  'strengths',
  'key_improvements',
] as const;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function describeZodError(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'entry'}: ${i.message}`).join('; ');
}

function entriesOf(
  payload: Record<string, unknown>,
  key: string,
  problems: string[],
): unknown[] {
  const value = payload[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    problems.push(`${key}: expected an array`);
    return [];
  }
  return value;
}

function toReference(entry: z.infer<typeof referenceSchema>): IssueReference {
  const typeName = entry.category ?? entry.type;
  const category = typeName ? normalizeCategory(typeName) : null;
  const message = entry.message ?? entry.description;
  return {
    ...(category ? { category } : {}),
    ...(entry.line !== undefined ? { line: entry.line } : {}),
    ...(message ? { message } : {}),
    ...(entry.reason ? { reason: entry.reason } : {}),
    ...(entry.recommendation ? { recommendation: entry.recommendation } : {}),
  };
}

function parseReferences(payload: Record<string, unknown>, key: string, problems: string[]) {
  const references: IssueReference[] = [];
  entriesOf(payload, key, problems).forEach((raw, index) => {
    const parsed = referenceSchema.safeParse(raw);
    if (!parsed.success) {
      problems.push(`${key}[${index}]: ${describeZodError(parsed.error)}`);
      return;
    }
    const reference = toReference(parsed.data);
    if (reference.line === undefined && reference.message === undefined) {
      problems.push(`${key}[${index}]: needs a line or a message`);
      return;
    }
    references.push(reference);
  });
  return references;
}

function parseFindings(payload: Record<string, unknown>, problems: string[]): Issue[] {
  const findings: Issue[] = [];
  entriesOf(payload, 'new_findings', problems).forEach((raw, index) => {
    const parsed = findingSchema.safeParse(raw);
    if (!parsed.success) {
      problems.push(`new_findings[${index}]: ${describeZodError(parsed.error)}`);
      return;
    }
    const entry = parsed.data;
    const message = entry.message ?? entry.description;
    if (!message) {
      problems.push(`new_findings[${index}]: missing message`);
      return;
    }

    let severity: Severity = 'MEDIUM';
    if (entry.severity) {
      const normalized = normalizeSeverity(entry.severity);
      if (normalized) severity = normalized;
      else problems.push(`new_findings[${index}]: unknown severity '${entry.severity}', using MEDIUM`);
    }

    const typeName = entry.category ?? entry.type;
    const snippet = entry.snippet ?? entry.code_snippet;
    findings.push({
      category: (typeName && normalizeCategory(typeName)) || 'LLM_FINDING',
      severity,
      ...(entry.line !== undefined ? { line: entry.line } : {}),
      message,
      source: 'AI',
      ...(snippet ? { snippet } : {}),
      ...(entry.recommendation ? { recommendation: entry.recommendation } : {}),
    });
  });
  return findings;
}

function parseStrings(payload: Record<string, unknown>, key: string, problems: string[]): string[] {
  const strings: string[] = [];
  entriesOf(payload, key, problems).forEach((value, index) => {
    if (typeof value === 'string' && value.trim()) strings.push(value.trim());
    else problems.push(`${key}[${index}]: expected a non-empty string`);
  });
  return strings;
}

/**
 * Validate a raw reviewer payload into an AIReview.
 *
 * - `failure`: not an object, or none of the expected fields present
 * - `partial`: some entries or fields were dropped (listed in `problems`)
 * - `success`: everything validated
 */
export function validateAIReview(raw: unknown): AIValidationResult {
  if (!isPlainObject(raw)) {
    return { status: 'failure', problems: ['AI response is not a JSON object'] };
  }
  if (!REVIEW_KEYS.some(key => key in raw)) {
    return { status: 'failure', problems: ['AI response has none of the expected fields'] };
  }

  const problems: string[] = [];

  let summary = '';
  if (typeof raw.summary === 'string') summary = raw.summary.trim();
  else if (raw.summary !== undefined && raw.summary !== null) problems.push('summary: expected a string');

  let score: number | undefined;
  if (raw.score !== undefined && raw.score !== null) {
    const parsed = scoreSchema.safeParse(raw.score);
    if (parsed.success) score = parsed.data;
    else problems.push('score: expected a number between 0 and 100');
  }

  const review: AIReview = Object.freeze({
    validatedIssues: Object.freeze(parseReferences(raw, 'validated_issues', problems)),
    falsePositives: Object.freeze(parseReferences(raw, 'false_positives', problems)),
    newFindings: Object.freeze(parseFindings(raw, problems)),
    summary,
    recommendations: Object.freeze(parseStrings(raw, 'key_improvements', problems)),
    strengths: Object.freeze(parseStrings(raw, 'strengths', problems)),
    ...(score !== undefined ? { score } : {}),
  });

  return problems.length === 0
    ? { status: 'success', review }
    : { status: 'partial', review, problems };
}

/**
 * An AIReview with nothing in it. Merging it changes nothing.
 */
export function emptyAIReview(): AIReview {
  return {
    validatedIssues: [],
    falsePositives: [],
    newFindings: [],
    summary: '',
    recommendations: [],
    strengths: [],
  };
}
