/**
 * Terminal rendering of a FinalReview for `critique review`.
 *
 * Issues are printed in the merged order (severity, then line).
 */

import type { Issue, Severity } from '@critique/core';
import type { FinalReview, SeverityCounts } from '../types.js';

/** ANSI color codes (no chalk dependency in the review package) */
const COLORS = {
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  green: '\x1b[32m',
  gray: '\x1b[90m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
} as const;

const SEVERITY_COLORS: Record<Severity, string> = {
  CRITICAL: COLORS.red,
  MEDIUM: COLORS.yellow,
  LOW: COLORS.blue,
};

const SEVERITY_LABELS: Record<Severity, string> = {
  CRITICAL: 'CRIT',
  MEDIUM: 'MED ',
  LOW: 'LOW ',
};

export interface FormatOptions {
  color?: boolean;
}

/**
 * Render a review as terminal text. Returns the lines joined with "\n".
 */
export function formatReview(review: FinalReview, opts: FormatOptions = {}): string {
  const useColor = opts.color ?? true;
  const c = (code: string): string => (useColor ? code : '');
  const lines: string[] = [];

  const title = review.source.filename ?? `<${review.source.language} source>`;
  lines.push(`${c(COLORS.bold)}${title}${c(COLORS.reset)} ${c(COLORS.gray)}(${review.source.language}, ${review.mode} review)${c(COLORS.reset)}`);
  lines.push(`Score: ${c(scoreColor(review.score))}${review.score}/100${c(COLORS.reset)}`);
  lines.push(formatCounts(review.counts, c));

  if (review.aiSkipped) {
    lines.push(`${c(COLORS.yellow)}AI review skipped: response could not be used${c(COLORS.reset)}`);
  }

  lines.push('');
  if (review.issues.length === 0) {
    lines.push('No issues found.');
  } else {
    for (const issue of review.issues) {
      lines.push(...formatIssue(issue, c));
    }
  }

  if (review.aiReview) {
    const { summary, recommendations, strengths } = review.aiReview;
    if (summary) {
      lines.push('', `${c(COLORS.bold)}Summary${c(COLORS.reset)}`, `  ${summary}`);
    }
    if (strengths.length > 0) {
      lines.push('', `${c(COLORS.bold)}Strengths${c(COLORS.reset)}`);
      for (const strength of strengths) lines.push(`  - ${strength}`);
    }
    if (recommendations.length > 0) {
      lines.push('', `${c(COLORS.bold)}Recommendations${c(COLORS.reset)}`);
      for (const recommendation of recommendations) lines.push(`  - ${recommendation}`);
    }
  }

  for (const note of review.degradations) {
    lines.push(`${c(COLORS.dim)}Degraded (${note.stage}): ${note.detail}${c(COLORS.reset)}`);
  }

  lines.push(`${c(COLORS.dim)}Completed in ${review.processingTimeMs}ms${c(COLORS.reset)}`);
  return lines.join('\n');
}

function formatIssue(issue: Issue, c: (code: string) => string): string[] {
  const lineRef = issue.line !== undefined ? `:${issue.line}` : '';
  const origin = issue.source === 'AI' ? ' ai' : issue.aiValidated ? ' confirmed' : '';
  const out = [
    `  ${c(SEVERITY_COLORS[issue.severity])}${SEVERITY_LABELS[issue.severity]}${c(COLORS.reset)} ` +
      `${c(COLORS.gray)}[${issue.category}${lineRef}]${origin}${c(COLORS.reset)} ${issue.message}`,
  ];
  if (issue.snippet) {
    out.push(`       ${c(COLORS.dim)}${issue.snippet}${c(COLORS.reset)}`);
  }
  if (issue.recommendation) {
    out.push(`       ${c(COLORS.dim)}Suggestion: ${issue.recommendation}${c(COLORS.reset)}`);
  }
  return out;
}

function formatCounts(counts: SeverityCounts, c: (code: string) => string): string {
  const parts = [
    `${c(COLORS.red)}${counts.critical} critical${c(COLORS.reset)}`,
    `${c(COLORS.yellow)}${counts.medium} medium${c(COLORS.reset)}`,
    `${c(COLORS.blue)}${counts.low} low${c(COLORS.reset)}`,
  ];
  return `${counts.total} issue${counts.total === 1 ? '' : 's'} (${parts.join(', ')})`;
}

function scoreColor(score: number): string {
  if (score >= 80) return COLORS.green;
  if (score >= 50) return COLORS.yellow;
  return COLORS.red;
}
