import type { Issue, Severity } from '@critique/core';

export const SEVERITY_RANK: Record<Severity, number> = {
  CRITICAL: 0,
  MEDIUM: 1,
  LOW: 2,
};

/**
 * Severity descending, then line ascending; issues without a line sort last
 * within their severity.
 */
export function compareIssues(a: Issue, b: Issue): number {
  const bySeverity = SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity];
  if (bySeverity !== 0) return bySeverity;
  if (a.line === b.line) return 0;
  if (a.line === undefined) return 1;
  if (b.line === undefined) return -1;
  return a.line - b.line;
}
