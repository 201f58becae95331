/**
 * ResultMerger: reconciles pre-analysis issues with the AI review into one
 * ordered, scored list. Inputs are never mutated; matched issues are copied.
 */

import {
  DEFAULT_PIPELINE_CONFIG,
  type Issue,
  type PipelineConfig,
  type ScoreWeights,
} from '@critique/core';
import { issueIdentity, normalizeMessagePrefix } from './ai-review.js';
import { compareIssues } from './severity.js';
import type { AIReview, IssueReference, MergeResult, SeverityCounts } from './types.js';

/**
 * Key that is unique per issue in a merged list: its identity plus source.
 */
export function mergeKey(issue: Issue): string {
  return `${issueIdentity(issue)}|${issue.source}`;
}

/**
 * Issues a reference points at, or an empty list when it resolves to none.
 *
 * With a category: category and line must agree; a line-less issue also
 * needs the same message prefix. Without a category: the line must hold
 * exactly one issue, or exactly one whose message prefix agrees.
 */
export function resolveReference(reference: IssueReference, issues: readonly Issue[]): Issue[] {
  const prefix = reference.message === undefined ? undefined : normalizeMessagePrefix(reference.message);

  if (reference.category !== undefined) {
    return issues.filter(issue => {
      if (issue.category !== reference.category) return false;
      if (issue.line !== undefined) return issue.line === reference.line;
      return reference.line === undefined && prefix !== undefined && normalizeMessagePrefix(issue.message) === prefix;
    });
  }

  if (reference.line === undefined) return [];
  const onLine = issues.filter(issue => issue.line === reference.line);
  if (onLine.length === 1) return onLine;
  if (prefix === undefined) return [];
  const byMessage = onLine.filter(issue => normalizeMessagePrefix(issue.message) === prefix);
  return byMessage.length === 1 ? byMessage : [];
}

export function countSeverities(issues: readonly Issue[]): SeverityCounts {
  let critical = 0;
  let medium = 0;
  let low = 0;
  for (const issue of issues) {
    if (issue.severity === 'CRITICAL') critical++;
    else if (issue.severity === 'MEDIUM') medium++;
    else low++;
  }
  return { critical, medium, low, total: issues.length };
}

/**
 * 100 minus weighted severity counts, clamped to [0, 100].
 */
export function computeScore(counts: SeverityCounts, weights: ScoreWeights): number {
  const raw =
    100 - weights.critical * counts.critical - weights.medium * counts.medium - weights.low * counts.low;
  return Math.min(100, Math.max(0, raw));
}

export class ResultMerger {
  constructor(
    private readonly config: Pick<PipelineConfig, 'scoreWeights'> = DEFAULT_PIPELINE_CONFIG,
  ) {}

  merge(base: { readonly issues: readonly Issue[] }, aiReview: AIReview | null): MergeResult {
    // 1. Dedup the starting list
    const seen = new Set<string>();
    let issues: Issue[] = [];
    for (const issue of base.issues) {
      const key = mergeKey(issue);
      if (seen.has(key)) continue;
      seen.add(key);
      issues.push(issue);
    }
    const preAnalysisFound = issues.filter(i => i.source === 'PRE_ANALYSIS').length;

    let unresolvedReferences = 0;
    let falsePositivesRemoved = 0;
    let duplicatesDropped = 0;
    let aiFound = 0;
    const validated = new Set<Issue>();

    if (aiReview) {
      // 2. Drop false positives
      const rejected = new Set<Issue>();
      for (const reference of aiReview.falsePositives) {
        const matches = resolveReference(reference, issues);
        if (matches.length === 0) unresolvedReferences++;
        for (const match of matches) rejected.add(match);
      }
      issues = issues.filter(issue => !rejected.has(issue));
      falsePositivesRemoved = rejected.size;

      // 3. Mark confirmed issues
      const recommendations = new Map<Issue, string>();
      for (const reference of aiReview.validatedIssues) {
        const matches = resolveReference(reference, issues);
        if (matches.length === 0) unresolvedReferences++;
        for (const match of matches) {
          validated.add(match);
          if (reference.recommendation !== undefined && !recommendations.has(match)) {
            recommendations.set(match, reference.recommendation);
          }
        }
      }
      issues = issues.map(issue => {
        if (!validated.has(issue)) return issue;
        const recommendation = recommendations.get(issue) ?? issue.recommendation;
        return {
          ...issue,
          aiValidated: true,
          ...(recommendation !== undefined ? { recommendation } : {}),
        };
      });

      // 4. Append new findings; existing issues win on collision
      const taken = new Set(issues.map(issueIdentity));
      for (const finding of aiReview.newFindings) {
        const identity = issueIdentity(finding);
        if (taken.has(identity)) {
          duplicatesDropped++;
          continue;
        }
        taken.add(identity);
        issues.push({ ...finding, source: 'AI' });
        aiFound++;
      }
    }

    // 5. Order
    issues.sort(compareIssues);

    // 6. Score
    const counts = countSeverities(issues);
    return Object.freeze({
      issues: Object.freeze(issues),
      score: computeScore(counts, this.config.scoreWeights),
      counts: Object.freeze(counts),
      statistics: Object.freeze({
        preAnalysisFound,
        aiFound,
        falsePositivesRemoved,
        unresolvedReferences,
        duplicatesDropped,
        validatedByAI: validated.size,
      }),
    });
  }
}
