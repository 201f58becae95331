import type { PipelineConfig } from '../config.js';
import type { FunctionSpan, Issue, SourceUnit } from '../types.js';
import { getErrorMessage } from '../errors/index.js';
import { BUILTIN_ISSUE_RULES, type IssueRule, type RuleContext, type RuleMatch } from './issue-rules.js';
import { findFunctionSpans } from './structure.js';
import { maskSource, renderTemplate, splitLines } from './text.js';

/** Snippets longer than this are cut */
export const MAX_SNIPPET_LENGTH = 120;

/**
 * A rule that threw while scanning. The rest of the rules still run.
 */
export interface RuleFailure {
  ruleId: string;
  line?: number;
  error: string;
}

export interface IssueDetection {
  issues: Issue[];
  ruleFailures: RuleFailure[];
}

interface RankedIssue {
  issue: Issue;
  priority: number;
}

/**
 * IssueDetector — runs every registered rule over a source unit.
 *
 * Output is ordered by rule priority, then line. A rule that throws on one
 * line is recorded in `ruleFailures` and skipped for that line only.
 */
export class IssueDetector {
  private readonly rules: IssueRule[];

  constructor(
    private readonly config: Pick<PipelineConfig, 'longLineThreshold' | 'longFunctionThreshold'>,
    rules: readonly IssueRule[] = BUILTIN_ISSUE_RULES,
  ) {
    this.rules = [];
    for (const rule of rules) this.register(rule);
  }

  /**
   * Add a rule. Ids must be unique.
   */
  register(rule: IssueRule): void {
    if (this.rules.some(r => r.id === rule.id)) {
      throw new Error(`Issue rule '${rule.id}' is already registered`);
    }
    this.rules.push(rule);
  }

  get ruleIds(): string[] {
    return this.rules.map(r => r.id);
  }

  detect(unit: SourceUnit, functions?: readonly FunctionSpan[]): IssueDetection {
    const lines = splitLines(unit.text);
    const ctx: RuleContext = {
      language: unit.language,
      lines,
      masked: maskSource(lines, unit.language),
      functions: functions ?? findFunctionSpans(lines, unit.language).spans,
      config: this.config,
    };

    const ranked: RankedIssue[] = [];
    const ruleFailures: RuleFailure[] = [];

    const emit = (rule: IssueRule, lineNumber: number, match: RuleMatch) => {
      ranked.push({
        priority: rule.priority,
        issue: {
          category: rule.category,
          severity: rule.severity,
          line: lineNumber,
          message: renderTemplate(rule.message, match),
          source: 'PRE_ANALYSIS',
          snippet: toSnippet(lines[lineNumber - 1] ?? ''),
        },
      });
    };

    for (const rule of this.rules) {
      if (rule.kind === 'source') {
        try {
          for (const candidate of rule.scan(ctx)) emit(rule, candidate.line, candidate.match);
        } catch (error) {
          ruleFailures.push({ ruleId: rule.id, error: getErrorMessage(error) });
        }
        continue;
      }

      for (let i = 0; i < lines.length; i++) {
        try {
          const match = rule.trigger({ number: i + 1, text: lines[i], masked: ctx.masked[i] }, ctx);
          if (match) emit(rule, i + 1, match);
        } catch (error) {
          ruleFailures.push({ ruleId: rule.id, line: i + 1, error: getErrorMessage(error) });
        }
      }
    }

    ranked.sort((a, b) => a.priority - b.priority || (a.issue.line ?? 0) - (b.issue.line ?? 0));
    return { issues: ranked.map(r => r.issue), ruleFailures };
  }
}

function toSnippet(line: string): string {
  const trimmed = line.trim();
  return trimmed.length > MAX_SNIPPET_LENGTH ? `${trimmed.slice(0, MAX_SNIPPET_LENGTH)}...` : trimmed;
}
