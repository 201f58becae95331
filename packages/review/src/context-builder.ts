/**
 * ContextBuilder: turns pre-analysis facts into the bounded brief that
 * precedes the code in the reviewer prompt.
 *
 * Output is a pure function of its input: same PreAnalysis and meta, same
 * bytes.
 */

import {
  DEFAULT_PIPELINE_CONFIG,
  activePatternCategories,
  type Issue,
  type Language,
  type PipelineConfig,
  type PreAnalysis,
} from '@critique/core';
import { compareIssues } from './severity.js';

/** Names listed per section before the rest is summarized */
export const MAX_LISTED_NAMES = 10;
/** Issue messages longer than this are cut */
export const MAX_CONTEXT_MESSAGE_LENGTH = 160;

export interface ContextMeta {
  filename?: string;
  language?: Language;
  size?: number;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

function listNames(names: readonly string[]): string {
  const shown = names.slice(0, MAX_LISTED_NAMES).map(n => `\`${n}\``);
  const rest = names.length - shown.length;
  return rest > 0 ? `${shown.join(', ')}, ... and ${rest} more` : shown.join(', ');
}

export class ContextBuilder {
  constructor(
    private readonly config: Pick<PipelineConfig, 'issueDisplayCap'> = DEFAULT_PIPELINE_CONFIG,
  ) {}

  build(analysis: PreAnalysis, meta: ContextMeta = {}): string {
    const sections = [
      '# Pre-analysis context',
      this.fileSection(analysis, meta),
      this.structureSection(analysis),
      this.complexitySection(analysis),
      this.patternSection(analysis),
      this.issueSection(analysis.issues),
    ];
    return `${sections.join('\n\n')}\n`;
  }

  private fileSection({ structure }: PreAnalysis, meta: ContextMeta): string {
    const lines = [
      '## File',
      `- Filename: ${meta.filename ?? 'unknown'}`,
      `- Language: ${meta.language ?? 'unknown'}`,
    ];
    if (meta.size !== undefined) lines.push(`- Size: ${meta.size} bytes`);
    lines.push(
      `- Lines: ${structure.totalLines} total, ${structure.codeLines} code, ` +
        `${structure.commentLines} comment, ${structure.blankLines} blank`,
    );
    return lines.join('\n');
  }

  private structureSection({ structure }: PreAnalysis): string {
    const lines = [
      '## Structure',
      `- Functions: ${structure.functionCount}`,
      `- Classes: ${structure.classCount}`,
      `- Imports: ${structure.importCount}`,
      `- Uses async: ${yesNo(structure.usesAsync)}`,
      `- Uses decorators: ${yesNo(structure.usesDecorators)}`,
    ];
    if (structure.functions.length > 0) {
      lines.push(`- Function names: ${listNames(structure.functions.map(f => f.name))}`);
    }
    if (structure.classes.length > 0) {
      lines.push(`- Class names: ${listNames(structure.classes.map(c => c.name))}`);
    }
    if (structure.confidence === 'low') {
      lines.push('- Note: blocks could not be matched cleanly; function spans are approximate');
    }
    return lines.join('\n');
  }

  private complexitySection({ complexity }: PreAnalysis): string {
    const lines = [
      '## Complexity',
      `- Average: ${complexity.average}`,
      `- Maximum: ${complexity.max}`,
    ];
    if (complexity.high.length === 0) {
      lines.push(`No functions at or above threshold ${complexity.threshold}.`);
    } else {
      lines.push(`Functions at or above threshold ${complexity.threshold}:`);
      for (const fn of complexity.high.slice(0, MAX_LISTED_NAMES)) {
        lines.push(`- \`${fn.name}\` (line ${fn.line}): complexity ${fn.score}`);
      }
      const rest = complexity.high.length - MAX_LISTED_NAMES;
      if (rest > 0) lines.push(`- ... and ${rest} more`);
    }
    return lines.join('\n');
  }

  private patternSection({ patterns }: PreAnalysis): string {
    const active = activePatternCategories(patterns);
    if (active.length === 0) return '## Patterns\nNo notable patterns detected.';

    const lines = ['## Patterns'];
    for (const category of active) {
      const { count, lines: where } = patterns[category];
      lines.push(`- ${category}: ${count} occurrence(s) (lines ${where.join(', ')})`);
    }
    return lines.join('\n');
  }

  private issueSection(issues: readonly Issue[]): string {
    const header = `## Pre-identified issues (${issues.length})`;
    if (issues.length === 0) return `${header}\nNo issues identified in pre-analysis.`;

    const cap = this.config.issueDisplayCap;
    const ordered = [...issues].sort(compareIssues);
    const lines = [header];
    for (const issue of ordered.slice(0, cap)) {
      const where = issue.line === undefined ? '' : ` at line ${issue.line}`;
      lines.push(
        `- [${issue.severity}] ${issue.category}${where}: ` +
          truncate(issue.message, MAX_CONTEXT_MESSAGE_LENGTH),
      );
    }
    if (ordered.length > cap) {
      lines.push(`... ${ordered.length - cap} more issue(s) omitted`);
    }
    return lines.join('\n');
  }
}
