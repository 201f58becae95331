/**
 * Lexical helpers shared by the heuristic scanners.
 *
 * `maskSource` blanks out comment and string-literal contents (keeping
 * quotes and column positions) so keyword and brace scans only see code.
 */

import type { Language } from '../languages.js';

const HASH_COMMENT_LANGUAGES = new Set<Language>(['python', 'ruby', 'php']);
const SLASH_COMMENT_LANGUAGES = new Set<Language>([
  'javascript',
  'typescript',
  'java',
  'go',
  'php',
  'cpp',
  'c',
  'csharp',
  'swift',
]);
const BACKTICK_LANGUAGES = new Set<Language>(['javascript', 'typescript', 'go']);

type ScanMode =
  | { kind: 'code' }
  | { kind: 'block-comment' }
  | { kind: 'string'; quote: string; multiline: boolean };

/**
 * Split source text into lines (LF or CRLF).
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  return text.split(/\r?\n/);
}

/**
 * Replace comment and string-literal contents with spaces.
 * Returns one masked line per input line, same lengths.
 */
export function maskSource(lines: readonly string[], language: Language): string[] {
  const hashComments = HASH_COMMENT_LANGUAGES.has(language);
  const slashComments = SLASH_COMMENT_LANGUAGES.has(language);
  const backticks = BACKTICK_LANGUAGES.has(language);
  const tripleQuotes = language === 'python';

  let mode: ScanMode = { kind: 'code' };
  const masked: string[] = [];

  for (const line of lines) {
    let out = '';
    let i = 0;

    while (i < line.length) {
      const ch = line[i];

      if (mode.kind === 'block-comment') {
        if (line.startsWith('*/', i)) {
          out += '  ';
          i += 2;
          mode = { kind: 'code' };
        } else {
          out += ' ';
          i++;
        }
        continue;
      }

      if (mode.kind === 'string') {
        if (ch === '\\' && i + 1 < line.length) {
          out += '  ';
          i += 2;
        } else if (line.startsWith(mode.quote, i)) {
          out += mode.quote;
          i += mode.quote.length;
          mode = { kind: 'code' };
        } else {
          out += ' ';
          i++;
        }
        continue;
      }

      if (slashComments && line.startsWith('/*', i)) {
        out += '  ';
        i += 2;
        mode = { kind: 'block-comment' };
      } else if ((slashComments && line.startsWith('//', i)) || (hashComments && ch === '#')) {
        out += ' '.repeat(line.length - i);
        i = line.length;
      } else if (tripleQuotes && (line.startsWith('"""', i) || line.startsWith("'''", i))) {
        const quote = line.slice(i, i + 3);
        out += quote;
        i += 3;
        mode = { kind: 'string', quote, multiline: true };
      } else if (ch === '"' || ch === "'" || (backticks && ch === '`')) {
        out += ch;
        i++;
        mode = { kind: 'string', quote: ch, multiline: ch === '`' };
      } else {
        out += ch;
        i++;
      }
    }

    // Plain quotes never span lines; an unterminated one ends here
    if (mode.kind === 'string' && !mode.multiline) {
      mode = { kind: 'code' };
    }
    masked.push(out);
  }

  return masked;
}

/**
 * Leading whitespace width, tabs counted as 4.
 */
export function indentOf(line: string): number {
  let width = 0;
  for (const ch of line) {
    if (ch === ' ') width++;
    else if (ch === '\t') width += 4;
    else break;
  }
  return width;
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

/**
 * Count non-overlapping matches of a global pattern.
 */
export function countMatches(line: string, pattern: RegExp): number {
  const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  let count = 0;
  for (const _ of line.matchAll(global)) count++;
  return count;
}

/**
 * Fill `{name}` placeholders. Unknown placeholders are left as-is.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string | number>> = {},
): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) =>
    key in values ? String(values[key]) : whole,
  );
}
