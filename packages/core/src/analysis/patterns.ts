/**
 * PatternDetector — registry of independent rules that tag lines with
 * domain patterns (endpoints, queries, I/O, network, auth).
 */

import {
  PATTERN_CATEGORIES,
  type PatternCategory,
  type PatternInfo,
  type PatternMatch,
  type SourceUnit,
} from '../types.js';
import { isBlank, maskSource, splitLines } from './text.js';

/** Example line numbers kept per category */
export const MAX_PATTERN_EXAMPLES = 3;

export interface PatternRule {
  category: PatternCategory;
  description: string;
  /** A line matches when any pattern matches. Patterns must not carry the `g` flag. */
  patterns: RegExp[];
}

export const NETWORK_CALL_PATTERNS: RegExp[] = [
  /\brequests\.(?:get|post|put|delete|patch|head|request)\s*\(/,
  /\bfetch\s*\(/,
  /\baxios(?:\.\w+)?\s*\(/,
  /\bhttpx?\.(?:get|post|put|delete|patch|request|Get|Post|NewRequest)\s*\(/,
  /\burlopen\s*\(/,
  /\bHttpClient\b/,
  /\bcurl_exec\s*\(/,
  /\bURLSession\b/,
  /\bnew\s+WebSocket\s*\(/,
  /\bNet::HTTP\b/,
];

export const BUILTIN_PATTERN_RULES: readonly PatternRule[] = [
  {
    category: 'API_ENDPOINT',
    description: 'HTTP route declarations',
    patterns: [
      /@(?:app|router|api|bp|blueprint)\.(?:get|post|put|delete|patch|route)\b/,
      /\b(?:app|router|server)\.(?:get|post|put|delete|patch|all)\s*\(\s*['"`]/,
      /@(?:Get|Post|Put|Delete|Patch|RequestMapping|GetMapping|PostMapping|PutMapping|DeleteMapping)\b/,
      /\bhttp\.HandleFunc\s*\(/,
      /\bRoute::(?:get|post|put|delete|patch)\b/,
    ],
  },
  {
    category: 'DB_QUERY',
    description: 'SQL statements and query APIs',
    patterns: [
      /\b(?:SELECT\s+[\w*]|INSERT\s+INTO|UPDATE\s+\w+\s+SET|DELETE\s+FROM|CREATE\s+TABLE|DROP\s+TABLE)/i,
      /\b(?:cursor|conn|connection|db)\.(?:execute|executemany|query)\s*\(/,
      /\bsession\.query\s*\(/,
    ],
  },
  {
    category: 'FILE_IO',
    description: 'File system access',
    patterns: [
      /(?:^|[^.\w])open\s*\(/,
      /\bfs\.\w+/,
      /\b(?:readFile|writeFile|readFileSync|writeFileSync|createReadStream|createWriteStream)\b/,
      /\bnew\s+File(?:Reader|Writer|InputStream|OutputStream)?\s*\(/,
      /\bfopen\s*\(/,
      /\bos\.(?:Open|Create|ReadFile|WriteFile)\b/,
      /\bFile\.(?:read|write|open|ReadAllText|WriteAllText)\b/,
    ],
  },
  {
    category: 'NETWORK_CALL',
    description: 'Outbound HTTP and socket calls',
    patterns: NETWORK_CALL_PATTERNS,
  },
  {
    category: 'AUTH',
    description: 'Authentication and credential handling',
    patterns: [
      /\b(?:authenticat\w*|authoriz\w*|auth|login|logout|passw(?:or)?d|jwt|oauth2?|bearer|\w*token|credentials?|api_?key)\b/i,
    ],
  },
];

export class PatternDetector {
  constructor(private readonly rules: readonly PatternRule[] = BUILTIN_PATTERN_RULES) {}

  detect(unit: SourceUnit): PatternInfo {
    const lines = splitLines(unit.text);
    const masked = maskSource(lines, unit.language);

    const hits = new Map<PatternCategory, Set<number>>(PATTERN_CATEGORIES.map(c => [c, new Set()]));

    for (const rule of this.rules) {
      const found = hits.get(rule.category) ?? new Set<number>();
      lines.forEach((line, i) => {
        // Comment-only lines carry no behavior
        if (isBlank(masked[i])) return;
        if (found.has(i + 1)) return;
        if (rule.patterns.some(p => p.test(line))) found.add(i + 1);
      });
      hits.set(rule.category, found);
    }

    const summarize = (category: PatternCategory): PatternMatch => {
      const found = [...(hits.get(category) ?? [])].sort((a, b) => a - b);
      return { count: found.length, lines: found.slice(0, MAX_PATTERN_EXAMPLES) };
    };

    return {
      API_ENDPOINT: summarize('API_ENDPOINT'),
      DB_QUERY: summarize('DB_QUERY'),
      FILE_IO: summarize('FILE_IO'),
      NETWORK_CALL: summarize('NETWORK_CALL'),
      AUTH: summarize('AUTH'),
    };
  }
}
