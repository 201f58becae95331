/**
 * Supported languages and the lexical markers the heuristic scanners use.
 */

export const SUPPORTED_LANGUAGES = [
  'python',
  'javascript',
  'typescript',
  'java',
  'go',
  'ruby',
  'php',
  'cpp',
  'c',
  'csharp',
  'swift',
] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

/**
 * How a language delimits function bodies.
 */
export type BlockStyle = 'braces' | 'indent' | 'end';

export interface LanguageDefinition {
  id: Language;
  blockStyle: BlockStyle;
  /** Each pattern captures the function name in group 1 */
  functionPatterns: RegExp[];
  classPattern: RegExp;
  importPattern: RegExp;
  /** Grouped imports such as Go's `import ( ... )`; each inner line counts once */
  importBlock?: { start: RegExp; end: RegExp };
  asyncPattern: RegExp | null;
  decoratorPattern: RegExp | null;
  /** Prefixes that start a whole-line comment */
  lineComments: string[];
  /** Whether `and` / `or` are boolean operators */
  wordBooleanOperators: boolean;
}

const C_FAMILY_COMMENTS = ['//', '/*', '*'];

/** Keywords a C-like method pattern must not treat as a function name */
export const CONTROL_KEYWORDS = new Set([
  'if',
  'for',
  'foreach',
  'while',
  'switch',
  'catch',
  'return',
  'sizeof',
  'new',
  'else',
  'do',
  'using',
  'lock',
  'function',
]);

const LANGUAGE_DEFINITIONS: Record<Language, LanguageDefinition> = {
  python: {
    id: 'python',
    blockStyle: 'indent',
    functionPatterns: [/^\s*(?:async\s+)?def\s+(\w+)\s*\(/],
    classPattern: /^\s*class\s+(\w+)\s*[(:]/,
    importPattern: /^\s*(?:import\s+\w|from\s+[\w.]+\s+import\b)/,
    asyncPattern: /\basync\s+def\b|\bawait\b/,
    decoratorPattern: /^\s*@[\w.]+/,
    lineComments: ['#'],
    wordBooleanOperators: true,
  },
  javascript: {
    id: 'javascript',
    blockStyle: 'braces',
    functionPatterns: [
      /\b(?:async\s+)?function\s*\*?\s*(\w+)\s*\(/,
      /\b(?:const|let|var)\s+(\w+)\s*=\s*(?:async\s*)?(?:\([^)]*\)|\w+)\s*=>/,
      /^\s*(?:static\s+)?(?:async\s+)?(\w+)\s*\([^)]*\)\s*\{/,
    ],
    classPattern: /\bclass\s+(\w+)/,
    importPattern: /^\s*(?:import\s|.*\brequire\s*\()/,
    asyncPattern: /\basync\b|\bawait\b/,
    decoratorPattern: null,
    lineComments: C_FAMILY_COMMENTS,
    wordBooleanOperators: false,
  },
  typescript: {
    id: 'typescript',
    blockStyle: 'braces',
    functionPatterns: [
      /\b(?:async\s+)?function\s*\*?\s*(\w+)\s*[<(]/,
      /\b(?:const|let|var)\s+(\w+)\s*(?::[^=]+)?=\s*(?:async\s*)?(?:\([^)]*\)|\w+)\s*(?::[^=]+)?=>/,
      /^\s*(?:(?:public|private|protected|static|readonly|abstract|override)\s+)*(?:async\s+)?(\w+)\s*(?:<[^>]*>)?\([^)]*\)\s*(?::[^{]+)?\{/,
    ],
    classPattern: /\bclass\s+(\w+)/,
    importPattern: /^\s*(?:import\s|.*\brequire\s*\()/,
    asyncPattern: /\basync\b|\bawait\b/,
    decoratorPattern: /^\s*@\w+/,
    lineComments: C_FAMILY_COMMENTS,
    wordBooleanOperators: false,
  },
  java: {
    id: 'java',
    blockStyle: 'braces',
    functionPatterns: [
      /^\s*(?:(?:public|private|protected|static|final|abstract|synchronized)\s+)*(?:<[^>]+>\s+)?[\w<>[\].,?]+\s+(\w+)\s*\([^)]*\)\s*(?:throws\s+[\w.,\s]+)?\{?\s*$/,
    ],
    classPattern: /\b(?:class|interface|enum|record)\s+(\w+)/,
    importPattern: /^\s*import\s+[\w.*]+/,
    asyncPattern: /\bCompletableFuture\b|\bExecutorService\b/,
    decoratorPattern: /^\s*@\w+/,
    lineComments: C_FAMILY_COMMENTS,
    wordBooleanOperators: false,
  },
  go: {
    id: 'go',
    blockStyle: 'braces',
    functionPatterns: [/^\s*func\s+(?:\([^)]*\)\s*)?(\w+)\s*[[(]/],
    classPattern: /^\s*type\s+(\w+)\s+struct\b/,
    importPattern: /^\s*import\b/,
    importBlock: { start: /^\s*import\s*\(\s*$/, end: /^\s*\)/ },
    asyncPattern: /\bgo\s+\w+|\bchan\b/,
    decoratorPattern: null,
    lineComments: ['//', '/*', '*'],
    wordBooleanOperators: false,
  },
  ruby: {
    id: 'ruby',
    blockStyle: 'end',
    functionPatterns: [/^\s*def\s+(?:self\.)?(\w+[?!=]?)/],
    classPattern: /^\s*(?:class|module)\s+(\w+)/,
    importPattern: /^\s*(?:require|require_relative|load)\b/,
    asyncPattern: /\bThread\.new\b|\bFiber\b|\basync\b/,
    decoratorPattern: null,
    lineComments: ['#'],
    wordBooleanOperators: true,
  },
  php: {
    id: 'php',
    blockStyle: 'braces',
    functionPatterns: [
      /^\s*(?:(?:public|private|protected|static|final|abstract)\s+)*function\s+&?\s*(\w+)\s*\(/,
    ],
    classPattern: /^\s*(?:(?:abstract|final)\s+)?(?:class|interface|trait)\s+(\w+)/,
    importPattern: /^\s*(?:use\s+[\w\\]+|require(?:_once)?\b|include(?:_once)?\b)/,
    asyncPattern: null,
    decoratorPattern: /^\s*#\[\w+/,
    lineComments: ['//', '#', '/*', '*'],
    wordBooleanOperators: false,
  },
  cpp: {
    id: 'cpp',
    blockStyle: 'braces',
    functionPatterns: [
      /^\s*(?:[\w:<>*&,]+\s+)+\**&?(~?\w+(?:::~?\w+)?)\s*\([^;]*\)\s*(?:const\s*)?(?:noexcept\s*)?(?:override\s*)?\{?\s*$/,
    ],
    classPattern: /^\s*(?:class|struct)\s+(\w+)(?!\s*;)/,
    importPattern: /^\s*#\s*include\b/,
    asyncPattern: /\bstd::(?:async|thread|future)\b/,
    decoratorPattern: /\[\[\w+\]\]/,
    lineComments: C_FAMILY_COMMENTS,
    wordBooleanOperators: false,
  },
  c: {
    id: 'c',
    blockStyle: 'braces',
    functionPatterns: [
      /^\s*(?:(?:static|inline|extern|const|unsigned|signed|struct)\s+)*\w+[\s*]+(\w+)\s*\([^;]*\)\s*\{?\s*$/,
    ],
    classPattern: /^\s*(?:typedef\s+)?struct\s+(\w+)\s*\{/,
    importPattern: /^\s*#\s*include\b/,
    asyncPattern: /\bpthread_create\b/,
    decoratorPattern: null,
    lineComments: C_FAMILY_COMMENTS,
    wordBooleanOperators: false,
  },
  csharp: {
    id: 'csharp',
    blockStyle: 'braces',
    functionPatterns: [
      /^\s*(?:(?:public|private|protected|internal|static|virtual|override|abstract|sealed|async|extern|new)\s+)+[\w<>[\].,?]+\s+(\w+)\s*(?:<[^>]+>)?\([^)]*\)\s*\{?\s*$/,
    ],
    classPattern: /\b(?:class|interface|struct|record|enum)\s+(\w+)/,
    importPattern: /^\s*using\s+[\w.]+\s*;/,
    asyncPattern: /\basync\b|\bawait\b/,
    decoratorPattern: /^\s*\[\w+/,
    lineComments: C_FAMILY_COMMENTS,
    wordBooleanOperators: false,
  },
  swift: {
    id: 'swift',
    blockStyle: 'braces',
    functionPatterns: [/\bfunc\s+(\w+)\s*[<(]/],
    classPattern: /\b(?:class|struct|protocol|enum|actor)\s+(\w+)/,
    importPattern: /^\s*import\s+\w+/,
    asyncPattern: /\basync\b|\bawait\b/,
    decoratorPattern: /^\s*@\w+/,
    lineComments: C_FAMILY_COMMENTS,
    wordBooleanOperators: false,
  },
};

const EXTENSION_MAP: Record<string, Language> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.java': 'java',
  '.go': 'go',
  '.rb': 'ruby',
  '.php': 'php',
  '.cpp': 'cpp',
  '.cc': 'cpp',
  '.hpp': 'cpp',
  '.c': 'c',
  '.h': 'c',
  '.cs': 'csharp',
  '.swift': 'swift',
};

export function isSupportedLanguage(tag: string): tag is Language {
  return SUPPORTED_LANGUAGES.some(language => language === tag);
}

export function getLanguageDefinition(language: Language): LanguageDefinition {
  return LANGUAGE_DEFINITIONS[language];
}

/**
 * Detect language from a file name. Returns null for unknown extensions.
 */
export function detectLanguage(filename: string): Language | null {
  const match = filename.toLowerCase().match(/(\.[a-z0-9]+)$/);
  if (!match) return null;
  return EXTENSION_MAP[match[1]] ?? null;
}
