import chalk from 'chalk';
import ora from 'ora';
import fs from 'fs';
import path from 'path';
import {
  InputInvalidError,
  createSourceUnit,
  detectLanguage,
  getErrorMessage,
  isSupportedLanguage,
  type Language,
} from '@critique/core';
import {
  LLMCodeReviewer,
  OpenRouterLLMClient,
  ReviewFailedError,
  ReviewOrchestrator,
  SYSTEM_PROMPT,
  consoleLogger,
  formatReview,
  loadConfig,
  resolveLLMApiKey,
  stderrLogger,
  type CodeReviewer,
  type FinalReview,
  type Logger,
  type ReviewMode,
} from '@critique/review';

/** Raw option values as commander hands them over */
export interface ReviewCommandOptions {
  format?: string;
  quick?: boolean;
  out?: string;
  model?: string;
  failUnder?: string;
  language?: string;
  verbose?: boolean;
}

export type OutputFormat = 'text' | 'json';

export interface ValidatedOptions {
  format: OutputFormat;
  failUnder?: number;
  language?: Language;
}

/** Process-level collaborators, replaced in tests */
export interface ReviewDeps {
  cwd: string;
  env: NodeJS.ProcessEnv;
  createReviewer(apiKey: string, model: string, logger: Logger): CodeReviewer;
}

export const EXIT_OK = 0;
export const EXIT_BELOW_THRESHOLD = 1;
export const EXIT_FAILURE = 2;

const VALID_FORMATS: readonly OutputFormat[] = ['text', 'json'];

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isOutputFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.some(format => format === value);
}

/**
 * @throws InputInvalidError on an unknown format, threshold or language
 */
export function validateOptions(options: ReviewCommandOptions): ValidatedOptions {
  const format = options.format ?? 'text';
  if (!isOutputFormat(format)) {
    throw new InputInvalidError(
      `Invalid --format value "${format}". Must be one of: ${VALID_FORMATS.join(', ')}`,
    );
  }

  let failUnder: number | undefined;
  if (options.failUnder !== undefined) {
    failUnder = Number(options.failUnder);
    if (options.failUnder.trim() === '' || !Number.isFinite(failUnder) || failUnder < 0 || failUnder > 100) {
      throw new InputInvalidError(
        `Invalid --fail-under value "${options.failUnder}". Must be a number between 0 and 100`,
      );
    }
  }

  let language: Language | undefined;
  if (options.language !== undefined) {
    const tag = options.language.trim().toLowerCase();
    if (!isSupportedLanguage(tag)) {
      throw new InputInvalidError(`Unsupported --language value "${options.language}"`);
    }
    language = tag;
  }

  return { format, failUnder, language };
}

/** True when a threshold is set and the score falls below it */
export function shouldFail(score: number, failUnder: number | undefined): boolean {
  return failUnder !== undefined && score < failUnder;
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

function createLogger(verbose: boolean, format: OutputFormat): Logger {
  if (verbose) return format === 'json' ? stderrLogger : consoleLogger;
  return {
    info: () => {},
    warning: (msg: string) => console.error(chalk.yellow(`Warning: ${msg}`)),
    // Failures are reported once, by the command
    error: () => {},
    debug: () => {},
  };
}

function defaultReviewer(apiKey: string, model: string, logger: Logger): CodeReviewer {
  const llm = new OpenRouterLLMClient({ apiKey, model, systemPrompt: SYSTEM_PROMPT, logger });
  return new LLMCodeReviewer({ llm, logger });
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * Review one file and print the report. Resolves to the process exit code.
 */
export async function runReview(
  file: string,
  options: ReviewCommandOptions,
  deps: ReviewDeps = { cwd: process.cwd(), env: process.env, createReviewer: defaultReviewer },
): Promise<number> {
  const spinner = options.format === 'json' ? null : ora();

  try {
    const settings = validateOptions(options);
    const logger = createLogger(options.verbose ?? false, settings.format);

    // 1. Read the file
    const filePath = path.resolve(deps.cwd, file);
    if (!fs.existsSync(filePath)) {
      throw new InputInvalidError(`File not found: ${file}`, { file });
    }
    const language = settings.language ?? detectLanguage(filePath);
    if (!language) {
      throw new InputInvalidError(
        `Could not detect the language of ${file}. Pass --language to set it.`,
        { file },
      );
    }
    const unit = createSourceUnit({
      text: fs.readFileSync(filePath, 'utf-8'),
      language,
      size: fs.statSync(filePath).size,
      filename: file,
    });

    // 2. Load config
    const config = loadConfig(deps.cwd, deps.env);

    // 3. Resolve LLM
    const apiKey = options.quick ? undefined : resolveLLMApiKey(config, deps.env);
    const mode: ReviewMode = apiKey ? 'full' : 'quick';

    if (!apiKey && !options.quick && settings.format === 'text') {
      console.log(
        chalk.dim(
          'No LLM API key found. Running a quick review (pre-analysis only).\n' +
            'Set OPENROUTER_API_KEY or configure .critique/review.yml for AI reviews.',
        ),
      );
    }

    const model = options.model ?? config.llm.model;
    const reviewer = apiKey ? deps.createReviewer(apiKey, model, logger) : undefined;
    if (reviewer && options.model && settings.format === 'text') {
      console.log(chalk.dim(`Using model: ${model}`));
    }

    // 4. Review
    spinner?.start(`Reviewing ${file} (${mode})...`);
    const orchestrator = new ReviewOrchestrator({ config: config.pipeline, reviewer, logger });
    const review = await orchestrator.review(unit, { mode });
    spinner?.succeed(`Review complete: score ${review.score}/100`);

    // 5. Present results
    if (settings.format === 'json') {
      console.log(serializeReview(review));
    } else {
      console.log(formatReview(review, { color: chalk.level > 0 }));
    }

    if (options.out) {
      const outPath = path.resolve(deps.cwd, options.out);
      fs.writeFileSync(outPath, `${serializeReview(review)}\n`);
      if (settings.format === 'text') console.log(chalk.dim(`Report written to ${options.out}`));
    }

    // 6. Exit code for CI
    return shouldFail(review.score, settings.failUnder) ? EXIT_BELOW_THRESHOLD : EXIT_OK;
  } catch (error) {
    spinner?.fail('Review failed');
    const code = error instanceof ReviewFailedError ? ` [${error.code} at ${error.failedAt}]` : '';
    console.error(chalk.red(`Error running review${code}:`), getErrorMessage(error));
    return EXIT_FAILURE;
  }
}

function serializeReview(review: FinalReview): string {
  return JSON.stringify(review, null, 2);
}

/**
 * `critique review <file>`
 */
export async function reviewCommand(file: string, options: ReviewCommandOptions): Promise<void> {
  process.exitCode = await runReview(file, options);
}
