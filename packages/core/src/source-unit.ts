import { InputInvalidError } from './errors/index.js';
import { SUPPORTED_LANGUAGES, isSupportedLanguage } from './languages.js';
import type { SourceUnit } from './types.js';

export interface SourceUnitInput {
  text: string;
  /** Language id, case-insensitive */
  language: string;
  /** Declared byte size; never below the UTF-8 length of `text` */
  size?: number;
  filename?: string;
}

/**
 * Build a frozen SourceUnit.
 *
 * @throws InputInvalidError for an unsupported language or a negative size
 */
export function createSourceUnit(input: SourceUnitInput): SourceUnit {
  const language = input.language.trim().toLowerCase();
  if (!isSupportedLanguage(language)) {
    throw new InputInvalidError(
      `Unsupported language '${input.language}'. Supported: ${SUPPORTED_LANGUAGES.join(', ')}`,
      { language: input.language },
    );
  }

  const declared = input.size;
  if (declared !== undefined && (!Number.isFinite(declared) || declared < 0)) {
    throw new InputInvalidError(`Invalid source size: ${declared}`, { size: declared });
  }
  const measured = Buffer.byteLength(input.text, 'utf8');
  const size = declared === undefined ? measured : Math.max(declared, measured);

  return Object.freeze({
    text: input.text,
    language,
    size,
    ...(input.filename === undefined ? {} : { filename: input.filename }),
  });
}
