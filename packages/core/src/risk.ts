/**
 * Risk heuristics deciding which l10n entries are safe to machine-translate.
 */

import { DEFAULT_MAX_TEXT_LENGTH, DEFAULT_SAFE_WORDS } from './config/defaults.js';

const ASCII_LETTER_PATTERN = /[A-Za-z]/;
const LOWERCASE_IDENTIFIER_PATTERN = /^[a-z0-9_.:/\\-]+$/;
const FILE_LIKE_PATTERN = /[\\/].+\.[A-Za-z0-9]{1,6}$/;
const DEBUG_FORMAT_PATTERN = /\{[^}]*[:?!][^}]*\}/;
const WORD_TOKEN_PATTERN = /^[A-Za-z0-9_]+$/;
const PUNCTUATION_ONLY_PATTERN = /^[^\p{L}\p{M}\p{N}_]+$/u;
const NUMBER_ONLY_PATTERN = /^\d+(?:\.\d+)?$/;
const CODE_OPERATORS = ['::', '->', '=>'];

export type RiskReason =
  | 'empty'
  | 'too-long'
  | 'url'
  | 'file-path'
  | 'identifier'
  | 'code-operator'
  | 'debug-format'
  | 'punctuation-or-number'
  | 'camel-case';

export interface RiskOptions {
  /** Trimmed text longer than this is high-risk. */
  maxLength?: number;
}

export interface ClassifyOptions extends RiskOptions {
  requireUppercaseStart?: boolean;
  safeWords?: Iterable<string>;
}

export type EntryVerdict =
  | { eligible: true }
  | { eligible: false; reason: 'high-risk'; detail: RiskReason | 'no-letters' }
  | { eligible: false; reason: 'not-ui' };

export function containsLetters(text: string): boolean {
  return ASCII_LETTER_PATTERN.test(text);
}

export function startsUppercase(text: string): boolean {
  const first = text.trimStart().charAt(0);
  return first >= 'A' && first <= 'Z';
}

export function isSafeSingleWord(text: string, safeWords: Iterable<string> = DEFAULT_SAFE_WORDS): boolean {
  const trimmed = text.trim();
  for (const word of safeWords) {
    if (word === trimmed) {
      return true;
    }
  }
  return false;
}

/**
 * Return the first heuristic that flags `text` as unsafe to translate, or
 * `undefined` when none does. Checks run on the trimmed text.
 */
export function riskReason(text: string, options: RiskOptions = {}): RiskReason | undefined {
  const maxLength = options.maxLength ?? DEFAULT_MAX_TEXT_LENGTH;
  const trimmed = text.trim();

  if (!trimmed) {
    return 'empty';
  }
  if ([...trimmed].length > maxLength) {
    return 'too-long';
  }
  if (trimmed.includes('://') || trimmed.startsWith('mailto:')) {
    return 'url';
  }
  if (FILE_LIKE_PATTERN.test(trimmed)) {
    return 'file-path';
  }
  if (LOWERCASE_IDENTIFIER_PATTERN.test(trimmed)) {
    return 'identifier';
  }
  if (CODE_OPERATORS.some((operator) => trimmed.includes(operator))) {
    return 'code-operator';
  }
  if (DEBUG_FORMAT_PATTERN.test(trimmed)) {
    return 'debug-format';
  }
  if (PUNCTUATION_ONLY_PATTERN.test(trimmed) || NUMBER_ONLY_PATTERN.test(trimmed)) {
    return 'punctuation-or-number';
  }
  // A single mixed-case token is usually a type or variable name.
  if (
    !trimmed.includes(' ') &&
    WORD_TOKEN_PATTERN.test(trimmed) &&
    /[a-z]/.test(trimmed) &&
    /[A-Z]/.test(trimmed)
  ) {
    return 'camel-case';
  }

  return undefined;
}

export function isHighRisk(text: string, options: RiskOptions = {}): boolean {
  return riskReason(text, options) !== undefined;
}

export function classifyEntry(text: string, options: ClassifyOptions = {}): EntryVerdict {
  if (!containsLetters(text)) {
    return { eligible: false, reason: 'high-risk', detail: 'no-letters' };
  }

  const detail = riskReason(text, options);
  if (detail) {
    return { eligible: false, reason: 'high-risk', detail };
  }

  if (options.requireUppercaseStart) {
    const uiish = startsUppercase(text) || isSafeSingleWord(text, options.safeWords);
    if (!uiish) {
      return { eligible: false, reason: 'not-ui' };
    }
  }

  return { eligible: true };
}
