/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary. Range checks are left to the validator.
 */

import type { AutofillConfig, RawAutofillConfig } from './types.js';
import {
  DEFAULT_PATH_PREFIXES,
  DEFAULT_SAFE_WORDS,
  DEFAULT_MAX_TEXT_LENGTH,
  DEFAULT_MAX_FILLED,
  DEFAULT_SOURCE_LANGUAGE,
  DEFAULT_TARGET_LANGUAGE,
  DEFAULT_PROVIDER,
  DEFAULT_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Value Utilities
// ─────────────────────────────────────────────────────────────────────────────

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function ensureUniqueStrings(values: string[]): string[] {
  return Array.from(new Set(values));
}

function normalizeNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? fallback : parsed;
  }
  return fallback;
}

function normalizeString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

function normalizeOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Normalizer
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeConfig(raw: RawAutofillConfig = {}): AutofillConfig {
  const prefixes = ensureUniqueStrings(ensureStringArray(raw.prefixes));
  const safeWords = ensureUniqueStrings(ensureStringArray(raw.safeWords));

  return {
    input: normalizeOptionalString(raw.input),
    output: normalizeOptionalString(raw.output),
    max: normalizeNumber(raw.max, DEFAULT_MAX_FILLED),
    prefixes: prefixes.length ? prefixes : [...DEFAULT_PATH_PREFIXES],
    anyPath: raw.anyPath === true,
    requireUppercaseStart: raw.requireUppercaseStart === true,
    safeWords: ensureUniqueStrings([...DEFAULT_SAFE_WORDS, ...safeWords]),
    maxLength: normalizeNumber(raw.maxLength, DEFAULT_MAX_TEXT_LENGTH),
    sourceLanguage: normalizeString(raw.sourceLanguage, DEFAULT_SOURCE_LANGUAGE),
    targetLanguage: normalizeString(raw.targetLanguage, DEFAULT_TARGET_LANGUAGE),
    provider: normalizeString(raw.provider, DEFAULT_PROVIDER),
    module: normalizeOptionalString(raw.module),
    delayMs: normalizeNumber(raw.delayMs, DEFAULT_DELAY_MS),
    timeoutMs: normalizeNumber(raw.timeoutMs, DEFAULT_TIMEOUT_MS),
  };
}
