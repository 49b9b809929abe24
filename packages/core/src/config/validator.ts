import type { AutofillConfig, RawAutofillConfig } from './types.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: ConfigValidationIssue[]) {
    const details = issues.map((issue) => `  • ${issue.field}: ${issue.message}`).join('\n');
    super(`Invalid l10n-autofill configuration:\n${details}`);
    this.name = 'ConfigValidationError';
  }
}

const LANGUAGE_TAG_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;

export function isSafeLanguageTag(value: string): boolean {
  return LANGUAGE_TAG_PATTERN.test(value);
}

function validatePositiveInteger(field: string, value: number, issues: ConfigValidationIssue[]) {
  if (!Number.isInteger(value) || value < 1) {
    issues.push({ field, message: 'must be a positive integer' });
  }
}

function validateLanguage(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!isSafeLanguageTag(value)) {
    issues.push({ field, message: 'must be an alphanumeric language tag (letters, numbers, "-", "_")' });
  }
}

export function validateConfig(config: AutofillConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validatePositiveInteger('max', config.max, issues);
  validatePositiveInteger('maxLength', config.maxLength, issues);

  if (!Number.isFinite(config.delayMs) || config.delayMs < 0) {
    issues.push({ field: 'delayMs', message: 'must be a non-negative number' });
  }
  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    issues.push({ field: 'timeoutMs', message: 'must be a positive number' });
  }

  validateLanguage('sourceLanguage', config.sourceLanguage, issues);
  validateLanguage('targetLanguage', config.targetLanguage, issues);

  if (!config.provider.trim()) {
    issues.push({ field: 'provider', message: 'must not be empty' });
  }

  return issues;
}

// ─────────────────────────────────────────────────────────────────────────────
// Raw Value Types
// ─────────────────────────────────────────────────────────────────────────────

type RawFieldKind = 'string' | 'number' | 'boolean' | 'string-list';

const RAW_FIELD_KINDS: Record<keyof AutofillConfig, RawFieldKind> = {
  input: 'string',
  output: 'string',
  max: 'number',
  prefixes: 'string-list',
  anyPath: 'boolean',
  requireUppercaseStart: 'boolean',
  safeWords: 'string-list',
  maxLength: 'number',
  sourceLanguage: 'string',
  targetLanguage: 'string',
  provider: 'string',
  module: 'string',
  delayMs: 'number',
  timeoutMs: 'number',
};

const RAW_KIND_MESSAGES: Record<RawFieldKind, string> = {
  string: 'must be a string',
  number: 'must be a number',
  boolean: 'must be true or false',
  'string-list': 'must be an array of strings',
};

function matchesKind(value: unknown, kind: RawFieldKind): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return (
        (typeof value === 'number' && Number.isFinite(value)) ||
        (typeof value === 'string' && value.trim().length > 0 && Number.isFinite(Number(value)))
      );
    case 'boolean':
      return typeof value === 'boolean';
    case 'string-list':
      return typeof value === 'string' || (Array.isArray(value) && value.every((item) => typeof item === 'string'));
  }
}

/**
 * Type-check the values of a config file before the normalizer replaces
 * anything it cannot use with a default.
 */
export function validateRawConfig(raw: RawAutofillConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];
  for (const [field, kind] of Object.entries(RAW_FIELD_KINDS)) {
    const value: unknown = Reflect.get(raw, field);
    if (value !== undefined && !matchesKind(value, kind)) {
      issues.push({ field, message: RAW_KIND_MESSAGES[kind] });
    }
  }
  return issues;
}

export function assertConfigValid(config: AutofillConfig): void {
  const issues = validateConfig(config);
  if (issues.length) {
    throw new ConfigValidationError(issues);
  }
}
