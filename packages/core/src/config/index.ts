/**
 * Configuration module for l10n-autofill
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type { AutofillConfig, RawAutofillConfig, LoadConfigResult } from './types.js';

export {
  DEFAULT_PATH_PREFIXES,
  DEFAULT_SAFE_WORDS,
  DEFAULT_MAX_TEXT_LENGTH,
  DEFAULT_MAX_FILLED,
  DEFAULT_SOURCE_LANGUAGE,
  DEFAULT_TARGET_LANGUAGE,
  DEFAULT_PROVIDER,
  DEFAULT_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_CONFIG_FILENAME,
} from './defaults.js';

export { ensureStringArray, ensureUniqueStrings, normalizeConfig } from './normalizer.js';

export {
  ConfigValidationError,
  validateConfig,
  validateRawConfig,
  assertConfigValid,
  isSafeLanguageTag,
} from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { loadConfigWithMeta } from './loader.js';
