/**
 * Configuration type definitions for l10n-autofill
 */

// ─────────────────────────────────────────────────────────────────────────────
// Config Shape
// ─────────────────────────────────────────────────────────────────────────────

export interface AutofillConfig {
  /** Source l10n map. The file is only ever read. */
  input?: string;
  /** Destination for the filled map. Must differ from `input`. */
  output?: string;
  /** Stop after this many entries were filled. */
  max: number;
  /** File-path prefixes whose groups may be translated. */
  prefixes: string[];
  /** Ignore `prefixes` and consider every group. */
  anyPath: boolean;
  /** Only translate text starting with A-Z (or a safe single word). */
  requireUppercaseStart: boolean;
  /** Single-word labels that count as UI text regardless of casing. */
  safeWords: string[];
  /** Longer text is treated as high-risk. */
  maxLength: number;
  sourceLanguage: string;
  targetLanguage: string;
  /** Translator provider name, resolved to `@l10n-autofill/translator-<provider>`. */
  provider: string;
  /** Explicit module specifier overriding `provider` resolution. */
  module?: string;
  /** Pause before each uncached translation request. */
  delayMs: number;
  /** Per-request timeout handed to the translator. */
  timeoutMs: number;
}

export type RawAutofillConfig = {
  [K in keyof AutofillConfig]?: unknown;
};

export interface LoadConfigResult {
  config: AutofillConfig;
  /** Absolute path of the config file, when one was found. */
  configPath?: string;
  projectRoot: string;
}
