/**
 * Default configuration values for l10n-autofill
 */

// ─────────────────────────────────────────────────────────────────────────────
// Path Whitelist Defaults
// ─────────────────────────────────────────────────────────────────────────────

/** UI source directories of the editor l10n maps this tool was first used on. */
export const DEFAULT_PATH_PREFIXES = [
  'zed/crates/assistant/src/',
  'zed/crates/assistant2/src/',
  'zed/crates/collab_ui/src/',
  'zed/crates/workspace/src/',
  'zed/crates/project_panel/src/',
  'zed/crates/search/src/',
  'zed/crates/file_finder/src/',
  'zed/crates/diagnostics/src/',
  'zed/crates/tasks_ui/src/',
  'zed/crates/zed/src/',
];

// ─────────────────────────────────────────────────────────────────────────────
// Classification Defaults
// ─────────────────────────────────────────────────────────────────────────────

/** Single-word UI labels worth translating even when the uppercase rule applies. */
export const DEFAULT_SAFE_WORDS = [
  'OK',
  'Ok',
  'Cancel',
  'Search',
  'Find',
  'Replace',
  'Preferences',
  'Help',
  'About',
  'Yes',
  'No',
];

export const DEFAULT_MAX_TEXT_LENGTH = 180;

// ─────────────────────────────────────────────────────────────────────────────
// Run Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_FILLED = 250;
export const DEFAULT_SOURCE_LANGUAGE = 'en';
export const DEFAULT_TARGET_LANGUAGE = 'zh-CN';
export const DEFAULT_PROVIDER = 'google';
export const DEFAULT_DELAY_MS = 150;
export const DEFAULT_TIMEOUT_MS = 20_000;
export const DEFAULT_CONFIG_FILENAME = 'l10n-autofill.config.json';
