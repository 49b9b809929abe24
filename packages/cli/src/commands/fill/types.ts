/**
 * Type definitions for the fill command
 */

import type { FillStats, FilledEntry, PlannedEntry, SkipReason } from '@l10n-autofill/core';

export interface FillCommandOptions {
  config?: string;
  input?: string;
  output?: string;
  max?: number;
  requireUppercaseStart?: boolean;
  prefix?: string[];
  anyPath?: boolean;
  safeWord?: string[];
  maxLength?: number;
  source?: string;
  target?: string;
  provider?: string;
  module?: string;
  delay?: number;
  timeout?: number;
  dryRun?: boolean;
  json?: boolean;
  report?: string;
  verbose?: boolean;
  strict?: boolean;
  yes?: boolean;
}

export interface FillFailure {
  filePath: string;
  original: string;
  reason: Extract<SkipReason, 'translation-failed' | 'no-target-script'>;
  detail?: string;
}

export interface FillSummary {
  dryRun: boolean;
  input: string;
  output: string;
  provider: string;
  sourceLanguage: string;
  targetLanguage: string;
  stats: FillStats;
  filled: FilledEntry[];
  planned: PlannedEntry[];
  failures: FillFailure[];
}
