/**
 * Single pass over an l10n map that fills empty entries through a translator.
 */

import { classifyEntry, type ClassifyOptions } from './risk.js';
import { acceptsGroup, type PathFilterOptions } from './paths.js';
import { maskPlaceholders, unmaskPlaceholders } from './placeholders.js';
import { containsTargetScript } from './script-check.js';
import {
  cloneL10nMap,
  countEmptyEntries,
  isEmptyTranslation,
  isEntryGroup,
  type L10nGroup,
  type L10nMap,
} from './l10n-map.js';

export interface FillStats {
  scannedEmpty: number;
  eligible: number;
  filled: number;
  skippedHighRisk: number;
  skippedNotWhitelisted: number;
  skippedNotUiish: number;
  skippedTranslationFailed: number;
  skippedNoTargetScript: number;
}

export function createFillStats(): FillStats {
  return {
    scannedEmpty: 0,
    eligible: 0,
    filled: 0,
    skippedHighRisk: 0,
    skippedNotWhitelisted: 0,
    skippedNotUiish: 0,
    skippedTranslationFailed: 0,
    skippedNoTargetScript: 0,
  };
}

export type TranslateOutcome = { ok: true; text: string } | { ok: false; error: string };

/** Translates one masked text. Failures are reported, never thrown. */
export type TextTranslator = (maskedText: string) => Promise<TranslateOutcome>;

export type SkipReason =
  | 'not-whitelisted'
  | 'high-risk'
  | 'not-ui'
  | 'translation-failed'
  | 'no-target-script';

export type EntryEvent =
  | { status: 'filled'; filePath: string; original: string; value: string }
  | { status: 'skipped'; filePath: string; original: string; reason: SkipReason; detail?: string };

export interface WalkOptions extends ClassifyOptions, PathFilterOptions {
  /** Stop once this many entries were filled (or planned, for a dry run). */
  max: number;
  onEntry?: (event: EntryEvent) => void;
}

export interface FillOptions extends WalkOptions {
  translate: TextTranslator;
  targetLanguage: string;
}

export interface FilledEntry {
  filePath: string;
  original: string;
  value: string;
}

export interface FillResult {
  map: L10nMap;
  stats: FillStats;
  filledEntries: FilledEntry[];
}

export interface PlannedEntry {
  filePath: string;
  original: string;
  masked: string;
  placeholders: string[];
}

export interface PlanResult {
  stats: FillStats;
  eligibleEntries: PlannedEntry[];
}

interface Candidate {
  filePath: string;
  group: L10nGroup;
  original: string;
}

/**
 * Yield eligible empty entries in document order while tallying everything
 * skipped on the way. Consumers stop the walk by returning early; entries
 * after that point are never counted.
 */
function* walkCandidates(map: L10nMap, options: WalkOptions, stats: FillStats): Generator<Candidate> {
  const notify = options.onEntry;

  for (const [filePath, group] of map) {
    if (!isEntryGroup(group)) {
      continue;
    }

    if (!acceptsGroup(filePath, options)) {
      const empties = countEmptyEntries(group);
      stats.scannedEmpty += empties;
      stats.skippedNotWhitelisted += empties;
      if (notify) {
        for (const [original, value] of group) {
          if (isEmptyTranslation(value)) {
            notify({ status: 'skipped', filePath, original, reason: 'not-whitelisted' });
          }
        }
      }
      continue;
    }

    for (const [original, value] of group) {
      if (!isEmptyTranslation(value)) {
        continue;
      }

      stats.scannedEmpty += 1;

      const verdict = classifyEntry(original, options);
      if (!verdict.eligible) {
        if (verdict.reason === 'high-risk') {
          stats.skippedHighRisk += 1;
          notify?.({ status: 'skipped', filePath, original, reason: 'high-risk', detail: verdict.detail });
        } else {
          stats.skippedNotUiish += 1;
          notify?.({ status: 'skipped', filePath, original, reason: 'not-ui' });
        }
        continue;
      }

      stats.eligible += 1;
      yield { filePath, group, original };
    }
  }
}

export async function fillL10nMap(map: L10nMap, options: FillOptions): Promise<FillResult> {
  const output = cloneL10nMap(map);
  const stats = createFillStats();
  const filledEntries: FilledEntry[] = [];
  const notify = options.onEntry;

  for (const { filePath, group, original } of walkCandidates(output, options, stats)) {
    const { masked, placeholders } = maskPlaceholders(original);

    const outcome = await options.translate(masked);
    if (!outcome.ok) {
      stats.skippedTranslationFailed += 1;
      notify?.({ status: 'skipped', filePath, original, reason: 'translation-failed', detail: outcome.error });
      continue;
    }

    const restored = unmaskPlaceholders(outcome.text, placeholders);
    if (!restored.ok) {
      stats.skippedTranslationFailed += 1;
      const detail = restored.reason === 'missing-token' ? `missing ${restored.token}` : 'leftover placeholder token';
      notify?.({ status: 'skipped', filePath, original, reason: 'translation-failed', detail });
      continue;
    }

    const value = restored.text.trim();
    if (!containsTargetScript(value, options.targetLanguage)) {
      stats.skippedNoTargetScript += 1;
      notify?.({ status: 'skipped', filePath, original, reason: 'no-target-script', detail: value });
      continue;
    }

    group.set(original, value);
    stats.filled += 1;
    filledEntries.push({ filePath, original, value });
    notify?.({ status: 'filled', filePath, original, value });

    if (stats.filled >= options.max) {
      break;
    }
  }

  return { map: output, stats, filledEntries };
}

/**
 * Dry run: classify entries exactly as {@link fillL10nMap} would, without
 * translating. Stops after `max` eligible entries.
 */
export function planFill(map: L10nMap, options: WalkOptions): PlanResult {
  const stats = createFillStats();
  const eligibleEntries: PlannedEntry[] = [];

  for (const { filePath, original } of walkCandidates(map, options, stats)) {
    eligibleEntries.push({ filePath, original, ...maskPlaceholders(original) });
    if (eligibleEntries.length >= options.max) {
      break;
    }
  }

  return { stats, eligibleEntries };
}
