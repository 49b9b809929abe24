/**
 * Translation execution: per-run cache, request pacing and retries
 */

import chalk from 'chalk';
import pRetry from 'p-retry';
import {
  fillL10nMap,
  type AutofillConfig,
  type EntryEvent,
  type FillResult,
  type L10nMap,
  type TextTranslator,
} from '@l10n-autofill/core';
import { loadTranslator, type Translator, type TranslatorLoadOptions } from '@l10n-autofill/translation';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_MIN_TIMEOUT_MS = 400;

export interface RetryingTranslatorOptions {
  translator: Translator;
  sourceLanguage: string;
  targetLanguage: string;
  delayMs: number;
  retries?: number;
  retryMinTimeoutMs?: number;
  log?: (message: string) => void;
}

/**
 * Wrap a batch translator as a single-text translator. Results are cached by
 * masked text, so repeated strings cost one request.
 */
export function createRetryingTranslator(options: RetryingTranslatorOptions): TextTranslator {
  const cache = new Map<string, string>();
  const log = options.log ?? ((message: string) => console.log(message));

  return async (masked) => {
    const cached = cache.get(masked);
    if (cached !== undefined) {
      return { ok: true, text: cached };
    }

    if (options.delayMs > 0) {
      await sleep(options.delayMs);
    }

    try {
      const text = await pRetry(
        async () => {
          const results = await options.translator.translate([masked], options.sourceLanguage, options.targetLanguage);
          if (!Array.isArray(results) || results.length !== 1) {
            throw new Error(`Translator returned ${Array.isArray(results) ? results.length : 0} result(s) for 1 input.`);
          }
          const [translated] = results;
          const trimmed = typeof translated === 'string' ? translated.trim() : '';
          if (!trimmed) {
            throw new Error('empty translation');
          }
          return trimmed;
        },
        {
          retries: options.retries ?? DEFAULT_RETRIES,
          minTimeout: options.retryMinTimeoutMs ?? DEFAULT_RETRY_MIN_TIMEOUT_MS,
          factor: 2,
          onFailedAttempt: (error) => {
            log(
              chalk.yellow(
                `Attempt ${error.attemptNumber} failed translating "${masked}": ${error.message}. There are ${error.retriesLeft} retries left.`
              )
            );
          },
        }
      );
      cache.set(masked, text);
      return { ok: true, text };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) };
    }
  };
}

export interface ExecuteFillInput {
  map: L10nMap;
  config: AutofillConfig;
  loaderOptions: TranslatorLoadOptions;
  onEntry?: (event: EntryEvent) => void;
  log?: (message: string) => void;
  retryMinTimeoutMs?: number;
}

export function buildLoaderOptions(config: AutofillConfig): TranslatorLoadOptions {
  return {
    provider: config.provider,
    module: config.module,
    timeoutMs: config.timeoutMs,
    config: { ...config },
  };
}

/**
 * Load the configured translator and run one fill pass over the map.
 */
export async function executeFill(input: ExecuteFillInput): Promise<FillResult> {
  const translator = await loadTranslator(input.loaderOptions);
  const { config } = input;

  try {
    const translate = createRetryingTranslator({
      translator,
      sourceLanguage: config.sourceLanguage,
      targetLanguage: config.targetLanguage,
      delayMs: config.delayMs,
      retryMinTimeoutMs: input.retryMinTimeoutMs,
      log: input.log,
    });

    return await fillL10nMap(input.map, {
      translate,
      targetLanguage: config.targetLanguage,
      max: config.max,
      prefixes: config.prefixes,
      anyPath: config.anyPath,
      requireUppercaseStart: config.requireUppercaseStart,
      safeWords: config.safeWords,
      maxLength: config.maxLength,
      onEntry: input.onEntry,
    });
  } finally {
    await translator.dispose?.();
  }
}
