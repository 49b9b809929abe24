/**
 * Fill command - translate empty l10n entries that pass the risk filters
 */

import path from 'path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { InvalidArgumentError, type Command } from 'commander';
import {
  assertConfigValid,
  createFillStats,
  loadConfigWithMeta,
  normalizeConfig,
  planFill,
  serializeL10nMap,
  type AutofillConfig,
  type EntryEvent,
} from '@l10n-autofill/core';

import type { FillCommandOptions, FillFailure, FillSummary } from './types.js';
import { emitFillOutput, printEntryEvent } from './reporter.js';
import { buildLoaderOptions, executeFill } from './executor.js';
import { CliError, withErrorHandling } from '../../utils/errors.js';
import { FILL_EXIT_CODES, setExitCode } from '../../utils/exit-codes.js';
import { fileExists, readL10nFile, writeFileAtomic } from '../../utils/files.js';

export * from './types.js';

function collectValues(value: string, previous: string[] = []): string[] {
  const tokens = value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
  return [...previous, ...tokens];
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Expected an integer.');
  }
  return parsed;
}

/**
 * Merge CLI flags over the loaded config. Flags win; list flags replace
 * (prefixes) or extend (safe words) the configured lists.
 */
export function resolveFillSettings(
  loaded: AutofillConfig,
  options: FillCommandOptions,
  cwd = process.cwd()
): AutofillConfig {
  const config = normalizeConfig({
    input: options.input ? path.resolve(cwd, options.input) : loaded.input,
    output: options.output ? path.resolve(cwd, options.output) : loaded.output,
    max: options.max ?? loaded.max,
    prefixes: options.prefix?.length ? options.prefix : loaded.prefixes,
    anyPath: options.anyPath ?? loaded.anyPath,
    requireUppercaseStart: options.requireUppercaseStart ?? loaded.requireUppercaseStart,
    safeWords: [...loaded.safeWords, ...(options.safeWord ?? [])],
    maxLength: options.maxLength ?? loaded.maxLength,
    sourceLanguage: options.source ?? loaded.sourceLanguage,
    targetLanguage: options.target ?? loaded.targetLanguage,
    provider: options.provider ?? loaded.provider,
    module: options.module ?? loaded.module,
    delayMs: options.delay ?? loaded.delayMs,
    timeoutMs: options.timeout ?? loaded.timeoutMs,
  });
  assertConfigValid(config);
  return config;
}

function requirePaths(config: AutofillConfig): { input: string; output: string } {
  if (!config.input) {
    throw new CliError('No input file given. Pass --input <path> or set "input" in the config file.');
  }
  if (!config.output) {
    throw new CliError('No output file given. Pass --output <path> or set "output" in the config file.');
  }
  if (path.resolve(config.input) === path.resolve(config.output)) {
    throw new CliError('Output path must differ from the input path; the input file is never overwritten.');
  }
  return { input: config.input, output: config.output };
}

/**
 * Prompt before replacing an existing output file
 */
async function confirmOverwrite(outputPath: string): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      default: false,
      message: `${outputPath} already exists. Overwrite it?`,
    },
  ]);
  return proceed;
}

export async function runFill(options: FillCommandOptions): Promise<FillSummary | undefined> {
  const { config: loaded } = await loadConfigWithMeta(options.config);
  const config = resolveFillSettings(loaded, options);
  const { input, output } = requirePaths(config);
  const quiet = options.json ?? false;
  const log = (message: string) => {
    if (!quiet) {
      console.log(message);
    }
  };

  const map = await readL10nFile(input);
  const summary: FillSummary = {
    dryRun: options.dryRun ?? false,
    input,
    output,
    provider: config.provider,
    sourceLanguage: config.sourceLanguage,
    targetLanguage: config.targetLanguage,
    stats: createFillStats(),
    filled: [],
    planned: [],
    failures: [],
  };

  if (options.dryRun) {
    log(chalk.blue('Planning fill (dry-run)...'));
    const plan = planFill(map, config);
    summary.stats = plan.stats;
    summary.planned = plan.eligibleEntries;
    await emitFillOutput(summary, options);
    return summary;
  }

  if (!options.yes && (await fileExists(output))) {
    if (!process.stdout.isTTY) {
      throw new CliError(`${output} already exists. Re-run with --yes to overwrite it.`);
    }
    const confirmed = await confirmOverwrite(output);
    if (!confirmed) {
      console.log(chalk.yellow('Fill aborted by user.'));
      return undefined;
    }
  }

  log(chalk.blue(`Filling empty entries (${config.sourceLanguage} → ${config.targetLanguage}) via ${config.provider}...`));

  const failures: FillFailure[] = [];
  const onEntry = (event: EntryEvent) => {
    if (event.status === 'skipped' && (event.reason === 'translation-failed' || event.reason === 'no-target-script')) {
      failures.push({ filePath: event.filePath, original: event.original, reason: event.reason, detail: event.detail });
    }
    if (options.verbose && !quiet) {
      printEntryEvent(event);
    }
  };

  const result = await executeFill({
    map,
    config,
    loaderOptions: buildLoaderOptions(config),
    onEntry,
    log,
  });

  await writeFileAtomic(output, serializeL10nMap(result.map));

  summary.stats = result.stats;
  summary.filled = result.filledEntries;
  summary.failures = failures;

  await emitFillOutput(summary, options);

  if (options.strict && failures.length > 0) {
    setExitCode(FILL_EXIT_CODES.TRANSLATION_FAILURES);
  }

  return summary;
}

/**
 * Register the fill command
 */
export function registerFill(program: Command): void {
  program
    .command('fill')
    .description('Fill empty l10n entries via machine translation, skipping strings that are not UI text')
    .option('-c, --config <path>', 'Path to an l10n-autofill config file (defaults to l10n-autofill.config.json when present)')
    .option('-i, --input <path>', 'Input l10n JSON file (never modified)')
    .option('-o, --output <path>', 'Output l10n JSON file')
    .option('--max <n>', 'Maximum number of entries to fill (default 250)', parseInteger)
    .option('--require-uppercase-start', 'Only translate strings starting with A-Z or a safe single word')
    .option('--prefix <path>', 'Whitelisted file path prefix (repeatable); replaces the defaults', collectValues)
    .option('--any-path', 'Consider every file path, ignoring the prefix whitelist')
    .option('--safe-word <word>', 'Extra single-word UI label to accept (repeatable)', collectValues)
    .option('--max-length <n>', 'Treat longer strings as high-risk (default 180)', parseInteger)
    .option('--source <lang>', 'Source language code (default en)')
    .option('--target <lang>', 'Target language code (default zh-CN)')
    .option(
      '--provider <name>',
      'Translator provider (default google). "mock" pseudo-localizes offline; its Latin output fails the script check for zh, ja, ko and other non-Latin targets, so pair it with --dry-run or a Latin --target'
    )
    .option('--module <specifier>', 'Load the translator from this module instead of the provider package')
    .option('--delay <ms>', 'Pause before each uncached request (default 150)', parseInteger)
    .option('--timeout <ms>', 'Per-request timeout (default 20000)', parseInteger)
    .option('--dry-run', 'Classify entries and list what would be translated, without calling the translator')
    .option('--json', 'Print the run summary as JSON')
    .option('--report <path>', 'Write the JSON summary to a file')
    .option('--verbose', 'Print one line per filled or skipped entry')
    .option('--strict', 'Exit with code 2 when an eligible entry could not be filled')
    .option('-y, --yes', 'Overwrite an existing output file without asking')
    .action(
      withErrorHandling(async (options: FillCommandOptions) => {
        await runFill(options);
      })
    );
}
