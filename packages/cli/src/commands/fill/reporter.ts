/**
 * Output formatting and reporting utilities for the fill command
 */

import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import type { EntryEvent } from '@l10n-autofill/core';
import type { FillCommandOptions, FillSummary } from './types.js';

const PLAN_PREVIEW_LIMIT = 20;

/**
 * Emit the fill output (report file, JSON, or console)
 */
export async function emitFillOutput(summary: FillSummary, options: FillCommandOptions): Promise<void> {
  if (options.report) {
    const outputPath = path.resolve(process.cwd(), options.report);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(summary, null, 2));
    if (!options.json) {
      console.log(chalk.green(`Fill report written to ${outputPath}`));
    }
  }

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  if (summary.dryRun) {
    printPlan(summary, options.verbose ?? false);
  }

  printStats(summary);

  if (summary.dryRun) {
    console.log(chalk.yellow('Dry run: nothing was translated or written. Run again without --dry-run to fill entries.'));
    return;
  }

  if (summary.failures.length) {
    console.log(
      chalk.yellow(
        `${summary.failures.length} eligible entr${summary.failures.length === 1 ? 'y' : 'ies'} could not be filled.`
      )
    );
  }
  console.log(chalk.green(`wrote: ${summary.output}`));
}

export function printStats(summary: FillSummary): void {
  console.log(chalk.blue('l10n-autofill stats:'));
  console.log(JSON.stringify(summary.stats, null, 2));
}

export function printPlan(summary: FillSummary, verbose: boolean): void {
  const { planned } = summary;
  console.log(
    chalk.green(
      `${planned.length} entr${planned.length === 1 ? 'y' : 'ies'} would be translated ${summary.sourceLanguage} → ${summary.targetLanguage} via ${summary.provider}.`
    )
  );

  const visible = verbose ? planned : planned.slice(0, PLAN_PREVIEW_LIMIT);
  visible.forEach((entry) => {
    console.log(`  • ${chalk.gray(entry.filePath)} ${JSON.stringify(entry.original)}`);
  });
  if (visible.length < planned.length) {
    console.log(chalk.gray(`  ... and ${planned.length - visible.length} more (use --verbose to list all)`));
  }
}

export function formatEntryEvent(event: EntryEvent): string {
  if (event.status === 'filled') {
    return `  filled ${event.filePath}: ${JSON.stringify(event.original)} → ${JSON.stringify(event.value)}`;
  }
  const detail = event.detail ? ` (${event.detail})` : '';
  return `  skip [${event.reason}] ${event.filePath}: ${JSON.stringify(event.original)}${detail}`;
}

export function printEntryEvent(event: EntryEvent): void {
  const line = formatEntryEvent(event);
  console.log(event.status === 'filled' ? chalk.green(line) : chalk.gray(line));
}
