import chalk from 'chalk';
import { ConfigValidationError, L10nFormatError } from '@l10n-autofill/core';
import { TranslatorLoadError } from '@l10n-autofill/translation';

export class CliError extends Error {
  constructor(message: string, public exitCode = 1) {
    super(message);
    this.name = 'CliError';
  }
}

/**
 * Map failures the user can fix (bad input, bad config, missing adapter) to
 * a CliError; anything else passes through unchanged.
 */
export function toCliError(error: unknown): unknown {
  if (
    error instanceof L10nFormatError ||
    error instanceof ConfigValidationError ||
    error instanceof TranslatorLoadError
  ) {
    return new CliError(error.message);
  }
  return error;
}

type MaybePromise<T> = T | Promise<T>;

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<R | undefined> {
  return async (...args: A): Promise<R | undefined> => {
    try {
      return await action(...args);
    } catch (caught) {
      const error = toCliError(caught);
      if (error instanceof CliError) {
        console.error(chalk.red(error.message));
        process.exitCode = error.exitCode;
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      process.exitCode = 1;
      return undefined;
    }
  };
}
