/**
 * Exit Code Reference for the l10n-autofill CLI
 *
 * | Code | Meaning                                                     |
 * |------|-------------------------------------------------------------|
 * | 0    | Success                                                     |
 * | 1    | General error (bad input, bad config, crash)                |
 * | 2    | `--strict` run where eligible entries could not be filled   |
 *
 * ```bash
 * l10n-autofill fill --input zh.json --output zh.filled.json --strict
 * if [ $? -eq 2 ]; then
 *   echo "Some entries failed translation"
 * fi
 * ```
 */

export const GENERAL_EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
} as const;

export const FILL_EXIT_CODES = {
  /** Translation or validation failed for at least one eligible entry */
  TRANSLATION_FAILURES: 2,
} as const;

export const EXIT_CODE_DESCRIPTIONS: Record<number, string> = {
  [GENERAL_EXIT_CODES.SUCCESS]: 'Success',
  [GENERAL_EXIT_CODES.ERROR]: 'General error',
  [FILL_EXIT_CODES.TRANSLATION_FAILURES]: 'Eligible entries failed translation or validation',
};

export function getExitCodeDescription(code: number): string {
  return EXIT_CODE_DESCRIPTIONS[code] ?? `Unknown exit code: ${code}`;
}

/**
 * Set the process exit code. With `DEBUG=l10n-autofill` the reason is logged.
 */
export function setExitCode(code: number): void {
  process.exitCode = code;
  if (code !== 0 && process.env.DEBUG?.includes('l10n-autofill')) {
    console.error(`[l10n-autofill] Exit code ${code}: ${getExitCodeDescription(code)}`);
  }
}
