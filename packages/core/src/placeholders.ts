/**
 * Placeholder masking around machine translation.
 *
 * Formatting tokens are swapped for opaque `__PH<n>__` markers before the text
 * leaves the process, then restored verbatim once the translation comes back.
 */

const PLACEHOLDER_PATTERN = /(\{[^}]*\}|%\d*\$?[a-zA-Z]|\$\{[^}]+\})/g;
const TOKEN_PREFIX = '__PH';

export interface MaskedText {
  masked: string;
  /** Original placeholders, indexed by token number. */
  placeholders: string[];
}

export type UnmaskResult =
  | { ok: true; text: string }
  | { ok: false; reason: 'missing-token'; token: string }
  | { ok: false; reason: 'leftover-token' };

export function placeholderToken(index: number): string {
  return `${TOKEN_PREFIX}${index}__`;
}

export function extractPlaceholders(text: string): string[] {
  return Array.from(text.matchAll(PLACEHOLDER_PATTERN), (match) => match[0]);
}

export function maskPlaceholders(text: string): MaskedText {
  const placeholders: string[] = [];
  const masked = text.replace(PLACEHOLDER_PATTERN, (match) => {
    placeholders.push(match);
    return placeholderToken(placeholders.length - 1);
  });
  return { masked, placeholders };
}

export function unmaskPlaceholders(text: string, placeholders: readonly string[]): UnmaskResult {
  let output = text;
  for (const [index, placeholder] of placeholders.entries()) {
    const token = placeholderToken(index);
    if (!output.includes(token)) {
      return { ok: false, reason: 'missing-token', token };
    }
    // split/join keeps `$&`-style sequences in the placeholder literal
    output = output.split(token).join(placeholder);
  }

  if (output.includes(TOKEN_PREFIX)) {
    return { ok: false, reason: 'leftover-token' };
  }

  return { ok: true, text: output };
}
