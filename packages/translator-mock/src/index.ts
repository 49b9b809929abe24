import type { Translator, TranslatorFactoryOptions } from '@l10n-autofill/translation';

const ACCENT_MAP: Record<string, string> = {
  a: 'á',
  e: 'é',
  i: 'í',
  o: 'ó',
  u: 'ú',
  A: 'Á',
  E: 'É',
  I: 'Í',
  O: 'Ó',
  U: 'Ú',
};

// Placeholder tokens must survive pseudo-localization untouched.
const MASK_TOKEN_PATTERN = /(__PH\d+__)/;

export interface MockTranslatorOptions extends TranslatorFactoryOptions {
  accentVowels?: boolean;
}

export function createTranslator(options: MockTranslatorOptions): Translator {
  const accentVowels = options.accentVowels ?? true;

  return {
    name: 'mock',
    async translate(texts: string[], _sourceLanguage: string, targetLanguage: string): Promise<string[]> {
      return texts.map((text) => pseudoLocalize(text, targetLanguage, accentVowels));
    },
  };
}

export function pseudoLocalize(input: string, locale: string, accentVowels: boolean): string {
  const prefix = `[${locale}]`;
  if (!input) {
    return prefix;
  }

  if (!accentVowels) {
    return `${prefix} ${input}`;
  }

  const transformed = input
    .split(MASK_TOKEN_PATTERN)
    .map((part) =>
      MASK_TOKEN_PATTERN.test(part)
        ? part
        : Array.from(part)
            .map((char) => ACCENT_MAP[char] ?? char)
            .join('')
    )
    .join('');
  return `${prefix} ${transformed}`;
}

export default {
  createTranslator,
};
