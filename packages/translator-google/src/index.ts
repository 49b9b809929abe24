import type { Translator, TranslatorFactoryOptions } from '@l10n-autofill/translation';

export const GOOGLE_TRANSLATE_ENDPOINT = 'https://translate.googleapis.com/translate_a/single';
const DEFAULT_TIMEOUT_MS = 20_000;
const USER_AGENT = 'Mozilla/5.0';

export interface GoogleTranslatorOptions extends TranslatorFactoryOptions {
  endpoint?: string;
  fetch?: typeof fetch;
}

export class GoogleTranslateError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'GoogleTranslateError';
  }
}

export function buildRequestUrl(endpoint: string, text: string, source: string, target: string): string {
  const params = new URLSearchParams({ client: 'gtx', sl: source, tl: target, dt: 't', q: text });
  return `${endpoint}?${params.toString()}`;
}

/**
 * The endpoint answers with nested arrays; element 0 lists segments shaped
 * `[translated, original, ...]`.
 */
export function parseTranslationResponse(payload: unknown): string {
  if (!Array.isArray(payload)) {
    throw new GoogleTranslateError('Unexpected response: expected a JSON array.');
  }

  const segments: unknown = payload[0];
  if (segments === null || segments === undefined) {
    return '';
  }
  if (!Array.isArray(segments)) {
    throw new GoogleTranslateError('Unexpected response: segment list is not an array.');
  }

  return segments
    .map((segment: unknown) => (Array.isArray(segment) && typeof segment[0] === 'string' ? segment[0] : ''))
    .join('');
}

export function createTranslator(options: GoogleTranslatorOptions): Translator {
  const endpoint = options.endpoint ?? GOOGLE_TRANSLATE_ENDPOINT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;

  async function translateOne(text: string, source: string, target: string): Promise<string> {
    const response = await fetchImpl(buildRequestUrl(endpoint, text, source, target), {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new GoogleTranslateError(`Google Translate responded with HTTP ${response.status}`, response.status);
    }

    const payload: unknown = await response.json();
    return parseTranslationResponse(payload);
  }

  return {
    name: 'google',
    async translate(texts: string[], sourceLanguage: string, targetLanguage: string): Promise<string[]> {
      const results: string[] = [];
      for (const text of texts) {
        results.push(await translateOne(text, sourceLanguage, targetLanguage));
      }
      return results;
    },
  };
}

export default {
  createTranslator,
};
