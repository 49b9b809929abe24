import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  GoogleTranslateError,
  buildRequestUrl,
  createTranslator,
  parseTranslationResponse,
} from './index.js';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('buildRequestUrl', () => {
  it('encodes the query for the anonymous endpoint', () => {
    expect(buildRequestUrl('https://mt.test/single', 'Save & Close', 'en', 'zh-CN')).toBe(
      'https://mt.test/single?client=gtx&sl=en&tl=zh-CN&dt=t&q=Save+%26+Close'
    );
  });
});

describe('parseTranslationResponse', () => {
  it('joins the first element of every segment', () => {
    const payload = [[['打开文件。', 'Open file.', null], ['保存', 'Save']], null, 'en'];
    expect(parseTranslationResponse(payload)).toBe('打开文件。保存');
  });

  it('skips empty segments', () => {
    expect(parseTranslationResponse([[null, ['好', 'Good'], []]])).toBe('好');
  });

  it('returns an empty string when there are no segments', () => {
    expect(parseTranslationResponse([null])).toBe('');
  });

  it('rejects payloads that are not arrays', () => {
    expect(() => parseTranslationResponse({ error: 'quota' })).toThrow(GoogleTranslateError);
    expect(() => parseTranslationResponse(['text'])).toThrow('Unexpected response: segment list is not an array.');
  });
});

describe('google translator', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requests one translation per text with a browser user agent', async () => {
    const fetchMock = vi
      .fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>()
      .mockResolvedValueOnce(jsonResponse([[['关闭', 'Close']]]))
      .mockResolvedValueOnce(jsonResponse([[['打开 __PH0__', 'Open __PH0__']]]));
    vi.stubGlobal('fetch', fetchMock);

    const translator = createTranslator({ provider: 'google', endpoint: 'https://mt.test/single' });
    const result = await translator.translate(['Close', 'Open __PH0__'], 'en', 'zh-CN');

    expect(result).toEqual(['关闭', '打开 __PH0__']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://mt.test/single?client=gtx&sl=en&tl=zh-CN&dt=t&q=Close');
    expect(init?.headers).toEqual({ 'User-Agent': 'Mozilla/5.0' });
  });

  it('throws on non-2xx responses', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 429));
    const translator = createTranslator({ provider: 'google', fetch: fetchMock });

    await expect(translator.translate(['Close'], 'en', 'zh-CN')).rejects.toThrow(
      'Google Translate responded with HTTP 429'
    );
  });

  it('uses a custom endpoint when given one', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request) => jsonResponse([[['Fermer', 'Close']]]));
    const translator = createTranslator({ provider: 'google', endpoint: 'https://alt.test/t', fetch: fetchMock });

    await translator.translate(['Close'], 'en', 'fr');
    expect(String(fetchMock.mock.calls[0][0])).toBe('https://alt.test/t?client=gtx&sl=en&tl=fr&dt=t&q=Close');
  });
});
