import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { normalizeConfig, parseL10nMap } from '@l10n-autofill/core';
import type { Translator, TranslatorLoadOptions } from '@l10n-autofill/translation';

const loadTranslatorMock = vi.hoisted(() => vi.fn());

vi.mock('@l10n-autofill/translation', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@l10n-autofill/translation')>();
  return { ...actual, loadTranslator: loadTranslatorMock };
});

import { buildLoaderOptions, createRetryingTranslator, executeFill } from './executor.js';

function fakeTranslator(translate: Translator['translate']): Translator & { dispose: Mock } {
  return { name: 'fake', translate: vi.fn(translate), dispose: vi.fn() };
}

describe('createRetryingTranslator', () => {
  it('translates each masked text once per run', async () => {
    const translator = fakeTranslator(async () => ['打开']);
    const translate = createRetryingTranslator({
      translator,
      sourceLanguage: 'en',
      targetLanguage: 'zh-CN',
      delayMs: 0,
    });

    await expect(translate('Open')).resolves.toEqual({ ok: true, text: '打开' });
    await expect(translate('Open')).resolves.toEqual({ ok: true, text: '打开' });
    expect(translator.translate).toHaveBeenCalledTimes(1);
    expect(translator.translate).toHaveBeenCalledWith(['Open'], 'en', 'zh-CN');
  });

  it('retries a failed request and logs the attempt', async () => {
    const translate = vi
      .fn<[string[], string, string], Promise<string[]>>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(['  保存  ']);
    const log = vi.fn();
    const textTranslator = createRetryingTranslator({
      translator: { name: 'flaky', translate },
      sourceLanguage: 'en',
      targetLanguage: 'zh-CN',
      delayMs: 0,
      retryMinTimeoutMs: 0,
      log,
    });

    await expect(textTranslator('Save')).resolves.toEqual({ ok: true, text: '保存' });
    expect(translate).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('Attempt 1 failed translating "Save": socket hang up'));
  });

  it('reports an empty translation after the last attempt', async () => {
    const translator = fakeTranslator(async () => ['   ']);
    const translate = createRetryingTranslator({
      translator,
      sourceLanguage: 'en',
      targetLanguage: 'zh-CN',
      delayMs: 0,
      retryMinTimeoutMs: 0,
      log: () => undefined,
    });

    await expect(translate('Close')).resolves.toEqual({ ok: false, error: 'empty translation' });
    expect(translator.translate).toHaveBeenCalledTimes(3);
  });

  it('does not cache failures', async () => {
    const translate = vi
      .fn<[string[], string, string], Promise<string[]>>()
      .mockResolvedValueOnce([''])
      .mockResolvedValueOnce([''])
      .mockResolvedValueOnce([''])
      .mockResolvedValueOnce(['关闭']);
    const textTranslator = createRetryingTranslator({
      translator: { name: 'flaky', translate },
      sourceLanguage: 'en',
      targetLanguage: 'zh-CN',
      delayMs: 0,
      retryMinTimeoutMs: 0,
      log: () => undefined,
    });

    await expect(textTranslator('Close')).resolves.toEqual({ ok: false, error: 'empty translation' });
    await expect(textTranslator('Close')).resolves.toEqual({ ok: true, text: '关闭' });
  });
});

describe('request pacing', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('waits before each uncached request and not on a cache hit', async () => {
    const translator = fakeTranslator(async (texts) => texts.map((text) => (text === 'Open' ? '打开' : '关闭')));
    const translate = createRetryingTranslator({
      translator,
      sourceLanguage: 'en',
      targetLanguage: 'zh-CN',
      delayMs: 150,
    });

    const first = translate('Open');
    await vi.advanceTimersByTimeAsync(149);
    expect(translator.translate).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await expect(first).resolves.toEqual({ ok: true, text: '打开' });
    expect(translator.translate).toHaveBeenCalledTimes(1);

    await expect(translate('Open')).resolves.toEqual({ ok: true, text: '打开' });
    expect(vi.getTimerCount()).toBe(0);
    expect(translator.translate).toHaveBeenCalledTimes(1);

    const second = translate('Close');
    await vi.advanceTimersByTimeAsync(149);
    expect(translator.translate).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    await expect(second).resolves.toEqual({ ok: true, text: '关闭' });
    expect(translator.translate).toHaveBeenCalledTimes(2);
  });

  it('does not wait when the delay is zero', async () => {
    const translator = fakeTranslator(async () => ['打开']);
    const translate = createRetryingTranslator({
      translator,
      sourceLanguage: 'en',
      targetLanguage: 'zh-CN',
      delayMs: 0,
    });

    await expect(translate('Open')).resolves.toEqual({ ok: true, text: '打开' });
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('buildLoaderOptions', () => {
  it('passes provider, module and timeout through', () => {
    const config = normalizeConfig({ provider: 'mock', module: './adapter.js', timeoutMs: 5000 });
    const options: TranslatorLoadOptions = buildLoaderOptions(config);

    expect(options.provider).toBe('mock');
    expect(options.module).toBe('./adapter.js');
    expect(options.timeoutMs).toBe(5000);
    expect(options.config).toMatchObject({ provider: 'mock', timeoutMs: 5000 });
  });
});

describe('executeFill', () => {
  let translator: ReturnType<typeof fakeTranslator>;

  beforeEach(() => {
    translator = fakeTranslator(async (texts) => texts.map((text) => (text === 'Open File' ? '打开文件' : text)));
    loadTranslatorMock.mockResolvedValue(translator);
  });

  it('fills through the loaded translator and disposes it', async () => {
    const map = parseL10nMap('{"app/src/menu.rs": {"Open File": null, "Quit": "Quit"}}');
    const config = normalizeConfig({ anyPath: true, delayMs: 0, provider: 'fake' });

    const result = await executeFill({ map, config, loaderOptions: buildLoaderOptions(config) });

    expect(loadTranslatorMock).toHaveBeenCalledWith(expect.objectContaining({ provider: 'fake' }));
    expect(result.map).toEqual(parseL10nMap('{"app/src/menu.rs": {"Open File": "打开文件", "Quit": "Quit"}}'));
    expect(result.stats.filled).toBe(1);
    expect(translator.dispose).toHaveBeenCalledTimes(1);
  });

  it('disposes the translator when the run throws', async () => {
    const map = parseL10nMap('{"app/src/menu.rs": {"Open File": null}}');
    const config = normalizeConfig({ anyPath: true, delayMs: 0 });
    const onEntry = vi.fn(() => {
      throw new Error('observer failed');
    });

    await expect(
      executeFill({ map, config, loaderOptions: buildLoaderOptions(config), onEntry })
    ).rejects.toThrow('observer failed');
    expect(translator.dispose).toHaveBeenCalledTimes(1);
  });
});
