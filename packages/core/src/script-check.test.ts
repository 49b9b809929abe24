import { describe, expect, it } from 'vitest';
import { containsTargetScript, hasScriptCheck, primaryLanguage } from './script-check.js';

describe('containsTargetScript', () => {
  it('requires Han characters for Chinese', () => {
    expect(containsTargetScript('打开文件', 'zh-CN')).toBe(true);
    expect(containsTargetScript('Open file', 'zh-CN')).toBe(false);
    expect(containsTargetScript('打开 {path}', 'zh_TW')).toBe(true);
  });

  it('accepts kana for Japanese', () => {
    expect(containsTargetScript('ファイル', 'ja')).toBe(true);
  });

  it('requires Cyrillic for Russian', () => {
    expect(containsTargetScript('Открыть', 'ru')).toBe(true);
    expect(containsTargetScript('Open', 'ru')).toBe(false);
  });

  it('passes Latin-script targets through', () => {
    expect(containsTargetScript('Ouvrir', 'fr')).toBe(true);
    expect(hasScriptCheck('pt-BR')).toBe(false);
    expect(hasScriptCheck('ko-KR')).toBe(true);
  });
});

describe('primaryLanguage', () => {
  it('lowercases the first subtag', () => {
    expect(primaryLanguage('ZH_tw')).toBe('zh');
    expect(primaryLanguage('de')).toBe('de');
  });
});
