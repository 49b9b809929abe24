import { describe, expect, it } from 'vitest';
import { extractPlaceholders, maskPlaceholders, placeholderToken, unmaskPlaceholders } from './placeholders.js';

describe('maskPlaceholders', () => {
  it('replaces brace and printf placeholders with numbered tokens', () => {
    expect(maskPlaceholders('Hello {name}, you have %d new %1$s')).toEqual({
      masked: 'Hello __PH0__, you have __PH1__ new __PH2__',
      placeholders: ['{name}', '%d', '%1$s'],
    });
  });

  it('masks template-literal placeholders whole', () => {
    expect(maskPlaceholders('${count} items')).toEqual({
      masked: '__PH0__ items',
      placeholders: ['${count}'],
    });
  });

  it('masks empty braces and leaves lone percent signs alone', () => {
    expect(maskPlaceholders('Save {} at 50% off')).toEqual({
      masked: 'Save __PH0__ at 50% off',
      placeholders: ['{}'],
    });
  });

  it('returns text without placeholders unchanged', () => {
    expect(maskPlaceholders('Close Tab')).toEqual({ masked: 'Close Tab', placeholders: [] });
  });
});

describe('extractPlaceholders', () => {
  it('lists placeholders in order of appearance', () => {
    expect(extractPlaceholders('{a} and %s and {a}')).toEqual(['{a}', '%s', '{a}']);
  });
});

describe('unmaskPlaceholders', () => {
  it('restores placeholders into the translation', () => {
    expect(unmaskPlaceholders('你好 __PH0__', ['{name}'])).toEqual({ ok: true, text: '你好 {name}' });
  });

  it('restores every occurrence of a token', () => {
    expect(unmaskPlaceholders('__PH0__ 和 __PH0__', ['{x}'])).toEqual({ ok: true, text: '{x} 和 {x}' });
  });

  it('inserts dollar sequences literally', () => {
    expect(unmaskPlaceholders('共 __PH0__ 项', ['${total}'])).toEqual({ ok: true, text: '共 ${total} 项' });
    expect(unmaskPlaceholders('a __PH0__', ['$&'])).toEqual({ ok: true, text: 'a $&' });
  });

  it('fails when the translator dropped or mangled a token', () => {
    expect(unmaskPlaceholders('你好', ['{name}'])).toEqual({ ok: false, reason: 'missing-token', token: '__PH0__' });
    expect(unmaskPlaceholders('你好 __ PH0 __', ['{name}'])).toEqual({
      ok: false,
      reason: 'missing-token',
      token: '__PH0__',
    });
  });

  it('fails when unknown tokens remain', () => {
    expect(unmaskPlaceholders('你好 __PH0__ __PH1__', ['{a}'])).toEqual({ ok: false, reason: 'leftover-token' });
  });

  it('keeps ten or more tokens apart', () => {
    const placeholders = Array.from({ length: 11 }, (_, index) => `{p${index}}`);
    const text = placeholders.map((_, index) => placeholderToken(index)).join(' ');
    expect(unmaskPlaceholders(text, placeholders)).toEqual({ ok: true, text: placeholders.join(' ') });
  });
});
