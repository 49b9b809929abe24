import { describe, expect, it } from 'vitest';
import { acceptsGroup, isPathWhitelisted } from './paths.js';

describe('path whitelist', () => {
  const prefixes = ['app/ui/', 'app/dialogs/'];

  it('matches on prefix only', () => {
    expect(isPathWhitelisted('app/ui/menu.rs', prefixes)).toBe(true);
    expect(isPathWhitelisted('lib/app/ui/menu.rs', prefixes)).toBe(false);
    expect(isPathWhitelisted('app/uikit/menu.rs', prefixes)).toBe(false);
  });

  it('accepts every group when anyPath is set', () => {
    expect(acceptsGroup('lib/core.rs', { prefixes, anyPath: true })).toBe(true);
    expect(acceptsGroup('lib/core.rs', { prefixes })).toBe(false);
  });
});
