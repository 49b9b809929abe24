import { describe, it, expect } from 'vitest';
import { formatEntryEvent } from './reporter.js';

describe('formatEntryEvent', () => {
  it('formats a filled entry', () => {
    expect(
      formatEntryEvent({ status: 'filled', filePath: 'app/src/menu.rs', original: 'Open', value: '打开' })
    ).toBe('  filled app/src/menu.rs: "Open" → "打开"');
  });

  it('includes the skip reason and detail', () => {
    expect(
      formatEntryEvent({
        status: 'skipped',
        filePath: 'app/src/menu.rs',
        original: 'foo_bar',
        reason: 'high-risk',
        detail: 'identifier',
      })
    ).toBe('  skip [high-risk] app/src/menu.rs: "foo_bar" (identifier)');
  });

  it('omits a missing detail', () => {
    expect(
      formatEntryEvent({ status: 'skipped', filePath: 'lib/src/a.rs', original: 'hello', reason: 'not-ui' })
    ).toBe('  skip [not-ui] lib/src/a.rs: "hello"');
  });
});
