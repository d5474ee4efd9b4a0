import { describe, it, expect } from '@jest/globals';
import { numberedSources, truncateForPrompt } from '../utils/text';

describe('truncateForPrompt', () => {
  it('leaves short text alone', () => {
    expect(truncateForPrompt('short', 10)).toBe('short');
  });

  it('cuts long text and marks the cut', () => {
    expect(truncateForPrompt('a'.repeat(50), 20)).toBe('aaaaa\n\n... (trimmed)');
  });

  it('prefers a nearby line break', () => {
    const text = `${'a'.repeat(22)}\n${'b'.repeat(40)}`;
    expect(truncateForPrompt(text, 40)).toBe(`${'a'.repeat(22)}\n\n... (trimmed)`);
  });
});

describe('numberedSources', () => {
  it('numbers sources and falls back to the url without a title', () => {
    expect(
      numberedSources([
        { url: 'https://a.example', title: 'Alpha' },
        { url: 'https://b.example', title: '  ' },
        { url: 'https://c.example', title: null },
      ]),
    ).toBe('[1] Alpha - https://a.example\n[2] https://b.example\n[3] https://c.example');
  });
});
