import { describe, it, expect } from 'vitest';

import { unescapeDelimiters } from './escape.js';

const brackets = { left: '[[', right: ']]' };

describe('unescapeDelimiters', () => {
  it('strips the marker from escaped left and right delimiters', () => {
    expect(unescapeDelimiters('some \\[[ text \\]]', brackets)).toBe(
      'some [[ text ]]',
    );
  });

  it('leaves other backslashes alone', () => {
    expect(unescapeDelimiters('C:\\path\\to [x]', brackets)).toBe(
      'C:\\path\\to [x]',
    );
  });

  it('leaves unescaped delimiters alone', () => {
    expect(unescapeDelimiters('a ]] b', brackets)).toBe('a ]] b');
  });

  it('uses the configured delimiters', () => {
    expect(unescapeDelimiters('a \\{b\\} \\[[', { left: '{', right: '}' })).toBe(
      'a {b} \\[[',
    );
  });

  it('handles delimiters made of regex metacharacters', () => {
    expect(
      unescapeDelimiters('\\(* note \\*)', { left: '(*', right: '*)' }),
    ).toBe('(* note *)');
  });
});
