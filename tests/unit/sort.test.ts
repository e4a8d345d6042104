import { describe, expect, it } from 'vitest';
import { compareCodePoints } from '../../src/utils/sort';

describe('compareCodePoints', () => {
  it('puts characters above U+FFFF after the rest of the BMP', () => {
    expect(['\u{1F3B5}', '\uFF5E', 'a'].sort(compareCodePoints)).toEqual(['a', '\uFF5E', '\u{1F3B5}']);
  });

  it('orders prefixes first and equal strings as equal', () => {
    expect(compareCodePoints('Rock', 'Rock and Roll')).toBeLessThan(0);
    expect(compareCodePoints('Rock and Roll', 'Rock')).toBeGreaterThan(0);
    expect(compareCodePoints('\u{1F3B5}x', '\u{1F3B5}x')).toBe(0);
  });
});
