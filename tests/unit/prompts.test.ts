import { describe, expect, it } from 'vitest';
import { formatFolderLine, truncate } from '../../src/cli/prompts';

describe('truncate', () => {
  it('leaves short text alone', () => {
    expect(truncate('Blue', 10)).toBe('Blue');
    expect(truncate('0123456789', 10)).toBe('0123456789');
  });

  it('cuts long text to the width with an ellipsis', () => {
    expect(truncate('0123456789AB', 10)).toBe('0123456...');
  });
});

describe('formatFolderLine', () => {
  it('pads the path to a fixed column', () => {
    expect(formatFolderLine('Artist/Album', 'Rock')).toBe(`${'Artist/Album'.padEnd(60)} Rock`);
  });

  it('truncates long paths and category names', () => {
    const line = formatFolderLine('a'.repeat(80), 'c'.repeat(40));
    expect(line).toBe(`${'a'.repeat(57)}... ${'c'.repeat(27)}...`);
  });
});
