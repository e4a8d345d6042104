/**
 * Orders strings by Unicode code point. The default sort compares UTF-16
 * code units, which puts astral characters before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) {
      return left - right;
    }
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }

  return a.length - i - (b.length - j);
}
