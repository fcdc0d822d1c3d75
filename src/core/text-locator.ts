/**
 * Text Locator
 * 在原始字节中查找语法树没有直接暴露的关键字位置（例如 else）。
 * 跳过行注释与块注释；不处理字符串字面量，调用方只能在字符串不可能出现的位置使用。
 */

export const NOT_FOUND = -1;

const SLASH = 0x2f;
const STAR = 0x2a;
const NEWLINE = 0x0a;

export function findKeyword(source: Buffer, start: number, keyword: string): number {
  const needle = Buffer.from(keyword, "utf8");
  let i = Math.max(start, 0);

  while (i < source.length) {
    if (source.subarray(i, i + needle.length).equals(needle)) {
      return i;
    }
    if (source[i] === SLASH && source[i + 1] === SLASH) {
      while (i < source.length && source[i] !== NEWLINE) i++;
      continue;
    }
    if (source[i] === SLASH && source[i + 1] === STAR) {
      const close = source.indexOf("*/", i + 2);
      if (close < 0) return NOT_FOUND;
      i = close + 2;
      continue;
    }
    i++;
  }

  return NOT_FOUND;
}
