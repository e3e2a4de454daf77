/**
 * @module utils/text
 *
 * 纯字符串工具：LangText 的文本运算在这里实现，LangText 只负责保留语言标签。
 *
 * 索引均按 UTF-16 代码单元计算，与 `String.prototype` 一致。
 */

import { Diagnostics } from '../diagnostics/diagnostics.js';

/**
 * 大小写折叠，用于不区分大小写的语言标签比较（`ß` → `ss`）。
 */
export function casefold(value: string): string {
  return value.toUpperCase().toLowerCase();
}

function isCased(ch: string): boolean {
  return ch.toLowerCase() !== ch.toUpperCase();
}

function isUpperChar(ch: string): boolean {
  return isCased(ch) && ch === ch.toUpperCase() && ch !== ch.toLowerCase();
}

function isLowerChar(ch: string): boolean {
  return isCased(ch) && ch === ch.toLowerCase() && ch !== ch.toUpperCase();
}

export function capitalize(value: string): string {
  const [first = '', ...rest] = value;
  return first.toUpperCase() + rest.join('').toLowerCase();
}

export function swapCase(value: string): string {
  let out = '';
  for (const ch of value) {
    if (isUpperChar(ch)) out += ch.toLowerCase();
    else if (isLowerChar(ch)) out += ch.toUpperCase();
    else out += ch;
  }
  return out;
}

/**
 * 每个单词首字母大写，其余小写。单词是连续的有大小写字符，
 * 因此 `they're` 变为 `They'Re`。
 */
export function title(value: string): string {
  let out = '';
  let previousCased = false;
  for (const ch of value) {
    if (isCased(ch)) {
      out += previousCased ? ch.toLowerCase() : ch.toUpperCase();
      previousCased = true;
    } else {
      out += ch;
      previousCased = false;
    }
  }
  return out;
}

export function isTitle(value: string): boolean {
  let previousCased = false;
  let sawCased = false;
  for (const ch of value) {
    if (isUpperChar(ch)) {
      if (previousCased) return false;
      previousCased = true;
      sawCased = true;
    } else if (isLowerChar(ch)) {
      if (!previousCased) return false;
      previousCased = true;
      sawCased = true;
    } else {
      previousCased = false;
    }
  }
  return sawCased;
}

export function isLower(value: string): boolean {
  const cased = [...value].filter(isCased);
  return cased.length > 0 && cased.every(isLowerChar);
}

export function isUpper(value: string): boolean {
  const cased = [...value].filter(isCased);
  return cased.length > 0 && cased.every(isUpperChar);
}

export function isAlpha(value: string): boolean {
  return /^\p{L}+$/u.test(value);
}

export function isDigit(value: string): boolean {
  return /^\p{Nd}+$/u.test(value);
}

export function isAlnum(value: string): boolean {
  return /^[\p{L}\p{N}]+$/u.test(value);
}

export function isSpace(value: string): boolean {
  return /^\s+$/u.test(value);
}

export type StripSide = 'both' | 'start' | 'end';

/**
 * 去除首尾字符。未给出 `chars` 时去除空白。
 */
export function strip(value: string, chars?: string, side: StripSide = 'both'): string {
  if (chars === undefined) {
    if (side === 'start') return value.trimStart();
    if (side === 'end') return value.trimEnd();
    return value.trim();
  }
  let start = 0;
  let end = value.length;
  if (side !== 'end') {
    while (start < end && chars.includes(value.charAt(start))) start++;
  }
  if (side !== 'start') {
    while (end > start && chars.includes(value.charAt(end - 1))) end--;
  }
  return value.slice(start, end);
}

function ensureFillChar(fillChar: string): string {
  if (fillChar.length !== 1) {
    return Diagnostics.invalidType('fillChar', 'a single character', fillChar).throw();
  }
  return fillChar;
}

export function center(value: string, width: number, fillChar = ' '): string {
  const fill = ensureFillChar(fillChar);
  const margin = width - value.length;
  if (margin <= 0) return value;
  // 奇数余量时与宽度的奇偶性共同决定多出的一格放在左侧还是右侧
  const left = Math.floor(margin / 2) + (margin & width & 1);
  return fill.repeat(left) + value + fill.repeat(margin - left);
}

export function ljust(value: string, width: number, fillChar = ' '): string {
  return value.padEnd(width, ensureFillChar(fillChar));
}

export function rjust(value: string, width: number, fillChar = ' '): string {
  return value.padStart(width, ensureFillChar(fillChar));
}

export function zfill(value: string, width: number): string {
  if (value.length >= width) return value;
  const zeros = '0'.repeat(width - value.length);
  const sign = value.charAt(0);
  if (sign === '+' || sign === '-') {
    return sign + zeros + value.slice(1);
  }
  return zeros + value;
}

export function expandTabs(value: string, tabSize = 8): string {
  let out = '';
  let column = 0;
  for (const ch of value) {
    if (ch === '\t') {
      if (tabSize > 0) {
        const spaces = tabSize - (column % tabSize);
        out += ' '.repeat(spaces);
        column += spaces;
      }
    } else if (ch === '\n' || ch === '\r') {
      out += ch;
      column = 0;
    } else {
      out += ch;
      column++;
    }
  }
  return out;
}

function ensureSeparator(separator: string): string {
  if (separator === '') {
    return Diagnostics.emptySeparator().throw();
  }
  return separator;
}

function whitespaceTokens(value: string): Array<{ start: number; end: number }> {
  return [...value.matchAll(/\S+/gu)].map(match => {
    const start = match.index ?? 0;
    return { start, end: start + match[0].length };
  });
}

/**
 * 按分隔符拆分。未给出分隔符时按连续空白拆分并丢弃空片段。
 * `maxSplit` 为负数表示不限制。
 */
export function split(value: string, separator?: string, maxSplit = -1): string[] {
  if (separator === undefined) {
    const tokens = whitespaceTokens(value);
    if (maxSplit < 0 || tokens.length <= maxSplit + 1) {
      return tokens.map(token => value.slice(token.start, token.end));
    }
    const head = tokens.slice(0, maxSplit).map(token => value.slice(token.start, token.end));
    const restStart = tokens[maxSplit]?.start ?? value.length;
    return [...head, value.slice(restStart)];
  }
  const sep = ensureSeparator(separator);
  const parts = value.split(sep);
  if (maxSplit < 0 || parts.length <= maxSplit + 1) return parts;
  return [...parts.slice(0, maxSplit), parts.slice(maxSplit).join(sep)];
}

/**
 * 与 `split` 相同，但 `maxSplit` 从右侧开始计数。
 */
export function rsplit(value: string, separator?: string, maxSplit = -1): string[] {
  if (separator === undefined) {
    const tokens = whitespaceTokens(value);
    if (maxSplit < 0 || tokens.length <= maxSplit + 1) {
      return tokens.map(token => value.slice(token.start, token.end));
    }
    const tail = tokens.slice(tokens.length - maxSplit).map(token => value.slice(token.start, token.end));
    const restEnd = tokens[tokens.length - maxSplit - 1]?.end ?? 0;
    return [value.slice(0, restEnd), ...tail];
  }
  const sep = ensureSeparator(separator);
  const parts = value.split(sep);
  if (maxSplit < 0 || parts.length <= maxSplit + 1) return parts;
  const cut = parts.length - maxSplit;
  return [parts.slice(0, cut).join(sep), ...parts.slice(cut)];
}

const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/g;

export function splitLines(value: string, keepEnds = false): string[] {
  const lines: string[] = [];
  let last = 0;
  for (const match of value.matchAll(LINE_BREAK)) {
    const index = match.index ?? 0;
    const end = index + match[0].length;
    lines.push(value.slice(last, keepEnds ? end : index));
    last = end;
  }
  if (last < value.length) {
    lines.push(value.slice(last));
  }
  return lines;
}

export function partition(value: string, separator: string): [string, string, string] {
  const sep = ensureSeparator(separator);
  const index = value.indexOf(sep);
  if (index < 0) return [value, '', ''];
  return [value.slice(0, index), sep, value.slice(index + sep.length)];
}

export function rpartition(value: string, separator: string): [string, string, string] {
  const sep = ensureSeparator(separator);
  const index = value.lastIndexOf(sep);
  if (index < 0) return ['', '', value];
  return [value.slice(0, index), sep, value.slice(index + sep.length)];
}

export function removePrefix(value: string, prefix: string): string {
  return prefix !== '' && value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

export function removeSuffix(value: string, suffix: string): string {
  return suffix !== '' && value.endsWith(suffix) ? value.slice(0, value.length - suffix.length) : value;
}

/** 将可能为负的起止位置规整为 [start, end]；start 可能超出长度 */
function searchBounds(length: number, start?: number, end?: number): [number, number] {
  let from = start ?? 0;
  let to = end ?? length;
  if (from < 0) from = Math.max(0, from + length);
  if (to < 0) to = Math.max(0, to + length);
  return [from, Math.min(to, length)];
}

export function find(value: string, sub: string, start?: number, end?: number): number {
  const [from, to] = searchBounds(value.length, start, end);
  if (from > value.length || from > to) return -1;
  const index = value.slice(from, to).indexOf(sub);
  return index < 0 ? -1 : index + from;
}

export function rfind(value: string, sub: string, start?: number, end?: number): number {
  const [from, to] = searchBounds(value.length, start, end);
  if (from > value.length || from > to) return -1;
  const index = value.slice(from, to).lastIndexOf(sub);
  return index < 0 ? -1 : index + from;
}

/** 统计不重叠出现次数 */
export function count(value: string, sub: string, start?: number, end?: number): number {
  const [from, to] = searchBounds(value.length, start, end);
  if (from > value.length || from > to) return 0;
  const window = value.slice(from, to);
  if (sub === '') return window.length + 1;
  return window.split(sub).length - 1;
}

/**
 * 替换 `{}`、`{0}`、`{name}` 占位符；`{{` 与 `}}` 输出字面花括号。
 * 缺少的占位值抛出 N001。
 */
export function format(template: string, args: readonly unknown[], kwargs: Readonly<Record<string, unknown>> = {}): string {
  let out = '';
  let autoIndex = 0;
  let i = 0;

  const resolve = (field: string): unknown => {
    if (field === '') {
      const index = autoIndex++;
      if (index >= args.length) return Diagnostics.entryNotFound(`Replacement index ${index}`).throw();
      return args[index];
    }
    if (/^\d+$/.test(field)) {
      const index = Number(field);
      if (index >= args.length) return Diagnostics.entryNotFound(`Replacement index ${index}`).throw();
      return args[index];
    }
    if (!Object.hasOwn(kwargs, field)) {
      return Diagnostics.entryNotFound(`Replacement field '${field}'`).throw();
    }
    return kwargs[field];
  };

  while (i < template.length) {
    const ch = template.charAt(i);
    if (ch === '{') {
      if (template.charAt(i + 1) === '{') {
        out += '{';
        i += 2;
        continue;
      }
      const close = template.indexOf('}', i);
      if (close < 0) {
        return Diagnostics.malformedFormat(template).throw();
      }
      out += String(resolve(template.slice(i + 1, close)));
      i = close + 1;
    } else if (ch === '}') {
      if (template.charAt(i + 1) !== '}') {
        return Diagnostics.malformedFormat(template).throw();
      }
      out += '}';
      i += 2;
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}
