/**
 * @module converter/from-string
 *
 * 原始字符串 → LangText / LangTextSet / MultiLangText。
 *
 * 两种方式：
 * - `manual`：调用方给出语言标签
 * - `parse`：按分隔符最后一次出现的位置拆分，`"Hello@en"` → `"Hello"@en`；
 *   找不到分隔符（或分隔符为空）时整个字符串作为文本，语言为空
 */

import { Diagnostics } from '../diagnostics/diagnostics.js';
import { LangText, type EntityOptions } from '../model/lang-text.js';
import { LangTextSet } from '../model/lang-text-set.js';
import type { MultiLangText } from '../model/multi-lang-text.js';
import { DEFAULT_SEPARATOR } from '../model/render.js';
import { assertOptionalString, assertString, assertStringIterable } from '../validation/type-guards.js';
import { fromLangTextsToMultiLangText } from './from-lang-text.js';

export type ConversionMethod = 'manual' | 'parse';

export const CONVERSION_METHODS: readonly ConversionMethod[] = ['manual', 'parse'];

export function isConversionMethod(value: unknown): value is ConversionMethod {
  return typeof value === 'string' && CONVERSION_METHODS.some(method => method === value);
}

export function fromStringToLangTextManual(
  input: string | null | undefined,
  lang?: string | null,
  options: EntityOptions = {}
): LangText {
  return new LangText(input ?? '', lang ?? '', options);
}

export function fromStringToLangTextParse(
  input: string,
  separator: string = DEFAULT_SEPARATOR,
  options: EntityOptions = {}
): LangText {
  assertString(input, 'input');
  assertString(separator, 'separator');

  const index = separator === '' ? -1 : input.lastIndexOf(separator);
  if (index < 0) {
    return new LangText(input, '', options);
  }
  return new LangText(input.slice(0, index), input.slice(index + separator.length), options);
}

/**
 * `method` 须为 `manual` 或 `parse`。
 *
 * @throws DiagnosticError K003 未知的转换方式
 */
export function fromStringToLangText(
  method: string,
  input: string,
  lang?: string | null,
  separator: string = DEFAULT_SEPARATOR,
  options: EntityOptions = {}
): LangText {
  assertString(input, 'input');
  assertOptionalString(lang, 'lang');
  if (!isConversionMethod(method)) {
    return Diagnostics.unknownConversionMethod(method).throw();
  }
  return method === 'manual'
    ? fromStringToLangTextManual(input, lang, options)
    : fromStringToLangTextParse(input, separator, options);
}

export function fromStringsToLangTexts(
  method: string,
  strings: Iterable<string>,
  lang?: string | null,
  separator: string = DEFAULT_SEPARATOR,
  options: EntityOptions = {}
): LangText[] {
  if (!isConversionMethod(method)) {
    return Diagnostics.unknownConversionMethod(method).throw();
  }
  return assertStringIterable(strings, 'strings').map(value =>
    fromStringToLangText(method, value, lang, separator, options)
  );
}

export function fromStringsToLangTextSet(
  strings: Iterable<string>,
  lang?: string | null,
  options: EntityOptions = {}
): LangTextSet {
  assertOptionalString(lang, 'lang');
  return new LangTextSet(assertStringIterable(strings, 'strings'), lang ?? '', options);
}

/**
 * 先转为 LangText，再按大小写规则合并为一个 MultiLangText。
 */
export function fromStringsToMultiLangText(
  method: string,
  strings: Iterable<string>,
  lang?: string | null,
  separator: string = DEFAULT_SEPARATOR,
  options: EntityOptions = {}
): MultiLangText {
  return fromLangTextsToMultiLangText(fromStringsToLangTexts(method, strings, lang, separator, options), options);
}
