/**
 * @module converter/from-lang-text-set
 *
 * LangTextSet（单个或多个）→ 字符串 / LangText / MultiLangText。
 * 多个集合先经 `LangTextSet.merge` 按语言合并。
 */

import { LangTextSet } from '../model/lang-text-set.js';
import type { LangText, EntityOptions } from '../model/lang-text.js';
import { DEFAULT_PREF_LANG, MultiLangText } from '../model/multi-lang-text.js';
import { compareStrings, type RenderOptions } from '../model/render.js';
import { assertInstance, assertInstanceArray } from '../validation/type-guards.js';

function mergeSorted(args: Iterable<LangTextSet>): LangTextSet[] {
  return LangTextSet.merge(assertInstanceArray(args, LangTextSet, 'args')).sort((a, b) =>
    compareStrings(a.lang, b.lang)
  );
}

/** `{'a', 'b'}@en` */
export function fromLangTextSetToString(arg: LangTextSet, options?: RenderOptions): string {
  assertInstance(arg, LangTextSet, 'arg');
  return arg.toString(options);
}

export function fromLangTextSetToStrings(arg: LangTextSet, options?: RenderOptions): string[] {
  assertInstance(arg, LangTextSet, 'arg');
  return arg.toStrings(options);
}

/** 按语言、文本排序 */
export function fromLangTextSetsToStrings(args: Iterable<LangTextSet>, options?: RenderOptions): string[] {
  return mergeSorted(args).flatMap(item => item.toStrings(options));
}

export function fromLangTextSetToLangTexts(arg: LangTextSet): LangText[] {
  assertInstance(arg, LangTextSet, 'arg');
  return arg.toLangTexts();
}

export function fromLangTextSetsToLangTexts(args: Iterable<LangTextSet>): LangText[] {
  return mergeSorted(args).flatMap(item => item.toLangTexts());
}

export function fromLangTextSetToMultiLangText(arg: LangTextSet): MultiLangText {
  assertInstance(arg, LangTextSet, 'arg');
  const result = new MultiLangText(null, DEFAULT_PREF_LANG, { flags: arg.flags });
  result.addLangTextSet(arg);
  return result;
}

/**
 * 同一语言的不同大小写写法合并为一个键：出现多种写法时使用折叠形式，
 * 否则保留原写法。
 */
export function fromLangTextSetsToMultiLangText(
  args: Iterable<LangTextSet>,
  options: EntityOptions = {}
): MultiLangText {
  const merged = LangTextSet.merge(assertInstanceArray(args, LangTextSet, 'args'));
  const [first] = merged;
  const result = new MultiLangText(null, DEFAULT_PREF_LANG, { flags: first?.flags ?? options.flags });
  merged.forEach(item => result.addLangTextSet(item));
  return result;
}
