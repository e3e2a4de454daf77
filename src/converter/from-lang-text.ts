/**
 * @module converter/from-lang-text
 *
 * LangText（单个或多个）→ 字符串 / LangTextSet / MultiLangText。
 * 多个 LangText 先经 `LangText.merge` 去重并协调语言标签大小写。
 */

import { Diagnostics } from '../diagnostics/diagnostics.js';
import { LangText, type EntityOptions } from '../model/lang-text.js';
import { LangTextSet } from '../model/lang-text-set.js';
import { DEFAULT_PREF_LANG, MultiLangText } from '../model/multi-lang-text.js';
import { compareStrings, type RenderOptions } from '../model/render.js';
import { assertInstance, assertInstanceArray } from '../validation/type-guards.js';

function byLangThenText(a: LangText, b: LangText): number {
  return compareStrings(a.lang, b.lang) || compareStrings(a.text, b.text);
}

export function fromLangTextToString(arg: LangText, options?: RenderOptions): string {
  assertInstance(arg, LangText, 'arg');
  return arg.toString(options);
}

/** 按语言、文本排序后输出 */
export function fromLangTextsToStrings(args: Iterable<LangText>, options?: RenderOptions): string[] {
  return assertInstanceArray(args, LangText, 'args')
    .sort(byLangThenText)
    .map(item => item.toString(options));
}

export function fromLangTextToLangTextSet(arg: LangText): LangTextSet {
  assertInstance(arg, LangText, 'arg');
  return new LangTextSet([arg.text], arg.lang, { flags: arg.flags });
}

/**
 * 所有 LangText 的语言（不区分大小写）必须相同，否则抛出 V006。
 * 空输入得到语言为空的空集合。
 */
export function fromLangTextsToLangTextSet(args: Iterable<LangText>, options: EntityOptions = {}): LangTextSet {
  const merged = LangText.merge(assertInstanceArray(args, LangText, 'args'));
  const langs = [...new Set(merged.map(item => item.lang))];
  if (langs.length > 1) {
    return Diagnostics.mixedLangs(langs).throw();
  }
  const [first] = merged;
  return new LangTextSet(
    merged.map(item => item.text),
    langs[0] ?? '',
    { flags: first?.flags ?? options.flags }
  );
}

/** 每种语言一个集合 */
export function fromLangTextsToLangTextSets(args: Iterable<LangText>): LangTextSet[] {
  const merged = LangText.merge(assertInstanceArray(args, LangText, 'args'));
  return LangTextSet.merge(merged.map(item => new LangTextSet([item.text], item.lang, { flags: item.flags })));
}

/** 首选语言取该 LangText 的语言 */
export function fromLangTextToMultiLangText(arg: LangText): MultiLangText {
  assertInstance(arg, LangText, 'arg');
  return new MultiLangText(new Map([[arg.lang, [arg.text]]]), arg.lang, { flags: arg.flags });
}

export function fromLangTextsToMultiLangText(args: Iterable<LangText>, options: EntityOptions = {}): MultiLangText {
  const merged = LangText.merge(assertInstanceArray(args, LangText, 'args'));
  const [first] = merged;
  const result = new MultiLangText(null, DEFAULT_PREF_LANG, { flags: first?.flags ?? options.flags });
  merged.forEach(item => result.addLangText(item));
  return result;
}
