/**
 * @module converter/from-multi-lang-text
 *
 * MultiLangText（单个或多个）→ 字符串 / LangText / LangTextSet。
 * 多个集合先经 `MultiLangText.merge` 合并；`langs` 限定只转换部分语言。
 */

import type { LangText } from '../model/lang-text.js';
import type { LangTextSet } from '../model/lang-text-set.js';
import { MultiLangText } from '../model/multi-lang-text.js';
import type { RenderOptions } from '../model/render.js';
import { assertInstance, assertInstanceArray } from '../validation/type-guards.js';

function select(arg: MultiLangText, langs?: Iterable<string>): MultiLangText {
  return langs === undefined ? arg : arg.getMultiLangText(langs);
}

function mergeAll(args: Iterable<MultiLangText>): MultiLangText {
  return MultiLangText.merge(assertInstanceArray(args, MultiLangText, 'args'));
}

export function fromMultiLangTextToString(arg: MultiLangText, options?: RenderOptions): string {
  assertInstance(arg, MultiLangText, 'arg');
  return arg.toString(options);
}

export function fromMultiLangTextToStrings(
  arg: MultiLangText,
  langs?: Iterable<string>,
  options?: RenderOptions
): string[] {
  assertInstance(arg, MultiLangText, 'arg');
  return select(arg, langs).toStrings(options);
}

export function fromMultiLangTextsToStrings(
  args: Iterable<MultiLangText>,
  langs?: Iterable<string>,
  options?: RenderOptions
): string[] {
  return select(mergeAll(args), langs).toStrings(options);
}

export function fromMultiLangTextToLangTexts(arg: MultiLangText, langs?: Iterable<string>): LangText[] {
  assertInstance(arg, MultiLangText, 'arg');
  return arg.toLangTexts(langs);
}

export function fromMultiLangTextsToLangTexts(args: Iterable<MultiLangText>, langs?: Iterable<string>): LangText[] {
  return mergeAll(args).toLangTexts(langs);
}

export function fromMultiLangTextToLangTextSets(arg: MultiLangText, langs?: Iterable<string>): LangTextSet[] {
  assertInstance(arg, MultiLangText, 'arg');
  return arg.toLangTextSets(langs);
}

export function fromMultiLangTextsToLangTextSets(
  args: Iterable<MultiLangText>,
  langs?: Iterable<string>
): LangTextSet[] {
  return mergeAll(args).toLangTextSets(langs);
}
