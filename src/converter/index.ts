/**
 * @module converter
 *
 * 各表示形式之间的无状态转换。函数既可单独导入，也可通过 `Converter` 对象使用：
 *
 * ```typescript
 * import { Converter } from 'lang-text';
 *
 * const hello = Converter.fromStringToLangText('parse', 'Hello@en');
 * Converter.fromLangTextToString(hello); // "Hello"@en
 * ```
 */

import * as fromString from './from-string.js';
import * as fromLangText from './from-lang-text.js';
import * as fromLangTextSet from './from-lang-text-set.js';
import * as fromMultiLangText from './from-multi-lang-text.js';

export * from './from-string.js';
export * from './from-lang-text.js';
export * from './from-lang-text-set.js';
export * from './from-multi-lang-text.js';

export const Converter = Object.freeze({
  fromStringToLangText: fromString.fromStringToLangText,
  fromStringToLangTextManual: fromString.fromStringToLangTextManual,
  fromStringToLangTextParse: fromString.fromStringToLangTextParse,
  fromStringsToLangTexts: fromString.fromStringsToLangTexts,
  fromStringsToLangTextSet: fromString.fromStringsToLangTextSet,
  fromStringsToMultiLangText: fromString.fromStringsToMultiLangText,

  fromLangTextToString: fromLangText.fromLangTextToString,
  fromLangTextToLangTextSet: fromLangText.fromLangTextToLangTextSet,
  fromLangTextToMultiLangText: fromLangText.fromLangTextToMultiLangText,
  fromLangTextsToStrings: fromLangText.fromLangTextsToStrings,
  fromLangTextsToLangTextSet: fromLangText.fromLangTextsToLangTextSet,
  fromLangTextsToLangTextSets: fromLangText.fromLangTextsToLangTextSets,
  fromLangTextsToMultiLangText: fromLangText.fromLangTextsToMultiLangText,

  fromLangTextSetToString: fromLangTextSet.fromLangTextSetToString,
  fromLangTextSetToStrings: fromLangTextSet.fromLangTextSetToStrings,
  fromLangTextSetToLangTexts: fromLangTextSet.fromLangTextSetToLangTexts,
  fromLangTextSetToMultiLangText: fromLangTextSet.fromLangTextSetToMultiLangText,
  fromLangTextSetsToStrings: fromLangTextSet.fromLangTextSetsToStrings,
  fromLangTextSetsToLangTexts: fromLangTextSet.fromLangTextSetsToLangTexts,
  fromLangTextSetsToMultiLangText: fromLangTextSet.fromLangTextSetsToMultiLangText,

  fromMultiLangTextToString: fromMultiLangText.fromMultiLangTextToString,
  fromMultiLangTextToStrings: fromMultiLangText.fromMultiLangTextToStrings,
  fromMultiLangTextToLangTexts: fromMultiLangText.fromMultiLangTextToLangTexts,
  fromMultiLangTextToLangTextSets: fromMultiLangText.fromMultiLangTextToLangTextSets,
  fromMultiLangTextsToStrings: fromMultiLangText.fromMultiLangTextsToStrings,
  fromMultiLangTextsToLangTexts: fromMultiLangText.fromMultiLangTextsToLangTexts,
  fromMultiLangTextsToLangTextSets: fromMultiLangText.fromMultiLangTextsToLangTextSets,
});
