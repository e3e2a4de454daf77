/**
 * @module validation/flag-validator
 *
 * 校验引擎：实体的每一次赋值都经过这里。
 *
 * 固定顺序：
 * 1. 类型检查（字符串或缺省；缺省视为 `''`）
 * 2. STRIP_TEXT / STRIP_LANG 去除首尾空白
 * 3. DEFINED_TEXT 要求文本非空
 * 4. DEFINED_LANG 要求语言标签非空
 * 5. LOWERCASE_LANG 折叠大小写
 * 6. VALID_LANG 交给 oracle 检查
 *
 * 先去除空白再检查，因此只有在 STRIP_* 开启时，纯空白输入才视为空。
 */

import { Controller } from '../config/controller.js';
import type { FlagRegistry } from '../config/flag-registry.js';
import type { EntityFlagScope } from '../config/flags.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { createLogger } from '../utils/logger.js';
import { casefold } from '../utils/text.js';
import { getLanguageTagOracle } from './oracle.js';

const logger = createLogger('flag-validator');

function normalizeRaw(argName: 'text' | 'lang', raw: unknown): string {
  if (raw === null || raw === undefined) return '';
  if (typeof raw !== 'string') {
    return Diagnostics.invalidType(argName, "'string'", raw).throw();
  }
  return raw;
}

/**
 * 按作用域的标志校验并规范化文本。
 *
 * @throws DiagnosticError T001 类型错误，V001 空文本
 */
export function validateText(scope: EntityFlagScope, raw: unknown, flags: FlagRegistry = Controller): string {
  const original = normalizeRaw('text', raw);
  let text = original;

  if (flags.stateOf(scope, 'STRIP_TEXT')) {
    text = text.trim();
  }
  if (flags.stateOf(scope, 'DEFINED_TEXT') && text === '') {
    Diagnostics.emptyText(scope, original).throw();
  }
  return text;
}

/**
 * 按作用域的标志校验并规范化语言标签。
 *
 * @throws DiagnosticError T001 类型错误，V002 空标签，V003 非法标签，V004 缺少 oracle
 */
export function validateLang(scope: EntityFlagScope, raw: unknown, flags: FlagRegistry = Controller): string {
  const original = normalizeRaw('lang', raw);
  let lang = original;

  if (flags.stateOf(scope, 'STRIP_LANG')) {
    lang = lang.trim();
  }
  if (flags.stateOf(scope, 'DEFINED_LANG') && lang === '') {
    Diagnostics.emptyLang(scope, original).throw();
  }
  if (flags.stateOf(scope, 'LOWERCASE_LANG')) {
    lang = casefold(lang);
  }
  if (flags.stateOf(scope, 'VALID_LANG')) {
    const oracle = getLanguageTagOracle();
    if (oracle === null) {
      if (flags.stateOf(scope, 'ENFORCE_EXTRA_DEPEND')) {
        Diagnostics.oracleUnavailable(scope).throw();
      }
      logger.warn('language tag oracle unavailable, skipping validation', { scope, lang });
    } else if (!oracle(lang)) {
      Diagnostics.invalidLangTag(scope, lang).throw();
    }
  }
  return lang;
}

/**
 * 同时校验文本与语言标签，文本先于语言标签检查。
 */
export function validateEntry(
  scope: EntityFlagScope,
  rawText: unknown,
  rawLang: unknown,
  flags: FlagRegistry = Controller
): { text: string; lang: string } {
  const text = validateText(scope, rawText, flags);
  const lang = validateLang(scope, rawLang, flags);
  return { text, lang };
}

/**
 * 查找用的规范化：只做类型检查、去除空白与大小写折叠，不检查空值与有效性。
 * 用于 discard / contains / get / pop 等不应因查找键而失败的操作。
 */
export function normalizeText(scope: EntityFlagScope, raw: unknown, flags: FlagRegistry = Controller): string {
  const text = normalizeRaw('text', raw);
  return flags.stateOf(scope, 'STRIP_TEXT') ? text.trim() : text;
}

export function normalizeLang(scope: EntityFlagScope, raw: unknown, flags: FlagRegistry = Controller): string {
  let lang = normalizeRaw('lang', raw);
  if (flags.stateOf(scope, 'STRIP_LANG')) lang = lang.trim();
  if (flags.stateOf(scope, 'LOWERCASE_LANG')) lang = casefold(lang);
  return lang;
}
