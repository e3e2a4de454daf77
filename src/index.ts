/**
 * @module lang-text
 *
 * 带语言标签的文本：单个文本（LangText）、同语言文本集合（LangTextSet）、
 * 多语言文本集合（MultiLangText），以及它们之间的转换（Converter）。
 * 所有赋值都经过由策略标志（Controller）驱动的校验。
 *
 * @example 基础用法
 * ```typescript
 * import { Controller, GlobalFlag, LangText, MultiLangText } from 'lang-text';
 *
 * Controller.set(GlobalFlag.STRIP_TEXT, true);
 * const hello = new LangText('  Hello ', 'en');
 * console.log(hello.toString()); // "Hello"@en
 *
 * const catalog = new MultiLangText({ en: ['Hello'], fr: ['Bonjour'] });
 * catalog.addEntry('Hi', 'EN'); // 落在已登记的 `en` 下
 * ```
 */

// 标志与配置
export {
  FlagScope,
  GlobalFlag,
  LangTextFlag,
  LangTextSetFlag,
  MultiLangTextFlag,
  FLAG_NAMES,
  FLAG_SCOPES,
  allFlags,
  isFlag,
  isFlagScope,
  flagFor,
  flagNameOf,
  flagScopeOf,
  defaultFlagState,
} from './config/flags.js';
export type { EntityFlagScope, Flag, FlagName } from './config/flags.js';
export { FlagRegistry } from './config/flag-registry.js';
export type { FlagWriter } from './config/flag-registry.js';
export { Controller, applyFlagProfileFile } from './config/controller.js';
export { FLAG_PROFILE_SCHEMA, isFlagProfile, loadFlagProfile, parseFlagProfile } from './config/flag-profile.js';
export type { FlagProfile } from './config/flag-profile.js';
export { ConfigService } from './config/config-service.js';

// 诊断
export {
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
} from './diagnostics/index.js';
export type { Diagnostic } from './diagnostics/index.js';

// 校验
export { validateText, validateLang, validateEntry, normalizeText, normalizeLang } from './validation/flag-validator.js';
export {
  getLanguageTagOracle,
  setLanguageTagOracle,
  resetLanguageTagOracle,
} from './validation/oracle.js';
export type { LanguageTagOracle } from './validation/oracle.js';

// 数据模型
export { LangText } from './model/lang-text.js';
export type { EntityOptions, TextOperand } from './model/lang-text.js';
export { LangTextSet } from './model/lang-text-set.js';
export type { SetElement, SetOperand } from './model/lang-text-set.js';
export { MultiLangText, DEFAULT_PREF_LANG } from './model/multi-lang-text.js';
export type { EntryTuple, MultiLangTextArg, MultiLangTextEntries } from './model/multi-lang-text.js';
export { DEFAULT_SEPARATOR } from './model/render.js';
export type { RenderOptions } from './model/render.js';

// 转换
export * from './converter/index.js';

// 日志
export { createLogger, setLogSink, Logger, LogLevel } from './utils/logger.js';
export type { LogSink, LogMetadata } from './utils/logger.js';
