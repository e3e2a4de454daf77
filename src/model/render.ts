/**
 * @module model/render
 *
 * 规范文本形式：`"Hello"@en`。
 */

import type { FlagRegistry } from '../config/flag-registry.js';
import type { EntityFlagScope } from '../config/flags.js';

export interface RenderOptions {
  /** 为文本加引号；缺省取实体的 PRINT_WITH_QUOTES */
  readonly printQuotes?: boolean;
  /** 文本与语言标签之间的分隔符，缺省 `@` */
  readonly separator?: string;
  /** 附加语言标签；缺省取实体的 PRINT_WITH_LANG */
  readonly printLang?: boolean;
}

export interface ResolvedRenderOptions {
  readonly printQuotes: boolean;
  readonly separator: string;
  readonly printLang: boolean;
}

export const DEFAULT_SEPARATOR = '@';

export function resolveRenderOptions(
  flags: FlagRegistry,
  scope: EntityFlagScope,
  options: RenderOptions = {}
): ResolvedRenderOptions {
  return {
    printQuotes: options.printQuotes ?? flags.stateOf(scope, 'PRINT_WITH_QUOTES'),
    separator: options.separator ?? DEFAULT_SEPARATOR,
    printLang: options.printLang ?? flags.stateOf(scope, 'PRINT_WITH_LANG'),
  };
}

/** 语言标签为空时省略后缀 */
export function withLangSuffix(body: string, lang: string, options: ResolvedRenderOptions): string {
  return options.printLang && lang !== '' ? `${body}${options.separator}${lang}` : body;
}

export function renderEntry(text: string, lang: string, options: ResolvedRenderOptions): string {
  return withLangSuffix(options.printQuotes ? `"${text}"` : text, lang, options);
}

/** 集合内部元素的形式：`'a'` */
export function renderMember(text: string, options: ResolvedRenderOptions): string {
  return options.printQuotes ? `'${text}'` : text;
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
