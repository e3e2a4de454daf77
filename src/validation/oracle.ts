/**
 * @module validation/oracle
 *
 * 语言标签有效性 oracle。
 *
 * 默认实现基于 `language-tags`（IANA 子标签注册表），首次使用时才加载；
 * 加载失败时视为 oracle 不可用，由 `ENFORCE_EXTRA_DEPEND` 决定是否报错。
 */

import { createRequire } from 'node:module';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('oracle');

/** 判断语言标签是否合法 */
export type LanguageTagOracle = (tag: string) => boolean;

const nodeRequire = createRequire(import.meta.url);

let defaultOracle: LanguageTagOracle | null | undefined;
let override: LanguageTagOracle | null | undefined;

function loadDefaultOracle(): LanguageTagOracle | null {
  if (defaultOracle !== undefined) return defaultOracle;
  try {
    const tags: typeof import('language-tags') = nodeRequire('language-tags');
    defaultOracle = (tag: string) => tags.check(tag);
  } catch (err: unknown) {
    logger.warn('language-tags could not be loaded, language tag validation is unavailable', {
      error: err instanceof Error ? err.message : String(err),
    });
    defaultOracle = null;
  }
  return defaultOracle;
}

/**
 * 取得当前 oracle；返回 null 表示不可用。
 */
export function getLanguageTagOracle(): LanguageTagOracle | null {
  return override === undefined ? loadDefaultOracle() : override;
}

/**
 * 替换 oracle。传入 null 表示不可用。
 */
export function setLanguageTagOracle(oracle: LanguageTagOracle | null): void {
  override = oracle;
}

/** 恢复默认 oracle */
export function resetLanguageTagOracle(): void {
  override = undefined;
}
