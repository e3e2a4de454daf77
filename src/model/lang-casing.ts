/**
 * @module model/lang-casing
 *
 * 合并时的语言标签大小写协调：同一折叠形式下若出现多种写法，使用折叠形式；
 * 只有一种写法时原样保留。
 */

import { casefold } from '../utils/text.js';

/**
 * @returns 折叠形式 → 合并后使用的标签，按首次出现顺序
 */
export function reconcileLangs(langs: Iterable<string>): Map<string, string> {
  const variants = new Map<string, Set<string>>();
  for (const lang of langs) {
    const key = casefold(lang);
    const seen = variants.get(key);
    if (seen) {
      seen.add(lang);
    } else {
      variants.set(key, new Set([lang]));
    }
  }

  const resolved = new Map<string, string>();
  for (const [key, seen] of variants) {
    const [only] = seen;
    resolved.set(key, seen.size === 1 && only !== undefined ? only : key);
  }
  return resolved;
}

export function sameLang(a: string, b: string): boolean {
  return casefold(a) === casefold(b);
}
