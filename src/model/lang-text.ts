/**
 * @module model/lang-text
 *
 * LangText：绑定到一个语言标签的文本。
 *
 * 文本运算返回新的 LangText，并保留原有语言标签；拆分类运算返回多个 LangText。
 * 相等与哈希基于 `(text, casefold(lang))`，因此 `en` 与 `EN` 视为同一语言。
 */

import { Controller } from '../config/controller.js';
import type { FlagRegistry } from '../config/flag-registry.js';
import { FlagScope } from '../config/flags.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { validateLang, validateText } from '../validation/flag-validator.js';
import { assertInstanceArray } from '../validation/type-guards.js';
import * as text from '../utils/text.js';
import { reconcileLangs, sameLang } from './lang-casing.js';
import { renderEntry, resolveRenderOptions, type RenderOptions } from './render.js';

const SCOPE = FlagScope.LangText;

export interface EntityOptions {
  /** 使用的标志注册表，缺省为进程级 `Controller` */
  readonly flags?: FlagRegistry;
}

/** 文本操作数：原始字符串或语言相同的 LangText */
export type TextOperand = string | LangText;

export class LangText implements Iterable<string> {
  readonly flags: FlagRegistry;
  private _text: string;
  private _lang: string;

  constructor(text?: string | null, lang?: string | null, options: EntityOptions = {}) {
    this.flags = options.flags ?? Controller;
    this._text = validateText(SCOPE, text, this.flags);
    this._lang = validateLang(SCOPE, lang, this.flags);
  }

  get text(): string {
    return this._text;
  }

  set text(value: string) {
    this._text = validateText(SCOPE, value, this.flags);
  }

  get lang(): string {
    return this._lang;
  }

  set lang(value: string) {
    this._lang = validateLang(SCOPE, value, this.flags);
  }

  get length(): number {
    return this._text.length;
  }

  [Symbol.iterator](): Iterator<string> {
    return this._text[Symbol.iterator]();
  }

  // ---- 文本运算 ----

  concat(other: TextOperand): LangText {
    return this.derive(this._text + this.operand(other));
  }

  /** 负数视为 0 */
  repeat(times: number): LangText {
    if (!Number.isFinite(times)) {
      return Diagnostics.invalidType('times', 'a finite number', times).throw();
    }
    return this.derive(this._text.repeat(Math.max(0, times)));
  }

  slice(start?: number, end?: number): LangText {
    return this.derive(this._text.slice(start, end));
  }

  charAt(index: number): LangText {
    return this.derive(this._text.charAt(index));
  }

  toUpperCase(): LangText {
    return this.derive(this._text.toUpperCase());
  }

  toLowerCase(): LangText {
    return this.derive(this._text.toLowerCase());
  }

  casefold(): LangText {
    return this.derive(text.casefold(this._text));
  }

  capitalize(): LangText {
    return this.derive(text.capitalize(this._text));
  }

  swapCase(): LangText {
    return this.derive(text.swapCase(this._text));
  }

  title(): LangText {
    return this.derive(text.title(this._text));
  }

  trim(): LangText {
    return this.derive(this._text.trim());
  }

  trimStart(): LangText {
    return this.derive(this._text.trimStart());
  }

  trimEnd(): LangText {
    return this.derive(this._text.trimEnd());
  }

  strip(chars?: string): LangText {
    return this.derive(text.strip(this._text, chars));
  }

  lstrip(chars?: string): LangText {
    return this.derive(text.strip(this._text, chars, 'start'));
  }

  rstrip(chars?: string): LangText {
    return this.derive(text.strip(this._text, chars, 'end'));
  }

  padStart(width: number, fill?: string): LangText {
    return this.derive(this._text.padStart(width, fill));
  }

  padEnd(width: number, fill?: string): LangText {
    return this.derive(this._text.padEnd(width, fill));
  }

  center(width: number, fillChar?: string): LangText {
    return this.derive(text.center(this._text, width, fillChar));
  }

  ljust(width: number, fillChar?: string): LangText {
    return this.derive(text.ljust(this._text, width, fillChar));
  }

  rjust(width: number, fillChar?: string): LangText {
    return this.derive(text.rjust(this._text, width, fillChar));
  }

  zfill(width: number): LangText {
    return this.derive(text.zfill(this._text, width));
  }

  expandTabs(tabSize?: number): LangText {
    return this.derive(text.expandTabs(this._text, tabSize));
  }

  /** 替换前 `count` 处（缺省全部） */
  replace(search: TextOperand, replacement: TextOperand, count = -1): LangText {
    const from = this.operand(search);
    const to = this.operand(replacement);
    if (count < 0) {
      return this.derive(this._text.replaceAll(from, () => to));
    }
    if (from === '') {
      // 插入点位于每个字符之前以及末尾
      const points = Math.min(count, this._text.length + 1);
      const chars = this._text.split('');
      const head = chars.slice(0, points).map(ch => to + ch).join('');
      const tail = chars.slice(points).join('');
      return this.derive(points > this._text.length ? head + to : head + tail);
    }
    const parts = this._text.split(from);
    const head = parts.slice(0, count + 1).join(to);
    const rest = parts.slice(count + 1);
    return this.derive(rest.length > 0 ? [head, ...rest].join(from) : head);
  }

  replaceAll(search: TextOperand, replacement: TextOperand): LangText {
    return this.replace(search, replacement);
  }

  removePrefix(prefix: TextOperand): LangText {
    return this.derive(text.removePrefix(this._text, this.operand(prefix)));
  }

  removeSuffix(suffix: TextOperand): LangText {
    return this.derive(text.removeSuffix(this._text, this.operand(suffix)));
  }

  split(separator?: string, maxSplit?: number): LangText[] {
    return text.split(this._text, separator, maxSplit).map(part => this.derive(part));
  }

  rsplit(separator?: string, maxSplit?: number): LangText[] {
    return text.rsplit(this._text, separator, maxSplit).map(part => this.derive(part));
  }

  splitLines(keepEnds?: boolean): LangText[] {
    return text.splitLines(this._text, keepEnds).map(part => this.derive(part));
  }

  partition(separator: string): [LangText, LangText, LangText] {
    const [head, sep, tail] = text.partition(this._text, separator);
    return [this.derive(head), this.derive(sep), this.derive(tail)];
  }

  rpartition(separator: string): [LangText, LangText, LangText] {
    const [head, sep, tail] = text.rpartition(this._text, separator);
    return [this.derive(head), this.derive(sep), this.derive(tail)];
  }

  /** 以本文本为分隔符连接各项 */
  join(items: Iterable<TextOperand>): LangText {
    const parts: string[] = [];
    for (const item of items) {
      parts.push(this.operand(item));
    }
    return this.derive(parts.join(this._text));
  }

  format(...args: unknown[]): LangText {
    return this.derive(text.format(this._text, args));
  }

  formatMap(mapping: Readonly<Record<string, unknown>>): LangText {
    return this.derive(text.format(this._text, [], mapping));
  }

  // ---- 查询 ----

  includes(search: TextOperand): boolean {
    return this._text.includes(this.operand(search));
  }

  startsWith(search: TextOperand, position?: number): boolean {
    return this._text.startsWith(this.operand(search), position);
  }

  endsWith(search: TextOperand, endPosition?: number): boolean {
    return this._text.endsWith(this.operand(search), endPosition);
  }

  indexOf(search: TextOperand, position?: number): number {
    return this._text.indexOf(this.operand(search), position);
  }

  lastIndexOf(search: TextOperand, position?: number): number {
    return this._text.lastIndexOf(this.operand(search), position);
  }

  find(search: TextOperand, start?: number, end?: number): number {
    return text.find(this._text, this.operand(search), start, end);
  }

  rfind(search: TextOperand, start?: number, end?: number): number {
    return text.rfind(this._text, this.operand(search), start, end);
  }

  /** 同 `find`，未找到时抛出 N002 */
  index(search: TextOperand, start?: number, end?: number): number {
    const sub = this.operand(search);
    const found = text.find(this._text, sub, start, end);
    if (found < 0) {
      return Diagnostics.substringNotFound(sub).throw();
    }
    return found;
  }

  /** 同 `rfind`，未找到时抛出 N002 */
  rindex(search: TextOperand, start?: number, end?: number): number {
    const sub = this.operand(search);
    const found = text.rfind(this._text, sub, start, end);
    if (found < 0) {
      return Diagnostics.substringNotFound(sub).throw();
    }
    return found;
  }

  count(search: TextOperand, start?: number, end?: number): number {
    return text.count(this._text, this.operand(search), start, end);
  }

  isAlpha(): boolean {
    return text.isAlpha(this._text);
  }

  isDigit(): boolean {
    return text.isDigit(this._text);
  }

  isAlnum(): boolean {
    return text.isAlnum(this._text);
  }

  isSpace(): boolean {
    return text.isSpace(this._text);
  }

  isLower(): boolean {
    return text.isLower(this._text);
  }

  isUpper(): boolean {
    return text.isUpper(this._text);
  }

  isTitle(): boolean {
    return text.isTitle(this._text);
  }

  // ---- 比较 ----

  lessThan(other: TextOperand): boolean {
    return this._text < this.comparable(other);
  }

  lessThanOrEqual(other: TextOperand): boolean {
    return this._text <= this.comparable(other);
  }

  greaterThan(other: TextOperand): boolean {
    return this._text > this.comparable(other);
  }

  greaterThanOrEqual(other: TextOperand): boolean {
    return this._text >= this.comparable(other);
  }

  /** 不会失败：非 LangText 或文本、语言不同时返回 false */
  equals(other: unknown): boolean {
    return other instanceof LangText && other._text === this._text && sameLang(other._lang, this._lang);
  }

  hashKey(): string {
    return JSON.stringify([this._text, text.casefold(this._lang)]);
  }

  toString(options?: RenderOptions): string {
    return renderEntry(this._text, this._lang, resolveRenderOptions(this.flags, SCOPE, options));
  }

  /**
   * 去重并协调语言标签大小写，保留首次出现的顺序。
   */
  static merge(langTexts: Iterable<LangText>): LangText[] {
    const items = assertInstanceArray(langTexts, LangText, 'langTexts');
    const langs = reconcileLangs(items.map(item => item._lang));
    const seen = new Set<string>();
    const merged: LangText[] = [];

    for (const item of items) {
      const key = item.hashKey();
      if (seen.has(key)) continue;
      seen.add(key);
      const lang = langs.get(text.casefold(item._lang)) ?? item._lang;
      merged.push(new LangText(item._text, lang, { flags: item.flags }));
    }
    return merged;
  }

  /** `["a"@en, "b"@en]` */
  static printList(langTexts: Iterable<LangText>, options?: RenderOptions): string {
    const items = assertInstanceArray(langTexts, LangText, 'langTexts');
    return `[${items.map(item => item.toString(options)).join(', ')}]`;
  }

  private derive(value: string): LangText {
    return new LangText(value, this._lang, { flags: this.flags });
  }

  /**
   * 取出操作数文本。METHODS_MATCH_TYPES 开启时拒绝原始字符串；
   * LangText 操作数的语言必须一致。
   */
  private operand(other: unknown): string {
    if (other instanceof LangText) {
      this.ensureSameLang(other);
      return other._text;
    }
    if (typeof other === 'string') {
      if (this.flags.stateOf(SCOPE, 'METHODS_MATCH_TYPES')) {
        return Diagnostics.strictOperand('LangText', other).throw();
      }
      return other;
    }
    return Diagnostics.invalidType('other', "'string' or 'LangText'", other).throw();
  }

  /** 比较始终接受原始字符串 */
  private comparable(other: unknown): string {
    if (other instanceof LangText) {
      this.ensureSameLang(other);
      return other._text;
    }
    if (typeof other === 'string') return other;
    return Diagnostics.invalidType('other', "'string' or 'LangText'", other).throw();
  }

  private ensureSameLang(other: LangText): void {
    if (!sameLang(other._lang, this._lang)) {
      Diagnostics.langMismatch('LangText', 'LangText').withContext('langs', [this._lang, other._lang]).throw();
    }
  }
}
