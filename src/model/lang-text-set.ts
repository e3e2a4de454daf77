/**
 * @module model/lang-text-set
 *
 * LangTextSet：共享一个语言标签的无序唯一文本集合。
 *
 * - 添加 LangText / LangTextSet 时语言必须一致（不区分大小写），否则抛出 V005，集合不变
 * - `discard` 对不存在的元素静默，`remove` 抛出 N001
 * - 集合运算接受 LangTextSet 或字符串可迭代对象；后者没有语言标签，不做语言检查，
 *   除非开启 METHODS_MATCH_TYPES
 */

import { Controller } from '../config/controller.js';
import type { FlagRegistry } from '../config/flag-registry.js';
import { FlagScope } from '../config/flags.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { normalizeText, validateLang, validateText } from '../validation/flag-validator.js';
import { assertInstanceArray, assertStringIterable } from '../validation/type-guards.js';
import { casefold } from '../utils/text.js';
import { reconcileLangs, sameLang } from './lang-casing.js';
import { LangText, type EntityOptions } from './lang-text.js';
import {
  compareStrings,
  renderEntry,
  renderMember,
  resolveRenderOptions,
  withLangSuffix,
  type RenderOptions,
} from './render.js';

const SCOPE = FlagScope.LangTextSet;

/** 集合运算的操作数 */
export type SetOperand = Iterable<string> | LangTextSet;

/** add / discard / remove 的参数 */
export type SetElement = string | LangText | LangTextSet;

export class LangTextSet implements Iterable<string> {
  readonly flags: FlagRegistry;
  private _texts: Set<string>;
  private _lang: string;

  constructor(texts?: Iterable<string> | null, lang?: string | null, options: EntityOptions = {}) {
    this.flags = options.flags ?? Controller;
    this._texts = this.validateTexts(texts ?? []);
    this._lang = validateLang(SCOPE, lang, this.flags);
  }

  /** 文本副本 */
  get texts(): Set<string> {
    return new Set(this._texts);
  }

  set texts(values: Iterable<string>) {
    this._texts = this.validateTexts(values);
  }

  get lang(): string {
    return this._lang;
  }

  set lang(value: string) {
    this._lang = validateLang(SCOPE, value, this.flags);
  }

  get size(): number {
    return this._texts.size;
  }

  [Symbol.iterator](): Iterator<string> {
    return this._texts[Symbol.iterator]();
  }

  has(element: string | LangText): boolean {
    if (element instanceof LangText) {
      return sameLang(element.lang, this._lang) && this._texts.has(element.text);
    }
    return this._texts.has(this.lookupText(element));
  }

  // ---- add / discard / remove ----

  add(element: SetElement): void {
    if (element instanceof LangText) {
      this.addLangText(element);
    } else if (element instanceof LangTextSet) {
      this.unionUpdate(element);
    } else {
      this.addText(element);
    }
  }

  addText(value: string): void {
    this.ensureRawAllowed(value);
    this._texts.add(validateText(SCOPE, value, this.flags));
  }

  addLangText(langText: LangText): void {
    this.ensureSameLang(langText.lang, 'LangText');
    this._texts.add(validateText(SCOPE, langText.text, this.flags));
  }

  discard(element: SetElement): void {
    if (element instanceof LangText) {
      this.discardLangText(element);
    } else if (element instanceof LangTextSet) {
      this.differenceUpdate(element);
    } else {
      this.discardText(element);
    }
  }

  discardText(value: string): void {
    this.ensureRawAllowed(value);
    this._texts.delete(this.lookupText(value));
  }

  discardLangText(langText: LangText): void {
    this.ensureSameLang(langText.lang, 'LangText');
    this._texts.delete(langText.text);
  }

  /**
   * 同 `discard`，元素不存在时抛出 N001。LangTextSet 参数先检查全部元素再删除。
   */
  remove(element: SetElement): void {
    if (element instanceof LangText) {
      this.removeLangText(element);
    } else if (element instanceof LangTextSet) {
      this.ensureSameLang(element._lang, 'LangTextSet');
      const missing = [...element._texts].find(value => !this._texts.has(value));
      if (missing !== undefined) {
        Diagnostics.entryNotFound(`Text '${missing}'`).throw();
      }
      element._texts.forEach(value => this._texts.delete(value));
    } else {
      this.removeText(element);
    }
  }

  removeText(value: string): void {
    this.ensureRawAllowed(value);
    const key = this.lookupText(value);
    if (!this._texts.has(key)) {
      Diagnostics.entryNotFound(`Text '${key}'`).throw();
    }
    this._texts.delete(key);
  }

  removeLangText(langText: LangText): void {
    this.ensureSameLang(langText.lang, 'LangText');
    if (!this._texts.has(langText.text)) {
      Diagnostics.entryNotFound(`Text '${langText.text}'`).throw();
    }
    this._texts.delete(langText.text);
  }

  clear(): void {
    this._texts.clear();
  }

  copy(): LangTextSet {
    return this.withTexts(this._texts);
  }

  /** 移除并返回一个文本（插入顺序中的第一个）；空集合抛出 N003 */
  pop(): string {
    const [first] = this._texts;
    if (first === undefined) {
      return Diagnostics.emptyCollection('LangTextSet').throw();
    }
    this._texts.delete(first);
    return first;
  }

  // ---- 集合运算 ----

  union(...others: SetOperand[]): LangTextSet {
    const result = this.copy();
    result.unionUpdate(...others);
    return result;
  }

  intersection(...others: SetOperand[]): LangTextSet {
    const result = this.copy();
    result.intersectionUpdate(...others);
    return result;
  }

  difference(...others: SetOperand[]): LangTextSet {
    const result = this.copy();
    result.differenceUpdate(...others);
    return result;
  }

  symmetricDifference(other: SetOperand): LangTextSet {
    const result = this.copy();
    result.symmetricDifferenceUpdate(other);
    return result;
  }

  unionUpdate(...others: SetOperand[]): void {
    const incoming = others.map(other => this.operandTexts(other, true));
    for (const values of incoming) {
      values.forEach(value => this._texts.add(value));
    }
  }

  intersectionUpdate(...others: SetOperand[]): void {
    const incoming = others.map(other => new Set(this.operandTexts(other, false)));
    this._texts = new Set([...this._texts].filter(value => incoming.every(values => values.has(value))));
  }

  differenceUpdate(...others: SetOperand[]): void {
    const incoming = others.map(other => this.operandTexts(other, false));
    for (const values of incoming) {
      values.forEach(value => this._texts.delete(value));
    }
  }

  symmetricDifferenceUpdate(other: SetOperand): void {
    const incoming = new Set(this.operandTexts(other, true));
    for (const value of incoming) {
      if (this._texts.has(value)) {
        this._texts.delete(value);
      } else {
        this._texts.add(value);
      }
    }
  }

  isDisjoint(other: SetOperand): boolean {
    return this.operandTexts(other, false).every(value => !this._texts.has(value));
  }

  isSubset(other: SetOperand): boolean {
    const values = new Set(this.operandTexts(other, false));
    return [...this._texts].every(value => values.has(value));
  }

  isSuperset(other: SetOperand): boolean {
    return this.operandTexts(other, false).every(value => this._texts.has(value));
  }

  isProperSubset(other: SetOperand): boolean {
    const values = new Set(this.operandTexts(other, false));
    return values.size > this._texts.size && [...this._texts].every(value => values.has(value));
  }

  isProperSuperset(other: SetOperand): boolean {
    const values = new Set(this.operandTexts(other, false));
    return values.size < this._texts.size && [...values].every(value => this._texts.has(value));
  }

  // ---- 比较与输出 ----

  equals(other: unknown): boolean {
    return (
      other instanceof LangTextSet &&
      sameLang(other._lang, this._lang) &&
      other._texts.size === this._texts.size &&
      [...other._texts].every(value => this._texts.has(value))
    );
  }

  hashKey(): string {
    return JSON.stringify([[...this._texts].sort(compareStrings), casefold(this._lang)]);
  }

  /** 每个文本的规范形式，按文本排序 */
  toStrings(options?: RenderOptions): string[] {
    const resolved = resolveRenderOptions(this.flags, SCOPE, options);
    return this.sortedTexts().map(value => renderEntry(value, this._lang, resolved));
  }

  /** 按文本排序的 LangText 列表 */
  toLangTexts(): LangText[] {
    return this.sortedTexts().map(value => new LangText(value, this._lang, { flags: this.flags }));
  }

  /** `{'a', 'b'}@en` */
  toString(options?: RenderOptions): string {
    const resolved = resolveRenderOptions(this.flags, SCOPE, options);
    const body = `{${this.sortedTexts()
      .map(value => renderMember(value, resolved))
      .join(', ')}}`;
    return withLangSuffix(body, this._lang, resolved);
  }

  /**
   * 按折叠后的语言合并，每种语言得到一个集合。
   * 同一语言出现多种大小写写法时使用折叠形式。
   */
  static merge(sets: Iterable<LangTextSet>): LangTextSet[] {
    const items = assertInstanceArray(sets, LangTextSet, 'sets');
    const langs = reconcileLangs(items.map(item => item._lang));
    const grouped = new Map<string, LangTextSet>();

    for (const item of items) {
      const key = casefold(item._lang);
      const existing = grouped.get(key);
      if (existing) {
        item._texts.forEach(value => existing._texts.add(value));
      } else {
        grouped.set(key, new LangTextSet(item._texts, langs.get(key) ?? item._lang, { flags: item.flags }));
      }
    }
    return [...grouped.values()];
  }

  private sortedTexts(): string[] {
    return [...this._texts].sort(compareStrings);
  }

  private withTexts(values: Iterable<string>): LangTextSet {
    return new LangTextSet(values, this._lang, { flags: this.flags });
  }

  private validateTexts(values: Iterable<string>): Set<string> {
    return new Set(assertStringIterable(values, 'texts').map(value => validateText(SCOPE, value, this.flags)));
  }

  private lookupText(value: unknown): string {
    return normalizeText(SCOPE, value, this.flags);
  }

  private ensureRawAllowed(value: unknown): void {
    if (this.flags.stateOf(SCOPE, 'METHODS_MATCH_TYPES')) {
      Diagnostics.strictOperand('LangTextSet', value).throw();
    }
  }

  private ensureSameLang(lang: string, owner: 'LangText' | 'LangTextSet'): void {
    if (!sameLang(lang, this._lang)) {
      Diagnostics.langMismatch('LangTextSet', owner).withContext('langs', [this._lang, lang]).throw();
    }
  }

  /**
   * 取出操作数中的文本。新增到集合的文本需完整校验，只用于查找的文本只做规范化。
   */
  private operandTexts(other: unknown, validate: boolean): string[] {
    if (other instanceof LangTextSet) {
      this.ensureSameLang(other._lang, 'LangTextSet');
      return [...other._texts];
    }
    if (this.flags.stateOf(SCOPE, 'METHODS_MATCH_TYPES')) {
      return Diagnostics.strictOperand('LangTextSet', other).throw();
    }
    const values = assertStringIterable(other, 'other');
    return values.map(value => (validate ? validateText(SCOPE, value, this.flags) : this.lookupText(value)));
  }
}
