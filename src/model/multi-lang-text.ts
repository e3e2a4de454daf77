/**
 * @module model/multi-lang-text
 *
 * MultiLangText：语言标签 → 文本集合的映射，外加一个首选语言。
 *
 * 语言查找不区分大小写：已存在 `en` 时，对 `EN` 的操作落在 `en` 上（"已登记语言"）。
 * 相等与哈希只看条目，忽略首选语言。
 *
 * 空语言的处理：
 * - `discard*` 清空某语言后保留该键，除非 `cleanEmpty` 为 true
 * - `remove*` 清空某语言后删除该键，除非 `cleanEmpty` 为 false（缺省 `cleanEmpty = true`）
 * - `addEmptyLang` 显式创建空语言
 *
 * 批量添加先校验全部语言与文本再写入，失败时集合不变。
 */

import { Controller } from '../config/controller.js';
import type { FlagRegistry } from '../config/flag-registry.js';
import { FlagScope } from '../config/flags.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { normalizeLang, normalizeText, validateLang, validateText } from '../validation/flag-validator.js';
import { assertBoolean, assertInstanceArray, assertStringIterable } from '../validation/type-guards.js';
import { casefold } from '../utils/text.js';
import { reconcileLangs } from './lang-casing.js';
import { LangText, type EntityOptions } from './lang-text.js';
import { LangTextSet } from './lang-text-set.js';
import {
  compareStrings,
  renderEntry,
  renderMember,
  resolveRenderOptions,
  withLangSuffix,
  type RenderOptions,
} from './render.js';

const SCOPE = FlagScope.MultiLangText;

export const DEFAULT_PREF_LANG = 'en';

/** 构造参数：Map 或普通对象，值为文本的可迭代对象 */
export type MultiLangTextEntries = ReadonlyMap<string, Iterable<string>> | Readonly<Record<string, Iterable<string>>>;

/** `[text, lang]` */
export type EntryTuple = readonly [text: string, lang: string];

export type MultiLangTextArg = EntryTuple | LangText | LangTextSet | MultiLangText;

function isEntryTuple(value: unknown): value is EntryTuple {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === 'string' && typeof value[1] === 'string';
}

function isEntryMap(entries: MultiLangTextEntries): entries is ReadonlyMap<string, Iterable<string>> {
  return entries instanceof Map;
}

function entriesOf(entries: MultiLangTextEntries): Array<[string, Iterable<string>]> {
  if (isEntryMap(entries)) {
    return [...entries.entries()];
  }
  return Object.entries(entries);
}

function describeEntry(text: string, lang: string): string {
  return `Entry '${text}'@'${lang}'`;
}

export class MultiLangText implements Iterable<[string, ReadonlySet<string>]> {
  readonly flags: FlagRegistry;
  private _entries = new Map<string, Set<string>>();
  private _prefLang: string;

  constructor(entries?: MultiLangTextEntries | null, prefLang: string = DEFAULT_PREF_LANG, options: EntityOptions = {}) {
    this.flags = options.flags ?? Controller;
    this._prefLang = validateLang(SCOPE, prefLang, this.flags);
    if (entries) {
      this.loadEntries(entriesOf(entries));
    }
  }

  /** 条目的深拷贝 */
  get entries(): Map<string, Set<string>> {
    return new Map([...this._entries].map(([lang, texts]) => [lang, new Set(texts)]));
  }

  get prefLang(): string {
    return this._prefLang;
  }

  set prefLang(value: string) {
    this._prefLang = validateLang(SCOPE, value, this.flags);
  }

  *[Symbol.iterator](): Iterator<[string, ReadonlySet<string>]> {
    for (const [lang, texts] of this._entries) {
      yield [lang, new Set(texts)];
    }
  }

  // ---- add ----

  add(arg: MultiLangTextArg): void {
    if (arg instanceof LangText) {
      this.addLangText(arg);
    } else if (arg instanceof LangTextSet) {
      this.addLangTextSet(arg);
    } else if (arg instanceof MultiLangText) {
      this.addMultiLangText(arg);
    } else if (isEntryTuple(arg)) {
      this.addEntry(arg[0], arg[1]);
    } else {
      Diagnostics.invalidType('arg', "'[text, lang]', 'LangText', 'LangTextSet' or 'MultiLangText'", arg).throw();
    }
  }

  addEntry(text: string, lang: string): void {
    const value = validateText(SCOPE, text, this.flags);
    const key = this.registeredLang(validateLang(SCOPE, lang, this.flags));
    this.textsFor(key).add(value);
  }

  addTextInPrefLang(text: string): void {
    this.addEntry(text, this._prefLang);
  }

  addLangText(langText: LangText): void {
    this.addEntry(langText.text, langText.lang);
  }

  /** 空集合也会登记其语言 */
  addLangTextSet(langTextSet: LangTextSet): void {
    this.writeValidated([this.validateGroup(langTextSet.lang, langTextSet)]);
  }

  /** 空语言同样登记 */
  addMultiLangText(other: MultiLangText): void {
    this.writeValidated([...other._entries].map(([lang, texts]) => this.validateGroup(lang, texts)));
  }

  addEmptyLang(lang: string): void {
    this.textsFor(this.registeredLang(validateLang(SCOPE, lang, this.flags)));
  }

  // ---- discard ----

  discard(arg: MultiLangTextArg, cleanEmpty = false): void {
    if (arg instanceof LangText) {
      this.discardLangText(arg, cleanEmpty);
    } else if (arg instanceof LangTextSet) {
      this.discardLangTextSet(arg, cleanEmpty);
    } else if (arg instanceof MultiLangText) {
      this.discardMultiLangText(arg, cleanEmpty);
    } else if (isEntryTuple(arg)) {
      this.discardEntry(arg[0], arg[1], cleanEmpty);
    } else {
      Diagnostics.invalidType('arg', "'[text, lang]', 'LangText', 'LangTextSet' or 'MultiLangText'", arg).throw();
    }
  }

  discardEntry(text: string, lang: string, cleanEmpty = false): void {
    assertBoolean(cleanEmpty, 'cleanEmpty');
    const key = this.lookupLang(lang);
    const texts = this._entries.get(key);
    if (!texts) return;
    texts.delete(normalizeText(SCOPE, text, this.flags));
    this.cleanIfEmpty(key, cleanEmpty);
  }

  discardTextInPrefLang(text: string, cleanEmpty = false): void {
    this.discardEntry(text, this._prefLang, cleanEmpty);
  }

  discardLangText(langText: LangText, cleanEmpty = false): void {
    this.discardEntry(langText.text, langText.lang, cleanEmpty);
  }

  discardLangTextSet(langTextSet: LangTextSet, cleanEmpty = false): void {
    assertBoolean(cleanEmpty, 'cleanEmpty');
    for (const value of langTextSet) {
      this.discardEntry(value, langTextSet.lang, false);
    }
    this.cleanIfEmpty(this.lookupLang(langTextSet.lang), cleanEmpty);
  }

  discardMultiLangText(other: MultiLangText, cleanEmpty = false): void {
    assertBoolean(cleanEmpty, 'cleanEmpty');
    for (const [lang, texts] of other._entries) {
      texts.forEach(value => this.discardEntry(value, lang, false));
      this.cleanIfEmpty(this.lookupLang(lang), cleanEmpty);
    }
  }

  /** 删除语言及其全部文本；语言不存在时静默 */
  discardLang(lang: string): void {
    this._entries.delete(this.lookupLang(lang));
  }

  // ---- remove ----

  /**
   * 同 `discard`，但元素不存在时抛出 N001。
   *
   * 与 `discard` 不同，`cleanEmpty` 缺省为 true：删除最后一个文本时一并删除该语言。
   */
  remove(arg: MultiLangTextArg, cleanEmpty = true): void {
    if (arg instanceof LangText) {
      this.removeLangText(arg, cleanEmpty);
    } else if (arg instanceof LangTextSet) {
      this.removeLangTextSet(arg, cleanEmpty);
    } else if (arg instanceof MultiLangText) {
      this.removeMultiLangText(arg, cleanEmpty);
    } else if (isEntryTuple(arg)) {
      this.removeEntry(arg[0], arg[1], cleanEmpty);
    } else {
      Diagnostics.invalidType('arg', "'[text, lang]', 'LangText', 'LangTextSet' or 'MultiLangText'", arg).throw();
    }
  }

  /** 条目不存在时抛出 N001 */
  removeEntry(text: string, lang: string, cleanEmpty = true): void {
    assertBoolean(cleanEmpty, 'cleanEmpty');
    if (!this.containsEntry(text, lang)) {
      Diagnostics.entryNotFound(describeEntry(text, lang)).throw();
    }
    this.discardEntry(text, lang, cleanEmpty);
  }

  removeTextInPrefLang(text: string, cleanEmpty = true): void {
    this.removeEntry(text, this._prefLang, cleanEmpty);
  }

  removeLangText(langText: LangText, cleanEmpty = true): void {
    this.removeEntry(langText.text, langText.lang, cleanEmpty);
  }

  /** 先确认集合中每个文本都存在，再删除 */
  removeLangTextSet(langTextSet: LangTextSet, cleanEmpty = true): void {
    if (!this.containsLangTextSet(langTextSet)) {
      Diagnostics.entryNotFound(`LangTextSet ${langTextSet.toString()}`).throw();
    }
    this.discardLangTextSet(langTextSet, cleanEmpty);
  }

  removeMultiLangText(other: MultiLangText, cleanEmpty = true): void {
    if (!this.containsMultiLangText(other)) {
      Diagnostics.entryNotFound(`MultiLangText ${other.toString()}`).throw();
    }
    this.discardMultiLangText(other, cleanEmpty);
  }

  /** 语言不存在时抛出 N001 */
  removeLang(lang: string): void {
    if (!this.containsLang(lang)) {
      Diagnostics.entryNotFound(`Language '${lang}'`).throw();
    }
    this.discardLang(lang);
  }

  removeEmptyLangs(): void {
    for (const [lang, texts] of [...this._entries]) {
      if (texts.size === 0) {
        this._entries.delete(lang);
      }
    }
  }

  // ---- get ----

  getLangs(casefolded = false): string[] {
    const langs = [...this._entries.keys()];
    return casefolded ? langs.map(casefold) : langs;
  }

  /** 所有语言中的文本（去重、排序） */
  getTexts(): string[] {
    const all = new Set<string>();
    this._entries.forEach(texts => texts.forEach(value => all.add(value)));
    return [...all].sort(compareStrings);
  }

  /** 不存在时返回 undefined */
  getLangText(text: string, lang: string): LangText | undefined {
    if (!this.containsEntry(text, lang)) return undefined;
    return new LangText(normalizeText(SCOPE, text, this.flags), this.lookupLang(lang), { flags: this.flags });
  }

  /** 不存在时返回该语言的空集合 */
  getLangTextSet(lang: string): LangTextSet {
    const key = this.lookupLang(lang);
    return new LangTextSet(this._entries.get(key) ?? [], key, { flags: this.flags });
  }

  /** 只包含给定语言（存在的部分）的新集合 */
  getMultiLangText(langs: Iterable<string>): MultiLangText {
    const result = this.empty();
    for (const lang of assertStringIterable(langs, 'langs')) {
      const key = this.lookupLang(lang);
      const texts = this._entries.get(key);
      if (texts) {
        result._entries.set(key, new Set(texts));
      }
    }
    return result;
  }

  /** 按语言、文本排序；给出 `lang` 时只返回该语言 */
  getLangTexts(lang?: string): LangText[] {
    return this.sortedEntries(lang).map(([value, key]) => new LangText(value, key, { flags: this.flags }));
  }

  getLangTextsPrefLang(): LangText[] {
    return this.getLangTexts(this._prefLang);
  }

  getStrings(options?: RenderOptions): string[] {
    const resolved = resolveRenderOptions(this.flags, SCOPE, options);
    return this.sortedEntries().map(([value, key]) => renderEntry(value, key, resolved));
  }

  getStringsLang(lang: string, options?: RenderOptions): string[] {
    const resolved = resolveRenderOptions(this.flags, SCOPE, options);
    return this.sortedEntries(lang).map(([value, key]) => renderEntry(value, key, resolved));
  }

  getStringsPrefLang(options?: RenderOptions): string[] {
    return this.getStringsLang(this._prefLang, options);
  }

  getPrefLangTextSet(): LangTextSet {
    return this.getLangTextSet(this._prefLang);
  }

  // ---- pop ----

  /** 取出并删除条目；语言因此变空时一并删除。不存在时返回 undefined */
  popLangText(text: string, lang: string): LangText | undefined {
    const found = this.getLangText(text, lang);
    if (found) {
      this.discardEntry(text, lang, true);
    }
    return found;
  }

  popLangTextSet(lang: string): LangTextSet | undefined {
    if (!this.containsLang(lang)) return undefined;
    const found = this.getLangTextSet(lang);
    this.discardLang(lang);
    return found;
  }

  popMultiLangText(langs: Iterable<string>): MultiLangText {
    const found = this.getMultiLangText(langs);
    found._entries.forEach((_texts, lang) => this._entries.delete(lang));
    return found;
  }

  // ---- contains ----

  contains(arg: MultiLangTextArg): boolean {
    if (arg instanceof LangText) return this.containsLangText(arg);
    if (arg instanceof LangTextSet) return this.containsLangTextSet(arg);
    if (arg instanceof MultiLangText) return this.containsMultiLangText(arg);
    if (isEntryTuple(arg)) return this.containsEntry(arg[0], arg[1]);
    return false;
  }

  containsEntry(text: string, lang: string): boolean {
    const texts = this._entries.get(this.lookupLang(lang));
    return texts !== undefined && texts.has(normalizeText(SCOPE, text, this.flags));
  }

  containsLang(lang: string): boolean {
    return this._entries.has(this.lookupLang(lang));
  }

  containsTextInPrefLang(text: string): boolean {
    return this.containsEntry(text, this._prefLang);
  }

  containsTextInAnyLang(text: string): boolean {
    const value = normalizeText(SCOPE, text, this.flags);
    return [...this._entries.values()].some(texts => texts.has(value));
  }

  containsLangText(langText: LangText): boolean {
    return this.containsEntry(langText.text, langText.lang);
  }

  /** 语言存在，且集合中每个文本都存在 */
  containsLangTextSet(langTextSet: LangTextSet): boolean {
    if (!this.containsLang(langTextSet.lang)) return false;
    return [...langTextSet].every(value => this.containsEntry(value, langTextSet.lang));
  }

  containsMultiLangText(other: MultiLangText): boolean {
    return [...other._entries].every(
      ([lang, texts]) => this.containsLang(lang) && [...texts].every(value => this.containsEntry(value, lang))
    );
  }

  // ---- 计数 ----

  countEntriesByLang(lang: string): number {
    return this._entries.get(this.lookupLang(lang))?.size ?? 0;
  }

  countEntriesPerLang(): Map<string, number> {
    return new Map([...this._entries].map(([lang, texts]) => [lang, texts.size]));
  }

  countEntriesTotal(): number {
    let total = 0;
    this._entries.forEach(texts => {
      total += texts.size;
    });
    return total;
  }

  countLangsTotal(): number {
    return this._entries.size;
  }

  hasPrefLangEntries(): boolean {
    return this.countEntriesByLang(this._prefLang) > 0;
  }

  // ---- 下标访问 ----

  /** 语言不存在时抛出 N001 */
  getItem(lang: string): Set<string> {
    const texts = this._entries.get(this.lookupLang(lang));
    if (!texts) {
      return Diagnostics.entryNotFound(`Language '${lang}'`).throw();
    }
    return new Set(texts);
  }

  /** 整体替换某语言的文本 */
  setItem(lang: string, texts: Iterable<string>): void {
    const key = this.registeredLang(validateLang(SCOPE, lang, this.flags));
    const values = assertStringIterable(texts, 'texts').map(value => validateText(SCOPE, value, this.flags));
    this._entries.set(key, new Set(values));
  }

  deleteItem(lang: string): void {
    this.removeLang(lang);
  }

  // ---- 输出 ----

  toStrings(options?: RenderOptions): string[] {
    return this.getStrings(options);
  }

  /** 给出 `langs` 时只转换这些语言 */
  toLangTexts(langs?: Iterable<string>): LangText[] {
    const source = langs === undefined ? this : this.getMultiLangText(langs);
    return source.getLangTexts();
  }

  toLangTextSets(langs?: Iterable<string>): LangTextSet[] {
    const source = langs === undefined ? this : this.getMultiLangText(langs);
    return source
      .sortedLangs()
      .map(lang => new LangTextSet(source._entries.get(lang) ?? [], lang, { flags: this.flags }));
  }

  /** `{'Hello', 'Hi'}@en, {'Bonjour'}@fr`；空集合为 `{}` */
  toString(options?: RenderOptions): string {
    if (this._entries.size === 0) return '{}';
    const resolved = resolveRenderOptions(this.flags, SCOPE, options);
    return this.sortedLangs()
      .map(lang => {
        const texts = [...(this._entries.get(lang) ?? [])].sort(compareStrings);
        const body = `{${texts.map(value => renderMember(value, resolved)).join(', ')}}`;
        return withLangSuffix(body, lang, resolved);
      })
      .join(', ');
  }

  /** 只比较条目（语言折叠后），忽略首选语言 */
  equals(other: unknown): boolean {
    if (!(other instanceof MultiLangText)) return false;
    return this.hashKey() === other.hashKey();
  }

  hashKey(): string {
    const folded = new Map<string, Set<string>>();
    for (const [lang, texts] of this._entries) {
      const key = casefold(lang);
      const bucket = folded.get(key) ?? new Set<string>();
      texts.forEach(value => bucket.add(value));
      folded.set(key, bucket);
    }
    const normalized = [...folded]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([lang, texts]) => [lang, [...texts].sort(compareStrings)]);
    return JSON.stringify(normalized);
  }

  /**
   * 合并多个集合为一个新集合（不修改输入）。
   * 首选语言与标志注册表取自第一个输入。
   */
  static merge(collections: Iterable<MultiLangText>): MultiLangText {
    const items = assertInstanceArray(collections, MultiLangText, 'collections');
    const [first] = items;
    const result = new MultiLangText(null, first?._prefLang ?? DEFAULT_PREF_LANG, { flags: first?.flags });
    result.loadEntries(items.flatMap(item => [...item._entries]));
    return result;
  }

  private empty(): MultiLangText {
    return new MultiLangText(null, this._prefLang, { flags: this.flags });
  }

  /**
   * 载入原始条目：逐项校验，只差大小写的语言按大小写规则合并。
   */
  private loadEntries(raw: Array<[string, Iterable<string>]>): void {
    const validated = raw.map(([lang, texts]): [string, string[]] => [
      validateLang(SCOPE, lang, this.flags),
      assertStringIterable(texts, 'texts').map(value => validateText(SCOPE, value, this.flags)),
    ]);
    const langs = reconcileLangs([...this._entries.keys(), ...validated.map(([lang]) => lang)]);

    for (const [lang, texts] of validated) {
      const key = langs.get(casefold(lang)) ?? lang;
      const bucket = this.takeBucket(key);
      texts.forEach(value => bucket.add(value));
    }
  }

  /** 取得键为 `key` 的集合；已有同折叠形式的其他写法时迁移到 `key` 下 */
  private takeBucket(key: string): Set<string> {
    const existing = this._entries.get(key);
    if (existing) return existing;

    const folded = casefold(key);
    const bucket = new Set<string>();
    for (const [lang, texts] of [...this._entries]) {
      if (casefold(lang) === folded) {
        texts.forEach(value => bucket.add(value));
        this._entries.delete(lang);
      }
    }
    this._entries.set(key, bucket);
    return bucket;
  }

  private validateGroup(lang: string, texts: Iterable<string>): [string, string[]] {
    return [
      validateLang(SCOPE, lang, this.flags),
      [...texts].map(value => validateText(SCOPE, value, this.flags)),
    ];
  }

  private writeValidated(groups: Array<[string, string[]]>): void {
    for (const [lang, texts] of groups) {
      const bucket = this.textsFor(this.registeredLang(lang));
      texts.forEach(value => bucket.add(value));
    }
  }

  /** 已登记的同语言键（不区分大小写），没有则原样返回 */
  private registeredLang(lang: string): string {
    if (this._entries.has(lang)) return lang;
    const folded = casefold(lang);
    for (const key of this._entries.keys()) {
      if (casefold(key) === folded) return key;
    }
    return lang;
  }

  private lookupLang(lang: string): string {
    return this.registeredLang(normalizeLang(SCOPE, lang, this.flags));
  }

  private textsFor(key: string): Set<string> {
    const existing = this._entries.get(key);
    if (existing) return existing;
    const created = new Set<string>();
    this._entries.set(key, created);
    return created;
  }

  private cleanIfEmpty(key: string, cleanEmpty: boolean): void {
    if (cleanEmpty && this._entries.get(key)?.size === 0) {
      this._entries.delete(key);
    }
  }

  private sortedLangs(): string[] {
    return [...this._entries.keys()].sort(compareStrings);
  }

  /** `[text, lang]`，按语言、文本排序 */
  private sortedEntries(lang?: string): Array<[string, string]> {
    const langs = lang === undefined ? this.sortedLangs() : [this.lookupLang(lang)];
    return langs.flatMap(key =>
      [...(this._entries.get(key) ?? [])].sort(compareStrings).map((value): [string, string] => [value, key])
    );
  }
}
