/**
 * @module config/flags
 *
 * 策略标志定义。
 *
 * 标志分布在四个作用域中：GlobalFlag 影响所有实体类型，其余三个只影响对应实体。
 * 四个枚举拥有同名成员；设置 GlobalFlag 时会级联到三个实体作用域的同名标志。
 * 枚举值采用 `<作用域>.<名称>` 形式，可直接用作标识符（例如配置文件中的键）。
 */

export enum FlagScope {
  Global = 'GlobalFlag',
  LangText = 'LangTextFlag',
  LangTextSet = 'LangTextSetFlag',
  MultiLangText = 'MultiLangTextFlag',
}

/** 实体作用域（除 Global 外） */
export type EntityFlagScope = Exclude<FlagScope, FlagScope.Global>;

export const FLAG_NAMES = [
  'DEFINED_LANG',
  'DEFINED_TEXT',
  'ENFORCE_EXTRA_DEPEND',
  'LOWERCASE_LANG',
  'METHODS_MATCH_TYPES',
  'PRINT_WITH_LANG',
  'PRINT_WITH_QUOTES',
  'STRIP_LANG',
  'STRIP_TEXT',
  'VALID_LANG',
] as const;

export type FlagName = (typeof FLAG_NAMES)[number];

export enum GlobalFlag {
  /** 语言标签不能为空 */
  DEFINED_LANG = 'GlobalFlag.DEFINED_LANG',
  /** 文本不能为空 */
  DEFINED_TEXT = 'GlobalFlag.DEFINED_TEXT',
  /** VALID_LANG 启用但没有可用的 oracle 时直接失败 */
  ENFORCE_EXTRA_DEPEND = 'GlobalFlag.ENFORCE_EXTRA_DEPEND',
  /** 语言标签转为 casefold 形式 */
  LOWERCASE_LANG = 'GlobalFlag.LOWERCASE_LANG',
  /** 方法操作数必须是带标签的类型，拒绝原始字符串 */
  METHODS_MATCH_TYPES = 'GlobalFlag.METHODS_MATCH_TYPES',
  /** 渲染时附加语言标签 */
  PRINT_WITH_LANG = 'GlobalFlag.PRINT_WITH_LANG',
  /** 渲染时为文本加引号 */
  PRINT_WITH_QUOTES = 'GlobalFlag.PRINT_WITH_QUOTES',
  /** 去除语言标签首尾空白 */
  STRIP_LANG = 'GlobalFlag.STRIP_LANG',
  /** 去除文本首尾空白 */
  STRIP_TEXT = 'GlobalFlag.STRIP_TEXT',
  /** 语言标签必须通过 oracle 校验 */
  VALID_LANG = 'GlobalFlag.VALID_LANG',
}

export enum LangTextFlag {
  DEFINED_LANG = 'LangTextFlag.DEFINED_LANG',
  DEFINED_TEXT = 'LangTextFlag.DEFINED_TEXT',
  ENFORCE_EXTRA_DEPEND = 'LangTextFlag.ENFORCE_EXTRA_DEPEND',
  LOWERCASE_LANG = 'LangTextFlag.LOWERCASE_LANG',
  METHODS_MATCH_TYPES = 'LangTextFlag.METHODS_MATCH_TYPES',
  PRINT_WITH_LANG = 'LangTextFlag.PRINT_WITH_LANG',
  PRINT_WITH_QUOTES = 'LangTextFlag.PRINT_WITH_QUOTES',
  STRIP_LANG = 'LangTextFlag.STRIP_LANG',
  STRIP_TEXT = 'LangTextFlag.STRIP_TEXT',
  VALID_LANG = 'LangTextFlag.VALID_LANG',
}

export enum LangTextSetFlag {
  DEFINED_LANG = 'LangTextSetFlag.DEFINED_LANG',
  DEFINED_TEXT = 'LangTextSetFlag.DEFINED_TEXT',
  ENFORCE_EXTRA_DEPEND = 'LangTextSetFlag.ENFORCE_EXTRA_DEPEND',
  LOWERCASE_LANG = 'LangTextSetFlag.LOWERCASE_LANG',
  METHODS_MATCH_TYPES = 'LangTextSetFlag.METHODS_MATCH_TYPES',
  PRINT_WITH_LANG = 'LangTextSetFlag.PRINT_WITH_LANG',
  PRINT_WITH_QUOTES = 'LangTextSetFlag.PRINT_WITH_QUOTES',
  STRIP_LANG = 'LangTextSetFlag.STRIP_LANG',
  STRIP_TEXT = 'LangTextSetFlag.STRIP_TEXT',
  VALID_LANG = 'LangTextSetFlag.VALID_LANG',
}

export enum MultiLangTextFlag {
  DEFINED_LANG = 'MultiLangTextFlag.DEFINED_LANG',
  DEFINED_TEXT = 'MultiLangTextFlag.DEFINED_TEXT',
  ENFORCE_EXTRA_DEPEND = 'MultiLangTextFlag.ENFORCE_EXTRA_DEPEND',
  LOWERCASE_LANG = 'MultiLangTextFlag.LOWERCASE_LANG',
  METHODS_MATCH_TYPES = 'MultiLangTextFlag.METHODS_MATCH_TYPES',
  PRINT_WITH_LANG = 'MultiLangTextFlag.PRINT_WITH_LANG',
  PRINT_WITH_QUOTES = 'MultiLangTextFlag.PRINT_WITH_QUOTES',
  STRIP_LANG = 'MultiLangTextFlag.STRIP_LANG',
  STRIP_TEXT = 'MultiLangTextFlag.STRIP_TEXT',
  VALID_LANG = 'MultiLangTextFlag.VALID_LANG',
}

export type Flag = GlobalFlag | LangTextFlag | LangTextSetFlag | MultiLangTextFlag;

export const FLAG_SCOPES: readonly FlagScope[] = [
  FlagScope.Global,
  FlagScope.LangText,
  FlagScope.LangTextSet,
  FlagScope.MultiLangText,
];

const ALL_FLAGS: readonly Flag[] = [
  ...Object.values(GlobalFlag),
  ...Object.values(LangTextFlag),
  ...Object.values(LangTextSetFlag),
  ...Object.values(MultiLangTextFlag),
];

const FLAG_INDEX: ReadonlyMap<string, Flag> = new Map(ALL_FLAGS.map(flag => [flag, flag]));

const DEFAULT_ON: ReadonlySet<FlagName> = new Set<FlagName>(['DEFINED_TEXT', 'PRINT_WITH_LANG', 'PRINT_WITH_QUOTES']);

export function allFlags(): readonly Flag[] {
  return ALL_FLAGS;
}

export function isFlag(value: unknown): value is Flag {
  return typeof value === 'string' && FLAG_INDEX.has(value);
}

export function isFlagScope(value: unknown): value is FlagScope {
  return typeof value === 'string' && FLAG_SCOPES.some(scope => scope === value);
}

function isFlagName(value: string): value is FlagName {
  return FLAG_NAMES.some(name => name === value);
}

function splitFlag(flag: Flag): [FlagScope, FlagName] {
  const [scope = '', name = ''] = flag.split('.');
  if (!isFlagScope(scope) || !isFlagName(name)) {
    throw new Error(`Malformed flag identifier '${flag}'`);
  }
  return [scope, name];
}

export function flagScopeOf(flag: Flag): FlagScope {
  return splitFlag(flag)[0];
}

export function flagNameOf(flag: Flag): FlagName {
  return splitFlag(flag)[1];
}

/**
 * 根据作用域与名称取得标志，例如 `flagFor(FlagScope.LangText, 'STRIP_TEXT')`。
 */
export function flagFor(scope: FlagScope, name: FlagName): Flag {
  const flag = FLAG_INDEX.get(`${scope}.${name}`);
  if (flag === undefined) {
    throw new Error(`No flag '${name}' in scope '${scope}'`);
  }
  return flag;
}

export function defaultFlagState(flag: Flag): boolean {
  return DEFAULT_ON.has(flagNameOf(flag));
}
