/**
 * @module config/flag-registry
 *
 * 标志注册表：保存所有策略标志的当前状态。
 *
 * FlagRegistry 是一个可复制的配置对象。进程级实例见 `Controller`（controller.ts）；
 * 需要隔离配置的调用方可以 `clone()` 一份并通过 `{ flags }` 选项传入实体构造函数。
 */

import {
  FlagScope,
  allFlags,
  defaultFlagState,
  flagFor,
  flagNameOf,
  flagScopeOf,
  isFlag,
  isFlagScope,
  type Flag,
  type FlagName,
} from './flags.js';
import type { FlagProfile } from './flag-profile.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('flag-registry');

export type FlagWriter = (line: string) => void;

const consoleWriter: FlagWriter = line => {
  console.log(line);
};

function ensureFlag(flag: unknown): Flag {
  if (!isFlag(flag)) {
    return Diagnostics.unknownFlag(flag).throw();
  }
  return flag;
}

function ensureScope(scope: unknown): FlagScope {
  if (!isFlagScope(scope)) {
    return Diagnostics.unknownFlagScope(scope).throw();
  }
  return scope;
}

function ensureState(state: unknown): boolean {
  if (typeof state !== 'boolean') {
    return Diagnostics.invalidType('state', "'boolean'", state).throw();
  }
  return state;
}

export class FlagRegistry {
  private readonly states = new Map<Flag, boolean>();

  constructor(initial?: Iterable<readonly [Flag, boolean]>) {
    for (const flag of allFlags()) {
      this.states.set(flag, defaultFlagState(flag));
    }
    if (initial) {
      for (const [flag, state] of initial) {
        this.states.set(ensureFlag(flag), ensureState(state));
      }
    }
  }

  /**
   * 设置标志状态。GlobalFlag 会同时设置三个实体作用域中的同名标志。
   */
  set(flag: Flag, state: boolean): void {
    const checked = ensureFlag(flag);
    const value = ensureState(state);

    for (const target of this.targetsOf(checked)) {
      this.states.set(target, value);
    }
    logger.debug('flag set', { flag: checked, state: value });
  }

  get(flag: Flag): boolean {
    const checked = ensureFlag(flag);
    return this.states.get(checked) ?? defaultFlagState(checked);
  }

  /** 按作用域和名称读取，供校验引擎使用 */
  stateOf(scope: FlagScope, name: FlagName): boolean {
    return this.get(flagFor(scope, name));
  }

  /** 返回所有标志状态的副本 */
  getAll(): Map<Flag, boolean> {
    return new Map(this.states);
  }

  /**
   * 将标志恢复为默认值。GlobalFlag 会恢复所有作用域中的同名标志，
   * 实体标志只恢复自身。
   */
  reset(flag: Flag): void {
    const checked = ensureFlag(flag);
    for (const target of this.targetsOf(checked)) {
      this.states.set(target, defaultFlagState(target));
    }
  }

  /**
   * 将某个作用域的全部标志恢复为默认值；`FlagScope.Global` 恢复所有标志。
   */
  resetAll(scope: FlagScope = FlagScope.Global): void {
    const checked = ensureScope(scope);
    for (const flag of allFlags()) {
      if (checked === FlagScope.Global || flagScopeOf(flag) === checked) {
        this.states.set(flag, defaultFlagState(flag));
      }
    }
  }

  format(flag: Flag): string {
    const checked = ensureFlag(flag);
    return `${checked} = ${String(this.get(checked))}`;
  }

  /** 按字母顺序格式化一个作用域（缺省为全部）的标志 */
  formatAll(scope?: FlagScope): string[] {
    const checked = scope === undefined ? undefined : ensureScope(scope);
    return [...this.states.keys()]
      .filter(flag => checked === undefined || flagScopeOf(flag) === checked)
      .sort()
      .map(flag => this.format(flag));
  }

  /**
   * 打印单个标志、一个作用域，或（缺省）所有标志。
   */
  print(target?: Flag | FlagScope, write: FlagWriter = consoleWriter): void {
    if (target === undefined) {
      this.formatAll().forEach(line => write(line));
      return;
    }
    if (isFlag(target)) {
      write(this.format(target));
      return;
    }
    if (isFlagScope(target)) {
      this.formatAll(target).forEach(line => write(line));
      return;
    }
    Diagnostics.unknownFlag(target).throw();
  }

  clone(): FlagRegistry {
    return new FlagRegistry(this.states);
  }

  /** 当前状态的只读快照，之后对注册表的修改不会反映到快照中 */
  snapshot(): Readonly<Partial<Record<Flag, boolean>>> {
    const record: Partial<Record<Flag, boolean>> = {};
    for (const [flag, state] of this.states) {
      record[flag] = state;
    }
    return Object.freeze(record);
  }

  /**
   * 应用配置文件中的标志设置。GlobalFlag 先于实体标志生效，
   * 因此实体标志可以覆盖对应的全局设置。
   */
  applyProfile(profile: FlagProfile): void {
    const entries = Object.entries(profile.flags).filter(
      (entry): entry is [Flag, boolean] => isFlag(entry[0]) && typeof entry[1] === 'boolean'
    );
    const globals = entries.filter(([flag]) => flagScopeOf(flag) === FlagScope.Global);
    const scoped = entries.filter(([flag]) => flagScopeOf(flag) !== FlagScope.Global);

    for (const [flag, state] of [...globals, ...scoped]) {
      this.set(flag, state);
    }
    logger.info('flag profile applied', { count: entries.length });
  }

  private targetsOf(flag: Flag): Flag[] {
    if (flagScopeOf(flag) !== FlagScope.Global) {
      return [flag];
    }
    const name = flagNameOf(flag);
    return [
      flagFor(FlagScope.Global, name),
      flagFor(FlagScope.LangText, name),
      flagFor(FlagScope.LangTextSet, name),
      flagFor(FlagScope.MultiLangText, name),
    ];
  }
}
