/**
 * @module validation/type-guards
 *
 * 面向非类型化调用方（JS、反序列化数据）的运行时参数检查。
 * 所有失败均抛出 T001 类型诊断。
 */

import { Diagnostics } from '../diagnostics/diagnostics.js';

export function assertString(value: unknown, argName: string): asserts value is string {
  if (typeof value !== 'string') {
    Diagnostics.invalidType(argName, "'string'", value).throw();
  }
}

export function assertOptionalString(value: unknown, argName: string): asserts value is string | null | undefined {
  if (value !== null && value !== undefined && typeof value !== 'string') {
    Diagnostics.invalidType(argName, "'string' or absent", value).throw();
  }
}

export function assertBoolean(value: unknown, argName: string): asserts value is boolean {
  if (typeof value !== 'boolean') {
    Diagnostics.invalidType(argName, "'boolean'", value).throw();
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  if (value === null || value === undefined) return false;
  if (typeof value === 'string') return true;
  return typeof value === 'object' && Symbol.iterator in value;
}

/**
 * 检查参数是字符串的可迭代对象，并收集为数组（生成器只能遍历一次）。
 * 单个字符串不被视为字符串集合。
 */
export function assertStringIterable(value: unknown, argName: string): string[] {
  if (typeof value === 'string' || !isIterable(value)) {
    return Diagnostics.invalidType(argName, 'an iterable of strings', value).throw();
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      return Diagnostics.invalidType(argName, 'an iterable of strings', item).throw();
    }
    items.push(item);
  }
  return items;
}

/**
 * 检查参数是某个类的实例组成的可迭代对象，并收集为数组。
 */
export function assertInstanceArray<T>(
  value: unknown,
  ctor: abstract new (...args: never[]) => T,
  argName: string
): T[] {
  if (typeof value === 'string' || !isIterable(value)) {
    return Diagnostics.invalidType(argName, `an iterable of '${ctor.name}'`, value).throw();
  }
  const items: T[] = [];
  for (const item of value) {
    if (!(item instanceof ctor)) {
      return Diagnostics.invalidType(argName, `an iterable of '${ctor.name}'`, item).throw();
    }
    items.push(item);
  }
  return items;
}

export function assertInstance<T>(
  value: unknown,
  ctor: abstract new (...args: never[]) => T,
  argName: string
): asserts value is T {
  if (!(value instanceof ctor)) {
    Diagnostics.invalidType(argName, `'${ctor.name}'`, value).throw();
  }
}
