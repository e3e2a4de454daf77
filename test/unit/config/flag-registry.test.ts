import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { FlagRegistry } from '../../../src/config/flag-registry.js';
import {
  FlagScope,
  GlobalFlag,
  LangTextFlag,
  LangTextSetFlag,
  MultiLangTextFlag,
  allFlags,
} from '../../../src/config/flags.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { diagnostic } from '../../helpers/state.js';

describe('FlagRegistry', () => {
  it('应该使用默认值初始化所有标志', () => {
    const registry = new FlagRegistry();

    assert.equal(registry.get(GlobalFlag.DEFINED_TEXT), true);
    assert.equal(registry.get(LangTextFlag.PRINT_WITH_LANG), true);
    assert.equal(registry.get(MultiLangTextFlag.PRINT_WITH_QUOTES), true);
    assert.equal(registry.get(GlobalFlag.STRIP_TEXT), false);
    assert.equal(registry.get(LangTextSetFlag.VALID_LANG), false);
    assert.equal(registry.getAll().size, allFlags().length);
    assert.equal(allFlags().length, 40);
  });

  it('应该将 GlobalFlag 级联到三个实体作用域', () => {
    const registry = new FlagRegistry();

    registry.set(GlobalFlag.STRIP_TEXT, true);

    assert.equal(registry.get(GlobalFlag.STRIP_TEXT), true);
    assert.equal(registry.get(LangTextFlag.STRIP_TEXT), true);
    assert.equal(registry.get(LangTextSetFlag.STRIP_TEXT), true);
    assert.equal(registry.get(MultiLangTextFlag.STRIP_TEXT), true);
    assert.equal(registry.get(GlobalFlag.STRIP_LANG), false);
  });

  it('应该只设置实体作用域自身的标志', () => {
    const registry = new FlagRegistry();

    registry.set(LangTextFlag.DEFINED_LANG, true);

    assert.equal(registry.get(LangTextFlag.DEFINED_LANG), true);
    assert.equal(registry.get(GlobalFlag.DEFINED_LANG), false);
    assert.equal(registry.get(LangTextSetFlag.DEFINED_LANG), false);
  });

  it('应该在重置实体标志时不影响其他标志', () => {
    const registry = new FlagRegistry();
    registry.set(GlobalFlag.LOWERCASE_LANG, true);

    registry.reset(LangTextSetFlag.LOWERCASE_LANG);

    assert.equal(registry.get(LangTextSetFlag.LOWERCASE_LANG), false);
    assert.equal(registry.get(LangTextFlag.LOWERCASE_LANG), true);
    assert.equal(registry.get(MultiLangTextFlag.LOWERCASE_LANG), true);
    assert.equal(registry.get(GlobalFlag.LOWERCASE_LANG), true);
  });

  it('应该在重置 GlobalFlag 时恢复所有同名标志', () => {
    const registry = new FlagRegistry();
    registry.set(GlobalFlag.DEFINED_TEXT, false);

    registry.reset(GlobalFlag.DEFINED_TEXT);

    assert.equal(registry.get(LangTextFlag.DEFINED_TEXT), true);
    assert.equal(registry.get(MultiLangTextFlag.DEFINED_TEXT), true);
  });

  it('应该按作用域批量重置', () => {
    const registry = new FlagRegistry();
    registry.set(GlobalFlag.STRIP_LANG, true);

    registry.resetAll(FlagScope.LangText);

    assert.equal(registry.get(LangTextFlag.STRIP_LANG), false);
    assert.equal(registry.get(LangTextSetFlag.STRIP_LANG), true);

    registry.resetAll();

    assert.equal(registry.get(GlobalFlag.STRIP_LANG), false);
    assert.equal(registry.get(LangTextSetFlag.STRIP_LANG), false);
  });

  it('应该拒绝未知标志与作用域', () => {
    const registry = new FlagRegistry();

    // 模拟非类型化调用方
    assert.throws(
      () => Reflect.apply(registry.get, registry, ['GlobalFlag.NOT_A_FLAG']),
      diagnostic(DiagnosticCode.K001_UnknownFlag)
    );
    assert.throws(
      () => Reflect.apply(registry.resetAll, registry, ['Nope']),
      diagnostic(DiagnosticCode.K002_UnknownFlagScope)
    );
  });

  it('应该拒绝非布尔状态', () => {
    const registry = new FlagRegistry();

    assert.throws(
      () => Reflect.apply(registry.set, registry, [GlobalFlag.VALID_LANG, 'yes']),
      diagnostic(DiagnosticCode.T001_InvalidArgumentType)
    );
    assert.equal(registry.get(GlobalFlag.VALID_LANG), false);
  });

  it('应该格式化单个标志和整个作用域', () => {
    const registry = new FlagRegistry();

    assert.equal(registry.format(GlobalFlag.STRIP_TEXT), 'GlobalFlag.STRIP_TEXT = false');
    assert.deepEqual(registry.formatAll(FlagScope.LangText).slice(0, 2), [
      'LangTextFlag.DEFINED_LANG = false',
      'LangTextFlag.DEFINED_TEXT = true',
    ]);
    assert.equal(registry.formatAll().length, 40);
  });

  it('应该通过写入函数打印标志', () => {
    const registry = new FlagRegistry();
    const lines: string[] = [];

    registry.print(MultiLangTextFlag.VALID_LANG, line => lines.push(line));
    registry.print(FlagScope.Global, line => lines.push(line));

    assert.equal(lines[0], 'MultiLangTextFlag.VALID_LANG = false');
    assert.equal(lines.length, 11);
    assert.equal(lines[10], 'GlobalFlag.VALID_LANG = false');
  });

  it('应该在克隆后互不影响', () => {
    const registry = new FlagRegistry();
    const copy = registry.clone();

    copy.set(GlobalFlag.DEFINED_LANG, true);

    assert.equal(copy.get(LangTextFlag.DEFINED_LANG), true);
    assert.equal(registry.get(LangTextFlag.DEFINED_LANG), false);
  });

  it('应该返回不随注册表变化的快照', () => {
    const registry = new FlagRegistry();
    const snapshot = registry.snapshot();

    registry.set(GlobalFlag.STRIP_TEXT, true);

    assert.equal(snapshot[GlobalFlag.STRIP_TEXT], false);
    assert.equal(Object.isFrozen(snapshot), true);
  });

  it('应该先应用全局标志，再应用实体标志', () => {
    const registry = new FlagRegistry();

    registry.applyProfile({
      flags: {
        [LangTextFlag.STRIP_TEXT]: false,
        [GlobalFlag.STRIP_TEXT]: true,
      },
    });

    assert.equal(registry.get(LangTextFlag.STRIP_TEXT), false);
    assert.equal(registry.get(LangTextSetFlag.STRIP_TEXT), true);
  });
});
