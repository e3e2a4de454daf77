import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { Controller } from '../../../src/config/controller.js';
import { FlagRegistry } from '../../../src/config/flag-registry.js';
import { GlobalFlag, LangTextSetFlag, MultiLangTextFlag } from '../../../src/config/flags.js';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { LangText } from '../../../src/model/lang-text.js';
import { LangTextSet } from '../../../src/model/lang-text-set.js';
import { MultiLangText } from '../../../src/model/multi-lang-text.js';
import { diagnostic, resetLibraryState } from '../../helpers/state.js';

beforeEach(() => {
  resetLibraryState();
});

afterEach(() => {
  resetLibraryState();
});

function greetings(): MultiLangText {
  return new MultiLangText({ en: ['Hello', 'Hi'], fr: ['Bonjour'] });
}

describe('MultiLangText 构造', () => {
  it('应该以排序后的形式输出', () => {
    const mlt = greetings();

    assert.equal(mlt.toString(), "{'Hello', 'Hi'}@en, {'Bonjour'}@fr");
    assert.equal(mlt.prefLang, 'en');
    assert.equal(new MultiLangText().toString(), '{}');
  });

  it('应该接受 Map 作为条目', () => {
    const mlt = new MultiLangText(new Map([['de', new Set(['Hallo'])]]), 'de');

    assert.deepEqual(mlt.getStringsPrefLang(), ['"Hallo"@de']);
  });

  it('应该按大小写规则合并只差大小写的语言', () => {
    assert.deepEqual(new MultiLangText({ en: ['a'], EN: ['b'] }).getLangs(), ['en']);
    assert.deepEqual(new MultiLangText({ EN: ['a'] }).getLangs(), ['EN']);
    assert.deepEqual(new MultiLangText({ EN: ['a'] }).getLangs(true), ['en']);
  });

  it('应该按作用域标志折叠语言标签', () => {
    Controller.set(MultiLangTextFlag.LOWERCASE_LANG, true);

    assert.deepEqual(new MultiLangText({ EN: ['a'] }).getLangs(), ['en']);
  });

  it('应该拒绝空文本', () => {
    assert.throws(() => new MultiLangText({ en: [''] }), diagnostic(DiagnosticCode.V001_EmptyText));
  });

  it('应该返回条目的深拷贝', () => {
    const mlt = greetings();

    mlt.entries.get('en')?.add('Hey');

    assert.equal(mlt.countEntriesByLang('en'), 2);
  });
});

describe('MultiLangText 添加', () => {
  it('应该把操作落在已登记的语言上', () => {
    const mlt = greetings();

    mlt.addEntry('Hey', 'EN');
    mlt.add(['Hallo', 'de']);
    mlt.add(new LangText('Salut', 'FR'));
    mlt.add(new LangTextSet([], 'es'));
    mlt.addTextInPrefLang('Yo');

    assert.deepEqual(
      [...mlt.countEntriesPerLang()],
      [
        ['en', 4],
        ['fr', 2],
        ['de', 1],
        ['es', 0],
      ]
    );
  });

  it('应该合并另一个 MultiLangText（包括空语言）', () => {
    const mlt = greetings();
    const other = new MultiLangText({ fr: ['Salut'] });
    other.addEmptyLang('it');

    mlt.add(other);

    assert.deepEqual(mlt.getLangs(), ['en', 'fr', 'it']);
    assert.equal(mlt.countEntriesTotal(), 4);
  });

  it('应该在 LangTextSet 中有文本校验失败时不做任何修改', () => {
    Controller.set(LangTextSetFlag.DEFINED_TEXT, false);
    const set = new LangTextSet(['a', ''], 'en');
    const mlt = new MultiLangText();

    assert.throws(() => mlt.add(set), diagnostic(DiagnosticCode.V001_EmptyText));
    assert.equal(mlt.countLangsTotal(), 0);
    assert.equal(mlt.toString(), '{}');
  });

  it('应该在另一个 MultiLangText 中有文本校验失败时不做任何修改', () => {
    const loose = new FlagRegistry();
    loose.set(GlobalFlag.DEFINED_TEXT, false);
    const other = new MultiLangText({ de: ['Hallo'], it: [''] }, 'en', { flags: loose });
    const mlt = greetings();

    assert.throws(() => mlt.add(other), diagnostic(DiagnosticCode.V001_EmptyText));
    assert.deepEqual(mlt.getLangs(), ['en', 'fr']);
    assert.equal(mlt.countEntriesTotal(), 3);
  });

  it('应该整体替换某语言的文本', () => {
    const mlt = greetings();

    mlt.setItem('FR', ['Salut']);

    assert.deepEqual([...mlt.getItem('fr')], ['Salut']);
    assert.throws(() => mlt.getItem('xx'), diagnostic(DiagnosticCode.N001_EntryNotFound));
  });
});

describe('MultiLangText 删除', () => {
  it('应该在 discard 后默认保留空语言', () => {
    const mlt = greetings();

    mlt.discardEntry('Bonjour', 'fr');
    assert.equal(mlt.containsLang('fr'), true);
    assert.equal(mlt.countEntriesByLang('fr'), 0);

    mlt.removeEmptyLangs();
    assert.equal(mlt.containsLang('fr'), false);
  });

  it('应该在 discard 指定 cleanEmpty 时删除空语言', () => {
    const mlt = greetings();

    mlt.discard(['Bonjour', 'fr'], true);

    assert.equal(mlt.containsLang('fr'), false);
  });

  it('应该在 remove 后默认删除空语言', () => {
    const mlt = greetings();

    mlt.removeEntry('Bonjour', 'fr');
    assert.equal(mlt.containsLang('fr'), false);

    const dispatched = greetings();
    dispatched.remove(['Bonjour', 'fr']);
    assert.equal(dispatched.containsLang('fr'), false);

    const kept = greetings();
    kept.removeEntry('Bonjour', 'fr', false);
    assert.equal(kept.containsLang('fr'), true);
  });

  it('应该在条目或语言不存在时让 remove 失败', () => {
    const mlt = greetings();

    assert.throws(() => mlt.removeEntry('nope', 'en'), diagnostic(DiagnosticCode.N001_EntryNotFound));
    assert.throws(() => mlt.removeLang('xx'), diagnostic(DiagnosticCode.N001_EntryNotFound));
    assert.throws(
      () => mlt.removeLangTextSet(new LangTextSet(['Hello', 'zzz'], 'en')),
      diagnostic(DiagnosticCode.N001_EntryNotFound)
    );
    mlt.discardLang('xx');

    assert.equal(mlt.countEntriesByLang('en'), 2);
  });

  it('应该拒绝非布尔的 cleanEmpty 且不做修改', () => {
    const mlt = greetings();

    // 模拟非类型化调用方
    assert.throws(
      () => Reflect.apply(mlt.discardEntry, mlt, ['Hello', 'en', 'yes']),
      diagnostic(DiagnosticCode.T001_InvalidArgumentType)
    );
    assert.throws(
      () => Reflect.apply(mlt.removeEntry, mlt, ['Hello', 'en', 1]),
      diagnostic(DiagnosticCode.T001_InvalidArgumentType)
    );
    assert.equal(mlt.containsEntry('Hello', 'en'), true);
  });

  it('应该删除整个语言', () => {
    const mlt = greetings();

    mlt.deleteItem('FR');
    mlt.removeLangText(new LangText('Hi', 'en'));

    assert.equal(mlt.toString(), "{'Hello'}@en");
  });

  it('应该删除另一个 MultiLangText 的全部条目', () => {
    const mlt = greetings();

    mlt.removeMultiLangText(new MultiLangText({ en: ['Hi'], fr: ['Bonjour'] }));

    assert.equal(mlt.toString(), "{'Hello'}@en");
  });
});

describe('MultiLangText 查询', () => {
  it('应该取得文本与实体', () => {
    const mlt = greetings();

    assert.deepEqual(mlt.getTexts(), ['Bonjour', 'Hello', 'Hi']);
    assert.equal(mlt.getLangText('Hi', 'EN')?.toString(), '"Hi"@en');
    assert.equal(mlt.getLangText('nope', 'en'), undefined);
    assert.equal(mlt.getLangTextSet('de').size, 0);
    assert.equal(mlt.getLangTextSet('de').lang, 'de');
    assert.equal(mlt.getPrefLangTextSet().toString(), "{'Hello', 'Hi'}@en");
    assert.deepEqual(mlt.getMultiLangText(['fr', 'xx']).getLangs(), ['fr']);
  });

  it('应该按语言与文本排序输出字符串', () => {
    const mlt = greetings();

    assert.deepEqual(mlt.getStrings(), ['"Hello"@en', '"Hi"@en', '"Bonjour"@fr']);
    assert.deepEqual(mlt.getStringsLang('fr', { printQuotes: false }), ['Bonjour@fr']);
    assert.deepEqual(
      mlt.getLangTextsPrefLang().map(item => item.text),
      ['Hello', 'Hi']
    );
  });

  it('应该判断包含关系', () => {
    const mlt = greetings();

    assert.equal(mlt.contains(['Hi', 'EN']), true);
    assert.equal(mlt.containsTextInAnyLang('Bonjour'), true);
    assert.equal(mlt.containsTextInPrefLang('Bonjour'), false);
    assert.equal(mlt.containsLangTextSet(new LangTextSet(['Hello'], 'EN')), true);
    assert.equal(mlt.containsMultiLangText(new MultiLangText({ fr: ['Bonjour'] })), true);
    assert.equal(mlt.contains(new LangText('Hi', 'fr')), false);
  });

  it('应该在查找时去除空白', () => {
    Controller.set(MultiLangTextFlag.STRIP_TEXT, true);
    const mlt = greetings();

    assert.equal(mlt.containsEntry(' Hello ', 'en'), true);
  });

  it('应该统计条目', () => {
    const mlt = greetings();

    assert.equal(mlt.countEntriesTotal(), 3);
    assert.equal(mlt.countLangsTotal(), 2);
    assert.equal(mlt.countEntriesByLang('xx'), 0);
    assert.equal(mlt.hasPrefLangEntries(), true);
  });
});

describe('MultiLangText 弹出', () => {
  it('应该弹出条目并清理变空的语言', () => {
    const mlt = greetings();

    assert.equal(mlt.popLangText('Bonjour', 'fr')?.toString(), '"Bonjour"@fr');
    assert.equal(mlt.containsLang('fr'), false);
    assert.equal(mlt.popLangText('Bonjour', 'fr'), undefined);
  });

  it('应该弹出语言集合', () => {
    const mlt = greetings();

    assert.equal(mlt.popLangTextSet('en')?.size, 2);
    assert.equal(mlt.containsLang('en'), false);
    assert.equal(mlt.popLangTextSet('xx'), undefined);

    const popped = greetings().popMultiLangText(['fr']);
    assert.deepEqual(popped.getLangs(), ['fr']);
  });
});

describe('MultiLangText 比较、输出与合并', () => {
  it('应该忽略首选语言与语言大小写判断相等', () => {
    const a = new MultiLangText({ en: ['a'] }, 'en');
    const b = new MultiLangText({ EN: ['a'] }, 'fr');

    assert.equal(a.equals(b), true);
    assert.equal(a.equals(new MultiLangText({ en: ['b'] })), false);
  });

  it('应该按渲染选项输出', () => {
    const mlt = greetings();

    assert.equal(mlt.toString({ printLang: false }), "{'Hello', 'Hi'}, {'Bonjour'}");
    assert.equal(mlt.toString({ separator: '#' }), "{'Hello', 'Hi'}#en, {'Bonjour'}#fr");
    assert.equal(mlt.toString({ printQuotes: false }), '{Hello, Hi}@en, {Bonjour}@fr');
  });

  it('应该在 PRINT_WITH_LANG 关闭时省略语言标签', () => {
    Controller.set(MultiLangTextFlag.PRINT_WITH_LANG, false);
    const mlt = greetings();
    mlt.addEmptyLang('es');

    assert.equal(mlt.toString(), "{'Hello', 'Hi'}, {}, {'Bonjour'}");
    assert.equal(mlt.toString({ printLang: true }), "{'Hello', 'Hi'}@en, {}@es, {'Bonjour'}@fr");
  });

  it('应该按语言转换', () => {
    const mlt = greetings();

    assert.deepEqual(
      mlt.toLangTexts(['fr']).map(item => item.toString()),
      ['"Bonjour"@fr']
    );
    assert.deepEqual(
      mlt.toLangTextSets().map(set => set.toString()),
      ["{'Hello', 'Hi'}@en", "{'Bonjour'}@fr"]
    );
    assert.deepEqual(
      [...mlt].map(([lang]) => lang),
      ['en', 'fr']
    );
  });

  it('应该合并为新集合而不修改输入', () => {
    const a = new MultiLangText({ en: ['a'] }, 'fr');
    const b = new MultiLangText({ EN: ['b'], de: ['c'] });

    const merged = MultiLangText.merge([a, b]);

    assert.equal(merged.prefLang, 'fr');
    assert.equal(merged.toString(), "{'c'}@de, {'a', 'b'}@en");
    assert.equal(a.countEntriesTotal(), 1);
  });
});
