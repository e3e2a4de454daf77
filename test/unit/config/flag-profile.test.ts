import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { isFlagProfile, loadFlagProfile, parseFlagProfile } from '../../../src/config/flag-profile.js';
import { GlobalFlag, MultiLangTextFlag } from '../../../src/config/flags.js';
import { DiagnosticCode, type Diagnostic } from '../../../src/diagnostics/diagnostics.js';

const cleanups: Array<() => void> = [];

function createTempFile(raw: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flag-profile-test-'));
  const filePath = path.join(dir, 'flags.json');
  fs.writeFileSync(filePath, raw, 'utf8');
  cleanups.push(() => fs.rmSync(dir, { recursive: true, force: true }));
  return filePath;
}

function expectDiagnostics(result: ReturnType<typeof parseFlagProfile>): Diagnostic[] {
  if (isFlagProfile(result)) {
    assert.fail('expected diagnostics');
  }
  return result;
}

afterEach(() => {
  cleanups.splice(0).forEach(cleanup => cleanup());
});

describe('parseFlagProfile', () => {
  it('应该解析合法的配置文件', () => {
    const result = parseFlagProfile(
      JSON.stringify({
        description: 'strict catalog',
        flags: { 'GlobalFlag.STRIP_TEXT': true, 'MultiLangTextFlag.LOWERCASE_LANG': true },
      })
    );

    assert.ok(isFlagProfile(result));
    assert.equal(result.description, 'strict catalog');
    assert.equal(result.flags[GlobalFlag.STRIP_TEXT], true);
    assert.equal(result.flags[MultiLangTextFlag.LOWERCASE_LANG], true);
  });

  it('应该在 JSON 解析失败时返回 C001', () => {
    const diagnostics = expectDiagnostics(parseFlagProfile('{ "flags": '));

    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0]?.code, DiagnosticCode.C001_ProfileParseError);
  });

  it('应该拒绝未知标志', () => {
    const diagnostics = expectDiagnostics(parseFlagProfile(JSON.stringify({ flags: { 'GlobalFlag.BOGUS': true } })));

    assert.ok(diagnostics.length > 0);
    assert.ok(diagnostics.every(d => d.code === DiagnosticCode.C002_ProfileSchemaViolation));
    assert.ok(diagnostics.some(d => d.message === "Unknown flag 'GlobalFlag.BOGUS' at /flags"));
  });

  it('应该拒绝非布尔值和多余字段', () => {
    const diagnostics = expectDiagnostics(
      parseFlagProfile(JSON.stringify({ flags: { 'GlobalFlag.VALID_LANG': 'yes' }, extra: 1 }))
    );

    assert.ok(diagnostics.some(d => d.message === "Unknown field 'extra' at /"));
    assert.ok(diagnostics.some(d => d.context?.['keyword'] === 'type'));
  });

  it('应该要求 flags 字段', () => {
    const diagnostics = expectDiagnostics(parseFlagProfile('{}'));

    assert.equal(diagnostics[0]?.code, DiagnosticCode.C002_ProfileSchemaViolation);
    assert.equal(diagnostics[0]?.context?.['keyword'], 'required');
  });
});

describe('loadFlagProfile', () => {
  it('应该从文件读取配置', () => {
    const filePath = createTempFile(JSON.stringify({ flags: { 'LangTextFlag.DEFINED_LANG': true } }));

    const result = loadFlagProfile(filePath);

    assert.ok(isFlagProfile(result));
    assert.deepEqual(result.flags, { 'LangTextFlag.DEFINED_LANG': true });
  });

  it('应该在文件不存在时返回 C001', () => {
    const missing = path.join(os.tmpdir(), `missing-flags-${Date.now()}.json`);

    const diagnostics = expectDiagnostics(loadFlagProfile(missing));

    assert.equal(diagnostics[0]?.code, DiagnosticCode.C001_ProfileParseError);
    assert.ok(diagnostics[0]?.message.startsWith(`Cannot read flag profile '${missing}'`));
  });
});
