import { Controller } from '../../src/config/controller.js';
import { resetLanguageTagOracle } from '../../src/validation/oracle.js';
import { setLogSink } from '../../src/utils/logger.js';
import { DiagnosticError, type DiagnosticCode } from '../../src/diagnostics/diagnostics.js';

/** 恢复进程级状态：标志默认值与默认 oracle */
export function resetLibraryState(): void {
  Controller.resetAll();
  resetLanguageTagOracle();
}

/** 捕获日志行，返回已解析的日志条目与恢复函数 */
export function captureLogs(): { entries: Array<Record<string, unknown>>; restore: () => void } {
  const entries: Array<Record<string, unknown>> = [];
  const restore = setLogSink(line => {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === 'object' && parsed !== null) {
      entries.push(Object.fromEntries(Object.entries(parsed)));
    }
  });
  return { entries, restore };
}

/** 用于 assert.throws 的诊断匹配器 */
export function diagnostic(code: DiagnosticCode): (error: unknown) => boolean {
  return (error: unknown) => error instanceof DiagnosticError && error.code === code;
}
