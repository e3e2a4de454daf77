/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 诊断类别 (DiagnosticCategory)：type / value / not-found / kind
 * - 诊断代码 (DiagnosticCode)
 */

export {
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticError,
  DiagnosticBuilder,
  Diagnostics,
  describeType,
  formatDiagnostic,
  type Diagnostic,
} from './diagnostics.js';
