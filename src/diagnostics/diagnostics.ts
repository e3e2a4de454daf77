// Structured diagnostics with error codes and categories

export enum DiagnosticCategory {
  Type = 'type',
  Value = 'value',
  NotFound = 'not-found',
  Kind = 'kind',
}

export enum DiagnosticCode {
  // Type errors (T001-T099)
  T001_InvalidArgumentType = 'T001',
  T002_StrictOperandType = 'T002',

  // Value errors (V001-V099)
  V001_EmptyText = 'V001',
  V002_EmptyLang = 'V002',
  V003_InvalidLangTag = 'V003',
  V004_OracleUnavailable = 'V004',
  V005_LangMismatch = 'V005',
  V006_MixedLangs = 'V006',
  V007_EmptySeparator = 'V007',
  V008_MalformedFormat = 'V008',

  // Lookup errors (N001-N099)
  N001_EntryNotFound = 'N001',
  N002_SubstringNotFound = 'N002',
  N003_EmptyCollection = 'N003',

  // Identifier errors (K001-K099)
  K001_UnknownFlag = 'K001',
  K002_UnknownFlagScope = 'K002',
  K003_UnknownConversionMethod = 'K003',

  // Flag profile errors (C001-C099)
  C001_ProfileParseError = 'C001',
  C002_ProfileSchemaViolation = 'C002',
}

export interface Diagnostic {
  readonly category: DiagnosticCategory;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly context?: Readonly<Record<string, unknown>>;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }

  get category(): DiagnosticCategory {
    return this.diagnostic.category;
  }
}

export class DiagnosticBuilder {
  private category: DiagnosticCategory = DiagnosticCategory.Value;
  private code?: DiagnosticCode;
  private message?: string;
  private context: Record<string, unknown> = {};

  static type(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withCategory(DiagnosticCategory.Type).withCode(code);
  }

  static value(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withCategory(DiagnosticCategory.Value).withCode(code);
  }

  static notFound(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withCategory(DiagnosticCategory.NotFound).withCode(code);
  }

  static kind(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withCategory(DiagnosticCategory.Kind).withCode(code);
  }

  withCategory(category: DiagnosticCategory): DiagnosticBuilder {
    this.category = category;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withContext(key: string, value: unknown): DiagnosticBuilder {
    this.context[key] = value;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    const diagnostic: Diagnostic = {
      category: this.category,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.context).length > 0) {
      return { ...diagnostic, context: { ...this.context } };
    }

    return diagnostic;
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

/**
 * 描述运行时值的类型名，用于错误消息。
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value === 'object') {
    const name: unknown = value.constructor?.name;
    return typeof name === 'string' && name !== '' ? name : 'object';
  }
  return typeof value;
}

// Common diagnostic patterns
export const Diagnostics = {
  invalidType: (argName: string, expected: string, actual: unknown): DiagnosticBuilder =>
    DiagnosticBuilder.type(DiagnosticCode.T001_InvalidArgumentType)
      .withMessage(`Invalid argument '${argName}': expected ${expected}, got '${describeType(actual)}'.`)
      .withContext('argument', argName),

  strictOperand: (owner: string, actual: unknown): DiagnosticBuilder =>
    DiagnosticBuilder.type(DiagnosticCode.T002_StrictOperandType)
      .withMessage(
        `Strict mode is enabled. Operand of ${owner} must be a tagged value, got '${describeType(actual)}'.`
      ),

  emptyText: (scope: string, raw: string): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V001_EmptyText)
      .withMessage(`Invalid 'text' value received ('${raw}'). '${scope}.DEFINED_TEXT' is enabled. Expected non-empty text.`)
      .withContext('scope', scope),

  emptyLang: (scope: string, raw: string): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V002_EmptyLang)
      .withMessage(`Invalid 'lang' value received ('${raw}'). '${scope}.DEFINED_LANG' is enabled. Expected non-empty language tag.`)
      .withContext('scope', scope),

  invalidLangTag: (scope: string, raw: string): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V003_InvalidLangTag)
      .withMessage(`Invalid 'lang' value received ('${raw}'). '${scope}.VALID_LANG' is enabled. Expected valid language tag.`)
      .withContext('scope', scope),

  oracleUnavailable: (scope: string): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V004_OracleUnavailable)
      .withMessage(
        `'${scope}.VALID_LANG' requires a language tag oracle and '${scope}.ENFORCE_EXTRA_DEPEND' is enabled, but no oracle is available.`
      )
      .withContext('scope', scope),

  langMismatch: (owner: string, other: string): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V005_LangMismatch)
      .withMessage(`Operation cannot be performed. Incompatible languages between ${owner} and ${other} object.`),

  mixedLangs: (langs: readonly string[]): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V006_MixedLangs)
      .withMessage(`The conversion can only be performed from values with the same language, got: ${langs.join(', ')}.`),

  emptySeparator: (): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V007_EmptySeparator).withMessage('Empty separator.'),

  malformedFormat: (template: string): DiagnosticBuilder =>
    DiagnosticBuilder.value(DiagnosticCode.V008_MalformedFormat)
      .withMessage(`Unbalanced braces in format string '${template}'.`),

  entryNotFound: (what: string): DiagnosticBuilder =>
    DiagnosticBuilder.notFound(DiagnosticCode.N001_EntryNotFound).withMessage(`${what} not found.`),

  substringNotFound: (sub: string): DiagnosticBuilder =>
    DiagnosticBuilder.notFound(DiagnosticCode.N002_SubstringNotFound).withMessage(`Substring '${sub}' not found.`),

  emptyCollection: (owner: string): DiagnosticBuilder =>
    DiagnosticBuilder.notFound(DiagnosticCode.N003_EmptyCollection).withMessage(`Cannot pop from an empty ${owner}.`),

  unknownFlag: (flag: unknown): DiagnosticBuilder =>
    DiagnosticBuilder.kind(DiagnosticCode.K001_UnknownFlag)
      .withMessage(
        `Invalid flag. Expected a member of GlobalFlag, LangTextFlag, LangTextSetFlag or MultiLangTextFlag, got '${String(flag)}'.`
      ),

  unknownFlagScope: (scope: unknown): DiagnosticBuilder =>
    DiagnosticBuilder.kind(DiagnosticCode.K002_UnknownFlagScope)
      .withMessage(`Invalid flag scope '${String(scope)}'.`),

  unknownConversionMethod: (method: unknown): DiagnosticBuilder =>
    DiagnosticBuilder.kind(DiagnosticCode.K003_UnknownConversionMethod)
      .withMessage(`Unknown method: ${String(method)}. Valid methods are 'manual' and 'parse'.`),
};

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.category} [${diagnostic.code}]: ${diagnostic.message}`;
}
