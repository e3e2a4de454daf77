/**
 * 标志配置文件解析器
 *
 * 负责读取、解析和验证标志配置文件（JSON）：
 *
 * ```json
 * {
 *   "description": "strict catalog",
 *   "flags": {
 *     "GlobalFlag.STRIP_TEXT": true,
 *     "MultiLangTextFlag.LOWERCASE_LANG": true
 *   }
 * }
 * ```
 */

import { readFileSync } from 'node:fs';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { allFlags, type Flag } from './flags.js';
import { DiagnosticBuilder, DiagnosticCode, type Diagnostic } from '../diagnostics/diagnostics.js';

export interface FlagProfile {
  readonly description?: string;
  readonly flags: Readonly<Partial<Record<Flag, boolean>>>;
}

export const FLAG_PROFILE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    description: { type: 'string' },
    flags: {
      type: 'object',
      propertyNames: { enum: [...allFlags()] },
      additionalProperties: { type: 'boolean' },
    },
  },
  required: ['flags'],
  additionalProperties: false,
};

const ajv = new Ajv({ strict: true, allErrors: true });
const validateSchema: ValidateFunction<FlagProfile> = ajv.compile<FlagProfile>(FLAG_PROFILE_SCHEMA);

function mapAjvError(error: ErrorObject): Diagnostic {
  const fieldPath = error.instancePath || '/';
  let message = `${fieldPath} ${error.message ?? 'is invalid'}`;

  if (error.keyword === 'additionalProperties') {
    const extra: unknown = error.params.additionalProperty;
    message = `Unknown field '${String(extra)}' at ${fieldPath}`;
  } else if (error.keyword === 'propertyNames') {
    const name: unknown = error.params.propertyName;
    message = `Unknown flag '${String(name)}' at ${fieldPath}`;
  }

  return DiagnosticBuilder.value(DiagnosticCode.C002_ProfileSchemaViolation)
    .withMessage(message)
    .withContext('keyword', error.keyword)
    .build();
}

/**
 * 解析标志配置文件内容
 *
 * @param content JSON 文本
 * @returns 解析后的配置，或诊断数组
 */
export function parseFlagProfile(content: string): FlagProfile | Diagnostic[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return [
      DiagnosticBuilder.value(DiagnosticCode.C001_ProfileParseError)
        .withMessage(`JSON parse failed: ${message}`)
        .build(),
    ];
  }

  if (!validateSchema(raw)) {
    return (validateSchema.errors ?? []).map(mapAjvError);
  }

  return raw;
}

/**
 * 读取标志配置文件
 *
 * @param filePath 配置文件路径
 */
export function loadFlagProfile(filePath: string): FlagProfile | Diagnostic[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return [
      DiagnosticBuilder.value(DiagnosticCode.C001_ProfileParseError)
        .withMessage(`Cannot read flag profile '${filePath}': ${message}`)
        .build(),
    ];
  }
  return parseFlagProfile(content);
}

export function isFlagProfile(result: FlagProfile | Diagnostic[]): result is FlagProfile {
  return !Array.isArray(result);
}
