/**
 * nufmt 配置文件加载
 *
 * 配置文件是一个 nuon 记录（JSON 是其子集），例如：
 *
 * ```nu
 * {
 *   indent: 2
 *   line_length: 100
 *   exclude: ["vendor/*"]
 * }
 * ```
 *
 * 文本用项目自身的解析器读取，只接受字面量；随后用 nufmt.schema.json 做结构校验。
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { Minimatch } from 'minimatch';
import type * as AST from '../types.js';
import { parse } from '../parser.js';
import { findUp } from '../utils/paths.js';
import { DiagnosticCode, DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';

export interface FormatConfig {
  /** Spaces per indentation level */
  readonly indent: number;
  /** Target maximum line width */
  readonly lineLength: number;
  /** Maximum consecutive blank lines kept */
  readonly margin: number;
  /** Glob patterns of paths to skip */
  readonly exclude: readonly string[];
}

export const DEFAULT_CONFIG: FormatConfig = Object.freeze({
  indent: 4,
  lineLength: 80,
  margin: 1,
  exclude: Object.freeze([]),
});

/** Default config file name looked up in the working directory */
export const CONFIG_FILE_NAME = 'nufmt.nuon';

/** 同一选项的多个键名 */
const ALIASES: Readonly<Record<'indent' | 'lineLength', readonly string[]>> = {
  indent: ['indent', 'tab_spaces'],
  lineLength: ['line_length', 'limit', 'max_width'],
};

let validator: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (validator === null) {
    const schema: SchemaObject = JSON.parse(readFileSync(findUp('nufmt.schema.json', import.meta.url), 'utf-8'));
    const ajv = new Ajv({ strict: true, allErrors: true });
    validator = ajv.compile(schema);
  }
  return validator;
}

/** nuon 字面量值 */
type NuonValue = string | number | boolean | null | NuonValue[] | { [key: string]: NuonValue };

function configError(code: DiagnosticCode, message: string): never {
  return Diagnostics.config(code, message).throw();
}

function unquote(text: string): string {
  if (text.startsWith('"')) {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'string' ? parsed : text;
  }
  if (text.startsWith("'") || text.startsWith('`')) return text.slice(1, -1);
  const raw = /^r(#+)'([\s\S]*)'\1$/.exec(text);
  return raw?.[2] ?? text;
}

/**
 * 把字面量表达式转换为值；遇到非字面量（命令、闭包、变量等）时报 C002。
 */
function toValue(expr: AST.Expression): NuonValue {
  switch (expr.kind) {
    case 'Literal':
      switch (expr.type) {
        case 'int':
        case 'float':
          return Number(expr.text.replace(/_/g, ''));
        case 'bool':
          return expr.text === 'true';
        case 'null':
          return null;
        case 'string':
          return unquote(expr.text);
        default:
          return expr.text;
      }
    case 'BareWord':
      return expr.text;
    case 'UnaryOp': {
      const operand = toValue(expr.operand);
      if (expr.op === '-' && typeof operand === 'number') return -operand;
      break;
    }
    case 'List':
      return expr.items.map(toValue);
    case 'Record': {
      const out: { [key: string]: NuonValue } = {};
      for (const entry of expr.entries) {
        if (entry.kind === 'Spread') break;
        const key = toValue(entry.key);
        if (typeof key !== 'string' && typeof key !== 'number') break;
        out[String(key)] = toValue(entry.value);
      }
      if (Object.keys(out).length === expr.entries.length) return out;
      break;
    }
    case 'Pipeline': {
      const [only] = expr.stages;
      if (only && expr.stages.length === 1) return toValue(only);
      break;
    }
    default:
      break;
  }
  return configError(DiagnosticCode.C002_ConfigInvalidFormat, `Configuration must be a nuon record of literal values`);
}

function readRecord(text: string): { [key: string]: NuonValue } {
  let program: AST.Program;
  try {
    program = parse(text).program;
  } catch (error) {
    if (error instanceof DiagnosticError) {
      const { line, col } = error.pos;
      return configError(
        DiagnosticCode.C002_ConfigInvalidFormat,
        `Configuration is not valid nuon: ${error.message} at ${line}:${col}`
      );
    }
    throw error;
  }
  const [statement] = program.statements;
  if (!statement || program.statements.length !== 1 || statement.kind !== 'Pipeline') {
    return configError(DiagnosticCode.C002_ConfigInvalidFormat, 'Configuration must be a single record');
  }
  const value = toValue(statement);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return configError(DiagnosticCode.C002_ConfigInvalidFormat, 'Configuration must be a record');
  }
  return value;
}

function mapAjvError(error: ErrorObject): never {
  const field = error.instancePath.replace(/^\//, '') || '(root)';
  switch (error.keyword) {
    case 'additionalProperties': {
      const property: unknown = error.params.additionalProperty;
      return configError(DiagnosticCode.C003_ConfigUnknownOption, `Unknown configuration option '${String(property)}'`);
    }
    case 'type':
      return configError(
        DiagnosticCode.C004_ConfigInvalidOptionType,
        `Option '${field}' ${error.message ?? 'has the wrong type'}`
      );
    case 'minimum':
      return configError(
        DiagnosticCode.C005_ConfigInvalidOptionValue,
        `Option '${field}' ${error.message ?? 'is out of range'}`
      );
    default:
      return configError(
        DiagnosticCode.C002_ConfigInvalidFormat,
        `Invalid configuration: ${error.message ?? error.keyword} (${field})`
      );
  }
}

function pickAlias(record: { [key: string]: NuonValue }, keys: readonly string[]): number | undefined {
  const present = keys.filter(key => key in record);
  if (present.length > 1) {
    return configError(
      DiagnosticCode.C005_ConfigInvalidOptionValue,
      `Options ${present.map(key => `'${key}'`).join(' and ')} set the same value; keep one`
    );
  }
  const [key] = present;
  if (key === undefined) return undefined;
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

function validateExclude(patterns: readonly string[]): void {
  for (const pattern of patterns) {
    if (pattern.trim() === '' || new Minimatch(pattern, { dot: true }).makeRe() === false) {
      configError(DiagnosticCode.C006_ConfigInvalidExcludePattern, `Invalid exclude pattern '${pattern}'`);
    }
  }
}

/**
 * 解析配置文本，未出现的选项取默认值。
 *
 * @throws {ConfigError} 格式、键名、类型或取值不合法时抛出
 */
export function parseConfig(text: string): FormatConfig {
  const record = readRecord(text);
  const validate = getValidator();
  if (!validate(record)) {
    const [first] = validate.errors ?? [];
    if (first) mapAjvError(first);
    return configError(DiagnosticCode.C002_ConfigInvalidFormat, 'Invalid configuration');
  }

  const exclude = Array.isArray(record.exclude)
    ? record.exclude.filter((item): item is string => typeof item === 'string')
    : [];
  validateExclude(exclude);

  const margin = record.margin;
  return Object.freeze({
    indent: pickAlias(record, ALIASES.indent) ?? DEFAULT_CONFIG.indent,
    lineLength: pickAlias(record, ALIASES.lineLength) ?? DEFAULT_CONFIG.lineLength,
    margin: typeof margin === 'number' ? margin : DEFAULT_CONFIG.margin,
    exclude: Object.freeze(exclude),
  });
}

/**
 * 加载配置文件。
 *
 * - 指定了路径：文件不存在报 C007，读取失败报 C001
 * - 未指定：使用 `cwd` 下的 nufmt.nuon，不存在时返回默认配置
 */
export function loadConfig(path?: string, cwd: string = process.cwd()): FormatConfig {
  const target = path !== undefined ? resolve(cwd, path) : join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(target)) {
    if (path === undefined) return DEFAULT_CONFIG;
    return configError(DiagnosticCode.C007_ConfigFileNotFound, `Configuration file not found: ${path}`);
  }
  let text: string;
  try {
    text = readFileSync(target, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return configError(DiagnosticCode.C001_ConfigReadFailed, `Failed to read ${target}: ${reason}`);
  }
  return parseConfig(text);
}
