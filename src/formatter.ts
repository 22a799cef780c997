/**
 * 格式化驱动：parse → 提取 trivia → 构建 Doc → 合并 trivia → 按宽度渲染。
 *
 * 单次格式化是纯函数：不读写文件，不共享可变状态，可在多个文件间并发调用。
 */

import { parse } from './parser.js';
import { createDocBuilder } from './format/doc_builder.js';
import { extractTrivia } from './format/trivia.js';
import { mergeTrivia } from './format/comment_merger.js';
import { printDoc } from './format/doc_printer.js';
import { DEFAULT_CONFIG, type FormatConfig } from './config/config.js';
import { DiagnosticError } from './diagnostics/diagnostics.js';
import { logPerformance } from './utils/logger.js';

export type FormatResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly error: DiagnosticError };

export interface CheckResult {
  readonly changed: boolean;
  readonly formatted: string;
}

/**
 * 格式化源代码。输出总以恰好一个换行结尾；空白输入返回空串。
 *
 * @throws {ParseError} 源代码无法解析
 * @throws {UnsupportedConstructError} 语法节点没有布局规则
 * @throws {TriviaAttachmentError} 注释无法放回输出
 *
 * @example
 * ```typescript
 * format('ls | where size > 10kb');
 * // 'ls\n| where size > 10kb\n'
 * ```
 */
export function format(source: string, config: FormatConfig = DEFAULT_CONFIG): string {
  const text = source.replace(/\r\n?/g, '\n');
  if (text.trim() === '') return '';

  const startTime = performance.now();
  const { program, tokens } = parse(text);
  const trivia = extractTrivia(text, program, tokens);
  const doc = createDocBuilder(text, { indent: config.indent }).program(program);
  const merged = mergeTrivia(doc, trivia, text, { margin: config.margin });
  const printed = printDoc(merged, { lineLength: config.lineLength });

  logPerformance({
    component: 'formatter',
    operation: 'format',
    duration: performance.now() - startTime,
    metadata: { statements: program.statements.length, trivia: trivia.length },
  });
  return printed.replace(/^\n+/, '').replace(/\n*$/, '\n');
}

/**
 * 比较输入与格式化结果，不写任何输出。
 */
export function check(source: string, config: FormatConfig = DEFAULT_CONFIG): CheckResult {
  const formatted = format(source, config);
  return { changed: formatted !== source, formatted };
}

/**
 * 与 format 相同，但把诊断错误作为结果返回，供批量格式化逐文件记录失败。
 * 非诊断类异常（程序缺陷）仍然抛出。
 */
export function formatOrError(source: string, config: FormatConfig = DEFAULT_CONFIG): FormatResult {
  try {
    return { ok: true, text: format(source, config) };
  } catch (error) {
    if (error instanceof DiagnosticError) return { ok: false, error };
    throw error;
  }
}
