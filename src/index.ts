/**
 * @module nufmt
 *
 * Nushell 脚本格式化器的公共 API。
 *
 * **格式化管道**：
 * ```
 * 源代码 → lex → parse → 提取 trivia → 构建 Doc → 合并 trivia → 按宽度渲染
 * ```
 *
 * @example
 * ```typescript
 * import { format, parseConfig } from 'nufmt';
 *
 * const config = parseConfig('{indent: 2, line_length: 100}');
 * format('def greet [name] { print $"hello ($name)" }', config);
 * // 'def greet [name] {\n  print $"hello ($name)"\n}\n'
 * ```
 */

// 格式化驱动
export { format, check, formatOrError } from './formatter.js';
export type { CheckResult, FormatResult } from './formatter.js';

// 配置
export { DEFAULT_CONFIG, CONFIG_FILE_NAME, parseConfig, loadConfig } from './config/config.js';
export type { FormatConfig } from './config/config.js';
export { ConfigService } from './config/config-service.js';

// 解析器
export { lex } from './frontend/lexer.js';
export { parse, parseTokens } from './parser.js';
export type { ParseResult } from './parser.js';
export { Node, DefaultAstVisitor, childrenOf, structureOf } from './ast/index.js';
export type { AstVisitor } from './ast/index.js';

// 布局文档与渲染
export * as Doc from './format/doc.js';
export { printDoc, textWidth } from './format/doc_printer.js';
export type { PrintOptions } from './format/doc_printer.js';
export { createDocBuilder } from './format/doc_builder.js';
export type { BuildOptions, DocBuilder } from './format/doc_builder.js';
export { extractTrivia, collectContainers } from './format/trivia.js';
export type { TriviaItem, TriviaKind, TriviaAttachment, TriviaTarget, Container } from './format/trivia.js';
export { mergeTrivia } from './format/comment_merger.js';
export type { MergeOptions } from './format/comment_merger.js';

// 批量处理与命令行
export { discoverFiles, ExcludeMatcher } from './cli/files.js';
export { formatFiles, summarize } from './cli/batch.js';
export type { BatchMode, BatchOptions, BatchSummary, FileResult } from './cli/batch.js';
export { runCli } from './cli/main.js';
export type { CliIO } from './cli/main.js';

// 诊断
export {
  DiagnosticBuilder,
  DiagnosticCode,
  DiagnosticSeverity,
  DiagnosticError,
  ParseError,
  UnsupportedConstructError,
  TriviaAttachmentError,
  ConfigError,
  FileIOError,
  UsageError,
  Diagnostics,
  formatDiagnostic,
} from './diagnostics/diagnostics.js';
export type { Diagnostic, ErrorKind } from './diagnostics/diagnostics.js';

// 类型定义
export type * from './types.js';
export { TokenKind } from './types.js';
