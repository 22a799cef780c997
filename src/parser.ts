/**
 * Parser - 主入口
 * 负责协调各个子模块完成整个脚本的解析
 */

import { Node } from './ast/ast.js';
import type { Program, Token } from './types.js';
import { TokenKind } from './frontend/tokens.js';
import { lex } from './frontend/lexer.js';
import { createParserContext } from './parser/context.js';
import { createParserTools } from './parser/parser-tools.js';
import { parseStatements } from './parser/expr-stmt-parser.js';
import { assignSpan } from './parser/span-utils.js';

/**
 * 解析结果
 *
 * 除 AST 外还保留完整的 token 流（含注释 trivia），供格式化阶段提取注释与空行。
 */
export interface ParseResult {
  program: Program;
  tokens: readonly Token[];
}

/**
 * 解析标记流生成 AST
 *
 * @param tokens 词法标记数组（以 EOF 结尾）
 * @param source 产生这些 token 的源代码
 * @throws {ParseError} 语法错误时抛出，附带出错位置
 */
export function parseTokens(tokens: readonly Token[], source: string): Program {
  const ctx = createParserContext(tokens, source);
  const tools = createParserTools(ctx);
  const statements = parseStatements(ctx, tools, TokenKind.EOF);
  return assignSpan(Node.Program(statements), { start: 0, end: source.length });
}

/**
 * 对源代码执行词法分析与语法分析。
 *
 * @example
 * ```typescript
 * const { program } = parse('ls | where size > 10kb');
 * program.statements[0]?.kind; // 'Pipeline'
 * ```
 */
export function parse(source: string): ParseResult {
  const tokens = lex(source);
  return { program: parseTokens(tokens, source), tokens };
}
