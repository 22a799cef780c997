/**
 * 解析器工具函数集合
 * 提供错误报告、期望验证和名称解析等辅助功能
 */

import { TokenKind } from '../frontend/tokens.js';
import type { Token } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { ParserContext } from './context.js';

/**
 * 解析器工具函数接口
 */
export interface ParserTools {
  /**
   * 报告解析错误并中止
   * @param msg 错误消息
   * @param tok 可选的错误位置 token（默认使用当前 token）
   */
  error: (msg: string, tok?: Token) => never;

  /** Reports that an expression was expected at the current token. */
  expectedExpression: (tok?: Token) => never;

  /**
   * 期望并消费指定关键字
   */
  expectWord: (word: string) => Token;

  /**
   * 解析名称：裸词或带引号的字符串（如 `def "git st" []`）
   */
  parseName: (what: string) => string;

  /** True when the current token ends a statement. */
  atStatementEnd: () => boolean;
}

export function describeToken(tok: Token): string {
  if (tok.kind === TokenKind.EOF) return 'end of input';
  if (tok.kind === TokenKind.NEWLINE) return 'newline';
  return tok.value;
}

/**
 * 创建解析器工具函数集合
 * @param ctx 解析器上下文
 * @returns 工具函数集合
 */
export function createParserTools(ctx: ParserContext): ParserTools {
  const tools: ParserTools = {
    error(msg: string, tok: Token = ctx.peek()): never {
      return Diagnostics.unexpectedToken(describeToken(tok), tok.pos)
        .withMessage(msg)
        .withOffsets({ start: tok.start, end: tok.end })
        .throw();
    },

    expectedExpression(tok: Token = ctx.peek()): never {
      return Diagnostics.expectedExpression(describeToken(tok), tok.pos)
        .withOffsets({ start: tok.start, end: tok.end })
        .throw();
    },

    expectWord(word: string): Token {
      const tok = ctx.peek();
      if (!ctx.atWord(word)) {
        Diagnostics.expectedToken(word, describeToken(tok), tok.pos)
          .withOffsets({ start: tok.start, end: tok.end })
          .throw();
      }
      return ctx.next();
    },

    parseName(what: string): string {
      const tok = ctx.peek();
      if (tok.kind !== TokenKind.WORD && tok.kind !== TokenKind.STRING) {
        return Diagnostics.expectedIdentifier(tok.pos)
          .withMessage(`Expected ${what}, got '${describeToken(tok)}'`)
          .withOffsets({ start: tok.start, end: tok.end })
          .throw();
      }
      return ctx.next().value;
    },

    atStatementEnd(): boolean {
      const kind = ctx.peek().kind;
      return (
        kind === TokenKind.NEWLINE ||
        kind === TokenKind.SEMICOLON ||
        kind === TokenKind.EOF ||
        kind === TokenKind.RPAREN ||
        kind === TokenKind.RBRACE
      );
    },
  };
  return tools;
}
