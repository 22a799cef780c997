import type { Token } from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';

/**
 * Parser 上下文接口
 * 包含词法标记流和解析状态
 */
export interface ParserContext {
  readonly tokens: readonly Token[];
  /** Source the tokens came from; used to slice raw text */
  readonly source: string;
  /** Offset of `source` within the file (non-zero for interpolation bodies) */
  readonly baseOffset: number;
  index: number;
  /** 大于 0 时 `{` 不开始新的表达式（用于 if/while/for/match 的条件部分） */
  braceStop: number;
  /** 跳过当前位置所有 trivia Token（如注释） */
  skipTrivia(): void;
  /** 查看第 N 个 Token（自动跳过 trivia） */
  peek(offset?: number): Token;
  /** 消费当前 Token 并前进（自动跳过 trivia） */
  next(): Token;
  /** The most recently consumed significant token */
  previous(): Token;
  at(kind: TokenKind, value?: string): boolean;
  atWord(word: string): boolean;
  expect(kind: TokenKind, message: string): Token;
  consumeNewlines(): void;
  /** Skips newlines and commas between collection items */
  consumeSeparators(): void;
  /** Runs `body` with `{` treated as a terminator */
  withBraceStop<T>(body: () => T): T;
  /** Runs `body` with `{` allowed again, e.g. inside parentheses */
  withoutBraceStop<T>(body: () => T): T;
}

export function createParserContext(tokens: readonly Token[], source: string, baseOffset = 0): ParserContext {
  const eof = tokens[tokens.length - 1];
  if (!eof || eof.kind !== TokenKind.EOF) {
    throw new Error('token stream must end with EOF');
  }

  const ctx: ParserContext = {
    tokens,
    source,
    baseOffset,
    index: 0,
    braceStop: 0,
    skipTrivia: (): void => {
      while (ctx.index < ctx.tokens.length) {
        const tok = ctx.tokens[ctx.index];
        if (tok && tok.channel === 'trivia') {
          ctx.index++;
        } else {
          break;
        }
      }
    },
    peek: (offset = 0): Token => {
      let idx = ctx.index;
      let count = 0;
      while (idx < ctx.tokens.length) {
        const tok = ctx.tokens[idx];
        if (tok && tok.channel !== 'trivia') {
          if (count === offset) return tok;
          count++;
        }
        idx++;
      }
      return eof;
    },
    next: (): Token => {
      ctx.skipTrivia();
      const tok = ctx.tokens[ctx.index] ?? eof;
      if (tok.kind !== TokenKind.EOF) ctx.index++;
      ctx.skipTrivia();
      return tok;
    },
    previous: (): Token => {
      let idx = ctx.index - 1;
      while (idx >= 0) {
        const tok = ctx.tokens[idx];
        if (tok && tok.channel !== 'trivia') return tok;
        idx--;
      }
      return ctx.peek();
    },
    at: (kind: TokenKind, value?: string): boolean => {
      const t = ctx.peek();
      if (t.kind !== kind) return false;
      if (value === undefined) return true;
      return t.value === value;
    },
    atWord: (word: string): boolean => ctx.at(TokenKind.WORD, word),
    expect: (kind: TokenKind, message: string): Token => {
      const tok = ctx.peek();
      if (tok.kind !== kind) {
        Diagnostics.expectedToken(kind, tok.value || tok.kind, tok.pos)
          .withMessage(message)
          .withOffsets({ start: tok.start, end: tok.end })
          .throw();
      }
      return ctx.next();
    },
    consumeNewlines: (): void => {
      while (ctx.at(TokenKind.NEWLINE)) ctx.next();
    },
    consumeSeparators: (): void => {
      while (ctx.at(TokenKind.NEWLINE) || ctx.at(TokenKind.COMMA)) ctx.next();
    },
    withBraceStop: <T>(body: () => T): T => {
      ctx.braceStop++;
      try {
        return body();
      } finally {
        ctx.braceStop--;
      }
    },
    withoutBraceStop: <T>(body: () => T): T => {
      const saved = ctx.braceStop;
      ctx.braceStop = 0;
      try {
        return body();
      } finally {
        ctx.braceStop = saved;
      }
    },
  };

  ctx.skipTrivia();
  return ctx;
}
