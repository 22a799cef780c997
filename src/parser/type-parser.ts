/**
 * 类型与签名解析器
 * 负责解析 `[x: int, --flag(-f): string = "a", ...rest]: in -> out` 形式的命令签名，
 * 以及 `list<string>`、`record<a: int>`、`closure(int)` 等类型表达式
 */

import { Node } from '../ast/ast.js';
import { TokenKind } from '../frontend/tokens.js';
import type { IoType, Parameter, Signature, TypeArg, TypeExpr } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { describeToken } from './parser-tools.js';
import { assignSpan, spanSince } from './span-utils.js';
import { parseExpression } from './expr-stmt-parser.js';

/**
 * 解析类型表达式
 */
export function parseType(ctx: ParserContext): TypeExpr {
  const start = ctx.peek();
  if (start.kind !== TokenKind.WORD) {
    return Diagnostics.expectedType(describeToken(start), start.pos)
      .withOffsets({ start: start.start, end: start.end })
      .throw();
  }
  ctx.next();
  let args: TypeArg[] | null = null;
  let bracket: TypeExpr['bracket'] = '<';
  const after = ctx.peek();
  if (after.kind === TokenKind.LT && !after.spaced) {
    ctx.next();
    args = parseTypeArgs(ctx, TokenKind.GT);
  } else if (after.kind === TokenKind.LPAREN && !after.spaced) {
    ctx.next();
    bracket = '(';
    args = parseTypeArgs(ctx, TokenKind.RPAREN);
  }
  return assignSpan(Node.Type(start.value, args, bracket), spanSince(ctx, start));
}

function parseTypeArgs(ctx: ParserContext, close: TokenKind): TypeArg[] {
  const args: TypeArg[] = [];
  for (;;) {
    ctx.consumeSeparators();
    if (ctx.at(close)) break;
    const tok = ctx.peek();
    if (tok.kind === TokenKind.WORD && ctx.peek(1).kind === TokenKind.COLON) {
      ctx.next();
      ctx.next();
      args.push({ key: tok.value, type: parseType(ctx) });
    } else if (tok.kind === TokenKind.STRING && ctx.peek(1).kind === TokenKind.COLON) {
      ctx.next();
      ctx.next();
      args.push({ key: tok.value, type: parseType(ctx) });
    } else {
      args.push({ key: null, type: parseType(ctx) });
    }
  }
  ctx.expect(close, close === TokenKind.GT ? "Expected '>' to close type arguments" : "Expected ')'");
  return args;
}

/**
 * 解析单个参数
 *
 * 支持 positional、`name?` 可选参数、`...rest` 与 `--flag(-f)` / `-f` 形式的 flag。
 */
export function parseParameter(ctx: ParserContext, tools: ParserTools): Parameter {
  const start = ctx.peek();
  let style: Parameter['style'] = 'positional';
  let name: string;
  let short: string | null = null;
  let shortOnly = false;

  if (start.kind === TokenKind.FLAG) {
    ctx.next();
    style = 'flag';
    if (start.value.startsWith('--')) {
      name = start.value.slice(2);
      const paren = ctx.peek();
      if (paren.kind === TokenKind.LPAREN && !paren.spaced) {
        ctx.next();
        const shortTok = ctx.expect(TokenKind.FLAG, "Expected short flag such as '-f'");
        short = shortTok.value.replace(/^-/, '');
        ctx.expect(TokenKind.RPAREN, "Expected ')' after short flag");
      }
    } else {
      name = start.value.slice(1);
      shortOnly = true;
    }
  } else if (start.kind === TokenKind.SPREAD) {
    ctx.next();
    style = 'rest';
    name = tools.parseName('rest parameter name');
  } else {
    name = tools.parseName('parameter name');
    if (name.endsWith('?')) {
      style = 'optional';
      name = name.slice(0, -1);
    }
  }

  let type: TypeExpr | null = null;
  if (ctx.at(TokenKind.COLON)) {
    ctx.next();
    type = parseType(ctx);
  }

  let defaultValue = null;
  if (ctx.at(TokenKind.EQUALS)) {
    ctx.next();
    defaultValue = ctx.withoutBraceStop(() => parseExpression(ctx, tools));
  }

  return assignSpan(
    Node.Parameter({ style, name, short, shortOnly, type, defaultValue }),
    spanSince(ctx, start)
  );
}

/**
 * 解析命令签名（包括可选的输入/输出类型）
 */
export function parseSignature(ctx: ParserContext, tools: ParserTools): Signature {
  const open = ctx.expect(TokenKind.LBRACKET, "Expected '[' to start the signature");
  const params: Parameter[] = [];
  for (;;) {
    ctx.consumeSeparators();
    if (ctx.at(TokenKind.RBRACKET)) break;
    if (ctx.at(TokenKind.EOF)) {
      Diagnostics.incompleteConstruction('signature', open.pos)
        .withOffsets({ start: open.start, end: open.end })
        .throw();
    }
    params.push(parseParameter(ctx, tools));
  }
  ctx.expect(TokenKind.RBRACKET, "Expected ']' to close the signature");
  const paramsSpan = spanSince(ctx, open);

  const io: IoType[] = [];
  let ioBracketed = false;
  if (ctx.at(TokenKind.COLON)) {
    ctx.next();
    if (ctx.at(TokenKind.LBRACKET)) {
      ioBracketed = true;
      ctx.next();
      for (;;) {
        ctx.consumeSeparators();
        if (ctx.at(TokenKind.RBRACKET)) break;
        io.push(parseIoType(ctx));
      }
      ctx.expect(TokenKind.RBRACKET, "Expected ']' to close the input/output types");
    } else {
      io.push(parseIoType(ctx));
    }
  }

  return assignSpan(Node.Signature(params, paramsSpan, io, ioBracketed), spanSince(ctx, open));
}

function parseIoType(ctx: ParserContext): IoType {
  const start = ctx.peek();
  const input = parseType(ctx);
  ctx.expect(TokenKind.THIN_ARROW, "Expected '->' between input and output types");
  const output = parseType(ctx);
  return assignSpan(Node.IoType(input, output), spanSince(ctx, start));
}
