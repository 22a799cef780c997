/**
 * 表达式与语句解析器
 *
 * 负责管道、命令调用、二元/一元运算、集合字面量、闭包、控制流
 * 以及 let/for/while/loop/return 等语句。声明类语句（def、alias、module、use 等）
 * 由 decl-parser 处理。
 */

import { Node } from '../ast/ast.js';
import { KW, BINARY_PRECEDENCE } from '../config/semantic.js';
import { TokenKind } from '../frontend/tokens.js';
import { lex } from '../frontend/lexer.js';
import type * as AST from '../types.js';
import type { Position, Token } from '../types.js';
import { isCommentToken } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { createParserContext, type ParserContext } from './context.js';
import { createParserTools, type ParserTools } from './parser-tools.js';
import { assignSpan, spanFromSources, spanSince } from './span-utils.js';
import { parseParameter, parseType } from './type-parser.js';
import {
  parseAlias,
  parseDef,
  parseExport,
  parseExportEnv,
  parseExtern,
  parseModule,
  parseModuleCommand,
} from './decl-parser.js';

/** Token kinds that can start a value in argument position */
const VALUE_START = new Set<TokenKind>([
  TokenKind.INT,
  TokenKind.FLOAT,
  TokenKind.NUMBER_UNIT,
  TokenKind.DATETIME,
  TokenKind.STRING,
  TokenKind.INTERPOLATION,
  TokenKind.VARIABLE,
  TokenKind.WORD,
  TokenKind.EXTERNAL,
  TokenKind.LBRACKET,
  TokenKind.LBRACE,
  TokenKind.LPAREN,
  TokenKind.SPREAD,
  TokenKind.RANGE,
]);

/** Tokens glued onto a bare argument when written without a space, e.g. `image:tag` or `key=value` */
const GLUE = new Set<TokenKind>([
  TokenKind.EQUALS,
  TokenKind.COLON,
  TokenKind.WORD,
  TokenKind.INT,
  TokenKind.FLOAT,
  TokenKind.NUMBER_UNIT,
  TokenKind.STRING,
  TokenKind.VARIABLE,
]);

function rawText(ctx: ParserContext, span: AST.Span): string {
  return ctx.source.slice(span.start - ctx.baseOffset, span.end - ctx.baseOffset);
}

/** Looks past newlines: returns the first significant token and how many newlines precede it. */
function peekPastNewlines(ctx: ParserContext): { tok: Token; skip: number } {
  let skip = 0;
  while (ctx.peek(skip).kind === TokenKind.NEWLINE) skip++;
  return { tok: ctx.peek(skip), skip };
}

// ---------------------------------------------------------------------------
// Statements

/**
 * 解析语句序列，直到遇到 `end`（`}`、`)` 或 EOF）。不消费结束 token。
 */
export function parseStatements(ctx: ParserContext, tools: ParserTools, end: TokenKind): AST.Statement[] {
  const statements: AST.Statement[] = [];
  for (;;) {
    while (ctx.at(TokenKind.NEWLINE) || ctx.at(TokenKind.SEMICOLON)) ctx.next();
    if (ctx.at(end)) break;
    if (ctx.at(TokenKind.EOF)) {
      const tok = ctx.peek();
      Diagnostics.incompleteConstruction('block', tok.pos)
        .withOffsets({ start: tok.start, end: tok.end })
        .throw();
    }
    statements.push(parseStatement(ctx, tools));
    if (!ctx.at(TokenKind.NEWLINE) && !ctx.at(TokenKind.SEMICOLON) && !ctx.at(end)) {
      tools.error(`Unexpected '${ctx.peek().value}' after statement`);
    }
  }
  return statements;
}

function parseStatement(ctx: ParserContext, tools: ParserTools): AST.Statement {
  const tok = ctx.peek();
  if (tok.kind === TokenKind.WORD) {
    switch (tok.value) {
      case KW.LET:
      case KW.MUT:
      case KW.CONST:
        return parseLet(ctx, tools);
      case KW.DEF:
        return parseDef(ctx, tools);
      case KW.EXTERN:
        return parseExtern(ctx, tools);
      case KW.ALIAS:
        return parseAlias(ctx, tools);
      case KW.FOR:
        return parseFor(ctx, tools);
      case KW.WHILE:
        return parseWhile(ctx, tools);
      case KW.LOOP: {
        ctx.next();
        const body = parseBlock(ctx, tools);
        return assignSpan(Node.Loop(body), spanSince(ctx, tok));
      }
      case KW.RETURN: {
        ctx.next();
        const value = tools.atStatementEnd() ? null : unwrapPipeline(parsePipeline(ctx, tools));
        return assignSpan(Node.Return(value), spanSince(ctx, tok));
      }
      case KW.BREAK:
        ctx.next();
        return assignSpan(Node.Break(), spanSince(ctx, tok));
      case KW.CONTINUE:
        ctx.next();
        return assignSpan(Node.Continue(), spanSince(ctx, tok));
      case KW.MODULE:
        return parseModule(ctx, tools);
      case KW.USE:
      case KW.HIDE:
      case KW.OVERLAY:
      case KW.SOURCE:
      case KW.SOURCE_ENV:
        return parseModuleCommand(ctx, tools);
      case KW.EXPORT:
        return parseExport(ctx, tools);
      case KW.EXPORT_ENV:
        return parseExportEnv(ctx, tools);
      default:
        break;
    }
  }
  return parsePipeline(ctx, tools);
}

export function parseLet(ctx: ParserContext, tools: ParserTools): AST.Let {
  const start = ctx.next();
  const keyword: AST.LetKeyword =
    start.value === KW.MUT ? 'mut' : start.value === KW.CONST ? 'const' : 'let';
  const name = tools.parseName('variable name');
  let type: AST.TypeExpr | null = null;
  if (ctx.at(TokenKind.COLON)) {
    ctx.next();
    type = parseType(ctx);
  }
  ctx.expect(TokenKind.EQUALS, `Expected '=' after '${keyword} ${name}'`);
  ctx.consumeNewlines();
  const value = parsePipeline(ctx, tools);
  return assignSpan(Node.Let(keyword, name, type, value), spanSince(ctx, start));
}

function parseFor(ctx: ParserContext, tools: ParserTools): AST.For {
  const start = ctx.next();
  const binding = tools.parseName('loop variable');
  tools.expectWord(KW.IN);
  const iterable = ctx.withBraceStop(() => parseExpression(ctx, tools));
  const body = parseBlock(ctx, tools);
  return assignSpan(Node.For(binding, iterable, body), spanSince(ctx, start));
}

function parseWhile(ctx: ParserContext, tools: ParserTools): AST.While {
  const start = ctx.next();
  const condition = ctx.withBraceStop(() => parseExpression(ctx, tools));
  const body = parseBlock(ctx, tools);
  return assignSpan(Node.While(condition, body), spanSince(ctx, start));
}

/**
 * 解析 `{ ... }` 语句块（控制流、def 等的主体）
 */
export function parseBlock(ctx: ParserContext, tools: ParserTools): AST.Block {
  const open = ctx.expect(TokenKind.LBRACE, "Expected '{' to start a block");
  const statements = ctx.withoutBraceStop(() => parseStatements(ctx, tools, TokenKind.RBRACE));
  ctx.expect(TokenKind.RBRACE, "Expected '}' to close the block");
  return assignSpan(Node.Block(statements), spanSince(ctx, open));
}

// ---------------------------------------------------------------------------
// Pipelines and commands

function unwrapPipeline(pipeline: AST.Pipeline): AST.Expression {
  const [only] = pipeline.stages;
  return pipeline.stages.length === 1 && only ? only : pipeline;
}

/**
 * 解析管道：`stage | stage | ...`。
 *
 * 下一行以 `|` 开头时管道继续。
 */
export function parsePipeline(ctx: ParserContext, tools: ParserTools): AST.Pipeline {
  const start = ctx.peek();
  const stages: AST.Expression[] = [parseStage(ctx, tools)];
  for (;;) {
    if (ctx.at(TokenKind.PIPE)) {
      ctx.next();
      ctx.consumeNewlines();
      stages.push(parseStage(ctx, tools));
      continue;
    }
    if (ctx.at(TokenKind.NEWLINE) && peekPastNewlines(ctx).tok.kind === TokenKind.PIPE) {
      ctx.consumeNewlines();
      continue;
    }
    break;
  }
  return assignSpan(Node.Pipeline(stages), spanSince(ctx, start));
}

function parseStage(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const tok = ctx.peek();
  if (tok.kind === TokenKind.EXTERNAL) return parseCommand(ctx, tools);
  if (tok.kind === TokenKind.WORD) {
    switch (tok.value) {
      case KW.IF:
        return parseIf(ctx, tools);
      case KW.MATCH:
        return parseMatch(ctx, tools);
      case KW.TRY:
        return parseTry(ctx, tools);
      case KW.NOT:
      case KW.TRUE:
      case KW.FALSE:
      case KW.NULL:
        return parseExpression(ctx, tools);
      default:
        return parseCommand(ctx, tools);
    }
  }

  const expr = parseExpression(ctx, tools);
  const op = ctx.peek();
  if (op.kind === TokenKind.EQUALS || op.kind === TokenKind.ASSIGN_OP) {
    ctx.next();
    ctx.consumeNewlines();
    const value = parsePipeline(ctx, tools);
    return assignSpan(Node.Assignment(op.value, expr, value), spanSince(ctx, tok));
  }
  return expr;
}

function atCommandEnd(ctx: ParserContext): boolean {
  const kind = ctx.peek().kind;
  switch (kind) {
    case TokenKind.NEWLINE:
    case TokenKind.SEMICOLON:
    case TokenKind.PIPE:
    case TokenKind.EOF:
    case TokenKind.RPAREN:
    case TokenKind.RBRACE:
    case TokenKind.RBRACKET:
      return true;
    case TokenKind.LBRACE:
      return ctx.braceStop > 0;
    default:
      return false;
  }
}

function parseCommand(ctx: ParserContext, tools: ParserTools): AST.Command {
  const head = ctx.next();
  const external = head.kind === TokenKind.EXTERNAL;
  const args = parseArguments(ctx, tools);
  return assignSpan(Node.Command(external ? head.value.slice(1) : head.value, external, args), spanSince(ctx, head));
}

/** 解析命令参数，直到管道或语句结束 */
export function parseArguments(ctx: ParserContext, tools: ParserTools): AST.Expression[] {
  const args: AST.Expression[] = [];
  while (!atCommandEnd(ctx)) {
    args.push(parseArgument(ctx, tools));
  }
  return args;
}

function parseArgument(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const tok = ctx.peek();
  if (tok.kind === TokenKind.FLAG) {
    ctx.next();
    let value: AST.Expression | null = null;
    const eq = ctx.peek();
    if (eq.kind === TokenKind.EQUALS && !eq.spaced) {
      ctx.next();
      value = parsePostfix(ctx, tools);
    }
    return assignSpan(Node.Flag(tok.value, value), spanSince(ctx, tok));
  }

  let arg: AST.Expression;
  if (startsValue(ctx)) {
    arg = parseExpression(ctx, tools);
  } else {
    ctx.next();
    arg = assignSpan(Node.BareWord(tok.value), spanSince(ctx, tok));
  }

  if (arg.kind !== 'BareWord' && arg.kind !== 'Literal' && arg.kind !== 'Variable' && arg.kind !== 'CellPath') {
    return arg;
  }
  let glued = false;
  for (;;) {
    const nextTok = ctx.peek();
    if (nextTok.spaced || !GLUE.has(nextTok.kind)) break;
    ctx.next();
    glued = true;
  }
  if (!glued) return arg;
  const span = spanSince(ctx, arg.span.start);
  return assignSpan(Node.BareWord(rawText(ctx, span)), span);
}

function startsValue(ctx: ParserContext): boolean {
  const tok = ctx.peek();
  if (VALUE_START.has(tok.kind)) return !(tok.kind === TokenKind.LBRACE && ctx.braceStop > 0);
  if (tok.kind === TokenKind.OPERATOR && tok.value === '-') {
    const after = ctx.peek(1);
    return !after.spaced && VALUE_START.has(after.kind);
  }
  return false;
}

// ---------------------------------------------------------------------------
// Expressions

/**
 * 解析表达式（二元运算，按优先级爬升）
 */
export function parseExpression(ctx: ParserContext, tools: ParserTools): AST.Expression {
  return parseBinary(ctx, tools, 0);
}

/** 运算符之后没有操作数：`rm foo *`、`use std/log *` 里的 `*` 是通配参数 */
function operandMissing(ctx: ParserContext): boolean {
  switch (ctx.peek(1).kind) {
    case TokenKind.NEWLINE:
      // 行尾的其他运算符在括号内续行
      return ctx.peek().value === '*';
    case TokenKind.SEMICOLON:
    case TokenKind.PIPE:
    case TokenKind.EOF:
    case TokenKind.RPAREN:
    case TokenKind.RBRACE:
    case TokenKind.RBRACKET:
      return true;
    default:
      return false;
  }
}

function peekBinaryOperator(ctx: ParserContext): string | null {
  const tok = ctx.peek();
  switch (tok.kind) {
    case TokenKind.OPERATOR:
      if (operandMissing(ctx)) return null;
      return BINARY_PRECEDENCE.has(tok.value) ? tok.value : null;
    case TokenKind.LT:
    case TokenKind.GT:
      return tok.value;
    case TokenKind.WORD:
      return BINARY_PRECEDENCE.has(tok.value) ? tok.value : null;
    default:
      return null;
  }
}

function parseBinary(ctx: ParserContext, tools: ParserTools, minPrec: number): AST.Expression {
  let left = parseUnary(ctx, tools);
  for (;;) {
    const op = peekBinaryOperator(ctx);
    if (op === null) break;
    const prec = BINARY_PRECEDENCE.get(op) ?? 0;
    if (prec < minPrec) break;
    ctx.next();
    ctx.consumeNewlines();
    // `**` is right-associative
    const right = parseBinary(ctx, tools, op === '**' ? prec : prec + 1);
    left = assignSpan(Node.BinaryOp(op, left, right), spanFromSources(left, right));
  }
  return left;
}

function parseUnary(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const tok = ctx.peek();
  if (tok.kind === TokenKind.WORD && tok.value === KW.NOT) {
    ctx.next();
    const operand = parseBinary(ctx, tools, (BINARY_PRECEDENCE.get('and') ?? 50) + 1);
    return assignSpan(Node.UnaryOp('not', operand), spanFromSources(tok, operand));
  }
  if (tok.kind === TokenKind.OPERATOR && tok.value === '-' && !ctx.peek(1).spaced) {
    ctx.next();
    const operand = parsePostfix(ctx, tools);
    return assignSpan(Node.UnaryOp('-', operand), spanFromSources(tok, operand));
  }
  return parsePostfix(ctx, tools);
}

/** primary + 单元格路径后缀 + 可选的范围 */
function parsePostfix(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const from = parseSuffixed(ctx, tools);
  const range = ctx.peek();
  if (range.kind === TokenKind.RANGE && !range.spaced) {
    return parseRange(ctx, tools, from);
  }
  return from;
}

function parseSuffixed(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const primary = parsePrimary(ctx, tools);
  const suffix = ctx.peek();
  if (suffix.kind === TokenKind.CELL_SUFFIX && !suffix.spaced) {
    ctx.next();
    return assignSpan(Node.CellPath(primary, suffix.value), spanFromSources(primary, suffix));
  }
  return primary;
}

function rangeOperandFollows(ctx: ParserContext): boolean {
  const tok = ctx.peek();
  if (tok.spaced) return false;
  if (tok.kind === TokenKind.LBRACE || tok.kind === TokenKind.RANGE) return false;
  return VALUE_START.has(tok.kind) || tok.kind === TokenKind.OPERATOR;
}

function parseRange(ctx: ParserContext, tools: ParserTools, from: AST.Expression | null): AST.Expression {
  const opTok = ctx.next();
  const start = from ? from.span.start : opTok.start;
  let op = toRangeOperator(opTok.value);
  let next: AST.Expression | null = null;
  let to: AST.Expression | null = rangeOperandFollows(ctx) ? parseRangeOperand(ctx, tools) : null;
  const second = ctx.peek();
  if (to !== null && op === '..' && second.kind === TokenKind.RANGE && !second.spaced) {
    // `start..next..end`: the bound operator is the second one
    ctx.next();
    op = toRangeOperator(second.value);
    next = to;
    to = rangeOperandFollows(ctx) ? parseRangeOperand(ctx, tools) : null;
  }
  if (from === null && to === null) {
    return assignSpan(Node.BareWord(opTok.value), spanSince(ctx, opTok));
  }
  return assignSpan(Node.Range(from, next, to, op), spanSince(ctx, start));
}

function parseRangeOperand(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const tok = ctx.peek();
  if (tok.kind === TokenKind.OPERATOR && tok.value === '-') {
    ctx.next();
    const operand = parseSuffixed(ctx, tools);
    return assignSpan(Node.UnaryOp('-', operand), spanFromSources(tok, operand));
  }
  return parseSuffixed(ctx, tools);
}

function toRangeOperator(value: string): AST.RangeOperator {
  if (value === '..<' || value === '..=') return value;
  return '..';
}

function parsePrimary(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const tok = ctx.peek();
  switch (tok.kind) {
    case TokenKind.INT:
      ctx.next();
      return assignSpan(Node.Literal('int', tok.value), spanSince(ctx, tok));
    case TokenKind.FLOAT:
      ctx.next();
      return assignSpan(Node.Literal('float', tok.value), spanSince(ctx, tok));
    case TokenKind.NUMBER_UNIT:
      ctx.next();
      return assignSpan(Node.Literal('unit', tok.value), spanSince(ctx, tok));
    case TokenKind.DATETIME:
      ctx.next();
      return assignSpan(Node.Literal('datetime', tok.value), spanSince(ctx, tok));
    case TokenKind.STRING:
      ctx.next();
      return assignSpan(Node.Literal('string', tok.value), spanSince(ctx, tok));
    case TokenKind.INTERPOLATION:
      ctx.next();
      return parseInterpolation(ctx, tok);
    case TokenKind.VARIABLE:
      ctx.next();
      return variableFromToken(tok);
    case TokenKind.WORD:
      return parseWordPrimary(ctx, tools, tok);
    case TokenKind.EXTERNAL:
    case TokenKind.FLAG:
      ctx.next();
      return assignSpan(Node.BareWord(tok.value), spanSince(ctx, tok));
    case TokenKind.LBRACKET:
      return parseListOrTable(ctx, tools);
    case TokenKind.LBRACE:
      if (ctx.braceStop > 0) return tools.expectedExpression(tok);
      return parseBraced(ctx, tools);
    case TokenKind.LPAREN:
      return parseSubexpression(ctx, tools);
    case TokenKind.SPREAD: {
      ctx.next();
      const operand = parseSuffixed(ctx, tools);
      return assignSpan(Node.Spread(operand), spanFromSources(tok, operand));
    }
    case TokenKind.RANGE:
      return parseRange(ctx, tools, null);
    default:
      return tools.expectedExpression(tok);
  }
}

function parseWordPrimary(ctx: ParserContext, tools: ParserTools, tok: Token): AST.Expression {
  switch (tok.value) {
    case KW.TRUE:
    case KW.FALSE:
      ctx.next();
      return assignSpan(Node.Literal('bool', tok.value), spanSince(ctx, tok));
    case KW.NULL:
      ctx.next();
      return assignSpan(Node.Literal('null', tok.value), spanSince(ctx, tok));
    case KW.IF:
      return parseIf(ctx, tools);
    case KW.MATCH:
      return parseMatch(ctx, tools);
    case KW.TRY:
      return parseTry(ctx, tools);
    default:
      ctx.next();
      return assignSpan(Node.BareWord(tok.value), spanSince(ctx, tok));
  }
}

/** `$name.member.path` → Variable，或包裹在 CellPath 中 */
function variableFromToken(tok: Token): AST.Expression {
  const dot = tok.value.indexOf('.');
  if (dot < 0) {
    return assignSpan(Node.Variable(tok.value), { start: tok.start, end: tok.end });
  }
  const variable = assignSpan(Node.Variable(tok.value.slice(0, dot)), {
    start: tok.start,
    end: tok.start + dot,
  });
  return assignSpan(Node.CellPath(variable, tok.value.slice(dot)), { start: tok.start, end: tok.end });
}

function parseSubexpression(ctx: ParserContext, tools: ParserTools): AST.Subexpression {
  const open = ctx.next();
  const statements = ctx.withoutBraceStop(() => parseStatements(ctx, tools, TokenKind.RPAREN));
  ctx.expect(TokenKind.RPAREN, "Expected ')' to close the subexpression");
  const span = spanSince(ctx, open);
  return assignSpan(Node.Subexpression(assignSpan(Node.Block(statements), span)), span);
}

function parseListOrTable(ctx: ParserContext, tools: ParserTools): AST.List | AST.Table {
  const open = ctx.next();
  return ctx.withoutBraceStop(() => {
    const items: AST.Expression[] = [];
    for (;;) {
      ctx.consumeSeparators();
      if (ctx.at(TokenKind.RBRACKET)) break;
      if (ctx.at(TokenKind.EOF)) {
        return Diagnostics.incompleteConstruction('list', open.pos)
          .withOffsets({ start: open.start, end: open.end })
          .throw();
      }
      const item = parseExpression(ctx, tools);
      items.push(item);
      ctx.consumeNewlines();
      const [header] = items;
      if (items.length === 1 && header && header.kind === 'List' && ctx.at(TokenKind.SEMICOLON)) {
        ctx.next();
        return parseTableRows(ctx, tools, open, header);
      }
    }
    ctx.expect(TokenKind.RBRACKET, "Expected ']' to close the list");
    return assignSpan(Node.List(items), spanSince(ctx, open));
  });
}

function parseTableRows(ctx: ParserContext, tools: ParserTools, open: Token, header: AST.List): AST.Table {
  const rows: AST.List[] = [];
  for (;;) {
    ctx.consumeSeparators();
    if (ctx.at(TokenKind.RBRACKET)) break;
    const rowTok = ctx.peek();
    const row = parseExpression(ctx, tools);
    if (row.kind !== 'List') {
      return tools.error('Expected a table row such as [1, 2]', rowTok);
    }
    rows.push(row);
  }
  ctx.expect(TokenKind.RBRACKET, "Expected ']' to close the table");
  return assignSpan(Node.Table(header, rows), spanSince(ctx, open));
}

/**
 * `{` 的消歧：
 * - `{|...|` 闭包
 * - `{}`、`{key: ...}`、`{...$r}` 记录
 * - 其余为无参数闭包
 */
function parseBraced(ctx: ParserContext, tools: ParserTools): AST.Closure | AST.RecordExpr {
  let k = 1;
  while (ctx.peek(k).kind === TokenKind.NEWLINE) k++;
  const first = ctx.peek(k);
  if (first.kind === TokenKind.PIPE) return parseClosure(ctx, tools);
  if (first.kind === TokenKind.RBRACE || first.kind === TokenKind.SPREAD) return parseRecord(ctx, tools);
  const keyLike =
    first.kind === TokenKind.WORD ||
    first.kind === TokenKind.STRING ||
    first.kind === TokenKind.INT ||
    first.kind === TokenKind.VARIABLE;
  if (keyLike && ctx.peek(k + 1).kind === TokenKind.COLON) return parseRecord(ctx, tools);
  return parseClosure(ctx, tools);
}

/** Like `parseBraced`, but `{}` reads as an empty closure */
function parseClosureLike(ctx: ParserContext, tools: ParserTools): AST.Closure {
  const parsed = parseBraced(ctx, tools);
  if (parsed.kind === 'Closure') return parsed;
  if (parsed.entries.length > 0) {
    return tools.error('Expected a closure, found a record', ctx.previous());
  }
  return assignSpan(Node.Closure(null, assignSpan(Node.Block([]), parsed.span)), parsed.span);
}

function parseRecord(ctx: ParserContext, tools: ParserTools): AST.RecordExpr {
  const open = ctx.next();
  return ctx.withoutBraceStop(() => {
    const entries: (AST.RecordEntry | AST.Spread)[] = [];
    for (;;) {
      ctx.consumeSeparators();
      if (ctx.at(TokenKind.RBRACE)) break;
      const tok = ctx.peek();
      if (tok.kind === TokenKind.SPREAD) {
        ctx.next();
        const operand = parseSuffixed(ctx, tools);
        entries.push(assignSpan(Node.Spread(operand), spanFromSources(tok, operand)));
        continue;
      }
      const key = parseRecordKey(ctx, tools);
      ctx.expect(TokenKind.COLON, "Expected ':' after record key");
      ctx.consumeNewlines();
      const value = parseExpression(ctx, tools);
      entries.push(assignSpan(Node.RecordEntry(key, value), spanFromSources(key, value)));
    }
    ctx.expect(TokenKind.RBRACE, "Expected '}' to close the record");
    return assignSpan(Node.Record(entries), spanSince(ctx, open));
  });
}

function parseRecordKey(ctx: ParserContext, tools: ParserTools): AST.Expression {
  const tok = ctx.peek();
  switch (tok.kind) {
    case TokenKind.WORD:
    case TokenKind.FLAG:
      ctx.next();
      return assignSpan(Node.BareWord(tok.value), spanSince(ctx, tok));
    case TokenKind.STRING:
    case TokenKind.INT:
    case TokenKind.VARIABLE:
    case TokenKind.LPAREN:
    case TokenKind.INTERPOLATION:
      return parseSuffixed(ctx, tools);
    default:
      return tools.error(`Expected a record key, got '${tok.value}'`, tok);
  }
}

function parseClosure(ctx: ParserContext, tools: ParserTools): AST.Closure {
  const open = ctx.next();
  return ctx.withoutBraceStop(() => {
    let params: AST.Parameter[] | null = null;
    ctx.consumeNewlines();
    if (ctx.at(TokenKind.PIPE)) {
      ctx.next();
      params = [];
      for (;;) {
        ctx.consumeSeparators();
        if (ctx.at(TokenKind.PIPE)) break;
        if (ctx.at(TokenKind.EOF) || ctx.at(TokenKind.RBRACE)) {
          return tools.error("Expected '|' to close the closure parameters");
        }
        params.push(parseParameter(ctx, tools));
      }
      ctx.next();
    }
    const statements = parseStatements(ctx, tools, TokenKind.RBRACE);
    ctx.expect(TokenKind.RBRACE, "Expected '}' to close the closure");
    const span = spanSince(ctx, open);
    return assignSpan(Node.Closure(params, assignSpan(Node.Block(statements), span)), span);
  });
}

// ---------------------------------------------------------------------------
// Control flow expressions

function parseIf(ctx: ParserContext, tools: ParserTools): AST.If {
  const start = ctx.next();
  const condition = ctx.withBraceStop(() => parseExpression(ctx, tools));
  const then = parseBlock(ctx, tools);
  let otherwise: AST.Block | AST.If | null = null;
  const ahead = peekPastNewlines(ctx);
  if (ahead.tok.kind === TokenKind.WORD && ahead.tok.value === KW.ELSE) {
    ctx.consumeNewlines();
    ctx.next();
    otherwise = ctx.atWord(KW.IF) ? parseIf(ctx, tools) : parseBlock(ctx, tools);
  }
  return assignSpan(Node.If(condition, then, otherwise), spanSince(ctx, start));
}

function parseMatch(ctx: ParserContext, tools: ParserTools): AST.Match {
  const start = ctx.next();
  const subject = ctx.withBraceStop(() => parseExpression(ctx, tools));
  const open = ctx.expect(TokenKind.LBRACE, "Expected '{' to start the match arms");
  const arms = ctx.withoutBraceStop(() => {
    const list: AST.MatchArm[] = [];
    for (;;) {
      ctx.consumeSeparators();
      if (ctx.at(TokenKind.RBRACE)) break;
      if (ctx.at(TokenKind.EOF)) {
        return Diagnostics.incompleteConstruction('match', open.pos)
          .withOffsets({ start: open.start, end: open.end })
          .throw();
      }
      list.push(parseMatchArm(ctx, tools));
    }
    return list;
  });
  ctx.expect(TokenKind.RBRACE, "Expected '}' to close the match arms");
  const armsSpan = spanSince(ctx, open);
  return assignSpan(Node.Match(subject, arms, armsSpan), spanSince(ctx, start));
}

function parseMatchArm(ctx: ParserContext, tools: ParserTools): AST.MatchArm {
  const start = ctx.peek();
  const patterns: AST.Expression[] = [parsePostfix(ctx, tools)];
  while (ctx.at(TokenKind.PIPE)) {
    ctx.next();
    ctx.consumeNewlines();
    patterns.push(parsePostfix(ctx, tools));
  }
  let guard: AST.Expression | null = null;
  if (ctx.atWord(KW.IF)) {
    ctx.next();
    guard = parseExpression(ctx, tools);
  }
  ctx.expect(TokenKind.FAT_ARROW, "Expected '=>' after the match pattern");
  ctx.consumeNewlines();
  const body = ctx.at(TokenKind.LBRACE) ? parseBraced(ctx, tools) : parseStage(ctx, tools);
  return assignSpan(Node.MatchArm(patterns, guard, body), spanSince(ctx, start));
}

function parseTry(ctx: ParserContext, tools: ParserTools): AST.Try {
  const start = ctx.next();
  const body = parseBlock(ctx, tools);
  let handler: AST.Closure | null = null;
  const ahead = peekPastNewlines(ctx);
  if (ahead.tok.kind === TokenKind.WORD && ahead.tok.value === KW.CATCH) {
    ctx.consumeNewlines();
    ctx.next();
    if (!ctx.at(TokenKind.LBRACE)) {
      tools.error("Expected '{' after 'catch'");
    }
    handler = parseClosureLike(ctx, tools);
  }
  return assignSpan(Node.Try(body, handler), spanSince(ctx, start));
}

// ---------------------------------------------------------------------------
// String interpolation

function advancePosition(pos: Position, text: string): Position {
  let { line, col } = pos;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\n' || (ch === '\r' && text[i + 1] !== '\n')) {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}

/** Index of the `)` matching the `(` at `open`, skipping quoted strings */
function matchingParen(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"' || ch === "'" || ch === '`') {
      i = skipQuoted(text, i);
      continue;
    }
    if (ch === '(') depth++;
    if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function skipQuoted(text: string, start: number): number {
  const quote = text[start];
  for (let i = start + 1; i < text.length; i++) {
    if (quote === '"' && text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === quote) return i;
  }
  return text.length;
}

/**
 * 拆分 `$"...(expr)..."` 为文本片段与表达式片段。
 *
 * 表达式片段重新词法分析并解析；其中含注释时保留原文（body 为 null）。
 */
function parseInterpolation(ctx: ParserContext, tok: Token): AST.StringInterpolation {
  const text = tok.value;
  const quote = text[1] === "'" ? "'" : '"';
  const parts: AST.InterpolationPart[] = [];
  let literal = '';
  let i = 2;
  const close = text.length - 1;
  while (i < close) {
    const ch = text[i] ?? '';
    if (quote === '"' && ch === '\\') {
      literal += text.slice(i, i + 2);
      i += 2;
      continue;
    }
    if (ch === '(') {
      const end = matchingParen(text, i);
      if (literal) parts.push({ kind: 'text', text: literal });
      literal = '';
      const raw = text.slice(i + 1, end);
      const offset = tok.start + i + 1;
      const pos = advancePosition(tok.pos, text.slice(0, i + 1));
      parts.push({ kind: 'expr', raw, body: parseInterpolationBody(raw, offset, pos, { start: tok.start + i, end: tok.start + end + 1 }) });
      i = end + 1;
      continue;
    }
    literal += ch;
    i++;
  }
  if (literal) parts.push({ kind: 'text', text: literal });
  return assignSpan(Node.StringInterpolation(quote, parts), { start: tok.start, end: tok.end });
}

function parseInterpolationBody(raw: string, offset: number, pos: Position, span: AST.Span): AST.Block | null {
  const tokens = lex(raw, offset, pos);
  if (tokens.some(isCommentToken)) return null;
  const inner = createParserContext(tokens, raw, offset);
  const tools = createParserTools(inner);
  const statements = parseStatements(inner, tools, TokenKind.EOF);
  return assignSpan(Node.Block(statements), span);
}
