/**
 * 声明解析器
 * 负责 def、extern、alias、module、use/hide/overlay/source 与 export 系列语句
 */

import { Node } from '../ast/ast.js';
import { KW } from '../config/semantic.js';
import { TokenKind } from '../frontend/tokens.js';
import type * as AST from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { assignSpan, spanSince } from './span-utils.js';
import { parseSignature } from './type-parser.js';
import { parseArguments, parseBlock, parseLet, parsePipeline } from './expr-stmt-parser.js';

/**
 * 解析命令定义：`def [--env|--wrapped] name [sig] { body }`
 */
export function parseDef(ctx: ParserContext, tools: ParserTools): AST.Def {
  const start = ctx.next();
  const flags: string[] = [];
  while (ctx.at(TokenKind.FLAG)) flags.push(ctx.next().value);
  const name = tools.parseName('command name');
  const signature = parseSignature(ctx, tools);
  const body = parseBlock(ctx, tools);
  return assignSpan(Node.Def(flags, name, signature, body), spanSince(ctx, start));
}

export function parseExtern(ctx: ParserContext, tools: ParserTools): AST.Extern {
  const start = ctx.next();
  const name = tools.parseName('command name');
  const signature = parseSignature(ctx, tools);
  return assignSpan(Node.Extern(name, signature), spanSince(ctx, start));
}

export function parseAlias(ctx: ParserContext, tools: ParserTools): AST.Alias {
  const start = ctx.next();
  const name = tools.parseName('alias name');
  ctx.expect(TokenKind.EQUALS, `Expected '=' after 'alias ${name}'`);
  ctx.consumeNewlines();
  const value = parsePipeline(ctx, tools);
  return assignSpan(Node.Alias(name, value), spanSince(ctx, start));
}

/** `module name { ... }` 或引用文件的 `module name` */
export function parseModule(ctx: ParserContext, tools: ParserTools): AST.Module {
  const start = ctx.next();
  const name = tools.parseName('module name');
  const body = ctx.at(TokenKind.LBRACE) ? parseBlock(ctx, tools) : null;
  return assignSpan(Node.Module(name, body), spanSince(ctx, start));
}

function toModuleKeyword(value: string): AST.ModuleKeyword {
  switch (value) {
    case KW.HIDE:
      return 'hide';
    case KW.OVERLAY:
      return 'overlay';
    case KW.SOURCE:
      return 'source';
    case KW.SOURCE_ENV:
      return 'source-env';
    default:
      return 'use';
  }
}

export function parseModuleCommand(ctx: ParserContext, tools: ParserTools): AST.ModuleCommand {
  const start = ctx.next();
  const args = parseArguments(ctx, tools);
  return assignSpan(Node.ModuleCommand(toModuleKeyword(start.value), args), spanSince(ctx, start));
}

/**
 * `export def|extern|alias|const|let|module|use ...`
 */
export function parseExport(ctx: ParserContext, tools: ParserTools): AST.Export {
  const start = ctx.next();
  const tok = ctx.peek();
  let declaration: AST.Export['declaration'];
  switch (tok.kind === TokenKind.WORD ? tok.value : '') {
    case KW.DEF:
      declaration = parseDef(ctx, tools);
      break;
    case KW.EXTERN:
      declaration = parseExtern(ctx, tools);
      break;
    case KW.ALIAS:
      declaration = parseAlias(ctx, tools);
      break;
    case KW.CONST:
    case KW.LET:
    case KW.MUT:
      declaration = parseLet(ctx, tools);
      break;
    case KW.MODULE:
      declaration = parseModule(ctx, tools);
      break;
    case KW.USE:
      declaration = parseModuleCommand(ctx, tools);
      break;
    default:
      return tools.error(`Expected a declaration after 'export', got '${tok.value}'`, tok);
  }
  return assignSpan(Node.Export(declaration), spanSince(ctx, start));
}

export function parseExportEnv(ctx: ParserContext, tools: ParserTools): AST.ExportEnv {
  const start = ctx.next();
  const body = parseBlock(ctx, tools);
  return assignSpan(Node.ExportEnv(body), spanSince(ctx, start));
}
