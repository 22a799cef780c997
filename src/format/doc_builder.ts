/**
 * @module format/doc_builder
 *
 * 按语法节点类型生成 Doc。每种节点对应一条固定的布局规则，
 * 分派使用穷尽的 switch；遇到没有规则的节点抛出 UnsupportedConstructError。
 *
 * 容器中的每个子项都包在 `anchor` 中，容器末尾放置 `dangling` 插槽，
 * 供注释合并阶段定位。
 */

import type * as AST from '../types.js';
import type { Doc, DocPart } from './doc.js';
import {
  anchor,
  concat,
  dangling,
  empty,
  group,
  hardline,
  join,
  line,
  nest,
  softline,
} from './doc.js';
import { printDoc } from './doc_printer.js';
import { interiorOf } from './trivia.js';
import { Diagnostics, locationOf } from '../diagnostics/diagnostics.js';

export interface BuildOptions {
  /** Spaces per indentation level */
  readonly indent: number;
}

/**
 * 语句所处的上下文：
 * - `block`：程序顶层与控制流语句块，多段管道总是按 pipe-leading 方式换行
 * - `inline`：闭包、子表达式等，多段管道作为 Group，放不下时才换行
 */
type StatementContext = 'block' | 'inline';

export interface DocBuilder {
  program(program: AST.Program): Doc;
  expression(expr: AST.Expression): Doc;
}

export function createDocBuilder(source: string, options: BuildOptions): DocBuilder {
  const indent = options.indent;

  const unsupported = (node: never): never => {
    const { kind, span }: { kind: string; span: AST.Span } = node;
    return Diagnostics.unsupportedConstruct(kind, locationOf(source, span), span).throw();
  };

  // -------------------------------------------------------------------------
  // Statement lists and blocks

  const statements = (list: readonly AST.Statement[], context: StatementContext): Doc =>
    join(
      [hardline()],
      list.map(stmt => anchor(stmt.span, statement(stmt, context)))
    );

  /**
   * 括号包围的组。`body` 为 null 时只剩注释槽：槽内每条注释自带换行，
   * 没有注释时打印为 `[]`。
   */
  const bracketed = (open: string, close: string, body: Doc | null, interior: AST.Span): Doc =>
    body === null
      ? group(open, nest(indent, dangling(interior)), softline(), close)
      : group(open, nest(indent, softline(), body, dangling(interior)), softline(), close);

  /** Control-flow body: always broken, one statement per line */
  const block = (node: AST.Block): Doc => {
    const interior = interiorOf(node.span);
    if (node.statements.length === 0) return bracketed('{', '}', null, interior);
    return concat(
      '{',
      nest(indent, hardline(), statements(node.statements, 'block'), dangling(interior)),
      hardline(),
      '}'
    );
  };

  /**
   * 列表、记录、签名参数共用的逗号分隔组：
   * 放得下时 `[a, b]`，否则每项一行，末项不加逗号。
   */
  const delimited = (open: string, close: string, items: readonly Doc[], interior: AST.Span): Doc =>
    bracketed(open, close, items.length === 0 ? null : join([',', line()], items), interior);

  // -------------------------------------------------------------------------
  // Statements

  const statement = (node: AST.Statement, context: StatementContext): Doc => {
    switch (node.kind) {
      case 'Let':
        return concat(
          node.keyword,
          ' ',
          node.name,
          node.type ? concat(': ', typeExpr(node.type)) : '',
          ' = ',
          pipeline(node.value, 'inline')
        );
      case 'Def':
        return concat(
          'def ',
          ...node.flags.map(flag => `${flag} `),
          node.name,
          ' ',
          signature(node.signature),
          ' ',
          block(node.body)
        );
      case 'Extern':
        return concat('extern ', node.name, ' ', signature(node.signature));
      case 'Alias':
        return concat('alias ', node.name, ' = ', pipeline(node.value, 'inline'));
      case 'For':
        return concat('for ', node.binding, ' in ', expression(node.iterable), ' ', block(node.body));
      case 'While':
        return concat('while ', expression(node.condition), ' ', block(node.body));
      case 'Loop':
        return concat('loop ', block(node.body));
      case 'Return':
        return node.value ? concat('return ', expression(node.value)) : concat('return');
      case 'Break':
        return concat('break');
      case 'Continue':
        return concat('continue');
      case 'Module':
        return concat('module ', node.name, node.body ? concat(' ', block(node.body)) : '');
      case 'ModuleCommand':
        return concat(node.keyword, ...node.args.map(arg => concat(' ', expression(arg))));
      case 'Export':
        return concat('export ', statement(node.declaration, context));
      case 'ExportEnv':
        return concat('export-env ', block(node.body));
      case 'Pipeline':
        return pipeline(node, context);
      default:
        return unsupported(node);
    }
  };

  const pipeline = (node: AST.Pipeline, context: StatementContext): Doc => {
    const [first, ...rest] = node.stages;
    if (!first) return empty();
    if (rest.length === 0) return expression(first);
    const head = anchor(first.span, expression(first));
    const tail = rest.map(stage => anchor(stage.span, '| ', expression(stage)));
    if (context === 'block') {
      return concat(head, ...tail.map(stage => concat(hardline(), stage)));
    }
    // 换行时 `|` 与首段对齐
    return group(head, ...tail.map(stage => concat(line(), stage)));
  };

  // -------------------------------------------------------------------------
  // Signatures and types

  const typeExpr = (node: AST.TypeExpr): Doc => {
    if (node.args === null) return concat(node.name);
    const close = node.bracket === '<' ? '>' : ')';
    const args = node.args.map(arg => {
      const type = arg.type ? typeExpr(arg.type) : empty();
      return arg.key === null ? type : concat(arg.key, ': ', type);
    });
    return concat(node.name, node.bracket, join([', '], args), close);
  };

  const parameter = (node: AST.Parameter): Doc => {
    let name: string;
    switch (node.style) {
      case 'positional':
        name = node.name;
        break;
      case 'optional':
        name = `${node.name}?`;
        break;
      case 'rest':
        name = `...${node.name}`;
        break;
      case 'flag':
        name = node.shortOnly
          ? `-${node.name}`
          : `--${node.name}${node.short !== null ? `(-${node.short})` : ''}`;
        break;
    }
    return concat(
      name,
      node.type ? concat(': ', typeExpr(node.type)) : '',
      node.defaultValue ? concat(' = ', expression(node.defaultValue)) : ''
    );
  };

  const ioType = (node: AST.IoType): Doc => concat(typeExpr(node.input), ' -> ', typeExpr(node.output));

  const signature = (node: AST.Signature): Doc => {
    const params = delimited(
      '[',
      ']',
      node.params.map(param => anchor(param.span, parameter(param))),
      interiorOf(node.paramsSpan)
    );
    if (node.io.length === 0) return params;
    const io = node.io.map(ioType);
    const [single] = io;
    if (!node.ioBracketed && single && io.length === 1) return concat(params, ': ', single);
    return concat(params, ': [', join([', '], io), ']');
  };

  // -------------------------------------------------------------------------
  // Expressions

  const closure = (node: AST.Closure): Doc => {
    const body = node.body;
    const slot = dangling(interiorOf(body.span));
    const header: DocPart =
      node.params === null ? '{' : concat('{ |', join([', '], node.params.map(parameter)), '|');
    if (body.statements.length === 0) {
      return group(header, nest(indent, slot), node.params === null ? softline() : line(), '}');
    }
    return group(header, nest(indent, line(), statements(body.statements, 'inline'), slot), line(), '}');
  };

  const interpolation = (node: AST.StringInterpolation): Doc => {
    const parts = node.parts.map(part => {
      if (part.kind === 'text') return part.text;
      return `(${interpolatedExpression(part)})`;
    });
    return concat(`$${node.quote}`, ...parts, node.quote);
  };

  /** 插值中的单条语句按单行格式化；多条语句、含注释或需换行时保留原文 */
  const interpolatedExpression = (part: { readonly raw: string; readonly body: AST.Block | null }): string => {
    const body = part.body;
    const [only] = body ? body.statements : [];
    if (!body || !only || body.statements.length !== 1) return part.raw;
    const printed = printDoc(statement(only, 'inline'), { lineLength: Number.POSITIVE_INFINITY });
    return printed.includes('\n') ? part.raw : printed;
  };

  const range = (node: AST.Range): Doc => {
    const parts: DocPart[] = [];
    if (node.from) parts.push(expression(node.from));
    if (node.next) parts.push('..', expression(node.next));
    parts.push(node.op);
    if (node.to) parts.push(expression(node.to));
    return concat(...parts);
  };

  const matchArm = (node: AST.MatchArm): Doc =>
    concat(
      join([' | '], node.patterns.map(expression)),
      node.guard ? concat(' if ', expression(node.guard)) : '',
      ' => ',
      expression(node.body)
    );

  const match = (node: AST.Match): Doc => {
    const interior = interiorOf(node.armsSpan);
    const head = concat('match ', expression(node.subject), ' ');
    if (node.arms.length === 0) return concat(head, bracketed('{', '}', null, interior));
    const arms = join(
      [hardline()],
      node.arms.map(arm => anchor(arm.span, matchArm(arm)))
    );
    return concat(head, '{', nest(indent, hardline(), arms, dangling(interior)), hardline(), '}');
  };

  const ifExpression = (node: AST.If): Doc => {
    const otherwise = node.otherwise;
    const then = anchor(node.then.span, block(node.then));
    if (!otherwise) return concat('if ', expression(node.condition), ' ', then);
    // `}` 与 else 之间有注释时 else 另起一行
    const commented = source.slice(node.then.span.end, otherwise.span.start).includes('#');
    const branch = otherwise.kind === 'If' ? ifExpression(otherwise) : block(otherwise);
    return concat(
      'if ',
      expression(node.condition),
      ' ',
      then,
      commented ? hardline() : ' ',
      anchor(otherwise.span, 'else ', branch)
    );
  };

  const expression = (node: AST.Expression): Doc => {
    switch (node.kind) {
      case 'Pipeline':
        return pipeline(node, 'inline');
      case 'Command':
        return concat(
          node.external ? `^${node.head}` : node.head,
          ...node.args.map(arg => concat(' ', expression(arg)))
        );
      case 'Flag':
        return node.value ? concat(node.name, '=', expression(node.value)) : concat(node.name);
      case 'BinaryOp':
        return concat(expression(node.left), ' ', node.op, ' ', expression(node.right));
      case 'UnaryOp':
        return node.op === 'not'
          ? concat('not ', expression(node.operand))
          : concat('-', expression(node.operand));
      case 'Assignment':
        return concat(expression(node.target), ' ', node.op, ' ', pipeline(node.value, 'inline'));
      case 'If':
        return ifExpression(node);
      case 'Match':
        return match(node);
      case 'Try':
        return concat(
          'try ',
          block(node.body),
          node.handler ? concat(' catch ', closure(node.handler)) : ''
        );
      case 'Closure':
        return closure(node);
      case 'Record':
        return delimited(
          '{',
          '}',
          node.entries.map(entry =>
            anchor(
              entry.span,
              entry.kind === 'Spread'
                ? concat('...', expression(entry.operand))
                : concat(expression(entry.key), ': ', expression(entry.value))
            )
          ),
          interiorOf(node.span)
        );
      case 'List':
        return delimited(
          '[',
          ']',
          node.items.map(item => anchor(item.span, expression(item))),
          interiorOf(node.span)
        );
      case 'Table': {
        const header = anchor(node.header.span, expression(node.header), ';');
        const rows = node.rows.map(row => anchor(row.span, expression(row)));
        const body = rows.length === 0 ? header : concat(header, line(), join([',', line()], rows));
        return bracketed('[', ']', body, interiorOf(node.span));
      }
      case 'Subexpression': {
        const body = node.body.statements.length === 0 ? null : statements(node.body.statements, 'inline');
        return bracketed('(', ')', body, interiorOf(node.span));
      }
      case 'Range':
        return range(node);
      case 'Spread':
        return concat('...', expression(node.operand));
      case 'StringInterpolation':
        return interpolation(node);
      case 'CellPath':
        return concat(expression(node.target), node.path);
      case 'Variable':
        return concat(node.name);
      case 'Literal':
      case 'BareWord':
        return concat(node.text);
      default:
        return unsupported(node);
    }
  };

  return {
    program(program: AST.Program): Doc {
      const slot = dangling(program.span, program.statements.length > 0);
      return concat(statements(program.statements, 'block'), slot);
    },
    expression,
  };
}
