import type { Expression, InterpolationPart, SyntaxNode } from '../types.js';

/**
 * 统一的 AST 遍历器接口与默认实现（只读遍历）。
 *
 * - 入口：visit，按节点类型分派到 visitNode
 * - 默认实现执行深度优先递归；子类覆写 visitNode 并调用 super 继续遍历
 */
export interface AstVisitor<Ctx> {
  visit(node: SyntaxNode, ctx: Ctx): void;
}

function nonNull<T>(items: readonly (T | null)[]): T[] {
  const out: T[] = [];
  for (const item of items) {
    if (item !== null) out.push(item);
  }
  return out;
}

function interpolationChildren(parts: readonly InterpolationPart[]): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  for (const part of parts) {
    if (part.kind === 'expr' && part.body) out.push(part.body);
  }
  return out;
}

/**
 * Direct children of a node, in document order.
 */
export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  switch (node.kind) {
    case 'Program':
    case 'Block':
      return [...node.statements];
    case 'Let':
      return nonNull<SyntaxNode>([node.type, node.value]);
    case 'Def':
      return [node.signature, node.body];
    case 'Extern':
      return [node.signature];
    case 'Alias':
      return [node.value];
    case 'For':
      return [node.iterable, node.body];
    case 'While':
      return [node.condition, node.body];
    case 'Loop':
      return [node.body];
    case 'Return':
      return nonNull<SyntaxNode>([node.value]);
    case 'Break':
    case 'Continue':
      return [];
    case 'Module':
      return nonNull<SyntaxNode>([node.body]);
    case 'ModuleCommand':
      return [...node.args];
    case 'Export':
      return [node.declaration];
    case 'ExportEnv':
      return [node.body];
    case 'Pipeline':
      return [...node.stages];
    case 'Command':
      return [...node.args];
    case 'Flag':
      return nonNull<SyntaxNode>([node.value]);
    case 'BinaryOp':
      return [node.left, node.right];
    case 'UnaryOp':
      return [node.operand];
    case 'Assignment':
      return [node.target, node.value];
    case 'If':
      return nonNull<SyntaxNode>([node.condition, node.then, node.otherwise]);
    case 'Match':
      return [node.subject, ...node.arms];
    case 'MatchArm':
      return nonNull<SyntaxNode>([...node.patterns, node.guard, node.body]);
    case 'Try':
      return nonNull<SyntaxNode>([node.body, node.handler]);
    case 'Closure':
      return [...(node.params ?? []), node.body];
    case 'Record':
      return [...node.entries];
    case 'RecordEntry':
      return [node.key, node.value];
    case 'List':
      return [...node.items];
    case 'Table':
      return [node.header, ...node.rows];
    case 'Subexpression':
      return [node.body];
    case 'Range':
      return nonNull<Expression>([node.from, node.next, node.to]);
    case 'Spread':
      return [node.operand];
    case 'StringInterpolation':
      return interpolationChildren(node.parts);
    case 'CellPath':
      return [node.target];
    case 'Variable':
    case 'Literal':
    case 'BareWord':
      return [];
    case 'Signature':
      return [...node.params, ...node.io];
    case 'Parameter':
      return nonNull<SyntaxNode>([node.type, node.defaultValue]);
    case 'IoType':
      return [node.input, node.output];
    case 'Type':
      return nonNull<SyntaxNode>((node.args ?? []).map(arg => arg.type));
  }
}

export class DefaultAstVisitor<Ctx> implements AstVisitor<Ctx> {
  visit(node: SyntaxNode, ctx: Ctx): void {
    this.visitNode(node, ctx);
  }

  protected visitNode(node: SyntaxNode, ctx: Ctx): void {
    for (const child of childrenOf(node)) {
      this.visit(child, ctx);
    }
  }
}

/**
 * 结构摘要：只保留节点类型与子结构，忽略 span 与空白。
 *
 * 用于验证格式化前后语法树结构一致。
 */
export function structureOf(node: SyntaxNode): string {
  const children = childrenOf(node);
  const label = `${node.kind}${labelOf(node)}`;
  if (children.length === 0) return label;
  return `${label}(${children.map(structureOf).join(',')})`;
}

function labelOf(node: SyntaxNode): string {
  switch (node.kind) {
    case 'Literal':
    case 'BareWord':
      return `:${node.text}`;
    case 'Variable':
    case 'Def':
    case 'Let':
    case 'Parameter':
    case 'Type':
      return `:${node.name}`;
    case 'Command':
      return `:${node.head}`;
    case 'Flag':
      return `:${node.name}`;
    case 'BinaryOp':
    case 'UnaryOp':
    case 'Assignment':
      return `:${node.op}`;
    default:
      return '';
  }
}
