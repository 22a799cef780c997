/**
 * @module ast
 *
 * AST（抽象语法树）模块。
 *
 * 包含：
 * - AST 节点构造器 (Node)
 * - AST 访问者与子节点枚举 (DefaultAstVisitor, childrenOf, structureOf)
 */

export { Node } from './ast.js';
export { DefaultAstVisitor, childrenOf, structureOf } from './ast_visitor.js';
export type { AstVisitor } from './ast_visitor.js';
