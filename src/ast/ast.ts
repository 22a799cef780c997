// Simple AST node constructors
import type * as AST from '../types.js';

function createEmptySpan(): AST.Span {
  return { start: 0, end: 0 };
}

export const Node = {
  Program: (statements: readonly AST.Statement[]): AST.Program => ({
    kind: 'Program',
    statements,
    span: createEmptySpan(),
  }),
  Block: (statements: readonly AST.Statement[]): AST.Block => ({
    kind: 'Block',
    statements,
    span: createEmptySpan(),
  }),
  Let: (
    keyword: AST.LetKeyword,
    name: string,
    type: AST.TypeExpr | null,
    value: AST.Pipeline
  ): AST.Let => ({
    kind: 'Let',
    keyword,
    name,
    type,
    value,
    span: createEmptySpan(),
  }),
  Def: (
    flags: readonly string[],
    name: string,
    signature: AST.Signature,
    body: AST.Block
  ): AST.Def => ({
    kind: 'Def',
    flags,
    name,
    signature,
    body,
    span: createEmptySpan(),
  }),
  Extern: (name: string, signature: AST.Signature): AST.Extern => ({
    kind: 'Extern',
    name,
    signature,
    span: createEmptySpan(),
  }),
  Alias: (name: string, value: AST.Pipeline): AST.Alias => ({
    kind: 'Alias',
    name,
    value,
    span: createEmptySpan(),
  }),
  For: (binding: string, iterable: AST.Expression, body: AST.Block): AST.For => ({
    kind: 'For',
    binding,
    iterable,
    body,
    span: createEmptySpan(),
  }),
  While: (condition: AST.Expression, body: AST.Block): AST.While => ({
    kind: 'While',
    condition,
    body,
    span: createEmptySpan(),
  }),
  Loop: (body: AST.Block): AST.Loop => ({ kind: 'Loop', body, span: createEmptySpan() }),
  Return: (value: AST.Expression | null): AST.Return => ({
    kind: 'Return',
    value,
    span: createEmptySpan(),
  }),
  Break: (): AST.Break => ({ kind: 'Break', span: createEmptySpan() }),
  Continue: (): AST.Continue => ({ kind: 'Continue', span: createEmptySpan() }),
  Module: (name: string, body: AST.Block | null): AST.Module => ({
    kind: 'Module',
    name,
    body,
    span: createEmptySpan(),
  }),
  ModuleCommand: (
    keyword: AST.ModuleKeyword,
    args: readonly AST.Expression[]
  ): AST.ModuleCommand => ({
    kind: 'ModuleCommand',
    keyword,
    args,
    span: createEmptySpan(),
  }),
  Export: (declaration: AST.Export['declaration']): AST.Export => ({
    kind: 'Export',
    declaration,
    span: createEmptySpan(),
  }),
  ExportEnv: (body: AST.Block): AST.ExportEnv => ({
    kind: 'ExportEnv',
    body,
    span: createEmptySpan(),
  }),

  Pipeline: (stages: readonly AST.Expression[]): AST.Pipeline => ({
    kind: 'Pipeline',
    stages,
    span: createEmptySpan(),
  }),
  Command: (head: string, external: boolean, args: readonly AST.Expression[]): AST.Command => ({
    kind: 'Command',
    head,
    external,
    args,
    span: createEmptySpan(),
  }),
  Flag: (name: string, value: AST.Expression | null): AST.Flag => ({
    kind: 'Flag',
    name,
    value,
    span: createEmptySpan(),
  }),
  BinaryOp: (op: string, left: AST.Expression, right: AST.Expression): AST.BinaryOp => ({
    kind: 'BinaryOp',
    op,
    left,
    right,
    span: createEmptySpan(),
  }),
  UnaryOp: (op: AST.UnaryOp['op'], operand: AST.Expression): AST.UnaryOp => ({
    kind: 'UnaryOp',
    op,
    operand,
    span: createEmptySpan(),
  }),
  Assignment: (op: string, target: AST.Expression, value: AST.Pipeline): AST.Assignment => ({
    kind: 'Assignment',
    op,
    target,
    value,
    span: createEmptySpan(),
  }),
  If: (
    condition: AST.Expression,
    then: AST.Block,
    otherwise: AST.Block | AST.If | null
  ): AST.If => ({
    kind: 'If',
    condition,
    then,
    otherwise,
    span: createEmptySpan(),
  }),
  Match: (
    subject: AST.Expression,
    arms: readonly AST.MatchArm[],
    armsSpan: AST.Span
  ): AST.Match => ({
    kind: 'Match',
    subject,
    arms,
    armsSpan,
    span: createEmptySpan(),
  }),
  MatchArm: (
    patterns: readonly AST.Expression[],
    guard: AST.Expression | null,
    body: AST.Expression
  ): AST.MatchArm => ({
    kind: 'MatchArm',
    patterns,
    guard,
    body,
    span: createEmptySpan(),
  }),
  Try: (body: AST.Block, handler: AST.Closure | null): AST.Try => ({
    kind: 'Try',
    body,
    handler,
    span: createEmptySpan(),
  }),
  Closure: (params: readonly AST.Parameter[] | null, body: AST.Block): AST.Closure => ({
    kind: 'Closure',
    params,
    body,
    span: createEmptySpan(),
  }),
  Record: (entries: readonly (AST.RecordEntry | AST.Spread)[]): AST.RecordExpr => ({
    kind: 'Record',
    entries,
    span: createEmptySpan(),
  }),
  RecordEntry: (key: AST.Expression, value: AST.Expression): AST.RecordEntry => ({
    kind: 'RecordEntry',
    key,
    value,
    span: createEmptySpan(),
  }),
  List: (items: readonly AST.Expression[]): AST.List => ({
    kind: 'List',
    items,
    span: createEmptySpan(),
  }),
  Table: (header: AST.List, rows: readonly AST.List[]): AST.Table => ({
    kind: 'Table',
    header,
    rows,
    span: createEmptySpan(),
  }),
  Subexpression: (body: AST.Block): AST.Subexpression => ({
    kind: 'Subexpression',
    body,
    span: createEmptySpan(),
  }),
  Range: (
    from: AST.Expression | null,
    next: AST.Expression | null,
    to: AST.Expression | null,
    op: AST.RangeOperator
  ): AST.Range => ({
    kind: 'Range',
    from,
    next,
    to,
    op,
    span: createEmptySpan(),
  }),
  Spread: (operand: AST.Expression): AST.Spread => ({
    kind: 'Spread',
    operand,
    span: createEmptySpan(),
  }),
  StringInterpolation: (
    quote: AST.StringInterpolation['quote'],
    parts: readonly AST.InterpolationPart[]
  ): AST.StringInterpolation => ({
    kind: 'StringInterpolation',
    quote,
    parts,
    span: createEmptySpan(),
  }),
  CellPath: (target: AST.Expression, path: string): AST.CellPath => ({
    kind: 'CellPath',
    target,
    path,
    span: createEmptySpan(),
  }),
  Variable: (name: string): AST.Variable => ({ kind: 'Variable', name, span: createEmptySpan() }),
  Literal: (type: AST.LiteralType, text: string): AST.Literal => ({
    kind: 'Literal',
    type,
    text,
    span: createEmptySpan(),
  }),
  BareWord: (text: string): AST.BareWord => ({ kind: 'BareWord', text, span: createEmptySpan() }),

  Signature: (
    params: readonly AST.Parameter[],
    paramsSpan: AST.Span,
    io: readonly AST.IoType[],
    ioBracketed: boolean
  ): AST.Signature => ({
    kind: 'Signature',
    params,
    paramsSpan,
    io,
    ioBracketed,
    span: createEmptySpan(),
  }),
  Parameter: (fields: {
    style: AST.ParameterStyle;
    name: string;
    short?: string | null;
    shortOnly?: boolean;
    type?: AST.TypeExpr | null;
    defaultValue?: AST.Expression | null;
  }): AST.Parameter => ({
    kind: 'Parameter',
    style: fields.style,
    name: fields.name,
    short: fields.short ?? null,
    shortOnly: fields.shortOnly ?? false,
    type: fields.type ?? null,
    defaultValue: fields.defaultValue ?? null,
    span: createEmptySpan(),
  }),
  IoType: (input: AST.TypeExpr, output: AST.TypeExpr): AST.IoType => ({
    kind: 'IoType',
    input,
    output,
    span: createEmptySpan(),
  }),
  Type: (
    name: string,
    args: readonly AST.TypeArg[] | null,
    bracket: AST.TypeExpr['bracket'] = '<'
  ): AST.TypeExpr => ({
    kind: 'Type',
    name,
    args,
    bracket,
    span: createEmptySpan(),
  }),
};
