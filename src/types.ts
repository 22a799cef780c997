// Core type definitions for nufmt

/** 1-based line/column position, used for diagnostics. */
export interface Position {
  readonly line: number;
  readonly col: number;
}

/**
 * Half-open `[start, end)` offset range into the source text.
 *
 * Offsets count UTF-16 code units, the unit JavaScript strings index by.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

/** Line/column range reported to users. */
export interface Location {
  readonly start: Position;
  readonly end: Position;
}

export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly start: number;
  readonly end: number;
  readonly pos: Position;
  /** 该 token 之前是否紧跟空白（空格、制表符或换行） */
  readonly spaced: boolean;
  readonly channel?: 'trivia';
}

export enum TokenKind {
  EOF = 'EOF',
  NEWLINE = 'NEWLINE',
  SEMICOLON = 'SEMICOLON',
  PIPE = 'PIPE',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  LBRACKET = 'LBRACKET',
  RBRACKET = 'RBRACKET',
  LBRACE = 'LBRACE',
  RBRACE = 'RBRACE',
  COMMA = 'COMMA',
  COLON = 'COLON',
  EQUALS = 'EQUALS',
  FAT_ARROW = 'FAT_ARROW',
  THIN_ARROW = 'THIN_ARROW',
  OPERATOR = 'OPERATOR',
  ASSIGN_OP = 'ASSIGN_OP',
  RANGE = 'RANGE',
  SPREAD = 'SPREAD',
  LT = 'LT',
  GT = 'GT',
  INT = 'INT',
  FLOAT = 'FLOAT',
  NUMBER_UNIT = 'NUMBER_UNIT',
  DATETIME = 'DATETIME',
  STRING = 'STRING',
  INTERPOLATION = 'INTERPOLATION',
  VARIABLE = 'VARIABLE',
  CELL_SUFFIX = 'CELL_SUFFIX',
  FLAG = 'FLAG',
  EXTERNAL = 'EXTERNAL',
  WORD = 'WORD',
  COMMENT = 'COMMENT',
}

/**
 * 判断指定 Token 是否为注释 Token，便于在遍历过程中筛选注释。
 */
export function isCommentToken(token: Token): boolean {
  return token.kind === TokenKind.COMMENT;
}

export interface AstNode {
  span: Span;
}

// ---------------------------------------------------------------------------
// Program structure

export interface Program extends AstNode {
  readonly kind: 'Program';
  readonly statements: readonly Statement[];
}

/**
 * A brace- or paren-delimited statement list. The span includes the delimiters.
 */
export interface Block extends AstNode {
  readonly kind: 'Block';
  readonly statements: readonly Statement[];
}

export type Statement =
  | Let
  | Def
  | Extern
  | Alias
  | For
  | While
  | Loop
  | Return
  | Break
  | Continue
  | Module
  | ModuleCommand
  | Export
  | ExportEnv
  | Pipeline;

export type LetKeyword = 'let' | 'mut' | 'const';

export interface Let extends AstNode {
  readonly kind: 'Let';
  readonly keyword: LetKeyword;
  readonly name: string;
  readonly type: TypeExpr | null;
  readonly value: Pipeline;
}

export interface Def extends AstNode {
  readonly kind: 'Def';
  /** `--env`, `--wrapped` and friends, in source order */
  readonly flags: readonly string[];
  readonly name: string;
  readonly signature: Signature;
  readonly body: Block;
}

export interface Extern extends AstNode {
  readonly kind: 'Extern';
  readonly name: string;
  readonly signature: Signature;
}

export interface Alias extends AstNode {
  readonly kind: 'Alias';
  readonly name: string;
  readonly value: Pipeline;
}

export interface For extends AstNode {
  readonly kind: 'For';
  readonly binding: string;
  readonly iterable: Expression;
  readonly body: Block;
}

export interface While extends AstNode {
  readonly kind: 'While';
  readonly condition: Expression;
  readonly body: Block;
}

export interface Loop extends AstNode {
  readonly kind: 'Loop';
  readonly body: Block;
}

export interface Return extends AstNode {
  readonly kind: 'Return';
  readonly value: Expression | null;
}

export interface Break extends AstNode {
  readonly kind: 'Break';
}

export interface Continue extends AstNode {
  readonly kind: 'Continue';
}

export interface Module extends AstNode {
  readonly kind: 'Module';
  readonly name: string;
  /** `null` for `module name` pointing at a file */
  readonly body: Block | null;
}

export type ModuleKeyword = 'use' | 'hide' | 'overlay' | 'source' | 'source-env';

/** `use`, `hide`, `overlay`, `source` 等模块相关命令 */
export interface ModuleCommand extends AstNode {
  readonly kind: 'ModuleCommand';
  readonly keyword: ModuleKeyword;
  readonly args: readonly Expression[];
}

export interface Export extends AstNode {
  readonly kind: 'Export';
  readonly declaration: Let | Def | Extern | Alias | Module | ModuleCommand;
}

export interface ExportEnv extends AstNode {
  readonly kind: 'ExportEnv';
  readonly body: Block;
}

// ---------------------------------------------------------------------------
// Expressions

export type Expression =
  | Pipeline
  | Command
  | Flag
  | BinaryOp
  | UnaryOp
  | Assignment
  | If
  | Match
  | Try
  | Closure
  | RecordExpr
  | List
  | Table
  | Subexpression
  | Range
  | Spread
  | StringInterpolation
  | CellPath
  | Variable
  | Literal
  | BareWord;

export interface Pipeline extends AstNode {
  readonly kind: 'Pipeline';
  readonly stages: readonly Expression[];
}

export interface Command extends AstNode {
  readonly kind: 'Command';
  readonly head: string;
  /** `^cmd` 形式的外部命令 */
  readonly external: boolean;
  readonly args: readonly Expression[];
}

export interface Flag extends AstNode {
  readonly kind: 'Flag';
  /** Flag text including its dashes, e.g. `--force` or `-f` */
  readonly name: string;
  readonly value: Expression | null;
}

export interface BinaryOp extends AstNode {
  readonly kind: 'BinaryOp';
  readonly op: string;
  readonly left: Expression;
  readonly right: Expression;
}

export interface UnaryOp extends AstNode {
  readonly kind: 'UnaryOp';
  readonly op: 'not' | '-';
  readonly operand: Expression;
}

export interface Assignment extends AstNode {
  readonly kind: 'Assignment';
  readonly op: string;
  readonly target: Expression;
  readonly value: Pipeline;
}

export interface If extends AstNode {
  readonly kind: 'If';
  readonly condition: Expression;
  readonly then: Block;
  readonly otherwise: Block | If | null;
}

export interface Match extends AstNode {
  readonly kind: 'Match';
  readonly subject: Expression;
  readonly arms: readonly MatchArm[];
  /** Span of the brace-delimited arm list */
  readonly armsSpan: Span;
}

export interface MatchArm extends AstNode {
  readonly kind: 'MatchArm';
  /** Alternatives joined by `|` */
  readonly patterns: readonly Expression[];
  readonly guard: Expression | null;
  readonly body: Expression;
}

export interface Try extends AstNode {
  readonly kind: 'Try';
  readonly body: Block;
  readonly handler: Closure | null;
}

export interface Closure extends AstNode {
  readonly kind: 'Closure';
  /** `null` when the braces carry no `|params|` */
  readonly params: readonly Parameter[] | null;
  readonly body: Block;
}

export interface RecordExpr extends AstNode {
  readonly kind: 'Record';
  readonly entries: readonly (RecordEntry | Spread)[];
}

export interface RecordEntry extends AstNode {
  readonly kind: 'RecordEntry';
  readonly key: Expression;
  readonly value: Expression;
}

export interface List extends AstNode {
  readonly kind: 'List';
  readonly items: readonly Expression[];
}

export interface Table extends AstNode {
  readonly kind: 'Table';
  readonly header: List;
  readonly rows: readonly List[];
}

export interface Subexpression extends AstNode {
  readonly kind: 'Subexpression';
  readonly body: Block;
}

export type RangeOperator = '..' | '..<' | '..=';

export interface Range extends AstNode {
  readonly kind: 'Range';
  readonly from: Expression | null;
  /** Second element of `a..b..c` */
  readonly next: Expression | null;
  readonly to: Expression | null;
  readonly op: RangeOperator;
}

export interface Spread extends AstNode {
  readonly kind: 'Spread';
  readonly operand: Expression;
}

export type InterpolationPart =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'expr'; readonly raw: string; readonly body: Block | null };

export interface StringInterpolation extends AstNode {
  readonly kind: 'StringInterpolation';
  readonly quote: '"' | "'";
  readonly parts: readonly InterpolationPart[];
}

export interface CellPath extends AstNode {
  readonly kind: 'CellPath';
  readonly target: Expression;
  /** Member chain as written, starting with `.` */
  readonly path: string;
}

export interface Variable extends AstNode {
  readonly kind: 'Variable';
  readonly name: string;
}

export type LiteralType = 'int' | 'float' | 'unit' | 'datetime' | 'bool' | 'null' | 'string';

export interface Literal extends AstNode {
  readonly kind: 'Literal';
  readonly type: LiteralType;
  /** Source text, passed through verbatim */
  readonly text: string;
}

export interface BareWord extends AstNode {
  readonly kind: 'BareWord';
  readonly text: string;
}

// ---------------------------------------------------------------------------
// Signatures and types

export interface Signature extends AstNode {
  readonly kind: 'Signature';
  readonly params: readonly Parameter[];
  /** Span of the bracketed parameter list */
  readonly paramsSpan: Span;
  readonly io: readonly IoType[];
  /** `[..]: [a -> b, c -> d]` 形式时为 true */
  readonly ioBracketed: boolean;
}

export type ParameterStyle = 'positional' | 'optional' | 'rest' | 'flag';

export interface Parameter extends AstNode {
  readonly kind: 'Parameter';
  readonly style: ParameterStyle;
  /** Name without `?`, `...` or dashes */
  readonly name: string;
  /** 短 flag，例如 `--force(-f)` 中的 `f`；仅 flag 使用 */
  readonly short: string | null;
  /** True for a flag written only in its short form, e.g. `-f` */
  readonly shortOnly: boolean;
  readonly type: TypeExpr | null;
  readonly defaultValue: Expression | null;
}

export interface IoType extends AstNode {
  readonly kind: 'IoType';
  readonly input: TypeExpr;
  readonly output: TypeExpr;
}

export interface TypeExpr extends AstNode {
  readonly kind: 'Type';
  readonly name: string;
  /** `<...>` 或 `(...)` 中的类型参数；无参数时为 null */
  readonly args: readonly TypeArg[] | null;
  readonly bracket: '<' | '(';
}

export interface TypeArg {
  readonly key: string | null;
  readonly type: TypeExpr | null;
}

export type SyntaxNode =
  | Program
  | Block
  | Statement
  | Expression
  | MatchArm
  | RecordEntry
  | Signature
  | Parameter
  | IoType
  | TypeExpr;
