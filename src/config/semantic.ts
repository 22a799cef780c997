/**
 * @module semantic
 *
 * 语言的关键字与运算符表。词法分析器只产出 WORD，关键字在语法分析阶段按位置识别。
 */

export const KW = {
  LET: 'let',
  MUT: 'mut',
  CONST: 'const',
  DEF: 'def',
  EXTERN: 'extern',
  ALIAS: 'alias',
  IF: 'if',
  ELSE: 'else',
  MATCH: 'match',
  FOR: 'for',
  IN: 'in',
  WHILE: 'while',
  LOOP: 'loop',
  TRY: 'try',
  CATCH: 'catch',
  RETURN: 'return',
  BREAK: 'break',
  CONTINUE: 'continue',
  MODULE: 'module',
  USE: 'use',
  EXPORT: 'export',
  EXPORT_ENV: 'export-env',
  HIDE: 'hide',
  OVERLAY: 'overlay',
  SOURCE: 'source',
  SOURCE_ENV: 'source-env',
  WHERE: 'where',
  NOT: 'not',
  TRUE: 'true',
  FALSE: 'false',
  NULL: 'null',
} as const;

/**
 * Binary operator precedence. Higher binds tighter.
 *
 * Word operators (`and`, `mod`, `starts-with` ...) are lexed as words and only
 * read as operators in infix position.
 */
export const BINARY_PRECEDENCE: ReadonlyMap<string, number> = new Map([
  ['**', 100],
  ['*', 95],
  ['/', 95],
  ['//', 95],
  ['mod', 95],
  ['+', 90],
  ['-', 90],
  ['bit-shl', 85],
  ['bit-shr', 85],
  ['++', 80],
  ['==', 80],
  ['!=', 80],
  ['<', 80],
  ['<=', 80],
  ['>', 80],
  ['>=', 80],
  ['=~', 80],
  ['!~', 80],
  ['in', 80],
  ['not-in', 80],
  ['has', 80],
  ['not-has', 80],
  ['starts-with', 80],
  ['ends-with', 80],
  ['like', 80],
  ['not-like', 80],
  ['bit-and', 75],
  ['bit-xor', 70],
  ['bit-or', 60],
  ['and', 50],
  ['xor', 45],
  ['or', 40],
]);

/** Redirections such as `out> file`, lexed as plain words. */
export const REDIRECTIONS: ReadonlySet<string> = new Set([
  'o>',
  'out>',
  'e>',
  'err>',
  'o+e>',
  'e+o>',
  'out+err>',
  'err+out>',
  'o>>',
  'out>>',
  'e>>',
  'err>>',
  'o+e>>',
  'out+err>>',
  'o>|',
  'e>|',
  'o+e>|',
  'e+o>|',
]);
