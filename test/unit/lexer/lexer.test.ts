import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { lex } from '../../../src/frontend/lexer.js';
import { TokenKind } from '../../../src/types.js';
import type { Token } from '../../../src/types.js';
import { DiagnosticCode, ParseError } from '../../../src/diagnostics/diagnostics.js';

function kinds(tokens: readonly Token[]): TokenKind[] {
  return tokens.map(token => token.kind);
}

function significant(tokens: readonly Token[]): readonly Token[] {
  return tokens.filter(token => token.channel !== 'trivia');
}

describe('词法分析器', () => {
  test('应该把行尾注释放到 trivia 通道', () => {
    const tokens = lex('let x = 1  # note');
    assert.deepEqual(kinds(tokens), [
      TokenKind.WORD,
      TokenKind.WORD,
      TokenKind.EQUALS,
      TokenKind.INT,
      TokenKind.COMMENT,
      TokenKind.EOF,
    ]);
    const comment = tokens[4];
    assert.equal(comment?.value, '# note');
    assert.equal(comment?.channel, 'trivia');
    assert.equal(comment?.start, 11);
    assert.equal(comment?.end, 17);
  });

  test('应该识别管道与比较运算', () => {
    const tokens = lex('ls | where size > 10kb');
    assert.deepEqual(kinds(tokens), [
      TokenKind.WORD,
      TokenKind.PIPE,
      TokenKind.WORD,
      TokenKind.WORD,
      TokenKind.GT,
      TokenKind.NUMBER_UNIT,
      TokenKind.EOF,
    ]);
    assert.equal(tokens[5]?.value, '10kb');
  });

  test('应该区分 flag、负数与减号', () => {
    assert.deepEqual(
      significant(lex('ls -la --all')).map(t => [t.kind, t.value]),
      [
        [TokenKind.WORD, 'ls'],
        [TokenKind.FLAG, '-la'],
        [TokenKind.FLAG, '--all'],
        [TokenKind.EOF, ''],
      ]
    );
    assert.deepEqual(
      lex('echo -5').map(t => [t.kind, t.value]),
      [
        [TokenKind.WORD, 'echo'],
        [TokenKind.INT, '-5'],
        [TokenKind.EOF, ''],
      ]
    );
    assert.deepEqual(kinds(lex('$x-1')), [TokenKind.VARIABLE, TokenKind.OPERATOR, TokenKind.INT, TokenKind.EOF]);
    assert.deepEqual(kinds(lex('1 - 2')), [TokenKind.INT, TokenKind.OPERATOR, TokenKind.INT, TokenKind.EOF]);
  });

  test('应该把变量与单元格路径作为一个 token', () => {
    const [variable] = lex('$env.PATH.0?');
    assert.equal(variable?.kind, TokenKind.VARIABLE);
    assert.equal(variable?.value, '$env.PATH.0?');
  });

  test('应该识别各种字符串形式', () => {
    assert.deepEqual(
      lex(`"a\\"b" 'c' \`d e\` r#'raw'#`).map(t => [t.kind, t.value]),
      [
        [TokenKind.STRING, '"a\\"b"'],
        [TokenKind.STRING, "'c'"],
        [TokenKind.STRING, '`d e`'],
        [TokenKind.STRING, "r#'raw'#"],
        [TokenKind.EOF, ''],
      ]
    );
    const [interp] = lex('$"sum: ($a + ($b))"');
    assert.equal(interp?.kind, TokenKind.INTERPOLATION);
    assert.equal(interp?.value, '$"sum: ($a + ($b))"');
  });

  test('应该识别日期、进制数与范围', () => {
    assert.deepEqual(
      lex('2024-01-02 0x1F 1..10').map(t => [t.kind, t.value]),
      [
        [TokenKind.DATETIME, '2024-01-02'],
        [TokenKind.INT, '0x1F'],
        [TokenKind.INT, '1'],
        [TokenKind.RANGE, '..'],
        [TokenKind.INT, '10'],
        [TokenKind.EOF, ''],
      ]
    );
  });

  test('应该识别外部命令与赋值运算符', () => {
    assert.deepEqual(
      lex('^git status').map(t => [t.kind, t.value]),
      [
        [TokenKind.EXTERNAL, '^git'],
        [TokenKind.WORD, 'status'],
        [TokenKind.EOF, ''],
      ]
    );
    assert.deepEqual(
      lex('$x += 1').map(t => t.kind),
      [TokenKind.VARIABLE, TokenKind.ASSIGN_OP, TokenKind.INT, TokenKind.EOF]
    );
  });

  test('应该记录行列位置与前导空白', () => {
    const tokens = lex('let x = 1\nls');
    const ls = tokens.find(t => t.value === 'ls');
    assert.deepEqual(ls?.pos, { line: 2, col: 1 });
    assert.equal(ls?.start, 10);
    assert.equal(ls?.spaced, true);
    const eq = tokens.find(t => t.kind === TokenKind.EQUALS);
    assert.deepEqual(eq?.pos, { line: 1, col: 7 });
  });

  test('应该支持偏移量基准，用于插值内部的重新分析', () => {
    const [first] = lex('$a', 20, { line: 3, col: 5 });
    assert.equal(first?.start, 20);
    assert.equal(first?.end, 22);
    assert.deepEqual(first?.pos, { line: 3, col: 5 });
  });

  test('未闭合的字符串应该抛出 ParseError', () => {
    assert.throws(
      () => lex('echo "open'),
      (error: unknown) =>
        error instanceof ParseError && error.diagnostic.code === DiagnosticCode.L002_UnterminatedString
    );
  });

  test('空输入只产生 EOF', () => {
    assert.deepEqual(kinds(lex('')), [TokenKind.EOF]);
  });
});
