import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { check, format, formatOrError } from '../../../src/formatter.js';
import { DEFAULT_CONFIG, type FormatConfig } from '../../../src/config/config.js';
import { DiagnosticCode, ParseError } from '../../../src/diagnostics/diagnostics.js';

function withConfig(overrides: Partial<FormatConfig>): FormatConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

describe('格式化器', () => {
  describe('基本场景', () => {
    test('规范化 let 周围的空白', () => {
      assert.equal(format('let x  =  1'), 'let x = 1\n');
    });

    test('if/else 的语句块总是展开', () => {
      assert.equal(format('if $x>0{1}else{2}'), 'if $x > 0 {\n    1\n} else {\n    2\n}\n');
    });

    test('顶层多段管道按 pipe-leading 方式换行，闭包保持单行', () => {
      assert.equal(
        format('[1,2,3]|each {|x| $x*2}|where {|x|$x>2}'),
        '[1, 2, 3]\n| each { |x| $x * 2 }\n| where { |x| $x > 2 }\n'
      );
    });

    test('超宽的记录每项一行，末项不加逗号', () => {
      const source = 'let r = {a: 1, b: 2, c: 3, d: 4, e: 5, f: 6, g: 7, h: 8, i: 9, j: 10}';
      const expected = [
        'let r = {',
        '    a: 1,',
        '    b: 2,',
        '    c: 3,',
        '    d: 4,',
        '    e: 5,',
        '    f: 6,',
        '    g: 7,',
        '    h: 8,',
        '    i: 9,',
        '    j: 10',
        '}',
        '',
      ].join('\n');
      assert.equal(format(source, withConfig({ lineLength: 40 })), expected);
    });

    test('放得下的记录保持单行', () => {
      const source = 'let r = {a: 1, b: 2, c: 3, d: 4, e: 5, f: 6, g: 7, h: 8, i: 9, j: 10}';
      assert.equal(format(source), `${source}\n`);
    });

    test('保留注释与空行', () => {
      assert.equal(
        format('# header\nlet x = 1  # trailing\n\nls'),
        '# header\nlet x = 1  # trailing\n\nls\n'
      );
    });

    test('match 每个分支一行', () => {
      assert.equal(format('match $x {0=>"zero" 1=>"one"}'), 'match $x {\n    0 => "zero"\n    1 => "one"\n}\n');
    });

    test('通配参数 * 原样保留', () => {
      assert.equal(format('use   std/log  *'), 'use std/log *\n');
      assert.equal(format('export use foo *'), 'export use foo *\n');
      assert.equal(format('rm foo *\nls'), 'rm foo *\nls\n');
    });
  });

  describe('输入规范化', () => {
    test('空白输入返回空串', () => {
      assert.equal(format(''), '');
      assert.equal(format('  \n\n\t\n'), '');
    });

    test('CRLF 换行转换为 LF', () => {
      assert.equal(format('ls\r\npwd\r\n'), 'ls\npwd\n');
    });

    test('去掉首尾空行，输出恰好以一个换行结尾', () => {
      assert.equal(format('\n\nls\n\n\n'), 'ls\n');
    });

    test('连续空行按 margin 截断', () => {
      assert.equal(format('ls\n\n\n\npwd'), 'ls\n\npwd\n');
      assert.equal(format('ls\n\n\n\npwd', withConfig({ margin: 2 })), 'ls\n\n\npwd\n');
      assert.equal(format('ls\n\n\n\npwd', withConfig({ margin: 0 })), 'ls\npwd\n');
    });

    test('缩进宽度可配置', () => {
      assert.equal(format('if $a { ls }', withConfig({ indent: 2 })), 'if $a {\n  ls\n}\n');
    });
  });

  describe('注释', () => {
    test('只有注释的文件', () => {
      assert.equal(format('# a\n\n# b'), '# a\n\n# b\n');
    });

    test('文件末尾的注释', () => {
      assert.equal(format('ls\n# end'), 'ls\n# end\n');
    });

    test('空语句块中的注释', () => {
      assert.equal(format('def f [] {\n    # nothing\n}'), 'def f [] {\n    # nothing\n}\n');
    });

    test('只含注释的列表、记录、签名与子表达式不多出空行', () => {
      assert.equal(format('let x = [\n    # c\n]'), 'let x = [\n    # c\n]\n');
      assert.equal(format('let r = {\n    # c\n}'), 'let r = {\n    # c\n}\n');
      assert.equal(format('def f [\n    # c\n] {}'), 'def f [\n    # c\n] {}\n');
      assert.equal(format('let s = (\n    # c\n)'), 'let s = (\n    # c\n)\n');
      assert.equal(format('let x = [\n  # a\n  # b\n]'), 'let x = [\n    # a\n    # b\n]\n');
    });

    test('then 块后的注释留在该分支上，else 另起一行', () => {
      assert.equal(
        format('if $x {\n    1\n} # c\nelse {\n    2\n}'),
        'if $x {\n    1\n}  # c\nelse {\n    2\n}\n'
      );
      assert.equal(
        format('if $x {\n    1\n}\n# c\nelse if $y {\n    2\n}'),
        'if $x {\n    1\n}\n# c\nelse if $y {\n    2\n}\n'
      );
      assert.equal(format('if $x { 1 } else { 2 }  # tail'), 'if $x {\n    1\n} else {\n    2\n}  # tail\n');
    });

    test('参数后的行尾注释放在逗号之后', () => {
      const source = 'def f [\n    x: int  # the x\n    y: int\n] { }';
      assert.equal(format(source), 'def f [\n    x: int,  # the x\n    y: int\n] {}\n');
    });

    test('管道阶段之间的注释留在该阶段之前', () => {
      const source = 'ls\n# keep only big files\n| where size > 10kb';
      assert.equal(format(source), 'ls\n# keep only big files\n| where size > 10kb\n');
    });

    test('展开项后的行尾注释', () => {
      const source = 'let r = {\n    ...$base  # inherited\n    b: 2\n}';
      assert.equal(format(source), 'let r = {\n    ...$base,  # inherited\n    b: 2\n}\n');
    });

    test('闭包内的注释使闭包展开', () => {
      const source = 'ls | each {|x|\n    # double it\n    $x * 2\n}';
      assert.equal(format(source), 'ls\n| each { |x|\n    # double it\n    $x * 2\n}\n');
    });

    test('注释内容原样保留', () => {
      assert.equal(format('ls   #   spaced   out'), 'ls  #   spaced   out\n');
    });
  });

  describe('check 与 formatOrError', () => {
    test('check 报告是否需要格式化', () => {
      assert.deepEqual(check('let x = 1\n'), { changed: false, formatted: 'let x = 1\n' });
      assert.deepEqual(check('let x=1'), { changed: true, formatted: 'let x = 1\n' });
    });

    test('formatOrError 把解析错误作为结果返回', () => {
      const result = formatOrError('let = 1');
      assert.equal(result.ok, false);
      if (result.ok) return;
      assert.ok(result.error instanceof ParseError);
      assert.equal(result.error.diagnostic.code, DiagnosticCode.P001_ExpectedIdentifier);
    });

    test('format 对语法错误抛出 ParseError', () => {
      assert.throws(() => format('let = 1'), ParseError);
    });

    test('格式化结果是稳定的', () => {
      const once = format('def f [x:int, --verbose(-v)] {if $verbose {print $x} else {ls|length}}');
      assert.equal(format(once), once);
    });
  });
});
