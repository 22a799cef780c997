import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { parse } from '../../../src/parser.js';
import { structureOf } from '../../../src/ast/ast_visitor.js';
import type { Expression, Program, Statement } from '../../../src/types.js';
import { DiagnosticCode, ParseError } from '../../../src/diagnostics/diagnostics.js';

function firstStatement(source: string): Statement {
  const [statement] = parse(source).program.statements;
  assert.ok(statement, 'expected a statement');
  return statement;
}

/** 单阶段管道语句的唯一表达式 */
function onlyStage(source: string): Expression {
  const statement = firstStatement(source);
  assert.equal(statement.kind, 'Pipeline');
  if (statement.kind !== 'Pipeline') throw new Error('unreachable');
  assert.equal(statement.stages.length, 1);
  const [stage] = statement.stages;
  assert.ok(stage);
  return stage;
}

function program(source: string): Program {
  return parse(source).program;
}

describe('语法分析器', () => {
  describe('语句', () => {
    test('应该解析 let 绑定并记录 span', () => {
      const statement = firstStatement('let x  =  1');
      assert.equal(statement.kind, 'Let');
      if (statement.kind !== 'Let') return;
      assert.equal(statement.keyword, 'let');
      assert.equal(statement.name, 'x');
      assert.equal(statement.type, null);
      assert.deepEqual(statement.span, { start: 0, end: 11 });
      assert.equal(structureOf(statement.value), 'Pipeline(Literal:1)');
    });

    test('应该解析带类型的 mut 绑定', () => {
      const statement = firstStatement('mut count: int = 0');
      assert.equal(statement.kind, 'Let');
      if (statement.kind !== 'Let') return;
      assert.equal(statement.keyword, 'mut');
      assert.equal(statement.type?.name, 'int');
    });

    test('应该解析 def 的签名与参数种类', () => {
      const statement = firstStatement('def f [x: int = 10, y?, --verbose(-v), ...rest] { }');
      assert.equal(statement.kind, 'Def');
      if (statement.kind !== 'Def') return;
      assert.equal(statement.name, 'f');
      assert.deepEqual(
        statement.signature.params.map(p => [p.style, p.name]),
        [
          ['positional', 'x'],
          ['optional', 'y'],
          ['flag', 'verbose'],
          ['rest', 'rest'],
        ]
      );
      const [x, , verbose] = statement.signature.params;
      assert.equal(x?.type?.name, 'int');
      assert.equal(x?.defaultValue?.kind, 'Literal');
      assert.equal(verbose?.short, 'v');
      assert.equal(statement.body.statements.length, 0);
    });

    test('应该解析输入输出类型', () => {
      const statement = firstStatement('def f []: string -> int { 1 }');
      assert.equal(statement.kind, 'Def');
      if (statement.kind !== 'Def') return;
      assert.deepEqual(
        statement.signature.io.map(io => [io.input.name, io.output.name]),
        [['string', 'int']]
      );
      assert.equal(statement.signature.ioBracketed, false);
    });

    test('应该解析控制流语句', () => {
      assert.equal(firstStatement('for x in [1 2] { print $x }').kind, 'For');
      assert.equal(firstStatement('while $i < 3 { $i += 1 }').kind, 'While');
      assert.equal(firstStatement('loop { break }').kind, 'Loop');
      assert.equal(firstStatement('alias ll = ls -l').kind, 'Alias');
      assert.equal(firstStatement('use std/log').kind, 'ModuleCommand');
      assert.equal(firstStatement('export def hi [] { "hi" }').kind, 'Export');
      assert.equal(firstStatement('export-env { $env.X = 1 }').kind, 'ExportEnv');
      assert.equal(firstStatement('module m { export def a [] { 1 } }').kind, 'Module');
    });

    test('return 可以不带值', () => {
      const statement = firstStatement('def f [] { return }');
      assert.equal(statement.kind, 'Def');
      if (statement.kind !== 'Def') return;
      const [ret] = statement.body.statements;
      assert.equal(ret?.kind, 'Return');
      if (ret?.kind !== 'Return') return;
      assert.equal(ret.value, null);
    });

    test('应该按换行与分号分隔语句，并忽略注释', () => {
      assert.equal(program('ls; pwd\n# note\ncd dir').statements.length, 3);
      assert.equal(program('ls  # trailing\n').statements.length, 1);
      assert.equal(program('# only a comment').statements.length, 0);
    });
  });

  describe('管道与命令', () => {
    test('应该解析多阶段管道与比较参数', () => {
      const statement = firstStatement('ls | where size > 10kb');
      assert.equal(
        structureOf(statement),
        'Pipeline(Command:ls,Command:where(BinaryOp:>(BareWord:size,Literal:10kb)))'
      );
    });

    test('下一行以 | 开头时管道继续', () => {
      const result = program('ls\n| sort-by name\n| first 3');
      assert.equal(result.statements.length, 1);
      const [statement] = result.statements;
      assert.equal(statement?.kind, 'Pipeline');
      if (statement?.kind !== 'Pipeline') return;
      assert.equal(statement.stages.length, 3);
    });

    test('应该解析 flag、带值的 flag 与外部命令', () => {
      assert.equal(structureOf(onlyStage('ls -la --sort=name')), 'Command:ls(Flag:-la,Flag:--sort(BareWord:name))');
      const external = onlyStage('^git status');
      assert.equal(external.kind, 'Command');
      if (external.kind !== 'Command') return;
      assert.equal(external.head, 'git');
      assert.equal(external.external, true);
    });

    test('紧贴的参数应该合并为一个裸词', () => {
      const stage = onlyStage('docker run image:latest');
      assert.equal(structureOf(stage), 'Command:docker(BareWord:run,BareWord:image:latest)');
    });

    test('参数末尾的 * 是通配符而不是乘法', () => {
      assert.equal(structureOf(onlyStage('rm foo *')), 'Command:rm(BareWord:foo,BareWord:*)');
      assert.equal(structureOf(firstStatement('use std/log *')), 'ModuleCommand(BareWord:std/log,BareWord:*)');
      assert.equal(
        structureOf(firstStatement('export use foo *')),
        'Export(ModuleCommand(BareWord:foo,BareWord:*))'
      );
      assert.equal(
        structureOf(firstStatement('ls foo * | length')),
        'Pipeline(Command:ls(BareWord:foo,BareWord:*),Command:length)'
      );
      assert.equal(structureOf(onlyStage('$a * $b')), 'BinaryOp:*(Variable:$a,Variable:$b)');
    });
  });

  describe('表达式', () => {
    test('应该按优先级解析二元运算', () => {
      assert.equal(
        structureOf(onlyStage('$a + $b * 2')),
        'BinaryOp:+(Variable:$a,BinaryOp:*(Variable:$b,Literal:2))'
      );
    });

    test('应该解析一元运算', () => {
      assert.equal(structureOf(onlyStage('not $x')), 'UnaryOp:not(Variable:$x)');
      const statement = firstStatement('let y = -$x');
      assert.equal(statement.kind, 'Let');
      if (statement.kind !== 'Let') return;
      assert.equal(structureOf(statement.value), 'Pipeline(UnaryOp:-(Variable:$x))');
    });

    test('应该解析赋值', () => {
      assert.equal(structureOf(onlyStage('$x += 1')), 'Assignment:+=(Variable:$x,Pipeline(Literal:1))');
    });

    test('应该解析单元格路径', () => {
      const path = onlyStage('$x.a.0?');
      assert.equal(path.kind, 'CellPath');
      if (path.kind !== 'CellPath') return;
      assert.equal(path.path, '.a.0?');
      assert.equal(path.target.kind, 'Variable');
    });

    test('应该解析范围', () => {
      const range = onlyStage('1..10');
      assert.equal(range.kind, 'Range');
      if (range.kind !== 'Range') return;
      assert.equal(range.op, '..');
      assert.equal(range.from?.kind, 'Literal');
      assert.equal(range.to?.kind, 'Literal');
      assert.equal(range.next, null);
    });

    test('应该区分记录与闭包', () => {
      assert.equal(onlyStage('{a: 1, b: 2}').kind, 'Record');
      assert.equal(onlyStage('{}').kind, 'Record');
      const closure = onlyStage('{ ls }');
      assert.equal(closure.kind, 'Closure');
      if (closure.kind !== 'Closure') return;
      assert.equal(closure.params, null);
    });

    test('应该解析带参数的闭包', () => {
      const command = onlyStage('each {|x| $x * 2}');
      assert.equal(command.kind, 'Command');
      if (command.kind !== 'Command') return;
      const [closure] = command.args;
      assert.equal(closure?.kind, 'Closure');
      if (closure?.kind !== 'Closure') return;
      assert.deepEqual(closure.params?.map(p => p.name), ['x']);
      assert.equal(closure.body.statements.length, 1);
    });

    test('应该解析表格字面量', () => {
      const table = onlyStage('[[a, b]; [1, 2], [3, 4]]');
      assert.equal(table.kind, 'Table');
      if (table.kind !== 'Table') return;
      assert.equal(table.header.items.length, 2);
      assert.equal(table.rows.length, 2);
    });

    test('列表项可以用换行或逗号分隔', () => {
      const list = onlyStage('[1\n2, 3]');
      assert.equal(list.kind, 'List');
      if (list.kind !== 'List') return;
      assert.equal(list.items.length, 3);
    });

    test('应该解析 if/else if/else', () => {
      const expr = onlyStage('if $a { 1 } else if $b { 2 } else { 3 }');
      assert.equal(expr.kind, 'If');
      if (expr.kind !== 'If') return;
      assert.equal(expr.otherwise?.kind, 'If');
    });

    test('应该解析 match 分支', () => {
      const expr = onlyStage('match $x {0=>"zero" 1=>"one"}');
      assert.equal(expr.kind, 'Match');
      if (expr.kind !== 'Match') return;
      assert.equal(expr.arms.length, 2);
    });

    test('应该解析 try/catch', () => {
      const expr = onlyStage('try { risky } catch {|e| print $e }');
      assert.equal(expr.kind, 'Try');
      if (expr.kind !== 'Try') return;
      assert.equal(expr.handler?.kind, 'Closure');
    });

    test('应该解析字符串插值的各个部分', () => {
      const command = onlyStage('print $"sum: ($a + $b)"');
      assert.equal(command.kind, 'Command');
      if (command.kind !== 'Command') return;
      const [interp] = command.args;
      assert.equal(interp?.kind, 'StringInterpolation');
      if (interp?.kind !== 'StringInterpolation') return;
      assert.deepEqual(
        interp.parts.map(part => part.kind),
        ['text', 'expr']
      );
    });

    test('应该解析子表达式', () => {
      const statement = firstStatement('let n = (ls | length)');
      assert.equal(statement.kind, 'Let');
      if (statement.kind !== 'Let') return;
      assert.equal(structureOf(statement.value), 'Pipeline(Subexpression(Block(Pipeline(Command:ls,Command:length))))');
    });
  });

  describe('错误', () => {
    test('缺少变量名时报 P001 并带位置', () => {
      assert.throws(
        () => parse('let = 1'),
        (error: unknown) =>
          error instanceof ParseError &&
          error.diagnostic.code === DiagnosticCode.P001_ExpectedIdentifier &&
          error.message === "Expected variable name, got '='" &&
          error.pos.line === 1 &&
          error.pos.col === 5
      );
    });

    test('未闭合的括号应该报错', () => {
      assert.throws(() => parse('(1'), ParseError);
      assert.throws(() => parse('[1, 2'), ParseError);
      assert.throws(() => parse('if $x {'), ParseError);
    });
  });
});
