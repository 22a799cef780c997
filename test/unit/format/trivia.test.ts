import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { parse } from '../../../src/parser.js';
import { collectContainers, countBlankLines, extractTrivia, interiorOf } from '../../../src/format/trivia.js';
import type { TriviaItem } from '../../../src/format/trivia.js';

function triviaOf(source: string): TriviaItem[] {
  const { program, tokens } = parse(source);
  return extractTrivia(source, program, tokens);
}

/** 每一项的摘要：种类、文本、归类、放置方式与锚点源码 */
function describeItems(source: string): string[] {
  return triviaOf(source).map(item => {
    const label = item.kind === 'comment' ? item.text : `blank×${item.lines}`;
    const anchorText = source.slice(item.target.span.start, item.target.span.end);
    return `${label} | ${item.attachment} | ${item.target.placement} | ${anchorText}`;
  });
}

describe('注释与空行提取', () => {
  test('应该区分前置注释、行尾注释与空行', () => {
    const source = '# header\nlet x = 1  # trailing\n\nls\n';
    assert.deepEqual(describeItems(source), [
      '# header | leading | before | let x = 1',
      '# trailing | trailing | after | let x = 1',
      'blank×1 | standalone | before | ls',
    ]);
  });

  test('与下一项隔着空行的注释是独立注释', () => {
    const source = 'ls\n# note\n\npwd';
    assert.deepEqual(describeItems(source), [
      '# note | standalone | before | pwd',
      'blank×1 | standalone | before | pwd',
    ]);
  });

  test('注释之前的空行锚定在注释所属的下一项', () => {
    const source = 'ls\n\n# later\npwd\n';
    assert.deepEqual(describeItems(source), [
      'blank×1 | standalone | before | pwd',
      '# later | leading | before | pwd',
    ]);
  });

  test('容器末尾的注释进入末尾插槽', () => {
    const source = 'ls\n# end';
    const [item] = triviaOf(source);
    assert.equal(item?.attachment, 'standalone');
    assert.deepEqual(item?.target, { placement: 'end', span: { start: 0, end: source.length } });
  });

  test('注释归属于最内层容器', () => {
    const source = 'let xs = [\n    1  # one\n    2\n]\n';
    assert.deepEqual(describeItems(source), ['# one | trailing | after | 1']);
  });

  test('闭包体内的注释锚定在闭包内的语句上', () => {
    const source = 'ls | each {|x|\n    # double it\n    $x * 2\n}\n';
    assert.deepEqual(describeItems(source), ['# double it | leading | before | $x * 2']);
  });

  test('空语句块中的注释进入该块的末尾插槽', () => {
    const source = 'def f [] {\n    # nothing\n}';
    const [item] = triviaOf(source);
    const open = source.indexOf('{');
    assert.equal(item?.target.placement, 'end');
    assert.deepEqual(item?.target.span, { start: open + 1, end: source.length - 1 });
  });

  test('then 块之后、else 之前的注释跟随所在分支', () => {
    assert.deepEqual(describeItems('if $x {\n    1\n} # c\nelse {\n    2\n}'), [
      '# c | trailing | after | {\n    1\n}',
    ]);
    assert.deepEqual(describeItems('if $x {\n    1\n}\n# c\nelse {\n    2\n}'), [
      '# c | leading | before | {\n    2\n}',
    ]);
  });

  test('列表中的空行不记录', () => {
    const source = 'let xs = [\n    1\n\n    2\n]';
    assert.deepEqual(triviaOf(source), []);
  });

  test('首项之前与末项之后的空行不记录', () => {
    assert.deepEqual(triviaOf('\n\nls\n\n\n'), []);
  });

  test('多行空白按实际行数记录', () => {
    assert.deepEqual(describeItems('ls\n\n\n\npwd'), ['blank×3 | standalone | before | pwd']);
  });

  test('行尾注释去掉末尾空白', () => {
    const [item] = triviaOf('ls  # note   \n');
    assert.equal(item?.text, '# note');
  });

  test('多段管道是容器，单段管道不是', () => {
    const { program } = parse('ls | length\npwd');
    const kinds = collectContainers(program).map(c => c.kind);
    assert.deepEqual(kinds, ['statements', 'elements']);
  });
});

describe('辅助函数', () => {
  test('countBlankLines 只统计两端之间的整行', () => {
    assert.equal(countBlankLines('a\nb', 1, 2), 0);
    assert.equal(countBlankLines('a\n\nb', 1, 3), 1);
    assert.equal(countBlankLines('a\n   \n\nb', 1, 7), 2);
  });

  test('interiorOf 去掉两侧定界符', () => {
    assert.deepEqual(interiorOf({ start: 4, end: 10 }), { start: 5, end: 9 });
    assert.deepEqual(interiorOf({ start: 4, end: 5 }), { start: 5, end: 5 });
  });
});
