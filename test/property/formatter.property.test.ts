import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { format } from '../../src/formatter.js';
import { parse } from '../../src/parser.js';
import { lex } from '../../src/frontend/lexer.js';
import { structureOf } from '../../src/ast/ast_visitor.js';
import { TokenKind } from '../../src/types.js';
import { DEFAULT_CONFIG, type FormatConfig } from '../../src/config/config.js';

const CONFIG: FormatConfig = { ...DEFAULT_CONFIG, lineLength: 40 };
const RUNS = 200;

const NAMES = ['a', 'xs', 'item', 'total'] as const;
const COMMANDS = ['ls', 'echo', 'print', 'sort-by', 'length'] as const;

const atom = fc.oneof(
  fc.integer({ min: 0, max: 999 }).map(String),
  fc.constantFrom('"ab"', "'cd'", '$a', '$item', 'true', 'null', 'name')
);

const separator = fc.constantFrom(', ', ' ', ',');

const list = fc
  .tuple(fc.array(atom, { maxLength: 6 }), separator)
  .map(([items, sep]) => `[${items.join(sep)}]`);

const record = fc
  .array(fc.tuple(fc.constantFrom('k', 'name', 'size'), atom), { maxLength: 4 })
  .map(entries => `{${entries.map(([key, value]) => `${key}: ${value}`).join(', ')}}`);

const value = fc.oneof(atom, list, record);

const command = fc
  .tuple(fc.constantFrom(...COMMANDS), fc.array(fc.oneof(atom, list, record, fc.constant('--all')), { maxLength: 2 }))
  .map(([head, args]) => [head, ...args].join(' '));

const closureStage = fc.constantFrom('each {|x| $x * 2}', 'where {|it| $it > 1}');

const pipeline = fc
  .tuple(command, fc.array(fc.oneof(command, closureStage), { minLength: 1, maxLength: 3 }), fc.constantFrom(' | ', '|'))
  .map(([head, rest, pipe]) => [head, ...rest].join(pipe));

const simpleStatement = fc.oneof(
  fc.tuple(fc.constantFrom(...NAMES), value).map(([name, v]) => `let ${name} = ${v}`),
  fc.tuple(fc.constantFrom(...NAMES), pipeline).map(([name, p]) => `let ${name} = ${p}`),
  fc.constantFrom(...NAMES).map(name => `$${name} += 1`),
  command,
  pipeline
);

/** 在语句前后随机加上注释 */
function commented(statement: fc.Arbitrary<string>): fc.Arbitrary<string> {
  return fc.tuple(fc.boolean(), statement, fc.boolean(), fc.nat({ max: 99 })).map(([leading, text, trailing, id]) => {
    const before = leading ? `# note ${id}\n` : '';
    const after = trailing ? `  # tail ${id}` : '';
    return `${before}${text}${after}`;
  });
}

function statements(depth: number): fc.Arbitrary<string> {
  const item = depth === 0 ? simpleStatement : fc.oneof(simpleStatement, compound(depth));
  return fc
    .tuple(fc.array(commented(item), { maxLength: 4 }), fc.constantFrom('\n', '\n\n', '\n\n\n'))
    .map(([items, sep]) => items.join(sep));
}

function compound(depth: number): fc.Arbitrary<string> {
  const body = statements(depth - 1);
  return fc.oneof(
    fc.tuple(body, body).map(([then, otherwise]) => `if $a > 1 {\n${then}\n} else {\n${otherwise}\n}`),
    fc.tuple(list, body).map(([iterable, b]) => `for x in ${iterable} {\n${b}\n}`),
    fc.tuple(fc.constantFrom(...NAMES), body).map(([name, b]) => `def ${name} [x, y: int] {\n${b}\n}`)
  );
}

const program = statements(2);

function comments(source: string): string[] {
  return lex(source)
    .filter(token => token.kind === TokenKind.COMMENT)
    .map(token => token.value.trimEnd())
    .sort();
}

describe('格式化器性质', () => {
  test('格式化是幂等的', () => {
    fc.assert(
      fc.property(program, source => {
        const once = format(source, CONFIG);
        assert.equal(format(once, CONFIG), once);
      }),
      { numRuns: RUNS }
    );
  });

  test('格式化不改变语法结构', () => {
    fc.assert(
      fc.property(program, source => {
        const once = format(source, CONFIG);
        assert.equal(structureOf(parse(once).program), structureOf(parse(source).program));
      }),
      { numRuns: RUNS }
    );
  });

  test('注释一条不少地保留', () => {
    fc.assert(
      fc.property(program, source => {
        assert.deepEqual(comments(format(source, CONFIG)), comments(source));
      }),
      { numRuns: RUNS }
    );
  });

  test('不含注释的行不超过行宽，连续空行不超过 margin', () => {
    fc.assert(
      fc.property(program, source => {
        const once = format(source, CONFIG);
        for (const line of once.split('\n')) {
          if (line.includes('#')) continue;
          assert.ok(line.length <= CONFIG.lineLength, `line too long: ${JSON.stringify(line)}`);
        }
        assert.equal(once.includes('\n\n\n'), false);
      }),
      { numRuns: RUNS }
    );
  });
});
