import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import {
  ConfigError,
  DiagnosticBuilder,
  DiagnosticCode,
  Diagnostics,
  FileIOError,
  ParseError,
  TriviaAttachmentError,
  UnsupportedConstructError,
  UsageError,
  formatDiagnostic,
  locationOf,
  positionAt,
} from '../../../src/diagnostics/diagnostics.js';

describe('诊断', () => {
  test('按错误码前缀选择错误类型', () => {
    assert.ok(Diagnostics.unexpectedCharacter('\u0001', { line: 1, col: 1 }).toError() instanceof ParseError);
    assert.ok(Diagnostics.config(DiagnosticCode.C003_ConfigUnknownOption, 'x').toError() instanceof ConfigError);
    assert.ok(Diagnostics.io(DiagnosticCode.I001_PathNotFound, 'x', 'a.nu').toError() instanceof FileIOError);
    assert.ok(Diagnostics.usage('x').toError() instanceof UsageError);
    const offsets = { start: 0, end: 1 };
    assert.ok(
      Diagnostics.triviaAttachment('comment', { line: 1, col: 1 }, offsets).toError() instanceof TriviaAttachmentError
    );
    assert.ok(
      Diagnostics.unsupportedConstruct('Widget', locationOf('x', offsets), offsets).toError() instanceof
        UnsupportedConstructError
    );
  });

  test('错误对象携带诊断与种类', () => {
    const error = Diagnostics.io(DiagnosticCode.I002_FileAccessFailed, 'Cannot access a.nu', 'a.nu').toError();
    assert.equal(error.kind, 'io');
    assert.equal(error.message, 'Cannot access a.nu');
    assert.equal(error.diagnostic.file, 'a.nu');
    assert.equal(error.name, 'FileIOError');
  });

  test('缺少必要字段时 build 抛出', () => {
    assert.throws(() => DiagnosticBuilder.error(DiagnosticCode.P005_UnexpectedToken).build(), /message is required/);
    assert.throws(
      () => DiagnosticBuilder.error(DiagnosticCode.P005_UnexpectedToken).withMessage('m').build(),
      /span is required/
    );
  });

  test('带源码时输出出错行与插入符', () => {
    const diagnostic = Diagnostics.expectedIdentifier({ line: 2, col: 5 })
      .withMessage("Expected variable name, got '='")
      .withOffsets({ start: 7, end: 8 })
      .withFile('a.nu')
      .build();
    const source = 'ls\nlet = 1\n';
    assert.equal(
      formatDiagnostic(diagnostic, source),
      [
        "error P001: Expected variable name, got '=' at a.nu:2:5",
        '> 2| let = 1',
        '>        ^',
      ].join('\n')
    );
  });

  test('没有源码位置的诊断只输出消息', () => {
    const diagnostic = Diagnostics.config(DiagnosticCode.C007_ConfigFileNotFound, 'Configuration file not found: x').build();
    assert.equal(formatDiagnostic(diagnostic), 'error C007: Configuration file not found: x');
  });

  test('偏移量转换为行列位置', () => {
    const source = 'ab\ncd\n';
    assert.deepEqual(positionAt(source, 0), { line: 1, col: 1 });
    assert.deepEqual(positionAt(source, 4), { line: 2, col: 2 });
    assert.deepEqual(positionAt(source, 100), { line: 3, col: 1 });
    assert.deepEqual(locationOf(source, { start: 3, end: 5 }), {
      start: { line: 2, col: 1 },
      end: { line: 2, col: 3 },
    });
  });
});
