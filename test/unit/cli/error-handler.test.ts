import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ExitCode, handleError, reportDiagnostic } from '../../../src/cli/utils/error-handler.js';
import { createCliLogger, type CliOutput } from '../../../src/cli/utils/logger.js';
import { Diagnostics, ParseError } from '../../../src/diagnostics/diagnostics.js';
import { parse } from '../../../src/parser.js';

function capture(): { output: CliOutput; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    output: { stdout: text => out.push(text), stderr: text => err.push(text) },
    out,
    err,
  };
}

function parseFailure(source: string): ParseError {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`expected a parse failure for ${source}`);
}

describe('error-handler', () => {
  it('诊断错误写入 stderr 并返回失败退出码', () => {
    const { output, out, err } = capture();
    const code = handleError(Diagnostics.usage('bad flag').toError(), createCliLogger(output, { color: false }));
    assert.equal(code, ExitCode.Failure);
    assert.deepEqual(err, ['✗ error U001: bad flag\n']);
    assert.deepEqual(out, []);
  });

  it('文件系统错误按 errno 分类', () => {
    const { output, err } = capture();
    const logger = createCliLogger(output, { color: false });
    handleError(Object.assign(new Error('open a.nu'), { code: 'ENOENT' }), logger);
    handleError(Object.assign(new Error('open b.nu'), { code: 'EACCES' }), logger);
    handleError(Object.assign(new Error('read c.nu'), { code: 'EISDIR' }), logger);
    assert.deepEqual(err, [
      '✗ error: no such file: open a.nu\n',
      '✗ error: permission denied: open b.nu\n',
      '✗ error: file system error (EISDIR): read c.nu\n',
    ]);
  });

  it('普通错误与非错误值', () => {
    const { output, err } = capture();
    const logger = createCliLogger(output, { color: false });
    assert.equal(handleError(new Error('boom'), logger), 2);
    assert.equal(handleError('boom', logger), 2);
    assert.deepEqual(err, ['✗ error: boom\n', '✗ error: unknown failure\n']);
  });

  it('reportDiagnostic 附带文件名与插入符', () => {
    const { output, err } = capture();
    reportDiagnostic(parseFailure('let = 1'), createCliLogger(output, { color: false }), 'let = 1', 'x.nu');
    assert.deepEqual(err, ["✗ error P001: Expected variable name, got '=' at x.nu:1:5\n> 1| let = 1\n>        ^\n"]);
  });

  it('彩色输出包裹符号', () => {
    const { output, out } = capture();
    createCliLogger(output, { color: true }).success('done');
    assert.deepEqual(out, ['\u001B[32m✓\u001B[0m done\n']);
  });
});
