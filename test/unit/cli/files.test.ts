import { afterEach, beforeEach, describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ExcludeMatcher, discoverFiles } from '../../../src/cli/files.js';
import { DiagnosticCode, FileIOError } from '../../../src/diagnostics/diagnostics.js';

describe('文件发现', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'nufmt-files-'));
    for (const sub of ['sub', 'vendor', 'node_modules', '.git']) mkdirSync(join(dir, sub));
    for (const file of ['a.nu', 'b.txt', 'sub/c.nu', 'vendor/d.nu', 'node_modules/e.nu', '.git/f.nu']) {
      writeFileSync(join(dir, file), 'ls\n');
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('递归收集 .nu 文件并跳过 .git 与 node_modules', () => {
    assert.deepEqual(discoverFiles(['.'], [], dir), [
      join(dir, 'a.nu'),
      join(dir, 'sub', 'c.nu'),
      join(dir, 'vendor', 'd.nu'),
    ]);
  });

  test('exclude 规则跳过匹配的目录与文件', () => {
    assert.deepEqual(discoverFiles(['.'], ['vendor'], dir), [join(dir, 'a.nu'), join(dir, 'sub', 'c.nu')]);
    assert.deepEqual(discoverFiles(['.'], ['sub/*.nu', 'a.nu'], dir), [join(dir, 'vendor', 'd.nu')]);
  });

  test('显式给出的文件不检查扩展名', () => {
    assert.deepEqual(discoverFiles(['b.txt'], [], dir), [join(dir, 'b.txt')]);
  });

  test('结果去重并排序', () => {
    assert.deepEqual(discoverFiles(['sub/c.nu', 'a.nu', 'sub'], [], dir), [join(dir, 'a.nu'), join(dir, 'sub', 'c.nu')]);
  });

  test('路径不存在时报 I001', () => {
    assert.throws(
      () => discoverFiles(['missing.nu'], [], dir),
      (error: unknown) =>
        error instanceof FileIOError &&
        error.diagnostic.code === DiagnosticCode.I001_PathNotFound &&
        error.message === 'Path not found: missing.nu'
    );
  });
});

describe('ExcludeMatcher', () => {
  test('不含 / 的模式匹配任意层级的文件名', () => {
    const matcher = new ExcludeMatcher(['*.gen.nu']);
    assert.equal(matcher.matches('deep/dir/x.gen.nu'), true);
    assert.equal(matcher.matches('deep/dir/x.nu'), false);
  });

  test('含 / 的模式按相对路径匹配', () => {
    const matcher = new ExcludeMatcher(['scripts/**']);
    assert.equal(matcher.matches('scripts/a/b.nu'), true);
    assert.equal(matcher.matches('other/scripts.nu'), false);
  });

  test('模式可以匹配点文件', () => {
    assert.equal(new ExcludeMatcher(['.*']).matches('.hidden.nu'), true);
  });
});
