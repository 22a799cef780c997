/**
 * 待格式化文件的发现：展开目录、应用 exclude 规则、去重排序。
 */

import { readdirSync, statSync, type Stats } from 'node:fs';
import { basename, join, relative, resolve, sep } from 'node:path';
import { Minimatch } from 'minimatch';
import { DiagnosticCode, Diagnostics } from '../diagnostics/diagnostics.js';

/** Extension of script files picked up when walking a directory */
export const SCRIPT_EXTENSION = '.nu';

const SKIPPED_DIRECTORIES = new Set(['.git', 'node_modules']);

/**
 * 编译后的 exclude 规则。
 *
 * 不含 `/` 的模式同时匹配任意层级的文件名（matchBase）。
 */
export class ExcludeMatcher {
  private readonly matchers: readonly Minimatch[];

  constructor(patterns: readonly string[]) {
    this.matchers = patterns.map(
      pattern => new Minimatch(pattern, { dot: true, matchBase: !pattern.includes('/') })
    );
  }

  /**
   * @param relativePath - 相对于工作目录的路径，使用 `/` 分隔
   */
  matches(relativePath: string): boolean {
    const name = basename(relativePath);
    return this.matchers.some(matcher => matcher.match(relativePath) || matcher.match(name));
  }
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

function statOrThrow(path: string, display: string): Stats {
  try {
    return statSync(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return Diagnostics.io(DiagnosticCode.I001_PathNotFound, `Path not found: ${display}`, display).throw();
    }
    const reason = error instanceof Error ? error.message : String(error);
    return Diagnostics.io(DiagnosticCode.I002_FileAccessFailed, `Cannot access ${display}: ${reason}`, display).throw();
  }
}

function walk(dir: string, cwd: string, exclude: ExcludeMatcher, out: Set<string>): void {
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = join(dir, entry.name);
    const rel = toPosix(relative(cwd, full));
    if (entry.isDirectory()) {
      if (SKIPPED_DIRECTORIES.has(entry.name) || exclude.matches(rel)) continue;
      walk(full, cwd, exclude, out);
    } else if (entry.isFile() && entry.name.endsWith(SCRIPT_EXTENSION) && !exclude.matches(rel)) {
      out.add(full);
    }
  }
}

/**
 * 展开命令行给出的路径。
 *
 * - 文件：无论扩展名，按给定路径格式化
 * - 目录：递归收集 `*.nu` 文件，跳过 `.git` 与 `node_modules`
 *
 * @returns 去重并排序后的绝对路径
 * @throws {FileIOError} 路径不存在（I001）或既不是文件也不是目录（I003）
 */
export function discoverFiles(paths: readonly string[], exclude: readonly string[], cwd: string): string[] {
  const matcher = new ExcludeMatcher(exclude);
  const found = new Set<string>();
  for (const input of paths) {
    const full = resolve(cwd, input);
    const stats = statOrThrow(full, input);
    const rel = toPosix(relative(cwd, full));
    if (stats.isDirectory()) {
      walk(full, cwd, matcher, found);
    } else if (stats.isFile()) {
      if (!matcher.matches(rel)) found.add(full);
    } else {
      Diagnostics.io(DiagnosticCode.I003_NotAFileOrDirectory, `Not a file or directory: ${input}`, input).throw();
    }
  }
  return [...found].sort();
}
