/**
 * 批量格式化：在有限并发的池中逐文件读取、格式化、比较并（写入模式下）回写。
 *
 * 每个文件独立成功或失败；单个文件的失败记录在其结果中，不影响其他文件。
 */

import { readFile, writeFile } from 'node:fs/promises';
import pLimit from 'p-limit';
import type { FormatConfig } from '../config/config.js';
import { formatOrError } from '../formatter.js';
import { DiagnosticCode, DiagnosticError, Diagnostics } from '../diagnostics/diagnostics.js';
import { logPerformance } from '../utils/logger.js';
import { ExitCode } from './utils/error-handler.js';

export type BatchMode = 'write' | 'check';

export interface BatchOptions {
  readonly mode: BatchMode;
  /** Maximum number of files processed at once */
  readonly concurrency: number;
}

export type FileResult =
  | { readonly file: string; readonly status: 'unchanged' }
  | { readonly file: string; readonly status: 'changed' }
  | { readonly file: string; readonly status: 'would-change' }
  | {
      readonly file: string;
      readonly status: 'failed';
      readonly error: DiagnosticError;
      /** Source text, when it could be read, for caret rendering */
      readonly source?: string;
    };

export interface BatchSummary {
  readonly unchanged: number;
  readonly changed: number;
  readonly wouldChange: number;
  readonly failed: number;
  readonly exitCode: ExitCode;
}

function ioFailure(file: string, action: string, error: unknown): DiagnosticError {
  const reason = error instanceof Error ? error.message : String(error);
  return Diagnostics.io(DiagnosticCode.I002_FileAccessFailed, `Failed to ${action} ${file}: ${reason}`, file).toError();
}

async function formatOne(file: string, config: FormatConfig, mode: BatchMode): Promise<FileResult> {
  let source: string;
  try {
    source = await readFile(file, 'utf-8');
  } catch (error) {
    return { file, status: 'failed', error: ioFailure(file, 'read', error) };
  }

  const result = formatOrError(source, config);
  if (!result.ok) return { file, status: 'failed', error: result.error, source };
  if (result.text === source) return { file, status: 'unchanged' };
  if (mode === 'check') return { file, status: 'would-change' };

  try {
    await writeFile(file, result.text, 'utf-8');
  } catch (error) {
    return { file, status: 'failed', error: ioFailure(file, 'write', error), source };
  }
  return { file, status: 'changed' };
}

/**
 * 并发格式化多个文件。结果顺序与输入顺序一致。
 */
export async function formatFiles(
  files: readonly string[],
  config: FormatConfig,
  options: BatchOptions
): Promise<FileResult[]> {
  const limit = pLimit(Math.max(1, options.concurrency));
  const startTime = performance.now();
  const results = await Promise.all(files.map(file => limit(() => formatOne(file, config, options.mode))));
  logPerformance({
    component: 'batch',
    operation: 'formatFiles',
    duration: performance.now() - startTime,
    metadata: { files: files.length, mode: options.mode },
  });
  return results;
}

/**
 * 汇总结果并计算退出码：有失败为 2；检查模式下有需要格式化的文件为 1；否则为 0。
 */
export function summarize(results: readonly FileResult[]): BatchSummary {
  let unchanged = 0;
  let changed = 0;
  let wouldChange = 0;
  let failed = 0;
  for (const result of results) {
    switch (result.status) {
      case 'unchanged':
        unchanged++;
        break;
      case 'changed':
        changed++;
        break;
      case 'would-change':
        wouldChange++;
        break;
      case 'failed':
        failed++;
        break;
    }
  }
  const exitCode: ExitCode = failed > 0 ? ExitCode.Failure : wouldChange > 0 ? ExitCode.WouldChange : ExitCode.Ok;
  return { unchanged, changed, wouldChange, failed, exitCode };
}
