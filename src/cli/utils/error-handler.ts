import { DiagnosticError, formatDiagnostic } from '../../diagnostics/diagnostics.js';
import type { CliLogger } from './logger.js';

/** 0 = 成功，1 = 检查模式发现需要格式化的文件，2 = 出错 */
export type ExitCode = 0 | 1 | 2;

export const ExitCode = {
  Ok: 0,
  WouldChange: 1,
  Failure: 2,
} as const satisfies Record<string, ExitCode>;

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * 打印单个诊断；有源文本时附带出错行与插入符。
 *
 * @param file - 诊断所属文件的显示路径
 */
export function reportDiagnostic(error: DiagnosticError, logger: CliLogger, source?: string, file?: string): void {
  const diagnostic = file !== undefined ? { ...error.diagnostic, file } : error.diagnostic;
  logger.diagnostic(formatDiagnostic(diagnostic, source));
}

function handleNodeError(error: NodeJS.ErrnoException, logger: CliLogger): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logger.error(`permission denied: ${error.message}`);
      break;
    case 'ENOENT':
      logger.error(`no such file: ${error.message}`);
      break;
    default:
      logger.error(`file system error (${code}): ${error.message}`);
      break;
  }
}

/**
 * 处理中止整个运行的错误（配置错误、参数错误、路径不存在等），返回退出码。
 */
export function handleError(error: unknown, logger: CliLogger): ExitCode {
  if (error instanceof DiagnosticError) {
    reportDiagnostic(error, logger);
  } else if (isNodeError(error)) {
    handleNodeError(error, logger);
  } else if (error instanceof Error) {
    logger.error(error.message);
  } else {
    logger.error('unknown failure');
  }
  return ExitCode.Failure;
}
