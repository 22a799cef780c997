/**
 * nufmt 命令行：
 *
 * ```
 * nufmt [...files]            格式化并回写文件
 * nufmt --dry-run [...files]  只报告需要格式化的文件
 * nufmt --stdin               从标准输入读取，格式化结果写到标准输出
 * ```
 *
 * 退出码：0 成功；1 检查模式发现需要格式化的文件；2 参数、配置、路径或单个文件出错。
 */

import { readFileSync } from 'node:fs';
import { relative } from 'node:path';
import { cac } from 'cac';
import { loadConfig, type FormatConfig } from '../config/config.js';
import { ConfigService } from '../config/config-service.js';
import { formatOrError } from '../formatter.js';
import { findUp } from '../utils/paths.js';
import { createLogger } from '../utils/logger.js';
import { discoverFiles } from './files.js';
import { formatFiles, summarize, type FileResult } from './batch.js';
import { createCliLogger, type CliLogger, type CliOutput } from './utils/logger.js';
import { ExitCode, handleError, reportDiagnostic } from './utils/error-handler.js';

const cliLogger = createLogger('cli');

export interface CliIO {
  readonly output: CliOutput;
  /** Reads all of standard input */
  readStdin(): Promise<string>;
  readonly cwd: string;
  /** Colored output; defaults to the NO_COLOR setting */
  readonly color?: boolean;
}

interface CliRequest {
  readonly files: readonly string[];
  readonly dryRun: boolean;
  readonly stdin: boolean;
  readonly config: string | undefined;
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(findUp('package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * 解析命令行参数。`--help`/`--version` 由 cac 直接输出，返回 null。
 *
 * @throws {CACError} 未知选项或缺少选项值
 */
function parseArgs(argv: readonly string[]): CliRequest | null {
  const cli = cac('nufmt');
  let request: CliRequest | null = null;

  // 全局声明，布尔选项才不会吞掉其后的文件参数
  cli
    .option('--dry-run', 'Report files that would be reformatted without writing them', { default: false })
    .option('--stdin', 'Format standard input and write the result to standard output', { default: false })
    .option('-c, --config <path>', 'Configuration file (default: ./nufmt.nuon)');

  cli
    .command('[...files]', 'Format script files and directories')
    .action((files: unknown, options: unknown) => {
      const list = Array.isArray(files) ? files.map(String) : [];
      const opts = typeof options === 'object' && options !== null ? options : {};
      const config = 'config' in opts ? opts.config : undefined;
      request = {
        files: list,
        dryRun: 'dryRun' in opts && opts.dryRun === true,
        stdin: 'stdin' in opts && opts.stdin === true,
        config: typeof config === 'string' ? config : config === undefined ? undefined : String(config),
      };
    });

  cli.help();
  cli.version(readVersion());

  const parsed = cli.parse(['node', 'nufmt', ...argv], { run: false });
  if (parsed.options.help === true || parsed.options.version === true) return null;
  cli.runMatchedCommand();
  return request;
}

async function runStdin(io: CliIO, config: FormatConfig, logger: CliLogger, dryRun: boolean): Promise<ExitCode> {
  const source = await io.readStdin();
  const result = formatOrError(source, config);
  if (!result.ok) {
    reportDiagnostic(result.error, logger, source.replace(/\r\n?/g, '\n'));
    return ExitCode.Failure;
  }
  if (dryRun) return result.text === source ? ExitCode.Ok : ExitCode.WouldChange;
  logger.raw(result.text);
  return ExitCode.Ok;
}

function reportResults(results: readonly FileResult[], io: CliIO, logger: CliLogger, dryRun: boolean): ExitCode {
  for (const result of results) {
    const display = relative(io.cwd, result.file) || result.file;
    switch (result.status) {
      case 'would-change':
        logger.info(`would reformat ${display}`);
        break;
      case 'changed':
        logger.success(`reformatted ${display}`);
        break;
      case 'failed':
        reportDiagnostic(result.error, logger, result.source, display);
        break;
      case 'unchanged':
        break;
    }
  }

  const summary = summarize(results);
  if (dryRun) {
    logger.info(`${summary.wouldChange} file(s) would be reformatted, ${summary.unchanged} already formatted`);
  } else {
    logger.success(`${summary.changed} file(s) reformatted, ${summary.unchanged} unchanged`);
  }
  if (summary.failed > 0) logger.error(`${summary.failed} file(s) could not be formatted`);
  return summary.exitCode;
}

/**
 * 运行命令行，返回退出码。不调用 process.exit，便于在进程内测试。
 *
 * @param argv - 去掉 node 与脚本路径后的参数
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<ExitCode> {
  const logger = createCliLogger(io.output, { color: io.color ?? !ConfigService.getInstance().noColor });

  let request: CliRequest | null;
  try {
    request = parseArgs(argv);
  } catch (error) {
    return handleError(error, logger);
  }
  if (request === null) return ExitCode.Ok;
  cliLogger.debug('cli request', { files: request.files.length, dryRun: request.dryRun, stdin: request.stdin });

  if (request.stdin && request.files.length > 0) {
    logger.error('--stdin cannot be combined with file arguments');
    return ExitCode.Failure;
  }
  if (!request.stdin && request.files.length === 0) {
    logger.error('no input given; pass files or directories, or use --stdin');
    return ExitCode.Failure;
  }

  let config: FormatConfig;
  let files: string[] = [];
  try {
    config = loadConfig(request.config, io.cwd);
    if (!request.stdin) files = discoverFiles(request.files, config.exclude, io.cwd);
  } catch (error) {
    return handleError(error, logger);
  }

  if (request.stdin) return runStdin(io, config, logger, request.dryRun);

  if (files.length === 0) {
    logger.warn('no files detected');
    return ExitCode.Ok;
  }

  const results = await formatFiles(files, config, {
    mode: request.dryRun ? 'check' : 'write',
    concurrency: ConfigService.getInstance().concurrency,
  });
  return reportResults(results, io, logger, request.dryRun);
}
