/**
 * CLI 专用日志工具，提供带颜色的统一输出格式。
 *
 * 输出经由可注入的 CliOutput 写出，便于在测试中捕获。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Cyan = '\u001B[36m',
}

/** 标准输出与标准错误的写入端 */
export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliLogger {
  info(message: string): void;
  success(message: string): void;
  /** 输出形如 `⚠ warning: ...` */
  warn(message: string): void;
  /** 输出形如 `✗ error: ...` */
  error(message: string): void;
  /** 已带严重级别的诊断文本，写入 stderr */
  diagnostic(text: string): void;
  /** 原样写出，不加符号与换行 */
  raw(text: string): void;
}

export const processOutput: CliOutput = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
};

export function createCliLogger(output: CliOutput, options: { color: boolean }): CliLogger {
  // 使用 Unicode 符号：绿色✓ / 红色✗ / 黄色⚠
  const colorize = (symbol: string, message: string, color: AnsiColor): string =>
    options.color ? `${color}${symbol}${AnsiColor.Reset} ${message}\n` : `${symbol} ${message}\n`;

  return {
    info: message => output.stdout(colorize('ℹ', message, AnsiColor.Cyan)),
    success: message => output.stdout(colorize('✓', message, AnsiColor.Green)),
    warn: message => output.stdout(colorize('⚠', `warning: ${message}`, AnsiColor.Yellow)),
    error: message => output.stderr(colorize('✗', `error: ${message}`, AnsiColor.Red)),
    diagnostic: text => output.stderr(colorize('✗', text, AnsiColor.Red)),
    raw: text => output.stdout(text),
  };
}
