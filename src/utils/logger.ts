import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

export class Logger {
  constructor(private readonly component: string, private readonly minLevel: LogLevel = LogLevel.INFO) {}

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    // 始终写 stderr，--stdin 模式下 stdout 只承载格式化结果
    console.error(JSON.stringify(entry));
  }
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

/** 耗时记录，DEBUG 级别，按调用方组件归类 */
export function logPerformance(metrics: PerformanceMetrics): void {
  createLogger(metrics.component).debug(`${metrics.operation} completed`, {
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
