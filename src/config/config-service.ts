/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * - 单一数据源：所有环境配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 延迟初始化：首次访问时读取
 * - 测试中可通过 resetForTesting() 重新读取
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const { concurrency } = ConfigService.getInstance();
 * ```
 */

import { availableParallelism } from 'node:os';
import { LogLevel } from '../utils/logger.js';

/** 并发上限的默认封顶值 */
const MAX_DEFAULT_CONCURRENCY = 8;

/**
 * 配置服务单例类。
 *
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 批量格式化的并发文件数（NUFMT_CONCURRENCY，默认为 CPU 数且不超过 8） */
  readonly concurrency: number;

  /** 是否禁用 ANSI 颜色（设置 NO_COLOR 即禁用） */
  readonly noColor: boolean;

  private constructor() {
    this.logLevel = ConfigService.parseLogLevel(process.env.LOG_LEVEL);
    this.concurrency = ConfigService.parseConcurrency(process.env.NUFMT_CONCURRENCY);
    this.noColor = process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '';
  }

  /**
   * 解析 LOG_LEVEL 环境变量，无法识别时回退到 INFO。
   */
  private static parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private static parseConcurrency(raw: string | undefined): number {
    const fallback = Math.max(1, Math.min(availableParallelism(), MAX_DEFAULT_CONCURRENCY));
    if (!raw) return fallback;
    const value = Number(raw);
    return Number.isInteger(value) && value > 0 ? value : fallback;
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
