import { afterEach, describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

const KEYS = ['LOG_LEVEL', 'NUFMT_CONCURRENCY', 'NO_COLOR'] as const;
const saved = new Map(KEYS.map(key => [key, process.env[key]]));

function setEnv(values: Partial<Record<(typeof KEYS)[number], string>>): ConfigService {
  for (const key of KEYS) {
    const value = values[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  ConfigService.resetForTesting();
  return ConfigService.getInstance();
}

describe('ConfigService', () => {
  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    ConfigService.resetForTesting();
  });

  test('未设置环境变量时使用默认值', () => {
    const config = setEnv({});
    assert.equal(config.logLevel, LogLevel.INFO);
    assert.equal(config.noColor, false);
    assert.ok(config.concurrency >= 1 && config.concurrency <= 8);
  });

  test('读取日志级别，大小写不敏感', () => {
    assert.equal(setEnv({ LOG_LEVEL: 'debug' }).logLevel, LogLevel.DEBUG);
    assert.equal(setEnv({ LOG_LEVEL: 'ERROR' }).logLevel, LogLevel.ERROR);
    assert.equal(setEnv({ LOG_LEVEL: 'verbose' }).logLevel, LogLevel.INFO);
  });

  test('读取并发数，非法值回退到默认值', () => {
    assert.equal(setEnv({ NUFMT_CONCURRENCY: '3' }).concurrency, 3);
    const fallback = setEnv({ NUFMT_CONCURRENCY: 'many' }).concurrency;
    assert.equal(setEnv({ NUFMT_CONCURRENCY: '0' }).concurrency, fallback);
  });

  test('设置 NO_COLOR 时禁用颜色', () => {
    assert.equal(setEnv({ NO_COLOR: '1' }).noColor, true);
    assert.equal(setEnv({ NO_COLOR: '' }).noColor, false);
  });

  test('单例在重置前保持不变', () => {
    const first = setEnv({ NUFMT_CONCURRENCY: '2' });
    process.env.NUFMT_CONCURRENCY = '5';
    assert.equal(ConfigService.getInstance(), first);
    assert.equal(ConfigService.getInstance().concurrency, 2);
  });
});
