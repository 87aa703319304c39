/**
 * Logger 组件测试
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Logger, LogStorage } from './logger';
import { FileStorage } from './file-storage';
import { CifModelError, Result, ok, err } from '../types';
import { createTempDir, cleanupTempDir } from '../test-utils';

/** 内存日志存储 */
class MemoryLogStorage implements LogStorage {
  readonly files = new Map<string, string>();

  async write(path: string, content: string): Promise<Result<void>> {
    this.files.set(path, content);
    return ok(undefined);
  }

  async read(path: string): Promise<Result<string>> {
    const content = this.files.get(path);
    return content === undefined ? err('E301_FILE_NOT_FOUND', path) : ok(content);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path);
  }
}

function entries(logger: Logger) {
  return logger
    .getLogContent()
    .split('\n')
    .filter(line => line)
    .map(line => Logger.parseLogEntry(line));
}

describe('Logger 基础功能', () => {
  it('记录结构化 JSON 日志行', () => {
    const logger = new Logger('test.log', null, 'debug');
    logger.info('DictionaryManager', '词典加载完成', { fieldCount: 12 });

    const [entry] = entries(logger);
    expect(entry?.level).toBe('info');
    expect(entry?.module).toBe('DictionaryManager');
    expect(entry?.event).toBe('INFO');
    expect(entry?.message).toBe('词典加载完成');
    expect(entry?.context).toEqual({ fieldCount: 12 });
  });

  it('context.event 作为事件类型并从上下文中移除', () => {
    const logger = new Logger('test.log', null, 'debug');
    logger.debug('FormatConverter', '转换完成', { event: 'CONVERSION_DONE' });

    const [entry] = entries(logger);
    expect(entry?.event).toBe('CONVERSION_DONE');
    expect(entry?.context).toBeUndefined();
  });

  it('CifModelError 附带错误码名称与修复建议', () => {
    const logger = new Logger('test.log', null, 'debug');
    logger.error(
      'DictionaryManager',
      '加载失败',
      new CifModelError('E111_DICTIONARY_EMPTY', 'no mappings')
    );

    const [entry] = entries(logger);
    expect(entry?.error?.code).toBe('E111_DICTIONARY_EMPTY');
    expect(entry?.error?.codeName).toBe('DICTIONARY_EMPTY');
    expect(entry?.error?.fixSuggestion).toContain('CIF 词典');
  });

  it('普通 Error 不带错误码', () => {
    const logger = new Logger('test.log', null, 'debug');
    logger.error('Test', 'boom', new Error('plain'));

    const [entry] = entries(logger);
    expect(entry?.error?.message).toBe('plain');
    expect(entry?.error?.code).toBeUndefined();
  });

  it('parseLogEntry 拒绝缺少字段的行', () => {
    expect(Logger.parseLogEntry('not json')).toBeNull();
    expect(Logger.parseLogEntry('{"level":"info"}')).toBeNull();
    expect(
      Logger.parseLogEntry(
        '{"timestamp":"t","level":"loud","module":"m","event":"e","message":"x"}'
      )
    ).toBeNull();
  });
});

describe('Logger 日志级别过滤', () => {
  it('minLevel=warn 时只记录 warn 和 error', () => {
    const logger = new Logger('test.log', null, 'warn');
    logger.debug('M', 'd');
    logger.info('M', 'i');
    logger.warn('M', 'w');
    logger.error('M', 'e');

    expect(entries(logger).map(e => e?.message)).toEqual(['w', 'e']);
  });

  it('动态修改日志级别', () => {
    const logger = new Logger('test.log', null, 'error');
    logger.info('M', 'hidden');
    logger.setLogLevel('info');
    logger.info('M', 'shown');

    expect(logger.getLogLevel()).toBe('info');
    expect(entries(logger).map(e => e?.message)).toEqual(['shown']);
  });
});

describe('Logger 循环日志', () => {
  it('超过大小限制时丢弃最旧的条目', () => {
    const logger = new Logger('test.log', null, 'debug', 600);
    for (let i = 0; i < 20; i++) {
      logger.info('M', `message-${i}`);
    }

    expect(logger.getCurrentSize()).toBeLessThanOrEqual(600);
    const messages = entries(logger).map(e => e?.message);
    expect(messages[messages.length - 1]).toBe('message-19');
    expect(messages).not.toContain('message-0');
  });

  it('clear() 清空缓冲区', () => {
    const logger = new Logger('test.log', null, 'debug');
    logger.info('M', 'x');
    logger.clear();

    expect(logger.getEntryCount()).toBe(0);
    expect(logger.getCurrentSize()).toBe(0);
  });
});

describe('Logger 持久化', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir('logger');
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it('flush 后日志写入存储', async () => {
    const storage = new MemoryLogStorage();
    const logger = new Logger('logs/app.log', storage, 'info');
    logger.info('M', 'first');
    logger.info('M', 'second');
    await logger.flush();

    const content = storage.files.get('logs/app.log') ?? '';
    expect(content.split('\n')).toHaveLength(2);
    expect(content).toContain('"message":"second"');
  });

  it('initialize 追加既有日志（跨会话）', async () => {
    const storage = new FileStorage({ dataDir: tempDir });
    const first = new Logger('logs/app.log', storage, 'info');
    await first.initialize();
    first.info('M', 'session-1');
    await first.flush();

    const second = new Logger('logs/app.log', storage, 'info');
    await second.initialize();
    second.info('M', 'session-2');
    await second.flush();

    expect(entries(second).map(e => e?.message)).toEqual(['session-1', 'session-2']);
  });
});
