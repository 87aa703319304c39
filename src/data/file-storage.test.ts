/**
 * FileStorage 测试
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs';
import * as path from 'path';
import { FileStorage } from './file-storage';
import { arbNonEmptyString, createTempDir, cleanupTempDir } from '../test-utils';

/**
 * 生成安全的文件路径（不包含特殊字符）
 */
const arbSafeFilePath = (): fc.Arbitrary<string> =>
  fc.tuple(
    fc.array(fc.stringMatching(/^[a-zA-Z0-9_-]+$/), { minLength: 1, maxLength: 3 }),
    fc.stringMatching(/^[a-zA-Z0-9_-]+$/),
    fc.constantFrom('.json', '.txt', '.dic')
  ).map(([dirs, filename, ext]) => {
    return [...dirs, filename + ext].join('/');
  });

/**
 * 生成测试数据（JSON 兼容）
 */
const arbTestData = (): fc.Arbitrary<unknown> =>
  fc.oneof(
    fc.string(),
    fc.integer(),
    fc.boolean(),
    fc.constant(null),
    fc.dictionary(fc.stringMatching(/^[a-z]{1,8}$/), fc.oneof(fc.string(), fc.integer(), fc.boolean(), fc.constant(null))),
    fc.array(fc.oneof(fc.string(), fc.integer(), fc.boolean(), fc.constant(null)))
  );

describe('FileStorage 本地存储约束', () => {
  let tempDir: string;
  let storage: FileStorage;

  beforeEach(() => {
    tempDir = createTempDir('fs');
    storage = new FileStorage({ dataDir: tempDir });
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it('属性测试：所有写入操作都在数据目录内', async () => {
    await fc.assert(
      fc.asyncProperty(arbSafeFilePath(), arbNonEmptyString(), async (filePath, content) => {
        const writeResult = await storage.write(filePath, content);
        expect(writeResult.ok).toBe(true);

        const fullPath = path.join(tempDir, filePath);
        expect(fs.existsSync(fullPath)).toBe(true);
        expect(path.normalize(fullPath).startsWith(path.normalize(tempDir))).toBe(true);

        await storage.delete(filePath);
      }),
      { numRuns: 50 }
    );
  });

  it('拒绝逃出数据目录的路径', async () => {
    const result = await storage.write('../outside.txt', 'x');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('E101_INVALID_INPUT');
    }
  });

  it('getDataDir() 返回配置的数据目录', () => {
    expect(storage.getDataDir()).toBe(tempDir);
  });
});

describe('FileStorage 原子写入', () => {
  let tempDir: string;
  let storage: FileStorage;

  beforeEach(() => {
    tempDir = createTempDir('fs');
    storage = new FileStorage({ dataDir: tempDir });
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it('属性测试：写入后读取应返回相同内容', async () => {
    await fc.assert(
      fc.asyncProperty(arbSafeFilePath(), arbNonEmptyString(), async (filePath, content) => {
        expect((await storage.write(filePath, content)).ok).toBe(true);

        const readResult = await storage.read(filePath);
        expect(readResult.ok).toBe(true);
        if (readResult.ok) {
          expect(readResult.value).toBe(content);
        }

        await storage.delete(filePath);
      }),
      { numRuns: 50 }
    );
  });

  it('属性测试：JSON 写入后读取应返回相同数据', async () => {
    await fc.assert(
      fc.asyncProperty(arbSafeFilePath(), arbTestData(), async (filePath, data) => {
        const jsonPath = filePath.replace(/\.[^.]+$/, '.json');

        expect((await storage.writeJSON(jsonPath, data)).ok).toBe(true);

        const readResult = await storage.readJSON(jsonPath);
        expect(readResult.ok).toBe(true);
        if (readResult.ok) {
          expect(readResult.value).toEqual(data);
        }

        await storage.delete(jsonPath);
      }),
      { numRuns: 50 }
    );
  });

  it('覆盖写入应替换原内容且不留临时文件', async () => {
    await storage.write('a/settings.json', 'first');
    await storage.write('a/settings.json', 'second');

    const readResult = await storage.read('a/settings.json');
    expect(readResult.ok && readResult.value).toBe('second');
    expect(fs.readdirSync(path.join(tempDir, 'a'))).toEqual(['settings.json']);
  });
});

describe('FileStorage 错误处理', () => {
  let tempDir: string;
  let storage: FileStorage;

  beforeEach(() => {
    tempDir = createTempDir('fs');
    storage = new FileStorage({ dataDir: tempDir });
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it('读取不存在的文件应返回 E301', async () => {
    const result = await storage.read('non-existent.txt');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('E301_FILE_NOT_FOUND');
    }
  });

  it('删除不存在的文件视为成功', async () => {
    const result = await storage.delete('non-existent.txt');
    expect(result.ok).toBe(true);
  });

  it('读取无效 JSON 应返回 E401', async () => {
    await storage.write('invalid.json', 'not valid json');

    const result = await storage.readJSON('invalid.json');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('E401_CONFIG_INVALID');
    }
  });

  it('ensureDir 创建嵌套目录', async () => {
    const result = await storage.ensureDir('logs/nested');
    expect(result.ok).toBe(true);
    expect(await storage.exists('logs/nested')).toBe(true);
  });
});
