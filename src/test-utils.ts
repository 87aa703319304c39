/**
 * 测试工具函数和辅助类型
 */

import * as fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from './data/logger';
import { DictionaryManager } from './core/dictionary-manager';
import type { DictionaryManagerOptions, DictionaryReader } from './core/dictionary-manager';
import type { PreferenceKey, Result, UserPreferenceStore } from './types';
import { err, ok } from './types';

// ============================================================================
// Fast-check Arbitraries (生成器)
// ============================================================================

/**
 * 生成非空字符串
 */
export const arbNonEmptyString = (): fc.Arbitrary<string> =>
  fc.string({ minLength: 1, maxLength: 100 });

/** 内置核心词典中有非弃用点分定义的旧写法字段 */
export const LEGACY_CORE_FIELDS = [
  '_cell_length_a',
  '_cell_length_b',
  '_cell_length_c',
  '_cell_angle_alpha',
  '_cell_volume',
  '_diffrn_ambient_temperature',
  '_chemical_formula_weight',
  '_exptl_crystal_colour',
  '_refine_ls_goodness_of_fit_ref',
  '_diffrn_reflns_number',
  '_audit_creation_method',
] as const;

/**
 * 生成不含空白、引号与 CIF 保留前缀的单个取值
 */
export const arbCifValue = (): fc.Arbitrary<string> =>
  fc.stringMatching(/^[A-Za-z0-9.()]{1,8}$/);

/**
 * 生成 CIF1 文档：一个数据块 + 若干互不相同的旧写法字段
 */
export const arbCif1Document = (): fc.Arbitrary<string> =>
  fc
    .uniqueArray(fc.constantFrom(...LEGACY_CORE_FIELDS), { minLength: 1, maxLength: LEGACY_CORE_FIELDS.length })
    .chain(fields =>
      fc.array(arbCifValue(), { minLength: fields.length, maxLength: fields.length }).map(values => [
        'data_test',
        ...fields.map((field, i) => `${field} ${values[i] ?? '?'}`),
        '',
      ].join('\n'))
    );

// ============================================================================
// 文件系统
// ============================================================================

/**
 * 创建临时测试目录
 */
export function createTempDir(label: string = 'test'): string {
  const tempDir = path.join(
    os.tmpdir(),
    `cif-${label}-${Date.now()}-${Math.random().toString(36).substring(7)}`
  );
  fs.mkdirSync(tempDir, { recursive: true });
  return tempDir;
}

/**
 * 清理临时目录
 */
export function cleanupTempDir(dirPath: string): void {
  if (fs.existsSync(dirPath)) {
    fs.rmSync(dirPath, { recursive: true, force: true });
  }
}

// ============================================================================
// 测试替身
// ============================================================================

/** 仅内存的 Logger */
export function createTestLogger(): Logger {
  return new Logger('test.log', null, 'debug');
}

/** 日志中记录的事件名（按顺序） */
export function logEvents(logger: Logger): string[] {
  return logger
    .getLogContent()
    .split('\n')
    .filter(line => line)
    .map(line => Logger.parseLogEntry(line)?.event ?? '');
}

/** 内存词典读取：路径 → 文本 */
export class MemoryDictionaryReader implements DictionaryReader {
  readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [filePath, content] of Object.entries(files)) {
      this.files.set(filePath, content);
    }
  }

  readText(filePath: string): string {
    const content = this.files.get(filePath);
    if (content === undefined) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return content;
  }

  size(filePath: string): number {
    return Buffer.byteLength(this.readText(filePath), 'utf-8');
  }
}

/** 内存偏好存储；failSaves 为 true 时保存失败 */
export class MemoryPreferenceStore implements UserPreferenceStore {
  readonly values: Record<PreferenceKey, string[]> = { allowedPrefixes: [], allowedFields: [] };
  failSaves = false;

  loadStringSet(key: PreferenceKey): string[] {
    return [...this.values[key]];
  }

  async saveStringSet(key: PreferenceKey, values: Iterable<string>): Promise<Result<void>> {
    if (this.failSaves) {
      return err('E303_DISK_FULL', 'save failed');
    }
    this.values[key] = [...values];
    return ok(undefined);
  }
}

/** 使用内置核心词典的 DictionaryManager */
export function createTestManager(
  overrides: Partial<DictionaryManagerOptions> = {}
): DictionaryManager {
  return new DictionaryManager({ logger: createTestLogger(), ...overrides });
}

// ============================================================================
// 词典文本构造
// ============================================================================

/** DDLm 测试定义 */
export interface TestDefinition {
  id: string;
  /** 别名；带 deprecated 日期的写在别名循环中 */
  aliases?: Array<string | { name: string; deprecated: string }>;
  replacedBy?: string;
  contents?: string;
}

/**
 * 构造最小 DDLm 词典文本
 */
export function buildDdlmDictionary(title: string, definitions: readonly TestDefinition[]): string {
  const lines = [
    '#\\#CIF_2.0',
    `data_${title.toUpperCase()}`,
    `    _dictionary.title             ${title}`,
    '    _dictionary.version           1.0.0',
    '    _dictionary.date              2024-01-01',
    '    _dictionary.ddl_conformance   4.2.0',
    '',
  ];

  const categories = new Set(definitions.map(d => d.id.replace(/^_/, '').split('.')[0] ?? ''));
  for (const category of categories) {
    lines.push(
      `save_${category.toUpperCase()}`,
      `    _definition.id                ${category.toUpperCase()}`,
      '    _definition.scope             Category',
      '    _definition.class             Loop',
      'save_',
      ''
    );
  }

  for (const definition of definitions) {
    const frame = definition.id.replace(/^_/, '');
    lines.push(`save_${frame}`, `    _definition.id                '${definition.id}'`);
    const aliases = definition.aliases ?? [];
    const simple = aliases.filter((alias): alias is string => typeof alias === 'string');
    const dated = aliases.filter(
      (alias): alias is { name: string; deprecated: string } => typeof alias !== 'string'
    );
    if (dated.length === 0 && simple.length <= 1) {
      for (const alias of simple) {
        lines.push(`    _alias.definition_id          '${alias}'`);
      }
    } else if (aliases.length > 0) {
      lines.push('    loop_', '      _alias.definition_id', '      _alias.deprecation_date');
      for (const alias of simple) lines.push(`         '${alias}'  .`);
      for (const alias of dated) lines.push(`         '${alias.name}'  ${alias.deprecated}`);
    }
    lines.push(`    _name.category_id             ${frame.split('.')[0] ?? ''}`);
    lines.push(`    _type.contents                ${definition.contents ?? 'Real'}`);
    if (definition.replacedBy !== undefined) {
      lines.push('    _definition_replaced.id       1', `    _definition_replaced.by       '${definition.replacedBy}'`);
    }
    lines.push('save_', '');
  }

  return lines.join('\n');
}
