/**
 * DictionaryParser - 词典解析器基类
 *
 * 持有解析得到的索引并提供统一的查询 API；具体格式（DDLm / DDL1）
 * 只负责把文本拆成定义记录，再交给 registerField 建索引。
 *
 * 索引约定：
 * - 查询大小写不敏感，存储保留原始大小写（如 IT_number）
 * - 所有别名（含弃用别名）都进入 cif1ToCif2，弃用与否由 isFieldDeprecated 单独判断
 * - 被取代的定义，其别名映射到 replacementBy（若有）
 */

import type {
  DeprecationInfo,
  DictionaryFormat,
  DictionaryMetadata,
  FieldMappings,
  FieldMetadata,
} from "../types";
import { CifModelError, isAliasDeprecated } from "../types";
import { getFieldValueSpan, scanCifLines, splitCifLines } from "./cif-text-scanner";
import type { CifLine } from "./cif-text-scanner";

// ============================================================================
// 帧内标签读取
// ============================================================================

/** 循环表 */
export interface LoopTable {
  /** 小写标签 */
  tags: string[];
  rows: string[][];
}

/** 一个帧 / 数据块内的标签视图 */
export interface TagView {
  /** 单值标签（首次出现；值可在下一行或文本块中） */
  single(tag: string): string | null;
  /** 包含指定标签的第一个循环 */
  loop(tag: string): LoopTable | null;
  /** 该标签在单值与循环中的所有值 */
  values(tag: string): string[];
}

/** 去掉成对的单 / 双引号 */
export function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === "'" || first === '"') && trimmed.endsWith(first)) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

function tokenizeLine(line: string): string[] {
  const tokens: string[] = [];
  let position = 0;

  while (position < line.length) {
    const ch = line.charAt(position);
    if (/\s/.test(ch)) {
      position++;
      continue;
    }
    if (ch === "#") break;

    if (ch === "'" || ch === '"') {
      // 闭合引号后须为空白或行尾
      let end = position + 1;
      while (
        end < line.length &&
        !(line.charAt(end) === ch && (end + 1 >= line.length || /\s/.test(line.charAt(end + 1))))
      ) {
        end++;
      }
      tokens.push(line.slice(position + 1, end));
      position = end + 1;
      continue;
    }

    let end = position;
    while (end < line.length && !/\s/.test(line.charAt(end))) {
      end++;
    }
    tokens.push(line.slice(position, end));
    position = end;
  }

  return tokens;
}

/**
 * 把循环数据切分为值：引号字符串、分号文本块、裸值；跳过注释
 */
export function tokenizeCifValues(text: string): string[] {
  const tokens: string[] = [];
  const lines = splitCifLines(text);
  let index = 0;

  while (index < lines.length) {
    const line = lines[index] ?? "";
    if (line.startsWith(";")) {
      const body = [line.slice(1)];
      index++;
      while (index < lines.length && !(lines[index] ?? "").startsWith(";")) {
        body.push(lines[index] ?? "");
        index++;
      }
      index++;
      tokens.push(body.join("\n").trim());
      continue;
    }
    tokens.push(...tokenizeLine(line));
    index++;
  }

  return tokens;
}

function readLoops(lines: readonly CifLine[]): LoopTable[] {
  const byLoop = new Map<number, { tags: string[]; data: string[] }>();

  for (const line of lines) {
    if (line.loopId === null) continue;
    let entry = byLoop.get(line.loopId);
    if (!entry) {
      entry = { tags: [], data: [] };
      byLoop.set(line.loopId, entry);
    }
    if (line.kind === "loop_header" && line.fieldName) {
      entry.tags.push(line.fieldName.toLowerCase());
    } else if (line.kind === "loop_data" || line.kind === "text_block") {
      entry.data.push(line.raw);
    }
  }

  const tables: LoopTable[] = [];
  for (const { tags, data } of byLoop.values()) {
    if (tags.length === 0) continue;
    const values = tokenizeCifValues(data.join("\n"));
    const rows: string[][] = [];
    for (let i = 0; i + tags.length <= values.length; i += tags.length) {
      rows.push(values.slice(i, i + tags.length));
    }
    tables.push({ tags, rows });
  }
  return tables;
}

/**
 * 为一段帧文本建立标签视图（文本块内容不会被当作标签）
 */
export function createTagView(frameLines: readonly string[]): TagView {
  const lines = scanCifLines(frameLines.join("\n"));
  const loops = readLoops(lines);
  const singles = new Map<string, string | null>();

  lines.forEach((line, index) => {
    if (line.kind !== "field" || !line.fieldName) return;
    const key = line.fieldName.toLowerCase();
    if (singles.has(key)) return;
    const span = getFieldValueSpan(lines, index);
    singles.set(key, span.value === null ? null : unquote(span.value));
  });

  const loop = (tag: string): LoopTable | null =>
    loops.find(table => table.tags.includes(tag.toLowerCase())) ?? null;

  return {
    single: tag => singles.get(tag.toLowerCase()) ?? null,
    loop,
    values: tag => {
      const key = tag.toLowerCase();
      const result: string[] = [];
      const value = singles.get(key);
      if (value) result.push(value);
      for (const table of loops) {
        const column = table.tags.indexOf(key);
        if (column < 0) continue;
        for (const row of table.rows) {
          const cell = row[column];
          if (cell !== undefined) result.push(cell);
        }
      }
      return result;
    },
  };
}

/** 值为 "." 或 "?" 视为缺省 */
export function presentOrNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed === "" || trimmed === "." || trimmed === "?" ? null : trimmed;
}

// ============================================================================
// 基类
// ============================================================================

export abstract class DictionaryParser {
  readonly path: string;
  readonly content: string;
  abstract readonly format: DictionaryFormat;

  protected metadata: DictionaryMetadata = { title: null, version: null, date: null };

  private readonly fields = new Map<string, FieldMetadata>();
  private readonly aliasToDefinition = new Map<string, string>();
  private readonly knownFields = new Set<string>();
  private readonly deprecatedFields = new Set<string>();
  private readonly categories = new Set<string>();
  private readonly cif1ToCif2 = new Map<string, string>();
  private readonly cif2ToCif1 = new Map<string, string[]>();
  private parsed = false;

  constructor(path: string, content: string) {
    this.path = path;
    this.content = content;
  }

  /** 把文本拆成定义记录并调用 registerField / registerCategory */
  protected abstract parseContent(): void;

  /**
   * 解析并返回双向映射（首次调用后缓存）
   *
   * @throws CifModelError E111_DICTIONARY_EMPTY 没有任何字段映射
   */
  parse(): FieldMappings {
    if (!this.parsed) {
      this.reset();
      this.parseContent();
      if (this.cif1ToCif2.size === 0) {
        throw new CifModelError(
          "E111_DICTIONARY_EMPTY",
          `No field mappings found in dictionary: ${this.path}`,
          { path: this.path, format: this.format }
        );
      }
      this.parsed = true;
    }
    return { cif1ToCif2: this.cif1ToCif2, cif2ToCif1: this.cif2ToCif1 };
  }

  private reset(): void {
    this.fields.clear();
    this.aliasToDefinition.clear();
    this.knownFields.clear();
    this.deprecatedFields.clear();
    this.categories.clear();
    this.cif1ToCif2.clear();
    this.cif2ToCif1.clear();
  }

  // ==========================================================================
  // 索引构建
  // ==========================================================================

  /** 登记一个字段定义；同名定义先到先得 */
  protected registerField(meta: FieldMetadata): void {
    const definitionLower = meta.definitionId.toLowerCase();
    if (this.fields.has(definitionLower)) return;

    this.fields.set(definitionLower, meta);
    this.knownFields.add(definitionLower);
    this.aliasToDefinition.set(definitionLower, meta.definitionId);
    if (meta.isReplaced) {
      this.deprecatedFields.add(definitionLower);
    }

    const target = meta.isReplaced ? meta.replacementBy ?? meta.definitionId : meta.definitionId;
    const targetLower = target.toLowerCase();

    for (const alias of meta.aliases) {
      const aliasLower = alias.name.toLowerCase();
      this.knownFields.add(aliasLower);
      if (!this.aliasToDefinition.has(aliasLower)) {
        this.aliasToDefinition.set(aliasLower, meta.definitionId);
      }
      if (meta.isReplaced || isAliasDeprecated(alias)) {
        this.deprecatedFields.add(aliasLower);
      }
      if (aliasLower === definitionLower) continue;

      if (!this.cif1ToCif2.has(aliasLower)) {
        this.cif1ToCif2.set(aliasLower, target);
      }
      const list = this.cif2ToCif1.get(targetLower) ?? [];
      if (!list.includes(alias.name)) {
        list.push(alias.name);
      }
      this.cif2ToCif1.set(targetLower, list);
    }
  }

  protected registerCategory(categoryId: string): void {
    const normalized = categoryId.trim().replace(/^_/, "").toLowerCase();
    if (normalized) {
      this.categories.add(normalized);
    }
  }

  // ==========================================================================
  // 查询
  // ==========================================================================

  isKnownField(name: string): boolean {
    this.parse();
    return this.knownFields.has(name.toLowerCase());
  }

  isFieldDeprecated(name: string): boolean {
    this.parse();
    return this.deprecatedFields.has(name.toLowerCase());
  }

  getCif2Field(name: string): string | null {
    return this.parse().cif1ToCif2.get(name.toLowerCase()) ?? null;
  }

  /** 优先不带点的非弃用别名，其次任一非弃用别名 */
  getCif1Field(name: string): string | null {
    const aliases = this.parse().cif2ToCif1.get(name.toLowerCase());
    if (!aliases) return null;
    const usable = aliases.filter(alias => !this.deprecatedFields.has(alias.toLowerCase()));
    return usable.find(alias => !alias.includes(".")) ?? usable[0] ?? null;
  }

  getDefinitionId(name: string): string | null {
    this.parse();
    return this.aliasToDefinition.get(name.toLowerCase()) ?? null;
  }

  getFieldMetadata(name: string): FieldMetadata | null {
    const definitionId = this.getDefinitionId(name);
    if (definitionId === null) return null;
    return this.fields.get(definitionId.toLowerCase()) ?? null;
  }

  /** 被取代的定义返回 replacementBy；弃用别名返回其定义 */
  getReplacementField(name: string): string | null {
    const meta = this.getFieldMetadata(name);
    if (!meta) return null;
    if (meta.isReplaced) return meta.replacementBy;
    if (this.isFieldDeprecated(name) && meta.definitionId.toLowerCase() !== name.toLowerCase()) {
      return meta.definitionId;
    }
    return null;
  }

  getDeprecationInfo(name: string): DeprecationInfo | null {
    if (!this.isFieldDeprecated(name)) return null;
    const meta = this.getFieldMetadata(name);
    if (!meta) return null;
    const lower = name.toLowerCase();
    const alias = meta.aliases.find(a => a.name.toLowerCase() === lower);
    return {
      fieldName: name,
      definitionId: meta.definitionId,
      deprecationDate: alias && isAliasDeprecated(alias) ? alias.deprecationDate : null,
      replacementBy: meta.replacementBy,
      isReplaced: meta.isReplaced,
    };
  }

  getAllAliases(name: string): string[] {
    return this.getFieldMetadata(name)?.aliases.map(alias => alias.name) ?? [];
  }

  getCategories(): string[] {
    this.parse();
    return [...this.categories].sort();
  }

  getDictionaryMetadata(): DictionaryMetadata {
    this.parse();
    return { ...this.metadata };
  }

  getFieldCount(): number {
    this.parse();
    return this.fields.size;
  }

  getAllFieldNames(): string[] {
    this.parse();
    return [...this.fields.values()].map(meta => meta.definitionId);
  }

  hasFieldWithPrefix(prefix: string): boolean {
    this.parse();
    const lower = prefix.toLowerCase();
    for (const name of this.knownFields) {
      if (name.startsWith(lower)) return true;
    }
    return false;
  }
}
