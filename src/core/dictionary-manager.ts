/**
 * DictionaryManager - 多词典合并索引与统一查询
 *
 * 负责：
 * - 主词典 + 额外词典的加载、移除、激活（同一 dictType 至多一个激活）
 * - 合并索引：主词典优先，其后按加载顺序；键冲突时先到先得；脏标记惰性重建
 * - 统一查询：isKnownField / isFieldDeprecated / 双向等价名 / 现代替代名
 * - 文档级分析：版本检测、别名冲突检测与解决、取值提取
 * - 专业词典建议
 *
 * 查询未命中一律返回 null / false，不抛异常；加载失败抛出 CifModelError。
 */

import { readFileSync, statSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type {
  AvailableDictionary,
  CifVersion,
  ConflictResolutions,
  ConversionResult,
  ConversionTarget,
  DeprecationInfo,
  DictionaryInfo,
  DictionarySourceType,
  DictionarySuggestion,
  FieldConflicts,
  FieldMappings,
  FieldMetadata,
  FieldOccurrence,
  ILogger,
  MixedCifReport,
  Result,
} from "../types";
import { CifModelError, err, ok } from "../types";
import bundledCategories from "../../resources/known-categories.json";
import { mapFsErrorToErrorCode } from "../data/file-storage";
import type { DictionaryParser } from "./base-dictionary-parser";
import { Cif2ExtensionTable } from "./cif2-extensions";
import {
  detectLineEnding,
  getFieldValueSpan,
  isNamedLine,
  scanCifLines,
  splitDeprecatedSection,
} from "./cif-text-scanner";
import type { CifLine } from "./cif-text-scanner";
import { createDictionaryParser } from "./dictionary-format";
import { DictionarySuggestionEngine } from "./dictionary-suggestions";

const MODULE = "DictionaryManager";

export const BUNDLED_CORE_DICTIONARY_PATH = fileURLToPath(
  new URL("../../resources/dictionaries/cif_core_minimal.dic", import.meta.url)
);

export const CIF2_HEADER = "#\\#CIF_2.0";
export const CIF1_HEADER = "#\\#CIF_1.1";

// ============================================================================
// 读取接口
// ============================================================================

/** 词典文本读取（词典获取协作方） */
export interface DictionaryReader {
  readText(path: string): string;
  size(path: string): number;
}

function toFileError(error: unknown, path: string): CifModelError {
  return new CifModelError(
    mapFsErrorToErrorCode(error),
    `Cannot read dictionary file: ${path}`,
    { path, cause: error instanceof Error ? error.message : String(error) }
  );
}

/** 基于 node:fs 的默认实现 */
export const nodeDictionaryReader: DictionaryReader = {
  readText(path) {
    try {
      return readFileSync(path, "utf-8");
    } catch (error) {
      throw toFileError(error, path);
    }
  },
  size(path) {
    try {
      return statSync(path).size;
    } catch (error) {
      throw toFileError(error, path);
    }
  },
};

// ============================================================================
// 配置与内部结构
// ============================================================================

export interface DictionaryManagerOptions {
  /** 主词典路径；缺省使用内置核心词典 */
  primaryPath?: string;
  reader?: DictionaryReader;
  logger: ILogger;
  /** 永不视为弃用的字段 */
  neverDeprecatedFields?: Iterable<string>;
  extensions?: Cif2ExtensionTable;
  suggestionEngine?: DictionarySuggestionEngine;
  knownCategories?: readonly string[];
}

interface LoadedDictionary {
  info: DictionaryInfo;
  parser: DictionaryParser;
}

/** dictType 推导规则（标题 + 文件名） */
const DICT_TYPE_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/cif_core|core_dic/, "core"],
  [/cif_pow/, "powder"],
  [/cif_ms/, "modulated"],
  [/cif_mag/, "magnetic"],
  [/cif_twin/, "twinning"],
  [/cif_img/, "image"],
  [/cif_rho/, "density"],
  [/cif_sym/, "symmetry"],
];

function baseName(path: string): string {
  const withoutQuery = path.split(/[?#]/)[0] ?? path;
  const parts = withoutQuery.split(/[\\/]/).filter(part => part !== "");
  return parts[parts.length - 1] ?? path;
}

export function deriveDictType(title: string | null, fileName: string): string {
  const haystack = `${title ?? ""} ${fileName}`.toLowerCase();
  for (const [pattern, type] of DICT_TYPE_PATTERNS) {
    if (pattern.test(haystack)) return type;
  }
  return fileName.replace(/\.[^.]*$/, "").toLowerCase();
}

export function deriveProvenance(sourceType: DictionarySourceType, path: string): string {
  switch (sourceType) {
    case "bundled":
      return "official release";
    case "url":
      return /refs\/heads|\/main\/|\/master\//.test(path) ? "development" : "official release";
    default:
      return "local file";
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * 同一字段的另一种写法：点分 → 全下划线；下划线 → 在每个下划线处尝试点分
 */
export function notationCounterparts(name: string): string[] {
  if (name.includes(".")) {
    return [name.replace(/\./g, "_")];
  }
  const variants: string[] = [];
  for (let i = 1; i < name.length; i++) {
    if (name.charAt(i) === "_") {
      variants.push(`${name.slice(0, i)}.${name.slice(i + 1)}`);
    }
  }
  return variants;
}

function isQuoted(value: string): boolean {
  if (value.length < 2) return false;
  const first = value.charAt(0);
  return (first === "'" || first === '"') && value.endsWith(first);
}

/**
 * 按 CIF 规则格式化单行取值：空值写作 ?，含空白时加引号
 *
 * 同时含单双引号的值无法写成单行，返回 null。
 */
export function formatCifValue(value: string): string | null {
  const trimmed = value.trim();
  if (trimmed === "") return "?";
  if (/\s/.test(trimmed) && !isQuoted(trimmed) && !trimmed.startsWith('"""') && !trimmed.startsWith("'''")) {
    if (!trimmed.includes("'")) return `'${trimmed}'`;
    if (!trimmed.includes('"')) return `"${trimmed}"`;
    return null;
  }
  return trimmed;
}

/** 字段 + 取值的文本行；多行值与无法加引号的值写成分号文本块 */
export function formatFieldLines(indent: string, field: string, value: string): string[] {
  const inline = value.includes("\n") ? null : formatCifValue(value);
  if (inline === null) {
    return [`${indent}${field}`, ";", ...value.split("\n"), ";"];
  }
  return [`${indent}${field} ${inline}`];
}

// ============================================================================
// DictionaryManager
// ============================================================================

export class DictionaryManager {
  private readonly logger: ILogger;
  private readonly reader: DictionaryReader;
  private readonly extensions: Cif2ExtensionTable;
  private readonly suggestionEngine: DictionarySuggestionEngine;
  private readonly bundledCategories: readonly string[];
  private readonly neverDeprecated: Set<string>;
  private readonly dictionaries: LoadedDictionary[] = [];
  private readonly listeners = new Set<() => void>();

  private merged: FieldMappings = { cif1ToCif2: new Map(), cif2ToCif1: new Map() };
  private dirty = true;

  /**
   * @throws CifModelError 主词典无法读取、格式不受支持或为空
   */
  constructor(options: DictionaryManagerOptions) {
    this.logger = options.logger;
    this.reader = options.reader ?? nodeDictionaryReader;
    this.extensions = options.extensions ?? new Cif2ExtensionTable();
    this.suggestionEngine = options.suggestionEngine ?? new DictionarySuggestionEngine();
    this.bundledCategories = options.knownCategories ?? bundledCategories.categories;
    this.neverDeprecated = new Set(
      [...(options.neverDeprecatedFields ?? [])].map(name => name.toLowerCase())
    );

    if (options.primaryPath) {
      const path = options.primaryPath;
      this.loadDictionary(path, this.reader.readText(path), this.reader.size(path), "file", true);
    } else {
      const path = BUNDLED_CORE_DICTIONARY_PATH;
      const content = nodeDictionaryReader.readText(path);
      this.loadDictionary(path, content, Buffer.byteLength(content, "utf-8"), "bundled", true);
    }
  }

  // ==========================================================================
  // 词典集合
  // ==========================================================================

  /**
   * 从文件加载额外词典；加载后激活并停用同类词典
   *
   * @throws CifModelError 读取失败 / 同名已加载 / 格式不受支持 / 词典为空
   */
  addDictionary(path: string): DictionaryInfo {
    this.assertNotLoaded(path);
    const content = this.reader.readText(path);
    return this.loadDictionary(path, content, this.reader.size(path), "file", false);
  }

  /**
   * 加载由获取方下载好的词典文本
   *
   * @throws CifModelError 同名已加载 / 格式不受支持 / 词典为空
   */
  addDictionaryFromUrl(url: string, content: string): DictionaryInfo {
    this.assertNotLoaded(url);
    return this.loadDictionary(url, content, Buffer.byteLength(content, "utf-8"), "url", false);
  }

  removeDictionary(id: string): Result<void> {
    const index = this.findIndex(id);
    const entry = index >= 0 ? this.dictionaries[index] : undefined;
    if (!entry) {
      return err("E311_NOT_FOUND", `Dictionary not loaded: ${id}`);
    }
    if (entry.info.isPrimary) {
      return err("E310_INVALID_STATE", `Cannot remove the primary dictionary: ${id}`);
    }

    this.dictionaries.splice(index, 1);
    this.invalidate();
    this.logger.info(MODULE, `已移除词典 ${entry.info.name}`, {
      event: "DICTIONARY_REMOVED",
      id: entry.info.id,
    });
    return ok(undefined);
  }

  /** 激活时停用同一 dictType 的其它词典（含主词典） */
  setDictionaryActive(id: string, active: boolean): Result<void> {
    const entry = this.dictionaries[this.findIndex(id)];
    if (!entry) {
      return err("E311_NOT_FOUND", `Dictionary not loaded: ${id}`);
    }

    if (active) {
      this.deactivateSiblings(entry.info);
    }
    entry.info.isActive = active;
    this.invalidate();
    this.logger.info(MODULE, `${active ? "已激活" : "已停用"}词典 ${entry.info.name}`, {
      event: "DICTIONARY_ACTIVATION_CHANGED",
      id: entry.info.id,
      dictType: entry.info.dictType,
      active,
    });
    return ok(undefined);
  }

  getDictionaryInfo(): DictionaryInfo[] {
    return this.dictionaries.map(({ info }) => ({ ...info }));
  }

  getActiveDictionaries(): DictionaryInfo[] {
    return this.getDictionaryInfo().filter(info => info.isActive);
  }

  /** 目录中的专业词典，并标记同类词典是否已加载 */
  getAvailableDictionaries(): AvailableDictionary[] {
    const loadedTypes = this.loadedDictTypes();
    return this.suggestionEngine
      .getCatalog()
      .map(entry => ({ ...entry, alreadyLoaded: loadedTypes.has(entry.dictType) }));
  }

  suggestDictionariesForCif(content: string): DictionarySuggestion[] {
    return this.suggestionEngine.analyze(content, this.loadedDictTypes());
  }

  /** 订阅词典集合变化；返回取消订阅函数 */
  onChange(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private assertNotLoaded(path: string): void {
    const name = baseName(path);
    if (this.findIndex(name) >= 0) {
      throw new CifModelError(
        "E320_DICTIONARY_CONFLICT",
        `A dictionary named '${name}' is already loaded`,
        { path }
      );
    }
  }

  private findIndex(id: string): number {
    const lower = id.toLowerCase();
    return this.dictionaries.findIndex(({ info }) => info.id.toLowerCase() === lower);
  }

  private loadedDictTypes(): Set<string> {
    return new Set(this.dictionaries.map(({ info }) => info.dictType));
  }

  private deactivateSiblings(target: DictionaryInfo): void {
    for (const { info } of this.dictionaries) {
      if (info !== target && info.dictType === target.dictType) {
        info.isActive = false;
      }
    }
  }

  private loadDictionary(
    path: string,
    content: string,
    sizeBytes: number,
    sourceType: DictionarySourceType,
    isPrimary: boolean
  ): DictionaryInfo {
    const started = Date.now();
    const name = baseName(path);

    let parser: DictionaryParser;
    try {
      parser = createDictionaryParser(path, content);
      parser.parse();
    } catch (error) {
      const failure =
        error instanceof CifModelError
          ? error
          : new CifModelError(
              "E112_DICTIONARY_PARSE_FAILED",
              `Failed to parse dictionary: ${path}`,
              { path, cause: error instanceof Error ? error.message : String(error) }
            );
      this.logger.error(MODULE, `词典加载失败：${name}`, failure, {
        event: "DICTIONARY_LOAD_FAILED",
        path,
      });
      throw failure;
    }

    const metadata = parser.getDictionaryMetadata();
    const info: DictionaryInfo = {
      id: name,
      name,
      path,
      sourceType,
      sizeBytes,
      fieldCount: parser.getFieldCount(),
      format: parser.format,
      title: metadata.title,
      version: metadata.version,
      date: metadata.date,
      provenance: deriveProvenance(sourceType, path),
      dictType: deriveDictType(metadata.title, name),
      isActive: true,
      isPrimary,
      loadedAt: new Date().toISOString(),
    };

    this.dictionaries.push({ info, parser });
    if (!isPrimary) {
      this.deactivateSiblings(info);
    }
    this.invalidate();

    this.logger.info(MODULE, `已加载词典 ${name}`, {
      event: "DICTIONARY_LOADED",
      format: info.format,
      dictType: info.dictType,
      fieldCount: info.fieldCount,
      primary: isPrimary,
      durationMs: Date.now() - started,
    });
    return info;
  }

  private invalidate(): void {
    this.dirty = true;
    for (const listener of this.listeners) {
      listener();
    }
  }

  // ==========================================================================
  // 合并索引
  // ==========================================================================

  private activeParsers(): DictionaryParser[] {
    return this.dictionaries.filter(({ info }) => info.isActive).map(({ parser }) => parser);
  }

  /** 弃用判断所用的词典：主词典激活时用主词典，否则第一个激活的词典 */
  private deprecationParser(): DictionaryParser | null {
    const primary = this.dictionaries.find(({ info }) => info.isPrimary);
    if (primary?.info.isActive) return primary.parser;
    return this.activeParsers()[0] ?? null;
  }

  private ensureIndex(): FieldMappings {
    if (!this.dirty) return this.merged;

    const started = Date.now();
    const cif1ToCif2 = new Map<string, string>();
    const cif2ToCif1 = new Map<string, string[]>();

    for (const parser of this.activeParsers()) {
      const mappings = parser.parse();
      for (const [alias, canonical] of mappings.cif1ToCif2) {
        if (!cif1ToCif2.has(alias)) cif1ToCif2.set(alias, canonical);
      }
      for (const [canonical, aliases] of mappings.cif2ToCif1) {
        if (!cif2ToCif1.has(canonical)) cif2ToCif1.set(canonical, [...aliases]);
      }
    }

    this.merged = { cif1ToCif2, cif2ToCif1 };
    this.dirty = false;
    this.logger.debug(MODULE, "合并索引已重建", {
      event: "INDEX_REBUILT",
      aliases: cif1ToCif2.size,
      canonicals: cif2ToCif1.size,
      durationMs: Date.now() - started,
    });
    return this.merged;
  }

  /** 合并后的双向映射（只读视图） */
  getMergedMappings(): FieldMappings {
    return this.ensureIndex();
  }

  // ==========================================================================
  // 字段查询
  // ==========================================================================

  isKnownField(name: string): boolean {
    if (!name) return false;
    const index = this.ensureIndex();
    const inIndex = (candidate: string): boolean => {
      const lower = candidate.toLowerCase();
      return index.cif1ToCif2.has(lower) || index.cif2ToCif1.has(lower);
    };

    if (inIndex(name)) return true;
    if (notationCounterparts(name).some(inIndex)) return true;
    if (this.activeParsers().some(parser => parser.isKnownField(name))) return true;
    if (this.extensions.isExtension(name)) return true;
    return this.searchPrimaryContent(name);
  }

  /** 在主词典原文中查找 _definition.id 或 save_ 帧 */
  private searchPrimaryContent(name: string): boolean {
    const primary = this.dictionaries.find(({ info }) => info.isPrimary);
    if (!primary) return false;
    const escaped = escapeRegExp(name);
    const definition = new RegExp(`_definition\\.id\\s+['"]?${escaped}['"]?(\\s|$)`, "im");
    const frame = new RegExp(`^\\s*save_${escapeRegExp(name.replace(/^_/, ""))}\\s*$`, "im");
    return definition.test(primary.parser.content) || frame.test(primary.parser.content);
  }

  isFieldDeprecated(name: string): boolean {
    if (!name || this.neverDeprecated.has(name.toLowerCase())) return false;
    return this.deprecationParser()?.isFieldDeprecated(name) ?? false;
  }

  getCif2Equivalent(name: string): string | null {
    if (!name) return null;
    const lower = name.toLowerCase();
    const index = this.ensureIndex();

    const direct = index.cif1ToCif2.get(lower);
    if (direct) return direct;

    const parsers = this.activeParsers();
    if (index.cif2ToCif1.has(lower)) {
      for (const parser of parsers) {
        const definitionId = parser.getDefinitionId(name);
        if (definitionId && definitionId.toLowerCase() === lower) return definitionId;
      }
      return name;
    }

    for (const parser of parsers) {
      const definitionId = parser.getDefinitionId(name);
      if (definitionId && definitionId.toLowerCase() === lower) return definitionId;
    }

    return this.extensions.getCif2(name);
  }

  /** 优先无点的非弃用别名 */
  getCif1Equivalent(name: string): string | null {
    if (!name) return null;
    const aliases = this.ensureIndex().cif2ToCif1.get(name.toLowerCase());
    if (aliases && aliases.length > 0) {
      const usable = aliases.filter(alias => !this.isFieldDeprecated(alias));
      return (
        usable.find(alias => !alias.includes(".")) ??
        aliases.find(alias => !alias.includes(".")) ??
        usable[0] ??
        aliases[0] ??
        null
      );
    }
    return this.extensions.getCif1(name);
  }

  getModernReplacement(name: string): string | null {
    if (!name) return null;
    const meta = this.getFieldMetadata(name);
    if (meta?.isReplaced && meta.replacementBy) {
      return meta.replacementBy;
    }
    if (this.isFieldDeprecated(name)) {
      const canonical = this.getCif2Equivalent(name);
      if (
        canonical &&
        canonical.toLowerCase() !== name.toLowerCase() &&
        !this.isFieldDeprecated(canonical)
      ) {
        return canonical;
      }
    }
    return null;
  }

  /**
   * 按大小写 / 写法变体查找最佳的非弃用等价名
   */
  getModernEquivalent(name: string, preferFormat: ConversionTarget = "CIF2"): string | null {
    if (!name) return null;
    const variations = [...new Set([name, name.toLowerCase(), ...notationCounterparts(name)])];

    for (const variation of variations) {
      // 变体必须能解析到具体定义，不能只靠写法互换“已知”
      const candidate = this.getModernReplacement(variation) ?? this.getCif2Equivalent(variation);
      if (!candidate || this.isFieldDeprecated(candidate)) continue;

      if (preferFormat === "CIF1") {
        const legacy = this.getCif1Equivalent(candidate);
        if (legacy && !this.isFieldDeprecated(legacy)) return legacy;
      }
      return candidate;
    }
    return null;
  }

  getFieldMetadata(name: string): FieldMetadata | null {
    for (const parser of this.activeParsers()) {
      const meta = parser.getFieldMetadata(name);
      if (meta) return meta;
    }
    return null;
  }

  getDeprecationInfo(name: string): DeprecationInfo | null {
    if (!this.isFieldDeprecated(name)) return null;
    return this.deprecationParser()?.getDeprecationInfo(name) ?? null;
  }

  getAllAliases(name: string): string[] {
    for (const parser of this.activeParsers()) {
      const aliases = parser.getAllAliases(name);
      if (aliases.length > 0) return aliases;
    }
    return [];
  }

  /** 仅靠 CIF2-only 手工映射才能转换的字段 */
  isCif2OnlyExtension(name: string): boolean {
    return this.extensions.isExtension(name);
  }

  hasFieldWithPrefix(prefix: string): boolean {
    return this.activeParsers().some(parser => parser.hasFieldWithPrefix(prefix));
  }

  /** 内置类别表与各激活词典的类别并集 */
  getKnownCategories(): string[] {
    const categories = new Set(this.bundledCategories.map(category => category.toLowerCase()));
    for (const parser of this.activeParsers()) {
      for (const category of parser.getCategories()) {
        categories.add(category);
      }
    }
    return [...categories].sort();
  }

  // ==========================================================================
  // 文档分析
  // ==========================================================================

  /**
   * 检测文档版本：前 5 行的版本标记优先，否则按字段写法判断
   */
  detectCifVersion(content: string): CifVersion {
    const trimmed = content.trim();
    if (!trimmed) return "UNKNOWN";

    for (const line of trimmed.split("\n").slice(0, 5)) {
      const text = line.trim();
      if (text.startsWith(CIF2_HEADER)) return "CIF2";
      if (text.startsWith(CIF1_HEADER)) return "CIF1";
    }

    let dotted = false;
    let undotted = false;
    for (const line of this.bodyFieldLines(trimmed)) {
      if (line.fieldName?.includes(".")) {
        dotted = true;
      } else {
        undotted = true;
      }
      if (dotted && undotted) return "MIXED";
    }
    if (dotted) return "CIF2";
    if (undotted) return "CIF1";
    return "UNKNOWN";
  }

  /** 弃用区段之前、文本块之外的字段行 */
  private bodyFieldLines(content: string): CifLine[] {
    const { bodyLines } = splitDeprecatedSection(content);
    return scanCifLines(bodyLines.join("\n")).filter(isNamedLine);
  }

  /** 冲突分组键：规范名，未知字段用自身 */
  private conflictKey(name: string): string {
    return this.getCif2Equivalent(name) ?? name;
  }

  /**
   * 检测别名 / 重复冲突：规范名 → 出现的拼写
   *
   * 多种拼写时列出各拼写（首次出现顺序）；同一拼写重复时列出 N 次。
   * 弃用字段不参与冲突检测。
   */
  detectFieldAliasesInCif(content: string): FieldConflicts {
    const groups = new Map<string, { canonical: string; spellings: string[] }>();

    for (const line of this.bodyFieldLines(content)) {
      const name = line.fieldName;
      if (!name || this.isFieldDeprecated(name)) continue;
      const canonical = this.conflictKey(name);
      const key = canonical.toLowerCase();
      const group = groups.get(key) ?? { canonical, spellings: [] };
      group.spellings.push(name);
      groups.set(key, group);
    }

    const conflicts: FieldConflicts = {};
    for (const { canonical, spellings } of groups.values()) {
      const distinct = [...new Set(spellings)];
      if (distinct.length > 1) {
        conflicts[canonical] = distinct;
      } else if (spellings.length > 1) {
        conflicts[canonical] = spellings;
      }
    }
    return conflicts;
  }

  /**
   * 应用用户的冲突选择
   *
   * 简单字段：首次出现处替换为所选字段与取值，其余出现删除。
   * 循环字段：首个表头改名，其余表头与简单出现删除，数据行不动。
   */
  applyFieldConflictResolutions(content: string, resolutions: ConflictResolutions): ConversionResult {
    const eol = detectLineEnding(content);
    let current = content;
    const changes: string[] = [];

    for (const [canonical, { field, value }] of Object.entries(resolutions)) {
      const key = canonical.toLowerCase();
      const { bodyLines, sectionLines, trailingLines } = splitDeprecatedSection(current);
      const lines = scanCifLines(bodyLines.join("\n"));
      const matches = lines.filter(
        line =>
          isNamedLine(line) &&
          line.fieldName !== null &&
          !this.isFieldDeprecated(line.fieldName) &&
          this.conflictKey(line.fieldName).toLowerCase() === key
      );
      if (matches.length === 0) continue;

      const replaced = new Map<number, string[]>();
      const removed = new Set<number>();
      const removeSpan = (line: CifLine): void => {
        const span = getFieldValueSpan(lines, line.index);
        for (let i = span.start; i <= span.end; i++) removed.add(i);
        changes.push(`Removed ${line.fieldName ?? ""} (line ${line.index + 1})`);
      };

      const headers = matches.filter(line => line.kind === "loop_header");
      const simples = matches.filter(line => line.kind === "field");

      const [firstHeader, ...otherHeaders] = headers;
      if (firstHeader) {
        replaced.set(firstHeader.index, [`${firstHeader.indent}${field}${firstHeader.rest}`]);
        changes.push(`Resolved ${canonical}: loop header ${firstHeader.fieldName ?? ""} → ${field}`);
        for (const header of otherHeaders) {
          removed.add(header.index);
          changes.push(`Removed duplicate loop header ${header.fieldName ?? ""} (line ${header.index + 1})`);
        }
        simples.forEach(removeSpan);
      } else {
        const [first, ...others] = simples;
        if (!first) continue;
        const span = getFieldValueSpan(lines, first.index);
        replaced.set(span.start, formatFieldLines(first.indent, field, value));
        for (let i = span.start + 1; i <= span.end; i++) removed.add(i);
        changes.push(`Resolved ${canonical}: kept ${field} (line ${first.index + 1})`);
        others.forEach(removeSpan);
      }

      const output: string[] = [];
      for (const line of lines) {
        const replacement = replaced.get(line.index);
        if (replacement) {
          output.push(...replacement);
        } else if (!removed.has(line.index)) {
          output.push(line.raw);
        }
      }
      current = [...output, ...sectionLines, ...trailingLines].join(eol);
    }

    return { content: current, changes };
  }

  /** 文档中每个字段出现的位置与取值 */
  getFieldOccurrences(content: string): FieldOccurrence[] {
    const lines = scanCifLines(content);
    return lines.filter(isNamedLine).map(line => ({
      fieldName: line.fieldName ?? "",
      lineNumber: line.index + 1,
      value: line.kind === "field" ? getFieldValueSpan(lines, line.index).value : null,
      inLoop: line.kind === "loop_header",
    }));
  }

  /** 指定字段（大小写不敏感）在文档中各简单出现的取值 */
  getFieldValues(content: string, names: readonly string[]): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    const byLower = new Map(names.map(name => [name.toLowerCase(), name]));
    for (const name of names) result[name] = [];

    for (const occurrence of this.getFieldOccurrences(content)) {
      const key = byLower.get(occurrence.fieldName.toLowerCase());
      if (key !== undefined && occurrence.value !== null) {
        result[key]?.push(occurrence.value);
      }
    }
    return result;
  }

  /** 混合格式文档的问题与建议 */
  validateMixedCif(content: string): MixedCifReport {
    const version = this.detectCifVersion(content);
    const issues: string[] = [];
    const suggestions: string[] = [];

    if (version === "MIXED") {
      const names = scanCifLines(content)
        .filter(isNamedLine)
        .map(line => line.fieldName ?? "");
      const cif2Count = names.filter(name => name.includes(".")).length;
      const cif1Count = names.length - cif2Count;

      issues.push("Mixed CIF1/CIF2 format detected");
      issues.push(`Found ${cif1Count} CIF1-style fields and ${cif2Count} CIF2-style fields`);
      suggestions.push("Convert to consistent CIF2 format");
      suggestions.push("Update deprecated field names to modern equivalents");
    }

    return {
      version,
      isValid: version === "CIF1" || version === "CIF2",
      issues,
      suggestions,
    };
  }
}
