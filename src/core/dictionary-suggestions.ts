/**
 * DictionarySuggestionEngine - 专业词典建议
 *
 * 目录来自 resources/dictionary-catalog.yaml。文档中出现某个目录条目的
 * 触发字段（两种写法均列出）时，建议加载该词典，按命中比例排序。
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { CatalogDictionary, DictionarySuggestion } from "../types";
import { CifModelError } from "../types";
import type { CifVersion } from "../types";
import { extractFieldNames } from "./cif-text-scanner";

export const BUNDLED_CATALOG_PATH = fileURLToPath(
  new URL("../../resources/dictionary-catalog.yaml", import.meta.url)
);

// ============================================================================
// 目录加载
// ============================================================================

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === "string");
}

function toCatalogEntry(value: unknown): CatalogDictionary | null {
  if (typeof value !== "object" || value === null) return null;
  const fields = new Map<string, unknown>(Object.entries(value));
  const key = fields.get("key");
  const name = fields.get("name");
  const description = fields.get("description");
  const url = fields.get("url");
  const dictType = fields.get("dictType");
  const localFile = fields.get("localFile") ?? null;
  const triggerFields = fields.get("triggerFields");

  if (
    typeof key !== "string" ||
    typeof name !== "string" ||
    typeof description !== "string" ||
    typeof url !== "string" ||
    typeof dictType !== "string" ||
    (localFile !== null && typeof localFile !== "string") ||
    !isStringArray(triggerFields)
  ) {
    return null;
  }
  return { key, name, description, url, dictType, localFile, triggerFields };
}

/**
 * 解析 YAML 目录文本
 *
 * @throws CifModelError E401_CONFIG_INVALID 结构不符
 */
export function parseDictionaryCatalog(text: string, source = "catalog"): CatalogDictionary[] {
  const document: unknown = YAML.parse(text, { uniqueKeys: true });
  if (typeof document !== "object" || document === null || !("dictionaries" in document)) {
    throw new CifModelError("E401_CONFIG_INVALID", `Dictionary catalog has no 'dictionaries' list: ${source}`);
  }
  const list = document.dictionaries;
  if (!Array.isArray(list)) {
    throw new CifModelError("E401_CONFIG_INVALID", `Dictionary catalog 'dictionaries' is not a list: ${source}`);
  }

  return list.map((item: unknown, index: number) => {
    const entry = toCatalogEntry(item);
    if (!entry) {
      throw new CifModelError(
        "E401_CONFIG_INVALID",
        `Invalid dictionary catalog entry #${index + 1}: ${source}`,
        { entry: item }
      );
    }
    return entry;
  });
}

/** 读取目录文件（默认内置目录） */
export function loadDictionaryCatalog(path: string = BUNDLED_CATALOG_PATH): CatalogDictionary[] {
  return parseDictionaryCatalog(readFileSync(path, "utf-8"), path);
}

// ============================================================================
// 建议引擎
// ============================================================================

export class DictionarySuggestionEngine {
  private readonly catalog: Map<string, CatalogDictionary>;

  constructor(catalog: readonly CatalogDictionary[] = loadDictionaryCatalog()) {
    this.catalog = new Map(catalog.map(entry => [entry.key, entry]));
  }

  /**
   * 分析文档并返回建议，按置信度降序
   *
   * @param loadedDictTypes 已加载词典的类别，用于标记 alreadyLoaded
   */
  analyze(content: string, loadedDictTypes: ReadonlySet<string> = new Set()): DictionarySuggestion[] {
    const present = new Set(extractFieldNames(content).map(name => name.toLowerCase()));
    const suggestions: DictionarySuggestion[] = [];

    for (const entry of this.catalog.values()) {
      const matched = entry.triggerFields.filter(field => present.has(field.toLowerCase()));
      if (matched.length === 0) continue;

      suggestions.push({
        key: entry.key,
        name: entry.name,
        description: entry.description,
        url: entry.url,
        dictType: entry.dictType,
        localFile: entry.localFile,
        triggerFields: matched,
        confidence: Math.min(1, (matched.length / entry.triggerFields.length) * 2),
        alreadyLoaded: loadedDictTypes.has(entry.dictType),
      });
    }

    return suggestions.sort((a, b) => b.confidence - a.confidence);
  }

  /** 可读摘要 */
  getSummary(suggestions: readonly DictionarySuggestion[]): string {
    if (suggestions.length === 0) {
      return "No specialized dictionaries suggested for this CIF file.";
    }

    let summary = "Suggested dictionaries based on CIF content:\n\n";
    suggestions.forEach((suggestion, index) => {
      summary += `${index + 1}. ${suggestion.name}\n`;
      summary += `   ${suggestion.description}\n`;
      summary += `   Confidence: ${(suggestion.confidence * 100).toFixed(1)}%\n`;
      summary += `   Triggered by fields: ${suggestion.triggerFields.slice(0, 3).join(", ")}\n`;
      if (suggestion.triggerFields.length > 3) {
        summary += `   (and ${suggestion.triggerFields.length - 3} more)\n`;
      }
      summary += "\n";
    });
    return summary;
  }

  /** 按文档格式筛选触发字段：CIF1 取无点写法，其余取点分写法 */
  getFormatAppropriateTriggers(format: CifVersion): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const entry of this.catalog.values()) {
      const triggers = entry.triggerFields.filter(field =>
        format === "CIF1" ? !field.includes(".") : field.includes(".")
      );
      if (triggers.length > 0) {
        result[entry.key] = triggers;
      }
    }
    return result;
  }

  /** 添加或覆盖目录条目 */
  addCustomSuggestion(entry: CatalogDictionary): void {
    this.catalog.set(entry.key, entry);
  }

  getCatalog(): CatalogDictionary[] {
    return [...this.catalog.values()];
  }
}
