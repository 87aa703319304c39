/**
 * PrefixRegistry - 已注册的本地数据名前缀
 *
 * 前缀表来自 resources/registered-prefixes.json；数据目录下同名文件
 * 结构有效时整体替换内置表。
 */

import type { ILogger } from "../types";
import { CifModelError } from "../types";
import bundledTable from "../../resources/registered-prefixes.json";
import type { FileStorage } from "../data/file-storage";
import { USER_PREFIXES_FILE } from "../data/file-storage";

const MODULE = "PrefixRegistry";

export const BUNDLED_PREFIX_SOURCE = "bundled";

/** 单个前缀的说明 */
export interface PrefixInfo {
  description: string;
  suggestedDictionary: string | null;
}

/** 前缀表 */
export interface PrefixTable {
  prefixes: Record<string, PrefixInfo>;
  /** 类别模式（如 pd_）→ 建议词典 */
  categoryDictionarySuggestions: Record<string, string>;
}

// ============================================================================
// 结构校验
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPrefixInfo(value: unknown): PrefixInfo | null {
  if (!isRecord(value)) return null;
  const { description, suggestedDictionary = null } = value;
  if (typeof description !== "string") return null;
  if (suggestedDictionary !== null && typeof suggestedDictionary !== "string") return null;
  return { description, suggestedDictionary };
}

/**
 * 校验并规整前缀表；结构不符时返回 null
 */
export function parsePrefixTable(value: unknown): PrefixTable | null {
  if (!isRecord(value) || !isRecord(value.prefixes)) return null;

  const prefixes: Record<string, PrefixInfo> = {};
  for (const [name, raw] of Object.entries(value.prefixes)) {
    const info = toPrefixInfo(raw);
    if (!info) return null;
    prefixes[name] = info;
  }

  const categoryDictionarySuggestions: Record<string, string> = {};
  const suggestions = value.categoryDictionarySuggestions ?? {};
  if (!isRecord(suggestions)) return null;
  for (const [pattern, dictionary] of Object.entries(suggestions)) {
    if (typeof dictionary !== "string") return null;
    categoryDictionarySuggestions[pattern] = dictionary;
  }

  return { prefixes, categoryDictionarySuggestions };
}

function bundledPrefixTable(): PrefixTable {
  const table = parsePrefixTable(bundledTable);
  if (!table) {
    throw new CifModelError("E500_INTERNAL_ERROR", "Bundled prefix table is malformed");
  }
  return table;
}

// ============================================================================
// 注册表
// ============================================================================

export class PrefixRegistry {
  private readonly table: PrefixTable;
  private readonly source: string;
  /** 小写前缀 → 原写法 */
  private readonly lowerNames: Map<string, string>;

  constructor(table: PrefixTable = bundledPrefixTable(), source: string = BUNDLED_PREFIX_SOURCE) {
    this.table = table;
    this.source = source;
    this.lowerNames = new Map(Object.keys(table.prefixes).map(name => [name.toLowerCase(), name]));
  }

  /**
   * 优先使用数据目录中的用户前缀表，缺失或无效时回退到内置表
   */
  static async load(storage: FileStorage, logger: ILogger): Promise<PrefixRegistry> {
    if (!(await storage.exists(USER_PREFIXES_FILE))) {
      return new PrefixRegistry();
    }

    const readResult = await storage.readJSON(USER_PREFIXES_FILE);
    if (!readResult.ok) {
      logger.warn(MODULE, "用户前缀表读取失败，使用内置前缀表", {
        event: "PREFIX_TABLE_FALLBACK",
        error: readResult.error,
      });
      return new PrefixRegistry();
    }

    const table = parsePrefixTable(readResult.value);
    if (!table) {
      logger.warn(MODULE, "用户前缀表结构无效，使用内置前缀表", {
        event: "PREFIX_TABLE_FALLBACK",
        path: USER_PREFIXES_FILE,
      });
      return new PrefixRegistry();
    }

    logger.info(MODULE, "已加载用户前缀表", {
      event: "PREFIX_TABLE_LOADED",
      count: Object.keys(table.prefixes).length,
    });
    return new PrefixRegistry(table, storage.resolvePath(USER_PREFIXES_FILE));
  }

  /** 前缀表来源：bundled 或用户文件路径 */
  getSource(): string {
    return this.source;
  }

  getRegisteredPrefixes(): string[] {
    return Object.keys(this.table.prefixes).sort();
  }

  /** 前缀本身是否已注册（大小写不敏感） */
  isPrefixRegistered(prefix: string): boolean {
    return this.lowerNames.has(prefix.toLowerCase());
  }

  /** 字段是否使用已注册前缀 */
  isRegisteredPrefix(fieldName: string): boolean {
    const prefix = this.getPrefixFromField(fieldName);
    return prefix !== null && this.isPrefixRegistered(prefix);
  }

  /**
   * 提取字段名的前缀段：`_shelx_res_file` → shelx，`_diffrn.ambient_temperature` → diffrn；
   * 单段名称没有前缀
   */
  getPrefixFromField(fieldName: string): string | null {
    const name = fieldName.replace(/^_+/, "");
    if (!name) return null;

    if (name.includes(".")) {
      const category = name.split(".")[0] ?? "";
      return category.split("_")[0] || null;
    }
    if (name.includes("_")) {
      return name.split("_")[0] || null;
    }
    return null;
  }

  getPrefixInfo(prefix: string): string | null {
    if (!prefix) return null;
    const name = this.lowerNames.get(prefix.toLowerCase());
    return name === undefined ? null : this.table.prefixes[name]?.description ?? null;
  }

  /**
   * 建议词典：注册前缀 → 类别模式精确匹配 → 大小写不敏感 → 下划线模式前缀
   */
  suggestDictionaryForPrefix(prefix: string): string | null {
    if (!prefix) return null;
    const lower = prefix.toLowerCase();

    const name = this.lowerNames.get(lower);
    const registered = name === undefined ? null : this.table.prefixes[name]?.suggestedDictionary;
    if (registered) return registered;

    const suggestions = this.table.categoryDictionarySuggestions;
    const exact = suggestions[prefix];
    if (exact) return exact;

    const entries = Object.entries(suggestions);
    const insensitive = entries.find(([pattern]) => pattern.toLowerCase() === lower);
    if (insensitive) return insensitive[1];

    const byPattern = entries.find(
      ([pattern]) => pattern.endsWith("_") && lower.startsWith(pattern.slice(0, -1).toLowerCase())
    );
    return byPattern ? byPattern[1] : null;
  }
}
