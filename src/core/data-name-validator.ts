/**
 * DataNameValidator - 数据名分类
 *
 * 判定顺序（先命中者为准）：
 * 1. 本次会话忽略 → user_allowed
 * 2. 用户允许的字段 → user_allowed
 * 3. 用户允许的前缀 → user_allowed
 * 4. 弃用（先于“已知”判断）→ deprecated
 * 5. 词典已知 → valid
 * 6. 已注册前缀 → registered_local
 * 7. 其余为 unknown；先检测嵌入式本地前缀（_chemical_oxdiff_formula
 *    应写作 _chemical.oxdiff_formula），嵌入前缀已允许 / 已注册时改判
 *
 * 结果按小写字段名缓存，复用时只更新行号；偏好或词典变化时清空。
 */

import type {
  ConversionResult,
  FieldAction,
  FieldCategory,
  FieldValidationResult,
  ILogger,
  PreferenceKey,
  Result,
  UserPreferenceStore,
  ValidationReport,
} from "../types";
import { err, ok } from "../types";
import { isNamedLine, renameField, scanCifLines } from "./cif-text-scanner";
import type { DictionaryManager } from "./dictionary-manager";
import type { PrefixRegistry } from "./registered-prefixes";

const MODULE = "DataNameValidator";

/** 嵌入式前缀检测结果 */
export interface EmbeddedPrefix {
  embeddedPrefix: string;
  suggestedFormat: string;
}

export interface DataNameValidatorOptions {
  manager: DictionaryManager;
  prefixes: PrefixRegistry;
  preferences: UserPreferenceStore;
  logger: ILogger;
}

function emptyReport(): ValidationReport {
  return {
    validFields: [],
    registeredLocalFields: [],
    userAllowedFields: [],
    unknownFields: [],
    deprecatedFields: [],
    totalFields: 0,
  };
}

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

export class DataNameValidator {
  private readonly manager: DictionaryManager;
  private readonly prefixes: PrefixRegistry;
  private readonly preferences: UserPreferenceStore;
  private readonly logger: ILogger;

  private allowedPrefixes = new Set<string>();
  private allowedFields = new Set<string>();
  private readonly sessionIgnored = new Set<string>();
  private readonly cache = new Map<string, FieldValidationResult>();
  private readonly unsubscribe: () => void;

  constructor(options: DataNameValidatorOptions) {
    this.manager = options.manager;
    this.prefixes = options.prefixes;
    this.preferences = options.preferences;
    this.logger = options.logger;
    this.unsubscribe = this.manager.onChange(() => this.clearCache());
  }

  /** 读取持久化的允许前缀与字段 */
  initialize(): void {
    this.allowedPrefixes = new Set(this.preferences.loadStringSet("allowedPrefixes").map(normalize));
    this.allowedFields = new Set(this.preferences.loadStringSet("allowedFields").map(normalize));
    this.clearCache();
    this.logger.debug(MODULE, "用户偏好已加载", {
      event: "PREFERENCES_LOADED",
      allowedPrefixes: this.allowedPrefixes.size,
      allowedFields: this.allowedFields.size,
    });
  }

  /** 停止跟随词典变化 */
  dispose(): void {
    this.unsubscribe();
  }

  // ==========================================================================
  // 分类
  // ==========================================================================

  validateField(fieldName: string, lineNumber = 0): FieldValidationResult {
    const key = normalize(fieldName);
    const cached = this.cache.get(key);
    if (cached) {
      return { ...cached, fieldName, lineNumber };
    }

    const result = this.classify(fieldName, lineNumber);
    this.cache.set(key, result);
    return result;
  }

  private classify(fieldName: string, lineNumber: number): FieldValidationResult {
    const key = normalize(fieldName);
    const prefix = this.prefixes.getPrefixFromField(fieldName);
    const build = (
      category: FieldCategory,
      description: string,
      extra: Partial<FieldValidationResult> = {}
    ): FieldValidationResult => ({
      fieldName,
      category,
      lineNumber,
      description,
      suggestedDictionary: null,
      modernEquivalent: null,
      prefix,
      suggestedFormat: null,
      embeddedPrefix: null,
      ...extra,
    });

    if (this.sessionIgnored.has(key)) {
      return build("user_allowed", "Ignored for this session");
    }
    if (this.allowedFields.has(key)) {
      return build("user_allowed", "Field allowed by user");
    }
    if (prefix && this.allowedPrefixes.has(prefix.toLowerCase())) {
      return build("user_allowed", `Prefix '${prefix}' allowed by user`);
    }

    if (this.manager.isFieldDeprecated(fieldName)) {
      return build("deprecated", "Field is deprecated", {
        modernEquivalent: this.manager.getModernReplacement(fieldName),
      });
    }
    if (this.manager.isKnownField(fieldName)) {
      return build("valid", "Known in dictionary");
    }

    if (prefix && this.prefixes.isRegisteredPrefix(fieldName)) {
      const info = this.prefixes.getPrefixInfo(prefix);
      return build("registered_local", `Uses registered prefix '${prefix}'${info ? `: ${info}` : ""}`, {
        suggestedDictionary: this.prefixes.suggestDictionaryForPrefix(prefix),
      });
    }

    const embedded = this.detectEmbeddedPrefix(fieldName);
    if (embedded) {
      const { embeddedPrefix } = embedded;
      if (this.allowedPrefixes.has(embeddedPrefix.toLowerCase())) {
        return build("user_allowed", `Embedded prefix '${embeddedPrefix}' allowed by user`, embedded);
      }
      if (this.prefixes.isPrefixRegistered(embeddedPrefix)) {
        const info = this.prefixes.getPrefixInfo(embeddedPrefix);
        return build(
          "registered_local",
          `Uses registered embedded prefix '${embeddedPrefix}'${info ? `: ${info}` : ""}`,
          { ...embedded, suggestedDictionary: this.prefixes.suggestDictionaryForPrefix(embeddedPrefix) }
        );
      }
    }

    return build(
      "unknown",
      embedded
        ? `Unknown field with embedded local prefix '${embedded.embeddedPrefix}'`
        : "Not found in loaded dictionaries",
      {
        ...embedded,
        suggestedDictionary: prefix ? this.prefixes.suggestDictionaryForPrefix(prefix) : null,
      }
    );
  }

  /**
   * 检测嵌入式本地前缀：最长的已知类别之后紧跟一个该类别下不存在的片段，
   * 且其后还有片段
   */
  detectEmbeddedPrefix(fieldName: string): EmbeddedPrefix | null {
    if (fieldName.includes(".")) return null;
    const parts = fieldName.replace(/^_/, "").split("_");
    if (parts.length < 3) return null;

    const categories = new Set(this.manager.getKnownCategories());
    for (let i = parts.length - 2; i >= 1; i--) {
      const category = parts.slice(0, i).join("_");
      if (!categories.has(category.toLowerCase())) continue;

      const [token = "", ...attribute] = parts.slice(i);
      if (!token || attribute.length === 0) continue;
      if (
        this.manager.hasFieldWithPrefix(`_${category}_${token}`) ||
        this.manager.hasFieldWithPrefix(`_${category}.${token}`)
      ) {
        continue;
      }

      return {
        embeddedPrefix: token,
        suggestedFormat: `_${category}.${[token, ...attribute].join("_")}`,
      };
    }
    return null;
  }

  /**
   * 对文档中的每个字段分类（跳过注释、data_/loop_ 行与文本块；同名只报告首次出现）
   */
  validateCifContent(content: string): ValidationReport {
    const report = emptyReport();
    const seen = new Set<string>();

    for (const line of scanCifLines(content)) {
      const name = line.fieldName;
      if (!isNamedLine(line) || !name || name.length < 2) continue;
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);

      const result = this.validateField(name, line.index + 1);
      report.totalFields++;
      switch (result.category) {
        case "valid":
          report.validFields.push(result);
          break;
        case "registered_local":
          report.registeredLocalFields.push(result);
          break;
        case "user_allowed":
          report.userAllowedFields.push(result);
          break;
        case "deprecated":
          report.deprecatedFields.push(result);
          break;
        default:
          report.unknownFields.push(result);
          break;
      }
    }

    this.logger.debug(MODULE, "数据名校验完成", {
      event: "DATA_NAMES_VALIDATED",
      totalFields: report.totalFields,
      unknown: report.unknownFields.length,
      deprecated: report.deprecatedFields.length,
    });
    return report;
  }

  /** 字段是否无需处理（非 unknown、非 deprecated） */
  isFieldValid(fieldName: string): boolean {
    const { category } = this.validateField(fieldName);
    return category !== "unknown" && category !== "deprecated";
  }

  // ==========================================================================
  // 用户偏好
  // ==========================================================================

  getAllowedPrefixes(): string[] {
    return [...this.allowedPrefixes].sort();
  }

  getAllowedFields(): string[] {
    return [...this.allowedFields].sort();
  }

  async addAllowedPrefix(prefix: string): Promise<Result<void>> {
    const value = normalize(prefix).replace(/^_+/, "").replace(/_+$/, "");
    if (!value) return err("E101_INVALID_INPUT", "Prefix must not be empty");
    this.allowedPrefixes.add(value);
    return this.persist("allowedPrefixes", this.allowedPrefixes);
  }

  async removeAllowedPrefix(prefix: string): Promise<Result<void>> {
    this.allowedPrefixes.delete(normalize(prefix).replace(/^_+/, "").replace(/_+$/, ""));
    return this.persist("allowedPrefixes", this.allowedPrefixes);
  }

  async addAllowedField(fieldName: string): Promise<Result<void>> {
    const value = normalize(fieldName);
    if (!value.startsWith("_") || value.length < 2) {
      return err("E101_INVALID_INPUT", `Not a data name: ${fieldName}`);
    }
    this.allowedFields.add(value);
    return this.persist("allowedFields", this.allowedFields);
  }

  async removeAllowedField(fieldName: string): Promise<Result<void>> {
    this.allowedFields.delete(normalize(fieldName));
    return this.persist("allowedFields", this.allowedFields);
  }

  /** 仅本次会话忽略，不持久化 */
  addSessionIgnored(fieldName: string): void {
    this.sessionIgnored.add(normalize(fieldName));
    this.cache.delete(normalize(fieldName));
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async persist(key: PreferenceKey, values: ReadonlySet<string>): Promise<Result<void>> {
    this.clearCache();
    const result = await this.preferences.saveStringSet(key, [...values].sort());
    if (!result.ok) {
      this.logger.warn(MODULE, "用户偏好保存失败", { event: "PREFERENCES_SAVE_FAILED", key, error: result.error });
    }
    return result;
  }

  // ==========================================================================
  // 用户处理
  // ==========================================================================

  /**
   * 执行用户对某个字段选择的处理方式
   *
   * 允许 / 忽略类操作不改动文档，返回原文与空变更列表。
   */
  async applyFieldAction(
    content: string,
    result: FieldValidationResult,
    action: FieldAction
  ): Promise<Result<ConversionResult>> {
    const unchanged: ConversionResult = { content, changes: [] };

    switch (action) {
      case "allow_field": {
        const saved = await this.addAllowedField(result.fieldName);
        return saved.ok ? ok(unchanged) : saved;
      }
      case "allow_prefix": {
        const prefix = result.embeddedPrefix ?? result.prefix;
        if (!prefix) return err("E101_INVALID_INPUT", `No prefix in ${result.fieldName}`);
        const saved = await this.addAllowedPrefix(prefix);
        return saved.ok ? ok(unchanged) : saved;
      }
      case "ignore_session":
        this.addSessionIgnored(result.fieldName);
        return ok(unchanged);
      case "replace_modern":
        if (!result.modernEquivalent) {
          return err("E101_INVALID_INPUT", `No modern equivalent for ${result.fieldName}`);
        }
        return ok(renameField(content, result.fieldName, result.modernEquivalent));
      case "fix_embedded_prefix":
        if (!result.suggestedFormat) {
          return err("E101_INVALID_INPUT", `No suggested format for ${result.fieldName}`);
        }
        return ok(renameField(content, result.fieldName, result.suggestedFormat));
      default:
        return err("E101_INVALID_INPUT", `Unsupported action: ${String(action)}`);
    }
  }
}
