/**
 * FieldRulesValidator - 字段规则模板校验
 *
 * 规则模板每行形如 `_field default_value  # description`，可带
 * DELETE: / EDIT: / CHECK: 动作前缀。对其中的字段做四项检查：
 * 格式不一致、重复 / 别名、弃用、未知；每个问题标注能否自动修复。
 */

import type {
  CifFormat,
  ConversionTarget,
  FieldRulesValidationResult,
  ILogger,
  ValidationIssue,
  AutoFixType,
} from "../types";
import { detectLineEnding, splitCifLines } from "./cif-text-scanner";
import type { DictionaryManager } from "./dictionary-manager";

const MODULE = "FieldRulesValidator";

const RULE_FIELD = /^(?:DELETE:|EDIT:|CHECK:)?\s*(_[a-zA-Z][a-zA-Z0-9_-]*(?:\.[a-zA-Z][a-zA-Z0-9_-]*)*)/;

/** 点分字段占比阈值 */
const CIF2_RATIO = 0.7;
const CIF1_RATIO = 0.3;

// ============================================================================
// 字段提取与格式分析
// ============================================================================

/** 提取规则行首的字段名（按出现顺序，含重复） */
export function extractRuleFields(content: string): string[] {
  const fields: string[] = [];
  for (const raw of splitCifLines(content)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const match = RULE_FIELD.exec(line);
    if (match?.[1]) fields.push(match[1]);
  }
  return fields;
}

/**
 * 按点分字段占比判断文档格式：≥70% 为 CIF2，≤30% 为 CIF1，其余 Mixed；
 * 空文档或无字段时为 CIF1
 */
export function analyzeCifFormat(content: string): CifFormat {
  const fields = extractRuleFields(content);
  if (fields.length === 0) return "CIF1";

  const ratio = fields.filter(field => field.includes(".")).length / fields.length;
  if (ratio >= CIF2_RATIO) return "CIF2";
  if (ratio <= CIF1_RATIO) return "CIF1";
  return "Mixed";
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** 按字段边界替换（不会改动更长字段名中的同名片段） */
export function replaceFieldName(content: string, from: string, to: string): string {
  const pattern = new RegExp(`(?<![A-Za-z0-9_.])${escapeRegExp(from)}(?![A-Za-z0-9_.\\-])`, "g");
  return content.replace(pattern, to);
}

function formatOf(field: string): ConversionTarget {
  return field.includes(".") ? "CIF2" : "CIF1";
}

// ============================================================================
// 校验器
// ============================================================================

export class FieldRulesValidator {
  private readonly manager: DictionaryManager;
  private readonly logger: ILogger;

  constructor(manager: DictionaryManager, logger: ILogger) {
    this.manager = manager;
    this.logger = logger;
  }

  /**
   * 校验规则模板
   *
   * @param cifContent 对应的 CIF 文档，仅用于报告其格式
   * @param targetFormat 期望格式；Mixed 按 CIF2 处理
   */
  validateFieldRules(
    rulesContent: string,
    cifContent?: string,
    targetFormat: CifFormat = "CIF2"
  ): FieldRulesValidationResult {
    const occurrences = extractRuleFields(rulesContent);
    const unique = [...new Set(occurrences)];

    const issues = [
      ...this.findMixedFormatIssues(unique, targetFormat),
      ...this.findDuplicateIssues(occurrences, unique),
      ...this.findDeprecatedIssues(unique),
      ...this.findUnknownIssues(unique),
    ];

    this.logger.debug(MODULE, "字段规则校验完成", {
      event: "FIELD_RULES_VALIDATED",
      totalFields: occurrences.length,
      issueCount: issues.length,
    });

    return {
      issues,
      totalFields: occurrences.length,
      uniqueFields: unique.length,
      cifFormatDetected: cifContent === undefined ? null : analyzeCifFormat(cifContent),
      targetFormat,
    };
  }

  private autoFixType(field: string, preferred: ConversionTarget = "CIF1"): AutoFixType {
    if (this.manager.isCif2OnlyExtension(field)) return "cif2_manual_mapping";
    const equivalent =
      preferred === "CIF1" ? this.manager.getCif1Equivalent(field) : this.manager.getCif2Equivalent(field);
    return equivalent ? "yes" : "no";
  }

  private findMixedFormatIssues(fields: readonly string[], target: CifFormat): ValidationIssue[] {
    const preferred: ConversionTarget = target === "CIF1" ? "CIF1" : "CIF2";
    const issues: ValidationIssue[] = [];

    for (const field of fields) {
      const current = formatOf(field);
      if (current === preferred) continue;
      const equivalent =
        preferred === "CIF2" ? this.manager.getCif2Equivalent(field) : this.manager.getCif1Equivalent(field);
      if (!equivalent || equivalent === field) continue;

      issues.push({
        issueType: "mixed_format",
        category: "Mixed Format Fields",
        fieldNames: [field],
        description: `Field ${field} is in ${current} format, but based on the current CIF file ${preferred} is preferred`,
        suggestedFix: `Convert to ${preferred} format: ${equivalent}`,
        autoFixType: this.autoFixType(field, preferred),
        replacement: equivalent,
      });
    }
    return issues;
  }

  private findDuplicateIssues(occurrences: readonly string[], unique: readonly string[]): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const processed = new Set<string>();

    const counts = new Map<string, number>();
    for (const field of occurrences) {
      counts.set(field, (counts.get(field) ?? 0) + 1);
    }
    for (const [field, count] of counts) {
      if (count <= 1) continue;
      issues.push({
        issueType: "duplicate_alias",
        category: "Duplicate/Alias Fields",
        fieldNames: [field],
        description: `Field ${field} appears ${count} times`,
        suggestedFix: `Remove ${count - 1} duplicate occurrence(s) of ${field}`,
        autoFixType: "yes",
        replacement: field,
      });
      processed.add(field);
    }

    // 小写 → 模板中的写法
    const present = new Map<string, string>();
    for (const field of unique) {
      if (!present.has(field.toLowerCase())) present.set(field.toLowerCase(), field);
    }

    const groups = new Map<string, string[]>();
    for (const field of unique) {
      if (processed.has(field)) continue;
      const group = [field];
      const canonical = this.manager.getCif2Equivalent(field);
      const legacy = this.manager.getCif1Equivalent(field);

      for (const equivalent of [canonical, legacy]) {
        const spelled = equivalent ? present.get(equivalent.toLowerCase()) : undefined;
        if (spelled && !group.includes(spelled) && !processed.has(spelled)) {
          group.push(spelled);
        }
      }
      if (group.length < 2) continue;

      const key = (canonical ?? field).toLowerCase();
      if (!groups.has(key)) {
        groups.set(key, group);
        group.forEach(name => processed.add(name));
      }
    }

    for (const group of groups.values()) {
      const preferred = group.find(name => name.includes(".")) ?? group[0] ?? "";
      issues.push({
        issueType: "duplicate_alias",
        category: "Duplicate/Alias Fields",
        fieldNames: group,
        description: `Multiple aliases found: ${group.join(", ")}`,
        suggestedFix: `Keep only ${preferred}, remove others`,
        autoFixType: "yes",
        replacement: preferred,
      });
    }
    return issues;
  }

  private findDeprecatedIssues(fields: readonly string[]): ValidationIssue[] {
    return fields
      .filter(field => this.manager.isFieldDeprecated(field))
      .map((field): ValidationIssue => {
        const modern = this.manager.getModernEquivalent(field, "CIF2");
        return {
          issueType: "deprecated_field",
          category: "Deprecated Fields",
          fieldNames: [field],
          description: `Field ${field} is deprecated`,
          suggestedFix: modern
            ? `Replace with modern equivalent: ${modern}`
            : "Remove deprecated field (no modern equivalent available)",
          autoFixType: modern ? "yes" : "no",
          replacement: modern,
        };
      });
  }

  private findUnknownIssues(fields: readonly string[]): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const field of fields) {
      if (this.manager.isKnownField(field)) continue;

      let candidate: string | null = null;
      if (field.includes(".")) {
        candidate = field.replace(/\./g, "_");
      } else {
        const parts = field.slice(1).split("_");
        if (parts.length >= 2) {
          candidate = `_${parts[0] ?? ""}.${parts.slice(1).join("_")}`;
        }
      }
      const known = candidate !== null && this.manager.isKnownField(candidate);

      issues.push({
        issueType: "unknown_field",
        category: "Unknown Fields",
        fieldNames: [field],
        description: `Unknown field: ${field}`,
        suggestedFix: known ? `Use known field: ${candidate ?? ""}` : "Verify field name or add to custom dictionary",
        autoFixType: known ? "yes" : this.autoFixType(field),
        replacement: known ? candidate : null,
      });
    }
    return issues;
  }

  // ==========================================================================
  // 自动修复
  // ==========================================================================

  /**
   * 逐个应用可自动修复的问题；autoFixType 为 no 的问题保持不动
   */
  applyAutomaticFixes(
    content: string,
    issues: readonly ValidationIssue[],
    targetFormat: ConversionTarget = "CIF2"
  ): { content: string; changes: string[] } {
    let current = content;
    const changes: string[] = [];

    for (const issue of issues) {
      if (issue.autoFixType === "no") continue;
      const [field] = issue.fieldNames;
      if (!field) continue;

      switch (issue.issueType) {
        case "mixed_format": {
          const replacement =
            targetFormat === "CIF1"
              ? this.manager.getCif1Equivalent(field) ?? field.replace(/\./g, "_")
              : this.manager.getCif2Equivalent(field);
          if (!replacement) break;
          const updated = replaceFieldName(current, field, replacement);
          if (updated !== current) {
            current = updated;
            changes.push(`Converted ${field} to ${replacement} (${targetFormat} format)`);
          }
          break;
        }
        case "duplicate_alias": {
          const result = this.fixDuplicate(current, issue.fieldNames, targetFormat);
          if (result.change) {
            current = result.content;
            changes.push(result.change);
          }
          break;
        }
        case "deprecated_field":
        case "unknown_field": {
          if (!issue.replacement) break;
          const updated = replaceFieldName(current, field, issue.replacement);
          if (updated !== current) {
            current = updated;
            changes.push(
              issue.issueType === "deprecated_field"
                ? `Replaced deprecated field ${field} with modern equivalent ${issue.replacement}`
                : `Replaced unknown field ${field} with ${issue.replacement}`
            );
          }
          break;
        }
        default:
          break;
      }
    }

    this.logger.info(MODULE, "自动修复完成", {
      event: "FIELD_RULES_FIXED",
      changeCount: changes.length,
    });
    return { content: current, changes };
  }

  /** 别名统一为目标格式的写法后，删除其后的重复规则行 */
  private fixDuplicate(
    content: string,
    fields: readonly string[],
    targetFormat: ConversionTarget
  ): { content: string; change: string | null } {
    const preferred = fields.find(field => formatOf(field) === targetFormat) ?? fields[0];
    if (!preferred) return { content, change: null };

    let updated = content;
    const replaced: string[] = [];
    for (const field of fields) {
      if (field === preferred) continue;
      const next = replaceFieldName(updated, field, preferred);
      if (next !== updated) {
        updated = next;
        replaced.push(field);
      }
    }

    let seen = false;
    let removed = 0;
    const kept = splitCifLines(updated).filter(raw => {
      const line = raw.trim();
      if (!line || line.startsWith("#")) return true;
      if (RULE_FIELD.exec(line)?.[1] !== preferred) return true;
      if (!seen) {
        seen = true;
        return true;
      }
      removed++;
      return false;
    });

    const eol = detectLineEnding(content);
    if (replaced.length > 0) {
      return {
        content: kept.join(eol),
        change: `Replaced ${replaced.join(", ")} with ${preferred} (${targetFormat} format)`,
      };
    }
    if (removed > 0) {
      return { content: kept.join(eol), change: `Removed ${removed} duplicate occurrence(s) of ${preferred}` };
    }
    return { content, change: null };
  }
}
