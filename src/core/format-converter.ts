/**
 * FormatConverter - CIF1 ↔ CIF2 整文档转换
 *
 * convertToCif2 流程：
 * 1. 版本头
 * 2. 逐行改写字段名（仅字段与循环表头位置，文本块与循环数据不动）
 * 3. 改写前记录弃用字段及其原值
 * 4. 未知字段保留原样并汇总为警告
 * 5. 去重：同一规范名保留点分写法
 * 6. 弃用字段移入文末 DEPRECATED FIELDS 区段
 * 7. checkCIF 兼容：为指定字段补回旧写法
 *
 * 已存在的弃用区段不参与改写；转换结果再次转换时保持不变。
 */

import type {
  CifVersion,
  ConversionPreview,
  ConversionResult,
  ConversionSafetyReport,
  ConversionSettings,
  ConversionTarget,
  ILogger,
} from "../types";
import { CifModelError } from "../types";
import bundledCompatibility from "../../resources/checkcif-compatibility.json";
import {
  detectLineEnding,
  getFieldValueSpan,
  isNamedLine,
  scanCifLines,
  splitDeprecatedSection,
} from "./cif-text-scanner";
import type { CifLine } from "./cif-text-scanner";
import { buildDeprecatedSection, insertDeprecatedSection } from "./deprecated-section";
import type { DeprecatedSectionItem } from "./deprecated-section";
import { CIF1_HEADER, CIF2_HEADER } from "./dictionary-manager";
import type { DictionaryManager } from "./dictionary-manager";

const MODULE = "FormatConverter";

export const DEFAULT_CONVERSION_SETTINGS: ConversionSettings = {
  removeDuplicates: true,
  deprecatedSection: true,
  checkcifCompatibility: true,
};

/** 改写阶段的结果 */
interface RewriteOutcome {
  lines: string[];
  changes: string[];
  unknown: string[];
  unmapped: string[];
  deprecated: Map<string, string>;
}

/** 行中的取值文本（文本块内容不算） */
function valueText(line: CifLine): string {
  switch (line.kind) {
    case "field":
      return line.rest.trim();
    case "value":
    case "loop_data":
      return line.raw.trim();
    default:
      return "";
  }
}

function pushUnique(list: string[], name: string): void {
  if (!list.includes(name)) list.push(name);
}

export class FormatConverter {
  private readonly manager: DictionaryManager;
  private readonly logger: ILogger;
  private options: ConversionSettings;
  /** 小写旧写法 → 原写法 */
  private readonly compatibilityFields: Map<string, string>;

  constructor(
    manager: DictionaryManager,
    logger: ILogger,
    options: ConversionSettings = DEFAULT_CONVERSION_SETTINGS,
    compatibilityFields: readonly string[] = bundledCompatibility.fields
  ) {
    this.manager = manager;
    this.logger = logger;
    this.options = { ...options };
    this.compatibilityFields = new Map(compatibilityFields.map(name => [name.toLowerCase(), name]));
  }

  setOptions(options: Partial<ConversionSettings>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): ConversionSettings {
    return { ...this.options };
  }

  getCompatibilityFields(): string[] {
    return [...this.compatibilityFields.values()];
  }

  // ==========================================================================
  // 转换入口
  // ==========================================================================

  convertToCif2(content: string): ConversionResult {
    const started = Date.now();
    const { bodyLines, sectionLines, trailingLines, entries } = splitDeprecatedSection(content);
    const changes: string[] = [];

    const headed = this.applyHeader(bodyLines, "CIF2", changes);
    const companions = this.findCompatibilityCompanions(headed);
    const rewrite = this.rewriteBody(headed, "CIF2", companions.lines);
    changes.push(...rewrite.changes);

    let body = rewrite.lines;
    if (this.options.removeDuplicates) {
      body = this.removeDuplicates(body, "CIF2", companions.names, changes);
    }

    // 兼容字段只看正文，先于弃用区段插入
    const compatibilityChanges: string[] = [];
    if (this.options.checkcifCompatibility) {
      body = this.addCompatibilityFields(body, compatibilityChanges);
    }

    let section = sectionLines;
    if (this.options.deprecatedSection && rewrite.deprecated.size > 0) {
      const items = this.mergeSectionItems(entries, rewrite.deprecated);
      if (sectionLines.length > 0) {
        section = buildDeprecatedSection(items);
        changes.push(`Updated DEPRECATED section with ${rewrite.deprecated.size} field(s)`);
      } else {
        body = insertDeprecatedSection(body, buildDeprecatedSection(items));
        changes.push(`Added DEPRECATED section with ${rewrite.deprecated.size} field(s)`);
      }
    }
    changes.push(...compatibilityChanges);

    if (rewrite.unknown.length > 0) {
      changes.push(`WARNING: ${rewrite.unknown.length} unknown field(s): ${rewrite.unknown.join(", ")}`);
    }

    this.logConversion("CIF2", changes, started);
    return { content: [...body, ...section, ...trailingLines].join(detectLineEnding(content)), changes };
  }

  convertToCif1(content: string): ConversionResult {
    const started = Date.now();
    const { bodyLines, sectionLines, trailingLines } = splitDeprecatedSection(content);
    const changes: string[] = [];

    const headed = this.applyHeader(bodyLines, "CIF1", changes);
    const rewrite = this.rewriteBody(headed, "CIF1", new Set());
    changes.push(...rewrite.changes);

    let body = rewrite.lines;
    if (this.options.removeDuplicates) {
      body = this.removeDuplicates(body, "CIF1", new Set(), changes);
    }

    if (rewrite.unknown.length > 0) {
      changes.push(`WARNING: ${rewrite.unknown.length} unknown field(s): ${rewrite.unknown.join(", ")}`);
    }
    if (rewrite.unmapped.length > 0) {
      changes.push(
        `WARNING: ${rewrite.unmapped.length} field(s) without CIF1 equivalent: ${rewrite.unmapped.join(", ")}`
      );
    }

    this.logConversion("CIF1", changes, started);
    return { content: [...body, ...sectionLines, ...trailingLines].join(detectLineEnding(content)), changes };
  }

  /**
   * 按目标格式修正混合格式文档
   *
   * @throws CifModelError E120_INVALID_CONVERSION_TARGET 目标不是 CIF1 / CIF2
   */
  fixMixedFormat(content: string, target: CifVersion = "CIF2"): ConversionResult {
    switch (target) {
      case "CIF2":
        return this.convertToCif2(content);
      case "CIF1":
        return this.convertToCif1(content);
      default:
        throw new CifModelError(
          "E120_INVALID_CONVERSION_TARGET",
          `Cannot convert to ${target}`,
          { target }
        );
    }
  }

  private convert(content: string, target: ConversionTarget): ConversionResult {
    return target === "CIF2" ? this.convertToCif2(content) : this.convertToCif1(content);
  }

  // ==========================================================================
  // 预览与安全检查
  // ==========================================================================

  getConversionPreview(content: string, target: ConversionTarget): ConversionPreview {
    const { changes } = this.convert(content, target);
    let headerChanges = 0;
    let fieldChanges = 0;
    let otherChanges = 0;

    for (const change of changes) {
      if (change.toLowerCase().includes("header")) {
        headerChanges++;
      } else if (change.includes("→")) {
        fieldChanges++;
      } else {
        otherChanges++;
      }
    }

    return {
      currentVersion: this.manager.detectCifVersion(content),
      targetVersion: target,
      totalChanges: changes.length,
      fieldChanges,
      headerChanges,
      otherChanges,
      changes,
    };
  }

  /** 检查转换是否可能丢失信息；只给出警告，不修改文档 */
  validateConversionSafety(content: string, target: ConversionTarget): ConversionSafetyReport {
    const currentVersion = this.manager.detectCifVersion(content);
    const warnings: string[] = [];
    const errors: string[] = [];
    const lines = scanCifLines(content);

    if (target === "CIF1" && currentVersion === "CIF2") {
      const hasCollections = lines.some(line => {
        const value = valueText(line);
        return value.startsWith("[") || value.startsWith("{");
      });
      if (hasCollections) {
        warnings.push("CIF2 list/table constructs detected - may not be compatible with CIF1");
      }
      if (content.includes('"""') || content.includes("'''")) {
        warnings.push("CIF2 triple-quoted strings detected - will be converted to text fields");
      }
    }

    const unmapped: string[] = [];
    for (const line of lines) {
      const name = line.fieldName;
      if (!isNamedLine(line) || !name) continue;
      const dotted = name.includes(".");
      if (target === "CIF2" && !dotted && this.manager.getCif2Equivalent(name) === null) {
        pushUnique(unmapped, name);
      } else if (target === "CIF1" && dotted && this.manager.getCif1Equivalent(name) === null) {
        pushUnique(unmapped, name);
      }
    }
    if (unmapped.length > 0) {
      warnings.push(`Fields without known mappings: ${unmapped.slice(0, 5).join(", ")}`);
      if (unmapped.length > 5) {
        warnings.push(`... and ${unmapped.length - 5} more`);
      }
    }

    return { safe: errors.length === 0, warnings, errors, currentVersion, targetVersion: target };
  }

  // ==========================================================================
  // 版本头
  // ==========================================================================

  private applyHeader(lines: readonly string[], target: ConversionTarget, changes: string[]): string[] {
    const [wanted, other] = target === "CIF2" ? [CIF2_HEADER, CIF1_HEADER] : [CIF1_HEADER, CIF2_HEADER];
    const head = lines.slice(0, 5);

    if (head.some(line => line.trim().startsWith(wanted))) {
      return [...lines];
    }

    const otherIndex = head.findIndex(line => line.trim().startsWith(other));
    if (otherIndex >= 0) {
      const updated = [...lines];
      updated[otherIndex] = wanted;
      changes.push(
        target === "CIF2"
          ? "Replaced CIF1 version header with CIF2 header"
          : "Replaced CIF2 version header with CIF1 header"
      );
      return updated;
    }

    changes.push(target === "CIF2" ? "Added CIF2 version header" : "Added CIF1 version header");
    return [wanted, "", ...lines];
  }

  // ==========================================================================
  // 字段改写
  // ==========================================================================

  private convertFieldToCif2(name: string): string {
    if (this.manager.isFieldDeprecated(name)) {
      const replacement = this.manager.getModernReplacement(name);
      if (replacement && replacement !== name) return replacement;
    }
    return this.manager.getCif2Equivalent(name) ?? name;
  }

  /**
   * 改写正文中的字段名（行号以加版本头之后的文本计）
   *
   * @param companions 不改写的兼容旧写法字段（行号）
   */
  private rewriteBody(
    lines: readonly string[],
    target: ConversionTarget,
    companions: ReadonlySet<number>
  ): RewriteOutcome {
    const scanned = scanCifLines(lines.join("\n"));
    const outcome: RewriteOutcome = {
      lines: [],
      changes: [],
      unknown: [],
      unmapped: [],
      deprecated: new Map(),
    };
    const dropped = new Set<number>();

    for (const line of scanned) {
      if (dropped.has(line.index)) continue;
      const name = line.fieldName;
      if (!isNamedLine(line) || !name || companions.has(line.index)) {
        outcome.lines.push(line.raw);
        continue;
      }

      if (!this.manager.isKnownField(name)) {
        pushUnique(outcome.unknown, name);
      }

      const lineNumber = line.index + 1;
      let converted = name;
      if (target === "CIF2") {
        const value = line.rest.trim();
        const deprecated = line.kind === "field" && value !== "" && this.manager.isFieldDeprecated(name);
        if (deprecated && !outcome.deprecated.has(name)) {
          outcome.deprecated.set(name, value);
        }
        converted = this.convertFieldToCif2(name);

        // 没有非弃用目标的弃用字段只保留在弃用区段中
        if (deprecated && this.options.deprecatedSection && this.manager.isFieldDeprecated(converted)) {
          const span = getFieldValueSpan(scanned, line.index);
          for (let i = span.start + 1; i <= span.end; i++) dropped.add(i);
          outcome.changes.push(`Line ${lineNumber}: Moved deprecated field ${name} to DEPRECATED section`);
          continue;
        }
      } else {
        const legacy = this.manager.getCif1Equivalent(name);
        if (legacy) {
          converted = legacy;
        } else if (name.includes(".") && this.manager.isKnownField(name)) {
          pushUnique(outcome.unmapped, name);
        }
      }

      const updated = converted === name ? line.raw : `${line.indent}${converted}${line.rest}`;
      if (updated !== line.raw) {
        outcome.changes.push(`Line ${lineNumber}: ${line.raw.trim()} → ${updated.trim()}`);
      }
      outcome.lines.push(updated);
    }

    return outcome;
  }

  // ==========================================================================
  // 去重
  // ==========================================================================

  /**
   * 删除同一规范名的重复简单字段；CIF2 保留点分写法，CIF1 保留无点写法
   */
  private removeDuplicates(
    lines: readonly string[],
    target: ConversionTarget,
    companions: ReadonlySet<string>,
    changes: string[]
  ): string[] {
    const scanned = scanCifLines(lines.join("\n"));
    const seen = new Map<string, CifLine>();
    const removed = new Set<number>();
    const preferred = (name: string): boolean => (target === "CIF2" ? name.includes(".") : !name.includes("."));

    const remove = (line: CifLine): void => {
      const span = getFieldValueSpan(scanned, line.index);
      for (let i = span.start; i <= span.end; i++) removed.add(i);
    };

    for (const line of scanned) {
      const name = line.fieldName;
      if (line.kind !== "field" || !name || companions.has(name.toLowerCase())) continue;
      const key = (this.manager.getCif2Equivalent(name) ?? name).toLowerCase();
      const previous = seen.get(key);
      const previousName = previous?.fieldName;
      if (!previous || !previousName) {
        seen.set(key, line);
        continue;
      }

      if (preferred(name) && !preferred(previousName)) {
        remove(previous);
        seen.set(key, line);
        changes.push(
          target === "CIF2"
            ? `Removed duplicate legacy field ${previousName} (kept modern ${name})`
            : `Removed duplicate field ${previousName} (kept ${name})`
        );
      } else {
        remove(line);
        changes.push(`Removed duplicate field ${name} (kept ${previousName})`);
      }
    }

    return scanned.filter(line => !removed.has(line.index)).map(line => line.raw);
  }

  // ==========================================================================
  // 弃用区段
  // ==========================================================================

  /** 已有区段的条目在前，新条目不覆盖同名旧条目 */
  private mergeSectionItems(
    existing: ReadonlyArray<{ fieldName: string; value: string }>,
    found: ReadonlyMap<string, string>
  ): DeprecatedSectionItem[] {
    const items = new Map<string, DeprecatedSectionItem>();
    const add = (fieldName: string, value: string): void => {
      const key = fieldName.toLowerCase();
      if (items.has(key)) return;
      items.set(key, { fieldName, value, replacement: this.manager.getModernReplacement(fieldName) });
    };
    existing.forEach(entry => add(entry.fieldName, entry.value));
    found.forEach((value, fieldName) => add(fieldName, value));
    return [...items.values()];
  }

  // ==========================================================================
  // checkCIF 兼容
  // ==========================================================================

  /** 正文中带值的简单字段：小写名 → 行（后出现者覆盖） */
  private simpleFields(scanned: readonly CifLine[]): Map<string, CifLine> {
    const fields = new Map<string, CifLine>();
    for (const line of scanned) {
      if (line.kind === "field" && line.fieldName && line.rest.trim()) {
        fields.set(line.fieldName.toLowerCase(), line);
      }
    }
    return fields;
  }

  /**
   * 已与现代写法并存的兼容旧写法：转换与去重时保持原样
   */
  private findCompatibilityCompanions(lines: readonly string[]): { lines: Set<number>; names: Set<string> } {
    const companions = { lines: new Set<number>(), names: new Set<string>() };
    if (!this.options.checkcifCompatibility) return companions;

    const fields = this.simpleFields(scanCifLines(lines.join("\n")));
    for (const [lower, line] of fields) {
      if (!this.compatibilityFields.has(lower) || this.manager.isFieldDeprecated(lower)) continue;
      const modern = this.manager.getCif2Equivalent(lower);
      if (modern && modern.toLowerCase() !== lower && fields.has(modern.toLowerCase())) {
        companions.lines.add(line.index);
        companions.names.add(lower);
      }
    }
    return companions;
  }

  private addCompatibilityFields(lines: readonly string[], changes: string[]): string[] {
    const scanned = scanCifLines(lines.join("\n"));
    const fields = this.simpleFields(scanned);
    const insertions = new Map<number, string[]>();

    for (const [lower, legacy] of this.compatibilityFields) {
      if (this.manager.isFieldDeprecated(legacy)) {
        const replacement = this.manager.getModernReplacement(legacy);
        // 弃用字段由弃用区段保留
        if (replacement && fields.has(replacement.toLowerCase())) continue;
      }

      const modern = this.manager.getCif2Equivalent(legacy);
      const modernLine = modern ? fields.get(modern.toLowerCase()) : undefined;
      if (!modern || !modernLine || fields.has(lower)) continue;

      const end = getFieldValueSpan(scanned, modernLine.index).end;
      const pending = insertions.get(end) ?? [];
      pending.push(`${modernLine.indent}${legacy} ${modernLine.rest.trim()}`);
      insertions.set(end, pending);
      changes.push(`Added legacy field ${legacy} for checkCIF compatibility (alongside ${modern})`);
    }

    if (insertions.size === 0) return [...lines];
    const output: string[] = [];
    for (const line of scanned) {
      output.push(line.raw);
      output.push(...(insertions.get(line.index) ?? []));
    }
    return output;
  }

  private logConversion(target: ConversionTarget, changes: readonly string[], started: number): void {
    this.logger.info(MODULE, `文档已转换为 ${target}`, {
      event: "CONVERSION_COMPLETED",
      target,
      changeCount: changes.length,
      durationMs: Date.now() - started,
    });
  }
}
