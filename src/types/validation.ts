/**
 * 校验类型定义
 *
 * 数据名校验（DataNameValidator）与字段规则校验（FieldRulesValidator）
 */

// ============================================================================
// 数据名校验
// ============================================================================

/** 字段分类 */
export type FieldCategory =
    | "valid"
    | "registered_local"
    | "user_allowed"
    | "unknown"
    | "deprecated";

/** 单个字段的分类结果 */
export interface FieldValidationResult {
    fieldName: string;
    category: FieldCategory;
    lineNumber: number;
    description: string;
    suggestedDictionary: string | null;
    modernEquivalent: string | null;
    prefix: string | null;
    /** 嵌入前缀修正后的建议写法 */
    suggestedFormat: string | null;
    embeddedPrefix: string | null;
}

/** 整个文档的分类报告 */
export interface ValidationReport {
    validFields: FieldValidationResult[];
    registeredLocalFields: FieldValidationResult[];
    userAllowedFields: FieldValidationResult[];
    unknownFields: FieldValidationResult[];
    deprecatedFields: FieldValidationResult[];
    totalFields: number;
}

/** 需要用户处理的字段数（未知 + 弃用） */
export function countValidationIssues(report: ValidationReport): number {
    return report.unknownFields.length + report.deprecatedFields.length;
}

export function hasValidationIssues(report: ValidationReport): boolean {
    return countValidationIssues(report) > 0;
}

/** 用户对字段的处理方式 */
export type FieldAction =
    | "allow_field"
    | "allow_prefix"
    | "ignore_session"
    | "replace_modern"
    | "fix_embedded_prefix";

// ============================================================================
// 字段规则校验
// ============================================================================

/** 规则问题类型 */
export type IssueType =
    | "mixed_format"
    | "duplicate_alias"
    | "unknown_field"
    | "format_inconsistency"
    | "deprecated_field";

/** 问题分组标签 */
export type IssueCategory =
    | "Mixed Format Fields"
    | "Duplicate/Alias Fields"
    | "Unknown Fields"
    | "Deprecated Fields";

/** 自动修复能力 */
export type AutoFixType = "yes" | "cif2_manual_mapping" | "no";

/** 格式分析结果 */
export type CifFormat = "CIF1" | "CIF2" | "Mixed";

/** 字段规则问题 */
export interface ValidationIssue {
    issueType: IssueType;
    category: IssueCategory;
    fieldNames: string[];
    description: string;
    suggestedFix: string;
    autoFixType: AutoFixType;
    /** 修复时写入的字段名；无自动修复时为 null */
    replacement: string | null;
}

/** 字段规则校验结果 */
export interface FieldRulesValidationResult {
    issues: ValidationIssue[];
    totalFields: number;
    uniqueFields: number;
    cifFormatDetected: CifFormat | null;
    targetFormat: CifFormat;
}
