/**
 * CIF 文档相关类型定义
 */

/** CIF 文档格式版本 */
export type CifVersion = "CIF1" | "CIF2" | "MIXED" | "UNKNOWN";

/** 转换目标格式 */
export type ConversionTarget = "CIF1" | "CIF2";

/** 整文档操作结果：新文本 + 变更日志 */
export interface ConversionResult {
    content: string;
    changes: string[];
}

/** 冲突检测结果：规范名 → 文档中出现的拼写（或重复） */
export type FieldConflicts = Record<string, string[]>;

/** 用户为某个规范名选择的字段与取值 */
export interface ConflictResolution {
    field: string;
    value: string;
}

/** 冲突解决映射：规范名 → 选择 */
export type ConflictResolutions = Record<string, ConflictResolution>;

/** 字段在文档中的一次出现 */
export interface FieldOccurrence {
    fieldName: string;
    /** 从 1 开始 */
    lineNumber: number;
    /** 值文本（循环表头为 null） */
    value: string | null;
    inLoop: boolean;
}

/** 转换预览 */
export interface ConversionPreview {
    currentVersion: CifVersion;
    targetVersion: ConversionTarget;
    totalChanges: number;
    fieldChanges: number;
    headerChanges: number;
    otherChanges: number;
    changes: string[];
}

/** 混合格式文档的检查结果 */
export interface MixedCifReport {
    version: CifVersion;
    /** 非混合格式即视为有效 */
    isValid: boolean;
    issues: string[];
    suggestions: string[];
}

/** 转换安全检查 */
export interface ConversionSafetyReport {
    /** errors 为空即为安全 */
    safe: boolean;
    warnings: string[];
    errors: string[];
    currentVersion: CifVersion;
    targetVersion: ConversionTarget;
}
