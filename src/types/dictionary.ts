/**
 * 词典模型类型定义
 *
 * FieldAlias、FieldMetadata、DictionaryInfo、合并索引
 */

// ============================================================================
// 字段元数据
// ============================================================================

/** 字段别名（可带弃用日期） */
export interface FieldAlias {
    name: string;
    /** 弃用日期；"." 为占位符，不表示弃用 */
    deprecationDate: string | null;
}

/** 一个词典定义帧对应的字段元数据 */
export interface FieldMetadata {
    /** 规范（CIF2 点分）名称，保留原始大小写 */
    definitionId: string;
    aliases: FieldAlias[];
    typeContents: string | null;
    typePurpose: string | null;
    typeContainer: string | null;
    typeSource: string | null;
    description: string | null;
    categoryId: string | null;
    units: string | null;
    /** 整个定义已被取代 */
    isReplaced: boolean;
    replacementBy: string | null;
    enumerationValues: string[] | null;
}

/** 弃用信息 */
export interface DeprecationInfo {
    fieldName: string;
    definitionId: string;
    deprecationDate: string | null;
    replacementBy: string | null;
    isReplaced: boolean;
}

/** 双向字段映射 */
export interface FieldMappings {
    /** 别名（小写） → 规范名 */
    cif1ToCif2: Map<string, string>;
    /** 规范名（小写） → 别名列表 */
    cif2ToCif1: Map<string, string[]>;
}

/** 词典文件头信息 */
export interface DictionaryMetadata {
    title: string | null;
    version: string | null;
    date: string | null;
}

// ============================================================================
// 词典格式与已加载词典
// ============================================================================

/** 词典格式 */
export type DictionaryFormat = "DDLm" | "DDL1" | "DDL2" | "UNKNOWN";

/** 词典来源 */
export type DictionarySourceType = "file" | "url" | "bundled";

/** 已加载词典的描述信息 */
export interface DictionaryInfo {
    /** 唯一标识（默认等于 name） */
    id: string;
    name: string;
    /** 文件路径或 URL */
    path: string;
    sourceType: DictionarySourceType;
    sizeBytes: number;
    fieldCount: number;
    format: DictionaryFormat;
    title: string | null;
    version: string | null;
    date: string | null;
    /** 来源说明，如 "official release" / "development" */
    provenance: string;
    /** 派生类别，如 "core" / "powder" */
    dictType: string;
    isActive: boolean;
    isPrimary: boolean;
    /** ISO 8601 */
    loadedAt: string;
}

// ============================================================================
// 词典建议
// ============================================================================

/** 专业词典目录条目 */
export interface CatalogDictionary {
    key: string;
    name: string;
    description: string;
    url: string;
    dictType: string;
    localFile: string | null;
    triggerFields: string[];
}

/** 目录条目 + 是否已加载同类词典 */
export interface AvailableDictionary extends CatalogDictionary {
    alreadyLoaded: boolean;
}

/** 针对某个 CIF 文档的词典建议 */
export interface DictionarySuggestion {
    key: string;
    name: string;
    description: string;
    url: string;
    dictType: string;
    localFile: string | null;
    /** 仅包含命中的触发字段 */
    triggerFields: string[];
    confidence: number;
    alreadyLoaded: boolean;
}

/** 判断别名是否弃用 */
export function isAliasDeprecated(alias: FieldAlias): boolean {
    return alias.deprecationDate !== null && alias.deprecationDate !== ".";
}
