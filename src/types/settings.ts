/**
 * 配置系统类型定义
 *
 * CoreSettings、用户偏好持久化接口
 */

import type { Result } from "./result";

/** 日志级别 */
export type LogLevel = "debug" | "info" | "warn" | "error";

// ============================================================================
// 配置
// ============================================================================

/** 额外词典配置 */
export interface DictionarySourceSetting {
    /** 文件路径 */
    path: string;
    active: boolean;
}

/** 转换选项 */
export interface ConversionSettings {
    removeDuplicates: boolean;
    /** 是否将弃用字段移入文末 DEPRECATED FIELDS 区段 */
    deprecatedSection: boolean;
    /** 是否为 checkCIF 补回旧写法字段 */
    checkcifCompatibility: boolean;
}

/** 用户允许的数据名（命名空间 dataNames） */
export interface DataNamePreferences {
    allowedPrefixes: string[];
    allowedFields: string[];
}

/** 核心设置 */
export interface CoreSettings {
    version: string;
    logLevel: LogLevel;
    /** 主词典路径；空字符串表示使用内置词典 */
    primaryDictionaryPath: string;
    additionalDictionaries: DictionarySourceSetting[];
    conversion: ConversionSettings;
    /** 永不视为弃用的字段（修正词典中的错误标注） */
    neverDeprecatedFields: string[];
    dataNames: DataNamePreferences;
}

// ============================================================================
// 偏好持久化
// ============================================================================

/** 偏好键（固定命名空间 dataNames 下） */
export type PreferenceKey = keyof DataNamePreferences;

/** 用户偏好存储接口（字符串集合序列化） */
export interface UserPreferenceStore {
    loadStringSet(key: PreferenceKey): string[];
    saveStringSet(key: PreferenceKey, values: Iterable<string>): Promise<Result<void>>;
}
