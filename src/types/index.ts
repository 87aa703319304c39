/**
 * 类型 Barrel 文件
 *
 * 新代码可按需导入具体子模块（如 `from "../types/dictionary"`）。
 */

// Result Monad
export type { Ok, Err, Result } from "./result";
export { ok, err, CifModelError, toErr, safeErrorMessage } from "./result";

// 词典模型
export type {
    FieldAlias, FieldMetadata, DeprecationInfo, FieldMappings, DictionaryMetadata,
    DictionaryFormat, DictionarySourceType, DictionaryInfo,
    CatalogDictionary, AvailableDictionary, DictionarySuggestion,
} from "./dictionary";
export { isAliasDeprecated } from "./dictionary";

// CIF 文档
export type {
    CifVersion, ConversionTarget, ConversionResult,
    FieldConflicts, ConflictResolution, ConflictResolutions,
    FieldOccurrence, ConversionPreview, MixedCifReport, ConversionSafetyReport,
} from "./cif";

// 校验
export type {
    FieldCategory, FieldValidationResult, ValidationReport, FieldAction,
    IssueType, IssueCategory, AutoFixType, CifFormat,
    ValidationIssue, FieldRulesValidationResult,
} from "./validation";
export { countValidationIssues, hasValidationIssues } from "./validation";

// 配置系统
export type {
    LogLevel, DictionarySourceSetting, ConversionSettings, DataNamePreferences,
    CoreSettings, PreferenceKey, UserPreferenceStore,
} from "./settings";

// 日志接口
export type { ILogger } from "./logger";
