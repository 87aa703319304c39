/**
 * 应用层组件导出
 */

export {
  scanCifLines,
  isNamedLine,
  getFieldValueSpan,
  splitDeprecatedSection,
  renameField,
  extractFieldNames,
  DEPRECATED_SECTION_MARKER,
  DEPRECATED_SECTION_END,
} from "./cif-text-scanner";
export type { CifLine, CifLineKind, FieldValueSpan, DeprecatedSectionSplit } from "./cif-text-scanner";
export { buildDeprecatedSection, insertDeprecatedSection } from "./deprecated-section";
export type { DeprecatedSectionItem } from "./deprecated-section";

// 词典
export { DictionaryParser } from "./base-dictionary-parser";
export { DdlmDictionaryParser } from "./ddlm-parser";
export { Ddl1DictionaryParser, deriveCanonicalName } from "./ddl1-parser";
export {
  detectDictionaryFormat,
  describeDictionaryFormat,
  scoreDictionaryFormats,
  createDictionaryParser,
} from "./dictionary-format";
export type { FormatScores } from "./dictionary-format";
export { Cif2ExtensionTable } from "./cif2-extensions";
export {
  DictionarySuggestionEngine,
  parseDictionaryCatalog,
  loadDictionaryCatalog,
} from "./dictionary-suggestions";
export {
  DictionaryManager,
  nodeDictionaryReader,
  BUNDLED_CORE_DICTIONARY_PATH,
  CIF1_HEADER,
  CIF2_HEADER,
} from "./dictionary-manager";
export type { DictionaryReader, DictionaryManagerOptions } from "./dictionary-manager";

// 转换与校验
export { FormatConverter, DEFAULT_CONVERSION_SETTINGS } from "./format-converter";
export {
  FieldRulesValidator,
  extractRuleFields,
  analyzeCifFormat,
} from "./field-rules-validator";
export { PrefixRegistry, parsePrefixTable } from "./registered-prefixes";
export type { PrefixInfo, PrefixTable } from "./registered-prefixes";
export { DataNameValidator } from "./data-name-validator";
export type { EmbeddedPrefix, DataNameValidatorOptions } from "./data-name-validator";
