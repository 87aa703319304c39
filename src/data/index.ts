/**
 * 数据层组件导出
 */

export { Logger } from "./logger";
export type { LogEntry, LogStorage } from "./logger";
export {
  FileStorage,
  SETTINGS_FILE,
  USER_PREFIXES_FILE,
  APP_LOG_FILE,
  mapFsErrorToErrorCode,
} from "./file-storage";
export {
  SettingsStore,
  DEFAULT_SETTINGS,
  DEFAULT_NEVER_DEPRECATED_FIELDS,
  cloneSettings,
} from "./settings-store";
export type { SettingsValidationError, SettingsValidationResult } from "./settings-store";

// 错误码系统
export {
  ERROR_CODE_INFO,
  isValidErrorCode,
  getErrorCodeInfo,
  getErrorCategory,
  isRetryableErrorCode,
  getFixSuggestion,
} from "./error-codes";

export type { ErrorCode, ErrorCategory, ErrorCodeInfo } from "./error-codes";
