/**
 * 错误码定义（SSOT）
 *
 * 约定：
 * - E1xx: 输入/词典/转换错误（不可重试）
 * - E3xx: 系统/IO/运行时状态错误（视情况）
 * - E4xx: 配置错误（不可重试）
 * - E5xx: 内部错误/BUG（不可重试）
 *
 * 形式：统一使用 “E###_NAME” 作为错误码字符串，便于日志检索与排障沟通。
 */

export type ErrorCategory =
  | "INPUT_VALIDATION"
  | "DICTIONARY"
  | "SYSTEM_IO"
  | "CONFIG"
  | "INTERNAL";

export interface ErrorCodeInfo {
  code: string;
  name: string;
  description: string;
  category: ErrorCategory;
  retryable: boolean;
  fixSuggestion?: string;
}

export const ERROR_CODE_INFO = {
  // E1xx 输入/词典/转换（不可重试）
  E101_INVALID_INPUT: {
    code: "E101_INVALID_INPUT",
    name: "INVALID_INPUT",
    description: "输入格式错误或无效",
    category: "INPUT_VALIDATION",
    retryable: false,
    fixSuggestion: "请检查输入内容或必要参数后重试。",
  },
  E102_MISSING_FIELD: {
    code: "E102_MISSING_FIELD",
    name: "MISSING_FIELD",
    description: "必需字段缺失",
    category: "INPUT_VALIDATION",
    retryable: false,
    fixSuggestion: "请补全必要字段后重试。",
  },
  E110_UNSUPPORTED_DICTIONARY_FORMAT: {
    code: "E110_UNSUPPORTED_DICTIONARY_FORMAT",
    name: "UNSUPPORTED_DICTIONARY_FORMAT",
    description: "词典格式无法识别或不受支持（仅支持 DDLm 与 DDL1）",
    category: "DICTIONARY",
    retryable: false,
    fixSuggestion: "请改用 DDLm 或 DDL1 格式的词典文件。",
  },
  E111_DICTIONARY_EMPTY: {
    code: "E111_DICTIONARY_EMPTY",
    name: "DICTIONARY_EMPTY",
    description: "词典中没有任何有效的字段映射",
    category: "DICTIONARY",
    retryable: false,
    fixSuggestion: "请确认文件是完整的 CIF 词典，而不是数据文件。",
  },
  E112_DICTIONARY_PARSE_FAILED: {
    code: "E112_DICTIONARY_PARSE_FAILED",
    name: "DICTIONARY_PARSE_FAILED",
    description: "词典解析失败",
    category: "DICTIONARY",
    retryable: false,
    fixSuggestion: "请检查词典文件是否损坏或被截断。",
  },
  E120_INVALID_CONVERSION_TARGET: {
    code: "E120_INVALID_CONVERSION_TARGET",
    name: "INVALID_CONVERSION_TARGET",
    description: "转换目标格式无效",
    category: "INPUT_VALIDATION",
    retryable: false,
    fixSuggestion: "目标格式只能是 CIF1 或 CIF2。",
  },

  // E3xx 系统/IO/状态（视情况）
  E301_FILE_NOT_FOUND: {
    code: "E301_FILE_NOT_FOUND",
    name: "FILE_NOT_FOUND",
    description: "文件不存在",
    category: "SYSTEM_IO",
    retryable: false,
    fixSuggestion: "请检查文件路径后重试。",
  },
  E302_PERMISSION_DENIED: {
    code: "E302_PERMISSION_DENIED",
    name: "PERMISSION_DENIED",
    description: "没有文件操作权限",
    category: "SYSTEM_IO",
    retryable: false,
    fixSuggestion: "请检查目录权限或关闭占用文件的程序。",
  },
  E303_DISK_FULL: {
    code: "E303_DISK_FULL",
    name: "DISK_FULL",
    description: "磁盘空间不足",
    category: "SYSTEM_IO",
    retryable: false,
    fixSuggestion: "请释放磁盘空间后重试。",
  },
  E310_INVALID_STATE: {
    code: "E310_INVALID_STATE",
    name: "INVALID_STATE",
    description: "状态不正确或前置条件不满足",
    category: "SYSTEM_IO",
    retryable: false,
    fixSuggestion: "主词典不能被移除；如需替换请修改配置。",
  },
  E311_NOT_FOUND: {
    code: "E311_NOT_FOUND",
    name: "NOT_FOUND",
    description: "资源或对象不存在",
    category: "SYSTEM_IO",
    retryable: false,
    fixSuggestion: "请检查词典名称是否仍在已加载列表中。",
  },
  E320_DICTIONARY_CONFLICT: {
    code: "E320_DICTIONARY_CONFLICT",
    name: "DICTIONARY_CONFLICT",
    description: "同名词典已加载",
    category: "SYSTEM_IO",
    retryable: false,
    fixSuggestion: "请先移除同名词典，或重命名文件后再加载。",
  },

  // E4xx 配置（不可重试）
  E401_CONFIG_INVALID: {
    code: "E401_CONFIG_INVALID",
    name: "CONFIG_INVALID",
    description: "配置文件内容无效",
    category: "CONFIG",
    retryable: false,
    fixSuggestion: "请检查配置文件，或删除后使用默认配置。",
  },

  // E5xx 内部错误（不可重试）
  E500_INTERNAL_ERROR: {
    code: "E500_INTERNAL_ERROR",
    name: "INTERNAL_ERROR",
    description: "内部程序错误或未预期异常",
    category: "INTERNAL",
    retryable: false,
    fixSuggestion: "请重试，如持续出现请反馈日志。",
  },
} as const satisfies Record<string, ErrorCodeInfo>;

export type ErrorCode = keyof typeof ERROR_CODE_INFO;

export function isValidErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_CODE_INFO, code);
}

export function getErrorCodeInfo(code: string): ErrorCodeInfo | undefined {
  if (!isValidErrorCode(code)) {
    return undefined;
  }
  return ERROR_CODE_INFO[code];
}

export function getErrorCategory(code: string): ErrorCategory | "UNKNOWN" {
  return getErrorCodeInfo(code)?.category ?? "UNKNOWN";
}

export function isRetryableErrorCode(code: string): boolean {
  return getErrorCodeInfo(code)?.retryable ?? false;
}

export function getFixSuggestion(code: string): string | undefined {
  return getErrorCodeInfo(code)?.fixSuggestion;
}
