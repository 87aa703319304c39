/** SettingsStore - 管理核心配置，支持版本兼容性检查、导入导出与用户偏好持久化 */

import type {
  CoreSettings,
  ConversionSettings,
  DictionarySourceSetting,
  ILogger,
  LogLevel,
  PreferenceKey,
  Result,
  UserPreferenceStore,
} from "../types";
import { ok, err } from "../types";
import type { FileStorage } from "./file-storage";
import { SETTINGS_FILE } from "./file-storage";

/**
 * CoreSettings 必填字段列表
 * 用于验证设置对象的完整性
 */
export const REQUIRED_SETTINGS_FIELDS: (keyof CoreSettings)[] = [
  "version",
  "logLevel",
  "primaryDictionaryPath",
  "additionalDictionaries",
  "conversion",
  "neverDeprecatedFields",
  "dataNames",
];

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const CONVERSION_FLAGS: (keyof ConversionSettings)[] = [
  "removeDuplicates",
  "deprecatedSection",
  "checkcifCompatibility",
];

/**
 * 词典中标注为弃用、但 checkCIF 仍要求提交的字段
 */
export const DEFAULT_NEVER_DEPRECATED_FIELDS: string[] = [
  "_atom_sites_solution_primary",
  "_atom_sites_solution_secondary",
  "_atom_sites_solution_hydrogens",
];

/**
 * 验证错误接口
 */
export interface SettingsValidationError {
  field: string;
  message: string;
  expectedType?: string;
  actualType?: string;
}

/**
 * 验证结果接口
 */
export interface SettingsValidationResult {
  valid: boolean;
  errors: SettingsValidationError[];
}

/** 默认设置 */
export const DEFAULT_SETTINGS: CoreSettings = {
  version: "1.0.0",

  // 日志级别
  logLevel: "info",

  // 词典
  primaryDictionaryPath: "",
  additionalDictionaries: [],

  // 转换选项
  conversion: {
    removeDuplicates: true,
    deprecatedSection: true,
    checkcifCompatibility: true,
  },

  neverDeprecatedFields: DEFAULT_NEVER_DEPRECATED_FIELDS,

  // 用户允许的数据名
  dataNames: {
    allowedPrefixes: [],
    allowedFields: [],
  },
};

/** 深拷贝设置，避免引用共享 */
export function cloneSettings(settings: CoreSettings): CoreSettings {
  return {
    ...settings,
    additionalDictionaries: settings.additionalDictionaries.map(entry => ({ ...entry })),
    conversion: { ...settings.conversion },
    neverDeprecatedFields: [...settings.neverDeprecatedFields],
    dataNames: {
      allowedPrefixes: [...settings.dataNames.allowedPrefixes],
      allowedFields: [...settings.dataNames.allowedFields],
    },
  };
}

/** SettingsStore 依赖 */
export interface SettingsStoreOptions {
  storage: FileStorage;
  logger: ILogger;
  settingsFilePath?: string;
}

/** SettingsStore 实现类 */
export class SettingsStore implements UserPreferenceStore {
  private readonly storage: FileStorage;
  private readonly logger: ILogger;
  private readonly settingsFilePath: string;
  private settings: CoreSettings;
  private listeners: Array<(settings: CoreSettings) => void> = [];

  constructor(options: SettingsStoreOptions) {
    this.storage = options.storage;
    this.logger = options.logger;
    this.settingsFilePath = options.settingsFilePath ?? SETTINGS_FILE;
    this.settings = cloneSettings(DEFAULT_SETTINGS);
  }

  /** 加载设置；文件不存在或无效时写入默认值 */
  async load(): Promise<Result<CoreSettings>> {
    if (!(await this.storage.exists(this.settingsFilePath))) {
      // 首次使用，使用默认设置
      this.settings = cloneSettings(DEFAULT_SETTINGS);
      const saveResult = await this.save();
      if (!saveResult.ok) return saveResult;
      return ok(this.getSettings());
    }

    const readResult = await this.storage.readJSON(this.settingsFilePath);
    if (!readResult.ok) {
      this.logger.warn("SettingsStore", "配置文件读取失败，重置为默认值", {
        error: readResult.error,
      });
      return this.resetAfterInvalidFile();
    }

    const data = readResult.value;
    const validation = this.validateSettingsDetailed(data);
    if (!validation.valid || !isSettingsShape(data)) {
      this.logger.warn("SettingsStore", "配置校验失败，重置为默认值", {
        errors: validation.errors,
      });
      return this.resetAfterInvalidFile();
    }

    // 检查版本兼容性
    const compatibilityResult = this.checkVersionCompatibility(data.version);
    if (!compatibilityResult.ok) {
      this.logger.warn("SettingsStore", "配置版本不兼容，重置为默认值", {
        version: data.version,
      });
      return this.resetAfterInvalidFile();
    }

    this.settings = this.mergeSettings(DEFAULT_SETTINGS, data);
    this.logger.debug("SettingsStore", "配置加载完成", {
      path: this.settingsFilePath,
    });
    return ok(this.getSettings());
  }

  /**
   * 获取设置（副本）
   */
  getSettings(): CoreSettings {
    return cloneSettings(this.settings);
  }

  /**
   * 更新设置
   */
  async updateSettings(partial: Partial<CoreSettings>): Promise<Result<void>> {
    const merged = this.mergeSettings(this.settings, partial);
    const validation = this.validateSettingsDetailed(merged);
    if (!validation.valid) {
      return err("E401_CONFIG_INVALID", "设置校验失败", { errors: validation.errors });
    }

    this.settings = merged;
    const saveResult = await this.save();
    if (!saveResult.ok) {
      return saveResult;
    }

    this.notifyListeners();
    return ok(undefined);
  }

  /**
   * 导出设置
   */
  exportSettings(): string {
    return JSON.stringify(this.settings, null, 2);
  }

  /**
   * 导入设置
   */
  async importSettings(json: string): Promise<Result<void>> {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      return err("E401_CONFIG_INVALID", "Failed to parse settings JSON", error);
    }

    const validation = this.validateSettingsDetailed(data);
    if (!validation.valid || !isSettingsShape(data)) {
      return err("E401_CONFIG_INVALID", "Invalid settings format", {
        errors: validation.errors,
      });
    }

    const compatibilityResult = this.checkVersionCompatibility(data.version);
    if (!compatibilityResult.ok) {
      return compatibilityResult;
    }

    this.settings = this.mergeSettings(DEFAULT_SETTINGS, data);
    const saveResult = await this.save();
    if (!saveResult.ok) {
      return saveResult;
    }

    this.notifyListeners();
    return ok(undefined);
  }

  /**
   * 重置为默认值
   */
  async resetToDefaults(): Promise<Result<void>> {
    this.settings = cloneSettings(DEFAULT_SETTINGS);
    const saveResult = await this.save();
    if (!saveResult.ok) {
      return saveResult;
    }
    this.notifyListeners();
    return ok(undefined);
  }

  /**
   * 订阅设置变更
   * @returns 取消订阅函数
   */
  subscribe(listener: (settings: CoreSettings) => void): () => void {
    this.listeners.push(listener);

    return () => {
      const index = this.listeners.indexOf(listener);
      if (index > -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  // ==========================================================================
  // UserPreferenceStore
  // ==========================================================================

  /** 读取 dataNames 命名空间下的字符串集合 */
  loadStringSet(key: PreferenceKey): string[] {
    return [...this.settings.dataNames[key]];
  }

  /** 保存字符串集合（排序去重） */
  async saveStringSet(key: PreferenceKey, values: Iterable<string>): Promise<Result<void>> {
    const normalized = [...new Set(values)].sort();
    return this.updateSettings({
      dataNames: { ...this.settings.dataNames, [key]: normalized },
    });
  }

  // ==========================================================================
  // 内部方法
  // ==========================================================================

  /**
   * 保存设置到磁盘
   */
  private async save(): Promise<Result<void>> {
    return this.storage.writeJSON(this.settingsFilePath, this.settings);
  }

  private async resetAfterInvalidFile(): Promise<Result<CoreSettings>> {
    this.settings = cloneSettings(DEFAULT_SETTINGS);
    const saveResult = await this.save();
    if (!saveResult.ok) return saveResult;
    return ok(this.getSettings());
  }

  /**
   * 通知所有监听器
   */
  private notifyListeners(): void {
    for (const listener of this.listeners) {
      listener(this.getSettings());
    }
  }

  /**
   * 检查版本兼容性：主版本号必须匹配
   */
  private checkVersionCompatibility(version: string): Result<void> {
    const currentMajor = DEFAULT_SETTINGS.version.split(".")[0];
    const loadedMajor = version.split(".")[0];

    if (currentMajor !== loadedMajor) {
      return err(
        "E401_CONFIG_INVALID",
        `Incompatible settings version: ${version} (current: ${DEFAULT_SETTINGS.version})`,
        { version, currentVersion: DEFAULT_SETTINGS.version }
      );
    }

    return ok(undefined);
  }

  /** 详细验证设置结构 */
  validateSettingsDetailed(data: unknown): SettingsValidationResult {
    const errors: SettingsValidationError[] = [];

    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      errors.push({
        field: "root",
        message: "Settings must be a non-null object",
        expectedType: "object",
        actualType: data === null ? "null" : typeof data,
      });
      return { valid: false, errors };
    }

    const settings = new Map<string, unknown>(Object.entries(data));

    for (const field of REQUIRED_SETTINGS_FIELDS) {
      if (!settings.has(field)) {
        errors.push({ field, message: `${field} is required` });
      }
    }

    const version = settings.get("version");
    if (settings.has("version") && typeof version !== "string") {
      errors.push({
        field: "version",
        message: "version must be a string",
        expectedType: "string",
        actualType: typeof version,
      });
    }

    const logLevel = settings.get("logLevel");
    if (settings.has("logLevel") && !isLogLevel(logLevel)) {
      errors.push({
        field: "logLevel",
        message: "logLevel must be one of debug, info, warn, error",
        expectedType: "'debug' | 'info' | 'warn' | 'error'",
        actualType: typeof logLevel === "string" ? `'${logLevel}'` : typeof logLevel,
      });
    }

    const primary = settings.get("primaryDictionaryPath");
    if (settings.has("primaryDictionaryPath") && typeof primary !== "string") {
      errors.push({
        field: "primaryDictionaryPath",
        message: "primaryDictionaryPath must be a string",
        expectedType: "string",
        actualType: typeof primary,
      });
    }

    this.validateAdditionalDictionaries(settings.get("additionalDictionaries"), errors);
    this.validateConversion(settings.get("conversion"), errors);

    const never = settings.get("neverDeprecatedFields");
    if (settings.has("neverDeprecatedFields") && !isStringArray(never)) {
      errors.push({
        field: "neverDeprecatedFields",
        message: "neverDeprecatedFields must be an array of strings",
        expectedType: "string[]",
      });
    }

    this.validateDataNames(settings.get("dataNames"), errors);

    return { valid: errors.length === 0, errors };
  }

  private validateAdditionalDictionaries(
    value: unknown,
    errors: SettingsValidationError[]
  ): void {
    if (value === undefined) return;
    if (!Array.isArray(value)) {
      errors.push({
        field: "additionalDictionaries",
        message: "additionalDictionaries must be an array",
        expectedType: "array",
        actualType: typeof value,
      });
      return;
    }
    value.forEach((entry: unknown, index) => {
      if (!isDictionarySourceSetting(entry)) {
        errors.push({
          field: `additionalDictionaries[${index}]`,
          message: "entry must have a string path and a boolean active flag",
        });
      }
    });
  }

  private validateConversion(value: unknown, errors: SettingsValidationError[]): void {
    if (value === undefined) return;
    if (typeof value !== "object" || value === null) {
      errors.push({
        field: "conversion",
        message: "conversion must be an object",
        expectedType: "object",
        actualType: value === null ? "null" : typeof value,
      });
      return;
    }
    const conversion = new Map<string, unknown>(Object.entries(value));
    for (const flag of CONVERSION_FLAGS) {
      if (conversion.has(flag) && typeof conversion.get(flag) !== "boolean") {
        errors.push({
          field: `conversion.${flag}`,
          message: `${flag} must be a boolean`,
          expectedType: "boolean",
          actualType: typeof conversion.get(flag),
        });
      }
    }
  }

  private validateDataNames(value: unknown, errors: SettingsValidationError[]): void {
    if (value === undefined) return;
    if (typeof value !== "object" || value === null) {
      errors.push({
        field: "dataNames",
        message: "dataNames must be an object",
        expectedType: "object",
      });
      return;
    }
    const dataNames = new Map<string, unknown>(Object.entries(value));
    for (const key of ["allowedPrefixes", "allowedFields"]) {
      if (dataNames.has(key) && !isStringArray(dataNames.get(key))) {
        errors.push({
          field: `dataNames.${key}`,
          message: `${key} must be an array of strings`,
          expectedType: "string[]",
        });
      }
    }
  }

  /**
   * 合并设置（嵌套对象逐层合并，数组整体替换）
   */
  private mergeSettings(base: CoreSettings, loaded: Partial<CoreSettings>): CoreSettings {
    const merged = cloneSettings(base);
    if (loaded.version !== undefined) merged.version = loaded.version;
    if (loaded.logLevel !== undefined) merged.logLevel = loaded.logLevel;
    if (loaded.primaryDictionaryPath !== undefined) {
      merged.primaryDictionaryPath = loaded.primaryDictionaryPath;
    }
    if (loaded.additionalDictionaries !== undefined) {
      merged.additionalDictionaries = loaded.additionalDictionaries.map(entry => ({ ...entry }));
    }
    if (loaded.conversion !== undefined) {
      merged.conversion = { ...merged.conversion, ...loaded.conversion };
    }
    if (loaded.neverDeprecatedFields !== undefined) {
      merged.neverDeprecatedFields = [...loaded.neverDeprecatedFields];
    }
    if (loaded.dataNames !== undefined) {
      merged.dataNames = {
        allowedPrefixes: [...(loaded.dataNames.allowedPrefixes ?? merged.dataNames.allowedPrefixes)],
        allowedFields: [...(loaded.dataNames.allowedFields ?? merged.dataNames.allowedFields)],
      };
    }
    return merged;
  }
}

// ============================================================================
// 类型守卫
// ============================================================================

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === "string");
}

function isDictionarySourceSetting(value: unknown): value is DictionarySourceSetting {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    typeof value.path === "string" &&
    "active" in value &&
    typeof value.active === "boolean"
  );
}

/** 通过 validateSettingsDetailed 后收窄类型 */
function isSettingsShape(value: unknown): value is CoreSettings {
  return (
    typeof value === "object" &&
    value !== null &&
    "version" in value &&
    typeof value.version === "string" &&
    "logLevel" in value &&
    isLogLevel(value.logLevel) &&
    "additionalDictionaries" in value &&
    Array.isArray(value.additionalDictionaries) &&
    value.additionalDictionaries.every(isDictionarySourceSetting) &&
    "conversion" in value &&
    typeof value.conversion === "object" &&
    value.conversion !== null &&
    "neverDeprecatedFields" in value &&
    isStringArray(value.neverDeprecatedFields) &&
    "dataNames" in value &&
    typeof value.dataNames === "object" &&
    value.dataNames !== null
  );
}
