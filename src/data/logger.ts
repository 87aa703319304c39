/**
 * Logger 实现
 * 提供结构化日志记录功能，支持循环日志（默认 1MB 上限）
 *
 * - 结构化日志格式（JSON 行）
 * - 循环日志机制
 * - 日志级别控制
 * - CifModelError 自动附带错误码信息
 */

import type { ILogger, LogLevel, Result } from "../types";
import { CifModelError } from "../types";
import { getErrorCodeInfo } from "./error-codes";

export type { LogLevel } from "../types";

/**
 * 日志条目接口
 */
export interface LogEntry {
  /** ISO 8601 格式时间戳 */
  timestamp: string;
  /** 日志级别 */
  level: LogLevel;
  /** 模块名称 */
  module: string;
  /** 事件类型（如 DICTIONARY_LOADED, INDEX_REBUILT 等） */
  event: string;
  /** 人类可读消息 */
  message: string;
  /** 上下文数据（可选） */
  context?: Record<string, unknown>;
  /** 错误信息（可选） */
  error?: {
    name: string;
    message: string;
    stack?: string;
    /** 错误码 (E###_NAME) */
    code?: string;
    /** 错误码名称 */
    codeName?: string;
    /** 修复建议 */
    fixSuggestion?: string;
  };
}

/** 日志持久化接口（FileStorage 满足此接口） */
export interface LogStorage {
  write(path: string, content: string): Promise<Result<void>>;
  read(path: string): Promise<Result<string>>;
  exists(path: string): Promise<boolean>;
}

/**
 * 日志级别优先级映射
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * 默认事件类型映射
 */
const DEFAULT_EVENTS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

const encoder = new TextEncoder();

/**
 * Logger 实现类
 *
 * storage 为 null 时只写入内存缓冲区。
 */
export class Logger implements ILogger {
  private logBuffer: string[] = [];
  private readonly maxLogSize: number;
  private currentSize = 0;
  private readonly logFilePath: string;
  private readonly storage: LogStorage | null;
  private minLevel: LogLevel;
  private initialized = false;
  private pendingWrite: Promise<void> = Promise.resolve();

  /**
   * @param logFilePath 日志文件路径（相对数据目录）
   * @param storage 文件存储；null 表示仅内存
   * @param minLevel 最小日志级别
   * @param maxLogSize 最大日志大小（字节），默认 1MB
   */
  constructor(
    logFilePath: string,
    storage: LogStorage | null,
    minLevel: LogLevel = "info",
    maxLogSize: number = 1024 * 1024
  ) {
    this.logFilePath = logFilePath;
    this.storage = storage;
    this.minLevel = minLevel;
    this.maxLogSize = maxLogSize;
  }

  /**
   * 初始化 Logger，读取既有日志文件（跨会话追加）
   */
  async initialize(): Promise<void> {
    if (this.initialized || !this.storage) {
      this.initialized = true;
      return;
    }

    if (await this.storage.exists(this.logFilePath)) {
      const readResult = await this.storage.read(this.logFilePath);
      if (readResult.ok && readResult.value) {
        const previous = readResult.value.split("\n").filter(line => line.trim());
        // 旧条目在前，启动前已产生的条目在后
        this.logBuffer = [...previous, ...this.logBuffer];
        this.currentSize = this.logBuffer.reduce(
          (size, line) => size + encoder.encode(line + "\n").length,
          0
        );
        if (this.currentSize > this.maxLogSize) {
          this.rotateLog(0);
        }
      } else if (!readResult.ok) {
        console.error("Logger initialization failed:", readResult.error.message);
      }
    }

    this.initialized = true;
  }

  /**
   * 调试日志
   */
  debug(module: string, message: string, context?: Record<string, unknown>): void {
    this.log("debug", module, message, undefined, context);
  }

  /**
   * 信息日志
   */
  info(module: string, message: string, context?: Record<string, unknown>): void {
    this.log("info", module, message, undefined, context);
  }

  /**
   * 警告日志
   */
  warn(module: string, message: string, context?: Record<string, unknown>): void {
    this.log("warn", module, message, undefined, context);
  }

  /**
   * 错误日志；CifModelError 会附带错误码名称与修复建议
   */
  error(module: string, message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log("error", module, message, error, context);
  }

  /**
   * 获取日志内容
   */
  getLogContent(): string {
    return this.logBuffer.join("\n");
  }

  /**
   * 清空日志
   */
  clear(): void {
    this.logBuffer = [];
    this.currentSize = 0;
  }

  /**
   * 获取当前日志大小（字节）
   */
  getCurrentSize(): number {
    return this.currentSize;
  }

  /**
   * 获取日志条目数量
   */
  getEntryCount(): number {
    return this.logBuffer.length;
  }

  /**
   * 设置最小日志级别
   */
  setLogLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * 获取当前日志级别
   */
  getLogLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * 等待所有排队的文件写入完成
   */
  async flush(): Promise<void> {
    await this.pendingWrite;
  }

  /**
   * 核心日志方法
   */
  private log(
    level: LogLevel,
    module: string,
    message: string,
    error?: Error,
    context?: Record<string, unknown>
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    // 从 context 中提取 event，其余字段保留
    let event = DEFAULT_EVENTS[level];
    let cleanContext: Record<string, unknown> | undefined;
    if (context) {
      const { event: contextEvent, ...rest } = context;
      if (typeof contextEvent === "string" && contextEvent) {
        event = contextEvent;
      }
      cleanContext = Object.keys(rest).length > 0 ? rest : undefined;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      event,
      message,
    };

    if (cleanContext) {
      entry.context = cleanContext;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      if (error instanceof CifModelError) {
        const codeInfo = getErrorCodeInfo(error.code);
        entry.error.code = error.code;
        entry.error.codeName = codeInfo?.name;
        entry.error.fixSuggestion = codeInfo?.fixSuggestion;
      }
    }

    const logLine = JSON.stringify(entry);
    const logLineSize = encoder.encode(logLine + "\n").length;

    if (this.currentSize + logLineSize > this.maxLogSize) {
      this.rotateLog(logLineSize);
    }

    this.logBuffer.push(logLine);
    this.currentSize += logLineSize;

    if (this.storage) {
      // 串行写入，避免并发覆盖
      this.pendingWrite = this.pendingWrite
        .then(() => this.writeToFile())
        .catch((writeError: unknown) => {
          console.error("Failed to write log to file:", writeError);
        });
    }
  }

  /**
   * 检查是否应该记录该级别的日志
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  /**
   * 解析日志行为 LogEntry 对象
   * @returns 解析后的 LogEntry 或 null（解析失败时）
   */
  static parseLogEntry(logLine: string): LogEntry | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(logLine);
    } catch {
      return null;
    }
    if (!isLogEntry(parsed)) {
      return null;
    }
    return parsed;
  }

  /**
   * 循环日志（删除旧日志以保持大小在限制内）
   */
  private rotateLog(newEntrySize: number): void {
    const targetSize = this.maxLogSize - newEntrySize;

    while (this.logBuffer.length > 0 && this.currentSize > targetSize) {
      const removedLine = this.logBuffer.shift();
      if (removedLine !== undefined) {
        this.currentSize -= encoder.encode(removedLine + "\n").length;
      }
    }
  }

  /**
   * 写入日志到文件
   */
  private async writeToFile(): Promise<void> {
    if (!this.storage) return;
    const result = await this.storage.write(this.logFilePath, this.getLogContent());
    if (!result.ok) {
      // 写入失败时只在控制台输出，避免递归
      console.error("Failed to write log file:", result.error.message);
    }
  }
}

const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

function isLogEntry(value: unknown): value is LogEntry {
  if (typeof value !== "object" || value === null) return false;
  const fields = new Map<string, unknown>(Object.entries(value));
  const level = fields.get("level");
  return (
    typeof fields.get("timestamp") === "string" &&
    typeof level === "string" &&
    LOG_LEVELS.includes(level) &&
    typeof fields.get("module") === "string" &&
    typeof fields.get("event") === "string" &&
    typeof fields.get("message") === "string"
  );
}
