/**
 * 日志接口定义
 *
 * 词典、转换与校验组件只依赖这四个方法；context.event 作为日志事件名。
 */

import type { LogLevel } from "./settings";

/** 日志记录器接口 */
export interface ILogger {
    debug(module: string, message: string, context?: Record<string, unknown>): void;
    info(module: string, message: string, context?: Record<string, unknown>): void;
    warn(module: string, message: string, context?: Record<string, unknown>): void;
    error(module: string, message: string, error?: Error, context?: Record<string, unknown>): void;
    setLogLevel(level: LogLevel): void;
}
