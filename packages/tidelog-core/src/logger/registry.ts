/**
 * tidelog - Logger 注册表
 *
 * 按文件绝对路径缓存 logger：同名再次获取返回同一实例，不会重复挂载 Sink
 * （否则每条日志会被写两遍）。注册表是普通对象，测试可各自创建互不影响；
 * 进程级的默认注册表在首次 getLogger 时创建。
 */

import path from "node:path";
import { resolveLoggerConfig } from "./config.js";
import { createLogger, type Logger, type LoggerEnvironment } from "./logger.js";
import type { LoggerOptions } from "./types.js";

export class LoggerRegistry {
  private readonly loggers = new Map<string, Logger>();
  private readonly env: LoggerEnvironment;

  constructor(env: LoggerEnvironment = {}) {
    this.env = env;
  }

  /** 返回已存在的同路径 logger；首次获取时按 options 创建 */
  getLogger(options: LoggerOptions): Logger {
    const config = resolveLoggerConfig(options);
    const existing = this.loggers.get(config.filePath);
    if (existing) return existing;

    const logger = createLogger(config, this.env);
    this.loggers.set(config.filePath, logger);
    return logger;
  }

  has(filePath: string): boolean {
    return this.loggers.has(path.resolve(filePath));
  }

  get size(): number {
    return this.loggers.size;
  }

  /** 关闭所有 logger 并清空注册表；某个关闭失败不影响其余 */
  closeAll(): void {
    const errors: unknown[] = [];
    for (const logger of this.loggers.values()) {
      try {
        logger.close();
      } catch (err) {
        errors.push(err);
      }
    }
    this.loggers.clear();
    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) throw new AggregateError(errors, "Failed to close some loggers");
  }
}

let defaultRegistry: LoggerRegistry | null = null;

export function getDefaultRegistry(): LoggerRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new LoggerRegistry();
  }
  return defaultRegistry;
}

export function getLogger(options: LoggerOptions): Logger {
  return getDefaultRegistry().getLogger(options);
}

export function closeAll(): void {
  defaultRegistry?.closeAll();
}
