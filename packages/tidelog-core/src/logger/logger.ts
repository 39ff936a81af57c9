/**
 * tidelog Logger - 门面
 *
 * 一个 logger 绑定一个格式化器、一个控制台 Sink、一个轮转文件 Sink。
 * 低于最低级别的调用直接返回；否则记录调用位置、构造事件并依次交给两个 Sink。
 */

import os from "node:os";
import { captureCallsite } from "./callsite.js";
import { systemClock } from "./clock.js";
import type { LoggerConfig } from "./config.js";
import { ConsoleSink } from "./console-sink.js";
import { ConfigError, IOError } from "./errors.js";
import { RotatingFileSink } from "./file-sink.js";
import { createFormatter } from "./format.js";
import { SEVERITY_WEIGHT, type Clock, type LogEvent, type Severity } from "./types.js";

export interface Logger {
  readonly config: LoggerConfig;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warning(message: string, data?: unknown): void;
  /** warning 的别名 */
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  critical(message: string, data?: unknown): void;
  log(severity: Severity, message: string, data?: unknown): void;
  isEnabledFor(severity: Severity): boolean;
  /** 刷新文件内容到磁盘 */
  flush(): void;
  /** 刷新并关闭文件句柄 */
  close(): void;
}

/** 运行环境注入点，测试中用于替换时钟、输出流等 */
export interface LoggerEnvironment {
  stream?: NodeJS.WritableStream;
  now?: Clock;
  hostname?: string;
  cwd?: () => string;
}

export function createLogger(config: LoggerConfig, env: LoggerEnvironment = {}): Logger {
  const now = env.now ?? systemClock;
  const minWeight = SEVERITY_WEIGHT[config.minSeverity];
  const formatter = createFormatter({
    colorEnabled: config.colorEnabled,
    hostname: env.hostname ?? os.hostname(),
    cwd: env.cwd,
    utcOffsetMinutes: config.utcOffsetMinutes,
  });

  const consoleSink = new ConsoleSink({ formatter, stream: env.stream });
  let fileSink: RotatingFileSink;
  try {
    fileSink = RotatingFileSink.open(config.filePath, {
      backupCount: config.backupCount,
      utcOffsetMinutes: config.utcOffsetMinutes,
      lockTimeoutMs: config.lockTimeoutMs,
      staleLockMs: config.staleLockMs,
      rotationRetryMs: config.rotationRetryMs,
      now,
      formatter,
      // 轮转相关的可恢复问题只提示到控制台
      onWarning: (message) => consoleSink.writeLine(`[tidelog] ${message}`),
    });
  } catch (err) {
    if (err instanceof IOError) {
      throw new ConfigError(`Cannot open log file ${config.filePath}: ${err.message}`, { cause: err });
    }
    throw err;
  }

  function isEnabledFor(severity: Severity): boolean {
    return SEVERITY_WEIGHT[severity] >= minWeight;
  }

  function emit(severity: Severity, message: string, data: unknown, boundary: (...args: never[]) => unknown): void {
    if (!isEnabledFor(severity)) return;
    const site = captureCallsite(boundary);
    const event: LogEvent = Object.freeze({
      severity,
      timestamp: now(),
      sourcePath: site.path,
      sourceLine: site.line,
      message,
      data,
    });
    // 控制台先写且从不抛错，文件写入失败（IOError）再抛给调用方
    consoleSink.write(event);
    fileSink.write(event);
  }

  const logger: Logger = {
    config,
    debug(msg, data) {
      emit("DEBUG", msg, data, logger.debug);
    },
    info(msg, data) {
      emit("INFO", msg, data, logger.info);
    },
    warning(msg, data) {
      emit("WARNING", msg, data, logger.warning);
    },
    warn(msg, data) {
      emit("WARNING", msg, data, logger.warn);
    },
    error(msg, data) {
      emit("ERROR", msg, data, logger.error);
    },
    critical(msg, data) {
      emit("CRITICAL", msg, data, logger.critical);
    },
    log(severity, msg, data) {
      emit(severity, msg, data, logger.log);
    },
    isEnabledFor,
    flush() {
      fileSink.flush();
    },
    close() {
      consoleSink.close();
      fileSink.close();
    },
  };

  return logger;
}
