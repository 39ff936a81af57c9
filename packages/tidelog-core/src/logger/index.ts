/**
 * tidelog Logger 模块
 *
 * 多进程安全的日志系统，支持：
 * - 双输出（控制台 + 文件），按级别着色
 * - 固定 UTC 偏移的时间戳、相对路径的调用位置
 * - 每日午夜轮转、备份保留份数，多个进程共享同一文件
 */

export { createLogger, type Logger, type LoggerEnvironment } from "./logger.js";
export { LoggerRegistry, getLogger, getDefaultRegistry, closeAll } from "./registry.js";
export {
  RotatingFileSink,
  withRotatingFileSink,
  type RotatingFileSinkOptions,
  type RotateWhen,
  type BackupFile,
} from "./file-sink.js";
export { ConsoleSink, type ConsoleSinkOptions } from "./console-sink.js";
export {
  formatEvent,
  createFormatter,
  parseLine,
  stripAnsi,
  COLORS,
  SEVERITY_COLORS,
  type FormatOptions,
  type FormatterOptions,
  type ParsedLine,
} from "./format.js";
export {
  toZonedTime,
  formatTimestamp,
  periodKey,
  systemClock,
  DEFAULT_UTC_OFFSET_MINUTES,
  type ZonedTime,
} from "./clock.js";
export { relativize } from "./path-normalizer.js";
export {
  acquireFileLock,
  releaseFileLock,
  withFileLock,
  lockPathFor,
  breakStaleLock,
  type FileLockOptions,
  type LockSnapshot,
} from "./file-lock.js";
export {
  resolveLoggerConfig,
  parseLoggerOptions,
  loadLoggerOptionsFromEnv,
  type LoggerConfig,
} from "./config.js";
export { TidelogError, ConfigError, IOError, LockTimeoutError } from "./errors.js";
export type { Severity, LevelName, LogEvent, LogSink, LoggerOptions, Formatter, Clock } from "./types.js";
export { SEVERITY_WEIGHT, LEVEL_RELATIONS } from "./types.js";
