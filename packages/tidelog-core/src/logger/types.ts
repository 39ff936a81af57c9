/**
 * tidelog - 类型定义
 *
 * 五个级别（DEBUG/INFO/WARNING/ERROR/CRITICAL），双输出（控制台 + 轮转文件）。
 */

export type Severity = "DEBUG" | "INFO" | "WARNING" | "ERROR" | "CRITICAL";

/** 配置中使用的级别名 */
export type LevelName = "debug" | "info" | "warning" | "error" | "crit";

/** 日志级别权重，用于比较 */
export const SEVERITY_WEIGHT: Record<Severity, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

/** 级别名 → 级别 */
export const LEVEL_RELATIONS: Record<LevelName, Severity> = {
  debug: "DEBUG",
  info: "INFO",
  warning: "WARNING",
  error: "ERROR",
  crit: "CRITICAL",
};

/** 单条日志记录（构造后冻结，Sink 只能派生展示副本） */
export interface LogEvent {
  readonly severity: Severity;
  readonly timestamp: Date;
  /** 调用方源文件的绝对路径（或 file:// URL） */
  readonly sourcePath: string;
  readonly sourceLine: number;
  readonly message: string;
  /** 可选的附加数据，会序列化为 JSON 追加到消息后 */
  readonly data?: unknown;
}

/** 把事件渲染成一行文本 */
export type Formatter = (event: LogEvent) => string;

/** 返回当前时刻；测试中注入以模拟跨越午夜 */
export type Clock = () => Date;

/** Sink 接口：输出日志到某个目标 */
export interface LogSink {
  write(event: LogEvent): void;
  /** 刷新并关闭资源（如文件句柄） */
  close(): void;
}

/** getLogger 的构造参数 */
export interface LoggerOptions {
  /** 日志文件路径，同时作为 registry 的 key */
  filePath: string;
  /** 最低输出级别，默认 "info" */
  level?: LevelName;
  /** 保留最近多少份轮转文件，0 表示全部保留 */
  backupCount?: number;
  /** 是否为消息着色，默认 true */
  colorEnabled?: boolean;
  /** 时间戳使用的固定 UTC 偏移（分钟），默认 480（UTC+8） */
  utcOffsetMinutes?: number;
  /** 轮转锁的最长等待时间（毫秒） */
  lockTimeoutMs?: number;
  /** 锁文件超过该时长视为残留，可被接管（毫秒） */
  staleLockMs?: number;
  /** 锁等待超时后，多久再尝试轮转（毫秒） */
  rotationRetryMs?: number;
}
