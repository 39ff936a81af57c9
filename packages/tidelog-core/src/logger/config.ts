/**
 * tidelog 配置校验与加载
 *
 * 构造参数用 zod 校验，非法时抛出 ConfigError（创建 logger 失败）。
 * 也可从环境变量读取（用于服务启动）。
 */

import path from "node:path";
import { z } from "zod";
import { DEFAULT_UTC_OFFSET_MINUTES } from "./clock.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_LOCK_TIMEOUT_MS, DEFAULT_ROTATION_RETRY_MS, DEFAULT_STALE_LOCK_MS } from "./file-sink.js";
import { LEVEL_RELATIONS, type LoggerOptions, type Severity } from "./types.js";

// ============================================================================
// Zod 验证 Schema
// ============================================================================

const LevelNameSchema = z.enum(["debug", "info", "warning", "error", "crit"], {
  errorMap: () => ({ message: 'level must be one of "debug", "info", "warning", "error", "crit"' }),
});

export const LoggerOptionsSchema = z.object({
  filePath: z.string().trim().min(1, "filePath must not be empty"),
  level: LevelNameSchema.optional().default("info"),
  backupCount: z.number().int().min(0, "backupCount must be >= 0").optional().default(0),
  colorEnabled: z.boolean().optional().default(true),
  utcOffsetMinutes: z
    .number()
    .int()
    .min(-14 * 60)
    .max(14 * 60)
    .optional()
    .default(DEFAULT_UTC_OFFSET_MINUTES),
  lockTimeoutMs: z.number().int().positive().optional().default(DEFAULT_LOCK_TIMEOUT_MS),
  staleLockMs: z.number().int().positive().optional().default(DEFAULT_STALE_LOCK_MS),
  rotationRetryMs: z.number().int().min(0).optional().default(DEFAULT_ROTATION_RETRY_MS),
});

export type ParsedLoggerOptions = z.output<typeof LoggerOptionsSchema>;

/** 校验后的不可变配置 */
export interface LoggerConfig {
  /** 绝对路径，同时作为 registry 的 key */
  readonly filePath: string;
  readonly minSeverity: Severity;
  readonly backupCount: number;
  readonly colorEnabled: boolean;
  readonly utcOffsetMinutes: number;
  readonly lockTimeoutMs: number;
  readonly staleLockMs: number;
  readonly rotationRetryMs: number;
}

export function parseLoggerOptions(input: unknown): ParsedLoggerOptions {
  const result = LoggerOptionsSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigError(`Invalid logger configuration: ${detail}`, { issues: result.error.issues });
  }
  return result.data;
}

export function resolveLoggerConfig(options: LoggerOptions): LoggerConfig {
  const parsed = parseLoggerOptions(options);
  return Object.freeze({
    filePath: path.resolve(parsed.filePath),
    minSeverity: LEVEL_RELATIONS[parsed.level],
    backupCount: parsed.backupCount,
    colorEnabled: parsed.colorEnabled,
    utcOffsetMinutes: parsed.utcOffsetMinutes,
    lockTimeoutMs: parsed.lockTimeoutMs,
    staleLockMs: parsed.staleLockMs,
    rotationRetryMs: parsed.rotationRetryMs,
  });
}

// ============================================================================
// 环境变量
// ============================================================================

export const DEFAULT_LOG_FILE = path.join("logs", "app.log");

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const v = readEnv(env, name);
  return v === undefined ? undefined : Number(v);
}

/**
 * TIDELOG_FILE / TIDELOG_LEVEL / TIDELOG_BACKUP_COUNT / TIDELOG_COLOR /
 * TIDELOG_UTC_OFFSET_MINUTES / TIDELOG_LOCK_TIMEOUT_MS
 */
export function loadLoggerOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  fallbackFilePath: string = DEFAULT_LOG_FILE,
): LoggerOptions {
  const color = readEnv(env, "TIDELOG_COLOR");
  return parseLoggerOptions({
    filePath: readEnv(env, "TIDELOG_FILE") ?? fallbackFilePath,
    level: readEnv(env, "TIDELOG_LEVEL")?.toLowerCase(),
    backupCount: readNumber(env, "TIDELOG_BACKUP_COUNT"),
    colorEnabled: color === undefined ? undefined : color !== "false",
    utcOffsetMinutes: readNumber(env, "TIDELOG_UTC_OFFSET_MINUTES"),
    lockTimeoutMs: readNumber(env, "TIDELOG_LOCK_TIMEOUT_MS"),
  });
}
