/**
 * tidelog - 错误类型
 *
 * ConfigError：创建 logger 时配置非法，致命。
 * IOError：写入/轮转/打开失败，抛给调用方。
 * LockTimeoutError：轮转锁等待超时，由文件 Sink 降级处理。
 */

import type { ZodIssue } from "zod";

export type TidelogErrorCode = "CONFIG_INVALID" | "IO_FAILED" | "LOCK_TIMEOUT";

export abstract class TidelogError extends Error {
  abstract readonly code: TidelogErrorCode;
}

export class ConfigError extends TidelogError {
  readonly code = "CONFIG_INVALID";
  readonly issues: ZodIssue[];

  constructor(message: string, options: { issues?: ZodIssue[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.issues = options.issues ?? [];
  }
}

export class IOError extends TidelogError {
  readonly code = "IO_FAILED";
  readonly path: string;
  /** 底层 errno 代码，例如 ENOSPC、EACCES */
  readonly errno?: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = "IOError";
    this.path = path;
    this.errno = errnoCode(cause);
  }
}

export class LockTimeoutError extends TidelogError {
  readonly code = "LOCK_TIMEOUT";
  readonly lockPath: string;
  readonly waitedMs: number;

  constructor(lockPath: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for ${lockPath}`);
    this.name = "LockTimeoutError";
    this.lockPath = lockPath;
    this.waitedMs = waitedMs;
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
