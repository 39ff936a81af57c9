/**
 * tidelog - 轮转文件 Sink
 *
 * 功能：
 * - 以 O_APPEND 打开，每行一次 write(2)，多进程追加不会交错
 * - 每到午夜（固定 UTC 偏移下）轮转：<path> → <path>.YYYY-MM-DD
 * - 轮转在跨进程锁内进行，并在锁内复查，避免重复轮转
 * - backupCount > 0 时只保留最近的 backupCount 份，0 表示全部保留
 *
 * 磁盘上的文件本身就是状态：活动文件的 inode 与备份文件名，无额外元数据。
 */

import fs from "node:fs";
import path from "node:path";
import { DEFAULT_UTC_OFFSET_MINUTES, periodKey, systemClock } from "./clock.js";
import { ConfigError, IOError, LockTimeoutError, errnoCode, errorMessage } from "./errors.js";
import { acquireFileLock, lockPathFor, releaseFileLock, type LockHandle } from "./file-lock.js";
import { createFormatter } from "./format.js";
import type { Clock, Formatter, LogEvent, LogSink } from "./types.js";

export const DEFAULT_LOCK_TIMEOUT_MS = 5_000;
export const DEFAULT_STALE_LOCK_MS = 10_000;
export const DEFAULT_ROTATION_RETRY_MS = 60_000;

export type RotateWhen = "midnight";

export interface RotatingFileSinkOptions {
  /** 保留的备份份数，0 表示全部保留 */
  backupCount?: number;
  when?: RotateWhen;
  utcOffsetMinutes?: number;
  lockTimeoutMs?: number;
  staleLockMs?: number;
  rotationRetryMs?: number;
  now?: Clock;
  formatter?: Formatter;
  /** 可恢复问题（锁超时、清理失败）的提示出口 */
  onWarning?: (message: string) => void;
}

export interface BackupFile {
  path: string;
  /** 备份所属周期 YYYY-MM-DD */
  period: string;
  /** 同一周期内的序号，首个为 0 */
  seq: number;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function ensureDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new IOError(`Failed to create log directory ${dir}`, dir, err);
  }
}

function statOrNull(p: string): fs.Stats | null {
  try {
    return fs.statSync(p);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw new IOError(`Failed to stat ${p}`, p, err);
  }
}

function defaultWarning(message: string): void {
  process.emitWarning(message, { code: "TIDELOG_ROTATION" });
}

export class RotatingFileSink implements LogSink {
  readonly filePath: string;
  readonly lockPath: string;
  readonly backupCount: number;

  private readonly utcOffsetMinutes: number;
  private readonly lockTimeoutMs: number;
  private readonly staleLockMs: number;
  private readonly rotationRetryMs: number;
  private readonly now: Clock;
  private readonly formatter: Formatter;
  private readonly onWarning: (message: string) => void;
  private readonly backupPattern: RegExp;

  private fd: number | null = null;
  private isClosed = false;
  private currentPeriod = "";
  private nextRotationAttemptAt = 0;

  /**
   * 创建父目录并以追加方式打开（不存在则创建）。
   * 多个进程打开同一路径是预期用法。
   */
  static open(filePath: string, opts: RotatingFileSinkOptions = {}): RotatingFileSink {
    return new RotatingFileSink(filePath, opts);
  }

  private constructor(filePath: string, opts: RotatingFileSinkOptions) {
    const when = opts.when ?? "midnight";
    if (when !== "midnight") {
      throw new ConfigError(`Unsupported rotation schedule: ${String(when)}`);
    }
    const backupCount = opts.backupCount ?? 0;
    if (!Number.isInteger(backupCount) || backupCount < 0) {
      throw new ConfigError(`backupCount must be a non-negative integer, got ${backupCount}`);
    }

    this.filePath = path.resolve(filePath);
    this.lockPath = lockPathFor(this.filePath);
    this.backupCount = backupCount;
    this.utcOffsetMinutes = opts.utcOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES;
    this.lockTimeoutMs = opts.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.staleLockMs = opts.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    this.rotationRetryMs = opts.rotationRetryMs ?? DEFAULT_ROTATION_RETRY_MS;
    this.now = opts.now ?? systemClock;
    this.formatter = opts.formatter ?? createFormatter({ utcOffsetMinutes: this.utcOffsetMinutes });
    this.onWarning = opts.onWarning ?? defaultWarning;
    this.backupPattern = new RegExp(
      `^${escapeRegExp(path.basename(this.filePath))}\\.(\\d{4}-\\d{2}-\\d{2})(?:\\.(\\d+))?$`,
    );

    ensureDir(path.dirname(this.filePath));
    const nowPeriod = this.periodOf(this.now());
    this.openActive(nowPeriod);

    // 遗留的非空文件属于其最后写入的那一天，新的一天首次写入时会被轮转
    const st = this.fstat();
    if (st.size > 0) {
      const mtimePeriod = this.periodOf(st.mtime);
      if (mtimePeriod < nowPeriod) this.currentPeriod = mtimePeriod;
    }
  }

  /** 当前活动文件所属周期 YYYY-MM-DD */
  get period(): string {
    return this.currentPeriod;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  write(event: LogEvent): void {
    this.append(this.formatter(event));
  }

  /**
   * 追加一行（自动补换行）。跨过午夜时先轮转。
   * 轮转失败时该行仍写入当前文件，随后抛出轮转错误。
   * 轮转后未能重新打开文件时，下次追加会再次尝试打开。
   */
  append(line: string): void {
    if (this.isClosed) {
      throw new IOError(`Log file ${this.filePath} is closed`, this.filePath);
    }

    let rotationError: unknown = null;
    try {
      this.ensureOpen();
      if (this.rotationDue()) this.rotate();
    } catch (err) {
      rotationError = err;
    }

    if (this.fd === null) {
      try {
        this.ensureOpen();
      } catch (err) {
        throw rotationError ?? err;
      }
    }

    this.writeAll(line.endsWith("\n") ? line : line + "\n");
    if (rotationError !== null) throw rotationError;
  }

  flush(): void {
    if (this.fd === null) return;
    try {
      fs.fsyncSync(this.fd);
    } catch (err) {
      throw new IOError(`Failed to flush ${this.filePath}`, this.filePath, err);
    }
  }

  close(): void {
    this.isClosed = true;
    if (this.fd === null) return;
    const fd = this.fd;
    try {
      this.flush();
    } finally {
      this.fd = null;
      try {
        fs.closeSync(fd);
      } catch (err) {
        throw new IOError(`Failed to close ${this.filePath}`, this.filePath, err);
      }
    }
  }

  /** 现有备份，按周期从旧到新 */
  backups(): BackupFile[] {
    const dir = path.dirname(this.filePath);
    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch (err) {
      throw new IOError(`Failed to list ${dir}`, dir, err);
    }
    const result: BackupFile[] = [];
    for (const name of names) {
      const m = name.match(this.backupPattern);
      if (!m) continue;
      result.push({ path: path.join(dir, name), period: m[1], seq: m[2] ? Number(m[2]) : 0 });
    }
    return result.sort((a, b) => (a.period === b.period ? a.seq - b.seq : a.period < b.period ? -1 : 1));
  }

  // ── 内部方法 ──

  private periodOf(instant: Date): string {
    return periodKey(instant, this.utcOffsetMinutes);
  }

  private rotationDue(): boolean {
    const now = this.now();
    if (this.periodOf(now) <= this.currentPeriod) return false;
    return now.getTime() >= this.nextRotationAttemptAt;
  }

  private rotate(): void {
    let handle: LockHandle;
    try {
      handle = acquireFileLock(this.lockPath, {
        timeoutMs: this.lockTimeoutMs,
        staleMs: this.staleLockMs,
        onStale: this.onWarning,
      });
    } catch (err) {
      if (!(err instanceof LockTimeoutError)) throw err;
      // 降级：继续写入轮转前的文件，稍后再试
      this.nextRotationAttemptAt = this.now().getTime() + this.rotationRetryMs;
      this.onWarning(`Rotation of ${this.filePath} postponed: ${err.message}`);
      return;
    }

    try {
      this.rotateLocked();
    } finally {
      releaseFileLock(handle);
    }
  }

  private rotateLocked(): void {
    const nowPeriod = this.periodOf(this.now());

    // 锁内复查：路径上的文件已不是我们打开的那个，说明其他进程已轮转
    const onDisk = statOrNull(this.filePath);
    const own = this.fstat();
    if (!onDisk || onDisk.ino !== own.ino || onDisk.dev !== own.dev) {
      this.reopen(nowPeriod);
      return;
    }

    // 空文件同样改名：新周期总是对应新的 inode，其他进程据此判断已轮转
    const backupPath = this.nextBackupPath(this.currentPeriod);
    this.closeActive();
    try {
      fs.renameSync(this.filePath, backupPath);
    } catch (err) {
      // 未改名：append 会重新打开原文件
      this.nextRotationAttemptAt = this.now().getTime() + this.rotationRetryMs;
      throw new IOError(`Failed to rotate ${this.filePath} to ${backupPath}`, this.filePath, err);
    }
    this.openActive(nowPeriod);
    if (own.size === 0) this.removeIfEmpty(backupPath);
    this.prune();
  }

  private removeIfEmpty(backupPath: string): void {
    try {
      const st = statOrNull(backupPath);
      if (st && st.size === 0) fs.unlinkSync(backupPath);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return;
      this.onWarning(`Failed to remove empty log ${backupPath}: ${errorMessage(err)}`);
    }
  }

  /** <path>.<period>，已存在时依次尝试 .1、.2 ... */
  private nextBackupPath(period: string): string {
    const base = `${this.filePath}.${period}`;
    let candidate = base;
    for (let seq = 1; statOrNull(candidate); seq++) {
      candidate = `${base}.${seq}`;
    }
    return candidate;
  }

  private prune(): void {
    if (this.backupCount === 0) return;
    const backups = this.backups();
    const excess = backups.length - this.backupCount;
    for (const backup of backups.slice(0, Math.max(excess, 0))) {
      try {
        fs.unlinkSync(backup.path);
      } catch (err) {
        if (errnoCode(err) === "ENOENT") continue;
        this.onWarning(`Failed to remove old log ${backup.path}: ${errorMessage(err)}`);
      }
    }
  }

  private ensureOpen(): void {
    if (this.fd === null) this.openActive(this.currentPeriod);
  }

  private openActive(period: string): void {
    // 先记录周期：打开失败时，重试仍归入该周期
    this.currentPeriod = period;
    let fd: number;
    try {
      fd = fs.openSync(this.filePath, "a");
    } catch (err) {
      throw new IOError(`Failed to open log file ${this.filePath}`, this.filePath, err);
    }
    this.fd = fd;
  }

  private closeActive(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (err) {
      throw new IOError(`Failed to close ${this.filePath}`, this.filePath, err);
    }
  }

  private reopen(period: string): void {
    this.closeActive();
    this.openActive(period);
  }

  private fstat(): fs.Stats {
    if (this.fd === null) {
      throw new IOError(`Log file ${this.filePath} is closed`, this.filePath);
    }
    try {
      return fs.fstatSync(this.fd);
    } catch (err) {
      throw new IOError(`Failed to stat ${this.filePath}`, this.filePath, err);
    }
  }

  private writeAll(text: string): void {
    if (this.fd === null) {
      throw new IOError(`Log file ${this.filePath} is closed`, this.filePath);
    }
    const buf = Buffer.from(text, "utf-8");
    try {
      // 普通文件上 writeSync 通常一次写完；短写时继续补齐
      let offset = 0;
      while (offset < buf.length) {
        offset += fs.writeSync(this.fd, buf, offset, buf.length - offset);
      }
    } catch (err) {
      throw new IOError(`Failed to write log file ${this.filePath}`, this.filePath, err);
    }
  }
}

/**
 * 打开 Sink，执行 fn，无论正常返回、抛错还是 Promise 被拒绝，
 * 都会刷新并关闭文件。
 */
export async function withRotatingFileSink<T>(
  filePath: string,
  opts: RotatingFileSinkOptions,
  fn: (sink: RotatingFileSink) => T | Promise<T>,
): Promise<T> {
  const sink = RotatingFileSink.open(filePath, opts);
  try {
    return await fn(sink);
  } finally {
    sink.close();
  }
}
