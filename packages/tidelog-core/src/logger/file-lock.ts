/**
 * tidelog - 跨进程文件锁
 *
 * 以 O_CREAT | O_EXCL（"wx"）创建 <path>.lock，只有一个进程能成功。
 * 锁文件记录 pid/hostname/acquiredAt，用于识别崩溃进程遗留的锁：
 * - 同一主机且 pid 已不存在 → 接管
 * - 存在时间超过 staleMs → 接管
 * 接管时先改名再核对，不会误删其他进程刚取得的锁。
 * 等待有上限，超时抛出 LockTimeoutError。
 */

import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import { z } from "zod";
import { IOError, LockTimeoutError, errnoCode } from "./errors.js";

export interface FileLockOptions {
  timeoutMs: number;
  staleMs: number;
  /** 接管残留锁时回调（用于输出警告） */
  onStale?: (reason: string) => void;
}

export interface LockHandle {
  fd: number;
  lockPath: string;
}

const LockOwnerSchema = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.number(),
});

type LockOwner = z.infer<typeof LockOwnerSchema>;

export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function backoff(attempt: number): number {
  // 10, 20, 40, ... 上限 200
  return Math.min(10 * 2 ** attempt, 200);
}

function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM：进程存在但属于其他用户
    return errnoCode(err) === "EPERM";
  }
}

/** 某一时刻磁盘上的锁文件：inode 加原始内容，用于确认接管的是同一把锁 */
export interface LockSnapshot {
  ino: number;
  raw: string;
  mtimeMs: number;
}

function readSnapshot(lockPath: string): LockSnapshot | null {
  try {
    const st = fs.statSync(lockPath);
    return { ino: st.ino, raw: fs.readFileSync(lockPath, "utf-8"), mtimeMs: st.mtimeMs };
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw new IOError(`Failed to read lock file ${lockPath}`, lockPath, err);
  }
}

function parseOwner(raw: string): LockOwner | null {
  try {
    const result = LockOwnerSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/** 返回残留原因；锁仍有效时返回 null */
function staleReason(snapshot: LockSnapshot, staleMs: number): string | null {
  const owner = parseOwner(snapshot.raw);
  if (!owner) {
    // 锁文件刚创建尚未写入内容，或内容损坏：按文件年龄判断
    const age = Date.now() - snapshot.mtimeMs;
    return age > staleMs ? `unreadable lock, age=${Math.round(age)}ms` : null;
  }
  if (owner.hostname === os.hostname() && !isProcessAlive(owner.pid)) {
    return `pid ${owner.pid} is gone`;
  }
  const age = Date.now() - owner.acquiredAt;
  if (age > staleMs) return `held by pid ${owner.pid} for ${age}ms`;
  return null;
}

function removeFile(p: string): void {
  try {
    fs.rmSync(p, { force: true });
  } catch (err) {
    throw new IOError(`Failed to remove ${p}`, p, err);
  }
}

/**
 * 移除判定为残留的锁。先改名到唯一的旁路文件，再核对 inode 与内容：
 * 若移走的已是其他进程新建的锁，则放回原处并返回 false。
 */
export function breakStaleLock(lockPath: string, stale: LockSnapshot): boolean {
  const aside = `${lockPath}.stale.${process.pid}.${crypto.randomUUID()}`;
  try {
    fs.renameSync(lockPath, aside);
  } catch (err) {
    // ENOENT：其他进程已先一步清理
    if (errnoCode(err) === "ENOENT") return false;
    throw new IOError(`Failed to remove stale lock ${lockPath}`, lockPath, err);
  }

  const moved = readSnapshot(aside);
  if (moved && moved.ino === stale.ino && moved.raw === stale.raw) {
    removeFile(aside);
    return true;
  }

  if (moved) {
    try {
      fs.linkSync(aside, lockPath);
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") {
        throw new IOError(`Failed to restore lock ${lockPath}`, lockPath, err);
      }
    }
  }
  removeFile(aside);
  return false;
}

/** 独占创建锁文件并写入持有者信息；已被占用时返回 null */
function tryCreate(lockPath: string): number | null {
  let fd: number;
  try {
    fd = fs.openSync(lockPath, "wx");
  } catch (err) {
    if (errnoCode(err) === "EEXIST") return null;
    throw new IOError(`Failed to create lock file ${lockPath}`, lockPath, err);
  }
  try {
    const owner: LockOwner = { pid: process.pid, hostname: os.hostname(), acquiredAt: Date.now() };
    fs.writeSync(fd, JSON.stringify(owner));
    return fd;
  } catch (err) {
    fs.closeSync(fd);
    fs.rmSync(lockPath, { force: true });
    throw new IOError(`Failed to write lock file ${lockPath}`, lockPath, err);
  }
}

export function acquireFileLock(lockPath: string, opts: FileLockOptions): LockHandle {
  const started = Date.now();
  let attempt = 0;

  for (;;) {
    const fd = tryCreate(lockPath);
    if (fd !== null) return { fd, lockPath };

    const snapshot = readSnapshot(lockPath);
    const reason = snapshot ? staleReason(snapshot, opts.staleMs) : null;
    if (snapshot && reason) {
      if (breakStaleLock(lockPath, snapshot)) {
        opts.onStale?.(`Removed stale lock ${lockPath} (${reason})`);
      }
      continue;
    }

    const elapsed = Date.now() - started;
    if (elapsed >= opts.timeoutMs) {
      throw new LockTimeoutError(lockPath, elapsed);
    }
    sleepSync(Math.min(backoff(attempt++), opts.timeoutMs - elapsed));
  }
}

export function releaseFileLock(handle: LockHandle): void {
  let ino: number | null = null;
  try {
    ino = fs.fstatSync(handle.fd).ino;
  } finally {
    fs.closeSync(handle.fd);
  }

  // 删除锁文件即释放；路径上已是别人的锁（我们的被接管）时不动
  const onDisk = readSnapshot(handle.lockPath);
  if (!onDisk || onDisk.ino !== ino) return;
  try {
    fs.unlinkSync(handle.lockPath);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") {
      throw new IOError(`Failed to release lock ${handle.lockPath}`, handle.lockPath, err);
    }
  }
}

/** 在锁内执行 fn，无论成功与否都会释放锁 */
export function withFileLock<T>(lockPath: string, opts: FileLockOptions, fn: () => T): T {
  const handle = acquireFileLock(lockPath, opts);
  try {
    return fn();
  } finally {
    releaseFileLock(handle);
  }
}
