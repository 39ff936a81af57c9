/**
 * tidelog - 源文件路径改写
 *
 * 把调用方源文件的绝对路径改写为相对当前工作目录的路径，无法改写时原样返回。
 */

import path from "node:path";
import { fileURLToPath } from "node:url";

function toFilePath(sourcePath: string): string | null {
  if (sourcePath.startsWith("file://")) {
    try {
      return fileURLToPath(sourcePath);
    } catch {
      return null;
    }
  }
  return path.isAbsolute(sourcePath) ? sourcePath : null;
}

export function relativize(sourcePath: string, cwd: string = process.cwd()): string {
  const absolute = toFilePath(sourcePath);
  // node:internal/...、<anonymous> 等不是文件路径
  if (!absolute) return sourcePath;

  const from = path.resolve(cwd);
  const to = path.resolve(absolute);
  // 不同盘符（Windows）或只有根目录是公共祖先
  if (path.parse(from).root !== path.parse(to).root) return sourcePath;
  const [fromHead] = segments(from);
  const [toHead] = segments(to);
  if (fromHead !== undefined && toHead !== undefined && fromHead !== toHead) return sourcePath;

  const rel = path.relative(from, to);
  if (!rel || path.isAbsolute(rel)) return sourcePath;
  return rel;
}

function segments(p: string): string[] {
  return p.slice(path.parse(p).root.length).split(path.sep).filter(Boolean);
}
