/**
 * tidelog - 调用位置
 *
 * 通过 V8 栈信息取得调用 logger 方法的源文件与行号。
 */

export interface Callsite {
  path: string;
  line: number;
}

const UNKNOWN: Callsite = { path: "(unknown file)", line: 0 };

// "    at fn (/a/b.ts:12:5)" / "    at /a/b.ts:12:5" / "    at async fn (file:///a/b.ts:12:5)"
const FRAME_RE = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

type StackBoundary = (...args: never[]) => unknown;

/**
 * 返回 boundary 之上的第一帧。boundary 为公开的日志方法，
 * 因此 logger 内部的帧不会出现在结果中。
 */
export function captureCallsite(boundary: StackBoundary): Callsite {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  return parseCallsite(holder.stack);
}

export function parseCallsite(stack: string | undefined): Callsite {
  if (!stack) return UNKNOWN;
  for (const raw of stack.split("\n").slice(1)) {
    const m = raw.match(FRAME_RE);
    if (!m) continue;
    const line = Number(m[2]);
    if (!Number.isFinite(line)) continue;
    return { path: m[1], line };
  }
  return UNKNOWN;
}
