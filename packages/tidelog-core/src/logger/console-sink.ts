/**
 * tidelog - 控制台输出 Sink
 *
 * 立即写入 stderr。每个进程拥有自己的流，无需跨进程协调；
 * 写入失败只通过 process.emitWarning 报告，不抛给调用方。
 */

import { createFormatter } from "./format.js";
import { errorMessage } from "./errors.js";
import type { Formatter, LogEvent, LogSink } from "./types.js";

export interface ConsoleSinkOptions {
  formatter?: Formatter;
  stream?: NodeJS.WritableStream;
}

function isWritable(stream: NodeJS.WritableStream): boolean {
  if (!stream.writable) return false;
  return !("destroyed" in stream && stream.destroyed === true);
}

// 每个流只挂一次 error 监听，多个 Logger 共用 stderr 时不会累积
const guardedStreams = new WeakSet<NodeJS.WritableStream>();

function reportWriteFailure(err: unknown): void {
  process.emitWarning(`Failed to write console log: ${errorMessage(err)}`, { code: "TIDELOG_CONSOLE" });
}

/** 异步写入失败（如 EPIPE）以 error 事件到达，未监听会成为未捕获异常 */
function guardStream(stream: NodeJS.WritableStream): void {
  if (guardedStreams.has(stream)) return;
  guardedStreams.add(stream);
  stream.on("error", reportWriteFailure);
}

export class ConsoleSink implements LogSink {
  private readonly formatter: Formatter;
  private readonly stream: NodeJS.WritableStream;

  constructor(opts: ConsoleSinkOptions = {}) {
    this.formatter = opts.formatter ?? createFormatter();
    this.stream = opts.stream ?? process.stderr;
    guardStream(this.stream);
  }

  write(event: LogEvent): boolean {
    return this.writeLine(this.formatter(event));
  }

  /** 写入一行已格式化的文本，返回是否成功交给流 */
  writeLine(line: string): boolean {
    if (!isWritable(this.stream)) {
      process.emitWarning("Console log stream is not writable", { code: "TIDELOG_CONSOLE" });
      return false;
    }
    try {
      this.stream.write(line + "\n");
      return true;
    } catch (err) {
      reportWriteFailure(err);
      return false;
    }
  }

  close(): void {
    // stderr 属于进程，不由 Sink 关闭
  }
}
