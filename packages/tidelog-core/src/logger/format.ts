/**
 * tidelog - 格式化
 *
 * 行格式：<hostname> - YYYY-MM-DD HH:MM:SS - <relpath>[line:<N>] - <LEVEL>: <message>
 * 开启颜色时只为 <message> 着色，并总是追加重置序列。
 */

import os from "node:os";
import { DEFAULT_UTC_OFFSET_MINUTES, formatTimestamp, toZonedTime } from "./clock.js";
import { relativize } from "./path-normalizer.js";
import type { Formatter, LogEvent, Severity } from "./types.js";

/** ANSI 颜色码 */
export const COLORS = {
  reset: "\x1b[0m",
  magenta: "\x1b[35m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  brightRed: "\x1b[31m\x1b[1m",
} as const;

export const SEVERITY_COLORS: Record<Severity, string> = {
  DEBUG: COLORS.magenta,
  INFO: COLORS.green,
  WARNING: COLORS.yellow,
  ERROR: COLORS.red,
  CRITICAL: COLORS.brightRed,
};

export interface FormatOptions {
  hostname?: string;
  /** 格式化时的工作目录，默认每次调用 process.cwd() */
  cwd?: () => string;
  utcOffsetMinutes?: number;
}

export interface FormatterOptions extends FormatOptions {
  colorEnabled?: boolean;
}

function renderMessage(event: LogEvent): string {
  if (event.data === undefined) return event.message;
  try {
    const dataStr = typeof event.data === "string" ? event.data : JSON.stringify(event.data);
    return `${event.message} ${dataStr}`;
  } catch {
    return `${event.message} [object]`;
  }
}

export function formatEvent(event: LogEvent, colorEnabled: boolean, opts: FormatOptions = {}): string {
  const hostname = opts.hostname ?? os.hostname();
  const cwd = opts.cwd ? opts.cwd() : process.cwd();
  const ts = formatTimestamp(toZonedTime(event.timestamp, opts.utcOffsetMinutes ?? DEFAULT_UTC_OFFSET_MINUTES));
  const source = relativize(event.sourcePath, cwd);
  let msg = renderMessage(event);
  if (colorEnabled) {
    msg = `${SEVERITY_COLORS[event.severity]}${msg}${COLORS.reset}`;
  }
  return `${hostname} - ${ts} - ${source}[line:${event.sourceLine}] - ${event.severity}: ${msg}`;
}

export function createFormatter(opts: FormatterOptions = {}): Formatter {
  const colorEnabled = opts.colorEnabled ?? true;
  const bound: FormatOptions = {
    hostname: opts.hostname ?? os.hostname(),
    cwd: opts.cwd,
    utcOffsetMinutes: opts.utcOffsetMinutes,
  };
  return (event) => formatEvent(event, colorEnabled, bound);
}

// ── 解析（用于读取日志文件） ──

export interface ParsedLine {
  hostname: string;
  timestamp: string;
  path: string;
  line: number;
  severity: Severity;
  message: string;
}

const ANSI_RE = /\x1b\[[0-9;]*m/g;
const LINE_RE =
  /^(.*?) - (\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}) - (.*?)\[line:(\d+)\] - (DEBUG|INFO|WARNING|ERROR|CRITICAL): (.*)$/s;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_RE, "");
}

export function parseLine(line: string): ParsedLine | null {
  const m = stripAnsi(line.replace(/\r?\n$/, "")).match(LINE_RE);
  if (!m) return null;
  return {
    hostname: m[1],
    timestamp: m[2],
    path: m[3],
    line: Number(m[4]),
    severity: toSeverity(m[5]),
    message: m[6],
  };
}

function toSeverity(name: string): Severity {
  switch (name) {
    case "DEBUG":
    case "INFO":
    case "WARNING":
    case "ERROR":
    case "CRITICAL":
      return name;
    default:
      return "INFO";
  }
}
