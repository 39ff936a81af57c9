/**
 * tidelog - 时钟适配
 *
 * 把时刻换算为固定 UTC 偏移下的日历字段，与宿主机时区设置无关，
 * 多台机器、多个进程写出的时间戳保持一致。
 */

import type { Clock } from "./types.js";

/** 中国时区为 UTC+8 */
export const DEFAULT_UTC_OFFSET_MINUTES = 8 * 60;

export interface ZonedTime {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  /** 0 = 周日 */
  weekday: number;
  /** 1-366 */
  yearDay: number;
  utcOffsetMinutes: number;
}

export const systemClock: Clock = () => new Date();

export function toZonedTime(instant: Date, utcOffsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES): ZonedTime {
  // 平移后按 UTC 读取字段，即得到目标偏移下的墙上时间
  const shifted = new Date(instant.getTime() + utcOffsetMinutes * 60_000);
  const year = shifted.getUTCFullYear();
  const startOfYear = Date.UTC(year, 0, 1);
  const startOfDay = Date.UTC(year, shifted.getUTCMonth(), shifted.getUTCDate());
  return {
    year,
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
    millisecond: shifted.getUTCMilliseconds(),
    weekday: shifted.getUTCDay(),
    yearDay: Math.round((startOfDay - startOfYear) / 86_400_000) + 1,
    utcOffsetMinutes,
  };
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** YYYY-MM-DD */
export function formatDate(t: ZonedTime): string {
  return `${pad(t.year, 4)}-${pad(t.month)}-${pad(t.day)}`;
}

/** YYYY-MM-DD HH:MM:SS */
export function formatTimestamp(t: ZonedTime): string {
  return `${formatDate(t)} ${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`;
}

/**
 * 时刻所在的轮转周期（按午夜切分），即偏移时区下的日期。
 * 形如 YYYY-MM-DD，字符串比较即时间先后。
 */
export function periodKey(instant: Date, utcOffsetMinutes: number = DEFAULT_UTC_OFFSET_MINUTES): string {
  return formatDate(toZonedTime(instant, utcOffsetMinutes));
}
