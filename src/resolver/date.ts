// 日期解析：名称开头的 RFC 3339 日期优先，否则退回文件创建/修改时间

import type { DateSource } from "../config/types.js";
import type { FsAccessor } from "../fs/types.js";


const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})/;
const TIME_RE = /^[Tt](\d{2}):(\d{2}):(\d{2})(\.\d+)?([Zz]|[+-]\d{2}:\d{2})/;


/** 名称开头识别出的日期前缀 */
export interface DatePrefix {
  date: Date;
  /** 前缀在名称中占用的字符数（不含其后的分隔符） */
  length: number;
}


/** 按需查询的文件时间 */
export interface FallbackTimestamps {
  created(): Promise<Date>;
  modified(): Promise<Date>;
}


function isLeapYear(y: number): boolean {
  return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0;
}


function daysInMonth(y: number, m: number): number {
  if (m === 2) return isLeapYear(y) ? 29 : 28;
  return [4, 6, 9, 11].includes(m) ? 30 : 31;
}


/** setUTCFullYear 避免 Date.UTC 把 0–99 年映射到 1900 年代 */
function utcInstant(y: number, mo: number, d: number, h = 0, mi = 0, s = 0, ms = 0): Date {
  const dt = new Date(0);
  dt.setUTCFullYear(y, mo - 1, d);
  dt.setUTCHours(h, mi, s, ms);
  return dt;
}


/** 前缀之后必须是非数字字符或名称结尾 */
function atBoundary(name: string, index: number): boolean {
  return index >= name.length || !/\d/.test(name[index]);
}


function parseTime(rest: string, y: number, mo: number, d: number): { date: Date; length: number } | null {
  const m = TIME_RE.exec(rest);
  if (!m) return null;
  const h = Number(m[1]);
  const mi = Number(m[2]);
  const s = Number(m[3]);
  if (h > 23 || mi > 59 || s > 59) return null;
  const ms = m[4] ? Number(m[4].slice(1, 4).padEnd(3, "0")) : 0;
  let offsetMinutes = 0;
  if (m[5] !== "Z" && m[5] !== "z") {
    const oh = Number(m[5].slice(1, 3));
    const om = Number(m[5].slice(4, 6));
    if (oh > 23 || om > 59) return null;
    offsetMinutes = (m[5][0] === "-" ? -1 : 1) * (oh * 60 + om);
  }
  const local = utcInstant(y, mo, d, h, mi, s, ms);
  return { date: new Date(local.getTime() - offsetMinutes * 60_000), length: m[0].length };
}


/**
 * 识别名称开头的 `YYYY-MM-DD`（可带 `THH:MM:SS[.frac](Z|±HH:MM)`）。
 * 日历非法（如 2021-13-40）或其后紧跟数字时返回 null。
 */
export function parseDatePrefix(name: string): DatePrefix | null {
  const m = DATE_RE.exec(name);
  if (!m) return null;
  const y = Number(m[1]);
  const mo = Number(m[2]);
  const d = Number(m[3]);
  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) return null;
  const dateLength = m[0].length;
  const timed = parseTime(name.slice(dateLength), y, mo, d);
  if (timed && atBoundary(name, dateLength + timed.length)) {
    return { date: timed.date, length: dateLength + timed.length };
  }
  if (!atBoundary(name, dateLength)) return null;
  return { date: utcInstant(y, mo, d), length: dateLength };
}


/** 某个文件的时间查询器 */
export function fileTimestamps(fs: FsAccessor, path: string): FallbackTimestamps {
  return {
    created: () => fs.createdAt(path),
    modified: () => fs.modifiedAt(path),
  };
}


/** 解析生效日期；只有时间查询本身的 I/O 错误会向上抛出 */
export async function resolveDate(name: string, fallback: FallbackTimestamps, dateSource: DateSource): Promise<Date> {
  const prefix = parseDatePrefix(name);
  if (prefix) return prefix.date;
  return dateSource === "modified" ? fallback.modified() : fallback.created();
}
