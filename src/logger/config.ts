// 日志配置：从环境变量读取，quiet 模式可在运行期覆盖

import type { LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

/** 运行期覆盖（如 --quiet），优先于 LOG_LEVEL */
let levelOverride: LogLevel | null = null;

function isLogLevel(s: string): s is LogLevel {
  return LEVEL_ORDER.some((level) => level === s);
}

export function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/** 当前控制台最低输出级别（默认 info） */
export function getConsoleLevel(): LogLevel {
  return levelOverride ?? parseLevel(process.env.LOG_LEVEL, "info");
}

/** 设置运行期最低级别；传 null 恢复读取 LOG_LEVEL */
export function setConsoleLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

/** 是否应输出到控制台 */
export function shouldLogToConsole(consoleLevel: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(consoleLevel);
}
