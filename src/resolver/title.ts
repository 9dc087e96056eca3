// 标题解析：去扩展名、去日期前缀、可选下划线转空格

import { parseDatePrefix } from "./date.js";


export interface TitleOptions {
  /** file 去掉扩展名；directory 原样 */
  kind: "file" | "directory";
  /** 默认 true */
  stripDatePrefix?: boolean;
  /** 默认 false */
  cleanUnderscores?: boolean;
}


/** 去掉最后一个扩展名；点号开头的文件名视为无扩展名 */
export function stripExtension(name: string): string {
  const i = name.lastIndexOf(".");
  return i > 0 ? name.slice(0, i) : name;
}


/** 反复去掉开头的日期前缀及其后一个分隔符 */
export function stripDatePrefixes(name: string): string {
  let out = name;
  for (let prefix = parseDatePrefix(out); prefix; prefix = parseDatePrefix(out)) {
    out = out.slice(prefix.length + 1);
  }
  return out;
}


export function resolveTitle(name: string, options: TitleOptions): string {
  const { kind, stripDatePrefix = true, cleanUnderscores = false } = options;
  const base = kind === "file" ? stripExtension(name) : name;
  let title = stripDatePrefix ? stripDatePrefixes(base) : base;
  if (title.trim() === "") title = base;
  return cleanUnderscores ? title.replaceAll("_", " ") : title;
}
