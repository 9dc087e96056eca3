// 汇总所有分类的候选条目：按日期降序、截断为前 N 条、填充 feed 元信息

import { isAbsolute, relative } from "node:path";
import { joinUrl } from "./url.js";
import { toRelPath } from "../scanner/candidate.js";
import type { SiteConfig } from "../config/types.js";
import type { CandidateEntry } from "../scanner/types.js";
import type { FeedAuthor, FeedModel } from "./types.js";


/** 稳定排序：同一时刻的条目保持输入顺序 */
export function rankEntries(candidates: readonly CandidateEntry[], limit: number): CandidateEntry[] {
  if (limit <= 0) return [];
  return [...candidates]
    .sort((a, b) => b.date.getTime() - a.date.getTime())
    .slice(0, limit);
}


/** Atom 要求 feed 或每个条目都有 author：名字依次取作者、邮箱、feed 标题 */
function feedAuthor(site: SiteConfig): FeedAuthor {
  const name = site.author?.trim() || site.email || site.title;
  return site.email ? { name, email: site.email } : { name };
}


/** 输出文件在根目录内时，其地址作为 self 链接 */
function selfUrl(site: SiteConfig): string | undefined {
  const rel = relative(site.rootDir, site.outputPath);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) return undefined;
  return joinUrl(site.baseUrl, toRelPath(site.rootDir, site.outputPath));
}


export function assembleFeed(candidates: readonly CandidateEntry[], site: SiteConfig, now: Date = new Date()): FeedModel {
  const entries = rankEntries(candidates, site.limit);
  return {
    title: site.title,
    subtitle: site.subtitle,
    baseUrl: site.baseUrl,
    selfUrl: selfUrl(site),
    author: feedAuthor(site),
    updated: entries.length > 0 ? entries[0].date : now,
    generatedAt: now,
    entries,
  };
}
