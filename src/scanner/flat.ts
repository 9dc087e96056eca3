// flat 分类：目录下每个 .gmi / .gemini 文件是一篇，index.* 是分类首页不收录

import { extname, join } from "node:path";
import { buildCandidate } from "./candidate.js";
import type { CandidateEntry, CategoryScanner, ScanContext } from "./types.js";


/** 收录的扩展名 */
export const GEMTEXT_EXTENSIONS: readonly string[] = [".gmi", ".gemini"];

/** flat 分类中排除的文件名（大小写敏感，精确匹配） */
export const FLAT_EXCLUDED_NAMES: readonly string[] = ["index.gmi", "index.gemini"];


export function isFlatArticle(name: string): boolean {
  return GEMTEXT_EXTENSIONS.includes(extname(name)) && !FLAT_EXCLUDED_NAMES.includes(name);
}


export const flatScanner: CategoryScanner = {
  scheme: "flat",
  async *scan(ctx: ScanContext): AsyncGenerator<CandidateEntry> {
    for (const entry of ctx.entries) {
      if (entry.kind !== "file" || !isFlatArticle(entry.name)) continue;
      const candidate = await buildCandidate(ctx, {
        path: join(ctx.categoryDir, entry.name),
        name: entry.name,
        kind: "file",
      });
      if (candidate) yield candidate;
    }
  },
};
