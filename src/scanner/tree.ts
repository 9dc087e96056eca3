// tree 分类：每个直接子目录是一篇，内容为其中的 index.gmi（优先）或 index.gemini

import { join } from "node:path";
import { buildCandidate } from "./candidate.js";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors/index.js";
import type { DirEntry } from "../fs/types.js";
import type { CandidateEntry, CategoryScanner, ScanContext } from "./types.js";


/** 文章目录内的内容文件名，按优先级排列 */
export const TREE_INDEX_NAMES: readonly string[] = ["index.gmi", "index.gemini"];


/** 按优先级选出 index 文件名；没有则返回 null */
export function pickIndexFile(children: readonly DirEntry[]): string | null {
  for (const name of TREE_INDEX_NAMES) {
    if (children.some((c) => c.kind === "file" && c.name === name)) return name;
  }
  return null;
}


export const treeScanner: CategoryScanner = {
  scheme: "tree",
  async *scan(ctx: ScanContext): AsyncGenerator<CandidateEntry> {
    for (const entry of ctx.entries) {
      if (entry.kind !== "directory") continue;
      const articleDir = join(ctx.categoryDir, entry.name);
      let children: DirEntry[];
      try {
        children = await ctx.fs.list(articleDir);
      } catch (err) {
        logger.warn("scanner", "文章目录不可读，跳过", { path: articleDir, err: errorMessage(err) });
        continue;
      }
      const indexName = pickIndexFile(children);
      if (indexName == null) {
        logger.debug("scanner", "文章目录无 index 文件，跳过", { path: articleDir });
        continue;
      }
      const candidate = await buildCandidate(ctx, {
        path: join(articleDir, indexName),
        name: entry.name,
        kind: "directory",
      });
      if (candidate) yield candidate;
    }
  },
};
