// 分类扫描注册表：按 scheme 分派到 flat / tree 扫描器

import { join } from "node:path";
import { flatScanner } from "./flat.js";
import { treeScanner } from "./tree.js";
import { ConfigError, errorMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";
import type { CategoryDescriptor, CategoryScheme, SiteConfig } from "../config/types.js";
import type { DirEntry, FsAccessor } from "../fs/types.js";
import type { CandidateEntry, CategoryScanner } from "./types.js";

export type { CandidateEntry, CategoryScanner, ScanContext } from "./types.js";
export { flatScanner, isFlatArticle, FLAT_EXCLUDED_NAMES, GEMTEXT_EXTENSIONS } from "./flat.js";
export { treeScanner, pickIndexFile, TREE_INDEX_NAMES } from "./tree.js";


const scanners: Record<CategoryScheme, CategoryScanner> = {
  flat: flatScanner,
  tree: treeScanner,
};


export function getScanner(scheme: CategoryScheme): CategoryScanner {
  return scanners[scheme];
}


/**
 * 扫描一个分类目录，逐个产出候选条目。
 * 分类目录不存在或不可读时抛 ConfigError；单篇文章的问题只记警告。
 */
export async function* scanCategory(
  descriptor: CategoryDescriptor,
  site: SiteConfig,
  fs: FsAccessor,
): AsyncGenerator<CandidateEntry> {
  const categoryDir = join(site.rootDir, descriptor.dir);
  if (!(await fs.isDirectory(categoryDir))) {
    throw new ConfigError("Category directory not found", categoryDir);
  }
  let entries: DirEntry[];
  try {
    entries = await fs.list(categoryDir);
  } catch (err) {
    throw new ConfigError(`Cannot read category directory (${errorMessage(err)})`, categoryDir);
  }
  logger.debug("scanner", "扫描分类", { path: categoryDir, scheme: descriptor.scheme, entries: entries.length });
  yield* getScanner(descriptor.scheme).scan({ site, fs, descriptor, categoryDir, entries });
}


/** 依次扫描所有分类并收集候选条目 */
export async function collectCandidates(site: SiteConfig, fs: FsAccessor): Promise<CandidateEntry[]> {
  const all: CandidateEntry[] = [];
  for (const descriptor of site.categories) {
    for await (const candidate of scanCategory(descriptor, site, fs)) {
      all.push(candidate);
    }
  }
  return all;
}
