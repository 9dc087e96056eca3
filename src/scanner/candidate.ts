// 构建单个 CandidateEntry：权限过滤、日期与标题解析；单篇失败只记警告

import { relative, sep } from "node:path";
import { fileTimestamps, resolveDate } from "../resolver/date.js";
import { resolveTitle } from "../resolver/title.js";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors/index.js";
import type { CandidateEntry, ScanContext } from "./types.js";


export interface CandidateSource {
  /** 内容文件绝对路径 */
  path: string;
  /** 用于推断日期与标题的名称：flat 为文件名，tree 为子目录名 */
  name: string;
  kind: "file" | "directory";
}


/** 相对根目录的 / 分隔路径 */
export function toRelPath(rootDir: string, path: string): string {
  return relative(rootDir, path).split(sep).join("/");
}


/** 不可公开读取或时间读取失败时返回 null */
export async function buildCandidate(ctx: ScanContext, source: CandidateSource): Promise<CandidateEntry | null> {
  const { site, fs, descriptor } = ctx;
  let date: Date;
  try {
    if (!(await fs.isPubliclyReadable(source.path))) {
      logger.debug("scanner", "跳过非公开可读文件", { path: source.path });
      return null;
    }
    date = await resolveDate(source.name, fileTimestamps(fs, source.path), site.dateSource);
  } catch (err) {
    logger.warn("scanner", "读取文件信息失败，跳过", { path: source.path, err: errorMessage(err) });
    return null;
  }
  const title = resolveTitle(source.name, { kind: source.kind, cleanUnderscores: site.cleanTitles });
  const path = source.path;
  return Object.freeze({
    path,
    relPath: toRelPath(site.rootDir, path),
    category: descriptor.dir,
    date,
    title,
    readContent: () => fs.readFile(path),
  });
}
