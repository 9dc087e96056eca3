// Feeder：一次完整运行。扫描所有分类 → 排序截断 → 读正文 → 生成 Atom → 原子写出

import { rename, rm, writeFile } from "node:fs/promises";
import { buildAtomXml } from "../feed/atom.js";
import { assembleFeed } from "../feed/assembler.js";
import { joinUrl } from "../feed/url.js";
import { collectCandidates } from "../scanner/index.js";
import { ConfigError, OutputError, errorMessage } from "../errors/index.js";
import { logger } from "../logger/index.js";
import type { SiteConfig } from "../config/types.js";
import type { FsAccessor } from "../fs/types.js";
import type { AtomEntry } from "../feed/types.js";
import type { CandidateEntry } from "../scanner/types.js";
import type { FeederOptions, FeederResult } from "./types.js";


/** Gemini 正文的 MIME 类型 */
export const GEMTEXT_MIME = "text/gemini";


/** 根据候选条目与正文生成 AtomEntry：链接即 id，跨运行保持不变 */
export function toAtomEntry(site: SiteConfig, candidate: CandidateEntry, content: Uint8Array): AtomEntry {
  const link = joinUrl(site.baseUrl, candidate.relPath);
  return {
    id: link,
    title: candidate.title,
    link,
    updated: candidate.date,
    content: Buffer.from(content).toString("utf-8"),
    contentType: GEMTEXT_MIME,
  };
}


/** 读取截断后条目的正文；单篇读取失败只记警告并丢弃该条 */
async function loadEntries(site: SiteConfig, candidates: readonly CandidateEntry[]): Promise<{ kept: CandidateEntry[]; entries: AtomEntry[] }> {
  const kept: CandidateEntry[] = [];
  const entries: AtomEntry[] = [];
  for (const candidate of candidates) {
    let content: Uint8Array;
    try {
      content = await candidate.readContent();
    } catch (err) {
      logger.warn("feeder", "读取正文失败，跳过", { path: candidate.path, err: errorMessage(err) });
      continue;
    }
    const entry = toAtomEntry(site, candidate, content);
    logger.info("feeder", `Adding ${candidate.relPath} with title ${entry.title}`);
    kept.push(candidate);
    entries.push(entry);
  }
  return { kept, entries };
}


/** 生成 feed 但不写文件 */
export async function generateFeed(site: SiteConfig, fs: FsAccessor, options: FeederOptions = {}): Promise<FeederResult> {
  if (!(await fs.isDirectory(site.rootDir))) {
    throw new ConfigError("Root directory not found", site.rootDir);
  }
  const candidates = await collectCandidates(site, fs);
  const assembled = assembleFeed(candidates, site, options.now);
  logger.info("feeder", `Generating feed "${assembled.title}", which should be served from ${assembled.selfUrl ?? assembled.baseUrl}`);
  if (candidates.length === 0) {
    logger.info("feeder", "No world-readable gemini content found");
  }
  const { kept, entries } = await loadEntries(site, assembled.entries);
  const feed = {
    ...assembled,
    entries: kept,
    updated: kept.length > 0 ? kept[0].date : assembled.generatedAt,
  };
  return { xml: buildAtomXml(feed, entries), feed, entries };
}


/** 整体写出：先写同目录临时文件再 rename，失败时不留下半截文件 */
export async function writeFeedFile(path: string, xml: string): Promise<void> {
  const tmp = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, xml, "utf-8");
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true }).catch((rmErr) => {
      logger.debug("feeder", "清理临时文件失败", { path: tmp, err: errorMessage(rmErr) });
    });
    throw new OutputError(`Cannot write feed (${errorMessage(err)})`, path, { cause: err });
  }
}


/** 生成并写出 feed 文件 */
export async function runFeed(site: SiteConfig, fs: FsAccessor, options: FeederOptions = {}): Promise<FeederResult> {
  const result = await generateFeed(site, fs, options);
  await writeFeedFile(site.outputPath, result.xml);
  logger.info("feeder", `Wrote ${result.entries.length} entries to ${site.outputPath}`);
  return result;
}
