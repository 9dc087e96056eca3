// Scanner 抽象接口：flat / tree 两种组织方式各实现一个，产出 CandidateEntry

import type { CategoryDescriptor, CategoryScheme, SiteConfig } from "../config/types.js";
import type { DirEntry, FsAccessor } from "../fs/types.js";


/** 一篇候选文章；创建后不再修改 */
export interface CandidateEntry {
  /** 内容文件绝对路径：flat 为文件本身，tree 为子目录内的 index.* */
  readonly path: string;
  /** 相对站点根目录的路径（/ 分隔），用于生成链接 */
  readonly relPath: string;
  /** 所属分类目录（相对根目录） */
  readonly category: string;
  /** 生效发布时间 */
  readonly date: Date;
  readonly title: string;
  /** 延迟读取正文字节：只在截断后的条目上调用 */
  readContent(): Promise<Uint8Array>;
}


/** 扫描调用上下文 */
export interface ScanContext {
  readonly site: SiteConfig;
  readonly fs: FsAccessor;
  readonly descriptor: CategoryDescriptor;
  /** 分类目录绝对路径 */
  readonly categoryDir: string;
  /** 分类目录的直接子项 */
  readonly entries: readonly DirEntry[];
}


/** 统一扫描接口：给定已列出的分类目录，逐个产出候选条目 */
export interface CategoryScanner {
  readonly scheme: CategoryScheme;
  scan(ctx: ScanContext): AsyncGenerator<CandidateEntry>;
}
