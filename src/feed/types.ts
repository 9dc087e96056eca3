// Atom 输出结构

import type { CandidateEntry } from "../scanner/types.js";


export interface FeedAuthor {
  name: string;
  email?: string;
}


/** 由 assembleFeed 构建一次，交给 feeder 读取正文后序列化 */
export interface FeedModel {
  title: string;
  subtitle?: string;
  /** feed id 与 alternate 链接 */
  baseUrl: string;
  /** feed 文件自身的地址（输出在根目录内时才有） */
  selfUrl?: string;
  /** 始终存在：Atom 要求 feed 级 author */
  author: FeedAuthor;
  /** 最新条目的日期；无条目时为生成时间 */
  updated: Date;
  generatedAt: Date;
  /** 按日期降序，长度不超过 limit */
  entries: readonly CandidateEntry[];
}


/** 已读入正文、可直接序列化的条目 */
export interface AtomEntry {
  id: string;
  title: string;
  link: string;
  updated: Date;
  /** 正文（UTF-8 解码后的原文） */
  content: string;
  /** 正文 MIME 类型 */
  contentType: string;
}
