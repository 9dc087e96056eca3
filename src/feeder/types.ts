// Feeder 返回类型

import type { AtomEntry, FeedModel } from "../feed/types.js";


export interface FeederOptions {
  /** 生成时间；测试中固定，默认当前时间 */
  now?: Date;
}


export interface FeederResult {
  /** Atom XML 字符串 */
  xml: string;
  /** 最终输出的 feed（不含读取正文失败的条目） */
  feed: FeedModel;
  entries: AtomEntry[];
}
