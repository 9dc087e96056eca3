// 日志类型与结构化条目
// 设计原则：控制台由 LOG_LEVEL 过滤（默认 info），quiet 模式只保留 error。

/** 日志级别：控制输出策略（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "scanner" // 分类目录扫描、文章发现
  | "feed"    // 条目排序、Atom 生成
  | "feeder"  // 单次运行编排与输出写入
  | "config"  // 配置构建与校验
  | "cli";    // 命令行入口

/** payload 常用字段约定（非强制） */
export interface LogPayloadConvention {
  /** 错误对象 message，避免序列化整个 Error */
  err?: string;
  /** 相关文件或目录路径 */
  path?: string;
  [k: string]: unknown;
}

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、path 等） */
  payload?: Record<string, unknown>;
  created_at: string;
}
