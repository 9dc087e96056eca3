// 错误分类：配置错误与输出错误为致命错误，由 CLI 捕获后以非零状态退出；单篇文章的 I/O 错误只在扫描层记录警告


/** 配置错误：根目录缺失、分类目录不可读、分类描述格式错误等，在写出任何输出之前中止 */
export class ConfigError extends Error {
  /** 出错的路径（若与某个路径相关） */
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${message}: ${path}` : message);
    this.name = "ConfigError";
    this.path = path;
  }
}


/** 输出错误：写入 feed 文件失败 */
export class OutputError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = "OutputError";
    this.path = path;
  }
}


/** 命令行用法错误：缺少必填参数、未知选项等 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}


/** 从任意抛出值中取出可读的错误消息 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
