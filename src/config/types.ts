// 站点配置类型：一次运行构建一次，显式传给每个组件

/** 分类组织方式：flat 目录下每个文件一篇；tree 每个子目录一篇（子目录内 index.*） */
export type CategoryScheme = "flat" | "tree";


/** 无日期前缀时采用的文件时间 */
export type DateSource = "created" | "modified";


export interface CategoryDescriptor {
  /** 相对站点根目录的子目录 */
  readonly dir: string;
  readonly scheme: CategoryScheme;
}


export interface SiteConfig {
  /** 站点根目录（绝对路径） */
  readonly rootDir: string;
  /** 基础 URL，规范化为以 / 结尾 */
  readonly baseUrl: string;
  readonly categories: readonly CategoryDescriptor[];
  readonly author?: string;
  readonly email?: string;
  readonly title: string;
  readonly subtitle?: string;
  /** 输出文件（绝对路径） */
  readonly outputPath: string;
  /** 最多输出条目数；<= 0 时输出空 feed */
  readonly limit: number;
  readonly dateSource: DateSource;
  /** 标题中下划线替换为空格 */
  readonly cleanTitles: boolean;
  /** 只输出错误 */
  readonly quiet: boolean;
}
