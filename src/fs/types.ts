// 文件系统访问接口：扫描器与解析器只依赖此契约，测试可替换为内存实现


/** 目录项类型：符号链接按其指向解析 */
export type DirEntryKind = "file" | "directory" | "other";


export interface DirEntry {
  name: string;
  kind: DirEntryKind;
}


/** 读取站点目录所需的全部文件系统能力 */
export interface FsAccessor {
  /** 列出目录的直接子项；目录不存在或不可读时抛出 */
  list(dir: string): Promise<DirEntry[]>;
  /** 路径是否为目录；路径不存在时返回 false */
  isDirectory(path: string): Promise<boolean>;
  /** 读取文件原始字节 */
  readFile(path: string): Promise<Uint8Array>;
  /** 文件创建时间 */
  createdAt(path: string): Promise<Date>;
  /** 文件最后修改时间 */
  modifiedAt(path: string): Promise<Date>;
  /** 文件对所有用户可读（其他用户读权限位） */
  isPubliclyReadable(path: string): Promise<boolean>;
}
