// FsAccessor 的 Node 实现：基于 node:fs/promises

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Stats } from "node:fs";
import type { DirEntry, DirEntryKind, FsAccessor } from "./types.js";

export type { DirEntry, DirEntryKind, FsAccessor } from "./types.js";


/** 其他用户读权限位 */
const S_IROTH = 0o004;


function kindOf(st: Stats): DirEntryKind {
  if (st.isDirectory()) return "directory";
  if (st.isFile()) return "file";
  return "other";
}


/** 创建时间：文件系统不记录 birthtime 时（birthtimeMs 为 0）退回 ctime */
export function creationTime(st: Stats): Date {
  return st.birthtimeMs > 0 ? st.birthtime : st.ctime;
}


export const nodeFs: FsAccessor = {
  async list(dir: string): Promise<DirEntry[]> {
    const dirents = await readdir(dir, { withFileTypes: true });
    const entries: DirEntry[] = [];
    for (const d of dirents) {
      if (d.isSymbolicLink()) {
        try {
          entries.push({ name: d.name, kind: kindOf(await stat(join(dir, d.name))) });
        } catch {
          // 悬空链接
          entries.push({ name: d.name, kind: "other" });
        }
        continue;
      }
      entries.push({ name: d.name, kind: d.isDirectory() ? "directory" : d.isFile() ? "file" : "other" });
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return entries;
  },

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch {
      return false;
    }
  },

  async readFile(path: string): Promise<Uint8Array> {
    return readFile(path);
  },

  async createdAt(path: string): Promise<Date> {
    return creationTime(await stat(path));
  },

  async modifiedAt(path: string): Promise<Date> {
    return (await stat(path)).mtime;
  },

  async isPubliclyReadable(path: string): Promise<boolean> {
    return ((await stat(path)).mode & S_IROTH) !== 0;
  },
};
