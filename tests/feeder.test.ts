import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { generateFeed, runFeed, toAtomEntry, writeFeedFile } from "../src/feeder/index.js";
import { ConfigError, OutputError } from "../src/errors/index.js";
import { MemoryFs } from "./helpers/memoryFs.js";
import { testSite } from "./helpers/site.js";
import { candidate } from "./helpers/candidate.js";


const NOW = new Date("2024-05-05T12:00:00Z");


beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});


describe("generateFeed", () => {
  it("flat 分类：带日期前缀与不带前缀的文章", async () => {
    const fs = new MemoryFs()
      .addFile("/site/texts/2021-01-15-hello.gmi", { content: "# Hello" })
      .addFile("/site/texts/world.gmi", { content: "# World", created: new Date("2022-06-01T00:00:00Z") });
    const { feed, entries } = await generateFeed(testSite(), fs, { now: NOW });
    expect(entries.map((e) => [e.title, e.link, e.updated.toISOString()])).toEqual([
      ["world", "gemini://example.org/texts/world.gmi", "2022-06-01T00:00:00.000Z"],
      ["hello", "gemini://example.org/texts/2021-01-15-hello.gmi", "2021-01-15T00:00:00.000Z"],
    ]);
    expect(entries[1].content).toBe("# Hello");
    expect(feed.updated.toISOString()).toBe("2022-06-01T00:00:00.000Z");
  });

  it("tree 分类：无日期前缀的文章目录使用创建时间", async () => {
    const fs = new MemoryFs().addFile("/site/noise/spam-and-eggs/index.gmi", {
      created: new Date("2023-02-02T00:00:00Z"),
      modified: new Date("2023-09-09T00:00:00Z"),
    });
    const site = testSite({ categories: [{ dir: "noise", scheme: "tree" }] });
    const { entries } = await generateFeed(site, fs, { now: NOW });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      id: "gemini://example.org/noise/spam-and-eggs/index.gmi",
      title: "spam-and-eggs",
      contentType: "text/gemini",
    });
    expect(entries[0].updated.toISOString()).toBe("2023-02-02T00:00:00.000Z");
  });

  it("跨分类全局排序并截断", async () => {
    const fs = new MemoryFs()
      .addFile("/site/texts/2021-01-01-old.gmi")
      .addFile("/site/texts/2023-01-01-new.gmi")
      .addFile("/site/noise/2022-01-01-middle/index.gmi");
    const site = testSite({
      limit: 2,
      categories: [
        { dir: "texts", scheme: "flat" },
        { dir: "noise", scheme: "tree" },
      ],
    });
    const { entries } = await generateFeed(site, fs, { now: NOW });
    expect(entries.map((e) => e.title)).toEqual(["new", "middle"]);
  });

  it("截断之外的条目不读取正文", async () => {
    const fs = new MemoryFs()
      .addFile("/site/texts/2023-01-01-new.gmi")
      .addFile("/site/texts/2021-01-01-old.gmi");
    const read = vi.spyOn(fs, "readFile");
    await generateFeed(testSite({ limit: 1 }), fs, { now: NOW });
    expect(read.mock.calls).toEqual([["/site/texts/2023-01-01-new.gmi"]]);
  });

  it("正文读取失败的条目被丢弃并记录警告", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const fs = new MemoryFs()
      .addFile("/site/texts/2023-01-01-broken.gmi", { failRead: true })
      .addFile("/site/texts/2021-01-01-fine.gmi");
    const { feed, entries } = await generateFeed(testSite(), fs, { now: NOW });
    expect(entries.map((e) => e.title)).toEqual(["fine"]);
    expect(feed.entries.map((e) => e.title)).toEqual(["fine"]);
    expect(feed.updated.toISOString()).toBe("2021-01-01T00:00:00.000Z");
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("没有文章时输出空 feed，updated 为生成时间", async () => {
    const fs = new MemoryFs().addFile("/site/texts/index.gmi");
    const { xml, entries } = await generateFeed(testSite(), fs, { now: NOW });
    expect(entries).toEqual([]);
    expect(xml).toContain("<updated>2024-05-05T12:00:00Z</updated>");
    expect(xml).not.toContain("<entry>");
  });

  it("文件名含控制字符时输出仍是合法 XML", async () => {
    const fs = new MemoryFs().addFile("/site/texts/bad\u0001name.gmi", { content: "body" });
    const { xml } = await generateFeed(testSite({ subtitle: "s\u000bt" }), fs, { now: NOW });
    expect(xml).toContain("    <title>badname</title>\n");
    expect(xml).toContain("  <subtitle>st</subtitle>\n");
    expect(xml.includes("\u0001")).toBe(false);
    expect(xml.includes("\u000b")).toBe(false);
  });

  it("未配置作者时 feed 仍带 author，名字为 feed 标题", async () => {
    const fs = new MemoryFs().addFile("/site/texts/post.gmi");
    const { xml } = await generateFeed(testSite(), fs, { now: NOW });
    expect(xml).toContain("  <author>\n    <name>Test capsule</name>\n  </author>\n");
  });

  it("根目录不存在时抛出 ConfigError", async () => {
    await expect(generateFeed(testSite(), new MemoryFs(), { now: NOW })).rejects.toBeInstanceOf(ConfigError);
  });
});


describe("toAtomEntry", () => {
  it("非法 UTF-8 字节解码为 U+FFFD", () => {
    const entry = toAtomEntry(testSite(), candidate("texts/a.gmi", "2021-01-15T00:00:00Z", "a"), Uint8Array.from([0x61, 0xff, 0x62]));
    expect(entry.content).toBe("a\uFFFDb");
  });
});


describe("runFeed", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gemini-atom-feeder-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("把 feed 写到输出路径", async () => {
    const fs = new MemoryFs().addFile(join(dir, "texts", "2021-01-15-hello.gmi"), { content: "hi" });
    const site = testSite({ rootDir: dir });
    const result = await runFeed(site, fs, { now: NOW });
    expect(await readFile(join(dir, "atom.xml"), "utf-8")).toBe(result.xml);
    expect(await readdir(dir)).toEqual(["atom.xml"]);
  });

  it("配置错误时不改动已有的输出文件", async () => {
    await writeFile(join(dir, "atom.xml"), "old", "utf-8");
    const fs = new MemoryFs().addDir(dir);
    await expect(runFeed(testSite({ rootDir: dir }), fs, { now: NOW })).rejects.toBeInstanceOf(ConfigError);
    expect(await readFile(join(dir, "atom.xml"), "utf-8")).toBe("old");
  });
});


describe("writeFeedFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gemini-atom-write-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("覆盖已有文件", async () => {
    const path = join(dir, "atom.xml");
    await writeFile(path, "old", "utf-8");
    await writeFeedFile(path, "<feed/>");
    expect(await readFile(path, "utf-8")).toBe("<feed/>");
    expect(await readdir(dir)).toEqual(["atom.xml"]);
  });

  it("目标目录不存在时抛出带路径的 OutputError", async () => {
    const path = join(dir, "missing", "atom.xml");
    const err = await writeFeedFile(path, "<feed/>").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OutputError);
    expect(err).toMatchObject({ path });
    expect(await readdir(dir)).toEqual([]);
  });
});
