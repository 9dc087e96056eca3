// 将 feed 元信息 + 条目构建为 Atom 1.0 XML

import type { AtomEntry, FeedModel } from "./types.js";


export const ATOM_NS = "http://www.w3.org/2005/Atom";
export const GENERATOR = "gemini-atom";


/** XML 1.0 不允许出现的控制字符 */
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;


/** 所有文本字段与属性值：去掉非法字符并转义五个保留字符 */
export function escapeXml(s: string): string {
  return s
    .replace(INVALID_XML_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}


/** 正文只转义标记字符，其余原样保留 */
function escapeContent(s: string): string {
  return s
    .replace(INVALID_XML_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}


/** RFC 3339，UTC，精确到秒 */
export function toRfc3339(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, "Z");
}


function buildEntry(entry: AtomEntry): string {
  const updated = toRfc3339(entry.updated);
  let buf = `  <entry>\n`;
  buf += `    <id>${escapeXml(entry.id)}</id>\n`;
  buf += `    <title>${escapeXml(entry.title)}</title>\n`;
  buf += `    <link rel="alternate" href="${escapeXml(entry.link)}"/>\n`;
  buf += `    <updated>${updated}</updated>\n`;
  buf += `    <published>${updated}</published>\n`;
  buf += `    <content type="${escapeXml(entry.contentType)}">${escapeContent(entry.content)}</content>\n`;
  buf += `  </entry>\n`;
  return buf;
}


export function buildAtomXml(feed: FeedModel, entries: AtomEntry[]): string {
  let head = `  <id>${escapeXml(feed.baseUrl)}</id>\n`;
  head += `  <title>${escapeXml(feed.title)}</title>\n`;
  if (feed.subtitle) head += `  <subtitle>${escapeXml(feed.subtitle)}</subtitle>\n`;
  head += `  <updated>${toRfc3339(feed.updated)}</updated>\n`;
  head += `  <link rel="alternate" href="${escapeXml(feed.baseUrl)}"/>\n`;
  if (feed.selfUrl) head += `  <link rel="self" href="${escapeXml(feed.selfUrl)}"/>\n`;
  head += `  <author>\n    <name>${escapeXml(feed.author.name)}</name>\n`;
  if (feed.author.email) head += `    <email>${escapeXml(feed.author.email)}</email>\n`;
  head += `  </author>\n`;
  head += `  <generator>${GENERATOR}</generator>\n`;
  const items = entries.map(buildEntry).join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="${ATOM_NS}">
${head}${items}</feed>
`;
}
