// 链接拼接：基础 URL + 相对根目录的路径，逐段百分号编码


/** 规范化基础 URL：去掉 query / fragment，路径以 / 结尾 */
export function normalizeBaseUrl(raw: string): string {
  const url = new URL(raw);
  url.search = "";
  url.hash = "";
  const href = url.href;
  return href.endsWith("/") ? href : `${href}/`;
}


/** 相对路径（/ 分隔）拼到基础 URL 上；同一输入在每次运行中得到相同结果，可作为条目 id */
export function joinUrl(baseUrl: string, relPath: string): string {
  const encoded = relPath.split("/").map(encodeURIComponent).join("/");
  return new URL(encoded, baseUrl).href;
}
