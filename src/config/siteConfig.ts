// 站点配置：zod 校验命令行/调用方传入的原始选项，解析路径并冻结为 SiteConfig

import { basename, isAbsolute, normalize, resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors/index.js";
import { normalizeBaseUrl } from "../feed/url.js";
import type { CategoryDescriptor, CategoryScheme, SiteConfig } from "./types.js";


export const DEFAULT_LIMIT = 10;
export const DEFAULT_OUTPUT = "atom.xml";
const SCHEMES: readonly CategoryScheme[] = ["flat", "tree"];


function isCategoryScheme(s: string): s is CategoryScheme {
  return SCHEMES.some((scheme) => scheme === s);
}


/** 校验 gemini:// URL：不允许携带用户名或密码 */
function checkGeminiUrl(val: string, ctx: z.RefinementCtx): void {
  let url: URL;
  try {
    url = new URL(val);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid URL: ${val}` });
    return;
  }
  if (url.protocol !== "gemini:") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Bad url scheme : ${url.protocol.replace(/:$/, "")}` });
    return;
  }
  if (url.username !== "" || url.password !== "") {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `user authentication not allowed in url ${val}` });
  }
}


/** 分类目录必须是根目录内的相对路径 */
function staysInsideRoot(dir: string): boolean {
  if (isAbsolute(dir)) return false;
  const n = normalize(dir);
  return n !== ".." && !n.startsWith("../");
}


const categorySchema = z.object({
  dir: z.string().min(1).refine(staysInsideRoot, { message: "Category directory must be relative to the site root" }),
  scheme: z.enum(["flat", "tree"]),
});


export const siteConfigSchema = z.object({
  rootDir: z.string().min(1, "Root directory is required"),
  baseUrl: z.string().superRefine(checkGeminiUrl),
  categories: z.array(categorySchema).min(1, "At least one category is required"),
  author: z.string().optional(),
  email: z.string().optional(),
  title: z.string().optional(),
  subtitle: z.string().optional(),
  /** 相对根目录或绝对路径 */
  output: z.string().min(1).default(DEFAULT_OUTPUT),
  limit: z.number().int().default(DEFAULT_LIMIT),
  dateSource: z.enum(["created", "modified"]).default("created"),
  cleanTitles: z.boolean().default(false),
  quiet: z.boolean().default(false),
});


export type SiteConfigInput = z.input<typeof siteConfigSchema>;


/** 解析 `DIR:TYPE` 形式的分类描述，TYPE 为 flat 或 tree */
export function parseCategorySpec(spec: string): CategoryDescriptor {
  const parts = spec.split(":");
  if (parts.length !== 2 || parts[0] === "") {
    throw new ConfigError(`Bad category specification: ${spec}`);
  }
  const [dir, scheme] = parts;
  if (!isCategoryScheme(scheme)) {
    throw new ConfigError(`Not a valid category: ${scheme}`);
  }
  return { dir, scheme };
}


/** 同一目录出现多次时以最后一次为准，保持首次出现的位置 */
function dedupeCategories(categories: readonly CategoryDescriptor[]): CategoryDescriptor[] {
  const byDir = new Map<string, CategoryDescriptor>();
  for (const c of categories) {
    const dir = normalize(c.dir).replace(/\/+$/, "");
    byDir.set(dir, Object.freeze({ dir, scheme: c.scheme }));
  }
  return [...byDir.values()];
}


/** 校验并构建不可变的 SiteConfig；不合法时抛 ConfigError */
export function buildSiteConfig(input: SiteConfigInput): SiteConfig {
  const result = siteConfigSchema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigError(`Invalid configuration (${message})`);
  }
  const raw = result.data;
  const rootDir = resolve(raw.rootDir);
  const config: SiteConfig = {
    rootDir,
    baseUrl: normalizeBaseUrl(raw.baseUrl),
    categories: Object.freeze(dedupeCategories(raw.categories)),
    author: raw.author || undefined,
    email: raw.email || undefined,
    title: raw.title || basename(rootDir),
    subtitle: raw.subtitle || undefined,
    outputPath: resolve(rootDir, raw.output),
    limit: raw.limit,
    dateSource: raw.dateSource,
    cleanTitles: raw.cleanTitles,
    quiet: raw.quiet,
  };
  return Object.freeze(config);
}
