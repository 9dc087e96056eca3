// 命令行参数：node:util parseArgs 解析后交给 buildSiteConfig 校验

import { parseArgs } from "node:util";
import { buildSiteConfig, parseCategorySpec, DEFAULT_LIMIT, DEFAULT_OUTPUT } from "../config/siteConfig.js";
import { UsageError, errorMessage } from "../errors/index.js";
import type { SiteConfig } from "../config/types.js";


export const PROGRAM = "gemini-atom";
export const VERSION = "1.0.0";


export const HELP = `${PROGRAM} ${VERSION}
Generate an Atom feed out of a Gemini capsule

Usage: ${PROGRAM} -d DIR -b URL -c DIR:TYPE [-c DIR:TYPE ...] [options]

Options:
  -a, --author NAME        Author name
  -b, --base URL           Base URL for feed and entries (gemini://)
  -c, --category DIR:TYPE  Category of a subdir, TYPE is 'flat' or 'tree' (repeatable)
  -d, --directory DIR      Root directory of the site
  -e, --email EMAIL        Author's email address
  -n, --count N            Include the N most recent entries (default ${DEFAULT_LIMIT})
  -o, --output FILE        Output file, relative to the root directory (default ${DEFAULT_OUTPUT})
  -q, --quiet              Do not write on stdout under non-error conditions
  -s, --subtitle STR       Feed subtitle
  -t, --title STR          Feed title (default: root directory name)
      --mtime              Use file modification time instead of creation time
  -u, --clean-titles       Replace underscores with spaces in titles
  -h, --help               Print this help
  -V, --version            Print version
`;


const OPTIONS = {
  author: { type: "string", short: "a" },
  base: { type: "string", short: "b" },
  category: { type: "string", short: "c", multiple: true },
  directory: { type: "string", short: "d" },
  email: { type: "string", short: "e" },
  count: { type: "string", short: "n" },
  output: { type: "string", short: "o" },
  quiet: { type: "boolean", short: "q" },
  subtitle: { type: "string", short: "s" },
  title: { type: "string", short: "t" },
  mtime: { type: "boolean" },
  "clean-titles": { type: "boolean", short: "u" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "V" },
} as const;


export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; config: SiteConfig };


function parseCount(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_LIMIT;
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(n)) {
    throw new UsageError(`Invalid entry count: ${raw}`);
  }
  return n;
}


function readOptions(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: false, strict: true }).values;
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
}


/**
 * 解析命令行。
 * 选项格式错误或缺少必填项抛 UsageError；取值不合法（URL、分类）抛 ConfigError。
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const values = readOptions(argv);
  if (values.help) return { kind: "help" };
  if (values.version) return { kind: "version" };

  const missing: string[] = [];
  if (!values.directory) missing.push("--directory");
  if (!values.base) missing.push("--base");
  if (!values.category || values.category.length === 0) missing.push("--category");
  if (missing.length > 0 || !values.directory || !values.base || !values.category) {
    throw new UsageError(`Missing required option(s): ${missing.join(", ")}`);
  }

  const config = buildSiteConfig({
    rootDir: values.directory,
    baseUrl: values.base,
    categories: values.category.map(parseCategorySpec),
    author: values.author,
    email: values.email,
    title: values.title,
    subtitle: values.subtitle,
    output: values.output,
    limit: parseCount(values.count),
    dateSource: values.mtime ? "modified" : "created",
    cleanTitles: values["clean-titles"] ?? false,
    quiet: values.quiet ?? false,
  });
  return { kind: "run", config };
}
